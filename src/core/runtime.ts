import { randomUUID } from "node:crypto";
import { parleyConfig } from "../config.js";
import { loadPersistedState, savePersistedState, getParleyDataDir } from "../persistence.js";
import { FileProfileStore, initDefaultProfiles, type ApiProfile, type ProfileDraft, type ProfileStore } from "../profiles.js";
import {
  OpenAiChatTransport,
  extractCompletionContent,
  type ChatRequest,
  type ChatTransport,
} from "../chat-http.js";
import type { ChatMessage } from "../chat-types.js";
import {
  NoModelConfiguredError,
  NoProfileConfiguredError,
  ProfileNotFoundError,
  describeExchangeFailure,
  toStreamError,
  toTransportError,
  type StreamError,
  type TransportError,
} from "../errors.js";
import { parseModelList, reconcileModel, resolveSelection } from "./selection.js";
import {
  createSessionState,
  findMessage,
  reduceSession,
  snapshotHistory,
  type SessionAction,
  type SessionState,
} from "./session.js";

export type RuntimeEvent = {
  type: string;
  payload: Record<string, unknown>;
};

export type PublicProfile = {
  id: string;
  serviceName: string;
  baseUrl: string;
  models: string[];
  hasApiKey: boolean;
  createdAt: string;
  updatedAt: string;
};

export type RuntimeSnapshot = {
  profiles: {
    count: number;
    ids: string[];
  };
  defaults: {
    profileId: string | null;
    model: string;
    useStreaming: boolean;
  };
  sessions: {
    count: number;
    ids: string[];
  };
  debug: boolean;
};

export type SettingsView = {
  session_id: string;
  profiles: PublicProfile[];
  selected_profile_id: string | null;
  selected_model: string;
  models: string[];
  use_streaming: boolean;
};

export type SendResult =
  | {
      session_id: string;
      accepted: true;
      turn_id: string;
      message_id: string;
    }
  | {
      session_id: string;
      accepted: false;
      reason: "empty" | "busy";
    };

export type RuntimeInitOptions = {
  store?: ProfileStore;
  transport?: ChatTransport;
  dataDir?: string;
  scrollSettleMs?: number;
  debug?: boolean;
  seedProfile?: ProfileDraft & { apiKey: string } | null;
};

type RuntimeSession = {
  state: SessionState;
  scrollTimer: ReturnType<typeof setTimeout> | null;
  activeTurn: Promise<void> | null;
};

type SelectionDefaults = {
  profileId: string | null;
  model: string;
  useStreaming: boolean;
};

export class ParleyCoreRuntime {
  private readonly store: ProfileStore;
  private readonly transport: ChatTransport;
  private readonly dataDir: string;
  private readonly scrollSettleMs: number;
  private readonly seedProfile: (ProfileDraft & { apiKey: string }) | null;

  private profiles: ApiProfile[] = [];
  private defaults: SelectionDefaults = {
    profileId: null,
    model: "",
    useStreaming: parleyConfig.defaultUseStreaming,
  };
  private listeners = new Set<(event: RuntimeEvent) => void>();
  private sessions = new Map<string, RuntimeSession>();
  private superDebug: boolean;
  private shuttingDown = false;

  private constructor(options: RuntimeInitOptions = {}) {
    this.dataDir = options.dataDir ?? getParleyDataDir();
    this.store = options.store ?? new FileProfileStore({ dataDir: this.dataDir });
    this.transport = options.transport ?? new OpenAiChatTransport();
    this.scrollSettleMs = options.scrollSettleMs ?? parleyConfig.scrollSettleMs;
    this.superDebug = options.debug ?? parleyConfig.debug;
    this.seedProfile = options.seedProfile === undefined ? parleyConfig.seedProfile : options.seedProfile;
  }

  static async create(options: RuntimeInitOptions = {}): Promise<ParleyCoreRuntime> {
    const runtime = new ParleyCoreRuntime(options);
    await runtime.initialize();
    return runtime;
  }

  onEvent(listener: (event: RuntimeEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(type: string, payload: Record<string, unknown>): void {
    const event: RuntimeEvent = {
      type,
      payload,
    };
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  async initialize(): Promise<void> {
    const persisted = loadPersistedState(this.dataDir);
    this.defaults = {
      profileId: persisted?.selectedProfileId ?? null,
      model: persisted?.selectedModel ?? "",
      useStreaming: persisted?.useStreaming ?? this.defaults.useStreaming,
    };

    this.profiles = this.seedProfile
      ? await initDefaultProfiles(this.store, this.seedProfile)
      : await this.store.listProfiles();
    this.reconcileDefaults();
  }

  async shutdown(reason?: string): Promise<{ accepted: true; reason?: string }> {
    this.shuttingDown = true;
    for (const session of this.sessions.values()) {
      this.clearScrollTimer(session);
    }
    this.sessions.clear();

    this.emit("state.changed", {
      reason: reason ?? "shutdown",
      snapshot: this.getState(),
    });

    return {
      accepted: true,
      reason,
    };
  }

  getState(): RuntimeSnapshot {
    return {
      profiles: {
        count: this.profiles.length,
        ids: this.profiles.map((profile) => profile.id),
      },
      defaults: { ...this.defaults },
      sessions: {
        count: this.sessions.size,
        ids: [...this.sessions.keys()],
      },
      debug: this.superDebug,
    };
  }

  createSession(): { session_id: string; state: SessionState } {
    if (this.shuttingDown) {
      throw new Error("runtime is shutting down");
    }
    const id = randomUUID();
    const selection = resolveSelection(this.profiles, this.defaults.profileId, this.defaults.model);
    const session: RuntimeSession = {
      state: createSessionState({
        id,
        createdAt: new Date().toISOString(),
        profileId: selection.profile?.id ?? null,
        model: selection.model,
        useStreaming: this.defaults.useStreaming,
      }),
      scrollTimer: null,
      activeTurn: null,
    };

    this.sessions.set(id, session);
    this.emit("state.changed", {
      reason: "session_created",
      session_id: id,
      snapshot: this.getState(),
    });

    return {
      session_id: id,
      state: copySessionState(session.state),
    };
  }

  getSession(sessionId: string): SessionState {
    return copySessionState(this.requireSession(sessionId).state);
  }

  closeSession(sessionId: string): { session_id: string; closed: boolean } {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return { session_id: sessionId, closed: false };
    }
    this.clearScrollTimer(session);
    this.sessions.delete(sessionId);
    this.emit("state.changed", {
      reason: "session_closed",
      session_id: sessionId,
      snapshot: this.getState(),
    });
    return { session_id: sessionId, closed: true };
  }

  clearSession(sessionId: string): SessionState {
    const session = this.requireSession(sessionId);
    this.dispatch(session, { type: "cleared" });
    return copySessionState(session.state);
  }

  /** Resolves once the session has no exchange in flight. */
  async whenIdle(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    while (session?.activeTurn) {
      await session.activeTurn;
    }
  }

  async sendSessionPrompt(params: { session_id: string; text?: string }): Promise<SendResult> {
    const session = this.requireSession(params.session_id);
    const text = (params.text ?? "").trim();

    if (!text) {
      return { session_id: session.state.id, accepted: false, reason: "empty" };
    }
    if (session.state.isWaitingForResponse) {
      return { session_id: session.state.id, accepted: false, reason: "busy" };
    }

    const selection = resolveSelection(this.profiles, session.state.currentProfileId, session.state.currentModel);
    if (!selection.profile) {
      throw new NoProfileConfiguredError();
    }
    if (!selection.model) {
      throw new NoModelConfiguredError(selection.profile.id);
    }
    this.dispatch(session, {
      type: "selection_changed",
      profileId: selection.profile.id,
      model: selection.model,
    });

    // Context is taken before the new user message is appended.
    const history = snapshotHistory(session.state);
    const turnId = randomUUID();
    const messageId = randomUUID();
    this.dispatch(session, {
      type: "submit",
      userMessageId: randomUUID(),
      assistantMessageId: messageId,
      text,
      modelName: selection.model,
      createdTime: new Date().toISOString(),
    });

    const turn: Promise<void> = this.runExchange({
      session,
      turnId,
      messageId,
      streaming: session.state.useStreaming,
      request: {
        profile: selection.profile,
        model: selection.model,
        message: text,
        history,
      },
    })
      .catch((error: unknown) => {
        this.emit("session.error", {
          session_id: session.state.id,
          turn_id: turnId,
          message_id: messageId,
          code: "internal_error",
          message: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => {
        if (session.activeTurn === turn) {
          session.activeTurn = null;
        }
      });
    session.activeTurn = turn;

    return {
      session_id: session.state.id,
      accepted: true,
      turn_id: turnId,
      message_id: messageId,
    };
  }

  async openSettings(sessionId: string): Promise<SettingsView> {
    this.requireSession(sessionId);
    await this.refreshProfiles("settings_opened");
    return this.buildSettingsView(sessionId);
  }

  async saveSettings(params: {
    session_id: string;
    profile_id?: string;
    model?: string;
    use_streaming?: boolean;
  }): Promise<SettingsView> {
    const session = this.requireSession(params.session_id);

    if (params.profile_id !== undefined || params.model !== undefined) {
      const profileId = params.profile_id ?? session.state.currentProfileId;
      const profile = this.profiles.find((candidate) => candidate.id === profileId);
      if (!profile) {
        throw profileId ? new ProfileNotFoundError(profileId) : new NoProfileConfiguredError();
      }
      const model = reconcileModel(profile, params.model ?? session.state.currentModel);
      this.dispatch(session, { type: "selection_changed", profileId: profile.id, model });
      this.defaults.profileId = profile.id;
      this.defaults.model = model;
    }

    if (params.use_streaming !== undefined) {
      this.dispatch(session, { type: "streaming_toggled", enabled: params.use_streaming });
      this.defaults.useStreaming = params.use_streaming;
    }

    this.persistDefaults();
    return this.buildSettingsView(session.state.id);
  }

  async listProfiles(): Promise<{ profiles: PublicProfile[] }> {
    await this.refreshProfiles("profiles_listed");
    return { profiles: this.profiles.map(toPublicProfile) };
  }

  async getProfile(profileId: string): Promise<PublicProfile> {
    const profile = await this.store.getProfileById(profileId);
    if (!profile) {
      throw new ProfileNotFoundError(profileId);
    }
    return toPublicProfile(profile);
  }

  async createProfile(draft: ProfileDraft): Promise<PublicProfile> {
    const profile = await this.store.createProfile(draft);
    await this.refreshProfiles("profile_created");
    return toPublicProfile(profile);
  }

  async updateProfile(profileId: string, draft: Partial<ProfileDraft>): Promise<PublicProfile> {
    const profile = await this.store.updateProfile(profileId, draft);
    await this.refreshProfiles("profile_updated");
    return toPublicProfile(profile);
  }

  async deleteProfile(profileId: string): Promise<{ profile_id: string; deleted: boolean }> {
    const deleted = await this.store.deleteProfile(profileId);
    await this.refreshProfiles("profile_deleted");
    return { profile_id: profileId, deleted };
  }

  setDebug(enabled: boolean): { super_debug: boolean } {
    this.superDebug = enabled;
    return { super_debug: this.superDebug };
  }

  private async refreshProfiles(reason: string): Promise<void> {
    this.profiles = await this.store.listProfiles();
    this.reconcileDefaults();
    for (const session of this.sessions.values()) {
      const selection = resolveSelection(this.profiles, session.state.currentProfileId, session.state.currentModel);
      this.dispatch(session, {
        type: "selection_changed",
        profileId: selection.profile?.id ?? null,
        model: selection.model,
      });
    }
    this.emit("state.changed", {
      reason,
      snapshot: this.getState(),
    });
  }

  private reconcileDefaults(): void {
    const selection = resolveSelection(this.profiles, this.defaults.profileId, this.defaults.model);
    this.defaults.profileId = selection.profile?.id ?? null;
    this.defaults.model = selection.model;
  }

  private persistDefaults(): void {
    savePersistedState(
      {
        selectedProfileId: this.defaults.profileId,
        selectedModel: this.defaults.model,
        useStreaming: this.defaults.useStreaming,
      },
      this.dataDir,
    );
  }

  private buildSettingsView(sessionId: string): SettingsView {
    const state = this.requireSession(sessionId).state;
    const selected = this.profiles.find((profile) => profile.id === state.currentProfileId);
    return {
      session_id: sessionId,
      profiles: this.profiles.map(toPublicProfile),
      selected_profile_id: state.currentProfileId,
      selected_model: state.currentModel,
      models: selected ? parseModelList(selected.models) : [],
      use_streaming: state.useStreaming,
    };
  }

  private async runExchange(input: {
    session: RuntimeSession;
    turnId: string;
    messageId: string;
    streaming: boolean;
    request: ChatRequest;
  }): Promise<void> {
    const { session, turnId, messageId, request } = input;
    const startedAt = Date.now();
    this.debug(session, turnId, messageId, "request", {
      profile_id: request.profile.id,
      model: request.model,
      streaming: input.streaming,
      history_length: request.history.length,
    });

    if (input.streaming) {
      let fragmentCount = 0;
      try {
        for await (const fragment of this.transport.sendStreamChatRequest(request)) {
          fragmentCount += 1;
          this.dispatch(session, { type: "stream_fragment", messageId, fragment });
        }
      } catch (error) {
        const failure = toStreamError(error);
        this.dispatch(session, {
          type: "stream_failed",
          messageId,
          errorText: describeExchangeFailure(failure),
        });
        this.emitFailure(session, turnId, messageId, failure);
        return;
      }

      this.dispatch(session, { type: "response_completed", messageId });
      this.debug(session, turnId, messageId, "stream_done", {
        fragment_count: fragmentCount,
        duration_ms: Date.now() - startedAt,
      });
      this.emitCompleted(session, turnId, messageId);
      return;
    }

    let content: string;
    try {
      content = extractCompletionContent(await this.transport.sendChatRequest(request));
    } catch (error) {
      const failure = toTransportError(error);
      this.dispatch(session, {
        type: "request_failed",
        messageId,
        errorText: describeExchangeFailure(failure),
        createdTime: new Date().toISOString(),
      });
      this.emitFailure(session, turnId, messageId, failure);
      return;
    }

    this.dispatch(session, { type: "response_completed", messageId, content });
    this.debug(session, turnId, messageId, "response_done", {
      answer_length: content.length,
      duration_ms: Date.now() - startedAt,
    });
    this.emitCompleted(session, turnId, messageId);
  }

  private dispatch(session: RuntimeSession, action: SessionAction): void {
    if (this.sessions.get(session.state.id) !== session) {
      return;
    }
    const transition = reduceSession(session.state, action);
    session.state = transition.state;
    for (const effect of transition.effects) {
      if (effect.type === "notify") {
        this.emit("session.state", {
          session_id: session.state.id,
          reason: action.type,
          state: copySessionState(session.state),
        });
      } else {
        this.scheduleScrollToEnd(session);
      }
    }
  }

  private scheduleScrollToEnd(session: RuntimeSession): void {
    this.clearScrollTimer(session);
    session.scrollTimer = setTimeout(() => {
      session.scrollTimer = null;
      this.emit("view.scroll_to_end", {
        session_id: session.state.id,
      });
    }, this.scrollSettleMs);
  }

  private clearScrollTimer(session: RuntimeSession): void {
    if (session.scrollTimer) {
      clearTimeout(session.scrollTimer);
      session.scrollTimer = null;
    }
  }

  private emitCompleted(session: RuntimeSession, turnId: string, messageId: string): void {
    const message = this.findLiveMessage(session, messageId);
    if (!message) {
      return;
    }
    this.emit("session.completed", {
      session_id: session.state.id,
      turn_id: turnId,
      message_id: messageId,
      answer_length: message.content.length,
    });
  }

  private emitFailure(
    session: RuntimeSession,
    turnId: string,
    messageId: string,
    failure: TransportError | StreamError,
  ): void {
    if (!this.findLiveMessage(session, messageId)) {
      return;
    }
    this.emit("session.error", {
      session_id: session.state.id,
      turn_id: turnId,
      message_id: messageId,
      code: failure.code,
      message: failure.message,
      status: failure.status,
    });
  }

  private findLiveMessage(session: RuntimeSession, messageId: string): ChatMessage | undefined {
    if (this.sessions.get(session.state.id) !== session) {
      return undefined;
    }
    return findMessage(session.state, messageId);
  }

  private debug(
    session: RuntimeSession,
    turnId: string,
    messageId: string,
    stage: string,
    data: Record<string, unknown>,
  ): void {
    if (!this.superDebug || !this.findLiveMessage(session, messageId)) {
      return;
    }
    this.emit("session.debug", {
      session_id: session.state.id,
      turn_id: turnId,
      stage,
      data,
    });
  }

  private requireSession(sessionId: string): RuntimeSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new Error(`session not found: ${sessionId}`);
    }
    return session;
  }
}

function copySessionState(state: SessionState): SessionState {
  return { ...state, messages: [...state.messages] };
}

export function toPublicProfile(profile: ApiProfile): PublicProfile {
  return {
    id: profile.id,
    serviceName: profile.serviceName,
    baseUrl: profile.baseUrl,
    models: parseModelList(profile.models),
    hasApiKey: profile.apiKey.trim().length > 0,
    createdAt: profile.createdAt,
    updatedAt: profile.updatedAt,
  };
}
