import { isTerminalStatus, type ChatMessage, type HistoryMessage } from "../chat-types.js";

export type SessionState = {
  id: string;
  createdAt: string;
  messages: ChatMessage[];
  currentProfileId: string | null;
  currentModel: string;
  isWaitingForResponse: boolean;
  inFlightMessageId: string | null;
  useStreaming: boolean;
};

export type SessionAction =
  | {
      type: "submit";
      userMessageId: string;
      assistantMessageId: string;
      text: string;
      modelName: string;
      createdTime: string;
    }
  | {
      type: "stream_fragment";
      messageId: string;
      fragment: string;
    }
  | {
      type: "response_completed";
      messageId: string;
      content?: string;
    }
  | {
      type: "request_failed";
      messageId: string;
      errorText: string;
      createdTime: string;
    }
  | {
      type: "stream_failed";
      messageId: string;
      errorText: string;
    }
  | {
      type: "selection_changed";
      profileId: string | null;
      model: string;
    }
  | {
      type: "streaming_toggled";
      enabled: boolean;
    }
  | {
      type: "cleared";
    };

export type SessionEffect = { type: "notify" } | { type: "scroll_to_end" };

export type SessionTransition = {
  state: SessionState;
  effects: SessionEffect[];
};

const CHANGED_EFFECTS: readonly SessionEffect[] = [{ type: "notify" }, { type: "scroll_to_end" }];

export function createSessionState(params: {
  id: string;
  createdAt: string;
  profileId: string | null;
  model: string;
  useStreaming: boolean;
}): SessionState {
  return {
    id: params.id,
    createdAt: params.createdAt,
    messages: [],
    currentProfileId: params.profileId,
    currentModel: params.model,
    isWaitingForResponse: false,
    inFlightMessageId: null,
    useStreaming: params.useStreaming,
  };
}

/**
 * Applies one action to a session. Returns the same state object and no effects when the
 * action is rejected or would not change anything.
 */
export function reduceSession(state: SessionState, action: SessionAction): SessionTransition {
  switch (action.type) {
    case "submit": {
      if (state.isWaitingForResponse || !action.text.trim()) {
        return unchanged(state);
      }
      const userMessage: ChatMessage = {
        id: action.userMessageId,
        content: action.text,
        isUser: true,
        modelName: action.modelName,
        createdTime: action.createdTime,
        status: "completed",
      };
      const placeholder: ChatMessage = {
        id: action.assistantMessageId,
        content: "",
        isUser: false,
        modelName: action.modelName,
        createdTime: action.createdTime,
        status: "pending",
      };
      return changed({
        ...state,
        messages: [...state.messages, userMessage, placeholder],
        isWaitingForResponse: true,
        inFlightMessageId: placeholder.id,
      });
    }

    case "stream_fragment": {
      if (!action.fragment) {
        return unchanged(state);
      }
      return updateInFlight(state, action.messageId, (message) => ({
        ...message,
        content: message.content + action.fragment,
        status: "streaming",
      }));
    }

    case "response_completed": {
      const next = updateInFlight(state, action.messageId, (message) => ({
        ...message,
        content: action.content ?? message.content,
        status: "completed",
      }));
      return settle(next);
    }

    case "request_failed": {
      const next = updateInFlight(state, action.messageId, (message) => ({
        id: message.id,
        content: action.errorText,
        isUser: false,
        modelName: message.modelName,
        createdTime: action.createdTime,
        status: "failed",
      }));
      return settle(next);
    }

    case "stream_failed": {
      const next = updateInFlight(state, action.messageId, (message) => ({
        ...message,
        content: message.content ? `${message.content}\n\n${action.errorText}` : action.errorText,
        status: "failed",
      }));
      return settle(next);
    }

    case "selection_changed": {
      if (state.currentProfileId === action.profileId && state.currentModel === action.model) {
        return unchanged(state);
      }
      return changed({
        ...state,
        currentProfileId: action.profileId,
        currentModel: action.model,
      });
    }

    case "streaming_toggled": {
      if (state.useStreaming === action.enabled) {
        return unchanged(state);
      }
      return changed({ ...state, useStreaming: action.enabled });
    }

    case "cleared": {
      if (state.messages.length === 0 && !state.isWaitingForResponse) {
        return unchanged(state);
      }
      return changed({
        ...state,
        messages: [],
        isWaitingForResponse: false,
        inFlightMessageId: null,
      });
    }
  }
}

/** Conversation context for the next request: settled messages only, in order. */
export function snapshotHistory(state: SessionState): HistoryMessage[] {
  return state.messages
    .filter((message) => message.status === "completed" && message.content.length > 0)
    .map((message) => ({
      role: message.isUser ? "user" : "assistant",
      content: message.content,
    }));
}

export function findMessage(state: SessionState, messageId: string): ChatMessage | undefined {
  return state.messages.find((message) => message.id === messageId);
}

function updateInFlight(
  state: SessionState,
  messageId: string,
  update: (message: ChatMessage) => ChatMessage,
): SessionTransition {
  if (state.inFlightMessageId !== messageId) {
    return unchanged(state);
  }
  const index = state.messages.findIndex((message) => message.id === messageId);
  const current = index === -1 ? undefined : state.messages[index];
  if (!current || isTerminalStatus(current.status)) {
    return unchanged(state);
  }
  const messages = [...state.messages];
  messages[index] = update(current);
  return changed({ ...state, messages });
}

function settle(transition: SessionTransition): SessionTransition {
  if (transition.effects.length === 0) {
    return transition;
  }
  return changed({
    ...transition.state,
    isWaitingForResponse: false,
    inFlightMessageId: null,
  });
}

function changed(state: SessionState): SessionTransition {
  return { state, effects: [...CHANGED_EFFECTS] };
}

function unchanged(state: SessionState): SessionTransition {
  return { state, effects: [] };
}
