import type { ParleyCoreRuntime } from "../core/runtime.js";
import { ParleyError, ProfileValidationError } from "../errors.js";
import type { ProfileDraft } from "../profiles.js";
import {
  JSON_RPC_ERROR,
  assertBoolean,
  assertObjectParams,
  assertOptionalBoolean,
  assertOptionalString,
  assertString,
  buildRpcMethodError,
  type JsonRpcRequest,
} from "./protocol.js";

type RpcMethodHandler = (params: unknown) => Promise<unknown>;

const PROTOCOL_VERSION = "1.0.0";

export class RpcRouter {
  private readonly runtime: ParleyCoreRuntime;
  private readonly handlers = new Map<string, RpcMethodHandler>();

  constructor(runtime: ParleyCoreRuntime) {
    this.runtime = runtime;
    this.registerHandlers();
  }

  listMethods(): string[] {
    return [...this.handlers.keys()].sort((a, b) => a.localeCompare(b));
  }

  async dispatch(request: JsonRpcRequest): Promise<unknown> {
    const handler = this.handlers.get(request.method);
    if (!handler) {
      throw buildRpcMethodError(
        JSON_RPC_ERROR.METHOD_NOT_FOUND,
        `method not found: ${request.method}`,
        {
          reason: "method_not_found",
          method: request.method,
        },
      );
    }

    try {
      return await handler(request.params);
    } catch (error) {
      if (error instanceof ProfileValidationError) {
        throw buildRpcMethodError(JSON_RPC_ERROR.INVALID_PARAMS, error.message, {
          reason: error.code,
          field: error.field,
        });
      }
      if (error instanceof ParleyError) {
        throw buildRpcMethodError(JSON_RPC_ERROR.APPLICATION_ERROR, error.message, {
          reason: error.code,
        });
      }
      throw error;
    }
  }

  private registerHandlers(): void {
    this.handlers.set("rpc.handshake", async (params) => {
      const body = assertObjectParams(params ?? {}, "rpc.handshake");
      const protocolVersion = assertOptionalString(body.protocol_version, "protocol_version", "rpc.handshake");
      const strict = assertOptionalBoolean(body.strict, "strict", "rpc.handshake") ?? false;

      if (strict && protocolVersion && protocolVersion !== PROTOCOL_VERSION) {
        throw buildRpcMethodError(
          JSON_RPC_ERROR.INVALID_PARAMS,
          `unsupported protocol_version: ${protocolVersion}`,
          {
            reason: "unsupported_protocol_version",
            supported: PROTOCOL_VERSION,
          },
        );
      }

      return {
        protocol_version: PROTOCOL_VERSION,
        server_name: "parley",
        capabilities: {
          events: true,
          streaming: true,
          multi_session: true,
        },
        methods: this.listMethods(),
      };
    });

    this.handlers.set("system.ping", async () => ({
      ok: true,
      time: new Date().toISOString(),
    }));

    this.handlers.set("system.shutdown", async (params) => {
      const body = assertObjectParams(params ?? {}, "system.shutdown");
      const reason = assertOptionalString(body.reason, "reason", "system.shutdown");
      return this.runtime.shutdown(reason);
    });

    this.handlers.set("state.get", async () => this.runtime.getState());

    this.handlers.set("session.create", async () => this.runtime.createSession());

    this.handlers.set("session.get", async (params) => {
      const body = assertObjectParams(params, "session.get");
      const sessionId = assertString(body.session_id, "session_id", "session.get");
      return this.runtime.getSession(sessionId);
    });

    this.handlers.set("session.send", async (params) => {
      const body = assertObjectParams(params, "session.send");
      const sessionId = assertString(body.session_id, "session_id", "session.send");
      const text = assertOptionalString(body.text, "text", "session.send");
      return this.runtime.sendSessionPrompt({
        session_id: sessionId,
        text,
      });
    });

    this.handlers.set("session.clear", async (params) => {
      const body = assertObjectParams(params, "session.clear");
      const sessionId = assertString(body.session_id, "session_id", "session.clear");
      return this.runtime.clearSession(sessionId);
    });

    this.handlers.set("session.close", async (params) => {
      const body = assertObjectParams(params, "session.close");
      const sessionId = assertString(body.session_id, "session_id", "session.close");
      return this.runtime.closeSession(sessionId);
    });

    this.handlers.set("settings.open", async (params) => {
      const body = assertObjectParams(params, "settings.open");
      const sessionId = assertString(body.session_id, "session_id", "settings.open");
      return this.runtime.openSettings(sessionId);
    });

    this.handlers.set("settings.save", async (params) => {
      const body = assertObjectParams(params, "settings.save");
      const sessionId = assertString(body.session_id, "session_id", "settings.save");
      const profileId = assertOptionalString(body.profile_id, "profile_id", "settings.save");
      const model = assertOptionalString(body.model, "model", "settings.save");
      const useStreaming = assertOptionalBoolean(body.use_streaming, "use_streaming", "settings.save");
      return this.runtime.saveSettings({
        session_id: sessionId,
        profile_id: profileId,
        model,
        use_streaming: useStreaming,
      });
    });

    this.handlers.set("profile.list", async () => this.runtime.listProfiles());

    this.handlers.set("profile.get", async (params) => {
      const body = assertObjectParams(params, "profile.get");
      const profileId = assertString(body.profile_id, "profile_id", "profile.get");
      return this.runtime.getProfile(profileId);
    });

    this.handlers.set("profile.create", async (params) => {
      const body = assertObjectParams(params, "profile.create");
      const draft: ProfileDraft = {
        serviceName: assertString(body.service_name, "service_name", "profile.create"),
        baseUrl: assertString(body.base_url, "base_url", "profile.create"),
        models: assertString(body.models, "models", "profile.create"),
        apiKey: assertOptionalString(body.api_key, "api_key", "profile.create"),
      };
      return this.runtime.createProfile(draft);
    });

    this.handlers.set("profile.update", async (params) => {
      const body = assertObjectParams(params, "profile.update");
      const profileId = assertString(body.profile_id, "profile_id", "profile.update");
      const draft: Partial<ProfileDraft> = {};
      const serviceName = assertOptionalString(body.service_name, "service_name", "profile.update");
      const baseUrl = assertOptionalString(body.base_url, "base_url", "profile.update");
      const models = assertOptionalString(body.models, "models", "profile.update");
      const apiKey = assertOptionalString(body.api_key, "api_key", "profile.update");
      if (serviceName !== undefined) {
        draft.serviceName = serviceName;
      }
      if (baseUrl !== undefined) {
        draft.baseUrl = baseUrl;
      }
      if (models !== undefined) {
        draft.models = models;
      }
      if (apiKey !== undefined) {
        draft.apiKey = apiKey;
      }
      return this.runtime.updateProfile(profileId, draft);
    });

    this.handlers.set("profile.delete", async (params) => {
      const body = assertObjectParams(params, "profile.delete");
      const profileId = assertString(body.profile_id, "profile_id", "profile.delete");
      return this.runtime.deleteProfile(profileId);
    });

    this.handlers.set("debug.set", async (params) => {
      const body = assertObjectParams(params, "debug.set");
      const superDebug = assertBoolean(body.super_debug, "super_debug", "debug.set");
      return this.runtime.setDebug(superDebug);
    });
  }
}
