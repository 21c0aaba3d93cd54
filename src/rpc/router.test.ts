import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import type { ChatRequest, ChatTransport } from "../chat-http.js";
import type { ChatCompletionPayload } from "../chat-types.js";
import { ParleyCoreRuntime, type PublicProfile, type SendResult, type SettingsView } from "../core/runtime.js";
import type { SessionState } from "../core/session.js";
import { FileProfileStore } from "../profiles.js";
import { createMemorySecretStore } from "../secure-store.js";
import { InProcessRpcClient } from "./inprocess-client.js";
import { JSON_RPC_ERROR } from "./protocol.js";

class EchoTransport implements ChatTransport {
  readonly requests: ChatRequest[] = [];

  async sendChatRequest(request: ChatRequest): Promise<ChatCompletionPayload> {
    this.requests.push(request);
    return { choices: [{ message: { content: `echo: ${request.message}` } }] };
  }

  async *sendStreamChatRequest(request: ChatRequest): AsyncIterable<string> {
    this.requests.push(request);
    yield "echo: ";
    yield request.message;
  }
}

const tempDirs: string[] = [];
const runtimes: ParleyCoreRuntime[] = [];

afterEach(async () => {
  for (const runtime of runtimes.splice(0)) {
    await runtime.shutdown("test_cleanup");
  }
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

async function setup() {
  const dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "parley-rpc-"));
  tempDirs.push(dataDir);
  const transport = new EchoTransport();
  const runtime = await ParleyCoreRuntime.create({
    store: new FileProfileStore({ dataDir, secrets: createMemorySecretStore() }),
    transport,
    dataDir,
    scrollSettleMs: 0,
    seedProfile: null,
  });
  runtimes.push(runtime);
  return { runtime, transport, client: new InProcessRpcClient(runtime) };
}

describe("RpcRouter", () => {
  it("answers the handshake with the method list", async () => {
    const { client } = await setup();

    const result = await client.call<{ server_name: string; protocol_version: string; methods: string[] }>(
      "rpc.handshake",
      { client_name: "test", protocol_version: "1.0.0" },
    );

    expect(result.server_name).toBe("parley");
    expect(result.protocol_version).toBe("1.0.0");
    expect(result.methods).toContain("session.send");
    expect(result.methods).toContain("profile.create");
  });

  it("rejects an unsupported protocol version in strict mode", async () => {
    const { client } = await setup();

    await expect(client.call("rpc.handshake", { protocol_version: "9.9.9", strict: true })).rejects.toMatchObject({
      code: JSON_RPC_ERROR.INVALID_PARAMS,
      data: { reason: "unsupported_protocol_version", supported: "1.0.0" },
    });
  });

  it("reports unknown methods", async () => {
    const { client } = await setup();

    await expect(client.call("session.explode", {})).rejects.toMatchObject({
      code: JSON_RPC_ERROR.METHOD_NOT_FOUND,
      message: "method not found: session.explode",
    });
  });

  it("validates params", async () => {
    const { client } = await setup();

    await expect(client.call("session.get", {})).rejects.toMatchObject({
      code: JSON_RPC_ERROR.INVALID_PARAMS,
      data: { reason: "invalid_params", field: "session_id" },
    });
    await expect(client.call("debug.set", { super_debug: "yes" })).rejects.toMatchObject({
      code: JSON_RPC_ERROR.INVALID_PARAMS,
      data: { field: "super_debug" },
    });
  });

  it("maps profile validation failures to invalid params", async () => {
    const { client } = await setup();

    await expect(
      client.call("profile.create", { service_name: "x", base_url: "not a url", models: "m1" }),
    ).rejects.toMatchObject({
      code: JSON_RPC_ERROR.INVALID_PARAMS,
      data: { reason: "invalid_profile", field: "baseUrl" },
    });
  });

  it("maps a missing profile to an application error", async () => {
    const { client } = await setup();
    const { session_id } = await client.call<{ session_id: string }>("session.create", {});

    await expect(client.call("session.send", { session_id, text: "hello" })).rejects.toMatchObject({
      code: JSON_RPC_ERROR.APPLICATION_ERROR,
      data: { reason: "no_profile_configured" },
    });
  });

  it("wraps unexpected failures as internal errors", async () => {
    const { client } = await setup();

    await expect(client.call("session.get", { session_id: "nope" })).rejects.toMatchObject({
      code: JSON_RPC_ERROR.INTERNAL_ERROR,
      message: "session not found: nope",
      data: { reason: "internal_error" },
    });
  });

  it("runs a conversation after a profile is created", async () => {
    const { client, runtime, transport } = await setup();
    const created = await client.call<PublicProfile>("profile.create", {
      service_name: "local",
      base_url: "http://localhost:8080/v1/",
      models: "small, large",
      api_key: "test-secret",
    });
    expect(created).toMatchObject({
      serviceName: "local",
      baseUrl: "http://localhost:8080/v1",
      models: ["small", "large"],
      hasApiKey: true,
    });

    const { session_id } = await client.call<{ session_id: string }>("session.create", {});
    const settings = await client.call<SettingsView>("settings.save", {
      session_id,
      model: "large",
      use_streaming: false,
    });
    expect(settings.selected_profile_id).toBe(created.id);
    expect(settings.selected_model).toBe("large");

    const sent = await client.call<SendResult>("session.send", { session_id, text: "ping" });
    expect(sent.accepted).toBe(true);
    await runtime.whenIdle(session_id);

    const state = await client.call<SessionState>("session.get", { session_id });
    expect(state.messages.map((message) => message.content)).toEqual(["ping", "echo: ping"]);
    expect(transport.requests[0]?.profile.apiKey).toBe("test-secret");
    expect(transport.requests[0]?.model).toBe("large");

    const closed = await client.call<{ closed: boolean }>("session.close", { session_id });
    expect(closed.closed).toBe(true);
  });

  it("updates and deletes profiles", async () => {
    const { client } = await setup();
    const created = await client.call<PublicProfile>("profile.create", {
      service_name: "local",
      base_url: "http://localhost:8080/v1",
      models: "small",
    });
    expect(created.hasApiKey).toBe(false);

    const updated = await client.call<PublicProfile>("profile.update", {
      profile_id: created.id,
      models: "small,tiny",
      api_key: "test-secret",
    });
    expect(updated.models).toEqual(["small", "tiny"]);
    expect(updated.hasApiKey).toBe(true);

    const deleted = await client.call<{ deleted: boolean }>("profile.delete", { profile_id: created.id });
    expect(deleted.deleted).toBe(true);

    const listed = await client.call<{ profiles: PublicProfile[] }>("profile.list", {});
    expect(listed.profiles).toEqual([]);

    await expect(client.call("profile.get", { profile_id: created.id })).rejects.toMatchObject({
      code: JSON_RPC_ERROR.APPLICATION_ERROR,
      data: { reason: "profile_not_found" },
    });
  });
});
