import { describe, expect, it } from "vitest";
import {
  createSessionState,
  findMessage,
  reduceSession,
  snapshotHistory,
  type SessionAction,
  type SessionState,
} from "./session.js";

const CREATED = "2026-01-01T00:00:00.000Z";

function freshState(overrides: Partial<SessionState> = {}): SessionState {
  return {
    ...createSessionState({
      id: "session-1",
      createdAt: CREATED,
      profileId: "profile-1",
      model: "model-a",
      useStreaming: true,
    }),
    ...overrides,
  };
}

function submit(text: string, suffix = "1"): SessionAction {
  return {
    type: "submit",
    userMessageId: `user-${suffix}`,
    assistantMessageId: `assistant-${suffix}`,
    text,
    modelName: "model-a",
    createdTime: CREATED,
  };
}

function apply(state: SessionState, actions: SessionAction[]): SessionState {
  return actions.reduce((current, action) => reduceSession(current, action).state, state);
}

describe("reduceSession submit", () => {
  it("appends the user message and a pending placeholder", () => {
    const transition = reduceSession(freshState(), submit("hello"));

    expect(transition.state.messages).toEqual([
      {
        id: "user-1",
        content: "hello",
        isUser: true,
        modelName: "model-a",
        createdTime: CREATED,
        status: "completed",
      },
      {
        id: "assistant-1",
        content: "",
        isUser: false,
        modelName: "model-a",
        createdTime: CREATED,
        status: "pending",
      },
    ]);
    expect(transition.state.isWaitingForResponse).toBe(true);
    expect(transition.state.inFlightMessageId).toBe("assistant-1");
    expect(transition.effects).toEqual([{ type: "notify" }, { type: "scroll_to_end" }]);
  });

  it("rejects blank text without effects", () => {
    const state = freshState();
    const transition = reduceSession(state, submit("   \n\t"));

    expect(transition.state).toBe(state);
    expect(transition.effects).toEqual([]);
  });

  it("rejects a second submit while waiting", () => {
    const waiting = reduceSession(freshState(), submit("first")).state;
    const transition = reduceSession(waiting, submit("second", "2"));

    expect(transition.state).toBe(waiting);
    expect(transition.state.messages).toHaveLength(2);
    expect(transition.effects).toEqual([]);
  });
});

describe("reduceSession streaming", () => {
  it("concatenates fragments in arrival order on the same message", () => {
    const state = apply(freshState(), [
      submit("hello"),
      { type: "stream_fragment", messageId: "assistant-1", fragment: "hi" },
      { type: "stream_fragment", messageId: "assistant-1", fragment: " there" },
    ]);

    expect(state.messages).toHaveLength(2);
    expect(findMessage(state, "assistant-1")).toMatchObject({ content: "hi there", status: "streaming" });
    expect(state.isWaitingForResponse).toBe(true);
  });

  it("treats an empty fragment as a no-op", () => {
    const waiting = reduceSession(freshState(), submit("hello")).state;
    const transition = reduceSession(waiting, { type: "stream_fragment", messageId: "assistant-1", fragment: "" });

    expect(transition.state).toBe(waiting);
    expect(transition.effects).toEqual([]);
  });

  it("completes the streamed message and clears waiting", () => {
    const state = apply(freshState(), [
      submit("hello"),
      { type: "stream_fragment", messageId: "assistant-1", fragment: "hi" },
      { type: "response_completed", messageId: "assistant-1" },
    ]);

    expect(findMessage(state, "assistant-1")).toMatchObject({ content: "hi", status: "completed" });
    expect(state.isWaitingForResponse).toBe(false);
    expect(state.inFlightMessageId).toBeNull();
  });

  it("completes with empty content when nothing arrived", () => {
    const state = apply(freshState(), [submit("hello"), { type: "response_completed", messageId: "assistant-1" }]);

    expect(findMessage(state, "assistant-1")).toMatchObject({ content: "", status: "completed" });
    expect(state.isWaitingForResponse).toBe(false);
  });

  it("appends the error after partial content on stream failure", () => {
    const state = apply(freshState(), [
      submit("hello"),
      { type: "stream_fragment", messageId: "assistant-1", fragment: "partial" },
      { type: "stream_failed", messageId: "assistant-1", errorText: "stream failed: reset" },
    ]);

    expect(findMessage(state, "assistant-1")).toMatchObject({
      content: "partial\n\nstream failed: reset",
      status: "failed",
    });
    expect(state.isWaitingForResponse).toBe(false);
  });

  it("uses the error as content when the stream failed before any fragment", () => {
    const state = apply(freshState(), [
      submit("hello"),
      { type: "stream_failed", messageId: "assistant-1", errorText: "stream failed: reset" },
    ]);

    expect(findMessage(state, "assistant-1")?.content).toBe("stream failed: reset");
  });

  it("ignores fragments for a message that is not in flight", () => {
    const waiting = reduceSession(freshState(), submit("hello")).state;
    const transition = reduceSession(waiting, { type: "stream_fragment", messageId: "other", fragment: "x" });

    expect(transition.state).toBe(waiting);
    expect(transition.effects).toEqual([]);
  });
});

describe("reduceSession non-streaming", () => {
  it("replaces the placeholder content on completion", () => {
    const state = apply(freshState({ useStreaming: false }), [
      submit("hello"),
      { type: "response_completed", messageId: "assistant-1", content: "hi there" },
    ]);

    expect(state.messages.map((message) => message.content)).toEqual(["hello", "hi there"]);
    expect(findMessage(state, "assistant-1")?.status).toBe("completed");
  });

  it("replaces the placeholder in place with the error text", () => {
    const state = apply(freshState({ useStreaming: false }), [
      submit("hello"),
      {
        type: "request_failed",
        messageId: "assistant-1",
        errorText: "request failed: status 500 - boom",
        createdTime: "2026-01-01T00:00:05.000Z",
      },
    ]);

    expect(state.messages).toHaveLength(2);
    expect(state.messages[1]).toEqual({
      id: "assistant-1",
      content: "request failed: status 500 - boom",
      isUser: false,
      modelName: "model-a",
      createdTime: "2026-01-01T00:00:05.000Z",
      status: "failed",
    });
    expect(state.isWaitingForResponse).toBe(false);
  });
});

describe("reduceSession selection and clearing", () => {
  it("reports no change when the selection is identical", () => {
    const state = freshState();
    const transition = reduceSession(state, { type: "selection_changed", profileId: "profile-1", model: "model-a" });

    expect(transition.state).toBe(state);
    expect(transition.effects).toEqual([]);
  });

  it("updates the selection", () => {
    const state = reduceSession(freshState(), { type: "selection_changed", profileId: "profile-2", model: "model-b" }).state;

    expect(state.currentProfileId).toBe("profile-2");
    expect(state.currentModel).toBe("model-b");
  });

  it("toggles streaming", () => {
    const state = reduceSession(freshState(), { type: "streaming_toggled", enabled: false }).state;
    expect(state.useStreaming).toBe(false);
  });

  it("clears messages and abandons the in-flight exchange", () => {
    const cleared = apply(freshState(), [submit("hello"), { type: "cleared" }]);

    expect(cleared.messages).toEqual([]);
    expect(cleared.isWaitingForResponse).toBe(false);

    const late = reduceSession(cleared, { type: "stream_fragment", messageId: "assistant-1", fragment: "late" });
    expect(late.state).toBe(cleared);
  });
});

describe("snapshotHistory", () => {
  it("includes only completed non-empty messages in order", () => {
    const state = apply(freshState(), [
      submit("first", "1"),
      { type: "response_completed", messageId: "assistant-1", content: "answer one" },
      submit("second", "2"),
      { type: "stream_failed", messageId: "assistant-2", errorText: "stream failed: reset" },
      submit("third", "3"),
      { type: "response_completed", messageId: "assistant-3" },
      submit("fourth", "4"),
    ]);

    expect(snapshotHistory(state)).toEqual([
      { role: "user", content: "first" },
      { role: "assistant", content: "answer one" },
      { role: "user", content: "second" },
      { role: "user", content: "third" },
      { role: "user", content: "fourth" },
    ]);
  });
});
