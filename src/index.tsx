import React, { useEffect, useRef, useState } from "react";
import { Box, Newline, render, Text, useApp, useInput } from "ink";
import TextInput from "ink-text-input";
import type { ChatMessage } from "./chat-types.js";
import type { PublicProfile, RuntimeEvent, SendResult, SettingsView } from "./core/runtime.js";
import type { SessionState } from "./core/session.js";
import { createInProcessRpcClient, type InProcessRpcClient } from "./rpc/inprocess-client.js";
import { isRpcMethodError } from "./rpc/protocol.js";
import { stepSelectorIndex } from "./selector-index.js";

type Notice = {
  id: number;
  tone: "info" | "error";
  text: string;
};

type SelectorState =
  | {
      kind: "profile";
      title: string;
      index: number;
      options: PublicProfile[];
    }
  | {
      kind: "model";
      title: string;
      index: number;
      profileId: string;
      options: string[];
    };

type CommandOption = {
  name: string;
  description: string;
};

const GLYPH_USER = "> ";
const GLYPH_ASSISTANT = "⟣ ";
const GLYPH_SYSTEM = "⌁ ";
const VISIBLE_MESSAGE_COUNT = 12;
const MAX_NOTICES = 4;
const PENDING_LABEL = "thinking...";

const COMMANDS: CommandOption[] = [
  { name: "/settings", description: "choose api profile and model" },
  { name: "/stream", description: "toggle streamed responses" },
  { name: "/new", description: "start a new chat" },
  { name: "/profiles", description: "list api profiles" },
  { name: "/profile add", description: "/profile add <name> <base-url> <models> [api-key]" },
  { name: "/profile rm", description: "/profile rm <name-or-id>" },
  { name: "/quit", description: "exit parley" },
];

function App() {
  const { exit } = useApp();
  const [session, setSession] = useState<SessionState | null>(null);
  const [profiles, setProfiles] = useState<PublicProfile[]>([]);
  const [notices, setNotices] = useState<Notice[]>([]);
  const [selector, setSelector] = useState<SelectorState | null>(null);
  const [input, setInput] = useState("");
  const [scrollOffset, setScrollOffset] = useState(0);
  const [ready, setReady] = useState(false);
  const [startupStatusLabel, setStartupStatusLabel] = useState("starting...");
  const rpcClientRef = useRef<InProcessRpcClient | null>(null);
  const rpcSessionIdRef = useRef<string | null>(null);
  const nextNoticeIdRef = useRef(1);

  const appendNotice = (text: string, tone: Notice["tone"] = "info") => {
    const id = nextNoticeIdRef.current;
    nextNoticeIdRef.current += 1;
    setNotices((current) => [...current, { id, tone, text }].slice(-MAX_NOTICES));
  };

  const requireRpcClient = (): InProcessRpcClient => {
    const client = rpcClientRef.current;
    if (!client) {
      throw new Error("rpc runtime is not ready");
    }
    return client;
  };

  const getRpcSessionId = (): string => {
    const sessionId = rpcSessionIdRef.current;
    if (!sessionId) {
      throw new Error("rpc session is not ready");
    }
    return sessionId;
  };

  const callRpc = async <T,>(method: string, params?: unknown): Promise<T> => {
    const client = requireRpcClient();
    return client.call<T>(method, params);
  };

  const refreshSession = async () => {
    const state = await callRpc<SessionState>("session.get", {
      session_id: getRpcSessionId(),
    });
    setSession(state);
  };

  const refreshProfiles = async (): Promise<PublicProfile[]> => {
    const result = await callRpc<{ profiles: PublicProfile[] }>("profile.list", {});
    setProfiles(result.profiles);
    return result.profiles;
  };

  const reportFailure = (prefix: string, error: unknown) => {
    if (isRpcMethodError(error) && error.data.reason === "no_profile_configured") {
      appendNotice("no api profile configured. add one with /profile add <name> <base-url> <models> [api-key]", "error");
      return;
    }
    const message = error instanceof Error ? error.message : String(error);
    appendNotice(`${prefix}: ${message}`, "error");
  };

  useEffect(() => {
    let cancelled = false;
    let unsubscribe: (() => void) | null = null;

    const handleRuntimeEvent = (event: RuntimeEvent) => {
      if (event.payload.session_id !== rpcSessionIdRef.current) {
        return;
      }
      if (event.type === "session.state") {
        refreshSession().catch((error: unknown) => reportFailure("refresh failed", error));
        return;
      }
      if (event.type === "view.scroll_to_end") {
        setScrollOffset(0);
        return;
      }
      if (event.type === "session.debug") {
        appendNotice(`debug ${String(event.payload.stage)}: ${JSON.stringify(event.payload.data)}`);
      }
    };

    (async () => {
      try {
        setStartupStatusLabel("starting rpc runtime...");
        const rpcClient = await createInProcessRpcClient();
        if (cancelled) {
          await rpcClient.call("system.shutdown", { reason: "tui_cancelled" });
          return;
        }

        rpcClientRef.current = rpcClient;
        await rpcClient.call("rpc.handshake", {
          client_name: "parley_tui",
          protocol_version: "1.0.0",
        });

        const created = await rpcClient.call<{ session_id: string; state: SessionState }>("session.create", {});
        rpcSessionIdRef.current = created.session_id;
        setSession(created.state);
        unsubscribe = rpcClient.onEvent(handleRuntimeEvent);

        await refreshProfiles();
        if (!cancelled) {
          setStartupStatusLabel("ready");
          setReady(true);
        }
      } catch (error) {
        if (!cancelled) {
          console.warn(`[parley] rpc startup failed: ${error instanceof Error ? error.message : String(error)}`);
          reportFailure("rpc startup failed", error);
          setStartupStatusLabel("startup failed");
          setReady(true);
        }
      }
    })().catch((error: unknown) => reportFailure("rpc startup failed", error));

    return () => {
      cancelled = true;
      unsubscribe?.();
      const rpcClient = rpcClientRef.current;
      rpcClientRef.current = null;
      if (rpcClient) {
        rpcClient.call("system.shutdown", { reason: "tui_exit" }).catch(() => undefined);
      }
    };
  }, []);

  const openSettingsSelector = async () => {
    const view = await callRpc<SettingsView>("settings.open", { session_id: getRpcSessionId() });
    setProfiles(view.profiles);
    if (view.profiles.length === 0) {
      appendNotice("no api profile configured. add one with /profile add <name> <base-url> <models> [api-key]", "error");
      return;
    }
    const selectedIndex = Math.max(
      0,
      view.profiles.findIndex((profile) => profile.id === view.selected_profile_id),
    );
    setSelector({
      kind: "profile",
      title: "api profile",
      index: selectedIndex,
      options: view.profiles,
    });
  };

  const openModelSelector = (profile: PublicProfile) => {
    const currentModel = session?.currentProfileId === profile.id ? session.currentModel : "";
    setSelector({
      kind: "model",
      title: `model for ${profile.serviceName}`,
      index: Math.max(0, profile.models.indexOf(currentModel)),
      profileId: profile.id,
      options: profile.models,
    });
  };

  const toggleStreaming = async () => {
    const enabled = !(session?.useStreaming ?? true);
    const view = await callRpc<SettingsView>("settings.save", {
      session_id: getRpcSessionId(),
      use_streaming: enabled,
    });
    appendNotice(`streamed responses ${view.use_streaming ? "on" : "off"}`);
  };

  const addProfile = async (args: string[]) => {
    const [serviceName, baseUrl, models, apiKey] = args;
    if (!serviceName || !baseUrl || !models) {
      appendNotice("usage: /profile add <name> <base-url> <models> [api-key]", "error");
      return;
    }
    const created = await callRpc<PublicProfile>("profile.create", {
      service_name: serviceName,
      base_url: baseUrl,
      models,
      api_key: apiKey,
    });
    await refreshProfiles();
    appendNotice(`profile added: ${created.serviceName} (${created.models.join(", ")})`);
  };

  const removeProfile = async (nameOrId: string | undefined) => {
    const target = profiles.find((profile) => profile.id === nameOrId || profile.serviceName === nameOrId);
    if (!target) {
      appendNotice(`unknown profile: ${nameOrId ?? "(none)"}`, "error");
      return;
    }
    await callRpc("profile.delete", { profile_id: target.id });
    await refreshProfiles();
    appendNotice(`profile removed: ${target.serviceName}`);
  };

  const runCommand = async (raw: string) => {
    const [command, ...args] = raw.split(/\s+/);
    switch (command?.toLowerCase()) {
      case "/quit":
      case "/exit":
        exit();
        return;
      case "/settings":
        await openSettingsSelector();
        return;
      case "/stream":
        await toggleStreaming();
        return;
      case "/new":
        await callRpc("session.clear", { session_id: getRpcSessionId() });
        return;
      case "/profiles": {
        const listed = await refreshProfiles();
        appendNotice(
          listed.length > 0
            ? listed.map((profile) => `${profile.serviceName} ${profile.baseUrl} [${profile.models.join(", ")}]`).join("\n")
            : "no api profiles",
        );
        return;
      }
      case "/profile": {
        const [action, ...rest] = args;
        if (action === "add") {
          await addProfile(rest);
          return;
        }
        if (action === "rm" || action === "remove") {
          await removeProfile(rest[0]);
          return;
        }
        appendNotice("usage: /profile add|rm ...", "error");
        return;
      }
      default:
        appendNotice(`unknown command: ${command ?? raw}`, "error");
    }
  };

  const submitPrompt = async (value: string) => {
    const trimmed = value.trim();
    setInput("");
    if (!trimmed) {
      return;
    }
    if (trimmed.startsWith("/")) {
      await runCommand(trimmed);
      return;
    }
    const result = await callRpc<SendResult>("session.send", {
      session_id: getRpcSessionId(),
      text: trimmed,
    });
    if (!result.accepted && result.reason === "busy") {
      appendNotice("still waiting for the previous response", "error");
    }
  };

  const confirmSelector = async (current: SelectorState) => {
    if (current.kind === "profile") {
      const profile = current.options[current.index];
      if (profile) {
        openModelSelector(profile);
      }
      return;
    }
    const model = current.options[current.index];
    setSelector(null);
    if (!model) {
      return;
    }
    await callRpc<SettingsView>("settings.save", {
      session_id: getRpcSessionId(),
      profile_id: current.profileId,
      model,
    });
  };

  useInput((character, key) => {
    if (key.ctrl && character === "c") {
      exit();
      return;
    }
    if (!ready) {
      return;
    }

    if (selector) {
      if (key.escape) {
        setSelector(null);
        return;
      }
      if (key.upArrow || key.downArrow) {
        const next = stepSelectorIndex(selector.index, key.upArrow ? -1 : 1, selector.options.length);
        if (next !== null) {
          setSelector({ ...selector, index: next });
        }
        return;
      }
      if (key.return && selector.options.length > 0) {
        confirmSelector(selector).catch((error: unknown) => reportFailure("settings failed", error));
      }
      return;
    }

    const messageCount = session?.messages.length ?? 0;
    if (key.pageUp) {
      setScrollOffset((current) => Math.min(current + VISIBLE_MESSAGE_COUNT, Math.max(0, messageCount - 1)));
      return;
    }
    if (key.pageDown) {
      setScrollOffset((current) => Math.max(0, current - VISIBLE_MESSAGE_COUNT));
    }
  });

  if (!ready) {
    return (
      <Box flexDirection="column" paddingX={1}>
        <Text color="cyanBright">parley</Text>
        <Text color="yellow">
          {GLYPH_SYSTEM}
          {startupStatusLabel}
        </Text>
        <Newline />
        <Text color="gray">ctrl+c exit</Text>
      </Box>
    );
  }

  const messages = session?.messages ?? [];
  const end = messages.length - scrollOffset;
  const visibleMessages = messages.slice(Math.max(0, end - VISIBLE_MESSAGE_COUNT), end);
  const activeProfile = profiles.find((profile) => profile.id === session?.currentProfileId);
  const commandSuggestions = input.startsWith("/")
    ? COMMANDS.filter((command) => command.name.startsWith(input.trim().split(/\s+/)[0] ?? ""))
    : [];

  return (
    <Box flexDirection="column" paddingX={1}>
      <Text color="cyanBright">parley</Text>
      <Text color="gray">
        profile: {activeProfile?.serviceName ?? "not selected"} | model: {session?.currentModel || "not selected"} |
        stream: {session?.useStreaming ? "on" : "off"}
      </Text>
      <Newline />
      <Box flexDirection="column">
        {visibleMessages.map((message) => (
          <MemoizedMessageRow key={message.id} message={message} />
        ))}
      </Box>
      {scrollOffset > 0 && (
        <Text color="gray">
          {scrollOffset} newer message{scrollOffset === 1 ? "" : "s"} below | pgdn to follow
        </Text>
      )}
      {notices.map((notice) => (
        <Text key={notice.id} color={notice.tone === "error" ? "redBright" : "gray"}>
          {GLYPH_SYSTEM}
          {notice.text}
        </Text>
      ))}
      {selector && (
        <Box flexDirection="column" marginTop={1}>
          <Text color="cyanBright">{selector.title}</Text>
          {selector.kind === "profile"
            ? selector.options.map((profile, index) => (
                <Text key={profile.id} color={index === selector.index ? "magentaBright" : "gray"}>
                  {index === selector.index ? ">" : " "} {profile.serviceName} - {profile.baseUrl}
                </Text>
              ))
            : selector.options.map((model, index) => (
                <Text key={model} color={index === selector.index ? "magentaBright" : "gray"}>
                  {index === selector.index ? ">" : " "} {model}
                </Text>
              ))}
          <Text color="gray">use up/down + enter. esc cancels.</Text>
        </Box>
      )}
      {session?.isWaitingForResponse && (
        <Text color="yellow">
          {GLYPH_SYSTEM}
          waiting for response...
        </Text>
      )}
      {commandSuggestions.length > 0 && !selector && (
        <Box flexDirection="column" marginTop={1}>
          {commandSuggestions.map((command) => (
            <Text key={command.name} color="gray">
              {command.name} - {command.description}
            </Text>
          ))}
        </Box>
      )}
      <Box marginTop={1}>
        <Text color="magentaBright">{selector ? "select> " : GLYPH_USER}</Text>
        <TextInput
          value={input}
          focus={!selector}
          onChange={setInput}
          onSubmit={(value) => {
            submitPrompt(value).catch((error: unknown) => reportFailure("send failed", error));
          }}
        />
      </Box>
    </Box>
  );
}

function MessageRow({ message }: { message: ChatMessage }) {
  if (message.isUser) {
    return (
      <Box flexDirection="column" marginBottom={1}>
        <Text color="blueBright">
          {GLYPH_USER}
          {message.content}
        </Text>
      </Box>
    );
  }
  if (message.status === "pending") {
    return (
      <Box flexDirection="column" marginBottom={1}>
        <Text color="gray">
          {GLYPH_ASSISTANT}
          {PENDING_LABEL}
        </Text>
      </Box>
    );
  }
  if (message.status === "failed") {
    return (
      <Box flexDirection="column" marginBottom={1}>
        <MarkdownText text={message.content} prefix={GLYPH_ASSISTANT} color="redBright" />
      </Box>
    );
  }
  return (
    <Box flexDirection="column" marginBottom={1}>
      <MarkdownText text={message.content} prefix={GLYPH_ASSISTANT} />
      <Text color="gray">
        {"  "}
        {message.modelName}
      </Text>
    </Box>
  );
}

const MemoizedMessageRow = React.memo(MessageRow);

function MarkdownText({ text, prefix = "", color = "white" }: { text: string; prefix?: string; color?: string }) {
  const lines = text.replace(/\r\n/g, "\n").split("\n");
  let inCodeBlock = false;

  return (
    <Box flexDirection="column">
      {lines.map((line, index) => {
        const linePrefix = index === 0 ? prefix : " ".repeat(prefix.length);
        const trimmed = line.trim();

        if (/^```/.test(trimmed)) {
          inCodeBlock = !inCodeBlock;
          return null;
        }
        if (inCodeBlock) {
          return (
            <Text key={`line-${index}`} color="yellow">
              {linePrefix}
              {line}
            </Text>
          );
        }
        if (!trimmed) {
          return <Text key={`line-${index}`}> </Text>;
        }

        const headingMatch = line.match(/^(#{1,6})\s+(.+)$/);
        if (headingMatch) {
          return (
            <Text key={`line-${index}`} color="cyanBright" bold>
              {linePrefix}
              {headingMatch[2]}
            </Text>
          );
        }

        const bulletMatch = line.match(/^(\s*)[-*]\s+(.+)$/);
        if (bulletMatch) {
          return (
            <Text key={`line-${index}`} color={color}>
              {linePrefix}
              {" ".repeat(bulletMatch[1]?.length ?? 0)}* {renderInlineMarkdown(bulletMatch[2] ?? "", `b-${index}`)}
            </Text>
          );
        }

        return (
          <Text key={`line-${index}`} color={color}>
            {linePrefix}
            {renderInlineMarkdown(line, `p-${index}`)}
          </Text>
        );
      })}
    </Box>
  );
}

function renderInlineMarkdown(input: string, keyPrefix: string): React.ReactNode[] {
  const text = input.replace(/\[([^\]]+)\]\(([^)]+)\)/g, "$1 ($2)");
  const tokens = text.split(/(\*\*[^*]+\*\*|`[^`]+`)/g);

  const nodes: React.ReactNode[] = [];
  let index = 0;
  for (const token of tokens) {
    if (!token) {
      continue;
    }
    if (token.startsWith("**") && token.endsWith("**")) {
      nodes.push(
        <Text key={`${keyPrefix}-${index++}`} bold>
          {token.slice(2, -2)}
        </Text>,
      );
      continue;
    }
    if (token.startsWith("`") && token.endsWith("`")) {
      nodes.push(
        <Text key={`${keyPrefix}-${index++}`} color="yellow">
          {token.slice(1, -1)}
        </Text>,
      );
      continue;
    }
    nodes.push(<Text key={`${keyPrefix}-${index++}`}>{token}</Text>);
  }
  return nodes;
}

export async function startTuiApp(): Promise<void> {
  const instance = render(<App />);
  await instance.waitUntilExit();
}
