import OpenAI from "openai";
import { parleyConfig } from "./config.js";
import { TransportError } from "./errors.js";
import type { ApiProfile } from "./profiles.js";
import type { ChatCompletionPayload, HistoryMessage } from "./chat-types.js";

export type ChatRequest = {
  profile: ApiProfile;
  model: string;
  message: string;
  history: HistoryMessage[];
};

export interface ChatTransport {
  sendChatRequest(request: ChatRequest): Promise<ChatCompletionPayload>;
  sendStreamChatRequest(request: ChatRequest): AsyncIterable<string>;
}

type RequestMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string };

const MISSING_API_KEY_PLACEHOLDER = "not-set";

export class OpenAiChatTransport implements ChatTransport {
  private readonly systemInstruction: string;
  private readonly timeoutMs: number;
  private readonly clients = new Map<string, OpenAI>();

  constructor(options: { systemInstruction?: string; timeoutMs?: number } = {}) {
    this.systemInstruction = options.systemInstruction ?? parleyConfig.systemInstruction;
    this.timeoutMs = options.timeoutMs ?? parleyConfig.requestTimeoutMs;
  }

  async sendChatRequest(request: ChatRequest): Promise<ChatCompletionPayload> {
    const client = this.clientFor(request.profile);
    try {
      const completion = await client.chat.completions.create({
        model: request.model,
        messages: buildRequestMessages(request.history, request.message, this.systemInstruction),
        stream: false,
      });
      return {
        choices: completion.choices.map((choice) => ({
          message: {
            content: choice.message.content,
          },
        })),
      };
    } catch (error) {
      throw toHttpTransportError(error);
    }
  }

  async *sendStreamChatRequest(request: ChatRequest): AsyncIterable<string> {
    const client = this.clientFor(request.profile);
    try {
      const stream = await client.chat.completions.create({
        model: request.model,
        messages: buildRequestMessages(request.history, request.message, this.systemInstruction),
        stream: true,
      });
      for await (const chunk of stream) {
        const fragment = chunk.choices[0]?.delta?.content;
        if (fragment) {
          yield fragment;
        }
      }
    } catch (error) {
      throw toHttpTransportError(error);
    }
  }

  private clientFor(profile: ApiProfile): OpenAI {
    const cacheKey = `${profile.id}\u0000${profile.baseUrl}\u0000${profile.apiKey}`;
    const cached = this.clients.get(cacheKey);
    if (cached) {
      return cached;
    }
    const client = new OpenAI({
      apiKey: profile.apiKey || MISSING_API_KEY_PLACEHOLDER,
      baseURL: profile.baseUrl,
      timeout: this.timeoutMs,
      maxRetries: 0,
    });
    this.clients.set(cacheKey, client);
    return client;
  }
}

export function buildRequestMessages(
  history: HistoryMessage[],
  message: string,
  systemInstruction = "",
): RequestMessage[] {
  const messages: RequestMessage[] = [];
  const instruction = systemInstruction.trim();
  if (instruction) {
    messages.push({ role: "system", content: instruction });
  }
  for (const item of history) {
    messages.push(
      item.role === "user"
        ? { role: "user", content: item.content }
        : { role: "assistant", content: item.content },
    );
  }
  messages.push({ role: "user", content: message });
  return messages;
}

export function extractCompletionContent(payload: ChatCompletionPayload): string {
  const content = payload.choices[0]?.message?.content;
  if (typeof content !== "string") {
    throw new TransportError("response contained no completion content");
  }
  return content;
}

export function toHttpTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  if (error instanceof OpenAI.APIError && typeof error.status === "number") {
    return new TransportError(
      error.message,
      {
        status: error.status,
        body: summarizeErrorBody(error.error, error.message),
      },
      { cause: error },
    );
  }
  const message = error instanceof Error ? error.message || error.name : String(error);
  return new TransportError(message, {}, { cause: error });
}

function summarizeErrorBody(body: unknown, fallback: string): string {
  if (typeof body === "string") {
    return body.trim() || fallback;
  }
  if (body && typeof body === "object") {
    return JSON.stringify(body);
  }
  return fallback;
}
