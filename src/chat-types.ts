export type MessageStatus = "pending" | "streaming" | "completed" | "failed";

export type ChatMessage = {
  id: string;
  content: string;
  isUser: boolean;
  modelName: string;
  createdTime: string;
  status: MessageStatus;
};

export type HistoryMessage = {
  role: "user" | "assistant";
  content: string;
};

export type ChatCompletionPayload = {
  choices: Array<{
    message: {
      content: string | null;
    };
  }>;
};

export function isTerminalStatus(status: MessageStatus): boolean {
  return status === "completed" || status === "failed";
}
