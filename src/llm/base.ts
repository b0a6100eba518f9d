export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface ChatProvider {
  readonly model: string;
  complete(messages: ChatMessage[], options?: ChatOptions): Promise<string>;
}
