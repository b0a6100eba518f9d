import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { ChatMessage, ChatOptions, ChatProvider } from "./base.js";

export const DEFAULT_CHAT_MODEL = "gpt-3.5-turbo";

/**
 * Chat completions against the OpenAI API or any endpoint speaking the same
 * protocol (set `baseUrl`). Temperature defaults to 0 so answers are as
 * repeatable as the model allows.
 */
export class OpenAIChatProvider implements ChatProvider {
  readonly model: string;
  private client: OpenAI;
  private temperature: number;

  constructor(apiKey: string, model: string = DEFAULT_CHAT_MODEL, baseUrl?: string, temperature: number = 0) {
    this.client = new OpenAI({ apiKey, baseURL: baseUrl });
    this.model = model;
    this.temperature = temperature;
  }

  async complete(messages: ChatMessage[], options?: ChatOptions): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: messages.map(toOpenAIMessage),
      temperature: options?.temperature ?? this.temperature,
      ...(options?.maxTokens !== undefined ? { max_tokens: options.maxTokens } : {}),
    });

    const content = response.choices[0]?.message?.content;
    if (typeof content !== "string") {
      throw new Error("Malformed chat completion response: no message content");
    }
    return content.trim();
  }
}

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "user":
      return { role: "user", content: message.content };
  }
}
