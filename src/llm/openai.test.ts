import { beforeEach, describe, expect, it, vi } from "vitest";

const { createCompletion } = vi.hoisted(() => ({ createCompletion: vi.fn() }));

vi.mock("openai", () => ({
  default: class {
    chat = { completions: { create: createCompletion } };
  },
}));

import { OpenAIChatProvider } from "./openai.js";

describe("OpenAIChatProvider", () => {
  beforeEach(() => {
    createCompletion.mockReset();
  });

  it("sends the messages with temperature 0 by default", async () => {
    createCompletion.mockResolvedValue({ choices: [{ message: { content: "  Paris.\n" } }] });
    const provider = new OpenAIChatProvider("test-key");

    const answer = await provider.complete([
      { role: "system", content: "Be brief." },
      { role: "user", content: "Capital of France?" },
    ]);

    expect(answer).toBe("Paris.");
    expect(createCompletion).toHaveBeenCalledWith({
      model: "gpt-3.5-turbo",
      messages: [
        { role: "system", content: "Be brief." },
        { role: "user", content: "Capital of France?" },
      ],
      temperature: 0,
    });
  });

  it("passes per-call options through", async () => {
    createCompletion.mockResolvedValue({ choices: [{ message: { content: "ok" } }] });
    const provider = new OpenAIChatProvider("test-key", "gpt-4o-mini", undefined, 0.3);

    await provider.complete([{ role: "assistant", content: "hi" }], { maxTokens: 20 });
    expect(createCompletion).toHaveBeenCalledWith({
      model: "gpt-4o-mini",
      messages: [{ role: "assistant", content: "hi" }],
      temperature: 0.3,
      max_tokens: 20,
    });

    await provider.complete([{ role: "user", content: "hi" }], { temperature: 1 });
    expect(createCompletion).toHaveBeenLastCalledWith(expect.objectContaining({ temperature: 1 }));
  });

  it("rejects a response without message content", async () => {
    createCompletion.mockResolvedValue({ choices: [] });
    const provider = new OpenAIChatProvider("test-key");

    await expect(provider.complete([{ role: "user", content: "hi" }])).rejects.toThrow(
      "Malformed chat completion response: no message content"
    );
  });

  it("surfaces client errors unchanged", async () => {
    const failure = new Error("Connection error.");
    createCompletion.mockRejectedValue(failure);
    const provider = new OpenAIChatProvider("test-key");

    await expect(provider.complete([{ role: "user", content: "hi" }])).rejects.toBe(failure);
  });
});
