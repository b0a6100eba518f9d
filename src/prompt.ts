import type { ChatMessage } from "./llm/base.js";

export const QA_PROMPT_TEMPLATE = `Use the following pieces of context to answer the question at the end.
If you don't know the answer, just say that you don't know, don't try to make up an answer.

Context: {context}

Question: {question}

Answer:`;

export function formatContext(texts: string[]): string {
  return texts.join("\n\n");
}

export function renderPrompt(context: string, question: string): string {
  // Single pass, so placeholders inside the document text are left alone.
  return QA_PROMPT_TEMPLATE.replace(/\{(context|question)\}/g, (_, key: string) =>
    key === "context" ? context : question
  );
}

export function buildQAMessages(contextTexts: string[], question: string): ChatMessage[] {
  return [{ role: "user", content: renderPrompt(formatContext(contextTexts), question) }];
}
