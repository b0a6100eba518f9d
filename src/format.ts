import type { QueryResult } from "./pipeline.js";
import type { ScoredChunk } from "./store.js";

function lineRange(chunk: ScoredChunk): string {
  return chunk.startLine === chunk.endLine
    ? `line ${chunk.startLine}`
    : `lines ${chunk.startLine}-${chunk.endLine}`;
}

export function formatSourceCount(result: QueryResult): string {
  const count = result.sources.length;
  return `(Based on ${count} source chunk${count !== 1 ? "s" : ""})`;
}

export function formatSources(sources: ScoredChunk[]): string {
  if (sources.length === 0) {
    return "No sources retrieved.";
  }

  let output = "";
  for (let i = 0; i < sources.length; i++) {
    const source = sources[i];
    output += `${"─".repeat(70)}\n`;
    output += `  [${i + 1}] ${source.source}, ${lineRange(source)} (distance ${source.distance.toFixed(4)})\n`;
    output += `${"─".repeat(70)}\n`;
    output += `  ${source.text.trim().split("\n").join("\n  ")}\n`;
  }
  return output;
}

export function formatAnswer(result: QueryResult, options: { showSources?: boolean } = {}): string {
  let output = `Answer: ${result.answer}`;
  if (options.showSources) {
    output += `\n\n${formatSources(result.sources)}`;
  }
  return output;
}
