import { createInterface } from "readline";
import type { Readable, Writable } from "stream";
import { errorMessage } from "./errors.js";
import { formatAnswer, formatSourceCount } from "./format.js";
import type { RAGPipeline } from "./pipeline.js";
import { logger } from "./utils/logger.js";

const EXIT_COMMANDS = new Set(["quit", "exit", "q"]);

export const QUESTION_PROMPT = "Your question: ";

export interface InteractiveOptions {
  input?: Readable;
  output?: Writable;
  showSources?: boolean;
}

export function isExitCommand(line: string): boolean {
  return EXIT_COMMANDS.has(line.trim().toLowerCase());
}

/**
 * Reads questions line by line until an exit command, Ctrl+C or the end of
 * input. A failed question is reported and the session goes on.
 */
export async function runInteractive(
  pipeline: Pick<RAGPipeline, "ask">,
  options: InteractiveOptions = {}
): Promise<void> {
  const rl = createInterface({
    input: options.input ?? process.stdin,
    output: options.output ?? process.stdout,
  });
  rl.setPrompt(QUESTION_PROMPT);
  rl.on("SIGINT", () => rl.close());

  logger.info("Interactive mode. Type 'quit', 'exit' or press Ctrl+C to exit.\n");
  rl.prompt();

  try {
    for await (const line of rl) {
      const question = line.trim();
      if (!question) {
        logger.info("Please enter a question.");
        rl.prompt();
        continue;
      }
      if (isExitCommand(question)) {
        break;
      }

      logger.info("Thinking...");
      try {
        const result = await pipeline.ask(question);
        logger.log(formatAnswer(result, { showSources: options.showSources }));
        if (result.sources.length > 0) {
          logger.log(formatSourceCount(result));
        }
      } catch (error) {
        logger.error(`Error: ${errorMessage(error)}`);
      }
      rl.prompt();
    }
  } finally {
    // Leaving the loop early does not close the interface or release the input.
    rl.close();
  }

  logger.info("Goodbye!");
}
