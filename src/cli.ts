import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import type { Readable, Writable } from "stream";
import { CHUNKER_TYPES, isChunkerType, validateChunkerOptions } from "./chunkers/index.js";
import { loadConfig, resolveApiKey, resolveBaseUrl } from "./config.js";
import { ensureFile } from "./document.js";
import type { EmbeddingProvider } from "./embeddings/base.js";
import { OpenAIEmbeddingProvider } from "./embeddings/openai.js";
import { AskDocError, errorMessage, isAskDocError } from "./errors.js";
import { formatAnswer } from "./format.js";
import { runInteractive } from "./interactive.js";
import type { ChatProvider } from "./llm/base.js";
import { OpenAIChatProvider } from "./llm/openai.js";
import { RAGPipeline } from "./pipeline.js";
import { LanceVectorStore, type VectorStore } from "./store.js";
import { logger } from "./utils/logger.js";

export const VERSION = "0.1.0";

interface CliOptions {
  question?: string;
  apiKey?: string;
  chunkSize?: number;
  chunkOverlap?: number;
  chunker?: string;
  topK?: number;
  model?: string;
  embeddingModel?: string;
  baseUrl?: string;
  config?: string;
  showSources?: boolean;
}

export interface CliDependencies {
  createEmbeddings(apiKey: string, model: string, baseUrl?: string): EmbeddingProvider;
  createChat(apiKey: string, model: string, baseUrl: string | undefined, temperature: number): ChatProvider;
  createStore(): Promise<VectorStore>;
  env: NodeJS.ProcessEnv;
  input?: Readable;
  output?: Writable;
  showProgress: boolean;
}

const defaultDependencies: CliDependencies = {
  createEmbeddings: (apiKey, model, baseUrl) => new OpenAIEmbeddingProvider(apiKey, model, baseUrl),
  createChat: (apiKey, model, baseUrl, temperature) => new OpenAIChatProvider(apiKey, model, baseUrl, temperature),
  createStore: () => LanceVectorStore.create(),
  env: process.env,
  showProgress: true,
};

function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parseInt(value, 10);
}

async function askDocument(file: string, options: CliOptions, deps: CliDependencies): Promise<number> {
  let pipeline: RAGPipeline | undefined;
  try {
    await ensureFile(file);
    const config = await loadConfig(options.config);
    const apiKey = resolveApiKey(options.apiKey, config, deps.env);

    const chunking = {
      chunkSize: options.chunkSize ?? config.chunking.chunkSize,
      chunkOverlap: options.chunkOverlap ?? config.chunking.chunkOverlap,
    };
    validateChunkerOptions(chunking);
    const chunker = options.chunker ?? config.chunking.strategy;
    if (!isChunkerType(chunker)) {
      throw new AskDocError(`Unknown chunker type: ${chunker}`, "INVALID_CONFIG");
    }

    const baseUrl = resolveBaseUrl(options.baseUrl, config, deps.env);
    pipeline = new RAGPipeline(
      {
        embeddings: deps.createEmbeddings(apiKey, options.embeddingModel ?? config.embeddingModel, baseUrl),
        chat: deps.createChat(apiKey, options.model ?? config.chatModel, baseUrl, config.temperature),
        createStore: deps.createStore,
      },
      {
        chunker,
        topK: options.topK ?? config.topK,
        batchSize: config.batching.maxTextsPerBatch,
        showProgress: deps.showProgress,
      }
    );

    logger.info(`Loading document: ${file}`);
    const summary = await pipeline.initializeFromFile(file, chunking);
    logger.success(`Ready to answer questions about ${summary.source} (${summary.chunks} chunks)`);

    if (options.question !== undefined) {
      logger.info(`\nQuestion: ${options.question}`);
      logger.info("Thinking...");
      const result = await pipeline.ask(options.question);
      logger.log(formatAnswer(result, { showSources: options.showSources }));
    } else {
      await runInteractive(pipeline, {
        input: deps.input,
        output: deps.output,
        showSources: options.showSources,
      });
    }
    return 0;
  } catch (error) {
    logger.error(`Error: ${errorMessage(error)}`);
    if (isAskDocError(error, "MISSING_CREDENTIAL")) {
      logger.info("Example: export OPENAI_API_KEY='your-api-key'");
    }
    return 1;
  } finally {
    await pipeline?.close();
  }
}

export function createProgram(deps: CliDependencies, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name("askdoc")
    .description("Answer questions about a text file with retrieval-augmented generation")
    .version(VERSION)
    .argument("<file>", "Path to the text file to load")
    .option("-q, --question <question>", "Ask a single question and exit (non-interactive mode)")
    .option("-k, --api-key <key>", "OpenAI API key (alternatively set OPENAI_API_KEY)")
    .option("--chunk-size <number>", "Size of text chunks in characters (default: 1000)", parseInteger)
    .option("--chunk-overlap <number>", "Overlap between chunks in characters (default: 200)", parseInteger)
    .addOption(new Option("--chunker <type>", "Chunking strategy (default: recursive)").choices(CHUNKER_TYPES))
    .option("-t, --top-k <number>", "Number of chunks to retrieve per question (default: 3)", parseInteger)
    .option("-m, --model <model>", "Chat model name")
    .option("--embedding-model <model>", "Embedding model name")
    .option("-u, --base-url <url>", "Base URL of an OpenAI-compatible API")
    .option("--config <path>", "Path to config file (default: ~/.config/askdoc/config.yaml)")
    .option("--show-sources", "Print the chunks each answer was based on")
    .addHelpText(
      "after",
      `
Examples:
  $ askdoc notes.txt
  $ askdoc notes.txt -q "What is the main topic?"
  $ askdoc notes.txt --chunk-size 500 --chunk-overlap 100`
    )
    .exitOverride()
    .action(async (file: string, options: CliOptions) => {
      onExit(await askDocument(file, options, deps));
    });

  return program;
}

/** Parses `argv` (without the node and script entries) and returns the exit code. */
export async function runCli(argv: string[], overrides: Partial<CliDependencies> = {}): Promise<number> {
  let exitCode = 0;
  const program = createProgram({ ...defaultDependencies, ...overrides }, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}
