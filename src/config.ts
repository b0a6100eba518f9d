import { readFile } from "fs/promises";
import { join } from "path";
import { homedir } from "os";
import yaml from "js-yaml";
import { z } from "zod";
import { CHUNKER_TYPES } from "./chunkers/index.js";
import { AskDocError, errorMessage } from "./errors.js";
import { DEFAULT_EMBEDDING_MODEL } from "./embeddings/openai.js";
import { DEFAULT_CHAT_MODEL } from "./llm/openai.js";

export const CONFIG_DIR = join(homedir(), ".config", "askdoc");
export const CONFIG_FILE = join(CONFIG_DIR, "config.yaml");

const configSchema = z
  .object({
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    chatModel: z.string().min(1).optional(),
    embeddingModel: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).optional(),
    topK: z.number().int().positive().optional(),
    chunking: z
      .object({
        strategy: z.enum(CHUNKER_TYPES).optional(),
        chunkSize: z.number().int().positive().optional(),
        chunkOverlap: z.number().int().nonnegative().optional(),
      })
      .strict()
      .optional(),
    batching: z
      .object({
        maxTextsPerBatch: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type AskDocConfigFile = z.infer<typeof configSchema>;

export interface AskDocConfig {
  apiKey?: string;
  baseUrl?: string;
  chatModel: string;
  embeddingModel: string;
  temperature: number;
  topK: number;
  chunking: {
    strategy: (typeof CHUNKER_TYPES)[number];
    chunkSize: number;
    chunkOverlap: number;
  };
  batching: {
    maxTextsPerBatch: number;
  };
}

export const DEFAULT_CONFIG: AskDocConfig = {
  chatModel: DEFAULT_CHAT_MODEL,
  embeddingModel: DEFAULT_EMBEDDING_MODEL,
  temperature: 0,
  topK: 3,
  chunking: {
    strategy: "recursive",
    chunkSize: 1000,
    chunkOverlap: 200,
  },
  batching: {
    maxTextsPerBatch: 64,
  },
};

export function parseConfig(content: string, filePath: string): AskDocConfigFile {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new AskDocError(`Invalid YAML in ${filePath}: ${errorMessage(error)}`, "INVALID_CONFIG", { cause: error });
  }
  // An empty file loads as undefined.
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new AskDocError(`Invalid config in ${filePath}: ${issues}`, "INVALID_CONFIG", { cause: result.error });
  }
  return result.data;
}

export function mergeConfig(file: AskDocConfigFile, base: AskDocConfig = DEFAULT_CONFIG): AskDocConfig {
  return {
    ...base,
    ...file,
    chunking: { ...base.chunking, ...file.chunking },
    batching: { ...base.batching, ...file.batching },
  };
}

export async function loadConfig(configPath?: string): Promise<AskDocConfig> {
  const filePath = configPath || CONFIG_FILE;

  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return DEFAULT_CONFIG;
    }
    throw error;
  }
  return mergeConfig(parseConfig(content, filePath));
}

/** Flag first, then the config file, then the environment. */
export function resolveApiKey(
  flag: string | undefined,
  config: Pick<AskDocConfig, "apiKey">,
  env: NodeJS.ProcessEnv = process.env
): string {
  const apiKey = flag || config.apiKey || env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new AskDocError(
      "OpenAI API key not provided. Use --api-key, set apiKey in the config file, " +
        "or set the OPENAI_API_KEY environment variable.",
      "MISSING_CREDENTIAL"
    );
  }
  return apiKey;
}

export function resolveBaseUrl(
  flag: string | undefined,
  config: Pick<AskDocConfig, "baseUrl">,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  return flag || config.baseUrl || env.OPENAI_BASE_URL || undefined;
}
