import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { PassThrough } from "stream";
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { runCli, type CliDependencies } from "./cli.js";
import { FakeChatProvider, FakeEmbeddingProvider, FRUIT_TEXT, MemoryVectorStore } from "./testing/fakes.js";

describe("runCli", () => {
  let dir: string;
  let filePath: string;
  let configPath: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;
  let embeddings: FakeEmbeddingProvider;
  let chat: FakeChatProvider;
  let deps: CliDependencies & {
    createEmbeddings: MockInstance<CliDependencies["createEmbeddings"]>;
    createChat: MockInstance<CliDependencies["createChat"]>;
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "askdoc-cli-"));
    filePath = join(dir, "fruit.txt");
    configPath = join(dir, "no-config.yaml");
    await writeFile(filePath, FRUIT_TEXT, "utf-8");

    log = vi.spyOn(console, "log").mockImplementation(() => {});
    error = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    embeddings = new FakeEmbeddingProvider();
    chat = new FakeChatProvider();
    deps = {
      createEmbeddings: vi.fn<CliDependencies["createEmbeddings"]>(() => embeddings),
      createChat: vi.fn<CliDependencies["createChat"]>(() => chat),
      createStore: async () => new MemoryVectorStore(),
      env: { OPENAI_API_KEY: "test-key" },
      showProgress: false,
    };
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  const printed = () => log.mock.calls.map(([message]) => message);

  it("answers a single question and exits 0", async () => {
    const code = await runCli([filePath, "-q", "Tell me about the banana.", "--config", configPath], deps);

    expect(code).toBe(0);
    expect(printed()).toContain("Answer: Bananas are yellow.");
    expect(deps.createEmbeddings).toHaveBeenCalledWith("test-key", "text-embedding-3-small", undefined);
    expect(deps.createChat).toHaveBeenCalledWith("test-key", "gpt-3.5-turbo", undefined, 0);
  });

  it("fails with exit 1 for a missing file before building any client", async () => {
    const missing = join(dir, "missing.txt");
    const code = await runCli([missing, "-q", "Anything?", "--config", configPath], deps);

    expect(code).toBe(1);
    expect(error).toHaveBeenCalledWith(`Error: File not found: ${missing}`);
    expect(deps.createEmbeddings).not.toHaveBeenCalled();
    expect(deps.createChat).not.toHaveBeenCalled();
    expect(embeddings.embedBatch).not.toHaveBeenCalled();
  });

  it("fails with exit 1 when no API key is available", async () => {
    const code = await runCli([filePath, "-q", "Anything?", "--config", configPath], { ...deps, env: {} });

    expect(code).toBe(1);
    expect(error).toHaveBeenCalledWith(
      "Error: OpenAI API key not provided. Use --api-key, set apiKey in the config file, " +
        "or set the OPENAI_API_KEY environment variable."
    );
    expect(printed()).toContain("Example: export OPENAI_API_KEY='your-api-key'");
    expect(deps.createEmbeddings).not.toHaveBeenCalled();
  });

  it("prefers --api-key over the environment", async () => {
    await runCli([filePath, "-q", "Hi?", "--api-key", "flag-key", "--config", configPath], deps);
    expect(deps.createEmbeddings).toHaveBeenCalledWith("flag-key", "text-embedding-3-small", undefined);
  });

  it("fails with exit 1 when overlap is not below chunk size", async () => {
    const code = await runCli(
      [filePath, "-q", "Hi?", "--chunk-size", "100", "--chunk-overlap", "100", "--config", configPath],
      deps
    );

    expect(code).toBe(1);
    expect(error).toHaveBeenCalledWith("Error: chunk-overlap (100) must be less than chunk-size (100)");
    expect(deps.createEmbeddings).not.toHaveBeenCalled();
  });

  it("rejects a chunk size that is not an integer", async () => {
    const code = await runCli([filePath, "--chunk-size", "big", "--config", configPath], deps);

    expect(code).toBe(1);
    expect(deps.createEmbeddings).not.toHaveBeenCalled();
  });

  it("uses config file settings under the flags", async () => {
    const config = join(dir, "config.yaml");
    await writeFile(config, "chatModel: gpt-4o-mini\nembeddingModel: local-embed\nbaseUrl: http://localhost:11434/v1\n");

    const code = await runCli([filePath, "-q", "Hi?", "--config", config, "-m", "flag-model"], deps);

    expect(code).toBe(0);
    expect(deps.createEmbeddings).toHaveBeenCalledWith("test-key", "local-embed", "http://localhost:11434/v1");
    expect(deps.createChat).toHaveBeenCalledWith("test-key", "flag-model", "http://localhost:11434/v1", 0);
  });

  it("reports an upstream failure with exit 1", async () => {
    chat.complete.mockRejectedValueOnce(new Error("503 Service Unavailable"));

    const code = await runCli([filePath, "-q", "Hi?", "--config", configPath], deps);

    expect(code).toBe(1);
    expect(error).toHaveBeenCalledWith(
      "Error: The chat service failed: 503 Service Unavailable. " +
        "Check your API key, network connection and rate limits, and that the chat model exists."
    );
  });

  it("prints sources with --show-sources", async () => {
    const code = await runCli(
      [filePath, "-q", "Tell me about the banana.", "-t", "1", "--show-sources", "--config", configPath],
      deps
    );

    expect(code).toBe(0);
    const answer = printed().find((message) => message.startsWith("Answer:"));
    expect(answer).toContain(`[1] ${filePath}, lines 1-5 (distance `);
  });

  it("runs the interactive loop without -q", async () => {
    const input = new PassThrough();
    input.end("Tell me about the banana.\nexit\n");

    const code = await runCli([filePath, "--config", configPath], { ...deps, input, output: new PassThrough() });

    expect(code).toBe(0);
    expect(printed()).toContain("Answer: Bananas are yellow.");
    expect(printed()).toContain("Goodbye!");
  });

  it("exits 0 for --version", async () => {
    await expect(runCli(["--version"], deps)).resolves.toBe(0);
  });
});
