import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, describe, expect, it } from "vitest";
import { loadConfig, loadSystemPrompt, PROJECT_ROOT } from "./config";
import { AppError, ErrorCode } from "./errors";

const baseEnv = {
  TELEGRAM_BOT_TOKEN: "test-token",
  GROQ_API_KEY: "test-key",
};

function configError(fn: () => unknown): AppError {
  try {
    fn();
  } catch (err) {
    if (err instanceof AppError) return err;
    throw err;
  }
  throw new Error("expected an AppError");
}

describe("loadConfig", () => {
  it("applies defaults and selects long polling without a webhook URL", () => {
    const config = loadConfig(baseEnv);

    expect(config).toEqual({
      botToken: "test-token",
      completion: {
        apiKey: "test-key",
        baseUrl: "https://api.groq.com/openai/v1",
        model: "llama-3.3-70b-versatile",
        timeoutMs: 60_000,
      },
      webhookUrl: undefined,
      webhookSecret: undefined,
      host: "0.0.0.0",
      port: 8080,
      historyLimit: 20,
      chunkDelayMs: 500,
      systemPromptFile: join(PROJECT_ROOT, "config/system-prompt.md"),
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      ...baseEnv,
      WEBHOOK_URL: "https://relay.example.com",
      TELEGRAM_WEBHOOK_SECRET: "test-secret",
      COMPLETION_BASE_URL: "https://llm.example.com/v1/",
      COMPLETION_MODEL: "other-model",
      HOST: "127.0.0.1",
      PORT: "3000",
      HISTORY_LIMIT: "6",
      CHUNK_DELAY_MS: "0",
      SYSTEM_PROMPT_FILE: "/etc/relay/prompt.md",
    });

    expect(config.webhookUrl).toBe("https://relay.example.com");
    expect(config.webhookSecret).toBe("test-secret");
    expect(config.completion.baseUrl).toBe("https://llm.example.com/v1");
    expect(config.completion.model).toBe("other-model");
    expect(config.host).toBe("127.0.0.1");
    expect(config.port).toBe(3000);
    expect(config.historyLimit).toBe(6);
    expect(config.chunkDelayMs).toBe(0);
    expect(config.systemPromptFile).toBe("/etc/relay/prompt.md");
  });

  it.each(["TELEGRAM_BOT_TOKEN", "GROQ_API_KEY"])("fails without %s", (name) => {
    const env: Record<string, string | undefined> = { ...baseEnv, [name]: undefined };

    const err = configError(() => loadConfig(env));

    expect(err.code).toBe(ErrorCode.ConfigMissing);
    expect(err.message).toBe(`${name} is not set`);
  });

  it("treats placeholder values as missing", () => {
    const err = configError(() => loadConfig({ ...baseEnv, GROQ_API_KEY: "your_groq_api_key" }));

    expect(err.code).toBe(ErrorCode.ConfigMissing);
  });

  it("treats an empty webhook URL as pull mode", () => {
    expect(loadConfig({ ...baseEnv, WEBHOOK_URL: "  " }).webhookUrl).toBeUndefined();
  });

  it.each([
    ["PORT", "eighty"],
    ["HISTORY_LIMIT", "0"],
    ["CHUNK_DELAY_MS", "-5"],
    ["COMPLETION_TIMEOUT_MS", "1.5"],
  ])("rejects %s=%s", (name, value) => {
    const err = configError(() => loadConfig({ ...baseEnv, [name]: value }));

    expect(err.code).toBe(ErrorCode.ConfigInvalid);
  });
});

describe("loadSystemPrompt", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("reads and trims the prompt file", async () => {
    dir = await mkdtemp(join(tmpdir(), "relay-prompt-"));
    const file = join(dir, "prompt.md");
    await writeFile(file, "\nYou are a helpful assistant.\n\n");

    await expect(loadSystemPrompt(file)).resolves.toBe("You are a helpful assistant.");
  });

  it("rejects an empty prompt file", async () => {
    dir = await mkdtemp(join(tmpdir(), "relay-prompt-"));
    const file = join(dir, "prompt.md");
    await writeFile(file, "  \n");

    await expect(loadSystemPrompt(file)).rejects.toMatchObject({ code: ErrorCode.ConfigInvalid });
  });

  it("reports a missing prompt file as a configuration error", async () => {
    await expect(loadSystemPrompt("/nonexistent/prompt.md")).rejects.toMatchObject({
      code: ErrorCode.ConfigMissing,
    });
  });

  it("ships a default prompt", async () => {
    const prompt = await loadSystemPrompt(loadConfig(baseEnv).systemPromptFile);

    expect(prompt).toContain("Архитектор Прогрева");
  });
});
