import { describe, expect, it, vi } from "vitest";

import {
  LlmError,
  LlmRateLimitError,
  type LlmClient,
  type LlmCompletionOptions,
  type LlmCompletionResult,
  type LlmPrompt,
} from "../../llm/client.js";

import { makeContext } from "./__tests__/fakes.js";
import { LlmRecipeArchitect } from "./architect.js";

class ScriptedLlmClient implements LlmClient {
  readonly calls: Array<{ prompt: LlmPrompt; options?: LlmCompletionOptions }> = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async complete(prompt: LlmPrompt, options?: LlmCompletionOptions): Promise<LlmCompletionResult> {
    this.calls.push({ prompt, options });
    const next = this.replies.shift();
    if (next === undefined) throw new Error("No scripted reply left");
    if (next instanceof Error) throw next;
    return { text: next, finishReason: "completed" };
  }
}

const LLM_SETTINGS = {
  temperature: 0.2,
  timeout_seconds: 30,
  max_tokens: 1024,
  rate_limit_attempts: 3,
  rate_limit_delay_seconds: 60,
};

function createArchitect(
  replies: Array<string | Error>,
  sleep = vi.fn(async (_ms: number) => undefined),
) {
  const client = new ScriptedLlmClient(replies);
  const architect = new LlmRecipeArchitect({ client, llm: LLM_SETTINGS, sleep });
  return { client, architect, sleep };
}

describe("LlmRecipeArchitect", () => {
  it("drafts from the rendered context and strips prose around the fence", async () => {
    const { client, architect } = createArchitect([
      "Here is your Dockerfile:\n```dockerfile\nFROM node:20-alpine\nCOPY . .\nCMD [\"node\", \"index.js\"]\n```\nEnjoy!",
    ]);

    const result = await architect.draft(makeContext());

    expect(result).toEqual({
      ok: true,
      recipe: 'FROM node:20-alpine\nCOPY . .\nCMD ["node", "index.js"]',
    });
    expect(client.calls[0]?.prompt.user).toBe(
      "Analyze this project and write the most optimized Dockerfile you can.\n\n" +
        "Project structure:\napp.py\npyproject.toml",
    );
    expect(client.calls[0]?.prompt.system).toContain("multi-stage build");
    expect(client.calls[0]?.options).toEqual({ temperature: 0.2, timeoutMs: 30_000, maxTokens: 1024 });
  });

  it("sends the failing recipe and log to the build heal prompt", async () => {
    const { client, architect } = createArchitect(["FROM python:3.12-slim\nCOPY . .\nRUN pip install ."]);

    const result = await architect.healBuild(
      makeContext(),
      "FROM python:3.12-slim\nCOPY requirements.txt .",
      "COPY failed: requirements.txt not found",
    );

    expect(result.ok).toBe(true);
    const prompt = client.calls[0]?.prompt;
    expect(prompt?.system).toContain("failed during `docker build`");
    expect(prompt?.user).toContain(
      "=== FAILING DOCKERFILE ===\nFROM python:3.12-slim\nCOPY requirements.txt .\n",
    );
    expect(prompt?.user).toContain(
      "=== DOCKER BUILD LOG ===\nCOPY failed: requirements.txt not found\n",
    );
  });

  it("uses the runtime framing for runtime heals", async () => {
    const { client, architect } = createArchitect(['FROM python:3.12-slim\nCMD ["python", "app.py"]']);

    await architect.healRuntime(makeContext(), 'FROM python:3.12-slim\nCMD ["app.py"]', "not found");

    const prompt = client.calls[0]?.prompt;
    expect(prompt?.system).toContain("BUILT successfully but the container FAILED");
    expect(prompt?.user).toContain("=== CONTAINER LOG ===\nnot found\n");
  });

  it("rejects output without a FROM instruction", async () => {
    const { architect } = createArchitect(["I cannot determine the entry point for this project."]);

    const result = await architect.draft(makeContext());

    expect(result).toEqual({
      ok: false,
      reason: "LLM output contained no Dockerfile instructions.",
      excerpt: "I cannot determine the entry point for this project.",
    });
  });

  it("waits out rate limits before giving the LLM another try", async () => {
    const { client, architect, sleep } = createArchitect([
      new LlmRateLimitError("OpenAI rate limit hit (status 429): slow down"),
      "FROM alpine:3.20",
    ]);

    const result = await architect.draft(makeContext());

    expect(result).toEqual({ ok: true, recipe: "FROM alpine:3.20" });
    expect(client.calls).toHaveLength(2);
    expect(sleep).toHaveBeenCalledWith(60_000);
  });

  it("turns LLM errors into a failed draft", async () => {
    const { architect } = createArchitect([
      new LlmError("OpenAI request failed (status 401): bad key Check OPENAI_API_KEY and permissions."),
    ]);

    const result = await architect.draft(makeContext());

    expect(result).toEqual({
      ok: false,
      reason:
        "LLM request failed: OpenAI request failed (status 401): bad key Check OPENAI_API_KEY and permissions.",
    });
  });
});
