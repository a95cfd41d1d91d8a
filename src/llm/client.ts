// LLM client contract shared by the OpenAI and Anthropic adapters.
// Clients return raw text; callers never assume structured output.

export type LlmPrompt = {
  system: string;
  user: string;
};

export type LlmCompletionOptions = {
  temperature?: number;
  timeoutMs?: number;
  maxTokens?: number;
};

export type LlmCompletionResult = {
  text: string;
  finishReason: string | null;
};

export interface LlmClient {
  complete(prompt: LlmPrompt, options?: LlmCompletionOptions): Promise<LlmCompletionResult>;
}

export class LlmError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "LlmError";
  }
}

// The only failure class that is worth retrying after a pause.
export class LlmRateLimitError extends LlmError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "LlmRateLimitError";
  }
}

// Provider error bodies nest the useful text under `message`, sometimes one level down.
export function providerErrorDetail(body: unknown, fallback: string): string {
  if (typeof body !== "object" || body === null || !("message" in body)) {
    if (typeof body === "object" && body !== null && "error" in body) {
      return providerErrorDetail(body.error, fallback);
    }
    return fallback;
  }
  return typeof body.message === "string" && body.message ? body.message : fallback;
}
