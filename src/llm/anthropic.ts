import Anthropic, { APIError } from "@anthropic-ai/sdk";
import type {
  Message,
  MessageCreateParamsNonStreaming,
} from "@anthropic-ai/sdk/resources/messages/messages";

import {
  type LlmClient,
  type LlmCompletionOptions,
  type LlmCompletionResult,
  type LlmPrompt,
  LlmError,
  LlmRateLimitError,
  providerErrorDetail,
} from "./client.js";

type AnthropicRequestOptions = {
  timeout?: number;
  maxRetries?: number;
};

type AnthropicResponse = Pick<Message, "content" | "stop_reason">;

type AnthropicTransport = {
  create: (
    body: MessageCreateParamsNonStreaming,
    options?: AnthropicRequestOptions,
  ) => Promise<AnthropicResponse>;
};

export type AnthropicClientOptions = {
  model: string;
  apiKey?: string;
  baseURL?: string;
  defaultTemperature?: number;
  defaultTimeoutMs?: number;
  defaultMaxTokens?: number;
  transport?: AnthropicTransport;
};

const DEFAULT_TIMEOUT_MS = 120_000;
const DEFAULT_MAX_TOKENS = 4096;
// 529 is Anthropic's "overloaded" status; it clears the same way a rate limit does.
const RATE_LIMIT_STATUSES = new Set([429, 529]);

export class AnthropicClient implements LlmClient {
  private readonly model: string;
  private readonly defaultTemperature?: number;
  private readonly defaultTimeoutMs: number;
  private readonly defaultMaxTokens: number;
  private readonly transport: AnthropicTransport;

  constructor(options: AnthropicClientOptions) {
    this.model = options.model;
    this.defaultTemperature = options.defaultTemperature;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.defaultMaxTokens = options.defaultMaxTokens ?? DEFAULT_MAX_TOKENS;

    if (!options.transport) {
      const apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY;
      if (!apiKey) {
        throw new LlmError(
          "Anthropic API key is required. Set ANTHROPIC_API_KEY or llm.api_key in autocontain.yaml.",
        );
      }
      this.transport = createTransport({ apiKey, baseURL: options.baseURL });
    } else {
      this.transport = options.transport;
    }
  }

  async complete(
    prompt: LlmPrompt,
    options: LlmCompletionOptions = {},
  ): Promise<LlmCompletionResult> {
    const body: MessageCreateParamsNonStreaming = {
      model: this.model,
      system: prompt.system,
      messages: [{ role: "user", content: prompt.user }],
      max_tokens: options.maxTokens ?? this.defaultMaxTokens,
      temperature: options.temperature ?? this.defaultTemperature,
    };

    let response: AnthropicResponse;
    try {
      response = await this.transport.create(body, {
        timeout: options.timeoutMs ?? this.defaultTimeoutMs,
        maxRetries: 0,
      });
    } catch (err) {
      throw this.wrapError(err);
    }

    const text = response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("")
      .trim();

    if (!text) {
      throw new LlmError("Anthropic response did not include text content.", response);
    }

    return { text, finishReason: response.stop_reason ?? null };
  }

  private wrapError(error: unknown): LlmError {
    if (error instanceof APIError) {
      const status = error.status ?? "unknown";
      const detail = providerErrorDetail(error.error, error.message);

      if (typeof error.status === "number" && RATE_LIMIT_STATUSES.has(error.status)) {
        return new LlmRateLimitError(
          `Anthropic rate limit hit (status ${error.status}): ${detail}`,
          error,
        );
      }

      const hint =
        status === 401 || status === 403 ? " Check ANTHROPIC_API_KEY and permissions." : "";
      return new LlmError(`Anthropic request failed (status ${status}): ${detail}${hint}`, error);
    }

    if (error instanceof LlmError) {
      return error;
    }

    if (error instanceof Error) {
      return new LlmError(error.message, error);
    }

    return new LlmError("Anthropic request failed due to an unknown error.", error);
  }
}

function createTransport(args: { apiKey: string; baseURL?: string }): AnthropicTransport {
  const client = new Anthropic({
    apiKey: args.apiKey,
    baseURL: args.baseURL,
    maxRetries: 0,
  });

  return {
    create: (body, options) => client.messages.create(body, options),
  };
}
