import OpenAI from "openai";
import { APIError, OpenAIError } from "openai/error";
import type {
  Response,
  ResponseCreateParamsNonStreaming,
} from "openai/resources/responses/responses";

import {
  type LlmClient,
  type LlmCompletionOptions,
  type LlmCompletionResult,
  type LlmPrompt,
  LlmError,
  LlmRateLimitError,
  providerErrorDetail,
} from "./client.js";

type OpenAiResponse = Pick<Response, "output_text" | "status">;

type OpenAiTransport = {
  create: (
    body: ResponseCreateParamsNonStreaming,
    options?: OpenAI.RequestOptions,
  ) => Promise<OpenAiResponse>;
};

export type OpenAiClientOptions = {
  model: string;
  apiKey?: string;
  baseURL?: string;
  defaultTemperature?: number;
  defaultTimeoutMs?: number;
  defaultMaxTokens?: number;
  fetch?: typeof fetch;
  transport?: OpenAiTransport;
};

const DEFAULT_TIMEOUT_MS = 120_000;
const RATE_LIMIT_STATUS = 429;

// Retries are not done here: rate limits surface as LlmRateLimitError for retryOnRateLimit.
export class OpenAiClient implements LlmClient {
  private readonly model: string;
  private readonly defaultTemperature?: number;
  private readonly defaultTimeoutMs: number;
  private readonly defaultMaxTokens?: number;
  private readonly transport: OpenAiTransport;

  constructor(options: OpenAiClientOptions) {
    this.model = options.model;
    this.defaultTemperature = options.defaultTemperature;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.defaultMaxTokens = options.defaultMaxTokens;

    if (!options.transport) {
      const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new LlmError(
          "OpenAI API key is required. Set OPENAI_API_KEY or llm.api_key in autocontain.yaml.",
        );
      }
      this.transport = createTransport({
        apiKey,
        baseURL: options.baseURL,
        fetch: options.fetch,
      });
    } else {
      this.transport = options.transport;
    }
  }

  async complete(
    prompt: LlmPrompt,
    options: LlmCompletionOptions = {},
  ): Promise<LlmCompletionResult> {
    const body = this.buildRequestBody(prompt, options);
    const requestOptions = this.buildRequestOptions(options.timeoutMs);

    let response: OpenAiResponse;
    try {
      response = await this.transport.create(body, requestOptions);
    } catch (err) {
      throw this.wrapError(err);
    }

    const text = response.output_text ?? "";
    if (!text) {
      throw new LlmError("OpenAI response did not include assistant content.", response);
    }

    return {
      text,
      finishReason: response.status ?? null,
    };
  }

  private buildRequestBody(
    prompt: LlmPrompt,
    options: LlmCompletionOptions,
  ): ResponseCreateParamsNonStreaming {
    return {
      model: this.model,
      instructions: prompt.system,
      input: prompt.user,
      temperature: options.temperature ?? this.defaultTemperature,
      max_output_tokens: options.maxTokens ?? this.defaultMaxTokens,
    };
  }

  private buildRequestOptions(timeoutMs?: number): OpenAI.RequestOptions | undefined {
    const timeout = timeoutMs ?? this.defaultTimeoutMs;
    if (!timeout) return undefined;
    return { timeout };
  }

  private wrapError(error: unknown): LlmError {
    if (error instanceof APIError) {
      const status = error.status ?? "unknown";
      const detail = providerErrorDetail(error.error, error.message);

      if (error.status === RATE_LIMIT_STATUS) {
        return new LlmRateLimitError(`OpenAI rate limit hit (status 429): ${detail}`, error);
      }

      const hint =
        status === 401 || status === 403 ? " Check OPENAI_API_KEY and permissions." : "";
      return new LlmError(`OpenAI request failed (status ${status}): ${detail}${hint}`, error);
    }

    if (error instanceof OpenAIError) {
      return new LlmError(`OpenAI request failed: ${error.message}`, error);
    }

    if (error instanceof LlmError) {
      return error;
    }

    if (error instanceof Error) {
      return new LlmError(error.message, error);
    }

    return new LlmError("OpenAI request failed due to an unknown error.", error);
  }
}

function createTransport(args: {
  apiKey: string;
  baseURL?: string;
  fetch?: typeof fetch;
}): OpenAiTransport {
  const client = new OpenAI({
    apiKey: args.apiKey,
    baseURL: args.baseURL,
    fetch: args.fetch,
    maxRetries: 0,
  });

  return {
    create: (body, options) => client.responses.create({ ...body, stream: false }, options),
  };
}
