import type { LlmConfig } from "../core/config.js";
import { secondsToMs } from "../core/utils.js";

import { AnthropicClient } from "./anthropic.js";
import type { LlmClient } from "./client.js";
import { OpenAiClient } from "./openai.js";

export function createLlmClient(config: LlmConfig): LlmClient {
  const common = {
    model: config.model,
    apiKey: config.api_key,
    baseURL: config.base_url,
    defaultTemperature: config.temperature,
    defaultTimeoutMs: secondsToMs(config.timeout_seconds),
    defaultMaxTokens: config.max_tokens,
  };

  switch (config.provider) {
    case "openai":
      return new OpenAiClient(common);
    case "anthropic":
      return new AnthropicClient(common);
  }
}
