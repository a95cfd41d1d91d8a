/**
 * Recipe architect.
 * Purpose: draft and heal Dockerfiles through the LLM, returning only sanitized recipes.
 * Assumptions: the client returns free text; nothing it says is trusted until it passes the sanitizer.
 * Usage: const architect = new LlmRecipeArchitect({ client, llm: config.llm }); await architect.draft(ctx).
 */

import type { LlmConfig } from "../../core/config.js";
import type { ProjectContext } from "../../core/inventory.js";
import { renderPrompt, type RenderedPrompt } from "../../core/prompts.js";
import { sanitizeRecipe } from "../../core/recipe/sanitize.js";
import { secondsToMs } from "../../core/utils.js";
import { LlmError, type LlmClient } from "../../llm/client.js";
import { retryOnRateLimit, type RateLimitRetryInfo } from "../../llm/retry.js";

import type { RecipeArchitect } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type DraftResult =
  | { ok: true; recipe: string }
  | { ok: false; reason: string; excerpt?: string };

export type LlmRecipeArchitectOptions = {
  client: LlmClient;
  llm: Pick<
    LlmConfig,
    "temperature" | "timeout_seconds" | "max_tokens" | "rate_limit_attempts" | "rate_limit_delay_seconds"
  >;
  sleep?: (ms: number) => Promise<void>;
  onRateLimit?: (info: RateLimitRetryInfo) => void;
};

// =============================================================================
// ARCHITECT
// =============================================================================

export class LlmRecipeArchitect implements RecipeArchitect {
  private readonly client: LlmClient;
  private readonly llm: LlmRecipeArchitectOptions["llm"];
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly onRateLimit?: (info: RateLimitRetryInfo) => void;

  constructor(opts: LlmRecipeArchitectOptions) {
    this.client = opts.client;
    this.llm = opts.llm;
    this.sleep = opts.sleep;
    this.onRateLimit = opts.onRateLimit;
  }

  async draft(context: ProjectContext): Promise<DraftResult> {
    return this.ask(await renderPrompt("draft", { context: context.rendered }));
  }

  async healBuild(context: ProjectContext, recipe: string, log: string): Promise<DraftResult> {
    return this.ask(await renderPrompt("heal-build", { context: context.rendered, recipe, log }));
  }

  async healRuntime(context: ProjectContext, recipe: string, log: string): Promise<DraftResult> {
    return this.ask(await renderPrompt("heal-runtime", { context: context.rendered, recipe, log }));
  }

  private async ask(prompt: RenderedPrompt): Promise<DraftResult> {
    let text: string;
    try {
      const result = await retryOnRateLimit(
        () =>
          this.client.complete(prompt, {
            temperature: this.llm.temperature,
            timeoutMs: secondsToMs(this.llm.timeout_seconds),
            maxTokens: this.llm.max_tokens,
          }),
        {
          maxAttempts: this.llm.rate_limit_attempts,
          delayMs: secondsToMs(this.llm.rate_limit_delay_seconds),
          sleep: this.sleep,
          onRetry: this.onRateLimit,
        },
      );
      text = result.text;
    } catch (err) {
      if (err instanceof LlmError) {
        return { ok: false, reason: `LLM request failed: ${err.message}` };
      }
      throw err;
    }

    const sanitized = sanitizeRecipe(text);
    if (!sanitized.ok) {
      return { ok: false, reason: sanitized.reason, excerpt: sanitized.excerpt };
    }
    return { ok: true, recipe: sanitized.recipe };
  }
}
