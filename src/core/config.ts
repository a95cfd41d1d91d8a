import { z } from "zod";

export const LLM_PROVIDERS = ["openai", "anthropic"] as const;

export const LlmConfigSchema = z
  .object({
    provider: z.enum(LLM_PROVIDERS).default("openai"),
    model: z.string().min(1).default("gpt-4o-mini"),
    temperature: z.number().min(0).max(2).default(0.2),
    timeout_seconds: z.number().positive().default(120),
    max_tokens: z.number().int().positive().default(4096),
    rate_limit_attempts: z.number().int().min(1).max(10).default(3),
    rate_limit_delay_seconds: z.number().min(0).default(60),
    api_key: z.string().min(1).optional(),
    base_url: z.string().url().optional(),
  })
  .strict();

export const DockerConfigSchema = z
  .object({
    tag: z.string().min(1).default("autocontain-app:latest"),
    runtime_test: z.boolean().default(true),
    probe_seconds: z.number().positive().default(10),
  })
  .strict();

export const HealingConfigSchema = z
  .object({
    build_attempts: z.number().int().min(0).default(1),
    runtime_attempts: z.number().int().min(0).default(1),
  })
  .strict();

export const InventoryConfigSchema = z
  .object({
    excerpt_bytes: z.number().int().positive().default(1000),
    log_tail_bytes: z.number().int().positive().default(4000),
  })
  .strict();

export const AutocontainConfigSchema = z
  .object({
    llm: LlmConfigSchema.default({}),
    docker: DockerConfigSchema.default({}),
    healing: HealingConfigSchema.default({}),
    inventory: InventoryConfigSchema.default({}),
  })
  .strict();

export type LlmProvider = (typeof LLM_PROVIDERS)[number];
export type LlmConfig = z.infer<typeof LlmConfigSchema>;
export type DockerConfig = z.infer<typeof DockerConfigSchema>;
export type HealingConfig = z.infer<typeof HealingConfigSchema>;
export type InventoryConfig = z.infer<typeof InventoryConfigSchema>;
export type AutocontainConfig = z.infer<typeof AutocontainConfigSchema>;

// Input shape before defaults are applied (config file, CLI flags).
export type AutocontainConfigInput = z.input<typeof AutocontainConfigSchema>;
