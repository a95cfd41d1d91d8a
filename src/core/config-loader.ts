import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import {
  AutocontainConfigSchema,
  type AutocontainConfig,
  type AutocontainConfigInput,
} from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

export const DEFAULT_CONFIG_FILE = "autocontain.yaml";

const CONFIG_HINT = `Fix ${DEFAULT_CONFIG_FILE} or the matching CLI flag, then retry.`;

export type LoadConfigOptions = {
  explicitPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: AutocontainConfigInput;
};

export type LoadedConfig = {
  config: AutocontainConfig;
  configPath: string | null;
};

// =============================================================================
// PUBLIC API
// =============================================================================

// Precedence, lowest first: config file, environment, CLI overrides.
export function loadConfig(opts: LoadConfigOptions = {}): LoadedConfig {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;
  const configPath = resolveConfigPath(opts.explicitPath, cwd);

  const fromFile = configPath ? readConfigFile(configPath) : {};
  const merged = mergeConfigs(mergeConfigs(fromFile, envOverrides(env)), opts.overrides ?? {});

  const parsed = AutocontainConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = formatConfigIssues(parsed.error.issues);
    const source = configPath ?? "CLI flags";
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Invalid configuration.",
      message: `Configuration from ${source} is invalid:\n${issues.map((i) => `  - ${i}`).join("\n")}`,
      hint: CONFIG_HINT,
      cause: new ConfigError(issues.join("; ")),
    });
  }

  return { config: parsed.data, configPath };
}

export function formatConfigIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "invalid_enum_value") {
      const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
      return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}

export function mergeConfigs(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const output: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue;

    const targetValue = output[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = mergeConfigs(targetValue, sourceValue);
    } else {
      output[key] = sourceValue;
    }
  }

  return output;
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveConfigPath(explicitPath: string | undefined, cwd: string): string | null {
  if (explicitPath) {
    const resolved = path.resolve(cwd, explicitPath);
    if (!fs.existsSync(resolved)) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Config file missing.",
        message: `Config file not found at ${resolved}.`,
        hint: "Pass an existing file to --config or omit the flag to use defaults.",
      });
    }
    return resolved;
  }

  const candidate = path.join(cwd, DEFAULT_CONFIG_FILE);
  return fs.existsSync(candidate) ? candidate : null;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(configPath, "utf8"));
  } catch (err) {
    const detail = err instanceof yaml.YAMLException ? err.message : String(err);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config file unreadable.",
      message: `Failed to parse ${configPath}: ${detail}`,
      hint: CONFIG_HINT,
      cause: err,
    });
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Invalid configuration.",
      message: `${configPath} must contain a YAML mapping at the top level.`,
      hint: CONFIG_HINT,
    });
  }
  return parsed;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const llm: Record<string, unknown> = {};
  const provider = env.AUTOCONTAIN_PROVIDER?.trim();
  const model = env.AUTOCONTAIN_MODEL?.trim();
  if (provider) llm.provider = provider;
  if (model) llm.model = model;
  return Object.keys(llm).length > 0 ? { llm } : {};
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
