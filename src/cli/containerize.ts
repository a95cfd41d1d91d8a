import { InvalidArgumentError } from "commander";

import { containerize, type PipelineProgress, type RunOutcome } from "../app/orchestrator/containerize.js";
import { buildRunContext } from "../app/orchestrator/run-context.js";
import type { FailureStage } from "../app/orchestrator/state-machine.js";
import type { AutocontainConfigInput, LlmProvider } from "../core/config.js";
import { loadConfig } from "../core/config-loader.js";
import { createAnsiFormatter, resolveColorEnabled, type AnsiFormatter } from "../core/error-format.js";
import {
  AutocontainError,
  DockerError,
  DraftingError,
  InfrastructureError,
  SourceError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
  type UserFacingErrorCode,
} from "../core/errors.js";
import { defaultRunId } from "../core/utils.js";
import { LlmError } from "../llm/client.js";

import { createRunStopSignalHandler } from "./signal-handlers.js";

// =============================================================================
// TYPES
// =============================================================================

export type ContainerizeCliOptions = {
  model?: string;
  provider?: LlmProvider;
  tag?: string;
  skipTest?: boolean;
  probeSeconds?: number;
  buildHeals?: number;
  runtimeHeals?: number;
  config?: string;
  debug?: boolean;
};

type Failed = Extract<RunOutcome, { status: "failed" }>;
type Succeeded = Extract<RunOutcome, { status: "succeeded" }>;

// =============================================================================
// COMMAND
// =============================================================================

export async function containerizeCommand(
  source: string,
  opts: ContainerizeCliOptions,
): Promise<void> {
  const { config, configPath } = loadConfig({
    explicitPath: opts.config,
    overrides: buildConfigOverrides(opts),
  });
  const runId = defaultRunId();
  const format = createAnsiFormatter(resolveColorEnabled({ stream: process.stdout }));

  if (configPath) {
    console.log(format(`Using config ${configPath}`, ["dim"]));
  }

  let ctx: ReturnType<typeof buildRunContext>;
  try {
    ctx = buildRunContext({
      runId,
      config,
      defaults: {
        onRateLimit: (info) =>
          console.log(
            format(
              `LLM rate limited; retrying in ${Math.round(info.delayMs / 1000)}s (attempt ${info.attempt + 1}/${info.maxAttempts}).`,
              ["yellow"],
            ),
          ),
      },
    });
  } catch (err) {
    if (err instanceof LlmError) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.llm,
        title: "LLM client unavailable.",
        message: err.message,
        hint: "Export the provider's API key or set llm.api_key in autocontain.yaml.",
        cause: err,
      });
    }
    throw err;
  }

  const stopHandler = createRunStopSignalHandler({
    onStop: (signal) => {
      console.log(`Received ${signal}. Stopping run ${runId} at the next step (repeat to quit now).`);
    },
  });

  let outcome: RunOutcome;
  try {
    console.log(format(`Containerizing ${source} (run ${runId})`, ["bold"]));
    outcome = await containerize(ctx, {
      source,
      signal: stopHandler.signal,
      onProgress: (progress) => {
        const line = describeProgress(progress, config.docker.tag);
        if (line) console.log(line);
      },
    });
  } finally {
    stopHandler.cleanup();
  }

  if (outcome.status === "failed") {
    throw outcomeToUserFacingError(outcome);
  }

  for (const line of formatSuccessSummary(outcome, format)) {
    console.log(line);
  }
}

// =============================================================================
// OPTION PARSING
// =============================================================================

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a whole number of 0 or more.");
  }
  return parsed;
}

export function parsePositiveSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a number of seconds greater than 0.");
  }
  return parsed;
}

export function buildConfigOverrides(opts: ContainerizeCliOptions): AutocontainConfigInput {
  return {
    llm: { provider: opts.provider, model: opts.model },
    docker: {
      tag: opts.tag,
      runtime_test: opts.skipTest ? false : undefined,
      probe_seconds: opts.probeSeconds,
    },
    healing: {
      build_attempts: opts.buildHeals,
      runtime_attempts: opts.runtimeHeals,
    },
  };
}

// =============================================================================
// OUTPUT
// =============================================================================

export function describeProgress(progress: PipelineProgress, tag: string): string | null {
  switch (progress.step) {
    case "workspace":
      return `Workspace ready at ${progress.workspace.root} (${progress.workspace.sourceKind})`;
    case "inventory": {
      const { files, missing } = progress.context;
      const missingText = missing.length > 0 ? `missing: ${missing.join(", ")}` : "nothing missing";
      return `Captured ${files.length} file(s); ${missingText}`;
    }
    case "transition":
      switch (progress.event.to) {
        case "DRAFTING":
          return "Drafting Dockerfile...";
        case "BUILDING":
          return `Building image ${tag}...`;
        case "RUNTIME_TESTING":
          return "Running the image to check it stays up...";
        case "HEALING_BUILD":
          return "Build failed; asking the LLM to repair the Dockerfile...";
        case "HEALING_RUNTIME":
          return "Container crashed; asking the LLM to repair the entry point...";
        default:
          return null;
      }
  }
}

export function formatSuccessSummary(outcome: Succeeded, format: AnsiFormatter): string[] {
  const runtime =
    outcome.runtime === null
      ? "skipped"
      : outcome.runtime.detail === "running"
        ? "still running after the observation window"
        : "exited cleanly";

  return [
    format(`Success: image ${outcome.image.tag} built (${outcome.image.id})`, ["bold", "green"]),
    `  Dockerfile: ${outcome.recipePath}`,
    `  Workspace:  ${outcome.workspace.dir}`,
    `  Runtime:    ${runtime}`,
    `  Attempts:   ${outcome.attempts.map((a) => a.kind).join(" -> ")}`,
    `  Run log:    ${outcome.logPath}`,
  ];
}

const STAGE_TITLES: Record<FailureStage, string> = {
  source: "Could not acquire the source.",
  inventory: "Could not read the project.",
  infrastructure: "Docker is unavailable.",
  drafting: "Could not draft a Dockerfile.",
  build: "Docker build failed.",
  "heal-build": "Build healing failed.",
  runtime: "Container failed the runtime test.",
  "heal-runtime": "Runtime healing failed.",
  cancelled: "Run cancelled.",
};

const STAGE_HINTS: Record<FailureStage, string | undefined> = {
  source: "Check that the path exists or that the repository URL is reachable.",
  inventory: "Check file permissions inside the extracted project.",
  infrastructure: "Start the Docker daemon and make sure the current user can reach it.",
  drafting: "Check the LLM provider settings, or retry with a different --model.",
  build: "Edit the preserved Dockerfile and run `docker build` there, or raise --build-heals.",
  "heal-build": "Retry, or raise --build-heals to give the LLM another pass.",
  runtime: "Inspect the container log below, or raise --runtime-heals.",
  "heal-runtime": "Inspect the preserved Dockerfile; the healed entry point did not build.",
  cancelled: undefined,
};

const STAGE_CODES: Record<FailureStage, UserFacingErrorCode> = {
  source: USER_FACING_ERROR_CODES.source,
  inventory: USER_FACING_ERROR_CODES.source,
  infrastructure: USER_FACING_ERROR_CODES.docker,
  drafting: USER_FACING_ERROR_CODES.llm,
  build: USER_FACING_ERROR_CODES.recipe,
  "heal-build": USER_FACING_ERROR_CODES.llm,
  runtime: USER_FACING_ERROR_CODES.recipe,
  "heal-runtime": USER_FACING_ERROR_CODES.llm,
  cancelled: USER_FACING_ERROR_CODES.unknown,
};

export function outcomeToUserFacingError(outcome: Failed): UserFacingError {
  const next = outcome.workspace
    ? `Workspace kept at ${outcome.workspace.dir}${outcome.recipePath ? ` (Dockerfile: ${outcome.recipePath})` : ""}. Run log: ${outcome.logPath}`
    : `Run log: ${outcome.logPath}`;

  return new UserFacingError({
    code: STAGE_CODES[outcome.stage],
    title: STAGE_TITLES[outcome.stage],
    message: outcome.reason,
    hint: STAGE_HINTS[outcome.stage],
    next,
    detail: outcome.log,
    cause: stageError(outcome.stage, outcome.reason),
  });
}

function stageError(stage: FailureStage, reason: string): AutocontainError {
  switch (stage) {
    case "source":
    case "inventory":
      return new SourceError(reason, { kind: "extraction" });
    case "infrastructure":
      return new InfrastructureError(reason);
    case "drafting":
    case "heal-build":
    case "heal-runtime":
      return new DraftingError(reason);
    case "build":
    case "runtime":
      return new DockerError(reason);
    case "cancelled":
      return new AutocontainError(reason);
  }
}
