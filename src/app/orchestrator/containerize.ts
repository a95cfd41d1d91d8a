/**
 * Containerization pipeline.
 * Purpose: acquire a source, capture its context, run the healing state machine and apply the
 * workspace release policy.
 * Assumptions: one pipeline per invocation; the caller owns signal handling and output.
 * Usage: const outcome = await containerize(ctx, { source: "./app.zip" }).
 */

import { DockerError, SourceError } from "../../core/errors.js";
import type { ProjectContext } from "../../core/inventory.js";
import type { JsonObject, JsonlLogger } from "../../core/logger.js";
import { secondsToMs } from "../../core/utils.js";
import type { BuiltImage } from "../../docker/docker.js";
import type { ProbeResult } from "../../docker/probe.js";
import type { Workspace } from "../workspace/workspace.js";

import type { RecipeStore } from "./ports.js";
import type { RunContext } from "./run-context.js";
import {
  runHealingStateMachine,
  type Attempt,
  type FailureStage,
  type HealingSettings,
  type TransitionEvent,
} from "./state-machine.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunOutcome =
  | {
      status: "succeeded";
      runId: string;
      image: BuiltImage;
      recipe: string;
      recipePath: string;
      workspace: Workspace;
      runtime: ProbeResult | null;
      attempts: Attempt[];
      logPath: string;
    }
  | {
      status: "failed";
      runId: string;
      stage: FailureStage;
      reason: string;
      log?: string;
      // Present only when the workspace was preserved for inspection.
      workspace?: Workspace;
      recipePath?: string;
      attempts: Attempt[];
      logPath: string;
    };

export type PipelineProgress =
  | { step: "workspace"; workspace: Workspace }
  | { step: "inventory"; context: ProjectContext }
  | { step: "transition"; event: TransitionEvent };

export type ContainerizeOptions = {
  source: string;
  signal?: AbortSignal;
  onProgress?: (progress: PipelineProgress) => void;
};

// Nothing worth inspecting exists yet (or the engine itself failed): the temp dir goes.
export const RELEASE_ON_STAGES: ReadonlySet<FailureStage> = new Set<FailureStage>([
  "source",
  "inventory",
  "drafting",
  "infrastructure",
  "cancelled",
]);

// =============================================================================
// PIPELINE
// =============================================================================

export async function containerize(
  ctx: RunContext,
  opts: ContainerizeOptions,
): Promise<RunOutcome> {
  const { config, ports, runId } = ctx;
  const logger = ports.logSink.createOrchestratorLogger(runId);
  const log = (type: string, payload: JsonObject): void =>
    ports.logSink.logOrchestratorEvent(logger, type, payload);

  log("run.start", {
    source: opts.source,
    tag: config.docker.tag,
    provider: config.llm.provider,
    model: config.llm.model,
    runtime_test: config.docker.runtime_test,
  });

  const finish = (outcome: RunOutcome): RunOutcome => {
    log("run.complete", {
      status: outcome.status,
      ...(outcome.status === "failed" ? { stage: outcome.stage, reason: outcome.reason } : {}),
      ...(outcome.workspace ? { workspace: outcome.workspace.dir } : {}),
    });
    return outcome;
  };

  const failEarly = (stage: FailureStage, reason: string): RunOutcome =>
    finish({ status: "failed", runId, stage, reason, attempts: [], logPath: logger.filePath });

  if (opts.signal?.aborted) {
    return failEarly("cancelled", "Run cancelled.");
  }

  try {
    await ports.buildEngine.ping();
  } catch (err) {
    if (err instanceof DockerError) return failEarly("infrastructure", err.message);
    throw err;
  }

  let workspace: Workspace;
  try {
    workspace = await ports.workspaces.acquire(opts.source);
  } catch (err) {
    if (err instanceof SourceError) {
      log("workspace.failed", { kind: err.kind, message: err.message });
      return failEarly("source", err.message);
    }
    throw err;
  }
  log("workspace.acquired", {
    dir: workspace.dir,
    root: workspace.root,
    source_kind: workspace.sourceKind,
  });
  opts.onProgress?.({ step: "workspace", workspace });

  const abandon = async (stage: FailureStage, reason: string): Promise<RunOutcome> => {
    await releaseAndLog(ctx, logger, workspace);
    return failEarly(stage, reason);
  };

  let context: ProjectContext;
  try {
    context = await ports.inventory.capture(workspace.root, {
      excerptBytes: config.inventory.excerpt_bytes,
    });
  } catch (err) {
    return abandon("inventory", err instanceof Error ? err.message : String(err));
  }
  log("inventory.captured", {
    files: context.files.length,
    manifests: context.manifests.map((m) => m.path),
    missing: [...context.missing],
  });
  opts.onProgress?.({ step: "inventory", context });

  const settings: HealingSettings = {
    tag: config.docker.tag,
    runtimeTest: config.docker.runtime_test,
    probeWindowMs: secondsToMs(config.docker.probe_seconds),
    buildHeals: config.healing.build_attempts,
    runtimeHeals: config.healing.runtime_attempts,
    logTailBytes: config.inventory.log_tail_bytes,
  };

  // Once a Dockerfile is on disk the workspace is worth inspecting, even after a crash.
  let recipeWritten = false;
  const recipeStore: RecipeStore = {
    write: async (root, recipe) => {
      const recipePath = await ports.recipeStore.write(root, recipe);
      recipeWritten = true;
      return recipePath;
    },
  };

  let result: Awaited<ReturnType<typeof runHealingStateMachine>>;
  try {
    result = await runHealingStateMachine({
      workspace,
      context,
      settings,
      ports: { ...ports, recipeStore },
      logger,
      signal: opts.signal,
      onTransition: (event) => opts.onProgress?.({ step: "transition", event }),
    });
  } catch (err) {
    if (recipeWritten) {
      log("workspace.preserved", { dir: workspace.dir });
    } else {
      await releaseAndLog(ctx, logger, workspace);
    }
    throw err;
  }

  if (result.status === "succeeded") {
    return finish({ ...result, runId, workspace, logPath: logger.filePath });
  }

  const preserve = !RELEASE_ON_STAGES.has(result.stage);
  if (!preserve) {
    await releaseAndLog(ctx, logger, workspace);
  }

  return finish({
    status: "failed",
    runId,
    stage: result.stage,
    reason: result.reason,
    ...(result.log !== undefined ? { log: result.log } : {}),
    ...(preserve ? { workspace } : {}),
    ...(preserve && result.recipePath ? { recipePath: result.recipePath } : {}),
    attempts: result.attempts,
    logPath: logger.filePath,
  });
}

// =============================================================================
// INTERNALS
// =============================================================================

async function releaseAndLog(
  ctx: RunContext,
  logger: JsonlLogger,
  workspace: Workspace,
): Promise<void> {
  await ctx.ports.workspaces.release(workspace);
  ctx.ports.logSink.logOrchestratorEvent(logger, "workspace.released", { dir: workspace.dir });
}
