/**
 * Healing state machine.
 * Purpose: drive draft → build → runtime test, with one bounded heal loop per failure class.
 * Assumptions: the workspace and project context already exist; every collaborator call is awaited
 * before the next transition.
 * Usage: const result = await runHealingStateMachine({ workspace, context, settings, ports, logger }).
 */

import { DockerError } from "../../core/errors.js";
import type { ProjectContext } from "../../core/inventory.js";
import type { JsonObject, JsonlLogger } from "../../core/logger.js";
import { checkRecipeConformance } from "../../core/recipe/conformance.js";
import { truncateTail } from "../../core/text.js";
import type { BuildOutcome, BuiltImage } from "../../docker/docker.js";
import type { ProbeResult } from "../../docker/probe.js";
import type { Workspace } from "../workspace/workspace.js";

import type { DraftResult } from "./architect.js";
import type { OrchestratorPorts } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type MachineState =
  | "START"
  | "DRAFTING"
  | "BUILDING"
  | "RUNTIME_TESTING"
  | "HEALING_BUILD"
  | "HEALING_RUNTIME"
  | "SUCCEEDED"
  | "FAILED";

export type FailureStage =
  | "source"
  | "inventory"
  | "infrastructure"
  | "drafting"
  | "build"
  | "heal-build"
  | "runtime"
  | "heal-runtime"
  | "cancelled";

export type AttemptKind = "draft" | "heal-build" | "heal-runtime";

export type Attempt = {
  index: number;
  kind: AttemptKind;
  recipe: string;
  build?: BuildOutcome;
  runtime?: ProbeResult;
};

export type HealingSettings = {
  tag: string;
  runtimeTest: boolean;
  probeWindowMs: number;
  buildHeals: number;
  runtimeHeals: number;
  logTailBytes: number;
};

export type TransitionEvent = {
  from: MachineState;
  to: MachineState;
  attempt: number;
  stage?: FailureStage;
};

export type MachineResult =
  | {
      status: "succeeded";
      image: BuiltImage;
      recipe: string;
      recipePath: string;
      runtime: ProbeResult | null;
      attempts: Attempt[];
    }
  | {
      status: "failed";
      stage: FailureStage;
      reason: string;
      log?: string;
      // Set once a recipe has been persisted to the workspace.
      recipePath?: string;
      attempts: Attempt[];
    };

export type HealingMachineInput = {
  workspace: Workspace;
  context: ProjectContext;
  settings: HealingSettings;
  ports: Pick<
    OrchestratorPorts,
    "architect" | "recipeStore" | "buildEngine" | "runtimeProbe" | "logSink"
  >;
  logger: JsonlLogger;
  signal?: AbortSignal;
  onTransition?: (event: TransitionEvent) => void;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function runHealingStateMachine(input: HealingMachineInput): Promise<MachineResult> {
  return new HealingStateMachine(input).run();
}

// =============================================================================
// MACHINE
// =============================================================================

class RunCancelled extends Error {
  constructor() {
    super("Run cancelled.");
    this.name = "RunCancelled";
  }
}

type Failure = Extract<MachineResult, { status: "failed" }>;

class HealingStateMachine {
  private state: MachineState = "START";
  private readonly attempts: Attempt[] = [];
  private recipePath?: string;
  private buildHealsUsed = 0;
  private runtimeHealsUsed = 0;

  constructor(private readonly input: HealingMachineInput) {}

  async run(): Promise<MachineResult> {
    try {
      return await this.loop();
    } catch (err) {
      if (err instanceof RunCancelled) {
        return this.fail("cancelled", err.message);
      }
      if (err instanceof DockerError) {
        return this.fail("infrastructure", err.message);
      }
      throw err;
    }
  }

  private async loop(): Promise<MachineResult> {
    const { architect, buildEngine, runtimeProbe } = this.input.ports;
    const { context, settings, workspace } = this.input;

    this.advance("DRAFTING");
    const drafted = await architect.draft(context);
    if (!drafted.ok) {
      return this.fail("drafting", drafted.reason, drafted.excerpt);
    }
    let current = await this.adopt("draft", drafted.recipe);

    for (;;) {
      this.advance("BUILDING");
      const build = await buildEngine.build(workspace.root, settings.tag);
      current.build = build;
      const buildLog = build.ok ? undefined : this.tail(build.log);
      this.event("build.finished", {
        ok: build.ok,
        ...(build.ok ? { image_id: build.image.id } : { log_tail: buildLog }),
      });

      if (!build.ok) {
        const log = buildLog ?? "";
        if (current.kind === "heal-runtime") {
          return this.fail("heal-runtime", "Rebuild after runtime heal failed.", log);
        }
        if (this.buildHealsUsed >= settings.buildHeals) {
          return this.fail("build", "Docker build failed.", log);
        }

        this.advance("HEALING_BUILD");
        this.buildHealsUsed += 1;
        const healed = await architect.healBuild(context, current.recipe, log);
        if (!healed.ok) {
          return this.failHeal("heal-build", healed, log);
        }
        current = await this.adopt("heal-build", healed.recipe);
        continue;
      }

      if (!settings.runtimeTest) {
        this.advance("SUCCEEDED");
        return this.succeed(build.image, current.recipe, null);
      }

      this.advance("RUNTIME_TESTING");
      const probe = await runtimeProbe.run(build.image.tag, settings.probeWindowMs);
      current.runtime = probe;
      if (probe.status === "stable") {
        this.event("runtime.finished", { status: probe.status, detail: probe.detail });
        this.advance("SUCCEEDED");
        return this.succeed(build.image, current.recipe, probe);
      }

      const log = this.tail(probe.log) || describeSilentCrash(probe.exitCode);
      this.event("runtime.finished", {
        status: probe.status,
        exit_code: probe.exitCode,
        log_tail: log,
      });
      if (this.runtimeHealsUsed >= settings.runtimeHeals) {
        return this.fail("runtime", crashReason(probe.exitCode), log);
      }

      this.advance("HEALING_RUNTIME");
      this.runtimeHealsUsed += 1;
      const healed = await architect.healRuntime(context, current.recipe, log);
      if (!healed.ok) {
        return this.failHeal("heal-runtime", healed, log);
      }
      current = await this.adopt("heal-runtime", healed.recipe);
    }
  }

  // ===== TRANSITIONS =====

  private advance(to: MachineState, stage?: FailureStage): void {
    // A failed run is always allowed to settle; every other move honours cancellation.
    if (to !== "FAILED" && this.input.signal?.aborted) {
      throw new RunCancelled();
    }

    const event: TransitionEvent = {
      from: this.state,
      to,
      attempt: this.attempts.length,
      ...(stage ? { stage } : {}),
    };
    this.state = to;
    this.event("state.transition", { ...event });
    this.input.onTransition?.(event);
  }

  private async adopt(kind: AttemptKind, recipe: string): Promise<Attempt> {
    const attempt: Attempt = { index: this.attempts.length + 1, kind, recipe };
    this.attempts.push(attempt);
    this.recipePath = await this.input.ports.recipeStore.write(this.input.workspace.root, recipe);

    const violations = checkRecipeConformance(recipe, this.input.context.missing);
    if (violations.length > 0) {
      this.event("recipe.conformance", {
        attempt: attempt.index,
        violations: violations.map((v) => ({
          line: v.line,
          instruction: v.instruction,
          file: v.file,
          text: v.text,
        })),
      });
    }
    return attempt;
  }

  private succeed(image: BuiltImage, recipe: string, runtime: ProbeResult | null): MachineResult {
    const recipePath = this.recipePath;
    if (!recipePath) {
      throw new Error("Invariant violated: build succeeded before a recipe was written.");
    }
    return { status: "succeeded", image, recipe, recipePath, runtime, attempts: this.attempts };
  }

  // The log that triggered the heal stays the outcome's log; the LLM's answer goes in the reason.
  private failHeal(
    stage: "heal-build" | "heal-runtime",
    result: Extract<DraftResult, { ok: false }>,
    log: string,
  ): Failure {
    const reason = result.excerpt
      ? `${result.reason} LLM replied: ${JSON.stringify(result.excerpt)}`
      : result.reason;
    return this.fail(stage, reason, log);
  }

  private fail(stage: FailureStage, reason: string, log?: string): Failure {
    this.advance("FAILED", stage);
    return {
      status: "failed",
      stage,
      reason,
      ...(log !== undefined ? { log } : {}),
      ...(this.recipePath ? { recipePath: this.recipePath } : {}),
      attempts: this.attempts,
    };
  }

  // ===== HELPERS =====

  private tail(log: string): string {
    return truncateTail(log, this.input.settings.logTailBytes).text;
  }

  private event(type: string, payload: JsonObject): void {
    this.input.ports.logSink.logOrchestratorEvent(this.input.logger, type, payload);
  }
}

function crashReason(exitCode: number | null): string {
  return exitCode === null
    ? "Container failed to start."
    : `Container exited with code ${exitCode}.`;
}

function describeSilentCrash(exitCode: number | null): string {
  return `${crashReason(exitCode)} It produced no log output.`;
}
