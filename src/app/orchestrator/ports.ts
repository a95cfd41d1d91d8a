/**
 * Orchestrator ports.
 * Purpose: name every collaborator the containerization pipeline talks to so tests can swap them.
 * Assumptions: adapters are thin; all policy lives in the state machine and the pipeline.
 */

import type { InventoryOptions, ProjectContext } from "../../core/inventory.js";
import type { JsonObject, JsonlLogger } from "../../core/logger.js";
import type { BuildOutcome } from "../../docker/docker.js";
import type { ProbeResult } from "../../docker/probe.js";
import type { Workspace } from "../workspace/workspace.js";

import type { DraftResult } from "./architect.js";

// =============================================================================
// PORTS
// =============================================================================

export type WorkspaceManager = {
  acquire(source: string): Promise<Workspace>;
  release(workspace: Workspace): Promise<void>;
};

export type ContextCapturer = {
  capture(root: string, opts: InventoryOptions): Promise<ProjectContext>;
};

export type RecipeArchitect = {
  draft(context: ProjectContext): Promise<DraftResult>;
  healBuild(context: ProjectContext, recipe: string, log: string): Promise<DraftResult>;
  healRuntime(context: ProjectContext, recipe: string, log: string): Promise<DraftResult>;
};

export type RecipeStore = {
  // Returns the path the recipe was written to.
  write(root: string, recipe: string): Promise<string>;
};

export type BuildEngine = {
  ping(): Promise<void>;
  build(contextDir: string, tag: string): Promise<BuildOutcome>;
};

export type RuntimeProbe = {
  run(tag: string, windowMs: number): Promise<ProbeResult>;
};

export type LogSink = {
  createOrchestratorLogger: (runId: string) => JsonlLogger;
  logOrchestratorEvent: (logger: JsonlLogger, type: string, payload?: JsonObject) => void;
};

export type OrchestratorPorts = {
  workspaces: WorkspaceManager;
  inventory: ContextCapturer;
  architect: RecipeArchitect;
  recipeStore: RecipeStore;
  buildEngine: BuildEngine;
  runtimeProbe: RuntimeProbe;
  logSink: LogSink;
};
