/**
 * RunContext + composition root for containerization runs.
 * Purpose: centralize run-scoped config and injected ports to avoid globals.
 * Assumptions: ports are thin adapters over core modules and are overrideable for tests.
 * Usage: buildRunContext({ runId, config }) and pass it to containerize().
 */

import type { AutocontainConfig } from "../../core/config.js";
import { captureProjectContext } from "../../core/inventory.js";
import { JsonlLogger, logOrchestratorEvent } from "../../core/logger.js";
import { orchestratorLogPath } from "../../core/paths.js";
import { buildImage, dockerClient, pingDocker } from "../../docker/docker.js";
import { probeImage } from "../../docker/probe.js";
import { createLlmClient } from "../../llm/factory.js";
import type { RateLimitRetryInfo } from "../../llm/retry.js";
import { acquireWorkspace, releaseWorkspace } from "../workspace/workspace.js";

import { LlmRecipeArchitect } from "./architect.js";
import type { OrchestratorPorts } from "./ports.js";
import { FileRecipeStore } from "./recipe-store.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunContext = {
  runId: string;
  config: AutocontainConfig;
  ports: OrchestratorPorts;
};

export type DefaultPortsOptions = {
  env?: NodeJS.ProcessEnv;
  onRateLimit?: (info: RateLimitRetryInfo) => void;
};

export type BuildRunContextInput = {
  runId: string;
  config: AutocontainConfig;
  ports?: Partial<OrchestratorPorts>;
  defaults?: DefaultPortsOptions;
};

// =============================================================================
// DEFAULT ADAPTERS
// =============================================================================

export function createDefaultPorts(
  config: AutocontainConfig,
  opts: DefaultPortsOptions = {},
): OrchestratorPorts {
  const docker = dockerClient();

  return {
    workspaces: {
      acquire: (source) => acquireWorkspace(source),
      release: releaseWorkspace,
    },
    inventory: {
      capture: captureProjectContext,
    },
    architect: new LlmRecipeArchitect({
      client: createLlmClient(config.llm),
      llm: config.llm,
      onRateLimit: opts.onRateLimit,
    }),
    recipeStore: new FileRecipeStore(),
    buildEngine: {
      ping: () => pingDocker(docker),
      build: (contextDir, tag) => buildImage({ contextDir, tag, docker }),
    },
    runtimeProbe: {
      run: (tag, windowMs) => probeImage(docker, { image: tag, windowMs }),
    },
    logSink: {
      createOrchestratorLogger: (runId) =>
        new JsonlLogger(orchestratorLogPath(runId, opts.env), { runId }),
      logOrchestratorEvent,
    },
  };
}

// =============================================================================
// COMPOSITION ROOT
// =============================================================================

// Overrides replace whole ports; the defaults are only built when something is missing.
export function buildRunContext(input: BuildRunContextInput): RunContext {
  const overrides = input.ports ?? {};
  const ports: OrchestratorPorts = isComplete(overrides)
    ? overrides
    : { ...createDefaultPorts(input.config, input.defaults), ...overrides };

  return {
    runId: input.runId,
    config: input.config,
    ports,
  };
}

function isComplete(ports: Partial<OrchestratorPorts>): ports is OrchestratorPorts {
  return (
    ports.workspaces !== undefined &&
    ports.inventory !== undefined &&
    ports.architect !== undefined &&
    ports.recipeStore !== undefined &&
    ports.buildEngine !== undefined &&
    ports.runtimeProbe !== undefined &&
    ports.logSink !== undefined
  );
}
