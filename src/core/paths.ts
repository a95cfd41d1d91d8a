import os from "node:os";
import path from "node:path";

// Run logs live outside the workspace so a build context never picks them up.
export function autocontainHome(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.AUTOCONTAIN_HOME?.trim();
  return override ? path.resolve(override) : path.join(os.homedir(), ".autocontain");
}

export function runLogsDir(runId: string, env?: NodeJS.ProcessEnv): string {
  return path.join(autocontainHome(env), "runs", runId);
}

export function orchestratorLogPath(runId: string, env?: NodeJS.ProcessEnv): string {
  return path.join(runLogsDir(runId, env), "orchestrator.jsonl");
}
