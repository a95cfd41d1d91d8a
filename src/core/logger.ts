/*
Purpose: append-only JSONL event logs for containerization runs.
Assumptions: one logger per file; writes are synchronous so events survive a crash mid-run.
Usage: const log = new JsonlLogger(orchestratorLogPath(runId), { runId }); logOrchestratorEvent(log, "state.transition", { to: "BUILDING" }).
*/

import fs from "node:fs";
import path from "node:path";

import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export type JsonObject = { [key: string]: JsonValue | undefined };

export type LogEventInput = {
  type: string;
  payload?: JsonObject;
};

export type LogEvent = LogEventInput & {
  ts: string;
  run_id?: string;
};

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  readonly filePath: string;
  private readonly runId?: string;
  private ensured = false;

  constructor(filePath: string, opts: { runId?: string } = {}) {
    this.filePath = filePath;
    this.runId = opts.runId;
  }

  log(event: LogEventInput): void {
    if (!this.ensured) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.ensured = true;
    }

    const record: LogEvent = {
      ts: isoNow(),
      ...(this.runId ? { run_id: this.runId } : {}),
      ...event,
    };
    fs.appendFileSync(this.filePath, `${JSON.stringify(record)}\n`, "utf8");
  }
}

export function logOrchestratorEvent(
  logger: JsonlLogger,
  type: string,
  payload: JsonObject = {},
): void {
  logger.log({ type, payload });
}
