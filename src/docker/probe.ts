/*
Purpose: run a freshly built image for a short observation window and classify the result.
Assumptions: the image's own CMD/ENTRYPOINT is the thing under test; no ports or volumes are wired.
Usage: const result = await probeImage(docker, { image: "app:latest", windowMs: 10_000 });
*/

import crypto from "node:crypto";

import type Docker from "dockerode";

import { DockerError, InfrastructureError } from "../core/errors.js";
import { sleep as defaultSleep } from "../core/utils.js";

import { createContainer, isConnectionError, removeContainer, startContainer } from "./docker.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProbeResult =
  | { status: "stable"; detail: "running" | "completed"; log: string }
  | { status: "crashed"; exitCode: number | null; log: string };

export type ContainerObservation = {
  running: boolean;
  exitCode: number | null;
};

export type ProbeImageOptions = {
  image: string;
  windowMs: number;
  sleep?: (ms: number) => Promise<void>;
  name?: string;
};

export const PROBE_LABEL = "autocontain.probe";

// =============================================================================
// CLASSIFICATION
// =============================================================================

// Still running after the window, or a clean exit, is stable. Any other exit
// code (137 included) is a crash.
export function classifyContainerState(state: ContainerObservation, log: string): ProbeResult {
  if (state.running) {
    return { status: "stable", detail: "running", log };
  }
  if (state.exitCode === 0) {
    return { status: "stable", detail: "completed", log };
  }
  return { status: "crashed", exitCode: state.exitCode, log };
}

// =============================================================================
// PROBE
// =============================================================================

export async function probeImage(docker: Docker, opts: ProbeImageOptions): Promise<ProbeResult> {
  const sleep = opts.sleep ?? defaultSleep;
  const name = opts.name ?? `autocontain-probe-${crypto.randomBytes(4).toString("hex")}`;

  let container: Docker.Container;
  try {
    container = await createContainer(docker, {
      name,
      image: opts.image,
      labels: { [PROBE_LABEL]: "1" },
    });
  } catch (err) {
    return crashOrRethrow(err);
  }

  try {
    try {
      await startContainer(container);
    } catch (err) {
      return crashOrRethrow(err);
    }

    await sleep(opts.windowMs);

    const info = await inspectOrThrow(container);
    const log = await readLogs(container);
    return classifyContainerState(
      { running: info.State.Running, exitCode: info.State.Running ? null : info.State.ExitCode },
      log,
    );
  } finally {
    await removeContainer(container);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

// Engine trouble propagates; anything the image caused becomes a crash the
// runtime heal can act on.
function crashOrRethrow(err: unknown): ProbeResult {
  if (err instanceof InfrastructureError) throw err;
  if (err instanceof DockerError) {
    return { status: "crashed", exitCode: null, log: err.message };
  }
  throw err;
}

async function inspectOrThrow(container: Docker.Container): Promise<Docker.ContainerInspectInfo> {
  try {
    return await container.inspect();
  } catch (err) {
    const message = `Failed to inspect probe container: ${err instanceof Error ? err.message : String(err)}`;
    throw isConnectionError(err)
      ? new InfrastructureError(message, err)
      : new DockerError(message, err);
  }
}

async function readLogs(container: Docker.Container): Promise<string> {
  try {
    const buf = await container.logs({ stdout: true, stderr: true, follow: false });
    return buf.toString("utf8").replace(/\r\n/g, "\n");
  } catch (err) {
    if (isConnectionError(err)) {
      throw new InfrastructureError(
        `Failed to read probe container logs: ${err instanceof Error ? err.message : String(err)}`,
        err,
      );
    }
    return `<logs unavailable: ${err instanceof Error ? err.message : String(err)}>`;
  }
}
