import Docker from "dockerode";
import { ExecaError, execa } from "execa";

import { DockerError, InfrastructureError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type BuiltImage = { tag: string; id: string };

export type BuildOutcome = { ok: true; image: BuiltImage } | { ok: false; log: string };

export type ContainerSpec = {
  name: string;
  image: string;
  labels?: Record<string, string>;
};

export type BuildImageOptions = {
  contextDir: string;
  tag: string;
  docker?: Docker;
};

// =============================================================================
// CLIENT
// =============================================================================

export function dockerClient(): Docker {
  return new Docker();
}

const DAEMON_UNREACHABLE =
  /Cannot connect to the Docker daemon|error during connect|Is the docker daemon running|permission denied while trying to connect/i;

const CONNECTION_ERROR_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ENOENT", "EACCES", "EPIPE"]);

export function isDaemonUnreachableLog(log: string): boolean {
  return DAEMON_UNREACHABLE.test(log);
}

// dockerode surfaces socket failures as plain errors carrying a Node error code.
export function isConnectionError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = "code" in err ? err.code : undefined;
  if (typeof code === "string" && CONNECTION_ERROR_CODES.has(code)) return true;
  return isDaemonUnreachableLog(err.message);
}

export async function pingDocker(docker: Docker): Promise<void> {
  try {
    await docker.ping();
  } catch (err) {
    throw new InfrastructureError(
      `Docker daemon is not reachable: ${err instanceof Error ? err.message : String(err)}`,
      err,
    );
  }
}

// =============================================================================
// IMAGES
// =============================================================================

/**
 * Build `contextDir` with the docker CLI, which reads `<contextDir>/Dockerfile`.
 * A failing recipe is a value carrying the combined build output; only an
 * unusable engine throws.
 */
export async function buildImage(opts: BuildImageOptions): Promise<BuildOutcome> {
  try {
    await execa("docker", ["build", "-t", opts.tag, opts.contextDir], { all: true });
  } catch (err) {
    if (!(err instanceof ExecaError)) {
      throw new InfrastructureError(
        `docker build could not be started: ${err instanceof Error ? err.message : String(err)}`,
        err,
      );
    }
    if (err.code === "ENOENT") {
      throw new InfrastructureError("docker CLI not found on PATH.", err);
    }

    const log = typeof err.all === "string" && err.all.length > 0 ? err.all : err.message;
    if (isDaemonUnreachableLog(log)) {
      throw new InfrastructureError(`Docker daemon is not reachable: ${firstLine(log)}`, err);
    }
    return { ok: false, log };
  }

  const docker = opts.docker ?? dockerClient();
  return { ok: true, image: { tag: opts.tag, id: await inspectImageId(docker, opts.tag) } };
}

export async function inspectImageId(docker: Docker, tag: string): Promise<string> {
  try {
    const info = await docker.getImage(tag).inspect();
    return info.Id;
  } catch (err) {
    throw new InfrastructureError(
      `Built image ${tag} could not be inspected: ${err instanceof Error ? err.message : String(err)}`,
      err,
    );
  }
}

// =============================================================================
// CONTAINERS
// =============================================================================

export async function createContainer(
  docker: Docker,
  spec: ContainerSpec,
): Promise<Docker.Container> {
  try {
    return await docker.createContainer({
      Image: spec.image,
      name: spec.name,
      Labels: spec.labels,
      // A TTY keeps the log stream free of multiplexing headers.
      Tty: true,
      HostConfig: { AutoRemove: false },
    });
  } catch (err) {
    throw wrapContainerError(`Failed to create container ${spec.name}`, err);
  }
}

export async function startContainer(container: Docker.Container): Promise<void> {
  try {
    await container.start();
  } catch (err) {
    throw wrapContainerError("Failed to start container", err);
  }
}

export async function removeContainer(container: Docker.Container): Promise<void> {
  try {
    await container.remove({ force: true });
  } catch {
    // already gone
  }
}

function wrapContainerError(prefix: string, err: unknown): DockerError {
  const message = `${prefix}: ${err instanceof Error ? err.message : String(err)}`;
  return isConnectionError(err)
    ? new InfrastructureError(message, err)
    : new DockerError(message, err);
}

function firstLine(text: string): string {
  return text.split("\n").find((line) => line.trim().length > 0)?.trim() ?? text;
}
