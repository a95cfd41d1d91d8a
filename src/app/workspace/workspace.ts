/**
 * Workspace lifecycle.
 * Purpose: materialize a source (archive, repository URL or local directory) in a private temp dir.
 * Assumptions: exactly one workspace is live per run; the caller decides when to release it.
 * Usage: const ws = await acquireWorkspace(source); ...; await releaseWorkspace(ws).
 */

import os from "node:os";
import path from "node:path";

import { execa } from "execa";
import fse from "fs-extra";

import { SourceError, type SourceErrorKind } from "../../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type SourceKind = "git" | "zip" | "tar" | "directory";

export type Workspace = {
  // Unique temp directory; the only thing release() deletes.
  dir: string;
  // Project root inside `dir` (the single top-level folder of a wrapped archive).
  root: string;
  source: string;
  sourceKind: SourceKind;
};

export type CommandRunner = (command: string, args: string[], cwd: string) => Promise<void>;

export type AcquireWorkspaceOptions = {
  tmpDir?: string;
  runCommand?: CommandRunner;
};

export const WORKSPACE_PREFIX = "autocontain-";

const TAR_SUFFIXES = [".tar", ".tar.gz", ".tgz"];
// Archive tooling on macOS adds this beside the real top-level folder.
const ARCHIVE_NOISE = new Set(["__MACOSX"]);

// =============================================================================
// CLASSIFICATION
// =============================================================================

export function isRemoteRepository(source: string): boolean {
  return (
    /^https?:\/\//i.test(source) ||
    source.startsWith("git@") ||
    /^ssh:\/\//i.test(source) ||
    source.toLowerCase().endsWith(".git")
  );
}

export async function classifySource(source: string): Promise<SourceKind> {
  if (isRemoteRepository(source)) return "git";

  const lower = source.toLowerCase();
  if (lower.endsWith(".zip")) return "zip";
  if (TAR_SUFFIXES.some((suffix) => lower.endsWith(suffix))) return "tar";

  const stat = await fse.stat(source).catch(() => null);
  if (stat?.isDirectory()) return "directory";

  throw new SourceError(
    stat
      ? `Unsupported source ${source}: expected a .zip or .tar archive, a git URL or a directory.`
      : `Source not found: ${source}`,
    { kind: "extraction" },
  );
}

// =============================================================================
// LIFECYCLE
// =============================================================================

export async function acquireWorkspace(
  source: string,
  opts: AcquireWorkspaceOptions = {},
): Promise<Workspace> {
  const sourceKind = await classifySource(source);
  const runCommand = opts.runCommand ?? defaultRunCommand;

  if (sourceKind !== "git" && !(await fse.pathExists(source))) {
    throw new SourceError(`Source not found: ${source}`, { kind: "extraction" });
  }

  const dir = await fse.mkdtemp(path.join(opts.tmpDir ?? os.tmpdir(), WORKSPACE_PREFIX));

  try {
    await materialize({ source, sourceKind, dir, runCommand });
    const root = sourceKind === "zip" || sourceKind === "tar" ? await unwrapSingleFolder(dir) : dir;
    return { dir, root, source, sourceKind };
  } catch (err) {
    await fse.remove(dir);
    if (err instanceof SourceError) throw err;
    throw new SourceError(
      `Failed to ${actionVerb(sourceKind)} ${source}: ${err instanceof Error ? err.message : String(err)}`,
      { kind: errorKindFor(sourceKind), cause: err },
    );
  }
}

export async function releaseWorkspace(workspace: Workspace): Promise<void> {
  await fse.remove(workspace.dir);
}

// =============================================================================
// INTERNALS
// =============================================================================

async function materialize(args: {
  source: string;
  sourceKind: SourceKind;
  dir: string;
  runCommand: CommandRunner;
}): Promise<void> {
  const { source, dir, runCommand } = args;

  switch (args.sourceKind) {
    case "git":
      await runCommand("git", ["clone", "--depth", "1", source, dir], dir);
      return;
    case "zip":
      await runCommand("unzip", ["-q", path.resolve(source), "-d", dir], dir);
      return;
    case "tar":
      await runCommand("tar", ["-xf", path.resolve(source), "-C", dir], dir);
      return;
    case "directory":
      await fse.copy(source, dir, {
        filter: (src) => path.basename(src) !== ".git",
      });
      return;
  }
}

// An archive that holds a single folder (optionally beside archive noise) is unwrapped.
async function unwrapSingleFolder(dir: string): Promise<string> {
  const entries = (await fse.readdir(dir, { withFileTypes: true })).filter(
    (entry) => !ARCHIVE_NOISE.has(entry.name),
  );
  const only = entries[0];
  if (entries.length === 1 && only?.isDirectory()) {
    return path.join(dir, only.name);
  }
  return dir;
}

async function defaultRunCommand(command: string, args: string[], cwd: string): Promise<void> {
  await execa(command, args, { cwd, stdio: "pipe" });
}

function actionVerb(kind: SourceKind): string {
  switch (kind) {
    case "git":
      return "clone";
    case "directory":
      return "copy";
    case "zip":
    case "tar":
      return "extract";
  }
}

function errorKindFor(kind: SourceKind): SourceErrorKind {
  return kind === "git" ? "clone" : "extraction";
}
