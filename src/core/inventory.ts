/*
Purpose: build the project context fed to every drafting and healing prompt.
Assumptions: the tree is not modified while it is captured; traversal order is stable so the
rendered text is reproducible byte for byte.
Usage: const ctx = await captureProjectContext(workspace.root, { excerptBytes: 1000 }); ctx.rendered.
*/

import type { Dirent } from "node:fs";
import fs, { type FileHandle } from "node:fs/promises";
import path from "node:path";

import { decodeLenient } from "./text.js";

// =============================================================================
// CONSTANTS
// =============================================================================

export const EXCLUDED_DIRS: ReadonlySet<string> = new Set([
  ".git",
  "__pycache__",
  "node_modules",
  ".venv",
  "venv",
  "env",
]);

// Order matters: the missing-files section lists names in this order.
export const CANONICAL_MANIFESTS: readonly string[] = [
  "package.json",
  "requirements.txt",
  "go.mod",
  "pom.xml",
  "main.py",
  "app.py",
  "index.js",
  "pyproject.toml",
  "setup.py",
  "README.md",
  "README.rst",
  "README.txt",
  "LICENSE",
];

export const DEFAULT_EXCERPT_BYTES = 1000;

const TREE_INDENT = "    ";

// =============================================================================
// TYPES
// =============================================================================

export type ManifestExcerpt = {
  name: string;
  path: string;
  excerpt: string;
  truncated: boolean;
};

export type ProjectContext = {
  readonly root: string;
  readonly files: readonly string[];
  readonly rootFiles: readonly string[];
  readonly tree: string;
  readonly manifests: readonly ManifestExcerpt[];
  readonly missing: readonly string[];
  readonly rendered: string;
};

export type InventoryOptions = {
  excerptBytes?: number;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function captureProjectContext(
  root: string,
  opts: InventoryOptions = {},
): Promise<ProjectContext> {
  const excerptBytes = opts.excerptBytes ?? DEFAULT_EXCERPT_BYTES;
  const walk = await walkTree(root);

  const manifestNames = new Set(CANONICAL_MANIFESTS);
  const found = new Set<string>();
  const manifests: ManifestExcerpt[] = [];

  for (const rel of walk.files) {
    const name = path.posix.basename(rel);
    if (!manifestNames.has(name)) continue;

    found.add(name);
    const excerpt = await readExcerpt(path.join(root, ...rel.split("/")), excerptBytes);
    manifests.push({ name, path: rel, ...excerpt });
  }

  const missing = CANONICAL_MANIFESTS.filter((name) => !found.has(name));
  const rootFiles = walk.files.filter((rel) => !rel.includes("/"));

  const context = {
    root,
    files: walk.files,
    rootFiles,
    tree: walk.treeLines.join("\n"),
    manifests,
    missing,
  };

  return Object.freeze({ ...context, rendered: renderProjectContext(context) });
}

export function renderProjectContext(ctx: Omit<ProjectContext, "rendered" | "root">): string {
  const sections: string[] = [];

  sections.push(`Project structure:\n${ctx.tree}`);

  sections.push(
    ["=== ROOT DIRECTORY FILES ===", ...ctx.rootFiles.map((file) => `  - ${file}`)].join("\n"),
  );

  sections.push(["=== ALL FILES THAT ACTUALLY EXIST ===", ...ctx.files].join("\n"));

  const contents = ctx.manifests.map((m) => {
    const suffix = m.truncated ? "\n[... truncated]" : "";
    return `--- ${m.path} ---\n${m.excerpt}${suffix}`;
  });
  sections.push(["=== KEY FILE CONTENTS ===", ...contents].join("\n"));

  if (ctx.missing.length > 0) {
    sections.push(
      [
        "=== MISSING STANDARD FILES ===",
        `The following common files do NOT exist: ${ctx.missing.join(", ")}`,
        "Do NOT reference these files in the Dockerfile (no COPY, ADD or RUN on them).",
      ].join("\n"),
    );
  }

  return `${sections.join("\n\n")}\n`;
}

// =============================================================================
// INTERNALS
// =============================================================================

type TreeWalk = {
  files: string[];
  treeLines: string[];
};

function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

// Pre-order, files before subdirectories at each level, each group sorted by name.
async function walkTree(root: string): Promise<TreeWalk> {
  const files: string[] = [];
  const treeLines: string[] = [];

  const visit = async (absDir: string, relDir: string, depth: number): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(absDir, { withFileTypes: true });
    } catch (err) {
      // The root must be readable; a locked subdirectory only loses its listing.
      if (depth === 0) throw err;
      treeLines.push(`${TREE_INDENT.repeat(depth)}<unreadable: ${errorCode(err)}>`);
      return;
    }
    const dirs = entries
      .filter((e) => e.isDirectory() && !EXCLUDED_DIRS.has(e.name))
      .map((e) => e.name)
      .sort(compareNames);
    const plain = entries
      .filter((e) => e.isFile())
      .map((e) => e.name)
      .sort(compareNames);

    const indent = TREE_INDENT.repeat(depth);
    for (const name of plain) {
      treeLines.push(`${indent}${name}`);
      files.push(relDir ? `${relDir}/${name}` : name);
    }
    for (const name of dirs) {
      treeLines.push(`${indent}${name}/`);
      await visit(path.join(absDir, name), relDir ? `${relDir}/${name}` : name, depth + 1);
    }
  };

  await visit(root, "", 0);
  return { files, treeLines };
}

async function readExcerpt(
  filePath: string,
  maxBytes: number,
): Promise<{ excerpt: string; truncated: boolean }> {
  let handle: FileHandle | undefined;
  try {
    handle = await fs.open(filePath, "r");
    const buffer = Buffer.alloc(maxBytes + 1);
    const { bytesRead } = await handle.read(buffer, 0, maxBytes + 1, 0);
    const truncated = bytesRead > maxBytes;
    const text = decodeLenient(buffer.subarray(0, Math.min(bytesRead, maxBytes)));
    return { excerpt: text, truncated };
  } catch (err) {
    return { excerpt: `<unreadable: ${errorCode(err)}>`, truncated: false };
  } finally {
    await handle?.close();
  }
}

function errorCode(err: unknown): string {
  return err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : "EUNKNOWN";
}
