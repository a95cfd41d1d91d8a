import fs from "node:fs";
import fsPromises from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { CANONICAL_MANIFESTS, captureProjectContext } from "./inventory.js";

// =============================================================================
// HELPERS
// =============================================================================

const tempDirs: string[] = [];

afterEach(() => {
  vi.restoreAllMocks();
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function errnoError(code: string): Error {
  return Object.assign(new Error(`${code}: permission denied`), { code });
}

function makeTree(files: Record<string, string | Buffer>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "inventory-test-"));
  tempDirs.push(root);
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(root, rel);
    fs.mkdirSync(path.dirname(abs), { recursive: true });
    fs.writeFileSync(abs, content);
  }
  return root;
}

// =============================================================================
// TESTS
// =============================================================================

describe("captureProjectContext", () => {
  it("renders a byte-identical context for an unmodified tree", async () => {
    const root = makeTree({
      "app.py": "print('hi')\n",
      "src/util.py": "x = 1\n",
      "src/pkg/__init__.py": "",
      "README.md": "# Demo\n",
    });

    const first = await captureProjectContext(root);
    const second = await captureProjectContext(root);

    expect(second.rendered).toBe(first.rendered);
  });

  it("lists files in a stable pre-order and skips noise directories", async () => {
    const root = makeTree({
      "b.txt": "b",
      "a.txt": "a",
      "src/main.py": "",
      "lib/z.py": "",
      ".git/HEAD": "ref: refs/heads/main",
      "node_modules/left-pad/index.js": "",
      "src/__pycache__/main.cpython-311.pyc": "",
      ".venv/bin/python": "",
    });

    const ctx = await captureProjectContext(root);

    expect(ctx.files).toEqual(["a.txt", "b.txt", "lib/z.py", "src/main.py"]);
    expect(ctx.rootFiles).toEqual(["a.txt", "b.txt"]);
    expect(ctx.tree).toBe(["a.txt", "b.txt", "lib/", "    z.py", "src/", "    main.py"].join("\n"));
  });

  it("lists exactly the canonical manifests that are absent everywhere", async () => {
    const root = makeTree({
      "pyproject.toml": "[project]\nname = 'demo'\n",
      "docs/README.md": "# Docs\n",
      "main.py": "print('hi')\n",
    });

    const ctx = await captureProjectContext(root);

    const expected = CANONICAL_MANIFESTS.filter(
      (name) => !["pyproject.toml", "README.md", "main.py"].includes(name),
    );
    expect(ctx.missing).toEqual(expected);
    expect(ctx.missing).toContain("requirements.txt");
    expect(ctx.rendered).toContain(
      `The following common files do NOT exist: ${expected.join(", ")}\n`,
    );
  });

  it("omits the missing section when every canonical manifest exists", async () => {
    const files: Record<string, string> = {};
    for (const name of CANONICAL_MANIFESTS) {
      files[name] = "x";
    }
    const ctx = await captureProjectContext(makeTree(files));

    expect(ctx.missing).toEqual([]);
    expect(ctx.rendered).not.toContain("=== MISSING STANDARD FILES ===");
  });

  it("excerpts manifests up to the byte budget and tolerates malformed bytes", async () => {
    const root = makeTree({
      "requirements.txt": "flask==3.0.0\n" + "x".repeat(50),
      "package.json": Buffer.from([0x7b, 0xff, 0xfe, 0x7d]),
    });

    const ctx = await captureProjectContext(root, { excerptBytes: 13 });

    const requirements = ctx.manifests.find((m) => m.name === "requirements.txt");
    expect(requirements).toEqual({
      name: "requirements.txt",
      path: "requirements.txt",
      excerpt: "flask==3.0.0\n",
      truncated: true,
    });

    const pkg = ctx.manifests.find((m) => m.name === "package.json");
    expect(pkg?.excerpt).toBe("{\uFFFD\uFFFD}");
    expect(pkg?.truncated).toBe(false);
    expect(ctx.rendered).toContain("--- requirements.txt ---\nflask==3.0.0\n\n[... truncated]");
  });

  it("keeps an unreadable manifest as found with a placeholder excerpt", async () => {
    const root = makeTree({
      "package.json": "{}",
      "requirements.txt": "flask==3.0.0\n",
    });
    vi.spyOn(fsPromises, "open").mockRejectedValueOnce(errnoError("EACCES"));

    const ctx = await captureProjectContext(root);

    expect(ctx.manifests.find((m) => m.name === "package.json")).toEqual({
      name: "package.json",
      path: "package.json",
      excerpt: "<unreadable: EACCES>",
      truncated: false,
    });
    expect(ctx.missing).not.toContain("package.json");
    expect(ctx.rendered).toContain("--- package.json ---\n<unreadable: EACCES>\n");
    expect(ctx.rendered).toContain("--- requirements.txt ---\nflask==3.0.0\n");
  });

  it("marks an unreadable subdirectory and keeps walking", async () => {
    const root = makeTree({
      "app.py": "",
      "locked/secret.txt": "",
      "src/main.py": "",
    });
    const realReaddir = fsPromises.readdir;
    // Root listing first, then "locked", then "src".
    vi.spyOn(fsPromises, "readdir")
      .mockImplementationOnce(realReaddir)
      .mockRejectedValueOnce(errnoError("EACCES"));

    const ctx = await captureProjectContext(root);

    expect(ctx.files).toEqual(["app.py", "src/main.py"]);
    expect(ctx.tree).toBe(
      ["app.py", "locked/", "    <unreadable: EACCES>", "src/", "    main.py"].join("\n"),
    );
  });

  it("fails when the root itself cannot be listed", async () => {
    const root = makeTree({ "app.py": "" });
    vi.spyOn(fsPromises, "readdir").mockRejectedValueOnce(errnoError("EACCES"));

    await expect(captureProjectContext(root)).rejects.toThrow("EACCES: permission denied");
  });

  it("returns a frozen context", async () => {
    const ctx = await captureProjectContext(makeTree({ "index.js": "" }));
    expect(Object.isFrozen(ctx)).toBe(true);
  });
});
