import { describe, expect, it } from "vitest";

import {
  createAnsiFormatter,
  formatErrorLines,
  renderErrorLines,
  resolveColorEnabled,
} from "./error-format.js";
import { DockerError, DraftingError, USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

describe("formatErrorLines", () => {
  it("formats user-facing errors in short mode", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.docker,
      title: "Build failed after healing.",
      message: "The healed Dockerfile still does not build.",
      hint: "Inspect the Dockerfile in the preserved workspace.",
      next: "Workspace preserved at /tmp/autocontain-abc",
      detail: "ERROR: failed to solve\n",
    });

    expect(formatErrorLines(error)).toEqual([
      { kind: "title", text: "Build failed after healing." },
      { kind: "message", text: "The healed Dockerfile still does not build." },
      { kind: "hint", text: "Inspect the Dockerfile in the preserved workspace." },
      { kind: "next", text: "Workspace preserved at /tmp/autocontain-abc" },
      { kind: "detail", text: "ERROR: failed to solve" },
    ]);
  });

  it("drops a message that repeats the title", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.recipe,
      title: "Docker build failed.",
      message: "Docker build failed.",
    });

    expect(formatErrorLines(error).map((line) => line.kind)).toEqual(["title"]);
  });

  it("keeps only the last detail lines in short mode", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.recipe,
      title: "Container failed the runtime test.",
      message: "Container exited with code 1.",
      detail: "one\ntwo\nthree\nfour",
    });

    const short = formatErrorLines(error, { detailLines: 2 });
    expect(short[short.length - 1]).toEqual({
      kind: "detail",
      text: "... 2 earlier line(s) omitted\nthree\nfour",
    });

    const debug = formatErrorLines(error, { mode: "debug", detailLines: 2 });
    expect(debug.find((line) => line.kind === "detail")?.text).toBe("one\ntwo\nthree\nfour");
  });

  it("includes the code and cause chain in debug mode", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.llm,
      title: "Drafting failed",
      message: "LLM output rejected",
      cause: new DraftingError("no FROM instruction", new DockerError("inner")),
    });

    const lines = formatErrorLines(error, { mode: "debug" });

    expect(lines.filter((line) => line.kind === "code" || line.kind === "cause")).toEqual([
      { kind: "code", text: "LLM_ERROR" },
      { kind: "cause", text: "DraftingError: no FROM instruction" },
      { kind: "cause", text: "DockerError: inner" },
    ]);
    expect(lines.find((line) => line.kind === "stack")?.text).toContain("UserFacingError");
  });

  it("defaults unknown inputs to an unexpected error title", () => {
    expect(formatErrorLines("boom")).toEqual([
      { kind: "title", text: "Unexpected error" },
      { kind: "message", text: "boom" },
    ]);
  });
});

describe("renderErrorLines", () => {
  it("prefixes hint and next lines when color is disabled", () => {
    const rendered = renderErrorLines(
      [
        { kind: "title", text: "Runtime check failed." },
        { kind: "hint", text: "Check CMD." },
        { kind: "next", text: "Workspace preserved at /tmp/ws" },
        { kind: "code", text: "RECIPE_ERROR" },
      ],
      createAnsiFormatter(false),
    );

    expect(rendered).toEqual([
      "Error: Runtime check failed.",
      "Hint: Check CMD.",
      "Next: Workspace preserved at /tmp/ws",
      "code: RECIPE_ERROR",
    ]);
  });
});

describe("resolveColorEnabled", () => {
  it("follows the stream when no override is set", () => {
    expect(resolveColorEnabled({ stream: { isTTY: false }, env: {} })).toBe(false);
    expect(resolveColorEnabled({ stream: { isTTY: true }, env: {} })).toBe(true);
  });

  it("honours NO_COLOR over FORCE_COLOR", () => {
    expect(resolveColorEnabled({ stream: { isTTY: false }, env: { FORCE_COLOR: "1" } })).toBe(true);
    expect(resolveColorEnabled({ stream: { isTTY: true }, env: { NO_COLOR: "1" } })).toBe(false);
    expect(
      resolveColorEnabled({ stream: { isTTY: true }, env: { NO_COLOR: "1", FORCE_COLOR: "1" } }),
    ).toBe(false);
  });
});

describe("createAnsiFormatter", () => {
  it("returns input unchanged when disabled", () => {
    expect(createAnsiFormatter(false)("plain", ["red"])).toBe("plain");
  });

  it("combines styles when enabled", () => {
    expect(createAnsiFormatter(true)("alert", ["bold", "red"])).toBe("\x1b[1m\x1b[31malert\x1b[0m");
  });
});
