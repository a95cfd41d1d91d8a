import { InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";

import { makeContext, makeWorkspace } from "../app/orchestrator/__tests__/fakes.js";
import type { RunOutcome } from "../app/orchestrator/containerize.js";
import { createAnsiFormatter } from "../core/error-format.js";
import { DockerError, DraftingError, InfrastructureError } from "../core/errors.js";

import {
  buildConfigOverrides,
  describeProgress,
  formatSuccessSummary,
  outcomeToUserFacingError,
  parseNonNegativeInt,
  parsePositiveSeconds,
} from "./containerize.js";

type Failed = Extract<RunOutcome, { status: "failed" }>;

function failedOutcome(overrides: Partial<Failed> = {}): Failed {
  return {
    status: "failed",
    runId: "run-1",
    logPath: "/home/me/.autocontain/logs/run-1/orchestrator.jsonl",
    stage: "build",
    reason: "Docker build failed.",
    log: "ERROR: failed to solve",
    attempts: [],
    ...overrides,
  };
}

describe("option parsing", () => {
  it("accepts whole heal counts including zero", () => {
    expect(parseNonNegativeInt("0")).toBe(0);
    expect(parseNonNegativeInt("3")).toBe(3);
    expect(() => parseNonNegativeInt("1.5")).toThrow(InvalidArgumentError);
    expect(() => parseNonNegativeInt("-1")).toThrow(InvalidArgumentError);
  });

  it("requires a positive probe window", () => {
    expect(parsePositiveSeconds("2.5")).toBe(2.5);
    expect(() => parsePositiveSeconds("0")).toThrow(InvalidArgumentError);
    expect(() => parsePositiveSeconds("soon")).toThrow(InvalidArgumentError);
  });

  it("maps flags onto config keys", () => {
    expect(
      buildConfigOverrides({ model: "gpt-4o", tag: "demo:1", skipTest: true, buildHeals: 2 }),
    ).toEqual({
      llm: { provider: undefined, model: "gpt-4o" },
      docker: { tag: "demo:1", runtime_test: false, probe_seconds: undefined },
      healing: { build_attempts: 2, runtime_attempts: undefined },
    });
  });

  it("leaves runtime testing to the config when --skip-test is absent", () => {
    expect(buildConfigOverrides({}).docker?.runtime_test).toBeUndefined();
  });
});

describe("describeProgress", () => {
  it("describes the workspace and captured context", () => {
    expect(describeProgress({ step: "workspace", workspace: makeWorkspace() }, "app:1")).toBe(
      "Workspace ready at /tmp/autocontain-test (zip)",
    );
    expect(describeProgress({ step: "inventory", context: makeContext() }, "app:1")).toBe(
      "Captured 2 file(s); missing: requirements.txt",
    );
  });

  it("names the tag when building and stays quiet on terminal states", () => {
    const attempt = 1;
    expect(
      describeProgress(
        { step: "transition", event: { from: "DRAFTING", to: "BUILDING", attempt } },
        "app:1",
      ),
    ).toBe("Building image app:1...");
    expect(
      describeProgress(
        { step: "transition", event: { from: "BUILDING", to: "SUCCEEDED", attempt } },
        "app:1",
      ),
    ).toBeNull();
  });
});

describe("outcomeToUserFacingError", () => {
  it("points at the preserved workspace and carries the build log", () => {
    const error = outcomeToUserFacingError(
      failedOutcome({
        workspace: makeWorkspace(),
        recipePath: "/tmp/autocontain-test/Dockerfile",
      }),
    );

    expect(error.code).toBe("RECIPE_ERROR");
    expect(error.title).toBe("Docker build failed.");
    expect(error.next).toBe(
      "Workspace kept at /tmp/autocontain-test (Dockerfile: /tmp/autocontain-test/Dockerfile). " +
        "Run log: /home/me/.autocontain/logs/run-1/orchestrator.jsonl",
    );
    expect(error.detail).toBe("ERROR: failed to solve");
    expect(error.cause).toBeInstanceOf(DockerError);
  });

  it("uses the stage to pick the error class", () => {
    const infra = outcomeToUserFacingError(
      failedOutcome({ stage: "infrastructure", reason: "Docker daemon is not reachable: EACCES" }),
    );
    expect(infra.code).toBe("DOCKER_ERROR");
    expect(infra.cause).toBeInstanceOf(InfrastructureError);
    expect(infra.next).toBe("Run log: /home/me/.autocontain/logs/run-1/orchestrator.jsonl");

    const heal = outcomeToUserFacingError(failedOutcome({ stage: "heal-build" }));
    expect(heal.code).toBe("LLM_ERROR");
    expect(heal.cause).toBeInstanceOf(DraftingError);
  });
});

describe("formatSuccessSummary", () => {
  it("lists the image, recipe and attempts", () => {
    const lines = formatSuccessSummary(
      {
        status: "succeeded",
        runId: "run-1",
        logPath: "/logs/run-1/orchestrator.jsonl",
        image: { tag: "demo:1", id: "sha256:abc" },
        recipe: "FROM alpine:3.20",
        recipePath: "/tmp/autocontain-test/Dockerfile",
        workspace: makeWorkspace(),
        runtime: { status: "stable", detail: "completed", log: "" },
        attempts: [
          { index: 1, kind: "draft", recipe: "FROM alpine" },
          { index: 2, kind: "heal-runtime", recipe: "FROM alpine:3.20" },
        ],
      },
      createAnsiFormatter(false),
    );

    expect(lines).toEqual([
      "Success: image demo:1 built (sha256:abc)",
      "  Dockerfile: /tmp/autocontain-test/Dockerfile",
      "  Workspace:  /tmp/autocontain-test",
      "  Runtime:    exited cleanly",
      "  Attempts:   draft -> heal-runtime",
      "  Run log:    /logs/run-1/orchestrator.jsonl",
    ]);
  });
});
