/*
Purpose: turn any thrown value into the lines autocontain prints on failure, plus ANSI styling.
Assumptions: detail blocks are build or container logs; short mode shows only their last lines.
Usage: renderErrorLines(formatErrorLines(err, { mode: "debug" }), createAnsiFormatter(resolveColorEnabled())).
*/

import { UserFacingError, USER_FACING_ERROR_CODES, type UserFacingErrorInput } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatOptions = {
  mode?: ErrorFormatMode;
  // Short mode only; debug mode always prints the full detail.
  detailLines?: number;
};

export type ErrorFormatLine = {
  kind: "title" | "message" | "hint" | "next" | "detail" | "code" | "cause" | "stack";
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "green" | "yellow" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type AnsiColorOptions = {
  stream?: { isTTY?: boolean };
  env?: NodeJS.ProcessEnv;
};

// =============================================================================
// ANSI
// =============================================================================

const ANSI_CODES: Record<AnsiStyle, number> = {
  bold: 1,
  dim: 2,
  red: 31,
  green: 32,
  yellow: 33,
  cyan: 36,
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) return (value) => value;

  return (value, styles = []) => {
    if (styles.length === 0) return value;
    const prefix = styles.map((style) => `\x1b[${ANSI_CODES[style]}m`).join("");
    return `${prefix}${value}\x1b[0m`;
  };
}

// NO_COLOR (https://no-color.org) wins over FORCE_COLOR; otherwise follow the stream.
export function resolveColorEnabled(options: AnsiColorOptions = {}): boolean {
  const env = options.env ?? process.env;
  if (env.NO_COLOR) return false;
  if (env.FORCE_COLOR && env.FORCE_COLOR !== "0") return true;
  return Boolean((options.stream ?? process.stderr).isTTY);
}

// =============================================================================
// ERROR LINES
// =============================================================================

const DEFAULT_DETAIL_LINES = 40;
const UNEXPECTED_TITLE = "Unexpected error";

export function formatErrorLines(
  error: unknown,
  options: ErrorFormatOptions = {},
): ErrorFormatLine[] {
  const debug = options.mode === "debug";
  const input = toUserFacing(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: input.title }];

  if (input.message !== input.title) lines.push({ kind: "message", text: input.message });
  if (input.hint) lines.push({ kind: "hint", text: input.hint });
  if (input.next) lines.push({ kind: "next", text: input.next });

  const detail = input.detail?.trim();
  if (detail) {
    lines.push({
      kind: "detail",
      text: debug ? detail : lastLines(detail, options.detailLines ?? DEFAULT_DETAIL_LINES),
    });
  }

  if (!debug) return lines;

  lines.push({ kind: "code", text: input.code });
  for (const cause of causeChain(input.cause)) {
    if (cause !== input.message) lines.push({ kind: "cause", text: cause });
  }
  const stack = firstStack(error, input.cause);
  if (stack) lines.push({ kind: "stack", text: stack });

  return lines;
}

export function renderErrorLines(lines: ErrorFormatLine[], format: AnsiFormatter): string[] {
  return lines.map(({ kind, text }) => {
    switch (kind) {
      case "title":
        return format(`Error: ${text}`, ["bold", "red"]);
      case "message":
        return text;
      case "hint":
        return format(`Hint: ${text}`, ["yellow"]);
      case "next":
        return format(`Next: ${text}`, ["cyan"]);
      case "detail":
        return format(text, ["dim"]);
      default:
        return format(`${kind}: ${text}`, ["dim"]);
    }
  });
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message.trim() || error.name;
  }
  if (typeof error === "string") {
    return error.trim();
  }
  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

function toUserFacing(error: unknown): UserFacingErrorInput {
  if (error instanceof UserFacingError) {
    return {
      code: error.code,
      title: error.title.trim() || UNEXPECTED_TITLE,
      message: error.message.trim() || error.title,
      hint: error.hint?.trim() || undefined,
      next: error.next?.trim() || undefined,
      detail: error.detail,
      cause: error.cause,
    };
  }

  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: UNEXPECTED_TITLE,
    message: formatErrorMessage(error) || "An unexpected error occurred.",
    cause: error instanceof Error ? error.cause : undefined,
  };
}

function lastLines(text: string, count: number): string {
  const lines = text.split("\n");
  if (lines.length <= count) return text;
  return [`... ${lines.length - count} earlier line(s) omitted`, ...lines.slice(-count)].join("\n");
}

// Nested causes, outermost first; stops on cycles.
function causeChain(cause: unknown): string[] {
  const messages: string[] = [];
  const seen = new Set<unknown>();

  for (let current = cause; current !== undefined && current !== null; ) {
    if (seen.has(current)) break;
    seen.add(current);

    const named = current instanceof Error ? `${current.name}: ${formatErrorMessage(current)}` : formatErrorMessage(current);
    messages.push(named);
    current = current instanceof Error ? current.cause : undefined;
  }

  return messages;
}

function firstStack(error: unknown, cause: unknown): string | undefined {
  for (const candidate of [error, cause]) {
    if (candidate instanceof Error && candidate.stack) return candidate.stack;
  }
  return undefined;
}
