/*
Purpose: turn free-form LLM output into a Dockerfile, or reject it.
Assumptions: the model may wrap the recipe in markdown fences and add prose around it.
Usage: const result = sanitizeRecipe(text); if (!result.ok) fail with result.reason.
*/

// =============================================================================
// TYPES
// =============================================================================

export type SanitizeResult =
  | { ok: true; recipe: string }
  | { ok: false; reason: string; excerpt: string };

// =============================================================================
// CONSTANTS
// =============================================================================

export const DOCKERFILE_INSTRUCTIONS: readonly string[] = [
  "FROM",
  "RUN",
  "CMD",
  "LABEL",
  "MAINTAINER",
  "EXPOSE",
  "ENV",
  "ADD",
  "COPY",
  "ENTRYPOINT",
  "VOLUME",
  "USER",
  "WORKDIR",
  "ARG",
  "ONBUILD",
  "STOPSIGNAL",
  "HEALTHCHECK",
  "SHELL",
];

const INSTRUCTION_LINE = new RegExp(`^\\s*(${DOCKERFILE_INSTRUCTIONS.join("|")})(\\s|$)`, "i");
const FROM_LINE = /^\s*FROM\s+\S/i;
const FENCE = "```";
const EXCERPT_LIMIT = 200;

// =============================================================================
// PUBLIC API
// =============================================================================

export function sanitizeRecipe(text: string): SanitizeResult {
  const body = extractFencedBlock(text) ?? text;

  const kept = body.split(/\r?\n/).filter(isRecipeLine);
  const recipe = kept.join("\n").trim();

  if (!recipe) {
    return reject("LLM output contained no Dockerfile instructions.", text);
  }
  if (!kept.some((line) => FROM_LINE.test(line))) {
    return reject("LLM output has no FROM instruction.", text);
  }

  return { ok: true, recipe };
}

export function isInstructionLine(line: string): boolean {
  return INSTRUCTION_LINE.test(line);
}

// Interior of the first fenced block; an unclosed fence runs to the end of the text.
export function extractFencedBlock(text: string): string | null {
  const open = text.indexOf(FENCE);
  if (open === -1) return null;

  const lineEnd = text.indexOf("\n", open);
  if (lineEnd === -1) return "";

  const close = text.indexOf(FENCE, lineEnd + 1);
  return close === -1 ? text.slice(lineEnd + 1) : text.slice(lineEnd + 1, close);
}

// =============================================================================
// INTERNALS
// =============================================================================

function isRecipeLine(line: string): boolean {
  const stripped = line.trim();
  if (!stripped) return false;
  if (stripped.startsWith("#")) return true;
  if (isInstructionLine(stripped)) return true;
  return line.startsWith(" ") || line.startsWith("\t");
}

function reject(reason: string, text: string): SanitizeResult {
  return { ok: false, reason, excerpt: text.slice(0, EXCERPT_LIMIT) };
}
