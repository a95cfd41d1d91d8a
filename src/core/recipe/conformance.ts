// Checks a recipe against the missing-files list of the project context.
// A reference to a file the inventory never saw is the most common cause of a failed build.

import { isInstructionLine } from "./sanitize.js";

export type RecipeViolation = {
  line: number;
  instruction: string;
  file: string;
  text: string;
};

const FILE_INSTRUCTIONS = new Set(["COPY", "ADD", "RUN"]);

export function checkRecipeConformance(
  recipe: string,
  missing: readonly string[],
): RecipeViolation[] {
  if (missing.length === 0) return [];

  const violations: RecipeViolation[] = [];
  const lines = recipe.split(/\r?\n/);

  lines.forEach((text, index) => {
    if (!isInstructionLine(text)) return;

    const instruction = text.trim().split(/\s+/, 1)[0]?.toUpperCase() ?? "";
    if (!FILE_INSTRUCTIONS.has(instruction)) return;

    const tokens = tokenize(text.trim().slice(instruction.length));
    for (const file of missing) {
      if (tokens.some((token) => referencesFile(token, file))) {
        violations.push({ line: index + 1, instruction, file, text: text.trim() });
      }
    }
  });

  return violations;
}

function tokenize(args: string): string[] {
  return args
    .replace(/[[\]",]/g, " ")
    .split(/\s+/)
    .filter((token) => token.length > 0 && !token.startsWith("--"));
}

function referencesFile(token: string, file: string): boolean {
  const normalized = token.replace(/^\.\//, "");
  return normalized === file || normalized.endsWith(`/${file}`);
}
