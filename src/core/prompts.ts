/*
Purpose: render the system/user prompt pairs sent to the LLM from templates/prompts/*.md.
Assumptions: templates use Handlebars with strict placeholders; values are inserted verbatim and
may themselves contain "{{ }}" (project files, build logs).
Usage: const prompt = await renderPrompt("heal-build", { context, recipe, log }).
*/

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import fse from "fs-extra";
import Handlebars from "handlebars";

import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type PromptKind = "draft" | "heal-build" | "heal-runtime";

export type PromptRole = "system" | "user";

export type PromptTemplateName = `${PromptKind}-${PromptRole}`;

export type PromptValues = {
  draft: { context: string };
  "heal-build": { context: string; recipe: string; log: string };
  "heal-runtime": { context: string; recipe: string; log: string };
};

export type RenderedPrompt = { system: string; user: string };

// =============================================================================
// PUBLIC API
// =============================================================================

export async function renderPrompt<K extends PromptKind>(
  kind: K,
  values: PromptValues[K],
): Promise<RenderedPrompt> {
  const base: PromptKind = kind;
  const [system, user] = await Promise.all([
    renderPromptTemplate(`${base}-system`, values),
    renderPromptTemplate(`${base}-user`, values),
  ]);
  return { system, user };
}

export async function renderPromptTemplate(
  name: PromptTemplateName,
  values: Record<string, string>,
): Promise<string> {
  const template = await loadTemplate(name);

  try {
    return template(values).trim();
  } catch (err) {
    throw promptError({
      title: "Prompt template failed to render.",
      message: `Prompt template "${name}" could not be rendered.`,
      hint: "Provide values for all required template placeholders.",
      cause: err,
    });
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

const TEMPLATE_CACHE = new Map<PromptTemplateName, Handlebars.TemplateDelegate>();
let promptsDir: string | undefined;

function promptError(input: {
  title: string;
  message: string;
  hint: string;
  cause?: unknown;
}): UserFacingError {
  return new UserFacingError({ code: USER_FACING_ERROR_CODES.llm, ...input });
}

async function loadTemplate(name: PromptTemplateName): Promise<Handlebars.TemplateDelegate> {
  const cached = TEMPLATE_CACHE.get(name);
  if (cached) return cached;

  const templatePath = path.join(resolvePromptsDir(), `${name}.md`);
  if (!(await fse.pathExists(templatePath))) {
    throw promptError({
      title: "Prompt template missing.",
      message: `Prompt template "${name}" not found at ${templatePath}.`,
      hint: "Reinstall autocontain; the templates/prompts directory ships with the package.",
    });
  }

  let compiled: Handlebars.TemplateDelegate;
  try {
    const raw = await fse.readFile(templatePath, "utf8");
    compiled = Handlebars.compile(raw, { noEscape: true, strict: true });
  } catch (err) {
    throw promptError({
      title: "Prompt template invalid.",
      message: `Prompt template "${name}" at ${templatePath} could not be loaded.`,
      hint: "Check that the file is readable and its Handlebars syntax is valid.",
      cause: err,
    });
  }

  TEMPLATE_CACHE.set(name, compiled);
  return compiled;
}

// Source (src/core) and compiled (dist/src/core) layouts sit at different depths.
function resolvePromptsDir(): string {
  if (promptsDir) return promptsDir;

  const startDir = fileURLToPath(new URL(".", import.meta.url));
  for (let current = startDir; ; current = path.dirname(current)) {
    if (fs.existsSync(path.join(current, "package.json"))) {
      promptsDir = path.join(current, "templates", "prompts");
      return promptsDir;
    }
    if (path.dirname(current) === current) break;
  }

  throw promptError({
    title: "Prompt templates unavailable.",
    message: `package.json not found while resolving prompts directory from ${startDir}.`,
    hint: "Run autocontain from an installed package or a full checkout.",
  });
}
