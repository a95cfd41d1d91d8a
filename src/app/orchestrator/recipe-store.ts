import path from "node:path";

import fse from "fs-extra";

import type { RecipeStore } from "./ports.js";

export const RECIPE_FILENAME = "Dockerfile";

// The recipe lives at a fixed path and is overwritten on every heal; the
// attempt history, not the filesystem, keeps earlier versions.
export class FileRecipeStore implements RecipeStore {
  async write(root: string, recipe: string): Promise<string> {
    const filePath = path.join(root, RECIPE_FILENAME);
    const content = recipe.endsWith("\n") ? recipe : `${recipe}\n`;
    await fse.outputFile(filePath, content, "utf8");
    return filePath;
  }
}
