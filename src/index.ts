import { Command, Option } from "commander";

import { LLM_PROVIDERS } from "./core/config.js";
import {
  createAnsiFormatter,
  formatErrorLines,
  renderErrorLines,
  resolveColorEnabled,
} from "./core/error-format.js";
import {
  containerizeCommand,
  parseNonNegativeInt,
  parsePositiveSeconds,
  type ContainerizeCliOptions,
} from "./cli/containerize.js";

// =============================================================================
// PROGRAM
// =============================================================================

export function buildCli(): Command {
  const program = new Command();

  program
    .name("autocontain")
    .description("Draft, build and heal a Dockerfile for a project with an LLM")
    .version("0.1.0")
    .argument("<source>", "Local directory, .zip/.tar archive, or git repository URL")
    .option("-m, --model <model>", "LLM model name")
    .addOption(new Option("--provider <provider>", "LLM provider").choices(LLM_PROVIDERS))
    .option("-t, --tag <tag>", "Image tag to build")
    .option("--skip-test", "Skip the runtime probe after a successful build")
    .option("--probe-seconds <seconds>", "How long the container must stay up", parsePositiveSeconds)
    .option("--build-heals <n>", "Build heal attempts before giving up", parseNonNegativeInt)
    .option("--runtime-heals <n>", "Runtime heal attempts before giving up", parseNonNegativeInt)
    .option("-c, --config <path>", "Path to autocontain.yaml")
    .option("--debug", "Show stack traces and error causes", false)
    .action(async (source: string, opts: ContainerizeCliOptions) => {
      await containerizeCommand(source, opts);
    });

  return program;
}

// =============================================================================
// ENTRYPOINT
// =============================================================================

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = buildCli();

  try {
    await program.parseAsync(argv);
  } catch (err) {
    const debug = argv.includes("--debug");
    const format = createAnsiFormatter(resolveColorEnabled({ stream: process.stderr }));
    const lines = renderErrorLines(formatErrorLines(err, { mode: debug ? "debug" : "short" }), format);
    for (const line of lines) {
      console.error(line);
    }
    process.exitCode = 1;
  }
}
