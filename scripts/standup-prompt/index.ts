#!/usr/bin/env node
/**
 * standup-prompt: Build a ready-to-paste prompt from standups.json, save it
 * as standup-prompt.txt and copy it to the clipboard.
 *
 * Usage:
 *   npm run standup:prompt -- [--input FILE] [--output-dir DIR] [--no-clipboard]
 *
 * Exit codes:
 *   0 = success (a clipboard failure is only a warning)
 *   1 = error (unreadable input, write failure)
 */

import { Command } from "commander";
import chalk from "chalk";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadEnvFile, loadOutputConfig } from "../config";
import { STANDUPS_FILE } from "../constants";
import { logError, logSuccess } from "../shared/errors";
import { copyToClipboard } from "./clipboard";
import { runBuildPrompt } from "./promptBuilder";

export type CliOptions = {
  input?: string;
  outputDir?: string;
  clipboard: boolean;
};

export function buildProgram(): Command {
  return new Command()
    .name("standup-prompt")
    .description("Build a standup prompt from standups.json")
    .option("--input <file>", "Standup document to read (default: <output-dir>/standups.json)")
    .option("--output-dir <dir>", "Directory for standup-prompt.txt (STANDUP_OUTPUT_DIR)")
    .option("--no-clipboard", "Do not copy the prompt to the clipboard");
}

/**
 * @returns Process exit code
 */
export async function main(
  argv: string[] = process.argv,
  copy: (text: string) => Promise<boolean> = copyToClipboard
): Promise<number> {
  const program = buildProgram();
  program.parse(argv);
  const options = program.opts<CliOptions>();

  try {
    loadEnvFile();
    const { outputDir } = loadOutputConfig(process.env, {
      outputDir: options.outputDir,
    });
    const inputPath = path.resolve(
      options.input ?? path.join(outputDir, STANDUPS_FILE)
    );

    const { outputPath, prompt, pageCount } = await runBuildPrompt({
      inputPath,
      outputDir,
    });
    logSuccess(`Prompt for ${pageCount} pages saved to ${outputPath}`);

    if (options.clipboard) {
      if (await copy(prompt)) {
        console.log(chalk.green("📋 Prompt copied to clipboard"));
      }
    }
    return 0;
  } catch (error) {
    logError(error, "standup:prompt");
    return 1;
  }
}

// Run if executed directly
const isDirectExec =
  !!process.argv[1] &&
  path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isDirectExec && process.env.NODE_ENV !== "test") {
  main()
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      console.error("Unhandled fatal error:", error);
      process.exit(1);
    });
}
