#!/usr/bin/env node
/**
 * standup-summarize: Turn standups.json into one narrative summary per
 * project using a text-generation model, saved as standups-summarized.json.
 *
 * Usage:
 *   npm run standup:summarize -- [--input FILE] [--output-dir DIR] [--model NAME] [--max-tokens N] [--base-url URL]
 *
 * Exit codes:
 *   0 = success (groups whose generation failed are reported and skipped)
 *   1 = error (unreadable input, invalid configuration, write failure)
 */

import { Command, InvalidArgumentError } from "commander";
import ora, { type Ora } from "ora";
import chalk from "chalk";
import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  loadEnvFile,
  loadGeneratorConfig,
  loadOutputConfig,
  type GeneratorConfig,
} from "../config";
import { STANDUPS_FILE } from "../constants";
import { logError, logWarning } from "../shared/errors";
import { runSummarize } from "./summarizer";
import { OpenAITextGenerator, type TextGenerator } from "./textGenerator";

export type CliOptions = {
  input?: string;
  outputDir?: string;
  model?: string;
  maxTokens?: number;
  baseUrl?: string;
};

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function buildProgram(): Command {
  return new Command()
    .name("standup-summarize")
    .description("Summarize standups.json per project with a language model")
    .option("--input <file>", "Standup document to read (default: <output-dir>/standups.json)")
    .option("--output-dir <dir>", "Directory for standups-summarized.json (STANDUP_OUTPUT_DIR)")
    .option("--model <name>", "Model name (AI_MODEL_NAME)")
    .option("--max-tokens <n>", "Maximum tokens per summary (AI_MAX_TOKENS)", parsePositiveInt)
    .option("--base-url <url>", "OpenAI-compatible endpoint (OPENAI_BASE_URL)");
}

/**
 * @returns Process exit code
 */
export async function main(
  argv: string[] = process.argv,
  createGenerator: (config: GeneratorConfig) => TextGenerator = (config) =>
    new OpenAITextGenerator(config)
): Promise<number> {
  const program = buildProgram();
  program.parse(argv);
  const options = program.opts<CliOptions>();

  let spinner: Ora | undefined;
  try {
    loadEnvFile();
    const { outputDir } = loadOutputConfig(process.env, {
      outputDir: options.outputDir,
    });
    const generatorConfig = loadGeneratorConfig(process.env, {
      model: options.model,
      maxTokens: options.maxTokens,
      baseURL: options.baseUrl,
    });
    const inputPath = path.resolve(
      options.input ?? path.join(outputDir, STANDUPS_FILE)
    );

    console.log(chalk.bold.cyan("🧠 Standup Summarization\n"));
    console.log(chalk.gray(`Using AI model: ${generatorConfig.model}`));

    spinner = ora(`Loading standups from ${inputPath}...`).start();
    const result = await runSummarize(
      { inputPath, outputDir },
      createGenerator(generatorConfig),
      { model: generatorConfig.model, maxTokens: generatorConfig.maxTokens },
      {
        progressLogger: ({ current, total, projectName }) => {
          if (spinner) {
            spinner.text = `Summarizing project ${current}/${total}: ${projectName}`;
          }
        },
      }
    );

    const failed = Object.keys(result.failures);
    if (failed.length > 0) {
      spinner.warn(
        chalk.yellow(
          `Summarized ${result.groupCount - failed.length}/${result.groupCount} projects`
        )
      );
      logWarning(`No summary for: ${failed.join(", ")}`, "standup:summarize");
    } else {
      spinner.succeed(
        chalk.green(`Summarized ${result.groupCount} projects`)
      );
    }
    console.log(chalk.green(`Output saved to: ${result.outputPath}`));
    return 0;
  } catch (error) {
    spinner?.fail(chalk.red("Standup summarization failed"));
    logError(error, "standup:summarize");
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
