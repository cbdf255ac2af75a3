#!/usr/bin/env node
/**
 * notion-standups: Fetch every page with the standup status from a Notion
 * database and write them, with their block content, to standups.json.
 *
 * Usage:
 *   npm run notion:standups -- [--token TOKEN] [--database-id ID] [--status STATUS] [--output-dir DIR]
 *
 * Exit codes:
 *   0 = success
 *   1 = error (missing configuration, Notion API failure, write failure)
 */

import { Command } from "commander";
import ora, { type Ora } from "ora";
import chalk from "chalk";
import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  loadEnvFile,
  loadFetcherConfig,
  type FetcherConfig,
  type FetcherOverrides,
} from "../config";
import { createNotionGateway, type NotionGateway } from "../notionClient";
import { logError, logInfo } from "../shared/errors";
import { runFetchStandups } from "./fetchStandups";

export type CliOptions = {
  token?: string;
  databaseId?: string;
  status?: string;
  outputDir?: string;
};

export function buildProgram(): Command {
  return new Command()
    .name("notion-standups")
    .description("Fetch finished Notion tasks into standups.json")
    .option("--token <token>", "Notion integration token (NOTION_API_KEY)")
    .option("--database-id <id>", "Notion database id (NOTION_DATABASE_ID)")
    .option("--status <status>", "Status value to collect (STANDUP_STATUS)")
    .option("--output-dir <dir>", "Directory for standups.json (STANDUP_OUTPUT_DIR)");
}

export function toOverrides(options: CliOptions): FetcherOverrides {
  return {
    notionToken: options.token,
    databaseId: options.databaseId,
    statusFilter: options.status,
    outputDir: options.outputDir,
  };
}

/**
 * @returns Process exit code
 */
export async function main(
  argv: string[] = process.argv,
  createGateway: (config: FetcherConfig) => NotionGateway = createNotionGateway
): Promise<number> {
  const program = buildProgram();
  program.parse(argv);
  const options = program.opts<CliOptions>();

  let spinner: Ora | undefined;
  try {
    loadEnvFile();
    const config = loadFetcherConfig(process.env, toOverrides(options));

    console.log(chalk.bold.cyan("📋 Notion Standups\n"));
    console.log(chalk.gray(`Database ID: ${config.databaseId}`));
    if (config.dataSourceId !== config.databaseId) {
      logInfo(`Querying data source ${config.dataSourceId}`, "notion:standups");
    }

    const gateway: NotionGateway = createGateway(config);
    spinner = ora(
      `Fetching pages with status = '${config.statusFilter}'...`
    ).start();

    const { outputPath, document } = await runFetchStandups(gateway, config, {
      progressLogger: ({ current, total, title }) => {
        if (spinner) {
          spinner.text = `Processing page ${current}/${total}: ${title || "(untitled)"}`;
        }
      },
    });

    spinner.succeed(
      chalk.green(`Saved ${document.pageCount} pages to ${outputPath}`)
    );
    return 0;
  } catch (error) {
    spinner?.fail(chalk.red("Fetching standups failed"));
    logError(error, "notion:standups");
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
