import path from "node:path";
import { SUMMARIES_FILE, UNKNOWN_PROJECT } from "../constants";
import {
  GenerationError,
  logError,
  toErrorMessage,
} from "../shared/errors";
import { readStandupDocument, writeJsonFile } from "../shared/standupFiles";
import type { StandupDocument, StandupPage, SummaryDocument } from "../types";
import type { GenerationOptions, TextGenerator } from "./textGenerator";

// Summary prompt template
export const SUMMARY_PROMPT = `Expand these short notes into a professional accomplishment summary.
Turn every work item into a full bullet point that describes what was achieved.

Rules:
- Include every item, even small ones
- Keep ticket numbers (like ENG-123) at the beginning of the bullet
- Do not invent work that is not in the notes
- Do NOT add credentials, API keys, passwords, sensitive environment values or URLs
- Start each bullet point with a dash (-) and put each on its own line

Example:
Input: "login redirect loop fixed"
Output: "- Fixed a redirect loop on the login page so users land on their dashboard after signing in"

Input: "ENG-42 csv export wip"
Output: "- ENG-42: Made progress on the CSV export, with the column mapping in place"

Now expand these work items:`;

export interface SummarizeResult {
  summaries: SummaryDocument;
  /** Project name -> error message, for groups whose generation failed */
  failures: Record<string, string>;
}

export interface SummarizeOptions {
  progressLogger?: (progress: {
    current: number;
    total: number;
    projectName: string;
  }) => void;
}

/**
 * Group pages by project tag, keeping the order projects first appear in
 */
export function groupByProject(
  pages: StandupPage[]
): Map<string, StandupPage[]> {
  const groups = new Map<string, StandupPage[]>();
  for (const page of pages) {
    const projectName = page.projectName.trim() || UNKNOWN_PROJECT;
    const group = groups.get(projectName);
    if (group) {
      group.push(page);
    } else {
      groups.set(projectName, [page]);
    }
  }
  return groups;
}

/**
 * Titles and flattened block text of one project's pages
 */
export function buildProjectContext(
  projectName: string,
  pages: StandupPage[]
): string {
  const lines = [`Project: ${projectName}`, "Work completed:"];
  for (const page of pages) {
    lines.push(`- ${page.title || "(untitled)"}`);
    for (const item of page.contents) {
      lines.push(`  - ${item}`);
    }
  }
  return lines.join("\n");
}

export function buildSummaryPrompt(
  projectName: string,
  pages: StandupPage[]
): string {
  return `${SUMMARY_PROMPT}\n\n${buildProjectContext(projectName, pages)}`;
}

/**
 * Generate one summary per project group. Groups are processed one after
 * another; a failed group is logged and left out, the rest still run.
 */
export async function summarizeStandups(
  document: StandupDocument,
  generator: TextGenerator,
  generationOptions: GenerationOptions,
  options: SummarizeOptions = {}
): Promise<SummarizeResult> {
  const groups = groupByProject(document.pages);
  const summaries: SummaryDocument = {};
  const failures: Record<string, string> = {};

  let current = 0;
  for (const [projectName, pages] of groups) {
    options.progressLogger?.({
      current: ++current,
      total: groups.size,
      projectName,
    });

    try {
      summaries[projectName] = await generator.generate(
        buildSummaryPrompt(projectName, pages),
        generationOptions
      );
    } catch (error) {
      const generationError = new GenerationError(
        projectName,
        `Failed to summarize "${projectName}": ${toErrorMessage(error)}`,
        error
      );
      logError(generationError, "standup:summarize");
      failures[projectName] = generationError.message;
    }
  }

  return { summaries, failures };
}

/**
 * Summarize a standup document and write standups-summarized.json
 */
export async function runSummarize(
  paths: { inputPath: string; outputDir: string },
  generator: TextGenerator,
  generationOptions: GenerationOptions,
  options: SummarizeOptions = {}
): Promise<SummarizeResult & { outputPath: string; groupCount: number }> {
  const document = await readStandupDocument(paths.inputPath);
  const result = await summarizeStandups(
    document,
    generator,
    generationOptions,
    options
  );

  const outputPath = await writeJsonFile(
    path.join(paths.outputDir, SUMMARIES_FILE),
    result.summaries
  );
  return {
    ...result,
    outputPath,
    groupCount:
      Object.keys(result.summaries).length + Object.keys(result.failures).length,
  };
}
