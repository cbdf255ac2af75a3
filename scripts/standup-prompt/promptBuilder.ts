import path from "node:path";
import { PROMPT_FILE, UNKNOWN_PROJECT } from "../constants";
import { readStandupDocument, writeTextFile } from "../shared/standupFiles";
import type { StandupDocument, StandupPage } from "../types";

export const PROMPT_PREAMBLE = `Complete the following work items into proper sentences.
Keep ticket numbers at the beginning.
Do not add extra details.
Do NOT add credentials, API keys, passwords, sensitive environment values or any URLs.

Format the output as a single string with bullet points separated by newlines.
Each bullet point should start with a dash (-)

Now summarize the following standup data:`;

export const PROMPT_FOOTER = `
Response Format:
The response should be in text with bullet points organized by project.

Format for each project:
<Project Name>

- Point 1 describing the work accomplished
- Point 2 describing the work accomplished
- Point 3 describing the work accomplished

Example output:

Billing Portal

- Fixed the rounding error in invoice totals
- Added retry handling for failed card payments

Mobile App

- Reworked the onboarding screens to match the new design
- Wrote tests for the offline sync queue`;

export const SECTION_SEPARATOR = "\n\n---\n\n";

export function formatPageSection(page: StandupPage): string {
  const items = [page.title, ...page.contents].filter(
    (item) => item.trim() !== ""
  );
  return [
    `Project: ${page.projectName || UNKNOWN_PROJECT}`,
    "Work completed:",
    ...items.map((item) => `- ${item}`),
  ].join("\n");
}

export function formatStandupData(document: StandupDocument): string {
  return document.pages.map(formatPageSection).join(SECTION_SEPARATOR);
}

/**
 * Preamble, standup data and response format, in that order. Deterministic:
 * the same document always yields the same prompt.
 */
export function buildStandupPrompt(document: StandupDocument): string {
  return `${PROMPT_PREAMBLE}\n\n${formatStandupData(document)}\n${PROMPT_FOOTER}`;
}

/**
 * Build the prompt from a standup document on disk and write
 * standup-prompt.txt
 */
export async function runBuildPrompt(paths: {
  inputPath: string;
  outputDir: string;
}): Promise<{ outputPath: string; prompt: string; pageCount: number }> {
  const document = await readStandupDocument(paths.inputPath);
  const prompt = buildStandupPrompt(document);
  const outputPath = await writeTextFile(
    path.join(paths.outputDir, PROMPT_FILE),
    prompt
  );
  return { outputPath, prompt, pageCount: document.pageCount };
}
