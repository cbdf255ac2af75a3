/**
 * Reading and writing the standup documents on disk
 */

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { StandupBlock, StandupDocument } from "../types";
import { FileSystemError, ValidationError, toErrorMessage } from "./errors";

const propertyValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z.array(z.string()),
]);

const standupBlockSchema: z.ZodType<StandupBlock> = z.lazy(() =>
  z.object({
    id: z.string(),
    type: z.string(),
    text: z.string(),
    checked: z.boolean().optional(),
    language: z.string().optional(),
    icon: z.string().optional(),
    createdTime: z.string(),
    lastEditedTime: z.string(),
    hasChildren: z.boolean(),
    children: z.array(standupBlockSchema),
  })
);

const standupPageSchema = z.object({
  id: z.string(),
  title: z.string(),
  projectName: z.string(),
  status: z.string(),
  url: z.string(),
  createdTime: z.string(),
  lastEditedTime: z.string(),
  archived: z.boolean(),
  properties: z.record(z.string(), propertyValueSchema).default({}),
  blocks: z.array(standupBlockSchema).default([]),
  contents: z.array(z.string()).default([]),
  expansionError: z.string().optional(),
});

export const standupDocumentSchema = z.object({
  generatedAt: z.string(),
  databaseId: z.string(),
  statusFilter: z.string(),
  pageCount: z.number().int().nonnegative(),
  pages: z.array(standupPageSchema),
});

async function writeFileEnsuringDir(
  filePath: string,
  content: string
): Promise<string> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, "utf8");
    return filePath;
  } catch (error) {
    throw new FileSystemError(
      `Failed to write ${filePath}: ${toErrorMessage(error)}`,
      [],
      { filePath }
    );
  }
}

/**
 * Write pretty-printed JSON, replacing any existing file
 * @returns The path written
 */
export async function writeJsonFile(
  filePath: string,
  data: unknown
): Promise<string> {
  return writeFileEnsuringDir(filePath, `${JSON.stringify(data, null, 2)}\n`);
}

export async function writeTextFile(
  filePath: string,
  text: string
): Promise<string> {
  return writeFileEnsuringDir(filePath, text);
}

/**
 * Load and validate a standup document written by notion:standups
 */
export async function readStandupDocument(
  filePath: string
): Promise<StandupDocument> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new FileSystemError(
      `Failed to read ${filePath}: ${toErrorMessage(error)}`,
      ["Run notion:standups first to create the standup document"],
      { filePath }
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(
      `Invalid JSON in ${filePath}: ${toErrorMessage(error)}`,
      [],
      { filePath }
    );
  }

  const result = standupDocumentSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(
      `${filePath} is not a standup document (${issue.path.join(".") || "root"}: ${issue.message})`,
      [],
      { filePath, issues: result.error.issues.length }
    );
  }
  return result.data;
}
