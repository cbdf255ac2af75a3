/**
 * Test helper utilities for common testing operations
 */
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

/**
 * Create an empty temporary directory for testing
 */
export const createTempDir = async (): Promise<string> => {
  return fs.mkdtemp(path.join(os.tmpdir(), "standups-test-"));
};

/**
 * Clean up temporary directory and all its contents
 */
export const cleanupTempDir = async (dirPath: string): Promise<void> => {
  await fs.rm(dirPath, { recursive: true, force: true });
};

export const readJson = async (filePath: string): Promise<unknown> => {
  return JSON.parse(await fs.readFile(filePath, "utf8"));
};

export const writeJson = async (
  filePath: string,
  data: unknown
): Promise<void> => {
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
};
