import { promises as fs } from "node:fs";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  readStandupDocument,
  writeJsonFile,
  writeTextFile,
} from "./standupFiles";
import { FileSystemError, ValidationError } from "./errors";
import {
  cleanupTempDir,
  createStandupBlock,
  createStandupDocument,
  createStandupPage,
  createTempDir,
  writeJson,
} from "../test-utils";

describe("standup files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(dir);
  });

  describe("writeJsonFile", () => {
    it("should write pretty JSON with a trailing newline, creating directories", async () => {
      const filePath = path.join(dir, "a", "b", "data.json");

      await expect(writeJsonFile(filePath, { key: [1] })).resolves.toBe(filePath);
      await expect(fs.readFile(filePath, "utf8")).resolves.toBe(
        '{\n  "key": [\n    1\n  ]\n}\n'
      );
    });

    it("should replace an existing file", async () => {
      const filePath = path.join(dir, "data.json");
      await writeJsonFile(filePath, { run: 1 });
      await writeJsonFile(filePath, { run: 2 });
      await expect(fs.readFile(filePath, "utf8")).resolves.toBe(
        '{\n  "run": 2\n}\n'
      );
    });

    it("should throw FileSystemError when the path cannot be written", async () => {
      const blocker = path.join(dir, "blocker");
      await fs.writeFile(blocker, "file, not a directory", "utf8");

      await expect(
        writeJsonFile(path.join(blocker, "data.json"), {})
      ).rejects.toBeInstanceOf(FileSystemError);
    });
  });

  describe("writeTextFile", () => {
    it("should write text as given", async () => {
      const filePath = path.join(dir, "prompt.txt");
      await writeTextFile(filePath, "line 1\nline 2");
      await expect(fs.readFile(filePath, "utf8")).resolves.toBe("line 1\nline 2");
    });
  });

  describe("readStandupDocument", () => {
    it("should read back a written document", async () => {
      const document = createStandupDocument([
        createStandupPage({
          properties: { Tags: ["a"], Points: 3, Done: true, Due: null },
          blocks: [
            createStandupBlock({
              hasChildren: true,
              children: [createStandupBlock({ id: "child", type: "to_do", checked: true })],
            }),
          ],
          contents: ["Item"],
          expansionError: "Failed to fetch all blocks for page page-1: timeout",
        }),
      ]);
      const filePath = path.join(dir, "standups.json");
      await writeJsonFile(filePath, document);

      await expect(readStandupDocument(filePath)).resolves.toEqual(document);
    });

    it("should fill in missing page lists with empty defaults", async () => {
      const filePath = path.join(dir, "standups.json");
      await writeJson(filePath, {
        ...createStandupDocument([]),
        pageCount: 1,
        pages: [
          {
            id: "page-1",
            title: "Old export",
            projectName: "Alpha",
            status: "Done",
            url: "",
            createdTime: "",
            lastEditedTime: "",
            archived: false,
          },
        ],
      });

      const document = await readStandupDocument(filePath);

      expect(document.pages[0]).toMatchObject({
        properties: {},
        blocks: [],
        contents: [],
      });
    });

    it("should throw FileSystemError for a missing file", async () => {
      const missing = path.join(dir, "missing.json");
      const rejection = readStandupDocument(missing);

      await expect(rejection).rejects.toBeInstanceOf(FileSystemError);
      await expect(rejection).rejects.toMatchObject({
        suggestions: expect.arrayContaining([
          "Run notion:standups first to create the standup document",
        ]),
      });
    });

    it("should throw ValidationError for invalid JSON", async () => {
      const filePath = path.join(dir, "standups.json");
      await fs.writeFile(filePath, "{ not json", "utf8");

      const rejection = readStandupDocument(filePath);
      await expect(rejection).rejects.toBeInstanceOf(ValidationError);
      await expect(rejection).rejects.toThrow(`Invalid JSON in ${filePath}`);
    });

    it("should name the first invalid field", async () => {
      const filePath = path.join(dir, "standups.json");
      await writeJson(filePath, { ...createStandupDocument([]), pages: "none" });

      await expect(readStandupDocument(filePath)).rejects.toThrow(
        `${filePath} is not a standup document (pages: Expected array, received string)`
      );
    });
  });
});
