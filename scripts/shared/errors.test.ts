/**
 * Tests for unified error handling utilities
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  AppError,
  ConfigError,
  NetworkError,
  ValidationError,
  FileSystemError,
  PartialExpansionError,
  GenerationError,
  toErrorMessage,
  logError,
  logWarning,
  logInfo,
  logSuccess,
} from "./errors";
import { mockConsole } from "../test-utils";

describe("AppError", () => {
  it("should create error with message and suggestions", () => {
    const error = new AppError("Test error", ["Suggestion 1", "Suggestion 2"]);
    expect(error.message).toBe("Test error");
    expect(error.suggestions).toEqual(["Suggestion 1", "Suggestion 2"]);
    expect(error.name).toBe("AppError");
  });

  it("should format error with suggestions and context", () => {
    const error = new AppError("Test error", ["Fix it"], { key: "value" });
    const formatted = error.format();
    expect(formatted).toContain("AppError: Test error");
    expect(formatted).toContain("- Fix it");
    expect(formatted).toContain('key: "value"');
  });

  it("should leave out empty sections", () => {
    const formatted = new AppError("Bare").format();
    expect(formatted).not.toContain("Suggestions");
    expect(formatted).not.toContain("Context");
  });
});

describe("error subclasses", () => {
  it("should put default suggestions before custom ones", () => {
    const error = new ConfigError("Missing token", ["Pass --token"]);
    expect(error.suggestions[0]).toBe("Check your .env file configuration");
    expect(error.suggestions.at(-1)).toBe("Pass --token");
    expect(error).toBeInstanceOf(AppError);
    expect(error.name).toBe("ConfigError");
  });

  it("should keep the wrapped error on NetworkError", () => {
    const cause = new Error("socket hang up");
    const error = new NetworkError("Query failed", [], { databaseId: "db" }, cause);
    expect(error.originalError).toBe(cause);
    expect(error.context).toEqual({ databaseId: "db" });
    expect(error.suggestions).toContain("Verify API credentials are valid");
  });

  it("should describe a partial block expansion", () => {
    const error = new PartialExpansionError("page-1", 3, new Error("rate limited"));
    expect(error.message).toBe(
      "Failed to fetch all blocks for page page-1: rate limited"
    );
    expect(error.context).toEqual({ pageId: "page-1", blocksFetched: 3 });
    expect(error.pageId).toBe("page-1");
    expect(error.blocksFetched).toBe(3);
  });

  it("should record the project on GenerationError", () => {
    const error = new GenerationError("Alpha", "Model offline");
    expect(error.projectName).toBe("Alpha");
    expect(error.context).toEqual({ projectName: "Alpha" });
  });

  it("should name ValidationError and FileSystemError", () => {
    expect(new ValidationError("bad").name).toBe("ValidationError");
    expect(new FileSystemError("io").name).toBe("FileSystemError");
  });
});

describe("toErrorMessage", () => {
  it("should read Error messages and stringify anything else", () => {
    expect(toErrorMessage(new Error("boom"))).toBe("boom");
    expect(toErrorMessage("plain")).toBe("plain");
    expect(toErrorMessage(42)).toBe("42");
  });
});

describe("logging helpers", () => {
  let consoleMock: ReturnType<typeof mockConsole>;

  beforeEach(() => {
    consoleMock = mockConsole();
  });

  it("should log AppError through format()", () => {
    const error = new AppError("Formatted", ["Try again"]);
    logError(error, "ctx");
    expect(consoleMock.error).toHaveBeenCalledTimes(1);
    expect(String(consoleMock.error.mock.calls[0][0])).toContain("Try again");
  });

  it("should log plain errors with a short stack", () => {
    logError(new Error("Plain failure"));
    expect(String(consoleMock.error.mock.calls[0][0])).toContain("Plain failure");
  });

  it("should log non-error values", () => {
    logError("string failure");
    expect(String(consoleMock.error.mock.calls[0][0])).toContain(
      "string failure"
    );
  });

  it("should route warnings, info and success to their console methods", () => {
    logWarning("careful");
    logInfo("fyi");
    logSuccess("done");
    expect(String(consoleMock.warn.mock.calls[0][0])).toContain("careful");
    expect(String(consoleMock.info.mock.calls[0][0])).toContain("fyi");
    expect(String(consoleMock.log.mock.calls[0][0])).toContain("done");
  });
});
