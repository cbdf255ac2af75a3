import path from "node:path";
import { describe, it, expect } from "vitest";
import {
  loadFetcherConfig,
  loadGeneratorConfig,
  loadOutputConfig,
} from "./config";
import { ConfigError } from "./shared/errors";

const baseEnv = {
  NOTION_API_KEY: "test-api-key",
  NOTION_DATABASE_ID: "test-database-id",
};

describe("loadFetcherConfig", () => {
  it("should apply defaults for everything but the credentials", () => {
    const config = loadFetcherConfig(baseEnv);
    expect(config).toEqual({
      notionToken: "test-api-key",
      databaseId: "test-database-id",
      dataSourceId: "test-database-id",
      statusFilter: "Done",
      statusProperty: "Status",
      statusPropertyType: "status",
      titleProperty: "Name",
      projectProperty: "Project",
      outputDir: path.resolve(process.cwd(), "logs"),
    });
  });

  it("should accept the NOTION_TOKEN and DATABASE_ID aliases", () => {
    const config = loadFetcherConfig({
      NOTION_TOKEN: "alias-token",
      DATABASE_ID: "alias-db",
    });
    expect(config.notionToken).toBe("alias-token");
    expect(config.databaseId).toBe("alias-db");
  });

  it("should prefer overrides over the environment", () => {
    const config = loadFetcherConfig(
      { ...baseEnv, STANDUP_STATUS: "Shipped", STANDUP_OUTPUT_DIR: "env-out" },
      {
        notionToken: "flag-token",
        databaseId: "flag-db",
        statusFilter: "Reviewed",
        outputDir: "flag-out",
      }
    );
    expect(config.notionToken).toBe("flag-token");
    expect(config.databaseId).toBe("flag-db");
    expect(config.dataSourceId).toBe("flag-db");
    expect(config.statusFilter).toBe("Reviewed");
    expect(config.outputDir).toBe(path.resolve(process.cwd(), "flag-out"));
  });

  it("should read property names and a separate data source id", () => {
    const config = loadFetcherConfig({
      ...baseEnv,
      NOTION_DATA_SOURCE_ID: "test-data-source",
      NOTION_STATUS_PROPERTY: "State",
      NOTION_STATUS_PROPERTY_TYPE: "select",
      NOTION_TITLE_PROPERTY: "Task",
      NOTION_PROJECT_PROPERTY: "Area",
    });
    expect(config.dataSourceId).toBe("test-data-source");
    expect(config.statusProperty).toBe("State");
    expect(config.statusPropertyType).toBe("select");
    expect(config.titleProperty).toBe("Task");
    expect(config.projectProperty).toBe("Area");
  });

  it("should throw ConfigError when the token is missing", () => {
    expect(() =>
      loadFetcherConfig({ NOTION_DATABASE_ID: "test-database-id" })
    ).toThrow(new ConfigError("NOTION_API_KEY is not set"));
  });

  it("should treat a blank token as missing", () => {
    expect(() =>
      loadFetcherConfig({ ...baseEnv, NOTION_API_KEY: "   " })
    ).toThrow("NOTION_API_KEY is not set");
  });

  it("should throw ConfigError when the database id is missing", () => {
    expect(() => loadFetcherConfig({ NOTION_API_KEY: "test-api-key" })).toThrow(
      "NOTION_DATABASE_ID is not set"
    );
  });

  it("should reject an unknown status property type", () => {
    expect(() =>
      loadFetcherConfig({ ...baseEnv, NOTION_STATUS_PROPERTY_TYPE: "people" })
    ).toThrow(ConfigError);
  });
});

describe("loadGeneratorConfig", () => {
  it("should default to a placeholder key and the default model", () => {
    expect(loadGeneratorConfig({})).toEqual({
      apiKey: "not-needed",
      baseURL: undefined,
      model: "gpt-4.1-nano",
      maxTokens: 512,
    });
  });

  it("should read model settings from the environment", () => {
    const config = loadGeneratorConfig({
      OPENAI_API_KEY: "test-secret",
      OPENAI_BASE_URL: "http://localhost:11434/v1",
      AI_MODEL_NAME: "llama3.2",
      OPENAI_MODEL: "ignored",
      AI_MAX_TOKENS: "256",
    });
    expect(config).toEqual({
      apiKey: "test-secret",
      baseURL: "http://localhost:11434/v1",
      model: "llama3.2",
      maxTokens: 256,
    });
  });

  it("should fall back to OPENAI_MODEL", () => {
    expect(loadGeneratorConfig({ OPENAI_MODEL: "gpt-4o-mini" }).model).toBe(
      "gpt-4o-mini"
    );
  });

  it("should let overrides win", () => {
    const config = loadGeneratorConfig(
      { AI_MODEL_NAME: "env-model", AI_MAX_TOKENS: "100" },
      { model: "flag-model", maxTokens: 50 }
    );
    expect(config.model).toBe("flag-model");
    expect(config.maxTokens).toBe(50);
  });

  it("should reject non-numeric AI_MAX_TOKENS", () => {
    expect(() => loadGeneratorConfig({ AI_MAX_TOKENS: "lots" })).toThrow(
      /Invalid environment configuration \(AI_MAX_TOKENS: /
    );
  });

  it("should reject a malformed base URL", () => {
    expect(() => loadGeneratorConfig({ OPENAI_BASE_URL: "not a url" })).toThrow(
      ConfigError
    );
  });
});

describe("loadOutputConfig", () => {
  it("should resolve the output directory against the working directory", () => {
    expect(loadOutputConfig({ STANDUP_OUTPUT_DIR: "out" }).outputDir).toBe(
      path.resolve(process.cwd(), "out")
    );
    expect(loadOutputConfig({}).outputDir).toBe(
      path.resolve(process.cwd(), "logs")
    );
  });
});
