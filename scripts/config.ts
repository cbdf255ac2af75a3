import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";
import {
  DEFAULT_AI_MAX_TOKENS,
  DEFAULT_AI_MODEL,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_STATUS_FILTER,
  DEFAULT_STATUS_PROPERTY_TYPE,
  NOTION_PROPERTIES,
  PLACEHOLDER_API_KEY,
} from "./constants";
import { ConfigError } from "./shared/errors";

export type Env = Record<string, string | undefined>;

export type StatusPropertyType = "status" | "select";

export interface FetcherConfig {
  notionToken: string;
  databaseId: string;
  /** Defaults to the database id; the two differ for multi-source databases */
  dataSourceId: string;
  statusFilter: string;
  statusProperty: string;
  statusPropertyType: StatusPropertyType;
  titleProperty: string;
  projectProperty: string;
  outputDir: string;
}

export interface GeneratorConfig {
  apiKey: string;
  baseURL?: string;
  model: string;
  maxTokens: number;
}

export interface OutputConfig {
  outputDir: string;
}

export type FetcherOverrides = Partial<
  Pick<FetcherConfig, "notionToken" | "databaseId" | "statusFilter" | "outputDir">
>;

export type GeneratorOverrides = Partial<
  Pick<GeneratorConfig, "model" | "maxTokens" | "baseURL">
>;

// Blank values in .env files count as unset
const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const envString = z.preprocess(blankToUndefined, z.string().trim().optional());

const outputEnvSchema = z.object({
  STANDUP_OUTPUT_DIR: envString,
});

const fetcherEnvSchema = outputEnvSchema.extend({
  NOTION_API_KEY: envString,
  NOTION_TOKEN: envString,
  NOTION_DATABASE_ID: envString,
  DATABASE_ID: envString,
  NOTION_DATA_SOURCE_ID: envString,
  STANDUP_STATUS: envString,
  NOTION_STATUS_PROPERTY: envString,
  NOTION_STATUS_PROPERTY_TYPE: z.preprocess(
    blankToUndefined,
    z.enum(["status", "select"]).optional()
  ),
  NOTION_TITLE_PROPERTY: envString,
  NOTION_PROJECT_PROPERTY: envString,
});

const generatorEnvSchema = z.object({
  OPENAI_API_KEY: envString,
  OPENAI_BASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  AI_MODEL_NAME: envString,
  OPENAI_MODEL: envString,
  AI_MAX_TOKENS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().optional()
  ),
});

/**
 * Load .env into process.env. Existing variables win over the file.
 */
export function loadEnvFile(): void {
  dotenv.config();
}

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Env): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigError(
      `Invalid environment configuration (${problems.join("; ")})`,
      [],
      { variables: result.error.issues.map((issue) => issue.path.join(".")) }
    );
  }
  return result.data;
}

function resolveOutputDir(dir: string | undefined): string {
  return path.resolve(process.cwd(), dir ?? DEFAULT_OUTPUT_DIR);
}

/**
 * Build the fetcher configuration. Throws ConfigError before any network
 * call when the token or database id is missing.
 */
export function loadFetcherConfig(
  env: Env,
  overrides: FetcherOverrides = {}
): FetcherConfig {
  const parsed = parseEnv(fetcherEnvSchema, env);

  const notionToken =
    overrides.notionToken ?? parsed.NOTION_API_KEY ?? parsed.NOTION_TOKEN;
  if (!notionToken) {
    throw new ConfigError("NOTION_API_KEY is not set", [
      "Create an integration at https://www.notion.so/my-integrations",
      "Pass --token or set NOTION_API_KEY (NOTION_TOKEN also works)",
    ]);
  }

  const databaseId =
    overrides.databaseId ?? parsed.NOTION_DATABASE_ID ?? parsed.DATABASE_ID;
  if (!databaseId) {
    throw new ConfigError("NOTION_DATABASE_ID is not set", [
      "Pass --database-id or set NOTION_DATABASE_ID (DATABASE_ID also works)",
    ]);
  }

  return {
    notionToken,
    databaseId,
    dataSourceId: parsed.NOTION_DATA_SOURCE_ID ?? databaseId,
    statusFilter:
      overrides.statusFilter ?? parsed.STANDUP_STATUS ?? DEFAULT_STATUS_FILTER,
    statusProperty: parsed.NOTION_STATUS_PROPERTY ?? NOTION_PROPERTIES.STATUS,
    statusPropertyType:
      parsed.NOTION_STATUS_PROPERTY_TYPE ?? DEFAULT_STATUS_PROPERTY_TYPE,
    titleProperty: parsed.NOTION_TITLE_PROPERTY ?? NOTION_PROPERTIES.TITLE,
    projectProperty:
      parsed.NOTION_PROJECT_PROPERTY ?? NOTION_PROPERTIES.PROJECT,
    outputDir: resolveOutputDir(overrides.outputDir ?? parsed.STANDUP_OUTPUT_DIR),
  };
}

export function loadGeneratorConfig(
  env: Env,
  overrides: GeneratorOverrides = {}
): GeneratorConfig {
  const parsed = parseEnv(generatorEnvSchema, env);

  return {
    apiKey: parsed.OPENAI_API_KEY ?? PLACEHOLDER_API_KEY,
    baseURL: overrides.baseURL ?? parsed.OPENAI_BASE_URL,
    model:
      overrides.model ??
      parsed.AI_MODEL_NAME ??
      parsed.OPENAI_MODEL ??
      DEFAULT_AI_MODEL,
    maxTokens: overrides.maxTokens ?? parsed.AI_MAX_TOKENS ?? DEFAULT_AI_MAX_TOKENS,
  };
}

export function loadOutputConfig(
  env: Env,
  overrides: Partial<OutputConfig> = {}
): OutputConfig {
  const parsed = parseEnv(outputEnvSchema, env);
  return {
    outputDir: resolveOutputDir(overrides.outputDir ?? parsed.STANDUP_OUTPUT_DIR),
  };
}
