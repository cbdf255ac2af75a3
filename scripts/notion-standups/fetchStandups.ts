import path from "node:path";
import chalk from "chalk";
import { isNotionClientError } from "@notionhq/client";
import type { FetcherConfig } from "../config";
import { STANDUPS_FILE } from "../constants";
import { fetchNotionData, collectBlockChildren } from "../fetchNotionData";
import type { NotionGateway, StatusFilter } from "../notionClient";
import { collectContents, countBlocks } from "../notionBlockUtils";
import {
  flattenProperties,
  getTitleFromProperties,
  parseRawPage,
  propertyValueToText,
  type RawPage,
} from "../notionPageUtils";
import {
  NetworkError,
  PartialExpansionError,
  logError,
  logWarning,
  toErrorMessage,
} from "../shared/errors";
import { writeJsonFile } from "../shared/standupFiles";
import type { StandupBlock, StandupDocument, StandupPage } from "../types";

export type StandupFetchConfig = Omit<FetcherConfig, "notionToken">;

export interface FetchStandupsOptions {
  /** Clock for the document timestamp */
  now?: () => Date;
  progressLogger?: (progress: {
    current: number;
    total: number;
    title: string;
  }) => void;
}

export interface BlockExpansion {
  blocks: StandupBlock[];
  error?: PartialExpansionError;
}

export function buildStatusFilter(
  config: Pick<
    FetcherConfig,
    "statusProperty" | "statusPropertyType" | "statusFilter"
  >
): StatusFilter {
  const { statusProperty: property, statusFilter: equals } = config;
  return config.statusPropertyType === "select"
    ? { property, select: { equals } }
    : { property, status: { equals } };
}

/**
 * Page fields that come from the query result alone, before any block fetch
 */
export function toStandupPage(
  raw: RawPage,
  config: Pick<
    FetcherConfig,
    "statusProperty" | "titleProperty" | "projectProperty"
  >
): StandupPage {
  const properties = flattenProperties(raw.properties);
  return {
    id: raw.id,
    title: getTitleFromProperties(raw.properties, config.titleProperty),
    projectName: propertyValueToText(properties[config.projectProperty]),
    status: propertyValueToText(properties[config.statusProperty]),
    url: raw.url,
    createdTime: raw.created_time,
    lastEditedTime: raw.last_edited_time,
    archived: raw.archived ?? raw.in_trash ?? false,
    properties,
    blocks: [],
    contents: [],
  };
}

/**
 * Fetch a page's block tree. A failure part-way through is returned instead
 * of thrown, together with the blocks collected before it.
 */
export async function expandPageBlocks(
  gateway: NotionGateway,
  pageId: string
): Promise<BlockExpansion> {
  const blocks: StandupBlock[] = [];
  try {
    await collectBlockChildren(gateway, pageId, blocks);
    return { blocks };
  } catch (error) {
    return {
      blocks,
      error: new PartialExpansionError(pageId, countBlocks(blocks), error),
    };
  }
}

async function queryMatchingPages(
  gateway: NotionGateway,
  config: StandupFetchConfig
): Promise<unknown[]> {
  try {
    return await fetchNotionData(gateway, buildStatusFilter(config));
  } catch (error) {
    throw new NetworkError(
      `Failed to query Notion database ${config.databaseId}: ${toErrorMessage(error)}`,
      [`Check that "${config.statusProperty}" is a ${config.statusPropertyType} property`],
      {
        databaseId: config.databaseId,
        ...(isNotionClientError(error) ? { code: error.code } : {}),
      },
      error
    );
  }
}

/**
 * Keep full pages whose status matches the filter, each id once
 */
function selectPages(results: unknown[], config: StandupFetchConfig): RawPage[] {
  const seenIds = new Set<string>();
  const selected: RawPage[] = [];

  for (const result of results) {
    const page = parseRawPage(result);
    if (!page) {
      logWarning("Skipping a query result that is not a full page object");
      continue;
    }
    if (seenIds.has(page.id)) continue;
    seenIds.add(page.id);

    const status = propertyValueToText(
      flattenProperties(page.properties)[config.statusProperty]
    );
    if (status !== config.statusFilter) {
      logWarning(
        `Skipping page ${page.id}: status "${status}" does not match "${config.statusFilter}"`
      );
      continue;
    }
    selected.push(page);
  }
  return selected;
}

/**
 * Query every page whose status equals the filter and expand each page's
 * block tree, one request at a time
 */
export async function fetchStandups(
  gateway: NotionGateway,
  config: StandupFetchConfig,
  options: FetchStandupsOptions = {}
): Promise<StandupDocument> {
  const { now = () => new Date(), progressLogger } = options;

  const results = await queryMatchingPages(gateway, config);
  const rawPages = selectPages(results, config);

  const pages: StandupPage[] = [];
  for (const [index, raw] of rawPages.entries()) {
    const page = toStandupPage(raw, config);
    progressLogger?.({
      current: index + 1,
      total: rawPages.length,
      title: page.title,
    });

    const { blocks, error } = await expandPageBlocks(gateway, page.id);
    if (error) {
      logError(error, "notion:standups");
      page.expansionError = error.message;
    }
    page.blocks = blocks;
    page.contents = collectContents(blocks);
    pages.push(page);
  }

  return {
    generatedAt: now().toISOString(),
    databaseId: config.databaseId,
    statusFilter: config.statusFilter,
    pageCount: pages.length,
    pages,
  };
}

/**
 * Fetch the standup document and write it to standups.json, replacing the
 * previous run's file
 */
export async function runFetchStandups(
  gateway: NotionGateway,
  config: StandupFetchConfig,
  options: FetchStandupsOptions = {}
): Promise<{ outputPath: string; document: StandupDocument }> {
  const document = await fetchStandups(gateway, config, options);
  if (document.pageCount === 0) {
    console.log(
      chalk.yellow(`No pages found with status = '${config.statusFilter}'`)
    );
  }

  const outputPath = await writeJsonFile(
    path.join(config.outputDir, STANDUPS_FILE),
    document
  );
  return { outputPath, document };
}
