import { Client } from "@notionhq/client";
import { NOTION_PAGE_SIZE } from "./constants";
import type { FetcherConfig } from "./config";

/** One page of a paginated Notion list response */
export interface PaginatedList {
  results: unknown[];
  has_more: boolean;
  next_cursor: string | null;
}

export type StatusFilter =
  | { property: string; status: { equals: string } }
  | { property: string; select: { equals: string } };

export interface DatabaseQuery {
  filter: StatusFilter;
  startCursor?: string;
}

/**
 * The two Notion calls the fetcher depends on. Tests supply an in-memory
 * implementation.
 */
export interface NotionGateway {
  queryDatabase(query: DatabaseQuery): Promise<PaginatedList>;
  listBlockChildren(
    blockId: string,
    startCursor?: string
  ): Promise<PaginatedList>;
}

/**
 * Notion gateway backed by the official client. Requests go out one at a
 * time, with the client's own timeout and no extra retries.
 */
export class NotionApiGateway implements NotionGateway {
  constructor(
    private readonly client: Client,
    private readonly dataSourceId: string
  ) {}

  async queryDatabase({
    filter,
    startCursor,
  }: DatabaseQuery): Promise<PaginatedList> {
    return this.client.dataSources.query({
      data_source_id: this.dataSourceId,
      filter,
      sorts: [{ timestamp: "last_edited_time", direction: "descending" }],
      start_cursor: startCursor,
      page_size: NOTION_PAGE_SIZE,
    });
  }

  async listBlockChildren(
    blockId: string,
    startCursor?: string
  ): Promise<PaginatedList> {
    return this.client.blocks.children.list({
      block_id: blockId,
      start_cursor: startCursor,
      page_size: NOTION_PAGE_SIZE,
    });
  }
}

export function createNotionGateway(
  config: Pick<FetcherConfig, "notionToken" | "dataSourceId">
): NotionApiGateway {
  const client = new Client({
    auth: config.notionToken,
    notionVersion: "2025-09-03", // Data source queries need this version
  });
  return new NotionApiGateway(client, config.dataSourceId);
}
