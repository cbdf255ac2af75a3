/**
 * In-memory stand-ins for the Notion API and the text generation model
 */
import { vi } from "vitest";
import type {
  DatabaseQuery,
  NotionGateway,
  PaginatedList,
} from "../notionClient";
import { flattenProperty, parseRawPage, propertyValueToText } from "../notionPageUtils";
import type {
  GenerationOptions,
  TextGenerator,
} from "../standup-summarize/textGenerator";

export interface FakeNotionGatewayOptions {
  /** Every page in the database; the status filter is applied on query */
  pages?: unknown[];
  /** Block id (or page id) -> child blocks */
  children?: Record<string, unknown[]>;
  /** Results per response; Notion's own limit is 100 */
  pageSize?: number;
}

/**
 * Notion gateway that serves pages and blocks from memory, paginated with
 * numeric cursors the same way the API paginates
 */
export class FakeNotionGateway implements NotionGateway {
  readonly queries: DatabaseQuery[] = [];
  readonly blockRequests: Array<{ blockId: string; startCursor?: string }> = [];

  private readonly pages: unknown[];
  private readonly children: Map<string, unknown[]>;
  private readonly pageSize: number;
  private readonly blockFailures = new Map<
    string,
    { error: Error; atCursor?: string }
  >();
  private queryFailure?: Error;

  constructor(options: FakeNotionGatewayOptions = {}) {
    this.pages = options.pages ?? [];
    this.children = new Map(Object.entries(options.children ?? {}));
    this.pageSize = options.pageSize ?? 100;
  }

  /** Make every database query reject */
  failQueries(error: Error): this {
    this.queryFailure = error;
    return this;
  }

  /**
   * Make listing the children of blockId reject, either on every request or
   * only on the request for the given cursor
   */
  failBlockChildren(blockId: string, error: Error, atCursor?: string): this {
    this.blockFailures.set(blockId, { error, atCursor });
    return this;
  }

  async queryDatabase(query: DatabaseQuery): Promise<PaginatedList> {
    this.queries.push(query);
    if (this.queryFailure) throw this.queryFailure;

    const { filter } = query;
    const expected = "status" in filter ? filter.status.equals : filter.select.equals;
    const matching = this.pages.filter((raw) => {
      const page = parseRawPage(raw);
      if (!page) return true;
      const value = flattenProperty(page.properties[filter.property]);
      return propertyValueToText(value) === expected;
    });
    return this.paginate(matching, query.startCursor);
  }

  async listBlockChildren(
    blockId: string,
    startCursor?: string
  ): Promise<PaginatedList> {
    this.blockRequests.push({ blockId, startCursor });
    const failure = this.blockFailures.get(blockId);
    if (
      failure &&
      (failure.atCursor === undefined || failure.atCursor === startCursor)
    ) {
      throw failure.error;
    }
    return this.paginate(this.children.get(blockId) ?? [], startCursor);
  }

  private paginate(items: unknown[], startCursor?: string): PaginatedList {
    const offset = startCursor ? Number(startCursor) : 0;
    const end = offset + this.pageSize;
    const hasMore = end < items.length;
    return {
      results: items.slice(offset, end),
      has_more: hasMore,
      next_cursor: hasMore ? String(end) : null,
    };
  }
}

/**
 * Text generator that answers from a function of the prompt. Calls are
 * recorded on `generate`.
 */
export const createMockTextGenerator = (
  respond: (prompt: string, options: GenerationOptions) => string = () =>
    "- Summary"
) => {
  const generator = {
    generate: vi.fn(async (prompt: string, options: GenerationOptions) =>
      respond(prompt, options)
    ),
  } satisfies TextGenerator;
  return generator;
};

/**
 * Silence console output while keeping the calls inspectable
 */
export const mockConsole = () => ({
  log: vi.spyOn(console, "log").mockImplementation(() => {}),
  error: vi.spyOn(console, "error").mockImplementation(() => {}),
  warn: vi.spyOn(console, "warn").mockImplementation(() => {}),
  info: vi.spyOn(console, "info").mockImplementation(() => {}),
});
