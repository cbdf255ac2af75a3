import chalk from "chalk";
import { MAX_RESULT_PAGES } from "./constants";
import type { NotionGateway, StatusFilter } from "./notionClient";
import { toStandupBlock } from "./notionBlockUtils";
import type { StandupBlock } from "./types";

/**
 * Run a database query to completion, following next_cursor until Notion
 * reports no more results. Results keep the order Notion returned them in.
 */
export async function fetchNotionData(
  gateway: NotionGateway,
  filter: StatusFilter
): Promise<unknown[]> {
  const results: unknown[] = [];
  let hasMore = true;
  let startCursor: string | undefined;
  let safetyCounter = 0;

  while (hasMore) {
    if (++safetyCounter > MAX_RESULT_PAGES) {
      console.warn(
        chalk.yellow(
          "⚠️  Pagination safety limit exceeded; returning partial results."
        )
      );
      break;
    }

    const response = await gateway.queryDatabase({ filter, startCursor });
    results.push(...response.results);

    hasMore = response.has_more;
    const nextCursor = response.next_cursor ?? undefined;

    if (hasMore && (!nextCursor || nextCursor === startCursor)) {
      console.warn(
        chalk.yellow(
          "⚠️  Notion reported more results without a new cursor; stopping with partial results."
        )
      );
      break;
    }
    startCursor = nextCursor;
  }

  return results;
}

/**
 * Append the children of blockId (recursively, depth-first) to `into`.
 * Blocks are appended as soon as they arrive, so when a request fails the
 * caller still holds everything fetched before the failure.
 */
export async function collectBlockChildren(
  gateway: NotionGateway,
  blockId: string,
  into: StandupBlock[]
): Promise<void> {
  let startCursor: string | undefined;
  let safetyCounter = 0;

  do {
    if (++safetyCounter > MAX_RESULT_PAGES) break;

    const response = await gateway.listBlockChildren(blockId, startCursor);

    for (const raw of response.results) {
      const block = toStandupBlock(raw);
      if (!block) continue;

      into.push(block);
      if (block.hasChildren) {
        await collectBlockChildren(gateway, block.id, block.children);
      }
    }

    const nextCursor = response.next_cursor ?? undefined;
    startCursor =
      response.has_more && nextCursor !== startCursor ? nextCursor : undefined;
  } while (startCursor);
}
