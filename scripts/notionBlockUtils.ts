/**
 * Converts raw Notion block objects into standup blocks and flattens block
 * trees into plain text lists
 */

import { z } from "zod";
import { CONTENT_BLOCK_TYPES } from "./constants";
import { joinPlainText, richTextSchema } from "./notionPageUtils";
import type { StandupBlock } from "./types";

const rawBlockSchema = z
  .object({
    object: z.literal("block"),
    id: z.string(),
    type: z.string(),
    created_time: z.string().default(""),
    last_edited_time: z.string().default(""),
    has_children: z.boolean().default(false),
  })
  .passthrough();

type RawBlock = z.infer<typeof rawBlockSchema>;

const iconSchema = z.object({
  emoji: z.string().optional(),
  external: z.object({ url: z.string() }).optional(),
  file: z.object({ url: z.string() }).optional(),
  custom_emoji: z.object({ url: z.string() }).optional(),
});

const blockPayloadSchema = z.object({
  rich_text: richTextSchema.optional(),
  checked: z.boolean().optional(),
  language: z.string().optional(),
  icon: iconSchema.nullish(),
});

type BlockPayload = z.infer<typeof blockPayloadSchema>;

const contentBlockTypes = new Set<string>(CONTENT_BLOCK_TYPES);

function parsePayload(value: unknown): BlockPayload | null {
  const result = blockPayloadSchema.safeParse(value);
  return result.success ? result.data : null;
}

/**
 * Block types without a rich_text payload of their own (tables, embeds,
 * synced blocks...) may still carry text somewhere in the object
 */
function findFallbackText(block: RawBlock): string {
  for (const value of Object.values(block)) {
    if (typeof value !== "object" || value === null) continue;
    const payload = parsePayload(value);
    const text = payload?.rich_text ? joinPlainText(payload.rich_text) : "";
    if (text) return text;
  }
  return "";
}

function iconToString(icon: z.infer<typeof iconSchema>): string | undefined {
  return (
    icon.emoji ?? icon.external?.url ?? icon.file?.url ?? icon.custom_emoji?.url
  );
}

/**
 * Convert one raw block. Returns null for partial block objects, which carry
 * no type or content.
 */
export function toStandupBlock(raw: unknown): StandupBlock | null {
  const parsed = rawBlockSchema.safeParse(raw);
  if (!parsed.success) return null;

  const block = parsed.data;
  const payload = parsePayload(block[block.type]);

  const standupBlock: StandupBlock = {
    id: block.id,
    type: block.type,
    text: payload?.rich_text
      ? joinPlainText(payload.rich_text)
      : findFallbackText(block),
    createdTime: block.created_time,
    lastEditedTime: block.last_edited_time,
    hasChildren: block.has_children,
    children: [],
  };

  if (block.type === "to_do") {
    standupBlock.checked = payload?.checked ?? false;
  } else if (block.type === "code") {
    standupBlock.language = payload?.language ?? "";
  } else if (block.type === "callout" && payload?.icon) {
    standupBlock.icon = iconToString(payload.icon);
  }

  return standupBlock;
}

/**
 * Depth-first list of the non-empty text of list, to-do, paragraph and
 * heading blocks
 */
export function collectContents(blocks: StandupBlock[]): string[] {
  const contents: string[] = [];
  const visit = (block: StandupBlock) => {
    if (contentBlockTypes.has(block.type) && block.text.trim()) {
      contents.push(block.text);
    }
    block.children.forEach(visit);
  };
  blocks.forEach(visit);
  return contents;
}

export function countBlocks(blocks: StandupBlock[]): number {
  return blocks.reduce(
    (total, block) => total + 1 + countBlocks(block.children),
    0
  );
}
