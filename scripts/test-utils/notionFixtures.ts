/**
 * Raw Notion API objects for tests: pages, blocks and property payloads
 */

import { NOTION_PROPERTIES } from "../constants";

export type RawObject = Record<string, unknown>;

let idCounter = 0;

const nextId = (prefix: string): string => `${prefix}-${++idCounter}`;

export const richText = (text: string) => [
  {
    type: "text",
    text: { content: text, link: null },
    annotations: { bold: false, italic: false, code: false },
    plain_text: text,
    href: null,
  },
];

export const titleProperty = (text: string) => ({
  id: "title",
  type: "title",
  title: text ? richText(text) : [],
});

export const richTextProperty = (text: string) => ({
  id: "rt",
  type: "rich_text",
  rich_text: text ? richText(text) : [],
});

export const statusProperty = (name: string | null) => ({
  id: "st",
  type: "status",
  status: name === null ? null : { id: `status-${name}`, name, color: "green" },
});

export const selectProperty = (name: string | null) => ({
  id: "sel",
  type: "select",
  select: name === null ? null : { id: `select-${name}`, name, color: "blue" },
});

export const multiSelectProperty = (names: string[]) => ({
  id: "ms",
  type: "multi_select",
  multi_select: names.map((name) => ({ id: `opt-${name}`, name, color: "red" })),
});

export const dateProperty = (start: string, end: string | null = null) => ({
  id: "dt",
  type: "date",
  date: { start, end, time_zone: null },
});

export const checkboxProperty = (checked: boolean) => ({
  id: "cb",
  type: "checkbox",
  checkbox: checked,
});

export const numberProperty = (value: number | null) => ({
  id: "num",
  type: "number",
  number: value,
});

export interface MockNotionPageOptions {
  id?: string;
  title?: string;
  status?: string | null;
  /** Status property type; "select" for databases without a status column */
  statusType?: "status" | "select";
  project?: string | null;
  createdTime?: string;
  lastEditedTime?: string;
  archived?: boolean;
  extraProperties?: RawObject;
}

/**
 * Create a raw page as a database query returns it
 */
export const createMockNotionPage = (
  options: MockNotionPageOptions = {}
): RawObject => {
  const {
    id = nextId("page"),
    title = "Test task",
    status = "Done",
    statusType = "status",
    project = "Alpha",
    createdTime = "2025-01-06T09:00:00.000Z",
    lastEditedTime = "2025-01-06T17:00:00.000Z",
    archived = false,
    extraProperties = {},
  } = options;

  return {
    object: "page",
    id,
    created_time: createdTime,
    last_edited_time: lastEditedTime,
    archived,
    in_trash: archived,
    parent: { type: "data_source_id", data_source_id: "test-database-id" },
    url: `https://www.notion.so/${id}`,
    properties: {
      [NOTION_PROPERTIES.TITLE]: titleProperty(title),
      [NOTION_PROPERTIES.STATUS]:
        statusType === "select" ? selectProperty(status) : statusProperty(status),
      [NOTION_PROPERTIES.PROJECT]: selectProperty(project),
      ...extraProperties,
    },
  };
};

export interface MockNotionBlockOptions {
  id?: string;
  type?: string;
  text?: string;
  hasChildren?: boolean;
  checked?: boolean;
  language?: string;
  icon?: RawObject | null;
}

/**
 * Create a raw block as blocks.children.list returns it
 */
export const createMockBlock = (
  options: MockNotionBlockOptions = {}
): RawObject => {
  const {
    id = nextId("block"),
    type = "paragraph",
    text = "Block text",
    hasChildren = false,
    checked,
    language,
    icon,
  } = options;

  const payload: RawObject = { rich_text: richText(text), color: "default" };
  if (checked !== undefined) payload.checked = checked;
  if (language !== undefined) payload.language = language;
  if (icon !== undefined) payload.icon = icon;

  return {
    object: "block",
    id,
    type,
    created_time: "2025-01-06T09:30:00.000Z",
    last_edited_time: "2025-01-06T10:00:00.000Z",
    has_children: hasChildren,
    archived: false,
    in_trash: false,
    [type]: payload,
  };
};

export const createMockTodo = (text: string, checked = true, id?: string) =>
  createMockBlock({ id, type: "to_do", text, checked });

export const createMockBullet = (
  text: string,
  options: Omit<MockNotionBlockOptions, "type" | "text"> = {}
) => createMockBlock({ ...options, type: "bulleted_list_item", text });
