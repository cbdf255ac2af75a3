/**
 * Standup documents as notion:standups writes them
 */

import type { StandupBlock, StandupDocument, StandupPage } from "../types";

export const createStandupBlock = (
  overrides: Partial<StandupBlock> = {}
): StandupBlock => ({
  id: "block-1",
  type: "bulleted_list_item",
  text: "Item",
  createdTime: "2025-01-06T09:30:00.000Z",
  lastEditedTime: "2025-01-06T10:00:00.000Z",
  hasChildren: false,
  children: [],
  ...overrides,
});

export const createStandupPage = (
  overrides: Partial<StandupPage> = {}
): StandupPage => ({
  id: "page-1",
  title: "Test task",
  projectName: "Alpha",
  status: "Done",
  url: "https://www.notion.so/page-1",
  createdTime: "2025-01-06T09:00:00.000Z",
  lastEditedTime: "2025-01-06T17:00:00.000Z",
  archived: false,
  properties: {},
  blocks: [],
  contents: [],
  ...overrides,
});

export const createStandupDocument = (
  pages: StandupPage[] = [],
  overrides: Partial<Omit<StandupDocument, "pages" | "pageCount">> = {}
): StandupDocument => ({
  generatedAt: "2025-01-07T08:00:00.000Z",
  databaseId: "test-database-id",
  statusFilter: "Done",
  ...overrides,
  pageCount: pages.length,
  pages,
});
