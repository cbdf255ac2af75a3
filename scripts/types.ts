/**
 * Shapes of the documents written by the standup scripts
 */

/** A Notion property coerced to something printable */
export type PropertyValue = string | number | boolean | null | string[];

export interface StandupBlock {
  id: string;
  type: string;
  text: string;
  /** Only set for to_do blocks */
  checked?: boolean;
  /** Only set for code blocks */
  language?: string;
  /** Only set for callout blocks: an emoji or an icon URL */
  icon?: string;
  createdTime: string;
  lastEditedTime: string;
  hasChildren: boolean;
  children: StandupBlock[];
}

export interface StandupPage {
  id: string;
  title: string;
  projectName: string;
  status: string;
  url: string;
  createdTime: string;
  lastEditedTime: string;
  archived: boolean;
  properties: Record<string, PropertyValue>;
  blocks: StandupBlock[];
  /** Non-empty text of list, to-do, paragraph and heading blocks, depth-first */
  contents: string[];
  /** Set when the block tree could only be fetched in part */
  expansionError?: string;
}

export interface StandupDocument {
  generatedAt: string;
  databaseId: string;
  statusFilter: string;
  pageCount: number;
  pages: StandupPage[];
}

/** Project name -> generated narrative */
export type SummaryDocument = Record<string, string>;
