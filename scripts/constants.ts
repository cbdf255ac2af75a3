/**
 * Constants used across the standup scripts
 */

// Notion property names
export const NOTION_PROPERTIES = {
  TITLE: "Name",
  STATUS: "Status",
  PROJECT: "Project",
};

export const DEFAULT_STATUS_FILTER = "Done";
export const DEFAULT_STATUS_PROPERTY_TYPE = "status";

// Project name used when a page has no project tag
export const UNKNOWN_PROJECT = "Unknown Project";

// Notion API limits
export const NOTION_PAGE_SIZE = 100; // Maximum page_size accepted by list/query endpoints
export const MAX_RESULT_PAGES = 10_000; // Safety limit to prevent infinite pagination loops

// Output files
export const DEFAULT_OUTPUT_DIR = "logs";
export const STANDUPS_FILE = "standups.json";
export const SUMMARIES_FILE = "standups-summarized.json";
export const PROMPT_FILE = "standup-prompt.txt";

// Text generation constants
export const DEFAULT_AI_MODEL = "gpt-4.1-nano";
export const DEFAULT_AI_MAX_TOKENS = 512;
export const DEFAULT_AI_TEMPERATURE = 0.9;
// Local OpenAI-compatible servers ignore the key, but the SDK insists on one
export const PLACEHOLDER_API_KEY = "not-needed";

// Block types whose text is collected into a page's flat contents list
export const CONTENT_BLOCK_TYPES = [
  "to_do",
  "bulleted_list_item",
  "numbered_list_item",
  "paragraph",
  "heading_1",
  "heading_2",
  "heading_3",
] as const;
