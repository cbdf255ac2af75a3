/**
 * Test utilities index - exports all test helpers, mocks, and fixtures
 */

// Standup document fixtures
export * from "./fixtures";

// Raw Notion API objects
export * from "./notionFixtures";

// In-memory Notion gateway and text generator
export * from "./mocks";

export * from "./helpers";
