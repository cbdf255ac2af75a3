/**
 * Global Vitest setup file
 * Keeps real credentials out of tests and marks the environment as test
 */

// Set up environment variables before any imports
process.env.NOTION_API_KEY = "test-api-key";
process.env.NOTION_DATABASE_ID = "test-database-id";
process.env.NODE_ENV = "test";

delete process.env.NOTION_DATA_SOURCE_ID;
delete process.env.OPENAI_BASE_URL;
