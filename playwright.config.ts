import { defineConfig } from "@playwright/test";

/**
 * Unit tests only: no browser projects and no web server.
 */
export default defineConfig({
  testDir: "./tests",
  testMatch: "**/*.test.ts",
  fullyParallel: true,
  forbidOnly: !!process.env.CI,
  retries: 0,
  workers: process.env.CI ? 2 : undefined,
  timeout: 30 * 1000,
});
