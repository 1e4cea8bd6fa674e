/**
 * Vitest Configuration: @statusflow/contracts
 *
 * Pure TypeScript tests. No database, no network.
 * These tests validate the Zod input schemas.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@statusflow/contracts",
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
