/**
 * Vitest Configuration: @statusflow/platform
 *
 * Unit tests for the engine. Everything runs against the in-memory
 * store or a mocked database handle; nothing connects to PostgreSQL.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@statusflow/platform",
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
