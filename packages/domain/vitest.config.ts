/**
 * Vitest Configuration: @statusflow/domain
 *
 * Checks the workflow presets against the engine (in-memory store) and
 * the subscribers' output.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@statusflow/domain",
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
