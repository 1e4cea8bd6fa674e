/**
 * Database Connection: Test Suite
 */

import { describe, it, expect, vi, afterEach } from "vitest";

const fake = vi.hoisted(() => ({
  client: { end: vi.fn(async () => {}) },
  db: { name: "drizzle" },
}));

vi.mock("postgres", () => ({
  default: vi.fn(() => fake.client),
}));

vi.mock("drizzle-orm/postgres-js", () => ({
  drizzle: vi.fn(() => fake.db),
}));

import postgres from "postgres";
import { loadConfig } from "../config/index.js";
import { closeDatabase, getDatabase, initDatabase } from "./connection.js";

afterEach(async () => {
  await closeDatabase();
  vi.clearAllMocks();
});

describe("initDatabase", () => {
  it("bounds every statement and lock wait on the connection", () => {
    initDatabase(
      loadConfig({
        DATABASE_URL: "postgres://localhost:5432/statusflow",
        DATABASE_STATEMENT_TIMEOUT_MS: "2000",
        DATABASE_LOCK_TIMEOUT_MS: "250",
      })
    );

    expect(postgres).toHaveBeenCalledWith("postgres://localhost:5432/statusflow", {
      max: 10,
      connect_timeout: 10,
      connection: { statement_timeout: 2000, lock_timeout: 250 },
    });
  });

  it("refuses to connect without a URL", () => {
    expect(() => initDatabase(loadConfig({}))).toThrow(
      "Cannot initialize the database without DATABASE_URL."
    );
  });
});

describe("getDatabase", () => {
  it("returns the client and Drizzle instance once initialized", () => {
    initDatabase(loadConfig({ DATABASE_URL: "postgres://db/statusflow" }));

    expect(getDatabase().db).toBe(fake.db);
  });

  it("throws after the connection is closed", async () => {
    initDatabase(loadConfig({ DATABASE_URL: "postgres://db/statusflow" }));
    await closeDatabase();

    expect(fake.client.end).toHaveBeenCalledTimes(1);
    expect(() => getDatabase()).toThrow("Database not initialized. Call initDatabase() at startup.");
  });
});
