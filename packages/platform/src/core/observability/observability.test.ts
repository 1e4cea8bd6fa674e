import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  resetObservability,
  captureException,
  captureMessage,
  flushObservability,
  getObservabilityProvider,
  setObservabilityProvider,
  type ObservabilityProvider,
} from "./index.js";

function recordingProvider(): ObservabilityProvider {
  return {
    name: "recording",
    captureException: vi.fn(),
    captureMessage: vi.fn(),
    flush: vi.fn(async () => {}),
  };
}

beforeEach(() => {
  resetObservability();
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Observability Module", () => {
  it("starts with the console provider", () => {
    expect(getObservabilityProvider().name).toBe("console");
  });

  describe("console provider", () => {
    it("writes exceptions as one JSON line with the error name", () => {
      const spy = vi.spyOn(console, "error").mockImplementation(() => {});

      const error = new Error("store unreachable");
      error.name = "PersistenceError";
      captureException(error, { tenantId: "org-1" });

      expect(spy).toHaveBeenCalledOnce();
      const output = JSON.parse(String(spy.mock.calls[0][0]));
      expect(output.event).toBe("exception");
      expect(output.errorName).toBe("PersistenceError");
      expect(output.message).toBe("store unreachable");
      expect(output.tenantId).toBe("org-1");
    });

    it("routes info messages to console.log", () => {
      const spy = vi.spyOn(console, "log").mockImplementation(() => {});

      captureMessage("workflow created");

      expect(spy).toHaveBeenCalledOnce();
      const output = JSON.parse(String(spy.mock.calls[0][0]));
      expect(output.level).toBe("info");
      expect(output.message).toBe("workflow created");
    });

    it("routes warnings to console.warn", () => {
      const spy = vi.spyOn(console, "warn").mockImplementation(() => {});

      captureMessage("transition retried", "warning", { attempt: 2 });

      expect(spy).toHaveBeenCalledOnce();
      const output = JSON.parse(String(spy.mock.calls[0][0]));
      expect(output.attempt).toBe(2);
    });

    it("routes fatal messages to console.error", () => {
      const spy = vi.spyOn(console, "error").mockImplementation(() => {});

      captureMessage("cannot start", "fatal");

      expect(spy).toHaveBeenCalledOnce();
    });
  });

  describe("setObservabilityProvider()", () => {
    it("delegates captures to the plugged-in provider", () => {
      const provider = recordingProvider();
      setObservabilityProvider(provider);

      const error = new Error("boom");
      captureException(error, { taskId: "task-1" });
      captureMessage("heads up", "warning");

      expect(provider.captureException).toHaveBeenCalledWith(error, { taskId: "task-1" });
      expect(provider.captureMessage).toHaveBeenCalledWith("heads up", "warning", undefined);
    });

    it("flushes through the provider", async () => {
      const provider = recordingProvider();
      setObservabilityProvider(provider);

      await flushObservability(500);

      expect(provider.flush).toHaveBeenCalledWith(500);
    });

    it("is undone by resetObservability()", () => {
      setObservabilityProvider(recordingProvider());
      resetObservability();
      expect(getObservabilityProvider().name).toBe("console");
    });
  });
});
