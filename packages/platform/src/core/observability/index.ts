/**
 * Observability Module
 *
 * Where warnings, errors and failed subscribers end up. Follows the
 * provider pattern: the host application plugs in its own backend with
 * setObservabilityProvider(); until then everything goes to the console
 * as structured JSON.
 *
 * Usage:
 *   captureException(error, { tenantId: "org-1", taskId });
 *   captureMessage("Transition retried", "warning", { attempt: 2 });
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ObservabilitySeverity = "fatal" | "error" | "warning" | "info" | "debug";

/** Tags attached to a capture for filtering */
export interface ObservabilityContext {
  userId?: string;
  tenantId?: string;
  [key: string]: unknown;
}

/** The provider contract. Every observability backend implements this. */
export interface ObservabilityProvider {
  readonly name: string;

  captureException(error: Error, context?: ObservabilityContext): void;

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void;

  /** Flush pending events to the backend (graceful shutdown) */
  flush(timeoutMs?: number): Promise<void>;
}

// ---------------------------------------------------------------------------
// Console Provider
// ---------------------------------------------------------------------------

export class ConsoleObservabilityProvider implements ObservabilityProvider {
  readonly name = "console";

  captureException(error: Error, context?: ObservabilityContext): void {
    console.error(
      JSON.stringify({
        level: "error",
        context: "observability",
        event: "exception",
        errorName: error.name,
        message: error.message,
        stack: error.stack,
        ...context,
        timestamp: new Date().toISOString(),
      })
    );
  }

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void {
    const logFn =
      level === "fatal" || level === "error"
        ? console.error
        : level === "warning"
          ? console.warn
          : level === "debug"
            ? console.debug
            : console.log;

    logFn(
      JSON.stringify({
        level,
        context: "observability",
        event: "message",
        message,
        ...context,
        timestamp: new Date().toISOString(),
      })
    );
  }

  async flush(): Promise<void> {
    // console writes are synchronous
  }
}

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

let provider: ObservabilityProvider = new ConsoleObservabilityProvider();

// ---------------------------------------------------------------------------
// Public API (delegates to provider)
// ---------------------------------------------------------------------------

export function captureException(error: Error, context?: ObservabilityContext): void {
  provider.captureException(error, context);
}

export function captureMessage(
  message: string,
  level: ObservabilitySeverity = "info",
  context?: ObservabilityContext
): void {
  provider.captureMessage(message, level, context);
}

/** Flush pending events (call during graceful shutdown) */
export async function flushObservability(timeoutMs?: number): Promise<void> {
  await provider.flush(timeoutMs);
}

export function getObservabilityProvider(): ObservabilityProvider {
  return provider;
}

/** Plug in a backend, or a recording stub in tests */
export function setObservabilityProvider(p: ObservabilityProvider): void {
  provider = p;
}

/** Back to the console provider (for testing) */
export function resetObservability(): void {
  provider = new ConsoleObservabilityProvider();
}
