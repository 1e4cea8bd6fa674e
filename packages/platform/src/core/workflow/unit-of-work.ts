/**
 * Runs one unit of work against the store and normalizes what comes out.
 *
 * Engine errors and the caller's own abort reason pass through untouched.
 * Anything else the store throws (connection loss, timeouts, driver
 * errors) becomes a PersistenceError carrying the original as `cause`.
 * Either way the transaction has been rolled back.
 */

import { PersistenceError, WorkflowEngineError } from "./errors.js";
import type { WorkflowStore, WorkflowTransaction } from "./store.js";

export async function runUnitOfWork<T>(
  store: WorkflowStore,
  work: (tx: WorkflowTransaction) => Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  try {
    return await store.transaction(work);
  } catch (error) {
    if (error instanceof WorkflowEngineError) throw error;
    if (signal?.aborted && error === signal.reason) throw error;

    const detail = error instanceof Error ? error.message : String(error);
    throw new PersistenceError(`Workflow store "${store.name}" failed: ${detail}`, { cause: error });
  }
}
