/**
 * Event Bus
 *
 * Routes DomainEvents to registered EventSubscriber handlers.
 *
 *   - Subscribers are registered at startup
 *   - Events are published after the unit of work that produced them has
 *     committed; a failing subscriber is captured and never rethrown
 *   - Matching: exact ("task.status_changed"), prefix ("task.*") and
 *     everything ("*")
 */

import type { DomainEvent, EventSubscriber } from "@statusflow/contracts";
import { captureException } from "../observability/index.js";

/** All registered subscribers, keyed by the pattern they subscribed with */
const subscribers = new Map<string, EventSubscriber[]>();

/**
 * Whether a subscription pattern covers an event type.
 * "task.*" matches "task.created" and "task.status_changed", not "task".
 */
export function matchesEventType(pattern: string, eventType: string): boolean {
  if (pattern === "*" || pattern === eventType) return true;
  if (pattern.endsWith(".*")) {
    return eventType.startsWith(pattern.slice(0, -1));
  }
  return false;
}

export function subscribe(subscriber: EventSubscriber): void {
  const existing = subscribers.get(subscriber.eventType) ?? [];
  existing.push(subscriber);
  subscribers.set(subscriber.eventType, existing);
}

export function subscribeAll(subs: EventSubscriber[]): void {
  for (const sub of subs) {
    subscribe(sub);
  }
}

/**
 * Publish a domain event to every matching subscriber.
 *
 * Handlers run concurrently; the returned promise settles once all of
 * them have, and never rejects.
 */
export async function publish(event: DomainEvent): Promise<void> {
  const enrichedEvent: DomainEvent = {
    ...event,
    timestamp: event.timestamp ?? new Date(),
  };

  const handlers: EventSubscriber[] = [];
  for (const [pattern, subs] of subscribers) {
    if (matchesEventType(pattern, enrichedEvent.type)) handlers.push(...subs);
  }

  if (handlers.length === 0) return;

  // A handler that throws synchronously is treated like one that rejects
  const results = await Promise.allSettled(
    handlers.map(async (sub) => sub.handler(enrichedEvent))
  );

  results.forEach((result, i) => {
    if (result.status === "fulfilled") return;

    const error =
      result.reason instanceof Error ? result.reason : new Error(String(result.reason));
    captureException(error, {
      subscriber: handlers[i]?.name,
      eventType: enrichedEvent.type,
    });
  });
}

/** Number of registered subscribers (for testing/debugging) */
export function getSubscriberCount(): number {
  let count = 0;
  for (const subs of subscribers.values()) {
    count += subs.length;
  }
  return count;
}

/** Clears all registered subscribers (test isolation) */
export function clearSubscribers(): void {
  subscribers.clear();
}
