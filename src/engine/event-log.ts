import type { GovernanceEvent, GovernanceEventKind, GovernanceEventPayload } from '../shared/events.js';
import type { GovernanceStore } from './store.js';

export type EventHandler = (event: GovernanceEvent) => void;

/**
 * Sequenced, append-only event log.
 *
 * `record` must run inside a store transaction: it writes the event but holds
 * delivery until `flush`, so subscribers only ever see committed events.
 */
export class EventLog {
  private handlers = new Map<GovernanceEventKind, Set<EventHandler>>();
  private globalHandlers = new Set<EventHandler>();
  private pending: GovernanceEvent[] = [];

  constructor(private store: GovernanceStore) {}

  /** Subscribe to one kind of event. */
  subscribe(kind: GovernanceEventKind, handler: EventHandler): () => void {
    let set = this.handlers.get(kind);
    if (!set) {
      set = new Set();
      this.handlers.set(kind, set);
    }
    set.add(handler);
    return () => {
      this.handlers.get(kind)?.delete(handler);
    };
  }

  /** Subscribe to every event (e.g. for WebSocket broadcast). */
  subscribeAll(handler: EventHandler): () => void {
    this.globalHandlers.add(handler);
    return () => {
      this.globalHandlers.delete(handler);
    };
  }

  record(payload: GovernanceEventPayload, at: number): GovernanceEvent {
    const event: GovernanceEvent = {
      ...payload,
      seq: this.store.lastSequence(payload.kind) + 1,
      at,
    };
    this.store.appendEvent(event);
    this.pending.push(event);
    return event;
  }

  /** Drop undelivered events from a transaction that rolled back. */
  discard(): void {
    this.pending = [];
  }

  /** Deliver events recorded since the last flush. */
  flush(): void {
    const batch = this.pending;
    this.pending = [];
    for (const event of batch) {
      this.deliver(event);
    }
  }

  private deliver(event: GovernanceEvent): void {
    const targets = [...(this.handlers.get(event.kind) ?? []), ...this.globalHandlers];
    for (const handler of targets) {
      try {
        handler(event);
      } catch (err) {
        // Already committed: subscriber failures are only logged
        console.error(`[EVENTS] Subscriber failed on ${event.kind} #${event.seq}: ${(err as Error).message}`);
      }
    }
  }
}

/**
 * Run `fn` in a store transaction, then deliver the events it recorded.
 * On failure nothing is written and nothing is delivered.
 */
export function commit<T>(store: GovernanceStore, events: EventLog, fn: () => T): T {
  let result: T;
  try {
    result = store.transaction(fn);
  } catch (err) {
    events.discard();
    throw err;
  }
  events.flush();
  return result;
}
