import type { CapturedEvent, EventSource } from '../schema/index.js';
import { deepFreeze, toJsonValue } from '../schema/index.js';

// ── Append input ─────────────────────────────────────────────

export interface EventInput {
  source: EventSource;
  payload: unknown;
  level?: string | undefined;
  originTimestamp?: number | undefined;
  /** Defaults to the store clock. */
  observedAt?: number | undefined;
}

export interface EventStoreOptions {
  now?: () => number;
}

// ── Store ────────────────────────────────────────────────────

/**
 * Ordered, append-only event collection shared by the polling loop and
 * the console-API callback. `append` never awaits, so both producers
 * land in arrival order on the single event loop.
 */
export class EventStore {
  private readonly events: CapturedEvent[] = [];
  private readonly now: () => number;

  constructor(options: EventStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  append(input: EventInput): CapturedEvent {
    const event: CapturedEvent = Object.freeze({
      source: input.source,
      payload: deepFreeze(toJsonValue(input.payload)),
      observedAt: Math.floor(input.observedAt ?? this.now()),
      ...(input.level !== undefined ? { level: input.level } : {}),
      ...(input.originTimestamp !== undefined && input.originTimestamp >= 0
        ? { originTimestamp: input.originTimestamp }
        : {}),
    });

    this.events.push(event);
    return event;
  }

  list(): readonly CapturedEvent[] {
    return [...this.events];
  }

  get size(): number {
    return this.events.length;
  }

  count(source: EventSource): number {
    return this.events.filter((event) => event.source === source).length;
  }

  /** Events observed during the session, excluding the teardown snapshot. */
  get observedCount(): number {
    return this.events.length - this.count('final_snapshot');
  }
}
