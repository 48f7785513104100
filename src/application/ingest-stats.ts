export const COUNTER_NAMES = [
  'received',
  'undecodable',
  'skipped',
  'archived',
  'failed',
  'dropped',
  'feed_errors',
  'recovered',
] as const;

export type CounterName = (typeof COUNTER_NAMES)[number];

export type CounterSnapshot = Record<CounterName, number>;

/**
 * Process-lifetime counters for the status endpoint.
 *
 * Counts reset on restart; nothing here is persisted.
 */
export class IngestStats {
  private readonly counters: CounterSnapshot = {
    received: 0,
    undecodable: 0,
    skipped: 0,
    archived: 0,
    failed: 0,
    dropped: 0,
    feed_errors: 0,
    recovered: 0,
  };

  increment(name: CounterName, by = 1): void {
    this.counters[name] += by;
  }

  /** Returns a copy; callers cannot mutate the live counters. */
  snapshot(): CounterSnapshot {
    return { ...this.counters };
  }
}
