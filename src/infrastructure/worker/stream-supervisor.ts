import type { Logger } from 'pino';
import type { BoundingBox } from '../../domain/index.js';
import { SubscriptionError } from '../../domain/index.js';
import { DeliveryQueue } from '../../application/delivery-queue.js';
import type { IngestStats } from '../../application/ingest-stats.js';
import type { StreamListener } from '../../application/stream-listener.js';
import type { CredentialProvider } from '../credentials/index.js';
import type { FeedHandlers, FeedSource, FeedSubscription } from '../feed/index.js';

export type SupervisorState =
  | 'idle'
  | 'authenticating'
  | 'subscribed'
  | 'disconnected'
  | 'terminated';

export interface ReconnectPolicy {
  /** false = the first disconnect is fatal. */
  enabled: boolean;
  baseMs: number;
  maxMs: number;
  /** Backoff base used after a rate-limit disconnect. */
  rateLimitBaseMs: number;
}

export interface SupervisorStatus {
  state: SupervisorState;
  reconnects: number;
  connectedSince: string | null;
  queue: { pending: number; capacity: number };
}

/** Dependencies bundled for the supervisor. */
export interface SupervisorDeps {
  feed: FeedSource;
  credentials: CredentialProvider;
  stats: IngestStats;
  log: Logger;
  reconnect: ReconnectPolicy;
  queueCapacity: number;
  /** Jitter source, injectable for deterministic tests. */
  random?: () => number;
}

/**
 * Exponential backoff with equal jitter.
 *
 * attempt 1 → base, attempt 2 → 2×base, … capped at `maxMs`;
 * the returned delay lies in [cap/2, cap].
 */
export function backoffDelay(
  attempt: number,
  baseMs: number,
  maxMs: number,
  random: () => number = Math.random,
): number {
  const ceiling = Math.min(maxMs, baseMs * 2 ** Math.max(0, attempt - 1));
  return Math.round(ceiling / 2 + (random() * ceiling) / 2);
}

/**
 * Owns the long-lived filtered subscription.
 *
 * idle → authenticating → subscribed → disconnected → authenticating …
 *                                                   ↘ terminated
 *
 * Deliveries go through a bounded DeliveryQueue so the listener sees one
 * message at a time. Messages still waiting in the queue at shutdown are
 * counted as dropped; they were never staged. AuthError is fatal; SubscriptionError triggers a
 * reconnect after backoff, unless reconnect is disabled.
 */
export class StreamSupervisor {
  private currentState: SupervisorState = 'idle';
  private reconnects = 0;
  private connectedSince: string | null = null;
  private subscription: FeedSubscription | null = null;
  private queue: DeliveryQueue<unknown> | null = null;
  private finished: Promise<void> = Promise.resolve();
  private readonly ac = new AbortController();

  constructor(private readonly deps: SupervisorDeps) {}

  get state(): SupervisorState {
    return this.currentState;
  }

  status(): SupervisorStatus {
    return {
      state: this.currentState,
      reconnects: this.reconnects,
      connectedSince: this.connectedSince,
      queue: {
        pending: this.queue?.pending ?? 0,
        capacity: this.deps.queueCapacity,
      },
    };
  }

  /**
   * Runs until stop() (resolves) or a fatal error (rejects).
   * Can only be called once per instance.
   */
  start(filter: BoundingBox, listener: StreamListener): Promise<void> {
    if (this.currentState !== 'idle') {
      return Promise.reject(new Error(`StreamSupervisor already started (state: ${this.currentState})`));
    }
    this.currentState = 'authenticating';

    const running = this.run(filter, listener);
    // Failures are reported to the start() caller
    this.finished = running.then(
      () => undefined,
      () => undefined,
    );
    return running;
  }

  /**
   * Aborts any backoff wait and closes the subscription. Queued messages
   * that have not started are skipped; the one in progress is awaited.
   */
  async stop(): Promise<void> {
    this.ac.abort();
    this.subscription?.close();
    await this.finished;
  }

  private async run(filter: BoundingBox, listener: StreamListener): Promise<void> {
    const { feed, credentials, stats, log, reconnect, queueCapacity } = this.deps;
    const signal = this.ac.signal;

    const queue = new DeliveryQueue<unknown>(
      queueCapacity,
      (raw) => listener.onEvent(raw, signal),
      (err) => log.error({ err }, 'Listener failed while processing a message'),
    );
    this.queue = queue;

    const handlers: FeedHandlers = {
      onMessage: (raw) => {
        if (!queue.push(raw)) {
          stats.increment('dropped');
          log.warn({ capacity: queueCapacity }, 'Delivery queue full, dropping message');
        }
      },
      onError: (err) => listener.onError(err),
    };

    const stopped = new Promise<null>((resolve) => {
      signal.addEventListener('abort', () => resolve(null), { once: true });
    });

    let attempt = 0;
    try {
      const secrets = await credentials.load();

      while (!signal.aborted) {
        this.currentState = 'authenticating';
        let ended: SubscriptionError | null;

        try {
          await feed.authenticate(secrets);
          if (signal.aborted) break;

          const subscription = await feed.subscribe(filter, handlers);
          this.subscription = subscription;
          if (signal.aborted) break;

          this.currentState = 'subscribed';
          this.connectedSince = new Date().toISOString();
          attempt = 0;
          log.info({ filter }, 'Subscribed to filtered feed');

          ended = await Promise.race([subscription.ended, stopped]);
          this.subscription = null;
        } catch (err: unknown) {
          // AuthError and anything unexpected are fatal
          if (!(err instanceof SubscriptionError)) throw err;
          ended = err;
        }

        if (ended === null || signal.aborted) break;

        this.currentState = 'disconnected';
        this.connectedSince = null;
        log.warn({ err: ended, rateLimited: ended.rateLimited }, 'Feed subscription ended');

        if (!reconnect.enabled) throw ended;

        attempt++;
        this.reconnects++;
        const base = ended.rateLimited ? reconnect.rateLimitBaseMs : reconnect.baseMs;
        const delayMs = backoffDelay(attempt, base, reconnect.maxMs, this.deps.random);
        log.info({ attempt, delayMs }, 'Reconnecting to feed after backoff');
        await sleep(delayMs, signal);
      }
    } finally {
      this.ac.abort();
      this.subscription?.close();
      this.subscription = null;
      this.currentState = 'terminated';
      this.connectedSince = null;

      const skipped = queue.close();
      if (skipped > 0) {
        stats.increment('dropped', skipped);
        log.warn({ skipped }, 'Skipping queued messages on shutdown');
      }
      await queue.drain();
      log.info('Stream supervisor stopped');
    }
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done, { once: true });
  });
}
