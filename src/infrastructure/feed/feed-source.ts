import type { BoundingBox } from '../../domain/index.js';
import type { SubscriptionError } from '../../domain/index.js';
import type { FeedCredentials } from '../credentials/index.js';

/** Callbacks the feed invokes while a subscription is live. */
export interface FeedHandlers {
  onMessage(raw: unknown): void;
  onError(err: unknown): void;
}

/** A live filtered subscription. */
export interface FeedSubscription {
  /** Settles once, when the subscription ends for any reason other than close(). */
  readonly ended: Promise<SubscriptionError>;
  /** Closes the connection; `ended` is not settled by an explicit close. */
  close(): void;
}

/**
 * Upstream stream of posts.
 *
 * `authenticate` rejects with AuthError when credentials are refused and
 * SubscriptionError for anything transient. `subscribe` rejects with
 * SubscriptionError (or AuthError) when the stream cannot be opened.
 */
export interface FeedSource {
  authenticate(credentials: FeedCredentials): Promise<void>;
  subscribe(filter: BoundingBox, handlers: FeedHandlers): Promise<FeedSubscription>;
}
