import { ApiResponseError, ETwitterStreamEvent, TwitterApi } from 'twitter-api-v2';
import type { Logger } from 'pino';
import type { BoundingBox } from '../../domain/index.js';
import { AuthError, SubscriptionError } from '../../domain/index.js';
import type { FeedCredentials } from '../credentials/index.js';
import type { FeedHandlers, FeedSource, FeedSubscription } from './feed-source.js';

/** HTTP statuses the streaming API uses for "slow down". */
const RATE_LIMIT_STATUSES = new Set([420, 429]);
const AUTH_STATUSES = new Set([401, 403]);

/**
 * Streaming API location filter: south-west corner then north-east corner,
 * each as longitude/latitude.
 */
export function toLocations(box: BoundingBox): Array<{ lng: string; lat: string }> {
  return [
    { lng: String(box.west), lat: String(box.south) },
    { lng: String(box.east), lat: String(box.north) },
  ];
}

/** Maps a client error to the worker's taxonomy. */
export function classifyFeedError(err: unknown, context: string): AuthError | SubscriptionError {
  if (err instanceof AuthError || err instanceof SubscriptionError) return err;

  if (err instanceof ApiResponseError) {
    if (AUTH_STATUSES.has(err.code)) {
      return new AuthError(`${context}: credentials rejected (HTTP ${err.code})`, { cause: err });
    }
    return new SubscriptionError(`${context}: HTTP ${err.code}`, {
      cause: err,
      rateLimited: RATE_LIMIT_STATUSES.has(err.code),
    });
  }

  const message = err instanceof Error ? err.message : String(err);
  return new SubscriptionError(`${context}: ${message}`, { cause: err });
}

/**
 * Feed source backed by the v1.1 filtered statuses stream.
 *
 * The library's own reconnect is switched off; the supervisor owns that.
 */
export class TwitterFeedSource implements FeedSource {
  private client: TwitterApi | null = null;

  constructor(private readonly log: Logger) {}

  async authenticate(credentials: FeedCredentials): Promise<void> {
    const client = new TwitterApi({
      appKey: credentials.consumerKey,
      appSecret: credentials.consumerSecret,
      accessToken: credentials.accessToken,
      accessSecret: credentials.accessTokenSecret,
    });

    try {
      const user = await client.v1.verifyCredentials();
      this.log.info({ screen_name: user.screen_name }, 'Feed credentials verified');
    } catch (err: unknown) {
      throw classifyFeedError(err, 'Credential verification failed');
    }

    this.client = client;
  }

  async subscribe(filter: BoundingBox, handlers: FeedHandlers): Promise<FeedSubscription> {
    if (this.client === null) {
      throw new SubscriptionError('subscribe() called before authenticate()');
    }

    const stream = await this.client.v1
      .filterStream({ locations: toLocations(filter) })
      .catch((err: unknown) => {
        throw classifyFeedError(err, 'Failed to open filtered stream');
      });

    stream.autoReconnect = false;

    let closing = false;
    let settle: (reason: SubscriptionError) => void = () => undefined;
    const ended = new Promise<SubscriptionError>((resolve) => {
      let settled = false;
      settle = (reason) => {
        if (settled || closing) return;
        settled = true;
        resolve(reason);
      };
    });

    stream.on(ETwitterStreamEvent.Data, (data: unknown) => handlers.onMessage(data));
    stream.on(ETwitterStreamEvent.DataError, (err: unknown) => handlers.onError(err));
    stream.on(ETwitterStreamEvent.TweetParseError, (err: unknown) => handlers.onError(err));
    stream.on(ETwitterStreamEvent.DataKeepAlive, () => this.log.trace('Feed keep-alive'));

    stream.on(ETwitterStreamEvent.ConnectionError, (err: unknown) => {
      settle(classifyFeedError(err, 'Stream connection error'));
      stream.close();
    });
    stream.on(ETwitterStreamEvent.ConnectionLost, () => {
      settle(new SubscriptionError('Stream connection lost (no keep-alive)'));
      stream.close();
    });
    stream.on(ETwitterStreamEvent.ConnectionClosed, () => {
      settle(new SubscriptionError('Stream closed by remote'));
    });

    return {
      ended,
      close: () => {
        closing = true;
        stream.close();
      },
    };
  }
}
