export type { FeedSource, FeedSubscription, FeedHandlers } from './feed-source.js';
export { TwitterFeedSource, toLocations, classifyFeedError } from './twitter-feed-source.js';
