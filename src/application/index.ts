export { decodeEvent, envelopeOf } from './event-schema.js';
export { EventHandler } from './event-handler.js';
export type { EventHandlerDeps, HandleOutcome, HandleStep } from './event-handler.js';
export { DeliveryQueue } from './delivery-queue.js';
export { IngestStats, COUNTER_NAMES } from './ingest-stats.js';
export type { CounterName, CounterSnapshot } from './ingest-stats.js';
export type { StreamListener } from './stream-listener.js';
