/**
 * Core domain types for the archived post model.
 *
 * These types define the shape of a decoded feed message as it flows
 * through the worker. They carry no framework dependencies.
 */

/** Rectangle in floating-point degrees, used for the stream filter and place extents. */
export interface BoundingBox {
  readonly west: number;
  readonly south: number;
  readonly east: number;
  readonly north: number;
}

/** Exact point attached to a post. */
export interface Coordinates {
  readonly lat: number;
  readonly lon: number;
}

/** Named location attached to a post instead of (or alongside) an exact point. */
export interface Place {
  readonly name: string | null;
  readonly boundingBox: BoundingBox | null;
}

/** Raw message body, stored verbatim in the archive. */
export type EventPayload = Record<string, unknown>;

/**
 * One post delivered by the feed.
 *
 * `payload` is the complete message as received; `coordinates` and `place`
 * are projections of it used for filtering only.
 */
export interface GeoEvent {
  readonly id: string;
  readonly coordinates: Coordinates | null;
  readonly place: Place | null;
  readonly payload: EventPayload;
  readonly receivedAt: string; // ISO-8601
}
