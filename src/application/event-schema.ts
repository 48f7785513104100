import { z } from 'zod';
import type { BoundingBox, GeoEvent, Place } from '../domain/index.js';

/** GeoJSON position: [longitude, latitude]. */
const positionSchema = z.tuple([z.number().finite(), z.number().finite()]);

const pointSchema = z.object({
  coordinates: positionSchema,
}).passthrough();

/**
 * Place object as sent by the feed. `bounding_box.coordinates` is a
 * polygon: an array of rings, each ring an array of positions.
 */
const placeSchema = z.object({
  full_name: z.string().optional(),
  name: z.string().optional(),
  bounding_box: z.object({
    coordinates: z.array(z.array(positionSchema)),
  }).passthrough().nullish(),
}).passthrough();

/**
 * Zod schema for a single post on the filtered stream.
 *
 * Only the fields the worker looks at are declared; everything else is
 * passed through untouched so the archived payload is the full message.
 * Delete/limit notices have no `id_str` and fail here.
 */
const feedMessageSchema = z.object({
  id_str: z.string().min(1),
  coordinates: pointSchema.nullish(),
  place: placeSchema.nullish(),
}).passthrough();

type FeedMessage = z.infer<typeof feedMessageSchema>;

/** Archived as sent: the raw message with its own key order. */
const payloadSchema = z.record(z.string(), z.unknown());

/** Min/max envelope of every position in the polygon, or null when it has none. */
export function envelopeOf(rings: ReadonlyArray<ReadonlyArray<readonly [number, number]>>): BoundingBox | null {
  const positions = rings.flat();
  if (positions.length === 0) return null;

  let west = Infinity;
  let south = Infinity;
  let east = -Infinity;
  let north = -Infinity;
  for (const [lon, lat] of positions) {
    west = Math.min(west, lon);
    east = Math.max(east, lon);
    south = Math.min(south, lat);
    north = Math.max(north, lat);
  }
  return { west, south, east, north };
}

function toPlace(raw: NonNullable<FeedMessage['place']>): Place {
  const rings = raw.bounding_box?.coordinates;
  return {
    name: raw.full_name ?? raw.name ?? null,
    boundingBox: rings ? envelopeOf(rings) : null,
  };
}

/**
 * Decodes a raw feed message into a GeoEvent.
 *
 * Returns null for anything that is not a post, including posts whose
 * geo fields are present but structurally malformed.
 */
export function decodeEvent(raw: unknown, receivedAt: Date = new Date()): GeoEvent | null {
  const parsed = feedMessageSchema.safeParse(raw);
  if (!parsed.success) return null;

  const message = parsed.data;
  const point = message.coordinates;

  return {
    id: message.id_str,
    coordinates: point ? { lon: point.coordinates[0], lat: point.coordinates[1] } : null,
    place: message.place ? toPlace(message.place) : null,
    payload: payloadSchema.parse(raw),
    receivedAt: receivedAt.toISOString(),
  };
}
