import type { GeoEvent } from './event.js';

/**
 * True when the post carries any geographic signal: an exact point or a
 * named place. Presence only; structural checks happen at decode time.
 */
export function hasGeoSignal(event: GeoEvent): boolean {
  return event.coordinates !== null || event.place !== null;
}
