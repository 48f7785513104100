import { describe, it, expect } from 'vitest';
import { hasGeoSignal } from '../../src/domain/index.js';
import { makeEvent } from '../helpers.js';

const point = { lat: 39.74, lon: -104.99 };
const place = {
  name: 'Denver, CO',
  boundingBox: { west: -105.11, south: 39.61, east: -104.6, north: 39.91 },
};

describe('hasGeoSignal', () => {
  it('is false when neither coordinates nor place are present', () => {
    expect(hasGeoSignal(makeEvent())).toBe(false);
  });

  it('is true with coordinates only', () => {
    expect(hasGeoSignal(makeEvent({ coordinates: point }))).toBe(true);
  });

  it('is true with place only', () => {
    expect(hasGeoSignal(makeEvent({ place }))).toBe(true);
  });

  it('is true with both', () => {
    expect(hasGeoSignal(makeEvent({ coordinates: point, place }))).toBe(true);
  });

  it('checks presence only: a place without name or box still counts', () => {
    expect(hasGeoSignal(makeEvent({ place: { name: null, boundingBox: null } }))).toBe(true);
  });
});
