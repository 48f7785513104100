export type { GeoEvent, EventPayload, Coordinates, Place, BoundingBox } from './event.js';
export { hasGeoSignal } from './geo-filter.js';
export {
  GeoStreamError,
  ConfigError,
  AuthError,
  SubscriptionError,
  IOWriteError,
  UploadError,
} from './errors.js';
