/**
 * @trackstamp/core — Main entry point
 */

// ─── Types ──────────────────────────────────────────────────────────────────

export type {
  Waypoint,
  Track,
  GpxWarningCode,
  GpxWarning,
  ParseResult,
  GpxLogger,
  GpxParseOptions,
  Location,
} from './types.js';

export { DEFAULT_GPX_PARSE_OPTIONS } from './types.js';

// ─── Errors ─────────────────────────────────────────────────────────────────

export { GpxParseError, InsufficientDataError } from './errors.js';
export type { GpxParseErrorKind } from './errors.js';

// ─── Haversine ──────────────────────────────────────────────────────────────

export { haversineDistance, cumulativeDistances } from './haversine.js';

// ─── GPX ────────────────────────────────────────────────────────────────────

export { tokenizeXml } from './xml-events.js';
export type { XmlEvent } from './xml-events.js';

export {
  INITIAL_GPX_PARSER_STATE,
  stepGpxParser,
  parseGpxEvents,
  parseGpx,
  decodeGpxBytes,
  parseDecimal,
  parseTimestamp,
} from './gpx-parser.js';
export type { GpxElement, Field, Candidate, GpxParserState, GpxStep } from './gpx-parser.js';

export { buildTrack } from './track.js';
export { loadGpxFile } from './gpx-file.js';

// ─── Location ───────────────────────────────────────────────────────────────

export { locate, interpolateLocation } from './location.js';
