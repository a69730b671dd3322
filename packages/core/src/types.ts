/**
 * @trackstamp/core — Type definitions
 *
 * Coordinates are WGS84 degrees, elevation is meters, times are epoch
 * milliseconds. A Track keeps its points in file order; location queries assume
 * that order is non-decreasing in time.
 */

// ─── Track ──────────────────────────────────────────────────────────────────

export interface Waypoint {
  readonly lon: number;
  readonly lat: number;
  /** Meters. 0 when the point has no usable <ele> */
  readonly ele: number;
  /** Epoch milliseconds */
  readonly timeMs: number;
}

export interface Track {
  /** Accepted points, in file order, frozen */
  readonly points: readonly Waypoint[];
  /** Epoch milliseconds of the first point */
  readonly startTimeMs?: number;
  /** Epoch milliseconds of the last point */
  readonly endTimeMs?: number;
  /** Seconds between first and last point */
  readonly durationS: number;
  /** Great-circle path length in meters */
  readonly totalDistanceM: number;
}

// ─── Parsing ────────────────────────────────────────────────────────────────

export type GpxWarningCode =
  | 'nested-trkpt'
  | 'missing-coordinates'
  | 'invalid-coordinates'
  | 'orphan-element'
  | 'invalid-time'
  | 'missing-time';

export interface GpxWarning {
  code: GpxWarningCode;
  message: string;
  /** 1-based ordinal of the <trkpt> the warning concerns */
  pointIndex?: number;
}

export interface ParseResult {
  track: Track;
  warnings: GpxWarning[];
}

export interface GpxLogger {
  log(message: string): void;
  warn(message: string): void;
}

export interface GpxParseOptions {
  /** Inputs shorter than this many bytes are not GPX files */
  minSizeBytes: number;
  /** Diagnostics sink; null silences the parser */
  logger: GpxLogger | null;
}

export const DEFAULT_GPX_PARSE_OPTIONS: GpxParseOptions = {
  minSizeBytes: 10,
  logger: console,
};

// ─── Location ───────────────────────────────────────────────────────────────

export interface Location {
  lon: number;
  lat: number;
  /** False when the query time falls before the first point or at/after the last */
  inRange: boolean;
}
