/**
 * GPX track parser.
 *
 * A small state machine over <trkpt>, <time> and <ele> events. Each step
 * takes the current state and one XML event and returns the next state, the
 * waypoint committed by that event (if any) and the warnings it raised.
 * Bad points are dropped with a warning; only unreadable or malformed input
 * aborts the parse.
 */

import { isValid, parseISO } from 'date-fns';
import type { GpxParseOptions, GpxWarning, GpxWarningCode, ParseResult, Waypoint } from './types.js';
import { DEFAULT_GPX_PARSE_OPTIONS } from './types.js';
import { GpxParseError } from './errors.js';
import { tokenizeXml } from './xml-events.js';
import type { XmlEvent } from './xml-events.js';
import { buildTrack } from './track.js';

// ─── State ──────────────────────────────────────────────────────────────────

export type GpxElement = 'none' | 'trkpt' | 'time' | 'ele';

/** Outcome of reading one field: present and parsed, or not. */
export type Field<T> = { ok: true; value: T } | { ok: false };

export interface Candidate {
  lon: Field<number>;
  lat: Field<number>;
  time: Field<Date>;
  ele: number;
  /** Cleared by any failure that disqualifies the point; never set back */
  valid: boolean;
}

export interface GpxParserState {
  element: GpxElement;
  candidate: Candidate | null;
  /** Number of <trkpt> start tags seen so far */
  seen: number;
}

export interface GpxStep {
  state: GpxParserState;
  committed?: Waypoint;
  warnings: GpxWarning[];
}

export const INITIAL_GPX_PARSER_STATE: GpxParserState = Object.freeze({
  element: 'none',
  candidate: null,
  seen: 0,
});

const MISSING: Field<never> = { ok: false };

// ─── Field parsing ──────────────────────────────────────────────────────────

const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const DATE_TIME = /^\d{4}-?\d{2}-?\d{2}T\d{2}:?\d{2}:?\d{2}(?:[.,]\d+)?(Z|[+-]\d{2}(?::?\d{2})?)?$/;

/** Locale-independent decimal, e.g. "-12.5" or "1e3". */
export function parseDecimal(text: string | undefined): Field<number> {
  if (text === undefined) return MISSING;
  const trimmed = text.trim();
  if (!DECIMAL.test(trimmed)) return MISSING;
  const value = Number(trimmed);
  return Number.isFinite(value) ? { ok: true, value } : MISSING;
}

/**
 * ISO-8601 date-time, extended (2024-05-01T08:00:00Z) or basic
 * (20240501T080000Z), with at least second resolution.
 * Values without a zone designator are taken as UTC, as GPX times are.
 */
export function parseTimestamp(text: string): Field<Date> {
  const trimmed = text.trim();
  const match = DATE_TIME.exec(trimmed);
  if (!match) return MISSING;
  const date = parseISO(match[1] === undefined ? `${trimmed}Z` : trimmed);
  return isValid(date) ? { ok: true, value: date } : MISSING;
}

// ─── Step ───────────────────────────────────────────────────────────────────

function warning(code: GpxWarningCode, message: string, pointIndex?: number): GpxWarning {
  return pointIndex === undefined ? { code, message } : { code, message, pointIndex };
}

function openTrackpoint(state: GpxParserState, attributes: Readonly<Record<string, string>>): GpxStep {
  const warnings: GpxWarning[] = [];
  const index = state.seen + 1;

  if (state.candidate) {
    warnings.push(
      warning('nested-trkpt', `broken gpx file, trkpt #${index} starts before trkpt #${state.seen} ended`, state.seen),
    );
  }

  const lonText = attributes['lon'];
  const latText = attributes['lat'];
  const lon = parseDecimal(lonText);
  const lat = parseDecimal(latText);
  const valid = lon.ok && lat.ok;

  if (lonText === undefined || latText === undefined) {
    warnings.push(warning('missing-coordinates', `broken gpx file, trkpt #${index} has no lon/lat attributes`, index));
  } else if (!valid) {
    warnings.push(
      warning(
        'invalid-coordinates',
        `broken gpx file, trkpt #${index} has unreadable coordinates lon="${lonText}" lat="${latText}"`,
        index,
      ),
    );
  }

  return {
    state: { element: 'trkpt', candidate: { lon, lat, time: MISSING, ele: 0, valid }, seen: index },
    warnings,
  };
}

function openChild(state: GpxParserState, element: 'time' | 'ele'): GpxStep {
  if (!state.candidate) {
    return {
      state,
      warnings: [warning('orphan-element', `broken gpx file, element '${element}' found outside of trkpt`)],
    };
  }
  return { state: { ...state, element }, warnings: [] };
}

function readText(state: GpxParserState, text: string): GpxStep {
  const { candidate } = state;
  if (!candidate) return { state, warnings: [] };

  if (state.element === 'time') {
    const time = parseTimestamp(text);
    if (time.ok) {
      return { state: { ...state, candidate: { ...candidate, time } }, warnings: [] };
    }
    return {
      state: { ...state, candidate: { ...candidate, valid: false } },
      warnings: [
        warning('invalid-time', `broken gpx file, failed to parse ISO-8601 time '${text}' for trkpt #${state.seen}`, state.seen),
      ],
    };
  }

  if (state.element === 'ele') {
    const ele = parseDecimal(text);
    return ele.ok ? { state: { ...state, candidate: { ...candidate, ele: ele.value } }, warnings: [] } : { state, warnings: [] };
  }

  return { state, warnings: [] };
}

function closeTrackpoint(state: GpxParserState): GpxStep {
  const next: GpxParserState = { element: 'none', candidate: null, seen: state.seen };
  const { candidate } = state;

  if (!candidate || !candidate.valid || !candidate.lon.ok || !candidate.lat.ok) {
    return { state: next, warnings: [] };
  }

  if (!candidate.time.ok) {
    return {
      state: next,
      warnings: [warning('missing-time', `broken gpx file, trkpt #${state.seen} has no time`, state.seen)],
    };
  }

  const committed: Waypoint = Object.freeze({
    lon: candidate.lon.value,
    lat: candidate.lat.value,
    ele: candidate.ele,
    timeMs: candidate.time.value.getTime(),
  });
  return { state: next, committed, warnings: [] };
}

/** Advance the parser by one XML event. The input state is left untouched. */
export function stepGpxParser(state: GpxParserState, event: XmlEvent): GpxStep {
  switch (event.type) {
    case 'start':
      if (event.name === 'trkpt') return openTrackpoint(state, event.attributes);
      if (event.name === 'time' || event.name === 'ele') return openChild(state, event.name);
      return { state, warnings: [] };
    case 'text':
      return readText(state, event.text);
    case 'end':
      if (event.name === 'trkpt') return closeTrackpoint(state);
      return { state: state.element === 'none' ? state : { ...state, element: 'none' }, warnings: [] };
  }
}

// ─── Drivers ────────────────────────────────────────────────────────────────

function resolveOptions(options: Partial<GpxParseOptions>): GpxParseOptions {
  return {
    minSizeBytes: options.minSizeBytes ?? DEFAULT_GPX_PARSE_OPTIONS.minSizeBytes,
    logger: options.logger === undefined ? DEFAULT_GPX_PARSE_OPTIONS.logger : options.logger,
  };
}

/**
 * Build a track from an already tokenized event stream.
 * Never throws: anomalies are returned as warnings.
 */
export function parseGpxEvents(events: Iterable<XmlEvent>, options: Partial<GpxParseOptions> = {}): ParseResult {
  const { logger } = resolveOptions(options);
  const points: Waypoint[] = [];
  const warnings: GpxWarning[] = [];
  let state = INITIAL_GPX_PARSER_STATE;

  for (const event of events) {
    const step = stepGpxParser(state, event);
    state = step.state;
    if (step.committed) points.push(step.committed);
    for (const w of step.warnings) {
      warnings.push(w);
      logger?.warn(`[GPX] ${w.message}`);
    }
  }

  const track = buildTrack(points);

  if (logger) {
    const dropped = state.seen - points.length;
    const byCode = new Map<GpxWarningCode, number>();
    for (const w of warnings) byCode.set(w.code, (byCode.get(w.code) ?? 0) + 1);
    const reasons = [...byCode].map(([code, count]) => `${code}=${count}`).join(', ');

    logger.log(
      `[GPX] Parsed ${points.length}/${state.seen} trackpoints` +
        (dropped > 0 ? ` (dropped ${dropped})` : '') +
        (reasons ? ` [${reasons}]` : ''),
    );
    if (track.startTimeMs !== undefined && track.endTimeMs !== undefined) {
      const start = new Date(track.startTimeMs).toISOString();
      const end = new Date(track.endTimeMs).toISOString();
      logger.log(
        `[GPX] Time range: ${start} → ${end} = ${track.durationS.toFixed(1)}s`,
      );
    }
  }

  return { track, warnings };
}

/** Decode GPX bytes as UTF-8. A leading byte order mark is dropped. */
export function decodeGpxBytes(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (err) {
    throw new GpxParseError('encoding', 'Invalid GPX file: content is not valid UTF-8', { cause: err });
  }
}

/**
 * Parse GPX file contents into a Track.
 * Throws GpxParseError when the input is too small, not UTF-8 or not well-formed XML.
 */
export function parseGpx(input: string | Uint8Array, options: Partial<GpxParseOptions> = {}): ParseResult {
  const resolved = resolveOptions(options);
  const size = typeof input === 'string' ? new TextEncoder().encode(input).byteLength : input.byteLength;

  if (size < resolved.minSizeBytes) {
    throw new GpxParseError(
      'too-small',
      `Not a GPX file: ${size} byte(s), expected at least ${resolved.minSizeBytes}`,
    );
  }

  const xml = typeof input === 'string' ? input : decodeGpxBytes(input);
  return parseGpxEvents(tokenizeXml(xml), resolved);
}
