/**
 * Time → position lookup on a parsed track.
 *
 * Both lookups assume track points are in non-decreasing time order. A query
 * before the first point or at/after the last one reports the nearest end of
 * the track with inRange = false.
 */

import type { Location, Track, Waypoint } from './types.js';
import { InsufficientDataError } from './errors.js';

function requirePoints(track: Track): readonly Waypoint[] {
  if (track.points.length < 2) {
    throw new InsufficientDataError(track.points.length);
  }
  return track.points;
}

function at(p: Waypoint, inRange: boolean): Location {
  return { lon: p.lon, lat: p.lat, inRange };
}

/**
 * Find the point whose time interval [p.timeMs, next.timeMs) contains the query
 * and return its position. An exact match on an interior point resolves to
 * that point.
 */
export function locate(track: Track, time: Date): Location {
  const points = requirePoints(track);
  const t = time.getTime();

  for (let i = 0; i < points.length; i++) {
    const p = points[i];
    const pt = p.timeMs;
    const isLast = i === points.length - 1;

    if ((isLast && t >= pt) || t < pt) return at(p, false);
    if (!isLast && t >= pt && t < points[i + 1].timeMs) return at(p, true);
  }

  // Reached only for an invalid Date, whose time compares false with everything
  return at(points[points.length - 1], false);
}

/**
 * Like locate, but inside the track's span the position is linearly
 * interpolated between the bracketing pair. An invalid Date reports the last
 * point out of range, as locate does.
 */
export function interpolateLocation(track: Track, time: Date): Location {
  const points = requirePoints(track);
  const t = time.getTime();

  const last = points[points.length - 1];
  if (Number.isNaN(t)) return at(last, false);

  const first = points[0];
  if (t < first.timeMs) return at(first, false);
  if (t >= last.timeMs) return at(last, false);

  // Binary search for surrounding points
  let lo = 0;
  let hi = points.length - 1;
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if (points[mid].timeMs <= t) {
      lo = mid;
    } else {
      hi = mid;
    }
  }

  const p0 = points[lo];
  const p1 = points[hi];
  const dt = p1.timeMs - p0.timeMs;
  const f = dt > 0 ? (t - p0.timeMs) / dt : 0;

  return {
    lon: p0.lon + f * (p1.lon - p0.lon),
    lat: p0.lat + f * (p1.lat - p0.lat),
    inRange: true,
  };
}
