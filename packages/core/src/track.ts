/**
 * Track construction.
 * Freezes the accepted points and derives the summary fields.
 */

import type { Track, Waypoint } from './types.js';
import { cumulativeDistances } from './haversine.js';

/** Build an immutable Track from waypoints kept in the given order. */
export function buildTrack(waypoints: readonly Waypoint[]): Track {
  const points = Object.freeze(waypoints.map((p) => (Object.isFrozen(p) ? p : Object.freeze({ ...p }))));

  if (points.length === 0) {
    return Object.freeze({ points, durationS: 0, totalDistanceM: 0 });
  }

  const startTimeMs = points[0].timeMs;
  const endTimeMs = points[points.length - 1].timeMs;
  const distances = cumulativeDistances(points);

  return Object.freeze({
    points,
    startTimeMs,
    endTimeMs,
    durationS: (endTimeMs - startTimeMs) / 1000,
    totalDistanceM: distances[distances.length - 1],
  });
}
