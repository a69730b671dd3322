/**
 * Errors thrown at the package boundary.
 *
 * Anomalies inside a well-formed file (bad coordinates, orphan elements, ...)
 * are never thrown: they come back as warnings on the ParseResult.
 */

export type GpxParseErrorKind = 'io' | 'too-small' | 'encoding' | 'malformed-xml';

/** The input could not be read as a GPX document. No track is produced. */
export class GpxParseError extends Error {
  readonly kind: GpxParseErrorKind;

  constructor(kind: GpxParseErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GpxParseError';
    this.kind = kind;
  }
}

/** A location query needs at least two track points. */
export class InsufficientDataError extends Error {
  readonly pointCount: number;

  constructor(pointCount: number) {
    super(`Track has ${pointCount} point(s), at least 2 are needed to locate a time`);
    this.name = 'InsufficientDataError';
    this.pointCount = pointCount;
  }
}
