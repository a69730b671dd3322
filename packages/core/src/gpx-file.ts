/**
 * Load a GPX track from disk.
 */

import { readFile } from 'node:fs/promises';
import type { GpxParseOptions, ParseResult } from './types.js';
import { GpxParseError } from './errors.js';
import { parseGpx } from './gpx-parser.js';

/**
 * Read and parse a GPX file.
 * Rejects with GpxParseError('io') when the file cannot be read, and with the
 * parser's GpxParseError for anything that is not a usable GPX document.
 */
export async function loadGpxFile(path: string, options: Partial<GpxParseOptions> = {}): Promise<ParseResult> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(path);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new GpxParseError('io', `Cannot read GPX file ${path}: ${reason}`, { cause: err });
  }
  return parseGpx(bytes, options);
}
