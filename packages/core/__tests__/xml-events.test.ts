import { describe, it, expect } from 'vitest';
import { tokenizeXml } from '../src/xml-events.js';
import { GpxParseError } from '../src/errors.js';

describe('tokenizeXml', () => {
  it('emits start, text and end events in document order', () => {
    expect(tokenizeXml('<a x="1"><b>hi</b><c/></a>')).toEqual([
      { type: 'start', name: 'a', attributes: { x: '1' } },
      { type: 'start', name: 'b', attributes: {} },
      { type: 'text', text: 'hi' },
      { type: 'end', name: 'b' },
      { type: 'start', name: 'c', attributes: {} },
      { type: 'end', name: 'c' },
      { type: 'end', name: 'a' },
    ]);
  });

  it('skips the declaration and whitespace between elements', () => {
    expect(tokenizeXml('<?xml version="1.0"?>\n<a>\n  <b>1</b>\n</a>')).toEqual([
      { type: 'start', name: 'a', attributes: {} },
      { type: 'start', name: 'b', attributes: {} },
      { type: 'text', text: '1' },
      { type: 'end', name: 'b' },
      { type: 'end', name: 'a' },
    ]);
  });

  it('decodes entities and keeps values as strings', () => {
    expect(tokenizeXml('<a n="007">x &amp; y</a>')).toEqual([
      { type: 'start', name: 'a', attributes: { n: '007' } },
      { type: 'text', text: 'x & y' },
      { type: 'end', name: 'a' },
    ]);
  });

  it('throws a malformed-xml GpxParseError on unbalanced tags', () => {
    expect(() => tokenizeXml('<a><b></a>')).toThrow(GpxParseError);
    try {
      tokenizeXml('<a><b></a>');
    } catch (err) {
      expect(err instanceof GpxParseError && err.kind).toBe('malformed-xml');
    }
  });
});
