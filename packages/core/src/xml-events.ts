/**
 * XML event stream.
 *
 * Turns a document into the flat start / text / end sequence the GPX state
 * machine consumes. Well-formedness and tokenizing are left to fast-xml-parser:
 * the validator rejects broken documents, and the order-preserving parse
 * output is walked depth-first to recover document order.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { GpxParseError } from './errors.js';

export type XmlEvent =
  | { type: 'start'; name: string; attributes: Readonly<Record<string, string>> }
  | { type: 'text'; text: string }
  | { type: 'end'; name: string };

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  processEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) return attributes;
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === 'string') attributes[name] = value;
  }
  return attributes;
}

function walk(nodes: unknown, events: XmlEvent[]): void {
  if (!Array.isArray(nodes)) return;

  for (const node of nodes) {
    if (!isRecord(node)) continue;

    for (const [key, value] of Object.entries(node)) {
      if (key === ATTRIBUTES_KEY) continue;

      if (key === TEXT_KEY) {
        const text = String(value);
        if (text !== '') events.push({ type: 'text', text });
        continue;
      }

      events.push({ type: 'start', name: key, attributes: readAttributes(node[ATTRIBUTES_KEY]) });
      walk(value, events);
      events.push({ type: 'end', name: key });
    }
  }
}

/**
 * Tokenize an XML document into events, in document order.
 * Throws GpxParseError('malformed-xml') when the document is not well formed.
 */
export function tokenizeXml(xml: string): XmlEvent[] {
  const text = xml.charCodeAt(0) === 0xfeff ? xml.slice(1) : xml;

  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new GpxParseError('malformed-xml', `Invalid GPX file: ${msg} (line ${line}, column ${col})`);
  }

  const tree: unknown = parser.parse(text);
  const events: XmlEvent[] = [];
  walk(tree, events);
  return events;
}
