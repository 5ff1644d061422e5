/**
 * Minimal element tree over fast-xml-parser's ordered output.
 *
 * Only elements and attributes are kept; text, comments and processing
 * instructions are dropped since neither dialect carries data in them.
 */

import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { EchoXmlError } from '../types/errors.js';

export interface XmlElement {
  tag: string;
  attributes: Record<string, string>;
  children: XmlElement[];
}

export interface BuildXmlOptions {
  /** Prepend `<?xml version="1.0" encoding="utf-8"?>` (default: true) */
  declaration?: boolean;
  /** Spaces per nesting level; 0 writes everything on one line (default: 2) */
  indent?: number;
}

export const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  processEntities: true,
  htmlEntities: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function decodeXmlInput(raw: string | Uint8Array): string {
  const text = typeof raw === 'string' ? raw : new TextDecoder('utf-8').decode(raw);
  return text.startsWith('\uFEFF') ? text.slice(1) : text;
}

function toElement(node: Record<string, unknown>): XmlElement | null {
  const tag = Object.keys(node).find((key) => key !== ATTRIBUTES_KEY && key !== TEXT_KEY);
  if (tag === undefined) return null;

  const attributes: Record<string, string> = {};
  const rawAttributes = node[ATTRIBUTES_KEY];
  if (isRecord(rawAttributes)) {
    for (const [name, value] of Object.entries(rawAttributes)) {
      attributes[name] = typeof value === 'string' ? value : String(value);
    }
  }

  return { tag, attributes, children: toElements(node[tag]) };
}

function toElements(nodes: unknown): XmlElement[] {
  if (!Array.isArray(nodes)) return [];
  const out: XmlElement[] = [];
  for (const node of nodes) {
    if (!isRecord(node)) continue;
    const element = toElement(node);
    if (element) out.push(element);
  }
  return out;
}

/**
 * Parse XML text into its root element.
 */
export function parseXml(raw: string | Uint8Array): XmlElement {
  const text = decodeXmlInput(raw);
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new EchoXmlError('XML_SYNTAX', `Malformed XML at line ${line}, column ${col}: ${msg}`);
  }

  const parsed: unknown = parser.parse(text);
  const [root] = toElements(parsed);
  if (!root) {
    throw new EchoXmlError('XML_SYNTAX', 'XML document has no root element');
  }
  return root;
}

function toOrderedNode(element: XmlElement): Record<string, unknown> {
  const node: Record<string, unknown> = {
    [element.tag]: element.children.map(toOrderedNode),
  };
  if (Object.keys(element.attributes).length > 0) {
    node[ATTRIBUTES_KEY] = { ...element.attributes };
  }
  return node;
}

/**
 * Serialize an element tree to XML text.
 */
export function buildXml(root: XmlElement, options: BuildXmlOptions = {}): string {
  const indent = options.indent ?? 2;
  const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    format: indent > 0,
    indentBy: ' '.repeat(indent),
    suppressEmptyNode: true,
    processEntities: true,
  });

  const built: unknown = builder.build([toOrderedNode(root)]);
  if (typeof built !== 'string') {
    throw new EchoXmlError('XML_SYNTAX', `XML builder returned ${typeof built} instead of text`);
  }
  const body = built.trim();
  return options.declaration === false ? `${body}\n` : `${XML_DECLARATION}\n${body}\n`;
}
