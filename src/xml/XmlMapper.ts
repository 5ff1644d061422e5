/**
 * Generic mapping between element schemas and element trees.
 */

import { z } from 'zod';
import { EchoXmlError } from '../types/errors.js';
import { elementOf, fieldOf } from './schema.js';
import type { AttributeField, ElementField, XmlField } from './schema.js';
import { buildXml, parseXml } from './tree.js';
import type { BuildXmlOptions, XmlElement } from './tree.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function joinPath(parent: string, key: string | number): string {
  return parent === '' ? String(key) : `${parent}.${key}`;
}

function requireField(schema: z.ZodTypeAny, path: string): XmlField {
  const field = fieldOf(schema);
  if (!field) {
    throw new Error(`Field "${path}" was not declared with attr(), optionalAttr(), xmlElement() or elementList()`);
  }
  return field;
}

function findChild(parent: XmlElement, tag: string, path: string): XmlElement {
  const child = parent.children.find((c) => c.tag === tag);
  if (!child) {
    throw new EchoXmlError(
      'MISSING_REQUIRED_FIELD',
      `Element <${parent.tag}> is missing required child element <${tag}>`,
      { element: parent.tag, field: tag, path }
    );
  }
  return child;
}

/**
 * Gather raw attribute strings keyed by logical field name, recursing into
 * nested elements and lists. Unknown attributes and elements are ignored.
 */
function collectRaw(element: ElementField, node: XmlElement, path: string): Record<string, unknown> {
  const raw: Record<string, unknown> = {};
  for (const [key, fieldSchema] of Object.entries(element.shape)) {
    const fieldPath = joinPath(path, key);
    const field = requireField(fieldSchema, fieldPath);
    switch (field.kind) {
      case 'attribute': {
        const value = node.attributes[field.name];
        if (value !== undefined) {
          raw[key] = value;
        } else if (field.required) {
          throw new EchoXmlError(
            'MISSING_REQUIRED_FIELD',
            `Element <${node.tag}> is missing required attribute "${field.name}"`,
            { element: node.tag, field: field.name, path: fieldPath }
          );
        }
        break;
      }
      case 'element':
        raw[key] = collectRaw(field, findChild(node, field.tag, fieldPath), fieldPath);
        break;
      case 'list': {
        const container = field.wrapper !== undefined ? findChild(node, field.wrapper, fieldPath) : node;
        raw[key] = container.children
          .filter((c) => c.tag === field.item.tag)
          .map((c, index) => collectRaw(field.item, c, joinPath(fieldPath, index)));
        break;
      }
    }
  }
  return raw;
}

function describeIssue(issues: z.ZodIssue[]): { path: string; message: string } {
  const [first] = issues;
  if (!first) return { path: '', message: 'invalid value' };
  return { path: first.path.join('.'), message: first.message };
}

/**
 * Decode an element into the logical record its schema describes.
 */
export function readElement<S extends z.ZodTypeAny>(schema: S, node: XmlElement): z.output<S> {
  const element = elementOf(schema);
  if (node.tag !== element.tag) {
    throw new EchoXmlError('UNEXPECTED_ROOT', `Expected element <${element.tag}>, found <${node.tag}>`, {
      element: node.tag,
    });
  }

  const result = schema.safeParse(collectRaw(element, node, ''));
  if (!result.success) {
    const { path, message } = describeIssue(result.error.issues);
    throw new EchoXmlError('INVALID_VALUE', `Invalid value for "${path}" in <${element.tag}>: ${message}`, {
      element: element.tag,
      path,
      cause: result.error,
    });
  }
  return result.data;
}

function encodeAttribute(field: AttributeField, value: unknown, path: string): string | undefined {
  try {
    return field.encode(value);
  } catch (err) {
    const message = err instanceof z.ZodError ? describeIssue(err.issues).message : String(err);
    throw new EchoXmlError('INVALID_VALUE', `Cannot encode "${path}" as attribute "${field.name}": ${message}`, {
      field: field.name,
      path,
      cause: err,
    });
  }
}

function emit(element: ElementField, value: unknown, path: string): XmlElement {
  if (!isRecord(value)) {
    throw new EchoXmlError('INVALID_VALUE', `Cannot encode "${path || element.tag}": expected an object`, {
      element: element.tag,
      path,
    });
  }

  const node: XmlElement = { tag: element.tag, attributes: {}, children: [] };
  for (const [key, fieldSchema] of Object.entries(element.shape)) {
    const fieldPath = joinPath(path, key);
    const field = requireField(fieldSchema, fieldPath);
    const fieldValue = value[key];
    switch (field.kind) {
      case 'attribute': {
        const encoded = encodeAttribute(field, fieldValue, fieldPath);
        if (encoded !== undefined) node.attributes[field.name] = encoded;
        break;
      }
      case 'element':
        node.children.push(emit(field, fieldValue, fieldPath));
        break;
      case 'list': {
        if (!Array.isArray(fieldValue)) {
          throw new EchoXmlError('INVALID_VALUE', `Cannot encode "${fieldPath}": expected an array`, {
            element: element.tag,
            path: fieldPath,
          });
        }
        const items = fieldValue.map((item: unknown, index) => emit(field.item, item, joinPath(fieldPath, index)));
        if (field.wrapper !== undefined) {
          node.children.push({ tag: field.wrapper, attributes: {}, children: items });
        } else {
          node.children.push(...items);
        }
        break;
      }
    }
  }
  return node;
}

/**
 * Encode a logical record into an element tree.
 */
export function writeElement<S extends z.ZodTypeAny>(schema: S, value: z.output<S>): XmlElement {
  return emit(elementOf(schema), value, '');
}

/**
 * Parse XML text and decode its root element.
 */
export function readDocument<S extends z.ZodTypeAny>(schema: S, raw: string | Uint8Array): z.output<S> {
  return readElement(schema, parseXml(raw));
}

export function writeDocument<S extends z.ZodTypeAny>(
  schema: S,
  value: z.output<S>,
  options: BuildXmlOptions = {}
): string {
  return buildXml(writeElement(schema, value), options);
}

/**
 * Re-run decoding on a record built in code: encode it, then decode the result.
 * The returned record is what a reader of the written file would get.
 */
export function normalizeRecord<S extends z.ZodTypeAny>(schema: S, value: z.output<S>): z.output<S> {
  return readElement(schema, writeElement(schema, value));
}
