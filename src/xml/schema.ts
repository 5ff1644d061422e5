/**
 * Declarative field tables for XML elements.
 *
 * An element schema is a zod object whose shape entries are built with the helpers
 * below. Each helper records how its field maps to XML (attribute name, nested
 * element, list of elements) in a side registry read by the mapping engine, while
 * zod decodes and validates the raw strings the engine collects.
 */

import { z } from 'zod';
import type { ScalarCodec, ScalarKind } from '../codec/types.js';
import type { ColumnSpec } from '../table/Table.js';

export interface AttributeField {
  kind: 'attribute';
  /** Attribute name on the wire */
  name: string;
  required: boolean;
  column: { kind: ScalarKind; nullable: boolean };
  /** Returns undefined when the attribute is to be omitted */
  encode(value: unknown): string | undefined;
}

export interface ElementField {
  kind: 'element';
  tag: string;
  shape: z.ZodRawShape;
}

export interface ListField {
  kind: 'list';
  item: ElementField;
  /** Wrapper element holding the items; items are direct children when absent */
  wrapper?: string;
}

export type XmlField = AttributeField | ElementField | ListField;

const registry = new WeakMap<z.ZodTypeAny, XmlField>();

export function fieldOf(schema: z.ZodTypeAny): XmlField | undefined {
  return registry.get(schema);
}

export function elementOf(schema: z.ZodTypeAny): ElementField {
  const field = registry.get(schema);
  if (!field || field.kind !== 'element') {
    throw new Error('Schema was not declared with xmlElement()');
  }
  return field;
}

function decodeWith<T>(codec: ScalarCodec<T>, raw: string, ctx: z.RefinementCtx): T {
  const decoded = codec.decode(raw);
  if (!decoded.ok) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: decoded.message });
    return z.NEVER;
  }
  return decoded.value;
}

/**
 * Attribute that must be present on the wire. Codecs that encode absence
 * (barcode, zero-as-absent) are always written.
 */
export function attr<T>(name: string, codec: ScalarCodec<T>): z.ZodEffects<z.ZodString, T, string> {
  const schema = z.string().transform((raw, ctx) => decodeWith(codec, raw, ctx));
  registry.set(schema, {
    kind: 'attribute',
    name,
    required: true,
    column: { kind: codec.kind, nullable: codec.nullable },
    encode: (value) => codec.encode(codec.value.parse(value)),
  });
  return schema;
}

/**
 * Attribute that may be missing. Missing reads as undefined; undefined is not written.
 */
export function optionalAttr<T>(
  name: string,
  codec: ScalarCodec<T>
): z.ZodEffects<z.ZodOptional<z.ZodString>, T | undefined, string | undefined> {
  const schema = z
    .string()
    .optional()
    .transform((raw, ctx) => (raw === undefined ? undefined : decodeWith(codec, raw, ctx)));
  registry.set(schema, {
    kind: 'attribute',
    name,
    required: false,
    column: { kind: codec.kind, nullable: true },
    encode: (value) => (value === undefined ? undefined : codec.encode(codec.value.parse(value))),
  });
  return schema;
}

/**
 * Element schema. Used as a shape entry of another element, it maps to a single
 * required child element.
 */
export function xmlElement<S extends z.ZodRawShape>(tag: string, shape: S): z.ZodObject<S> {
  const schema = z.object(shape);
  registry.set(schema, { kind: 'element', tag, shape });
  return schema;
}

/**
 * Ordered list of child elements, optionally inside a wrapper element.
 */
export function elementList<S extends z.ZodTypeAny>(
  item: S,
  options: { wrapper?: string } = {}
): z.ZodArray<S> {
  const schema = z.array(item);
  const field: ListField = { kind: 'list', item: elementOf(item) };
  if (options.wrapper !== undefined) field.wrapper = options.wrapper;
  registry.set(schema, field);
  return schema;
}

/**
 * Column specs for the attribute fields of an element, in declared order.
 * Nested elements and lists are not scalar and are left out.
 */
export function attributeColumns(schema: z.ZodTypeAny): ColumnSpec[] {
  const columns: ColumnSpec[] = [];
  for (const [name, fieldSchema] of Object.entries(elementOf(schema).shape)) {
    const field = fieldOf(fieldSchema);
    if (field?.kind !== 'attribute') continue;
    columns.push({ name, ...field.column });
  }
  return columns;
}
