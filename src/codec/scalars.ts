/**
 * Scalar codecs for the attribute values used by both XML dialects.
 */

import { z } from 'zod';
import type { DecodeResult, ScalarCodec } from './types.js';
import { VendorTimestamp } from './VendorTimestamp.js';

/** Barcode written by the instrument when a plate has no readable barcode. */
export const UNKNOWN_BARCODE = 'UnknownBarCode';

const INTEGER_PATTERN = /^[+-]?\d+$/;

function ok<T>(value: T): DecodeResult<T> {
  return { ok: true, value };
}

function fail<T>(message: string): DecodeResult<T> {
  return { ok: false, message };
}

function parseFloatStrict(raw: string): DecodeResult<number> {
  const trimmed = raw.trim();
  if (trimmed === '') return fail('expected a number, got an empty string');
  const value = Number(trimmed);
  if (!Number.isFinite(value)) return fail(`expected a finite number, got "${raw}"`);
  return ok(value);
}

function parseIntegerStrict(raw: string): DecodeResult<number> {
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return fail(`expected an integer, got "${raw}"`);
  const value = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(value)) return fail(`integer out of range: "${raw}"`);
  return ok(value);
}

export const stringCodec: ScalarCodec<string> = {
  kind: 'string',
  nullable: false,
  value: z.string(),
  decode: (raw) => ok(raw),
  encode: (value) => value,
};

export const floatCodec: ScalarCodec<number> = {
  kind: 'float',
  nullable: false,
  value: z.number().finite(),
  decode: parseFloatStrict,
  encode: (value) => String(value),
};

export const integerCodec: ScalarCodec<number> = {
  kind: 'integer',
  nullable: false,
  value: z.number().int(),
  decode: parseIntegerStrict,
  encode: (value) => String(value),
};

export const nonNegativeIntegerCodec: ScalarCodec<number> = {
  kind: 'integer',
  nullable: false,
  value: z.number().int().nonnegative(),
  decode(raw) {
    const parsed = parseIntegerStrict(raw);
    if (parsed.ok && parsed.value < 0) return fail(`expected a non-negative integer, got "${raw}"`);
    return parsed;
  },
  encode: (value) => String(value),
};

/**
 * Closed set of wire values.
 */
export function enumCodec<T extends string>(values: readonly [T, ...T[]]): ScalarCodec<T> {
  const isMember = (candidate: unknown): candidate is T => values.some((v) => v === candidate);
  return {
    kind: 'string',
    nullable: false,
    value: z.custom<T>(isMember, { message: `expected one of ${values.join(', ')}` }),
    decode(raw) {
      const match = values.find((v) => v === raw);
      return match !== undefined ? ok(match) : fail(`expected one of ${values.join(', ')}, got "${raw}"`);
    },
    encode: (value) => value,
  };
}

/**
 * `UnknownBarCode` means no barcode. A plate genuinely labelled with that text
 * cannot be told apart from an unlabelled one.
 */
export const barcodeCodec: ScalarCodec<string | undefined> = {
  kind: 'string',
  nullable: true,
  value: z.string().optional(),
  decode: (raw) => ok(raw === UNKNOWN_BARCODE ? undefined : raw),
  encode: (value) => value ?? UNKNOWN_BARCODE,
};

/**
 * Zero means absent. A genuine zero reading cannot be told apart from a missing one.
 */
export const zeroAsAbsentFloatCodec: ScalarCodec<number | undefined> = {
  kind: 'float',
  nullable: true,
  value: z.number().finite().optional(),
  decode(raw) {
    const parsed = parseFloatStrict(raw);
    if (!parsed.ok) return parsed;
    return ok(parsed.value === 0 ? undefined : parsed.value);
  },
  encode: (value) => (value === undefined ? '0' : String(value)),
};

export const timestampCodec: ScalarCodec<VendorTimestamp> = {
  kind: 'datetime',
  nullable: false,
  value: z.custom<VendorTimestamp>((v) => v instanceof VendorTimestamp, {
    message: 'expected a VendorTimestamp',
  }),
  decode(raw) {
    const ts = VendorTimestamp.parse(raw);
    return ts ? ok(ts) : fail(`expected a timestamp like 2024-01-31 13:45:10.123, got "${raw}"`);
  },
  encode: (value) => value.toString(),
};
