import type { z } from 'zod';

/**
 * Column kinds a decoded scalar can take in the tabular projection.
 */
export type ScalarKind = 'string' | 'integer' | 'float' | 'datetime';

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; message: string };

/**
 * A pair of pure functions between an XML attribute string and a logical value.
 *
 * `value` validates a logical value before it is encoded, so values built in code
 * go through the same checks as values read from a file.
 */
export interface ScalarCodec<T> {
  readonly kind: ScalarKind;
  /** Whether absence is a representable logical value */
  readonly nullable: boolean;
  readonly value: z.ZodType<T>;
  decode(raw: string): DecodeResult<T>;
  encode(value: T): string;
}
