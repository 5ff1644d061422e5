/**
 * Error type shared by every layer of the reader/writer.
 *
 * Field-level and structural errors abort the document being read; nothing
 * returns a partially built document.
 */

export type EchoXmlErrorCode =
  | 'XML_SYNTAX'
  | 'UNEXPECTED_ROOT'
  | 'MISSING_REQUIRED_FIELD'
  | 'INVALID_VALUE'
  | 'VARIANT_MISMATCH'
  | 'DUPLICATE_KEY'
  | 'LOOKUP_MISS'
  | 'SCHEMA_VIOLATION';

export interface EchoXmlErrorDetails {
  /** Tag of the element the error was found on */
  element?: string;
  /** Raw attribute or element name involved */
  field?: string;
  /** Logical field path, e.g. "wells.3.volume" */
  path?: string;
  cause?: unknown;
}

export class EchoXmlError extends Error {
  readonly code: EchoXmlErrorCode;
  readonly element?: string;
  readonly field?: string;
  readonly path?: string;

  constructor(code: EchoXmlErrorCode, message: string, details: EchoXmlErrorDetails = {}) {
    super(message, details.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = 'EchoXmlError';
    this.code = code;
    if (details.element !== undefined) this.element = details.element;
    if (details.field !== undefined) this.field = details.field;
    if (details.path !== undefined) this.path = details.path;
  }
}

export function isEchoXmlError(err: unknown, code?: EchoXmlErrorCode): err is EchoXmlError {
  return err instanceof EchoXmlError && (code === undefined || err.code === code);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
