/**
 * A validated plate survey document.
 */

import { readFile, writeFile } from 'node:fs/promises';
import type { DiagnosticSink } from '../diagnostics/DiagnosticSink.js';
import { projectRows } from '../table/Table.js';
import type { Table } from '../table/Table.js';
import { validateSurvey } from '../validation/SurveyRules.js';
import type { RuleViolation } from '../validation/SurveyRules.js';
import { elementOf, fieldOf } from '../xml/schema.js';
import { normalizeRecord, readDocument, writeDocument } from '../xml/XmlMapper.js';
import type { BuildXmlOptions } from '../xml/tree.js';
import { plateSurveySchema, SURVEY_HEADER_COLUMNS, WELL_COLUMNS } from './schema.js';
import type { PlateSurveyRecord, SurveyHeader, WellSurvey } from './schema.js';

export interface SurveyReadOptions {
  sink?: DiagnosticSink;
  /** Data format version accepted without a warning (default: 1) */
  expectedFormatVersion?: number;
}

export type SurveyDestination = string | ((survey: EchoPlateSurvey) => string);

export interface SurveyWriteOptions extends BuildXmlOptions {
  /** Fill `{field}` placeholders of a string destination (default: true) */
  formatPath?: boolean;
}

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export class EchoPlateSurvey {
  readonly data: Readonly<PlateSurveyRecord>;
  /** Warnings raised while validating */
  readonly warnings: readonly RuleViolation[];

  private constructor(data: PlateSurveyRecord, warnings: RuleViolation[]) {
    this.data = deepFreeze(data);
    this.warnings = Object.freeze(warnings);
  }

  static fromBytes(raw: string | Uint8Array, options: SurveyReadOptions = {}): EchoPlateSurvey {
    const record = readDocument(plateSurveySchema, raw);
    return new EchoPlateSurvey(record, validateSurvey(record, options));
  }

  static async read(path: string, options: SurveyReadOptions = {}): Promise<EchoPlateSurvey> {
    const raw = await readFile(path);
    return EchoPlateSurvey.fromBytes(raw, options);
  }

  /**
   * Build a survey in code. Fields are validated as if read from a file and the
   * cross-field rules run.
   */
  static create(record: PlateSurveyRecord, options: SurveyReadOptions = {}): EchoPlateSurvey {
    const normalized = normalizeRecord(plateSurveySchema, record);
    return new EchoPlateSurvey(normalized, validateSurvey(normalized, options));
  }

  get wells(): readonly WellSurvey[] {
    return this.data.wells;
  }

  get header(): SurveyHeader {
    const { wells: _wells, ...header } = this.data;
    return header;
  }

  toXml(options: BuildXmlOptions = {}): string {
    return writeDocument(plateSurveySchema, this.data, options);
  }

  toBytes(options: BuildXmlOptions = {}): Uint8Array {
    return new TextEncoder().encode(this.toXml(options));
  }

  /**
   * Fill `{field}` placeholders with the header attribute values as they are
   * written to the file (e.g. `{plate_barcode}` becomes `UnknownBarCode` when the
   * plate has none). Unknown placeholders are left as they are.
   */
  formatPath(template: string): string {
    const shape = elementOf(plateSurveySchema).shape;
    const header: Record<string, unknown> = this.header;
    return template.replace(PLACEHOLDER, (match, name: string) => {
      const schema = shape[name];
      const field = schema ? fieldOf(schema) : undefined;
      if (field?.kind !== 'attribute') return match;
      return field.encode(header[name]) ?? '';
    });
  }

  /**
   * Write the survey and return the path written to.
   */
  async write(destination: SurveyDestination, options: SurveyWriteOptions = {}): Promise<string> {
    const { formatPath = true, ...xmlOptions } = options;
    const path =
      typeof destination === 'function'
        ? destination(this)
        : formatPath
          ? this.formatPath(destination)
          : destination;
    await writeFile(path, this.toXml(xmlOptions), 'utf-8');
    return path;
  }

  /**
   * One row per well with the scalar well fields, followed by every header
   * field repeated on each row.
   */
  toTable(): Table {
    return projectRows(WELL_COLUMNS, this.data.wells, {
      columns: SURVEY_HEADER_COLUMNS,
      values: this.header,
    });
  }
}
