/**
 * Collection of plate definitions, keyed by `platetype`.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { EchoXmlError } from '../types/errors.js';
import type { DiagnosticSink } from '../diagnostics/DiagnosticSink.js';
import type { BuildXmlOptions } from '../xml/tree.js';
import { projectRows } from '../table/Table.js';
import type { Table } from '../table/Table.js';
import { readLabwarePlates, writeLabwarePlates } from './LabwareDocument.js';
import type { LabwareVariant } from './LabwareDocument.js';
import { createPlateInfo, PLATE_INFO_COLUMNS, PlateUsage, toPlateInfoRecord } from './PlateInfo.js';
import type { PlateInfo, PlateInfoRecord } from './PlateInfo.js';

export interface LabwareReadOptions {
  sink?: DiagnosticSink;
}

function duplicateKey(platetype: string): EchoXmlError {
  return new EchoXmlError('DUPLICATE_KEY', `Plate of type ${platetype} already exists`, {
    field: 'platetype',
  });
}

export class Labware {
  private readonly _plates: PlateInfo[] = [];
  /** Variant the collection was read from, when it was read from a document */
  readonly variant?: LabwareVariant;

  constructor(plates: readonly PlateInfo[] = [], variant?: LabwareVariant) {
    for (const plate of plates) {
      if (this.has(plate.platetype)) throw duplicateKey(plate.platetype);
      this._plates.push(plate);
    }
    if (variant !== undefined) this.variant = variant;
  }

  static fromBytes(raw: string | Uint8Array, options: LabwareReadOptions = {}): Labware {
    const { variant, plates } = readLabwarePlates(raw, options);
    return new Labware(plates, variant);
  }

  static async fromFile(path: string, options: LabwareReadOptions = {}): Promise<Labware> {
    const raw = await readFile(path);
    return Labware.fromBytes(raw, options);
  }

  get plates(): readonly PlateInfo[] {
    return [...this._plates];
  }

  get sourcePlates(): readonly PlateInfo[] {
    return this._plates.filter((p) => p.usage === PlateUsage.SOURCE);
  }

  get destinationPlates(): readonly PlateInfo[] {
    return this._plates.filter((p) => p.usage === PlateUsage.DESTINATION);
  }

  get size(): number {
    return this._plates.length;
  }

  keys(): string[] {
    return this._plates.map((p) => p.platetype);
  }

  has(platetype: string): boolean {
    return this._plates.some((p) => p.platetype === platetype);
  }

  get(platetype: string): PlateInfo {
    const plate = this._plates.find((p) => p.platetype === platetype);
    if (!plate) {
      throw new EchoXmlError('LOOKUP_MISS', `No plate of type ${platetype}`, { field: 'platetype' });
    }
    return plate;
  }

  /**
   * Add a plate definition. Records are validated before being added; the
   * collection is left unchanged when validation or the uniqueness check fails.
   */
  add(plate: PlateInfo | PlateInfoRecord): PlateInfo {
    const validated = createPlateInfo('shape' in plate ? toPlateInfoRecord(plate) : plate);
    if (this.has(validated.platetype)) throw duplicateKey(validated.platetype);
    this._plates.push(validated);
    return validated;
  }

  toXml(options: BuildXmlOptions = {}): string {
    return writeLabwarePlates(this._plates, options);
  }

  toBytes(options: BuildXmlOptions = {}): Uint8Array {
    return new TextEncoder().encode(this.toXml(options));
  }

  /** Write an ELWX file. */
  async toFile(path: string, options: BuildXmlOptions = {}): Promise<void> {
    await writeFile(path, this.toXml(options), 'utf-8');
  }

  toTable(): Table {
    return projectRows(
      PLATE_INFO_COLUMNS,
      this._plates.map((plate) => toPlateInfoRecord(plate))
    );
  }
}
