/**
 * Plate type definitions (`plateinfo` elements) in both labware file variants.
 *
 * ELWX files carry every attribute. ELW files omit `usage`, `welllength` and
 * `plateformat`; those are computed from the list a plate sits in and from
 * `wellwidth`. Both variants are exposed through the same read-only PlateInfo view.
 */

import type { z } from 'zod';
import {
  enumCodec,
  floatCodec,
  nonNegativeIntegerCodec,
  stringCodec,
} from '../codec/scalars.js';
import { attr, attributeColumns, optionalAttr, xmlElement } from '../xml/schema.js';
import { normalizeRecord } from '../xml/XmlMapper.js';

/** Wire values of `usage`. */
export const PlateUsage = {
  SOURCE: 'SRC',
  DESTINATION: 'DEST',
} as const;

export type PlateUsage = (typeof PlateUsage)[keyof typeof PlateUsage];

/** `plateformat` reported for ELW plates, which do not record one. */
export const UNKNOWN_PLATE_FORMAT = 'UNKNOWN';

export const plateInfoSchema = xmlElement('plateinfo', {
  platetype: attr('platetype', stringCodec),
  plateformat: attr('plateformat', stringCodec),
  usage: attr('usage', enumCodec([PlateUsage.SOURCE, PlateUsage.DESTINATION])),
  fluid: optionalAttr('fluid', stringCodec),
  manufacturer: attr('manufacturer', stringCodec),
  lotnumber: attr('lotnumber', stringCodec),
  partnumber: attr('partnumber', stringCodec),
  rows: attr('rows', nonNegativeIntegerCodec),
  cols: attr('cols', nonNegativeIntegerCodec),
  a1offsety: attr('a1offsety', nonNegativeIntegerCodec),
  centerspacingx: attr('centerspacingx', nonNegativeIntegerCodec),
  centerspacingy: attr('centerspacingy', nonNegativeIntegerCodec),
  plateheight: attr('plateheight', nonNegativeIntegerCodec),
  skirtheight: attr('skirtheight', nonNegativeIntegerCodec),
  wellwidth: attr('wellwidth', nonNegativeIntegerCodec),
  welllength: attr('welllength', nonNegativeIntegerCodec),
  wellcapacity: attr('wellcapacity', nonNegativeIntegerCodec),
  bottominset: attr('bottominset', floatCodec),
  centerwellposx: attr('centerwellposx', floatCodec),
  centerwellposy: attr('centerwellposy', floatCodec),
  minwellvol: optionalAttr('minwellvol', floatCodec),
  maxwellvol: optionalAttr('maxwellvol', floatCodec),
  maxvoltotal: optionalAttr('maxvoltotal', floatCodec),
  minvolume: optionalAttr('minvolume', floatCodec),
  dropvolume: optionalAttr('dropvolume', floatCodec),
});

export const elwPlateInfoSchema = xmlElement(
  'plateinfo',
  plateInfoSchema.omit({ usage: true, welllength: true, plateformat: true }).shape
);

/** Every field of an ELWX `plateinfo` element. */
export type PlateInfoRecord = z.output<typeof plateInfoSchema>;

/** Fields stored by an ELW `plateinfo` element. */
export type ElwPlateInfoRecord = z.output<typeof elwPlateInfoSchema>;

/**
 * Read-only view over a plate definition, whichever variant it was read from.
 */
export type PlateInfo = Readonly<PlateInfoRecord> & {
  readonly shape: readonly [rows: number, cols: number];
};

/** Table columns for plate rows, derived once from the field table. */
export const PLATE_INFO_COLUMNS = attributeColumns(plateInfoSchema);

function freezeView(record: PlateInfoRecord): PlateInfo {
  return Object.freeze({
    ...record,
    shape: Object.freeze([record.rows, record.cols] as const),
  });
}

/**
 * View over an ELWX record.
 */
export function plateInfoView(record: PlateInfoRecord): PlateInfo {
  return freezeView(record);
}

/**
 * View over an ELW record. `usage` comes from the list the plate was read from.
 */
export function elwPlateInfoView(record: ElwPlateInfoRecord, usage: PlateUsage): PlateInfo {
  return freezeView({
    ...record,
    usage,
    welllength: record.wellwidth,
    plateformat: UNKNOWN_PLATE_FORMAT,
  });
}

/**
 * Build a plate definition in code. Values are validated exactly as if they had
 * been read from a file.
 */
export function createPlateInfo(record: PlateInfoRecord): PlateInfo {
  return freezeView(normalizeRecord(plateInfoSchema, record));
}

/** Strip the derived `shape` back off a view. */
export function toPlateInfoRecord(plate: PlateInfo): PlateInfoRecord {
  const { shape: _shape, ...record } = plate;
  return record;
}
