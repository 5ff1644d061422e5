/**
 * `EchoLabware` document shapes and the variant-detecting reader.
 */

import type { z } from 'zod';
import type { DiagnosticSink } from '../diagnostics/DiagnosticSink.js';
import { noopSink } from '../diagnostics/DiagnosticSink.js';
import { describeError, EchoXmlError } from '../types/errors.js';
import { elementList, xmlElement } from '../xml/schema.js';
import { readElement, writeDocument } from '../xml/XmlMapper.js';
import { parseXml } from '../xml/tree.js';
import type { BuildXmlOptions, XmlElement } from '../xml/tree.js';
import {
  elwPlateInfoSchema,
  elwPlateInfoView,
  plateInfoSchema,
  plateInfoView,
  PlateUsage,
  toPlateInfoRecord,
} from './PlateInfo.js';
import type { PlateInfo } from './PlateInfo.js';

export const LABWARE_ROOT_TAG = 'EchoLabware';

export const elwxLabwareSchema = xmlElement(LABWARE_ROOT_TAG, {
  sourceplates: elementList(plateInfoSchema, { wrapper: 'sourceplates' }),
  destinationplates: elementList(plateInfoSchema, { wrapper: 'destinationplates' }),
});

export const elwLabwareSchema = xmlElement(LABWARE_ROOT_TAG, {
  sourceplates: elementList(elwPlateInfoSchema, { wrapper: 'sourceplates' }),
  destinationplates: elementList(elwPlateInfoSchema, { wrapper: 'destinationplates' }),
});

export type ElwxLabwareRecord = z.output<typeof elwxLabwareSchema>;
export type ElwLabwareRecord = z.output<typeof elwLabwareSchema>;

export type LabwareVariant = 'ELWX' | 'ELW';

export type VariantAttempt =
  | { ok: true; variant: LabwareVariant; plates: PlateInfo[] }
  | { ok: false; variant: LabwareVariant; error: EchoXmlError };

function asVariantError(variant: LabwareVariant, err: unknown): EchoXmlError {
  if (err instanceof EchoXmlError) return err;
  return new EchoXmlError('VARIANT_MISMATCH', `Not an ${variant} labware document: ${describeError(err)}`, {
    cause: err,
  });
}

export function attemptElwx(root: XmlElement): VariantAttempt {
  try {
    const doc = readElement(elwxLabwareSchema, root);
    return {
      ok: true,
      variant: 'ELWX',
      plates: [...doc.sourceplates, ...doc.destinationplates].map(plateInfoView),
    };
  } catch (err) {
    return { ok: false, variant: 'ELWX', error: asVariantError('ELWX', err) };
  }
}

export function attemptElw(root: XmlElement): VariantAttempt {
  try {
    const doc = readElement(elwLabwareSchema, root);
    return {
      ok: true,
      variant: 'ELW',
      plates: [
        ...doc.sourceplates.map((p) => elwPlateInfoView(p, PlateUsage.SOURCE)),
        ...doc.destinationplates.map((p) => elwPlateInfoView(p, PlateUsage.DESTINATION)),
      ],
    };
  } catch (err) {
    return { ok: false, variant: 'ELW', error: asVariantError('ELW', err) };
  }
}

export interface ReadLabwareOptions {
  sink?: DiagnosticSink;
}

/**
 * Read the plates of a labware document, trying ELWX first and ELW second.
 *
 * ELWX is tried first because it carries more information. When both fail, the
 * ELW error is thrown and the ELWX error is attached as its `cause`.
 */
export function readLabwarePlates(
  raw: string | Uint8Array,
  options: ReadLabwareOptions = {}
): { variant: LabwareVariant; plates: PlateInfo[] } {
  const sink = options.sink ?? noopSink;
  const root = parseXml(raw);

  const attempts = [attemptElwx, attemptElw];
  let firstFailure: EchoXmlError | undefined;
  let lastFailure: EchoXmlError | undefined;
  for (const attempt of attempts) {
    const result = attempt(root);
    if (result.ok) {
      return { variant: result.variant, plates: result.plates };
    }
    sink.debug(`Labware document is not ${result.variant}`, {
      variant: result.variant,
      code: result.error.code,
      reason: result.error.message,
    });
    firstFailure ??= result.error;
    lastFailure = result.error;
  }

  const reported = lastFailure ?? new EchoXmlError('VARIANT_MISMATCH', 'No labware variant matched');
  throw new EchoXmlError(reported.code, reported.message, {
    ...(reported.element !== undefined ? { element: reported.element } : {}),
    ...(reported.field !== undefined ? { field: reported.field } : {}),
    ...(reported.path !== undefined ? { path: reported.path } : {}),
    cause: firstFailure,
  });
}

/**
 * Write plates as an ELWX document: SRC plates in `sourceplates`,
 * DEST plates in `destinationplates`, relative order kept.
 */
export function writeLabwarePlates(plates: readonly PlateInfo[], options: BuildXmlOptions = {}): string {
  const record: ElwxLabwareRecord = {
    sourceplates: plates.filter((p) => p.usage === PlateUsage.SOURCE).map(toPlateInfoRecord),
    destinationplates: plates.filter((p) => p.usage === PlateUsage.DESTINATION).map(toPlateInfoRecord),
  };
  return writeDocument(elwxLabwareSchema, record, options);
}
