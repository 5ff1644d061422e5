/**
 * Field tables for `platesurvey` documents written by the instrument's survey scan.
 */

import type { z } from 'zod';
import {
  barcodeCodec,
  floatCodec,
  integerCodec,
  nonNegativeIntegerCodec,
  stringCodec,
  timestampCodec,
  zeroAsAbsentFloatCodec,
} from '../codec/scalars.js';
import { attr, attributeColumns, elementList, optionalAttr, xmlElement } from '../xml/schema.js';

export const SURVEY_ROOT_TAG = 'platesurvey';

/** One detected acoustic feature. */
export const signalFeatureSchema = xmlElement('f', {
  feature_type: attr('t', stringCodec),
  tof: attr('o', floatCodec),
  vpp: attr('v', floatCodec),
});

/** Acoustic signal recorded for a well; features keep their recorded order. */
export const echoSignalSchema = xmlElement('e', {
  signal_type: attr('t', stringCodec),
  transducer_x: attr('x', floatCodec),
  transducer_y: attr('y', floatCodec),
  transducer_z: attr('z', floatCodec),
  features: elementList(signalFeatureSchema),
});

export const wellSurveySchema = xmlElement('w', {
  row: attr('r', nonNegativeIntegerCodec),
  column: attr('c', nonNegativeIntegerCodec),
  well: attr('n', stringCodec),
  volume: attr('vl', zeroAsAbsentFloatCodec),
  current_volume: attr('cvl', zeroAsAbsentFloatCodec),
  status: attr('status', stringCodec),
  fluid: attr('fld', stringCodec),
  fluid_units: attr('fldu', stringCodec),
  meniscus_x: attr('x', floatCodec),
  meniscus_y: attr('y', floatCodec),
  fluid_composition: attr('s', floatCodec),
  dmso_homogeneous: attr('fsh', floatCodec),
  dmso_inhomogeneous: attr('fsinh', floatCodec),
  fluid_thickness: attr('t', floatCodec),
  current_fluid_thickness: attr('ct', floatCodec),
  bottom_thickness: attr('b', floatCodec),
  fluid_thickness_homogeneous: attr('fth', floatCodec),
  fluid_thickness_imhomogeneous: attr('ftinh', floatCodec),
  outlier: attr('o', floatCodec),
  corrective_action: attr('a', stringCodec),
  echo_signal: echoSignalSchema,
});

export const plateSurveySchema = xmlElement(SURVEY_ROOT_TAG, {
  /** In practice always the plate type */
  plate_type: attr('name', stringCodec),
  plate_barcode: attr('barcode', barcodeCodec),
  timestamp: attr('date', timestampCodec),
  instrument_serial_number: attr('serial_number', stringCodec),
  vtl: attr('vtl', integerCodec),
  original: attr('original', integerCodec),
  data_format_version: attr('frmt', integerCodec),
  survey_rows: attr('rows', nonNegativeIntegerCodec),
  survey_columns: attr('cols', nonNegativeIntegerCodec),
  survey_total_wells: attr('totalWells', nonNegativeIntegerCodec),
  wells: elementList(wellSurveySchema),
  // Not written by the instrument; added by tooling that annotates surveys.
  plate_name: optionalAttr('plate_name', stringCodec),
  comment: optionalAttr('note', stringCodec),
});

export type SignalFeature = z.output<typeof signalFeatureSchema>;
export type EchoSignal = z.output<typeof echoSignalSchema>;
export type WellSurvey = z.output<typeof wellSurveySchema>;
export type PlateSurveyRecord = z.output<typeof plateSurveySchema>;

export type SurveyHeader = Omit<PlateSurveyRecord, 'wells'>;

/** Scalar well columns; the signal and its features are not projected. */
export const WELL_COLUMNS = attributeColumns(wellSurveySchema);

/** Header columns, broadcast onto every well row. */
export const SURVEY_HEADER_COLUMNS = attributeColumns(plateSurveySchema);
