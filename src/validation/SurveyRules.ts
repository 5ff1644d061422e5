/**
 * Cross-field checks run on a survey after its fields have been decoded.
 */

import type { DiagnosticSink } from '../diagnostics/DiagnosticSink.js';
import { noopSink } from '../diagnostics/DiagnosticSink.js';
import { EchoXmlError } from '../types/errors.js';
import type { PlateSurveyRecord } from '../survey/schema.js';

/** Data format version the reader has been checked against. */
export const SUPPORTED_FORMAT_VERSION = 1;

export type RuleSeverity = 'error' | 'warning';

export interface RuleContext {
  expectedFormatVersion: number;
}

export interface RuleViolation {
  ruleId: string;
  severity: RuleSeverity;
  message: string;
  details: Record<string, unknown>;
}

export interface SurveyRule {
  id: string;
  severity: RuleSeverity;
  /** Returns a violation message and details, or null when the rule holds */
  check(survey: PlateSurveyRecord, context: RuleContext): { message: string; details: Record<string, unknown> } | null;
}

export const wellCountRule: SurveyRule = {
  id: 'WELL_COUNT',
  severity: 'error',
  check(survey) {
    if (survey.wells.length === survey.survey_total_wells) return null;
    return {
      message: `Number of well data items (${survey.wells.length}) does not match reported (${survey.survey_total_wells})`,
      details: { wells: survey.wells.length, survey_total_wells: survey.survey_total_wells },
    };
  },
};

export const formatVersionRule: SurveyRule = {
  id: 'FORMAT_VERSION',
  severity: 'warning',
  check(survey, context) {
    if (survey.data_format_version === context.expectedFormatVersion) return null;
    return {
      message:
        `Unexpected data format version ${survey.data_format_version}.` +
        ` This library has been tested on version ${context.expectedFormatVersion}.`,
      details: { data_format_version: survey.data_format_version, expected: context.expectedFormatVersion },
    };
  },
};

export const SURVEY_RULES: readonly SurveyRule[] = [wellCountRule, formatVersionRule];

export interface ValidateSurveyOptions {
  sink?: DiagnosticSink;
  expectedFormatVersion?: number;
}

/**
 * Run every rule. Error-severity violations throw SCHEMA_VIOLATION; warnings go
 * to the sink and are returned.
 */
export function validateSurvey(
  survey: PlateSurveyRecord,
  options: ValidateSurveyOptions = {},
  rules: readonly SurveyRule[] = SURVEY_RULES
): RuleViolation[] {
  const sink = options.sink ?? noopSink;
  const context: RuleContext = {
    expectedFormatVersion: options.expectedFormatVersion ?? SUPPORTED_FORMAT_VERSION,
  };

  const violations: RuleViolation[] = [];
  for (const rule of rules) {
    const found = rule.check(survey, context);
    if (found) violations.push({ ruleId: rule.id, severity: rule.severity, ...found });
  }

  const firstError = violations.find((v) => v.severity === 'error');
  if (firstError) {
    throw new EchoXmlError('SCHEMA_VIOLATION', firstError.message, { element: 'platesurvey' });
  }

  const warnings = violations.filter((v) => v.severity === 'warning');
  for (const warning of warnings) {
    sink.warn(warning.message, { code: warning.ruleId, ...warning.details });
  }
  return warnings;
}
