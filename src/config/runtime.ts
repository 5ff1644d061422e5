/**
 * Process-wide wiring: the one place a logger is created from configuration.
 */

import { pino } from 'pino';
import type { DestinationStream, Logger } from 'pino';
import { createLoggerSink } from '../diagnostics/DiagnosticSink.js';
import type { DiagnosticSink } from '../diagnostics/DiagnosticSink.js';
import type { LabwareReadOptions } from '../labware/Labware.js';
import type {
  EchoPlateSurvey,
  SurveyDestination,
  SurveyReadOptions,
  SurveyWriteOptions,
} from '../survey/EchoPlateSurvey.js';
import type { EchoXmlConfig } from './types.js';

export interface Runtime {
  config: EchoXmlConfig;
  logger: Logger;
  sink: DiagnosticSink;
  labwareReadOptions: LabwareReadOptions;
  surveyReadOptions: SurveyReadOptions;
  writeOptions: SurveyWriteOptions;
  /** Write a survey to `destination`, or to the configured path template */
  writeSurvey(survey: EchoPlateSurvey, destination?: SurveyDestination): Promise<string>;
}

export function createRuntime(config: EchoXmlConfig, stream?: DestinationStream): Runtime {
  const options = { name: 'echo-plate-xml', level: config.logging.level };
  const logger = stream ? pino(options, stream) : pino(options);
  const sink = createLoggerSink(logger);
  const writeOptions: SurveyWriteOptions = {
    declaration: config.xml.declaration,
    indent: config.xml.indent,
  };
  return {
    config,
    logger,
    sink,
    labwareReadOptions: { sink },
    surveyReadOptions: {
      sink,
      expectedFormatVersion: config.survey.expectedFormatVersion,
    },
    writeOptions,
    async writeSurvey(survey, destination) {
      const target = destination ?? config.survey.pathTemplate;
      if (target === undefined) {
        throw new Error('No destination given and survey.pathTemplate is not configured');
      }
      const path = await survey.write(target, writeOptions);
      logger.info({ path, plate_type: survey.data.plate_type }, 'Wrote plate survey');
      return path;
    },
  };
}
