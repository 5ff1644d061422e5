/**
 * Configuration types for the labware and survey reader/writer.
 *
 * These types define the structure of echo-xml.yaml.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/**
 * Top-level configuration.
 */
export interface EchoXmlConfig {
  logging: LoggingConfig;
  xml: XmlOutputConfig;
  survey: SurveyConfig;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Log level (default: 'info') */
  level: LogLevel;
}

/**
 * How written XML is laid out.
 */
export interface XmlOutputConfig {
  /** Write an XML declaration (default: true) */
  declaration: boolean;
  /** Spaces per nesting level, 0 for a single line (default: 2) */
  indent: number;
}

/**
 * Survey reading and writing.
 */
export interface SurveyConfig {
  /** Data format version accepted without a warning (default: 1) */
  expectedFormatVersion: number;
  /** Default output path template, e.g. "surveys/{plate_type}-{plate_barcode}.xml" */
  pathTemplate?: string;
}

export const DEFAULT_CONFIG: EchoXmlConfig = {
  logging: {
    level: 'info',
  },
  xml: {
    declaration: true,
    indent: 2,
  },
  survey: {
    expectedFormatVersion: 1,
  },
};
