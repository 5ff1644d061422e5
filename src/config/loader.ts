/**
 * Configuration loader.
 *
 * Loads config from a YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { EchoXmlConfig, LoggingConfig, SurveyConfig, XmlOutputConfig } from './types.js';
import { DEFAULT_CONFIG, LOG_LEVELS } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.ECHO_XML_CONFIG or './echo-xml.yaml') */
  configPath?: string;
  /** Environment used for ${VAR} substitution (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Substitute environment variables in a string. Unset variables without a
 * default become an empty string.
 */
function substituteEnvVars(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    return env[varName] ?? defaultValue ?? '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
export function substituteEnvVarsRecursive(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVarsRecursive(item, env));
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value, env);
    }
    return result;
  }
  return obj;
}

/**
 * YAML scalars may arrive as strings after substitution ("${INDENT:-2}").
 */
function coerceNumber(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return value;
}

function coerceBoolean(value: unknown): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

function section(config: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = config[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ConfigValidationError('must be an object', key, value);
  }
  return value;
}

function isLogLevel(value: unknown): value is LoggingConfig['level'] {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Validate logging configuration.
 */
function readLoggingConfig(c: Record<string, unknown>, path = 'logging'): LoggingConfig {
  const result = { ...DEFAULT_CONFIG.logging };
  if (c.level !== undefined) {
    if (!isLogLevel(c.level)) {
      throw new ConfigValidationError(`level must be one of: ${LOG_LEVELS.join(', ')}`, `${path}.level`, c.level);
    }
    result.level = c.level;
  }
  return result;
}

/**
 * Validate XML output configuration.
 */
function readXmlConfig(c: Record<string, unknown>, path = 'xml'): XmlOutputConfig {
  const result = { ...DEFAULT_CONFIG.xml };
  const declaration = coerceBoolean(c.declaration);
  if (declaration !== undefined) {
    if (typeof declaration !== 'boolean') {
      throw new ConfigValidationError('declaration must be a boolean', `${path}.declaration`, c.declaration);
    }
    result.declaration = declaration;
  }
  const indent = coerceNumber(c.indent);
  if (indent !== undefined) {
    if (typeof indent !== 'number' || !Number.isInteger(indent) || indent < 0 || indent > 8) {
      throw new ConfigValidationError('indent must be an integer between 0 and 8', `${path}.indent`, c.indent);
    }
    result.indent = indent;
  }
  return result;
}

/**
 * Validate survey configuration.
 */
function readSurveyConfig(c: Record<string, unknown>, path = 'survey'): SurveyConfig {
  const result: SurveyConfig = { ...DEFAULT_CONFIG.survey };
  const version = coerceNumber(c.expectedFormatVersion);
  if (version !== undefined) {
    if (typeof version !== 'number' || !Number.isInteger(version)) {
      throw new ConfigValidationError(
        'expectedFormatVersion must be an integer',
        `${path}.expectedFormatVersion`,
        c.expectedFormatVersion
      );
    }
    result.expectedFormatVersion = version;
  }
  if (c.pathTemplate !== undefined && c.pathTemplate !== '') {
    if (typeof c.pathTemplate !== 'string') {
      throw new ConfigValidationError('pathTemplate must be a string', `${path}.pathTemplate`, c.pathTemplate);
    }
    result.pathTemplate = c.pathTemplate;
  }
  return result;
}

/**
 * Validate a parsed config document and merge it over the defaults.
 */
export function resolveConfig(config: unknown): EchoXmlConfig {
  if (config === undefined || config === null) {
    return structuredClone(DEFAULT_CONFIG);
  }
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }
  return {
    logging: readLoggingConfig(section(config, 'logging')),
    xml: readXmlConfig(section(config, 'xml')),
    survey: readSurveyConfig(section(config, 'survey')),
  };
}

/**
 * Load configuration from a YAML file. A missing file yields the defaults.
 *
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<EchoXmlConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env.ECHO_XML_CONFIG ?? './echo-xml.yaml';
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    return structuredClone(DEFAULT_CONFIG);
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }

  return resolveConfig(substituteEnvVarsRecursive(parsed, env));
}
