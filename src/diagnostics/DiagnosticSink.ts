/**
 * Side channel for non-fatal conditions found while reading documents.
 *
 * Core code only sees this interface. The process-wide logger is created once,
 * by createRuntime(), and adapted here.
 */

import type { Logger } from 'pino';

export type DiagnosticContext = Record<string, unknown>;

export interface DiagnosticSink {
  debug(message: string, context?: DiagnosticContext): void;
  warn(message: string, context?: DiagnosticContext): void;
}

export const noopSink: DiagnosticSink = {
  debug: () => undefined,
  warn: () => undefined,
};

export function createLoggerSink(logger: Logger): DiagnosticSink {
  return {
    debug: (message, context = {}) => logger.debug(context, message),
    warn: (message, context = {}) => logger.warn(context, message),
  };
}

export interface RecordedDiagnostic {
  level: 'debug' | 'warn';
  message: string;
  context: DiagnosticContext;
}

/**
 * Sink that keeps every diagnostic in memory, for callers that report them
 * after a batch rather than logging as they go.
 */
export class CollectingSink implements DiagnosticSink {
  readonly entries: RecordedDiagnostic[] = [];

  debug(message: string, context: DiagnosticContext = {}): void {
    this.entries.push({ level: 'debug', message, context });
  }

  warn(message: string, context: DiagnosticContext = {}): void {
    this.entries.push({ level: 'warn', message, context });
  }

  warnings(): RecordedDiagnostic[] {
    return this.entries.filter((e) => e.level === 'warn');
  }
}
