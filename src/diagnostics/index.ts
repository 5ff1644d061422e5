export * from './DiagnosticSink.js';
