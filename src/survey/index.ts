export * from './schema.js';
export * from './EchoPlateSurvey.js';
