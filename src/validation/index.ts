export * from './SurveyRules.js';
