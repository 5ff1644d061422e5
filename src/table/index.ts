export * from './Table.js';
