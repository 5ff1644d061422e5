/**
 * echo-plate-xml: typed reader/writer for acoustic liquid handler labware
 * definitions and plate surveys.
 *
 * This is the main entry point for the library.
 */

// Errors
export * from './types/errors.js';

// Scalar codecs
export * from './codec/index.js';

// Element trees and the field-table mapping engine
export * from './xml/index.js';

// Labware definitions (ELWX / ELW)
export * from './labware/index.js';

// Plate surveys
export * from './survey/index.js';

// Cross-field validation
export * from './validation/index.js';

// Tabular projection
export * from './table/index.js';

// Diagnostics and configuration
export * from './diagnostics/index.js';
export * from './config/index.js';
