export * from './PlateInfo.js';
export * from './LabwareDocument.js';
export * from './Labware.js';
