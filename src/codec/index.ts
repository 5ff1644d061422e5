export * from './types.js';
export * from './scalars.js';
export { VendorTimestamp } from './VendorTimestamp.js';
