export * from './tree.js';
export * from './schema.js';
export * from './XmlMapper.js';
