export * from './binary.js';
export * from './guid.js';
export * from './attributeBlobs.js';
