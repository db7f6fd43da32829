/**
 * @apimeta/types - Data model for the apimeta definition compiler
 */

export * from './typeReference.js';
export * from './declarations.js';
export * from './metadata.js';
