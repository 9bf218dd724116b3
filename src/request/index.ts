/**
 * Request vocabulary, identifier resolution and request building.
 */

export * from './vocabulary.js';
export * from './IdentifierResolver.js';
export * from './RequestBuilder.js';
