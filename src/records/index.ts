/**
 * Record wrappers and mapping of decoded bodies.
 */

export * from './Compound.js';
export * from './Substance.js';
export * from './Assay.js';
export * from './RecordMapper.js';
export * from './structure.js';
export * from './enums.js';
export * from './info.js';
export type { LinkedIdentifierKind, LookupDomain, SupplementalLookup } from './lookup.js';
export { LazyProperties, memoizeAsync } from './LazyProperties.js';
export type { Extractors } from './LazyProperties.js';
export { elementSymbol, propertyTag } from './tables.js';
