/**
 * Lookup tables shipped as JSON: element symbols by atomic number, and
 * camelCase property names to PUG REST property tags.
 */

import { z } from 'zod';
import elementsJson from './elements.json' with { type: 'json' };
import propertyMapJson from './propertyMap.json' with { type: 'json' };

const StringTableSchema = z.record(z.string(), z.string());

const ELEMENTS: Readonly<Record<string, string>> = Object.freeze(StringTableSchema.parse(elementsJson));
const PROPERTY_MAP: Readonly<Record<string, string>> = Object.freeze(StringTableSchema.parse(propertyMapJson));

/**
 * Element symbol for an atomic number, or undefined outside the table.
 */
export function elementSymbol(atomicNumber: number): string | undefined {
  return ELEMENTS[String(atomicNumber)];
}

/**
 * PUG REST tag for a property name. Names not in the table pass through,
 * so both `molecularWeight` and `MolecularWeight` work.
 */
export function propertyTag(name: string): string {
  return PROPERTY_MAP[name] ?? name;
}
