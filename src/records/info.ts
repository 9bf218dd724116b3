/**
 * Reading values out of PUG REST info-data lists (`props`, conformer `data`).
 *
 * Each entry carries a URN (label, name, implementation) and a value object
 * with a single typed slot.
 */

import type { InfoData, Urn } from './schemas.js';

export interface UrnQuery {
  label?: string;
  /** One name, or alternatives accepted in order of preference */
  name?: string | readonly string[];
  implementation?: string;
}

export type InfoValue = string | number | string[] | number[];

function urnMatches(urn: Urn, query: UrnQuery): boolean {
  if (query.label !== undefined && urn.label !== query.label) return false;
  if (query.implementation !== undefined && urn.implementation !== query.implementation) return false;
  if (query.name !== undefined) {
    const names: readonly string[] = typeof query.name === 'string' ? [query.name] : query.name;
    if (urn.name === undefined || !names.includes(urn.name)) return false;
  }
  return true;
}

function valueOf(entry: InfoData): InfoValue | undefined {
  const { sval, fval, ival, binary, slist, fvec, ivec } = entry.value;
  return sval ?? fval ?? ival ?? binary ?? slist ?? fvec ?? ivec;
}

/**
 * Value of the first entry matching the query. With alternative names, an
 * earlier name wins over a later one.
 */
export function findInfoValue(list: readonly InfoData[] | undefined, query: UrnQuery): InfoValue | undefined {
  if (!list) return undefined;
  const names = typeof query.name === 'string' || query.name === undefined ? [query.name] : query.name;
  for (const name of names) {
    const single: UrnQuery = { ...query, name };
    const hit = list.find((entry) => urnMatches(entry.urn, single));
    if (hit) return valueOf(hit);
  }
  return undefined;
}

export function describeQuery(query: UrnQuery): string {
  const name = typeof query.name === 'string' ? query.name : query.name?.join('|');
  return [query.label, name, query.implementation].filter((part) => part !== undefined).join(' ');
}
