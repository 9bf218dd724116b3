/**
 * Record Mapper - turns decoded bodies into domain objects and plain rows.
 *
 * Record lists are all-or-nothing: the first malformed record aborts the
 * whole list with a MalformedRecordError naming its position.
 */

import { MalformedRecordError, ResponseParseError, type RecordKind } from '../core/errors.js';
import { deepFreeze, isRecord } from '../core/guards.js';
import type { DecodedBody } from '../decode/ResponseDecoder.js';
import { Assay } from './Assay.js';
import { Compound } from './Compound.js';
import type { SupplementalLookup } from './lookup.js';
import {
  CONTAINER_KEYS,
  IdentifierInformationSchema,
  IdentifierListSchema,
  InformationListSchema,
  PropertyTableSchema,
  SynonymInformationSchema,
} from './schemas.js';
import { Substance } from './Substance.js';

export type PropertyValue = string | number;
export type PropertyRow = Readonly<Record<string, PropertyValue>>;
export type IdentifierKey = 'CID' | 'SID' | 'AID';

export interface SynonymEntry {
  /** The CID, SID or AID the synonyms belong to */
  id: number | undefined;
  synonyms: string[];
}

function expectJson(decoded: DecodedBody, what: string): unknown {
  if (decoded.kind !== 'json') {
    throw new ResponseParseError(`Expected a JSON ${what} response, got ${decoded.kind}`);
  }
  return decoded.value;
}

function recordList(decoded: DecodedBody, kind: RecordKind): unknown[] {
  const value = expectJson(decoded, `${kind} record`);
  const key = CONTAINER_KEYS[kind];
  const list = isRecord(value) ? value[key] : undefined;
  if (!Array.isArray(list)) {
    throw new MalformedRecordError(`response has no ${key} list`, { kind });
  }
  return list;
}

export function mapRecords(decoded: DecodedBody, kind: 'compound', lookup?: SupplementalLookup): Compound[];
export function mapRecords(decoded: DecodedBody, kind: 'substance', lookup?: SupplementalLookup): Substance[];
export function mapRecords(decoded: DecodedBody, kind: 'assay'): Assay[];
export function mapRecords(
  decoded: DecodedBody,
  kind: RecordKind,
  lookup?: SupplementalLookup
): Array<Compound | Substance | Assay> {
  const list = recordList(decoded, kind);
  return list.map((raw, index) => {
    switch (kind) {
      case 'compound':
        return Compound.fromRecord(raw, { lookup, index });
      case 'substance':
        return Substance.fromRecord(raw, { lookup, index });
      case 'assay':
        return Assay.fromRecord(raw, { index });
    }
  });
}

const NUMERIC_CELL = /^-?\d+(?:\.\d+)?(?:[eE][-+]?\d+)?$/;

function coerceCell(value: PropertyValue): PropertyValue {
  return typeof value === 'string' && NUMERIC_CELL.test(value) ? Number(value) : value;
}

/**
 * Rows of a property table, from a JSON `PropertyTable` or a CSV table.
 * Numeric text becomes a number; empty CSV cells are left out.
 */
export function mapPropertyRows(decoded: DecodedBody): PropertyRow[] {
  if (decoded.kind === 'table') {
    return decoded.rows.map((cells) => {
      const row: Record<string, PropertyValue> = {};
      decoded.header.forEach((column, i) => {
        const cell = cells[i];
        if (cell !== undefined && cell !== '') row[column] = coerceCell(cell);
      });
      return Object.freeze(row);
    });
  }

  const parsed = PropertyTableSchema.safeParse(expectJson(decoded, 'property table'));
  if (!parsed.success) {
    throw new ResponseParseError('Response has no PropertyTable', { cause: parsed.error });
  }
  return parsed.data.PropertyTable.Properties.map((properties) => {
    const row: Record<string, PropertyValue> = {};
    for (const [column, value] of Object.entries(properties)) {
      row[column] = coerceCell(value);
    }
    return Object.freeze(row);
  });
}

function informationEntries(decoded: DecodedBody): Array<Record<string, unknown>> {
  const parsed = InformationListSchema.safeParse(expectJson(decoded, 'information list'));
  if (!parsed.success) {
    throw new ResponseParseError('Response has no InformationList', { cause: parsed.error });
  }
  return parsed.data.InformationList.Information ?? [];
}

/**
 * Identifiers of one kind, in response order. Reads an `IdentifierList`,
 * the per-input lists of an `InformationList`, or TXT rows.
 */
export function mapIdentifierList(decoded: DecodedBody, key: IdentifierKey): number[] {
  if (decoded.kind === 'table') {
    return decoded.rows.map(([cell]) => {
      const id = Number(cell);
      if (cell === undefined || !Number.isSafeInteger(id)) {
        throw new ResponseParseError(`Expected one ${key} per line, got '${cell ?? ''}'`);
      }
      return id;
    });
  }

  const value = expectJson(decoded, 'identifier list');
  const list = IdentifierListSchema.safeParse(value);
  if (list.success) {
    return list.data.IdentifierList[key] ?? [];
  }

  const ids: number[] = [];
  for (const [index, entry] of informationEntries(decoded).entries()) {
    const parsed = IdentifierInformationSchema.safeParse(entry);
    if (!parsed.success) {
      throw new ResponseParseError(`Malformed information entry at position ${index}`, { cause: parsed.error });
    }
    const found = parsed.data[key];
    if (found !== undefined) ids.push(...(typeof found === 'number' ? [found] : found));
  }
  return ids;
}

/**
 * Synonym lists, one entry per input identifier.
 */
export function mapSynonyms(decoded: DecodedBody): SynonymEntry[] {
  return informationEntries(decoded).map((entry, index) => {
    const parsed = SynonymInformationSchema.safeParse(entry);
    if (!parsed.success) {
      throw new ResponseParseError(`Malformed synonym entry at position ${index}`, { cause: parsed.error });
    }
    const { CID, SID, AID, Synonym } = parsed.data;
    return { id: CID ?? SID ?? AID, synonyms: Synonym };
  });
}

/**
 * Raw `InformationList` entries (titles, descriptions), frozen.
 */
export function mapInformation(decoded: DecodedBody): ReadonlyArray<Readonly<Record<string, unknown>>> {
  return informationEntries(decoded).map((entry) => deepFreeze(entry));
}

/**
 * Depositor names from a sources listing.
 */
export function mapSourceNames(decoded: DecodedBody): string[] {
  const parsed = InformationListSchema.safeParse(expectJson(decoded, 'sources'));
  const names = parsed.success ? parsed.data.InformationList.SourceName : undefined;
  if (!names) {
    throw new ResponseParseError('Response has no SourceName list');
  }
  return names;
}
