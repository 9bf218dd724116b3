/**
 * Tests for Compound mapping and properties.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Compound } from './Compound.js';
import { mapRecords } from './RecordMapper.js';
import type { LinkedIdentifierKind, LookupDomain, SupplementalLookup } from './lookup.js';
import { decodeResponse } from '../decode/ResponseDecoder.js';
import { MalformedRecordError, UnsupportedOperationError } from '../core/errors.js';
import { readPath } from '../core/guards.js';

const here = dirname(fileURLToPath(import.meta.url));
const aspirinJson = readFileSync(join(here, 'fixtures', 'aspirin-2244.json'), 'utf-8');

function decodeAspirin(lookup?: SupplementalLookup): Compound {
  const decoded = decodeResponse({ status: 200, body: new TextEncoder().encode(aspirinJson) }, 'JSON');
  const [compound] = mapRecords(decoded, 'compound', lookup);
  if (!compound) throw new Error('fixture has no compound');
  return compound;
}

class StubLookup implements SupplementalLookup {
  calls: string[] = [];
  failures = 0;

  async lookupSynonyms(domain: LookupDomain, id: number): Promise<string[]> {
    this.calls.push(`synonyms ${domain} ${id}`);
    if (this.failures > 0) {
      this.failures -= 1;
      throw new Error('offline');
    }
    return ['aspirin', 'acetylsalicylic acid'];
  }

  async lookupLinkedIdentifiers(domain: LookupDomain, id: number, kind: LinkedIdentifierKind): Promise<number[]> {
    this.calls.push(`${kind} ${domain} ${id}`);
    return [101, 102];
  }

  async lookupCompound(cid: number): Promise<Compound> {
    throw new Error(`unexpected compound lookup ${cid}`);
  }
}

const WATER_3D = {
  id: { id: { cid: 962 } },
  atoms: { aid: [1, 2, 3], element: [8, 1, 1], charge: [{ aid: 1, value: -1 }] },
  bonds: { aid1: [1, 1], aid2: [2, 3], order: [1, 1] },
  coords: [
    {
      type: [2, 5, 255],
      aid: [1, 2, 3],
      conformers: [
        {
          x: [0, 0.96, -0.24],
          y: [0, 0, 0.93],
          z: [0, 0, 0],
          style: { annotation: [5], aid1: [3], aid2: [1] },
          data: [
            { urn: { label: 'Shape', name: 'Volume' }, value: { fval: 20.1 } },
            { urn: { label: 'Conformer', name: 'ID' }, value: { sval: '000003C200000001' } },
            { urn: { label: 'Shape', name: 'Multipoles' }, value: { fvec: [20.1, 0.5] } },
            { urn: { label: 'Fingerprint', name: 'Shape' }, value: { slist: ['10 1', '20 2'] } },
          ],
        },
      ],
      data: [{ urn: { label: 'Conformer', name: 'RMSD' }, value: { fval: 0.4 } }],
    },
  ],
  props: [
    { urn: { label: 'SMILES', name: 'Canonical' }, value: { sval: 'O' } },
    { urn: { label: 'SMILES', name: 'Isomeric' }, value: { sval: '[OH2]' } },
    { urn: { label: 'Molecular Weight' }, value: { fval: 18.015 } },
  ],
};

describe('Compound (aspirin fixture)', () => {
  let aspirin: Compound;

  beforeEach(() => {
    aspirin = decodeAspirin();
  });

  it('reads identifiers and names', () => {
    expect(aspirin.cid).toBe(2244);
    expect(aspirin.molecularFormula).toBe('C9H8O4');
    expect(aspirin.iupacName).toBe('2-acetyloxybenzoic acid');
    expect(aspirin.inchikey).toBe('BSYNRYMUTXBXSQ-UHFFFAOYSA-N');
    expect(aspirin.inchi).toBe('InChI=1S/C9H8O4/c1-6(10)13-8-5-3-2-4-7(8)9(11)12/h2-5H,1H3,(H,11,12)');
  });

  it('accepts the Connectivity and Absolute SMILES labels', () => {
    expect(aspirin.canonicalSmiles).toBe('CC(=O)OC1=CC=CC=C1C(=O)O');
    expect(aspirin.isomericSmiles).toBe('CC(=O)OC1=CC=CC=C1C(=O)O');
  });

  it('parses masses given as strings', () => {
    expect(aspirin.molecularWeight).toBe(180.16);
    expect(aspirin.exactMass).toBe(180.04225873);
    expect(aspirin.monoisotopicMass).toBe(180.04225873);
  });

  it('reads computed descriptors', () => {
    expect(aspirin.xlogp).toBe(1.2);
    expect(aspirin.tpsa).toBe(63.6);
    expect(aspirin.complexity).toBe(212);
    expect(aspirin.hBondDonorCount).toBe(1);
    expect(aspirin.hBondAcceptorCount).toBe(4);
    expect(aspirin.rotatableBondCount).toBe(3);
    expect(aspirin.heavyAtomCount).toBe(13);
    expect(aspirin.covalentUnitCount).toBe(1);
    expect(aspirin.atomStereoCount).toBe(0);
    expect(aspirin.charge).toBe(0);
  });

  it('leaves absent optional properties undefined', () => {
    expect(aspirin.volume3d).toBeUndefined();
    expect(aspirin.conformerRmsd3d).toBeUndefined();
    expect(aspirin.effectiveRotorCount3d).toBeUndefined();
    expect(aspirin.pharmacophoreFeatures3d).toBeUndefined();
  });

  it('builds atoms and bonds', () => {
    expect(aspirin.coordinateType).toBe('2d');
    expect(aspirin.atoms).toHaveLength(21);
    expect(aspirin.elements).toEqual([
      'O', 'O', 'O', 'O',
      'C', 'C', 'C', 'C', 'C', 'C', 'C', 'C', 'C',
      'H', 'H', 'H', 'H', 'H', 'H', 'H', 'H',
    ]);
    expect(aspirin.atoms[0]?.toDict()).toEqual({ aid: 1, number: 8, element: 'O', x: 3.732, y: -0.06 });
    expect(aspirin.atoms[0]?.coordinateType).toBe('2d');

    expect(aspirin.bonds).toHaveLength(21);
    expect(aspirin.bonds[0]?.toDict()).toEqual({ aid1: 1, aid2: 5, order: 1 });
    expect(aspirin.bonds[4]?.toDict()).toEqual({ aid1: 3, aid2: 11, order: 2 });
  });

  it('returns frozen structure lists', () => {
    expect(Object.isFrozen(aspirin.elements)).toBe(true);
    expect(Object.isFrozen(aspirin.atoms)).toBe(true);
    expect(aspirin.elements).toBe(aspirin.elements);
    expect(aspirin.elements).toHaveLength(21);
  });

  it('expands the CACTVS fingerprint to 881 bits', () => {
    const bits = aspirin.cactvsFingerprint;
    expect(bits).toHaveLength(881);
    expect(bits?.[0]).toBe('1');
    expect(bits?.[880]).toBe('1');
    expect(bits?.split('').filter((bit) => bit === '1')).toHaveLength(2);
  });

  it('computes properties on first access only', () => {
    expect(aspirin.isComputed('molecularFormula')).toBe(false);
    expect(aspirin.molecularFormula).toBe('C9H8O4');
    expect(aspirin.isComputed('molecularFormula')).toBe(true);
  });

  it('gives equal but distinct objects for two decodes', () => {
    const again = decodeAspirin();
    expect(again).not.toBe(aspirin);
    expect(again.record).not.toBe(aspirin.record);
    expect(again.equals(aspirin)).toBe(true);
  });

  it('freezes the record', () => {
    expect(Object.isFrozen(aspirin.record)).toBe(true);
    expect(Object.isFrozen(aspirin.record.atoms.aid)).toBe(true);
  });

  it('renders selected properties', () => {
    expect(aspirin.toDict(['cid', 'molecularFormula', 'molecularWeight'])).toEqual({
      cid: 2244,
      molecularFormula: 'C9H8O4',
      molecularWeight: 180.16,
    });
    const all = aspirin.toDict();
    expect(all.heavyAtomCount).toBe(13);
    expect(Array.isArray(all.atoms)).toBe(true);
    expect(all).not.toHaveProperty('synonyms');
  });
});

describe('Compound (3D record)', () => {
  const water = Compound.fromRecord(WATER_3D);

  it('reads 3D coordinates, charges and bond styles', () => {
    expect(water.coordinateType).toBe('3d');
    expect(water.atoms[0]?.charge).toBe(-1);
    expect(water.atoms[0]?.coordinateType).toBe('3d');
    expect(water.atoms[1]?.x).toBe(0.96);
    expect(water.bonds[0]?.style).toBeUndefined();
    expect(water.bonds[1]?.style).toBe(5);
  });

  it('prefers the Canonical and Isomeric SMILES labels', () => {
    expect(water.canonicalSmiles).toBe('O');
    expect(water.isomericSmiles).toBe('[OH2]');
    expect(water.molecularWeight).toBe(18.015);
  });

  it('reads conformer data', () => {
    expect(water.volume3d).toBe(20.1);
    expect(water.conformerId3d).toBe('000003C200000001');
    expect(water.multipoles3d).toEqual([20.1, 0.5]);
    expect(water.shapeFingerprint3d).toEqual(['10 1', '20 2']);
    expect(water.conformerRmsd3d).toBe(0.4);
  });

  it('has no counts or formula', () => {
    expect(water.heavyAtomCount).toBeUndefined();
    expect(water.molecularFormula).toBeUndefined();
    expect(water.cactvsFingerprint).toBeUndefined();
  });
});

describe('Compound (malformed records)', () => {
  it('rejects atom lists of different lengths', () => {
    expect(() => Compound.fromRecord({ id: { id: { cid: 5 } }, atoms: { aid: [1, 2], element: [6] } })).toThrow(
      'Malformed compound record CID 5: atom ids and elements differ in length'
    );
  });

  it('rejects coordinates that do not cover every atom', () => {
    const record = {
      atoms: { aid: [1, 2], element: [6, 8] },
      coords: [{ type: [1], aid: [1], conformers: [{ x: [0], y: [0] }] }],
    };
    expect(() => Compound.fromRecord(record)).toThrow(MalformedRecordError);
  });

  it('names the failing record in a list', () => {
    const fixtureValue: unknown = JSON.parse(aspirinJson);
    const fixtureRecords = readPath(fixtureValue, ['PC_Compounds']);
    const first: unknown = Array.isArray(fixtureRecords) ? fixtureRecords[0] : undefined;
    const decoded = {
      kind: 'json' as const,
      value: { PC_Compounds: [first, { id: { id: { cid: 7 } }, atoms: { aid: 'x' } }] },
    };
    try {
      mapRecords(decoded, 'compound');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedRecordError);
      if (err instanceof MalformedRecordError) {
        expect(err.identifier).toBe(7);
        expect(err.index).toBe(1);
        expect(err.message).toBe('Malformed compound record CID 7 at position 1: record does not match the compound layout');
        expect(err.issues.length).toBeGreaterThan(0);
      }
    }
  });

  it('rejects a property of the wrong type on access', () => {
    const compound = Compound.fromRecord({
      atoms: { aid: [1], element: [6] },
      props: [{ urn: { label: 'Molecular Formula' }, value: { fval: 3 } }],
    });
    expect(() => compound.molecularFormula).toThrow(MalformedRecordError);
  });
});

describe('Compound (supplemental lookups)', () => {
  it('fetches synonyms once', async () => {
    const lookup = new StubLookup();
    const aspirin = decodeAspirin(lookup);

    expect(await aspirin.synonyms()).toEqual(['aspirin', 'acetylsalicylic acid']);
    await aspirin.synonyms();

    expect(lookup.calls).toEqual(['synonyms compound 2244']);
  });

  it('retries after a failed fetch', async () => {
    const lookup = new StubLookup();
    lookup.failures = 1;
    const aspirin = decodeAspirin(lookup);

    await expect(aspirin.synonyms()).rejects.toThrow('offline');
    await expect(aspirin.synonyms()).resolves.toEqual(['aspirin', 'acetylsalicylic acid']);
    expect(lookup.calls).toHaveLength(2);
  });

  it('fetches linked SIDs and AIDs', async () => {
    const lookup = new StubLookup();
    const aspirin = decodeAspirin(lookup);

    expect(await aspirin.sids()).toEqual([101, 102]);
    expect(await aspirin.aids()).toEqual([101, 102]);
    expect(lookup.calls).toEqual(['sids compound 2244', 'aids compound 2244']);
  });

  it('needs a client for lookups', async () => {
    await expect(decodeAspirin().synonyms()).rejects.toBeInstanceOf(UnsupportedOperationError);
  });

  it('returns nothing for records without a CID', async () => {
    const lookup = new StubLookup();
    const compound = Compound.fromRecord({ atoms: { aid: [1], element: [6] } }, { lookup });
    expect(await compound.synonyms()).toEqual([]);
    expect(lookup.calls).toEqual([]);
  });
});
