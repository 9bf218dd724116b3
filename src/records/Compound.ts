/**
 * Compound - one record of the PubChem Compound database.
 *
 * Atoms and bonds are built (and checked) when the record is mapped; every
 * other property is read from the record on first access and memoized.
 * Synonyms, SIDs and AIDs need another request and go through the client.
 */

import { isDeepStrictEqual } from 'node:util';
import { MalformedRecordError, UnsupportedOperationError } from '../core/errors.js';
import { deepFreeze, readPath } from '../core/guards.js';
import { CoordinateType } from './enums.js';
import { describeQuery, findInfoValue, type UrnQuery } from './info.js';
import { LazyProperties, memoizeAsync, type Extractors } from './LazyProperties.js';
import type { SupplementalLookup } from './lookup.js';
import { CompoundRecordSchema, type CompoundRecord, type ConformerRecord, type InfoData } from './schemas.js';
import { Atom, Bond, bondKey, type AtomInit, type BondInit } from './structure.js';

export interface CompoundProperties {
  cid: number | undefined;
  elements: readonly (string | undefined)[];
  atoms: readonly Atom[];
  bonds: readonly Bond[];
  charge: number;
  coordinateType: '2d' | '3d' | undefined;
  molecularFormula: string | undefined;
  molecularWeight: number | undefined;
  canonicalSmiles: string | undefined;
  isomericSmiles: string | undefined;
  inchi: string | undefined;
  inchikey: string | undefined;
  iupacName: string | undefined;
  xlogp: number | undefined;
  exactMass: number | undefined;
  monoisotopicMass: number | undefined;
  tpsa: number | undefined;
  complexity: number | undefined;
  hBondDonorCount: number | undefined;
  hBondAcceptorCount: number | undefined;
  rotatableBondCount: number | undefined;
  fingerprint: string | undefined;
  cactvsFingerprint: string | undefined;
  heavyAtomCount: number | undefined;
  isotopeAtomCount: number | undefined;
  atomStereoCount: number | undefined;
  definedAtomStereoCount: number | undefined;
  undefinedAtomStereoCount: number | undefined;
  bondStereoCount: number | undefined;
  definedBondStereoCount: number | undefined;
  undefinedBondStereoCount: number | undefined;
  covalentUnitCount: number | undefined;
  volume3d: number | undefined;
  multipoles3d: number[] | undefined;
  conformerRmsd3d: number | undefined;
  effectiveRotorCount3d: number | undefined;
  pharmacophoreFeatures3d: string[] | undefined;
  mmff94PartialCharges3d: string[] | undefined;
  mmff94Energy3d: number | undefined;
  conformerId3d: string | undefined;
  shapeSelfoverlap3d: number | undefined;
  featureSelfoverlap3d: number | undefined;
  shapeFingerprint3d: string[] | undefined;
}

export type CompoundPropertyName = keyof CompoundProperties;

export const COMPOUND_PROPERTY_NAMES = [
  'cid', 'elements', 'atoms', 'bonds', 'charge', 'coordinateType',
  'molecularFormula', 'molecularWeight', 'canonicalSmiles', 'isomericSmiles', 'inchi', 'inchikey',
  'iupacName', 'xlogp', 'exactMass', 'monoisotopicMass', 'tpsa', 'complexity',
  'hBondDonorCount', 'hBondAcceptorCount', 'rotatableBondCount', 'fingerprint', 'cactvsFingerprint',
  'heavyAtomCount', 'isotopeAtomCount', 'atomStereoCount', 'definedAtomStereoCount',
  'undefinedAtomStereoCount', 'bondStereoCount', 'definedBondStereoCount', 'undefinedBondStereoCount',
  'covalentUnitCount', 'volume3d', 'multipoles3d', 'conformerRmsd3d', 'effectiveRotorCount3d',
  'pharmacophoreFeatures3d', 'mmff94PartialCharges3d', 'mmff94Energy3d', 'conformerId3d',
  'shapeSelfoverlap3d', 'featureSelfoverlap3d', 'shapeFingerprint3d',
] as const satisfies readonly CompoundPropertyName[];

export interface RecordOptions {
  /** Client used for synonyms, SIDs and AIDs */
  lookup?: SupplementalLookup | undefined;
  /** Position of the record in the response, for error messages */
  index?: number | undefined;
}

/** CACTVS substructure keys in a PubChem fingerprint. */
const CACTVS_BITS = 881;

export class Compound {
  /** The validated record, deep-frozen */
  readonly record: CompoundRecord;
  private readonly lookup: SupplementalLookup | undefined;
  private readonly index: number | undefined;
  private readonly structure: { atoms: readonly Atom[]; bonds: readonly Bond[] };
  private readonly props: LazyProperties<CompoundProperties>;

  /**
   * Validate a raw `PC_Compounds` entry and wrap it.
   *
   * @throws MalformedRecordError
   */
  static fromRecord(raw: unknown, options: RecordOptions = {}): Compound {
    const parsed = CompoundRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const cid = readPath(raw, ['id', 'id', 'cid']);
      throw new MalformedRecordError('record does not match the compound layout', {
        kind: 'compound',
        identifier: typeof cid === 'number' ? cid : undefined,
        index: options.index,
        issues: parsed.error.issues.map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`),
      });
    }
    return new Compound(parsed.data, options);
  }

  constructor(record: CompoundRecord, options: RecordOptions = {}) {
    this.record = deepFreeze(record);
    this.lookup = options.lookup;
    this.index = options.index;
    this.structure = this.buildStructure();
    this.props = new LazyProperties<CompoundProperties>(this.extractors());
  }

  // ── Structure ────────────────────────────────────────────────

  private malformed(message: string): MalformedRecordError {
    return new MalformedRecordError(message, {
      kind: 'compound',
      identifier: this.record.id?.id?.cid,
      index: this.index,
    });
  }

  private at<T>(list: readonly T[], i: number, what: string): T {
    const value = list[i];
    if (value === undefined) {
      throw this.malformed(`missing ${what} at position ${i}`);
    }
    return value;
  }

  private get conformer(): ConformerRecord | undefined {
    return this.record.coords?.[0]?.conformers[0];
  }

  private buildStructure(): { atoms: readonly Atom[]; bonds: readonly Bond[] } {
    const { aid, element, charge } = this.record.atoms;
    if (aid.length !== element.length) {
      throw this.malformed('atom ids and elements differ in length');
    }

    const atoms = new Map<number, AtomInit>();
    for (let i = 0; i < aid.length; i += 1) {
      const id = this.at(aid, i, 'atom id');
      atoms.set(id, { aid: id, number: this.at(element, i, 'element') });
    }

    const coords = this.record.coords?.[0];
    const conformer = this.conformer;
    if (coords && conformer) {
      const { x, y } = conformer;
      const z = conformer.z ?? [];
      const ids = coords.aid;
      if (
        ids.length !== x.length ||
        ids.length !== y.length ||
        ids.length !== atoms.size ||
        (z.length > 0 && z.length !== ids.length)
      ) {
        throw this.malformed('atom coordinates do not match the atom list');
      }
      for (let i = 0; i < ids.length; i += 1) {
        const id = this.at(ids, i, 'coordinate atom id');
        const atom = atoms.get(id);
        if (!atom) throw this.malformed(`coordinates reference unknown atom ${id}`);
        atom.x = this.at(x, i, 'x coordinate');
        atom.y = this.at(y, i, 'y coordinate');
        atom.z = z.length > 0 ? this.at(z, i, 'z coordinate') : undefined;
      }
    }

    for (const entry of charge ?? []) {
      const atom = atoms.get(entry.aid);
      if (!atom) throw this.malformed(`charge references unknown atom ${entry.aid}`);
      atom.charge = entry.value;
    }

    const bonds = new Map<string, BondInit>();
    const bondRecord = this.record.bonds;
    if (bondRecord) {
      const { aid1, aid2, order } = bondRecord;
      if (aid1.length !== aid2.length || aid1.length !== order.length) {
        throw this.malformed('bond lists differ in length');
      }
      for (let i = 0; i < aid1.length; i += 1) {
        const a1 = this.at(aid1, i, 'bond atom');
        const a2 = this.at(aid2, i, 'bond atom');
        bonds.set(bondKey(a1, a2), { aid1: a1, aid2: a2, order: this.at(order, i, 'bond order') });
      }
    }

    const style = conformer?.style;
    if (style) {
      for (let i = 0; i < style.annotation.length; i += 1) {
        const a1 = this.at(style.aid1, i, 'style atom');
        const a2 = this.at(style.aid2, i, 'style atom');
        const bond = bonds.get(bondKey(a1, a2));
        if (!bond) throw this.malformed(`style references unknown bond ${a1}-${a2}`);
        bond.style = this.at(style.annotation, i, 'style annotation');
      }
    }

    return {
      atoms: Object.freeze([...atoms.values()].sort((a, b) => a.aid - b.aid).map((init) => new Atom(init))),
      bonds: Object.freeze(
        [...bonds.values()]
          .sort((a, b) => a.aid1 - b.aid1 || a.aid2 - b.aid2)
          .map((init) => new Bond(init))
      ),
    };
  }

  // ── Typed info-data readers ──────────────────────────────────

  private text(list: readonly InfoData[] | undefined, query: UrnQuery): string | undefined {
    const value = findInfoValue(list, query);
    if (value === undefined || typeof value === 'string') return value;
    throw this.malformed(`${describeQuery(query)} is not a string`);
  }

  private numeric(list: readonly InfoData[] | undefined, query: UrnQuery): number | undefined {
    const value = findInfoValue(list, query);
    if (value === undefined || typeof value === 'number') return value;
    if (typeof value === 'string' && value.trim() !== '') {
      const parsed = Number(value);
      if (Number.isFinite(parsed)) return parsed;
    }
    throw this.malformed(`${describeQuery(query)} is not a number`);
  }

  private textList(list: readonly InfoData[] | undefined, query: UrnQuery): string[] | undefined {
    const value = findInfoValue(list, query);
    if (value === undefined) return undefined;
    if (Array.isArray(value)) {
      const strings = value.filter((item): item is string => typeof item === 'string');
      if (strings.length === value.length) return strings;
    }
    throw this.malformed(`${describeQuery(query)} is not a string list`);
  }

  private numberList(list: readonly InfoData[] | undefined, query: UrnQuery): number[] | undefined {
    const value = findInfoValue(list, query);
    if (value === undefined) return undefined;
    if (Array.isArray(value)) {
      const numbers = value.filter((item): item is number => typeof item === 'number');
      if (numbers.length === value.length) return numbers;
    }
    throw this.malformed(`${describeQuery(query)} is not a number list`);
  }

  private count(key: string): number | undefined {
    return this.record.count?.[key];
  }

  private extractors(): Extractors<CompoundProperties> {
    const props = () => this.record.props;
    const conformerData = () => this.conformer?.data;

    return {
      cid: () => this.record.id?.id?.cid,
      elements: () => Object.freeze(this.structure.atoms.map((atom) => atom.element)),
      atoms: () => this.structure.atoms,
      bonds: () => this.structure.bonds,
      charge: () => this.record.charge ?? 0,
      coordinateType: () => {
        const types = this.record.coords?.[0]?.type ?? [];
        if (types.includes(CoordinateType.TWO_D)) return '2d';
        if (types.includes(CoordinateType.THREE_D)) return '3d';
        return undefined;
      },
      molecularFormula: () => this.text(props(), { label: 'Molecular Formula' }),
      molecularWeight: () => this.numeric(props(), { label: 'Molecular Weight' }),
      canonicalSmiles: () => this.text(props(), { label: 'SMILES', name: ['Canonical', 'Connectivity'] }),
      isomericSmiles: () => this.text(props(), { label: 'SMILES', name: ['Isomeric', 'Absolute'] }),
      inchi: () => this.text(props(), { label: 'InChI', name: 'Standard' }),
      inchikey: () => this.text(props(), { label: 'InChIKey', name: 'Standard' }),
      iupacName: () => this.text(props(), { label: 'IUPAC Name', name: 'Preferred' }),
      xlogp: () => this.numeric(props(), { label: 'Log P' }),
      exactMass: () => this.numeric(props(), { label: 'Mass', name: 'Exact' }),
      monoisotopicMass: () => this.numeric(props(), { label: 'Weight', name: 'MonoIsotopic' }),
      tpsa: () => this.numeric(props(), { implementation: 'E_TPSA' }),
      complexity: () => this.numeric(props(), { implementation: 'E_COMPLEXITY' }),
      hBondDonorCount: () => this.numeric(props(), { implementation: 'E_NHDONORS' }),
      hBondAcceptorCount: () => this.numeric(props(), { implementation: 'E_NHACCEPTORS' }),
      rotatableBondCount: () => this.numeric(props(), { implementation: 'E_NROTBONDS' }),
      fingerprint: () => this.text(props(), { implementation: 'E_SCREEN' }),
      cactvsFingerprint: () => {
        const fingerprint = this.props.get('fingerprint');
        // First 4 bytes hold the bit count; the last 7 bits are padding
        if (fingerprint === undefined || fingerprint.length <= 8) return undefined;
        const bits = BigInt(`0x${fingerprint.slice(8)}`).toString(2).padStart(20, '0');
        return bits.slice(0, -7).padStart(CACTVS_BITS, '0');
      },
      heavyAtomCount: () => this.count('heavy_atom'),
      isotopeAtomCount: () => this.count('isotope_atom'),
      atomStereoCount: () => this.count('atom_chiral'),
      definedAtomStereoCount: () => this.count('atom_chiral_def'),
      undefinedAtomStereoCount: () => this.count('atom_chiral_undef'),
      bondStereoCount: () => this.count('bond_chiral'),
      definedBondStereoCount: () => this.count('bond_chiral_def'),
      undefinedBondStereoCount: () => this.count('bond_chiral_undef'),
      covalentUnitCount: () => this.count('covalent_unit'),
      volume3d: () => this.numeric(conformerData(), { label: 'Shape', name: 'Volume' }),
      multipoles3d: () => this.numberList(conformerData(), { label: 'Shape', name: 'Multipoles' }),
      conformerRmsd3d: () => this.numeric(this.record.coords?.[0]?.data, { label: 'Conformer', name: 'RMSD' }),
      effectiveRotorCount3d: () => this.numeric(props(), { label: 'Count', name: 'Effective Rotor' }),
      pharmacophoreFeatures3d: () => this.textList(props(), { label: 'Features', name: 'Pharmacophore' }),
      mmff94PartialCharges3d: () => this.textList(props(), { label: 'Charge', name: 'MMFF94 Partial' }),
      mmff94Energy3d: () => this.numeric(conformerData(), { label: 'Energy', name: 'MMFF94 NoEstat' }),
      conformerId3d: () => this.text(conformerData(), { label: 'Conformer', name: 'ID' }),
      shapeSelfoverlap3d: () => this.numeric(conformerData(), { label: 'Shape', name: 'Self Overlap' }),
      featureSelfoverlap3d: () => this.numeric(conformerData(), { label: 'Feature', name: 'Self Overlap' }),
      shapeFingerprint3d: () => this.textList(conformerData(), { label: 'Fingerprint', name: 'Shape' }),
    };
  }

  // ── Properties ───────────────────────────────────────────────

  /** Read any synchronous property by name. */
  get<K extends CompoundPropertyName>(name: K): CompoundProperties[K] {
    return this.props.get(name);
  }

  /**
   * PubChem Compound Identifier. Records computed on the fly for structures
   * not in the database have none.
   */
  get cid(): number | undefined { return this.props.get('cid'); }
  get elements(): readonly (string | undefined)[] { return this.props.get('elements'); }
  get atoms(): readonly Atom[] { return this.props.get('atoms'); }
  get bonds(): readonly Bond[] { return this.props.get('bonds'); }
  /** Formal charge */
  get charge(): number { return this.props.get('charge'); }
  get coordinateType(): '2d' | '3d' | undefined { return this.props.get('coordinateType'); }
  get molecularFormula(): string | undefined { return this.props.get('molecularFormula'); }
  get molecularWeight(): number | undefined { return this.props.get('molecularWeight'); }
  /** SMILES without stereochemistry */
  get canonicalSmiles(): string | undefined { return this.props.get('canonicalSmiles'); }
  get isomericSmiles(): string | undefined { return this.props.get('isomericSmiles'); }
  get inchi(): string | undefined { return this.props.get('inchi'); }
  get inchikey(): string | undefined { return this.props.get('inchikey'); }
  /** Preferred IUPAC name */
  get iupacName(): string | undefined { return this.props.get('iupacName'); }
  get xlogp(): number | undefined { return this.props.get('xlogp'); }
  get exactMass(): number | undefined { return this.props.get('exactMass'); }
  get monoisotopicMass(): number | undefined { return this.props.get('monoisotopicMass'); }
  /** Topological polar surface area */
  get tpsa(): number | undefined { return this.props.get('tpsa'); }
  get complexity(): number | undefined { return this.props.get('complexity'); }
  get hBondDonorCount(): number | undefined { return this.props.get('hBondDonorCount'); }
  get hBondAcceptorCount(): number | undefined { return this.props.get('hBondAcceptorCount'); }
  get rotatableBondCount(): number | undefined { return this.props.get('rotatableBondCount'); }
  /** Padded, hex-encoded fingerprint as returned by the service */
  get fingerprint(): string | undefined { return this.props.get('fingerprint'); }
  /** 881-character bit string, one bit per CACTVS substructure key */
  get cactvsFingerprint(): string | undefined { return this.props.get('cactvsFingerprint'); }
  get heavyAtomCount(): number | undefined { return this.props.get('heavyAtomCount'); }
  get isotopeAtomCount(): number | undefined { return this.props.get('isotopeAtomCount'); }
  get atomStereoCount(): number | undefined { return this.props.get('atomStereoCount'); }
  get definedAtomStereoCount(): number | undefined { return this.props.get('definedAtomStereoCount'); }
  get undefinedAtomStereoCount(): number | undefined { return this.props.get('undefinedAtomStereoCount'); }
  get bondStereoCount(): number | undefined { return this.props.get('bondStereoCount'); }
  get definedBondStereoCount(): number | undefined { return this.props.get('definedBondStereoCount'); }
  get undefinedBondStereoCount(): number | undefined { return this.props.get('undefinedBondStereoCount'); }
  get covalentUnitCount(): number | undefined { return this.props.get('covalentUnitCount'); }
  get volume3d(): number | undefined { return this.props.get('volume3d'); }
  get multipoles3d(): number[] | undefined { return this.props.get('multipoles3d'); }
  get conformerRmsd3d(): number | undefined { return this.props.get('conformerRmsd3d'); }
  get effectiveRotorCount3d(): number | undefined { return this.props.get('effectiveRotorCount3d'); }
  get pharmacophoreFeatures3d(): string[] | undefined { return this.props.get('pharmacophoreFeatures3d'); }
  get mmff94PartialCharges3d(): string[] | undefined { return this.props.get('mmff94PartialCharges3d'); }
  get mmff94Energy3d(): number | undefined { return this.props.get('mmff94Energy3d'); }
  get conformerId3d(): string | undefined { return this.props.get('conformerId3d'); }
  get shapeSelfoverlap3d(): number | undefined { return this.props.get('shapeSelfoverlap3d'); }
  get featureSelfoverlap3d(): number | undefined { return this.props.get('featureSelfoverlap3d'); }
  get shapeFingerprint3d(): string[] | undefined { return this.props.get('shapeFingerprint3d'); }

  /** Whether a property has already been computed. */
  isComputed(name: CompoundPropertyName): boolean {
    return this.props.isComputed(name);
  }

  // ── Supplemental (one request each, memoized) ────────────────

  private requireLookup(what: string): SupplementalLookup {
    if (!this.lookup) {
      throw new UnsupportedOperationError(`Compound.${what}() needs a compound obtained through a PubChemClient`);
    }
    return this.lookup;
  }

  /** Ranked list of names for this compound; empty when there is no CID. */
  readonly synonyms = memoizeAsync(async (): Promise<string[]> => {
    const cid = this.cid;
    if (cid === undefined) return [];
    return this.requireLookup('synonyms').lookupSynonyms('compound', cid);
  });

  readonly sids = memoizeAsync(async (): Promise<number[]> => {
    const cid = this.cid;
    if (cid === undefined) return [];
    return this.requireLookup('sids').lookupLinkedIdentifiers('compound', cid, 'sids');
  });

  readonly aids = memoizeAsync(async (): Promise<number[]> => {
    const cid = this.cid;
    if (cid === undefined) return [];
    return this.requireLookup('aids').lookupLinkedIdentifiers('compound', cid, 'aids');
  });

  // ── Comparison and export ────────────────────────────────────

  equals(other: unknown): boolean {
    return other instanceof Compound && other.cid === this.cid && isDeepStrictEqual(other.record, this.record);
  }

  /**
   * Plain-object view of the synchronous properties (all by default).
   * Atoms and bonds are rendered with their own `toDict`.
   */
  toDict(names: readonly CompoundPropertyName[] = COMPOUND_PROPERTY_NAMES): Record<string, unknown> {
    const data: Record<string, unknown> = {};
    for (const name of names) {
      if (name === 'atoms') data.atoms = this.atoms.map((atom) => atom.toDict());
      else if (name === 'bonds') data.bonds = this.bonds.map((bond) => bond.toDict());
      else data[name] = this.props.get(name);
    }
    return data;
  }

  toString(): string {
    return this.cid === undefined ? 'Compound()' : `Compound(${this.cid})`;
  }
}
