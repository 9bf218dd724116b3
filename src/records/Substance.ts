/**
 * Substance - one deposited record of the PubChem Substance database.
 */

import { isDeepStrictEqual } from 'node:util';
import { MalformedRecordError, UnsupportedOperationError } from '../core/errors.js';
import { deepFreeze, readPath } from '../core/guards.js';
import { Compound, type RecordOptions } from './Compound.js';
import { CompoundIdType } from './enums.js';
import { LazyProperties, memoizeAsync } from './LazyProperties.js';
import type { SupplementalLookup } from './lookup.js';
import { SubstanceRecordSchema, type SubstanceRecord } from './schemas.js';

export interface SubstanceProperties {
  sid: number;
  synonyms: string[] | undefined;
  sourceName: string;
  sourceId: string;
  standardizedCid: number | undefined;
  depositedCompound: Compound | undefined;
}

export type SubstancePropertyName = keyof SubstanceProperties;

/** Properties rendered by `toDict()` when no names are given. */
export const SUBSTANCE_PROPERTY_NAMES = [
  'sid', 'synonyms', 'sourceName', 'sourceId', 'standardizedCid',
] as const satisfies readonly SubstancePropertyName[];

export class Substance {
  readonly record: SubstanceRecord;
  private readonly lookup: SupplementalLookup | undefined;
  private readonly index: number | undefined;
  private readonly props: LazyProperties<SubstanceProperties>;

  static fromRecord(raw: unknown, options: RecordOptions = {}): Substance {
    const parsed = SubstanceRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const sid = readPath(raw, ['sid', 'id']);
      throw new MalformedRecordError('record does not match the substance layout', {
        kind: 'substance',
        identifier: typeof sid === 'number' ? sid : undefined,
        index: options.index,
        issues: parsed.error.issues.map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`),
      });
    }
    return new Substance(parsed.data, options);
  }

  constructor(record: SubstanceRecord, options: RecordOptions = {}) {
    this.record = deepFreeze(record);
    this.lookup = options.lookup;
    this.index = options.index;
    this.props = new LazyProperties<SubstanceProperties>({
      sid: () => this.required(this.record.sid?.id, 'sid'),
      synonyms: () => this.record.synonyms,
      sourceName: () => this.required(this.record.source?.db?.name, 'source name'),
      sourceId: () => this.required(this.record.source?.db?.source_id?.str, 'source id'),
      standardizedCid: () => this.compoundEntry(CompoundIdType.STANDARDIZED)?.id.id?.cid,
      depositedCompound: () => {
        const entry = this.compoundEntry(CompoundIdType.DEPOSITED);
        return entry === undefined ? undefined : Compound.fromRecord(entry, { lookup: this.lookup, index: this.index });
      },
    });
  }

  private required<T>(value: T | undefined, what: string): T {
    if (value === undefined) {
      throw new MalformedRecordError(`record has no ${what}`, {
        kind: 'substance',
        identifier: this.record.sid?.id,
        index: this.index,
      });
    }
    return value;
  }

  private compoundEntry(type: CompoundIdType): NonNullable<SubstanceRecord['compound']>[number] | undefined {
    return this.record.compound?.find((entry) => entry.id.type === type);
  }

  /** PubChem Substance Identifier */
  get sid(): number {
    return this.props.get('sid');
  }

  get synonyms(): string[] | undefined {
    return this.props.get('synonyms');
  }

  /** Depositor that supplied this substance */
  get sourceName(): string {
    return this.props.get('sourceName');
  }

  /** The depositor's own identifier for this substance */
  get sourceId(): string {
    return this.props.get('sourceId');
  }

  /** CID produced by standardization; undefined when the substance could not be standardized */
  get standardizedCid(): number | undefined {
    return this.props.get('standardizedCid');
  }

  /**
   * The structure as deposited, before standardization. It has no CID and
   * few computed properties.
   */
  get depositedCompound(): Compound | undefined {
    return this.props.get('depositedCompound');
  }

  private requireLookup(what: string): SupplementalLookup {
    if (!this.lookup) {
      throw new UnsupportedOperationError(`Substance.${what}() needs a substance obtained through a PubChemClient`);
    }
    return this.lookup;
  }

  /** Fetch the standardized compound. */
  readonly standardizedCompound = memoizeAsync(async (): Promise<Compound | undefined> => {
    const cid = this.standardizedCid;
    if (cid === undefined) return undefined;
    return this.requireLookup('standardizedCompound').lookupCompound(cid);
  });

  readonly cids = memoizeAsync(async (): Promise<number[]> =>
    this.requireLookup('cids').lookupLinkedIdentifiers('substance', this.sid, 'cids')
  );

  readonly aids = memoizeAsync(async (): Promise<number[]> =>
    this.requireLookup('aids').lookupLinkedIdentifiers('substance', this.sid, 'aids')
  );

  equals(other: unknown): boolean {
    return (
      other instanceof Substance &&
      other.record.sid?.id === this.record.sid?.id &&
      isDeepStrictEqual(other.record, this.record)
    );
  }

  toDict(names: readonly SubstancePropertyName[] = SUBSTANCE_PROPERTY_NAMES): Record<string, unknown> {
    const data: Record<string, unknown> = {};
    for (const name of names) {
      const value = this.props.get(name);
      data[name] = value instanceof Compound ? value.toDict() : value;
    }
    return data;
  }

  toString(): string {
    const sid = this.record.sid?.id;
    return sid === undefined ? 'Substance()' : `Substance(${sid})`;
  }
}
