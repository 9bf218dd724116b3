/**
 * Assay - one bioassay description from PubChem BioAssay.
 */

import { isDeepStrictEqual } from 'node:util';
import { MalformedRecordError } from '../core/errors.js';
import { deepFreeze, readPath } from '../core/guards.js';
import type { RecordOptions } from './Compound.js';
import { LazyProperties } from './LazyProperties.js';
import { AssayRecordSchema, type AssayRecord } from './schemas.js';

type AssayEntry = Readonly<Record<string, unknown>>;

export interface AssayProperties {
  aid: number;
  name: string;
  description: string[];
  /** See ProjectCategory */
  projectCategory: number | undefined;
  comments: string[];
  results: readonly AssayEntry[];
  target: readonly AssayEntry[] | undefined;
  revision: number;
  aidVersion: number;
}

export type AssayPropertyName = keyof AssayProperties;

export const ASSAY_PROPERTY_NAMES = [
  'aid', 'name', 'description', 'projectCategory', 'comments', 'results', 'target', 'revision', 'aidVersion',
] as const satisfies readonly AssayPropertyName[];

export class Assay {
  readonly record: AssayRecord;
  private readonly index: number | undefined;
  private readonly props: LazyProperties<AssayProperties>;

  static fromRecord(raw: unknown, options: Pick<RecordOptions, 'index'> = {}): Assay {
    const parsed = AssayRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const aid = readPath(raw, ['assay', 'descr', 'aid', 'id']);
      throw new MalformedRecordError('record does not match the assay layout', {
        kind: 'assay',
        identifier: typeof aid === 'number' ? aid : undefined,
        index: options.index,
        issues: parsed.error.issues.map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`),
      });
    }
    return new Assay(parsed.data, options);
  }

  constructor(record: AssayRecord, options: Pick<RecordOptions, 'index'> = {}) {
    this.record = deepFreeze(record);
    this.index = options.index;
    const descr = this.record.assay.descr;
    this.props = new LazyProperties<AssayProperties>({
      aid: () => this.required(descr.aid?.id, 'aid'),
      name: () => this.required(descr.name, 'name'),
      description: () => this.required(descr.description, 'description'),
      projectCategory: () => descr.project_category,
      comments: () => (descr.comment ?? []).filter((comment) => comment.length > 0),
      results: () => descr.results ?? [],
      target: () => descr.target,
      revision: () => this.required(descr.revision, 'revision'),
      aidVersion: () => this.required(descr.aid?.version, 'aid version'),
    });
  }

  private required<T>(value: T | undefined, what: string): T {
    if (value === undefined) {
      throw new MalformedRecordError(`record has no ${what}`, {
        kind: 'assay',
        identifier: this.record.assay.descr.aid?.id,
        index: this.index,
      });
    }
    return value;
  }

  /** PubChem Assay Identifier */
  get aid(): number {
    return this.props.get('aid');
  }

  /** Short display name */
  get name(): string {
    return this.props.get('name');
  }

  /** Description paragraphs */
  get description(): string[] {
    return this.props.get('description');
  }

  get projectCategory(): number | undefined {
    return this.props.get('projectCategory');
  }

  /** Non-empty comment lines */
  get comments(): string[] {
    return this.props.get('comments');
  }

  /** Result column definitions */
  get results(): readonly AssayEntry[] {
    return this.props.get('results');
  }

  get target(): readonly AssayEntry[] | undefined {
    return this.props.get('target');
  }

  get revision(): number {
    return this.props.get('revision');
  }

  /** Bumped whenever the depositor updates the record */
  get aidVersion(): number {
    return this.props.get('aidVersion');
  }

  equals(other: unknown): boolean {
    return (
      other instanceof Assay &&
      other.record.assay.descr.aid?.id === this.record.assay.descr.aid?.id &&
      isDeepStrictEqual(other.record, this.record)
    );
  }

  toDict(names: readonly AssayPropertyName[] = ASSAY_PROPERTY_NAMES): Record<string, unknown> {
    const data: Record<string, unknown> = {};
    for (const name of names) {
      data[name] = this.props.get(name);
    }
    return data;
  }

  toString(): string {
    const aid = this.record.assay.descr.aid?.id;
    return aid === undefined ? 'Assay()' : `Assay(${aid})`;
  }
}
