/**
 * Atoms and bonds of a compound record.
 */

import { elementSymbol } from './tables.js';
import { BondType } from './enums.js';

export interface AtomInit {
  aid: number;
  number: number;
  x?: number | undefined;
  y?: number | undefined;
  z?: number | undefined;
  charge?: number | undefined;
}

export class Atom {
  readonly aid: number;
  /** Atomic number */
  readonly number: number;
  readonly x: number | undefined;
  readonly y: number | undefined;
  /** Undefined for 2D records */
  readonly z: number | undefined;
  /** Formal charge */
  readonly charge: number;

  constructor(init: AtomInit) {
    this.aid = init.aid;
    this.number = init.number;
    this.x = init.x;
    this.y = init.y;
    this.z = init.z;
    this.charge = init.charge ?? 0;
  }

  get element(): string | undefined {
    return elementSymbol(this.number);
  }

  get coordinateType(): '2d' | '3d' {
    return this.z === undefined ? '2d' : '3d';
  }

  equals(other: unknown): boolean {
    return (
      other instanceof Atom &&
      other.aid === this.aid &&
      other.number === this.number &&
      other.x === this.x &&
      other.y === this.y &&
      other.z === this.z &&
      other.charge === this.charge
    );
  }

  toDict(): Record<string, unknown> {
    const data: Record<string, unknown> = { aid: this.aid, number: this.number, element: this.element };
    if (this.x !== undefined) data.x = this.x;
    if (this.y !== undefined) data.y = this.y;
    if (this.z !== undefined) data.z = this.z;
    if (this.charge !== 0) data.charge = this.charge;
    return data;
  }

  toString(): string {
    return `Atom(${this.aid}, ${this.element ?? this.number})`;
  }
}

export interface BondInit {
  aid1: number;
  aid2: number;
  order?: number | undefined;
  style?: number | undefined;
}

export class Bond {
  readonly aid1: number;
  readonly aid2: number;
  readonly order: number;
  /** Drawing annotation (wedge, dash, ...) from the conformer, when present */
  readonly style: number | undefined;

  constructor(init: BondInit) {
    this.aid1 = init.aid1;
    this.aid2 = init.aid2;
    this.order = init.order ?? BondType.SINGLE;
    this.style = init.style;
  }

  equals(other: unknown): boolean {
    return (
      other instanceof Bond &&
      other.aid1 === this.aid1 &&
      other.aid2 === this.aid2 &&
      other.order === this.order &&
      other.style === this.style
    );
  }

  toDict(): Record<string, unknown> {
    const data: Record<string, unknown> = { aid1: this.aid1, aid2: this.aid2, order: this.order };
    if (this.style !== undefined) data.style = this.style;
    return data;
  }

  toString(): string {
    return `Bond(${this.aid1}, ${this.aid2}, ${this.order})`;
  }
}

/**
 * Key for an unordered atom pair.
 */
export function bondKey(aid1: number, aid2: number): string {
  return aid1 < aid2 ? `${aid1}-${aid2}` : `${aid2}-${aid1}`;
}
