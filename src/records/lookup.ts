/**
 * Follow-up requests a record wrapper can make through the client.
 */

import type { Compound } from './Compound.js';

export type LookupDomain = 'compound' | 'substance';
export type LinkedIdentifierKind = 'cids' | 'sids' | 'aids';

export interface SupplementalLookup {
  /** Ranked synonyms of one compound or substance */
  lookupSynonyms(domain: LookupDomain, id: number): Promise<string[]>;
  /** Identifiers linked to one compound or substance */
  lookupLinkedIdentifiers(domain: LookupDomain, id: number, kind: LinkedIdentifierKind): Promise<number[]>;
  lookupCompound(cid: number): Promise<Compound>;
}
