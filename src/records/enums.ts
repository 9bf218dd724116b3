/**
 * Numeric codes used inside PUG REST records.
 */

export const BondType = {
  SINGLE: 1,
  DOUBLE: 2,
  TRIPLE: 3,
  QUADRUPLE: 4,
  DATIVE: 5,
  COMPLEX: 6,
  IONIC: 7,
  UNKNOWN: 255,
} as const;
export type BondType = (typeof BondType)[keyof typeof BondType];

export const CoordinateType = {
  TWO_D: 1,
  THREE_D: 2,
  SUBMITTED: 3,
  EXPERIMENTAL: 4,
  COMPUTED: 5,
  STANDARDIZED: 6,
  AUGMENTED: 7,
  ALIGNED: 8,
  COMPACT: 9,
  UNITS_ANGSTROMS: 10,
  UNITS_NANOMETERS: 11,
  UNITS_PIXEL: 12,
  UNITS_POINTS: 13,
  UNITS_STDBONDS: 14,
  UNITS_UNKNOWN: 255,
} as const;
export type CoordinateType = (typeof CoordinateType)[keyof typeof CoordinateType];

/** Role of a compound inside a substance record. */
export const CompoundIdType = {
  DEPOSITED: 0,
  STANDARDIZED: 1,
  COMPONENT: 2,
  NEUTRALIZED: 3,
  MIXTURE: 4,
  TAUTOMER: 5,
  IONIZED: 6,
  UNKNOWN: 255,
} as const;
export type CompoundIdType = (typeof CompoundIdType)[keyof typeof CompoundIdType];

export const ProjectCategory = {
  MLSCN: 1,
  MLPCN: 2,
  MLSCN_AP: 3,
  MLPCN_AP: 4,
  JOURNAL_ARTICLE: 5,
  ASSAY_VENDOR: 6,
  LITERATURE_EXTRACTED: 7,
  LITERATURE_AUTHOR: 8,
  LITERATURE_PUBLISHER: 9,
  RNAIGI: 10,
  OTHER: 255,
} as const;
export type ProjectCategory = (typeof ProjectCategory)[keyof typeof ProjectCategory];
