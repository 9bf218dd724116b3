/**
 * zod schemas for the PUG REST JSON shapes the mapper reads.
 *
 * Record schemas are loose: unknown keys survive parsing, so the parsed
 * value is a complete (and typed) copy of the record.
 */

import { z } from 'zod';

const int = z.number().int();

// ── Info data (props, conformer data) ──────────────────────────

export const UrnSchema = z.looseObject({
  label: z.string(),
  name: z.string().optional(),
  implementation: z.string().optional(),
});

export const InfoValueSchema = z.looseObject({
  sval: z.string().optional(),
  fval: z.number().optional(),
  ival: z.number().optional(),
  binary: z.string().optional(),
  slist: z.array(z.string()).optional(),
  fvec: z.array(z.number()).optional(),
  ivec: z.array(z.number()).optional(),
});

export const InfoDataSchema = z.looseObject({
  urn: UrnSchema,
  value: InfoValueSchema,
});

export type Urn = z.infer<typeof UrnSchema>;
export type InfoData = z.infer<typeof InfoDataSchema>;

// ── Compound ───────────────────────────────────────────────────

const AtomsSchema = z.looseObject({
  aid: z.array(int),
  element: z.array(int),
  charge: z.array(z.object({ aid: int, value: z.number() })).optional(),
});

const BondsSchema = z.looseObject({
  aid1: z.array(int),
  aid2: z.array(int),
  order: z.array(int),
});

const ConformerSchema = z.looseObject({
  x: z.array(z.number()),
  y: z.array(z.number()),
  z: z.array(z.number()).optional(),
  style: z
    .looseObject({
      annotation: z.array(int),
      aid1: z.array(int),
      aid2: z.array(int),
    })
    .optional(),
  data: z.array(InfoDataSchema).optional(),
});

const CoordsSchema = z.looseObject({
  type: z.array(int),
  aid: z.array(int),
  conformers: z.array(ConformerSchema).min(1),
  data: z.array(InfoDataSchema).optional(),
});

export const CompoundRecordSchema = z.looseObject({
  id: z
    .looseObject({
      id: z.looseObject({ cid: int.optional() }).optional(),
    })
    .optional(),
  atoms: AtomsSchema,
  bonds: BondsSchema.optional(),
  coords: z.array(CoordsSchema).optional(),
  charge: int.optional(),
  props: z.array(InfoDataSchema).optional(),
  count: z.record(z.string(), z.number()).optional(),
});

export type CompoundRecord = z.infer<typeof CompoundRecordSchema>;
export type ConformerRecord = z.infer<typeof ConformerSchema>;

// ── Substance ──────────────────────────────────────────────────

const SubstanceCompoundSchema = z.looseObject({
  id: z.looseObject({
    type: int,
    id: z.looseObject({ cid: int.optional() }).optional(),
  }),
});

export const SubstanceRecordSchema = z.looseObject({
  sid: z.looseObject({ id: int, version: int.optional() }).optional(),
  source: z
    .looseObject({
      db: z
        .looseObject({
          name: z.string().optional(),
          source_id: z.looseObject({ str: z.string().optional() }).optional(),
        })
        .optional(),
    })
    .optional(),
  synonyms: z.array(z.string()).optional(),
  compound: z.array(SubstanceCompoundSchema).optional(),
});

export type SubstanceRecord = z.infer<typeof SubstanceRecordSchema>;

// ── Assay ──────────────────────────────────────────────────────

const AssayDescriptionSchema = z.looseObject({
  aid: z.looseObject({ id: int.optional(), version: int.optional() }).optional(),
  name: z.string().optional(),
  description: z.array(z.string()).optional(),
  comment: z.array(z.string()).optional(),
  results: z.array(z.looseObject({})).optional(),
  target: z.array(z.looseObject({})).optional(),
  revision: int.optional(),
  project_category: int.optional(),
});

export const AssayRecordSchema = z.looseObject({
  assay: z.looseObject({
    descr: AssayDescriptionSchema,
  }),
});

export type AssayRecord = z.infer<typeof AssayRecordSchema>;

// ── Containers and tabular responses ───────────────────────────

export const CONTAINER_KEYS = {
  compound: 'PC_Compounds',
  substance: 'PC_Substances',
  assay: 'PC_AssayContainer',
} as const;

export const PropertyTableSchema = z.object({
  PropertyTable: z.object({
    Properties: z.array(z.record(z.string(), z.union([z.string(), z.number()]))),
  }),
});

export const IdentifierListSchema = z.object({
  IdentifierList: z.looseObject({
    CID: z.array(int).optional(),
    SID: z.array(int).optional(),
    AID: z.array(int).optional(),
  }),
});

export const InformationListSchema = z.object({
  InformationList: z.looseObject({
    Information: z.array(z.looseObject({})).optional(),
    SourceName: z.array(z.string()).optional(),
  }),
});

export const SynonymInformationSchema = z.looseObject({
  CID: int.optional(),
  SID: int.optional(),
  AID: int.optional(),
  Synonym: z.array(z.string()).default([]),
});

export const IdentifierInformationSchema = z.looseObject({
  CID: z.union([int, z.array(int)]).optional(),
  SID: z.union([int, z.array(int)]).optional(),
  AID: z.union([int, z.array(int)]).optional(),
});
