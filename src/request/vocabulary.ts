/**
 * PUG REST vocabulary: domains, namespaces, operations, output formats and
 * search types, plus the compatibility table that says which combinations
 * the service accepts.
 */

export const DOMAINS = ['compound', 'substance', 'assay'] as const;
export type Domain = (typeof DOMAINS)[number];

export const COMPOUND_NAMESPACES = [
  'cid', 'name', 'smiles', 'inchi', 'sdf', 'inchikey', 'formula', 'fastformula', 'listkey',
] as const;
export const SUBSTANCE_NAMESPACES = ['sid', 'name', 'sourceall', 'listkey'] as const;
export const ASSAY_NAMESPACES = ['aid', 'type', 'sourceall', 'activity', 'listkey'] as const;

export type CompoundNamespace = (typeof COMPOUND_NAMESPACES)[number];
export type SubstanceNamespace = (typeof SUBSTANCE_NAMESPACES)[number];
export type AssayNamespace = (typeof ASSAY_NAMESPACES)[number];

/** Cross-reference types an `xref` search starts from (`/compound/xref/RegistryID/...`). */
export const XREF_TYPES = [
  'RegistryID', 'RN', 'PubMedID', 'MMDBID', 'ProteinGI', 'NucleotideGI',
  'TaxonomyID', 'MIMID', 'GeneID', 'ProbeID', 'PatentID',
] as const;
export type XrefType = (typeof XREF_TYPES)[number];

/** Substance lookup by depositor ID: `sourceid/<source name>`. */
export type SourceIdNamespace = `sourceid/${string}`;

export type Namespace = CompoundNamespace | SubstanceNamespace | AssayNamespace | XrefType | SourceIdNamespace;

/** Every fixed namespace; `sourceid/<source>` is open-ended and not listed. */
export const NAMESPACES: readonly Namespace[] = [
  ...new Set<Namespace>([...COMPOUND_NAMESPACES, ...SUBSTANCE_NAMESPACES, ...ASSAY_NAMESPACES, ...XREF_TYPES]),
];

/** Namespaces whose identifiers are positive integers. */
export const NUMERIC_NAMESPACES: ReadonlySet<Namespace> = new Set<Namespace>(['cid', 'sid', 'aid', 'listkey']);

/** Namespaces whose identifiers are sent in a POST body rather than the URL path. */
export const POST_BODY_NAMESPACES: ReadonlySet<Namespace> = new Set<Namespace>(['inchi', 'sdf']);

export const OPERATIONS = [
  'record',
  'property',
  'synonyms',
  'sids',
  'cids',
  'aids',
  'description',
  'summary',
  'image',
  'conformers',
  'assaysummary',
  'xrefs',
  'targets',
] as const;
export type Operation = (typeof OPERATIONS)[number];

/** Operations that take a trailing argument list (`property/MolecularWeight,XLogP`). */
export const OPERATIONS_WITH_ARGS: ReadonlySet<Operation> = new Set<Operation>(['property', 'xrefs', 'targets']);

/** Operations addressed without a path segment of their own. */
export const IMPLICIT_OPERATIONS: ReadonlySet<Operation> = new Set<Operation>(['record', 'image']);

export const OUTPUTS = ['JSON', 'XML', 'CSV', 'TXT', 'PNG', 'SDF', 'ASNT'] as const;
export type OutputFormat = (typeof OUTPUTS)[number];

export const SEARCH_TYPES = ['substructure', 'superstructure', 'similarity', 'identity', 'formula', 'xref'] as const;
export type SearchType = (typeof SEARCH_TYPES)[number];

/** Namespaces a structure search (substructure, superstructure, ...) can start from. */
export const STRUCTURE_SEARCH_NAMESPACES: ReadonlySet<Namespace> = new Set<Namespace>(['cid', 'smiles', 'inchi', 'sdf']);

export const DOMAIN_NAMESPACES: Record<Domain, readonly Namespace[]> = {
  compound: COMPOUND_NAMESPACES,
  substance: SUBSTANCE_NAMESPACES,
  assay: ASSAY_NAMESPACES,
};

export const DOMAIN_OPERATIONS: Record<Domain, readonly Operation[]> = {
  compound: [
    'record', 'property', 'synonyms', 'sids', 'cids', 'aids', 'description',
    'image', 'conformers', 'assaysummary', 'xrefs',
  ],
  substance: ['record', 'synonyms', 'sids', 'cids', 'aids', 'description', 'image', 'assaysummary', 'xrefs'],
  assay: ['record', 'description', 'summary', 'aids', 'sids', 'cids', 'targets'],
};

export const OPERATION_OUTPUTS: Record<Operation, readonly OutputFormat[]> = {
  record: ['JSON', 'XML', 'SDF', 'ASNT'],
  property: ['JSON', 'XML', 'CSV', 'TXT'],
  synonyms: ['JSON', 'XML', 'TXT'],
  sids: ['JSON', 'XML', 'TXT'],
  cids: ['JSON', 'XML', 'TXT'],
  aids: ['JSON', 'XML', 'TXT'],
  description: ['JSON', 'XML'],
  summary: ['JSON', 'XML'],
  image: ['PNG'],
  conformers: ['JSON', 'XML', 'TXT'],
  assaysummary: ['JSON', 'XML', 'CSV'],
  xrefs: ['JSON', 'XML', 'TXT'],
  targets: ['JSON', 'XML', 'TXT'],
};

const DOMAIN_SET: ReadonlySet<string> = new Set<string>(DOMAINS);
const NAMESPACE_SET: ReadonlySet<string> = new Set<string>(NAMESPACES);
const OPERATION_SET: ReadonlySet<string> = new Set<string>(OPERATIONS);
const OUTPUT_SET: ReadonlySet<string> = new Set<string>(OUTPUTS);
const SEARCH_TYPE_SET: ReadonlySet<string> = new Set<string>(SEARCH_TYPES);
const XREF_TYPE_SET: ReadonlySet<string> = new Set<string>(XREF_TYPES);

const SOURCE_ID_PREFIX = 'sourceid/';

export function isDomain(value: string): value is Domain {
  return DOMAIN_SET.has(value);
}

export function isSourceIdNamespace(value: string): value is SourceIdNamespace {
  return value.startsWith(SOURCE_ID_PREFIX) && value.slice(SOURCE_ID_PREFIX.length).trim().length > 0;
}

/**
 * The depositor name inside a `sourceid/<source>` namespace.
 */
export function sourceIdSource(namespace: SourceIdNamespace): string {
  return namespace.slice(SOURCE_ID_PREFIX.length);
}

export function isXrefType(value: string): value is XrefType {
  return XREF_TYPE_SET.has(value);
}

export function isNamespace(value: string): value is Namespace {
  return NAMESPACE_SET.has(value) || isSourceIdNamespace(value);
}

export function isOperation(value: string): value is Operation {
  return OPERATION_SET.has(value);
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_SET.has(value);
}

export function isSearchType(value: string): value is SearchType {
  return SEARCH_TYPE_SET.has(value);
}
