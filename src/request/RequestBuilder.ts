/**
 * Request Builder - turns a SearchSpec into a PUG REST request.
 *
 * Path layout:
 *   {base}/{domain}/{searchtype?}/{namespace}/{identifiers?}/{operation...}/{output}
 *
 * e.g. /substance/sourceid/DTP.NCI/747285/JSON, /compound/xref/RN/50-78-2/cids/JSON
 *
 * Every combination is checked against the vocabulary tables before a URL is
 * produced, so an unsupported request never reaches the transport.
 */

import { InvalidIdentifierError, UnsupportedOperationError } from '../core/errors.js';
import {
  assertNamespace,
  encodeIdentifier,
  encodeNamespace,
  normalizeIdentifiers,
  type IdentifierInput,
} from './IdentifierResolver.js';
import {
  DOMAIN_NAMESPACES,
  DOMAIN_OPERATIONS,
  IMPLICIT_OPERATIONS,
  OPERATION_OUTPUTS,
  OPERATIONS_WITH_ARGS,
  POST_BODY_NAMESPACES,
  STRUCTURE_SEARCH_NAMESPACES,
  isDomain,
  isOperation,
  isOutputFormat,
  isSearchType,
  isSourceIdNamespace,
  isXrefType,
  type Domain,
  type Namespace,
  type Operation,
  type OutputFormat,
  type SearchType,
} from './vocabulary.js';

export type QueryValue = string | number | boolean;

/**
 * Everything needed to address one PUG REST call.
 */
export interface SearchSpec {
  domain: Domain;
  namespace: Namespace;
  identifiers: IdentifierInput;
  operation: Operation;
  /** Property tags, xref types or target type, for the operations that take them */
  operationArgs?: string | readonly string[] | undefined;
  output: OutputFormat;
  searchtype?: SearchType | undefined;
  maxRecords?: number | undefined;
  listkeyCount?: number | undefined;
  listkeyStart?: number | undefined;
  threshold?: number | undefined;
  /** Extra query parameters, appended after the named ones */
  params?: Readonly<Record<string, QueryValue>> | undefined;
}

/**
 * A fully resolved request. `query` keeps insertion order.
 */
export interface PreparedRequest {
  readonly url: string;
  readonly query: Readonly<Record<string, string>>;
  /** Form-encoded payload; present only for POST requests */
  readonly body?: string | undefined;
}

function trimBase(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

function toArgList(args: string | readonly string[] | undefined): string[] {
  if (args === undefined) return [];
  const list = typeof args === 'string' ? args.split(',') : args;
  return list.map((arg) => arg.trim()).filter((arg) => arg.length > 0);
}

function checkCombination(spec: SearchSpec): void {
  const { domain, namespace, operation, output, searchtype } = spec;

  if (!isDomain(domain)) {
    throw new UnsupportedOperationError(`Unknown domain '${domain}'`);
  }
  if (isSourceIdNamespace(namespace)) {
    if (domain !== 'substance') {
      throw new UnsupportedOperationError(`Namespace 'sourceid' is only available for substances`);
    }
  } else if (isXrefType(namespace)) {
    if (searchtype !== 'xref') {
      throw new UnsupportedOperationError(`Namespace '${namespace}' requires the 'xref' search type`);
    }
  } else if (!DOMAIN_NAMESPACES[domain].includes(namespace)) {
    throw new UnsupportedOperationError(`Namespace '${namespace}' is not available for domain '${domain}'`);
  }
  if (!isOperation(operation) || !DOMAIN_OPERATIONS[domain].includes(operation)) {
    throw new UnsupportedOperationError(`Operation '${operation}' is not available for domain '${domain}'`);
  }
  if (!isOutputFormat(output) || !OPERATION_OUTPUTS[operation].includes(output)) {
    throw new UnsupportedOperationError(`Output '${output}' is not available for operation '${operation}'`);
  }

  if (searchtype === undefined) return;
  if (!isSearchType(searchtype)) {
    throw new UnsupportedOperationError(`Unknown search type '${searchtype}'`);
  }
  if (searchtype === 'formula') {
    if (namespace !== 'formula') {
      throw new UnsupportedOperationError(`Search type 'formula' requires the 'formula' namespace, got '${namespace}'`);
    }
    return;
  }
  if (searchtype === 'xref') {
    if (domain === 'assay') {
      throw new UnsupportedOperationError(`Search type 'xref' is not available for assays`);
    }
    if (!isXrefType(namespace)) {
      throw new UnsupportedOperationError(`Search type 'xref' needs a cross-reference type namespace, got '${namespace}'`);
    }
    return;
  }
  if (domain !== 'compound') {
    throw new UnsupportedOperationError(`Search type '${searchtype}' is only available for compounds`);
  }
  if (!STRUCTURE_SEARCH_NAMESPACES.has(namespace)) {
    throw new UnsupportedOperationError(`Search type '${searchtype}' cannot start from namespace '${namespace}'`);
  }
}

function operationSegments(operation: Operation, args: string[]): string[] {
  if (OPERATIONS_WITH_ARGS.has(operation)) {
    if (args.length === 0) {
      throw new UnsupportedOperationError(`Operation '${operation}' requires at least one argument`);
    }
    return [operation, args.map(encodeURIComponent).join(',')];
  }
  if (args.length > 0) {
    throw new UnsupportedOperationError(`Operation '${operation}' takes no arguments`);
  }
  return IMPLICIT_OPERATIONS.has(operation) ? [] : [operation];
}

function buildQuery(spec: SearchSpec): Record<string, string> {
  const query: Record<string, string> = {};
  if (spec.maxRecords !== undefined) query.MaxRecords = String(spec.maxRecords);
  if (spec.listkeyCount !== undefined) query.listkey_count = String(spec.listkeyCount);
  if (spec.listkeyStart !== undefined) query.listkey_start = String(spec.listkeyStart);
  if (spec.threshold !== undefined) query.Threshold = String(spec.threshold);
  for (const [key, value] of Object.entries(spec.params ?? {})) {
    query[key] = String(value);
  }
  return query;
}

/**
 * Build the request for a search spec.
 *
 * @throws InvalidNamespaceError, InvalidIdentifierError, UnsupportedOperationError
 */
export function buildRequest(spec: SearchSpec, baseUrl: string): PreparedRequest {
  const namespace = assertNamespace(spec.namespace);
  checkCombination(spec);

  const identifiers = normalizeIdentifiers(spec.identifiers, namespace);
  const segments: string[] = [trimBase(baseUrl), spec.domain];

  if (spec.searchtype !== undefined && spec.searchtype !== 'formula') {
    segments.push(spec.searchtype);
  }
  segments.push(encodeNamespace(namespace));

  let body: string | undefined;
  if (POST_BODY_NAMESPACES.has(namespace)) {
    const [identifier] = identifiers;
    if (identifier === undefined || identifiers.length > 1) {
      throw new InvalidIdentifierError(
        identifiers.join(', '),
        namespace,
        `Namespace '${namespace}' takes exactly one identifier per request`
      );
    }
    body = new URLSearchParams({ [namespace]: identifier }).toString();
  } else {
    segments.push(identifiers.map((identifier) => encodeIdentifier(identifier, namespace)).join(','));
  }

  segments.push(...operationSegments(spec.operation, toArgList(spec.operationArgs)));
  segments.push(spec.output);

  return { url: segments.join('/'), query: buildQuery(spec), body };
}

/**
 * Request listing every depositor of substances or assays.
 */
export function buildSourcesRequest(domain: Extract<Domain, 'substance' | 'assay'>, baseUrl: string): PreparedRequest {
  return { url: `${trimBase(baseUrl)}/sources/${domain}/JSON`, query: {} };
}

/**
 * PUG View request for the GHS classification of one compound.
 */
export function buildSafetyRequest(cid: number | string, viewBaseUrl: string): PreparedRequest {
  const id = normalizeIdentifiers(cid, 'cid').join('');
  return {
    url: `${trimBase(viewBaseUrl)}/data/compound/${id}/JSON`,
    query: { heading: 'GHS Classification' },
  };
}

export function requestMethod(request: PreparedRequest): 'GET' | 'POST' {
  return request.body === undefined ? 'GET' : 'POST';
}

/**
 * Render the URL with its query string.
 */
export function formatUrl(request: PreparedRequest): string {
  const search = new URLSearchParams(request.query).toString();
  return search.length > 0 ? `${request.url}?${search}` : request.url;
}

/**
 * Stable identity of a request, used as the cache key.
 */
export function requestKey(request: PreparedRequest): string {
  const line = `${requestMethod(request)} ${formatUrl(request)}`;
  return request.body === undefined ? line : `${line}\n${request.body}`;
}
