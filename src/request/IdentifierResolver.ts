/**
 * Identifier/namespace resolution.
 *
 * Turns one identifier or an ordered list of them into the identifier path
 * segment of a PUG REST URL: validated, percent-encoded, comma-joined.
 */

import { InvalidIdentifierError, InvalidNamespaceError } from '../core/errors.js';
import { isNamespace, isSourceIdNamespace, NUMERIC_NAMESPACES, sourceIdSource, type Namespace } from './vocabulary.js';

export type Identifier = string | number;
export type IdentifierInput = Identifier | readonly Identifier[];

const IDENTIFIER_SEPARATOR = ',';

/**
 * Narrow a namespace string, rejecting anything the service does not know.
 */
export function assertNamespace(namespace: string): Namespace {
  if (!isNamespace(namespace)) {
    throw new InvalidNamespaceError(namespace);
  }
  return namespace;
}

/**
 * Digit strings are kept as text: listkeys can exceed Number.MAX_SAFE_INTEGER.
 */
function normalizeNumeric(identifier: Identifier, namespace: Namespace): string {
  const text = String(identifier).trim();
  const canonical =
    typeof identifier === 'number'
      ? Number.isSafeInteger(identifier) && identifier > 0 ? String(identifier) : ''
      : /^\d+$/.test(text) ? text.replace(/^0+/, '') : '';
  if (canonical.length === 0) {
    throw new InvalidIdentifierError(text, namespace, `Namespace '${namespace}' requires positive integer identifiers, got '${text}'`);
  }
  return canonical;
}

/**
 * Validate identifiers for a namespace and return them as strings, in input order.
 * Numeric namespaces get canonical integer text ("002244" becomes "2244").
 */
export function normalizeIdentifiers(identifiers: IdentifierInput, namespace: string): string[] {
  const ns = assertNamespace(namespace);
  const list: readonly Identifier[] =
    typeof identifiers === 'string' || typeof identifiers === 'number' ? [identifiers] : identifiers;

  if (list.length === 0) {
    throw new InvalidIdentifierError('', ns, 'At least one identifier is required');
  }

  return list.map((identifier) => {
    if (NUMERIC_NAMESPACES.has(ns)) {
      return normalizeNumeric(identifier, ns);
    }
    const text = String(identifier).trim();
    if (text.length === 0) {
      throw new InvalidIdentifierError(text, ns, `Empty identifier for namespace '${ns}'`);
    }
    return text;
  });
}

/**
 * Source names may contain '/', which the service expects written as '.'.
 */
function encodeSourceName(source: string): string {
  return encodeURIComponent(source.trim().replaceAll('/', '.'));
}

/**
 * Percent-encode one identifier for use inside a URL path.
 * `sourceall` identifiers are source names.
 */
export function encodeIdentifier(identifier: string, namespace: Namespace): string {
  return namespace === 'sourceall' ? encodeSourceName(identifier) : encodeURIComponent(identifier);
}

/**
 * The namespace path segment. For `sourceid/<source>` the source name is
 * rewritten and encoded: `sourceid/DTP/NCI` becomes `sourceid/DTP.NCI`.
 */
export function encodeNamespace(namespace: Namespace): string {
  return isSourceIdNamespace(namespace) ? `sourceid/${encodeSourceName(sourceIdSource(namespace))}` : namespace;
}

/**
 * Build the identifier path segment for a namespace.
 */
export function resolveIdentifiers(identifiers: IdentifierInput, namespace: string): string {
  const ns = assertNamespace(namespace);
  return normalizeIdentifiers(identifiers, ns)
    .map((identifier) => encodeIdentifier(identifier, ns))
    .join(IDENTIFIER_SEPARATOR);
}
