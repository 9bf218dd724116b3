/**
 * Error taxonomy for the PubChem client.
 *
 * Client-side errors (namespace, identifier, operation) are raised before any
 * request leaves the process. Everything else describes a transport failure,
 * a service rejection, or a response that did not have the expected shape.
 */

/**
 * Base class for every error raised by this library.
 */
export class PubChemError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'PubChemError';
  }
}

export class InvalidNamespaceError extends PubChemError {
  readonly namespace: string;

  constructor(namespace: string, message?: string) {
    super('INVALID_NAMESPACE', message ?? `Unrecognized namespace: ${namespace}`);
    this.name = 'InvalidNamespaceError';
    this.namespace = namespace;
  }
}

export class InvalidIdentifierError extends PubChemError {
  readonly identifier: string;
  readonly namespace: string;

  constructor(identifier: string, namespace: string, message?: string) {
    super(
      'INVALID_IDENTIFIER',
      message ?? `Identifier '${identifier}' is not valid for namespace '${namespace}'`
    );
    this.name = 'InvalidIdentifierError';
    this.identifier = identifier;
    this.namespace = namespace;
  }
}

export class UnsupportedOperationError extends PubChemError {
  constructor(message: string) {
    super('UNSUPPORTED_OPERATION', message);
    this.name = 'UnsupportedOperationError';
  }
}

export class TransportError extends PubChemError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super('TRANSPORT_ERROR', message, options);
    this.name = 'TransportError';
    this.url = url;
  }
}

export class AsyncJobTimeoutError extends PubChemError {
  readonly listKey: string;
  readonly waitedMs: number;

  constructor(listKey: string, waitedMs: number) {
    super('ASYNC_JOB_TIMEOUT', `Listkey ${listKey} did not settle within ${waitedMs}ms`);
    this.name = 'AsyncJobTimeoutError';
    this.listKey = listKey;
    this.waitedMs = waitedMs;
  }
}

/**
 * The service answered with an HTTP error status.
 *
 * `code` is the fault code reported by PubChem (e.g. "PUGREST.NotFound"), or
 * one derived from the status when the body carried no readable fault.
 */
export class PubChemServiceError extends PubChemError {
  readonly statusCode: number;
  readonly details: string[];

  constructor(statusCode: number, code: string, message: string, details: string[] = []) {
    super(code, message);
    this.name = 'PubChemServiceError';
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class ResponseParseError extends PubChemError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RESPONSE_PARSE_ERROR', message, options);
    this.name = 'ResponseParseError';
  }
}

export type RecordKind = 'compound' | 'substance' | 'assay';

export interface MalformedRecordContext {
  kind: RecordKind;
  identifier?: number | undefined;
  index?: number | undefined;
  issues?: string[] | undefined;
}

export class MalformedRecordError extends PubChemError {
  readonly kind: RecordKind;
  readonly identifier: number | undefined;
  readonly index: number | undefined;
  readonly issues: string[];

  constructor(message: string, context: MalformedRecordContext) {
    super('MALFORMED_RECORD', `${describeRecord(context)}: ${message}`);
    this.name = 'MalformedRecordError';
    this.kind = context.kind;
    this.identifier = context.identifier;
    this.index = context.index;
    this.issues = context.issues ?? [];
  }
}

function describeRecord(context: MalformedRecordContext): string {
  const idLabel = { compound: 'CID', substance: 'SID', assay: 'AID' }[context.kind];
  const parts = [`Malformed ${context.kind} record`];
  if (context.identifier !== undefined) parts.push(`${idLabel} ${context.identifier}`);
  if (context.index !== undefined) parts.push(`at position ${context.index}`);
  return parts.join(' ');
}

export class SafetyDataParseError extends PubChemError {
  constructor(message: string) {
    super('SAFETY_DATA_PARSE_ERROR', message);
    this.name = 'SafetyDataParseError';
  }
}
