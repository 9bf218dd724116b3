/**
 * PubChemClient - the programmatic surface of the library.
 *
 * Each call builds one request from a SearchSpec, dispatches it through the
 * transport (and the response cache, when configured), decodes the body and
 * maps it into records, rows or identifier lists. Structure and formula
 * searches may answer with a listkey; the client then polls the listkey
 * until the job settles.
 */

import { writeFile } from 'node:fs/promises';
import type { AppConfig, PollingConfig } from '../config/types.js';
import { DEFAULT_CONFIG } from '../config/types.js';
import { ResponseParseError } from '../core/errors.js';
import { createLogger, type Logger } from '../core/logger.js';
import type { CsvTable } from '../decode/csv.js';
import { decodeResponse, raiseForStatus, type DecodedBody } from '../decode/ResponseDecoder.js';
import type { Assay } from '../records/Assay.js';
import type { Compound } from '../records/Compound.js';
import type { LinkedIdentifierKind, LookupDomain, SupplementalLookup } from '../records/lookup.js';
import {
  mapIdentifierList,
  mapInformation,
  mapPropertyRows,
  mapRecords,
  mapSourceNames,
  mapSynonyms,
  type IdentifierKey,
  type PropertyRow,
  type SynonymEntry,
} from '../records/RecordMapper.js';
import type { Substance } from '../records/Substance.js';
import { propertyTag } from '../records/tables.js';
import type { IdentifierInput } from '../request/IdentifierResolver.js';
import {
  buildRequest,
  buildSafetyRequest,
  buildSourcesRequest,
  formatUrl,
  requestMethod,
  type PreparedRequest,
  type QueryValue,
  type SearchSpec,
} from '../request/RequestBuilder.js';
import { OPERATION_OUTPUTS, type Domain, type Namespace, type SearchType } from '../request/vocabulary.js';
import { emptySafetyData, parseSafetyData, type SafetyData } from '../safety/SafetyDataParser.js';
import { dispatch } from '../transport/dispatch.js';
import { FetchTransport } from '../transport/FetchTransport.js';
import { pollListKey, readListKey, type PollStep } from '../transport/ListKeyPoller.js';
import { ResponseCache } from '../transport/ResponseCache.js';
import type { RawResponse, Transport } from '../transport/types.js';

export interface PubChemClientOptions {
  transport?: Transport;
  cache?: ResponseCache | undefined;
  logger?: Logger;
  baseUrl?: string;
  viewBaseUrl?: string;
  polling?: Partial<PollingConfig>;
  /** Replaces the timer between listkey polls (tests) */
  sleep?: (ms: number) => Promise<void>;
  /** Replaces Date.now for the listkey deadline (tests) */
  now?: () => number;
}

/**
 * Search options shared by the record and identifier getters.
 */
export interface QueryOptions {
  searchtype?: SearchType | undefined;
  maxRecords?: number | undefined;
  listkeyCount?: number | undefined;
  listkeyStart?: number | undefined;
  threshold?: number | undefined;
  params?: Readonly<Record<string, QueryValue>> | undefined;
}

export interface CompoundQueryOptions extends QueryOptions {
  /** '3d' asks for a conformer instead of 2D depiction coordinates */
  recordType?: '2d' | '3d';
}

export interface ImageOptions {
  domain?: Extract<Domain, 'compound' | 'substance'>;
  /** 'small', 'large' or 'WxH' */
  imageSize?: string;
}

export interface DownloadOptions {
  /** Replace an existing file instead of failing */
  overwrite?: boolean;
}

const LINKED_KEYS: Record<LinkedIdentifierKind, IdentifierKey> = { cids: 'CID', sids: 'SID', aids: 'AID' };

/** Cross-reference searches answer directly and are never polled. */
function isAsyncSearch(spec: SearchSpec): boolean {
  return (spec.searchtype !== undefined && spec.searchtype !== 'xref') || spec.namespace === 'formula';
}

/**
 * The first request of an asynchronous search always asks for JSON, since
 * only a JSON body carries a readable listkey.
 */
function probeFor(spec: SearchSpec): SearchSpec {
  if (spec.output === 'JSON') return spec;
  if (OPERATION_OUTPUTS[spec.operation].includes('JSON')) return { ...spec, output: 'JSON' };
  return { ...spec, operation: 'cids', operationArgs: undefined, output: 'JSON' };
}

function listKeySpec(spec: SearchSpec, listKey: string): SearchSpec {
  return {
    domain: spec.domain,
    namespace: 'listkey',
    identifiers: listKey,
    operation: spec.operation,
    operationArgs: spec.operationArgs,
    output: spec.output,
    listkeyCount: spec.listkeyCount,
    listkeyStart: spec.listkeyStart,
    params: spec.params,
  };
}

function jsonValue(decoded: DecodedBody): unknown {
  if (decoded.kind !== 'json') {
    throw new ResponseParseError(`Expected a JSON response, got ${decoded.kind}`);
  }
  return decoded.value;
}

export class PubChemClient implements SupplementalLookup {
  private readonly transport: Transport;
  private readonly cache: ResponseCache | undefined;
  private readonly logger: Logger;
  private readonly baseUrl: string;
  private readonly viewBaseUrl: string;
  private readonly polling: PollingConfig;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;
  private readonly now: (() => number) | undefined;

  constructor(options: PubChemClientOptions = {}) {
    this.transport = options.transport ?? new FetchTransport();
    this.cache = options.cache;
    this.logger = options.logger ?? createLogger();
    this.baseUrl = options.baseUrl ?? DEFAULT_CONFIG.service.baseUrl;
    this.viewBaseUrl = options.viewBaseUrl ?? DEFAULT_CONFIG.service.viewBaseUrl;
    this.polling = { ...DEFAULT_CONFIG.polling, ...options.polling };
    this.sleep = options.sleep;
    this.now = options.now;
  }

  /**
   * Wire transport, cache and logger from a loaded configuration.
   */
  static fromConfig(config: AppConfig): PubChemClient {
    return new PubChemClient({
      transport: new FetchTransport({
        timeoutMs: config.service.timeoutMs,
        userAgent: config.service.userAgent,
      }),
      cache: config.cache.enabled ? new ResponseCache(config.cache.maxEntries) : undefined,
      logger: createLogger({ level: config.logLevel }),
      baseUrl: config.service.baseUrl,
      viewBaseUrl: config.service.viewBaseUrl,
      polling: config.polling,
    });
  }

  // ── Core request path ────────────────────────────────────────

  private async send(request: PreparedRequest): Promise<RawResponse> {
    const url = formatUrl(request);
    this.logger.debug('Dispatching request', { method: requestMethod(request), url });
    const { response, cached } = await dispatch(this.transport, request, this.cache);
    if (cached) {
      this.logger.debug('Cache hit', { url });
    }
    return response;
  }

  /**
   * Send a spec and return the final raw response, following a listkey
   * when the search runs asynchronously. Error statuses are left to the caller.
   */
  private async resolve(spec: SearchSpec): Promise<RawResponse> {
    const prepared = buildRequest(spec, this.baseUrl);
    if (!isAsyncSearch(spec)) {
      return this.send(prepared);
    }

    const probe = probeFor(spec);
    const first = await this.send(probe === spec ? prepared : buildRequest(probe, this.baseUrl));
    const listKey = readListKey(jsonValue(decodeResponse(first, 'JSON')));
    if (listKey === undefined) {
      return probe === spec ? first : this.send(prepared);
    }

    this.logger.info('Search is running asynchronously, polling listkey', { listKey });
    const pollRequest = buildRequest(listKeySpec(probe, listKey), this.baseUrl);
    const settled = await pollListKey(
      listKey,
      async (): Promise<PollStep<RawResponse>> => {
        const response = await this.send(pollRequest);
        const waiting = readListKey(jsonValue(decodeResponse(response, 'JSON'))) !== undefined;
        return waiting ? { waiting: true } : { waiting: false, value: response };
      },
      { ...this.polling, sleep: this.sleep, now: this.now }
    );
    this.logger.info('Listkey settled', { listKey });

    return probe === spec ? settled : this.send(buildRequest(listKeySpec(spec, listKey), this.baseUrl));
  }

  /**
   * Send a spec and decode the response in its output format.
   *
   * @throws UnsupportedOperationError, InvalidNamespaceError, InvalidIdentifierError before any request
   * @throws PubChemServiceError, TransportError, AsyncJobTimeoutError, ResponseParseError
   */
  async request(spec: SearchSpec): Promise<DecodedBody> {
    return decodeResponse(await this.resolve(spec), spec.output);
  }

  // ── Records ──────────────────────────────────────────────────

  async getCompounds(
    identifiers: IdentifierInput,
    namespace: Namespace = 'cid',
    options: CompoundQueryOptions = {}
  ): Promise<Compound[]> {
    const { recordType, ...query } = options;
    const params = recordType ? { ...query.params, record_type: recordType } : query.params;
    const decoded = await this.request({
      ...query,
      params,
      domain: 'compound',
      namespace,
      identifiers,
      operation: 'record',
      output: 'JSON',
    });
    return mapRecords(decoded, 'compound', this);
  }

  async getCompound(cid: number | string, options: CompoundQueryOptions = {}): Promise<Compound> {
    const [compound] = await this.getCompounds(cid, 'cid', options);
    if (!compound) {
      throw new ResponseParseError(`Response for CID ${cid} contained no compound record`);
    }
    return compound;
  }

  async getSubstances(
    identifiers: IdentifierInput,
    namespace: Namespace = 'sid',
    options: QueryOptions = {}
  ): Promise<Substance[]> {
    const decoded = await this.request({
      ...options,
      domain: 'substance',
      namespace,
      identifiers,
      operation: 'record',
      output: 'JSON',
    });
    return mapRecords(decoded, 'substance', this);
  }

  async getSubstance(sid: number | string): Promise<Substance> {
    const [substance] = await this.getSubstances(sid, 'sid');
    if (!substance) {
      throw new ResponseParseError(`Response for SID ${sid} contained no substance record`);
    }
    return substance;
  }

  /**
   * Assay descriptions. PUG REST serves the assay record under `description`.
   */
  async getAssays(identifiers: IdentifierInput, namespace: Namespace = 'aid', options: QueryOptions = {}): Promise<Assay[]> {
    const decoded = await this.request({
      ...options,
      domain: 'assay',
      namespace,
      identifiers,
      operation: 'description',
      output: 'JSON',
    });
    return mapRecords(decoded, 'assay');
  }

  async getAssay(aid: number | string): Promise<Assay> {
    const [assay] = await this.getAssays(aid, 'aid');
    if (!assay) {
      throw new ResponseParseError(`Response for AID ${aid} contained no assay record`);
    }
    return assay;
  }

  // ── Tables and lists ─────────────────────────────────────────

  /**
   * Compound properties as rows. Names may be camelCase (`molecularWeight`)
   * or PubChem tags (`MolecularWeight`).
   */
  async getProperties(
    properties: string | readonly string[],
    identifiers: IdentifierInput,
    namespace: Namespace = 'cid',
    options: QueryOptions = {}
  ): Promise<PropertyRow[]> {
    const decoded = await this.request(this.propertySpec(properties, identifiers, namespace, options, 'JSON'));
    return mapPropertyRows(decoded);
  }

  /**
   * The same properties as a CSV table, cells left as text.
   */
  async getPropertyTable(
    properties: string | readonly string[],
    identifiers: IdentifierInput,
    namespace: Namespace = 'cid',
    options: QueryOptions = {}
  ): Promise<CsvTable> {
    const decoded = await this.request(this.propertySpec(properties, identifiers, namespace, options, 'CSV'));
    if (decoded.kind !== 'table') {
      throw new ResponseParseError(`Expected a CSV table, got ${decoded.kind}`);
    }
    return { header: decoded.header, rows: decoded.rows };
  }

  private propertySpec(
    properties: string | readonly string[],
    identifiers: IdentifierInput,
    namespace: Namespace,
    options: QueryOptions,
    output: 'JSON' | 'CSV'
  ): SearchSpec {
    const names = typeof properties === 'string' ? properties.split(',') : properties;
    return {
      ...options,
      domain: 'compound',
      namespace,
      identifiers,
      operation: 'property',
      operationArgs: names.map((name) => propertyTag(name.trim())),
      output,
    };
  }

  async getSynonyms(
    identifiers: IdentifierInput,
    namespace: Namespace = 'cid',
    domain: Domain = 'compound',
    options: QueryOptions = {}
  ): Promise<SynonymEntry[]> {
    const decoded = await this.request({ ...options, domain, namespace, identifiers, operation: 'synonyms', output: 'JSON' });
    return mapSynonyms(decoded);
  }

  async getCids(
    identifiers: IdentifierInput,
    namespace: Namespace = 'name',
    domain: Domain = 'compound',
    options: QueryOptions = {}
  ): Promise<number[]> {
    return this.getLinked('cids', identifiers, namespace, domain, options);
  }

  async getSids(
    identifiers: IdentifierInput,
    namespace: Namespace = 'cid',
    domain: Domain = 'compound',
    options: QueryOptions = {}
  ): Promise<number[]> {
    return this.getLinked('sids', identifiers, namespace, domain, options);
  }

  async getAids(
    identifiers: IdentifierInput,
    namespace: Namespace = 'cid',
    domain: Domain = 'compound',
    options: QueryOptions = {}
  ): Promise<number[]> {
    return this.getLinked('aids', identifiers, namespace, domain, options);
  }

  private async getLinked(
    kind: LinkedIdentifierKind,
    identifiers: IdentifierInput,
    namespace: Namespace,
    domain: Domain,
    options: QueryOptions
  ): Promise<number[]> {
    const decoded = await this.request({ ...options, domain, namespace, identifiers, operation: kind, output: 'JSON' });
    return mapIdentifierList(decoded, LINKED_KEYS[kind]);
  }

  /**
   * Titles and descriptions, one information entry per input.
   */
  async getDescriptions(
    identifiers: IdentifierInput,
    namespace: Namespace = 'cid',
    domain: Domain = 'compound'
  ): Promise<ReadonlyArray<Readonly<Record<string, unknown>>>> {
    const decoded = await this.request({ domain, namespace, identifiers, operation: 'description', output: 'JSON' });
    return mapInformation(decoded);
  }

  async getAllSources(domain: Extract<Domain, 'substance' | 'assay'> = 'substance'): Promise<string[]> {
    const response = await this.send(buildSourcesRequest(domain, this.baseUrl));
    return mapSourceNames(decodeResponse(response, 'JSON'));
  }

  // ── Binary and raw output ────────────────────────────────────

  /**
   * 2D depiction as PNG bytes.
   */
  async getImage(identifier: number | string, namespace: Namespace = 'cid', options: ImageOptions = {}): Promise<Uint8Array> {
    const decoded = await this.request({
      domain: options.domain ?? 'compound',
      namespace,
      identifiers: identifier,
      operation: 'image',
      output: 'PNG',
      params: options.imageSize ? { image_size: options.imageSize } : undefined,
    });
    if (decoded.kind !== 'binary') {
      throw new ResponseParseError(`Expected PNG bytes, got ${decoded.kind}`);
    }
    return decoded.bytes;
  }

  /**
   * The response body of any spec, undecoded.
   */
  async download(spec: SearchSpec): Promise<Uint8Array> {
    const response = await this.resolve(spec);
    raiseForStatus(response);
    return response.body.slice();
  }

  /**
   * Download a spec's response body to a file.
   * Without `overwrite`, an existing file makes the write fail with EEXIST.
   */
  async downloadToFile(path: string, spec: SearchSpec, options: DownloadOptions = {}): Promise<void> {
    const body = await this.download(spec);
    await writeFile(path, body, { flag: options.overwrite ? 'w' : 'wx' });
    this.logger.debug('Downloaded response', { path, bytes: body.byteLength });
  }

  // ── Safety data (PUG View) ───────────────────────────────────

  /**
   * GHS pictograms, hazard codes and precautionary codes of one compound.
   * A compound PUG View has no classification for yields empty lists.
   */
  async getSafetyData(cid: number | string): Promise<SafetyData> {
    const response = await this.send(buildSafetyRequest(cid, this.viewBaseUrl));
    if (response.status === 404) {
      this.logger.info('No GHS classification available', { cid });
      return emptySafetyData();
    }

    const safety = parseSafetyData(jsonValue(decodeResponse(response, 'JSON')));
    if (safety.pictogram.length === 0 && safety.hazard.length === 0 && safety.precautionary.length === 0) {
      this.logger.info('GHS classification is empty', { cid });
    }
    return safety;
  }

  // ── SupplementalLookup ───────────────────────────────────────

  async lookupSynonyms(domain: LookupDomain, id: number): Promise<string[]> {
    const [entry] = await this.getSynonyms(id, domain === 'compound' ? 'cid' : 'sid', domain);
    return entry?.synonyms ?? [];
  }

  async lookupLinkedIdentifiers(domain: LookupDomain, id: number, kind: LinkedIdentifierKind): Promise<number[]> {
    return this.getLinked(kind, id, domain === 'compound' ? 'cid' : 'sid', domain, {});
  }

  async lookupCompound(cid: number): Promise<Compound> {
    return this.getCompound(cid);
  }
}
