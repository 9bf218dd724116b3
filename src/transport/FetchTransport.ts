/**
 * Transport over the global fetch.
 */

import { TransportError } from '../core/errors.js';
import { formatUrl, requestMethod, type PreparedRequest } from '../request/RequestBuilder.js';
import type { RawResponse, Transport } from './types.js';

export type FetchFn = typeof fetch;

export interface FetchTransportOptions {
  /** Abort the request after this many ms (default 30_000) */
  timeoutMs?: number;
  userAgent?: string | undefined;
  /** Replaces the global fetch, mainly for tests */
  fetchImpl?: FetchFn;
}

export class FetchTransport implements Transport {
  private readonly timeoutMs: number;
  private readonly userAgent: string | undefined;
  private readonly fetchImpl: FetchFn;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.userAgent = options.userAgent;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async send(request: PreparedRequest): Promise<RawResponse> {
    const url = formatUrl(request);
    const headers: Record<string, string> = {};
    if (this.userAgent) {
      headers['User-Agent'] = this.userAgent;
    }
    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await this.fetchImpl(url, {
        method: requestMethod(request),
        headers,
        body: request.body,
        signal: controller.signal,
      });
      const body = new Uint8Array(await res.arrayBuffer());
      return {
        status: res.status,
        body,
        contentType: res.headers.get('content-type') ?? undefined,
      };
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new TransportError(url, `Request timed out after ${this.timeoutMs}ms`, { cause: err });
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new TransportError(url, `Request failed: ${reason}`, { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }
}
