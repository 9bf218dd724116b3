/**
 * Transport types.
 */

import type { PreparedRequest } from '../request/RequestBuilder.js';

/**
 * One HTTP answer, before decoding.
 */
export interface RawResponse {
  readonly status: number;
  readonly body: Uint8Array;
  readonly contentType?: string | undefined;
}

/**
 * Sends a prepared request. Implementations do not retry and do not
 * interpret the status code.
 */
export interface Transport {
  send(request: PreparedRequest): Promise<RawResponse>;
}
