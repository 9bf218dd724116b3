/**
 * Send a request, going through the response cache when one is given.
 * Only successful (200) responses stay cached.
 */

import { requestKey, type PreparedRequest } from '../request/RequestBuilder.js';
import type { ResponseCache } from './ResponseCache.js';
import type { RawResponse, Transport } from './types.js';

export interface DispatchResult {
  response: RawResponse;
  cached: boolean;
}

export async function dispatch(
  transport: Transport,
  request: PreparedRequest,
  cache?: ResponseCache
): Promise<DispatchResult> {
  if (!cache) {
    return { response: await transport.send(request), cached: false };
  }

  const key = requestKey(request);
  const hit = cache.get(key);
  if (hit) {
    return { response: await hit, cached: true };
  }

  const pending = transport.send(request);
  cache.set(key, pending);

  let response: RawResponse;
  try {
    response = await pending;
  } catch (err) {
    cache.evict(key, pending);
    throw err;
  }
  if (response.status !== 200) {
    cache.evict(key, pending);
  }
  return { response, cached: false };
}
