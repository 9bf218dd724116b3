/**
 * Transport, response cache and listkey polling.
 */

export type { RawResponse, Transport } from './types.js';
export { FetchTransport } from './FetchTransport.js';
export type { FetchFn, FetchTransportOptions } from './FetchTransport.js';
export { ResponseCache } from './ResponseCache.js';
export { dispatch } from './dispatch.js';
export type { DispatchResult } from './dispatch.js';
export { pollListKey, readListKey, delay } from './ListKeyPoller.js';
export type { PollOptions, PollStep } from './ListKeyPoller.js';
