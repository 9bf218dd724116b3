/**
 * Polling for asynchronous PUG REST jobs.
 *
 * Searches that take a while answer with a waiting token
 * (`{"Waiting": {"ListKey": "..."}}`); the result is later read from the
 * listkey until the service stops answering with a token.
 */

import { z } from 'zod';
import { AsyncJobTimeoutError } from '../core/errors.js';

const WaitingSchema = z.object({
  Waiting: z.object({
    ListKey: z.union([z.string(), z.number()]),
    Message: z.string().optional(),
  }),
});

/**
 * Return the listkey of a waiting token, or undefined for any other value.
 */
export function readListKey(value: unknown): string | undefined {
  const parsed = WaitingSchema.safeParse(value);
  return parsed.success ? String(parsed.data.Waiting.ListKey) : undefined;
}

export interface PollOptions {
  intervalMs: number;
  maxWaitMs: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export type PollStep<T> = { waiting: true } | { waiting: false; value: T };

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Call `check` every `intervalMs` until it stops reporting `waiting`.
 *
 * @throws AsyncJobTimeoutError once `maxWaitMs` has elapsed
 */
export async function pollListKey<T>(
  listKey: string,
  check: () => Promise<PollStep<T>>,
  options: PollOptions
): Promise<T> {
  const sleep = options.sleep ?? delay;
  const now = options.now ?? Date.now;
  const startedAt = now();

  for (;;) {
    const elapsed = now() - startedAt;
    if (elapsed >= options.maxWaitMs) {
      throw new AsyncJobTimeoutError(listKey, elapsed);
    }
    await sleep(options.intervalMs);
    const step = await check();
    if (!step.waiting) {
      return step.value;
    }
  }
}
