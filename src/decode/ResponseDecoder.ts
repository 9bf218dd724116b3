/**
 * Response Decoder - turns a raw response into a tagged body according to
 * the requested output format, or raises the service's fault.
 *
 * Decoding is syntactic only; record shapes are checked by the mapper.
 */

import { z } from 'zod';
import { PubChemServiceError, ResponseParseError } from '../core/errors.js';
import type { OutputFormat } from '../request/vocabulary.js';
import type { RawResponse } from '../transport/types.js';
import { parseCsvTable } from './csv.js';

export type DecodedBody =
  | { kind: 'json'; value: unknown }
  | { kind: 'table'; header: string[]; rows: string[][] }
  | { kind: 'text'; text: string }
  | { kind: 'binary'; bytes: Uint8Array };

const FaultSchema = z.object({
  Fault: z.object({
    Code: z.string().optional(),
    Message: z.string().optional(),
    Details: z.array(z.string()).optional(),
  }),
});

interface Fault {
  code?: string | undefined;
  message?: string | undefined;
  details: string[];
}

const STATUS_CODES: Record<number, string> = {
  400: 'PUGREST.BadRequest',
  404: 'PUGREST.NotFound',
  405: 'PUGREST.NotAllowed',
  500: 'PUGREST.ServerError',
  501: 'PUGREST.Unimplemented',
  503: 'PUGREST.ServerBusy',
  504: 'PUGREST.Timeout',
};

export function statusCodeName(status: number): string {
  return STATUS_CODES[status] ?? `HTTP.${status}`;
}

function readText(body: Uint8Array): string {
  return new TextDecoder('utf-8').decode(body);
}

function faultFromJson(text: string): Fault | undefined {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = FaultSchema.safeParse(value);
  if (!parsed.success) return undefined;
  const { Code, Message, Details } = parsed.data.Fault;
  return { code: Code, message: Message, details: Details ?? [] };
}

/**
 * Plain-text faults are "Key: value" lines (Status, Code, Message, Detail).
 */
function faultFromText(text: string): Fault | undefined {
  const fault: Fault = { details: [] };
  let matched = false;
  for (const line of text.split(/\r?\n/)) {
    const match = /^\s*(Code|Message|Detail|Details)\s*:\s*(.*?)\s*$/.exec(line);
    if (!match) continue;
    const [, key, value = ''] = match;
    matched = true;
    if (key === 'Code') fault.code = value;
    else if (key === 'Message') fault.message = value;
    else fault.details.push(value);
  }
  return matched ? fault : undefined;
}

function serviceError(raw: RawResponse): PubChemServiceError {
  const text = readText(raw.body);
  const fault = faultFromJson(text) ?? faultFromText(text);
  const message = fault?.message ? fault.message : `${raw.status} error`;
  const code = fault?.code ? fault.code : statusCodeName(raw.status);
  return new PubChemServiceError(raw.status, code, message, fault?.details ?? []);
}

/**
 * Raise the service's fault for an error status; no-op otherwise.
 *
 * @throws PubChemServiceError for status >= 400
 */
export function raiseForStatus(raw: RawResponse): void {
  if (raw.status >= 400) {
    throw serviceError(raw);
  }
}

function decodeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ResponseParseError(`Malformed JSON response: ${reason}`, { cause: err });
  }
}

/**
 * Decode a response for the given output format.
 *
 * @throws PubChemServiceError for status >= 400
 * @throws ResponseParseError for a JSON body that does not parse
 */
export function decodeResponse(raw: RawResponse, output: OutputFormat): DecodedBody {
  raiseForStatus(raw);

  switch (output) {
    case 'JSON':
      return { kind: 'json', value: decodeJson(readText(raw.body)) };
    case 'CSV': {
      const { header, rows } = parseCsvTable(readText(raw.body));
      return { kind: 'table', header, rows };
    }
    case 'TXT': {
      const rows = readText(raw.body)
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0)
        .map((line) => [line]);
      return { kind: 'table', header: [], rows };
    }
    case 'XML':
    case 'ASNT':
      return { kind: 'text', text: readText(raw.body) };
    case 'PNG':
    case 'SDF':
      return { kind: 'binary', bytes: raw.body.slice() };
  }
}
