/**
 * Response decoding.
 */

export { decodeResponse, raiseForStatus, statusCodeName } from './ResponseDecoder.js';
export type { DecodedBody } from './ResponseDecoder.js';
export { parseCsvTable, splitCsvLine } from './csv.js';
export type { CsvTable } from './csv.js';
