/**
 * Tests for the client facade, against an in-process stub transport.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { PubChemClient } from './PubChemClient.js';
import { createLogger, type LogLevel } from '../core/logger.js';
import { AsyncJobTimeoutError, PubChemServiceError, UnsupportedOperationError } from '../core/errors.js';
import { formatUrl, type PreparedRequest } from '../request/RequestBuilder.js';
import { ResponseCache } from '../transport/ResponseCache.js';
import type { RawResponse, Transport } from '../transport/types.js';

const here = dirname(fileURLToPath(import.meta.url));
const BASE = 'https://example.test/rest/pug';
const VIEW_BASE = 'https://example.test/rest/pug_view';

function fixture(...path: string[]): string {
  return readFileSync(join(here, '..', ...path), 'utf-8');
}

function text(status: number, body: string): RawResponse {
  return { status, body: new TextEncoder().encode(body) };
}

function json(status: number, value: unknown): RawResponse {
  return text(status, JSON.stringify(value));
}

function waiting(listKey: string): RawResponse {
  return json(202, { Waiting: { ListKey: listKey, Message: 'Your request is running' } });
}

/**
 * Answers each URL from its queue of responses; the last one repeats.
 */
class StubTransport implements Transport {
  readonly requests: PreparedRequest[] = [];

  constructor(private readonly routes: Record<string, RawResponse[]>) {}

  async send(request: PreparedRequest): Promise<RawResponse> {
    const url = formatUrl(request);
    const seen = this.requests.filter((r) => formatUrl(r) === url).length;
    this.requests.push(request);
    const queue = this.routes[url] ?? [];
    const response = queue[Math.min(seen, queue.length - 1)];
    if (!response) {
      throw new Error(`Unexpected request: ${url}`);
    }
    return response;
  }

  get urls(): string[] {
    return this.requests.map(formatUrl);
  }
}

function fakeClock(): { now: () => number; sleep: (ms: number) => Promise<void>; sleeps: number[] } {
  let time = 0;
  const sleeps: number[] = [];
  return {
    now: () => time,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      time += ms;
    },
    sleeps,
  };
}

function setup(routes: Record<string, RawResponse[]>, options: { cache?: ResponseCache; level?: LogLevel } = {}) {
  const transport = new StubTransport(routes);
  const clock = fakeClock();
  const lines: string[] = [];
  const client = new PubChemClient({
    transport,
    cache: options.cache,
    logger: createLogger({ level: options.level ?? 'debug', sink: (_level, line) => lines.push(line) }),
    baseUrl: BASE,
    viewBaseUrl: VIEW_BASE,
    polling: { intervalMs: 2000, maxWaitMs: 5000 },
    sleep: clock.sleep,
    now: clock.now,
  });
  return { client, transport, clock, lines };
}

describe('PubChemClient records', () => {
  it('fetches a compound record by CID', async () => {
    const { client, transport } = setup({
      [`${BASE}/compound/cid/2244/JSON`]: [text(200, fixture('records', 'fixtures', 'aspirin-2244.json'))],
    });

    const compound = await client.getCompound(2244);

    expect(transport.urls).toEqual([`${BASE}/compound/cid/2244/JSON`]);
    expect(compound.cid).toBe(2244);
    expect(compound.molecularFormula).toBe('C9H8O4');
    expect(compound.isomericSmiles).toBe('CC(=O)OC1=CC=CC=C1C(=O)O');
  });

  it('asks for 3D records through record_type', async () => {
    const { client, transport } = setup({
      [`${BASE}/compound/cid/962/JSON?record_type=3d`]: [json(200, { PC_Compounds: [] })],
    });
    expect(await client.getCompounds(962, 'cid', { recordType: '3d' })).toEqual([]);
    expect(transport.urls).toEqual([`${BASE}/compound/cid/962/JSON?record_type=3d`]);
  });

  it('fetches supplemental synonyms once through the client', async () => {
    const { client, transport } = setup({
      [`${BASE}/compound/cid/2244/JSON`]: [text(200, fixture('records', 'fixtures', 'aspirin-2244.json'))],
      [`${BASE}/compound/cid/2244/synonyms/JSON`]: [
        json(200, { InformationList: { Information: [{ CID: 2244, Synonym: ['aspirin', 'acetylsalicylic acid'] }] } }),
      ],
    });

    const compound = await client.getCompound(2244);
    expect(await compound.synonyms()).toEqual(['aspirin', 'acetylsalicylic acid']);
    await compound.synonyms();

    expect(transport.urls).toEqual([`${BASE}/compound/cid/2244/JSON`, `${BASE}/compound/cid/2244/synonyms/JSON`]);
  });

  it('reads assays from the description operation', async () => {
    const { client } = setup({
      [`${BASE}/assay/aid/1000/description/JSON`]: [
        json(200, { PC_AssayContainer: [{ assay: { descr: { aid: { id: 1000, version: 1 }, name: 'Example screen' } } }] }),
      ],
    });
    const assay = await client.getAssay(1000);
    expect(assay.name).toBe('Example screen');
  });

  it('passes the service fault message through', async () => {
    const { client } = setup({
      [`${BASE}/compound/cid/999999999/JSON`]: [
        json(404, { Fault: { Code: 'PUGREST.NotFound', Message: 'No CID found', Details: ['No record for this CID'] } }),
      ],
    });

    const error = await client.getCompound(999999999).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(PubChemServiceError);
    expect(error).toMatchObject({ statusCode: 404, code: 'PUGREST.NotFound', message: 'No CID found' });
  });

  it('falls back to the status when the error body is unreadable', async () => {
    const { client } = setup({ [`${BASE}/compound/cid/1/JSON`]: [text(503, '<html>busy</html>')] });
    await expect(client.getCompound(1)).rejects.toThrow(new PubChemServiceError(503, 'PUGREST.ServerBusy', '503 error'));
  });
});

describe('PubChemClient validation', () => {
  it('rejects an unsupported combination before sending anything', async () => {
    const { client, transport } = setup({});
    await expect(
      client.request({ domain: 'assay', namespace: 'aid', identifiers: 1000, operation: 'image', output: 'PNG' })
    ).rejects.toThrow(UnsupportedOperationError);
    expect(transport.requests).toHaveLength(0);
  });

  it('rejects property requests without properties before sending anything', async () => {
    const { client, transport } = setup({});
    await expect(client.getProperties([], 2244)).rejects.toThrow(UnsupportedOperationError);
    expect(transport.requests).toHaveLength(0);
  });
});

describe('PubChemClient tables and lists', () => {
  it('maps camelCase property names to tags', async () => {
    const { client } = setup({
      [`${BASE}/compound/cid/2244,1983/property/MolecularFormula,MolecularWeight/JSON`]: [
        json(200, {
          PropertyTable: {
            Properties: [
              { CID: 2244, MolecularFormula: 'C9H8O4', MolecularWeight: '180.16' },
              { CID: 1983, MolecularFormula: 'C8H9NO2', MolecularWeight: '151.16' },
            ],
          },
        }),
      ],
    });

    const rows = await client.getProperties(['molecularFormula', 'molecularWeight'], [2244, 1983]);
    expect(rows).toEqual([
      { CID: 2244, MolecularFormula: 'C9H8O4', MolecularWeight: 180.16 },
      { CID: 1983, MolecularFormula: 'C8H9NO2', MolecularWeight: 151.16 },
    ]);
  });

  it('returns property tables from CSV', async () => {
    const { client } = setup({
      [`${BASE}/compound/cid/2244/property/XLogP/CSV`]: [text(200, '"CID","XLogP"\n2244,1.2\n')],
    });
    expect(await client.getPropertyTable('xlogp', 2244)).toEqual({ header: ['CID', 'XLogP'], rows: [['2244', '1.2']] });
  });

  it('reads CIDs for a name', async () => {
    const { client } = setup({
      [`${BASE}/compound/name/acetic%20acid/cids/JSON`]: [json(200, { IdentifierList: { CID: [176] } })],
    });
    expect(await client.getCids('acetic acid')).toEqual([176]);
  });

  it('sends InChI identifiers in a POST body', async () => {
    const { client, transport } = setup({
      [`${BASE}/compound/inchi/cids/JSON`]: [json(200, { IdentifierList: { CID: [962] } })],
    });
    expect(await client.getCids('InChI=1S/H2O/h1H2', 'inchi')).toEqual([962]);
    expect(transport.requests[0]?.body).toBe('inchi=InChI%3D1S%2FH2O%2Fh1H2');
  });

  it('lists depositors', async () => {
    const { client } = setup({
      [`${BASE}/sources/assay/JSON`]: [json(200, { InformationList: { SourceName: ['Depositor A'] } })],
    });
    expect(await client.getAllSources('assay')).toEqual(['Depositor A']);
  });

  it('returns image bytes', async () => {
    const png = new Uint8Array([0x89, 0x50, 0x4e, 0x47]);
    const { client } = setup({
      [`${BASE}/compound/cid/2244/PNG?image_size=large`]: [{ status: 200, body: png }],
    });
    expect(await client.getImage(2244, 'cid', { imageSize: 'large' })).toEqual(png);
  });
});

describe('PubChemClient asynchronous searches', () => {
  it('polls a listkey until the search settles', async () => {
    const { client, transport, clock, lines } = setup({
      [`${BASE}/compound/formula/C9H8O4/cids/JSON`]: [waiting('123456789')],
      [`${BASE}/compound/listkey/123456789/cids/JSON`]: [waiting('123456789'), json(200, { IdentifierList: { CID: [2244, 5161] } })],
    });

    expect(await client.getCids('C9H8O4', 'formula')).toEqual([2244, 5161]);
    expect(transport.urls).toEqual([
      `${BASE}/compound/formula/C9H8O4/cids/JSON`,
      `${BASE}/compound/listkey/123456789/cids/JSON`,
      `${BASE}/compound/listkey/123456789/cids/JSON`,
    ]);
    expect(clock.sleeps).toEqual([2000, 2000]);
    expect(lines).toContain('[pubchem] INFO  Search is running asynchronously, polling listkey {"listKey":"123456789"}');
  });

  it('gives up once the maximum wait has elapsed', async () => {
    const { client, transport } = setup({
      [`${BASE}/compound/formula/C6H6/cids/JSON`]: [waiting('42')],
      [`${BASE}/compound/listkey/42/cids/JSON`]: [waiting('42')],
    });

    const error = await client.getCids('C6H6', 'formula').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(AsyncJobTimeoutError);
    expect(error).toMatchObject({ listKey: '42', waitedMs: 6000 });
    expect(transport.requests).toHaveLength(4);
  });

  it('fetches non-JSON output from the listkey after the search settles', async () => {
    const { client, transport } = setup({
      [`${BASE}/compound/substructure/smiles/CCO/property/MolecularWeight/JSON`]: [waiting('77')],
      [`${BASE}/compound/listkey/77/property/MolecularWeight/JSON`]: [
        json(200, { PropertyTable: { Properties: [{ CID: 702, MolecularWeight: '46.07' }] } }),
      ],
      [`${BASE}/compound/listkey/77/property/MolecularWeight/CSV`]: [text(200, '"CID","MolecularWeight"\n702,46.07\n')],
    });

    const table = await client.getPropertyTable('molecularWeight', 'CCO', 'smiles', { searchtype: 'substructure' });
    expect(table).toEqual({ header: ['CID', 'MolecularWeight'], rows: [['702', '46.07']] });
    expect(transport.urls).toEqual([
      `${BASE}/compound/substructure/smiles/CCO/property/MolecularWeight/JSON`,
      `${BASE}/compound/listkey/77/property/MolecularWeight/JSON`,
      `${BASE}/compound/listkey/77/property/MolecularWeight/CSV`,
    ]);
  });

  it('uses an immediate answer without polling', async () => {
    const { client, transport } = setup({
      [`${BASE}/compound/identity/cid/2244/cids/JSON`]: [json(200, { IdentifierList: { CID: [2244] } })],
    });
    expect(await client.getCids(2244, 'cid', 'compound', { searchtype: 'identity' })).toEqual([2244]);
    expect(transport.requests).toHaveLength(1);
  });

  it('sends cross-reference searches once without polling', async () => {
    const { client, transport, clock } = setup({
      [`${BASE}/compound/xref/RegistryID/50-78-2/cids/JSON`]: [json(200, { IdentifierList: { CID: [2244] } })],
    });
    expect(await client.getCids('50-78-2', 'RegistryID', 'compound', { searchtype: 'xref' })).toEqual([2244]);
    expect(transport.urls).toEqual([`${BASE}/compound/xref/RegistryID/50-78-2/cids/JSON`]);
    expect(clock.sleeps).toEqual([]);
  });

  it('looks substances up by depositor ID', async () => {
    const { client, transport } = setup({
      [`${BASE}/substance/sourceid/DTP.NCI/747285/cids/JSON`]: [json(200, { IdentifierList: { CID: [2244] } })],
    });
    expect(await client.getCids('747285', 'sourceid/DTP/NCI', 'substance')).toEqual([2244]);
    expect(transport.urls).toEqual([`${BASE}/substance/sourceid/DTP.NCI/747285/cids/JSON`]);
  });
});

describe('PubChemClient cache', () => {
  it('serves a repeated request from the cache', async () => {
    const url = `${BASE}/compound/cid/2244/property/MolecularFormula/JSON`;
    const { client, transport, lines } = setup(
      { [url]: [json(200, { PropertyTable: { Properties: [{ CID: 2244, MolecularFormula: 'C9H8O4' }] } })] },
      { cache: new ResponseCache(10) }
    );

    const first = await client.getProperties('molecularFormula', 2244);
    const second = await client.getProperties('molecularFormula', 2244);

    expect(second).toEqual(first);
    expect(transport.requests).toHaveLength(1);
    expect(lines).toContain(`[pubchem] DEBUG Cache hit {"url":"${url}"}`);
  });

  it('does not keep waiting tokens', async () => {
    const cache = new ResponseCache(10);
    const { client } = setup(
      {
        [`${BASE}/compound/formula/CH4/cids/JSON`]: [waiting('5')],
        [`${BASE}/compound/listkey/5/cids/JSON`]: [json(200, { IdentifierList: { CID: [297] } })],
      },
      { cache }
    );
    await client.getCids('CH4', 'formula');
    expect(cache.size).toBe(1);
  });
});

describe('PubChemClient safety data', () => {
  it('parses the GHS classification of a compound', async () => {
    const { client, transport } = setup({
      [`${VIEW_BASE}/data/compound/1254/JSON?heading=GHS+Classification`]: [text(200, fixture('safety', 'fixtures', 'ghs-1254.json'))],
    });

    const safety = await client.getSafetyData(1254);

    expect(safety.hazard).toEqual(['H315', 'H318', 'H319', 'H335', 'H402', 'H412']);
    expect(safety.pictogram.map((p) => p.icon)).toEqual(['GHS05.svg', 'GHS07.svg']);
    expect(transport.urls).toEqual([`${VIEW_BASE}/data/compound/1254/JSON?heading=GHS+Classification`]);
  });

  it('returns empty lists when PUG View has no classification', async () => {
    const { client, lines } = setup({
      [`${VIEW_BASE}/data/compound/9999/JSON?heading=GHS+Classification`]: [
        json(404, { Fault: { Code: 'PUGVIEW.NotFound', Message: 'No data found' } }),
      ],
    });

    expect(await client.getSafetyData(9999)).toEqual({ pictogram: [], hazard: [], precautionary: [] });
    expect(lines).toContain('[pubchem] INFO  No GHS classification available {"cid":9999}');
  });

  it('propagates other service errors', async () => {
    const { client } = setup({
      [`${VIEW_BASE}/data/compound/1/JSON?heading=GHS+Classification`]: [text(500, 'Code: PUGVIEW.ServerError\nMessage: Internal failure')],
    });
    await expect(client.getSafetyData(1)).rejects.toThrow('Internal failure');
  });
});

describe('PubChemClient downloads', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pubchem-download-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const spec = { domain: 'compound', namespace: 'cid', identifiers: 2244, operation: 'record', output: 'SDF' } as const;
  const sdf = '2244\n  -OEChem-\n\nM  END\n$$$$\n';

  it('writes the raw body to a file', async () => {
    const { client } = setup({ [`${BASE}/compound/cid/2244/SDF`]: [text(200, sdf)] });
    const path = join(dir, 'aspirin.sdf');

    await client.downloadToFile(path, spec);

    expect(await readFile(path, 'utf-8')).toBe(sdf);
  });

  it('refuses to replace a file unless asked to', async () => {
    const { client } = setup({ [`${BASE}/compound/cid/2244/SDF`]: [text(200, sdf)] });
    const path = join(dir, 'aspirin.sdf');
    await client.downloadToFile(path, spec);

    await expect(client.downloadToFile(path, spec)).rejects.toMatchObject({ code: 'EEXIST' });
    await expect(client.downloadToFile(path, spec, { overwrite: true })).resolves.toBeUndefined();
  });

  it('raises the fault instead of writing an error body', async () => {
    const { client } = setup({
      [`${BASE}/compound/cid/2244/SDF`]: [text(400, 'Status: 400\nCode: PUGREST.BadRequest\nMessage: Invalid request')],
    });
    await expect(client.download(spec)).rejects.toThrow('Invalid request');
  });
});
