/**
 * MCP tools for PubChem lookups through the PUG REST client.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { PubChemClient } from '../../client/PubChemClient.js';
import type { CompoundPropertyName } from '../../records/Compound.js';
import { SEARCH_TYPES } from '../../request/vocabulary.js';
import { jsonResult, toolError } from '../helpers.js';

/** Properties reported per compound by pubchem_compound. */
const SUMMARY_PROPERTIES: readonly CompoundPropertyName[] = [
  'cid', 'molecularFormula', 'molecularWeight', 'canonicalSmiles', 'isomericSmiles', 'inchi', 'inchikey',
  'iupacName', 'xlogp', 'exactMass', 'tpsa', 'complexity', 'hBondDonorCount', 'hBondAcceptorCount',
  'rotatableBondCount', 'heavyAtomCount', 'charge',
];

const identifierSchema = z.union([z.string(), z.number()]);
const lookupNamespace = z.enum(['cid', 'name', 'smiles', 'inchi', 'inchikey', 'formula']);
const searchNamespace = z.enum(['name', 'smiles', 'inchi', 'inchikey', 'formula', 'cid']);

export function registerPubChemTools(server: McpServer, client: PubChemClient): void {
  // ── pubchem_compound ───────────────────────────────────────────
  server.tool(
    'pubchem_compound',
    'Fetch PubChem compound records and return their main descriptors: formula, weight, SMILES, InChI, IUPAC name and counts.',
    {
      identifier: identifierSchema.describe('CID, name, SMILES, InChI, InChIKey or formula'),
      namespace: lookupNamespace.optional().describe('What the identifier is (default "cid")'),
    },
    async (args) => {
      try {
        const compounds = await client.getCompounds(args.identifier, args.namespace ?? 'cid');
        return jsonResult({ compounds: compounds.map((compound) => compound.toDict(SUMMARY_PROPERTIES)) });
      } catch (err) {
        return toolError(err);
      }
    }
  );

  // ── pubchem_properties ─────────────────────────────────────────
  server.tool(
    'pubchem_properties',
    'Read computed properties for one or more compounds. Property names may be camelCase (molecularWeight) or PubChem tags (MolecularWeight).',
    {
      identifiers: z.array(identifierSchema).min(1).describe('Compound identifiers'),
      properties: z.array(z.string()).min(1).describe('Property names'),
      namespace: lookupNamespace.optional().describe('What the identifiers are (default "cid")'),
    },
    async (args) => {
      try {
        const rows = await client.getProperties(args.properties, args.identifiers, args.namespace ?? 'cid');
        return jsonResult({ rows });
      } catch (err) {
        return toolError(err);
      }
    }
  );

  // ── pubchem_synonyms ───────────────────────────────────────────
  server.tool(
    'pubchem_synonyms',
    'List synonyms of a compound, most common first.',
    {
      identifier: identifierSchema.describe('CID or compound name'),
      namespace: z.enum(['cid', 'name']).optional().describe('What the identifier is (default "cid")'),
      limit: z.number().int().positive().optional().describe('Maximum synonyms per compound (default 20)'),
    },
    async (args) => {
      try {
        const limit = args.limit ?? 20;
        const entries = await client.getSynonyms(args.identifier, args.namespace ?? 'cid');
        return jsonResult({
          results: entries.map((entry) => ({ cid: entry.id, synonyms: entry.synonyms.slice(0, limit) })),
        });
      } catch (err) {
        return toolError(err);
      }
    }
  );

  // ── pubchem_search ─────────────────────────────────────────────
  server.tool(
    'pubchem_search',
    'Find compound CIDs by name, structure or formula. Structure searches (substructure, superstructure, similarity, identity) run asynchronously and are polled until done.',
    {
      query: z.string().min(1).describe('Name, SMILES, InChI, InChIKey, formula or CID'),
      namespace: searchNamespace.optional().describe('What the query is (default "name")'),
      searchtype: z.enum(SEARCH_TYPES).exclude(['xref']).optional().describe('Structure or formula search type'),
      maxRecords: z.number().int().positive().optional().describe('Maximum CIDs to return'),
    },
    async (args) => {
      try {
        const cids = await client.getCids(args.query, args.namespace ?? 'name', 'compound', {
          searchtype: args.searchtype,
          maxRecords: args.maxRecords,
        });
        return jsonResult({ cids, total: cids.length });
      } catch (err) {
        return toolError(err);
      }
    }
  );

  // ── pubchem_safety ─────────────────────────────────────────────
  server.tool(
    'pubchem_safety',
    'GHS safety classification of a compound: hazard pictograms, H-codes and P-codes from PubChem.',
    {
      cid: z.number().int().positive().describe('PubChem Compound ID'),
    },
    async (args) => {
      try {
        return jsonResult(await client.getSafetyData(args.cid));
      } catch (err) {
        return toolError(err);
      }
    }
  );
}
