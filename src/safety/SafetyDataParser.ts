/**
 * GHS safety data from a PUG View compound record.
 *
 * PUG View nests headed sections (`TOCHeading`, `Section`, `Information`).
 * Every section headed "GHS Classification" contributes pictograms, hazard
 * codes and precautionary codes, taken from its Information entries by name.
 */

import { z } from 'zod';
import { SafetyDataParseError } from '../core/errors.js';
import { isRecord } from '../core/guards.js';

export interface Pictogram {
  /** Icon file name, e.g. "GHS07.svg" */
  icon: string;
  /** Label, e.g. "Irritant" */
  string: string;
}

export interface SafetyData {
  readonly pictogram: readonly Pictogram[];
  readonly hazard: readonly string[];
  readonly precautionary: readonly string[];
}

const GHS_HEADING = 'ghs classification';
const PICTOGRAM_NAMES = new Set(['ghs hazard pictograms', 'pictogram(s)']);
const HAZARD_NAMES = new Set(['ghs hazard statements']);
const PRECAUTIONARY_NAMES = new Set(['precautionary statements', 'precautionary statement codes']);

const HAZARD_PATTERN = /^\s*(H\d{3}(?:\+H\d{3})*)/;
const PRECAUTIONARY_PATTERN = /P\d{3}(?:\+P\d{3})*/g;

const MarkupSchema = z.looseObject({
  URL: z.string().optional(),
  Extra: z.string().optional(),
  Type: z.string().optional(),
});

const StringWithMarkupSchema = z.looseObject({
  String: z.string(),
  Markup: z.array(MarkupSchema).optional(),
});

const InformationSchema = z.looseObject({
  Name: z.string().optional(),
  Value: z
    .looseObject({
      StringWithMarkup: z.array(StringWithMarkupSchema).optional(),
    })
    .optional(),
});

const GhsSectionSchema = z.looseObject({
  Information: z.array(InformationSchema).optional(),
});

type Information = z.infer<typeof InformationSchema>;

export function emptySafetyData(): SafetyData {
  return Object.freeze({ pictogram: Object.freeze([]), hazard: Object.freeze([]), precautionary: Object.freeze([]) });
}

/**
 * Collect every section with the given heading, depth first, in document order.
 */
function findSections(node: unknown, heading: string, found: unknown[] = []): unknown[] {
  if (!isRecord(node)) return found;
  if (typeof node.TOCHeading === 'string' && node.TOCHeading.toLowerCase() === heading) {
    found.push(node);
  }
  if (Array.isArray(node.Section)) {
    for (const child of node.Section) {
      findSections(child, heading, found);
    }
  }
  return found;
}

class OrderedSet<T> {
  private readonly keys = new Set<string>();
  readonly items: T[] = [];

  constructor(private readonly keyOf: (item: T) => string) {}

  add(item: T): void {
    const key = this.keyOf(item);
    if (this.keys.has(key)) return;
    this.keys.add(key);
    this.items.push(item);
  }
}

function statements(info: Information): string[] {
  return (info.Value?.StringWithMarkup ?? []).map((entry) => entry.String);
}

function collectPictograms(info: Information, into: OrderedSet<Pictogram>): void {
  for (const entry of info.Value?.StringWithMarkup ?? []) {
    for (const markup of entry.Markup ?? []) {
      if (markup.URL === undefined || markup.Extra === undefined) {
        throw new SafetyDataParseError(`Pictogram markup without ${markup.URL === undefined ? 'URL' : 'label'}`);
      }
      const icon = markup.URL.slice(markup.URL.lastIndexOf('/') + 1);
      into.add({ icon, string: markup.Extra });
    }
  }
}

/**
 * Extract SafetyData from a decoded PUG View response.
 *
 * @throws SafetyDataParseError when the response or a GHS section has an unexpected layout
 */
export function parseSafetyData(json: unknown): SafetyData {
  const record = isRecord(json) ? json.Record : undefined;
  if (!isRecord(record)) {
    throw new SafetyDataParseError('PUG View response has no Record object');
  }

  const pictograms = new OrderedSet<Pictogram>((p) => `${p.icon}\u0000${p.string}`);
  const hazards = new OrderedSet<string>((code) => code);
  const precautionary = new OrderedSet<string>((code) => code);

  for (const section of findSections(record, GHS_HEADING)) {
    const parsed = GhsSectionSchema.safeParse(section);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.map(String).join('.')}: ${issue.message}` : 'unknown';
      throw new SafetyDataParseError(`Unexpected GHS Classification layout (${where})`);
    }

    for (const info of parsed.data.Information ?? []) {
      const name = (info.Name ?? '').trim().toLowerCase();
      if (PICTOGRAM_NAMES.has(name)) {
        collectPictograms(info, pictograms);
      } else if (HAZARD_NAMES.has(name)) {
        for (const text of statements(info)) {
          const match = HAZARD_PATTERN.exec(text);
          const codes = match?.[1]?.split('+') ?? [];
          codes.forEach((code) => hazards.add(code));
        }
      } else if (PRECAUTIONARY_NAMES.has(name)) {
        for (const text of statements(info)) {
          for (const match of text.matchAll(PRECAUTIONARY_PATTERN)) {
            precautionary.add(match[0]);
          }
        }
      }
    }
  }

  return Object.freeze({
    pictogram: Object.freeze(pictograms.items.map((p) => Object.freeze(p))),
    hazard: Object.freeze(hazards.items),
    precautionary: Object.freeze(precautionary.items),
  });
}
