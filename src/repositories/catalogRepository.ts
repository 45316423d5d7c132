// src/repositories/catalogRepository.ts
// What: Read side of the spot catalog ({ "photo": [...] } JSON file) with an in-memory snapshot cache.
// How: load() parses the file once into an immutable CatalogSnapshot; concurrent callers share the in-flight read.
//      invalidate() drops the cached snapshot and the next load() swaps in a new one, so a search holding a
//      snapshot never sees records from both sides of a write. Entries without id/name are skipped with a warning.

import fs from 'node:fs/promises';
import { z } from 'zod';
import logger from '../logging.js';
import { CatalogUnavailableError } from '../errors.js';
import type { RecordId, SpotRecord } from '../models/types.js';

const entrySchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform((v) => String(v)).pipe(z.string().min(1)),
    name: z.string().min(1),
    location: z.string().optional().default(''),
    description: z.union([z.object({ _content: z.string().optional() }).passthrough(), z.string()]).optional(),
  })
  .passthrough();

const catalogSchema = z.object({
  photo: z.array(z.unknown()),
});

const CORE_KEYS = new Set(['id', 'name', 'location', 'description']);

function toRecord(entry: z.infer<typeof entrySchema>): SpotRecord {
  const textFields: Record<string, string> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (CORE_KEYS.has(key)) continue;
    if (typeof value === 'string') textFields[key] = value;
  }
  // Long-form description is nested as { _content } in stored entries
  const description = typeof entry.description === 'string' ? entry.description : entry.description?._content;
  if (description) textFields.description = description;

  return Object.freeze({
    id: entry.id,
    name: entry.name,
    location: entry.location,
    textFields: Object.freeze(textFields),
  });
}

export function parseCatalog(raw: unknown): SpotRecord[] {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CatalogUnavailableError(`Malformed catalog: ${parsed.error.message}`);
  }

  const records: SpotRecord[] = [];
  const seen = new Set<RecordId>();
  parsed.data.photo.forEach((item, index) => {
    const entry = entrySchema.safeParse(item);
    if (!entry.success) {
      logger.warn({ index, issues: entry.error.issues }, 'Skipping invalid catalog entry');
      return;
    }
    if (seen.has(entry.data.id)) {
      logger.warn({ index, id: entry.data.id }, 'Skipping duplicate catalog id');
      return;
    }
    seen.add(entry.data.id);
    records.push(toRecord(entry.data));
  });
  return records;
}

export class CatalogSnapshot {
  private readonly records: readonly SpotRecord[];
  private readonly index: ReadonlyMap<RecordId, SpotRecord>;

  constructor(records: readonly SpotRecord[]) {
    this.records = Object.freeze([...records]);
    const index = new Map<RecordId, SpotRecord>();
    for (const r of this.records) {
      if (!index.has(r.id)) index.set(r.id, r);
    }
    this.index = index;
  }

  get size(): number {
    return this.records.length;
  }

  /** Storage order. */
  allRecords(): readonly SpotRecord[] {
    return this.records;
  }

  byId(id: RecordId): SpotRecord | undefined {
    return this.index.get(id);
  }

  /** Records whose location contains any keyword (case-sensitive substring). */
  byLocationKeyword(keywords: ReadonlySet<string>): SpotRecord[] {
    if (keywords.size === 0) return [];
    const terms = [...keywords].filter((k) => k.length > 0);
    return this.records.filter((r) => r.location.length > 0 && terms.some((k) => r.location.includes(k)));
  }
}

export class CatalogRepository {
  private snapshot: CatalogSnapshot | null = null;
  private inflight: Promise<CatalogSnapshot> | null = null;
  private generation = 0;

  constructor(private readonly catalogPath: string) {}

  async load(): Promise<CatalogSnapshot> {
    if (this.snapshot) return this.snapshot;
    if (!this.inflight) {
      const generation = this.generation;
      const pending: Promise<CatalogSnapshot> = this.read().then(
        (snapshot) => {
          // A write that invalidated mid-read must not have its stale result installed
          if (generation === this.generation) this.snapshot = snapshot;
          if (this.inflight === pending) this.inflight = null;
          return snapshot;
        },
        (err: unknown) => {
          if (this.inflight === pending) this.inflight = null;
          throw err;
        },
      );
      this.inflight = pending;
    }
    return this.inflight;
  }

  invalidate(): void {
    this.generation += 1;
    this.snapshot = null;
    this.inflight = null;
  }

  private async read(): Promise<CatalogSnapshot> {
    let text: string;
    try {
      text = await fs.readFile(this.catalogPath, 'utf8');
    } catch (err: unknown) {
      throw new CatalogUnavailableError(`Cannot read catalog at ${this.catalogPath}`, { cause: err });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err: unknown) {
      throw new CatalogUnavailableError(`Catalog at ${this.catalogPath} is not valid JSON`, { cause: err });
    }

    const snapshot = new CatalogSnapshot(parseCatalog(raw));
    logger.info({ file: this.catalogPath, records: snapshot.size }, 'Catalog loaded');
    return snapshot;
  }
}
