// src/repositories/embeddingRepository.ts
// What: Per-modality id -> vector store backed by JSON files.
// How: Each modality file is read once, validated with zod and cached together with its outcome. A failed load is
//      remembered as a StoreUnavailableError so allVectors() can raise it on every request without touching disk
//      again; invalidate() forgets the cached outcome and any read in flight, whose result is then discarded.
//      Files look like { "model"?: string, "vectors": { id: [...] } }.

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import logger from '../logging.js';
import { StoreUnavailableError } from '../errors.js';
import { MODALITIES } from '../models/types.js';
import type { EmbeddingMap, EmbeddingVector, Modality, RecordId } from '../models/types.js';

const fileSchema = z.object({
  model: z.string().optional(),
  vectors: z.record(z.string(), z.array(z.number().finite())),
});

type LoadOutcome = { ok: true; map: EmbeddingMap } | { ok: false; error: StoreUnavailableError };

export function parseEmbeddingMap(modality: Modality, raw: unknown): EmbeddingMap {
  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StoreUnavailableError(modality, `Malformed ${modality} embedding file: ${parsed.error.message}`);
  }

  const vectors = new Map<RecordId, EmbeddingVector>();
  let dimension = -1;
  for (const [id, vector] of Object.entries(parsed.data.vectors)) {
    if (dimension === -1) dimension = vector.length;
    if (vector.length !== dimension) {
      throw new StoreUnavailableError(
        modality,
        `Inconsistent ${modality} vector length for ${id}: ${vector.length} vs ${dimension}`,
      );
    }
    vectors.set(id, vector);
  }
  return { modality, dimension: Math.max(dimension, 0), vectors };
}

export class EmbeddingRepository {
  private readonly outcomes = new Map<Modality, LoadOutcome>();
  private readonly inflight = new Map<Modality, Promise<LoadOutcome>>();
  private readonly generations = new Map<Modality, number>();

  constructor(private readonly paths: Partial<Record<Modality, string>>) {}

  /** In-memory repository over already materialised maps. */
  static fromMaps(maps: Partial<Record<Modality, EmbeddingMap>>): EmbeddingRepository {
    const repo = new EmbeddingRepository({});
    for (const modality of MODALITIES) {
      const map = maps[modality];
      if (map) repo.outcomes.set(modality, { ok: true, map });
    }
    return repo;
  }

  /**
   * Load one modality, at most once until invalidated.
   * Rejects with StoreUnavailableError when the file is missing or corrupt.
   */
  async load(modality: Modality): Promise<EmbeddingMap> {
    const outcome = await this.resolve(modality);
    if (!outcome.ok) throw outcome.error;
    return outcome.map;
  }

  /** Load every configured modality; failures are logged and kept for allVectors(). */
  async preload(): Promise<void> {
    await Promise.all(MODALITIES.map((m) => this.resolve(m)));
  }

  allVectors(modality: Modality): EmbeddingMap {
    const outcome = this.outcomes.get(modality);
    if (!outcome) {
      throw new StoreUnavailableError(modality, `${modality} embeddings have not been loaded`);
    }
    if (!outcome.ok) throw outcome.error;
    return outcome.map;
  }

  vectorFor(modality: Modality, id: RecordId): EmbeddingVector | undefined {
    const outcome = this.outcomes.get(modality);
    return outcome?.ok ? outcome.map.vectors.get(id) : undefined;
  }

  invalidate(modality?: Modality): void {
    const targets = modality ? [modality] : MODALITIES;
    for (const m of targets) {
      // In-memory maps have no file to reload from
      if (!this.paths[m]) continue;
      this.generations.set(m, this.generationOf(m) + 1);
      this.outcomes.delete(m);
      this.inflight.delete(m);
    }
  }

  private resolve(modality: Modality): Promise<LoadOutcome> {
    const cached = this.outcomes.get(modality);
    if (cached) return Promise.resolve(cached);

    const joined = this.inflight.get(modality);
    if (joined) return joined;

    const generation = this.generationOf(modality);
    const pending: Promise<LoadOutcome> = this.readOutcome(modality).then((outcome) => {
      // Invalidated while reading: hand the result to this caller only
      if (generation === this.generationOf(modality)) this.outcomes.set(modality, outcome);
      if (this.inflight.get(modality) === pending) this.inflight.delete(modality);
      return outcome;
    });
    this.inflight.set(modality, pending);
    return pending;
  }

  private generationOf(modality: Modality): number {
    return this.generations.get(modality) ?? 0;
  }

  private async readOutcome(modality: Modality): Promise<LoadOutcome> {
    const file = this.paths[modality];
    if (!file) {
      return { ok: false, error: new StoreUnavailableError(modality, `No ${modality} embedding file configured`) };
    }
    try {
      const text = await fs.readFile(file, 'utf8');
      const map = parseEmbeddingMap(modality, JSON.parse(text));
      logger.info({ modality, file, count: map.vectors.size, dimension: map.dimension }, 'Embedding map loaded');
      return { ok: true, map };
    } catch (err: unknown) {
      const error =
        err instanceof StoreUnavailableError
          ? err
          : new StoreUnavailableError(modality, `Cannot read ${modality} embeddings from ${file}`, { cause: err });
      logger.warn({ err: error, modality, file }, 'Embedding map unavailable');
      return { ok: false, error };
    }
  }
}

/** Write an embedding file in the format EmbeddingRepository reads. */
export async function saveEmbeddingMap(file: string, map: EmbeddingMap, model?: string): Promise<void> {
  const vectors: Record<RecordId, EmbeddingVector> = {};
  for (const [id, vector] of map.vectors) vectors[id] = vector;
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, JSON.stringify({ model, vectors }), 'utf8');
}
