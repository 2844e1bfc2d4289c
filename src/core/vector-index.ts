import { ChunkRecord, EmbeddedChunk, stripEmbedding } from './chunk';
import { CorruptIndexError, DimensionMismatch, NoEmbeddingsFound, Result, err, ok } from './errors';

export interface IndexMetadata {
  channelName: string;
  dimension: number;
  chunkCount: number;
  buildTimestamp: string;
}

/** Persisted form of an index. `vectors[i]` belongs to `chunks[i]`. */
export interface IndexSnapshot {
  metadata: IndexMetadata;
  vectors: number[][];
  chunks: ChunkRecord[];
}

export type SearchHit = ChunkRecord & {
  distance: number;
  score: number;
};

export interface Neighbor {
  position: number;
  distance: number;
}

/**
 * Returns up to `k` neighbours of `query`, nearest first. Implementations other than the
 * exact scan may return fewer, or positions that do not exist; the index drops those.
 */
export type NearestNeighborSearch = (
  vectors: readonly (readonly number[])[],
  query: readonly number[],
  k: number,
) => Neighbor[];

export function squaredL2(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    sum += diff * diff;
  }
  return sum;
}

// Linear scan; ties go to the lower position so repeated queries order identically.
export const exactL2Search: NearestNeighborSearch = (vectors, query, k) => {
  if (k < 1) return [];

  const neighbors = vectors.map((vector, position) => ({ position, distance: squaredL2(vector, query) }));
  neighbors.sort((a, b) => a.distance - b.distance || a.position - b.position);
  return neighbors.slice(0, k);
};

export const distanceToScore = (distance: number): number => 1 / (1 + distance);

export interface VectorIndexOptions {
  neighborSearch?: NearestNeighborSearch;
}

export class VectorIndex {
  private readonly neighborSearch: NearestNeighborSearch;

  private constructor(
    readonly metadata: Readonly<IndexMetadata>,
    private readonly vectors: readonly (readonly number[])[],
    private readonly chunks: readonly ChunkRecord[],
    options: VectorIndexOptions,
  ) {
    this.neighborSearch = options.neighborSearch ?? exactL2Search;
  }

  /**
   * Concatenates the collections in the order given, then record order within each.
   * Every embedding must share the width of the first one.
   */
  static build(
    channelName: string,
    collections: readonly EmbeddedChunk[][],
    options: VectorIndexOptions & { now?: Date } = {},
  ): Result<VectorIndex, NoEmbeddingsFound | DimensionMismatch> {
    const all = collections.flat();
    const first = all[0];
    if (!first) {
      return err(new NoEmbeddingsFound(channelName));
    }

    const dimension = first.embedding.length;
    const vectors: number[][] = [];
    const chunks: ChunkRecord[] = [];
    for (const chunk of all) {
      if (chunk.embedding.length !== dimension) {
        return err(new DimensionMismatch(dimension, chunk.embedding.length, chunk.chunkId));
      }
      vectors.push([...chunk.embedding]);
      chunks.push(stripEmbedding(chunk));
    }

    const metadata: IndexMetadata = {
      channelName,
      dimension,
      chunkCount: chunks.length,
      buildTimestamp: (options.now ?? new Date()).toISOString(),
    };
    return ok(new VectorIndex(metadata, vectors, chunks, options));
  }

  static restore(snapshot: IndexSnapshot, options: VectorIndexOptions = {}): VectorIndex {
    const { metadata, vectors, chunks } = snapshot;
    const fail = (reason: string) => new CorruptIndexError(metadata.channelName, reason);

    if (vectors.length !== chunks.length) {
      throw fail(`${vectors.length} vectors but ${chunks.length} chunks`);
    }
    if (vectors.length !== metadata.chunkCount) {
      throw fail(`metadata records ${metadata.chunkCount} chunks, found ${vectors.length}`);
    }
    const badPosition = vectors.findIndex((vector) => vector.length !== metadata.dimension);
    if (badPosition !== -1) {
      throw fail(`vector ${badPosition} does not have dimension ${metadata.dimension}`);
    }

    return new VectorIndex({ ...metadata }, vectors, chunks, options);
  }

  get dimension(): number {
    return this.metadata.dimension;
  }

  get size(): number {
    return this.chunks.length;
  }

  search(queryVector: readonly number[], topK: number): Result<SearchHit[], DimensionMismatch> {
    if (queryVector.length !== this.dimension) {
      return err(new DimensionMismatch(this.dimension, queryVector.length));
    }

    const hits: SearchHit[] = [];
    for (const { position, distance } of this.neighborSearch(this.vectors, queryVector, Math.floor(topK))) {
      const chunk = Number.isInteger(position) ? this.chunks[position] : undefined;
      if (!chunk) continue;
      hits.push({ ...chunk, distance, score: distanceToScore(distance) });
    }
    return ok(hits.slice(0, Math.max(0, Math.floor(topK))));
  }

  entries(): Array<{ vector: readonly number[]; chunk: ChunkRecord }> {
    return this.chunks.map((chunk, position) => ({ vector: this.vectors[position] ?? [], chunk }));
  }

  toSnapshot(): IndexSnapshot {
    return {
      metadata: { ...this.metadata },
      vectors: this.vectors.map((vector) => [...vector]),
      chunks: [...this.chunks],
    };
  }
}
