import { ChunkRecord, EmbeddedChunk, embeddingSchema } from './chunk';
import { DimensionMismatch, EmbeddingError, Result, err, ok } from './errors';
import { Embedder } from '../ports/Embedder';

// The first vector fixes the dimension for the batch.
export async function attachEmbeddings(
  chunks: ChunkRecord[],
  embedder: Embedder,
): Promise<Result<EmbeddedChunk[], DimensionMismatch>> {
  const embedded: EmbeddedChunk[] = [];
  let dimension: number | undefined;

  for (const chunk of chunks) {
    const parsed = embeddingSchema.safeParse(await embedder.getEmbeddings(chunk.text));
    if (!parsed.success) {
      throw new EmbeddingError(`Embedder returned an invalid vector for chunk ${chunk.chunkId}`);
    }

    const embedding = parsed.data;
    if (dimension === undefined) dimension = embedding.length;
    if (embedding.length !== dimension) {
      return err(new DimensionMismatch(dimension, embedding.length, chunk.chunkId));
    }

    embedded.push({ ...chunk, embedding });
  }

  return ok(embedded);
}
