import { EmbeddedChunk } from '../core/chunk';

export interface ChunkCollection {
  videoId: string;
  chunks: EmbeddedChunk[];
}

export interface ChunkCollectionStore {
  save(channelName: string, collection: ChunkCollection): Promise<void>;
  /** Every collection of the channel, in a stable order. */
  loadAll(channelName: string): Promise<ChunkCollection[]>;
}
