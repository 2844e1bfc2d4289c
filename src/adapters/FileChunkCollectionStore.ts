import path from 'node:path';
import { z } from 'zod';
import { embeddedChunkSchema } from '../core/chunk';
import { ChunkCollection, ChunkCollectionStore } from '../ports/ChunkCollectionStore';
import { listFiles, readJsonFile, writeJsonFile } from '../lib/json-file';

const SUFFIX = '_embeddings.json';
const collectionSchema = z.array(embeddedChunkSchema);

/** One `{videoId}_embeddings.json` per video under `{root}/{channel}/`. */
export class FileChunkCollectionStore implements ChunkCollectionStore {
  constructor(private readonly root: string) {}

  async save(channelName: string, collection: ChunkCollection): Promise<void> {
    await writeJsonFile(this.filePath(channelName, collection.videoId), collection.chunks);
  }

  async loadAll(channelName: string): Promise<ChunkCollection[]> {
    const files = (await listFiles(path.join(this.root, channelName))).filter((file) => file.endsWith(SUFFIX));

    const collections: ChunkCollection[] = [];
    for (const file of files) {
      const videoId = file.slice(0, -SUFFIX.length);
      const filePath = this.filePath(channelName, videoId);
      const parsed = collectionSchema.safeParse(await readJsonFile(filePath));
      if (!parsed.success) {
        throw new Error(`Invalid chunk collection ${filePath}: ${parsed.error.message}`);
      }
      collections.push({ videoId, chunks: parsed.data });
    }
    return collections;
  }

  private filePath(channelName: string, videoId: string): string {
    return path.join(this.root, channelName, `${videoId}${SUFFIX}`);
  }
}
