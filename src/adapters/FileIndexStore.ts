import path from 'node:path';
import { IndexStore } from '../ports/IndexStore';
import { IndexSnapshot } from '../core/vector-index';
import { indexSnapshotSchema } from '../core/snapshot';
import { CorruptIndexError } from '../core/errors';
import { readJsonFile, writeJsonFile } from '../lib/json-file';

/**
 * Keeps each channel's whole snapshot in `{root}/{channel}.index.json`. Vectors and chunk
 * metadata live in one file, so publishing is a single rename.
 */
export class FileIndexStore implements IndexStore {
  constructor(private readonly root: string) {}

  async save(snapshot: IndexSnapshot): Promise<void> {
    await writeJsonFile(this.filePath(snapshot.metadata.channelName), snapshot, 0);
  }

  async load(channelName: string): Promise<IndexSnapshot | undefined> {
    const raw = await readJsonFile(this.filePath(channelName));
    if (raw === undefined) return undefined;

    const parsed = indexSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CorruptIndexError(channelName, parsed.error.message);
    }
    return parsed.data;
  }

  async close(): Promise<void> {}

  private filePath(channelName: string): string {
    return path.join(this.root, `${channelName}.index.json`);
  }
}
