import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileChunkCollectionStore } from './FileChunkCollectionStore';
import { embedded, makeChunk } from '../test-utils';

describe('FileChunkCollectionStore', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'collections-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('loads collections back in file-name order', async () => {
    const store = new FileChunkCollectionStore(root);
    const beta = [embedded(makeChunk('beta', 'title'), [0.25, 0.5])];
    const alpha = [embedded(makeChunk('alpha', 'title'), [1, 2]), embedded(makeChunk('alpha', 'd0'), [3, 4])];

    await store.save('testchannel', { videoId: 'beta', chunks: beta });
    await store.save('testchannel', { videoId: 'alpha', chunks: alpha });

    expect(await store.loadAll('testchannel')).toEqual([
      { videoId: 'alpha', chunks: alpha },
      { videoId: 'beta', chunks: beta },
    ]);
  });

  it('ignores files that are not chunk collections', async () => {
    await mkdir(path.join(root, 'testchannel'), { recursive: true });
    await writeFile(path.join(root, 'testchannel', 'notes.json'), '{}');

    expect(await new FileChunkCollectionStore(root).loadAll('testchannel')).toEqual([]);
  });

  it('returns nothing for an unknown channel', async () => {
    expect(await new FileChunkCollectionStore(root).loadAll('nobody')).toEqual([]);
  });

  it('rejects a collection whose chunks lack embeddings', async () => {
    await mkdir(path.join(root, 'testchannel'), { recursive: true });
    await writeFile(
      path.join(root, 'testchannel', 'vidA_embeddings.json'),
      JSON.stringify([makeChunk('vidA', 'title')]),
    );

    await expect(new FileChunkCollectionStore(root).loadAll('testchannel')).rejects.toThrow(
      /^Invalid chunk collection .*vidA_embeddings\.json/,
    );
  });
});
