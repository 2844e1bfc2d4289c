import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileIndexStore } from './FileIndexStore';
import { CorruptIndexError } from '../core/errors';
import { VectorIndex } from '../core/vector-index';
import { embedded, makeChunk } from '../test-utils';

function snapshotOf(chunkIds: string[]) {
  const result = VectorIndex.build(
    'testchannel',
    [chunkIds.map((id, i) => embedded(makeChunk('vidA', id), [i, 0.1 + i]))],
    { now: new Date('2026-02-03T04:05:06.000Z') },
  );
  if (!result.ok) throw result.error;
  return result.value.toSnapshot();
}

describe('FileIndexStore', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'index-store-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('round-trips a snapshot exactly', async () => {
    const store = new FileIndexStore(root);
    const snapshot = snapshotOf(['x', 'y']);

    await store.save(snapshot);

    expect(await store.load('testchannel')).toEqual(snapshot);
    expect(await readdir(root)).toEqual(['testchannel.index.json']);
  });

  it('returns undefined for a channel that was never built', async () => {
    expect(await new FileIndexStore(root).load('nobody')).toBeUndefined();
  });

  it('replaces the previous snapshot', async () => {
    const store = new FileIndexStore(root);
    await store.save(snapshotOf(['x', 'y']));
    await store.save(snapshotOf(['z']));

    const loaded = await store.load('testchannel');
    expect(loaded?.chunks.map((chunk) => chunk.chunkId)).toEqual(['vidA_z']);
    expect(loaded?.metadata.chunkCount).toBe(1);
  });

  it('rejects a file that does not hold a valid snapshot', async () => {
    await writeFile(path.join(root, 'testchannel.index.json'), JSON.stringify({ metadata: {}, vectors: [] }));

    await expect(new FileIndexStore(root).load('testchannel')).rejects.toBeInstanceOf(CorruptIndexError);
  });
});
