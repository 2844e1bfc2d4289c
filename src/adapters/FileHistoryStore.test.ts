import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileHistoryStore, historyStamp } from './FileHistoryStore';
import { emptyAnswer } from '../core/answer';
import { HistoryEntry } from '../ports/HistoryStore';

describe('historyStamp', () => {
  it('formats local date and time without separators', () => {
    expect(historyStamp(new Date(2026, 0, 2, 3, 4, 5))).toBe('20260102_030405');
    expect(historyStamp(new Date(2026, 9, 19, 14, 25, 1))).toBe('20261019_142501');
  });
});

describe('FileHistoryStore', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'history-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const entry = (query: string): HistoryEntry => {
    const response = emptyAnswer(query, undefined, new Date('2026-10-19T12:00:00.000Z'));
    return { channelName: 'testchannel', query, response, timestamp: response.generationTimestamp };
  };

  it('writes one numbered file per question under the channel directory', async () => {
    const store = new FileHistoryStore(root);
    const stamp = historyStamp(new Date('2026-10-19T12:00:00.000Z'));

    const first = await store.append(entry('first'));
    const second = await store.append(entry('second'));

    expect(first).toBe(path.join(root, 'testchannel', `query_${stamp}_1.json`));
    expect(second).toBe(path.join(root, 'testchannel', `query_${stamp}_2.json`));
    expect(JSON.parse(await readFile(second, 'utf8'))).toEqual(entry('second'));
  });

  it('does not overwrite an entry written by another process in the same second', async () => {
    const stamp = historyStamp(new Date('2026-10-19T12:00:00.000Z'));

    const first = await new FileHistoryStore(root).append(entry('from the first run'));
    const second = await new FileHistoryStore(root).append(entry('from the second run'));

    expect(first).toBe(path.join(root, 'testchannel', `query_${stamp}_1.json`));
    expect(second).toBe(path.join(root, 'testchannel', `query_${stamp}_2.json`));
    expect(JSON.parse(await readFile(first, 'utf8'))).toEqual(entry('from the first run'));
  });
});
