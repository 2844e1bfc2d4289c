import { describe, expect, it } from 'vitest';
import { PgConnection, PgConnector, PostgresIndexStore, SCHEMA_SQL } from './PostgresIndexStore';
import { CorruptIndexError } from '../core/errors';
import { IndexSnapshot } from '../core/vector-index';
import { makeChunk } from '../test-utils';

interface RecordedQuery {
  text: string;
  values?: unknown[];
}

/** Records every statement and answers SELECTs from canned rows. */
class FakePool implements PgConnector {
  readonly queries: RecordedQuery[] = [];
  released = 0;
  ended = false;
  failOn?: string;
  failedConnects = 0;

  constructor(
    private readonly metadataRows: unknown[] = [],
    private readonly chunkRows: unknown[] = [],
  ) {}

  async connect(): Promise<PgConnection> {
    if (this.failedConnects > 0) {
      this.failedConnects -= 1;
      throw new Error('connection refused');
    }
    return {
      query: async (text: string, values?: unknown[]) => {
        this.queries.push({ text, values });
        if (this.failOn && text.startsWith(this.failOn)) throw new Error('connection lost');
        if (text.startsWith('SELECT channel_name')) return { rows: this.metadataRows };
        if (text.startsWith('SELECT position')) return { rows: this.chunkRows };
        return { rows: [] };
      },
      release: () => {
        this.released += 1;
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  statements(): string[] {
    return this.queries.map((query) => query.text.split(' (')[0]);
  }
}

const snapshot: IndexSnapshot = {
  metadata: { channelName: 'testchannel', dimension: 2, chunkCount: 2, buildTimestamp: '2026-04-05T06:07:08.000Z' },
  vectors: [
    [0.5, 1],
    [2, 3],
  ],
  chunks: [makeChunk('vidA', 'title'), makeChunk('vidB', 'title')],
};

describe('PostgresIndexStore.save', () => {
  it('replaces the channel index inside one transaction', async () => {
    const pool = new FakePool();

    await new PostgresIndexStore(pool).save(snapshot);

    expect(pool.queries[0].text).toBe(SCHEMA_SQL);
    expect(pool.statements().slice(1)).toEqual([
      'BEGIN',
      'DELETE FROM channel_indexes WHERE channel_name = $1',
      'INSERT INTO channel_indexes',
      'INSERT INTO index_chunks',
      'COMMIT',
    ]);
    expect(pool.queries[3].values).toEqual(['testchannel', 2, 2, '2026-04-05T06:07:08.000Z']);
    expect(pool.queries[4].text).toBe(
      'INSERT INTO index_chunks (channel_name, position, chunk, embedding) VALUES ($1, $2, $3, $4), ($5, $6, $7, $8)',
    );
    expect(pool.queries[4].values).toEqual([
      'testchannel',
      0,
      JSON.stringify(snapshot.chunks[0]),
      [0.5, 1],
      'testchannel',
      1,
      JSON.stringify(snapshot.chunks[1]),
      [2, 3],
    ]);
    expect(pool.released).toBe(2);
  });

  it('creates the schema only once per store', async () => {
    const pool = new FakePool();
    const store = new PostgresIndexStore(pool);

    await store.save(snapshot);
    await store.save(snapshot);

    expect(pool.queries.filter((query) => query.text === SCHEMA_SQL)).toHaveLength(1);
  });

  it('retries schema creation after a failed connect', async () => {
    const pool = new FakePool();
    pool.failedConnects = 1;
    const store = new PostgresIndexStore(pool);

    await expect(store.save(snapshot)).rejects.toThrow('connection refused');
    await store.save(snapshot);

    expect(pool.queries[0].text).toBe(SCHEMA_SQL);
    expect(pool.statements().slice(-1)).toEqual(['COMMIT']);
  });

  it('rolls back and rethrows when a write fails', async () => {
    const pool = new FakePool();
    pool.failOn = 'INSERT INTO index_chunks';

    await expect(new PostgresIndexStore(pool).save(snapshot)).rejects.toThrow('connection lost');

    expect(pool.statements().slice(-2)).toEqual(['INSERT INTO index_chunks', 'ROLLBACK']);
    expect(pool.released).toBe(2);
  });
});

describe('PostgresIndexStore.load', () => {
  const metadataRow = {
    channel_name: 'testchannel',
    dimension: 2,
    chunk_count: 2,
    build_timestamp: new Date('2026-04-05T06:07:08.000Z'),
  };
  const chunkRows = [
    { position: 0, chunk: snapshot.chunks[0], embedding: [0.5, 1] },
    { position: 1, chunk: snapshot.chunks[1], embedding: [2, 3] },
  ];

  it('reads both tables in one read-only snapshot transaction', async () => {
    const pool = new FakePool([metadataRow], chunkRows);

    const loaded = await new PostgresIndexStore(pool).load('testchannel');

    expect(loaded).toEqual(snapshot);
    expect(pool.statements().slice(1)).toEqual([
      'BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY',
      'SELECT channel_name, dimension, chunk_count, build_timestamp FROM channel_indexes WHERE channel_name = $1',
      'SELECT position, chunk, embedding FROM index_chunks WHERE channel_name = $1 ORDER BY position',
      'COMMIT',
    ]);
  });

  it('returns undefined when the channel has no index', async () => {
    expect(await new PostgresIndexStore(new FakePool()).load('testchannel')).toBeUndefined();
  });

  it('rejects rows with a gap in positions', async () => {
    const pool = new FakePool([metadataRow], [chunkRows[0], { ...chunkRows[1], position: 2 }]);

    await expect(new PostgresIndexStore(pool).load('testchannel')).rejects.toBeInstanceOf(CorruptIndexError);
  });

  it('closes the pool', async () => {
    const pool = new FakePool();
    await new PostgresIndexStore(pool).close();
    expect(pool.ended).toBe(true);
  });
});
