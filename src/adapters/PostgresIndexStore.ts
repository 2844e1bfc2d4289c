import { Pool } from 'pg';
import { z } from 'zod';
import { IndexStore } from '../ports/IndexStore';
import { IndexSnapshot } from '../core/vector-index';
import { chunkRecordSchema } from '../core/chunk';
import { indexMetadataSchema } from '../core/snapshot';
import { CorruptIndexError } from '../core/errors';

export interface PgConnection {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  release(): void;
}

export interface PgConnector {
  connect(): Promise<PgConnection>;
  end(): Promise<void>;
}

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS channel_indexes (
    channel_name TEXT PRIMARY KEY,
    dimension INTEGER NOT NULL,
    chunk_count INTEGER NOT NULL,
    build_timestamp TIMESTAMPTZ NOT NULL
  );
  CREATE TABLE IF NOT EXISTS index_chunks (
    channel_name TEXT NOT NULL REFERENCES channel_indexes (channel_name) ON DELETE CASCADE,
    position INTEGER NOT NULL,
    chunk JSONB NOT NULL,
    embedding DOUBLE PRECISION[] NOT NULL,
    PRIMARY KEY (channel_name, position)
  );
`;

const metadataRowSchema = z.object({
  channel_name: z.string(),
  dimension: z.coerce.number(),
  chunk_count: z.coerce.number(),
  build_timestamp: z.union([z.date(), z.string()]),
});

const chunkRowSchema = z.object({
  position: z.coerce.number(),
  chunk: z.unknown(),
  embedding: z.array(z.coerce.number()),
});

export class PostgresIndexStore implements IndexStore {
  private readonly batchSize = 100;
  private schemaReady: Promise<void> | undefined;

  constructor(private readonly pool: PgConnector) {}

  static fromConnectionString(connectionString: string): PostgresIndexStore {
    return new PostgresIndexStore(
      new Pool({
        connectionString,
        max: 10,
        idleTimeoutMillis: 30000, // Close idle clients after 30 seconds
        connectionTimeoutMillis: 2000,
      }),
    );
  }

  private ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.createSchema().catch((error: unknown) => {
        // Let the next call try again.
        this.schemaReady = undefined;
        throw error;
      });
    }
    return this.schemaReady;
  }

  private async createSchema(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query(SCHEMA_SQL);
    } finally {
      client.release();
    }
  }

  async save(snapshot: IndexSnapshot): Promise<void> {
    await this.ensureSchema();
    const { metadata, vectors, chunks } = snapshot;
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');
      // The cascade drops the previous chunks; nothing is visible to readers until COMMIT.
      await client.query('DELETE FROM channel_indexes WHERE channel_name = $1', [metadata.channelName]);
      await client.query(
        'INSERT INTO channel_indexes (channel_name, dimension, chunk_count, build_timestamp) VALUES ($1, $2, $3, $4)',
        [metadata.channelName, metadata.dimension, metadata.chunkCount, metadata.buildTimestamp],
      );

      for (let start = 0; start < chunks.length; start += this.batchSize) {
        const values: unknown[] = [];
        const placeholders: string[] = [];

        chunks.slice(start, start + this.batchSize).forEach((chunk, offset) => {
          const position = start + offset;
          const base = offset * 4;
          placeholders.push(`($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4})`);
          values.push(metadata.channelName, position, JSON.stringify(chunk), vectors[position]);
        });

        await client.query(
          `INSERT INTO index_chunks (channel_name, position, chunk, embedding) VALUES ${placeholders.join(', ')}`,
          values,
        );
      }

      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async load(channelName: string): Promise<IndexSnapshot | undefined> {
    await this.ensureSchema();
    const client = await this.pool.connect();

    try {
      // One snapshot for both reads, so a concurrent build cannot split them.
      await client.query('BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY');
      const metadataResult = await client.query(
        'SELECT channel_name, dimension, chunk_count, build_timestamp FROM channel_indexes WHERE channel_name = $1',
        [channelName],
      );
      const chunkResult = await client.query(
        'SELECT position, chunk, embedding FROM index_chunks WHERE channel_name = $1 ORDER BY position',
        [channelName],
      );
      await client.query('COMMIT');

      const [metadataRow] = metadataResult.rows;
      if (metadataRow === undefined) return undefined;

      return this.toSnapshot(channelName, metadataRow, chunkResult.rows);
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  private toSnapshot(channelName: string, metadataRow: unknown, chunkRows: unknown[]): IndexSnapshot {
    const meta = metadataRowSchema.safeParse(metadataRow);
    if (!meta.success) {
      throw new CorruptIndexError(channelName, meta.error.message);
    }
    const buildTimestamp = meta.data.build_timestamp;
    const metadata = indexMetadataSchema.safeParse({
      channelName: meta.data.channel_name,
      dimension: meta.data.dimension,
      chunkCount: meta.data.chunk_count,
      buildTimestamp: buildTimestamp instanceof Date ? buildTimestamp.toISOString() : new Date(buildTimestamp).toISOString(),
    });
    if (!metadata.success) {
      throw new CorruptIndexError(channelName, metadata.error.message);
    }

    const snapshot: IndexSnapshot = { metadata: metadata.data, vectors: [], chunks: [] };
    for (const [expectedPosition, row] of chunkRows.entries()) {
      const parsedRow = chunkRowSchema.safeParse(row);
      if (!parsedRow.success) {
        throw new CorruptIndexError(channelName, parsedRow.error.message);
      }
      if (parsedRow.data.position !== expectedPosition) {
        throw new CorruptIndexError(channelName, `missing chunk at position ${expectedPosition}`);
      }
      const chunk = chunkRecordSchema.safeParse(parsedRow.data.chunk);
      if (!chunk.success) {
        throw new CorruptIndexError(channelName, chunk.error.message);
      }
      snapshot.vectors.push(parsedRow.data.embedding);
      snapshot.chunks.push(chunk.data);
    }
    return snapshot;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
