import { z } from 'zod';
import { chunkRecordSchema } from './chunk';
import { IndexMetadata, IndexSnapshot } from './vector-index';

export const indexMetadataSchema = z.object({
  channelName: z.string().min(1),
  dimension: z.number().int().positive(),
  chunkCount: z.number().int().nonnegative(),
  buildTimestamp: z.string().datetime(),
}) satisfies z.ZodType<IndexMetadata>;

export const indexSnapshotSchema = z.object({
  metadata: indexMetadataSchema,
  vectors: z.array(z.array(z.number().finite())),
  chunks: z.array(chunkRecordSchema),
}) satisfies z.ZodType<IndexSnapshot>;
