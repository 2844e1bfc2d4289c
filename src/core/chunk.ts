import { z } from 'zod';

const baseChunkShape = {
  chunkId: z.string().min(1),
  videoId: z.string().min(1),
  channelName: z.string().min(1),
  text: z.string().refine((text) => text.trim().length > 0, 'chunk text must not be empty'),
  videoTitle: z.string(),
  videoUrl: z.string(),
  timestampUrl: z.string(),
  startTime: z.number().finite(),
  endTime: z.number().finite(),
  segmentIndices: z.array(z.number().int().nonnegative()),
};

const untimedChunk = <T extends 'title' | 'description'>(chunkType: T) =>
  z.object({
    ...baseChunkShape,
    chunkType: z.literal(chunkType),
    startTime: z.literal(0),
    endTime: z.literal(0),
    segmentIndices: z.array(z.number().int().nonnegative()).length(0),
  });

export const titleChunkSchema = untimedChunk('title');
export const descriptionChunkSchema = untimedChunk('description');

export const transcriptChunkSchema = z.object({
  ...baseChunkShape,
  chunkType: z.literal('transcript'),
  startTime: z.number().finite().nonnegative(),
  timestampSeconds: z.number().int().nonnegative(),
  timestampFormatted: z.string(),
  segmentIndices: z.array(z.number().int().nonnegative()).nonempty(),
});

export const chunkRecordSchema = z
  .discriminatedUnion('chunkType', [titleChunkSchema, descriptionChunkSchema, transcriptChunkSchema])
  .superRefine((chunk, ctx) => {
    if (chunk.chunkType !== 'transcript' && chunk.timestampUrl !== chunk.videoUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['timestampUrl'],
        message: 'untimed chunks link to the video itself',
      });
    }
    if (chunk.endTime < chunk.startTime) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['endTime'],
        message: 'endTime precedes startTime',
      });
    }
  });

export type TitleChunk = z.infer<typeof titleChunkSchema>;
export type DescriptionChunk = z.infer<typeof descriptionChunkSchema>;
export type TranscriptChunk = z.infer<typeof transcriptChunkSchema>;
export type ChunkRecord = z.infer<typeof chunkRecordSchema>;
export type ChunkType = ChunkRecord['chunkType'];

export const embeddingSchema = z.array(z.number().finite()).nonempty();

export type EmbeddedChunk = ChunkRecord & { embedding: number[] };

export const embeddedChunkSchema = z
  .object({ embedding: embeddingSchema })
  .passthrough()
  .transform((value, ctx): EmbeddedChunk => {
    const { embedding, ...rest } = value;
    const chunk = chunkRecordSchema.safeParse(rest);
    if (!chunk.success) {
      for (const issue of chunk.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: issue.path, message: issue.message });
      }
      return z.NEVER;
    }
    return { ...chunk.data, embedding };
  });

export function createChunk(record: ChunkRecord): ChunkRecord {
  return chunkRecordSchema.parse(record);
}

export function stripEmbedding({ embedding: _embedding, ...chunk }: EmbeddedChunk): ChunkRecord {
  return chunk;
}
