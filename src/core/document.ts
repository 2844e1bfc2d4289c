import { z } from 'zod';

export const rawTranscriptSegmentSchema = z.object({
  text: z.string(),
  startTime: z.number().finite().nonnegative(),
  duration: z.number().finite().nonnegative(),
});

export const videoDocumentSchema = z
  .object({
    videoId: z.string().min(1),
    channelName: z.string().min(1),
    title: z.string().default(''),
    description: z.string().default(''),
    url: z.string().optional(),
    timestampBaseUrl: z.string().optional(),
    transcript: z.array(rawTranscriptSegmentSchema).default([]),
  })
  .transform((doc) => {
    const url = doc.url ?? `https://www.youtube.com/watch?v=${doc.videoId}`;
    return {
      ...doc,
      url,
      timestampBaseUrl: doc.timestampBaseUrl ?? `${url}&t=`,
    };
  });

export type RawTranscriptSegment = z.infer<typeof rawTranscriptSegmentSchema>;

export type VideoDocument = z.output<typeof videoDocumentSchema>;

export interface TranscriptSegment {
  text: string;
  startTime: number;
  endTime: number;
  timestampSeconds: number;
  timestampFormatted: string;
}
