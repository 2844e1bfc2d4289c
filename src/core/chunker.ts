import { ChunkRecord, createChunk } from './chunk';
import { RawTranscriptSegment, TranscriptSegment, VideoDocument } from './document';
import { formatTimestamp } from './timestamp';

export interface WindowOptions {
  windowSize: number;
  overlap: number;
}

export const DEFAULT_WINDOW: WindowOptions = { windowSize: 5, overlap: 1 };

export function normalizeTranscript(segments: RawTranscriptSegment[]): TranscriptSegment[] {
  const normalized: TranscriptSegment[] = [];
  for (const segment of segments) {
    const text = segment.text.trim();
    if (!text) continue;

    normalized.push({
      text,
      startTime: segment.startTime,
      endTime: segment.startTime + segment.duration,
      timestampSeconds: Math.floor(segment.startTime),
      timestampFormatted: formatTimestamp(segment.startTime),
    });
  }
  return normalized;
}

/**
 * Half-open `[start, end)` windows over `count` items. With the defaults, 7 items give
 * `[0, 5)` and `[4, 7)`.
 */
export function slidingWindows(count: number, { windowSize, overlap }: WindowOptions): Array<[number, number]> {
  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new RangeError(`windowSize must be a positive integer, got ${windowSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= windowSize) {
    throw new RangeError(`overlap must be an integer in [0, ${windowSize}), got ${overlap}`);
  }

  const stride = windowSize - overlap;
  const windows: Array<[number, number]> = [];
  for (let start = 0; start < count; start += stride) {
    windows.push([start, Math.min(start + windowSize, count)]);
  }
  return windows;
}

type VideoContext = Pick<VideoDocument, 'videoId' | 'channelName' | 'title' | 'url' | 'timestampBaseUrl'>;

function chunkMetadata(video: VideoContext, title: string, description: string): ChunkRecord[] {
  const common = {
    videoId: video.videoId,
    channelName: video.channelName,
    videoTitle: title,
    videoUrl: video.url,
    timestampUrl: video.url,
    startTime: 0,
    endTime: 0,
  } as const;

  const chunks: ChunkRecord[] = [];
  if (title) {
    chunks.push(createChunk({ ...common, segmentIndices: [], chunkId: `${video.videoId}_title`, chunkType: 'title', text: title }));
  }

  const paragraphs = description
    .split('\n\n')
    .map((paragraph) => paragraph.trim())
    .filter(Boolean);

  paragraphs.forEach((paragraph, index) => {
    chunks.push(
      createChunk({
        ...common,
        segmentIndices: [],
        chunkId: `${video.videoId}_description_${index}`,
        chunkType: 'description',
        text: paragraph,
      }),
    );
  });

  return chunks;
}

function chunkTranscript(
  video: VideoContext,
  title: string,
  segments: TranscriptSegment[],
  options: WindowOptions,
): ChunkRecord[] {
  return slidingWindows(segments.length, options).map(([start, end]) => {
    const window = segments.slice(start, end);
    const first = window[0];
    const last = window[window.length - 1];
    if (!first || !last) {
      throw new RangeError(`empty transcript window [${start}, ${end})`);
    }

    const segmentIndices: [number, ...number[]] = [start];
    for (let index = start + 1; index < end; index++) segmentIndices.push(index);

    return createChunk({
      chunkId: `${video.videoId}_transcript_${start}_${end}`,
      videoId: video.videoId,
      channelName: video.channelName,
      chunkType: 'transcript',
      text: window.map((segment) => segment.text).join(' '),
      videoTitle: title,
      videoUrl: video.url,
      timestampUrl: `${video.timestampBaseUrl}${first.timestampSeconds}`,
      startTime: first.startTime,
      endTime: last.endTime,
      timestampSeconds: first.timestampSeconds,
      timestampFormatted: first.timestampFormatted,
      segmentIndices,
    });
  });
}

// Title, then description paragraphs, then transcript windows.
export function segmentDocument(document: VideoDocument | undefined, options: WindowOptions = DEFAULT_WINDOW): ChunkRecord[] {
  if (!document) return [];

  const title = document.title.trim();
  return [
    ...chunkMetadata(document, title, document.description),
    ...chunkTranscript(document, title, normalizeTranscript(document.transcript), options),
  ];
}
