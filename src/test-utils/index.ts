import { ChunkRecord, EmbeddedChunk } from '../core/chunk';
import { VideoDocument } from '../core/document';
import { IndexSnapshot, SearchHit } from '../core/vector-index';
import { ChunkCollection, ChunkCollectionStore } from '../ports/ChunkCollectionStore';
import { DocumentSource } from '../ports/DocumentSource';
import { Embedder } from '../ports/Embedder';
import { IndexStore } from '../ports/IndexStore';

export function makeDocument(overrides: Partial<VideoDocument> = {}): VideoDocument {
  const videoId = overrides.videoId ?? 'vid1';
  const url = overrides.url ?? `https://www.youtube.com/watch?v=${videoId}`;
  return {
    videoId,
    channelName: 'testchannel',
    title: 'Test video',
    description: '',
    url,
    timestampBaseUrl: `${url}&t=`,
    transcript: [],
    ...overrides,
  };
}

/** `count` one-word segments, each 2 seconds long, starting at 10s. */
export function makeTranscript(count: number) {
  return Array.from({ length: count }, (_, index) => ({
    text: `s${index}`,
    startTime: 10 + index * 2,
    duration: 2,
  }));
}

export function makeChunk(videoId: string, suffix: string, text = `text of ${videoId} ${suffix}`): ChunkRecord {
  return {
    chunkId: `${videoId}_${suffix}`,
    videoId,
    channelName: 'testchannel',
    chunkType: 'description',
    text,
    videoTitle: `Title ${videoId}`,
    videoUrl: `https://www.youtube.com/watch?v=${videoId}`,
    timestampUrl: `https://www.youtube.com/watch?v=${videoId}`,
    startTime: 0,
    endTime: 0,
    segmentIndices: [],
  };
}

export function embedded(chunk: ChunkRecord, embedding: number[]): EmbeddedChunk {
  return { ...chunk, embedding };
}

export function makeHit(videoId: string, suffix: string, score: number, startTime = 0): SearchHit {
  const videoUrl = `https://www.youtube.com/watch?v=${videoId}`;
  return {
    chunkId: `${videoId}_transcript_${suffix}`,
    videoId,
    channelName: 'testchannel',
    chunkType: 'transcript',
    text: `${videoId} ${suffix}`,
    videoTitle: `Title ${videoId}`,
    videoUrl,
    timestampUrl: `${videoUrl}&t=${Math.floor(startTime)}`,
    startTime,
    endTime: startTime + 5,
    timestampSeconds: Math.floor(startTime),
    timestampFormatted: '0:00',
    segmentIndices: [0],
    distance: 1 / score - 1,
    score,
  };
}

/** Returns the vector registered for a text, or `fallback` for anything else. */
export class FakeEmbedder implements Embedder {
  readonly calls: string[] = [];

  constructor(
    private readonly vectors: Record<string, number[]> = {},
    private readonly fallback: number[] = [0, 0, 0],
  ) {}

  async getEmbeddings(text: string): Promise<number[]> {
    this.calls.push(text);
    return this.vectors[text] ?? this.fallback;
  }
}

export class InMemoryIndexStore implements IndexStore {
  readonly snapshots = new Map<string, IndexSnapshot>();
  closed = false;

  async save(snapshot: IndexSnapshot): Promise<void> {
    this.snapshots.set(snapshot.metadata.channelName, structuredClone(snapshot));
  }

  async load(channelName: string): Promise<IndexSnapshot | undefined> {
    const snapshot = this.snapshots.get(channelName);
    return snapshot ? structuredClone(snapshot) : undefined;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class InMemoryChunkCollectionStore implements ChunkCollectionStore {
  readonly collections = new Map<string, ChunkCollection[]>();

  async save(channelName: string, collection: ChunkCollection): Promise<void> {
    const existing = (this.collections.get(channelName) ?? []).filter((c) => c.videoId !== collection.videoId);
    this.collections.set(channelName, [...existing, collection]);
  }

  async loadAll(channelName: string): Promise<ChunkCollection[]> {
    return this.collections.get(channelName) ?? [];
  }
}

export class InMemoryDocumentSource implements DocumentSource {
  /** `missingIds` are listed for every channel but have no document behind them. */
  constructor(
    private readonly documents: VideoDocument[],
    private readonly missingIds: string[] = [],
  ) {}

  async listVideoIds(channelName: string): Promise<string[]> {
    const ids = this.documents.filter((doc) => doc.channelName === channelName).map((doc) => doc.videoId);
    return [...ids, ...this.missingIds];
  }

  async load(channelName: string, videoId: string): Promise<VideoDocument | undefined> {
    return this.documents.find((doc) => doc.channelName === channelName && doc.videoId === videoId);
  }
}
