import { segmentDocument, WindowOptions, DEFAULT_WINDOW } from './chunker';
import { attachEmbeddings } from './embedding';
import { DimensionMismatch, EmptySourceDocument } from './errors';
import { ChunkCollectionStore } from '../ports/ChunkCollectionStore';
import { DocumentSource } from '../ports/DocumentSource';
import { Embedder } from '../ports/Embedder';
import { Logger } from '../ports/Logger';

export interface IngestReport {
  processed: { videoId: string; chunkCount: number }[];
  skipped: { videoId: string; error: EmptySourceDocument | DimensionMismatch }[];
}

export class IngestHandler {
  constructor(
    private readonly documents: DocumentSource,
    private readonly collections: ChunkCollectionStore,
    private readonly embedder: Embedder,
    private readonly logger: Logger,
    private readonly windowOptions: WindowOptions = DEFAULT_WINDOW,
  ) {}

  /**
   * Segments and embeds every processed video of the channel and stores one chunk collection
   * per video. Videos that yield nothing are skipped and their stored collection is emptied,
   * so the next build drops their old chunks. Embedder failures abort the run.
   */
  async run(channelName: string, onProgress?: (done: number, total: number) => void): Promise<IngestReport> {
    const logger = this.logger.child(channelName);
    const videoIds = await this.documents.listVideoIds(channelName);
    logger.info(`Found ${videoIds.length} processed videos`);

    const report: IngestReport = { processed: [], skipped: [] };

    for (const [position, videoId] of videoIds.entries()) {
      const document = await this.documents.load(channelName, videoId);
      const chunks = segmentDocument(document, this.windowOptions);

      if (chunks.length === 0) {
        const error = new EmptySourceDocument(channelName, videoId);
        logger.warn(error.message);
        await this.collections.save(channelName, { videoId, chunks: [] });
        report.skipped.push({ videoId, error });
        onProgress?.(position + 1, videoIds.length);
        continue;
      }

      const embedded = await attachEmbeddings(chunks, this.embedder);
      if (!embedded.ok) {
        logger.error(`Skipping video ${videoId}: ${embedded.error.message}`);
        await this.collections.save(channelName, { videoId, chunks: [] });
        report.skipped.push({ videoId, error: embedded.error });
        onProgress?.(position + 1, videoIds.length);
        continue;
      }

      await this.collections.save(channelName, { videoId, chunks: embedded.value });
      logger.debug(`Stored ${chunks.length} chunks for video ${videoId}`);
      report.processed.push({ videoId, chunkCount: chunks.length });
      onProgress?.(position + 1, videoIds.length);
    }

    logger.info(`Ingest complete: ${report.processed.length} videos stored, ${report.skipped.length} skipped`);
    return report;
  }
}
