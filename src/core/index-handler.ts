import { DimensionMismatch, IndexNotFound, NoEmbeddingsFound, Result, err, ok } from './errors';
import { IndexMetadata, SearchHit, VectorIndex, VectorIndexOptions } from './vector-index';
import { ChunkCollectionStore } from '../ports/ChunkCollectionStore';
import { IndexStore } from '../ports/IndexStore';
import { Logger } from '../ports/Logger';

export class IndexHandler {
  constructor(
    private readonly collections: ChunkCollectionStore,
    private readonly indexStore: IndexStore,
    private readonly logger: Logger,
    private readonly indexOptions: VectorIndexOptions = {},
  ) {}

  async build(channelName: string, now: Date = new Date()): Promise<Result<IndexMetadata, NoEmbeddingsFound | DimensionMismatch>> {
    const logger = this.logger.child(channelName);
    const collections = await this.collections.loadAll(channelName);
    logger.info(`Building index from ${collections.length} chunk collections`);

    const built = VectorIndex.build(
      channelName,
      collections.map((collection) => collection.chunks),
      { ...this.indexOptions, now },
    );
    if (!built.ok) {
      if (built.error.kind === 'DimensionMismatch') {
        logger.error(built.error.message, { expected: built.error.expected, actual: built.error.actual });
      } else {
        logger.warn(built.error.message);
      }
      return built;
    }

    const index = built.value;
    await this.indexStore.save(index.toSnapshot());
    logger.info(`Published index with ${index.size} chunks of dimension ${index.dimension}`);
    return ok(index.metadata);
  }

  async search(
    channelName: string,
    queryVector: readonly number[],
    topK: number,
  ): Promise<Result<SearchHit[], IndexNotFound | DimensionMismatch>> {
    const loaded = await this.open(channelName);
    if (!loaded.ok) return loaded;

    const result = loaded.value.search(queryVector, topK);
    if (!result.ok) {
      this.logger.child(channelName).error(result.error.message);
      return result;
    }
    this.logger.child(channelName).debug(`Search returned ${result.value.length} hits`, { topK });
    return result;
  }

  async describe(channelName: string): Promise<Result<IndexMetadata, IndexNotFound>> {
    const loaded = await this.open(channelName);
    return loaded.ok ? ok(loaded.value.metadata) : loaded;
  }

  private async open(channelName: string): Promise<Result<VectorIndex, IndexNotFound>> {
    const snapshot = await this.indexStore.load(channelName);
    if (!snapshot) {
      this.logger.child(channelName).warn('Index not found');
      return err(new IndexNotFound(channelName));
    }
    return ok(VectorIndex.restore(snapshot, this.indexOptions));
  }
}
