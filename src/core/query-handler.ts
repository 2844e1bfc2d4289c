import { Answer, assembleAnswer, emptyAnswer } from './answer';
import { describeError } from './errors';
import { IndexHandler } from './index-handler';
import { Embedder } from '../ports/Embedder';
import { Logger } from '../ports/Logger';

export const DEFAULT_TOP_K = 10;

export class QueryHandler {
  constructor(
    private readonly index: IndexHandler,
    private readonly embedder: Embedder,
    private readonly logger: Logger,
    private readonly topK: number = DEFAULT_TOP_K,
  ) {}

  async run(channelName: string, question: string, now: Date = new Date()): Promise<Answer> {
    const query = question.trim();
    this.logger.child(channelName).info(`Processing query: ${query}`);

    const queryEmbedding = await this.embedder.getEmbeddings(query);
    const results = await this.index.search(channelName, queryEmbedding, this.topK);

    if (!results.ok) {
      return emptyAnswer(query, describeError(results.error), now);
    }
    return assembleAnswer(query, results.value, now);
  }
}
