import OpenAI from 'openai';
import { Embedder } from '../ports/Embedder';
import { EmbeddingError } from '../core/errors';

export interface OpenAiEmbedderOptions {
    apiKey: string;
    model: string;
}

export class OpenAiEmbedder implements Embedder {
    private readonly client: OpenAI;
    private readonly model: string;

    constructor(options: OpenAiEmbedderOptions, client?: OpenAI) {
        if (!options.apiKey && !client) {
            throw new Error('OPENAI_API_KEY is not set');
        }
        this.client = client ?? new OpenAI({ apiKey: options.apiKey });
        this.model = options.model;
    }

    async getEmbeddings(text: string): Promise<number[]> {
        const response = await this.client.embeddings.create({
            model: this.model,
            input: text
        });
        const embedding = response.data[0]?.embedding;
        if (!embedding) {
            throw new EmbeddingError(`No embedding returned by ${this.model}`);
        }
        return embedding;
    }
}
