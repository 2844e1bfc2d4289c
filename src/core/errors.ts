export type Result<T, E = EngineError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

// Returned inside a `Result`, never thrown.
export abstract class EngineError extends Error {
  abstract readonly kind: 'NoEmbeddingsFound' | 'DimensionMismatch' | 'IndexNotFound' | 'EmptySourceDocument';

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NoEmbeddingsFound extends EngineError {
  readonly kind = 'NoEmbeddingsFound' as const;

  constructor(public readonly channelName: string) {
    super(`No embedded chunks found for channel ${channelName}`);
  }
}

export class DimensionMismatch extends EngineError {
  readonly kind = 'DimensionMismatch' as const;

  constructor(
    public readonly expected: number,
    public readonly actual: number,
    public readonly chunkId?: string,
  ) {
    super(
      chunkId
        ? `Embedding dimension mismatch for chunk ${chunkId}: expected ${expected}, got ${actual}`
        : `Embedding dimension mismatch: expected ${expected}, got ${actual}`,
    );
  }
}

export class IndexNotFound extends EngineError {
  readonly kind = 'IndexNotFound' as const;

  constructor(public readonly channelName: string) {
    super(`No index has been built for channel ${channelName}`);
  }
}

export class EmptySourceDocument extends EngineError {
  readonly kind = 'EmptySourceDocument' as const;

  constructor(
    public readonly channelName: string,
    public readonly videoId: string,
  ) {
    super(`No chunks could be produced for video ${videoId} of channel ${channelName}`);
  }
}

export type AnyEngineError = NoEmbeddingsFound | DimensionMismatch | IndexNotFound | EmptySourceDocument;

export class EmbeddingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmbeddingError';
  }
}

export class CorruptIndexError extends Error {
  constructor(
    public readonly channelName: string,
    reason: string,
  ) {
    super(`Persisted index for channel ${channelName} is corrupt: ${reason}`);
    this.name = 'CorruptIndexError';
  }
}

// Plain-language text for the response layer; never exposes the error kind.
export function describeError(error: AnyEngineError): string {
  switch (error.kind) {
    case 'NoEmbeddingsFound':
      return `There is no embedded content for channel ${error.channelName} yet. Run the ingest command first.`;
    case 'IndexNotFound':
      return `No index has been built for channel ${error.channelName} yet. Run the build command first.`;
    case 'DimensionMismatch':
      return `Embeddings of different sizes were mixed (expected ${error.expected} values, got ${error.actual}). Re-run ingest and build with a single embedding model.`;
    case 'EmptySourceDocument':
      return `Video ${error.videoId} has no usable title, description or transcript.`;
  }
}
