/**
 * Error hierarchy for the retrieval pipeline. Each failure mode has its own
 * class so callers can decide between skipping, retrying and aborting.
 */
export class RagError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Extraction failed or the file type is not supported. */
export class DocumentProcessingError extends RagError {}

export class EmbeddingGenerationError extends RagError {}

export class VectorStoreError extends RagError {}

export class RetrievalError extends RagError {}

export class ChunkingError extends RagError {}

export class GenerationError extends RagError {}

/** Caller supplied input the pipeline cannot act on, e.g. an empty query. */
export class InputValidationError extends RagError {}

/** Invalid settings detected while constructing a component. */
export class ConfigurationError extends RagError {}

/**
 * Raised only in strict-citation mode; otherwise citation problems are
 * reported alongside the answer.
 */
export class CitationValidationError extends RagError {
  constructor(readonly errors: string[]) {
    super(`Answer contains invalid citations: ${errors.join('; ')}`);
  }
}
