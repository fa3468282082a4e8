import {
  BadGatewayException,
  BadRequestException,
  HttpException,
  InternalServerErrorException,
  UnprocessableEntityException,
} from '@nestjs/common';
import {
  CitationValidationError,
  DocumentProcessingError,
  EmbeddingGenerationError,
  GenerationError,
  InputValidationError,
  RagError,
  RetrievalError,
  VectorStoreError,
} from './rag.errors';

/**
 * Translate pipeline errors into HTTP exceptions. Caller mistakes become 4xx,
 * failures of upstream services 502, anything else 500.
 */
export function toHttpException(error: unknown): HttpException {
  if (error instanceof HttpException) {
    return error;
  }
  if (error instanceof InputValidationError) {
    return new BadRequestException(error.message, { cause: error });
  }
  if (error instanceof DocumentProcessingError) {
    return new UnprocessableEntityException(error.message, { cause: error });
  }
  if (error instanceof CitationValidationError) {
    return new BadGatewayException({ message: error.message, citationErrors: error.errors }, { cause: error });
  }
  if (
    error instanceof GenerationError ||
    error instanceof EmbeddingGenerationError ||
    error instanceof RetrievalError ||
    error instanceof VectorStoreError
  ) {
    return new BadGatewayException(error.message, { cause: error });
  }
  if (error instanceof RagError) {
    return new InternalServerErrorException(error.message, { cause: error });
  }
  return new InternalServerErrorException('Unexpected error', { cause: error });
}
