import * as crypto from 'crypto';

/**
 * Computes a SHA256 hash for the given content.
 * @returns The hex-encoded SHA256 hash.
 */
export function createContentHash(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * Cache key of an embedding. Model and output size are part of the key so that
 * changing either never serves vectors produced under the old settings.
 */
export function createEmbeddingCacheKey(model: string, dimensions: number, text: string): string {
  return `embedding:${createContentHash(`${model}:${dimensions}:${text}`)}`;
}
