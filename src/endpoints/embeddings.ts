/**
 * Request encoding for the embeddings endpoint.
 */

import type { EmbeddingsInput, EmbeddingsInputKind, EmbeddingsRequest } from '../models/embeddings.js';

export const EMBEDDINGS_PATH = '/v1/embeddings';

/**
 * Classify the input by its JSON shape. An empty array counts as a string array.
 */
export function embeddingsInputKind(input: EmbeddingsInput): EmbeddingsInputKind {
  if (typeof input === 'string') {
    return 'string';
  }
  if (Array.isArray(input)) {
    return input.every((item) => typeof item === 'string') ? 'string_array' : 'document_array';
  }
  return 'document';
}

/**
 * Build the JSON body. `input` is passed through untouched; optional fields are
 * left out when unset.
 */
export function serializeEmbeddingsRequest(request: EmbeddingsRequest): Record<string, unknown> {
  const body: Record<string, unknown> = {
    model: request.model,
    input: request.input,
  };
  if (request.embedding_type !== undefined) body.embedding_type = request.embedding_type;
  if (request.normalized !== undefined) body.normalized = request.normalized;
  return body;
}
