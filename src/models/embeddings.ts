/**
 * Models for the Jina Embeddings API.
 */

import { z } from 'zod';
import { BaseResponseSchema, type ImageDoc, type TextDoc } from './base.js';

/**
 * Available models with their parameter size and output dimension:
 *
 * - `jina-clip-v1`, 223M, 768
 * - `jina-embeddings-v2-base-en`, 137M, 768
 * - `jina-embeddings-v2-base-es`, 161M, 768
 * - `jina-embeddings-v2-base-de`, 161M, 768
 * - `jina-embeddings-v2-base-zh`, 161M, 768
 * - `jina-embeddings-v2-base-code`, 137M, 768
 */
export const EMBEDDINGS_MODELS = [
  'jina-clip-v1',
  'jina-embeddings-v2-base-en',
  'jina-embeddings-v2-base-es',
  'jina-embeddings-v2-base-de',
  'jina-embeddings-v2-base-zh',
  'jina-embeddings-v2-base-code',
] as const;

export type EmbeddingsModel = (typeof EMBEDDINGS_MODELS)[number];

export const EMBEDDING_TYPES = ['float', 'base64', 'binary', 'ubinary'] as const;

export type EmbeddingTypeValue = (typeof EMBEDDING_TYPES)[number];

/** A single format or a list of formats. */
export type EmbeddingType = EmbeddingTypeValue | EmbeddingTypeValue[];

export type Doc = TextDoc | ImageDoc;

/**
 * What to embed. The variants are told apart on the wire by their JSON shape
 * alone: a string, an array of strings, an object, or an array of objects.
 */
export type EmbeddingsInput = string | string[] | Doc | Doc[];

export type EmbeddingsInputKind = 'string' | 'string_array' | 'document' | 'document_array';

export interface EmbeddingsRequest {
  model: EmbeddingsModel;
  /** Texts, images, or documents to embed. */
  input: EmbeddingsInput;
  /**
   * The format in which the embeddings are returned. Defaults to `float`
   * server-side.
   */
  embedding_type?: EmbeddingType;
  /** Normalize the embeddings to unit L2 norm. */
  normalized?: boolean;
}

export const EmbeddingSchema = z.object({
  index: z.number().int().nonnegative(),
  embedding: z.array(z.number()),
  object: z.string(),
});

export type Embedding = z.infer<typeof EmbeddingSchema>;

export const EmbeddingsResponseSchema = BaseResponseSchema.extend({
  data: z.array(EmbeddingSchema),
});

export type EmbeddingsResponse = z.infer<typeof EmbeddingsResponseSchema>;
