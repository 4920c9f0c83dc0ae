/**
 * Models for the Jina Rerank API.
 */

import { z } from 'zod';
import { BaseResponseSchema, type TextDoc } from './base.js';

/**
 * Available models with their parameter size:
 *
 * - `jina-reranker-v2-base-multilingual`, 278M
 * - `jina-reranker-v1-base-en`, 137M
 * - `jina-reranker-v1-tiny-en`, 33M
 * - `jina-reranker-v1-turbo-en`, 38M
 * - `jina-colbert-v1-en`, 137M
 */
export const RERANKER_MODELS = [
  'jina-reranker-v2-base-multilingual',
  'jina-reranker-v1-base-en',
  'jina-reranker-v1-tiny-en',
  'jina-reranker-v1-turbo-en',
  'jina-colbert-v1-en',
] as const;

export type RerankerModel = (typeof RERANKER_MODELS)[number];

export type RerankQuery = string | TextDoc;

/** Either all plain strings or all text documents, never mixed. */
export type RerankDocuments = string[] | TextDoc[];

export interface RerankRequest {
  model: RerankerModel;
  /** The search query. */
  query: RerankQuery;
  /**
   * Candidates to rerank. Results echo only a document's `text`.
   */
  documents: RerankDocuments;
  /** Number of results to return. The server defaults it to `documents.length`. */
  top_n?: number;
  /**
   * Echo each document's text in the results. The server defaults it to `true`;
   * with `false` every result carries only `index` and `relevance_score`.
   */
  return_documents?: boolean;
}

export const RankedDocumentSchema = z.object({
  text: z.string(),
});

export const RankedResultSchema = z.object({
  /** Position of the document in the request's `documents`. */
  index: z.number().int().nonnegative(),
  document: RankedDocumentSchema.optional(),
  relevance_score: z.number(),
});

export type RankedDocument = z.infer<typeof RankedDocumentSchema>;
export type RankedResult = z.infer<typeof RankedResultSchema>;

export const RerankResponseSchema = BaseResponseSchema.extend({
  results: z.array(RankedResultSchema),
});

export type RerankResponse = z.infer<typeof RerankResponseSchema>;
