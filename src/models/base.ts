/**
 * Shared models for Jina API responses.
 */

import { z } from 'zod';

export const UsageSchema = z.object({
  /** Tokens consumed by the input. */
  prompt_tokens: z.number().int().nonnegative(),
  /** Tokens billed for the request. */
  total_tokens: z.number().int().nonnegative(),
});

/**
 * Token accounting attached to every successful embeddings and rerank response.
 */
export type Usage = z.infer<typeof UsageSchema>;

/**
 * Text-bearing document, accepted by both the embeddings and rerank endpoints.
 */
export interface TextDoc {
  text: string;
}

/**
 * Image-bearing document. `image` is a URL or a base64-encoded image.
 */
export interface ImageDoc {
  image: string;
}

/**
 * Fields common to the embeddings and rerank responses. `model` is whatever the
 * server reports and is not checked against the requested model.
 */
export const BaseResponseSchema = z.object({
  model: z.string(),
  usage: UsageSchema,
});
