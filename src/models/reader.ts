/**
 * Models for the Jina Reader API.
 */

import { z } from 'zod';

export const READER_RETURN_FORMATS = [
  'default',
  'markdown',
  'html',
  'text',
  'screenshot',
  'pageshot',
] as const;

export type ReaderReturnFormat = (typeof READER_RETURN_FORMATS)[number];

/**
 * Only `url` is sent in the body. Every other field travels as an `X-*`
 * request header and is sent only when set.
 */
export interface ReaderRequest {
  url: string;
  return_format?: ReaderReturnFormat;
  /** Bypass the server-side cache. */
  no_cache?: boolean;
  /** CSS selector to wait for before extracting. */
  wait_for_selector?: string;
  /** CSS selector restricting extraction to part of the page. */
  target_selector?: string;
  /** Page load timeout in seconds. */
  timeout?: number;
  proxy_url?: string;
  locale?: string;
}

export const ReaderUsageSchema = z.object({
  tokens: z.number().int().nonnegative(),
});

export const ReaderDataSchema = z.object({
  content: z.string(),
  description: z.string(),
  title: z.string(),
  url: z.string(),
  usage: ReaderUsageSchema,
});

export const ReaderResponseSchema = z.object({
  code: z.number().int(),
  status: z.number().int(),
  data: ReaderDataSchema,
});

export type ReaderUsage = z.infer<typeof ReaderUsageSchema>;
export type ReaderData = z.infer<typeof ReaderDataSchema>;
export type ReaderResponse = z.infer<typeof ReaderResponseSchema>;
