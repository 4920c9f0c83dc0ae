/**
 * jina-client - typed TypeScript client for the Jina AI API
 *
 * Usage:
 *
 *   import { JinaClient } from 'jina-client';
 *
 *   const jina = new JinaClient(); // reads JINA_API_KEY
 *
 *   const { data } = await jina.embeddings({
 *     model: 'jina-embeddings-v2-base-en',
 *     input: ['first text', 'second text'],
 *   });
 *
 *   const { results } = await jina.rerank({
 *     model: 'jina-reranker-v2-base-multilingual',
 *     query: 'organic fertilizer',
 *     documents: ['compost tea', 'granite countertops'],
 *     top_n: 1,
 *   });
 *
 *   const page = await jina.reader({
 *     url: 'https://example.com',
 *     return_format: 'markdown',
 *   });
 *
 * Errors:
 *
 *   import { HttpError } from 'jina-client';
 *
 *   try {
 *     await jina.embeddings(request);
 *   } catch (e) {
 *     if (e instanceof HttpError && e.status === 429) {
 *       // back off; the client never retries on its own
 *     }
 *   }
 *
 * Tracing:
 *
 *   Every call runs in an OpenTelemetry span (`jina.embeddings`, `jina.rerank`,
 *   `jina.reader`) on the globally registered tracer provider. `initTracer()`
 *   registers an in-memory one for local inspection.
 */

export { JinaClient } from './client.js';

export type { Fetch, JinaClientOptions, ResolvedConfig } from './config.js';
export {
  resolveConfig,
  DEFAULT_BASE_URL,
  DEFAULT_READER_BASE_URL,
  DEFAULT_API_KEY_ENV_VAR,
} from './config.js';

export type { HttpErrorPayload } from './errors.js';
export {
  JinaError,
  TransportError,
  HttpError,
  DeserializationError,
  ConstructionError,
  parseHttpErrorPayload,
} from './errors.js';

export * from './models/index.js';

export { EMBEDDINGS_PATH, embeddingsInputKind, serializeEmbeddingsRequest } from './endpoints/embeddings.js';
export { RERANK_PATH, serializeRerankRequest } from './endpoints/rerank.js';
export type { HeaderPair } from './endpoints/reader.js';
export { parseReaderReturnFormat, readerHeaders, serializeReaderRequest } from './endpoints/reader.js';

// Tracer utilities (for advanced usage)
export {
  initTracer,
  getTracer,
  getFinishedSpans,
  clearSpans,
  resetTracer,
  isInitialized,
} from './tracer.js';
export type { ReadableSpan } from './tracer.js';
