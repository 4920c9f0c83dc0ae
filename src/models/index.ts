export type { Usage, TextDoc, ImageDoc } from './base.js';
export { UsageSchema, BaseResponseSchema } from './base.js';

export type {
  EmbeddingsModel,
  EmbeddingTypeValue,
  EmbeddingType,
  Doc,
  EmbeddingsInput,
  EmbeddingsInputKind,
  EmbeddingsRequest,
  Embedding,
  EmbeddingsResponse,
} from './embeddings.js';
export {
  EMBEDDINGS_MODELS,
  EMBEDDING_TYPES,
  EmbeddingSchema,
  EmbeddingsResponseSchema,
} from './embeddings.js';

export type {
  RerankerModel,
  RerankQuery,
  RerankDocuments,
  RerankRequest,
  RankedDocument,
  RankedResult,
  RerankResponse,
} from './rerank.js';
export {
  RERANKER_MODELS,
  RankedDocumentSchema,
  RankedResultSchema,
  RerankResponseSchema,
} from './rerank.js';

export type {
  ReaderReturnFormat,
  ReaderRequest,
  ReaderUsage,
  ReaderData,
  ReaderResponse,
} from './reader.js';
export {
  READER_RETURN_FORMATS,
  ReaderUsageSchema,
  ReaderDataSchema,
  ReaderResponseSchema,
} from './reader.js';
