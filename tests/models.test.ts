import { describe, it, expect } from 'vitest';
import {
  EMBEDDINGS_MODELS,
  EMBEDDING_TYPES,
  EmbeddingsResponseSchema,
  READER_RETURN_FORMATS,
  RERANKER_MODELS,
  ReaderResponseSchema,
  RerankResponseSchema,
  UsageSchema,
} from '../src/index.js';

describe('Models', () => {
  describe('identifiers', () => {
    it('should list the embeddings models', () => {
      expect(EMBEDDINGS_MODELS).toEqual([
        'jina-clip-v1',
        'jina-embeddings-v2-base-en',
        'jina-embeddings-v2-base-es',
        'jina-embeddings-v2-base-de',
        'jina-embeddings-v2-base-zh',
        'jina-embeddings-v2-base-code',
      ]);
    });

    it('should list the reranker models', () => {
      expect(RERANKER_MODELS).toEqual([
        'jina-reranker-v2-base-multilingual',
        'jina-reranker-v1-base-en',
        'jina-reranker-v1-tiny-en',
        'jina-reranker-v1-turbo-en',
        'jina-colbert-v1-en',
      ]);
    });

    it('should list embedding types and return formats in wire form', () => {
      expect(EMBEDDING_TYPES).toEqual(['float', 'base64', 'binary', 'ubinary']);
      expect(READER_RETURN_FORMATS).toEqual(['default', 'markdown', 'html', 'text', 'screenshot', 'pageshot']);
    });
  });

  describe('UsageSchema', () => {
    it('should accept token counts', () => {
      expect(UsageSchema.parse({ prompt_tokens: 7, total_tokens: 9 })).toEqual({
        prompt_tokens: 7,
        total_tokens: 9,
      });
    });

    it('should reject negative or fractional counts', () => {
      expect(UsageSchema.safeParse({ prompt_tokens: -1, total_tokens: 1 }).success).toBe(false);
      expect(UsageSchema.safeParse({ prompt_tokens: 1, total_tokens: 1.5 }).success).toBe(false);
    });
  });

  describe('EmbeddingsResponseSchema', () => {
    it('should keep any model name the server reports', () => {
      const parsed = EmbeddingsResponseSchema.parse({
        model: 'jina-embeddings-v3',
        data: [{ index: 0, embedding: [1, 0], object: 'embedding' }],
        usage: { prompt_tokens: 1, total_tokens: 1 },
      });

      expect(parsed.model).toBe('jina-embeddings-v3');
    });

    it('should drop unknown top-level fields', () => {
      const parsed = EmbeddingsResponseSchema.parse({
        model: 'm',
        object: 'list',
        data: [],
        usage: { prompt_tokens: 0, total_tokens: 0 },
      });

      expect(parsed).toEqual({ model: 'm', data: [], usage: { prompt_tokens: 0, total_tokens: 0 } });
    });
  });

  describe('RerankResponseSchema', () => {
    it('should require a relevance score', () => {
      const result = RerankResponseSchema.safeParse({
        model: 'm',
        results: [{ index: 0, document: { text: 'a' } }],
        usage: { prompt_tokens: 1, total_tokens: 1 },
      });

      expect(result.success).toBe(false);
    });

    it('should keep only the text of an echoed document', () => {
      const parsed = RerankResponseSchema.parse({
        model: 'm',
        results: [{ index: 0, document: { text: 'a', source: 'wiki' }, relevance_score: 0.5 }],
        usage: { prompt_tokens: 1, total_tokens: 1 },
      });

      expect(parsed.results[0].document).toEqual({ text: 'a' });
    });
  });

  describe('ReaderResponseSchema', () => {
    it('should require the nested usage', () => {
      const result = ReaderResponseSchema.safeParse({
        code: 200,
        status: 20000,
        data: { content: 'c', description: 'd', title: 't', url: 'https://example.com' },
      });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.issues[0].path).toEqual(['data', 'usage']);
    });
  });
});
