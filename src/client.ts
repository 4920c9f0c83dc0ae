/**
 * Jina API client.
 *
 * Holds the resolved configuration and nothing else, so a single instance can
 * serve concurrent calls. Each endpoint method encodes its request, then hands
 * it to `post()`, which owns authentication, status handling and decoding.
 */

import { SpanStatusCode, type Attributes, type Span } from '@opentelemetry/api';
import type { ZodIssue, ZodType } from 'zod';
import { resolveConfig, type Fetch, type JinaClientOptions } from './config.js';
import { EMBEDDINGS_PATH, embeddingsInputKind, serializeEmbeddingsRequest } from './endpoints/embeddings.js';
import { readerHeaders, serializeReaderRequest, type HeaderPair } from './endpoints/reader.js';
import { RERANK_PATH, serializeRerankRequest } from './endpoints/rerank.js';
import { DeserializationError, HttpError, TransportError, parseHttpErrorPayload } from './errors.js';
import { logger } from './logger.js';
import { EmbeddingsResponseSchema, type EmbeddingsRequest, type EmbeddingsResponse } from './models/embeddings.js';
import { ReaderResponseSchema, type ReaderRequest, type ReaderResponse } from './models/reader.js';
import { RerankResponseSchema, type RerankRequest, type RerankResponse } from './models/rerank.js';
import { getTracer } from './tracer.js';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describeIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export class JinaClient {
  readonly baseUrl: string;
  readonly readerBaseUrl: string;
  private readonly apiKey: string;
  private readonly fetchImpl: Fetch;

  /**
   * @throws ConstructionError when no API key is given and none is found in the environment.
   */
  constructor(options: JinaClientOptions = {}) {
    const config = resolveConfig(options);
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl;
    this.readerBaseUrl = config.readerBaseUrl;
    this.fetchImpl = config.fetch;
  }

  /**
   * Create embeddings for text, images or documents.
   *
   * The returned vectors are passed through as the server sent them.
   */
  async embeddings(request: EmbeddingsRequest): Promise<EmbeddingsResponse> {
    const url = `${this.baseUrl}${EMBEDDINGS_PATH}`;
    const attributes: Attributes = {
      'jina.model': request.model,
      'jina.input.kind': embeddingsInputKind(request.input),
    };

    return this.traced('jina.embeddings', url, attributes, async (span) => {
      const response = await this.post(span, url, serializeEmbeddingsRequest(request), EmbeddingsResponseSchema);
      span.setAttribute('jina.usage.total_tokens', response.usage.total_tokens);
      return response;
    });
  }

  /**
   * Rank `documents` by relevance to `query`.
   *
   * `top_n` and `return_documents` are forwarded only when set.
   */
  async rerank(request: RerankRequest): Promise<RerankResponse> {
    const url = `${this.baseUrl}${RERANK_PATH}`;
    const attributes: Attributes = {
      'jina.model': request.model,
      'jina.documents.count': request.documents.length,
    };

    return this.traced('jina.rerank', url, attributes, async (span) => {
      const response = await this.post(span, url, serializeRerankRequest(request), RerankResponseSchema);
      span.setAttribute('jina.usage.total_tokens', response.usage.total_tokens);
      return response;
    });
  }

  /**
   * Extract the content of a web page.
   *
   * @throws ConstructionError before sending when a field cannot be carried in a header.
   */
  async reader(request: ReaderRequest): Promise<ReaderResponse> {
    const url = `${this.readerBaseUrl}/`;

    return this.traced('jina.reader', url, {}, async (span) => {
      const body = serializeReaderRequest(request);
      const headers: HeaderPair[] = [['Accept', 'application/json'], ...readerHeaders(request)];
      const response = await this.post(span, url, body, ReaderResponseSchema, headers);
      span.setAttribute('jina.usage.tokens', response.data.usage.tokens);
      return response;
    });
  }

  private traced<T>(name: string, url: string, attributes: Attributes, fn: (span: Span) => Promise<T>): Promise<T> {
    const spanAttributes: Attributes = {
      'http.request.method': 'POST',
      'url.full': url,
      ...attributes,
    };

    return getTracer().startActiveSpan(name, { attributes: spanAttributes }, async (span) => {
      try {
        return await fn(span);
      } catch (e) {
        const err = e instanceof Error ? e : new Error(String(e));
        span.recordException(err);
        span.setStatus({ code: SpanStatusCode.ERROR, message: `${err.name}: ${err.message}` });
        throw e;
      } finally {
        span.end();
      }
    });
  }

  private async post<T>(
    span: Span,
    url: string,
    body: unknown,
    schema: ZodType<T>,
    extraHeaders: HeaderPair[] = []
  ): Promise<T> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiKey}`,
      'Content-Type': 'application/json',
    };
    for (const [name, value] of extraHeaders) {
      headers[name] = value;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
      });
    } catch (e) {
      throw new TransportError(`Request to ${url} failed: ${describeError(e)}`, e);
    }

    span.setAttribute('http.response.status_code', response.status);
    logger.debug(`POST ${url} -> HTTP ${response.status}`);

    if (!response.ok) {
      // The error body is best-effort: an unreadable one means no payload.
      let errorBody: string | null = null;
      try {
        errorBody = await response.text();
      } catch (e) {
        logger.debug(`Could not read error body from ${url}: ${describeError(e)}`);
      }
      throw new HttpError(response.status, errorBody === null ? null : parseHttpErrorPayload(errorBody));
    }

    let text: string;
    try {
      text = await response.text();
    } catch (e) {
      throw new TransportError(`Failed to read response body from ${url}: ${describeError(e)}`, e);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (e) {
      throw new DeserializationError(
        `Response from ${url} is not valid JSON: ${describeError(e)}`,
        response.status,
        text,
        [],
        e
      );
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      throw new DeserializationError(
        `Unexpected response shape from ${url}: ${describeIssues(result.error.issues)}`,
        response.status,
        text,
        result.error.issues
      );
    }
    return result.data;
  }
}
