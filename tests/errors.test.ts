import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { JinaClient } from '../src/client.js';
import type { Fetch } from '../src/config.js';
import {
  DeserializationError,
  HttpError,
  JinaError,
  TransportError,
  parseHttpErrorPayload,
} from '../src/errors.js';

function failingBody(reason: string): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.error(new Error(reason));
    },
  });
}

describe('error handling', () => {
  let mockFetch: Mock<Fetch>;
  let client: JinaClient;

  beforeEach(() => {
    mockFetch = vi.fn<Fetch>();
    client = new JinaClient({
      apiKey: 'test-key',
      baseUrl: 'http://jina.test',
      fetch: mockFetch,
      env: {},
    });
  });

  async function embedError(): Promise<unknown> {
    return client.embeddings({ model: 'jina-clip-v1', input: 'x' }).catch((e: unknown) => e);
  }

  it('should surface a 429 as an HttpError with the decoded payload', async () => {
    mockFetch.mockResolvedValueOnce(
      new Response(JSON.stringify({ detail: 'Rate limit exceeded' }), {
        status: 429,
        headers: { 'Content-Type': 'application/json' },
      })
    );

    const error = await embedError();

    expect(error).toBeInstanceOf(HttpError);
    if (!(error instanceof HttpError)) return;
    expect(error.status).toBe(429);
    expect(error.payload).toEqual({ detail: 'Rate limit exceeded' });
    expect(error.message).toBe('HTTP 429: Rate limit exceeded');
    expect(error.name).toBe('HttpError');
  });

  it('should yield no payload for a non-JSON error body', async () => {
    mockFetch.mockResolvedValueOnce(new Response('<html>Bad Gateway</html>', { status: 502 }));

    const error = await embedError();

    expect(error).toBeInstanceOf(HttpError);
    if (!(error instanceof HttpError)) return;
    expect(error.status).toBe(502);
    expect(error.payload).toBeNull();
    expect(error.message).toBe('HTTP 502');
  });

  it('should JSON-encode a structured detail in the message', async () => {
    mockFetch.mockResolvedValueOnce(
      new Response(JSON.stringify({ detail: [{ loc: ['body', 'model'], msg: 'field required' }] }), {
        status: 422,
      })
    );

    const error = await embedError();

    expect(error).toBeInstanceOf(HttpError);
    if (!(error instanceof HttpError)) return;
    expect(error.message).toBe('HTTP 422: [{"loc":["body","model"],"msg":"field required"}]');
  });

  it('should wrap a transport failure in a TransportError', async () => {
    const cause = new TypeError('fetch failed');
    mockFetch.mockRejectedValueOnce(cause);

    const error = await embedError();

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toBeInstanceOf(JinaError);
    if (!(error instanceof TransportError)) return;
    expect(error.message).toBe('Request to http://jina.test/v1/embeddings failed: fetch failed');
    expect(error.cause).toBe(cause);
  });

  it('should keep the status when an error body cannot be read', async () => {
    mockFetch.mockResolvedValueOnce(new Response(failingBody('socket reset'), { status: 503 }));

    const error = await embedError();

    expect(error).toBeInstanceOf(HttpError);
    if (!(error instanceof HttpError)) return;
    expect(error.status).toBe(503);
    expect(error.payload).toBeNull();
    expect(error.message).toBe('HTTP 503');
  });

  it('should wrap a failed read of a 2xx body in a TransportError', async () => {
    mockFetch.mockResolvedValueOnce(new Response(failingBody('socket reset'), { status: 200 }));

    const error = await embedError();

    expect(error).toBeInstanceOf(TransportError);
    if (!(error instanceof TransportError)) return;
    expect(error.message).toBe('Failed to read response body from http://jina.test/v1/embeddings: socket reset');
  });

  it('should fail on a 200 with a non-JSON body', async () => {
    mockFetch.mockResolvedValueOnce(new Response('not json', { status: 200 }));

    const error = await embedError();

    expect(error).toBeInstanceOf(DeserializationError);
    if (!(error instanceof DeserializationError)) return;
    expect(error.status).toBe(200);
    expect(error.body).toBe('not json');
    expect(error.issues).toEqual([]);
  });

  it('should treat any 2xx as success', async () => {
    mockFetch.mockResolvedValueOnce(
      new Response(
        JSON.stringify({
          model: 'jina-clip-v1',
          data: [],
          usage: { prompt_tokens: 0, total_tokens: 0 },
        }),
        { status: 201 }
      )
    );

    const response = await client.embeddings({ model: 'jina-clip-v1', input: [] });

    expect(response.data).toEqual([]);
  });
});

describe('parseHttpErrorPayload()', () => {
  it('should decode a JSON object', () => {
    expect(parseHttpErrorPayload('{"detail":"Unauthorized","code":401}')).toEqual({
      detail: 'Unauthorized',
      code: 401,
    });
  });

  it('should return null for anything that is not a JSON object', () => {
    expect(parseHttpErrorPayload('')).toBeNull();
    expect(parseHttpErrorPayload('Internal Server Error')).toBeNull();
    expect(parseHttpErrorPayload('"just a string"')).toBeNull();
    expect(parseHttpErrorPayload('[1, 2]')).toBeNull();
    expect(parseHttpErrorPayload('null')).toBeNull();
  });
});

describe('HttpError', () => {
  it('should omit the detail when the payload has none', () => {
    const error = new HttpError(500, { error: 'boom' });

    expect(error.message).toBe('HTTP 500');
    expect(error.payload).toEqual({ error: 'boom' });
  });
});
