/**
 * Error taxonomy for the Jina client.
 *
 * Every failed call rejects with exactly one of these:
 *
 * - `TransportError`: no HTTP status was obtained (connection, DNS, abort), or
 *   a successful response's body could not be read.
 * - `HttpError`: the server answered with a non-2xx status.
 * - `DeserializationError`: a 2xx body that is not JSON or not the expected shape.
 * - `ConstructionError`: the client or a request could not be built.
 */

import type { ZodIssue } from 'zod';

/**
 * Decoded JSON error body returned by the API. Jina usually sends
 * `{ "detail": ... }`; the rest of the shape belongs to the server.
 */
export type HttpErrorPayload = Record<string, unknown>;

/**
 * Base class for all errors thrown by the client.
 */
export class JinaError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'JinaError';
  }
}

export class TransportError extends JinaError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'TransportError';
  }
}

export class HttpError extends JinaError {
  readonly status: number;
  /** `null` when the body was empty or not a JSON object. */
  readonly payload: HttpErrorPayload | null;

  constructor(status: number, payload: HttpErrorPayload | null) {
    super(formatHttpErrorMessage(status, payload));
    this.name = 'HttpError';
    this.status = status;
    this.payload = payload;
  }
}

export class DeserializationError extends JinaError {
  readonly status: number;
  /** Raw response body. */
  readonly body: string;
  /** Schema mismatches, empty when the body was not valid JSON. */
  readonly issues: ZodIssue[];

  constructor(message: string, status: number, body: string, issues: ZodIssue[] = [], cause?: unknown) {
    super(message, cause);
    this.name = 'DeserializationError';
    this.status = status;
    this.body = body;
    this.issues = issues;
  }
}

export class ConstructionError extends JinaError {
  constructor(message: string) {
    super(message);
    this.name = 'ConstructionError';
  }
}

function formatHttpErrorMessage(status: number, payload: HttpErrorPayload | null): string {
  const detail = payload?.detail;
  if (detail === undefined || detail === null) {
    return `HTTP ${status}`;
  }
  return `HTTP ${status}: ${typeof detail === 'string' ? detail : JSON.stringify(detail)}`;
}

/**
 * Best-effort decode of an error body. Anything other than a JSON object
 * yields `null`.
 */
export function parseHttpErrorPayload(body: string): HttpErrorPayload | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return null;
  }
  return Object.fromEntries(Object.entries(parsed));
}
