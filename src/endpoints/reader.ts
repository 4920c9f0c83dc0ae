/**
 * Request encoding for the reader endpoint.
 *
 * Unlike embeddings and rerank, the reader takes only `url` in the body. The
 * extraction controls are sent as `X-*` headers.
 */

import { ConstructionError } from '../errors.js';
import { READER_RETURN_FORMATS, type ReaderRequest, type ReaderReturnFormat } from '../models/reader.js';

export type HeaderPair = [name: string, value: string];

// Tab, printable ASCII and obs-text. Rejects CR, LF and other controls.
const HEADER_VALUE_PATTERN = /^[\t\x20-\x7e\x80-\xff]*$/;

const MAX_TIMEOUT = 65535;

function isReaderReturnFormat(value: string): value is ReaderReturnFormat {
  return READER_RETURN_FORMATS.some((format) => format === value);
}

/**
 * Parse a return format case-insensitively, e.g. from a CLI flag or config file.
 *
 * @throws ConstructionError for an unknown format.
 */
export function parseReaderReturnFormat(value: string): ReaderReturnFormat {
  const normalized = value.trim().toLowerCase();
  if (!isReaderReturnFormat(normalized)) {
    throw new ConstructionError(
      `Invalid reader return format '${value}'. Expected one of: ${READER_RETURN_FORMATS.join(', ')}`
    );
  }
  return normalized;
}

function headerSafe(field: string, value: string): string {
  if (!HEADER_VALUE_PATTERN.test(value)) {
    throw new ConstructionError(`Reader field '${field}' contains characters not allowed in a header value`);
  }
  return value;
}

function timeoutHeader(timeout: number): string {
  if (!Number.isInteger(timeout) || timeout < 0 || timeout > MAX_TIMEOUT) {
    throw new ConstructionError(`Reader timeout must be an integer between 0 and ${MAX_TIMEOUT}, got ${timeout}`);
  }
  return String(timeout);
}

/**
 * Map the optional reader fields to request headers, skipping unset ones.
 *
 * @throws ConstructionError when a free-form field is not header-safe or the
 * timeout is out of range.
 */
export function readerHeaders(request: ReaderRequest): HeaderPair[] {
  const headers: HeaderPair[] = [];

  if (request.return_format !== undefined) {
    headers.push(['X-Return-Format', request.return_format]);
  }
  if (request.target_selector !== undefined) {
    headers.push(['X-Target-Selector', headerSafe('target_selector', request.target_selector)]);
  }
  if (request.locale !== undefined) {
    headers.push(['X-Locale', headerSafe('locale', request.locale)]);
  }
  if (request.proxy_url !== undefined) {
    headers.push(['X-Proxy-Url', headerSafe('proxy_url', request.proxy_url)]);
  }
  if (request.timeout !== undefined) {
    headers.push(['X-Timeout', timeoutHeader(request.timeout)]);
  }
  if (request.no_cache !== undefined) {
    headers.push(['X-No-Cache', String(request.no_cache)]);
  }
  if (request.wait_for_selector !== undefined) {
    headers.push(['X-Wait-For-Selector', headerSafe('wait_for_selector', request.wait_for_selector)]);
  }

  return headers;
}

/**
 * The reader body carries the target URL and nothing else.
 */
export function serializeReaderRequest(request: ReaderRequest): { url: string } {
  return { url: headerSafe('url', request.url) };
}
