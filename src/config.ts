/**
 * Client configuration: explicit options first, then environment fallbacks.
 */

import { ConstructionError } from './errors.js';

export const DEFAULT_BASE_URL = 'https://api.jina.ai';
export const DEFAULT_READER_BASE_URL = 'https://r.jina.ai';
export const DEFAULT_API_KEY_ENV_VAR = 'JINA_API_KEY';

/**
 * The transport collaborator. Anything with the shape of the global `fetch`
 * works, which lets callers plug in their own agent, proxy or test double.
 */
export type Fetch = (input: string, init: RequestInit) => Promise<Response>;

export interface JinaClientOptions {
  /** Bearer token. Falls back to the environment variable named by `apiKeyEnvVar`. */
  apiKey?: string;
  /** Environment variable holding the API key. Defaults to `JINA_API_KEY`. */
  apiKeyEnvVar?: string;
  /** Base URL for embeddings and rerank. Falls back to `JINA_BASE_URL`. */
  baseUrl?: string;
  /** Base URL for the reader. Falls back to `JINA_READER_BASE_URL`. */
  readerBaseUrl?: string;
  /** Defaults to the global `fetch`. */
  fetch?: Fetch;
  /** Source for the fallbacks. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

export interface ResolvedConfig {
  apiKey: string;
  baseUrl: string;
  readerBaseUrl: string;
  fetch: Fetch;
}

function nonBlank(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function stripTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Collapse options and environment into the values the client needs.
 *
 * @throws ConstructionError when no API key is available from either source.
 */
export function resolveConfig(options: JinaClientOptions = {}): ResolvedConfig {
  const env = options.env ?? process.env;
  const apiKeyEnvVar = options.apiKeyEnvVar ?? DEFAULT_API_KEY_ENV_VAR;
  const apiKey = nonBlank(options.apiKey) ?? nonBlank(env[apiKeyEnvVar]);
  if (!apiKey) {
    throw new ConstructionError(
      `API key is required. Pass apiKey or set the ${apiKeyEnvVar} environment variable.`
    );
  }

  const baseUrl = nonBlank(options.baseUrl) ?? nonBlank(env.JINA_BASE_URL) ?? DEFAULT_BASE_URL;
  const readerBaseUrl =
    nonBlank(options.readerBaseUrl) ?? nonBlank(env.JINA_READER_BASE_URL) ?? DEFAULT_READER_BASE_URL;

  return {
    apiKey,
    baseUrl: stripTrailingSlashes(baseUrl),
    readerBaseUrl: stripTrailingSlashes(readerBaseUrl),
    fetch: options.fetch ?? globalThis.fetch,
  };
}
