/**
 * Request encoding for the rerank endpoint.
 */

import type { RerankRequest } from '../models/rerank.js';

export const RERANK_PATH = '/v1/rerank';

/**
 * Build the JSON body. `top_n` and `return_documents` are omitted, not sent as
 * `null`, when unset so the server defaults apply.
 */
export function serializeRerankRequest(request: RerankRequest): Record<string, unknown> {
  const body: Record<string, unknown> = {
    model: request.model,
    query: request.query,
    documents: request.documents,
  };
  if (request.top_n !== undefined) body.top_n = request.top_n;
  if (request.return_documents !== undefined) body.return_documents = request.return_documents;
  return body;
}
