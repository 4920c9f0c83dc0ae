/**
 * Embed a handful of passages, then rerank them against a query.
 *
 * Usage:
 *   JINA_API_KEY=your_key npx tsx example/semantic-search/index.ts
 */

import { HttpError, JinaClient, initTracer, getFinishedSpans } from '../../src/index.js';

const passages = [
  'Sourdough needs a mature starter and a long, cool fermentation.',
  'A cast iron pan should be dried immediately and lightly oiled.',
  'Espresso extraction time is usually between 25 and 30 seconds.',
];

async function main(): Promise<void> {
  initTracer();
  const jina = new JinaClient();

  const embedded = await jina.embeddings({
    model: 'jina-embeddings-v2-base-en',
    input: passages,
    normalized: true,
  });
  for (const item of embedded.data) {
    console.log(`passage ${item.index}: ${item.embedding.length} dimensions`);
  }

  const ranked = await jina.rerank({
    model: 'jina-reranker-v2-base-multilingual',
    query: 'how long should I pull a shot of coffee?',
    documents: passages,
    top_n: 2,
  });
  for (const result of ranked.results) {
    console.log(`${result.relevance_score.toFixed(3)}  ${result.document?.text ?? passages[result.index]}`);
  }

  console.log(`\ntokens used: ${embedded.usage.total_tokens + ranked.usage.total_tokens}`);
  console.log(`spans: ${getFinishedSpans().map((span) => span.name).join(', ')}`);
}

main().catch((e: unknown) => {
  if (e instanceof HttpError) {
    console.error(`Jina API returned ${e.status}`, e.payload);
  } else {
    console.error(e);
  }
  process.exit(1);
});
