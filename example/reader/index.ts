/**
 * Fetch a page through the reader and print it as markdown.
 *
 * Usage:
 *   JINA_API_KEY=your_key npx tsx example/reader/index.ts https://example.com [format]
 */

import { JinaClient, parseReaderReturnFormat } from '../../src/index.js';

async function main(): Promise<void> {
  const [url, format = 'markdown'] = process.argv.slice(2);
  if (!url) {
    console.error('Usage: example/reader/index.ts <url> [format]');
    process.exit(1);
  }

  const jina = new JinaClient();
  const page = await jina.reader({
    url,
    return_format: parseReaderReturnFormat(format),
    timeout: 20,
    no_cache: true,
  });

  console.log(`# ${page.data.title}\n`);
  console.log(page.data.content);
  console.error(`\n(${page.data.usage.tokens} tokens)`);
}

main().catch(console.error);
