import 'dotenv/config';
import { loadConfig } from '../src/config/index.js';
import { openArchive } from '../src/rag/store.js';
import { logger } from '../src/utils/logger.js';
import { numberArg, parseArgs, stringArg } from './args.js';

// Search needs no generation backend, only the archive and its embeddings
async function main() {
  const args = parseArgs(process.argv.slice(2));
  const ticker = args._ === undefined ? null : String(args._).toUpperCase();
  const query = stringArg(args, 'query');
  if (!query) {
    console.error('Usage: npm run search -- [TICKER] --query="..." [--limit=5] [--daily-only]');
    process.exit(1);
  }
  const { store, close } = openArchive(loadConfig());
  try {
    const hits = await store.search(query, { ticker, k: numberArg(args, 'limit') ?? 5, includeReflections: args['daily-only'] !== true });
    if (!hits.length) console.log('No matching analyses.');
    hits.forEach(({ record, score }, i) => {
      console.log(`${i + 1}. [${score.toFixed(3)}] ${record.date} ${record.ticker ?? 'PORTFOLIO'} (${record.analysisType})`);
      console.log(`   ${record.body.replace(/\s+/g, ' ').slice(0, 200)}`);
    });
  } finally {
    close();
  }
}

main().catch((err: unknown) => {
  logger.error({ err }, 'search_script_failed');
  process.exit(1);
});
