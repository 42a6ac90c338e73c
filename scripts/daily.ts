import 'dotenv/config';
import fs from 'fs';
import { z } from 'zod';
import { loadConfig } from '../src/config/index.js';
import { buildServices } from '../src/services/container.js';
import { articleSchema, pricePointSchema } from '../src/routes/analysis.js';
import { isNewsPromptFacet } from '../src/prompts/catalog.js';
import { logger } from '../src/utils/logger.js';
import { parseArgs, stringArg } from './args.js';

const inputSchema = z.object({
  news: z.array(articleSchema).default([]),
  prices: z.array(pricePointSchema).default([]),
  marketNews: z.array(articleSchema).default([]),
});

const USAGE = 'Usage: npm run daily -- <TICKER|market:label|topic:label> --input=file.json [--date=YYYY-MM-DD] [--prompt=news_analysis] [--news-only] [--no-save]';

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const target = String(args._ ?? '').trim();
  const inputFile = stringArg(args, 'input');
  if (!target || !inputFile) {
    console.error(USAGE);
    process.exit(1);
  }
  const prompt = stringArg(args, 'prompt');
  if (prompt !== undefined && !isNewsPromptFacet(prompt)) {
    console.error(`Unknown news prompt "${prompt}". ${USAGE}`);
    process.exit(1);
  }

  const input = inputSchema.parse(JSON.parse(fs.readFileSync(inputFile, 'utf8')));
  const { service, close } = buildServices(loadConfig());
  try {
    if (args['news-only'] === true) {
      const { summary, articleCount } = await service.summarizeNews({ target, news: input.news, newsPrompt: prompt });
      console.log(summary);
      console.log(`\n[daily] news-only summary of ${articleCount} articles, not archived`);
      return;
    }
    const { record, archive } = await service.runDaily({
      ticker: target.toUpperCase(),
      ...input,
      date: stringArg(args, 'date'),
      newsPrompt: prompt,
      save: args['no-save'] !== true,
    });
    console.log(record.body);
    if (archive === null) console.log('\n[daily] not archived (--no-save)');
    else if (archive.saved) console.log(`\n[daily] archived as ${archive.id}`);
    else console.log(`\n[daily] analysis produced but NOT archived: ${archive.error}`);
  } finally {
    close();
  }
}

main().catch((err: unknown) => {
  logger.error({ err }, 'daily_script_failed');
  process.exit(1);
});
