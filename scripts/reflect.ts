import 'dotenv/config';
import { pathToFileURL } from 'url';
import { loadConfig } from '../src/config/index.js';
import { buildServices } from '../src/services/container.js';
import type { AnalysisService } from '../src/services/analysisService.js';
import { InsufficientHistoryError } from '../src/shared/errors.js';
import { logger } from '../src/utils/logger.js';
import { numberArg, parseArgs, stringArg } from './args.js';

export interface ReflectDeps {
  service: AnalysisService;
  close(): void;
}

/** Resolves to the process exit code; 2 means there was no history to reflect on. */
export async function reflectCommand(argv: string[], open: () => ReflectDeps): Promise<number> {
  const args = parseArgs(argv);
  const ticker = args._ === undefined ? null : String(args._).toUpperCase();
  const period = stringArg(args, 'period') ?? 'week';
  const { service, close } = open();
  try {
    const { record, archive } = await service.runReflection({
      ticker,
      period,
      days: numberArg(args, 'days'),
      endDate: stringArg(args, 'end'),
      save: args['no-save'] !== true,
    });
    console.log(record.body);
    if (record.lowConfidenceFacets.length) console.log(`\n[reflect] low confidence: ${record.lowConfidenceFacets.join(', ')}`);
    if (archive === null) console.log('[reflect] not archived (--no-save)');
    else if (archive.saved) console.log(`[reflect] archived as ${archive.id}`);
    else console.log(`[reflect] reflection produced but NOT archived: ${archive.error}`);
    return 0;
  } catch (err) {
    if (err instanceof InsufficientHistoryError) {
      console.error(`${err.message}. ${err.guidance}`);
      return 2;
    }
    throw err;
  } finally {
    close();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  reflectCommand(process.argv.slice(2), () => buildServices(loadConfig())).then(
    (code) => { process.exitCode = code; },
    (err: unknown) => {
      logger.error({ err }, 'reflect_script_failed');
      process.exitCode = 1;
    },
  );
}
