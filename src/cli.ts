import { parseArgs } from 'util';
import logger from 'jet-logger';
import { loadInventory, readJsonSource } from './lib/inventory/inventory-source';
import { buildCriteria, searchListings } from './lib/realestate';
import { formatResults } from './lib/utils/format-result';

export const DEFAULT_LISTINGS = 'data/sample_listings.json';
export const DEFAULT_CRITERIA = 'config/industrial_criteria.json';

export interface CliOptions {
  listings: string;
  criteria: string;
  top?: number;
}

export const USAGE = [
  'Uso: land-search [--listings <archivo|url>] [--criteria <archivo|url>] [--top <n>]',
  '',
  'Evalúa terrenos con base en criterios configurables.',
].join('\n');

/**
 * @throws {Error} on unknown options or a non-positive `--top`.
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      listings: { type: 'string', short: 'l', default: DEFAULT_LISTINGS },
      criteria: { type: 'string', short: 'c', default: DEFAULT_CRITERIA },
      top: { type: 'string', short: 't' },
    },
    strict: true,
  });

  let top: number | undefined;
  if (values.top !== undefined) {
    top = Number.parseInt(values.top, 10);
    if (!Number.isInteger(top) || top <= 0) {
      throw new Error(`--top debe ser un entero positivo (recibido "${values.top}")`);
    }
  }

  return {
    listings: values.listings ?? DEFAULT_LISTINGS,
    criteria: values.criteria ?? DEFAULT_CRITERIA,
    top,
  };
}

/**
 * Run a search from the command line and print the shortlist.
 *
 * @returns the process exit code.
 */
export async function runCli(argv: string[], print: (text: string) => void = console.log): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    logger.err(error instanceof Error ? error.message : String(error));
    print(USAGE);
    return 2;
  }

  try {
    const listings = await loadInventory(options.listings);
    const criteria = buildCriteria(await readJsonSource(options.criteria));
    const results = searchListings(
      listings,
      options.top ? { ...criteria, top: options.top } : criteria
    );

    print(formatResults(results));
    return 0;
  } catch (error) {
    logger.err(`[CLI] ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
