/**
 * CLI entrypoint for csv-subsample.
 *
 * Usage:
 *   csv-subsample --input_prefix data/objects --num 50
 */
import { inspect, parseArgs } from 'node:util';
import { closest, distance } from 'fastest-levenshtein';
import { DEFAULT_INPUT_PREFIX, DEFAULT_NUM, parseSubsampleConfig, type SubsampleConfig } from './config';
import { subsample, subsampleAsync, type SubsampleHooks } from './subsample';

export const USAGE = `
csv-subsample — keep the first N entity IDs across related CSV files

Reads {prefix}_eph.csv, {prefix}_orbit.csv and {prefix}_physical.csv and writes
{prefix}_{num}_eph.csv, {prefix}_{num}_orbit.csv and {prefix}_{num}_physical.csv.

Options:
  --input_prefix <prefix>  Base path of the CSV files  (default: ${DEFAULT_INPUT_PREFIX})
  --num <n>                Number of distinct IDs to keep  (default: ${DEFAULT_NUM})
  --manifest               Also write the selected IDs to {prefix}_{num}_ids.csv
  --encoding <name>        Encoding of the ID column  (default: utf-8)
  --stream                 Use the stream-based reader and writer
  --verbose                Print a row count per output file
  --help                   Show this help
`.trim();

const OPTIONS = {
  input_prefix: { type: 'string', default: DEFAULT_INPUT_PREFIX },
  num: { type: 'string', default: String(DEFAULT_NUM) },
  manifest: { type: 'boolean', default: false },
  encoding: { type: 'string', default: 'utf-8' },
  stream: { type: 'boolean', default: false },
  verbose: { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

const OPTION_NAMES = Object.keys(OPTIONS);

/** Exit code for usage errors, matching common CLI argument parsers. */
const EXIT_USAGE = 2;

function isKnownOption(name: string): boolean {
  return OPTION_NAMES.includes(name) || name === 'h';
}

/**
 * Returns a usage message for the first unrecognised option in `argv`,
 * with a suggestion when a known option is within a small edit distance.
 */
export function describeUnknownOption(argv: string[]): string | undefined {
  const { tokens } = parseArgs({ args: argv, options: OPTIONS, strict: false, tokens: true });
  const unknown = tokens.find((token) => token.kind === 'option' && !isKnownOption(token.name));
  if (!unknown || unknown.kind !== 'option') return undefined;

  const message = `Unknown option '${unknown.rawName}'.`;
  const candidate = closest(unknown.name, OPTION_NAMES);
  const threshold = Math.max(2, Math.floor(candidate.length / 3));
  if (distance(unknown.name, candidate) > threshold) return message;
  return `${message} Did you mean '--${candidate}'?`;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, strict: true }).values;
}

function usageError(message: string): number {
  console.error(message);
  console.error(USAGE);
  return EXIT_USAGE;
}

/**
 * Runs the CLI and resolves with the process exit code. Usage errors resolve
 * with 2; I/O failures reject with the underlying SubsampleError.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const unknown = describeUnknownOption(argv);
  if (unknown) return usageError(unknown);

  let values: ReturnType<typeof parseCliArgs>;
  try {
    values = parseCliArgs(argv);
  } catch (error) {
    return usageError(error instanceof Error ? error.message : String(error));
  }

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  let config: SubsampleConfig;
  try {
    config = parseSubsampleConfig({
      inputPrefix: values.input_prefix,
      num: values.num,
      manifest: values.manifest,
      encoding: values.encoding,
    });
  } catch (error) {
    return usageError(error instanceof Error ? error.message : String(error));
  }

  const hooks: SubsampleHooks = {
    // every ID, not the first 100 that console.log shows for a Set
    onIds: (ids) => console.log(inspect(ids, { maxArrayLength: null })),
  };
  if (values.verbose) {
    hooks.onTable = (table) => console.log(`${table.destination}: ${table.rowsWritten}/${table.rowsRead} rows`);
  }

  const result = values.stream ? await subsampleAsync(config, hooks) : subsample(config, hooks);
  if (values.verbose && result.manifest) {
    console.log(`${result.manifest}: ${result.ids.size} ids`);
  }
  return 0;
}
