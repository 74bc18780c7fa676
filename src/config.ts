/**
 * Run options validation and file naming.
 */
import { z } from 'zod';
import { SubsampleError } from './errors';
import { ASCII_COMPATIBLE_ENCODINGS } from './lines';

export const DEFAULT_INPUT_PREFIX = 'mba/mba_sample';
export const DEFAULT_NUM = 100;

/** Table suffixes, in processing order. The first one is the driver. */
export const TABLE_SUFFIXES = ['eph', 'orbit', 'physical'] as const;

export type TableSuffix = (typeof TABLE_SUFFIXES)[number];

// Lines and IDs are split on raw bytes, so multi-byte-unit encodings such as utf16le are refused.
const EncodingSchema = z.string().pipe(z.enum(ASCII_COMPATIBLE_ENCODINGS, {
  errorMap: () => ({
    message: `Unsupported encoding, expected one of ${ASCII_COMPATIBLE_ENCODINGS.join(', ')}`,
  }),
}));

// Decimal digits only, like an `int` argument: no hex, exponents or fractions.
const INTEGER_PATTERN = /^[+-]?\d+$/;

export const SubsampleConfigSchema = z.object({
  inputPrefix: z.string().min(1).default(DEFAULT_INPUT_PREFIX),
  num: z
    .union([z.number(), z.string().trim().regex(INTEGER_PATTERN, 'Expected a decimal integer')])
    .pipe(z.coerce.number().int().nonnegative())
    .default(DEFAULT_NUM),
  manifest: z.boolean().default(false),
  encoding: EncodingSchema.default('utf-8'),
});

export type SubsampleConfigInput = z.input<typeof SubsampleConfigSchema>;
export type SubsampleConfig = z.infer<typeof SubsampleConfigSchema>;

/**
 * Validates raw options and fills in defaults.
 * @throws {SubsampleError} Listing every invalid option
 */
export function parseSubsampleConfig(raw: SubsampleConfigInput = {}): SubsampleConfig {
  const parsed = SubsampleConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new SubsampleError(`Invalid subsample options: ${issues}`, parsed.error);
  }
  return parsed.data;
}

export interface TablePaths {
  suffix: TableSuffix;
  input: string;
  output: string;
}

export interface SubsamplePaths {
  /** File the ID set is drawn from */
  driver: string;
  tables: TablePaths[];
  manifest: string;
}

export function subsamplePaths(inputPrefix: string, num: number): SubsamplePaths {
  const tables = TABLE_SUFFIXES.map((suffix) => ({
    suffix,
    input: `${inputPrefix}_${suffix}.csv`,
    output: `${inputPrefix}_${num}_${suffix}.csv`,
  }));

  return {
    driver: `${inputPrefix}_${TABLE_SUFFIXES[0]}.csv`,
    tables,
    manifest: `${inputPrefix}_${num}_ids.csv`,
  };
}
