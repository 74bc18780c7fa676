/**
 * @fileoverview Runs a full subsample: collect IDs from the driver table, then
 * copy the matching rows of every related table.
 */

import { collectIds, collectIdsAsync } from './ids';
import { writeIdManifest } from './manifest';
import { copySubset, copySubsetAsync, type CopySubsetResult } from './subset';
import { parseSubsampleConfig, subsamplePaths, type SubsampleConfigInput } from './config';

/**
 * Callbacks invoked while a subsample runs
 */
export interface SubsampleHooks {
  /** Called once the ID set is known, before any output file is written */
  onIds?: (ids: ReadonlySet<string>) => void;
  /** Called after each table has been copied */
  onTable?: (result: CopySubsetResult) => void;
}

export interface SubsampleResult {
  ids: ReadonlySet<string>;
  tables: CopySubsetResult[];
  /** Path of the ID manifest, when one was written */
  manifest?: string;
}

/**
 * Collects the first `num` IDs of `{inputPrefix}_eph.csv` and writes
 * `{inputPrefix}_{num}_{suffix}.csv` for each table.
 *
 * Outputs already written stay in place when a later step fails.
 *
 * @param rawConfig - Options, validated by {@link parseSubsampleConfig}
 * @param hooks - Progress callbacks
 * @throws {SubsampleError} On invalid options or any I/O failure
 *
 * @example
 * ```typescript
 * const { ids } = subsample({ inputPrefix: 'data/objects', num: 50 }, {
 *   onIds: (ids) => console.log(ids),
 * });
 * ```
 */
export function subsample(rawConfig: SubsampleConfigInput = {}, hooks: SubsampleHooks = {}): SubsampleResult {
  const config = parseSubsampleConfig(rawConfig);
  const paths = subsamplePaths(config.inputPrefix, config.num);
  const options = { encoding: config.encoding };

  const ids = collectIds(paths.driver, config.num, options);
  hooks.onIds?.(ids);

  const tables: CopySubsetResult[] = [];
  for (const table of paths.tables) {
    const result = copySubset(table.input, table.output, ids, options);
    tables.push(result);
    hooks.onTable?.(result);
  }

  if (!config.manifest) return { ids, tables };

  writeIdManifest(paths.manifest, ids);
  return { ids, tables, manifest: paths.manifest };
}

/**
 * Streaming version of {@link subsample}. Tables are still processed one after another.
 */
export async function subsampleAsync(
  rawConfig: SubsampleConfigInput = {},
  hooks: SubsampleHooks = {}
): Promise<SubsampleResult> {
  const config = parseSubsampleConfig(rawConfig);
  const paths = subsamplePaths(config.inputPrefix, config.num);
  const options = { encoding: config.encoding };

  const ids = await collectIdsAsync(paths.driver, config.num, options);
  hooks.onIds?.(ids);

  const tables: CopySubsetResult[] = [];
  for (const table of paths.tables) {
    const result = await copySubsetAsync(table.input, table.output, ids, options);
    tables.push(result);
    hooks.onTable?.(result);
  }

  if (!config.manifest) return { ids, tables };

  writeIdManifest(paths.manifest, ids);
  return { ids, tables, manifest: paths.manifest };
}
