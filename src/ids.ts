/**
 * @fileoverview Collects the first N distinct entity IDs of a driver file.
 */

import { SubsampleError, toSubsampleError } from './errors';
import { firstField, lineGenerator, openFileAsync, readLinesSync, type AsciiCompatibleEncoding, type LineReadOptions } from './lines';

/**
 * Options for ID collection
 */
export interface CollectIdsOptions extends LineReadOptions {
  /** Encoding used to decode the ID field (default `utf-8`) */
  encoding?: AsciiCompatibleEncoding;
}

interface IdCollector {
  readonly ids: Set<string>;
  /** Feeds one line and reports whether enough IDs have been gathered. */
  push(line: Buffer): boolean;
}

function assertTargetCount(targetCount: number): void {
  if (!Number.isInteger(targetCount) || targetCount < 0) {
    throw new SubsampleError(`Target count must be a non-negative integer, got ${targetCount}`);
  }
}

// The stop check also runs after the header, so a target of 0 ends the scan
// there with an empty set.
function createIdCollector(targetCount: number, encoding: AsciiCompatibleEncoding): IdCollector {
  const ids = new Set<string>();
  let headerSeen = false;

  return {
    ids,
    push(line: Buffer): boolean {
      if (headerSeen) {
        ids.add(firstField(line, encoding));
      } else {
        headerSeen = true;
      }
      return ids.size >= targetCount;
    },
  };
}

/**
 * Reads `filename` until `targetCount` distinct IDs have been seen.
 *
 * The first line is treated as a header and skipped. IDs are the first
 * comma-delimited field of each data line. When the file holds fewer distinct
 * IDs than requested, all of them are returned.
 *
 * @param filename - Driver CSV file
 * @param targetCount - Number of distinct IDs to gather
 * @param options - Read options
 * @returns The IDs, iterating in first-appearance order
 * @throws {SubsampleError} If `targetCount` is invalid or the file cannot be read
 *
 * @example
 * ```typescript
 * const ids = collectIds('mba/mba_sample_eph.csv', 100);
 * ```
 */
export function collectIds(
  filename: string,
  targetCount: number,
  options: CollectIdsOptions = {}
): ReadonlySet<string> {
  assertTargetCount(targetCount);
  const collector = createIdCollector(targetCount, options.encoding ?? 'utf-8');

  try {
    for (const line of readLinesSync(filename, options)) {
      if (collector.push(line)) break;
    }
  } catch (error) {
    throw toSubsampleError(error, `Failed to collect IDs from ${filename}`);
  }

  return collector.ids;
}

/**
 * Streaming version of {@link collectIds}.
 */
export async function collectIdsAsync(
  filename: string,
  targetCount: number,
  options: CollectIdsOptions = {}
): Promise<ReadonlySet<string>> {
  assertTargetCount(targetCount);
  const collector = createIdCollector(targetCount, options.encoding ?? 'utf-8');
  const handle = await openFileAsync(filename, 'r');

  try {
    for await (const line of lineGenerator(handle, options)) {
      if (collector.push(line)) break;
    }
  } catch (error) {
    throw toSubsampleError(error, `Failed to collect IDs from ${filename}`);
  }

  return collector.ids;
}
