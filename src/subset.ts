/**
 * @fileoverview Copies the header and the ID-matching rows of a CSV file.
 */

import fs from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { toSubsampleError } from './errors';
import {
  firstField,
  lineGenerator,
  linesFromDescriptor,
  openFile,
  openFileAsync,
  type AsciiCompatibleEncoding,
  type LineReadOptions,
} from './lines';

/**
 * Options for subset copying
 */
export interface CopySubsetOptions extends LineReadOptions {
  /** Encoding used to decode the ID field and the reported header (default `utf-8`) */
  encoding?: AsciiCompatibleEncoding;
}

/**
 * Outcome of copying one table
 */
export interface CopySubsetResult {
  source: string;
  destination: string;
  /** First line of the source, terminator included; `undefined` for an empty file */
  header: string | undefined;
  /** Data lines read, header excluded */
  rowsRead: number;
  /** Data lines written, header excluded */
  rowsWritten: number;
}

interface SubsetFilter {
  accept(line: Buffer): boolean;
  result(source: string, destination: string): CopySubsetResult;
}

function createSubsetFilter(ids: ReadonlySet<string>, encoding: AsciiCompatibleEncoding): SubsetFilter {
  let header: string | undefined;
  let headerSeen = false;
  let rowsRead = 0;
  let rowsWritten = 0;

  return {
    accept(line: Buffer): boolean {
      if (!headerSeen) {
        headerSeen = true;
        header = line.toString(encoding);
        return true;
      }

      rowsRead++;
      if (!ids.has(firstField(line, encoding))) return false;
      rowsWritten++;
      return true;
    },
    result(source: string, destination: string): CopySubsetResult {
      return { source, destination, header, rowsRead, rowsWritten };
    },
  };
}

function writeFully(fd: number, data: Buffer): void {
  let offset = 0;
  while (offset < data.length) {
    offset += fs.writeSync(fd, data, offset);
  }
}

/**
 * Copies the header of `source` and every data line whose first field is in
 * `ids` to `destination`, byte for byte and in source order.
 *
 * The source is opened first, so a missing source leaves the destination
 * untouched. Once writing has started the copy is not atomic: a failure
 * leaves whatever was written so far.
 *
 * @param source - CSV file to read
 * @param destination - File to create or truncate
 * @param ids - Entity IDs to keep
 * @param options - Read options
 * @returns Line counts for the copy
 * @throws {SubsampleError} If either file cannot be opened, read or written
 */
export function copySubset(
  source: string,
  destination: string,
  ids: ReadonlySet<string>,
  options: CopySubsetOptions = {}
): CopySubsetResult {
  const filter = createSubsetFilter(ids, options.encoding ?? 'utf-8');
  const sourceFd = openFile(source, 'r');

  try {
    const destinationFd = openFile(destination, 'w');
    try {
      for (const line of linesFromDescriptor(sourceFd, options)) {
        if (filter.accept(line)) writeFully(destinationFd, line);
      }
    } finally {
      fs.closeSync(destinationFd);
    }
  } catch (error) {
    throw toSubsampleError(error, `Failed to copy ${source} to ${destination}`);
  } finally {
    fs.closeSync(sourceFd);
  }

  return filter.result(source, destination);
}

/**
 * Streaming version of {@link copySubset}. Writes go through a file write
 * stream with backpressure.
 */
export async function copySubsetAsync(
  source: string,
  destination: string,
  ids: ReadonlySet<string>,
  options: CopySubsetOptions = {}
): Promise<CopySubsetResult> {
  const filter = createSubsetFilter(ids, options.encoding ?? 'utf-8');
  const sourceHandle = await openFileAsync(source, 'r');

  let destinationHandle: FileHandle;
  try {
    destinationHandle = await openFileAsync(destination, 'w');
  } catch (error) {
    await sourceHandle.close();
    throw error;
  }

  async function* matchingLines(): AsyncGenerator<Buffer, void, undefined> {
    for await (const line of lineGenerator(sourceHandle, options)) {
      if (filter.accept(line)) yield line;
    }
  }

  try {
    await pipeline(Readable.from(matchingLines()), destinationHandle.createWriteStream());
  } catch (error) {
    throw toSubsampleError(error, `Failed to copy ${source} to ${destination}`);
  } finally {
    // no-op when the read stream already closed it
    await sourceHandle.close();
  }

  return filter.result(source, destination);
}
