/**
 * @fileoverview Line-level access to CSV files. Lines are raw `Buffer`s that
 * keep their terminator, so a copied line is byte-identical to its source.
 */

import fs from 'node:fs';
import { open, type FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { SubsampleError } from './errors';

const NEWLINE = 0x0a;
const COMMA = 0x2c;

/**
 * Encodings in which `\n` and `,` are the single bytes 0x0A and 0x2C and never
 * occur inside another character. Lines and IDs are cut on those raw bytes.
 */
export const ASCII_COMPATIBLE_ENCODINGS = ['utf-8', 'utf8', 'latin1', 'binary', 'ascii'] as const;

export type AsciiCompatibleEncoding = (typeof ASCII_COMPATIBLE_ENCODINGS)[number];

/** Default read size in bytes for both the sync and the stream readers. */
export const DEFAULT_CHUNK_SIZE = 64 * 1024;

/**
 * Options shared by the line readers
 */
export interface LineReadOptions {
  /** Bytes requested per read */
  chunkSize?: number;
}

/**
 * Opens a file and wraps the failure in a SubsampleError.
 * @param filename - Path to open
 * @param flags - `'r'` for reading, `'w'` to create or truncate
 * @returns The file descriptor
 * @throws {SubsampleError} If the file cannot be opened
 */
export function openFile(filename: string, flags: 'r' | 'w'): number {
  try {
    return fs.openSync(path.resolve(filename), flags);
  } catch (error) {
    const purpose = flags === 'r' ? 'reading' : 'writing';
    throw new SubsampleError(`Failed to open ${filename} for ${purpose}`, error);
  }
}

/**
 * Async variant of {@link openFile}.
 */
export async function openFileAsync(filename: string, flags: 'r' | 'w'): Promise<FileHandle> {
  try {
    return await open(path.resolve(filename), flags);
  } catch (error) {
    const purpose = flags === 'r' ? 'reading' : 'writing';
    throw new SubsampleError(`Failed to open ${filename} for ${purpose}`, error);
  }
}

/**
 * Splits `chunk` on newlines. Complete lines go to `emit`; the trailing
 * partial line is returned so the caller can carry it into the next chunk.
 */
function splitChunk(chunk: Buffer, pending: Buffer[], emit: (line: Buffer) => void): Buffer[] {
  let start = 0;
  let newline = chunk.indexOf(NEWLINE, start);

  while (newline !== -1) {
    const piece = chunk.subarray(start, newline + 1);
    emit(pending.length > 0 ? Buffer.concat([...pending, piece]) : Buffer.from(piece));
    pending = [];
    start = newline + 1;
    newline = chunk.indexOf(NEWLINE, start);
  }

  if (start < chunk.length) {
    pending.push(Buffer.from(chunk.subarray(start)));
  }
  return pending;
}

/**
 * Yields the lines of an already open file descriptor. The descriptor is left
 * open; closing it is the caller's job.
 */
export function* linesFromDescriptor(
  fd: number,
  options: LineReadOptions = {}
): Generator<Buffer, void, undefined> {
  const chunk = Buffer.allocUnsafe(options.chunkSize ?? DEFAULT_CHUNK_SIZE);
  let pending: Buffer[] = [];
  let bytesRead = fs.readSync(fd, chunk, 0, chunk.length, null);

  while (bytesRead > 0) {
    const ready: Buffer[] = [];
    pending = splitChunk(chunk.subarray(0, bytesRead), pending, (line) => ready.push(line));
    yield* ready;
    bytesRead = fs.readSync(fd, chunk, 0, chunk.length, null);
  }

  if (pending.length > 0) {
    yield Buffer.concat(pending);
  }
}

/**
 * Reads a file synchronously, one line at a time.
 *
 * The file is opened on the first `next()` and closed when the generator
 * finishes, throws, or is stopped early with `break`/`return()`.
 *
 * @example
 * ```typescript
 * for (const line of readLinesSync('objects_eph.csv')) {
 *   process.stdout.write(line);
 * }
 * ```
 */
export function* readLinesSync(
  filename: string,
  options: LineReadOptions = {}
): Generator<Buffer, void, undefined> {
  const fd = openFile(filename, 'r');
  try {
    yield* linesFromDescriptor(fd, options);
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Async counterpart of {@link readLinesSync}, backed by a read stream.
 * @param source - A path, or a file handle the generator takes ownership of
 */
export async function* lineGenerator(
  source: string | FileHandle,
  options: LineReadOptions = {}
): AsyncGenerator<Buffer, void, undefined> {
  const highWaterMark = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const stream = typeof source === 'string'
    ? fs.createReadStream(path.resolve(source), { highWaterMark })
    : source.createReadStream({ highWaterMark });

  let pending: Buffer[] = [];
  try {
    for await (const chunk of stream) {
      const ready: Buffer[] = [];
      const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      pending = splitChunk(bytes, pending, (line) => ready.push(line));
      yield* ready;
    }

    if (pending.length > 0) {
      yield Buffer.concat(pending);
    }
  } finally {
    stream.destroy();
  }
}

/**
 * Returns the entity ID of a line: everything before the first comma, or the
 * whole line (terminator included) when there is no comma.
 */
export function firstField(line: Buffer, encoding: AsciiCompatibleEncoding = 'utf-8'): string {
  const comma = line.indexOf(COMMA);
  return line.toString(encoding, 0, comma === -1 ? line.length : comma);
}
