/**
 * @fileoverview Writes the selected ID set as a one-column CSV.
 */

import fs from 'node:fs';
import path from 'node:path';
import { stringify as stringifyCSV } from 'csv/sync';
import { SubsampleError } from './errors';

/**
 * Renders the IDs as CSV text with an `id` header, one row per ID in set
 * iteration order. IDs containing commas, quotes or line breaks are quoted.
 */
export function formatIdManifest(ids: ReadonlySet<string>): string {
  return stringifyCSV(
    Array.from(ids, (id) => ({ id })),
    { header: true, columns: ['id'] }
  );
}

/**
 * Writes {@link formatIdManifest} output to `filename`, replacing any existing file.
 * @throws {SubsampleError} If the file cannot be written
 */
export function writeIdManifest(filename: string, ids: ReadonlySet<string>): void {
  try {
    fs.writeFileSync(path.resolve(filename), formatIdManifest(ids), 'utf-8');
  } catch (error) {
    throw new SubsampleError(`Failed to write ID manifest ${filename}`, error);
  }
}
