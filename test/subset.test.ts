import { describe, it, expect, vi, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { SubsampleError, copySubset, copySubsetAsync } from '../src';
import { ORBIT_CSV, makeTmpDir, readText, removeTmpDirs, writeFile } from './fixtures';

const ids: ReadonlySet<string> = new Set(['A', 'B']);

describe('copySubset', () => {
  afterEach(removeTmpDirs);

  it('should copy the header and the matching rows in source order', () => {
    const dir = makeTmpDir();
    const source = writeFile(dir, 'orbit.csv', ORBIT_CSV);
    const destination = path.join(dir, 'orbit_2.csv');

    const result = copySubset(source, destination, ids);

    expect(readText(destination)).toBe('id,a,e,i\nA,2.2,0.15,3.1\nB,3.1,0.05,9.9\n');
    expect(result).toEqual({
      source,
      destination,
      header: 'id,a,e,i\n',
      rowsRead: 3,
      rowsWritten: 2,
    });
  });

  it('should keep every row of a repeated ID', () => {
    const dir = makeTmpDir();
    const source = writeFile(dir, 'eph.csv', 'id,t\nC,0\nA,0\nB,0\nA,1\n');
    const destination = path.join(dir, 'out.csv');

    copySubset(source, destination, ids);

    expect(readText(destination)).toBe('id,t\nA,0\nB,0\nA,1\n');
  });

  it('should write the header even when no row matches', () => {
    const dir = makeTmpDir();
    const source = writeFile(dir, 'orbit.csv', ORBIT_CSV);
    const destination = path.join(dir, 'out.csv');

    const result = copySubset(source, destination, new Set());

    expect(readText(destination)).toBe('id,a,e,i\n');
    expect(result.rowsWritten).toBe(0);
  });

  it('should write the header once even when it looks like a matching row', () => {
    const dir = makeTmpDir();
    const source = writeFile(dir, 'odd.csv', 'A,header\nA,1\nC,2\n');
    const destination = path.join(dir, 'out.csv');

    copySubset(source, destination, ids);

    expect(readText(destination)).toBe('A,header\nA,1\n');
  });

  it('should preserve line terminators byte for byte', () => {
    const dir = makeTmpDir();
    const source = writeFile(dir, 'crlf.csv', 'id,v\r\nA,1\r\nC,2\r\nB,3');
    const destination = path.join(dir, 'out.csv');

    copySubset(source, destination, ids, { chunkSize: 4 });

    expect(fs.readFileSync(destination)).toEqual(Buffer.from('id,v\r\nA,1\r\nB,3'));
  });

  it('should match single-byte IDs decoded as latin1', () => {
    const dir = makeTmpDir();
    const source = writeFile(dir, 'latin1.csv', Buffer.from('id,v\n\u00e9,1\nC,2\n', 'latin1'));
    const destination = path.join(dir, 'out.csv');

    const result = copySubset(source, destination, new Set(['\u00e9']), { encoding: 'latin1' });

    expect(fs.readFileSync(destination)).toEqual(Buffer.from('id,v\n\u00e9,1\n', 'latin1'));
    expect(result.rowsWritten).toBe(1);
  });

  it('should create an empty destination for an empty source', () => {
    const dir = makeTmpDir();
    const source = writeFile(dir, 'empty.csv', '');
    const destination = path.join(dir, 'out.csv');

    const result = copySubset(source, destination, ids);

    expect(readText(destination)).toBe('');
    expect(result.header).toBeUndefined();
    expect(result.rowsRead).toBe(0);
  });

  it('should truncate an existing destination', () => {
    const dir = makeTmpDir();
    const source = writeFile(dir, 'orbit.csv', ORBIT_CSV);
    const destination = writeFile(dir, 'out.csv', 'stale content that is longer than the result\n'.repeat(10));

    copySubset(source, destination, new Set(['C']));

    expect(readText(destination)).toBe('id,a,e,i\nC,2.7,0.10,5.0\n');
  });

  it('should produce identical output when run twice', () => {
    const dir = makeTmpDir();
    const source = writeFile(dir, 'orbit.csv', ORBIT_CSV);
    const destination = path.join(dir, 'out.csv');

    copySubset(source, destination, ids);
    const first = fs.readFileSync(destination);
    copySubset(source, destination, ids);

    expect(fs.readFileSync(destination)).toEqual(first);
  });

  it('should not create the destination when the source is missing', () => {
    const dir = makeTmpDir();
    const source = path.join(dir, 'missing.csv');
    const destination = path.join(dir, 'out.csv');

    expect(() => copySubset(source, destination, ids)).toThrow(`Failed to open ${source} for reading`);
    expect(fs.existsSync(destination)).toBe(false);
  });

  it('should throw a SubsampleError when the destination cannot be created', () => {
    const dir = makeTmpDir();
    const source = writeFile(dir, 'orbit.csv', ORBIT_CSV);
    const destination = path.join(dir, 'no-such-dir', 'out.csv');

    try {
      copySubset(source, destination, ids);
      expect.unreachable('copySubset should have thrown');
    } catch (error) {
      if (!(error instanceof SubsampleError)) throw error;
      expect(error.message).toBe(`Failed to open ${destination} for writing`);
      expect(error.cause).toMatchObject({ code: 'ENOENT' });
    }
  });

  it('should leave a partial destination and release both files when a write fails', () => {
    const dir = makeTmpDir();
    const source = writeFile(dir, 'orbit.csv', ORBIT_CSV);
    const destination = path.join(dir, 'out.csv');
    const closeSpy = vi.spyOn(fs, 'closeSync');
    vi.spyOn(fs, 'writeSync').mockImplementationOnce(() => {
      throw new Error('disk full');
    });

    expect(() => copySubset(source, destination, ids)).toThrow(`Failed to copy ${source} to ${destination}`);
    expect(closeSpy).toHaveBeenCalledTimes(2);
    expect(fs.existsSync(destination)).toBe(true);
    expect(readText(destination)).toBe('');
  });
});

describe('copySubsetAsync', () => {
  afterEach(removeTmpDirs);

  it('should write the same bytes and counts as the sync copier', async () => {
    const dir = makeTmpDir();
    const source = writeFile(dir, 'crlf.csv', 'id,v\r\nA,1\r\nC,2\r\nB,3');
    const syncDestination = path.join(dir, 'sync.csv');
    const asyncDestination = path.join(dir, 'async.csv');

    const syncResult = copySubset(source, syncDestination, ids);
    const asyncResult = await copySubsetAsync(source, asyncDestination, ids, { chunkSize: 3 });

    expect(fs.readFileSync(asyncDestination)).toEqual(fs.readFileSync(syncDestination));
    expect(asyncResult).toEqual({ ...syncResult, destination: asyncDestination });
  });

  it('should not create the destination when the source is missing', async () => {
    const dir = makeTmpDir();
    const source = path.join(dir, 'missing.csv');
    const destination = path.join(dir, 'out.csv');

    await expect(copySubsetAsync(source, destination, ids)).rejects.toThrow(`Failed to open ${source} for reading`);
    expect(fs.existsSync(destination)).toBe(false);
  });

  it('should reject when the destination cannot be created', async () => {
    const dir = makeTmpDir();
    const source = writeFile(dir, 'orbit.csv', ORBIT_CSV);
    const destination = path.join(dir, 'no-such-dir', 'out.csv');

    await expect(copySubsetAsync(source, destination, ids)).rejects.toThrow(SubsampleError);
  });
});
