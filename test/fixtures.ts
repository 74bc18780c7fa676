/**
 * Shared test fixtures: temp directories and a small table family.
 */
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

const tmpDirs: string[] = [];

export function makeTmpDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'csv-subsample-'));
  tmpDirs.push(dir);
  return dir;
}

export function removeTmpDirs(): void {
  for (const dir of tmpDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

export function writeFile(dir: string, name: string, content: string | Buffer): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, content);
  return file;
}

export function readText(file: string): string {
  return fs.readFileSync(file, 'utf-8');
}

export const EPH_CSV =
  'id,t,x,y,z\n' +
  'A,0,1.0,2.0,3.0\n' +
  'B,0,4.0,5.0,6.0\n' +
  'A,1,1.1,2.1,3.1\n' +
  'C,0,7.0,8.0,9.0\n';

export const ORBIT_CSV =
  'id,a,e,i\n' +
  'C,2.7,0.10,5.0\n' +
  'A,2.2,0.15,3.1\n' +
  'B,3.1,0.05,9.9\n';

export const PHYSICAL_CSV =
  'id,h,albedo\n' +
  'B,15.2,0.21\n' +
  'D,16.0,0.12\n' +
  'A,14.1,0.30\n';

/** Writes `{prefix}_eph.csv`, `{prefix}_orbit.csv` and `{prefix}_physical.csv`. */
export function writeTableFamily(dir: string, base = 'mba_sample'): string {
  writeFile(dir, `${base}_eph.csv`, EPH_CSV);
  writeFile(dir, `${base}_orbit.csv`, ORBIT_CSV);
  writeFile(dir, `${base}_physical.csv`, PHYSICAL_CSV);
  return path.join(dir, base);
}
