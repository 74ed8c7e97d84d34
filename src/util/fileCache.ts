import fs from 'node:fs'; import path from 'node:path';

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

/** Writes `<dir>/<name>.json` (pretty-printed) and returns the path written. */
export function saveJSON(dir: string, name: string, obj: unknown): string {
  ensureDir(dir);
  const file = path.join(dir, `${name}.json`);
  fs.writeFileSync(file, JSON.stringify(obj, null, 2), 'utf-8');
  return file;
}
