import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, resolve } from 'node:path';

/**
 * Bare file names land in the output directory; anything with a
 * directory part is taken as given, relative to `cwd`.
 */
export function resolveExportPath(file: string, outputDir: string, cwd: string = process.cwd()): string {
  if (isAbsolute(file)) return file;
  if (dirname(file) !== '.') return resolve(cwd, file);
  return resolve(cwd, join(outputDir, file));
}

export async function writeOutput(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content);
}
