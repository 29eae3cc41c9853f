import { readdir } from 'fs/promises';
import { join } from 'path';

/**
 * Every regular file under `dir`, depth first, as absolute paths in sorted order
 */
export async function listFilesRecursive(dir: string): Promise<string[]> {
  const files: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFilesRecursive(path)));
    } else if (entry.isFile()) {
      files.push(path);
    }
  }
  return files;
}
