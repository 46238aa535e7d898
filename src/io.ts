import { mkdir, readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { SchemaIoError } from './errors.js';
import { getLogger } from './logger.js';

const logger = getLogger('io');

/**
 * True for an absolute URL with both a scheme and a host.
 */
export function isValidURL(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol !== '' && url.host !== '';
  } catch {
    return false;
  }
}

/**
 * Fetches raw schema bytes. A response outside 2xx yields an empty body rather
 * than an error; transport failures throw `SchemaIoError`.
 */
export async function fetchSchema(url: string): Promise<Buffer> {
  let response: Response;
  try {
    response = await fetch(url);
  } catch (err) {
    throw new SchemaIoError(url, 'Cannot fetch schema', err);
  }
  if (!response.ok) {
    logger.warn(`Schema fetch returned HTTP ${response.status}; using an empty body`, { url });
    return Buffer.alloc(0);
  }
  try {
    return Buffer.from(await response.arrayBuffer());
  } catch (err) {
    throw new SchemaIoError(url, 'Cannot read schema response body', err);
  }
}

async function walk(dir: string, files: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(path, files);
    } else if (entry.isFile()) {
      files.push(path);
    }
  }
}

/**
 * Lists `path` itself when it is a file, or every file below it, in name order,
 * when it is a directory.
 */
export async function listFiles(path: string): Promise<string[]> {
  try {
    const info = await stat(path);
    if (!info.isDirectory()) return [path];
    const files: string[] = [];
    await walk(path, files);
    return files;
  } catch (err) {
    throw new SchemaIoError(path, 'Cannot list schema files', err);
  }
}

/**
 * Creates the output directory and its parents if missing. An empty path is a no-op.
 */
export async function prepareOutputDir(path: string): Promise<void> {
  if (path === '') return;
  try {
    await mkdir(path, { recursive: true });
  } catch (err) {
    throw new SchemaIoError(path, 'Cannot create output directory', err);
  }
}
