import { readFile } from 'node:fs/promises';
import { ConfigError } from '../core/errors';

// fs errors may come from another realm (vm contexts), so check the shape, not the class.
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

/** Read a UTF-8 script. Any failure is a ConfigError naming the path. */
export async function loadScript(path: string): Promise<string> {
  if (!path || !path.trim()) throw new ConfigError('No script file given');
  try {
    return await readFile(path, 'utf8');
  } catch (err) {
    const code = errnoCode(err);
    if (code === 'ENOENT') throw new ConfigError(`${path} not found`, { cause: err });
    if (code === 'EISDIR') throw new ConfigError(`${path} is a directory`, { cause: err });
    throw new ConfigError(`Cannot read ${path}`, { cause: err });
  }
}
