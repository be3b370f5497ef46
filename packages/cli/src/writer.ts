/**
 * Filesystem writer for resolved output streams
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { type NamedUnit, WriteError, renderUnit, targetPath } from '@idlgen/core';

/**
 * Write every module under `root`, creating directories as needed.
 * Returns the written paths in module order.
 */
export async function writeModules(
  root: string,
  modules: readonly NamedUnit[]
): Promise<string[]> {
  const written: string[] = [];
  for (const { name, unit } of modules) {
    const file = path.join(root, targetPath(name));
    try {
      await mkdir(path.dirname(file), { recursive: true });
      await writeFile(file, renderUnit(unit), 'utf8');
    } catch (error: unknown) {
      throw new WriteError(file, error instanceof Error ? error : new Error(String(error)));
    }
    written.push(file);
  }
  return written;
}
