import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { ConfigurationError, type FileGroup, parseSchemaDocument } from '@idlgen/core';

/**
 * Read and load the schema document named by --schema, relative to the
 * working directory.
 */
export async function readFileGroup(schemaPath: string | undefined): Promise<FileGroup> {
  if (!schemaPath) {
    throw new ConfigurationError('Missing --schema <file>', { option: 'schema' });
  }
  const abs = path.resolve(process.cwd(), schemaPath);

  let text: string;
  try {
    text = await readFile(abs, 'utf8');
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read schema document ${abs}: ${reason}`, {
      option: 'schema',
      path: abs,
    });
  }

  const loaded = parseSchemaDocument(text);
  if (loaded.isErr()) {
    throw loaded.error;
  }
  return loaded.value;
}
