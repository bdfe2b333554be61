import { join, parse, format } from 'node:path';
import type { Exporter } from '@todo/core';

export const DEFAULT_STORE_FILE = 'todo.json';
export const STORE_PATH_ENV = 'TODO_FILE';

/**
 * Resolve the backing file.
 * Priority: explicit --path > TODO_FILE > ./todo.json.
 */
export function resolveStorePath(
  explicitPath: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  if (explicitPath) return explicitPath;
  const fromEnv = env[STORE_PATH_ENV];
  if (fromEnv) return fromEnv;
  return join(cwd, DEFAULT_STORE_FILE);
}

/**
 * Default export destination: the store path with the exporter's extension
 * (todo.json -> todo.csv). A JSON export gets ".export.json" so it never
 * lands on the store file itself.
 */
export function resolveExportPath(
  explicitOutput: string | undefined,
  storePath: string,
  exporter: Pick<Exporter, 'extension'>,
): string {
  if (explicitOutput) return explicitOutput;
  const { dir, name, ext } = parse(storePath);
  const extension = exporter.extension === ext ? `.export${exporter.extension}` : exporter.extension;
  return format({ dir, name, ext: extension });
}
