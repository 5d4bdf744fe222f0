import * as defaultFs from 'node:fs/promises';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { ChoreApp } from '../app.js';
import { DEFAULT_TASK_FILES, type Config } from '../config/types.js';
import { TaskFileLoadError, TaskFileNotFoundError } from './errors.js';

type FsModule = typeof defaultFs;

export type ModuleImporter = (specifier: string) => Promise<unknown>;

export const importModule: ModuleImporter = (specifier) => import(specifier);

/**
 * A task file may export a setup function instead of (or besides) calling
 * `chore.task` at module level. It receives the app the CLI is driving, which
 * matters when the file resolves a different copy of the package.
 */
type TaskFileSetup = (app: ChoreApp) => unknown;

function hasSetup(module: unknown): module is { default: TaskFileSetup } {
  return (
    typeof module === 'object' && module !== null && 'default' in module && typeof module.default === 'function'
  );
}

async function exists(path: string, fs: FsModule): Promise<boolean> {
  return fs.access(path).then(
    () => true,
    () => false,
  );
}

/**
 * Picks the configured task file, or the first default candidate found in the
 * project root.
 * @throws {TaskFileNotFoundError}
 */
export async function resolveTaskFile(config: Config, fs: FsModule = defaultFs): Promise<string> {
  const candidates = config.taskFile
    ? [config.taskFile]
    : DEFAULT_TASK_FILES.map((name) => resolve(config.rootDir, name));

  for (const candidate of candidates) {
    if (await exists(candidate, fs)) {
      return candidate;
    }
  }
  throw new TaskFileNotFoundError(candidates);
}

/**
 * Imports the task file, which registers its tasks, and runs its default
 * export when that is a function.
 * @throws {TaskFileLoadError}
 */
export async function loadTaskFile(
  app: ChoreApp,
  path: string,
  importer: ModuleImporter = importModule,
): Promise<void> {
  let module: unknown;
  try {
    module = await importer(pathToFileURL(path).href);
  } catch (e) {
    throw new TaskFileLoadError(path, e instanceof Error ? e : undefined);
  }

  if (hasSetup(module)) {
    await module.default(app);
  }
}
