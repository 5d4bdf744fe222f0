import { readFile, access } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';
import { CONFIG_FILE_NAME, DEFAULT_ENV_FILE, type Config, type ConfigService } from './types.js';
import { ConfigLoadError, ConfigNotFoundError, ConfigValidationError } from './errors.js';

const configSchema = z
  .object({
    taskFile: z.string().min(1, 'taskFile cannot be empty').optional(),
    envFile: z.string().min(1, 'envFile cannot be empty').optional(),
    shell: z.string().min(1, 'shell cannot be empty').optional(),
    dryRun: z.boolean().optional(),
    echo: z.boolean().optional(),
    color: z.boolean().optional(),
  })
  .strict();

type RawConfig = z.infer<typeof configSchema>;

export class ConfigServiceImpl implements ConfigService {
  /**
   * @param startDir - directory the lookup starts from, the working directory by default
   */
  constructor(private readonly startDir: string = process.cwd()) {}

  /**
   * Find config file by traversing up the directory tree.
   * Returns the resolved path to the config file, or null if not found.
   */
  private async findConfigPath(startDir: string): Promise<string | null> {
    let currentDir = resolve(startDir);

    while (true) {
      const configPath = resolve(currentDir, CONFIG_FILE_NAME);

      try {
        await access(configPath);
        return configPath;
      } catch (e) {
        const error = e as NodeJS.ErrnoException;
        // Anything but "not found" (e.g. permission denied) is reported
        if (error.code !== 'ENOENT') {
          throw new ConfigLoadError(`Cannot access config at ${configPath}`, error);
        }
      }

      const parentDir = dirname(currentDir);

      // Stop if we've reached the root
      if (parentDir === currentDir) {
        return null;
      }

      currentDir = parentDir;
    }
  }

  /**
   * Loads `chore.config.yml` from `path`, or from the nearest directory
   * upwards. Without a file every setting takes its default.
   */
  async load(path?: string): Promise<Config> {
    let configPath: string | null;

    if (path) {
      configPath = resolve(this.startDir, path);
      // Explicit path: verify it exists
      try {
        await access(configPath);
      } catch {
        throw new ConfigNotFoundError(configPath);
      }
    } else {
      configPath = await this.findConfigPath(this.startDir);
    }

    if (!configPath) {
      return this.withDefaults(resolve(this.startDir), {});
    }

    const content = await readFile(configPath, 'utf-8');

    let rawConfig: unknown;
    try {
      rawConfig = parse(content);
    } catch (e) {
      throw new ConfigLoadError('Invalid YAML in configuration file', e instanceof Error ? e : undefined);
    }

    // An empty file is a valid, empty configuration
    if (rawConfig === null || rawConfig === undefined) {
      rawConfig = {};
    }

    if (typeof rawConfig !== 'object' || Array.isArray(rawConfig)) {
      throw new ConfigLoadError('Configuration file must contain a mapping');
    }

    return this.withDefaults(dirname(configPath), this.validateAndParse(rawConfig));
  }

  private validateAndParse(raw: unknown): RawConfig {
    const result = configSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigValidationError(
        result.error.issues.map((issue) => ({ message: issue.message, path: issue.path })),
      );
    }
    return result.data;
  }

  private withDefaults(rootDir: string, raw: RawConfig): Config {
    return {
      rootDir,
      taskFile: raw.taskFile === undefined ? undefined : resolve(rootDir, raw.taskFile),
      envFile: resolve(rootDir, raw.envFile ?? DEFAULT_ENV_FILE),
      shell: raw.shell,
      dryRun: raw.dryRun ?? false,
      echo: raw.echo ?? true,
      color: raw.color,
    };
  }
}

export const configService = new ConfigServiceImpl();

export { CONFIG_FILE_NAME, DEFAULT_ENV_FILE, DEFAULT_TASK_FILES } from './types.js';
export type { Config, ConfigService } from './types.js';
export { ConfigLoadError, ConfigNotFoundError, ConfigValidationError } from './errors.js';
