/** Name of the configuration file looked up from the working directory upwards */
export const CONFIG_FILE_NAME = 'chore.config.yml';

/** Task files tried in order when `taskFile` is not configured */
export const DEFAULT_TASK_FILES = ['chorefile.js', 'chorefile.mjs'] as const;

export const DEFAULT_ENV_FILE = '.env';

export interface Config {
  /** Directory of the configuration file, or the working directory when there is none */
  rootDir: string;
  /** Absolute path of the task file, when configured */
  taskFile?: string;
  /** Absolute path of the dotenv file */
  envFile: string;
  /** Shell used by `chore.run`; the platform default when unset */
  shell?: string;
  dryRun: boolean;
  echo: boolean;
  /** Force colors on or off; detected from the terminal when unset */
  color?: boolean;
}

export interface ConfigService {
  load(path?: string): Promise<Config>;
}
