import { createProgram } from './cli/command.js';
import { remainingEnv, type EnvEntry } from './env/env.js';
import { createPrinter, type Printer } from './output/printer.js';
import { Registry } from './registry/registry.js';
import { ShellExecutor, type RunOptions, type RunResult, type SpawnFn } from './shell/shell.js';
import type { Task } from './task/task.js';
import type { TaskDefinition } from './task/types.js';

export interface AppSettings {
  color?: boolean;
  shell?: string;
  dryRun: boolean;
  echo: boolean;
}

export interface AppOptions {
  printer?: Printer;
  spawn?: SpawnFn;
}

export interface EnvListingOptions {
  /** Also list the rest of `process.env` */
  all?: boolean;
  /** List this task's own environment as well */
  task?: Task;
}

/**
 * What a chorefile talks to: task registration, shell commands and console
 * output. The CLI drives the same object through the dispatcher.
 */
export class ChoreApp {
  readonly registry = new Registry();
  private printerImpl: Printer;
  private readonly shell: ShellExecutor;
  private dotenvEntries: EnvEntry[] = [];

  constructor(options: AppOptions = {}) {
    this.printerImpl = options.printer ?? createPrinter();
    this.shell = new ShellExecutor({ printer: this.printerImpl, dryRun: false, echo: true }, options.spawn);

    this.registry.addBuiltin('list', 'List all available tasks', () => this.listTasks());
    this.registry.addBuiltin('help', 'Show general help', () => this.printHelp());
  }

  get printer(): Printer {
    return this.printerImpl;
  }

  /**
   * Applies settings from the configuration file and the command line.
   * `color` replaces the printer.
   */
  configure(settings: AppSettings): void {
    if (settings.color !== undefined) {
      this.printerImpl = createPrinter({ color: settings.color });
    }
    this.shell.configure({
      printer: this.printerImpl,
      shell: settings.shell,
      dryRun: settings.dryRun,
      echo: settings.echo,
    });
  }

  /**
   * Registers a task. Tasks named in `requires` must be registered first.
   *
   * @example
   * const a = chore.task({ name: 'a', params: [{ name: 'num', type: 'number', default: 1 }], run: (num) => ... });
   * chore.task({ name: 'b', requires: [[a, [2]]], run: () => ... });
   */
  task(definition: TaskDefinition): Task {
    return this.registry.define(definition);
  }

  run(command: string, options?: RunOptions): Promise<RunResult> {
    return this.shell.run(command, options);
  }

  print(message: string): void {
    this.printerImpl.print(message);
  }

  printError(message: string): void {
    this.printerImpl.error(message);
  }

  printWarning(message: string): void {
    this.printerImpl.warning(message);
  }

  printWeak(message: string): void {
    this.printerImpl.weak(message);
  }

  /**
   * Remembers the entries loaded from the dotenv file for environment listings.
   */
  useDotenv(entries: readonly EnvEntry[]): void {
    this.dotenvEntries = [...entries];
  }

  listTasks(): void {
    if (this.registry.hasOnlyBuiltins()) {
      this.printerImpl.error(
        'No tasks have been registered. chore expects at least one `chore.task(...)` in your chorefile.',
      );
      return;
    }

    this.printerImpl.box(
      'Tasks',
      this.registry.list().map((task) => {
        const [summary = ''] = task.description.split('\n');
        return [task.name, task.isDefault ? `${summary} (default)`.trim() : summary] as const;
      }),
    );
  }

  printHelp(): void {
    this.printerImpl.print(createProgram().helpInformation());
    this.printerImpl.print('Available tasks:');
    this.listTasks();
  }

  printEnv(inline: readonly EnvEntry[], options: EnvListingOptions = {}): void {
    this.printerImpl.box('.env', this.dotenvEntries, { sort: true });
    this.printerImpl.box('in-line', inline, { sort: true });

    const taskEnv = options.task ? Object.entries(options.task.env) : [];
    if (taskEnv.length > 0) {
      this.printerImpl.box('Task-defined Environment', taskEnv, { sort: true });
    }

    if (options.all) {
      this.printerImpl.box('All (rest)', remainingEnv(this.dotenvEntries), { sort: true });
    }
  }
}

/** The application object chorefiles import */
export const chore = new ChoreApp();
