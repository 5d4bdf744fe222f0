import { CommanderError } from 'commander';
import { loadEnvFile } from '../env/env.js';
import { ChoreError } from '../errors.js';
import type { Printer } from '../output/printer.js';
import { parseCommand, type ResolvedCommand } from './command.js';
import { dispatch } from './dispatcher.js';
import { loadTaskFile, resolveTaskFile } from './loader.js';
import { createServices, type Services } from './services.js';

/**
 * Prints an error that ended the run.
 */
export function reportError(printer: Printer, error: unknown): void {
  if (error instanceof ChoreError) {
    printer.error(error.message);
    return;
  }
  if (error instanceof Error) {
    printer.error(`${error.name}: ${error.message}`);
    return;
  }
  printer.error(`Unknown error: ${String(error)}`);
}

/**
 * Main CLI entry point.
 *
 * Loads the configuration, the dotenv file and the task file, then
 * dispatches the command.
 * @returns the process exit code
 */
export async function main(
  argv: readonly string[] = process.argv.slice(2),
  services: Services = createServices(),
): Promise<number> {
  const { app } = services;

  let command: ResolvedCommand;
  try {
    command = parseCommand(argv);
  } catch (error) {
    // commander has already printed the message (or the version)
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  try {
    const config = await services.config.load(command.config);
    app.configure({
      color: config.color,
      shell: config.shell,
      dryRun: command.dryRun || config.dryRun,
      echo: config.echo,
    });
    app.useDotenv(await loadEnvFile(config.envFile, services.fs));

    const taskFile = await resolveTaskFile(config, services.fs);
    await loadTaskFile(app, taskFile, services.importModule);

    await dispatch(app, command);
    return 0;
  } catch (error) {
    reportError(app.printer, error);
    return 1;
  }
}

export { dispatch, resolveState, type DispatchState } from './dispatcher.js';
export { parseCommand, createProgram, type ResolvedCommand } from './command.js';
export { TaskFileLoadError, TaskFileNotFoundError, DispatchError } from './errors.js';
