import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { z } from 'zod';

/**
 * Command line resolved into what the dispatcher needs.
 */
export interface ResolvedCommand {
  task?: string;
  args: string[];
  help: boolean;
  list: boolean;
  listEnv: boolean;
  listEnvAll: boolean;
  /** Raw `KEY=VALUE` assignments from `-e`, in order */
  env: string[];
  dryRun: boolean;
  config?: string;
}

interface CliOptions {
  help?: boolean;
  list?: boolean;
  listEnv?: boolean;
  listEnvAll?: boolean;
  env: string[];
  dryRun?: boolean;
  config?: string;
}

const packageSchema = z.object({ version: z.string() });

function readVersion(): string {
  // src/cli and dist/cli are both two levels below package.json
  const content = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
  return packageSchema.parse(JSON.parse(content)).version;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Builds the commander program. Help is handled by the dispatcher,
 * so commander's own `--help` is disabled.
 */
export function createProgram(): Command {
  return new Command()
    .name('chore')
    .description('Run the tasks declared in a chorefile')
    .usage('[task] [args...] [options]')
    .version(readVersion(), '-V, --version', 'Print the version')
    .helpOption(false)
    .exitOverride()
    .argument('[task]', 'Task to run (the default task when omitted)')
    .argument('[args...]', 'Arguments passed to the task, use -- before arguments starting with -')
    .option('-h, --help', 'Show help for a task (or general help without a task)')
    .option('-l, --list', 'List available tasks')
    .option('--list-env', 'List .env and in-line environment variables')
    .option('--list-env-all', 'List .env, in-line and all remaining environment variables')
    .option('-e, --env <KEY=VALUE>', 'Set an environment variable (repeatable)', collect, [])
    .option('--dry-run', 'Print shell commands instead of running them')
    .option('-c, --config <path>', 'Use this configuration file');
}

/**
 * Parses user arguments (without the node binary and script path).
 * @throws {CommanderError} for unknown options, `--version` and other commander exits
 */
export function parseCommand(argv: readonly string[], program: Command = createProgram()): ResolvedCommand {
  program.parse([...argv], { from: 'user' });
  const options = program.opts<CliOptions>();
  const [task, ...args] = program.args;

  return {
    task,
    args,
    help: options.help ?? false,
    list: options.list ?? false,
    listEnv: options.listEnv ?? false,
    listEnvAll: options.listEnvAll ?? false,
    env: options.env,
    dryRun: options.dryRun ?? false,
    config: options.config,
  };
}

export function hasTaskSpecified(command: ResolvedCommand): command is ResolvedCommand & { task: string } {
  return command.task !== undefined && command.task !== '';
}
