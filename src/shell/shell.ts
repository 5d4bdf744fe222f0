import { spawn, type SpawnOptions } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { Printer } from '../output/printer.js';

export interface RunOptions {
  /** Merged over `process.env` for this command only */
  env?: Record<string, string>;
  /**
   * Send SIGTERM to the shell after this many seconds. Processes the shell
   * started keep running, and `run` waits until they close their output.
   */
  timeoutSecs?: number;
  /** Print the command instead of running it */
  dryRun?: boolean;
  /** Print `Executing: ...` before running */
  echo?: boolean;
  /** Forward output lines to the console as they arrive */
  print?: boolean;
}

export interface RunResult {
  output: string;
  exitCode: number;
}

/**
 * The part of a ChildProcess the executor relies on.
 */
export interface SpawnedProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnFn = (command: string, options: SpawnOptions) => SpawnedProcess;

export interface ShellSettings {
  printer: Printer;
  /** Shell binary; the platform default when unset */
  shell?: string;
  dryRun: boolean;
  echo: boolean;
}

interface Exit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

const defaultSpawn: SpawnFn = (command, options) => spawn(command, options);

function waitForExit(child: SpawnedProcess): Promise<Exit> {
  return new Promise<Exit>((resolve, reject) => {
    child.once('error', reject);
    child.once('close', (code, signal) => resolve({ code, signal }));
  });
}

async function readLines(stream: Readable | null, onLine: (line: string) => void): Promise<void> {
  if (!stream) {
    return;
  }
  for await (const line of createInterface({ input: stream, crlfDelay: Infinity })) {
    onLine(line);
  }
}

/**
 * Runs shell commands for task bodies.
 *
 * Failures are reported through the returned exit code, never thrown:
 * callers decide whether a non-zero exit is fatal.
 */
export class ShellExecutor {
  private settings: ShellSettings;

  constructor(
    settings: ShellSettings,
    private readonly spawnFn: SpawnFn = defaultSpawn,
  ) {
    this.settings = { ...settings };
  }

  configure(settings: Partial<ShellSettings>): void {
    this.settings = { ...this.settings, ...settings };
  }

  async run(command: string, options: RunOptions = {}): Promise<RunResult> {
    const { printer } = this.settings;
    const dryRun = options.dryRun ?? this.settings.dryRun;
    const echo = options.echo ?? this.settings.echo;
    const print = options.print ?? true;

    if (echo) {
      printer.weak(`Executing: \`${command}\``);
    }

    if (dryRun) {
      printer.warning(`Dry run: ${command}`);
      return { output: '', exitCode: 0 };
    }

    let output = '';
    const onLine = (line: string): void => {
      output += `${line}\n`;
      if (print) {
        printer.print(line);
      }
    };

    let exit: Exit;
    try {
      const child = this.spawnFn(command, {
        shell: this.settings.shell ?? true,
        env: { ...process.env, ...options.env },
        stdio: ['inherit', 'pipe', 'pipe'],
        timeout: options.timeoutSecs === undefined ? undefined : options.timeoutSecs * 1000,
      });
      [exit] = await Promise.all([
        waitForExit(child),
        readLines(child.stdout, onLine),
        readLines(child.stderr, onLine),
      ]);
    } catch (error) {
      const message = `Error running command: ${error instanceof Error ? error.message : String(error)}`;
      printer.error(message);
      return { output: message, exitCode: 1 };
    }

    if (exit.code === null) {
      if (options.timeoutSecs !== undefined) {
        printer.error(`Command '${command}' timed out after ${options.timeoutSecs} seconds`);
      } else {
        printer.error(`Command '${command}' was terminated by ${exit.signal ?? 'a signal'}`);
      }
      return { output, exitCode: 1 };
    }

    if (exit.code !== 0) {
      printer.error(`Command failed with exit code ${exit.code}`);
    }
    return { output, exitCode: exit.code };
  }
}
