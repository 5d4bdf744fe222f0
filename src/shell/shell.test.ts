import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import type { SpawnOptions } from 'node:child_process';
import type { Printer } from '../output/printer.js';
import { ShellExecutor, type SpawnFn } from './shell.js';

class FakeProcess extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
}

interface FakeRun {
  stdout?: string;
  stderr?: string;
  code: number | null;
  signal?: NodeJS.Signals | null;
}

/** Spawn stand-in that writes the given output and then closes */
function fakeSpawn(run: FakeRun): SpawnFn & { calls: Array<[string, SpawnOptions]> } {
  const calls: Array<[string, SpawnOptions]> = [];
  const fn = (command: string, options: SpawnOptions): FakeProcess => {
    calls.push([command, options]);
    const child = new FakeProcess();
    setImmediate(() => {
      child.stdout.end(run.stdout ?? '');
      child.stderr.end(run.stderr ?? '');
      child.emit('close', run.code, run.signal ?? null);
    });
    return child;
  };
  return Object.assign(fn, { calls });
}

function recordingPrinter(): Printer & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    print: (message) => lines.push(`print: ${message}`),
    error: (message) => lines.push(`error: ${message}`),
    warning: (message) => lines.push(`warning: ${message}`),
    weak: (message) => lines.push(`weak: ${message}`),
    value: (value) => lines.push(`value: ${String(value)}`),
    box: (title) => lines.push(`box: ${title}`),
  };
}

describe('ShellExecutor', () => {
  let printer: ReturnType<typeof recordingPrinter>;

  beforeEach(() => {
    printer = recordingPrinter();
  });

  describe('run()', () => {
    it('should echo the command, forward its output and capture it', async () => {
      const spawn = fakeSpawn({ stdout: 'hello\nworld\n', code: 0 });
      const shell = new ShellExecutor({ printer, dryRun: false, echo: true }, spawn);

      const result = await shell.run('echo hello');

      expect(result).toEqual({ output: 'hello\nworld\n', exitCode: 0 });
      expect(printer.lines).toEqual(['weak: Executing: `echo hello`', 'print: hello', 'print: world']);
    });

    it('should capture stderr lines as well', async () => {
      const spawn = fakeSpawn({ stderr: 'warning: deprecated\n', code: 0 });
      const shell = new ShellExecutor({ printer, dryRun: false, echo: false }, spawn);

      const result = await shell.run('npm ls');

      expect(result.output).toBe('warning: deprecated\n');
    });

    it('should not forward output when print is false', async () => {
      const spawn = fakeSpawn({ stdout: 'quiet\n', code: 0 });
      const shell = new ShellExecutor({ printer, dryRun: false, echo: false }, spawn);

      const result = await shell.run('git rev-parse HEAD', { print: false });

      expect(result.output).toBe('quiet\n');
      expect(printer.lines).toEqual([]);
    });

    it('should report a non-zero exit code without throwing', async () => {
      const spawn = fakeSpawn({ code: 2 });
      const shell = new ShellExecutor({ printer, dryRun: false, echo: false }, spawn);

      const result = await shell.run('false');

      expect(result).toEqual({ output: '', exitCode: 2 });
      expect(printer.lines).toEqual(['error: Command failed with exit code 2']);
    });

    it('should only print the command on a dry run', async () => {
      const spawn = vi.fn<SpawnFn>();
      const shell = new ShellExecutor({ printer, dryRun: true, echo: true }, spawn);

      const result = await shell.run('rm -rf dist');

      expect(result).toEqual({ output: '', exitCode: 0 });
      expect(spawn).not.toHaveBeenCalled();
      expect(printer.lines).toEqual(['weak: Executing: `rm -rf dist`', 'warning: Dry run: rm -rf dist']);
    });

    it('should let per-call options override the settings', async () => {
      const spawn = vi.fn<SpawnFn>();
      const shell = new ShellExecutor({ printer, dryRun: false, echo: true }, spawn);

      await shell.run('make', { dryRun: true, echo: false });

      expect(spawn).not.toHaveBeenCalled();
      expect(printer.lines).toEqual(['warning: Dry run: make']);
    });

    it('should merge the extra env over process.env and pass the timeout in milliseconds', async () => {
      process.env.CHORE_SHELL_TEST = 'inherited';
      const spawn = fakeSpawn({ code: 0 });
      const shell = new ShellExecutor({ printer, dryRun: false, echo: false, shell: '/bin/bash' }, spawn);

      await shell.run('env', { env: { EXTRA: '1' }, timeoutSecs: 5 });
      delete process.env.CHORE_SHELL_TEST;

      expect(spawn.calls).toHaveLength(1);
      const [command, options] = spawn.calls[0] ?? ['', {}];
      expect(command).toBe('env');
      expect(options.shell).toBe('/bin/bash');
      expect(options.timeout).toBe(5000);
      expect(options.stdio).toEqual(['inherit', 'pipe', 'pipe']);
      expect(options.env).toMatchObject({ CHORE_SHELL_TEST: 'inherited', EXTRA: '1' });
    });

    it('should use the platform shell when none is configured', async () => {
      const spawn = fakeSpawn({ code: 0 });
      const shell = new ShellExecutor({ printer, dryRun: false, echo: false }, spawn);

      await shell.run('ls');

      expect(spawn.calls[0]?.[1].shell).toBe(true);
      expect(spawn.calls[0]?.[1].timeout).toBeUndefined();
    });

    it('should report a timeout', async () => {
      const spawn = fakeSpawn({ stdout: 'partial\n', code: null, signal: 'SIGTERM' });
      const shell = new ShellExecutor({ printer, dryRun: false, echo: false }, spawn);

      const result = await shell.run('sleep 60', { timeoutSecs: 1, print: false });

      expect(result).toEqual({ output: 'partial\n', exitCode: 1 });
      expect(printer.lines).toEqual(["error: Command 'sleep 60' timed out after 1 seconds"]);
    });

    it('should report a command killed by a signal', async () => {
      const spawn = fakeSpawn({ code: null, signal: 'SIGKILL' });
      const shell = new ShellExecutor({ printer, dryRun: false, echo: false }, spawn);

      const result = await shell.run('yes');

      expect(result.exitCode).toBe(1);
      expect(printer.lines).toEqual(["error: Command 'yes' was terminated by SIGKILL"]);
    });

    it('should turn a spawn error into exit code 1', async () => {
      const spawn: SpawnFn = () => {
        const child = new FakeProcess();
        setImmediate(() => {
          child.emit('error', new Error('spawn /bin/nope ENOENT'));
          child.stdout.end();
          child.stderr.end();
        });
        return child;
      };
      const shell = new ShellExecutor({ printer, dryRun: false, echo: false, shell: '/bin/nope' }, spawn);

      const result = await shell.run('ls');

      expect(result).toEqual({ output: 'Error running command: spawn /bin/nope ENOENT', exitCode: 1 });
      expect(printer.lines).toEqual(['error: Error running command: spawn /bin/nope ENOENT']);
    });

    it('should turn a synchronous spawn failure into exit code 1', async () => {
      const spawn: SpawnFn = () => {
        throw new Error('invalid options');
      };
      const shell = new ShellExecutor({ printer, dryRun: false, echo: false }, spawn);

      const result = await shell.run('ls');

      expect(result.exitCode).toBe(1);
      expect(result.output).toBe('Error running command: invalid options');
    });
  });

  describe('configure()', () => {
    it('should update settings for later runs', async () => {
      const spawn = vi.fn<SpawnFn>();
      const shell = new ShellExecutor({ printer, dryRun: false, echo: false }, spawn);

      shell.configure({ dryRun: true });
      await shell.run('deploy');

      expect(spawn).not.toHaveBeenCalled();
      expect(printer.lines).toEqual(['warning: Dry run: deploy']);
    });
  });
});
