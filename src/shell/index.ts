export { ShellExecutor } from './shell.js';
export type { RunOptions, RunResult, ShellSettings, SpawnFn, SpawnedProcess } from './shell.js';
