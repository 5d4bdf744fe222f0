import type { ChoreApp } from '../app.js';
import { applyEnv, parseAssignments, type EnvEntry } from '../env/env.js';
import type { Task } from '../task/task.js';
import { hasTaskSpecified, type ResolvedCommand } from './command.js';
import { DispatchError } from './errors.js';

/**
 * What a single run does, decided from the resolved command.
 */
export type DispatchState =
  | { kind: 'list-tasks' }
  | { kind: 'list-env'; all: boolean }
  | { kind: 'general-help' }
  | { kind: 'invoke'; task: Task; args: readonly string[] }
  | { kind: 'task-help'; task: Task }
  | { kind: 'task-env'; task: Task; all: boolean };

/**
 * Picks the state for `command`, first match wins:
 * 1. listing flags without a task
 * 2. `--help` without a task
 * 3. no task and no flag: the default task, or the task listing when there is none
 * 4. a named task: its help, its environment listing, or the task itself
 *
 * @throws {TaskNotFoundError} for an unknown task name
 * @throws {MultipleDefaultsError} when the default task is ambiguous
 */
export function resolveState(app: ChoreApp, command: ResolvedCommand): DispatchState {
  if (!hasTaskSpecified(command)) {
    if (command.list) {
      return { kind: 'list-tasks' };
    }
    if (command.listEnv || command.listEnvAll) {
      return { kind: 'list-env', all: command.listEnvAll };
    }
    if (command.help) {
      return { kind: 'general-help' };
    }

    const defaultTask = app.registry.getDefault();
    return defaultTask ? { kind: 'invoke', task: defaultTask, args: [] } : { kind: 'list-tasks' };
  }

  const task = app.registry.get(command.task);
  if (command.help) {
    return { kind: 'task-help', task };
  }
  if (command.listEnv || command.listEnvAll) {
    return { kind: 'task-env', task, all: command.listEnvAll };
  }
  return { kind: 'invoke', task, args: command.args };
}

async function execute(app: ChoreApp, state: DispatchState, inline: readonly EnvEntry[]): Promise<void> {
  switch (state.kind) {
    case 'list-tasks':
      app.listTasks();
      return;
    case 'list-env':
      app.printEnv(inline, { all: state.all });
      return;
    case 'general-help':
      app.printHelp();
      return;
    case 'task-help':
      app.printer.print(state.task.describe());
      return;
    case 'task-env':
      app.printEnv(inline, { all: state.all, task: state.task });
      return;
    case 'invoke':
      await state.task.invoke(state.args, { printer: app.printer });
      return;
    default: {
      const unhandled: never = state;
      throw new DispatchError('Execution failed for unknown reason.', unhandled);
    }
  }
}

/**
 * Drives one CLI run: applies the `-e` assignments to the environment,
 * then resolves and executes the dispatch state.
 */
export async function dispatch(app: ChoreApp, command: ResolvedCommand): Promise<void> {
  const inline = parseAssignments(command.env);
  applyEnv(inline);

  await execute(app, resolveState(app, command), inline);
}
