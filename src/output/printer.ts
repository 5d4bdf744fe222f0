import { inspect } from 'node:util';
import pc from 'picocolors';

export type BoxRow = readonly [string, string];

export interface BoxOptions {
  /** Sort rows by their first column */
  sort?: boolean;
}

/**
 * Console output used by the dispatcher, the shell executor and task files.
 */
export interface Printer {
  print(message: string): void;
  error(message: string): void;
  warning(message: string): void;
  weak(message: string): void;
  /** Prints a task's return value: strings as-is, anything else inspected */
  value(value: unknown): void;
  box(title: string, rows: readonly BoxRow[], options?: BoxOptions): void;
}

export interface PrinterOptions {
  /** Defaults to whatever picocolors detects for the current terminal */
  color?: boolean;
}

/**
 * Renders rows as a rounded box:
 *
 * ```
 * ╭─ title ──────╮
 * │ key    value │
 * ╰──────────────╯
 * ```
 *
 * Multi-line values continue under the value column.
 */
export function renderBox(title: string, rows: readonly BoxRow[], options: BoxOptions = {}): string[] {
  const ordered = options.sort ? [...rows].sort((a, b) => a[0].localeCompare(b[0])) : rows;
  const keyWidth = Math.max(0, ...ordered.map(([key]) => key.length));

  const content: string[] = [];
  for (const [key, value] of ordered) {
    const [first = '', ...rest] = value.split('\n');
    content.push(`${key.padEnd(keyWidth)}  ${first}`.trimEnd());
    for (const line of rest) {
      content.push(`${' '.repeat(keyWidth)}  ${line}`.trimEnd());
    }
  }

  const width = Math.max(title.length + 2, ...content.map((line) => line.length));
  return [
    `╭─ ${title} ${'─'.repeat(width - title.length - 1)}╮`,
    ...content.map((line) => `│ ${line.padEnd(width)} │`),
    `╰${'─'.repeat(width + 2)}╯`,
  ];
}

class ConsolePrinter implements Printer {
  private readonly colors: ReturnType<typeof pc.createColors>;

  constructor(color: boolean) {
    this.colors = pc.createColors(color);
  }

  print(message: string): void {
    console.log(message);
  }

  error(message: string): void {
    console.error(this.colors.red(message));
  }

  warning(message: string): void {
    console.log(this.colors.yellow(message));
  }

  weak(message: string): void {
    console.log(this.colors.gray(message));
  }

  value(value: unknown): void {
    console.log(typeof value === 'string' ? value : inspect(value));
  }

  box(title: string, rows: readonly BoxRow[], options?: BoxOptions): void {
    for (const line of renderBox(title, rows, options)) {
      console.log(line);
    }
  }
}

export function createPrinter(options: PrinterOptions = {}): Printer {
  return new ConsolePrinter(options.color ?? pc.isColorSupported);
}
