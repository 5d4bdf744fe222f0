import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createPrinter, renderBox } from './printer.js';

describe('renderBox()', () => {
  it('should draw a box sized to the title', () => {
    expect(renderBox('.env', [['B', '2'], ['A', '1']], { sort: true })).toEqual([
      '╭─ .env ─╮',
      '│ A  1   │',
      '│ B  2   │',
      '╰────────╯',
    ]);
  });

  it('should keep row order unless sorting is requested', () => {
    const lines = renderBox('t', [
      ['b', 'x'],
      ['a', 'y'],
    ]);

    expect(lines.slice(1, -1)).toEqual(['│ b  x │', '│ a  y │']);
  });

  it('should size the box to the widest row and align values', () => {
    expect(
      renderBox('Tasks', [
        ['build', 'Compile sources'],
        ['lint', ''],
      ]),
    ).toEqual([
      '╭─ Tasks ────────────────╮',
      '│ build  Compile sources │',
      '│ lint                   │',
      '╰────────────────────────╯',
    ]);
  });

  it('should continue multi-line values under the value column', () => {
    expect(renderBox('x', [['key', 'one\ntwo']])).toEqual([
      '╭─ x ──────╮',
      '│ key  one │',
      '│      two │',
      '╰──────────╯',
    ]);
  });

  it('should draw an empty box', () => {
    expect(renderBox('in-line', [])).toEqual(['╭─ in-line ─╮', '╰───────────╯']);
  });
});

describe('createPrinter()', () => {
  let logs: string[];
  let errors: string[];

  beforeEach(() => {
    logs = [];
    errors = [];
    vi.spyOn(console, 'log').mockImplementation((msg) => logs.push(String(msg)));
    vi.spyOn(console, 'error').mockImplementation((msg) => errors.push(String(msg)));
  });

  it('should print plain text without colors', () => {
    const printer = createPrinter({ color: false });

    printer.print('hello');
    printer.warning('careful');
    printer.weak('quiet');
    printer.error('broken');

    expect(logs).toEqual(['hello', 'careful', 'quiet']);
    expect(errors).toEqual(['broken']);
  });

  it('should wrap messages in ANSI colors when enabled', () => {
    const printer = createPrinter({ color: true });

    printer.error('broken');

    expect(errors).toEqual(['\x1b[31mbroken\x1b[39m']);
  });

  it('should print strings as-is and inspect other values', () => {
    const printer = createPrinter({ color: false });

    printer.value('done');
    printer.value(42);
    printer.value(['a', 'b']);

    expect(logs).toEqual(['done', '42', "[ 'a', 'b' ]"]);
  });

  it('should print a box line by line', () => {
    const printer = createPrinter({ color: false });

    printer.box('.env', [['A', '1']]);

    expect(logs).toEqual(['╭─ .env ─╮', '│ A  1   │', '╰────────╯']);
  });
});
