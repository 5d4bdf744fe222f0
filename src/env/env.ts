import * as defaultFs from 'node:fs/promises';
import dotenv from 'dotenv';
import type { BoxRow } from '../output/printer.js';
import { EnvAssignmentError, EnvFileError } from './errors.js';

type FsModule = typeof defaultFs;

export type EnvEntry = BoxRow;

interface NodeError extends Error {
  code?: string;
}

function isNodeError(e: unknown): e is NodeError {
  return e instanceof Error;
}

const ENV_KEY_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Reads a dotenv file and copies its entries into `process.env`.
 * Variables that are already set keep their value.
 *
 * @returns the parsed entries, empty when the file does not exist
 * @throws {EnvFileError} when the file exists but cannot be read
 */
export async function loadEnvFile(path: string, fs: FsModule = defaultFs): Promise<EnvEntry[]> {
  let content: string;
  try {
    content = await fs.readFile(path, 'utf8');
  } catch (e) {
    if (isNodeError(e) && e.code === 'ENOENT') {
      return [];
    }
    throw new EnvFileError(path, isNodeError(e) ? e : undefined);
  }

  const entries = Object.entries(dotenv.parse(content));
  for (const [key, value] of entries) {
    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
  return entries;
}

/**
 * Parses `KEY=VALUE` pairs given with `-e`. The value is everything after the first `=`.
 * @throws {EnvAssignmentError}
 */
export function parseAssignments(assignments: readonly string[]): EnvEntry[] {
  return assignments.map((assignment) => {
    const separator = assignment.indexOf('=');
    const key = separator < 0 ? '' : assignment.slice(0, separator);
    if (!ENV_KEY_REGEX.test(key)) {
      throw new EnvAssignmentError(assignment);
    }
    return [key, assignment.slice(separator + 1)] as const;
  });
}

export function applyEnv(entries: readonly EnvEntry[]): void {
  for (const [key, value] of entries) {
    process.env[key] = value;
  }
}

/**
 * Variables of `process.env` except those that came unchanged from the dotenv file.
 */
export function remainingEnv(dotenvEntries: readonly EnvEntry[]): EnvEntry[] {
  const fromFile = new Map(dotenvEntries);
  const rest: EnvEntry[] = [];
  for (const [key, value] of Object.entries(process.env)) {
    if (value === undefined || fromFile.get(key) === value) {
      continue;
    }
    rest.push([key, value]);
  }
  return rest;
}
