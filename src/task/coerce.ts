import type { ParamSpec } from './types.js';
import { ArgumentTypeError } from './errors.js';

const INTEGER_REGEX = /^[+-]?\d+$/;

const BOOLEAN_VALUES = new Map<string, boolean>([
  ['true', true],
  ['yes', true],
  ['1', true],
  ['false', false],
  ['no', false],
  ['0', false],
]);

/**
 * Converts a command-line string to the parameter's declared type.
 * Values that are not strings (bound dependency arguments, defaults) pass through.
 * @throws {ArgumentTypeError} when the string does not fit the type
 */
export function coerceArgument(taskName: string, param: ParamSpec, value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }

  if (param.choices) {
    if (!param.choices.includes(value)) {
      throw new ArgumentTypeError(taskName, param.name, value, `one of ${param.choices.join(', ')}`);
    }
    return value;
  }

  switch (param.type ?? 'string') {
    case 'string':
      return value;
    case 'number': {
      const parsed = Number(value);
      if (value.trim() === '' || !Number.isFinite(parsed)) {
        throw new ArgumentTypeError(taskName, param.name, value, 'a number');
      }
      return parsed;
    }
    case 'integer': {
      const parsed = Number.parseInt(value, 10);
      if (!INTEGER_REGEX.test(value) || !Number.isSafeInteger(parsed)) {
        throw new ArgumentTypeError(taskName, param.name, value, 'an integer');
      }
      return parsed;
    }
    case 'boolean': {
      const parsed = BOOLEAN_VALUES.get(value.toLowerCase());
      if (parsed === undefined) {
        throw new ArgumentTypeError(taskName, param.name, value, 'true or false');
      }
      return parsed;
    }
  }
}

/**
 * Whether the parameter's default fits its declared type: a value of that type,
 * or a string that coerces to it. Untyped parameters take any default.
 */
export function defaultFitsType(param: ParamSpec): boolean {
  const value = param.default;
  if (value === undefined || param.type === undefined) {
    return true;
  }
  switch (param.type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' ? Number.isFinite(value) : canCoerce(param, value);
    case 'integer':
      return typeof value === 'number' ? Number.isSafeInteger(value) : canCoerce(param, value);
    case 'boolean':
      return typeof value === 'boolean' || canCoerce(param, value);
  }
}

function canCoerce(param: ParamSpec, value: string | number | boolean): boolean {
  if (typeof value !== 'string') {
    return false;
  }
  try {
    coerceArgument('', param, value);
    return true;
  } catch (e) {
    if (e instanceof ArgumentTypeError) {
      return false;
    }
    throw e;
  }
}

/**
 * Type label shown in task help, empty when the parameter declares none.
 */
export function typeLabel(param: ParamSpec): string {
  if (param.choices) {
    return param.choices.join('|');
  }
  return param.type ?? '';
}
