/**
 * Value parsing with git's config semantics.
 *
 * @module config_source/config_parsing
 */

import { ConfigPathError, ConfigValueError } from './config_source.errors';

const TRUE_WORDS = ['true', 'yes', 'on'] as const;
const FALSE_WORDS = ['false', 'no', 'off'] as const;

/**
 * Integers the way strtoimax reads them with base 0 (leading whitespace, an
 * optional sign, `0x` hex or leading-`0` octal), then an optional k/m/g unit.
 */
const INTEGER_PATTERN = /^[ \t\n\v\f\r]*([+-]?)(0[xX][0-9a-fA-F]+|0[0-7]*|[1-9][0-9]*)([kmg]?)$/i;

const INT_MAX = 2 ** 31 - 1;

const UNIT_FACTORS: Record<string, number> = { '': 1, k: 1024, m: 1024 ** 2, g: 1024 ** 3 };

/**
 * Parses an integer value, or returns undefined when it is not one or does
 * not fit a 32-bit int once scaled by its unit.
 */
function parseInteger(value: string): number | undefined {
  const match = INTEGER_PATTERN.exec(value);
  if (!match) {
    return undefined;
  }

  const [, sign = '', digits = '', unit = ''] = match;
  const factor = UNIT_FACTORS[unit.toLowerCase()];
  if (factor === undefined) {
    return undefined;
  }

  let magnitude: number;
  if (/^0[xX]/.test(digits)) {
    magnitude = Number.parseInt(digits.slice(2), 16);
  } else if (digits.length > 1 && digits.startsWith('0')) {
    magnitude = Number.parseInt(digits, 8);
  } else {
    magnitude = Number.parseInt(digits, 10);
  }

  if (magnitude * factor > INT_MAX) {
    return undefined;
  }
  return (sign === '-' ? -magnitude : magnitude) * factor;
}

/**
 * Normalizes a config key for lookup. Section and variable names are
 * case-insensitive; a subsection (the middle part of `a.b.c`) is not.
 *
 * @example
 * normalizeConfigKey('Core.FSMonitor');            // => 'core.fsmonitor'
 * normalizeConfigKey('Remote.Origin.URL');         // => 'remote.Origin.url'
 */
export function normalizeConfigKey(key: string): string {
  const first = key.indexOf('.');
  const last = key.lastIndexOf('.');

  if (first === -1) {
    return key.toLowerCase();
  }

  const section = key.slice(0, first).toLowerCase();
  const variable = key.slice(last + 1).toLowerCase();

  if (first === last) {
    return `${section}.${variable}`;
  }

  return `${section}.${key.slice(first + 1, last)}.${variable}`;
}

/**
 * Interprets a raw value as a boolean when git would.
 *
 * A value-less key (`null`) means true and an empty value means false.
 * Returns undefined for anything that is not a boolean or an integer.
 */
export function parseMaybeBool(value: string | null): boolean | undefined {
  if (value === null) {
    return true;
  }
  if (value === '') {
    return false;
  }

  const lowered = value.toLowerCase();
  if ((TRUE_WORDS as readonly string[]).includes(lowered)) {
    return true;
  }
  if ((FALSE_WORDS as readonly string[]).includes(lowered)) {
    return false;
  }

  const integer = parseInteger(value);
  return integer === undefined ? undefined : integer !== 0;
}

/**
 * Interprets a raw value as a boolean, failing on anything else.
 *
 * @throws ConfigValueError for values that are neither boolean nor integer
 */
export function parseBool(key: string, value: string | null): boolean {
  const parsed = parseMaybeBool(value);
  if (parsed === undefined) {
    throw new ConfigValueError(`bad boolean config value '${value}' for '${key}'`, key, value);
  }
  return parsed;
}

export type ExpandPathnameOptions = {
  /** Home directory of the current user */
  homedir: string;
  /** Login name of the current user, for `~name/` forms */
  username: string;
};

/**
 * Expands a leading `~/` or `~user/` in a pathname value. Only the current
 * user's home directory is known, so `~other/` cannot be expanded.
 *
 * @throws ConfigPathError when the user directory cannot be expanded
 */
export function expandPathname(value: string, options: ExpandPathnameOptions): string {
  if (!value.startsWith('~')) {
    return value;
  }

  const slash = value.indexOf('/');
  const user = slash === -1 ? value.slice(1) : value.slice(1, slash);
  const rest = slash === -1 ? '' : value.slice(slash);

  if ((user === '' || user === options.username) && options.homedir) {
    return `${options.homedir.replace(/\/+$/, '')}${rest}`;
  }

  throw new ConfigPathError(`failed to expand user dir in: '${value}'`, value);
}
