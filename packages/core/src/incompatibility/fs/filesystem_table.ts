/**
 * Filesystem type table
 *
 * Loads filesystem_types.yaml and validates it against
 * filesystem_types.schema.json. Compiled validators and loaded tables are
 * cached per path, since the oracle may be created once per repository.
 *
 * @module incompatibility/fs/filesystem_table
 */

import Ajv from 'ajv';
import type { ValidateFunction } from 'ajv';
import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import filesystemTableSchema from './filesystem_types.schema.json';
import { FilesystemTableError } from '../incompatibility.errors';

export type FilesystemType = {
  name: string;
  /** f_type as reported by statfs */
  magic: number;
  remote: boolean;
  sockets: boolean;
};

export type FilesystemTable = Partial<Record<NodeJS.Platform, FilesystemType[]>>;

export const DEFAULT_FILESYSTEM_TABLE_PATH = path.join(__dirname, 'filesystem_types.yaml');

let validator: ValidateFunction<FilesystemTable> | null = null;
const tableCache = new Map<string, FilesystemTable>();

function getValidator(): ValidateFunction<FilesystemTable> {
  if (!validator) {
    const ajv = new Ajv({ allErrors: true });
    validator = ajv.compile<FilesystemTable>(filesystemTableSchema);
  }
  return validator;
}

/**
 * Validates a parsed table.
 *
 * @throws FilesystemTableError listing every schema violation
 */
export function validateFilesystemTable(data: unknown, tablePath: string): FilesystemTable {
  const validate = getValidator();
  if (validate(data)) {
    return data;
  }

  const details = (validate.errors ?? []).map(
    error => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`
  );
  throw new FilesystemTableError(
    `Invalid filesystem table ${tablePath}: ${details.join('; ')}`,
    tablePath,
    details
  );
}

/**
 * Reads and validates a filesystem table.
 *
 * @throws FilesystemTableError if the file cannot be read, parsed or validated
 */
export function loadFilesystemTable(tablePath: string = DEFAULT_FILESYSTEM_TABLE_PATH): FilesystemTable {
  const cached = tableCache.get(tablePath);
  if (cached) {
    return cached;
  }

  let data: unknown;
  try {
    data = yaml.load(fs.readFileSync(tablePath, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new FilesystemTableError(`Cannot load filesystem table ${tablePath}: ${message}`, tablePath);
  }

  const table = validateFilesystemTable(data, tablePath);
  tableCache.set(tablePath, table);
  return table;
}

/**
 * Finds the entry for a statfs type. Magic numbers are compared as unsigned
 * 32-bit values, since some platforms report f_type sign-extended.
 */
export function findFilesystemType(
  entries: readonly FilesystemType[],
  statfsType: number
): FilesystemType | undefined {
  const wanted = statfsType >>> 0;
  return entries.find(entry => entry.magic >>> 0 === wanted);
}
