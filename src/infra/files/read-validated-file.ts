import fs from 'node:fs/promises';

import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import { formatSchemaErrors, getErrorMessage, type FileLoadError } from '@/common/types/errors.js';

import type { Static, TSchema } from '@sinclair/typebox';
import type { TypeCheck } from '@sinclair/typebox/compiler';

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

/**
 * Reads a YAML or JSON file and validates it against a compiled TypeBox schema.
 *
 * JSON is parsed by the YAML parser as well (JSON is a YAML subset).
 */
export const readValidatedFile = async <T extends TSchema>(
  filePath: string,
  validator: TypeCheck<T>
): Promise<Result<Static<T>, FileLoadError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return err({
        type: 'NotFound',
        message: `File not found at ${filePath}`,
        path: filePath,
      });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read file at ${filePath}: ${getErrorMessage(error)}`,
      path: filePath,
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse ${filePath}: ${getErrorMessage(error)}`,
      path: filePath,
    });
  }

  if (!validator.Check(parsed)) {
    return err({
      type: 'SchemaValidationError',
      message: `Schema validation failed for ${filePath}`,
      path: filePath,
      details: formatSchemaErrors(validator.Errors(parsed)),
    });
  }

  return ok(parsed);
};
