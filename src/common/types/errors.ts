/**
 * Error types shared by the file loading repositories
 */

import type { ValueError } from '@sinclair/typebox/errors';

/**
 * Errors raised while loading a file from disk.
 */
export type FileLoadError =
  | { readonly type: 'NotFound'; readonly message: string; readonly path: string }
  | { readonly type: 'ReadError'; readonly message: string; readonly path: string }
  | { readonly type: 'ParseError'; readonly message: string; readonly path: string }
  | {
      readonly type: 'SchemaValidationError';
      readonly message: string;
      readonly path: string;
      readonly details: string[];
    };

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);

/**
 * Extracts a readable message from an unknown thrown value.
 */
export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};
