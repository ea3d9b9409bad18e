/**
 * Static JSON document reader
 *
 * Reads a JSON file once, parses it and validates it against a compiled
 * TypeBox schema. Used for the lookup documents loaded at startup.
 */

import fs from 'node:fs/promises';

import { err, ok, type Result } from 'neverthrow';

import type { Static, TSchema } from '@sinclair/typebox';
import type { TypeCheck } from '@sinclair/typebox/compiler';
import type { ValueError } from '@sinclair/typebox/errors';

export type DocumentError =
  | { type: 'NotFound'; message: string }
  | { type: 'ReadError'; message: string }
  | { type: 'ParseError'; message: string }
  | { type: 'SchemaValidationError'; message: string; details: string[] };

/** Upper bound on schema errors reported for a single document */
const MAX_REPORTED_SCHEMA_ERRORS = 20;

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] => {
  const details: string[] = [];
  for (const error of errors) {
    if (details.length >= MAX_REPORTED_SCHEMA_ERRORS) {
      break;
    }
    details.push(`${error.path}: ${error.message}`);
  }
  return details;
};

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Reads and validates a JSON document.
 *
 * @param filePath - Location of the document on disk
 * @param validator - Compiled schema the parsed value must satisfy
 * @param label - Human readable document name used in error messages
 */
export const readJsonDocument = async <T extends TSchema>(
  filePath: string,
  validator: TypeCheck<T>,
  label: string
): Promise<Result<Static<T>, DocumentError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      return err({
        type: 'NotFound',
        message: `${label} not found at ${filePath}`,
      });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read ${label} at ${filePath}: ${describeError(error)}`,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse ${label} at ${filePath}: ${describeError(error)}`,
    });
  }

  if (!validator.Check(parsed)) {
    return err({
      type: 'SchemaValidationError',
      message: `Schema validation failed for ${label} at ${filePath}`,
      details: formatSchemaErrors(validator.Errors(parsed)),
    });
  }

  return ok(parsed);
};
