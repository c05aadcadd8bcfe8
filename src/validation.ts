/**
 * Validation utilities using TypeBox.
 *
 * Schemas are built with `Type` and compiled once at module load.
 */

import type { Static, TSchema } from 'typebox';
import { Compile } from 'typebox/compile';
import { ValidationError } from './errors.ts';

/**
 * Compiled validator for a schema.
 */
export interface CompiledValidator<T> {
  /** Check if value is valid */
  check: (value: unknown) => value is T;
  /** Validate and throw on error */
  validate: (value: unknown) => T;
  /** Describe why a value fails, for logging */
  explain: (value: unknown) => string;
}

/**
 * TypeBox localized validation error type.
 */
interface LocalizedValidationError {
  keyword: string;
  schemaPath: string;
  instancePath: string;
  params: object;
  message: string;
}

/**
 * Format validation errors for display.
 */
function formatErrors(errors: LocalizedValidationError[]): string {
  if (errors.length === 0) {
    return 'Unknown validation error';
  }
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message}`).join('; ');
}

/**
 * Compile a TypeBox schema into a validator.
 */
export function compileSchema<T extends TSchema>(schema: T): CompiledValidator<Static<T>> {
  const compiled = Compile(schema);

  const check = (value: unknown): value is Static<T> => {
    return compiled.Check(value);
  };

  return {
    check,

    validate: (value: unknown): Static<T> => {
      if (!check(value)) {
        throw new ValidationError(formatErrors(compiled.Errors(value)));
      }
      return value;
    },

    explain: (value: unknown): string => formatErrors(compiled.Errors(value)),
  };
}
