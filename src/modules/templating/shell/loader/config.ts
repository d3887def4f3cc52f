/**
 * Templating configuration schema.
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';

import { createConfigurationError, type ConfigurationError } from '../../core/errors.js';

export const TemplatingConfigSchema = Type.Object({
  /** Backend used when `load()` names none */
  defaultType: Type.String({ default: 'handlebars', minLength: 1 }),
  /** Directories searched for template files, in order */
  includePaths: Type.Array(Type.String(), { default: [] }),
  /** Append the driver's template extension to file names that lack it */
  autoAddTemplateExtension: Type.Boolean({ default: true }),
  /** Make `output()` return the mutable output holder instead of a string */
  returnReferences: Type.Boolean({ default: false }),
  /** Per-backend sections: driver keys plus native engine options */
  drivers: Type.Record(Type.String(), Type.Record(Type.String(), Type.Unknown()), { default: {} }),
});

export type TemplatingConfig = Static<typeof TemplatingConfigSchema>;

/**
 * Fills defaults and validates a templating config.
 */
export const parseTemplatingConfig = (
  input: unknown = {}
): Result<TemplatingConfig, ConfigurationError> => {
  const value = Value.Default(TemplatingConfigSchema, Value.Clone(input));

  if (!Value.Check(TemplatingConfigSchema, value)) {
    const errors = [...Value.Errors(TemplatingConfigSchema, value)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    return err(createConfigurationError(`Invalid templating configuration: ${errorMessages}`));
  }

  return ok(value);
};
