/**
 * Helpers shared by the built-in drivers.
 */

import fs from 'node:fs';
import path from 'node:path';

import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';

import { createConfigurationError, type ConfigurationError } from '../../core/errors.js';

import type { ParamStore } from '../../core/param-store.js';
import type { ContainingTemplate } from '../../core/ports.js';
import type { DriverInit, NativeConfig } from '../../core/types.js';
import type { Static, TSchema } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Template Source
// ─────────────────────────────────────────────────────────────────────────────

export type TemplateSource =
  | { kind: 'file'; filename: string }
  | { kind: 'string'; source: string };

/**
 * Enforces that exactly one of filename and inline source was given.
 */
export const selectTemplateSource = (
  backend: string,
  init: DriverInit
): Result<TemplateSource, ConfigurationError> => {
  const { filename, source } = init;

  if (filename !== undefined && source !== undefined) {
    return err(
      createConfigurationError(`${backend}: specify either a file or a string, not both`, 'source')
    );
  }
  if (filename !== undefined && filename !== '') {
    return ok({ kind: 'file', filename });
  }
  if (source !== undefined) {
    return ok({ kind: 'string', source });
  }
  return err(createConfigurationError(`${backend}: file or string must be specified`, 'source'));
};

/**
 * Finds `filename` on the include paths (then relative to the working
 * directory) and reads it.
 */
export const readTemplateFile = (
  backend: string,
  filename: string,
  includePaths: readonly string[]
): Result<{ path: string; source: string }, ConfigurationError> => {
  const candidates = path.isAbsolute(filename)
    ? [filename]
    : [...includePaths.map((dir) => path.join(dir, filename)), path.resolve(filename)];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return ok({ path: candidate, source: fs.readFileSync(candidate, 'utf8') });
    }
  }

  return err(
    createConfigurationError(
      `${backend}: template file '${filename}' not found in [${includePaths.join(', ')}]`,
      'file'
    )
  );
};

/**
 * Loads the template text for drivers that hand a string to their engine.
 */
export const loadTemplateText = (
  backend: string,
  init: DriverInit
): Result<{ filename: string | undefined; source: string }, ConfigurationError> =>
  selectTemplateSource(backend, init).andThen(
    (selected): Result<{ filename: string | undefined; source: string }, ConfigurationError> => {
      if (selected.kind === 'string') {
        return ok({ filename: undefined, source: selected.source });
      }
      return readTemplateFile(backend, selected.filename, init.includePaths).map((file) => ({
        filename: selected.filename,
        source: file.source,
      }));
    }
  );

// ─────────────────────────────────────────────────────────────────────────────
// Native Options
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Validates the native engine options against the backend's schema.
 */
export const parseNativeConfig = <T extends TSchema>(
  backend: string,
  schema: T,
  nativeConfig: NativeConfig
): Result<Static<T>, ConfigurationError> => {
  if (Value.Check(schema, nativeConfig)) {
    return ok(nativeConfig);
  }

  const messages = [...Value.Errors(schema, nativeConfig)].map(
    (e) => `${e.path === '' ? '/' : e.path}: ${e.message}`
  );
  return err(
    createConfigurationError(`${backend}: invalid native options: ${messages.join(', ')}`)
  );
};

// ─────────────────────────────────────────────────────────────────────────────
// Containing Template View
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Read-only view over a driver's parameters, handed to embedded run modes.
 */
export const makeContainingView = (
  backend: string,
  filename: string | undefined,
  params: ParamStore
): ContainingTemplate => ({
  backend,
  filename,
  param: (name) => params.get(name),
  paramNames: () => params.names(),
  getParamHash: () => params.snapshot(),
});
