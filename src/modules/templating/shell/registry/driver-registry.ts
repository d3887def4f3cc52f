/**
 * Driver Registry
 *
 * Explicit table of backend drivers, built once at startup and passed to
 * whatever loads templates. Read-only after construction.
 */

import { err, ok, type Result } from 'neverthrow';

import { createConfigurationError, type ConfigurationError } from '../../core/errors.js';
import { handlebarsDriver } from '../drivers/handlebars.js';
import { mustacheDriver } from '../drivers/mustache.js';
import { nunjucksDriver } from '../drivers/nunjucks.js';

import type { DriverDefinition } from '../../core/ports.js';
import type { EmbedStrategy } from '../../core/types.js';

export interface DriverRegistry {
  get(type: string): Result<DriverDefinition, ConfigurationError>;
  has(type: string): boolean;
  types(): string[];
  strategyOf(type: string): EmbedStrategy | undefined;
}

export const makeDriverRegistry = (definitions: readonly DriverDefinition[]): DriverRegistry => {
  const byType = new Map<string, DriverDefinition>();
  for (const definition of definitions) {
    byType.set(definition.backend, definition);
  }

  return {
    get(type) {
      const definition = byType.get(type);
      if (definition === undefined) {
        return err(
          createConfigurationError(
            `Unknown template type '${type}' (available: ${[...byType.keys()].join(', ')})`,
            'type'
          )
        );
      }
      return ok(definition);
    },

    has(type) {
      return byType.has(type);
    },

    types() {
      return [...byType.keys()];
    },

    strategyOf(type) {
      return byType.get(type)?.strategy;
    },
  };
};

/**
 * Registry with the built-in Handlebars, Mustache and Nunjucks drivers.
 */
export const makeDefaultDriverRegistry = (): DriverRegistry =>
  makeDriverRegistry([handlebarsDriver, mustacheDriver, nunjucksDriver]);
