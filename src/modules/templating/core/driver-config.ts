/**
 * Driver Config Splitting
 *
 * A backend's config section mixes keys for the driver (`embedTagName`,
 * `templateExtension`) with options for the native engine. Driver keys are
 * pulled out and merged over the driver's defaults; everything else is
 * passed through to the engine untouched.
 */

import { err, ok, type Result } from 'neverthrow';

import { validateEmbedTagName } from './embed-syntax.js';
import { createConfigurationError, type ConfigurationError } from './errors.js';

import type { DriverDefinition } from './ports.js';
import type { DriverConfig, NativeConfig } from './types.js';

export interface SplitDriverConfig {
  driverConfig: DriverConfig;
  nativeConfig: NativeConfig;
}

const isDriverKey = (definition: DriverDefinition, key: string): key is keyof DriverConfig =>
  definition.driverConfigKeys.some((driverKey) => driverKey === key);

export const splitDriverConfig = (
  definition: DriverDefinition,
  config: Readonly<Record<string, unknown>> = {}
): Result<SplitDriverConfig, ConfigurationError> => {
  const driverConfig: DriverConfig = { ...definition.defaultDriverConfig };
  const nativeConfig: NativeConfig = {};

  for (const [key, value] of Object.entries(config)) {
    if (!isDriverKey(definition, key)) {
      nativeConfig[key] = value;
      continue;
    }
    if (typeof value !== 'string') {
      return err(
        createConfigurationError(`${definition.backend}: ${key} must be a string`, key)
      );
    }
    driverConfig[key] = value;
  }

  const markerResult = validateEmbedTagName(driverConfig.embedTagName);
  if (markerResult.isErr()) return err(markerResult.error);

  return ok({ driverConfig, nativeConfig });
};
