/**
 * Template Loader
 *
 * Creates a driver for the requested backend, feeds it the split driver and
 * native config, and wraps it in the `Template` facade callers work with.
 */

import { err, ok } from 'neverthrow';

import { makeComponentHandler } from '../../core/component-handler.js';
import { splitDriverConfig } from '../../core/driver-config.js';
import { outputTemplate } from '../../core/usecases/output-template.js';

import type { TemplatingConfig } from './config.js';
import type {
  EmbeddingHost,
  Template,
  TemplateDriver,
  TemplateLoader,
} from '../../core/ports.js';
import type { DriverRegistry } from '../registry/driver-registry.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface TemplateLoaderDeps {
  registry: DriverRegistry;
  config: TemplatingConfig;
  /** Owner of the run modes; held weakly so templates never keep it alive */
  host?: EmbeddingHost;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

export const withTemplateExtension = (filename: string, extension: string): string =>
  extension === '' || filename.endsWith(extension) ? filename : `${filename}${extension}`;

interface TemplateFacadeDeps {
  driver: TemplateDriver;
  filename: string | undefined;
  source: string | undefined;
  getHost: () => EmbeddingHost | undefined;
  returnReferences: boolean;
}

const makeTemplateFacade = (deps: TemplateFacadeDeps): Template => {
  const { driver, filename, source, getHost, returnReferences } = deps;

  const template: Template = {
    backend: driver.backend,
    filename,
    source,

    param(name) {
      return driver.getParameters()[name];
    },

    paramNames() {
      return Object.keys(driver.getParameters());
    },

    getParamHash() {
      return driver.getParameters();
    },

    setParameters(params) {
      driver.setParameters(params);
    },

    clearParameters() {
      driver.clearParameters();
    },

    output(params) {
      return outputTemplate({ driver, getHost, returnReferences }, template, params);
    },

    object() {
      return driver.native();
    },
  };

  return template;
};

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const makeTemplateLoader = (deps: TemplateLoaderDeps): TemplateLoader => {
  const { registry, config, logger } = deps;
  const log = logger.child({ component: 'TemplateLoader' });
  const hostRef = deps.host !== undefined ? new WeakRef(deps.host) : undefined;
  const getHost = (): EmbeddingHost | undefined => hostRef?.deref();

  const loader: TemplateLoader = {
    load(options) {
      const type = options.type ?? config.defaultType;

      const definition = registry.get(type);
      if (definition.isErr()) return err(definition.error);

      const split = splitDriverConfig(definition.value, config.drivers[type]);
      if (split.isErr()) return err(split.error);
      const { driverConfig, nativeConfig } = split.value;

      const filename =
        options.file !== undefined && config.autoAddTemplateExtension
          ? withTemplateExtension(options.file, driverConfig.templateExtension)
          : options.file;

      const driver = definition.value.create({
        componentHandler: makeComponentHandler({
          getHost,
          backend: type,
          templates: loader,
          logger,
        }),
        logger,
      });

      const initialized = driver.initialize({
        filename,
        source: options.string,
        includePaths: config.includePaths,
        driverConfig,
        nativeConfig,
      });
      if (initialized.isErr()) {
        log.warn({ type, filename, error: initialized.error }, 'Template load failed');
        return err(initialized.error);
      }

      if (options.params !== undefined) {
        driver.setParameters(options.params);
      }

      log.debug({ type, filename, inline: options.string !== undefined }, 'Template loaded');

      return ok(
        makeTemplateFacade({
          driver,
          filename,
          source: options.string,
          getHost,
          returnReferences: config.returnReferences,
        })
      );
    },
  };

  return loader;
};
