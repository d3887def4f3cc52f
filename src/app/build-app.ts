/**
 * Fastify application factory
 * Wires config, logger, driver registry and the run-mode routes together
 */

import fastifyLib, {
  type FastifyError,
  type FastifyInstance,
  type FastifyServerOptions,
} from 'fastify';

import { createChildLogger, createLogger } from '../infra/logger/index.js';
import {
  makeDefaultDriverRegistry,
  makeRunModeRoutes,
  parseTemplatingConfig,
  type DriverRegistry,
  type PostProcessHook,
  type PreProcessHook,
  type RunModeHandler,
  type TemplatingConfig,
} from '../modules/templating/index.js';

import type { AppConfig } from '../infra/config/index.js';
import type { Logger } from 'pino';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  /** Run modes the application serves, by name */
  runModes: Readonly<Record<string, RunModeHandler>>;
  /** Run mode served when the request names none */
  startMode: string;
  /** Query key naming the run mode (default `rm`) */
  modeParam?: string;
  /** Defaults to the built-in Handlebars, Mustache and Nunjucks drivers */
  registry?: DriverRegistry;
  /** Native options per backend, merged with the env-derived driver keys */
  drivers?: Readonly<Record<string, Readonly<Record<string, unknown>>>>;
  preProcessHooks?: readonly PreProcessHook[];
  postProcessHooks?: readonly PostProcessHook[];
  logger?: Logger;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
}

/**
 * Builds the templating config from the env-derived settings. A configured
 * call marker applies to every registered backend unless a backend section
 * sets its own.
 */
export const buildTemplatingConfig = (
  config: AppConfig,
  registry: DriverRegistry,
  drivers: Readonly<Record<string, Readonly<Record<string, unknown>>>> = {}
): TemplatingConfig => {
  const { embedTagName, ...templating } = config.templating;

  const sections: Record<string, Record<string, unknown>> = {};
  for (const type of new Set([...registry.types(), ...Object.keys(drivers)])) {
    sections[type] = {
      ...(embedTagName !== undefined && { embedTagName }),
      ...drivers[type],
    };
  }

  const parsed = parseTemplatingConfig({ ...templating, drivers: sections });
  if (parsed.isErr()) {
    throw new Error(parsed.error.message);
  }
  return parsed.value;
};

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps } = options;
  const { config, runModes, startMode } = deps;

  if (!Object.prototype.hasOwnProperty.call(runModes, startMode)) {
    throw new Error(`Start run mode '${startMode}' is not among the registered run modes`);
  }

  const logger =
    deps.logger ?? createLogger({ level: config.logger.level, pretty: config.logger.pretty });
  const registry = deps.registry ?? makeDefaultDriverRegistry();
  const templatingConfig = buildTemplatingConfig(config, registry, deps.drivers);

  const app = fastifyLib({
    ...fastifyOptions,
  });

  await app.register(
    makeRunModeRoutes({
      registry,
      config: templatingConfig,
      logger: createChildLogger(logger, { module: 'templating' }),
      runModes,
      startMode,
      ...(deps.modeParam !== undefined && { modeParam: deps.modeParam }),
      ...(deps.preProcessHooks !== undefined && { preProcessHooks: deps.preProcessHooks }),
      ...(deps.postProcessHooks !== undefined && { postProcessHooks: deps.postProcessHooks }),
    })
  );

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    // Handle validation errors
    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: 'Request validation failed',
      });
    }

    // Handle known HTTP errors
    if (error.statusCode != null) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
