/**
 * Run Mode REST Routes
 *
 * Serves run modes over HTTP, the way a request-dispatching application
 * would: the query names the run mode, the run mode renders templates, and
 * templates embed further run modes.
 * - GET /?rm=<run mode>: Render a run mode as text/html
 */

import { ErrorResponseSchema, RunModeQuerySchema, type RunModeQuery } from './schemas.js';
import { makeComponentHandler } from '../../core/component-handler.js';
import { getHttpStatusForError } from '../../core/errors.js';
import { makeRunModeHost } from '../host/run-mode-host.js';
import { makeTemplateLoader } from '../loader/template-loader.js';

import type { PostProcessHook, PreProcessHook, RunModeHandler } from '../../core/ports.js';
import type { TemplatingConfig } from '../loader/config.js';
import type { DriverRegistry } from '../registry/driver-registry.js';
import type { FastifyPluginAsync } from 'fastify';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeRunModeRoutesDeps {
  registry: DriverRegistry;
  config: TemplatingConfig;
  logger: Logger;
  runModes: Readonly<Record<string, RunModeHandler>>;
  /** Query key naming the run mode */
  modeParam?: string;
  /** Run mode used when the query names none */
  startMode: string;
  preProcessHooks?: readonly PreProcessHook[];
  postProcessHooks?: readonly PostProcessHook[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates the run-mode route. Each request gets its own host and loader,
 * so no template or parameter state is shared between requests.
 */
export const makeRunModeRoutes = (deps: MakeRunModeRoutesDeps): FastifyPluginAsync => {
  const {
    registry,
    config,
    logger,
    runModes,
    modeParam = 'rm',
    startMode,
    preProcessHooks = [],
    postProcessHooks = [],
  } = deps;

  return async (fastify) => {
    fastify.get<{ Querystring: RunModeQuery }>(
      '/',
      {
        schema: {
          querystring: RunModeQuerySchema,
          response: {
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const runMode = request.query[modeParam] ?? startMode;
        const log = logger.child({ reqId: request.id, runMode });

        const host = makeRunModeHost({ runModes });
        for (const hook of preProcessHooks) host.addPreProcessHook(hook);
        for (const hook of postProcessHooks) host.addPostProcessHook(hook);

        const templates = makeTemplateLoader({ registry, config, host, logger: log });
        const handler = makeComponentHandler({
          getHost: () => host,
          backend: config.defaultType,
          templates,
          logger: log,
        });

        const result = handler.invoke(runMode, [request.query], undefined);

        if (result.isErr()) {
          const status = getHttpStatusForError(result.error);
          log.warn({ error: result.error }, 'Run mode request failed');
          return reply.status(status).send({
            ok: false,
            error: result.error.type,
            message: result.error.message,
          });
        }

        return reply.type('text/html; charset=utf-8').send(result.value);
      }
    );
  };
};
