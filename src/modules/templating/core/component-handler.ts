/**
 * Component Handler
 *
 * Runs the run mode named by an embedded call and hands back its output as
 * the text to splice in at the call site. The output is inserted verbatim;
 * escaping is left to the run mode or the native engine.
 */

import { err, ok, type Result } from 'neverthrow';

import { isValidIdentifier } from './embed-syntax.js';
import {
  createMalformedCallError,
  createRenderError,
  createUnknownHandlerError,
  type TemplateError,
} from './errors.js';
import { resolveArgs } from './param-resolver.js';
import { toText, type EmbeddedCall, type ParamMap } from './types.js';

import type {
  ComponentHandler,
  ContainingTemplate,
  EmbeddingHost,
  RunModeOutput,
  TemplateLoader,
} from './ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ComponentHandlerDeps {
  /** Returns the host, or undefined once it has been released */
  getHost: () => EmbeddingHost | undefined;
  /** Backend of the templates this handler serves, for error reporting */
  backend: string;
  /** Loader passed on to run modes for nested renders */
  templates: TemplateLoader;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const toSubstitution = (output: RunModeOutput): Result<string, TemplateError> => {
  if (typeof output === 'string') return ok(output);
  if ('content' in output) return ok(output.content);
  return output.map(toText);
};

const describeCall = (call: EmbeddedCall): string => `${call.marker}.${call.method}(...)`;

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const makeComponentHandler = (deps: ComponentHandlerDeps): ComponentHandler => {
  const { getHost, backend, templates, logger } = deps;
  const log = logger.child({ component: 'ComponentHandler', backend });

  return {
    invoke(runMode, args, containingTemplate) {
      const handler = getHost()?.resolveRunMode(runMode);
      if (handler === undefined) {
        log.debug({ runMode }, 'Embedded run mode not found');
        return err(createUnknownHandlerError(runMode));
      }

      log.debug({ runMode, argCount: args.length }, 'Invoking embedded run mode');

      let output: RunModeOutput;
      try {
        output = handler({ containingTemplate, templates }, ...args);
      } catch (error) {
        log.error({ error, runMode }, 'Embedded run mode threw');
        return err(createRenderError(backend, error, runMode));
      }

      return toSubstitution(output);
    },
  };
};

/**
 * Resolves a parsed call's arguments against `params` and invokes it.
 * The first resolved argument is the run mode name; the rest are passed on.
 */
export const invokeEmbeddedCall = (
  handler: ComponentHandler,
  call: EmbeddedCall,
  params: Readonly<ParamMap>,
  containingTemplate: ContainingTemplate
): Result<string, TemplateError> => {
  const [runMode, ...rest] = resolveArgs(call.args, params);

  if (typeof runMode !== 'string' || !isValidIdentifier(runMode)) {
    return err(
      createMalformedCallError(describeCall(call), `invalid run mode name "${String(runMode)}"`)
    );
  }

  return handler.invoke(runMode, rest, containingTemplate);
};
