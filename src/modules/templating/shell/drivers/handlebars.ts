/**
 * Handlebars Driver
 *
 * Handlebars cannot evaluate `marker.embed('x')` (parenthesized calls are not
 * part of its expression grammar), so this driver uses pre-scan emulation.
 * Calls are written inside ordinary mustaches:
 *
 *   {{{cgiapp.embed('header')}}}       output inserted as-is
 *   {{cgiapp.embed('greet', name)}}    output HTML-escaped by Handlebars
 */

import { Type } from '@sinclair/typebox';
import Handlebars from 'handlebars';
import { err, ok } from 'neverthrow';

import { createConfigurationError, createRenderError } from '../../core/errors.js';
import { makeParamStore } from '../../core/param-store.js';
import { DEFAULT_EMBED_TAG_NAME } from '../../core/types.js';
import {
  loadTemplateText,
  makeContainingView,
  parseNativeConfig,
} from './common.js';
import { runPrescan, type ExpressionSite } from './pre-scan.js';

import type { DriverDefinition, DriverDeps, TemplateDriver } from '../../core/ports.js';
import type { Static } from '@sinclair/typebox';

const BACKEND = 'handlebars';

/**
 * Compile options accepted as native config.
 */
export const HandlebarsOptionsSchema = Type.Object(
  {
    noEscape: Type.Optional(Type.Boolean()),
    strict: Type.Optional(Type.Boolean()),
    assumeObjects: Type.Optional(Type.Boolean()),
    preventIndent: Type.Optional(Type.Boolean()),
    ignoreStandalone: Type.Optional(Type.Boolean()),
    knownHelpersOnly: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: false }
);

export type HandlebarsOptions = Static<typeof HandlebarsOptionsSchema>;

// `{{ expr }}`, `{{{ expr }}}` and the `~` whitespace-control forms
const MUSTACHE_TAG = /\{\{\{?~?\s*([\s\S]*?)\s*~?\}?\}\}/dg;

const isEscaped = (source: string, at: number): boolean =>
  source.charAt(at - 1) === '\\' && source.charAt(at - 2) !== '\\';

/**
 * Locates the expression inside every mustache tag of the source.
 * `\{{...}}` is literal text to Handlebars and is skipped.
 */
export const findHandlebarsExpressions = (source: string): ExpressionSite[] => {
  const sites: ExpressionSite[] = [];
  for (const match of source.matchAll(MUSTACHE_TAG)) {
    if (isEscaped(source, match.index ?? 0)) continue;
    const span = match.indices?.[1];
    if (span !== undefined && span[1] > span[0]) {
      sites.push({ start: span[0], end: span[1] });
    }
  }
  return sites;
};

interface LoadedTemplate {
  filename: string | undefined;
  source: string;
  marker: string;
  options: HandlebarsOptions;
}

export const makeHandlebarsDriver = (deps: DriverDeps): TemplateDriver => {
  const { componentHandler, logger } = deps;
  const log = logger.child({ component: 'HandlebarsDriver' });
  const params = makeParamStore();
  const handlebars = Handlebars.create();

  let loaded: LoadedTemplate | undefined;
  // Last compiled (rewritten) source; reset by clearParameters
  let compiled: { source: string; template: Handlebars.TemplateDelegate } | undefined;

  return {
    backend: BACKEND,
    strategy: 'prescan',

    initialize(init) {
      const options = parseNativeConfig(BACKEND, HandlebarsOptionsSchema, init.nativeConfig);
      if (options.isErr()) return err(options.error);

      const text = loadTemplateText(BACKEND, init);
      if (text.isErr()) return err(text.error);

      loaded = {
        ...text.value,
        marker: init.driverConfig.embedTagName,
        options: options.value,
      };
      compiled = undefined;
      return ok(undefined);
    },

    setParameters(values) {
      params.set(values);
    },

    getParameters() {
      return params.snapshot();
    },

    clearParameters() {
      params.clear();
      compiled = undefined;
    },

    render() {
      if (loaded === undefined) {
        return err(createConfigurationError(`${BACKEND}: render called before initialize`));
      }

      const snapshot = params.snapshot();
      const scan = runPrescan({
        source: loaded.source,
        sites: findHandlebarsExpressions(loaded.source),
        marker: loaded.marker,
        params: snapshot,
        handler: componentHandler,
        containingTemplate: makeContainingView(BACKEND, loaded.filename, params),
        // Block helpers such as #each and #with change the lookup context
        formatReference: (key) => `@root.${key}`,
      });
      if (scan.isErr()) return err(scan.error);

      try {
        const { source, injected } = scan.value;
        const template =
          compiled?.source === source
            ? compiled.template
            : handlebars.compile(source, loaded.options);
        compiled = { source, template };

        const output = template({ ...snapshot, ...injected });
        log.debug({ filename: loaded.filename, length: output.length }, 'Rendered template');
        return ok(output);
      } catch (error) {
        log.error({ error, filename: loaded.filename }, 'Handlebars render failed');
        return err(createRenderError(BACKEND, error));
      }
    },

    native() {
      return handlebars;
    },
  };
};

export const handlebarsDriver: DriverDefinition = {
  backend: BACKEND,
  strategy: 'prescan',
  driverConfigKeys: ['embedTagName', 'templateExtension'],
  defaultDriverConfig: {
    embedTagName: DEFAULT_EMBED_TAG_NAME,
    templateExtension: '.hbs',
  },
  create: makeHandlebarsDriver,
};
