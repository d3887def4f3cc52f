/**
 * Mustache Driver
 *
 * Mustache only looks up names, so embedded calls go through pre-scan
 * emulation. Rather than scanning raw text, the driver asks Mustache for the
 * variable tags it would substitute and checks each tag's name:
 *
 *   {{{cgiapp.embed('header')}}}
 *   {{& cgiapp.embed('greet', name)}}
 */

import { Type } from '@sinclair/typebox';
import Mustache from 'mustache';
import { err, ok, type Result } from 'neverthrow';

import {
  createConfigurationError,
  createRenderError,
  type RenderError,
} from '../../core/errors.js';
import { makeParamStore } from '../../core/param-store.js';
import { DEFAULT_EMBED_TAG_NAME } from '../../core/types.js';
import { loadTemplateText, makeContainingView, parseNativeConfig } from './common.js';
import { runPrescan, type ExpressionSite } from './pre-scan.js';

import type { DriverDefinition, DriverDeps, TemplateDriver } from '../../core/ports.js';
import type { Static } from '@sinclair/typebox';

const BACKEND = 'mustache';

export const MustacheOptionsSchema = Type.Object(
  {
    /** Custom opening and closing delimiters */
    tags: Type.Optional(Type.Tuple([Type.String(), Type.String()])),
  },
  { additionalProperties: false }
);

export type MustacheOptions = Static<typeof MustacheOptionsSchema>;

type TemplateSpans = ReturnType<typeof Mustache.parse>;

const collectVariableTags = (source: string, spans: TemplateSpans, sites: ExpressionSite[]): void => {
  for (const span of spans) {
    const [type, value, start] = span;
    if (type === 'name' || type === '&') {
      const offset = source.indexOf(value, start);
      if (offset !== -1) sites.push({ start: offset, end: offset + value.length });
    } else if (span.length === 6) {
      collectVariableTags(source, span[4], sites);
    }
  }
};

/**
 * Queries Mustache for the variable tags in `source`, including those
 * nested in sections.
 */
export const findMustacheExpressions = (
  source: string,
  tags?: [string, string]
): Result<ExpressionSite[], RenderError> => {
  try {
    const sites: ExpressionSite[] = [];
    collectVariableTags(source, Mustache.parse(source, tags), sites);
    return ok(sites);
  } catch (error) {
    return err(createRenderError(BACKEND, error));
  }
};

interface LoadedTemplate {
  filename: string | undefined;
  source: string;
  marker: string;
  options: MustacheOptions;
}

export const makeMustacheDriver = (deps: DriverDeps): TemplateDriver => {
  const { componentHandler, logger } = deps;
  const log = logger.child({ component: 'MustacheDriver' });
  const params = makeParamStore();

  let loaded: LoadedTemplate | undefined;

  return {
    backend: BACKEND,
    strategy: 'prescan',

    initialize(init) {
      const options = parseNativeConfig(BACKEND, MustacheOptionsSchema, init.nativeConfig);
      if (options.isErr()) return err(options.error);

      const text = loadTemplateText(BACKEND, init);
      if (text.isErr()) return err(text.error);

      loaded = {
        ...text.value,
        marker: init.driverConfig.embedTagName,
        options: options.value,
      };
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
    },

    render() {
      if (loaded === undefined) {
        return err(createConfigurationError(`${BACKEND}: render called before initialize`));
      }
      const { source, marker, filename, options } = loaded;

      const sites = findMustacheExpressions(source, options.tags);
      if (sites.isErr()) return err(sites.error);

      const snapshot = params.snapshot();
      const scan = runPrescan({
        source,
        sites: sites.value,
        marker,
        params: snapshot,
        handler: componentHandler,
        containingTemplate: makeContainingView(BACKEND, filename, params),
      });
      if (scan.isErr()) return err(scan.error);

      try {
        const view = { ...snapshot, ...scan.value.injected };
        const output = Mustache.render(scan.value.source, view, undefined, options.tags);
        log.debug({ filename, length: output.length }, 'Rendered template');
        return ok(output);
      } catch (error) {
        log.error({ error, filename }, 'Mustache render failed');
        return err(createRenderError(BACKEND, error));
      }
    },

    native() {
      return Mustache;
    },
  };
};

export const mustacheDriver: DriverDefinition = {
  backend: BACKEND,
  strategy: 'prescan',
  driverConfigKeys: ['embedTagName', 'templateExtension'],
  defaultDriverConfig: {
    embedTagName: DEFAULT_EMBED_TAG_NAME,
    templateExtension: '.mustache',
  },
  create: makeMustacheDriver,
};
