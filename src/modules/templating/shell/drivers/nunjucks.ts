/**
 * Nunjucks Driver
 *
 * Nunjucks evaluates method calls itself, so the call marker is bound as an
 * object in the render context and the engine calls into it:
 *
 *   {{ cgiapp.embed('greet', name) }}
 *
 * Arguments arrive already evaluated by Nunjucks; `name` is looked up in the
 * same parameters the template renders with.
 */

import { Type } from '@sinclair/typebox';
import { err, ok, type Result } from 'neverthrow';
import nunjucks from 'nunjucks';

import { isValidIdentifier, parseEmbeddedCall } from '../../core/embed-syntax.js';
import {
  createConfigurationError,
  createMalformedCallError,
  createRenderError,
  type MalformedCallError,
  type TemplateError,
} from '../../core/errors.js';
import { normalizeNativeArg } from '../../core/param-resolver.js';
import { makeParamStore } from '../../core/param-store.js';
import { DEFAULT_EMBED_TAG_NAME, type EmbedMethod } from '../../core/types.js';
import {
  makeContainingView,
  parseNativeConfig,
  readTemplateFile,
  selectTemplateSource,
} from './common.js';

import type {
  ComponentHandler,
  ContainingTemplate,
  DriverDefinition,
  DriverDeps,
  TemplateDriver,
} from '../../core/ports.js';
import type { Static } from '@sinclair/typebox';
import type { Environment, Template as NunjucksTemplate, runtime } from 'nunjucks';

const BACKEND = 'nunjucks';

export const NunjucksOptionsSchema = Type.Object(
  {
    autoescape: Type.Optional(Type.Boolean()),
    throwOnUndefined: Type.Optional(Type.Boolean()),
    trimBlocks: Type.Optional(Type.Boolean()),
    lstripBlocks: Type.Optional(Type.Boolean()),
    noCache: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: false }
);

export type NunjucksOptions = Static<typeof NunjucksOptionsSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Invocable
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Object bound under the call marker. Nunjucks calls its methods with the
 * evaluated arguments; the return value is marked safe so the run mode's
 * output is inserted as-is.
 */
export type Invocable = Record<EmbedMethod, (...args: unknown[]) => runtime.SafeString>;

interface InvocableDeps {
  marker: string;
  handler: ComponentHandler;
  containingTemplate: ContainingTemplate;
  /** Receives the first failure; the render is discarded when set */
  onFailure: (error: TemplateError) => void;
}

const makeInvocable = (deps: InvocableDeps): Invocable => {
  const { marker, handler, containingTemplate, onFailure } = deps;

  const call =
    (method: EmbedMethod) =>
    (...rawArgs: unknown[]): runtime.SafeString => {
      const [runMode, ...rest] = rawArgs.map(normalizeNativeArg);

      const result: Result<string, TemplateError> =
        typeof runMode === 'string' && isValidIdentifier(runMode)
          ? handler.invoke(runMode, rest, containingTemplate)
          : err(
              createMalformedCallError(
                `${marker}.${method}(...)`,
                `invalid run mode name "${String(runMode)}"`
              )
            );

      if (result.isErr()) {
        onFailure(result.error);
        // Abort the native render; the recorded error is what gets reported
        throw new Error(result.error.message);
      }
      return new nunjucks.runtime.SafeString(result.value);
    };

  return { embed: call('embed'), dispatch: call('dispatch') };
};

// ─────────────────────────────────────────────────────────────────────────────
// Syntax Errors
// ─────────────────────────────────────────────────────────────────────────────

// `{{ expr }}` and the `-` whitespace-control forms
const VARIABLE_TAG = /\{\{-?\s*([\s\S]*?)\s*-?\}\}/dg;

const lineAt = (source: string, offset: number): number =>
  source.slice(0, offset).split('\n').length;

/** 1-based line a Nunjucks parse error points at, when it carries one */
const errorLine = (error: unknown): number | undefined =>
  error instanceof Error && 'lineno' in error && typeof error.lineno === 'number'
    ? error.lineno
    : undefined;

/**
 * Finds an embedded call that does not parse, among the variable tags on
 * `line` (or anywhere, when the line is unknown).
 */
export const findMalformedCall = (
  source: string,
  marker: string,
  line: number | undefined
): MalformedCallError | undefined => {
  for (const match of source.matchAll(VARIABLE_TAG)) {
    const span = match.indices?.[1];
    if (span === undefined) continue;
    if (line !== undefined && (line < lineAt(source, span[0]) || line > lineAt(source, span[1]))) {
      continue;
    }
    const parsed = parseEmbeddedCall(source.slice(span[0], span[1]), marker);
    if (parsed.isErr()) return parsed.error;
  }
  return undefined;
};

// ─────────────────────────────────────────────────────────────────────────────
// Driver
// ─────────────────────────────────────────────────────────────────────────────

interface LoadedTemplate {
  filename: string | undefined;
  /** Template text, kept to diagnose syntax errors */
  source: string | undefined;
  template: NunjucksTemplate;
  marker: string;
}

export const makeNunjucksDriver = (deps: DriverDeps): TemplateDriver => {
  const { componentHandler, logger } = deps;
  const log = logger.child({ component: 'NunjucksDriver' });
  const params = makeParamStore();

  let environment: Environment | undefined;
  let loaded: LoadedTemplate | undefined;

  return {
    backend: BACKEND,
    strategy: 'native',

    initialize(init) {
      const options = parseNativeConfig(BACKEND, NunjucksOptionsSchema, init.nativeConfig);
      if (options.isErr()) return err(options.error);

      const selected = selectTemplateSource(BACKEND, init);
      if (selected.isErr()) return err(selected.error);

      const { noCache, ...envOptions } = options.value;
      const loader = new nunjucks.FileSystemLoader([...init.includePaths], {
        noCache: noCache ?? false,
      });
      const env = new nunjucks.Environment(loader, envOptions);
      environment = env;

      if (selected.value.kind === 'string') {
        loaded = {
          filename: undefined,
          source: selected.value.source,
          template: new nunjucks.Template(selected.value.source, env),
          marker: init.driverConfig.embedTagName,
        };
        return ok(undefined);
      }

      const { filename } = selected.value;
      try {
        const template = env.getTemplate(filename);
        const text = readTemplateFile(BACKEND, filename, init.includePaths);
        loaded = {
          filename,
          source: text.isOk() ? text.value.source : undefined,
          template,
          marker: init.driverConfig.embedTagName,
        };
        return ok(undefined);
      } catch (error) {
        log.debug({ error, filename }, 'Template lookup failed');
        return err(
          createConfigurationError(
            `${BACKEND}: template file '${filename}' not found in [${init.includePaths.join(', ')}]`,
            'file'
          )
        );
      }
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
      const { template, marker, filename, source } = loaded;

      const failure: { error?: TemplateError } = {};
      const invocable = makeInvocable({
        marker,
        handler: componentHandler,
        containingTemplate: makeContainingView(BACKEND, filename, params),
        onFailure: (error) => {
          failure.error ??= error;
        },
      });

      let output: string;
      try {
        output = template.render({ ...params.snapshot(), [marker]: invocable });
      } catch (error) {
        if (failure.error !== undefined) return err(failure.error);
        // Nunjucks rejects a bad argument list before any call runs
        const malformed =
          source === undefined ? undefined : findMalformedCall(source, marker, errorLine(error));
        if (malformed !== undefined) return err(malformed);
        log.error({ error, filename }, 'Nunjucks render failed');
        return err(createRenderError(BACKEND, error));
      }

      if (failure.error !== undefined) return err(failure.error);
      log.debug({ filename, length: output.length }, 'Rendered template');
      return ok(output);
    },

    native() {
      return environment;
    },
  };
};

export const nunjucksDriver: DriverDefinition = {
  backend: BACKEND,
  strategy: 'native',
  driverConfigKeys: ['embedTagName', 'templateExtension'],
  defaultDriverConfig: {
    embedTagName: DEFAULT_EMBED_TAG_NAME,
    templateExtension: '.njk',
  },
  create: makeNunjucksDriver,
};
