/**
 * Templating Module - Core Types
 *
 * Type definitions shared by the embedding protocol, drivers and loader.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Default call marker (`cgiapp.embed(...)`).
 */
export const DEFAULT_EMBED_TAG_NAME = 'cgiapp';

/**
 * Identifier grammar for call markers, run mode names and param refs.
 */
export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Method names recognized after the call marker.
 * `dispatch` is an alias of `embed`.
 */
export const EMBED_METHODS = ['embed', 'dispatch'] as const;

export type EmbedMethod = (typeof EMBED_METHODS)[number];

/**
 * Hook names the host may register callbacks for.
 */
export const TEMPLATE_HOOKS = ['template_pre_process', 'template_post_process'] as const;

export type TemplateHookName = (typeof TEMPLATE_HOOKS)[number];

// ─────────────────────────────────────────────────────────────────────────────
// Parameters
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Template parameter mapping (name → value).
 */
export type ParamMap = Record<string, unknown>;

// ─────────────────────────────────────────────────────────────────────────────
// Embedded Calls
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Quoted argument, used as-is.
 */
export interface LiteralArg {
  readonly kind: 'literal';
  readonly value: string;
}

/**
 * Bare identifier argument, looked up in the containing template's params.
 */
export interface ParamRefArg {
  readonly kind: 'param';
  readonly name: string;
}

export type CallArg = LiteralArg | ParamRefArg;

/**
 * A parsed `marker.embed(...)` call. The first argument names the run mode.
 */
export interface EmbeddedCall {
  readonly marker: string;
  readonly method: EmbedMethod;
  readonly args: readonly CallArg[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Embedding Strategy
// ─────────────────────────────────────────────────────────────────────────────

/**
 * How a driver routes embedded calls to the component handler.
 *
 * - `native`: the engine evaluates `marker.embed(...)` itself against a bound object
 * - `prescan`: the driver finds calls in the source and substitutes their output
 */
export type EmbedStrategy = 'native' | 'prescan';

/**
 * Built-in backend identifiers.
 */
export const BUILTIN_BACKENDS = ['handlebars', 'mustache', 'nunjucks'] as const;

export type BuiltinBackend = (typeof BUILTIN_BACKENDS)[number];

// ─────────────────────────────────────────────────────────────────────────────
// Output
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Mutable output holder passed to post-process hooks.
 * Returned by `output()` when the loader is configured with `returnReferences`.
 */
export interface OutputRef {
  content: string;
}

export type RenderedOutput = string | OutputRef;

/**
 * Reads the text of a rendered output regardless of its shape.
 */
export const toText = (output: RenderedOutput): string =>
  typeof output === 'string' ? output : output.content;

// ─────────────────────────────────────────────────────────────────────────────
// Driver Configuration
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Configuration consumed by the driver itself (as opposed to the native engine).
 */
export interface DriverConfig {
  /** Call marker name */
  embedTagName: string;
  /** Suffix appended to file names when auto-add is enabled */
  templateExtension: string;
}

/**
 * Native engine options, passed through after driver keys are removed.
 */
export type NativeConfig = Record<string, unknown>;

/**
 * Everything a driver needs to set up its native template.
 * Exactly one of `filename` and `source` must be present.
 */
export interface DriverInit {
  filename?: string | undefined;
  source?: string | undefined;
  includePaths: readonly string[];
  driverConfig: DriverConfig;
  nativeConfig: NativeConfig;
}
