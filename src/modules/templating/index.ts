/**
 * Templating Module - Public API
 *
 * One template interface over several engines, with run modes embedded in
 * templates through `cgiapp.embed('run_mode', ...)` calls.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  BuiltinBackend,
  CallArg,
  DriverConfig,
  DriverInit,
  EmbedMethod,
  EmbedStrategy,
  EmbeddedCall,
  LiteralArg,
  NativeConfig,
  OutputRef,
  ParamMap,
  ParamRefArg,
  RenderedOutput,
  TemplateHookName,
} from './core/types.js';

export {
  // Constants
  BUILTIN_BACKENDS,
  DEFAULT_EMBED_TAG_NAME,
  EMBED_METHODS,
  IDENTIFIER_PATTERN,
  TEMPLATE_HOOKS,
  // Helpers
  toText,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  TemplateError,
  ConfigurationError,
  MalformedCallError,
  UnknownHandlerError,
  RenderError,
} from './core/errors.js';

export {
  // Error constructors
  createConfigurationError,
  createMalformedCallError,
  createUnknownHandlerError,
  createRenderError,
  // HTTP status mapping
  TEMPLATE_ERROR_HTTP_STATUS,
  getHttpStatusForError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type {
  ComponentHandler,
  ContainingTemplate,
  DriverDefinition,
  DriverDeps,
  EmbeddingHost,
  LoadTemplateOptions,
  PostProcessHook,
  PreProcessHook,
  RunModeContext,
  RunModeHandler,
  RunModeOutput,
  Template,
  TemplateDriver,
  TemplateLoader,
} from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Embedding Protocol
// ─────────────────────────────────────────────────────────────────────────────

export { parseEmbeddedCall, isValidIdentifier, validateEmbedTagName } from './core/embed-syntax.js';
export { resolveArg, resolveArgs, normalizeNativeArg } from './core/param-resolver.js';
export { makeComponentHandler, invokeEmbeddedCall } from './core/component-handler.js';
export { makeParamStore, type ParamStore } from './core/param-store.js';
export { splitDriverConfig, type SplitDriverConfig } from './core/driver-config.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export { outputTemplate, type OutputTemplateDeps } from './core/usecases/output-template.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Drivers
// ─────────────────────────────────────────────────────────────────────────────

export { handlebarsDriver, makeHandlebarsDriver } from './shell/drivers/handlebars.js';
export { mustacheDriver, makeMustacheDriver } from './shell/drivers/mustache.js';
export { nunjucksDriver, makeNunjucksDriver, type Invocable } from './shell/drivers/nunjucks.js';
export { runPrescan, type ExpressionSite } from './shell/drivers/pre-scan.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Registry, Host and Loader
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeDriverRegistry,
  makeDefaultDriverRegistry,
  type DriverRegistry,
} from './shell/registry/driver-registry.js';

export {
  makeRunModeHost,
  type RunModeHost,
  type RunModeHostOptions,
} from './shell/host/run-mode-host.js';

export {
  makeTemplateLoader,
  withTemplateExtension,
  type TemplateLoaderDeps,
} from './shell/loader/template-loader.js';

export {
  TemplatingConfigSchema,
  parseTemplatingConfig,
  type TemplatingConfig,
} from './shell/loader/config.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - REST
// ─────────────────────────────────────────────────────────────────────────────

export { makeRunModeRoutes, type MakeRunModeRoutesDeps } from './shell/rest/routes.js';
