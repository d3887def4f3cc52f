/**
 * Templating Module - Ports (Interfaces)
 *
 * Contracts between the embedding core, the per-backend drivers and the host
 * application that owns the run modes.
 */

import type { ConfigurationError, TemplateError } from './errors.js';
import type {
  DriverConfig,
  DriverInit,
  EmbedStrategy,
  OutputRef,
  ParamMap,
  RenderedOutput,
} from './types.js';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Template Views
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Read-only view of the template whose embedded call invoked a run mode.
 */
export interface ContainingTemplate {
  readonly backend: string;
  readonly filename: string | undefined;
  param(name: string): unknown;
  paramNames(): string[];
  getParamHash(): Readonly<ParamMap>;
}

/**
 * A loaded template (one load/render cycle).
 */
export interface Template extends ContainingTemplate {
  readonly source: string | undefined;
  setParameters(params: ParamMap): void;
  clearParameters(): void;
  /**
   * Renders the template, running the host's pre/post process hooks.
   * Params given here are merged before rendering.
   */
  output(params?: ParamMap): Result<RenderedOutput, TemplateError>;
  /** The underlying native engine object */
  object(): unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Loader
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Options for loading a single template.
 */
export interface LoadTemplateOptions {
  /** Backend id; defaults to the configured default type */
  type?: string;
  /** Template file name, searched on the include paths */
  file?: string;
  /** Inline template source */
  string?: string;
  /** Initial parameters */
  params?: ParamMap;
}

export interface TemplateLoader {
  load(options: LoadTemplateOptions): Result<Template, ConfigurationError>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Host (run mode dispatch table)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * What a run mode receives when it is invoked.
 */
export interface RunModeContext {
  /** Template whose embedded call invoked the run mode; absent for top-level dispatch */
  readonly containingTemplate: ContainingTemplate | undefined;
  /** Loader bound to the same host, for nested renders */
  readonly templates: TemplateLoader;
}

/**
 * Value a run mode may return. Results let nested renders propagate their errors.
 */
export type RunModeOutput = RenderedOutput | Result<RenderedOutput, TemplateError>;

export type RunModeHandler = (context: RunModeContext, ...args: unknown[]) => RunModeOutput;

export type PreProcessHook = (template: Template) => void;

export type PostProcessHook = (template: Template, output: OutputRef) => void;

/**
 * The application that owns run modes and template hooks.
 */
export interface EmbeddingHost {
  resolveRunMode(name: string): RunModeHandler | undefined;
  callHook(name: 'template_pre_process', template: Template): void;
  callHook(name: 'template_post_process', template: Template, output: OutputRef): void;
}

// ─────────────────────────────────────────────────────────────────────────────
// Component Handler
// ─────────────────────────────────────────────────────────────────────────────

export interface ComponentHandler {
  /**
   * Runs the named run mode and returns its output as the substitution text.
   * `containingTemplate` is undefined for top-level dispatch.
   */
  invoke(
    runMode: string,
    args: readonly unknown[],
    containingTemplate: ContainingTemplate | undefined
  ): Result<string, TemplateError>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Drivers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Uniform contract every backend implements.
 */
export interface TemplateDriver {
  readonly backend: string;
  readonly strategy: EmbedStrategy;
  initialize(init: DriverInit): Result<void, ConfigurationError>;
  setParameters(params: ParamMap): void;
  getParameters(): Readonly<ParamMap>;
  clearParameters(): void;
  render(): Result<string, TemplateError>;
  native(): unknown;
}

export interface DriverDeps {
  componentHandler: ComponentHandler;
  logger: Logger;
}

/**
 * Static description of a backend, registered once at startup.
 */
export interface DriverDefinition {
  readonly backend: string;
  readonly strategy: EmbedStrategy;
  /** Config keys consumed by the driver; all others go to the native engine */
  readonly driverConfigKeys: readonly (keyof DriverConfig)[];
  readonly defaultDriverConfig: DriverConfig;
  create(deps: DriverDeps): TemplateDriver;
}
