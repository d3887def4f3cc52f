/**
 * Templating Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Invalid or contradictory setup (source selection, marker name, options).
 */
export interface ConfigurationError {
  readonly type: 'ConfigurationError';
  readonly message: string;
  readonly field?: string;
}

/**
 * An embedded call could not be parsed.
 */
export interface MalformedCallError {
  readonly type: 'MalformedCallError';
  readonly message: string;
  readonly text: string;
}

/**
 * An embedded call names a run mode the host cannot resolve.
 */
export interface UnknownHandlerError {
  readonly type: 'UnknownHandlerError';
  readonly message: string;
  readonly runMode: string;
}

/**
 * The native engine (or a run mode it called into) failed.
 */
export interface RenderError {
  readonly type: 'RenderError';
  readonly message: string;
  readonly backend: string;
  readonly runMode?: string;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type TemplateError =
  | ConfigurationError
  | MalformedCallError
  | UnknownHandlerError
  | RenderError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createConfigurationError = (message: string, field?: string): ConfigurationError => ({
  type: 'ConfigurationError',
  message,
  ...(field !== undefined && { field }),
});

export const createMalformedCallError = (text: string, reason: string): MalformedCallError => ({
  type: 'MalformedCallError',
  message: `Malformed embedded call "${text}": ${reason}`,
  text,
});

export const createUnknownHandlerError = (runMode: string): UnknownHandlerError => ({
  type: 'UnknownHandlerError',
  message: `Run mode '${runMode}' is not registered`,
  runMode,
});

/**
 * Wraps an engine failure with the backend that raised it.
 */
export const createRenderError = (
  backend: string,
  cause: unknown,
  runMode?: string
): RenderError => {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return {
    type: 'RenderError',
    message:
      runMode !== undefined
        ? `[${backend}] run mode '${runMode}' failed: ${reason}`
        : `[${backend}] ${reason}`,
    backend,
    ...(runMode !== undefined && { runMode }),
    cause,
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const TEMPLATE_ERROR_HTTP_STATUS: Record<TemplateError['type'], number> = {
  ConfigurationError: 500,
  MalformedCallError: 500,
  UnknownHandlerError: 404,
  RenderError: 500,
} as const;

export const getHttpStatusForError = (error: TemplateError): number =>
  TEMPLATE_ERROR_HTTP_STATUS[error.type];
