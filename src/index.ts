/**
 * polytemplate - Public API
 */

export * from './modules/templating/index.js';

export { buildApp, createApp, buildTemplatingConfig } from './app/build-app.js';
export type { AppDeps, AppOptions } from './app/build-app.js';

export { parseEnv, createConfig, type AppConfig, type Env } from './infra/config/index.js';
export { createLogger, createChildLogger, type LoggerConfig, type LogLevel } from './infra/logger/index.js';
