export * from './types/index.js';
export * from './errors.js';
export { buildApp, classifyBodySchema, type AppDependencies } from './app.js';
export { loadConfig, parseConfig, toGatePolicy, type TariffGateConfig, type BackendConfig } from './config.js';
export { createLogger, silentLogger, type Logger } from './logger.js';
export * from './crypto/index.js';
export * from './repository/index.js';
export * from './inference/index.js';
export * from './tools/index.js';
export * from './parser/index.js';
export * from './orchestrator/index.js';
export * from './gates/index.js';
export * from './services/index.js';
export { withDeadline } from './utils/deadline.js';
