export * from './features/gpu';
export { config, loadConfig } from './lib/config';
export type { AppConfig, LogLevel } from './lib/config';
export { createLogger, setLogLevel, getLogLevel } from './lib/logger';
export type { Logger } from './lib/logger';
