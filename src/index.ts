/**
 * Device Farm Runner
 *
 * Uploads mobile apps and test packages to AWS Device Farm, schedules runs
 * and collects run artifacts into a local job/suite/test directory tree.
 */

export * from './services/device-farm/index.js';

export { Logger, LogLevel, createLogger, createModuleLogger, logger, loggerConfigFromEnv } from './utils/logger.js';
export type { LoggerConfig } from './utils/logger.js';
