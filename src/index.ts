/**
 * 库入口
 */

export * from '@/core/di';
export { Logger, LogLevel, getLogger, createLogger, createModuleLogger } from '@/utils/Logger';
export type { LoggerConfig, LogEntry } from '@/utils/Logger';
export { LoggerFactory } from '@/utils/LoggerFactory';
export { ConfigManager, ConfigError } from '@/utils/Config';
export type { AppConfig, ConfigUpdate } from '@/utils/Config';
export { ConfigLoader } from '@/utils/ConfigLoader';
export { Application } from './main';
export type { ApplicationOptions } from './main';
