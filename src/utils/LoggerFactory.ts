/**
 * Logger 工厂
 * 根据配置段创建 logger
 */

import type { LoggingSection } from './Config';
import { Logger, createModuleLogger, parseLogLevel, type LoggerConfig } from './Logger';

export class LoggerFactory {
  constructor(private readonly defaults: Partial<LoggerConfig> = {}) {}

  createLogger(config?: Partial<LoggerConfig>): Logger {
    return new Logger({ ...this.defaults, ...config });
  }

  createModuleLogger(moduleName: string, config?: Partial<LoggerConfig>): Logger {
    return createModuleLogger(moduleName, { ...this.defaults, ...config });
  }

  /**
   * 将 [logging] 配置段转换为 LoggerConfig
   */
  static fromSection(section: LoggingSection): LoggerFactory {
    return new LoggerFactory({
      level: parseLogLevel(section.level),
      console: section.console,
      file: section.file,
      colors: section.colors,
      maxFileSize: section.max_file_size,
      maxFiles: section.max_files,
      logDir: section.log_dir,
    });
  }
}
