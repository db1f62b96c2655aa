import { existsSync, mkdirSync, appendFileSync, readdirSync, readFileSync, statSync, unlinkSync } from 'fs';
import { join } from 'path';
import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';

/**
 * 日志级别枚举
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
};

/**
 * 日志条目接口
 */
export interface LogEntry {
  timestamp: string; // ISO 8601格式时间戳
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logger配置接口
 */
export interface LoggerConfig {
  level: LogLevel; // 最小日志级别
  console: boolean; // 是否输出到控制台
  file: boolean; // 是否输出到文件
  colors?: boolean; // 控制台彩色输出（默认true）
  maxFileSize?: number; // 单个文件最大字节数（默认10MB）
  maxFiles?: number; // 保留的文件数量（默认5）
  logDir?: string; // 日志目录（默认logs）
}

const LoggerConfigSchema = z.object({
  level: z.nativeEnum(LogLevel).default(LogLevel.INFO),
  console: z.boolean().default(true),
  file: z.boolean().default(false),
  colors: z.boolean().default(true),
  maxFileSize: z
    .number()
    .positive()
    .default(10 * 1024 * 1024),
  maxFiles: z.number().positive().default(5),
  logDir: z.string().default('logs'),
});

type ResolvedLoggerConfig = z.infer<typeof LoggerConfigSchema>;

/**
 * config.toml 中 [logging] 段的最小结构，仅用于 Logger 自举
 */
const LoggingFileSchema = z.object({
  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      console: z.boolean().default(true),
      file: z.boolean().default(false),
      colors: z.boolean().default(true),
      max_file_size: z.number().positive().optional(),
      max_files: z.number().positive().optional(),
      log_dir: z.string().optional(),
    })
    .optional(),
});

/**
 * 日志轮转信息
 */
interface LogRotationInfo {
  currentDate: string;
  fileIndex: number;
  currentSize: number;
}

/**
 * 解析日志级别字符串
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.toLowerCase()) {
    case 'error':
      return LogLevel.ERROR;
    case 'warn':
      return LogLevel.WARN;
    case 'info':
      return LogLevel.INFO;
    case 'debug':
      return LogLevel.DEBUG;
    default:
      console.warn(`未知的日志级别: ${level}，使用默认级别 INFO`);
      return LogLevel.INFO;
  }
}

/**
 * 结构化日志器
 *
 * 控制台输出带颜色的单行文本，文件输出为按日期和大小轮转的 JSONL
 */
export class Logger {
  private config: ResolvedLoggerConfig;
  private rotationInfo: LogRotationInfo;
  private currentFilePath: string;

  /**
   * @param config 日志配置；为空时从 ./config.toml 的 [logging] 段读取
   * @param module 模块名称，写入每条日志的 context.module
   */
  constructor(
    config: Partial<LoggerConfig> = {},
    private readonly module?: string,
  ) {
    const source = Object.keys(config).length === 0 ? Logger.getConfigFromApp() : config;
    this.config = LoggerConfigSchema.parse(source);

    this.rotationInfo = {
      currentDate: this.getCurrentDate(),
      fileIndex: 0,
      currentSize: 0,
    };
    this.currentFilePath = this.getLogFilePath();

    if (this.config.file) {
      this.ensureLogDirectory();
      this.initializeCurrentFile();
    }
  }

  error(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  /**
   * 通用日志记录方法
   */
  log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (level > this.config.level) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: this.module ? { ...context, module: this.module } : context,
      error: error
        ? {
            name: error.name,
            message: error.message,
            stack: error.stack,
          }
        : undefined,
    };

    if (this.config.console) {
      this.writeToConsole(entry);
    }

    if (this.config.file) {
      this.writeToFile(entry);
    }
  }

  /**
   * 创建子日志器（模块专用）
   */
  child(module: string): Logger {
    return new Logger(this.config, module);
  }

  /**
   * 更新配置
   */
  updateConfig(config: Partial<LoggerConfig>): void {
    this.config = LoggerConfigSchema.parse({ ...this.config, ...config });
    if (this.config.file) {
      this.ensureLogDirectory();
    }
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  /**
   * 从 ./config.toml 读取日志配置，文件不存在或无法解析时返回默认配置
   */
  private static getConfigFromApp(): Partial<LoggerConfig> {
    const configPath = './config.toml';
    if (existsSync(configPath)) {
      try {
        const parsed = LoggingFileSchema.safeParse(parseToml(readFileSync(configPath, 'utf8')));
        const logging = parsed.success ? parsed.data.logging : undefined;
        if (logging) {
          return {
            level: parseLogLevel(logging.level),
            console: logging.console,
            file: logging.file,
            colors: logging.colors,
            maxFileSize: logging.max_file_size,
            maxFiles: logging.max_files,
            logDir: logging.log_dir,
          };
        }
      } catch (error) {
        // Logger 尚未可用，只能直接写控制台
        console.warn(`读取日志配置失败，使用默认配置: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    return {
      level: LogLevel.INFO,
      console: true,
      file: false,
    };
  }

  /**
   * 将日期格式化为 "YYYY-MM-DD HH:mm:ss" 字符串
   */
  private formatTimestamp(date: Date): string {
    const pad = (n: number) => n.toString().padStart(2, '0');
    return (
      `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
      `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
    );
  }

  private getColor(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return '\x1b[90m'; // 灰色
      case LogLevel.INFO:
        return '\x1b[32m'; // 绿色
      case LogLevel.WARN:
        return '\x1b[33m'; // 黄色
      case LogLevel.ERROR:
        return '\x1b[31m'; // 红色
    }
  }

  /**
   * 格式化控制台输出行
   */
  formatConsoleLine(entry: LogEntry): string {
    const colors = this.config.colors;
    const context: Record<string, unknown> = entry.context ?? {};
    const { module: moduleName, ...rest } = context;
    const contextStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';

    const timestamp = `[${this.formatTimestamp(new Date(entry.timestamp))}]`;
    const levelPart = `[${LOG_LEVEL_NAMES[entry.level]}]`;
    const parts = [
      colors ? `\x1b[90m${timestamp}\x1b[0m` : timestamp,
      colors ? `${this.getColor(entry.level)}${levelPart}\x1b[0m` : levelPart,
    ];
    if (moduleName !== undefined) {
      const modulePart = `[${String(moduleName)}]`;
      parts.push(colors ? `\x1b[34m${modulePart}\x1b[0m` : modulePart);
    }

    return `${parts.join(' ')} ${entry.message}${contextStr}`;
  }

  private writeToConsole(entry: LogEntry): void {
    const line = this.formatConsoleLine(entry);

    switch (entry.level) {
      case LogLevel.ERROR:
        console.error(line);
        if (entry.error?.stack) {
          console.error(entry.error.stack);
        }
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      case LogLevel.INFO:
        console.log(line);
        break;
      case LogLevel.DEBUG:
        console.debug(line);
        break;
    }
  }

  /**
   * 以 JSONL 格式追加到当前日志文件
   */
  private writeToFile(entry: LogEntry): void {
    try {
      const jsonLine = JSON.stringify(entry) + '\n';
      const lineSize = Buffer.byteLength(jsonLine, 'utf8');

      if (this.getCurrentDate() !== this.rotationInfo.currentDate || this.rotationInfo.currentSize + lineSize > this.config.maxFileSize) {
        this.rotateLog();
      }

      appendFileSync(this.currentFilePath, jsonLine, 'utf8');
      this.rotationInfo.currentSize += lineSize;
    } catch (error) {
      // 文件写入失败时降级到控制台
      console.error('Failed to write log to file:', error);
      console.error('Log entry:', entry);
    }
  }

  private rotateLog(): void {
    const currentDate = this.getCurrentDate();

    if (currentDate !== this.rotationInfo.currentDate) {
      this.rotationInfo = { currentDate, fileIndex: 0, currentSize: 0 };
      this.currentFilePath = this.getLogFilePath();
      return;
    }

    this.rotationInfo.fileIndex++;
    this.rotationInfo.currentSize = 0;
    this.currentFilePath = this.getLogFilePath();

    this.cleanupOldFiles();
  }

  private getCurrentDate(): string {
    return new Date().toISOString().slice(0, 10); // YYYY-MM-DD
  }

  private getLogFilePath(): string {
    const { fileIndex, currentDate } = this.rotationInfo;
    const fileName = fileIndex > 0 ? `app-${currentDate}-${fileIndex}.jsonl` : `app-${currentDate}.jsonl`;
    return join(this.config.logDir, fileName);
  }

  private ensureLogDirectory(): void {
    try {
      if (!existsSync(this.config.logDir)) {
        mkdirSync(this.config.logDir, { recursive: true });
      }
    } catch (error) {
      console.error('Failed to create log directory:', error);
    }
  }

  /**
   * 续写已存在的当日日志文件
   */
  private initializeCurrentFile(): void {
    if (existsSync(this.currentFilePath)) {
      this.rotationInfo.currentSize = statSync(this.currentFilePath).size;
    }
  }

  /**
   * 保留最新的 maxFiles 个日志文件
   */
  private cleanupOldFiles(): void {
    const { maxFiles, logDir } = this.config;

    try {
      const files = readdirSync(logDir)
        .filter(file => file.startsWith('app-') && file.endsWith('.jsonl'))
        .map(file => ({
          path: join(logDir, file),
          mtime: statSync(join(logDir, file)).mtimeMs,
        }))
        .sort((a, b) => b.mtime - a.mtime);

      for (const file of files.slice(maxFiles)) {
        unlinkSync(file.path);
      }
    } catch (error) {
      console.error('Failed to cleanup old log files:', error);
    }
  }
}

/**
 * 全局日志管理器
 *
 * 根日志器惰性创建，模块日志器按名称缓存
 */
export class GlobalLoggerManager {
  private static instance: GlobalLoggerManager | undefined;
  private rootLogger: Logger | undefined;
  private childLoggers = new Map<string, Logger>();

  private constructor() {}

  static getInstance(): GlobalLoggerManager {
    if (!GlobalLoggerManager.instance) {
      GlobalLoggerManager.instance = new GlobalLoggerManager();
    }
    return GlobalLoggerManager.instance;
  }

  getLogger(moduleName: string): Logger {
    let childLogger = this.childLoggers.get(moduleName);
    if (!childLogger) {
      childLogger = this.getRootLogger().child(moduleName);
      this.childLoggers.set(moduleName, childLogger);
    }
    return childLogger;
  }

  getRootLogger(): Logger {
    if (!this.rootLogger) {
      this.rootLogger = new Logger();
    }
    return this.rootLogger;
  }

  /**
   * 替换根日志器（例如配置加载完成后），已缓存的模块日志器会被丢弃
   */
  setRootLogger(logger: Logger): void {
    this.rootLogger = logger;
    this.childLoggers.clear();
  }
}

/**
 * 获取模块日志器的便捷函数
 */
export function getLogger(moduleName: string): Logger {
  return GlobalLoggerManager.getInstance().getLogger(moduleName);
}

export function createLogger(config?: Partial<LoggerConfig>): Logger {
  return new Logger(config);
}

export function createModuleLogger(moduleName: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger(config, moduleName);
}
