import { existsSync, copyFileSync, readFileSync, writeFileSync } from 'fs';
import { parse as parseToml, stringify as stringifyToml } from 'smol-toml';
import { z } from 'zod';
import { EventEmitter } from 'events';
import { getLogger, type Logger } from './Logger';

const AppSectionSchema = z.object({
  name: z.string().default('service-registry'),
  version: z.string().default('0.1.0'),
  debug: z.boolean().default(false),
});

const LoggingSectionSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  console: z.boolean().default(true),
  file: z.boolean().default(false),
  colors: z.boolean().default(true),
  max_file_size: z.number().positive().default(10 * 1024 * 1024),
  max_files: z.number().positive().default(5),
  log_dir: z.string().default('./logs'),
});

const RegistrySectionSchema = z.object({
  async_factory_timeout: z.number().int().min(0).default(0), // 毫秒，0 表示不限制
  warm_up_on_start: z.boolean().default(true), // 启动时调用 allReady()
});

const AppConfigSchema = z.object({
  app: AppSectionSchema.default({}),
  logging: LoggingSectionSchema.default({}),
  registry: RegistrySectionSchema.default({}),
});

export type AppSection = z.infer<typeof AppSectionSchema>;
export type LoggingSection = z.infer<typeof LoggingSectionSchema>;
export type RegistrySection = z.infer<typeof RegistrySectionSchema>;

/**
 * 主配置
 */
export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * 按段的部分更新
 */
export type ConfigUpdate = {
  [S in keyof AppConfig]?: Partial<AppConfig[S]>;
};

/**
 * 配置错误类
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * 配置管理器
 *
 * 事件：
 * - configChanged(config) 通过 updateConfig() 修改后
 * - configReloaded(config) 通过 reload() 重新加载后
 */
export class ConfigManager extends EventEmitter {
  private config: AppConfig | null = null;
  private logger: Logger;

  constructor(
    private readonly configPath: string = './config.toml',
    private readonly templatePath: string = './config-template.toml',
    logger?: Logger,
  ) {
    super();
    this.logger = logger ?? getLogger('Config');
  }

  /**
   * 加载配置
   *
   * 配置文件不存在时从模板创建；模板也不存在时抛出 ConfigError。
   * 文件内容无法解析或校验失败时记录错误并使用默认配置
   */
  async loadConfig(): Promise<AppConfig> {
    this.logger.debug('开始加载配置文件', { path: this.configPath });

    this.ensureConfigFile();

    try {
      const rawConfig = parseToml(readFileSync(this.configPath, 'utf8'));
      this.config = AppConfigSchema.parse(rawConfig);

      this.logger.info('配置加载成功', {
        sections: Object.keys(this.config),
        debug: this.config.app.debug,
      });
    } catch (error) {
      this.logger.error('配置加载失败，使用默认配置', { error: error instanceof Error ? error.message : String(error) });
      this.config = this.getDefaultConfig();
    }

    return this.config;
  }

  getConfig(): AppConfig {
    if (!this.config) {
      throw new ConfigError('配置尚未加载，请先调用 loadConfig()');
    }
    return this.config;
  }

  getSection<T extends keyof AppConfig>(section: T): AppConfig[T] {
    return this.getConfig()[section];
  }

  /**
   * 合并、校验并保存配置
   */
  async updateConfig(updates: ConfigUpdate): Promise<void> {
    const current = this.getConfig();

    let validated: AppConfig;
    try {
      validated = AppConfigSchema.parse(this.mergeConfig(current, updates));
    } catch (error) {
      this.logger.error('配置更新失败', { error: error instanceof Error ? error.message : String(error) });
      throw new ConfigError('配置更新失败', error instanceof Error ? error : undefined);
    }

    this.saveConfig(validated);
    this.config = validated;

    this.logger.info('配置更新成功', { updatedSections: Object.keys(updates) });
    this.emit('configChanged', validated);
  }

  async reload(): Promise<void> {
    this.logger.info('重新加载配置');
    const config = await this.loadConfig();
    this.emit('configReloaded', config);
  }

  saveConfig(config: AppConfig = this.getConfig()): void {
    try {
      writeFileSync(this.configPath, stringifyToml(config), 'utf8');
      this.logger.debug('配置已保存到文件', { path: this.configPath });
    } catch (error) {
      throw new ConfigError('保存配置失败', error instanceof Error ? error : undefined);
    }
  }

  private ensureConfigFile(): void {
    if (existsSync(this.configPath)) {
      return;
    }

    this.logger.info('配置文件不存在，从模板创建', {
      configPath: this.configPath,
      templatePath: this.templatePath,
    });

    if (!existsSync(this.templatePath)) {
      throw new ConfigError(`配置模板文件不存在: ${this.templatePath}`);
    }

    try {
      copyFileSync(this.templatePath, this.configPath);
    } catch (error) {
      throw new ConfigError('创建配置文件失败', error instanceof Error ? error : undefined);
    }
  }

  private getDefaultConfig(): AppConfig {
    return AppConfigSchema.parse({});
  }

  private mergeConfig(base: AppConfig, updates: ConfigUpdate): AppConfig {
    return {
      app: { ...base.app, ...updates.app },
      logging: { ...base.logging, ...updates.logging },
      registry: { ...base.registry, ...updates.registry },
    };
  }
}
