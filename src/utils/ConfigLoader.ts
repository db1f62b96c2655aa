/**
 * 配置加载器
 * 统一管理配置文件的加载
 */

import { ConfigManager, type AppConfig } from './Config';
import type { Logger } from './Logger';

export class ConfigLoader {
  private manager: ConfigManager | undefined;

  constructor(private readonly logger?: Logger) {}

  /**
   * 加载配置文件
   */
  async loadConfig(configPath?: string, templatePath?: string): Promise<AppConfig> {
    this.manager = new ConfigManager(configPath, templatePath, this.logger);
    return await this.manager.loadConfig();
  }

  async loadDefaultConfig(): Promise<AppConfig> {
    return await this.loadConfig('./config.toml', './config-template.toml');
  }

  /**
   * 最近一次加载使用的管理器
   */
  getManager(): ConfigManager | undefined {
    return this.manager;
  }
}
