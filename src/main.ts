/**
 * 组合根入口
 *
 * 启动流程：
 * 1. 加载配置并用 [logging] 段重建根日志器
 * 2. 按配置创建 Registry，登记已加载的配置
 * 3. 按顺序加载模块
 * 4. 预热所有异步单例（registry.warm_up_on_start）
 * 5. 初始化生命周期服务
 */

import { createCoreModule, describeKey, ModuleLoader, Registry, RegistryError, ServiceKeys, type Module } from '@/core/di';
import { ConfigLoader } from '@/utils/ConfigLoader';
import { createLogger, GlobalLoggerManager, LogLevel, type Logger } from '@/utils/Logger';
import { LoggerFactory } from '@/utils/LoggerFactory';

/**
 * 基础错误日志记录器（在配置加载前使用）
 */
const basicErrorLogger: Logger = createLogger({
  level: LogLevel.INFO,
  console: true,
  file: false,
});

export interface ApplicationOptions {
  configPath?: string;
  templatePath?: string;
  /** 在核心模块之后按顺序加载 */
  modules?: readonly Module[];
}

export class Application {
  private registry?: Registry;
  private logger: Logger = basicErrorLogger;
  private started = false;

  constructor(private readonly options: ApplicationOptions = {}) {}

  /**
   * 初始化应用程序，返回装配完成的 Registry
   */
  async initialize(): Promise<Registry> {
    const configLoader = new ConfigLoader();
    const config = await configLoader.loadConfig(
      this.options.configPath ?? './config.toml',
      this.options.templatePath ?? './config-template.toml',
    );

    this.logger = LoggerFactory.fromSection(config.logging).createLogger();
    GlobalLoggerManager.getInstance().setRootLogger(this.logger);
    this.logger.info(`${config.app.name} 正在启动...`, { version: config.app.version });

    const registry = new Registry({
      logger: this.logger.child('Registry'),
      asyncFactoryTimeout: config.registry.async_factory_timeout,
    });
    this.registry = registry;

    registry.registerSingleton(ServiceKeys.Config, config);
    registry.registerSingleton(ServiceKeys.ConfigLoader, configLoader);

    new ModuleLoader(registry, this.logger.child('ModuleLoader')).loadAll([createCoreModule(), ...(this.options.modules ?? [])]);

    if (config.registry.warm_up_on_start) {
      await registry.allReady();
    }

    await registry.resolve(ServiceKeys.LifecycleRegistry).initializeAll();
    this.started = true;

    this.logger.info('启动完成', { services: registry.getRegisteredKeys().map(describeKey) });
    return registry;
  }

  async shutdown(): Promise<void> {
    if (!this.registry || !this.started) {
      return;
    }

    this.logger.info('正在关闭...');
    await this.registry.resolve(ServiceKeys.LifecycleRegistry).disposeAll();
    this.registry.reset();
    this.started = false;
    this.logger.info('已关闭');
  }

  /**
   * 输出启动失败信息，注册表错误会带上出错的服务键
   */
  reportFailure(error: unknown): void {
    if (error instanceof RegistryError) {
      this.logger.error(`启动失败: ${error.message}`, { key: error.key, type: error.type }, error);
    } else {
      this.logger.error('启动失败', undefined, error instanceof Error ? error : new Error(String(error)));
    }
  }
}

async function main(): Promise<void> {
  const app = new Application();

  const shutdownHandler = async () => {
    try {
      await app.shutdown();
      process.exit(0);
    } catch (error) {
      basicErrorLogger.error('关闭时出错', undefined, error instanceof Error ? error : new Error(String(error)));
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdownHandler());
  process.on('SIGTERM', () => void shutdownHandler());

  try {
    await app.initialize();
  } catch (error) {
    app.reportFailure(error);
    await app.shutdown();
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main().catch(error => {
    basicErrorLogger.error('程序异常', undefined, error instanceof Error ? error : new Error(String(error)));
    process.exit(1);
  });
}
