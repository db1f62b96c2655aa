/**
 * 应用程序启动配置
 * 核心模块在这里注册基础服务
 */

import { ConfigLoader } from '@/utils/ConfigLoader';
import { GlobalLoggerManager } from '@/utils/Logger';
import { LoggerFactory } from '@/utils/LoggerFactory';
import { defineModule, ModuleLoader, type Module } from './Module';
import type { Registry } from './Registry';
import { ServiceKeys } from './ServiceKeys';
import { LifecycleRegistry } from './ServiceLifecycle';

export interface CoreModuleOptions {
  configPath?: string;
  templatePath?: string;
}

/**
 * 核心模块：配置、日志和生命周期管理
 *
 * Config 是异步单例，需要 allReady() 或 resolveAsync() 之后才能同步解析。
 * 组合根已提供的 Config 和 ConfigLoader 不会被覆盖
 */
export function createCoreModule(options: CoreModuleOptions = {}): Module {
  return defineModule('core', registry => {
    if (!registry.isRegistered(ServiceKeys.ConfigLoader)) {
      registry.registerLazySingleton(ServiceKeys.ConfigLoader, () => new ConfigLoader());
    }

    if (!registry.isRegistered(ServiceKeys.Config)) {
      registry.registerSingletonAsync(ServiceKeys.Config, () =>
        registry.resolve(ServiceKeys.ConfigLoader).loadConfig(options.configPath, options.templatePath),
      );
    }

    // 依赖 Config，只能在 allReady() 之后解析
    registry.registerLazySingleton(ServiceKeys.LoggerFactory, () => LoggerFactory.fromSection(registry.resolve(ServiceKeys.Config).logging));
    registry.registerLazySingleton(ServiceKeys.Logger, () => GlobalLoggerManager.getInstance().getRootLogger());
    registry.registerLazySingleton(ServiceKeys.LifecycleRegistry, () => new LifecycleRegistry());
  });
}

/**
 * 按顺序加载模块并等待所有异步单例就绪
 */
export async function initializeDependencies(registry: Registry, modules: readonly Module[]): Promise<void> {
  new ModuleLoader(registry).loadAll(modules);
  await registry.allReady();
}
