/**
 * 服务键定义
 *
 * 使用 ServiceToken 作为键，解析时自动推断服务类型：
 * ```ts
 * const config = registry.resolve(ServiceKeys.Config); // AppConfig
 * ```
 */

import type { AppConfig } from '@/utils/Config';
import type { ConfigLoader } from '@/utils/ConfigLoader';
import type { Logger } from '@/utils/Logger';
import type { LoggerFactory } from '@/utils/LoggerFactory';
import type { LifecycleRegistry } from './ServiceLifecycle';
import { createToken } from './ServiceKey';

export const ServiceKeys = {
  // 核心基础设施
  Config: createToken<AppConfig>('Config'),
  ConfigLoader: createToken<ConfigLoader>('ConfigLoader'),
  Logger: createToken<Logger>('Logger'),
  LoggerFactory: createToken<LoggerFactory>('LoggerFactory'),

  // 生命周期
  LifecycleRegistry: createToken<LifecycleRegistry>('LifecycleRegistry'),
} as const;
