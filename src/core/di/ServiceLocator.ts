/**
 * 服务定位器
 *
 * Registry 之上的简化门面，适合只需要同步服务的调用方
 */

import { NotRegisteredError, RegistryError, RegistryErrorType } from './errors';
import type { Factory } from './Registration';
import { Registry } from './Registry';
import { describeKey, type ServiceKey } from './ServiceKey';

export class ServiceLocator {
  constructor(private readonly registry: Registry = new Registry()) {}

  register<T>(key: ServiceKey<T>, service: T): void {
    this.registry.registerSingleton(key, service);
  }

  registerLazy<T>(key: ServiceKey<T>, factory: Factory<T>): void {
    this.registry.registerLazySingleton(key, factory);
  }

  registerFactory<T>(key: ServiceKey<T>, factory: Factory<T>): void {
    this.registry.registerFactory(key, factory);
  }

  get<T>(key: ServiceKey<T>): T {
    return this.registry.resolve(key);
  }

  /**
   * 未注册时返回 undefined，其他错误照常抛出
   */
  tryGet<T>(key: ServiceKey<T>): T | undefined {
    try {
      return this.registry.resolve(key);
    } catch (error) {
      if (error instanceof NotRegisteredError) {
        return undefined;
      }
      throw error;
    }
  }

  has(key: ServiceKey): boolean {
    return this.registry.isRegistered(key);
  }

  unregister(key: ServiceKey): void {
    this.registry.unregister(key);
  }

  reset(): void {
    this.registry.reset();
  }

  builder<T>(key: ServiceKey<T>): ServiceBuilder<T> {
    return new ServiceBuilder(this, key);
  }
}

/**
 * 链式注册
 *
 * ```ts
 * locator.builder(ServiceKeys.LoggerFactory).withFactory(() => new LoggerFactory()).asTransient().register();
 * ```
 */
export class ServiceBuilder<T> {
  private factory: Factory<T> | undefined;
  private singleton = true;

  constructor(
    private readonly locator: ServiceLocator,
    private readonly key: ServiceKey<T>,
  ) {}

  withFactory(factory: Factory<T>): this {
    this.factory = factory;
    return this;
  }

  asSingleton(): this {
    this.singleton = true;
    return this;
  }

  asTransient(): this {
    this.singleton = false;
    return this;
  }

  register(): void {
    if (!this.factory) {
      throw new RegistryError(RegistryErrorType.BUILDER_INCOMPLETE, `服务 ${describeKey(this.key)} 缺少工厂函数`, this.key);
    }

    if (this.singleton) {
      this.locator.registerLazy(this.key, this.factory);
    } else {
      this.locator.registerFactory(this.key, this.factory);
    }
  }
}
