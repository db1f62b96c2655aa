/**
 * 服务注册表
 *
 * 特点：
 * - 不使用反射，键可以是 ServiceToken、类、string 或 symbol
 * - 五种注册方式：单例、懒加载单例、工厂、异步单例、带参工厂
 * - 异步单例 single-flight：并发解析同一个键只会调用一次工厂
 * - 异步工厂失败不缓存，下次解析会重新调用工厂
 *
 * 使用示例：
 * ```ts
 * const registry = new Registry();
 * registry.registerLazySingleton(ServiceKeys.LoggerFactory, () => new LoggerFactory());
 * registry.registerSingletonAsync(ServiceKeys.Config, () => configLoader.loadDefaultConfig());
 *
 * await registry.allReady();
 * const config = registry.resolve(ServiceKeys.Config);
 * ```
 */

import type { ZodType } from 'zod';
import { getLogger, type Logger } from '@/utils/Logger';
import {
  AllReadyError,
  errorMessage,
  FactoryTimeoutError,
  InvalidParameterError,
  NotParameterizedError,
  NotRegisteredError,
  WrongResolutionMethodError,
  type KeyFailure,
} from './errors';
import {
  RegistrationKind,
  type AsyncFactory,
  type AsyncSingletonRegistration,
  type Factory,
  type ParamFactory,
  type Registration,
} from './Registration';
import { describeKey, type Constructor, type ParamServiceToken, type ServiceKey } from './ServiceKey';

export interface RegistryOptions {
  logger?: Logger;
  /** 异步工厂的默认超时（毫秒），0 表示不限制 */
  asyncFactoryTimeout?: number;
}

export interface AsyncSingletonOptions {
  /** 覆盖 Registry 的默认超时，0 表示不限制 */
  timeout?: number;
}

export interface FactoryParamOptions<P> {
  /**
   * 参数校验 schema
   *
   * 提供时参数先经 schema 解析，失败抛出 InvalidParameterError 且不调用工厂
   */
  schema?: ZodType<P>;
}

/**
 * 不携带参数类型的键，注册带参工厂时必须提供 schema
 */
export type UntypedParamKey<T> = Constructor<T> | string | symbol;

export interface CheckedParamOptions<P> {
  schema: ZodType<P>;
}

/**
 * 进行中的异步创建
 *
 * 占据键的位置直到工厂本身结束；超时只让单个调用方失败
 */
interface Production {
  readonly promise: Promise<unknown>;
  readonly timeout: number;
}

/**
 * 为单次等待加上超时，超时后以 FactoryTimeoutError 拒绝，不影响被等待的创建
 */
function withTimeout<T>(production: Promise<T>, timeout: number, key: ServiceKey): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new FactoryTimeoutError(key, timeout)), timeout);
  });
  return Promise.race([production, expiry]).finally(() => clearTimeout(timer));
}

export class Registry {
  private registrations = new Map<ServiceKey, Registration>();
  private singletons = new Map<ServiceKey, unknown>();
  private inFlight = new Map<ServiceKey, Production>();
  private readonly asyncFactoryTimeout: number;
  private _logger: Logger | undefined;

  constructor(options: RegistryOptions = {}) {
    this._logger = options.logger;
    this.asyncFactoryTimeout = options.asyncFactoryTimeout ?? 0;
  }

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getLogger('Registry');
    }
    return this._logger;
  }

  /**
   * 注册已存在的实例
   */
  registerSingleton<T>(key: ServiceKey<T>, value: T): this {
    this.store(key, { kind: RegistrationKind.Singleton, value });
    this.singletons.set(key, value);
    return this;
  }

  /**
   * 注册懒加载单例（首次解析时创建）
   */
  registerLazySingleton<T>(key: ServiceKey<T>, factory: Factory<T>): this {
    this.store(key, { kind: RegistrationKind.LazySingleton, factory });
    return this;
  }

  /**
   * 注册工厂（每次解析都创建新实例）
   */
  registerFactory<T>(key: ServiceKey<T>, factory: Factory<T>): this {
    this.store(key, { kind: RegistrationKind.Factory, factory });
    return this;
  }

  /**
   * 注册异步单例，只能通过 resolveAsync() 或 allReady() 创建
   */
  registerSingletonAsync<T>(key: ServiceKey<T>, factory: AsyncFactory<T>, options: AsyncSingletonOptions = {}): this {
    this.store(key, { kind: RegistrationKind.AsyncSingleton, factory, timeout: options.timeout });
    return this;
  }

  /**
   * 注册带参数的工厂，通过 resolveWithParam() 解析
   *
   * ParamServiceToken 在注册和解析两端约束同一个参数类型；
   * 类、string、symbol 键不携带参数类型，必须提供 schema 在运行时校验
   */
  registerFactoryParam<T, P>(key: ParamServiceToken<T, P>, factory: ParamFactory<T, P>, options?: FactoryParamOptions<P>): this;
  registerFactoryParam<T, P>(key: UntypedParamKey<T>, factory: ParamFactory<T, P>, options: CheckedParamOptions<P>): this;
  registerFactoryParam<T, P>(key: ServiceKey<T>, factory: ParamFactory<T, P>, options: FactoryParamOptions<P> = {}): this {
    const { schema } = options;
    // 参数类型已由重载约束，produce 以 unknown 接收
    const produce = schema ? (param: unknown) => factory(this.parseParam(key, schema, param)) : factory;
    this.store(key, { kind: RegistrationKind.FactoryWithParam, produce });
    return this;
  }

  /**
   * 同步解析服务
   */
  resolve<T>(key: ServiceKey<T>): T {
    if (this.singletons.has(key)) {
      return this.singletons.get(key) as T;
    }

    const registration = this.registrations.get(key);
    if (!registration) {
      throw new NotRegisteredError(key);
    }

    switch (registration.kind) {
      case RegistrationKind.Singleton:
        return registration.value as T;

      case RegistrationKind.LazySingleton: {
        const instance = registration.factory();
        this.singletons.set(key, instance);
        this.logger.debug(`创建懒加载单例: ${describeKey(key)}`);
        return instance as T;
      }

      case RegistrationKind.Factory:
        return registration.factory() as T;

      case RegistrationKind.AsyncSingleton:
        throw new WrongResolutionMethodError(key, 'resolveAsync');

      case RegistrationKind.FactoryWithParam:
        throw new WrongResolutionMethodError(key, 'resolveWithParam');
    }
  }

  /**
   * 异步解析服务
   *
   * 对异步单例：已缓存直接返回；正在创建则等待同一次创建；
   * 否则调用工厂并在第一次挂起前登记到进行中表。其余类型走 resolve()
   *
   * 超时按调用方分别计时。超时的调用方得到 FactoryTimeoutError，
   * 创建本身继续占据该键，工厂结束前的重试会加入同一次创建
   */
  async resolveAsync<T>(key: ServiceKey<T>): Promise<T> {
    if (this.singletons.has(key)) {
      return this.singletons.get(key) as T;
    }

    let production = this.inFlight.get(key);
    if (!production) {
      const registration = this.registrations.get(key);
      if (!registration) {
        throw new NotRegisteredError(key);
      }

      if (registration.kind !== RegistrationKind.AsyncSingleton) {
        return this.resolve(key);
      }

      production = this.startProduction(key, registration);
    }

    const { promise, timeout } = production;
    return (await (timeout > 0 ? withTimeout(promise, timeout, key) : promise)) as T;
  }

  /**
   * 使用参数解析带参工厂，每次返回新实例
   */
  resolveWithParam<T, P>(key: ParamServiceToken<T, P>, param: P): T;
  resolveWithParam<T = unknown>(key: UntypedParamKey<T>, param: unknown): T;
  resolveWithParam<T>(key: ServiceKey<T>, param: unknown): T {
    const registration = this.registrations.get(key);
    if (!registration) {
      throw new NotRegisteredError(key);
    }

    if (registration.kind !== RegistrationKind.FactoryWithParam) {
      throw new NotParameterizedError(key);
    }

    return registration.produce(param) as T;
  }

  isRegistered(key: ServiceKey): boolean {
    return this.registrations.has(key);
  }

  /**
   * 是否已有缓存的单例实例
   */
  isResolved(key: ServiceKey): boolean {
    return this.singletons.has(key);
  }

  /**
   * 是否有进行中的异步创建
   */
  isPending(key: ServiceKey): boolean {
    return this.inFlight.has(key);
  }

  getRegistrationKind(key: ServiceKey): RegistrationKind | undefined {
    return this.registrations.get(key)?.kind;
  }

  getRegisteredKeys(): ServiceKey[] {
    return Array.from(this.registrations.keys());
  }

  /**
   * 注销服务
   *
   * 已在等待的调用方仍会拿到进行中创建的结果，但该结果不会再写入缓存
   */
  unregister(key: ServiceKey): void {
    this.registrations.delete(key);
    this.singletons.delete(key);
    this.inFlight.delete(key);
    this.logger.debug(`注销服务: ${describeKey(key)}`);
  }

  /**
   * 清空所有注册和缓存
   */
  reset(): void {
    this.registrations.clear();
    this.singletons.clear();
    this.inFlight.clear();
    this.logger.debug('注册表已清空');
  }

  /**
   * 并发解析所有异步单例，全部完成（成功或失败）后返回
   *
   * @throws AllReadyError 任一异步单例失败时，包含所有失败的键
   */
  async allReady(): Promise<void> {
    const keys = Array.from(this.registrations)
      .filter(([, registration]) => registration.kind === RegistrationKind.AsyncSingleton)
      .map(([key]) => key);

    const results = await Promise.allSettled(keys.map(key => this.resolveAsync(key)));

    const failures: KeyFailure[] = [];
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        failures.push({ key: describeKey(keys[index]), error: result.reason });
      }
    });

    if (failures.length > 0) {
      const error = new AllReadyError(failures);
      this.logger.error(error.message, { failures: failures.map(f => ({ key: f.key, error: errorMessage(f.error) })) });
      throw error;
    }

    this.logger.info(`异步服务已就绪 (${keys.length})`);
  }

  /**
   * 写入注册；已存在的键会被直接替换，只记录一条警告，不会失败
   */
  private store(key: ServiceKey, registration: Registration): void {
    if (this.registrations.has(key)) {
      this.logger.warn(`服务 ${describeKey(key)} 已存在，将被覆盖`);
    }

    this.registrations.set(key, registration);
    // 旧注册产生的实例和进行中的创建都作废
    this.singletons.delete(key);
    this.inFlight.delete(key);

    this.logger.debug(`注册服务: ${describeKey(key)} (${registration.kind})`);
  }

  /**
   * 调用异步工厂并登记到进行中表
   *
   * 登记在工厂结束时才移除，与调用方是否超时无关，因此同一个键最多只有一次工厂调用在执行
   */
  private startProduction(key: ServiceKey, registration: AsyncSingletonRegistration): Production {
    // 同步抛出的错误也转为 rejected Promise
    const settled = (async () => registration.factory())();

    const production: Production = {
      timeout: registration.timeout ?? this.asyncFactoryTimeout,
      promise: settled.then(
        instance => {
          // 期间被注销或重新注册时不写缓存
          if (this.inFlight.get(key) === production) {
            this.inFlight.delete(key);
            this.singletons.set(key, instance);
            this.logger.debug(`异步单例创建完成: ${describeKey(key)}`);
          }
          return instance;
        },
        (error: unknown) => {
          if (this.inFlight.get(key) === production) {
            this.inFlight.delete(key);
          }
          this.logger.warn(`异步单例创建失败: ${describeKey(key)}`, { error: errorMessage(error) });
          throw error;
        },
      ),
    };

    this.inFlight.set(key, production);
    return production;
  }

  private parseParam<P>(key: ServiceKey, schema: ZodType<P>, param: unknown): P {
    const result = schema.safeParse(param);
    if (!result.success) {
      throw new InvalidParameterError(
        key,
        result.error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)),
        result.error,
      );
    }
    return result.data;
  }
}

/**
 * 进程级默认注册表
 *
 * 仅供组合根使用；库代码应通过参数显式接收 Registry，测试应各自创建实例
 */
export const globalRegistry = new Registry();
