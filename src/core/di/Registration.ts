/**
 * 注册描述
 *
 * 每个服务键对应一条不可变的注册记录，按 kind 区分生产方式
 */

/**
 * 注册类型
 */
export enum RegistrationKind {
  /** 注册时即确定的值 */
  Singleton = 'singleton',
  /** 首次解析时调用工厂，之后复用 */
  LazySingleton = 'lazySingleton',
  /** 每次解析都调用工厂 */
  Factory = 'factory',
  /** 异步工厂，最多调用一次，并发解析共享同一个进行中的 Promise */
  AsyncSingleton = 'asyncSingleton',
  /** 带一个参数的工厂，每次解析都调用 */
  FactoryWithParam = 'factoryWithParam',
}

/**
 * 同步工厂函数类型
 */
export type Factory<T> = () => T;

/**
 * 异步工厂函数类型
 */
export type AsyncFactory<T> = () => Promise<T>;

/**
 * 带参数的工厂函数类型
 */
export type ParamFactory<T, P> = (param: P) => T;

export interface SingletonRegistration {
  readonly kind: RegistrationKind.Singleton;
  readonly value: unknown;
}

export interface LazySingletonRegistration {
  readonly kind: RegistrationKind.LazySingleton;
  readonly factory: Factory<unknown>;
}

export interface FactoryRegistration {
  readonly kind: RegistrationKind.Factory;
  readonly factory: Factory<unknown>;
}

export interface AsyncSingletonRegistration {
  readonly kind: RegistrationKind.AsyncSingleton;
  readonly factory: AsyncFactory<unknown>;
  /** 超时时间（毫秒），未设置时使用 Registry 的默认值 */
  readonly timeout?: number;
}

export interface FactoryWithParamRegistration {
  readonly kind: RegistrationKind.FactoryWithParam;
  /** 参数在进入工厂前已按注册时的 schema 校验（如果有） */
  produce(param: unknown): unknown;
}

/**
 * 注册记录
 */
export type Registration =
  | SingletonRegistration
  | LazySingletonRegistration
  | FactoryRegistration
  | AsyncSingletonRegistration
  | FactoryWithParamRegistration;
