/**
 * 注册表错误定义
 *
 * 所有注册表错误都继承 RegistryError，可通过 type 区分；
 * 用户工厂抛出的错误不会被包装，原样传递给调用方
 */

import { describeKey, type ServiceKey } from './ServiceKey';

/**
 * 错误类型
 */
export enum RegistryErrorType {
  NOT_REGISTERED = 'NOT_REGISTERED',
  WRONG_RESOLUTION_METHOD = 'WRONG_RESOLUTION_METHOD',
  NOT_PARAMETERIZED = 'NOT_PARAMETERIZED',
  INVALID_PARAMETER = 'INVALID_PARAMETER',
  FACTORY_TIMEOUT = 'FACTORY_TIMEOUT',
  ALL_READY_FAILED = 'ALL_READY_FAILED',
  DISPOSE_FAILED = 'DISPOSE_FAILED',
  BUILDER_INCOMPLETE = 'BUILDER_INCOMPLETE',
}

/**
 * 单个服务键的失败记录
 */
export interface KeyFailure {
  key: string;
  error: unknown;
}

/**
 * 注册表错误基类
 */
export class RegistryError extends Error {
  public readonly type: RegistryErrorType;
  /** 出错的服务键名称 */
  public readonly key?: string;
  public readonly timestamp: Date;
  public readonly cause?: unknown;

  constructor(type: RegistryErrorType, message: string, key?: ServiceKey, cause?: unknown) {
    super(message);
    this.name = 'RegistryError';
    this.type = type;
    this.key = key === undefined ? undefined : describeKey(key);
    this.timestamp = new Date();
    this.cause = cause;

    // 保持堆栈跟踪
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * 转换为JSON格式，便于日志记录
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      key: this.key,
      message: this.message,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause instanceof Error ? { name: this.cause.name, message: this.cause.message } : this.cause,
    };
  }
}

export class NotRegisteredError extends RegistryError {
  constructor(key: ServiceKey) {
    super(RegistryErrorType.NOT_REGISTERED, `服务 ${describeKey(key)} 未注册`, key);
    this.name = 'NotRegisteredError';
  }
}

/**
 * 解析方式错误：异步单例需 resolveAsync，带参工厂需 resolveWithParam
 */
export class WrongResolutionMethodError extends RegistryError {
  constructor(
    key: ServiceKey,
    public readonly expected: 'resolveAsync' | 'resolveWithParam',
  ) {
    super(RegistryErrorType.WRONG_RESOLUTION_METHOD, `resolve() 无法解析 ${describeKey(key)}，请使用 ${expected}()`, key);
    this.name = 'WrongResolutionMethodError';
  }
}

export class NotParameterizedError extends RegistryError {
  constructor(key: ServiceKey) {
    super(RegistryErrorType.NOT_PARAMETERIZED, `服务 ${describeKey(key)} 不是带参数的工厂`, key);
    this.name = 'NotParameterizedError';
  }
}

export class InvalidParameterError extends RegistryError {
  constructor(
    key: ServiceKey,
    public readonly issues: string[],
    cause?: unknown,
  ) {
    super(RegistryErrorType.INVALID_PARAMETER, `服务 ${describeKey(key)} 的参数无效: ${issues.join('; ')}`, key, cause);
    this.name = 'InvalidParameterError';
  }
}

export class FactoryTimeoutError extends RegistryError {
  constructor(
    key: ServiceKey,
    public readonly timeout: number,
  ) {
    super(RegistryErrorType.FACTORY_TIMEOUT, `服务 ${describeKey(key)} 的异步工厂超时 (${timeout}ms)`, key);
    this.name = 'FactoryTimeoutError';
  }
}

/**
 * allReady() 中至少一个异步单例失败
 */
export class AllReadyError extends RegistryError {
  constructor(public readonly failures: KeyFailure[]) {
    super(
      RegistryErrorType.ALL_READY_FAILED,
      `${failures.length} 个异步服务初始化失败: ${failures.map(f => f.key).join(', ')}`,
      undefined,
      failures[0]?.error,
    );
    this.name = 'AllReadyError';
  }
}

export class DisposeError extends RegistryError {
  constructor(public readonly failures: KeyFailure[]) {
    super(
      RegistryErrorType.DISPOSE_FAILED,
      `${failures.length} 个服务销毁失败: ${failures.map(f => f.key).join(', ')}`,
      undefined,
      failures[0]?.error,
    );
    this.name = 'DisposeError';
  }
}

/**
 * 将任意抛出值转为可读消息
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
