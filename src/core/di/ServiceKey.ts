/**
 * 服务键定义
 *
 * 支持四种键：
 * - ServiceToken<T>：带类型的命名令牌（推荐，可自动推断解析结果类型）
 * - ParamServiceToken<T, P>：带参工厂的令牌，同时携带参数类型
 * - 类构造函数：以类本身作为键
 * - string / symbol：显式标签，解析时需手动指定类型参数
 */

/**
 * 带类型的服务令牌
 *
 * 每个实例都是唯一的键，即使名称相同
 */
export class ServiceToken<T> {
  /** 仅用于类型推断，运行时永远不存在 */
  declare readonly __type?: T;
  /** 私有成员使令牌只能由 ServiceToken 构造，类构造函数不会被误认为令牌 */
  private readonly id: symbol;

  constructor(public readonly name: string) {
    this.id = Symbol(name);
  }

  toString(): string {
    return `ServiceToken(${this.name})`;
  }
}

/**
 * 带参工厂的令牌
 *
 * 参数类型 P 在注册和解析两端必须一致；普通 ServiceToken 不能当作它使用
 */
export class ParamServiceToken<T, P> extends ServiceToken<T> {
  /** 仅用于类型检查：P 同时出现在参数和返回位置，令牌对 P 不变 */
  declare readonly __param: (param: P) => P;

  toString(): string {
    return `ParamServiceToken(${this.name})`;
  }
}

/**
 * 可作为键的类构造函数（包括抽象类）
 */
export type Constructor<T> = abstract new (...args: never[]) => T;

/**
 * 服务标识符类型
 */
export type ServiceKey<T = unknown> = ServiceToken<T> | Constructor<T> | string | symbol;

/**
 * 创建服务令牌
 */
export function createToken<T>(name: string): ServiceToken<T> {
  return new ServiceToken<T>(name);
}

/**
 * 创建带参工厂令牌
 */
export function createParamToken<T, P>(name: string): ParamServiceToken<T, P> {
  return new ParamServiceToken<T, P>(name);
}

/**
 * 获取服务键的可读名称（用于日志和错误消息）
 */
export function describeKey(key: ServiceKey): string {
  if (typeof key === 'string') {
    return key;
  }
  if (typeof key === 'symbol') {
    return key.description ?? key.toString();
  }
  if (key instanceof ServiceToken) {
    return key.name;
  }
  return key.name || '<anonymous class>';
}
