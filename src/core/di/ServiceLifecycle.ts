/**
 * 服务生命周期管理
 */

import { getLogger, type Logger } from '@/utils/Logger';
import { DisposeError, errorMessage, type KeyFailure } from './errors';
import { describeKey, type ServiceKey } from './ServiceKey';

/**
 * 需要初始化和销毁的服务
 */
export interface Service {
  initialize(): Promise<void>;
  dispose(): Promise<void>;
}

/**
 * 生命周期服务基类：initialize/dispose 各只执行一次
 */
export abstract class LifecycleService implements Service {
  private _isInitialized = false;
  private _isDisposed = false;

  get isInitialized(): boolean {
    return this._isInitialized;
  }

  get isDisposed(): boolean {
    return this._isDisposed;
  }

  async initialize(): Promise<void> {
    if (this._isInitialized) return;
    await this.onInitialize();
    this._isInitialized = true;
  }

  async dispose(): Promise<void> {
    if (this._isDisposed) return;
    await this.onDispose();
    this._isDisposed = true;
  }

  protected abstract onInitialize(): Promise<void>;

  protected abstract onDispose(): Promise<void>;
}

/**
 * 按注册顺序初始化、按相反顺序销毁服务
 */
export class LifecycleRegistry {
  private services = new Map<ServiceKey, Service>();
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? getLogger('LifecycleRegistry');
  }

  register<T extends Service>(key: ServiceKey<T>, service: T): void {
    this.services.set(key, service);
  }

  get<T extends Service>(key: ServiceKey<T>): T | undefined {
    return this.services.get(key) as T | undefined;
  }

  get size(): number {
    return this.services.size;
  }

  /**
   * 依次初始化，遇到第一个失败即停止并抛出
   */
  async initializeAll(): Promise<void> {
    for (const [key, service] of this.services) {
      this.logger.debug(`初始化服务: ${describeKey(key)}`);
      await service.initialize();
    }
    this.logger.info(`已初始化 ${this.services.size} 个服务`);
  }

  /**
   * 逆序销毁所有服务，单个失败不影响其余服务
   *
   * @throws DisposeError 有服务销毁失败时
   */
  async disposeAll(): Promise<void> {
    const failures: KeyFailure[] = [];

    for (const [key, service] of Array.from(this.services).reverse()) {
      try {
        await service.dispose();
      } catch (error) {
        this.logger.error(`销毁服务 ${describeKey(key)} 失败`, { error: errorMessage(error) });
        failures.push({ key: describeKey(key), error });
      }
    }

    this.services.clear();

    if (failures.length > 0) {
      throw new DisposeError(failures);
    }
    this.logger.info('所有服务已销毁');
  }
}
