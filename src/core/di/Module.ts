/**
 * 模块：一组相关注册的组合单元
 *
 * 任何带 register(registry) 的对象都是模块，不需要继承
 */

import { getLogger, type Logger } from '@/utils/Logger';
import type { Registry } from './Registry';
import { describeKey, type ServiceKey } from './ServiceKey';

export interface Module {
  readonly name: string;
  /** 声明依赖的服务键，仅作说明，加载顺序由调用方决定 */
  readonly dependencies?: readonly ServiceKey[];
  register(registry: Registry): void;
}

/**
 * 用函数快速定义模块
 */
export function defineModule(name: string, register: (registry: Registry) => void, dependencies: readonly ServiceKey[] = []): Module {
  return { name, dependencies, register };
}

/**
 * 模块加载器：按调用顺序把模块应用到同一个 Registry
 */
export class ModuleLoader {
  private loaded: string[] = [];
  private logger: Logger;

  constructor(
    private readonly registry: Registry,
    logger?: Logger,
  ) {
    this.logger = logger ?? getLogger('ModuleLoader');
  }

  load(module: Module): void {
    module.register(this.registry);
    this.loaded.push(module.name);

    const missing = (module.dependencies ?? []).filter(key => !this.registry.isRegistered(key));
    if (missing.length > 0) {
      this.logger.debug(`模块 ${module.name} 声明的依赖尚未注册`, { missing: missing.map(describeKey) });
    }
    this.logger.debug(`模块已加载: ${module.name}`);
  }

  /**
   * 按列表顺序加载，不做依赖排序
   */
  loadAll(modules: readonly Module[]): void {
    for (const module of modules) {
      this.load(module);
    }
    this.logger.info(`已加载 ${modules.length} 个模块`, { modules: modules.map(m => m.name) });
  }

  getLoadedModules(): string[] {
    return [...this.loaded];
  }
}
