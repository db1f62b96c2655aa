import { createLogger, LogLevel, Logger } from '@/utils/Logger';
import { defineModule, ModuleLoader, type Module } from '../Module';
import { Registry } from '../Registry';
import { createToken } from '../ServiceKey';

describe('ModuleLoader', () => {
  const quietLogger = createLogger({ level: LogLevel.ERROR, console: false, file: false });
  let registry: Registry;
  let loader: ModuleLoader;

  beforeEach(() => {
    registry = new Registry({ logger: quietLogger });
    loader = new ModuleLoader(registry, quietLogger);
  });

  test('load() 对模块调用一次 register', () => {
    const register = jest.fn();
    const module: Module = { name: 'network', register };

    loader.load(module);

    expect(register).toHaveBeenCalledTimes(1);
    expect(register).toHaveBeenCalledWith(registry);
    expect(loader.getLoadedModules()).toEqual(['network']);
  });

  test('loadAll() 按列表顺序加载', () => {
    const order: string[] = [];
    const modules = ['core', 'storage', 'feature'].map(name => defineModule(name, () => order.push(name)));

    loader.loadAll(modules);

    expect(order).toEqual(['core', 'storage', 'feature']);
    expect(loader.getLoadedModules()).toEqual(['core', 'storage', 'feature']);
  });

  test('后加载的模块可以使用先加载模块的注册', () => {
    const ApiUrl = createToken<string>('ApiUrl');
    const Client = createToken<{ url: string }>('Client');

    loader.loadAll([
      defineModule('config', r => r.registerSingleton(ApiUrl, 'https://api.test')),
      defineModule('client', r => r.registerLazySingleton(Client, () => ({ url: r.resolve(ApiUrl) })), [ApiUrl]),
    ]);

    expect(registry.resolve(Client)).toEqual({ url: 'https://api.test' });
  });

  test('声明的依赖只作说明，缺失时不会阻止加载', () => {
    const Missing = createToken<string>('Missing');
    const logger = new Logger({ level: LogLevel.DEBUG, console: false, file: false });
    const debug = jest.spyOn(logger, 'debug');
    const register = jest.fn();

    new ModuleLoader(registry, logger).load(defineModule('feature', register, [Missing]));

    expect(register).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith('模块 feature 声明的依赖尚未注册', { missing: ['Missing'] });
  });

  test('同一个模块加载两次会调用两次 register', () => {
    const register = jest.fn();
    const module = defineModule('twice', register);

    loader.load(module);
    loader.load(module);

    expect(register).toHaveBeenCalledTimes(2);
  });

  test('register 抛出的错误原样传递', () => {
    const failure = new Error('bad module');

    expect(() =>
      loader.loadAll([
        defineModule('broken', () => {
          throw failure;
        }),
      ]),
    ).toThrow(failure);
    expect(loader.getLoadedModules()).toEqual([]);
  });

  test('任何带 register 的对象都可以作为模块', () => {
    class StorageModule implements Module {
      readonly name = 'storage';
      register(target: Registry): void {
        target.registerFactory('session', () => ({ id: 'session' }));
      }
    }

    loader.load(new StorageModule());

    expect(registry.resolve('session')).toEqual({ id: 'session' });
  });
});
