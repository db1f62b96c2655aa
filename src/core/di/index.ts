/**
 * 依赖注入模块导出
 */

export { Registry, globalRegistry } from './Registry';
export type { RegistryOptions, AsyncSingletonOptions, FactoryParamOptions, CheckedParamOptions, UntypedParamKey } from './Registry';
export { RegistrationKind } from './Registration';
export type { Registration, Factory, AsyncFactory, ParamFactory } from './Registration';
export { ServiceToken, ParamServiceToken, createToken, createParamToken, describeKey } from './ServiceKey';
export type { ServiceKey, Constructor } from './ServiceKey';
export {
  RegistryError,
  RegistryErrorType,
  NotRegisteredError,
  WrongResolutionMethodError,
  NotParameterizedError,
  InvalidParameterError,
  FactoryTimeoutError,
  AllReadyError,
  DisposeError,
} from './errors';
export type { KeyFailure } from './errors';
export { ModuleLoader, defineModule } from './Module';
export type { Module } from './Module';
export { ServiceLocator, ServiceBuilder } from './ServiceLocator';
export { LifecycleService, LifecycleRegistry } from './ServiceLifecycle';
export type { Service } from './ServiceLifecycle';
export { ServiceKeys } from './ServiceKeys';
export { createCoreModule, initializeDependencies } from './bootstrap';
export type { CoreModuleOptions } from './bootstrap';
