import 'reflect-metadata';

// DI Container exports
export { initializeContainer, resetContainer, isInitialized, container, ContainerConfigError } from './di/container.js';
export type { ContainerInitOptions } from './di/container.js';
export { DI } from './di/tokens.js';

// Registry
export { ServiceLocator, DEFAULT_REGISTRY_OPTIONS } from './registry/service-locator.js';
export type { ServiceLocatorDeps } from './registry/service-locator.js';
export { RegistryNode } from './registry/registry-node.js';
export { ScopeIndex } from './registry/scope-index.js';
export type { ReleasedSlot } from './registry/scope-index.js';
export { ServiceTable } from './registry/service-table.js';
export {
  RegistryBootstrapper,
  GlobalRegistryBootstrapper,
  GroupRegistryBootstrapper,
} from './registry/bootstrapper.js';
export type { BootstrapperKind } from './registry/bootstrapper.js';
export { closestAttached, closestRegistry, nextInChain, registryForGroupOf, globalRegistry } from './registry/resolution.js';
export type { RegistryContext, RegistryOptions } from './registry/context.js';
export { asGroupId, UNSCOPED } from './registry/scope.js';
export type { GroupId, ScopeTag, ScopeKind } from './registry/scope.js';
export { defineServiceToken, serviceTypeName, matchesServiceType, isServiceToken } from './registry/service-type.js';
export type { ServiceClass, ServiceToken, ServiceType } from './registry/service-type.js';

// Ports and adapters
export type { HierarchyPort } from './ports/hierarchy.port.js';
export type { BootstrapFinder } from './ports/bootstrap-finder.port.js';
export { HierarchyBootstrapFinder } from './infrastructure/hierarchy/hierarchy-bootstrap-finder.js';
export {
  InMemoryHierarchy,
  HostMember,
  PERSISTENT_GROUP,
  DEFAULT_GROUP_NAME,
} from './infrastructure/hierarchy/in-memory-hierarchy.js';
export type { CreateMemberOptions } from './infrastructure/hierarchy/in-memory-hierarchy.js';

// Errors, config, logging
export * from './errors/index.js';
export { loadConfig, createValidatedConfig, defaultConfig, DEFAULT_GLOBAL_MEMBER_NAME } from './config/app-config.js';
export type { AppConfig, ValidatedConfig, GlobalMemberName, LoadConfigResult } from './config/app-config.js';
export * from './core/logging/index.js';
