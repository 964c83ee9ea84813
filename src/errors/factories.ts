import type {
  ConfigInvalidError,
  ConfigIssue,
  DuplicateGlobalAssignmentError,
  DuplicateGroupAssignmentError,
  RedundantGlobalAssignmentError,
  RegistryError,
  ScopeAlreadyAssignedError,
  ServiceNotRegistered,
} from './registry-error.js';
import type { GroupId, ScopeKind } from '../registry/scope.js';

export const Err = {
  duplicateGlobalAssignment: (registryId: number, currentGlobalId: number): DuplicateGlobalAssignmentError => ({
    _tag: 'DuplicateGlobalAssignment',
    registryId,
    currentGlobalId,
    message: `Registry #${registryId} cannot become global: registry #${currentGlobalId} already is`,
  }),

  duplicateGroupAssignment: (
    registryId: number,
    group: GroupId,
    currentRegistryId: number
  ): DuplicateGroupAssignmentError => ({
    _tag: 'DuplicateGroupAssignment',
    registryId,
    group,
    currentRegistryId,
    message:
      registryId === currentRegistryId
        ? `Registry #${registryId} is already configured for group "${group}"`
        : `Registry #${registryId} cannot govern group "${group}": registry #${currentRegistryId} already does`,
  }),

  redundantGlobalAssignment: (registryId: number): RedundantGlobalAssignmentError => ({
    _tag: 'RedundantGlobalAssignment',
    registryId,
    message: `Registry #${registryId} is already configured as global`,
  }),

  scopeAlreadyAssigned: (
    registryId: number,
    current: ScopeKind,
    requested: Exclude<ScopeKind, 'unscoped'>
  ): ScopeAlreadyAssignedError => ({
    _tag: 'ScopeAlreadyAssigned',
    registryId,
    current,
    requested,
    message: `Registry #${registryId} already holds ${current} scope and cannot take ${requested} scope`,
  }),

  serviceNotRegistered: (serviceType: string): ServiceNotRegistered => ({
    _tag: 'ServiceNotRegistered',
    serviceType,
    message: `Service of type "${serviceType}" is not registered`,
  }),

  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),
} as const satisfies Record<string, (...args: never[]) => RegistryError>;
