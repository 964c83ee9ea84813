import type { GroupId, ScopeKind } from '../registry/scope.js';

// ============================================================================
// Scope assignment (reported at the point of assignment, never thrown)
// ============================================================================

export interface DuplicateGlobalAssignmentError {
  readonly _tag: 'DuplicateGlobalAssignment';
  readonly registryId: number;
  readonly currentGlobalId: number;
  readonly message: string;
}

export interface DuplicateGroupAssignmentError {
  readonly _tag: 'DuplicateGroupAssignment';
  readonly registryId: number;
  readonly group: GroupId;
  readonly currentRegistryId: number;
  readonly message: string;
}

export interface RedundantGlobalAssignmentError {
  readonly _tag: 'RedundantGlobalAssignment';
  readonly registryId: number;
  readonly message: string;
}

export interface ScopeAlreadyAssignedError {
  readonly _tag: 'ScopeAlreadyAssigned';
  readonly registryId: number;
  readonly current: ScopeKind;
  readonly requested: Exclude<ScopeKind, 'unscoped'>;
  readonly message: string;
}

export type ScopeAssignmentError =
  | DuplicateGlobalAssignmentError
  | DuplicateGroupAssignmentError
  | RedundantGlobalAssignmentError
  | ScopeAlreadyAssignedError;

// ============================================================================
// Lookup
// ============================================================================

export interface ServiceNotRegistered {
  readonly _tag: 'ServiceNotRegistered';
  readonly serviceType: string;
  readonly message: string;
}

// ============================================================================
// Configuration
// ============================================================================

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export interface ConfigInvalidError {
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}

export type RegistryError = ScopeAssignmentError | ServiceNotRegistered | ConfigInvalidError;

export type Severity = 'warn' | 'error';

/** Redundant assignments are harmless; every other conflict leaves a node unscoped. */
export function severityOf(error: ScopeAssignmentError): Severity {
  return error._tag === 'RedundantGlobalAssignment' ? 'warn' : 'error';
}
