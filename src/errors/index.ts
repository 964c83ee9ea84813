export type {
  RegistryError,
  ScopeAssignmentError,
  DuplicateGlobalAssignmentError,
  DuplicateGroupAssignmentError,
  RedundantGlobalAssignmentError,
  ScopeAlreadyAssignedError,
  ServiceNotRegistered,
  ConfigIssue,
  ConfigInvalidError,
  Severity,
} from './registry-error.js';
export { severityOf } from './registry-error.js';
export { Err } from './factories.js';
export { formatRegistryError } from './formatter.js';
export { ServiceNotRegisteredError } from './service-not-registered-error.js';
