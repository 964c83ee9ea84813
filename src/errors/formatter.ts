import type { RegistryError } from './registry-error.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatRegistryError(error: RegistryError): string {
  switch (error._tag) {
    case 'DuplicateGlobalAssignment':
    case 'DuplicateGroupAssignment':
    case 'RedundantGlobalAssignment':
    case 'ScopeAlreadyAssigned':
      return `${error._tag}: ${error.message}`;

    case 'ServiceNotRegistered':
      return `${error.message} anywhere in the fallback chain`;

    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    default:
      return assertNever(error);
  }
}
