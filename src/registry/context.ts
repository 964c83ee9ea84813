import type { Logger } from '../core/logging/types.js';
import type { HierarchyPort } from '../ports/hierarchy.port.js';
import type { BootstrapFinder } from '../ports/bootstrap-finder.port.js';
import type { ScopeIndex } from './scope-index.js';
import type { RegistryNode } from './registry-node.js';

export interface RegistryOptions {
  /** Name of the member spawned when a lookup needs a global registry and none exists. */
  readonly globalMemberName: string;
  /** Whether that spawned global survives group transitions. */
  readonly persistGlobal: boolean;
}

/**
 * Everything a registry node needs to take part in resolution. One context per
 * forest; nodes never reach for process-wide statics.
 */
export interface RegistryContext<M> {
  readonly index: ScopeIndex<M>;
  readonly hierarchy: HierarchyPort<M>;
  readonly bootstrappers: BootstrapFinder<M>;
  readonly logger: Logger;
  readonly options: RegistryOptions;

  /** Creates an unscoped registry node and attaches it to `member`. */
  createRegistry(member: M): RegistryNode<M>;
}
