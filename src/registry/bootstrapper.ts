import { ok, type Result } from 'neverthrow';
import type { RegistryNode } from './registry-node.js';
import type { ScopeAssignmentError } from '../errors/registry-error.js';

export type BootstrapperKind = 'global' | 'group';

/**
 * Placeholder attached to a host member that configures the registry node on that
 * member the first time it is activated. Hosts activate bootstrappers on start-up;
 * lookups activate pending ones on demand.
 */
export abstract class RegistryBootstrapper<M> {
  abstract readonly kind: BootstrapperKind;
  private hasActivated = false;

  constructor(readonly registry: RegistryNode<M>) {}

  get activated(): boolean {
    return this.hasActivated;
  }

  /** Runs once; later calls succeed without doing anything. */
  activate(): Result<void, ScopeAssignmentError> {
    if (this.hasActivated) return ok(undefined);
    this.hasActivated = true;
    return this.configure();
  }

  protected abstract configure(): Result<void, ScopeAssignmentError>;
}

export class GlobalRegistryBootstrapper<M> extends RegistryBootstrapper<M> {
  readonly kind = 'global';

  constructor(registry: RegistryNode<M>, private readonly persistAcrossTransitions = true) {
    super(registry);
  }

  protected configure(): Result<void, ScopeAssignmentError> {
    return this.registry.assignGlobalScope(this.persistAcrossTransitions);
  }
}

export class GroupRegistryBootstrapper<M> extends RegistryBootstrapper<M> {
  readonly kind = 'group';

  protected configure(): Result<void, ScopeAssignmentError> {
    return this.registry.assignGroupScope(this.registry.group);
  }
}
