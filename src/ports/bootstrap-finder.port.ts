import type { GroupId } from '../registry/scope.js';
import type { RegistryNode } from '../registry/registry-node.js';
import type { RegistryBootstrapper } from '../registry/bootstrapper.js';

/**
 * Port: discovery of bootstrappers that have not been activated yet.
 *
 * Lookups that reach a group (or the global scope) with no registered node ask this
 * port for a pending bootstrapper and activate it on demand.
 */
export interface BootstrapFinder<M> {
  /**
   * Pending group bootstrapper among the top-level members of `group`, skipping the
   * one whose registry is `exclude`. `scratch` is a reusable buffer owned by the
   * caller's ScopeIndex.
   */
  findGroupBootstrapper(
    group: GroupId,
    exclude: RegistryNode<M> | null,
    scratch: M[]
  ): RegistryBootstrapper<M> | null;

  findGlobalBootstrapper(): RegistryBootstrapper<M> | null;
}
