import type { BootstrapFinder } from '../../ports/bootstrap-finder.port.js';
import type { HierarchyPort } from '../../ports/hierarchy.port.js';
import type { GroupId } from '../../registry/scope.js';
import type { RegistryNode } from '../../registry/registry-node.js';
import type { RegistryBootstrapper } from '../../registry/bootstrapper.js';

/**
 * BootstrapFinder that scans the host tree through its HierarchyPort.
 *
 * Group search only looks at top-level members of the group; global search looks
 * at every member the host knows about.
 */
export class HierarchyBootstrapFinder<M> implements BootstrapFinder<M> {
  constructor(private readonly hierarchy: HierarchyPort<M>) {}

  findGroupBootstrapper(
    group: GroupId,
    exclude: RegistryNode<M> | null,
    scratch: M[]
  ): RegistryBootstrapper<M> | null {
    scratch.length = 0;
    this.hierarchy.collectRootMembers(group, scratch);

    for (const member of scratch) {
      const bootstrapper = this.hierarchy.bootstrapperOn(member);
      if (isPending(bootstrapper, 'group') && bootstrapper.registry !== exclude) {
        return bootstrapper;
      }
    }
    return null;
  }

  findGlobalBootstrapper(): RegistryBootstrapper<M> | null {
    const member = this.hierarchy.findMember((m) => isPending(this.hierarchy.bootstrapperOn(m), 'global'));
    return member === null ? null : this.hierarchy.bootstrapperOn(member);
  }
}

function isPending<M>(
  bootstrapper: RegistryBootstrapper<M> | null,
  kind: RegistryBootstrapper<M>['kind']
): bootstrapper is RegistryBootstrapper<M> {
  return bootstrapper !== null && bootstrapper.kind === kind && !bootstrapper.activated;
}
