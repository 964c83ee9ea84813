import type { GroupId } from './scope.js';
import type { RegistryNode } from './registry-node.js';

export type ReleasedSlot =
  | { readonly kind: 'global' }
  | { readonly kind: 'group'; readonly group: GroupId }
  | { readonly kind: 'none' };

/**
 * Bookkeeping for one registry forest: the global node, the node governing each
 * group, and a scratch buffer reused while enumerating group root members.
 *
 * References are non-owning; members (and their registry nodes) live and die with the
 * host hierarchy, which reports destruction through `RegistryNode.onDestroyed()`.
 *
 * Single-threaded by contract. `reset()` is the environment start hook.
 */
export class ScopeIndex<M> {
  private globalNode: RegistryNode<M> | null = null;
  private readonly groups = new Map<GroupId, RegistryNode<M>>();
  private readonly scratchBuffer: M[] = [];
  private nextRegistryId = 1;

  get global(): RegistryNode<M> | null {
    return this.globalNode;
  }

  get scratch(): M[] {
    return this.scratchBuffer;
  }

  allocateRegistryId(): number {
    return this.nextRegistryId++;
  }

  claimGlobal(node: RegistryNode<M>): void {
    this.globalNode = node;
  }

  registryForGroup(group: GroupId): RegistryNode<M> | null {
    return this.groups.get(group) ?? null;
  }

  claimGroup(group: GroupId, node: RegistryNode<M>): void {
    this.groups.set(group, node);
  }

  groupEntries(): ReadonlyMap<GroupId, RegistryNode<M>> {
    return new Map(this.groups);
  }

  /** Drops whichever slot `node` occupies. */
  release(node: RegistryNode<M>): ReleasedSlot {
    if (this.globalNode === node) {
      this.globalNode = null;
      return { kind: 'global' };
    }

    for (const [group, registered] of this.groups) {
      if (registered === node) {
        this.groups.delete(group);
        return { kind: 'group', group };
      }
    }

    return { kind: 'none' };
  }

  /** Forgets every slot. Scope tags on the nodes that held them are left as they are. */
  reset(): void {
    this.globalNode = null;
    this.groups.clear();
    this.scratchBuffer.length = 0;
  }
}
