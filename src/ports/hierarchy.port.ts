import type { GroupId } from '../registry/scope.js';
import type { RegistryNode } from '../registry/registry-node.js';
import type { RegistryBootstrapper } from '../registry/bootstrapper.js';

/**
 * Port: the host's structural tree, seen from the registry.
 *
 * `M` is the host's member type (a scene object, a DOM node, a plugin instance...).
 * The registry never owns members; it only asks about them and attaches registry
 * nodes and bootstrappers to them.
 *
 * Guarantees expected from implementations:
 * - Synchronous, no I/O
 * - `parentOf` walks towards a group root and terminates
 * - `collectRootMembers` appends to the buffer it is given and allocates nothing else
 * - Destroying a member with an attached registry calls `RegistryNode.onDestroyed()`
 */
export interface HierarchyPort<M> {
  parentOf(member: M): M | null;
  groupOf(member: M): GroupId;

  /** Registry node attached directly to `member`, if any. */
  registryOn(member: M): RegistryNode<M> | null;
  bootstrapperOn(member: M): RegistryBootstrapper<M> | null;

  /** Appends the top-level members of `group` to `into`. */
  collectRootMembers(group: GroupId, into: M[]): void;

  /** First member anywhere in the process for which `predicate` holds. */
  findMember(predicate: (member: M) => boolean): M | null;

  /** Creates a new top-level member to host a registry nobody declared. */
  spawnMember(name: string): M;
  attachRegistry(member: M, registry: RegistryNode<M>): void;
  attachBootstrapper(member: M, bootstrapper: RegistryBootstrapper<M>): void;

  /** Keeps `member` alive across ordinary group transitions. */
  persistAcrossTransitions(member: M): void;
}
