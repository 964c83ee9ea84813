import type { HierarchyPort } from '../../ports/hierarchy.port.js';
import { asGroupId, type GroupId } from '../../registry/scope.js';
import type { RegistryNode } from '../../registry/registry-node.js';
import type { RegistryBootstrapper } from '../../registry/bootstrapper.js';

/** Group that members marked persistent move to; never unloaded by a transition. */
export const PERSISTENT_GROUP: GroupId = asGroupId('PersistentAcrossTransitions');

export const DEFAULT_GROUP_NAME = 'Main';

/**
 * A member of the in-memory host tree. Fields are maintained by `InMemoryHierarchy`;
 * treat them as read-only outside of it.
 */
export class HostMember {
  readonly children: HostMember[] = [];
  registry: RegistryNode<HostMember> | null = null;
  bootstrapper: RegistryBootstrapper<HostMember> | null = null;
  destroyed = false;

  constructor(
    readonly id: number,
    readonly name: string,
    public group: GroupId,
    public parent: HostMember | null
  ) {}
}

export interface CreateMemberOptions {
  readonly parent?: HostMember;
  /** Group for a top-level member; loaded if needed. Ignored when `parent` is given. */
  readonly group?: string;
}

/**
 * In-process host tree: named groups of member trees, additive group loading, and
 * single-group transitions that destroy everything not marked persistent.
 *
 * Destroying a member destroys its subtree first and notifies any attached registry.
 */
export class InMemoryHierarchy implements HierarchyPort<HostMember> {
  private readonly roots = new Map<GroupId, HostMember[]>();
  private activeGroup: GroupId;
  private nextMemberId = 1;

  constructor(initialGroup: string = DEFAULT_GROUP_NAME) {
    this.roots.set(PERSISTENT_GROUP, []);
    this.activeGroup = this.loadGroup(initialGroup);
  }

  get active(): GroupId {
    return this.activeGroup;
  }

  loadedGroups(): GroupId[] {
    return [...this.roots.keys()];
  }

  /** Loads `name` alongside the groups already loaded. */
  loadGroup(name: string): GroupId {
    const group = asGroupId(name);
    if (!this.roots.has(group)) this.roots.set(group, []);
    return group;
  }

  /** Unloads every group except the persistent one, then loads and activates `name`. */
  transitionTo(name: string): GroupId {
    for (const group of [...this.roots.keys()]) {
      if (group !== PERSISTENT_GROUP) this.unloadGroup(group);
    }
    this.activeGroup = this.loadGroup(name);
    return this.activeGroup;
  }

  unloadGroup(group: GroupId): void {
    if (group === PERSISTENT_GROUP) return;
    for (const root of [...this.rootsOf(group)]) {
      this.destroy(root);
    }
    this.roots.delete(group);
  }

  createMember(name: string, options: CreateMemberOptions = {}): HostMember {
    const { parent } = options;

    if (parent) {
      if (parent.destroyed) throw new Error(`Cannot parent "${name}" under destroyed member "${parent.name}"`);
      const member = new HostMember(this.nextMemberId++, name, parent.group, parent);
      parent.children.push(member);
      return member;
    }

    const group = options.group === undefined ? this.activeGroup : this.loadGroup(options.group);
    const member = new HostMember(this.nextMemberId++, name, group, null);
    this.rootsOf(group).push(member);
    return member;
  }

  destroy(member: HostMember): void {
    if (member.destroyed) return;

    for (const child of [...member.children]) {
      this.destroy(child);
    }

    member.destroyed = true;
    this.detach(member);
    member.registry?.onDestroyed();
  }

  membersOf(group: GroupId): HostMember[] {
    const out: HostMember[] = [];
    for (const root of this.roots.get(group) ?? []) {
      collectSubtree(root, out);
    }
    return out;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // HierarchyPort
  // ═══════════════════════════════════════════════════════════════════════════

  parentOf(member: HostMember): HostMember | null {
    return member.parent;
  }

  groupOf(member: HostMember): GroupId {
    return member.group;
  }

  registryOn(member: HostMember): RegistryNode<HostMember> | null {
    return member.registry;
  }

  bootstrapperOn(member: HostMember): RegistryBootstrapper<HostMember> | null {
    return member.bootstrapper;
  }

  collectRootMembers(group: GroupId, into: HostMember[]): void {
    const roots = this.roots.get(group);
    if (roots) into.push(...roots);
  }

  findMember(predicate: (member: HostMember) => boolean): HostMember | null {
    for (const group of this.roots.keys()) {
      for (const member of this.membersOf(group)) {
        if (predicate(member)) return member;
      }
    }
    return null;
  }

  spawnMember(name: string): HostMember {
    return this.createMember(name);
  }

  attachRegistry(member: HostMember, registry: RegistryNode<HostMember>): void {
    if (member.registry && member.registry !== registry) {
      throw new Error(`Member "${member.name}" already carries registry #${member.registry.id}`);
    }
    member.registry = registry;
  }

  attachBootstrapper(member: HostMember, bootstrapper: RegistryBootstrapper<HostMember>): void {
    if (member.bootstrapper && member.bootstrapper !== bootstrapper) {
      throw new Error(`Member "${member.name}" already carries a ${member.bootstrapper.kind} bootstrapper`);
    }
    member.bootstrapper = bootstrapper;
  }

  /** Persistence applies to whole trees: the member's root moves to the persistent group. */
  persistAcrossTransitions(member: HostMember): void {
    const root = rootOf(member);
    if (root.group === PERSISTENT_GROUP) return;

    this.detach(root);
    setGroup(root, PERSISTENT_GROUP);
    this.rootsOf(PERSISTENT_GROUP).push(root);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Internal
  // ═══════════════════════════════════════════════════════════════════════════

  private rootsOf(group: GroupId): HostMember[] {
    let roots = this.roots.get(group);
    if (!roots) {
      roots = [];
      this.roots.set(group, roots);
    }
    return roots;
  }

  private detach(member: HostMember): void {
    const siblings = member.parent ? member.parent.children : this.roots.get(member.group);
    if (!siblings) return;
    const index = siblings.indexOf(member);
    if (index >= 0) siblings.splice(index, 1);
  }
}

function rootOf(member: HostMember): HostMember {
  let current = member;
  while (current.parent) current = current.parent;
  return current;
}

function setGroup(member: HostMember, group: GroupId): void {
  member.group = group;
  for (const child of member.children) setGroup(child, group);
}

function collectSubtree(member: HostMember, out: HostMember[]): void {
  out.push(member);
  for (const child of member.children) collectSubtree(child, out);
}
