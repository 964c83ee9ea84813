import { ok, err, type Result } from 'neverthrow';
import type { Logger } from '../core/logging/types.js';
import type { RegistryContext } from './context.js';
import { UNSCOPED, type GroupId, type ScopeTag } from './scope.js';
import { ServiceTable } from './service-table.js';
import { matchesServiceType, serviceTypeName, type ServiceType } from './service-type.js';
import { globalRegistry, nextInChain } from './resolution.js';
import { Err } from '../errors/factories.js';
import { severityOf, type ScopeAssignmentError, type ServiceNotRegistered } from '../errors/registry-error.js';
import { formatRegistryError } from '../errors/formatter.js';
import { ServiceNotRegisteredError } from '../errors/service-not-registered-error.js';

/**
 * One registry in the forest, attached to a host member.
 *
 * Lookups check the node's own table, then delegate to the next broader node
 * (`nextInChain`) until a match is found or the global node also misses.
 *
 * Scope is assigned at most once. A failed assignment is logged and returned as an
 * error; the node stays usable as an unscoped registry.
 */
export class RegistryNode<M> {
  readonly id: number;
  private readonly services = new ServiceTable();
  private readonly logger: Logger;
  private scopeTag: ScopeTag = UNSCOPED;
  private destroyed = false;

  constructor(
    readonly member: M,
    private readonly context: RegistryContext<M>
  ) {
    this.id = context.index.allocateRegistryId();
    this.logger = context.logger.child({ registry: this.id });
  }

  get scope(): ScopeTag {
    return this.scopeTag;
  }

  /** Group of the member this node is attached to (not necessarily a group this node governs). */
  get group(): GroupId {
    return this.context.hierarchy.groupOf(this.member);
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  get isGlobal(): boolean {
    return this.context.index.global === this;
  }

  /** Names of the service types registered directly on this node. */
  registeredTypes(): string[] {
    return this.services.typeNames();
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // REGISTRATION
  // ═══════════════════════════════════════════════════════════════════════════

  register<T>(type: ServiceType<T>, instance: T): this;
  register(instance: object): this;
  register(...args: [ServiceType<unknown>, unknown] | [object]): this {
    if (args.length === 2) {
      const [type, instance] = args;
      if (!matchesServiceType(type, instance)) {
        this.logger.warn(
          { service: serviceTypeName(type) },
          'Registered instance does not match its service type; lookups will skip it'
        );
      }
      this.services.register(type, instance);
    } else {
      this.services.registerOwn(args[0]);
    }
    return this;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // LOOKUP
  // ═══════════════════════════════════════════════════════════════════════════

  /** Absence anywhere in the chain is a normal outcome: `undefined`. */
  tryGet<T>(type: ServiceType<T>): T | undefined {
    return this.tryGetFrom(type, new Set());
  }

  resolve<T>(type: ServiceType<T>): Result<T, ServiceNotRegistered> {
    const service = this.tryGet(type);
    return service === undefined ? err(Err.serviceNotRegistered(serviceTypeName(type))) : ok(service);
  }

  /** @throws ServiceNotRegisteredError when no node in the chain has `type` */
  get<T>(type: ServiceType<T>): T {
    const service = this.tryGet(type);
    if (service === undefined) {
      throw ServiceNotRegisteredError.forType(serviceTypeName(type));
    }
    return service;
  }

  /**
   * Chainable form of `get`:
   * ```typescript
   * registry.use(Audio, (a) => (audio = a)).use(Input, (i) => (input = i));
   * ```
   * @throws ServiceNotRegisteredError when no node in the chain has `type`
   */
  use<T>(type: ServiceType<T>, consumer: (service: T) => void): this {
    consumer(this.get(type));
    return this;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // SCOPE ASSIGNMENT
  // ═══════════════════════════════════════════════════════════════════════════

  assignGlobalScope(persistAcrossTransitions: boolean): Result<void, ScopeAssignmentError> {
    const { index, hierarchy } = this.context;
    const current = index.global;

    if (current === this) return this.report(Err.redundantGlobalAssignment(this.id));
    if (current !== null) return this.report(Err.duplicateGlobalAssignment(this.id, current.id));
    if (this.scopeTag.kind !== 'unscoped') {
      return this.report(Err.scopeAlreadyAssigned(this.id, this.scopeTag.kind, 'global'));
    }

    index.claimGlobal(this);
    this.scopeTag = { kind: 'global', persistent: persistAcrossTransitions };
    if (persistAcrossTransitions) hierarchy.persistAcrossTransitions(this.member);

    this.logger.debug({ persistent: persistAcrossTransitions }, 'Configured as global registry');
    return ok(undefined);
  }

  assignGroupScope(group: GroupId): Result<void, ScopeAssignmentError> {
    const { index } = this.context;
    const current = index.registryForGroup(group);

    if (current !== null) return this.report(Err.duplicateGroupAssignment(this.id, group, current.id));
    if (this.scopeTag.kind !== 'unscoped') {
      return this.report(Err.scopeAlreadyAssigned(this.id, this.scopeTag.kind, 'group'));
    }

    index.claimGroup(group, this);
    this.scopeTag = { kind: 'group', group };

    this.logger.debug({ group }, 'Configured as group registry');
    return ok(undefined);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════════════════

  /** Called by the host when the member carrying this node is destroyed. */
  onDestroyed(): void {
    if (this.destroyed) return;
    this.destroyed = true;

    const released = this.context.index.release(this);
    this.services.clear();
    this.logger.debug({ released: released.kind }, 'Registry destroyed');
  }

  /**
   * A group node parented under an unscoped one would otherwise hand the lookup back
   * and forth; a node already visited in this lookup is skipped in favour of the global.
   */
  private tryGetFrom<T>(type: ServiceType<T>, visited: Set<RegistryNode<M>>): T | undefined {
    const local = this.services.tryGet(type);
    if (local !== undefined) return local;
    visited.add(this);

    let next = nextInChain(this, this.context);
    if (next && visited.has(next)) {
      const global = globalRegistry(this.context);
      next = visited.has(global) ? null : global;
    }
    return next ? next.tryGetFrom(type, visited) : undefined;
  }

  private report(error: ScopeAssignmentError): Result<void, ScopeAssignmentError> {
    this.logger[severityOf(error)]({ tag: error._tag }, formatRegistryError(error));
    return err(error);
  }
}
