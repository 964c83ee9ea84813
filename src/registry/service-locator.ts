import type { Logger } from '../core/logging/types.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';
import type { HierarchyPort } from '../ports/hierarchy.port.js';
import type { BootstrapFinder } from '../ports/bootstrap-finder.port.js';
import { HierarchyBootstrapFinder } from '../infrastructure/hierarchy/hierarchy-bootstrap-finder.js';
import { DEFAULT_GLOBAL_MEMBER_NAME } from '../config/app-config.js';
import type { RegistryContext, RegistryOptions } from './context.js';
import { ScopeIndex } from './scope-index.js';
import { RegistryNode } from './registry-node.js';
import { GlobalRegistryBootstrapper, GroupRegistryBootstrapper } from './bootstrapper.js';
import { closestRegistry, globalRegistry, registryForGroupOf } from './resolution.js';

export interface ServiceLocatorDeps<M> {
  readonly hierarchy: HierarchyPort<M>;
  /** Defaults to scanning `hierarchy`. */
  readonly bootstrappers?: BootstrapFinder<M>;
  /** Defaults to a fresh index. */
  readonly index?: ScopeIndex<M>;
  readonly logger?: Logger;
  readonly options?: Partial<RegistryOptions>;
}

export const DEFAULT_REGISTRY_OPTIONS: RegistryOptions = {
  globalMemberName: DEFAULT_GLOBAL_MEMBER_NAME,
  persistGlobal: true,
};

/**
 * Entry point for one registry forest.
 *
 * USAGE:
 * ```typescript
 * const locator = new ServiceLocator({ hierarchy });
 * locator.global().register(AudioService, new AudioService());
 * locator.forGroupOf(levelRoot).register(LevelClock, clock);
 *
 * // from anywhere in the tree
 * const audio = locator.for(enemy).get(AudioService);
 * ```
 */
export class ServiceLocator<M> {
  private readonly context: RegistryContext<M>;

  constructor(deps: ServiceLocatorDeps<M>) {
    const { hierarchy } = deps;
    this.context = {
      index: deps.index ?? new ScopeIndex<M>(),
      hierarchy,
      bootstrappers: deps.bootstrappers ?? new HierarchyBootstrapFinder(hierarchy),
      logger: deps.logger ?? createBootstrapLogger('ServiceLocator'),
      options: { ...DEFAULT_REGISTRY_OPTIONS, ...deps.options },
      createRegistry: (member) => this.attach(member),
    };
  }

  get index(): ScopeIndex<M> {
    return this.context.index;
  }

  /** Global registry; bootstrapped or created on first use. */
  global(): RegistryNode<M> {
    return globalRegistry(this.context);
  }

  /** Registry governing the group `member` belongs to, else the global one. */
  forGroupOf(member: M): RegistryNode<M> {
    return registryForGroupOf(member, this.context, null) ?? globalRegistry(this.context);
  }

  /** Closest registry to `member`: its own ancestors first, then its group, then global. */
  for(member: M): RegistryNode<M> {
    return closestRegistry(member, this.context);
  }

  /** Attaches an unscoped registry to `member`, or returns the one it already carries. */
  attach(member: M): RegistryNode<M> {
    const { hierarchy } = this.context;
    const existing = hierarchy.registryOn(member);
    if (existing) return existing;

    const registry = new RegistryNode(member, this.context);
    hierarchy.attachRegistry(member, registry);
    return registry;
  }

  /** Declares `member` as the home of the global registry. Activation is left to the host or to lookups. */
  attachGlobalBootstrapper(
    member: M,
    persistAcrossTransitions: boolean = this.context.options.persistGlobal
  ): GlobalRegistryBootstrapper<M> {
    const bootstrapper = new GlobalRegistryBootstrapper(this.attach(member), persistAcrossTransitions);
    this.context.hierarchy.attachBootstrapper(member, bootstrapper);
    return bootstrapper;
  }

  /** Declares `member` as the home of its group's registry. */
  attachGroupBootstrapper(member: M): GroupRegistryBootstrapper<M> {
    const bootstrapper = new GroupRegistryBootstrapper(this.attach(member));
    this.context.hierarchy.attachBootstrapper(member, bootstrapper);
    return bootstrapper;
  }

  /**
   * Environment start hook: forgets the global and every group mapping. Nodes that held
   * a slot keep their scope tag, so a former global cannot claim global scope again.
   */
  reset(): void {
    this.context.index.reset();
    this.context.logger.debug('Scope index reset');
  }
}
