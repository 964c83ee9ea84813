import { InMemoryHierarchy, type HostMember } from '../../src/infrastructure/hierarchy/in-memory-hierarchy.js';
import { HierarchyBootstrapFinder } from '../../src/infrastructure/hierarchy/hierarchy-bootstrap-finder.js';
import { ServiceLocator, DEFAULT_REGISTRY_OPTIONS } from '../../src/registry/service-locator.js';
import { ScopeIndex } from '../../src/registry/scope-index.js';
import { RegistryNode } from '../../src/registry/registry-node.js';
import type { RegistryContext, RegistryOptions } from '../../src/registry/context.js';
import { RecordingBootstrapFinder } from '../fakes/recording-bootstrap-finder.js';
import { CapturingLogger } from './capturing-logger.js';

export interface FixtureOptions {
  readonly group?: string;
  readonly registry?: Partial<RegistryOptions>;
}

/** Locator over a fresh in-memory hierarchy, logging into memory. */
export function createLocatorFixture(options: FixtureOptions = {}) {
  const hierarchy = new InMemoryHierarchy(options.group);
  const logs = new CapturingLogger();
  const locator = new ServiceLocator<HostMember>({ hierarchy, logger: logs.logger, options: options.registry });
  return { hierarchy, logs, locator };
}

/**
 * Bare resolution context, no facade: what the algorithm sees. The finder records
 * every search it is asked to make.
 */
export function createContextFixture(options: FixtureOptions = {}) {
  const hierarchy = new InMemoryHierarchy(options.group);
  const logs = new CapturingLogger();
  const finder = new RecordingBootstrapFinder(new HierarchyBootstrapFinder(hierarchy));

  const context: RegistryContext<HostMember> = {
    index: new ScopeIndex<HostMember>(),
    hierarchy,
    bootstrappers: finder,
    logger: logs.logger,
    options: { ...DEFAULT_REGISTRY_OPTIONS, ...options.registry },
    createRegistry: (member) => attach(member),
  };

  function attach(member: HostMember): RegistryNode<HostMember> {
    const registry = new RegistryNode(member, context);
    hierarchy.attachRegistry(member, registry);
    return registry;
  }

  return { hierarchy, logs, finder, context, attach };
}
