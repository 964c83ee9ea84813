import type { RegistryContext } from './context.js';
import type { RegistryNode } from './registry-node.js';
import type { RegistryBootstrapper } from './bootstrapper.js';
import { GlobalRegistryBootstrapper } from './bootstrapper.js';

/**
 * Fallback chain resolution.
 *
 * Order, most specific first:
 *   1. nearest registry on an ancestor member
 *   2. the registry governing the member's group (bootstrapped on demand)
 *   3. the global registry (bootstrapped or created on demand)
 *
 * `nextInChain` starts one level above the failing node; `closestRegistry` starts at
 * the member itself. Collapsing the two changes which node answers first.
 */

/** Nearest registry attached to `member` or one of its ancestors. */
export function closestAttached<M>(member: M | null, context: RegistryContext<M>): RegistryNode<M> | null {
  const { hierarchy } = context;
  for (let current = member; current !== null; current = hierarchy.parentOf(current)) {
    const registry = hierarchy.registryOn(current);
    if (registry) return registry;
  }
  return null;
}

/** Next broader node after `node` missed a lookup; `null` once the global has missed. */
export function nextInChain<M>(node: RegistryNode<M>, context: RegistryContext<M>): RegistryNode<M> | null {
  if (context.index.global === node) return null;

  const parent = context.hierarchy.parentOf(node.member);
  return (
    closestAttached(parent, context) ??
    registryForGroupOf(node.member, context, node) ??
    globalRegistry(context)
  );
}

/** Registry for an arbitrary member: its own ancestors (itself included), then group, then global. */
export function closestRegistry<M>(member: M, context: RegistryContext<M>): RegistryNode<M> {
  return closestAttached(member, context) ?? registryForGroupOf(member, context, null) ?? globalRegistry(context);
}

/**
 * Registry governing the group of `member`, or `null` when the group has none and no
 * pending bootstrapper declares one. `exclude` is never returned.
 */
export function registryForGroupOf<M>(
  member: M,
  context: RegistryContext<M>,
  exclude: RegistryNode<M> | null
): RegistryNode<M> | null {
  const { index, hierarchy, bootstrappers, logger } = context;
  const group = hierarchy.groupOf(member);

  const registered = index.registryForGroup(group);
  if (registered && registered !== exclude) return registered;

  const bootstrapper = bootstrappers.findGroupBootstrapper(group, exclude, index.scratch);
  if (!bootstrapper) return null;

  logger.debug({ group, registry: bootstrapper.registry.id }, 'Bootstrapping group registry on demand');
  activateOnDemand(bootstrapper, context);
  return bootstrapper.registry;
}

/**
 * The global registry, bootstrapped or created if the forest has none yet. A pending
 * bootstrapper that fails to claim the slot is passed over and a global is spawned.
 */
export function globalRegistry<M>(context: RegistryContext<M>): RegistryNode<M> {
  const { index, hierarchy, bootstrappers, logger, options } = context;

  const current = index.global;
  if (current) return current;

  const pending = bootstrappers.findGlobalBootstrapper();
  if (pending) {
    logger.debug({ registry: pending.registry.id }, 'Bootstrapping global registry on demand');
    activateOnDemand(pending, context);
    if (index.global) return index.global;
  }

  const member = hierarchy.spawnMember(options.globalMemberName);
  const registry = context.createRegistry(member);
  const bootstrapper = new GlobalRegistryBootstrapper(registry, options.persistGlobal);
  hierarchy.attachBootstrapper(member, bootstrapper);

  logger.debug({ registry: registry.id, name: options.globalMemberName }, 'Creating global registry');
  activateOnDemand(bootstrapper, context);
  return index.global ?? registry;
}

function activateOnDemand<M>(bootstrapper: RegistryBootstrapper<M>, context: RegistryContext<M>): void {
  const activation = bootstrapper.activate();
  if (activation.isErr()) {
    // Already logged by the node; the bootstrapped node still answers as unscoped.
    context.logger.debug(
      { registry: bootstrapper.registry.id, tag: activation.error._tag },
      'On-demand bootstrap did not claim a scope'
    );
  }
}
