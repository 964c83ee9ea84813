import 'reflect-metadata';
import { container, instanceCachingFactory, type DependencyContainer } from 'tsyringe';
import { DI } from './tokens.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import { formatRegistryError } from '../errors/formatter.js';
import type { ConfigInvalidError } from '../errors/registry-error.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import type { ILoggerFactory } from '../core/logging/types.js';
import type { HierarchyPort } from '../ports/hierarchy.port.js';
import type { BootstrapFinder } from '../ports/bootstrap-finder.port.js';
import { HierarchyBootstrapFinder } from '../infrastructure/hierarchy/hierarchy-bootstrap-finder.js';
import { ScopeIndex } from '../registry/scope-index.js';
import { ServiceLocator } from '../registry/service-locator.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

export interface ContainerInitOptions<M> {
  readonly hierarchy: HierarchyPort<M>;
  /** Skips environment parsing; tests pass a config built with `createValidatedConfig`. */
  readonly config?: ValidatedConfig;
  readonly env?: Record<string, string | undefined>;
}

export class ContainerConfigError extends Error {
  readonly code = 'CONTAINER_CONFIG_INVALID';

  constructor(readonly detail: ConfigInvalidError) {
    super(formatRegistryError(detail));
    this.name = 'ContainerConfigError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig<M>(options: ContainerInitOptions<M>): ValidatedConfig {
  if (options.config) {
    container.register<ValidatedConfig>(DI.Config.App, { useValue: options.config });
    return options.config;
  }

  const configResult = loadConfig({ env: options.env ?? process.env });
  if (configResult.isErr()) {
    throw new ContainerConfigError(configResult.error);
  }

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  return configResult.value;
}

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRY REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerRegistry<M>(options: ContainerInitOptions<M>): void {
  container.register(DI.Logging.Factory, {
    useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
  });

  container.register<HierarchyPort<M>>(DI.Registry.Hierarchy, { useValue: options.hierarchy });

  container.register(DI.Registry.BootstrapFinder, {
    useFactory: instanceCachingFactory<BootstrapFinder<M>>(
      (c) => new HierarchyBootstrapFinder(c.resolve<HierarchyPort<M>>(DI.Registry.Hierarchy))
    ),
  });

  container.register(DI.Registry.ScopeIndex, {
    useFactory: instanceCachingFactory<ScopeIndex<M>>(() => new ScopeIndex<M>()),
  });

  container.register(DI.Registry.Locator, {
    useFactory: instanceCachingFactory<ServiceLocator<M>>((c: DependencyContainer) => {
      const config = c.resolve<ValidatedConfig>(DI.Config.App);
      return new ServiceLocator<M>({
        hierarchy: c.resolve<HierarchyPort<M>>(DI.Registry.Hierarchy),
        bootstrappers: c.resolve<BootstrapFinder<M>>(DI.Registry.BootstrapFinder),
        index: c.resolve<ScopeIndex<M>>(DI.Registry.ScopeIndex),
        logger: c.resolve<ILoggerFactory>(DI.Logging.Factory).create('ServiceLocator'),
        options: {
          globalMemberName: config.registry.globalMemberName,
          persistGlobal: config.registry.persistGlobal,
        },
      });
    }),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Composition root. Registers config, logging and the registry forest, then runs the
 * environment start hook once.
 *
 * @throws ContainerConfigError when the environment does not parse
 */
export function initializeContainer<M>(options: ContainerInitOptions<M>): ServiceLocator<M> {
  if (initialized) {
    throw new Error('[DI] Container already initialized; call resetContainer() first');
  }

  registerConfig(options);
  registerRegistry(options);

  const locator = container.resolve<ServiceLocator<M>>(DI.Registry.Locator);
  locator.reset();

  initialized = true;
  return locator;
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export function isInitialized(): boolean {
  return initialized;
}

export { container };
