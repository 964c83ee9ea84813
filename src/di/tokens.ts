/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens, grouped by concern.
 */
export const DI = {
  Config: {
    /** Validated application configuration */
    App: Symbol('Config.App'),
  },

  Logging: {
    /** ILoggerFactory */
    Factory: Symbol('Logging.Factory'),
  },

  Registry: {
    /** HierarchyPort supplied by the host */
    Hierarchy: Symbol('Registry.Hierarchy'),
    /** BootstrapFinder over the host hierarchy */
    BootstrapFinder: Symbol('Registry.BootstrapFinder'),
    /** ScopeIndex for the forest */
    ScopeIndex: Symbol('Registry.ScopeIndex'),
    /** ServiceLocator facade */
    Locator: Symbol('Registry.Locator'),
  },
} as const;
