/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized hierarchically by domain, not by type.
 */
export const DI = {
  Config: {
    /** Validated library configuration */
    App: Symbol('Config.App'),
  },

  Logging: {
    /** Logger factory (component child loggers) */
    Factory: Symbol('Logging.Factory'),
  },

  Runtime: {
    /** Shared allocator; one heap budget per container */
    Allocator: Symbol('Runtime.Allocator'),
  },
} as const;
