import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import { err, ok, type Result } from 'neverthrow';
import { DI } from './tokens.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { ConfigInvalidError } from '../errors/app-error.js';
import { formatAppError } from '../errors/formatter.js';
import type { ILoggerFactory } from '../core/logging/types.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';
import type { AllocatorPort } from '../ports/allocator.port.js';
import { HeapAllocator } from '../adapters/heap-allocator.js';
import { ErrorRegister } from '../core/error-register.js';
import type { LibraryContext } from '../core/library-context.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

export interface ContainerInitOptions {
  /** Defaults to process.env. */
  readonly env?: Record<string, string | undefined>;
}

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(env: Record<string, string | undefined>): Result<void, ConfigInvalidError> {
  // Tests may inject config before initialization; never overwrite it.
  if (container.isRegistered(DI.Config.App)) return ok(undefined);

  const configResult = loadConfig({ env });
  if (configResult.isErr()) {
    createBootstrapLogger('container').error(formatAppError(configResult.error));
    return err(configResult.error);
  }

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  return ok(undefined);
}

function registerServices(): void {
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
    });
  }

  if (!container.isRegistered(DI.Runtime.Allocator)) {
    container.register<AllocatorPort>(DI.Runtime.Allocator, {
      useFactory: instanceCachingFactory((c) => {
        const config = c.resolve<ValidatedConfig>(DI.Config.App);
        return new HeapAllocator(config.heap.limitBytes);
      }),
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

export function initializeContainer(options: ContainerInitOptions = {}): Result<void, ConfigInvalidError> {
  if (initialized) return ok(undefined);

  const configResult = registerConfig(options.env ?? process.env);
  if (configResult.isErr()) return configResult;

  registerServices();
  initialized = true;
  createBootstrapLogger('container').debug('container initialized');
  return ok(undefined);
}

export function isInitialized(): boolean {
  return initialized;
}

/**
 * Fresh context from the container: a new register every call, the shared
 * allocator and logger factory.
 */
export function createContext(component = 'ownkit'): Result<LibraryContext, ConfigInvalidError> {
  const init = initializeContainer();
  if (init.isErr()) return err(init.error);

  const loggers = container.resolve<ILoggerFactory>(DI.Logging.Factory);
  return ok({
    register: new ErrorRegister(),
    allocator: container.resolve<AllocatorPort>(DI.Runtime.Allocator),
    logger: loggers.create(component),
  });
}

/**
 * Clear all registrations (tests).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export { container };
