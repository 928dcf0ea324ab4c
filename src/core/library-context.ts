import type { AllocatorPort } from '../ports/allocator.port.js';
import type { Logger } from './logging/types.js';
import { ErrorRegister } from './error-register.js';
import { HeapAllocator } from '../adapters/heap-allocator.js';
import { createBootstrapLogger } from './logging/bootstrap.js';

/**
 * Execution context threaded through every public operation.
 *
 * Owns its own error register. Two contexts never share a status slot, so
 * independent callers cannot observe each other's outcomes.
 */
export interface LibraryContext {
  readonly register: ErrorRegister;
  readonly allocator: AllocatorPort;
  readonly logger: Logger;
}

export interface LibraryContextDeps {
  readonly register?: ErrorRegister;
  readonly allocator?: AllocatorPort;
  readonly logger?: Logger;
}

/**
 * Build a context without the container.
 * Defaults: fresh register, unbounded heap allocator, bootstrap logger.
 */
export function createLibraryContext(deps: LibraryContextDeps = {}): LibraryContext {
  return {
    register: deps.register ?? new ErrorRegister(),
    allocator: deps.allocator ?? new HeapAllocator(),
    logger: deps.logger ?? createBootstrapLogger('ownkit'),
  };
}
