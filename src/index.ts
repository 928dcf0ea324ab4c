import 'reflect-metadata';

// Errors
export * from './errors/index.js';

// Runtime
export { ErrorRegister } from './core/error-register.js';
export type { LibraryContext, LibraryContextDeps } from './core/library-context.js';
export { createLibraryContext } from './core/library-context.js';
export type { Capacity } from './runtime/brand.js';
export type { AllocationHandle, AllocationPurpose, AllocatorPort } from './ports/allocator.port.js';
export { HeapAllocator } from './adapters/heap-allocator.js';

// Collections and hooks
export * from './collections/index.js';
export * from './hooks/index.js';

// Boundary functions
export * from './leaf/index.js';

// Configuration, logging, composition root
export type { AppConfig, ValidatedConfig, LoadConfigOptions, HeapLimitBytes } from './config/app-config.js';
export { loadConfig, createValidatedConfig } from './config/app-config.js';
export type { Logger, ILoggerFactory, LogLevel } from './core/logging/index.js';
export { PinoLoggerFactory, getBootstrapLogger, createBootstrapLogger } from './core/logging/index.js';
export { DI } from './di/tokens.js';
export { initializeContainer, createContext, resetContainer, isInitialized } from './di/container.js';
