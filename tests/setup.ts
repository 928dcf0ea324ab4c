/**
 * Vitest setup file
 * Runs before all tests
 */

// Required for tsyringe DI decorators
import 'reflect-metadata';

import { afterAll } from 'vitest';
import { resetContainer } from '../src/di/container.js';

afterAll(() => {
  resetContainer();
});
