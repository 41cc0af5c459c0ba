import { vi } from 'vitest';
import { closeDb, resetDb } from '../db/connection.js';

/** Fresh in-memory note store. Call from beforeEach() so every test starts empty. */
export function setupTestDb(): void {
  resetDb(':memory:');
}

export function teardownTestDb(): void {
  closeDb();
}

/**
 * Swallow stderr diagnostics for the rest of the test. Undone by
 * vi.restoreAllMocks().
 */
export function silenceLogs(): void {
  vi.spyOn(console, 'error').mockImplementation(() => {});
}
