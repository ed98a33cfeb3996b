/**
 * Vitest Test Setup
 *
 * Runs before every test file.
 */

import { afterEach, vi } from 'vitest';

// Engine components log through console; keep test output readable unless asked for
if (!process.env.VERBOSE) {
  vi.spyOn(console, 'info').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
}

afterEach(() => {
  vi.useRealTimers();
});

export {};
