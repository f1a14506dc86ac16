/**
 * Global test setup. Runs before every test file in gateway.
 *
 * Silences getLog so route and receiver tests stay quiet.
 *
 * IMPORTANT: Tests that need to ASSERT on log method calls (e.g.,
 * `expect(mockLog.error).toHaveBeenCalledWith(...)`) should declare
 * their own `vi.mock` for the log module; the local mock will
 * override this global one for that file.
 */

import { vi } from 'vitest';

vi.mock('./services/log.js', () => ({
  getLog: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));
