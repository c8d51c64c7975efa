/**
 * Vitest Setup File
 *
 * Global test setup and mocks.
 */

import { vi } from 'vitest';

// Mock environment variables for tests
process.env.OPENAI_API_KEY = 'test-key';
process.env.LOG_LEVEL = 'silent';

// Keep test output clean; comment out when debugging tests
vi.spyOn(console, 'warn').mockImplementation(() => {});
vi.spyOn(console, 'log').mockImplementation(() => {});
