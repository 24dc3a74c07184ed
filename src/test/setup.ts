import { beforeEach, afterEach, vi } from 'vitest';
import { resetConfigCache } from '../utils/config';
import { clearLoggerContext, resetWarnOnce } from '../utils/logger';

let envSnapshot: NodeJS.ProcessEnv;

beforeEach(() => {
  envSnapshot = { ...process.env };
});

afterEach(() => {
  vi.restoreAllMocks();
  process.env = envSnapshot;
  resetConfigCache();
  resetWarnOnce();
  clearLoggerContext();
});
