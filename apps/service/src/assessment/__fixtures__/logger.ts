import { vi } from 'vitest';

import type { SitelineLogger } from '../../logger.js';

export const createStubLogger = () => ({
  debug: vi.fn<SitelineLogger['debug']>(),
  info: vi.fn<SitelineLogger['info']>(),
  warn: vi.fn<SitelineLogger['warn']>(),
  error: vi.fn<SitelineLogger['error']>()
});
