import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node'
  },
  resolve: {
    alias: {
      '@siteline/core': resolve(__dirname, '../../packages/core/src/index.ts'),
      '@siteline/fixtures': resolve(__dirname, '../../packages/fixtures/src/index.ts'),
      '@siteline/collaborators': resolve(__dirname, '../../packages/collaborators/src/index.ts')
    }
  }
});
