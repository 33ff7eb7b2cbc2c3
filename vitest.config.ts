import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolvePackage = (relativePath: string): string => fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@stratum/contracts': resolvePackage('./packages/contracts/src/index.ts'),
      '@stratum/graph': resolvePackage('./packages/graph/src/index.ts'),
      '@stratum/parser': resolvePackage('./packages/parser/src/index.ts'),
      '@stratum/planner': resolvePackage('./packages/planner/src/index.ts'),
      '@stratum/state': resolvePackage('./packages/state/src/index.ts'),
      '@stratum/orchestrator': resolvePackage('./packages/orchestrator/src/index.ts'),
      '@stratum/provider-sim': resolvePackage('./providers/sim/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.spec.ts', 'providers/*/tests/**/*.spec.ts'],
    environment: 'node',
  },
});
