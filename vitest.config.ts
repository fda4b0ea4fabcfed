import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    hookTimeout: 10000,
    include: ['tests/unit/**/*.test.ts'],
    // Isolate tests from any local .env and real provider endpoints
    env: {
      LIFEQ_DATA_DIR: './data/test',
      LIFEQ_DB_PATH: ':memory:',
      LIFEQ_EMBEDDING_PROVIDER: 'disabled',
      LIFEQ_LLM_ENABLED: 'false',
      LIFEQ_EMBEDDING_BATCH_DELAY_MS: '0',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        // Entry points are thin wrappers over the engine
        'src/cli.ts',
        'src/index.ts',
        '**/types.ts',
        '**/index.ts',
        // Provider adapters need a running OpenAI-compatible server
        'src/services/llm/client.ts',
      ],
    },
  },
});
