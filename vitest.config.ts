import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000,
    hookTimeout: 30000,
    env: {
      NODE_ENV: 'test',
      SUPABASE_JWT_SECRET: 'test-secret-test-secret-test-secret-0000',
      PUBLIC_BASE_URL: 'http://localhost:3000',
      BOTANICAL_CSV_PATH: './data/botanical-classes.csv',
    },
  },
});
