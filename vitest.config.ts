import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration for policy-qa
 *
 * Test tiers controlled by POLICY_QA_TEST_MODE environment variable:
 * - 'unit' (default): Fast tests with faked providers and stores
 * - 'integration': Real Azure OpenAI / Airtable credentials, skip if unavailable
 */
export default defineConfig(() => {
  const mode = process.env.POLICY_QA_TEST_MODE ?? 'unit';
  const excluded: string[] = ['node_modules/**', 'dist/**'];

  if (mode === 'unit') {
    excluded.push('**/*.integration.test.ts');
  }

  return {
    test: {
      globals: false,
      environment: 'node',
      include: ['src/**/*.test.ts'],
      exclude: excluded,
      setupFiles: ['./vitest.setup.ts'],
      testTimeout: mode === 'integration' ? 120000 : 30000,
      hookTimeout: 10000,
      pool: 'forks' as const,
      coverage: {
        provider: 'v8' as const,
        reporter: ['text', 'json', 'html'],
        exclude: [
          'node_modules/',
          'dist/',
          '**/*.test.ts',
          'vitest.config.ts',
          'vitest.setup.ts',
        ],
      },
    },
  };
});
