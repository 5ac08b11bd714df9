/**
 * Centralized Vitest Setup for policy-qa
 *
 * In 'unit' mode the provider credentials are cleared so that no test can
 * reach Azure OpenAI or Airtable by accident, and logging is silenced unless
 * POLICY_QA_LOG_LEVEL is set explicitly.
 */

import { beforeAll } from 'vitest';

const POLICY_QA_TEST_MODE = process.env.POLICY_QA_TEST_MODE ?? 'unit';

if (POLICY_QA_TEST_MODE === 'unit') {
  for (const key of [
    'AZURE_OPENAI_API_KEY',
    'AZURE_OPENAI_ENDPOINT',
    'AIRTABLE_API_KEY',
    'AIRTABLE_BASE_ID',
    'AIRTABLE_TABLE_NAME',
    'POLICY_QA_CONFIG',
  ]) {
    delete process.env[key];
  }
  process.env.POLICY_QA_LOG_LEVEL ??= 'silent';
}

beforeAll(() => {
  if (process.env.VITEST_QUIET !== 'true' && POLICY_QA_TEST_MODE !== 'unit') {
    console.log(`[vitest.setup] Test mode: ${POLICY_QA_TEST_MODE}`);
  }
});
