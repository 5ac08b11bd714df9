/**
 * @fileoverview policy-qa configuration loading
 *
 * Precedence, lowest first:
 * - built-in defaults (see schema.ts)
 * - a YAML file (`--config <file>` or POLICY_QA_CONFIG)
 * - environment variables
 *
 * The merged object is validated once; the first problem is reported as a
 * ConfigurationError naming the offending field.
 */

import * as fs from 'node:fs/promises';
import yaml from 'yaml';
import { ConfigurationError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';
import { PolicyQaConfigSchema, type PolicyQaConfig } from './schema.js';

export {
  PolicyQaConfigSchema,
  DEFAULT_BOILERPLATE,
  type PolicyQaConfig,
  type PrimaryStoreKind,
  type AzureSettings,
  type AirtableSettings,
} from './schema.js';

export type Env = Record<string, string | undefined>;

export interface LoadConfigOptions {
  env?: Env;
  /** YAML file; falls back to POLICY_QA_CONFIG. */
  file?: string;
  /** Applied last, above the environment. */
  overrides?: Record<string, unknown>;
}

type RawConfig = Record<string, unknown>;

/**
 * Environment variable → config path.
 */
type ConfigPath = readonly [section: string, key?: string];

const ENV_BINDINGS: ReadonlyArray<readonly [string, ConfigPath]> = [
  ['AZURE_OPENAI_API_KEY', ['azure', 'apiKey']],
  ['AZURE_OPENAI_ENDPOINT', ['azure', 'endpoint']],
  ['AZURE_OPENAI_API_VERSION', ['azure', 'apiVersion']],
  ['AZURE_OPENAI_CHAT_DEPLOYMENT', ['azure', 'chatDeployment']],
  ['AZURE_OPENAI_EMBEDDING_DEPLOYMENT', ['azure', 'embeddingDeployment']],
  ['AIRTABLE_API_KEY', ['airtable', 'apiKey']],
  ['AIRTABLE_BASE_ID', ['airtable', 'baseId']],
  ['AIRTABLE_TABLE_NAME', ['airtable', 'tableName']],
  ['POLICY_QA_PRIMARY_STORE', ['storage', 'primary']],
  ['POLICY_QA_SESSION_DB', ['storage', 'sessionDbPath']],
  ['POLICY_QA_INDEX_DB', ['index', 'dbPath']],
  ['POLICY_QA_INDEX_EXPORT', ['index', 'exportPath']],
  ['POLICY_QA_FAQ_PATH', ['faq', 'path']],
  ['POLICY_QA_LOG_LEVEL', ['logLevel']],
];

export async function loadConfig(options: LoadConfigOptions = {}): Promise<PolicyQaConfig> {
  const env = options.env ?? process.env;
  const file = options.file ?? nonEmpty(env.POLICY_QA_CONFIG);
  const fromFile = file ? await readConfigFile(file) : {};
  return resolveConfig(mergeRaw(mergeRaw(fromFile, configFromEnv(env)), options.overrides ?? {}));
}

/**
 * Validate an already merged raw object and fill in defaults.
 */
export function resolveConfig(raw: RawConfig = {}): PolicyQaConfig {
  const parsed = PolicyQaConfigSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  const issue = parsed.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
  throw new ConfigurationError(field, issue?.message ?? 'invalid configuration');
}

export function configFromEnv(env: Env): RawConfig {
  const raw: RawConfig = {};
  for (const [name, path] of ENV_BINDINGS) {
    const value = nonEmpty(env[name]);
    if (value === undefined) continue;
    const [section, key] = path;
    if (key === undefined) {
      raw[section] = section === 'logLevel' ? value.toLowerCase() : value;
      continue;
    }
    const existing = raw[section];
    const target: RawConfig = isRecord(existing) ? existing : {};
    target[key] = value;
    raw[section] = target;
  }
  return raw;
}

export async function readConfigFile(file: string): Promise<RawConfig> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf8');
  } catch (error) {
    throw new ConfigurationError(file, `cannot read config file (${getErrorMessage(error)})`);
  }
  let parsed: unknown;
  try {
    parsed = yaml.parse(text);
  } catch (error) {
    throw new ConfigurationError(file, `invalid YAML (${getErrorMessage(error)})`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigurationError(file, 'config file must contain a mapping');
  }
  return parsed;
}

// ============================================================================
// HELPERS
// ============================================================================

function mergeRaw(base: RawConfig, patch: RawConfig): RawConfig {
  const merged: RawConfig = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    const existing = merged[key];
    merged[key] = isRecord(existing) && isRecord(value) ? mergeRaw(existing, value) : value;
  }
  return merged;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
