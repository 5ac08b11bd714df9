/**
 * @fileoverview Zod schema for policy-qa configuration
 *
 * Every section has defaults, so an empty object parses to a complete
 * configuration. Provider credentials stay optional: a missing key makes the
 * provider absent rather than failing the load.
 */

import { z } from 'zod';

export const PrimaryStoreSchema = z.enum(['sqlite', 'airtable', 'none']);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const DEFAULT_BOILERPLATE = [
  'Your Health Your Finances Your Eligibility',
  'Your Health Your Finances',
  'Your Health Your Family Your Perks',
  'Your Eligibility',
  'CONFIDENTIAL INFORMATION',
  'EMPLOYEE HANDBOOK',
];

const optionalText = z.string().trim().min(1).optional();

export const AzureSettingsSchema = z
  .object({
    apiKey: optionalText,
    endpoint: z.string().trim().url().optional(),
    apiVersion: z.string().trim().min(1).default('2024-02-01'),
    chatDeployment: optionalText,
    embeddingDeployment: optionalText,
  })
  .default({});

export const AirtableSettingsSchema = z
  .object({
    apiKey: optionalText,
    baseId: optionalText,
    tableName: z.string().trim().min(1).default('Chat History'),
  })
  .default({});

export const StorageSettingsSchema = z
  .object({
    primary: PrimaryStoreSchema.default('sqlite'),
    sessionDbPath: z.string().trim().min(1).default('.state/sessions.db'),
  })
  .default({});

export const IndexSettingsSchema = z
  .object({
    dbPath: z.string().trim().min(1).default('.state/index.db'),
    /** When set, the index is loaded from this export file instead of the chunk store. */
    exportPath: optionalText,
  })
  .default({});

export const RetrievalSettingsSchema = z
  .object({
    topK: z.number().int().positive().default(5),
    scoreThreshold: z.number().min(0).max(1).default(0.5),
    boilerplate: z.array(z.string().min(1)).default(() => [...DEFAULT_BOILERPLATE]),
  })
  .default({});

export const ContextSettingsSchema = z
  .object({
    maxContextTurns: z.number().int().min(0).default(4),
    previewLength: z.number().int().positive().default(50),
  })
  .default({});

export const GenerationSettingsSchema = z
  .object({
    temperature: z.number().min(0).max(2).default(0.3),
    maxTokens: z.number().int().positive().default(500),
  })
  .default({});

export const TimeoutSettingsSchema = z
  .object({
    embeddingMs: z.number().int().min(0).default(15_000),
    searchMs: z.number().int().min(0).default(10_000),
    generationMs: z.number().int().min(0).default(60_000),
    storageMs: z.number().int().min(0).default(10_000),
  })
  .default({});

export const FaqSettingsSchema = z
  .object({
    enabled: z.boolean().default(true),
    /** Defaults to the bundled data/faq.json. */
    path: optionalText,
  })
  .default({});

export const PolicyQaConfigSchema = z
  .object({
    azure: AzureSettingsSchema,
    airtable: AirtableSettingsSchema,
    storage: StorageSettingsSchema,
    index: IndexSettingsSchema,
    retrieval: RetrievalSettingsSchema,
    context: ContextSettingsSchema,
    generation: GenerationSettingsSchema,
    timeouts: TimeoutSettingsSchema,
    faq: FaqSettingsSchema,
    logLevel: LogLevelSchema.default('info'),
  })
  .superRefine((config, ctx) => {
    if (config.storage.primary !== 'airtable') return;
    for (const field of ['apiKey', 'baseId'] as const) {
      if (!config.airtable[field]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['airtable', field],
          message: 'required when the primary store is airtable',
        });
      }
    }
  });

export type PolicyQaConfig = z.infer<typeof PolicyQaConfigSchema>;
export type PrimaryStoreKind = z.infer<typeof PrimaryStoreSchema>;
export type AzureSettings = PolicyQaConfig['azure'];
export type AirtableSettings = PolicyQaConfig['airtable'];
