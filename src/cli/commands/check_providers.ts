/**
 * @fileoverview Check-providers command - report what is configured
 *
 * Reads configuration only; no external service is contacted.
 */

import { parseArgs } from 'node:util';
import { createAzureProviders } from '../../providers/azure_openai.js';
import { loadVectorIndex } from '../../api/engine_factory.js';
import { printKeyValue } from '../progress.js';
import { parseCommandArgs, type CommandContext } from './types.js';

export interface ComponentStatus {
  available: boolean;
  detail: string;
}

export interface ProviderReport {
  generation: ComponentStatus;
  embeddings: ComponentStatus;
  index: ComponentStatus;
  primaryStore: ComponentStatus;
}

export async function checkProvidersCommand(options: CommandContext): Promise<ProviderReport> {
  const { values } = parseCommandArgs(() =>
    parseArgs({
      args: options.args,
      options: { json: { type: 'boolean', default: false } },
      allowPositionals: false,
      strict: true,
    })
  );
  const { config } = options;

  const azure = createAzureProviders(config.azure, {
    temperature: config.generation.temperature,
    maxTokens: config.generation.maxTokens,
  });
  const index = options.overrides?.index !== undefined ? options.overrides.index : await loadVectorIndex(config);

  const report: ProviderReport = {
    generation: azure.llm
      ? { available: true, detail: `azure-openai deployment ${config.azure.chatDeployment ?? ''}` }
      : { available: false, detail: azure.missing.llm ?? 'not configured' },
    embeddings: azure.embeddings
      ? { available: true, detail: `azure-openai deployment ${config.azure.embeddingDeployment ?? ''}` }
      : { available: false, detail: azure.missing.embeddings ?? 'not configured' },
    index: index
      ? { available: true, detail: `${index.size()} chunks` }
      : { available: false, detail: 'no chunks loaded' },
    primaryStore: describePrimaryStore(options),
  };

  if (values.json) {
    console.log(JSON.stringify(report, null, 2));
    return report;
  }

  console.log('Provider status');
  printKeyValue([
    { key: 'Generation', value: formatStatus(report.generation) },
    { key: 'Embeddings', value: formatStatus(report.embeddings) },
    { key: 'Vector index', value: formatStatus(report.index) },
    { key: 'Primary store', value: formatStatus(report.primaryStore) },
  ]);
  return report;
}

function describePrimaryStore({ config }: CommandContext): ComponentStatus {
  switch (config.storage.primary) {
    case 'none':
      return { available: false, detail: 'disabled; sessions are kept in memory only' };
    case 'sqlite':
      return { available: true, detail: `sqlite at ${config.storage.sessionDbPath}` };
    case 'airtable':
      return config.airtable.apiKey && config.airtable.baseId
        ? { available: true, detail: `airtable table "${config.airtable.tableName}"` }
        : { available: false, detail: 'missing AIRTABLE_API_KEY or AIRTABLE_BASE_ID' };
  }
}

function formatStatus(status: ComponentStatus): string {
  return `${status.available ? 'ok' : 'unavailable'} (${status.detail})`;
}
