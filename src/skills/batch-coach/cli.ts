#!/usr/bin/env node
import { BatchCoach, loadManifest } from './index.js';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { ReinforcedCoach } from '../../services/coaching/ReinforcedCoach.js';
import { ExtractionOrchestrator } from '../../services/orchestration/ExtractionOrchestrator.js';
import type { BatchCoachConfig, BatchCoachResult, ItemSummary } from './types.js';

interface CliArgs {
  manifest?: string;
  format?: string;
  help?: boolean;
}

const HELP = `
Batch Coaching - Validate and coach agent extractions listed in a manifest

Usage:
  npm run batch-coach -- --manifest <path> [options]

Options:
  --manifest <path>    JSON manifest: { "items": [{ documentId, agentId, extraction, groundTruth? }] } (required)
  --format <fmt>       Output format: table or json (default: table)
  --help               Show this help message

Examples:
  npm run batch-coach -- --manifest ./manifests/brf-2024.json
  npm run batch-coach -- --manifest ./manifests/brf-2024.json --format json
`;

const parseArgs = (argv: string[]): CliArgs => {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case '--manifest':
        args.manifest = argv[++i];
        break;
      case '--format':
        args.format = argv[++i];
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
    }
  }

  return args;
};

const parseFormat = (value?: string): BatchCoachConfig['format'] | null => {
  if (value === undefined || value === 'table') return 'table';
  if (value === 'json') return 'json';
  return null;
};

const formatAccuracy = (value?: number): string => (value === undefined ? '  -  ' : value.toFixed(3));

const printTable = (items: ItemSummary[]) => {
  const maxDoc = Math.max(12, ...items.map(item => item.documentId.length));
  const maxAgent = Math.max(20, ...items.map(item => item.agentId.length));
  const header = `${'Document'.padEnd(maxDoc)} | ${'Agent'.padEnd(maxAgent)} | Valid | Strategy | Before | After | Status`;
  const separator = '-'.repeat(header.length);

  console.log(separator);
  console.log(header);
  console.log(separator);

  for (const item of items) {
    console.log(
      `${item.documentId.padEnd(maxDoc)} | ${item.agentId.padEnd(maxAgent)} | ${(item.valid ? 'yes' : 'no').padEnd(5)} | ${(item.strategy ?? '-').padEnd(8)} | ${formatAccuracy(item.initialAccuracy).padEnd(6)} | ${formatAccuracy(item.finalAccuracy).padEnd(5)} | ${item.status}${item.golden ? ' (golden)' : ''}`
    );
  }
  console.log(separator);
};

const printSummary = ({ summary }: BatchCoachResult) => {
  console.log('\nSummary:');
  console.log(`  Total:     ${summary.total}`);
  console.log(`  Coached:   ${summary.coached}`);
  console.log(`  Validated: ${summary.validated}`);
  console.log(`  Failed:    ${summary.failed}`);
  console.log('\nBy Strategy:');
  for (const [strategy, count] of Object.entries(summary.byStrategy)) {
    console.log(`  ${strategy}: ${count}`);
  }
};

const main = async (): Promise<void> => {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(HELP);
    process.exit(0);
  }

  if (!args.manifest) {
    console.error('Error: --manifest is required');
    console.log(HELP);
    process.exit(1);
  }

  const format = parseFormat(args.format);
  if (!format) {
    console.error(`Error: unknown format "${args.format}"`);
    process.exit(1);
  }

  const batchConfig: BatchCoachConfig = {
    manifest: args.manifest,
    format,
  };

  const coach = config.coaching.enabled ? await ReinforcedCoach.create() : undefined;
  const orchestrator = new ExtractionOrchestrator({ coach });

  try {
    const manifest = await loadManifest(batchConfig.manifest);
    logger.info({ manifest: batchConfig.manifest, items: manifest.items.length }, 'Starting batch coaching');

    const result = await new BatchCoach(orchestrator, coach).run(manifest);

    if (batchConfig.format === 'json') {
      console.log(JSON.stringify(result, null, 2));
    } else {
      console.log(`\nCoaching Results (${result.items.length} items):\n`);
      printTable(result.items);
      printSummary(result);
    }
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Batch coaching failed');
    console.error('Error:', errorMessage(error));
    process.exitCode = 1;
  } finally {
    await coach?.close();
  }
};

main().catch(error => {
  console.error('Error:', errorMessage(error));
  process.exit(1);
});
