/**
 * Run Campaign Brain Script
 *
 * Runs every input in a JSON array through the campaign brain and prints
 * the batch summary.
 *
 * Usage:
 *   npm run campaign:run -- --input=./data/leads.json --verbose
 *
 * Or:
 *   tsx packages/agents/src/scripts/run-campaign-brain.ts --input=./data/leads.json
 */

import { readFileSync } from 'node:fs';
import {
  describeLangfuseStatus,
  flushLangfuse,
  shutdownLangfuse,
} from '@campaign-brain/lib/observability';
import { CampaignBrainAgent } from '../campaign-brain/agent';
import { runCampaignBatch } from '../campaign-brain/batch';
import { loadCampaignBrainConfig } from '../campaign-brain/config';
import { getErrorMessage } from '../campaign-brain/errors';
import { createMemoryStore } from '../campaign-brain/memory-manager';
import { SlackReviewNotifier } from '../campaign-brain/escalation';
import type { BatchRunSummary } from '../campaign-brain/types';

// ===========================================
// CLI Argument Parsing
// ===========================================

interface CliArgs {
  input: string;
  verbose: boolean;
  concurrency?: number;
}

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);
  let input = '';
  let verbose = false;
  let concurrency: number | undefined;

  for (const arg of args) {
    if (arg.startsWith('--input=')) {
      input = arg.slice('--input='.length);
    } else if (arg === '--verbose') {
      verbose = true;
    } else if (arg.startsWith('--concurrency=')) {
      const value = Number.parseInt(arg.slice('--concurrency='.length), 10);
      concurrency = Number.isNaN(value) ? undefined : value;
    }
  }

  if (!input) {
    console.error('Usage: npm run campaign:run -- --input=<path> [--verbose] [--concurrency=<n>]');
    console.error('  --input        Path to a JSON array of campaign inputs');
    console.error('  --verbose      Log one line per finished lead');
    console.error('  --concurrency  Leads processed at the same time (default: 5)');
    process.exit(1);
  }

  return { input, verbose, concurrency };
}

function readInputs(path: string): unknown[] {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!Array.isArray(parsed)) {
    throw new Error(`Expected a JSON array of campaign inputs in ${path}`);
  }
  return parsed;
}

function printSummary(summary: BatchRunSummary): void {
  console.log('\n📊 Campaign batch summary');
  console.log(`   Total:          ${summary.total}`);
  console.log(`   Approved:       ${summary.approved}`);
  console.log(`   Manual review:  ${summary.manual_review}`);
  console.log(`   Stalled:        ${summary.stalled}`);
  console.log(`   Error:          ${summary.error}`);
  console.log(`   Rejected:       ${summary.rejected}`);
  console.log(`   Fallback used:  ${summary.fallback_used}`);
  console.log(`   Time:           ${summary.total_time_ms}ms\n`);

  for (const result of summary.results) {
    const score = result.overall_quality_score ?? '-';
    console.log(`   ${result.lead_id}  ${result.status}  ${score}  ${result.reason}`);
  }
}

// ===========================================
// Main
// ===========================================

async function main(): Promise<void> {
  const { input, verbose, concurrency } = parseArgs();

  const config = loadCampaignBrainConfig();
  const memoryStore = createMemoryStore();
  const notifier = SlackReviewNotifier.fromEnv() ?? undefined;

  console.log(`\n🧠 Campaign brain (${config.copywriter} copywriter, ${memoryStore.name} memory)`);
  console.log(`📄 Source file: ${input}`);

  const agent = new CampaignBrainAgent({ config, memoryStore, notifier });
  console.log(`📡 Tracing: ${describeLangfuseStatus()}`);
  const summary = await runCampaignBatch(agent, readInputs(input), { verbose, concurrency });

  printSummary(summary);
  await flushLangfuse();
}

main()
  .catch((error: unknown) => {
    console.error(`❌ Campaign run failed: ${getErrorMessage(error)}`);
    process.exitCode = 1;
  })
  .finally(() => shutdownLangfuse());
