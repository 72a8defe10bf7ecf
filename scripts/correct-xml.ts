#!/usr/bin/env tsx
/**
 * Correct one XML order document against the orders file.
 *
 * Usage:
 *   npm run xml:correct -- incoming/assignment.xml
 *   npm run xml:correct -- incoming/assignment.xml --order FU70001236 --out-dir corrected/
 *
 * The corrected document is written next to the input (or into --out-dir)
 * as <name>_corrected.xml.
 *
 * Exit codes:
 *   0 - Corrected, no rule failed
 *   1 - Document or order problem, nothing written
 *   2 - Written, but at least one rule failed
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { OrdersStore } from '../src/orders/store.js';
import { CorrectionService } from '../src/services/correction-service.js';
import { formatOutcomeLines } from '../src/engine/reporter.js';
import { config } from '../src/config/index.js';

function argValue(flag: string): string | undefined {
  const index = process.argv.indexOf(flag);
  return index === -1 ? undefined : process.argv[index + 1];
}

const OUTCOME_ICONS: Record<string, string> = {
  updated: '✅',
  created: '✅',
  failed: '❌',
};

async function main(): Promise<number> {
  const flagValues = new Set([argValue('--order'), argValue('--out-dir')]);
  const xmlPath = process.argv.slice(2).find((arg) => !arg.startsWith('--') && !flagValues.has(arg));
  if (!xmlPath) {
    console.error('Usage: correct-xml <document.xml> [--order <id>] [--out-dir <dir>]');
    return 1;
  }

  const store = await OrdersStore.load(config.orders.path);
  const service = new CorrectionService(store, {
    orderIdPattern: config.orders.orderIdPattern,
    requireKnownOrder: config.orders.requireKnownOrder,
    correctedSuffix: config.corrections.correctedSuffix,
  });

  const result = service.correctDocument({
    xml: await readFile(xmlPath, 'utf-8'),
    fileName: basename(xmlPath),
    orderId: argValue('--order'),
  });

  console.log(`\nOrder ${result.orderId ?? '(unknown)'}: ${basename(xmlPath)}\n`);
  formatOutcomeLines(result.outcomes).forEach((line, i) => {
    console.log(`${OUTCOME_ICONS[result.outcomes[i].tag] ?? '⚠️ '} ${line}`);
  });

  const outDir = argValue('--out-dir') ?? dirname(xmlPath);
  await mkdir(outDir, { recursive: true });
  const outPath = join(outDir, result.fileName);
  await writeFile(outPath, result.xml, 'utf-8');

  const { summary } = result;
  console.log(`\n${summary.applied}/${summary.total} rules applied, written to ${outPath}`);
  return summary.ok ? 0 : 2;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error('❌', error instanceof Error ? error.message : error);
    process.exit(1);
  });
