#!/usr/bin/env tsx
/**
 * Orders Sync Script
 *
 * Rebuilds the orders file from a CSV export of the orders spreadsheet.
 * The rule table of an existing orders file is kept; a new file gets the
 * built-in rules.
 *
 * Usage:
 *   npm run orders:sync -- exports/orders.csv
 *   npm run orders:sync -- exports/orders.csv --out data/orders.json
 *
 * Exit codes:
 *   0 - Orders file written
 *   1 - Missing argument, unreadable CSV, or no orders in it
 */

import { readFile } from 'node:fs/promises';
import { parseOrdersCsv } from '../src/facts/sheet-import.js';
import { OrdersStore, buildOrdersFile } from '../src/orders/store.js';
import { OrdersFileError } from '../src/orders/errors.js';
import type { RuleSetT } from '../src/schemas/rules.js';
import { config } from '../src/config/index.js';

function argValue(flag: string): string | undefined {
  const index = process.argv.indexOf(flag);
  return index === -1 ? undefined : process.argv[index + 1];
}

async function existingRules(path: string): Promise<RuleSetT | undefined> {
  try {
    return (await OrdersStore.load(path)).toJSON().rules;
  } catch (error) {
    if (error instanceof OrdersFileError && error.reason === 'not_found') {
      return undefined;
    }
    throw error;
  }
}

async function main(): Promise<number> {
  const csvPath = process.argv.slice(2).find((arg) => !arg.startsWith('--') && arg !== argValue('--out'));
  if (!csvPath) {
    console.error('Usage: sync-orders <export.csv> [--out <orders.json>]');
    return 1;
  }
  const outPath = argValue('--out') ?? config.orders.path;

  console.log('\n=== Orders Sync ===\n');

  const csv = await readFile(csvPath, 'utf-8');
  const clientName = config.orders.clientName;
  const imported = parseOrdersCsv(csv, { clientName });

  for (const skipped of imported.skipped) {
    console.log(`⚠️  Row ${skipped.row} ignored: ${skipped.reason}`);
  }
  if (imported.ignoredColumns.length > 0) {
    console.log(`⚠️  Unknown columns ignored: ${imported.ignoredColumns.join(', ')}`);
  }
  if (imported.orders.length === 0) {
    console.error('❌ No orders found in the export');
    return 1;
  }
  console.log(`✅ ${imported.orders.length} orders converted`);

  const file = buildOrdersFile(imported.orders, {
    clientName,
    source: `CSV export ${csvPath}`,
    rules: await existingRules(outPath),
  });
  await new OrdersStore(outPath, file).save();

  const stats = file.statistics;
  console.log(`✅ ${outPath} written`);
  console.log(`   Orders: ${stats?.total_orders ?? 0}`);
  console.log(`   Agencies: ${stats?.unique_agency_codes.join(', ') || '(none)'}`);
  console.log(`   Rules: ${file.rules?.length ?? 0}`);
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error('❌ Sync failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
