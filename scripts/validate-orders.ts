#!/usr/bin/env tsx
/**
 * Orders File Validation Script
 *
 * Checks the orders file (structure, required order fields, rule table,
 * statistics) and prints a data-quality report. Run after every sync.
 *
 * Usage:
 *   npm run orders:validate
 *   npm run orders:validate -- path/to/orders.json
 *
 * Exit codes:
 *   0 - Valid (warnings may have been printed)
 *   1 - Missing file, invalid JSON, or validation errors
 */

import { readFile } from 'node:fs/promises';
import { validateOrdersFile } from '../src/orders/validate.js';
import { emit, TelemetryEvents } from '../src/utils/telemetry.js';
import { config } from '../src/config/index.js';

async function main(): Promise<number> {
  const path = process.argv[2] ?? config.orders.path;
  console.log(`\n=== Orders File Validation: ${path} ===\n`);

  let data: unknown;
  try {
    data = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    console.error(`❌ Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`);
    console.error('   Run the sync script first (npm run orders:sync)');
    return 1;
  }

  const result = validateOrdersFile(data, {
    clientName: config.orders.clientName,
    orderIdPattern: config.orders.orderIdPattern,
  });
  emit(TelemetryEvents.OrdersValidated, {
    path,
    valid: result.valid,
    errors: result.errors.length,
    warnings: result.warnings.length,
  });

  for (const warning of result.warnings) {
    console.log(`⚠️  ${warning}`);
  }
  for (const error of result.errors) {
    console.log(`❌ ${error}`);
  }

  const report = result.report;
  if (report) {
    const { summary, data_quality: quality } = report;
    console.log('\n--- Report ---');
    console.log(`Orders: ${summary.total_orders}`);
    console.log(`Rules: ${summary.total_rules}`);
    console.log(`Agency codes: ${summary.agency_codes}`);
    console.log(`Job codes: ${summary.job_codes}`);
    console.log(`Socio categories: ${summary.socio_categories}`);
    console.log('\nData quality:');
    console.log(`- With job code: ${quality.with_job_code}/${summary.total_orders}`);
    console.log(`- With analysis centre: ${quality.with_cost_centre}/${summary.total_orders}`);
    console.log(`- With dates: ${quality.with_dates}/${summary.total_orders}`);
    if (report.details.agency_codes.length > 0) {
      console.log(`\nAgencies: ${report.details.agency_codes.join(', ')}`);
    }
  }

  if (!result.valid) {
    console.log(`\n❌ Validation failed (${result.errors.length} errors)`);
    return 1;
  }
  console.log('\n✅ Orders file is valid');
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error('❌ Validation crashed:', error);
    process.exit(1);
  });
