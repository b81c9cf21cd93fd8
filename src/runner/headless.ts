#!/usr/bin/env node
/**
 * Headless Runner
 * CLI for running a resupply simulation or a parameter study
 */

import { readEnvConfig } from '../config/env.js';
import { ResupplySimulation } from '../core/simulation.js';
import type { SimulationResults } from '../core/types.js';
import { createDataSource } from '../storage/factory.js';
import { ParameterStudy, summarizeStudy, type StudySummaryRow } from './parameter-study.js';
import { HELP_TEXT, collectOverrides, parseArgs } from './cli-args.js';

function formatPercent(value: number): string {
  return (value * 100).toFixed(1).padStart(5) + '%';
}

function formatAmount(value: number): string {
  return value.toFixed(0).padStart(9);
}

function printResults(results: SimulationResults): void {
  const { metrics, metadata } = results;

  console.log('Customers:');
  for (const customer of results.customers) {
    const m = metrics.customerMetrics[customer.id];
    if (m === undefined) {
      console.log(`  ${customer.name}: no consumption recorded`);
      continue;
    }
    console.log(`  ${customer.name} (${customer.id}):`);
    console.log(
      `    Service: ${formatPercent(m.serviceLevel)} | Stockout hours: ${m.stockoutHours}`
    );
    console.log(
      `    Inventory avg ${formatAmount(m.avgInventory)} | min ${formatAmount(m.minInventory)} | final ${formatAmount(customer.currentInventory)}`
    );
  }

  console.log('Ships:');
  for (const ship of results.ships) {
    const m = metrics.shipMetrics[ship.id];
    if (m === undefined) {
      console.log(`  ${ship.name}: idle all run`);
      continue;
    }
    console.log(
      `  ${ship.name} (${ship.id}): ${m.numDeliveries} deliveries, ${m.numResupplies} resupplies, ${m.totalDistance.toFixed(1)} distance`
    );
  }

  console.log('');
  console.log(`Overall service level: ${formatPercent(metrics.overallServiceLevel)}`);
  console.log(`Stockout events:       ${metrics.totalStockoutEvents}`);
  console.log(`Delivered amount:      ${metrics.totalDeliveredAmount.toFixed(0)}`);
  console.log(`Failed dispatches:     ${metrics.totalFailedDispatches}`);
  console.log(`Process failures:      ${metrics.totalProcessFailures}`);

  console.log('');
  console.log('Determinism Check:');
  console.log(`  Events: ${metadata.numEvents}`);
  console.log(`  Event log hash: ${metadata.eventLogHash}`);
}

function printStudy(paramName: string, rows: StudySummaryRow[]): void {
  console.log(
    `${paramName.padEnd(24)} ${'service'.padStart(8)} ${'stockouts'.padStart(10)} ${'failed'.padStart(8)}`
  );
  console.log('-'.repeat(60));
  for (const row of rows) {
    console.log(
      `${String(row.paramValue).padEnd(24)} ${formatPercent(row.overallServiceLevel).padStart(8)} ${String(row.totalStockoutEvents).padStart(10)} ${String(row.totalFailedDispatches).padStart(8)}`
    );
  }
}

async function main() {
  const env = readEnvConfig();
  const options = parseArgs(process.argv.slice(2), {
    source: env.dataSource,
    dataDir: env.dataDir,
    dbPath: env.dbPath,
  });

  if (options.help) {
    console.log(HELP_TEXT);
    return;
  }

  const verbose = options.verbose || env.debug;
  const overrides = collectOverrides(options, env.overridesPath);
  const dataSource = createDataSource(options.source, {
    dataDir: options.dataDir,
    dbPath: options.dbPath,
  });

  console.log('='.repeat(60));
  console.log('Maritime Resupply Simulation');
  console.log('='.repeat(60));
  console.log(`Source: ${options.source}`);
  if (Object.keys(overrides).length > 0) {
    console.log(`Overrides: ${JSON.stringify(overrides)}`);
  }
  console.log('');

  if (options.study) {
    const { paramName, values } = options.study;
    console.log(`Parameter study: ${paramName} over ${values.join(', ')}`);
    console.log('');

    const study = new ParameterStudy(dataSource, paramName, values, {
      baseOverrides: overrides,
      debug: verbose,
    });
    const runs = study.run();

    console.log('');
    printStudy(paramName, summarizeStudy(runs));
    return;
  }

  const startTime = Date.now();
  const simulation = new ResupplySimulation(dataSource, overrides, { debug: verbose });
  const results = simulation.run();
  const elapsed = Date.now() - startTime;

  console.log('='.repeat(60));
  console.log('Simulation Complete');
  console.log('='.repeat(60));
  console.log(`Simulated hours: ${results.metadata.simulatedUntil}`);
  console.log(`Elapsed time: ${elapsed}ms`);
  console.log('');
  printResults(results);
}

main().catch((error) => {
  console.error('Simulation failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
