/**
 * Compare the stock parameter sets against the data in ./data
 * Prints one table per studied parameter
 */

import { readEnvConfig } from '../src/config/env.js';
import type { ParamName } from '../src/core/types.js';
import { createDataSource } from '../src/storage/factory.js';
import { ParameterStudy, summarizeStudy } from '../src/runner/parameter-study.js';

const STUDIES: Array<{ paramName: ParamName; values: number[] }> = [
  { paramName: 'loading_rate', values: [3000, 5000, 7000] },
  { paramName: 'resupply_threshold_days', values: [2, 3, 5] },
  { paramName: 'ship_speed_multiplier', values: [0.8, 1.0, 1.2] },
];

// ANSI colors
const BOLD = '\x1b[1m';
const RESET = '\x1b[0m';

function formatPercent(n: number): string {
  return `${(n * 100).toFixed(1)}%`;
}

async function main() {
  const env = readEnvConfig();
  const dataSource = createDataSource(env.dataSource, { dataDir: env.dataDir, dbPath: env.dbPath });

  for (const { paramName, values } of STUDIES) {
    console.log(`\n${BOLD}${paramName}${RESET}`);
    const runs = new ParameterStudy(dataSource, paramName, values).run();

    console.log('-'.repeat(50));
    for (const row of summarizeStudy(runs)) {
      console.log(
        `  ${String(row.paramValue).padEnd(10)} service ${formatPercent(row.overallServiceLevel).padStart(6)}` +
          ` | stockouts ${String(row.totalStockoutEvents).padStart(4)}` +
          ` | failed dispatches ${String(row.totalFailedDispatches).padStart(4)}`
      );
    }
  }
}

main().catch((error) => {
  console.error('Study failed:', error);
  process.exit(1);
});
