/**
 * JSON file data source
 * Reads ships.json, customers.json, distances.json and simulation_params.json
 * from a directory and writes one results file per run.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { MalformedConfigurationError } from '../core/errors.js';
import { DEFAULT_PARAMS } from '../core/world.js';
import { isRecord, type DataSource } from './data-source.js';
import type { ResultsDocument } from './results-serializer.js';
import {
  EXAMPLE_CUSTOMERS,
  EXAMPLE_PARAMS,
  EXAMPLE_SHIPS,
  exampleLocations,
  generateDistanceMatrix,
} from './example-data.js';

export const DATA_FILES = {
  ships: 'ships.json',
  customers: 'customers.json',
  distances: 'distances.json',
  params: 'simulation_params.json',
} as const;

const DATA_FILE_KEYS = ['ships', 'customers', 'distances', 'params'] as const;

function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace('T', '_').replace('.', '_').replace('Z', '');
}

export class JsonDataSource implements DataSource {
  constructor(private readonly dataDir: string) {
    this.ensureDataFilesExist();
  }

  getDataDir(): string {
    return this.dataDir;
  }

  getShipsData(): unknown[] {
    return this.readArray(DATA_FILES.ships);
  }

  getCustomersData(): unknown[] {
    return this.readArray(DATA_FILES.customers);
  }

  getDistanceMatrix(): unknown {
    return this.readJson(DATA_FILES.distances);
  }

  getSimulationParams(): Record<string, unknown> {
    const data = this.readJson(DATA_FILES.params);
    if (!isRecord(data)) {
      throw new MalformedConfigurationError('params', [`${DATA_FILES.params}: expected an object`]);
    }
    return data;
  }

  saveResults(results: ResultsDocument): void {
    const filePath = join(this.dataDir, `results_${formatTimestamp(new Date())}.json`);
    writeFileSync(filePath, JSON.stringify(results, null, 2), 'utf-8');
    console.log(`[JsonDataSource] Results saved to ${filePath}`);
  }

  /**
   * Write example files for anything missing
   */
  private ensureDataFilesExist(): void {
    mkdirSync(this.dataDir, { recursive: true });

    const examples: Record<(typeof DATA_FILE_KEYS)[number], unknown> = {
      ships: EXAMPLE_SHIPS,
      customers: EXAMPLE_CUSTOMERS,
      distances: generateDistanceMatrix(exampleLocations(), DEFAULT_PARAMS.random_seed),
      params: EXAMPLE_PARAMS,
    };

    for (const key of DATA_FILE_KEYS) {
      const filePath = join(this.dataDir, DATA_FILES[key]);
      if (!existsSync(filePath)) {
        writeFileSync(filePath, JSON.stringify(examples[key], null, 2), 'utf-8');
        console.log(`[JsonDataSource] Generated example ${DATA_FILES[key]}`);
      }
    }
  }

  private readJson(fileName: string): unknown {
    const filePath = join(this.dataDir, fileName);
    try {
      return JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new MalformedConfigurationError(fileName, [message]);
    }
  }

  private readArray(fileName: string): unknown[] {
    const data: unknown = this.readJson(fileName);
    if (!Array.isArray(data)) {
      throw new MalformedConfigurationError(fileName, ['expected an array']);
    }
    return data;
  }
}
