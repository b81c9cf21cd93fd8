/**
 * SQLite Data Source
 * Fleet, customers, routes and parameters in tables; one row per saved run
 */

import Database from 'better-sqlite3';
import type {
  CustomerConfigRecord,
  DistanceMatrix,
  ShipConfigRecord,
  SimulationParamsRecord,
} from '../core/types.js';
import { DEFAULT_PARAMS } from '../core/world.js';
import type { DataSource } from './data-source.js';
import type { ResultsDocument } from './results-serializer.js';
import {
  EXAMPLE_CUSTOMERS,
  EXAMPLE_PARAMS,
  EXAMPLE_SHIPS,
  exampleLocations,
  generateDistanceMatrix,
} from './example-data.js';

// ============================================================================
// Types
// ============================================================================

export type ParamType = 'float' | 'int' | 'str';

interface ShipRow {
  id: string;
  name: string;
  capacity: number;
  speed: number;
  initial_location: string;
  initial_cargo: number;
}

interface CustomerRow {
  id: string;
  name: string;
  location: string;
  demand_rate: number;
  initial_inventory: number;
  min_inventory: number;
  max_inventory: number;
}

interface DistanceRow {
  from_location: string;
  to_location: string;
  distance: number;
}

interface ParamRow {
  param_name: string;
  param_value: string;
  param_type: string;
}

interface ResultRow {
  run_id: number;
  timestamp: string;
  overall_service_level: number;
  results_json: string;
}

/**
 * Saved run, without its results document
 */
export interface ResultsSummary {
  runId: number;
  timestamp: string;
  overallServiceLevel: number;
}

// ============================================================================
// Schema
// ============================================================================

const SCHEMA = `
-- Fleet
CREATE TABLE IF NOT EXISTS ships (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  capacity REAL NOT NULL,
  speed REAL NOT NULL,
  initial_location TEXT NOT NULL,
  initial_cargo REAL NOT NULL DEFAULT 0
);

-- Customer sites
CREATE TABLE IF NOT EXISTS customers (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  location TEXT NOT NULL,
  demand_rate REAL NOT NULL,
  initial_inventory REAL NOT NULL,
  min_inventory REAL NOT NULL,
  max_inventory REAL NOT NULL
);

-- Directed routes
CREATE TABLE IF NOT EXISTS distances (
  from_location TEXT NOT NULL,
  to_location TEXT NOT NULL,
  distance REAL NOT NULL,
  PRIMARY KEY (from_location, to_location)
);

-- Parameters stored as text with a type tag
CREATE TABLE IF NOT EXISTS simulation_params (
  param_name TEXT PRIMARY KEY,
  param_value TEXT NOT NULL,
  param_type TEXT NOT NULL CHECK(param_type IN ('float', 'int', 'str'))
);

-- Results documents
CREATE TABLE IF NOT EXISTS simulation_results (
  run_id INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp TEXT NOT NULL DEFAULT (datetime('now')),
  overall_service_level REAL NOT NULL,
  results_json TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_results_timestamp ON simulation_results(timestamp);
`;

/**
 * Convert a stored parameter back to its runtime value
 */
export function castParam(value: string, type: string): string | number {
  switch (type) {
    case 'int':
      return parseInt(value, 10);
    case 'float':
      return parseFloat(value);
    default:
      return value;
  }
}

function paramType(value: string | number): ParamType {
  if (typeof value === 'string') return 'str';
  return Number.isInteger(value) ? 'int' : 'float';
}

// ============================================================================
// SqliteDataSource Class
// ============================================================================

/**
 * All methods are synchronous with better-sqlite3
 */
export class SqliteDataSource implements DataSource {
  private db: Database.Database;
  private lastRunId: number | null = null;

  private stmtSelectShips: Database.Statement<[], ShipRow>;
  private stmtSelectCustomers: Database.Statement<[], CustomerRow>;
  private stmtSelectDistances: Database.Statement<[], DistanceRow>;
  private stmtSelectParams: Database.Statement<[], ParamRow>;
  private stmtInsertShip: Database.Statement<[ShipRow]>;
  private stmtInsertCustomer: Database.Statement<[CustomerRow]>;
  private stmtInsertDistance: Database.Statement<[DistanceRow]>;
  private stmtUpsertParam: Database.Statement<[ParamRow]>;
  private stmtInsertResult: Database.Statement<[number, string]>;

  /**
   * @param dbPath Path to SQLite database file (use ':memory:' for in-memory)
   */
  constructor(dbPath: string = 'resupply.db') {
    this.db = new Database(dbPath);

    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }

    this.db.exec(SCHEMA);

    this.stmtSelectShips = this.db.prepare<[], ShipRow>(
      'SELECT id, name, capacity, speed, initial_location, initial_cargo FROM ships ORDER BY rowid'
    );
    this.stmtSelectCustomers = this.db.prepare<[], CustomerRow>(`
      SELECT id, name, location, demand_rate, initial_inventory, min_inventory, max_inventory
      FROM customers ORDER BY rowid
    `);
    this.stmtSelectDistances = this.db.prepare<[], DistanceRow>(
      'SELECT from_location, to_location, distance FROM distances ORDER BY rowid'
    );
    this.stmtSelectParams = this.db.prepare<[], ParamRow>(
      'SELECT param_name, param_value, param_type FROM simulation_params'
    );
    this.stmtInsertShip = this.db.prepare<[ShipRow]>(`
      INSERT OR REPLACE INTO ships (id, name, capacity, speed, initial_location, initial_cargo)
      VALUES (@id, @name, @capacity, @speed, @initial_location, @initial_cargo)
    `);
    this.stmtInsertCustomer = this.db.prepare<[CustomerRow]>(`
      INSERT OR REPLACE INTO customers
      (id, name, location, demand_rate, initial_inventory, min_inventory, max_inventory)
      VALUES (@id, @name, @location, @demand_rate, @initial_inventory, @min_inventory, @max_inventory)
    `);
    this.stmtInsertDistance = this.db.prepare<[DistanceRow]>(`
      INSERT OR REPLACE INTO distances (from_location, to_location, distance)
      VALUES (@from_location, @to_location, @distance)
    `);
    this.stmtUpsertParam = this.db.prepare<[ParamRow]>(`
      INSERT OR REPLACE INTO simulation_params (param_name, param_value, param_type)
      VALUES (@param_name, @param_value, @param_type)
    `);
    this.stmtInsertResult = this.db.prepare<[number, string]>(`
      INSERT INTO simulation_results (overall_service_level, results_json) VALUES (?, ?)
    `);
  }

  /**
   * Get the underlying database connection for direct queries
   */
  getDb(): Database.Database {
    return this.db;
  }

  // ============================================================================
  // DataSource
  // ============================================================================

  getShipsData(): unknown[] {
    return this.stmtSelectShips.all();
  }

  getCustomersData(): unknown[] {
    return this.stmtSelectCustomers.all();
  }

  getDistanceMatrix(): unknown {
    const matrix: DistanceMatrix = {};
    for (const row of this.stmtSelectDistances.all()) {
      matrix[row.from_location] ??= {};
      matrix[row.from_location][row.to_location] = row.distance;
    }
    return matrix;
  }

  getSimulationParams(): Record<string, unknown> {
    const params: Record<string, unknown> = {};
    for (const row of this.stmtSelectParams.all()) {
      params[row.param_name] = castParam(row.param_value, row.param_type);
    }
    return params;
  }

  saveResults(results: ResultsDocument): void {
    const result = this.stmtInsertResult.run(
      results.metrics.overall_service_level,
      JSON.stringify(results)
    );
    this.lastRunId = Number(result.lastInsertRowid);
    console.log(`[Database] Results saved as run ${this.lastRunId}`);
  }

  // ============================================================================
  // Configuration
  // ============================================================================

  replaceShips(ships: readonly ShipConfigRecord[]): void {
    this.db.transaction(() => {
      this.db.exec('DELETE FROM ships');
      for (const ship of ships) {
        this.stmtInsertShip.run({ ...ship, initial_cargo: ship.initial_cargo ?? 0 });
      }
    })();
  }

  replaceCustomers(customers: readonly CustomerConfigRecord[]): void {
    this.db.transaction(() => {
      this.db.exec('DELETE FROM customers');
      for (const customer of customers) {
        this.stmtInsertCustomer.run(customer);
      }
    })();
  }

  replaceDistances(matrix: DistanceMatrix): void {
    this.db.transaction(() => {
      this.db.exec('DELETE FROM distances');
      for (const [from, row] of Object.entries(matrix)) {
        for (const [to, distance] of Object.entries(row)) {
          this.stmtInsertDistance.run({ from_location: from, to_location: to, distance });
        }
      }
    })();
  }

  setParams(params: Partial<SimulationParamsRecord>): void {
    this.db.transaction(() => {
      for (const [name, value] of Object.entries(params)) {
        if (value === undefined) continue;
        this.stmtUpsertParam.run({
          param_name: name,
          param_value: String(value),
          param_type: paramType(value),
        });
      }
    })();
  }

  /**
   * Fill empty configuration tables with the example data
   * @returns true if anything was written
   */
  seedDefaults(): boolean {
    const count = (table: string): number =>
      this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n ?? 0;

    let seeded = false;
    if (count('ships') === 0) {
      this.replaceShips(EXAMPLE_SHIPS);
      seeded = true;
    }
    if (count('customers') === 0) {
      this.replaceCustomers(EXAMPLE_CUSTOMERS);
      seeded = true;
    }
    if (count('distances') === 0) {
      this.replaceDistances(generateDistanceMatrix(exampleLocations(), DEFAULT_PARAMS.random_seed));
      seeded = true;
    }
    if (count('simulation_params') === 0) {
      this.setParams(EXAMPLE_PARAMS);
      seeded = true;
    }

    if (seeded) {
      console.log('[Database] Seeded example configuration');
    }
    return seeded;
  }

  // ============================================================================
  // Results
  // ============================================================================

  getLastRunId(): number | null {
    return this.lastRunId;
  }

  /**
   * Saved runs, newest first
   */
  listResults(limit: number = 20): ResultsSummary[] {
    return this.db
      .prepare<[number], Omit<ResultRow, 'results_json'>>(`
        SELECT run_id, timestamp, overall_service_level
        FROM simulation_results
        ORDER BY run_id DESC
        LIMIT ?
      `)
      .all(limit)
      .map((row) => ({
        runId: row.run_id,
        timestamp: row.timestamp,
        overallServiceLevel: row.overall_service_level,
      }));
  }

  /**
   * Parsed results document for a saved run, or null if unknown
   */
  getResults(runId: number): unknown {
    const row = this.db
      .prepare<[number], Pick<ResultRow, 'results_json'>>(
        'SELECT results_json FROM simulation_results WHERE run_id = ?'
      )
      .get(runId);
    return row ? JSON.parse(row.results_json) : null;
  }

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close();
  }
}

/**
 * Create a SQLite data source, returning null if it cannot be opened
 */
export function createDatabase(dbPath: string = 'resupply.db'): SqliteDataSource | null {
  try {
    return new SqliteDataSource(dbPath);
  } catch (error) {
    console.warn('[Database] Failed to create database:', error);
    return null;
  }
}
