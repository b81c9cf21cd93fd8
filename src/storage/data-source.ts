/**
 * Data Source
 * Collaborator contract for reading a configuration snapshot and persisting results
 */

import type { ConfigurationSnapshot } from '../core/types.js';
import type { ResultsDocument } from './results-serializer.js';

export interface DataSource {
  getShipsData(): unknown[];
  getCustomersData(): unknown[];
  getDistanceMatrix(): unknown;
  getSimulationParams(): Record<string, unknown>;
  saveResults(results: ResultsDocument): void;
}

/**
 * Read everything the engine needs at setup in one go
 */
export function readSnapshot(source: DataSource): ConfigurationSnapshot {
  return {
    ships: source.getShipsData(),
    customers: source.getCustomersData(),
    distances: source.getDistanceMatrix(),
    params: source.getSimulationParams(),
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
