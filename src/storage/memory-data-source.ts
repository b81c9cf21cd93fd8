/**
 * In-memory data source
 * Holds a snapshot and hands out deep copies, so runs never share state
 */

import type { ConfigurationSnapshot } from '../core/types.js';
import type { DataSource } from './data-source.js';
import type { ResultsDocument } from './results-serializer.js';

export class InMemoryDataSource implements DataSource {
  private snapshot: ConfigurationSnapshot;
  private saved: ResultsDocument[] = [];

  constructor(snapshot: ConfigurationSnapshot) {
    this.snapshot = structuredClone(snapshot);
  }

  getShipsData(): unknown[] {
    return structuredClone(this.snapshot.ships);
  }

  getCustomersData(): unknown[] {
    return structuredClone(this.snapshot.customers);
  }

  getDistanceMatrix(): unknown {
    return structuredClone(this.snapshot.distances);
  }

  getSimulationParams(): Record<string, unknown> {
    return structuredClone(this.snapshot.params);
  }

  saveResults(results: ResultsDocument): void {
    this.saved.push(results);
  }

  /**
   * Documents passed to saveResults, oldest first
   */
  getSavedResults(): ResultsDocument[] {
    return [...this.saved];
  }
}
