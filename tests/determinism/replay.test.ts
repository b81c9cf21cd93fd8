/**
 * Determinism Tests
 * Verify that identical configurations produce identical event logs
 */

import { describe, it, expect } from 'vitest';
import { ResupplySimulation } from '../../src/core/simulation.js';
import { InMemoryDataSource } from '../../src/storage/memory-data-source.js';
import { serializeResults } from '../../src/storage/results-serializer.js';
import {
  EXAMPLE_CUSTOMERS,
  EXAMPLE_PARAMS,
  EXAMPLE_SHIPS,
  exampleLocations,
  generateDistanceMatrix,
} from '../../src/storage/example-data.js';
import { hashState } from '../../src/core/rng.js';

function createSource(seed: number): InMemoryDataSource {
  return new InMemoryDataSource({
    ships: EXAMPLE_SHIPS,
    customers: EXAMPLE_CUSTOMERS,
    distances: generateDistanceMatrix(exampleLocations(), seed),
    params: { ...EXAMPLE_PARAMS, simulation_duration: 240 },
  });
}

function runOnce(source: InMemoryDataSource) {
  return new ResupplySimulation(source, {}, { persistResults: false }).run();
}

describe('Determinism', () => {
  it('should produce identical event logs for the same configuration', () => {
    const run1 = runOnce(createSource(12345));
    const run2 = runOnce(createSource(12345));

    expect(run1.events).toEqual(run2.events);
    expect(run1.metrics).toEqual(run2.metrics);
    expect(run1.metadata.eventLogHash).toBe(run2.metadata.eventLogHash);
  });

  it('should replay identically from one data source', () => {
    const source = createSource(42);

    const history1 = runOnce(source).events.map((e) => hashState(e));
    const history2 = runOnce(source).events.map((e) => hashState(e));

    expect(history1).toEqual(history2);
  });

  it('should produce different logs for different routes', () => {
    const run1 = runOnce(createSource(12345));
    const run2 = runOnce(createSource(67890));

    expect(run1.metadata.eventLogHash).not.toBe(run2.metadata.eventLogHash);
  });

  it('should match the hash of the serialized document', () => {
    const results = runOnce(createSource(7));
    const document = serializeResults(results);

    expect(document.metadata.event_log_hash).toBe(results.metadata.eventLogHash);
    expect(document.events).toHaveLength(results.events.length);
  });
});
