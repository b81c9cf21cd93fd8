/**
 * Example fleet, customers and parameters used to seed empty data sources
 */

import type {
  CustomerConfigRecord,
  DistanceMatrix,
  LocationId,
  ShipConfigRecord,
  SimulationParamsRecord,
} from '../core/types.js';
import { SeededRNG } from '../core/rng.js';
import { DEFAULT_PORT_LOCATION } from '../core/world.js';

export const EXAMPLE_SHIPS: ShipConfigRecord[] = [
  { id: 'ship_1', name: 'Vessel Alpha', capacity: 100000, speed: 25, initial_location: 'port_main', initial_cargo: 80000 },
  { id: 'ship_2', name: 'Vessel Beta', capacity: 75000, speed: 30, initial_location: 'port_main', initial_cargo: 60000 },
  { id: 'ship_3', name: 'Vessel Gamma', capacity: 120000, speed: 20, initial_location: 'port_main', initial_cargo: 100000 },
];

export const EXAMPLE_CUSTOMERS: CustomerConfigRecord[] = [
  { id: 'customer_1', name: 'Manufacturing Plant A', location: 'location_a', demand_rate: 1000, initial_inventory: 48000, min_inventory: 24000, max_inventory: 120000 },
  { id: 'customer_2', name: 'Distribution Center B', location: 'location_b', demand_rate: 750, initial_inventory: 36000, min_inventory: 18000, max_inventory: 90000 },
  { id: 'customer_3', name: 'Processing Facility C', location: 'location_c', demand_rate: 1200, initial_inventory: 57600, min_inventory: 28800, max_inventory: 144000 },
];

export const EXAMPLE_PARAMS: SimulationParamsRecord = {
  simulation_duration: 720.0, // 30 days
  time_step: 1.0,
  resupply_threshold_days: 3.0,
  loading_rate: 5000.0,
  unloading_rate: 4000.0,
  port_resupply_delay: 12.0,
  random_seed: 42,
};

/**
 * Symmetric matrix with zero diagonal and distances drawn from [min, max)
 */
export function generateDistanceMatrix(
  locations: readonly LocationId[],
  seed: number,
  min: number = 200,
  max: number = 800
): DistanceMatrix {
  const rng = new SeededRNG(seed);
  const matrix: DistanceMatrix = {};

  for (const from of locations) {
    matrix[from] = {};
  }
  for (let i = 0; i < locations.length; i++) {
    const from = locations[i];
    matrix[from][from] = 0;
    for (let j = i + 1; j < locations.length; j++) {
      const to = locations[j];
      const distance = Math.round(rng.randomRange(min, max) * 10) / 10;
      matrix[from][to] = distance;
      matrix[to][from] = distance;
    }
  }

  return matrix;
}

/**
 * Port first, then each example customer's location
 */
export function exampleLocations(): LocationId[] {
  return [DEFAULT_PORT_LOCATION, ...EXAMPLE_CUSTOMERS.map((c) => c.location)];
}
