/**
 * World State Management
 * Defaults and construction of entities from a validated configuration
 */

import type {
  CustomerId,
  CustomerSiteState,
  DistanceMatrix,
  ShipId,
  ShipState,
  SimulationConfig,
  SimulationParamsRecord,
} from './types.js';
import { createShip } from '../systems/shipping.js';
import { createCustomerSite } from '../systems/consumption.js';

export const DEFAULT_PORT_LOCATION = 'port_main';

/**
 * Parameter defaults. `simulation_duration` and `time_step` have none and
 * must come from the data source or an override.
 */
export const DEFAULT_PARAMS: Required<
  Omit<SimulationParamsRecord, 'simulation_duration' | 'time_step'>
> = {
  resupply_threshold_days: 3.0, // Trigger resupply below 3 days of supply
  loading_rate: 5000.0, // Units per hour
  unloading_rate: 4000.0, // Units per hour
  port_resupply_delay: 12.0, // Hours at port before loading starts
  random_seed: 42,
  port_location: DEFAULT_PORT_LOCATION,
  ship_speed_multiplier: 1.0,
};

export interface WorldState {
  ships: Map<ShipId, ShipState>;
  customers: Map<CustomerId, CustomerSiteState>;
  distances: DistanceMatrix;
}

/**
 * Build fresh entities for one run. Nothing is shared with the configuration.
 */
export function initializeWorld(config: SimulationConfig): WorldState {
  const ships = new Map<ShipId, ShipState>();
  for (const shipConfig of config.ships) {
    ships.set(shipConfig.id, createShip(shipConfig, config.params.shipSpeedMultiplier));
  }

  const customers = new Map<CustomerId, CustomerSiteState>();
  for (const customerConfig of config.customers) {
    customers.set(customerConfig.id, createCustomerSite(customerConfig));
  }

  return {
    ships,
    customers,
    distances: structuredClone(config.distances),
  };
}
