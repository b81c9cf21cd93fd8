/**
 * Test fixtures: configuration records, snapshots and a hand-driven context
 */

import type {
  ConfigurationSnapshot,
  CustomerConfigRecord,
  CustomerId,
  CustomerSiteState,
  DistanceMatrix,
  ProcessKind,
  ShipConfigRecord,
  ShipId,
  ShipState,
  SimulationEvent,
  SimulationParams,
  SimulationParamsRecord,
} from '../../src/core/types.js';
import type { SimulationContext, SimulationProcess } from '../../src/core/context.js';
import { createShip } from '../../src/systems/shipping.js';
import { createCustomerSite } from '../../src/systems/consumption.js';

export function shipRecord(
  id: string,
  overrides: Partial<ShipConfigRecord> = {}
): ShipConfigRecord {
  return {
    id,
    name: `Ship ${id}`,
    capacity: 10000,
    speed: 10,
    initial_location: 'port',
    initial_cargo: 10000,
    ...overrides,
  };
}

export function customerRecord(
  id: string,
  overrides: Partial<CustomerConfigRecord> = {}
): CustomerConfigRecord {
  return {
    id,
    name: `Customer ${id}`,
    location: 'site_a',
    demand_rate: 100,
    initial_inventory: 10000,
    min_inventory: 2000,
    max_inventory: 20000,
    ...overrides,
  };
}

export function paramsRecord(
  overrides: Partial<SimulationParamsRecord> = {}
): SimulationParamsRecord {
  return {
    simulation_duration: 24,
    time_step: 1,
    resupply_threshold_days: 3,
    loading_rate: 1000,
    unloading_rate: 1000,
    port_resupply_delay: 2,
    random_seed: 42,
    port_location: 'port',
    ...overrides,
  };
}

export function snapshot(parts: {
  ships?: ShipConfigRecord[];
  customers?: CustomerConfigRecord[];
  distances?: DistanceMatrix;
  params?: Partial<SimulationParamsRecord>;
}): ConfigurationSnapshot {
  return {
    ships: parts.ships ?? [shipRecord('ship_1')],
    customers: parts.customers ?? [customerRecord('customer_1')],
    distances: parts.distances ?? {
      port: { port: 0, site_a: 100 },
      site_a: { site_a: 0, port: 100 },
    },
    params: { ...paramsRecord(parts.params) },
  };
}

export function makeShip(id: ShipId, overrides: Partial<ShipState> = {}): ShipState {
  return {
    ...createShip({
      id,
      name: `Ship ${id}`,
      capacity: 10000,
      speed: 10,
      initialLocation: 'port',
      initialCargo: 10000,
    }),
    ...overrides,
  };
}

export function makeCustomer(
  id: CustomerId,
  overrides: Partial<CustomerSiteState> = {}
): CustomerSiteState {
  return {
    ...createCustomerSite({
      id,
      name: `Customer ${id}`,
      location: 'site_a',
      demandRate: 100,
      initialInventory: 10000,
      minInventory: 2000,
      maxInventory: 20000,
    }),
    ...overrides,
  };
}

export const TEST_PARAMS: SimulationParams = {
  simulationDuration: 24,
  timeStep: 1,
  resupplyThresholdDays: 3,
  loadingRate: 1000,
  unloadingRate: 1000,
  portResupplyDelay: 2,
  randomSeed: 42,
  portLocation: 'port',
  shipSpeedMultiplier: 1,
};

/**
 * Context driven by hand: the test sets `now` and inspects what was emitted
 */
export interface TestContext extends SimulationContext {
  now: number;
  events: SimulationEvent[];
  spawned: SimulationProcess[];
}

export function makeContext(parts: {
  ships?: ShipState[];
  customers?: CustomerSiteState[];
  distances?: DistanceMatrix;
  params?: Partial<SimulationParams>;
  now?: number;
}): TestContext {
  const counters: Record<ProcessKind, number> = { consumption: 0, delivery: 0, resupply: 0 };
  const events: SimulationEvent[] = [];
  const spawned: SimulationProcess[] = [];

  return {
    now: parts.now ?? 0,
    params: { ...TEST_PARAMS, ...parts.params },
    ships: new Map((parts.ships ?? []).map((s) => [s.id, s])),
    customers: new Map((parts.customers ?? []).map((c) => [c.id, c])),
    distances: parts.distances ?? {
      port: { port: 0, site_a: 100 },
      site_a: { site_a: 0, port: 100 },
    },
    events,
    spawned,
    emit: (event) => {
      events.push(event);
    },
    spawn: (process) => {
      spawned.push(process);
    },
    nextProcessId: (kind) => `${kind}_${++counters[kind]}`,
    debug: () => {},
  };
}
