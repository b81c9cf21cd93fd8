/**
 * Validation of the input contract
 * Raw snake_case records from a data source become typed camelCase config
 */

import { z } from 'zod';
import type {
  ConfigurationSnapshot,
  CustomerConfig,
  DistanceMatrix,
  ParamName,
  ParamOverrides,
  ShipConfig,
  SimulationConfig,
  SimulationParams,
} from '../core/types.js';
import { MalformedConfigurationError } from '../core/errors.js';
import { DEFAULT_PARAMS } from '../core/world.js';

const amount = z.number().finite().nonnegative();

export const PARAM_NAMES = [
  'simulation_duration',
  'time_step',
  'resupply_threshold_days',
  'loading_rate',
  'unloading_rate',
  'port_resupply_delay',
  'random_seed',
  'port_location',
  'ship_speed_multiplier',
] as const satisfies readonly ParamName[];

export function isParamName(name: string): name is ParamName {
  return PARAM_NAMES.some((p) => p === name);
}

export const ShipConfigSchema = z
  .object({
    id: z.string().min(1, 'Ship id cannot be empty'),
    name: z.string(),
    capacity: amount,
    speed: z.number().finite().positive(),
    initial_location: z.string().min(1, 'Initial location cannot be empty'),
    initial_cargo: amount.default(0),
  })
  .transform(
    (s): ShipConfig => ({
      id: s.id,
      name: s.name,
      capacity: s.capacity,
      speed: s.speed,
      initialLocation: s.initial_location,
      initialCargo: Math.min(s.initial_cargo, s.capacity),
    })
  );

export const CustomerConfigSchema = z
  .object({
    id: z.string().min(1, 'Customer id cannot be empty'),
    name: z.string(),
    location: z.string().min(1, 'Location cannot be empty'),
    demand_rate: z.number().finite(),
    initial_inventory: amount,
    min_inventory: amount,
    max_inventory: amount,
  })
  .refine((c) => c.min_inventory <= c.max_inventory, {
    message: 'min_inventory cannot exceed max_inventory',
    path: ['min_inventory'],
  })
  .transform(
    (c): CustomerConfig => ({
      id: c.id,
      name: c.name,
      location: c.location,
      demandRate: c.demand_rate,
      initialInventory: Math.min(c.initial_inventory, c.max_inventory),
      minInventory: c.min_inventory,
      maxInventory: c.max_inventory,
    })
  );

export const DistanceMatrixSchema: z.ZodType<DistanceMatrix> = z.record(z.record(amount));

export const SimulationParamsSchema = z
  .object({
    simulation_duration: z.number().finite(),
    time_step: z.number().finite().positive(),
    resupply_threshold_days: z.number().finite(),
    loading_rate: z.number().finite().positive(),
    unloading_rate: z.number().finite().positive(),
    port_resupply_delay: amount,
    random_seed: z.number().int(),
    port_location: z.string().min(1),
    ship_speed_multiplier: z.number().finite().positive(),
  })
  .transform(
    (p): SimulationParams => ({
      simulationDuration: p.simulation_duration,
      timeStep: p.time_step,
      resupplyThresholdDays: p.resupply_threshold_days,
      loadingRate: p.loading_rate,
      unloadingRate: p.unloading_rate,
      portResupplyDelay: p.port_resupply_delay,
      randomSeed: p.random_seed,
      portLocation: p.port_location,
      shipSpeedMultiplier: p.ship_speed_multiplier,
    })
  );

/**
 * Shape accepted for overrides, from the CLI or an overrides file
 */
export const ParamOverridesSchema: z.ZodType<ParamOverrides> = z
  .object({
    simulation_duration: z.number(),
    time_step: z.number(),
    resupply_threshold_days: z.number(),
    loading_rate: z.number(),
    unloading_rate: z.number(),
    port_resupply_delay: z.number(),
    random_seed: z.number(),
    port_location: z.string(),
    ship_speed_multiplier: z.number(),
  })
  .partial()
  .strict();

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

function parseSection<S extends z.ZodTypeAny>(schema: S, section: string, data: unknown): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new MalformedConfigurationError(section, formatIssues(result.error));
  }
  return result.data;
}

function assertUniqueIds(section: string, items: ReadonlyArray<{ id: string }>): void {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const item of items) {
    if (seen.has(item.id)) duplicates.push(`${item.id}: duplicate id`);
    seen.add(item.id);
  }
  if (duplicates.length > 0) {
    throw new MalformedConfigurationError(section, duplicates);
  }
}

export function parseShips(data: unknown): ShipConfig[] {
  const ships = parseSection(z.array(ShipConfigSchema), 'ships', data);
  assertUniqueIds('ships', ships);
  return ships;
}

export function parseCustomers(data: unknown): CustomerConfig[] {
  const customers = parseSection(z.array(CustomerConfigSchema), 'customers', data);
  assertUniqueIds('customers', customers);
  return customers;
}

export function parseDistances(data: unknown): DistanceMatrix {
  return parseSection(DistanceMatrixSchema, 'distances', data);
}

/**
 * Defaults, then source values, then overrides
 */
export function parseParams(
  source: Record<string, unknown>,
  overrides: ParamOverrides = {}
): SimulationParams {
  return parseSection(SimulationParamsSchema, 'params', {
    ...DEFAULT_PARAMS,
    ...source,
    ...overrides,
  });
}

export function parseOverrides(data: unknown): ParamOverrides {
  return parseSection(ParamOverridesSchema, 'overrides', data);
}

/**
 * Validate a whole snapshot. Throws MalformedConfigurationError on the first bad section.
 */
export function parseConfiguration(
  snapshot: ConfigurationSnapshot,
  overrides: ParamOverrides = {}
): SimulationConfig {
  return {
    ships: parseShips(snapshot.ships),
    customers: parseCustomers(snapshot.customers),
    distances: parseDistances(snapshot.distances),
    params: parseParams(snapshot.params, overrides),
  };
}
