/**
 * Configuration Schema Tests
 * Input contract validation and parameter precedence
 */

import { describe, it, expect } from 'vitest';
import {
  parseConfiguration,
  parseCustomers,
  parseDistances,
  parseOverrides,
  parseParams,
  parseShips,
} from '../../src/config/schema.js';
import { MalformedConfigurationError } from '../../src/core/errors.js';
import { customerRecord, paramsRecord, shipRecord, snapshot } from '../helpers/fixtures.js';

function captureError(fn: () => unknown): MalformedConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof MalformedConfigurationError) return error;
    throw error;
  }
  throw new Error('expected MalformedConfigurationError');
}

describe('parseShips', () => {
  it('should convert records to camelCase config', () => {
    expect(parseShips([shipRecord('s1', { initial_cargo: 2500 })])).toEqual([
      {
        id: 's1',
        name: 'Ship s1',
        capacity: 10000,
        speed: 10,
        initialLocation: 'port',
        initialCargo: 2500,
      },
    ]);
  });

  it('should default missing cargo to empty and clamp excess cargo', () => {
    const { initial_cargo: _omitted, ...withoutCargo } = shipRecord('s1');
    const [empty, overfull] = parseShips([
      withoutCargo,
      shipRecord('s2', { capacity: 100, initial_cargo: 150 }),
    ]);

    expect(empty.initialCargo).toBe(0);
    expect(overfull.initialCargo).toBe(100);
  });

  it('should list every issue with its path', () => {
    const error = captureError(() =>
      parseShips([{ id: 's1', name: 'No speed', capacity: 'lots', initial_location: 'port' }])
    );

    expect(error.section).toBe('ships');
    expect(error.issues).toEqual([
      '0.capacity: Expected number, received string',
      '0.speed: Required',
    ]);
    expect(error.code).toBe('MALFORMED_CONFIGURATION');
  });

  it('should reject duplicate ids', () => {
    const error = captureError(() => parseShips([shipRecord('s1'), shipRecord('s1')]));

    expect(error.issues).toEqual(['s1: duplicate id']);
  });

  it('should reject a non-positive speed', () => {
    expect(() => parseShips([shipRecord('s1', { speed: 0 })])).toThrow(MalformedConfigurationError);
  });
});

describe('parseCustomers', () => {
  it('should convert records and clamp initial inventory', () => {
    const [customer] = parseCustomers([
      customerRecord('c1', { initial_inventory: 30000, max_inventory: 20000 }),
    ]);

    expect(customer).toEqual({
      id: 'c1',
      name: 'Customer c1',
      location: 'site_a',
      demandRate: 100,
      initialInventory: 20000,
      minInventory: 2000,
      maxInventory: 20000,
    });
  });

  it('should reject a minimum above the maximum', () => {
    const error = captureError(() =>
      parseCustomers([customerRecord('c1', { min_inventory: 25000, max_inventory: 20000 })])
    );

    expect(error.section).toBe('customers');
    expect(error.issues).toEqual(['0.min_inventory: min_inventory cannot exceed max_inventory']);
  });

  it('should reject a list that is not an array', () => {
    expect(() => parseCustomers({ c1: customerRecord('c1') })).toThrow(
      'Malformed customers configuration: (root): Expected array, received object'
    );
  });
});

describe('parseDistances', () => {
  it('should accept a nested matrix and reject negative entries', () => {
    expect(parseDistances({ port: { a: 10 } })).toEqual({ port: { a: 10 } });
    expect(() => parseDistances({ port: { a: -1 } })).toThrow(MalformedConfigurationError);
  });
});

describe('parseParams', () => {
  it('should layer defaults, source values and overrides', () => {
    const params = parseParams(
      { simulation_duration: 100, time_step: 2, loading_rate: 3000 },
      { loading_rate: 9000 }
    );

    expect(params).toEqual({
      simulationDuration: 100,
      timeStep: 2,
      resupplyThresholdDays: 3,
      loadingRate: 9000,
      unloadingRate: 4000,
      portResupplyDelay: 12,
      randomSeed: 42,
      portLocation: 'port_main',
      shipSpeedMultiplier: 1,
    });
  });

  it('should require a duration and a positive time step', () => {
    expect(() => parseParams({ time_step: 1 })).toThrow(
      'Malformed params configuration: simulation_duration: Required'
    );
    expect(() => parseParams(paramsRecord({ time_step: 0 }))).toThrow(MalformedConfigurationError);
  });

  it('should accept a zero or negative duration', () => {
    expect(parseParams(paramsRecord({ simulation_duration: 0 })).simulationDuration).toBe(0);
    expect(parseParams(paramsRecord({ simulation_duration: -5 })).simulationDuration).toBe(-5);
  });
});

describe('parseOverrides', () => {
  it('should reject unknown parameter names', () => {
    expect(() => parseOverrides({ warp_factor: 9 })).toThrow(MalformedConfigurationError);
  });

  it('should reject values of the wrong type', () => {
    expect(() => parseOverrides({ loading_rate: 'fast' })).toThrow(MalformedConfigurationError);
  });
});

describe('parseConfiguration', () => {
  it('should validate a whole snapshot', () => {
    const config = parseConfiguration(snapshot({}), { simulation_duration: 48 });

    expect(config.ships.map((s) => s.id)).toEqual(['ship_1']);
    expect(config.customers.map((c) => c.id)).toEqual(['customer_1']);
    expect(config.params.simulationDuration).toBe(48);
    expect(config.params.portLocation).toBe('port');
  });
});
