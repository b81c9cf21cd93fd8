/**
 * Metrics System
 * Pure post-run aggregation over the event log and final entity state
 */

import type {
  ConsumptionEvent,
  CustomerMetrics,
  CustomerSiteState,
  DistanceMatrix,
  ShipMetrics,
  ShipState,
  SimulationEvent,
  SimulationMetrics,
  SimulationParams,
} from '../core/types.js';
import { eventsOfType } from '../core/event-log.js';
import { getDistance } from './shipping.js';

export interface MetricsInput {
  events: readonly SimulationEvent[];
  ships: Iterable<ShipState>;
  customers: Iterable<CustomerSiteState>;
  distances: DistanceMatrix;
  params: Pick<SimulationParams, 'timeStep' | 'simulationDuration'>;
}

const SHIP_ACTIVITY_EVENTS: ReadonlySet<SimulationEvent['type']> = new Set([
  'delivery_started',
  'delivery_completed',
  'resupply_started',
  'resupply_completed',
]);

export function isStockout(event: ConsumptionEvent): boolean {
  return event.currentInventory === 0;
}

/**
 * Inventory statistics for one customer, or null if it never consumed
 */
export function calculateCustomerMetrics(
  consumption: readonly ConsumptionEvent[],
  params: Pick<SimulationParams, 'timeStep' | 'simulationDuration'>
): CustomerMetrics | null {
  if (consumption.length === 0) {
    return null;
  }

  let total = 0;
  let min = Number.POSITIVE_INFINITY;
  let stockouts = 0;
  for (const event of consumption) {
    total += event.currentInventory;
    min = Math.min(min, event.currentInventory);
    if (isStockout(event)) stockouts++;
  }

  const stockoutHours = stockouts * params.timeStep;
  const serviceLevel =
    params.simulationDuration > 0 ? 1 - stockoutHours / params.simulationDuration : 1;

  return {
    avgInventory: total / consumption.length,
    minInventory: min,
    stockoutHours,
    serviceLevel,
  };
}

/**
 * Distance over every journey the matrix can resolve
 */
export function calculateTotalDistance(ship: ShipState, distances: DistanceMatrix): number {
  let total = 0;
  for (const journey of ship.travelHistory) {
    total += getDistance(journey.departure, journey.destination, distances) ?? 0;
  }
  return total;
}

export function computeMetrics(input: MetricsInput): SimulationMetrics {
  const consumption = eventsOfType(input.events, 'consumption');

  const customerMetrics: Record<string, CustomerMetrics> = {};
  for (const customer of input.customers) {
    const own = consumption.filter((e) => e.customerId === customer.id);
    const metrics = calculateCustomerMetrics(own, input.params);
    if (metrics !== null) {
      customerMetrics[customer.id] = metrics;
    }
  }

  const shipMetrics: Record<string, ShipMetrics> = {};
  for (const ship of input.ships) {
    let active = false;
    let numDeliveries = 0;
    let numResupplies = 0;

    for (const event of input.events) {
      if (!SHIP_ACTIVITY_EVENTS.has(event.type)) continue;
      if (!('shipId' in event) || event.shipId !== ship.id) continue;
      active = true;
      if (event.type === 'delivery_completed') numDeliveries++;
      if (event.type === 'resupply_completed') numResupplies++;
    }

    if (active) {
      shipMetrics[ship.id] = {
        totalDistance: calculateTotalDistance(ship, input.distances),
        numDeliveries,
        numResupplies,
      };
    }
  }

  const serviceLevels = Object.values(customerMetrics).map((m) => m.serviceLevel);
  const overallServiceLevel =
    serviceLevels.length > 0
      ? serviceLevels.reduce((sum, level) => sum + level, 0) / serviceLevels.length
      : 0;

  const totalDeliveredAmount = eventsOfType(input.events, 'delivery_completed').reduce(
    (sum, e) => sum + e.amountDelivered,
    0
  );

  return {
    overallServiceLevel,
    totalStockoutEvents: consumption.filter(isStockout).length,
    totalDeliveredAmount,
    totalFailedDispatches: eventsOfType(input.events, 'delivery_failed').length,
    totalProcessFailures: eventsOfType(input.events, 'process_failed').length,
    customerMetrics,
    shipMetrics,
  };
}
