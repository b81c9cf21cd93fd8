/**
 * Results Serializer
 * Converts run results to the JSON results document handed to persistence
 */

import type {
  SimulationEvent,
  SimulationMetrics,
  SimulationResults,
  SimulationParams,
} from '../core/types.js';

// ============================================================================
// Document Types
// ============================================================================

export interface ParamsSnapshot {
  simulation_duration: number;
  time_step: number;
  resupply_threshold_days: number;
  loading_rate: number;
  unloading_rate: number;
  port_resupply_delay: number;
  random_seed: number;
  port_location: string;
  ship_speed_multiplier: number;
}

export interface MetadataSnapshot {
  start_time: string;
  end_time: string;
  duration_seconds: number;
  simulated_until: number;
  params: ParamsSnapshot;
  counts: {
    ships: number;
    customers: number;
    events: number;
    processes_spawned: number;
    processes_completed: number;
    processes_failed: number;
    processes_truncated: number;
  };
  event_log_hash: string;
}

/** Event fields in snake_case; non-finite numbers become null */
export type EventSnapshot = { time: number; type: SimulationEvent['type'] } & Record<
  string,
  string | number | null
>;

export interface MetricsSnapshot {
  overall_service_level: number;
  total_stockout_events: number;
  total_delivered_amount: number;
  total_failed_dispatches: number;
  total_process_failures: number;
  customer_metrics: Record<
    string,
    { avg_inventory: number; min_inventory: number; stockout_hours: number; service_level: number }
  >;
  ship_metrics: Record<
    string,
    { total_distance: number; num_deliveries: number; num_resupplies: number }
  >;
}

export interface ShipHistorySnapshot {
  ship_id: string;
  ship_name: string;
  departure: string;
  destination: string;
  departure_time: number;
  arrival_time: number;
  cargo: number;
}

export interface CustomerHistorySnapshot {
  customer_id: string;
  customer_name: string;
  time: number;
  inventory: number;
  demand: number;
  fulfilled: number;
  shortage: number;
}

export interface ResultsDocument {
  metadata: MetadataSnapshot;
  events: EventSnapshot[];
  metrics: MetricsSnapshot;
  ships_history: ShipHistorySnapshot[];
  customers_history: CustomerHistorySnapshot[];
}

// ============================================================================
// Serialization
// ============================================================================

function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

function finiteOrNull(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}

export function serializeParams(params: SimulationParams): ParamsSnapshot {
  return {
    simulation_duration: params.simulationDuration,
    time_step: params.timeStep,
    resupply_threshold_days: params.resupplyThresholdDays,
    loading_rate: params.loadingRate,
    unloading_rate: params.unloadingRate,
    port_resupply_delay: params.portResupplyDelay,
    random_seed: params.randomSeed,
    port_location: params.portLocation,
    ship_speed_multiplier: params.shipSpeedMultiplier,
  };
}

export function serializeEvent(event: SimulationEvent): EventSnapshot {
  const snapshot: EventSnapshot = { time: event.time, type: event.type };
  for (const [key, value] of Object.entries(event)) {
    if (key === 'time' || key === 'type' || value === undefined) continue;
    snapshot[toSnakeCase(key)] = typeof value === 'number' ? finiteOrNull(value) : String(value);
  }
  return snapshot;
}

export function serializeMetrics(metrics: SimulationMetrics): MetricsSnapshot {
  const customerMetrics: MetricsSnapshot['customer_metrics'] = {};
  for (const [id, m] of Object.entries(metrics.customerMetrics)) {
    customerMetrics[id] = {
      avg_inventory: m.avgInventory,
      min_inventory: m.minInventory,
      stockout_hours: m.stockoutHours,
      service_level: m.serviceLevel,
    };
  }

  const shipMetrics: MetricsSnapshot['ship_metrics'] = {};
  for (const [id, m] of Object.entries(metrics.shipMetrics)) {
    shipMetrics[id] = {
      total_distance: m.totalDistance,
      num_deliveries: m.numDeliveries,
      num_resupplies: m.numResupplies,
    };
  }

  return {
    overall_service_level: metrics.overallServiceLevel,
    total_stockout_events: metrics.totalStockoutEvents,
    total_delivered_amount: metrics.totalDeliveredAmount,
    total_failed_dispatches: metrics.totalFailedDispatches,
    total_process_failures: metrics.totalProcessFailures,
    customer_metrics: customerMetrics,
    ship_metrics: shipMetrics,
  };
}

/**
 * Build the results document for a completed run
 */
export function serializeResults(results: SimulationResults): ResultsDocument {
  const { metadata } = results;

  return {
    metadata: {
      start_time: metadata.startTime,
      end_time: metadata.endTime,
      duration_seconds: metadata.durationSeconds,
      simulated_until: metadata.simulatedUntil,
      params: serializeParams(metadata.params),
      counts: {
        ships: metadata.numShips,
        customers: metadata.numCustomers,
        events: metadata.numEvents,
        processes_spawned: metadata.processes.spawned,
        processes_completed: metadata.processes.completed,
        processes_failed: metadata.processes.failed,
        processes_truncated: metadata.processes.truncated,
      },
      event_log_hash: metadata.eventLogHash,
    },
    events: results.events.map(serializeEvent),
    metrics: serializeMetrics(results.metrics),
    ships_history: results.shipsHistory.map((row) => ({
      ship_id: row.shipId,
      ship_name: row.shipName,
      departure: row.departure,
      destination: row.destination,
      departure_time: row.departureTime,
      arrival_time: row.arrivalTime,
      cargo: row.cargo,
    })),
    customers_history: results.customersHistory.map((row) => ({
      customer_id: row.customerId,
      customer_name: row.customerName,
      time: row.time,
      inventory: row.inventory,
      demand: row.demand,
      fulfilled: row.fulfilled,
      shortage: row.shortage,
    })),
  };
}
