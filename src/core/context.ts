/**
 * Simulation context shared by every process step
 * The single owner of the mutable ship and customer registries during a run
 */

import type {
  CustomerId,
  CustomerSiteState,
  DistanceMatrix,
  ProcessId,
  ProcessKind,
  ShipId,
  ShipState,
  SimTime,
  SimulationEvent,
  SimulationParams,
} from './types.js';
import type { SimProcess } from './scheduler.js';

export interface SimulationContext {
  readonly now: SimTime;
  readonly params: SimulationParams;
  readonly ships: Map<ShipId, ShipState>;
  readonly customers: Map<CustomerId, CustomerSiteState>;
  readonly distances: DistanceMatrix;
  emit(event: SimulationEvent): void;
  spawn(process: SimProcess<SimulationContext>): void;
  nextProcessId(kind: ProcessKind): ProcessId;
  debug(message: string): void;
}

export type SimulationProcess = SimProcess<SimulationContext>;

/**
 * Look up an entity that a process was created for
 */
export function requireShip(ctx: SimulationContext, shipId: ShipId): ShipState {
  const ship = ctx.ships.get(shipId);
  if (ship === undefined) {
    throw new Error(`Unknown ship ${shipId}`);
  }
  return ship;
}

export function requireCustomer(ctx: SimulationContext, customerId: CustomerId): CustomerSiteState {
  const customer = ctx.customers.get(customerId);
  if (customer === undefined) {
    throw new Error(`Unknown customer ${customerId}`);
  }
  return customer;
}
