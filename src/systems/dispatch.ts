/**
 * Dispatch System
 * Matches an under-supplied customer with an idle, cargo-bearing ship
 */

import type { CustomerSiteState, ShipId, ShipState, SimTime } from '../core/types.js';
import type { SimulationContext } from '../core/context.js';
import { isDispatchEligible, reserveShip } from './shipping.js';
import { DeliveryProcess } from '../processes/delivery-process.js';

/** Deliveries aim to refill a site to this share of its storage */
export const TARGET_FILL_RATIO = 0.8;

export type DispatchResult =
  | { kind: 'not_needed' }
  | { kind: 'no_ship'; neededAmount: number }
  | { kind: 'dispatched'; shipId: ShipId; neededAmount: number };

/**
 * Units needed to bring the customer up to the target fill level
 */
export function calculateNeededAmount(customer: CustomerSiteState): number {
  return customer.maxInventory * TARGET_FILL_RATIO - customer.currentInventory;
}

/**
 * Pick the eligible ship carrying the most cargo.
 * Equal cargo goes to the lowest ship id.
 */
export function selectShip(ships: Iterable<ShipState>, now: SimTime): ShipState | undefined {
  let best: ShipState | undefined;

  for (const ship of ships) {
    if (!isDispatchEligible(ship, now)) continue;
    if (
      best === undefined ||
      ship.currentCargo > best.currentCargo ||
      (ship.currentCargo === best.currentCargo && ship.id < best.id)
    ) {
      best = ship;
    }
  }

  return best;
}

/**
 * Try to start a delivery to the customer.
 * The chosen ship is reserved before its delivery process first runs, so a
 * second request in the same instant cannot claim it.
 */
export function dispatchDelivery(
  ctx: SimulationContext,
  customer: CustomerSiteState
): DispatchResult {
  const neededAmount = calculateNeededAmount(customer);
  if (neededAmount <= 0) {
    return { kind: 'not_needed' };
  }

  const ship = selectShip(ctx.ships.values(), ctx.now);
  if (ship === undefined) {
    ctx.emit({
      type: 'delivery_failed',
      time: ctx.now,
      customerId: customer.id,
      reason: 'no_ships_available',
      neededAmount,
    });
    return { kind: 'no_ship', neededAmount };
  }

  reserveShip(ship);
  ctx.spawn(
    new DeliveryProcess(ctx.nextProcessId('delivery'), ship.id, customer.id, neededAmount)
  );
  ctx.debug(`Dispatched ${ship.id} to ${customer.id} for ${neededAmount.toFixed(1)} units`);

  return { kind: 'dispatched', shipId: ship.id, neededAmount };
}
