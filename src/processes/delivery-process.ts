/**
 * Delivery process
 * start -> traveling -> unloading -> done
 */

import type { CustomerId, ProcessId, ProcessOutcome, ShipId } from '../core/types.js';
import {
  requireCustomer,
  requireShip,
  type SimulationContext,
  type SimulationProcess,
} from '../core/context.js';
import { travelTo, unloadCargo, occupyShip, releaseShip, reserveShip } from '../systems/shipping.js';
import { receiveDelivery } from '../systems/consumption.js';
import { ResupplyProcess } from './resupply-process.js';

/** Below this share of capacity a ship heads back to port after delivering */
export const RESUPPLY_CARGO_RATIO = 0.2;

type DeliveryPhase = 'start' | 'traveling' | 'unloading' | 'done';

export class DeliveryProcess implements SimulationProcess {
  readonly kind = 'delivery';
  private phase: DeliveryPhase = 'start';
  private deliveryAmount = 0;

  constructor(
    readonly id: ProcessId,
    readonly shipId: ShipId,
    readonly customerId: CustomerId,
    readonly requestedAmount: number
  ) {}

  getPhase(): DeliveryPhase {
    return this.phase;
  }

  resume(ctx: SimulationContext): ProcessOutcome {
    const ship = requireShip(ctx, this.shipId);
    const customer = requireCustomer(ctx, this.customerId);

    switch (this.phase) {
      case 'start': {
        ctx.emit({
          type: 'delivery_started',
          time: ctx.now,
          shipId: ship.id,
          shipName: ship.name,
          customerId: customer.id,
          customerName: customer.name,
          requestedAmount: this.requestedAmount,
          availableCargo: ship.currentCargo,
        });

        const arrival = travelTo(ship, customer.location, ctx.distances, ctx.now);
        this.phase = 'traveling';
        return { kind: 'wait', duration: arrival - ctx.now };
      }

      case 'traveling': {
        ctx.emit({
          type: 'ship_arrived',
          time: ctx.now,
          shipId: ship.id,
          shipName: ship.name,
          location: customer.location,
          customerId: customer.id,
          customerName: customer.name,
        });

        this.deliveryAmount = Math.min(this.requestedAmount, ship.currentCargo);
        const unloadingTime = this.deliveryAmount / ctx.params.unloadingRate;
        occupyShip(ship, ctx.now + unloadingTime, 'unloading');
        this.phase = 'unloading';
        return { kind: 'wait', duration: unloadingTime };
      }

      case 'unloading': {
        const unloaded = unloadCargo(ship, this.deliveryAmount);
        const received = receiveDelivery(customer, unloaded, ctx.now);

        ctx.emit({
          type: 'delivery_completed',
          time: ctx.now,
          shipId: ship.id,
          shipName: ship.name,
          customerId: customer.id,
          customerName: customer.name,
          amountUnloaded: unloaded,
          amountDelivered: received,
          customerInventory: customer.currentInventory,
          shipRemainingCargo: ship.currentCargo,
        });

        if (ship.currentCargo < RESUPPLY_CARGO_RATIO * ship.capacity) {
          // Stays out of the pool until the resupply process has run
          reserveShip(ship);
          ctx.spawn(new ResupplyProcess(ctx.nextProcessId('resupply'), ship.id));
        } else {
          releaseShip(ship, ctx.now);
        }

        this.phase = 'done';
        return { kind: 'done' };
      }

      case 'done':
        return { kind: 'done' };
    }
  }
}
