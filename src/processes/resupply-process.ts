/**
 * Resupply process
 * start -> traveling -> at_port -> loading -> done
 */

import type { ProcessId, ProcessOutcome, ShipId } from '../core/types.js';
import { requireShip, type SimulationContext, type SimulationProcess } from '../core/context.js';
import { travelTo, loadCargo, occupyShip, releaseShip } from '../systems/shipping.js';

type ResupplyPhase = 'start' | 'traveling' | 'at_port' | 'loading' | 'done';

export class ResupplyProcess implements SimulationProcess {
  readonly kind = 'resupply';
  private phase: ResupplyPhase = 'start';

  constructor(
    readonly id: ProcessId,
    readonly shipId: ShipId
  ) {}

  getPhase(): ResupplyPhase {
    return this.phase;
  }

  resume(ctx: SimulationContext): ProcessOutcome {
    const ship = requireShip(ctx, this.shipId);
    const port = ctx.params.portLocation;

    switch (this.phase) {
      case 'start': {
        ctx.emit({
          type: 'resupply_started',
          time: ctx.now,
          shipId: ship.id,
          shipName: ship.name,
          currentLocation: ship.currentLocation,
          destination: port,
          currentCargo: ship.currentCargo,
        });

        if (ship.currentLocation !== port) {
          const arrival = travelTo(ship, port, ctx.distances, ctx.now);
          this.phase = 'traveling';
          return { kind: 'wait', duration: arrival - ctx.now };
        }
        return this.arriveAtPort(ctx);
      }

      case 'traveling':
        return this.arriveAtPort(ctx);

      case 'at_port': {
        const loadingTime = (ship.capacity - ship.currentCargo) / ctx.params.loadingRate;
        occupyShip(ship, ctx.now + loadingTime, 'loading');
        this.phase = 'loading';
        return { kind: 'wait', duration: loadingTime };
      }

      case 'loading': {
        loadCargo(ship, ship.capacity - ship.currentCargo);

        ctx.emit({
          type: 'resupply_completed',
          time: ctx.now,
          shipId: ship.id,
          shipName: ship.name,
          location: port,
          newCargoLevel: ship.currentCargo,
        });

        releaseShip(ship, ctx.now);
        this.phase = 'done';
        return { kind: 'done' };
      }

      case 'done':
        return { kind: 'done' };
    }
  }

  private arriveAtPort(ctx: SimulationContext): ProcessOutcome {
    const ship = requireShip(ctx, this.shipId);
    const port = ctx.params.portLocation;

    ctx.emit({
      type: 'ship_arrived',
      time: ctx.now,
      shipId: ship.id,
      shipName: ship.name,
      location: port,
    });

    const delay = ctx.params.portResupplyDelay;
    occupyShip(ship, ctx.now + delay, 'waiting');
    this.phase = 'at_port';
    return { kind: 'wait', duration: delay };
  }
}
