/**
 * Customer consumption process
 * Depletes a site's inventory once per time step and asks for a delivery
 * whenever days of supply drop below the resupply threshold.
 */

import type { CustomerId, ProcessId, ProcessOutcome } from '../core/types.js';
import { requireCustomer, type SimulationContext, type SimulationProcess } from '../core/context.js';
import { consume, daysOfSupply } from '../systems/consumption.js';
import { dispatchDelivery } from '../systems/dispatch.js';

type ConsumptionPhase = 'start' | 'waiting';

export class ConsumptionProcess implements SimulationProcess {
  readonly kind = 'consumption';
  private phase: ConsumptionPhase = 'start';

  constructor(
    readonly id: ProcessId,
    readonly customerId: CustomerId
  ) {}

  resume(ctx: SimulationContext): ProcessOutcome {
    const timeStep = ctx.params.timeStep;

    if (this.phase === 'start') {
      this.phase = 'waiting';
      return { kind: 'wait', duration: timeStep };
    }

    const customer = requireCustomer(ctx, this.customerId);
    const record = consume(customer, timeStep, ctx.now);
    const supply = daysOfSupply(customer);

    ctx.emit({
      type: 'consumption',
      time: ctx.now,
      customerId: customer.id,
      customerName: customer.name,
      demand: record.demand,
      amountConsumed: record.fulfilled,
      shortage: record.shortage,
      currentInventory: customer.currentInventory,
      daysOfSupply: supply,
    });

    // Re-evaluated every tick; this is the only retry after a failed dispatch
    if (supply < ctx.params.resupplyThresholdDays) {
      dispatchDelivery(ctx, customer);
    }

    return { kind: 'wait', duration: timeStep };
  }
}
