/**
 * Process Tests
 * Step-by-step delivery and resupply state machines
 */

import { describe, it, expect } from 'vitest';
import { DeliveryProcess } from '../../src/processes/delivery-process.js';
import { ResupplyProcess } from '../../src/processes/resupply-process.js';
import { ConsumptionProcess } from '../../src/processes/consumption-process.js';
import { RouteNotFoundError } from '../../src/core/errors.js';
import { makeContext, makeCustomer, makeShip } from '../helpers/fixtures.js';

describe('DeliveryProcess', () => {
  it('should travel, unload and send an emptied ship to resupply', () => {
    const ship = makeShip('s1');
    const customer = makeCustomer('c1', { currentInventory: 6000 });
    const ctx = makeContext({ ships: [ship], customers: [customer], now: 4 });
    const delivery = new DeliveryProcess('delivery_1', 's1', 'c1', 10000);

    expect(delivery.resume(ctx)).toEqual({ kind: 'wait', duration: 10 });
    expect(ctx.events[0]).toMatchObject({
      type: 'delivery_started',
      time: 4,
      shipId: 's1',
      customerId: 'c1',
      requestedAmount: 10000,
      availableCargo: 10000,
    });
    expect(ship.busyUntil).toBe(14);

    ctx.now = 14;
    expect(delivery.resume(ctx)).toEqual({ kind: 'wait', duration: 10 });
    expect(ctx.events[1]).toMatchObject({ type: 'ship_arrived', time: 14, location: 'site_a' });
    expect(ship.busyUntil).toBe(24);
    expect(ship.activity).toBe('unloading');

    ctx.now = 24;
    expect(delivery.resume(ctx)).toEqual({ kind: 'done' });
    expect(ctx.events[2]).toMatchObject({
      type: 'delivery_completed',
      time: 24,
      amountUnloaded: 10000,
      amountDelivered: 10000,
      customerInventory: 16000,
      shipRemainingCargo: 0,
    });
    expect(delivery.getPhase()).toBe('done');

    // Still reserved while the resupply process waits to start
    expect(ship.busyUntil).toBe(Infinity);
    expect(ctx.spawned).toHaveLength(1);
    expect(ctx.spawned[0]).toBeInstanceOf(ResupplyProcess);
  });

  it('should release a ship with enough cargo left', () => {
    const ship = makeShip('s1');
    const customer = makeCustomer('c1', { currentInventory: 6000 });
    const ctx = makeContext({ ships: [ship], customers: [customer] });
    const delivery = new DeliveryProcess('delivery_1', 's1', 'c1', 4000);

    delivery.resume(ctx);
    ctx.now = 10;
    expect(delivery.resume(ctx)).toEqual({ kind: 'wait', duration: 4 });
    ctx.now = 14;
    delivery.resume(ctx);

    expect(ship.currentCargo).toBe(6000);
    expect(customer.currentInventory).toBe(10000);
    expect(ship.busyUntil).toBe(14);
    expect(ship.activity).toBe('idle');
    expect(ctx.spawned).toEqual([]);
  });

  it('should deliver no more than the ship carries', () => {
    const ship = makeShip('s1', { currentCargo: 3000 });
    const customer = makeCustomer('c1', { currentInventory: 6000 });
    const ctx = makeContext({ ships: [ship], customers: [customer] });
    const delivery = new DeliveryProcess('delivery_1', 's1', 'c1', 10000);

    delivery.resume(ctx);
    ctx.now = 10;
    expect(delivery.resume(ctx)).toEqual({ kind: 'wait', duration: 3 });
    ctx.now = 13;
    delivery.resume(ctx);

    expect(ctx.events[2]).toMatchObject({ amountUnloaded: 3000, amountDelivered: 3000 });
  });

  it('should throw RouteNotFoundError when the site is unreachable', () => {
    const ship = makeShip('s1');
    const customer = makeCustomer('c1', { location: 'site_z' });
    const ctx = makeContext({ ships: [ship], customers: [customer] });

    expect(() => new DeliveryProcess('delivery_1', 's1', 'c1', 100).resume(ctx)).toThrow(
      RouteNotFoundError
    );
  });
});

describe('ResupplyProcess', () => {
  it('should sail to port, wait, load to capacity and release', () => {
    const ship = makeShip('s1', { currentLocation: 'site_a', currentCargo: 0 });
    const ctx = makeContext({ ships: [ship], now: 24 });
    const resupply = new ResupplyProcess('resupply_1', 's1');

    expect(resupply.resume(ctx)).toEqual({ kind: 'wait', duration: 10 });
    expect(ctx.events[0]).toMatchObject({
      type: 'resupply_started',
      currentLocation: 'site_a',
      destination: 'port',
      currentCargo: 0,
    });

    ctx.now = 34;
    expect(resupply.resume(ctx)).toEqual({ kind: 'wait', duration: 2 });
    expect(ctx.events[1]).toMatchObject({ type: 'ship_arrived', time: 34, location: 'port' });
    expect(ship.activity).toBe('waiting');

    ctx.now = 36;
    expect(resupply.resume(ctx)).toEqual({ kind: 'wait', duration: 10 });
    expect(ship.activity).toBe('loading');
    expect(ship.busyUntil).toBe(46);

    ctx.now = 46;
    expect(resupply.resume(ctx)).toEqual({ kind: 'done' });
    expect(ctx.events[2]).toMatchObject({
      type: 'resupply_completed',
      time: 46,
      location: 'port',
      newCargoLevel: 10000,
    });
    expect(ship.busyUntil).toBe(46);
    expect(ship.activity).toBe('idle');
  });

  it('should skip the voyage when already at port', () => {
    const ship = makeShip('s1', { currentCargo: 1000 });
    const ctx = makeContext({ ships: [ship], now: 5 });
    const resupply = new ResupplyProcess('resupply_1', 's1');

    expect(resupply.resume(ctx)).toEqual({ kind: 'wait', duration: 2 });
    expect(ctx.events.map((e) => e.type)).toEqual(['resupply_started', 'ship_arrived']);
    expect(ship.travelHistory).toEqual([]);
  });
});

describe('ConsumptionProcess', () => {
  it('should wait one step before the first consumption', () => {
    const customer = makeCustomer('c1');
    const ctx = makeContext({ customers: [customer] });
    const consumption = new ConsumptionProcess('consumption_1', 'c1');

    expect(consumption.resume(ctx)).toEqual({ kind: 'wait', duration: 1 });
    expect(ctx.events).toEqual([]);
  });

  it('should request a delivery below the threshold', () => {
    const ship = makeShip('s1');
    // 7100 left after one step is just under 3 days of supply
    const customer = makeCustomer('c1', { currentInventory: 7200 });
    const ctx = makeContext({ ships: [ship], customers: [customer] });
    const consumption = new ConsumptionProcess('consumption_1', 'c1');

    consumption.resume(ctx);
    ctx.now = 1;
    consumption.resume(ctx);

    expect(ctx.events[0]).toMatchObject({
      type: 'consumption',
      time: 1,
      demand: 100,
      amountConsumed: 100,
      shortage: 0,
      currentInventory: 7100,
    });
    expect(ctx.spawned).toHaveLength(1);
    expect(ship.busyUntil).toBe(Infinity);
  });
});
