/**
 * Consumption System
 * Customer site demand, inventory depletion and delivery receipt
 */

import type {
  CustomerSiteState,
  CustomerConfig,
  CustomerStatus,
  InventoryRecord,
  SimTime,
} from '../core/types.js';

const HOURS_PER_DAY = 24;

/**
 * Build a fresh customer site from its configuration
 */
export function createCustomerSite(config: CustomerConfig): CustomerSiteState {
  return {
    id: config.id,
    name: config.name,
    location: config.location,
    demandRate: config.demandRate,
    currentInventory: Math.min(Math.max(config.initialInventory, 0), config.maxInventory),
    minInventory: config.minInventory,
    maxInventory: config.maxInventory,
    inventoryHistory: [],
    ordersHistory: [],
  };
}

/**
 * Demand over a period of hours
 */
export function calculateDemand(customer: CustomerSiteState, timePeriod: number): number {
  return customer.demandRate * timePeriod;
}

/**
 * Consume inventory for one period, never going below zero
 * Appends an inventory record stamped with `now`
 */
export function consume(
  customer: CustomerSiteState,
  timePeriod: number,
  now: SimTime
): InventoryRecord {
  const demand = calculateDemand(customer, timePeriod);
  const fulfilled = Math.max(0, Math.min(demand, customer.currentInventory));
  customer.currentInventory -= fulfilled;

  const record: InventoryRecord = {
    time: now,
    inventory: customer.currentInventory,
    demand,
    fulfilled,
    shortage: Math.max(0, demand - fulfilled),
  };
  customer.inventoryHistory.push(record);

  return record;
}

/**
 * Accept a delivery, limited by free storage
 * @returns Amount actually received
 */
export function receiveDelivery(
  customer: CustomerSiteState,
  amount: number,
  now: SimTime
): number {
  const availableSpace = customer.maxInventory - customer.currentInventory;
  const received = Math.max(0, Math.min(amount, availableSpace));
  customer.currentInventory += received;

  customer.ordersHistory.push({
    time: now,
    amountRequested: amount,
    amountReceived: received,
    inventoryAfter: customer.currentInventory,
  });

  return received;
}

/**
 * Days the current inventory lasts at the current demand rate
 * Infinite when nothing is being consumed
 */
export function daysOfSupply(customer: CustomerSiteState): number {
  if (customer.demandRate <= 0) {
    return Number.POSITIVE_INFINITY;
  }
  return customer.currentInventory / (customer.demandRate * HOURS_PER_DAY);
}

export function getCustomerStatus(customer: CustomerSiteState): CustomerStatus {
  return {
    id: customer.id,
    name: customer.name,
    location: customer.location,
    inventory: customer.currentInventory,
    minInventory: customer.minInventory,
    inventoryDeficit: Math.max(0, customer.minInventory - customer.currentInventory),
    fillCapacity: customer.maxInventory - customer.currentInventory,
  };
}
