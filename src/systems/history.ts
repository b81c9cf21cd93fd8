/**
 * Flatten per-entity histories into time series rows
 */

import type {
  CustomerHistoryEntry,
  CustomerSiteState,
  ShipHistoryEntry,
  ShipState,
} from '../core/types.js';

export function extractShipsHistory(ships: Iterable<ShipState>): ShipHistoryEntry[] {
  const rows: ShipHistoryEntry[] = [];
  for (const ship of ships) {
    for (const journey of ship.travelHistory) {
      rows.push({ shipId: ship.id, shipName: ship.name, ...journey });
    }
  }
  return rows;
}

export function extractCustomersHistory(
  customers: Iterable<CustomerSiteState>
): CustomerHistoryEntry[] {
  const rows: CustomerHistoryEntry[] = [];
  for (const customer of customers) {
    for (const record of customer.inventoryHistory) {
      rows.push({ customerId: customer.id, customerName: customer.name, ...record });
    }
  }
  return rows;
}
