/**
 * Shipping System
 * Cargo handling, routing and availability for ships
 */

import type {
  ShipState,
  ShipConfig,
  ShipStatus,
  ShipActivity,
  DistanceMatrix,
  LocationId,
  SimTime,
} from '../core/types.js';
import { RouteNotFoundError } from '../core/errors.js';

/**
 * Build a fresh ship from its configuration
 */
export function createShip(config: ShipConfig, speedMultiplier: number = 1): ShipState {
  return {
    id: config.id,
    name: config.name,
    capacity: config.capacity,
    speed: config.speed * speedMultiplier,
    currentLocation: config.initialLocation,
    currentCargo: Math.min(Math.max(config.initialCargo, 0), config.capacity),
    busyUntil: 0,
    activity: 'idle',
    travelHistory: [],
  };
}

/**
 * Load cargo, limited by free capacity
 * @returns Amount actually loaded
 */
export function loadCargo(ship: ShipState, amount: number): number {
  const availableCapacity = ship.capacity - ship.currentCargo;
  const actual = Math.max(0, Math.min(amount, availableCapacity));
  ship.currentCargo += actual;
  return actual;
}

/**
 * Unload cargo, limited by what is aboard
 * @returns Amount actually unloaded
 */
export function unloadCargo(ship: ShipState, amount: number): number {
  const actual = Math.max(0, Math.min(amount, ship.currentCargo));
  ship.currentCargo -= actual;
  return actual;
}

/**
 * Look up the distance between two locations
 */
export function getDistance(
  from: LocationId,
  to: LocationId,
  distances: DistanceMatrix
): number | undefined {
  const row = Object.hasOwn(distances, from) ? distances[from] : undefined;
  if (row === undefined || !Object.hasOwn(row, to)) {
    return undefined;
  }
  return row[to];
}

/**
 * Hours needed to sail from the ship's current location to a destination
 */
export function calculateTravelTime(
  ship: ShipState,
  destination: LocationId,
  distances: DistanceMatrix
): number {
  const distance = getDistance(ship.currentLocation, destination, distances);
  if (distance === undefined) {
    throw new RouteNotFoundError(ship.currentLocation, destination);
  }
  return distance / ship.speed;
}

/**
 * Send the ship to a destination, recording the journey
 * @returns Arrival time
 */
export function travelTo(
  ship: ShipState,
  destination: LocationId,
  distances: DistanceMatrix,
  now: SimTime
): SimTime {
  const travelTime = calculateTravelTime(ship, destination, distances);
  const arrivalTime = now + travelTime;

  ship.travelHistory.push({
    departure: ship.currentLocation,
    destination,
    departureTime: now,
    arrivalTime,
    cargo: ship.currentCargo,
  });

  ship.currentLocation = destination;
  ship.busyUntil = arrivalTime;
  ship.activity = 'traveling';

  return arrivalTime;
}

/**
 * Idle and carrying something to deliver.
 * A ship whose wait ends at `now` stays engaged until its own process resumes.
 */
export function isDispatchEligible(ship: ShipState, now: SimTime): boolean {
  return ship.activity === 'idle' && ship.busyUntil <= now && ship.currentCargo > 0;
}

/**
 * Take the ship out of the pool until a process sets a concrete busy time
 */
export function reserveShip(ship: ShipState): void {
  ship.busyUntil = Number.POSITIVE_INFINITY;
}

/**
 * Keep the ship engaged in an activity until the given time
 */
export function occupyShip(ship: ShipState, until: SimTime, activity: ShipActivity): void {
  ship.busyUntil = until;
  ship.activity = activity;
}

/**
 * Return the ship to the pool
 */
export function releaseShip(ship: ShipState, now: SimTime): void {
  ship.busyUntil = now;
  ship.activity = 'idle';
}

export function getShipStatus(ship: ShipState): ShipStatus {
  return {
    id: ship.id,
    name: ship.name,
    location: ship.currentLocation,
    cargo: ship.currentCargo,
    availableCapacity: ship.capacity - ship.currentCargo,
    busyUntil: ship.busyUntil,
    activity: ship.activity,
  };
}
