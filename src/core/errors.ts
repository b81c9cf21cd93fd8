/**
 * Simulation error types
 */

import type { LocationId } from './types.js';

export type SimulationErrorCode = 'ROUTE_NOT_FOUND' | 'MALFORMED_CONFIGURATION';

/**
 * Base class for errors raised by the engine
 */
export class SimulationError extends Error {
  constructor(
    message: string,
    public readonly code: SimulationErrorCode
  ) {
    super(message);
    this.name = 'SimulationError';
  }
}

/**
 * A ship was asked to travel between two locations the distance matrix does not connect.
 * Fatal to the process that raised it only.
 */
export class RouteNotFoundError extends SimulationError {
  constructor(
    public readonly from: LocationId,
    public readonly to: LocationId
  ) {
    super(`No route found from ${from} to ${to}`, 'ROUTE_NOT_FOUND');
    this.name = 'RouteNotFoundError';
  }
}

/**
 * Ships, customers, distances or params failed validation at setup
 */
export class MalformedConfigurationError extends SimulationError {
  constructor(
    public readonly section: string,
    public readonly issues: string[]
  ) {
    super(`Malformed ${section} configuration: ${issues.join('; ')}`, 'MALFORMED_CONFIGURATION');
    this.name = 'MalformedConfigurationError';
  }
}
