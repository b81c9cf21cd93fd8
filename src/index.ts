/**
 * Maritime resupply simulation
 */

export { ResupplySimulation } from './core/simulation.js';
export type { SimulationOptions } from './core/simulation.js';
export { Scheduler } from './core/scheduler.js';
export type { SimProcess, SchedulerHooks } from './core/scheduler.js';
export type { SimulationContext, SimulationProcess } from './core/context.js';
export { EventLog, eventsOfType } from './core/event-log.js';
export { SeededRNG, hashState } from './core/rng.js';
export { DEFAULT_PARAMS, DEFAULT_PORT_LOCATION, initializeWorld } from './core/world.js';
export { SimulationError, RouteNotFoundError, MalformedConfigurationError } from './core/errors.js';
export type * from './core/types.js';

export { ConsumptionProcess } from './processes/consumption-process.js';
export { DeliveryProcess } from './processes/delivery-process.js';
export { ResupplyProcess } from './processes/resupply-process.js';

export { computeMetrics } from './systems/metrics.js';
export { selectShip, dispatchDelivery } from './systems/dispatch.js';

export { parseConfiguration, parseOverrides, PARAM_NAMES } from './config/schema.js';
export {
  loadOverrides,
  saveOverrides,
  addOverride,
  removeOverride,
  clearOverrides,
  getOverridesAsParams,
} from './config/overrides.js';

export * from './storage/index.js';
export { ParameterStudy, summarizeStudy } from './runner/parameter-study.js';
export type { StudyRun, StudyOptions, StudySummaryRow } from './runner/parameter-study.js';
