/**
 * Resupply Simulation
 * Reads a configuration snapshot, runs every process against one scheduler
 * and returns the event log, metrics and histories of the run
 */

import type {
  ParamOverrides,
  ProcessKind,
  SimulationConfig,
  SimulationResults,
} from './types.js';
import type { SimulationContext, SimulationProcess } from './context.js';
import type { RouteNotFoundError } from './errors.js';
import { Scheduler } from './scheduler.js';
import { EventLog } from './event-log.js';
import { hashState } from './rng.js';
import { initializeWorld, type WorldState } from './world.js';
import { parseConfiguration } from '../config/schema.js';
import { readSnapshot, type DataSource } from '../storage/data-source.js';
import { serializeResults, type ResultsDocument } from '../storage/results-serializer.js';
import { computeMetrics } from '../systems/metrics.js';
import { extractCustomersHistory, extractShipsHistory } from '../systems/history.js';
import { ConsumptionProcess } from '../processes/consumption-process.js';
import { DeliveryProcess } from '../processes/delivery-process.js';
import { ResupplyProcess } from '../processes/resupply-process.js';

export interface SimulationOptions {
  debug: boolean;
  persistResults: boolean;
}

const DEFAULT_OPTIONS: SimulationOptions = {
  debug: false,
  persistResults: true,
};

export class ResupplySimulation {
  private options: SimulationOptions;
  private config: SimulationConfig | null = null;
  private lastResults: SimulationResults | null = null;

  constructor(
    private readonly dataSource: DataSource,
    private readonly paramOverrides: ParamOverrides = {},
    options: Partial<SimulationOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Read and validate the configuration.
   * Throws MalformedConfigurationError before any simulated time passes.
   */
  setup(): SimulationConfig {
    const config = parseConfiguration(readSnapshot(this.dataSource), this.paramOverrides);
    this.config = config;

    if (this.options.debug) {
      console.log(
        `[Simulation] Loaded ${config.ships.length} ships, ${config.customers.length} customers`
      );
    }
    return config;
  }

  getConfig(): SimulationConfig | null {
    return this.config;
  }

  getLastResults(): SimulationResults | null {
    return this.lastResults;
  }

  /**
   * Run from a freshly built world up to simulationDuration.
   * Every call re-reads the data source, so runs never share entity state.
   */
  run(): SimulationResults {
    const config = this.setup();
    const { params } = config;
    const world = initializeWorld(config);

    const startedAt = new Date();
    const eventLog = new EventLog();
    const scheduler = new Scheduler<SimulationContext>({
      onProcessFailed: (process, error, ctx) => this.handleProcessFailure(process, error, ctx),
    });
    const ctx = this.createContext(world, config, scheduler, eventLog);

    for (const customer of world.customers.values()) {
      scheduler.spawn(new ConsumptionProcess(ctx.nextProcessId('consumption'), customer.id));
    }

    const stats = scheduler.run(ctx, params.simulationDuration);
    const events = eventLog.toArray();
    const endedAt = new Date();

    const results: SimulationResults = {
      metadata: {
        startTime: startedAt.toISOString(),
        endTime: endedAt.toISOString(),
        durationSeconds: (endedAt.getTime() - startedAt.getTime()) / 1000,
        simulatedUntil: scheduler.now,
        params,
        numShips: world.ships.size,
        numCustomers: world.customers.size,
        numEvents: events.length,
        processes: stats,
        eventLogHash: hashState(events),
      },
      events,
      metrics: computeMetrics({
        events,
        ships: world.ships.values(),
        customers: world.customers.values(),
        distances: world.distances,
        params,
      }),
      shipsHistory: extractShipsHistory(world.ships.values()),
      customersHistory: extractCustomersHistory(world.customers.values()),
      ships: [...world.ships.values()],
      customers: [...world.customers.values()],
    };

    this.lastResults = results;

    if (this.options.debug) {
      console.log(
        `[Simulation] Finished at t=${scheduler.now}: ${events.length} events, ` +
          `${stats.completed} processes completed, ${stats.failed} failed, ${stats.truncated} cut at horizon`
      );
    }

    if (this.options.persistResults) {
      this.persist(results);
    }

    return results;
  }

  /**
   * Results document for the last run
   */
  getDocument(): ResultsDocument | null {
    return this.lastResults ? serializeResults(this.lastResults) : null;
  }

  private createContext(
    world: WorldState,
    config: SimulationConfig,
    scheduler: Scheduler<SimulationContext>,
    eventLog: EventLog
  ): SimulationContext {
    const counters: Record<ProcessKind, number> = { consumption: 0, delivery: 0, resupply: 0 };
    const debug = this.options.debug;

    return {
      get now() {
        return scheduler.now;
      },
      params: config.params,
      ships: world.ships,
      customers: world.customers,
      distances: world.distances,
      emit: (event) => eventLog.append(event),
      spawn: (process: SimulationProcess) => scheduler.spawn(process),
      nextProcessId: (kind) => `${kind}_${++counters[kind]}`,
      debug: (message) => {
        if (debug) {
          console.log(`[Simulation] t=${scheduler.now} ${message}`);
        }
      },
    };
  }

  /**
   * A missing route ends the one process; the ship it held stays reserved
   */
  private handleProcessFailure(
    process: SimulationProcess,
    error: RouteNotFoundError,
    ctx: SimulationContext
  ): void {
    console.warn(`[Simulation] Process ${process.id} failed at t=${ctx.now}: ${error.message}`);

    if (process instanceof DeliveryProcess) {
      ctx.emit({
        type: 'process_failed',
        time: ctx.now,
        processId: process.id,
        processKind: process.kind,
        reason: 'route_not_found',
        message: error.message,
        shipId: process.shipId,
        customerId: process.customerId,
      });
    } else if (process instanceof ResupplyProcess) {
      ctx.emit({
        type: 'process_failed',
        time: ctx.now,
        processId: process.id,
        processKind: process.kind,
        reason: 'route_not_found',
        message: error.message,
        shipId: process.shipId,
      });
    } else {
      throw error;
    }
  }

  private persist(results: SimulationResults): void {
    try {
      this.dataSource.saveResults(serializeResults(results));
    } catch (error) {
      console.warn('[Simulation] Failed to save results:', error);
    }
  }
}
