/**
 * Core types for the maritime resupply simulation
 * Entities, events, parameters and the raw input contract
 */

// ============================================================================
// Primitive Types
// ============================================================================

export type ShipId = string;
export type CustomerId = string;
export type LocationId = string;
export type ProcessId = string;

/** Virtual time, in simulated hours */
export type SimTime = number;

/**
 * location -> location -> distance (>= 0)
 * A missing entry is a routing error, never a zero.
 */
export type DistanceMatrix = Record<LocationId, Record<LocationId, number>>;

// ============================================================================
// Raw Input Contract (snake_case, as supplied by a data source)
// ============================================================================

export interface ShipConfigRecord {
  id: string;
  name: string;
  capacity: number;
  speed: number;
  initial_location: string;
  initial_cargo?: number;
}

export interface CustomerConfigRecord {
  id: string;
  name: string;
  location: string;
  demand_rate: number;
  initial_inventory: number;
  min_inventory: number;
  max_inventory: number;
}

export type SimulationParamsRecord = {
  simulation_duration: number;
  time_step: number;
  resupply_threshold_days?: number;
  loading_rate?: number;
  unloading_rate?: number;
  port_resupply_delay?: number;
  random_seed?: number;
  port_location?: string;
  ship_speed_multiplier?: number;
};

export type ParamName = keyof SimulationParamsRecord;

/**
 * Construction-time overrides, applied after defaults and source values
 */
export type ParamOverrides = Partial<SimulationParamsRecord>;

/**
 * Everything the engine reads from a data source at setup
 */
export interface ConfigurationSnapshot {
  ships: unknown[];
  customers: unknown[];
  distances: unknown;
  params: Record<string, unknown>;
}

// ============================================================================
// Validated Configuration
// ============================================================================

export interface SimulationParams {
  simulationDuration: number;
  timeStep: number;
  resupplyThresholdDays: number;
  loadingRate: number; // units per hour
  unloadingRate: number; // units per hour
  portResupplyDelay: number; // hours spent at port before loading
  randomSeed: number;
  portLocation: LocationId;
  shipSpeedMultiplier: number;
}

export interface ShipConfig {
  id: ShipId;
  name: string;
  capacity: number;
  speed: number; // distance units per hour
  initialLocation: LocationId;
  initialCargo: number;
}

export interface CustomerConfig {
  id: CustomerId;
  name: string;
  location: LocationId;
  demandRate: number; // units per hour
  initialInventory: number;
  minInventory: number;
  maxInventory: number;
}

export interface SimulationConfig {
  ships: ShipConfig[];
  customers: CustomerConfig[];
  distances: DistanceMatrix;
  params: SimulationParams;
}

// ============================================================================
// Ship State
// ============================================================================

export type ShipActivity = 'idle' | 'traveling' | 'unloading' | 'waiting' | 'loading';

export interface Journey {
  departure: LocationId;
  destination: LocationId;
  departureTime: SimTime;
  arrivalTime: SimTime;
  cargo: number;
}

export interface ShipState {
  id: ShipId;
  name: string;
  capacity: number;
  speed: number;
  currentLocation: LocationId;
  currentCargo: number;
  /** Time the ship becomes available; +Infinity while reserved by a dispatch */
  busyUntil: SimTime;
  activity: ShipActivity;
  travelHistory: Journey[];
}

export interface ShipStatus {
  id: ShipId;
  name: string;
  location: LocationId;
  cargo: number;
  availableCapacity: number;
  busyUntil: SimTime;
  activity: ShipActivity;
}

// ============================================================================
// Customer Site State
// ============================================================================

export interface InventoryRecord {
  time: SimTime;
  inventory: number;
  demand: number;
  fulfilled: number;
  shortage: number;
}

export interface OrderRecord {
  time: SimTime;
  amountRequested: number;
  amountReceived: number;
  inventoryAfter: number;
}

export interface CustomerSiteState {
  id: CustomerId;
  name: string;
  location: LocationId;
  demandRate: number;
  currentInventory: number;
  minInventory: number;
  maxInventory: number;
  inventoryHistory: InventoryRecord[];
  ordersHistory: OrderRecord[];
}

export interface CustomerStatus {
  id: CustomerId;
  name: string;
  location: LocationId;
  inventory: number;
  minInventory: number;
  inventoryDeficit: number;
  fillCapacity: number;
}

// ============================================================================
// Events
// ============================================================================

export interface ConsumptionEvent {
  type: 'consumption';
  time: SimTime;
  customerId: CustomerId;
  customerName: string;
  demand: number;
  amountConsumed: number;
  shortage: number;
  currentInventory: number;
  daysOfSupply: number;
}

export interface DeliveryStartedEvent {
  type: 'delivery_started';
  time: SimTime;
  shipId: ShipId;
  shipName: string;
  customerId: CustomerId;
  customerName: string;
  requestedAmount: number;
  availableCargo: number;
}

export interface ShipArrivedEvent {
  type: 'ship_arrived';
  time: SimTime;
  shipId: ShipId;
  shipName: string;
  location: LocationId;
  customerId?: CustomerId;
  customerName?: string;
}

export interface DeliveryCompletedEvent {
  type: 'delivery_completed';
  time: SimTime;
  shipId: ShipId;
  shipName: string;
  customerId: CustomerId;
  customerName: string;
  amountUnloaded: number;
  amountDelivered: number;
  customerInventory: number;
  shipRemainingCargo: number;
}

export type DeliveryFailureReason = 'no_ships_available';

export interface DeliveryFailedEvent {
  type: 'delivery_failed';
  time: SimTime;
  customerId: CustomerId;
  reason: DeliveryFailureReason;
  neededAmount: number;
}

export interface ResupplyStartedEvent {
  type: 'resupply_started';
  time: SimTime;
  shipId: ShipId;
  shipName: string;
  currentLocation: LocationId;
  destination: LocationId;
  currentCargo: number;
}

export interface ResupplyCompletedEvent {
  type: 'resupply_completed';
  time: SimTime;
  shipId: ShipId;
  shipName: string;
  location: LocationId;
  newCargoLevel: number;
}

export type ProcessFailureReason = 'route_not_found';

export interface ProcessFailedEvent {
  type: 'process_failed';
  time: SimTime;
  processId: ProcessId;
  processKind: ProcessKind;
  reason: ProcessFailureReason;
  message: string;
  shipId: ShipId;
  customerId?: CustomerId;
}

export type SimulationEvent =
  | ConsumptionEvent
  | DeliveryStartedEvent
  | ShipArrivedEvent
  | DeliveryCompletedEvent
  | DeliveryFailedEvent
  | ResupplyStartedEvent
  | ResupplyCompletedEvent
  | ProcessFailedEvent;

export type SimulationEventType = SimulationEvent['type'];

// ============================================================================
// Processes
// ============================================================================

export type ProcessKind = 'consumption' | 'delivery' | 'resupply';

/**
 * What a process step hands back to the scheduler
 */
export type ProcessOutcome =
  | { kind: 'wait'; duration: number }
  | { kind: 'done' };

export interface SchedulerStats {
  spawned: number;
  completed: number;
  failed: number;
  truncated: number;
}

// ============================================================================
// Metrics
// ============================================================================

export interface CustomerMetrics {
  avgInventory: number;
  minInventory: number;
  stockoutHours: number;
  serviceLevel: number;
}

export interface ShipMetrics {
  totalDistance: number;
  numDeliveries: number;
  numResupplies: number;
}

export interface SimulationMetrics {
  overallServiceLevel: number;
  totalStockoutEvents: number;
  totalDeliveredAmount: number;
  totalFailedDispatches: number;
  totalProcessFailures: number;
  customerMetrics: Record<CustomerId, CustomerMetrics>;
  shipMetrics: Record<ShipId, ShipMetrics>;
}

// ============================================================================
// Run Results
// ============================================================================

export interface ShipHistoryEntry extends Journey {
  shipId: ShipId;
  shipName: string;
}

export interface CustomerHistoryEntry extends InventoryRecord {
  customerId: CustomerId;
  customerName: string;
}

export interface RunMetadata {
  startTime: string;
  endTime: string;
  durationSeconds: number;
  simulatedUntil: SimTime;
  params: SimulationParams;
  numShips: number;
  numCustomers: number;
  numEvents: number;
  processes: SchedulerStats;
  eventLogHash: string;
}

export interface SimulationResults {
  metadata: RunMetadata;
  events: SimulationEvent[];
  metrics: SimulationMetrics;
  shipsHistory: ShipHistoryEntry[];
  customersHistory: CustomerHistoryEntry[];
  ships: ShipState[];
  customers: CustomerSiteState[];
}
