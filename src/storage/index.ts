/**
 * Storage Module
 * Data sources for configuration input and results output
 */

export type { DataSource } from './data-source.js';
export { readSnapshot } from './data-source.js';

export { JsonDataSource, DATA_FILES } from './json-data-source.js';
export { SqliteDataSource, createDatabase, castParam } from './database.js';
export type { ParamType, ResultsSummary } from './database.js';
export { InMemoryDataSource } from './memory-data-source.js';

export { createDataSource, isDataSourceKind, DATA_SOURCE_KINDS } from './factory.js';
export type { DataSourceKind, DataSourceOptions } from './factory.js';

export {
  EXAMPLE_SHIPS,
  EXAMPLE_CUSTOMERS,
  EXAMPLE_PARAMS,
  generateDistanceMatrix,
} from './example-data.js';

export { serializeResults, serializeEvent, serializeMetrics, serializeParams } from './results-serializer.js';
export type { ResultsDocument, EventSnapshot, MetricsSnapshot } from './results-serializer.js';
