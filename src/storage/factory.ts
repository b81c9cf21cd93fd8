/**
 * Data source selection by kind name, as used by the CLI and env config
 */

import type { DataSource } from './data-source.js';
import { JsonDataSource } from './json-data-source.js';
import { SqliteDataSource } from './database.js';

export const DATA_SOURCE_KINDS = ['json', 'sqlite'] as const;
export type DataSourceKind = (typeof DATA_SOURCE_KINDS)[number];

export interface DataSourceOptions {
  dataDir?: string;
  dbPath?: string;
}

export function isDataSourceKind(kind: string): kind is DataSourceKind {
  return DATA_SOURCE_KINDS.some((k) => k === kind);
}

export function createDataSource(kind: string, options: DataSourceOptions = {}): DataSource {
  switch (kind) {
    case 'json':
      return new JsonDataSource(options.dataDir ?? './data');
    case 'sqlite': {
      const source = new SqliteDataSource(options.dbPath ?? 'resupply.db');
      source.seedDefaults();
      return source;
    }
    default:
      throw new Error(
        `Unknown data source type: ${kind} (expected one of ${DATA_SOURCE_KINDS.join(', ')})`
      );
  }
}
