/**
 * Wiring of the services from configuration.
 */

import type { Config } from './config.js';
import { Analyzer } from './services/analyzer.js';
import { AiSdkGenerationService, type GenerationService } from './services/llm.js';
import { SchemaRefresher } from './services/refresh.js';
import { SchemaCache } from './services/schema-cache.js';
import { SnapshotStore } from './services/snapshot-store.js';
import { DatabricksWarehouse, type Warehouse } from './services/warehouse.js';

export interface Services {
  store: SnapshotStore;
  schemaCache: SchemaCache;
  generation: GenerationService;
  warehouse: Warehouse;
  analyzer: Analyzer;
  refresher: SchemaRefresher;
}

export interface ServiceOverrides {
  generation?: GenerationService;
  warehouse?: Warehouse;
  store?: SnapshotStore;
}

export function createServices(cfg: Config, overrides: ServiceOverrides = {}): Services {
  const store =
    overrides.store ?? new SnapshotStore(cfg.DATABASE_LIST_PATH, cfg.SCHEMA_SNAPSHOT_PATH);
  const schemaCache = new SchemaCache(store);
  const generation = overrides.generation ?? new AiSdkGenerationService(cfg.LLM_CONFIG);
  const warehouse =
    overrides.warehouse ??
    new DatabricksWarehouse({
      host: cfg.WAREHOUSE_CONFIG.host ?? '',
      path: cfg.WAREHOUSE_CONFIG.path ?? '',
      token: cfg.WAREHOUSE_CONFIG.token ?? '',
    });

  const analyzer = new Analyzer(schemaCache, generation, warehouse, {
    sqlMaxOutputTokens: cfg.SQL_MAX_OUTPUT_TOKENS,
    insightMaxOutputTokens: cfg.INSIGHT_MAX_OUTPUT_TOKENS,
    insightTemperature: cfg.INSIGHT_TEMPERATURE,
    placeholderDatabase: cfg.PLACEHOLDER_DATABASE,
    readOnly: cfg.SQL_READ_ONLY,
  });
  const refresher = new SchemaRefresher(warehouse, store, schemaCache);

  return { store, schemaCache, generation, warehouse, analyzer, refresher };
}
