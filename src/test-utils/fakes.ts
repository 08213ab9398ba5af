/**
 * In-process stand-ins for the generation service and the warehouse.
 */

import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { QueryResult } from '../types/models.js';
import type { GenerationRequest, GenerationService } from '../services/llm.js';
import type { Warehouse, WarehouseSession } from '../services/warehouse.js';
import { SnapshotStore } from '../services/snapshot-store.js';

/**
 * Returns scripted replies in order and records every request.
 */
export class ScriptedGeneration implements GenerationService {
  readonly requests: GenerationRequest[] = [];
  private readonly replies: Array<string | Error>;

  constructor(replies: Array<string | Error>) {
    this.replies = [...replies];
  }

  async generate(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('No scripted reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

export type StatementHandler = (statement: string) => QueryResult | Error;

export const EMPTY_RESULT: QueryResult = { columns: [], rows: [] };

/**
 * Answers statements through a handler and counts session lifecycles.
 */
export class FakeWarehouse implements Warehouse {
  readonly statements: string[] = [];
  opened = 0;
  closed = 0;

  constructor(private readonly handler: StatementHandler = () => EMPTY_RESULT) {}

  async withSession<T>(fn: (session: WarehouseSession) => Promise<T>): Promise<T> {
    this.opened++;
    const session: WarehouseSession = {
      run: async (statement) => {
        this.statements.push(statement);
        const result = this.handler(statement);
        if (result instanceof Error) {
          throw result;
        }
        return result;
      },
    };
    try {
      return await fn(session);
    } finally {
      this.closed++;
    }
  }
}

/**
 * Snapshot store in a fresh temporary directory.
 */
export function createTempStore(): { store: SnapshotStore; dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), 'sqlsight-test-'));
  const store = new SnapshotStore(
    join(dir, 'databases.json'),
    join(dir, 'all_databases_schema.json')
  );
  return {
    store,
    dir,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}
