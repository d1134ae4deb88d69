// =============================================================================
// CASE EVALUATION — Record Store Factory
//
// Returns the IEvaluationStore for the configured driver.
//   postgres: production; schema applied by `npm run migrate`
//   memory  : single process, nothing persisted
// =============================================================================

import { config, StoreDriver } from '../config';
import { IEvaluationStore } from '../types/store';
import { MemoryEvaluationStore } from './memory-store';
import { createPool } from './pool';
import { PostgresEvaluationStore } from './postgres-store';

export function createStore(driver: StoreDriver = config.db.driver): IEvaluationStore {
  switch (driver) {
    case 'memory':
      console.warn('[DB] Using in-memory store. Data is lost on restart.');
      return new MemoryEvaluationStore();

    case 'postgres':
      return new PostgresEvaluationStore(createPool());
  }
}

export { MemoryEvaluationStore, PostgresEvaluationStore };
