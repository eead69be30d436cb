export { stagingCustomers, stagingOrders, stagingSubscriptions } from './staging.js';
export type { StagingTable, StagingRow, NewStagingRow } from './staging.js';

export { collectionRuns, migrationOutcomes } from './monitoring.js';
export type {
  CollectionRun,
  NewCollectionRun,
  MigrationOutcomeRow,
  NewMigrationOutcomeRow,
} from './monitoring.js';
