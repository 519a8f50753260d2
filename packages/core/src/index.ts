// Database
export {
  createDatabaseConnection,
  closeDatabaseConnection,
  openWarehouseDatabase,
  type CreateDatabaseInput,
  type DatabaseConnection,
  type OpenWarehouseDatabaseInput,
  type WarehouseDatabase,
} from './database.ts';

// Migrations
export {
  MIGRATIONS,
  runMigrations,
  type MigrationDefinition,
  type RunMigrationsResult,
} from './migrations/index.ts';

// Raw layer
export {
  createRawRepository,
  type RawRepository,
} from './raw/raw-repository.ts';
export type {
  RawDetectionRecord,
  RawMessageRecord,
  RawSnapshot,
} from './raw/types.ts';

// Date dimension
export {
  buildDateDimensionRow,
  generateDateDimensionRows,
  parseUtcTimestamp,
  populateDateDimension,
  readDateKeys,
  toDateKey,
  type DateDimensionRow,
  type PopulateDateDimensionInput,
  type PopulateDateDimensionResult,
} from './date-dimension/index.ts';

// Marts
export {
  MART_TABLE_NAMES,
  type MartTableName,
} from './marts/schema.ts';
export {
  computeMartContentHash,
  publishMarts,
  type MartPublication,
  type PublishMartsInput,
} from './marts/mart-publisher.ts';
export {
  createMartQueries,
  type MartQueries,
  type ProductMention,
} from './marts/mart-queries.ts';
export type {
  ActivityLevel,
  ChannelDimensionRow,
  ChannelType,
  DetailedImageCategory,
  DetectionFactRow,
  MartTables,
  MessageFactRow,
} from './marts/types.ts';

// Run ledger
export {
  createRunRepository,
  type FinishPipelineRunInput,
  type PipelineLineageInput,
  type PipelineRunCounts,
  type PipelineRunRecord,
  type PipelineRunStatus,
  type RunRepository,
} from './runs/run-repository.ts';
