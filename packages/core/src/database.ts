import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { AppError, err, ok, type Result } from '@medwarehouse/shared';
import { runMigrations, type RunMigrationsResult } from './migrations/index.ts';

export interface CreateDatabaseInput {
  /** `:memory:` when omitted. */
  filename?: string;
  timeoutMs?: number;
}

export interface DatabaseConnection {
  readonly db: Database.Database;
  close: () => Result<void, AppError>;
}

export interface OpenWarehouseDatabaseInput extends CreateDatabaseInput {
  now?: () => Date;
}

export interface WarehouseDatabase {
  connection: DatabaseConnection;
  migrations: RunMigrationsResult;
}

export function createDatabaseConnection(input: CreateDatabaseInput = {}): Result<DatabaseConnection, AppError> {
  const filename = input.filename ?? ':memory:';
  const timeoutMs = input.timeoutMs ?? 5_000;

  try {
    const db = new Database(filename, { timeout: timeoutMs });

    // mart_publications and pipeline_lineage reference pipeline_runs.
    db.pragma('foreign_keys = ON');
    db.pragma(`busy_timeout = ${String(timeoutMs)}`);

    if (!db.memory) {
      db.pragma('journal_mode = WAL');
    }

    return ok({
      db,
      close: () => closeDatabaseConnection(db),
    });
  } catch (cause) {
    return err(
      AppError.fromCause('DB_OPEN_FAILED', 'Could not open the warehouse database.', cause, { filename, timeoutMs }),
    );
  }
}

/**
 * Opens the warehouse file, creating its directory on first use, and brings
 * the schema up to date. The connection is closed again if migrating fails.
 */
export function openWarehouseDatabase(input: OpenWarehouseDatabaseInput = {}): Result<WarehouseDatabase, AppError> {
  const filename = input.filename ?? ':memory:';
  if (filename !== ':memory:') {
    try {
      fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
    } catch (cause) {
      return err(
        AppError.fromCause('DB_DIRECTORY_FAILED', 'Could not create the warehouse database directory.', cause, {
          filename,
        }),
      );
    }
  }

  const connectionResult = createDatabaseConnection(input);
  if (!connectionResult.ok) {
    return connectionResult;
  }
  const connection = connectionResult.value;

  const migrations = runMigrations(connection.db, input.now);
  if (!migrations.ok) {
    const closed = connection.close();
    const context = closed.ok ? { filename } : { filename, closeError: closed.error.toDTO() };
    return err(migrations.error.withContext(context));
  }
  return ok({ connection, migrations: migrations.value });
}

export function closeDatabaseConnection(db: Database.Database): Result<void, AppError> {
  try {
    if (db.open) {
      db.close();
    }
    return ok(undefined);
  } catch (cause) {
    return err(
      AppError.fromCause('DB_CLOSE_FAILED', 'Could not close the warehouse database.', cause, {
        databaseName: db.name,
      }),
    );
  }
}
