import type Database from 'better-sqlite3';
import { AppError, err, ok, type Result } from '@medwarehouse/shared';
import { rawLayerSchemaMigration } from './001-raw-layer-schema.ts';
import { dateDimensionSchemaMigration } from './002-date-dimension-schema.ts';
import { martsSchemaMigration } from './003-marts-schema.ts';
import type { MigrationDefinition } from './types.ts';

export type { MigrationDefinition } from './types.ts';

export interface RunMigrationsResult {
  applied: string[];
  alreadyApplied: string[];
}

export const MIGRATIONS: ReadonlyArray<MigrationDefinition> = [
  rawLayerSchemaMigration,
  dateDimensionSchemaMigration,
  martsSchemaMigration,
];

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      layer TEXT NOT NULL,
      applied_at TEXT NOT NULL
    );
  `);
}

export function runMigrations(
  db: Database.Database,
  now: () => Date = () => new Date(),
): Result<RunMigrationsResult, AppError> {
  try {
    ensureMigrationsTable(db);

    const appliedRows = db
      .prepare<[], { id: number; name: string }>(
        `
          SELECT id, name
          FROM schema_migrations
          ORDER BY id ASC
        `,
      )
      .all();

    const appliedNames = new Set<string>();
    for (const row of appliedRows) {
      appliedNames.add(row.name);
    }

    const insertMigration = db.prepare<{ id: number; name: string; layer: string; appliedAt: string }>(
      `
        INSERT INTO schema_migrations (id, name, layer, applied_at)
        VALUES (@id, @name, @layer, @appliedAt)
      `,
    );

    const applied: string[] = [];
    const alreadyApplied: string[] = [];

    for (const migration of MIGRATIONS) {
      if (appliedNames.has(migration.name)) {
        alreadyApplied.push(migration.name);
        continue;
      }

      const applyMigrationTx = db.transaction(() => {
        migration.up(db);
        insertMigration.run({
          id: migration.id,
          name: migration.name,
          layer: migration.layer,
          appliedAt: now().toISOString(),
        });
      });

      applyMigrationTx();
      applied.push(migration.name);
    }

    return ok({ applied, alreadyApplied });
  } catch (cause) {
    return err(
      AppError.fromCause(
        'DB_MIGRATION_FAILED',
        'Could not run warehouse database migrations.',
        cause,
      ),
    );
  }
}
