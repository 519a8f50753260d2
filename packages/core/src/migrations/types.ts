import type Database from 'better-sqlite3';

export interface MigrationDefinition {
  readonly id: number;
  readonly name: string;
  /** Layer the migration belongs to: raw, shared lookups or marts. */
  readonly layer: 'raw' | 'lookup' | 'marts';
  up: (db: Database.Database) => void;
}
