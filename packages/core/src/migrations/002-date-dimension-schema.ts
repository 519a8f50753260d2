import type { MigrationDefinition } from './types.ts';

export const dateDimensionSchemaMigration: MigrationDefinition = {
  id: 2,
  name: '002-date-dimension-schema',
  layer: 'lookup',
  up: (db) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS dim_dates (
        date_key INTEGER PRIMARY KEY,
        full_date TEXT NOT NULL UNIQUE,
        day_of_week INTEGER NOT NULL CHECK (day_of_week BETWEEN 1 AND 7),
        day_name TEXT NOT NULL,
        day_of_month INTEGER NOT NULL,
        day_of_year INTEGER NOT NULL,
        week_of_year INTEGER NOT NULL,
        month INTEGER NOT NULL CHECK (month BETWEEN 1 AND 12),
        month_name TEXT NOT NULL,
        quarter INTEGER NOT NULL CHECK (quarter BETWEEN 1 AND 4),
        year INTEGER NOT NULL,
        is_weekend INTEGER NOT NULL CHECK (is_weekend IN (0, 1)),
        is_holiday INTEGER NOT NULL DEFAULT 0 CHECK (is_holiday IN (0, 1)),
        holiday_name TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_dim_dates_year_month
        ON dim_dates(year, month);
    `);
  },
};
