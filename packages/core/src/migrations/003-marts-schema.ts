import {
  MART_INDEXES_DDL,
  MART_TABLE_NAMES,
  channelDimensionDdl,
  detectionFactDdl,
  messageFactDdl,
} from '../marts/schema.ts';
import type { MigrationDefinition } from './types.ts';

export const martsSchemaMigration: MigrationDefinition = {
  id: 3,
  name: '003-marts-schema',
  layer: 'marts',
  up: (db) => {
    db.exec(channelDimensionDdl(MART_TABLE_NAMES.channels));
    db.exec(messageFactDdl(MART_TABLE_NAMES.messages));
    db.exec(detectionFactDdl(MART_TABLE_NAMES.detections));
    db.exec(MART_INDEXES_DDL);

    db.exec(`
      CREATE TABLE IF NOT EXISTS pipeline_runs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        status TEXT NOT NULL CHECK (status IN ('running', 'succeeded', 'failed', 'aborted')),
        started_at TEXT NOT NULL,
        finished_at TEXT,
        raw_messages INTEGER NOT NULL DEFAULT 0,
        staged_messages INTEGER NOT NULL DEFAULT 0,
        channel_rows INTEGER NOT NULL DEFAULT 0,
        message_rows INTEGER NOT NULL DEFAULT 0,
        detection_rows INTEGER NOT NULL DEFAULT 0,
        skipped_detections INTEGER NOT NULL DEFAULT 0,
        publication_version INTEGER,
        error_code TEXT,
        error_message TEXT
      );

      CREATE TABLE IF NOT EXISTS mart_publications (
        version INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id INTEGER NOT NULL REFERENCES pipeline_runs(id),
        published_at TEXT NOT NULL,
        channel_rows INTEGER NOT NULL CHECK (channel_rows >= 0),
        message_rows INTEGER NOT NULL CHECK (message_rows >= 0),
        detection_rows INTEGER NOT NULL CHECK (detection_rows >= 0),
        content_hash TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS pipeline_lineage (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id INTEGER NOT NULL REFERENCES pipeline_runs(id),
        pipeline_stage TEXT NOT NULL,
        source_table TEXT NOT NULL,
        target_table TEXT NOT NULL,
        source_record_count INTEGER NOT NULL DEFAULT 0 CHECK (source_record_count >= 0),
        output_record_count INTEGER NOT NULL DEFAULT 0 CHECK (output_record_count >= 0),
        metadata_json TEXT NOT NULL,
        produced_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_pipeline_runs_status
        ON pipeline_runs(status, started_at);

      CREATE INDEX IF NOT EXISTS idx_pipeline_lineage_run_stage
        ON pipeline_lineage(run_id, pipeline_stage);
    `);
  },
};
