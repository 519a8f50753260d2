import type { MigrationDefinition } from './types.ts';

// Raw layer is append-only input owned by the scraper and the vision loader.
// Channel and timestamp stay nullable here; staging filters them out.
export const rawLayerSchemaMigration: MigrationDefinition = {
  id: 1,
  name: '001-raw-layer-schema',
  layer: 'raw',
  up: (db) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS raw_telegram_messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        message_id INTEGER NOT NULL,
        channel_name TEXT,
        message_date TEXT,
        message_text TEXT,
        has_media INTEGER CHECK (has_media IS NULL OR has_media IN (0, 1)),
        image_path TEXT,
        views INTEGER CHECK (views IS NULL OR views >= 0),
        forwards INTEGER CHECK (forwards IS NULL OR forwards >= 0),
        scraped_at TEXT,
        raw_data TEXT NOT NULL DEFAULT '{}',
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        UNIQUE (message_id, channel_name)
      );

      CREATE TABLE IF NOT EXISTS raw_image_detections (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        message_id INTEGER,
        channel_name TEXT,
        image_path TEXT NOT NULL,
        detected_objects TEXT NOT NULL DEFAULT '[]',
        detection_count INTEGER NOT NULL DEFAULT 0,
        image_category TEXT,
        processing_date TEXT,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        UNIQUE (message_id, channel_name, image_path)
      );

      CREATE INDEX IF NOT EXISTS idx_raw_messages_channel
        ON raw_telegram_messages(channel_name);

      CREATE INDEX IF NOT EXISTS idx_raw_messages_date
        ON raw_telegram_messages(message_date);

      CREATE INDEX IF NOT EXISTS idx_raw_detections_message
        ON raw_image_detections(message_id, channel_name);
    `);
  },
};
