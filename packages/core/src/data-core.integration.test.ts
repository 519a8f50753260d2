import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { createDatabaseConnection, openWarehouseDatabase, type DatabaseConnection } from './database.ts';
import { populateDateDimension, readDateKeys } from './date-dimension/index.ts';
import { runMigrations } from './migrations/index.ts';
import { createRawRepository } from './raw/raw-repository.ts';
import type { RawMessageRecord } from './raw/types.ts';
import { createRunRepository } from './runs/run-repository.ts';

function createMigratedDatabase(): DatabaseConnection | null {
  const connectionResult = createDatabaseConnection();
  expect(connectionResult.ok).toBe(true);
  if (!connectionResult.ok) {
    return null;
  }

  const migrationResult = runMigrations(connectionResult.value.db, () => new Date('2026-01-01T00:00:00.000Z'));
  expect(migrationResult.ok).toBe(true);
  if (!migrationResult.ok) {
    return null;
  }
  return connectionResult.value;
}

function closeDatabase(connection: DatabaseConnection): void {
  const closeResult = connection.close();
  expect(closeResult.ok).toBe(true);
}

function rawMessage(overrides: Partial<RawMessageRecord> = {}): RawMessageRecord {
  return {
    messageId: 1,
    channelName: 'CheMed123',
    messageDate: '2025-03-01T08:00:00.000Z',
    messageText: 'Amoxicillin in stock',
    hasMedia: false,
    imagePath: null,
    views: 100,
    forwards: 2,
    scrapedAt: '2025-03-02T00:00:00.000Z',
    rawPayload: '{"id":1}',
    ...overrides,
  };
}

describe('Data Core integration', () => {
  it('opens a warehouse file in a new directory and migrates it once', () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'medwarehouse-db-'));
    const filename = path.join(tempDir, 'nested', 'warehouse.db');

    const first = openWarehouseDatabase({ filename });
    expect(first.ok).toBe(true);
    if (first.ok) {
      expect(first.value.migrations.applied).toEqual([
        '001-raw-layer-schema',
        '002-date-dimension-schema',
        '003-marts-schema',
      ]);
      expect(first.value.connection.db.pragma('journal_mode', { simple: true })).toBe('wal');
      closeDatabase(first.value.connection);
    }

    const second = openWarehouseDatabase({ filename });
    expect(second.ok).toBe(true);
    if (second.ok) {
      expect(second.value.migrations.applied).toEqual([]);
      closeDatabase(second.value.connection);
    }

    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('runs migrations idempotently and creates raw, lookup and mart tables', () => {
    const connection = createMigratedDatabase();
    if (!connection) {
      return;
    }

    const secondRun = runMigrations(connection.db);
    expect(secondRun.ok).toBe(true);
    if (!secondRun.ok) {
      closeDatabase(connection);
      return;
    }
    expect(secondRun.value.applied).toHaveLength(0);
    expect(secondRun.value.alreadyApplied).toEqual([
      '001-raw-layer-schema',
      '002-date-dimension-schema',
      '003-marts-schema',
    ]);

    const tableNames = new Set(
      connection.db
        .prepare<[], { name: string }>(
          `
            SELECT name
            FROM sqlite_master
            WHERE type = 'table'
            ORDER BY name ASC
          `,
        )
        .all()
        .map((row) => row.name),
    );

    for (const tableName of [
      'schema_migrations',
      'raw_telegram_messages',
      'raw_image_detections',
      'dim_dates',
      'dim_channels',
      'fct_messages',
      'fct_image_detections',
      'pipeline_runs',
      'mart_publications',
      'pipeline_lineage',
    ]) {
      expect(tableNames.has(tableName)).toBe(true);
    }

    closeDatabase(connection);
  });

  it('upserts raw messages on (message_id, channel_name) and keeps nullable fields', () => {
    const connection = createMigratedDatabase();
    if (!connection) {
      return;
    }
    const repository = createRawRepository(connection.db);

    const firstWrite = repository.upsertRawMessages([
      rawMessage(),
      rawMessage({ messageId: 2, channelName: null, hasMedia: null, views: null, forwards: null }),
    ]);
    expect(firstWrite).toEqual({ ok: true, value: 2 });

    const secondWrite = repository.upsertRawMessages([
      rawMessage({ messageText: 'Amoxicillin sold out', views: 150, messageDate: '2030-01-01T00:00:00.000Z' }),
    ]);
    expect(secondWrite.ok).toBe(true);

    const messagesResult = repository.readRawMessages();
    expect(messagesResult.ok).toBe(true);
    if (!messagesResult.ok) {
      closeDatabase(connection);
      return;
    }

    expect(messagesResult.value).toHaveLength(2);
    const [updated, withNulls] = messagesResult.value;
    // Conflict updates text and counters only; the original timestamp stays.
    expect(updated).toEqual(
      rawMessage({ messageText: 'Amoxicillin sold out', views: 150 }),
    );
    expect(withNulls).toEqual(
      rawMessage({ messageId: 2, channelName: null, hasMedia: null, views: null, forwards: null }),
    );

    closeDatabase(connection);
  });

  it('rejects negative view and forward counts in the raw layer', () => {
    const connection = createMigratedDatabase();
    if (!connection) {
      return;
    }
    const repository = createRawRepository(connection.db);

    const negativeViews = repository.upsertRawMessages([rawMessage({ views: -500 })]);
    const negativeForwards = repository.upsertRawMessages([rawMessage({ messageId: 2, forwards: -1 })]);

    expect(negativeViews.ok).toBe(false);
    if (!negativeViews.ok) {
      expect(negativeViews.error.code).toBe('RAW_WRITE_FAILED');
    }
    expect(negativeForwards.ok).toBe(false);
    expect(repository.readRawMessages()).toEqual({ ok: true, value: [] });

    closeDatabase(connection);
  });

  it('upserts raw detections and reads a consistent snapshot', () => {
    const connection = createMigratedDatabase();
    if (!connection) {
      return;
    }
    const repository = createRawRepository(connection.db);

    const detection = {
      messageId: 1,
      channelName: 'chemed123',
      imagePath: 'images/chemed123/1.jpg',
      detectedObjects: '[{"class_name":"bottle","confidence":0.8}]',
      detectionCount: 1,
      imageCategory: 'product',
      processingDate: '2025-03-03T00:00:00.000Z',
    };
    expect(repository.upsertRawDetections([detection]).ok).toBe(true);
    expect(repository.upsertRawDetections([{ ...detection, detectionCount: 0, detectedObjects: '[]' }]).ok).toBe(true);
    expect(repository.upsertRawMessages([rawMessage()]).ok).toBe(true);

    const snapshot = repository.readRawSnapshot();
    expect(snapshot.ok).toBe(true);
    if (!snapshot.ok) {
      closeDatabase(connection);
      return;
    }
    expect(snapshot.value.messages).toHaveLength(1);
    expect(snapshot.value.detections).toEqual([{ ...detection, detectionCount: 0, detectedObjects: '[]' }]);

    closeDatabase(connection);
  });

  it('populates the date dimension and exposes its keys', () => {
    const connection = createMigratedDatabase();
    if (!connection) {
      return;
    }

    const first = populateDateDimension(connection.db, { startDate: '2024-02-27', endDate: '2024-03-02' });
    expect(first).toEqual({ ok: true, value: { requested: 5, inserted: 5 } });

    const second = populateDateDimension(connection.db, { startDate: '2024-02-27', endDate: '2024-03-02' });
    expect(second).toEqual({ ok: true, value: { requested: 5, inserted: 0 } });

    const keys = readDateKeys(connection.db);
    expect(keys.ok).toBe(true);
    if (!keys.ok) {
      closeDatabase(connection);
      return;
    }
    expect([...keys.value]).toEqual([20240227, 20240228, 20240229, 20240301, 20240302]);

    const leapDay = connection.db
      .prepare<[], { dayOfYear: number; dayName: string; isWeekend: number }>(
        `
          SELECT day_of_year AS dayOfYear, day_name AS dayName, is_weekend AS isWeekend
          FROM dim_dates
          WHERE date_key = 20240229
        `,
      )
      .get();
    expect(leapDay).toEqual({ dayOfYear: 60, dayName: 'Thursday', isWeekend: 0 });

    closeDatabase(connection);
  });

  it('extends an existing date dimension with the missing days only', () => {
    const connection = createMigratedDatabase();
    if (!connection) {
      return;
    }

    expect(populateDateDimension(connection.db, { startDate: '2025-01-01', endDate: '2025-01-31' }).ok).toBe(true);
    const widened = populateDateDimension(connection.db, { startDate: '2024-12-30', endDate: '2025-02-02' });
    expect(widened).toEqual({ ok: true, value: { requested: 35, inserted: 4 } });

    const keys = readDateKeys(connection.db);
    expect(keys.ok).toBe(true);
    if (keys.ok) {
      expect(keys.value.size).toBe(35);
      expect(keys.value.has(20241230)).toBe(true);
      expect(keys.value.has(20250202)).toBe(true);
    }

    closeDatabase(connection);
  });

  it('rejects an inverted date dimension range', () => {
    const connection = createMigratedDatabase();
    if (!connection) {
      return;
    }

    const result = populateDateDimension(connection.db, { startDate: '2025-01-02', endDate: '2025-01-01' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('DATE_DIMENSION_RANGE_INVALID');
    }

    closeDatabase(connection);
  });

  it('allows only one open pipeline run at a time', () => {
    const connection = createMigratedDatabase();
    if (!connection) {
      return;
    }
    const runs = createRunRepository(connection.db);

    const first = runs.startRun('2026-01-01T00:00:00.000Z');
    expect(first).toEqual({ ok: true, value: 1 });

    const blocked = runs.startRun('2026-01-01T00:05:00.000Z');
    expect(blocked.ok).toBe(false);
    if (!blocked.ok) {
      expect(blocked.error.code).toBe('PIPELINE_RUN_IN_PROGRESS');
      expect(blocked.error.context).toEqual({ runningRunId: 1, runningSince: '2026-01-01T00:00:00.000Z' });
    }

    const finished = runs.finishRun({
      runId: 1,
      status: 'failed',
      finishedAt: '2026-01-01T00:01:00.000Z',
      counts: {
        rawMessages: 3,
        stagedMessages: 2,
        channelRows: 0,
        messageRows: 0,
        detectionRows: 0,
        skippedDetections: 0,
      },
      publicationVersion: null,
      errorCode: 'PIPELINE_READ_FAILED',
      errorMessage: 'boom',
    });
    expect(finished.ok).toBe(true);

    const reopened = runs.startRun('2026-01-01T00:10:00.000Z');
    expect(reopened).toEqual({ ok: true, value: 2 });

    const record = runs.getRunById(1);
    expect(record.ok).toBe(true);
    if (record.ok) {
      expect(record.value?.status).toBe('failed');
      expect(record.value?.stagedMessages).toBe(2);
      expect(record.value?.errorCode).toBe('PIPELINE_READ_FAILED');
    }

    closeDatabase(connection);
  });
});
