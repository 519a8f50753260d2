import fs from 'node:fs';
import {
  createRawRepository,
  openWarehouseDatabase,
  populateDateDimension,
  type DatabaseConnection,
} from '../packages/core/src/index.ts';
import {
  loadDetectionResultsFile,
  loadScrapedMessageFiles,
  runWarehousePipeline,
  type RawLoadWarning,
} from '../packages/data-pipeline/src/index.ts';
import {
  AppError,
  createLogger,
  err,
  loadWarehouseConfig,
  ok,
  type Logger,
  type Result,
  type WarehouseConfig,
} from '../packages/shared/src/index.ts';

function logLoadWarnings(logger: Logger, warnings: readonly RawLoadWarning[]): void {
  for (const warning of warnings) {
    logger.warning('Raw input skipped.', {
      filePath: warning.filePath,
      index: warning.index,
      error: warning.error.toDTO(),
    });
  }
}

function loadRawInputs(connection: DatabaseConnection, config: WarehouseConfig, logger: Logger): Result<void, AppError> {
  const raw = createRawRepository(connection.db);

  if (fs.existsSync(config.rawMessagesDir)) {
    const messages = loadScrapedMessageFiles(config.rawMessagesDir);
    if (!messages.ok) {
      return messages;
    }
    logLoadWarnings(logger, messages.value.warnings);
    const upserted = raw.upsertRawMessages(messages.value.records);
    if (!upserted.ok) {
      return upserted;
    }
    logger.info('Raw messages loaded.', { files: messages.value.files, rows: upserted.value });
  } else {
    logger.info('Raw message directory not found; using rows already in the database.', {
      rawMessagesDir: config.rawMessagesDir,
    });
  }

  if (config.detectionsPath === null) {
    return ok(undefined);
  }
  if (!fs.existsSync(config.detectionsPath)) {
    return err(
      AppError.create('RAW_FILE_MISSING', 'Configured detection results file does not exist.', 'error', {
        detectionsPath: config.detectionsPath,
      }),
    );
  }
  const detections = loadDetectionResultsFile(config.detectionsPath);
  logLoadWarnings(logger, detections.warnings);
  const upserted = raw.upsertRawDetections(detections.records);
  if (!upserted.ok) {
    return upserted;
  }
  logger.info('Raw detections loaded.', { rows: upserted.value });
  return ok(undefined);
}

function prepareDatabase(connection: DatabaseConnection, config: WarehouseConfig, logger: Logger): Result<void, AppError> {
  const calendar = populateDateDimension(connection.db, config.dateDimension);
  if (!calendar.ok) {
    return calendar;
  }
  logger.info('Date dimension ready.', { ...calendar.value, ...config.dateDimension });

  return loadRawInputs(connection, config, logger);
}

function main(): number {
  const configResult = loadWarehouseConfig();
  if (!configResult.ok) {
    createLogger().fatal('Invalid configuration.', { error: configResult.error.toDTO() });
    return 1;
  }
  const config = configResult.value;
  const logger = createLogger({ baseContext: { app: 'medwarehouse' }, minLevel: config.logLevel });

  const opened = openWarehouseDatabase({ filename: config.dbPath });
  if (!opened.ok) {
    logger.fatal('Could not open the warehouse database.', { error: opened.error.toDTO() });
    return 1;
  }
  const { connection, migrations } = opened.value;
  logger.info('Migrations applied.', { applied: migrations.applied });

  let exitCode = 0;
  try {
    const prepared = prepareDatabase(connection, config, logger);
    if (!prepared.ok) {
      logger.fatal('Warehouse preparation failed.', { error: prepared.error.toDTO() });
      exitCode = 1;
    } else {
      const run = runWarehousePipeline({ db: connection.db, logger });
      if (run.ok) {
        logger.info('Warehouse refreshed.', {
          version: run.value.publication.version,
          contentHash: run.value.publication.contentHash,
          ...run.value.counts,
        });
      } else {
        exitCode = 1;
      }
    }
  } finally {
    const closeResult = connection.close();
    if (!closeResult.ok) {
      logger.error('Could not close the warehouse database.', { error: closeResult.error.toDTO() });
      exitCode = 1;
    }
  }
  return exitCode;
}

process.exitCode = main();
