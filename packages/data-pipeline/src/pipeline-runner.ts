import {
  MART_TABLE_NAMES,
  createRawRepository,
  createRunRepository,
  publishMarts,
  readDateKeys,
  type DatabaseConnection,
  type MartPublication,
  type MartTables,
  type PipelineLineageInput,
  type PipelineRunCounts,
  type RunRepository,
} from '@medwarehouse/core';
import { AppError, createSilentLogger, err, ok, type Logger, type Result } from '@medwarehouse/shared';
import { aggregateChannels } from './channel-aggregator.ts';
import { createDateDimensionResolver } from './date-dimension-resolver.ts';
import { enrichDetections, type DetectionWarning } from './detection-enricher.ts';
import { buildMessageFacts } from './fact-builder.ts';
import { normalizeRawMessages } from './staging-normalizer.ts';

const STAGING_TABLE = 'stg_telegram_messages';
const RAW_MESSAGES_TABLE = 'raw_telegram_messages';
const RAW_DETECTIONS_TABLE = 'raw_image_detections';

export interface RunWarehousePipelineInput {
  db: DatabaseConnection['db'];
  logger?: Logger;
  now?: () => Date;
  /** Checked between stages and before publishing; an aborted run publishes nothing. */
  signal?: AbortSignal;
}

export interface WarehousePipelineCounts extends PipelineRunCounts {
  rawDetections: number;
  droppedMessages: number;
  duplicateMessages: number;
  unresolvedDateKeys: number;
  filteredDetections: number;
}

export interface WarehousePipelineRunResult {
  runId: number;
  publication: MartPublication;
  counts: WarehousePipelineCounts;
  detectionWarnings: DetectionWarning[];
}

interface StageOutput {
  tables: MartTables;
  lineage: PipelineLineageInput[];
  detectionWarnings: DetectionWarning[];
}

function emptyCounts(): WarehousePipelineCounts {
  return {
    rawMessages: 0,
    rawDetections: 0,
    stagedMessages: 0,
    droppedMessages: 0,
    duplicateMessages: 0,
    unresolvedDateKeys: 0,
    channelRows: 0,
    messageRows: 0,
    detectionRows: 0,
    skippedDetections: 0,
    filteredDetections: 0,
  };
}

function checkAborted(signal: AbortSignal | undefined, stage: string): Result<void, AppError> {
  if (signal?.aborted) {
    return err(AppError.warning('PIPELINE_ABORTED', 'Warehouse pipeline run was aborted.', { stage }));
  }
  return ok(undefined);
}

function runStages(
  input: RunWarehousePipelineInput,
  logger: Logger,
  counts: WarehousePipelineCounts,
): Result<StageOutput, AppError> {
  const snapshotResult = createRawRepository(input.db).readRawSnapshot();
  if (!snapshotResult.ok) {
    return snapshotResult;
  }
  const dateKeysResult = readDateKeys(input.db);
  if (!dateKeysResult.ok) {
    return dateKeysResult;
  }
  const snapshot = snapshotResult.value;
  counts.rawMessages = snapshot.messages.length;
  counts.rawDetections = snapshot.detections.length;
  logger.info('Raw snapshot read.', {
    rawMessages: counts.rawMessages,
    rawDetections: counts.rawDetections,
    calendarDays: dateKeysResult.value.size,
  });

  const abortedBeforeStaging = checkAborted(input.signal, 'staging');
  if (!abortedBeforeStaging.ok) {
    return abortedBeforeStaging;
  }
  const staging = normalizeRawMessages(snapshot.messages, {
    resolveDateKey: createDateDimensionResolver(dateKeysResult.value),
  });
  counts.stagedMessages = staging.messages.length;
  counts.droppedMessages = staging.droppedRows;
  counts.duplicateMessages = staging.duplicateRows;
  counts.unresolvedDateKeys = staging.messages.filter((message) => message.dateKey === null).length;
  logger.info('Staging finished.', {
    stagedMessages: counts.stagedMessages,
    droppedMessages: counts.droppedMessages,
    duplicateMessages: counts.duplicateMessages,
    unresolvedDateKeys: counts.unresolvedDateKeys,
  });

  const abortedBeforeChannels = checkAborted(input.signal, 'channels');
  if (!abortedBeforeChannels.ok) {
    return abortedBeforeChannels;
  }
  const channels = aggregateChannels(staging.messages);
  counts.channelRows = channels.length;
  logger.info('Channel dimension built.', { channelRows: counts.channelRows });

  const abortedBeforeFacts = checkAborted(input.signal, 'messages');
  if (!abortedBeforeFacts.ok) {
    return abortedBeforeFacts;
  }
  const factsResult = buildMessageFacts(staging.messages, channels);
  if (!factsResult.ok) {
    return factsResult;
  }
  const messages = factsResult.value;
  counts.messageRows = messages.length;
  logger.info('Message facts built.', { messageRows: counts.messageRows });

  const abortedBeforeDetections = checkAborted(input.signal, 'detections');
  if (!abortedBeforeDetections.ok) {
    return abortedBeforeDetections;
  }
  const enrichment = enrichDetections(snapshot.detections, { messageFacts: messages, channels });
  counts.detectionRows = enrichment.detections.length;
  counts.skippedDetections = enrichment.skipped;
  counts.filteredDetections = enrichment.filtered;
  for (const warning of enrichment.warnings) {
    logger.debug('Detection record skipped.', {
      index: warning.index,
      messageId: warning.messageId,
      error: warning.error.toDTO(),
    });
  }
  if (enrichment.skipped > 0) {
    logger.warning('Some detection records were skipped.', { skippedDetections: enrichment.skipped });
  }
  logger.info('Detection facts built.', {
    detectionRows: counts.detectionRows,
    filteredDetections: counts.filteredDetections,
  });

  return ok({
    tables: { channels, messages, detections: enrichment.detections },
    detectionWarnings: enrichment.warnings,
    lineage: [
      {
        pipelineStage: 'staging',
        sourceTable: RAW_MESSAGES_TABLE,
        targetTable: STAGING_TABLE,
        sourceRecordCount: counts.rawMessages,
        outputRecordCount: counts.stagedMessages,
        metadata: {
          droppedMessages: counts.droppedMessages,
          duplicateMessages: counts.duplicateMessages,
          unresolvedDateKeys: counts.unresolvedDateKeys,
        },
      },
      {
        pipelineStage: 'channels',
        sourceTable: STAGING_TABLE,
        targetTable: MART_TABLE_NAMES.channels,
        sourceRecordCount: counts.stagedMessages,
        outputRecordCount: counts.channelRows,
        metadata: {},
      },
      {
        pipelineStage: 'messages',
        sourceTable: STAGING_TABLE,
        targetTable: MART_TABLE_NAMES.messages,
        sourceRecordCount: counts.stagedMessages,
        outputRecordCount: counts.messageRows,
        metadata: {},
      },
      {
        pipelineStage: 'detections',
        sourceTable: RAW_DETECTIONS_TABLE,
        targetTable: MART_TABLE_NAMES.detections,
        sourceRecordCount: counts.rawDetections,
        outputRecordCount: counts.detectionRows,
        metadata: {
          skippedDetections: counts.skippedDetections,
          filteredDetections: counts.filteredDetections,
        },
      },
    ],
  });
}

function closeFailedRun(
  runs: RunRepository,
  logger: Logger,
  runId: number,
  finishedAt: string,
  counts: WarehousePipelineCounts,
  error: AppError,
): void {
  const finished = runs.finishRun({
    runId,
    status: error.code === 'PIPELINE_ABORTED' ? 'aborted' : 'failed',
    finishedAt,
    counts,
    publicationVersion: null,
    errorCode: error.code,
    errorMessage: error.message,
  });
  if (!finished.ok) {
    logger.error('Could not close the failed run record.', { error: finished.error.toDTO() });
  }
}

/**
 * Runs the six transformation stages over one raw snapshot and publishes the
 * mart tables. The previous publication stays live unless every stage and the
 * publish itself succeed.
 */
export function runWarehousePipeline(
  input: RunWarehousePipelineInput,
): Result<WarehousePipelineRunResult, AppError> {
  const now = input.now ?? (() => new Date());
  const baseLogger = input.logger ?? createSilentLogger();
  const runs = createRunRepository(input.db);

  const startResult = runs.startRun(now().toISOString());
  if (!startResult.ok) {
    baseLogger.error('Warehouse pipeline run refused.', { error: startResult.error.toDTO() });
    return startResult;
  }
  const runId = startResult.value;
  const logger = baseLogger.withContext({ runId });
  const counts = emptyCounts();
  logger.info('Warehouse pipeline run started.');

  const fail = (error: AppError): Result<WarehousePipelineRunResult, AppError> => {
    const level = error.code === 'PIPELINE_ABORTED' ? 'warning' : 'error';
    logger.log(level, 'Warehouse pipeline run failed.', { error: error.toDTO() });
    closeFailedRun(runs, logger, runId, now().toISOString(), counts, error);
    return err(error.withContext({ runId }));
  };

  const stagesResult = runStages(input, logger, counts);
  if (!stagesResult.ok) {
    return fail(stagesResult.error);
  }

  const abortedBeforePublish = checkAborted(input.signal, 'publish');
  if (!abortedBeforePublish.ok) {
    return fail(abortedBeforePublish.error);
  }

  const publishedAt = now().toISOString();
  // Lineage commits with the publication or not at all.
  const publishResult = publishMarts(input.db, {
    runId,
    publishedAt,
    ...stagesResult.value.tables,
    beforeCommit: () => runs.recordLineage(runId, publishedAt, stagesResult.value.lineage),
  });
  if (!publishResult.ok) {
    return fail(publishResult.error);
  }
  const publication = publishResult.value;
  logger.info('Marts published.', {
    version: publication.version,
    contentHash: publication.contentHash,
  });

  const finishResult = runs.finishRun({
    runId,
    status: 'succeeded',
    finishedAt: now().toISOString(),
    counts,
    publicationVersion: publication.version,
    errorCode: null,
    errorMessage: null,
  });
  if (!finishResult.ok) {
    logger.error('Could not close the run record.', { error: finishResult.error.toDTO() });
    return err(finishResult.error.withContext({ runId }));
  }

  logger.info('Warehouse pipeline run succeeded.', { ...counts });
  return ok({
    runId,
    publication,
    counts,
    detectionWarnings: stagesResult.value.detectionWarnings,
  });
}
