import type Database from 'better-sqlite3';
import { AppError, err, ok, type Result } from '@medwarehouse/shared';

export type PipelineRunStatus = 'running' | 'succeeded' | 'failed' | 'aborted';

export interface PipelineRunCounts {
  rawMessages: number;
  stagedMessages: number;
  channelRows: number;
  messageRows: number;
  detectionRows: number;
  skippedDetections: number;
}

export interface FinishPipelineRunInput {
  runId: number;
  status: Exclude<PipelineRunStatus, 'running'>;
  finishedAt: string;
  counts: PipelineRunCounts;
  publicationVersion: number | null;
  errorCode: string | null;
  errorMessage: string | null;
}

export interface PipelineLineageInput {
  pipelineStage: string;
  sourceTable: string;
  targetTable: string;
  sourceRecordCount: number;
  outputRecordCount: number;
  metadata: Record<string, unknown>;
}

export interface PipelineRunRecord extends PipelineRunCounts {
  id: number;
  status: PipelineRunStatus;
  startedAt: string;
  finishedAt: string | null;
  publicationVersion: number | null;
  errorCode: string | null;
  errorMessage: string | null;
}

export interface RunRepository {
  startRun: (startedAt: string) => Result<number, AppError>;
  finishRun: (input: FinishPipelineRunInput) => Result<void, AppError>;
  recordLineage: (runId: number, producedAt: string, entries: readonly PipelineLineageInput[]) => Result<void, AppError>;
  getRunById: (runId: number) => Result<PipelineRunRecord | null, AppError>;
}

function toNumberId(value: number | bigint): number {
  if (typeof value === 'bigint') {
    return Number(value);
  }
  return value;
}

export function createRunRepository(db: Database.Database): RunRepository {
  const findRunningStmt = db.prepare<[], { id: number; startedAt: string }>(
    `
      SELECT id, started_at AS startedAt
      FROM pipeline_runs
      WHERE status = 'running'
      ORDER BY id ASC
      LIMIT 1
    `,
  );
  const insertRunStmt = db.prepare<{ startedAt: string }>(
    `
      INSERT INTO pipeline_runs (status, started_at)
      VALUES ('running', @startedAt)
    `,
  );
  const finishRunStmt = db.prepare<{
    runId: number;
    status: string;
    finishedAt: string;
    rawMessages: number;
    stagedMessages: number;
    channelRows: number;
    messageRows: number;
    detectionRows: number;
    skippedDetections: number;
    publicationVersion: number | null;
    errorCode: string | null;
    errorMessage: string | null;
  }>(
    `
      UPDATE pipeline_runs
      SET
        status = @status,
        finished_at = @finishedAt,
        raw_messages = @rawMessages,
        staged_messages = @stagedMessages,
        channel_rows = @channelRows,
        message_rows = @messageRows,
        detection_rows = @detectionRows,
        skipped_detections = @skippedDetections,
        publication_version = @publicationVersion,
        error_code = @errorCode,
        error_message = @errorMessage
      WHERE id = @runId
    `,
  );
  const insertLineageStmt = db.prepare<{
    runId: number;
    pipelineStage: string;
    sourceTable: string;
    targetTable: string;
    sourceRecordCount: number;
    outputRecordCount: number;
    metadataJson: string;
    producedAt: string;
  }>(
    `
      INSERT INTO pipeline_lineage (
        run_id,
        pipeline_stage,
        source_table,
        target_table,
        source_record_count,
        output_record_count,
        metadata_json,
        produced_at
      )
      VALUES (
        @runId,
        @pipelineStage,
        @sourceTable,
        @targetTable,
        @sourceRecordCount,
        @outputRecordCount,
        @metadataJson,
        @producedAt
      )
    `,
  );
  const getRunStmt = db.prepare<{ runId: number }, PipelineRunRecord>(
    `
      SELECT
        id,
        status,
        started_at AS startedAt,
        finished_at AS finishedAt,
        raw_messages AS rawMessages,
        staged_messages AS stagedMessages,
        channel_rows AS channelRows,
        message_rows AS messageRows,
        detection_rows AS detectionRows,
        skipped_detections AS skippedDetections,
        publication_version AS publicationVersion,
        error_code AS errorCode,
        error_message AS errorMessage
      FROM pipeline_runs
      WHERE id = @runId
      LIMIT 1
    `,
  );

  // Check and insert share one immediate transaction: at most one run may be open.
  const startRunTx = db.transaction((startedAt: string): Result<number, AppError> => {
    const running = findRunningStmt.get();
    if (running) {
      return err(
        AppError.create(
          'PIPELINE_RUN_IN_PROGRESS',
          'Another warehouse pipeline run is still marked as running.',
          'error',
          { runningRunId: running.id, runningSince: running.startedAt },
        ),
      );
    }
    const inserted = insertRunStmt.run({ startedAt });
    return ok(toNumberId(inserted.lastInsertRowid));
  });

  const recordLineageTx = db.transaction(
    (runId: number, producedAt: string, entries: readonly PipelineLineageInput[]) => {
      for (const entry of entries) {
        insertLineageStmt.run({
          runId,
          pipelineStage: entry.pipelineStage,
          sourceTable: entry.sourceTable,
          targetTable: entry.targetTable,
          sourceRecordCount: entry.sourceRecordCount,
          outputRecordCount: entry.outputRecordCount,
          metadataJson: JSON.stringify(entry.metadata),
          producedAt,
        });
      }
    },
  );

  return {
    startRun: (startedAt) => {
      try {
        return startRunTx.immediate(startedAt);
      } catch (cause) {
        return err(AppError.fromCause('PIPELINE_RUN_START_FAILED', 'Could not register pipeline run.', cause));
      }
    },
    finishRun: (input) => {
      try {
        finishRunStmt.run({
          runId: input.runId,
          status: input.status,
          finishedAt: input.finishedAt,
          rawMessages: input.counts.rawMessages,
          stagedMessages: input.counts.stagedMessages,
          channelRows: input.counts.channelRows,
          messageRows: input.counts.messageRows,
          detectionRows: input.counts.detectionRows,
          skippedDetections: input.counts.skippedDetections,
          publicationVersion: input.publicationVersion,
          errorCode: input.errorCode,
          errorMessage: input.errorMessage,
        });
        return ok(undefined);
      } catch (cause) {
        return err(
          AppError.fromCause('PIPELINE_RUN_FINISH_FAILED', 'Could not close pipeline run.', cause, {
            runId: input.runId,
          }),
        );
      }
    },
    recordLineage: (runId, producedAt, entries) => {
      try {
        recordLineageTx(runId, producedAt, entries);
        return ok(undefined);
      } catch (cause) {
        return err(
          AppError.fromCause('PIPELINE_LINEAGE_FAILED', 'Could not record pipeline lineage.', cause, { runId }),
        );
      }
    },
    getRunById: (runId) => {
      try {
        return ok(getRunStmt.get({ runId }) ?? null);
      } catch (cause) {
        return err(AppError.fromCause('PIPELINE_RUN_READ_FAILED', 'Could not read pipeline run.', cause, { runId }));
      }
    },
  };
}
