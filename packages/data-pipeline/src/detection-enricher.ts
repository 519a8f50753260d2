import type {
  ChannelDimensionRow,
  DetectionFactRow,
  MessageFactRow,
  RawDetectionRecord,
} from '@medwarehouse/core';
import { AppError, toError } from '@medwarehouse/shared';
import { z } from 'zod/v4';
import {
  CONTAINER_LABELS,
  MEDICAL_TOOL_LABELS,
  PERSON_LABELS,
  classifyDetection,
  type DetectionFlags,
} from './rules.ts';
import { normalizeChannelName } from './staging-normalizer.ts';
import { compareText } from './channel-aggregator.ts';
import { computeForwardRate } from './fact-builder.ts';
import { detectionKey } from './surrogate-key.ts';

const ConfidenceSchema = z.number().min(0).max(1);

// Older detection exports name the label `object` instead of `class_name`.
const DetectedObjectSchema = z
  .union([
    z.object({ class_name: z.string(), confidence: ConfidenceSchema }),
    z.object({ object: z.string(), confidence: ConfidenceSchema }),
  ])
  .transform((value) => ({
    label: 'class_name' in value ? value.class_name : value.object,
    confidence: value.confidence,
  }));

const DetectedObjectsSchema = z.array(DetectedObjectSchema);

export type DetectedObject = z.infer<typeof DetectedObjectSchema>;

export interface DetectionWarning {
  /** Position of the record in the raw input. */
  index: number;
  messageId: number;
  error: AppError;
}

export interface EnrichDetectionsInput {
  messageFacts: readonly MessageFactRow[];
  channels: readonly ChannelDimensionRow[];
}

export interface DetectionEnrichmentResult {
  detections: DetectionFactRow[];
  warnings: DetectionWarning[];
  /** Qualifying records left out because of a warning. */
  skipped: number;
  /** Records with no detections or without a message id or channel. */
  filtered: number;
}

export function parseDetectedObjects(payload: string): DetectedObject[] | AppError {
  let decoded: unknown;
  try {
    decoded = JSON.parse(payload);
  } catch (cause) {
    return AppError.create(
      'DETECTION_PAYLOAD_INVALID',
      'Detected objects payload is not valid JSON.',
      'warning',
      undefined,
      toError(cause),
    );
  }

  const parsed = DetectedObjectsSchema.safeParse(decoded);
  if (!parsed.success) {
    return AppError.warning('DETECTION_PAYLOAD_INVALID', 'Detected objects payload has an unexpected shape.', {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

export function computeDetectionFlags(labels: readonly string[]): DetectionFlags {
  const present = new Set(labels);
  const anyPresent = (candidates: readonly string[]) => candidates.some((label) => present.has(label));
  return {
    hasPerson: anyPresent(PERSON_LABELS),
    hasContainer: anyPresent(CONTAINER_LABELS),
    hasMedicalTool: anyPresent(MEDICAL_TOOL_LABELS),
  };
}

export function summarizeDetectedObjects(objects: readonly DetectedObject[]): {
  objectCount: number;
  avgConfidence: number | null;
  detectedObjectsList: string | null;
} {
  if (objects.length === 0) {
    return { objectCount: 0, avgConfidence: null, detectedObjectsList: null };
  }
  const confidenceTotal = objects.reduce((sum, object) => sum + object.confidence, 0);
  const labels = [...new Set(objects.map((object) => object.label))].sort(compareText);
  return {
    objectCount: objects.length,
    avgConfidence: confidenceTotal / objects.length,
    detectedObjectsList: labels.join(', '),
  };
}

function factLookupKey(channelKey: string, messageId: number): string {
  return `${channelKey}:${messageId}`;
}

/**
 * Turns raw detection records into detection facts, left-joined to the message
 * facts. A record whose payload cannot be parsed is skipped and reported; the
 * rest of the batch still goes through.
 */
export function enrichDetections(
  rawDetections: readonly RawDetectionRecord[],
  input: EnrichDetectionsInput,
): DetectionEnrichmentResult {
  const channelKeysByName = new Map<string, string>();
  for (const channel of input.channels) {
    channelKeysByName.set(channel.channelName, channel.channelKey);
  }
  const factsByKey = new Map<string, MessageFactRow>();
  for (const fact of input.messageFacts) {
    factsByKey.set(factLookupKey(fact.channelKey, fact.messageId), fact);
  }

  const detections: DetectionFactRow[] = [];
  const warnings: DetectionWarning[] = [];
  const seenKeys = new Set<string>();
  let filtered = 0;

  rawDetections.forEach((record, index) => {
    if (record.detectionCount <= 0 || record.messageId === null || record.channelName === null) {
      filtered += 1;
      return;
    }
    const messageId = record.messageId;
    const channelName = normalizeChannelName(record.channelName);
    const key = detectionKey(messageId, channelName, record.imagePath);

    if (seenKeys.has(key)) {
      warnings.push({
        index,
        messageId,
        error: AppError.warning('DETECTION_DUPLICATE', 'Detection repeats an earlier image once channel names are normalized.', {
          channelName,
          imagePath: record.imagePath,
        }),
      });
      return;
    }

    const objects = parseDetectedObjects(record.detectedObjects);
    if (objects instanceof AppError) {
      warnings.push({
        index,
        messageId,
        error: objects.withContext({ channelName, imagePath: record.imagePath }),
      });
      return;
    }
    seenKeys.add(key);

    const flags = computeDetectionFlags(objects.map((object) => object.label));
    const channelKey = channelKeysByName.get(channelName);
    const fact = channelKey === undefined ? undefined : factsByKey.get(factLookupKey(channelKey, messageId));

    detections.push({
      detectionKey: key,
      messageId,
      channelName,
      imagePath: record.imagePath,
      detectionCount: record.detectionCount,
      imageCategory: record.imageCategory,
      processingDate: record.processingDate,
      ...flags,
      ...summarizeDetectedObjects(objects),
      messageKey: fact?.messageKey ?? null,
      channelKey: fact?.channelKey ?? null,
      dateKey: fact?.dateKey ?? null,
      views: fact?.views ?? null,
      forwards: fact?.forwards ?? null,
      totalEngagement: fact?.totalEngagement ?? null,
      forwardRate: fact ? computeForwardRate(fact.views, fact.forwards) : 0,
      detailedCategory: classifyDetection(flags),
    });
  });

  return { detections, warnings, skipped: warnings.length, filtered };
}
