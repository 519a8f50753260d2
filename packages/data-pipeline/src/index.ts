export { cleanText } from './text-cleaner.ts';

export {
  SURROGATE_KEY_NULL,
  channelKey,
  detectionKey,
  generateSurrogateKey,
  messageKey,
  type SurrogateKeyValue,
} from './surrogate-key.ts';

export { createDateDimensionResolver, type DateKeyResolver } from './date-dimension-resolver.ts';

export {
  NO_TEXT_SENTINEL,
  classifyActivityLevel,
  classifyChannelType,
  classifyDetection,
  containsAnyKeyword,
  detectProduct,
  extractPriceAmount,
  resolveChannelDisplayName,
  type DetectionFlags,
} from './rules.ts';

export type { StagingMessage } from './types.ts';

export {
  normalizeChannelName,
  normalizeMessageText,
  normalizeRawMessage,
  normalizeRawMessages,
  type NormalizeRawMessagesOptions,
  type StagingResult,
} from './staging-normalizer.ts';

export { aggregateChannels } from './channel-aggregator.ts';

export { buildMessageFacts } from './fact-builder.ts';

export {
  enrichDetections,
  type DetectionEnrichmentResult,
  type DetectionWarning,
  type EnrichDetectionsInput,
} from './detection-enricher.ts';

export {
  loadDetectionResultsFile,
  loadScrapedMessageFiles,
  type RawLoadResult,
  type RawLoadWarning,
} from './raw-loader.ts';

export {
  runWarehousePipeline,
  type RunWarehousePipelineInput,
  type WarehousePipelineCounts,
  type WarehousePipelineRunResult,
} from './pipeline-runner.ts';
