export interface ForcedThresholds {
  lowDensity: number;
  highDensity: number;
  lowCoveragePercent: number;
  minCount: number;
  maxCount: number;
}

export interface DetectionSettings {
  confidenceThreshold: number;
  maxRetries: number;
  vadFilter: boolean;
  vadMinSpeechDurationMs: number;
  vadMaxSpeechDurationS: number;
  processSubtitles: boolean;
  subtitleConfidenceThreshold: number;
  detectForcedSubtitles: boolean;
  analyzeForcedAudio: boolean;
  detectSdhSubtitles: boolean;
  operationTimeoutMs: number;
  forced: ForcedThresholds;
}

export interface RunOptions {
  dryRun: boolean;
  useTracking: boolean;
  forceReprocess: boolean;
  reprocessAll: boolean;
  reprocessAllSubtitles: boolean;
}

type EnvSource = Record<string, string | undefined>;

export const DEFAULT_FORCED_THRESHOLDS: ForcedThresholds = {
  lowDensity: 3.0,
  highDensity: 8.0,
  lowCoveragePercent: 25.0,
  minCount: 50,
  maxCount: 300
};

export const DEFAULT_DETECTION_SETTINGS: DetectionSettings = {
  confidenceThreshold: 0.9,
  maxRetries: 3,
  vadFilter: true,
  vadMinSpeechDurationMs: 250,
  vadMaxSpeechDurationS: 30,
  processSubtitles: true,
  subtitleConfidenceThreshold: 0.85,
  detectForcedSubtitles: true,
  analyzeForcedAudio: false,
  detectSdhSubtitles: true,
  operationTimeoutMs: 600_000,
  forced: DEFAULT_FORCED_THRESHOLDS
};

export const DEFAULT_RUN_OPTIONS: RunOptions = {
  dryRun: false,
  useTracking: true,
  forceReprocess: false,
  reprocessAll: false,
  reprocessAllSubtitles: false
};

function readTrimmed(source: EnvSource, key: string): string | undefined {
  const value = source[key];
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function readEnvNumber(source: EnvSource, key: string, fallback: number): number {
  const raw = readTrimmed(source, key);
  if (!raw) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) {
    return fallback;
  }
  return parsed;
}

export function readEnvBoolean(source: EnvSource, key: string, fallback: boolean): boolean {
  const raw = readTrimmed(source, key)?.toLowerCase();
  if (raw === 'true' || raw === '1' || raw === 'yes' || raw === 'on') {
    return true;
  }
  if (raw === 'false' || raw === '0' || raw === 'no' || raw === 'off') {
    return false;
  }
  return fallback;
}

export function loadDetectionSettings(source: EnvSource = process.env): DetectionSettings {
  const defaults = DEFAULT_DETECTION_SETTINGS;
  const forced = DEFAULT_FORCED_THRESHOLDS;

  return {
    confidenceThreshold: readEnvNumber(source, 'CONFIDENCE_THRESHOLD', defaults.confidenceThreshold),
    maxRetries: Math.max(1, Math.floor(readEnvNumber(source, 'MAX_RETRIES', defaults.maxRetries))),
    vadFilter: readEnvBoolean(source, 'VAD_FILTER', defaults.vadFilter),
    vadMinSpeechDurationMs: readEnvNumber(
      source,
      'VAD_MIN_SPEECH_DURATION_MS',
      defaults.vadMinSpeechDurationMs
    ),
    vadMaxSpeechDurationS: readEnvNumber(
      source,
      'VAD_MAX_SPEECH_DURATION_S',
      defaults.vadMaxSpeechDurationS
    ),
    processSubtitles: readEnvBoolean(source, 'PROCESS_SUBTITLES', defaults.processSubtitles),
    subtitleConfidenceThreshold: readEnvNumber(
      source,
      'SUBTITLE_CONFIDENCE_THRESHOLD',
      defaults.subtitleConfidenceThreshold
    ),
    detectForcedSubtitles: readEnvBoolean(
      source,
      'DETECT_FORCED_SUBTITLES',
      defaults.detectForcedSubtitles
    ),
    analyzeForcedAudio: readEnvBoolean(source, 'ANALYZE_FORCED_AUDIO', defaults.analyzeForcedAudio),
    detectSdhSubtitles: readEnvBoolean(source, 'DETECT_SDH_SUBTITLES', defaults.detectSdhSubtitles),
    operationTimeoutMs:
      readEnvNumber(source, 'OPERATION_TIMEOUT_SECONDS', defaults.operationTimeoutMs / 1000) * 1000,
    forced: {
      lowDensity: readEnvNumber(source, 'FORCED_LOW_DENSITY_THRESHOLD', forced.lowDensity),
      highDensity: readEnvNumber(source, 'FORCED_HIGH_DENSITY_THRESHOLD', forced.highDensity),
      lowCoveragePercent: readEnvNumber(
        source,
        'FORCED_LOW_COVERAGE_THRESHOLD',
        forced.lowCoveragePercent
      ),
      minCount: readEnvNumber(source, 'FORCED_MIN_COUNT_THRESHOLD', forced.minCount),
      maxCount: readEnvNumber(source, 'FORCED_MAX_COUNT_THRESHOLD', forced.maxCount)
    }
  };
}

export function loadRunOptions(source: EnvSource = process.env): RunOptions {
  const defaults = DEFAULT_RUN_OPTIONS;
  return {
    dryRun: readEnvBoolean(source, 'DRY_RUN', defaults.dryRun),
    useTracking: readEnvBoolean(source, 'USE_TRACKING', defaults.useTracking),
    forceReprocess: readEnvBoolean(source, 'FORCE_REPROCESS', defaults.forceReprocess),
    reprocessAll: readEnvBoolean(source, 'REPROCESS_ALL', defaults.reprocessAll),
    reprocessAllSubtitles: readEnvBoolean(
      source,
      'REPROCESS_ALL_SUBTITLES',
      defaults.reprocessAllSubtitles
    )
  };
}
