import type { TrackKind } from '@/types/media';

export type AttemptVariant = 'filtered' | 'unfiltered';

export interface TranscriptionEvidence {
  language: string;
  confidence: number;
  text: string;
  textLength: number;
  wordCount: number;
  segmentsDetected: number;
  vadRemovedAll: boolean;
  variant: AttemptVariant;
}

export type VerdictMethod = 'sampled-segment' | 'full-track' | 'aggregated-majority';

export interface LanguageVerdict {
  code: string;
  confidence: number;
  method: VerdictMethod;
}

export interface SampleVerdict {
  code: string;
  confidence: number;
  variant: AttemptVariant;
}

export interface SubtitleStatistics {
  count: number;
  totalDurationSec: number;
  coveragePercent: number;
  density: number;
  avgDurationSec: number;
  gapVariance: number;
  timings: Array<[number, number]>;
}

export type ForcedTier = 1 | 2 | 3;

export interface ForcedVerdict {
  forced: boolean;
  reason: string;
  tier: ForcedTier;
}

export type FailureKind = 'extraction' | 'inference' | 'low-confidence' | 'timeout' | 'write';

export interface TrackFailure {
  trackKind: TrackKind;
  trackIndex: number;
  kind: FailureKind;
  message: string;
}

export interface TrackingEntry {
  size: number;
  mtimeMs: number;
  audioProcessed: boolean;
  subtitleProcessed: boolean;
  processedAt: string;
}

export interface TrackingDb {
  entries: Record<string, TrackingEntry>;
}

export type SubtitleLanguageMethod = 'text-detector' | 'script-heuristic' | 'ocr';

export interface SubtitleLanguageResult {
  code: string;
  confidence: number;
  method: SubtitleLanguageMethod;
  entryCount: number;
}
