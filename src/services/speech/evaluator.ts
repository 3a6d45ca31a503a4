import type { DetectionSettings } from '@/config/detection';
import { describeError, logDetail } from '@/lib/log';
import { classifyEvidence } from '@/services/speech/verdict';
import type { AttemptVariant, SampleVerdict, TranscriptionEvidence } from '@/types/detection';
import type { RecognitionResult, RecognizedSegment, SpeechRecognizer } from '@/types/media';

const FILTERED_TEMPERATURE = 0.0;
const UNFILTERED_TEMPERATURE = 0.2;

export type VadSettings = Pick<
  DetectionSettings,
  'vadFilter' | 'vadMinSpeechDurationMs' | 'vadMaxSpeechDurationS'
>;

export interface AttemptRequest {
  variant: AttemptVariant;
  temperature: number;
  vadRemovedAll?: boolean;
  vad?: VadSettings;
}

export interface EvaluatedSample extends SampleVerdict {
  evidence: TranscriptionEvidence;
}

export function segmentConfidence(segment: RecognizedSegment): number | undefined {
  if (segment.avgLogprob === undefined || !Number.isFinite(segment.avgLogprob)) {
    return undefined;
  }
  return Math.min(1, Math.max(0, segment.avgLogprob + 1));
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/** Model language probability, raised to the mean segment confidence when that is higher. */
export function blendConfidence(result: RecognitionResult): number {
  const scores = result.segments
    .map(segmentConfidence)
    .filter((score): score is number => score !== undefined);
  const base = Math.min(1, Math.max(0, result.languageProbability));
  if (scores.length === 0) {
    return base;
  }
  const mean = scores.reduce((sum, score) => sum + score, 0) / scores.length;
  return Math.max(base, mean);
}

export function toEvidence(
  result: RecognitionResult,
  request: Pick<AttemptRequest, 'variant' | 'vadRemovedAll'>,
  vadRequested: boolean
): TranscriptionEvidence {
  const text = result.segments
    .map((segment) => segment.text.trim())
    .filter(Boolean)
    .join(' ');

  return {
    language: result.language,
    confidence: blendConfidence(result),
    text,
    textLength: text.length,
    wordCount: countWords(text),
    segmentsDetected: result.segments.length,
    vadRemovedAll: request.vadRemovedAll ?? (vadRequested && result.segments.length === 0),
    variant: request.variant
  };
}

/**
 * One recognizer call. A thrown error means the attempt was inconclusive and
 * yields nothing; the caller moves on.
 */
export async function evaluateTranscription(
  recognizer: SpeechRecognizer,
  audioPath: string,
  request: AttemptRequest
): Promise<TranscriptionEvidence | undefined> {
  const vadFilter = request.vad !== undefined;
  try {
    const result = await recognizer.transcribe(audioPath, {
      vadFilter,
      temperature: request.temperature,
      vadMinSpeechDurationMs: request.vad?.vadMinSpeechDurationMs,
      vadMaxSpeechDurationS: request.vad?.vadMaxSpeechDurationS
    });
    return toEvidence(result, request, vadFilter);
  } catch (error) {
    console.warn(`[speech][attempt] ${request.variant} transcription failed: ${describeError(error)}`);
    return undefined;
  }
}

function describeEvidence(evidence: TranscriptionEvidence): string {
  return (
    `${evidence.variant}: language=${evidence.language || '?'} confidence=${evidence.confidence.toFixed(2)} ` +
    `segments=${evidence.segmentsDetected} words=${evidence.wordCount}`
  );
}

/**
 * Transcribes a sample with voice-activity filtering first (when enabled and
 * supported by the recognizer). When filtering leaves no segments, or the
 * filtered call fails, an unfiltered attempt runs instead.
 */
export async function detectSampleLanguage(
  recognizer: SpeechRecognizer,
  audioPath: string,
  settings: VadSettings
): Promise<EvaluatedSample | undefined> {
  let vadRemovedAll = false;

  if (settings.vadFilter && recognizer.supportsVad) {
    const filtered = await evaluateTranscription(recognizer, audioPath, {
      variant: 'filtered',
      temperature: FILTERED_TEMPERATURE,
      vad: settings
    });
    if (filtered) {
      logDetail('speech', describeEvidence(filtered));
      if (filtered.segmentsDetected > 0) {
        return { ...classifyEvidence(filtered), evidence: filtered };
      }
      vadRemovedAll = true;
    }
  }

  const unfiltered = await evaluateTranscription(recognizer, audioPath, {
    variant: 'unfiltered',
    temperature: UNFILTERED_TEMPERATURE,
    vadRemovedAll
  });
  if (!unfiltered) {
    return undefined;
  }
  logDetail('speech', describeEvidence(unfiltered));
  return { ...classifyEvidence(unfiltered), evidence: unfiltered };
}
