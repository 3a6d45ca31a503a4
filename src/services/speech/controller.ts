import type { DetectionSettings } from '@/config/detection';
import { describeError, logDetail } from '@/lib/log';
import { runStrategies } from '@/lib/strategies';
import { NO_LINGUISTIC_CONTENT } from '@/services/language/codes';
import { isToolTimeout } from '@/services/media/errors';
import { detectSampleLanguage, type EvaluatedSample } from '@/services/speech/evaluator';
import { planSampleWindows } from '@/services/speech/sampling';
import type { FailureKind, LanguageVerdict, SampleVerdict } from '@/types/detection';
import type { AudioSelection, MediaExtractor, SpeechRecognizer, Track } from '@/types/media';

export interface AudioLanguageDeps {
  extractor: MediaExtractor;
  recognizer: SpeechRecognizer;
}

export type AudioLanguageSettings = Pick<
  DetectionSettings,
  | 'confidenceThreshold'
  | 'maxRetries'
  | 'vadFilter'
  | 'vadMinSpeechDurationMs'
  | 'vadMaxSpeechDurationS'
  | 'operationTimeoutMs'
>;

export type AudioLanguageOutcome =
  | { status: 'detected'; verdict: LanguageVerdict }
  | { status: 'failed'; kind: FailureKind; message: string };

interface SampleRun {
  verdict?: EvaluatedSample;
  extracted: boolean;
  timedOut: boolean;
}

function selectionLabel(selection: AudioSelection): string {
  return selection === 'full'
    ? 'full track'
    : `${selection.startSec.toFixed(0)}s+${selection.durationSec}s`;
}

async function runSample(
  deps: AudioLanguageDeps,
  filePath: string,
  track: Track,
  selection: AudioSelection,
  settings: AudioLanguageSettings
): Promise<SampleRun> {
  const sample = await deps.extractor.extractAudio(
    filePath,
    track,
    selection,
    selection === 'full' ? { timeoutMs: settings.operationTimeoutMs } : undefined
  );
  if (!sample) {
    return { extracted: false, timedOut: false };
  }

  try {
    const verdict = await detectSampleLanguage(deps.recognizer, sample.path, settings);
    return { verdict, extracted: true, timedOut: false };
  } finally {
    await sample.release();
  }
}

/**
 * Most frequent real language across the retries (first seen wins a tie), or
 * `zxx` when every retry heard silence.
 */
export function aggregateVerdicts(verdicts: SampleVerdict[]): LanguageVerdict | undefined {
  if (verdicts.length === 0) {
    return undefined;
  }

  const tallies = new Map<string, { count: number; confidence: number }>();
  for (const verdict of verdicts) {
    if (verdict.code === NO_LINGUISTIC_CONTENT) {
      continue;
    }
    const tally = tallies.get(verdict.code);
    if (tally) {
      tally.count += 1;
      tally.confidence = Math.max(tally.confidence, verdict.confidence);
    } else {
      tallies.set(verdict.code, { count: 1, confidence: verdict.confidence });
    }
  }

  let winner: LanguageVerdict | undefined;
  let winnerCount = 0;
  for (const [code, tally] of tallies) {
    if (tally.count > winnerCount) {
      winner = { code, confidence: tally.confidence, method: 'aggregated-majority' };
      winnerCount = tally.count;
    }
  }
  if (winner) {
    return winner;
  }

  return {
    code: NO_LINGUISTIC_CONTENT,
    confidence: Math.max(...verdicts.map((verdict) => verdict.confidence)),
    method: 'aggregated-majority'
  };
}

/**
 * Bounded search for an audio track's language. Each retry samples different
 * windows and stops early once a real language clears the threshold; after
 * that the whole track is analysed once, and finally the retries vote.
 */
export async function detectAudioLanguage(
  deps: AudioLanguageDeps,
  filePath: string,
  track: Track,
  durationSec: number,
  settings: AudioLanguageSettings
): Promise<AudioLanguageOutcome> {
  const scope = `[audio-language][track ${track.index}]`;
  const verdicts: SampleVerdict[] = [];
  let best: SampleVerdict | undefined;
  let extractedAny = false;

  for (let retry = 0; retry < settings.maxRetries; retry += 1) {
    const windows = planSampleWindows(durationSec, retry);
    const outcome = await runStrategies(
      windows.map((window) => ({
        name: selectionLabel(window),
        run: async () => {
          const run = await runSample(deps, filePath, track, window, settings);
          extractedAny = extractedAny || run.extracted;
          return run.verdict;
        }
      })),
      {
        onFailure: (name, error) => {
          if (error !== undefined) {
            console.warn(`${scope}[retry ${retry + 1}] sample ${name} failed: ${describeError(error)}`);
          } else {
            logDetail('audio-language', `track ${track.index} sample ${name} gave no usable result`);
          }
        }
      }
    );

    if (!outcome) {
      logDetail('audio-language', `track ${track.index} retry ${retry + 1} produced no verdict`);
      continue;
    }

    const verdict = outcome.value;
    verdicts.push(verdict);
    logDetail(
      'audio-language',
      `track ${track.index} retry ${retry + 1}: ${verdict.code} (${verdict.confidence.toFixed(2)}, ${verdict.variant})`
    );

    if (!best || verdict.confidence > best.confidence) {
      best = verdict;
    }

    if (verdict.code !== NO_LINGUISTIC_CONTENT && verdict.confidence >= settings.confidenceThreshold) {
      return {
        status: 'detected',
        verdict: { code: verdict.code, confidence: verdict.confidence, method: 'sampled-segment' }
      };
    }
  }

  if (best) {
    logDetail(
      'audio-language',
      `track ${track.index} best sampled verdict ${best.code} (${best.confidence.toFixed(2)}) is below ${settings.confidenceThreshold}, analysing full track`
    );
  }

  let fullTimedOut = false;
  try {
    const full = await runSample(deps, filePath, track, 'full', settings);
    extractedAny = extractedAny || full.extracted;
    if (full.verdict) {
      const { code, confidence } = full.verdict;
      // Silence heard on the whole track is trusted at any confidence.
      if (code === NO_LINGUISTIC_CONTENT || confidence >= settings.confidenceThreshold) {
        return { status: 'detected', verdict: { code, confidence, method: 'full-track' } };
      }
      logDetail(
        'audio-language',
        `track ${track.index} full-track verdict ${code} (${confidence.toFixed(2)}) is below threshold`
      );
    }
  } catch (error) {
    fullTimedOut = isToolTimeout(error);
    console.warn(`${scope}[full-track] analysis failed: ${describeError(error)}`);
  }

  const majority = aggregateVerdicts(verdicts);
  if (majority) {
    return { status: 'detected', verdict: majority };
  }

  if (fullTimedOut) {
    return { status: 'failed', kind: 'timeout', message: 'full-track analysis timed out and no sample produced a verdict' };
  }
  if (!extractedAny) {
    return { status: 'failed', kind: 'extraction', message: 'no audio sample could be extracted' };
  }
  return { status: 'failed', kind: 'inference', message: 'speech recognition produced no usable result' };
}
