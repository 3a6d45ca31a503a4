import type { ForcedThresholds } from '@/config/detection';
import type { ForcedVerdict, SubtitleStatistics } from '@/types/detection';

const ABSOLUTE_DENSITY_FLOOR = 2.0;
const ABSOLUTE_DENSITY_CEILING = 10.0;
const FULL_COVERAGE_FLOOR = 30.0;
const LONG_RUNTIME_MINUTES = 30;

const IMAGE_SUBTITLE_CODECS = new Set([
  'hdmv_pgs_subtitle',
  'pgssub',
  'dvd_subtitle',
  'dvdsub',
  'dvb_subtitle',
  'dvbsub',
  'xsub'
]);

export type ForcedDecision =
  | { kind: 'decided'; verdict: ForcedVerdict }
  | { kind: 'ambiguous'; reason: string; fallback: ForcedVerdict };

function decided(forced: boolean, reason: string, tier: ForcedVerdict['tier']): ForcedDecision {
  return { kind: 'decided', verdict: { forced, reason, tier } };
}

/** Best guess for an ambiguous track when no audio evidence is available. */
export function midpointHeuristic(statistics: SubtitleStatistics): boolean {
  return statistics.density < 5.5 || statistics.coveragePercent < 37.5;
}

/**
 * Classifies a text subtitle track from its timing metrics. Clear-cut cases
 * are decided at tier 3, agreeing secondary signals at tier 2; everything else
 * comes back ambiguous with the midpoint guess as its fallback.
 */
export function decideForcedFromStatistics(
  statistics: SubtitleStatistics,
  durationMinutes: number,
  thresholds: ForcedThresholds
): ForcedDecision {
  const { density, coveragePercent: coverage, count, gapVariance } = statistics;
  const d = density.toFixed(1);
  const c = coverage.toFixed(1);

  if (density < thresholds.lowDensity && coverage < thresholds.lowCoveragePercent) {
    return decided(true, `Very low density (${d} subs/min) and coverage (${c}%)`, 3);
  }
  if (count < thresholds.minCount) {
    return decided(true, `Very low subtitle count (${count} subtitles)`, 3);
  }
  if (density < ABSOLUTE_DENSITY_FLOOR) {
    return decided(true, `Extremely low density (${d} subs/min)`, 3);
  }
  if (density > thresholds.highDensity && coverage > FULL_COVERAGE_FLOOR) {
    return decided(false, `High density (${d} subs/min) and coverage (${c}%)`, 3);
  }
  if (count > thresholds.maxCount && durationMinutes > LONG_RUNTIME_MINUTES) {
    return decided(
      false,
      `High subtitle count (${count} subtitles for ${durationMinutes.toFixed(0)} min video)`,
      3
    );
  }
  if (density > ABSOLUTE_DENSITY_CEILING) {
    return decided(false, `Very high density (${d} subs/min)`, 3);
  }

  const forcedFactors: string[] = [];
  const fullFactors: string[] = [];
  let forcedScore = 0;
  let fullScore = 0;

  if (density < 5.0) {
    forcedScore += 1;
    forcedFactors.push(`density=${d}`);
  }
  if (density > 6.0) {
    fullScore += 1;
    fullFactors.push(`density=${d}`);
  }
  if (coverage < 30.0) {
    forcedScore += 1;
    forcedFactors.push(`coverage=${c}%`);
  }
  if (coverage > 40.0) {
    fullScore += 1;
    fullFactors.push(`coverage=${c}%`);
  }
  if (count < 150) {
    forcedScore += 1;
    forcedFactors.push(`count=${count}`);
  }
  if (count > 250) {
    fullScore += 1;
    fullFactors.push(`count=${count}`);
  }
  // Clustered subtitles point at forced, evenly spread ones at full.
  if (gapVariance > 100.0) {
    forcedScore += 1;
    forcedFactors.push(`gap variance=${gapVariance.toFixed(1)}`);
  }
  if (gapVariance < 50.0) {
    fullScore += 1;
    fullFactors.push(`gap variance=${gapVariance.toFixed(1)}`);
  }

  if (forcedScore >= 2 && fullScore === 0) {
    return decided(true, `Multiple forced indicators: ${forcedFactors.join(', ')}`, 2);
  }
  if (fullScore >= 2 && forcedScore === 0) {
    return decided(false, `Multiple full indicators: ${fullFactors.join(', ')}`, 2);
  }

  const reason = `Ambiguous metrics: density=${d} subs/min, coverage=${c}%, count=${count}`;
  return {
    kind: 'ambiguous',
    reason,
    fallback: { forced: midpointHeuristic(statistics), reason: `${reason} (midpoint heuristic)`, tier: 1 }
  };
}

function overlapSeconds(
  subtitles: Array<[number, number]>,
  speech: Array<[number, number]>
): number {
  let total = 0;
  for (const [subStart, subEnd] of subtitles) {
    for (const [speechStart, speechEnd] of speech) {
      const start = Math.max(subStart, speechStart);
      const end = Math.min(subEnd, speechEnd);
      if (start < end) {
        total += end - start;
      }
    }
  }
  return total;
}

/**
 * Settles an ambiguous track by comparing subtitle display time with detected
 * speech. No speech at all means the subtitles cannot be a transcript.
 */
export function resolveForcedWithSpeech(
  statistics: SubtitleStatistics,
  speechTimings: Array<[number, number]>,
  durationSec: number
): ForcedVerdict {
  if (speechTimings.length === 0) {
    return { forced: true, reason: 'No speech detected in audio', tier: 1 };
  }

  const speechSeconds = speechTimings.reduce((sum, [start, end]) => sum + (end - start), 0);
  const speechCoverage = durationSec > 0 ? (speechSeconds / durationSec) * 100 : 0;
  const subtitledSpeech =
    speechSeconds > 0 ? (overlapSeconds(statistics.timings, speechTimings) / speechSeconds) * 100 : 0;
  const coverageRatio = speechCoverage > 0 ? statistics.coveragePercent / speechCoverage : 0;
  const metrics =
    `speech with subtitles ${subtitledSpeech.toFixed(1)}%, ` +
    `coverage ratio ${coverageRatio.toFixed(2)}`;

  if (subtitledSpeech > 80) {
    return { forced: false, reason: `Most speech is subtitled (${metrics})`, tier: 1 };
  }

  const forced =
    subtitledSpeech < 50 ||
    coverageRatio < 0.4 ||
    (statistics.coveragePercent < 25 && statistics.density < 5);

  return {
    forced,
    reason: forced ? `Sparse subtitles against speech (${metrics})` : `Subtitles follow speech (${metrics})`,
    tier: 1
  };
}

export function isImageSubtitleCodec(codec: string): boolean {
  const normalized = codec.trim().toLowerCase();
  return (
    IMAGE_SUBTITLE_CODECS.has(normalized) ||
    normalized.includes('pgs') ||
    normalized.includes('hdmv') ||
    normalized.includes('dvd') ||
    normalized.includes('dvb')
  );
}

/** Frame-count proxy for image subtitles, whose per-entry timing is unknown. */
export function classifyImageSubtitleForced(frameCount: number, durationSec: number): ForcedVerdict {
  if (!(durationSec > 0)) {
    return { forced: false, reason: 'Unknown runtime, frame density unavailable', tier: 1 };
  }

  const perMinute = frameCount / (durationSec / 60);
  const rate = perMinute.toFixed(1);

  if (frameCount < 100) {
    return { forced: true, reason: `Very low frame count (${frameCount})`, tier: 3 };
  }
  if (perMinute < 5) {
    return { forced: true, reason: `Very low frame density (${rate}/min)`, tier: 3 };
  }
  if (perMinute > 30) {
    return { forced: false, reason: `High frame density (${rate}/min)`, tier: 3 };
  }
  if (perMinute < 15) {
    return { forced: true, reason: `Low-to-moderate frame density (${rate}/min)`, tier: 2 };
  }
  return { forced: false, reason: `Moderate frame density (${rate}/min)`, tier: 2 };
}
