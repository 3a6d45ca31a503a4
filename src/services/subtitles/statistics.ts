import type { SubtitleStatistics } from '@/types/detection';
import type { SubtitleEntry } from '@/types/media';

const EMPTY_STATISTICS: SubtitleStatistics = {
  count: 0,
  totalDurationSec: 0,
  coveragePercent: 0,
  density: 0,
  avgDurationSec: 0,
  gapVariance: 0,
  timings: []
};

/**
 * Timing metrics of one subtitle track against the container runtime. Entries
 * with no positive display time still count towards `count` and `density`.
 */
export function computeSubtitleStatistics(
  entries: SubtitleEntry[],
  durationSec: number
): SubtitleStatistics {
  if (entries.length === 0 || !(durationSec > 0)) {
    return { ...EMPTY_STATISTICS, timings: [] };
  }

  const timings: Array<[number, number]> = [];
  let totalDurationSec = 0;

  for (const entry of entries) {
    const length = entry.end - entry.start;
    if (length > 0) {
      totalDurationSec += length;
      timings.push([entry.start, entry.end]);
    }
  }

  const gaps: number[] = [];
  for (let i = 0; i < timings.length - 1; i += 1) {
    const gap = (timings[i + 1]?.[0] ?? 0) - (timings[i]?.[1] ?? 0);
    if (gap >= 0) {
      gaps.push(gap);
    }
  }

  let gapVariance = 0;
  if (gaps.length > 1) {
    const meanGap = gaps.reduce((sum, gap) => sum + gap, 0) / gaps.length;
    gapVariance = gaps.reduce((sum, gap) => sum + (gap - meanGap) ** 2, 0) / gaps.length;
  }

  return {
    count: entries.length,
    totalDurationSec,
    coveragePercent: (totalDurationSec / durationSec) * 100,
    density: entries.length / (durationSec / 60),
    avgDurationSec: timings.length > 0 ? totalDurationSec / timings.length : 0,
    gapVariance,
    timings
  };
}
