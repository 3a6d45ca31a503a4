import assert from 'node:assert/strict';
import test from 'node:test';
import { DEFAULT_FORCED_THRESHOLDS } from '../../src/config/detection';
import {
  classifyImageSubtitleForced,
  decideForcedFromStatistics,
  isImageSubtitleCodec,
  resolveForcedWithSpeech
} from '../../src/services/subtitles/forced';
import type { SubtitleStatistics } from '../../src/types/detection';

function stats(overrides: Partial<SubtitleStatistics>): SubtitleStatistics {
  return {
    count: 200,
    totalDurationSec: 0,
    coveragePercent: 0,
    density: 0,
    avgDurationSec: 0,
    gapVariance: 0,
    timings: [],
    ...overrides
  };
}

test('decideForcedFromStatistics marks sparse tracks as forced at tier 3', () => {
  const decision = decideForcedFromStatistics(
    stats({ density: 1, coveragePercent: 10 }),
    90,
    DEFAULT_FORCED_THRESHOLDS
  );

  assert.deepEqual(decision, {
    kind: 'decided',
    verdict: { forced: true, reason: 'Very low density (1.0 subs/min) and coverage (10.0%)', tier: 3 }
  });
});

test('decideForcedFromStatistics marks low subtitle counts as forced', () => {
  const decision = decideForcedFromStatistics(
    stats({ count: 40, density: 4, coveragePercent: 40 }),
    10,
    DEFAULT_FORCED_THRESHOLDS
  );

  assert.deepEqual(decision, {
    kind: 'decided',
    verdict: { forced: true, reason: 'Very low subtitle count (40 subtitles)', tier: 3 }
  });
});

test('decideForcedFromStatistics marks dense tracks as full at tier 3', () => {
  const decision = decideForcedFromStatistics(
    stats({ count: 1000, density: 12, coveragePercent: 60 }),
    90,
    DEFAULT_FORCED_THRESHOLDS
  );

  assert.deepEqual(decision, {
    kind: 'decided',
    verdict: { forced: false, reason: 'High density (12.0 subs/min) and coverage (60.0%)', tier: 3 }
  });
});

test('decideForcedFromStatistics applies the absolute density floor', () => {
  const decision = decideForcedFromStatistics(
    stats({ count: 200, density: 1.5, coveragePercent: 40 }),
    90,
    DEFAULT_FORCED_THRESHOLDS
  );

  assert.deepEqual(decision, {
    kind: 'decided',
    verdict: { forced: true, reason: 'Extremely low density (1.5 subs/min)', tier: 3 }
  });
});

test('decideForcedFromStatistics marks high counts on long runtimes as full', () => {
  const decision = decideForcedFromStatistics(
    stats({ count: 400, density: 7, coveragePercent: 20 }),
    60,
    DEFAULT_FORCED_THRESHOLDS
  );

  assert.deepEqual(decision, {
    kind: 'decided',
    verdict: { forced: false, reason: 'High subtitle count (400 subtitles for 60 min video)', tier: 3 }
  });
});

test('decideForcedFromStatistics ignores the count ceiling on runtimes of 30 minutes or less', () => {
  const decision = decideForcedFromStatistics(
    stats({ count: 400, density: 7, coveragePercent: 20 }),
    30,
    DEFAULT_FORCED_THRESHOLDS
  );

  assert.equal(decision.kind, 'ambiguous');
});

test('decideForcedFromStatistics applies the absolute density ceiling', () => {
  const decision = decideForcedFromStatistics(
    stats({ count: 200, density: 11, coveragePercent: 20 }),
    90,
    DEFAULT_FORCED_THRESHOLDS
  );

  assert.deepEqual(decision, {
    kind: 'decided',
    verdict: { forced: false, reason: 'Very high density (11.0 subs/min)', tier: 3 }
  });
});

test('decideForcedFromStatistics combines agreeing full signals at tier 2', () => {
  const decision = decideForcedFromStatistics(
    stats({ count: 280, density: 7, coveragePercent: 35, gapVariance: 20 }),
    90,
    DEFAULT_FORCED_THRESHOLDS
  );

  assert.deepEqual(decision, {
    kind: 'decided',
    verdict: {
      forced: false,
      reason: 'Multiple full indicators: density=7.0, count=280, gap variance=20.0',
      tier: 2
    }
  });
});

test('decideForcedFromStatistics combines agreeing secondary signals at tier 2', () => {
  const decision = decideForcedFromStatistics(
    stats({ count: 120, density: 4, coveragePercent: 28, gapVariance: 120 }),
    30,
    DEFAULT_FORCED_THRESHOLDS
  );

  assert.deepEqual(decision, {
    kind: 'decided',
    verdict: {
      forced: true,
      reason: 'Multiple forced indicators: density=4.0, coverage=28.0%, count=120, gap variance=120.0',
      tier: 2
    }
  });
});

test('decideForcedFromStatistics leaves mixed metrics ambiguous with a midpoint fallback', () => {
  const decision = decideForcedFromStatistics(
    stats({ count: 220, density: 5.5, coveragePercent: 35, gapVariance: 75 }),
    40,
    DEFAULT_FORCED_THRESHOLDS
  );

  const reason = 'Ambiguous metrics: density=5.5 subs/min, coverage=35.0%, count=220';
  assert.deepEqual(decision, {
    kind: 'ambiguous',
    reason,
    fallback: { forced: true, reason: `${reason} (midpoint heuristic)`, tier: 1 }
  });
});

test('resolveForcedWithSpeech treats a silent track as forced', () => {
  assert.deepEqual(resolveForcedWithSpeech(stats({}), [], 100), {
    forced: true,
    reason: 'No speech detected in audio',
    tier: 1
  });
});

test('resolveForcedWithSpeech treats subtitles covering the speech as full', () => {
  const verdict = resolveForcedWithSpeech(
    stats({ coveragePercent: 10, density: 1, timings: [[0, 10]] }),
    [[0, 10]],
    100
  );

  assert.deepEqual(verdict, {
    forced: false,
    reason: 'Most speech is subtitled (speech with subtitles 100.0%, coverage ratio 1.00)',
    tier: 1
  });
});

test('resolveForcedWithSpeech treats sparsely subtitled speech as forced', () => {
  const verdict = resolveForcedWithSpeech(
    stats({ coveragePercent: 2, density: 1, timings: [[0, 2]] }),
    [[0, 10]],
    100
  );

  assert.equal(verdict.forced, true);
  assert.equal(verdict.reason, 'Sparse subtitles against speech (speech with subtitles 20.0%, coverage ratio 0.20)');
});

test('classifyImageSubtitleForced uses frame density bands', () => {
  assert.deepEqual(classifyImageSubtitleForced(50, 3600), {
    forced: true,
    reason: 'Very low frame count (50)',
    tier: 3
  });
  assert.deepEqual(classifyImageSubtitleForced(2400, 3600), {
    forced: false,
    reason: 'High frame density (40.0/min)',
    tier: 3
  });
  assert.equal(classifyImageSubtitleForced(600, 3600).forced, true);
  assert.equal(classifyImageSubtitleForced(600, 3600).tier, 2);
  assert.equal(classifyImageSubtitleForced(1200, 3600).forced, false);
  assert.equal(classifyImageSubtitleForced(1200, 3600).tier, 2);
  assert.equal(classifyImageSubtitleForced(500, 0).forced, false);
});

test('isImageSubtitleCodec recognizes bitmap codecs', () => {
  assert.equal(isImageSubtitleCodec('hdmv_pgs_subtitle'), true);
  assert.equal(isImageSubtitleCodec('DVD_SUBTITLE'), true);
  assert.equal(isImageSubtitleCodec('subrip'), false);
  assert.equal(isImageSubtitleCodec('ass'), false);
});
