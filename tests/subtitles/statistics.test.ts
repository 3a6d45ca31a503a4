import assert from 'node:assert/strict';
import test from 'node:test';
import { computeSubtitleStatistics } from '../../src/services/subtitles/statistics';
import type { SubtitleEntry } from '../../src/types/media';

function cue(index: number, start: number, end: number): SubtitleEntry {
  return { index, start, end, text: `line ${index}` };
}

test('computeSubtitleStatistics measures coverage, density and gap spread', () => {
  const stats = computeSubtitleStatistics(
    [cue(0, 0, 2), cue(1, 10, 12), cue(2, 30, 33), cue(3, 40, 40)],
    120
  );

  assert.equal(stats.count, 4);
  assert.equal(stats.totalDurationSec, 7);
  assert.equal(stats.coveragePercent, (7 / 120) * 100);
  assert.equal(stats.density, 2);
  assert.equal(stats.avgDurationSec, 7 / 3);
  // Gaps of 8 s and 18 s around a mean of 13 s.
  assert.equal(stats.gapVariance, 25);
  assert.deepEqual(stats.timings, [
    [0, 2],
    [10, 12],
    [30, 33]
  ]);
});

test('computeSubtitleStatistics ignores overlapping cues when measuring gaps', () => {
  const stats = computeSubtitleStatistics([cue(0, 0, 5), cue(1, 4, 6), cue(2, 8, 9)], 60);

  // Only the 2 s gap between the last two cues is non-negative, so there is no spread.
  assert.equal(stats.gapVariance, 0);
});

test('computeSubtitleStatistics returns zeros without entries or runtime', () => {
  const empty = computeSubtitleStatistics([], 120);
  assert.equal(empty.count, 0);
  assert.equal(empty.density, 0);

  const noRuntime = computeSubtitleStatistics([cue(0, 0, 2)], 0);
  assert.equal(noRuntime.count, 0);
  assert.deepEqual(noRuntime.timings, []);
});
