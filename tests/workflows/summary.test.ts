import assert from 'node:assert/strict';
import test from 'node:test';
import { formatSummary, summarizeReports } from '../../src/workflows/summary';
import type { FileReport } from '../../src/workflows/process-file';
import { audioTrack, subtitleTrack } from '../helpers/fakes';

function report(overrides: Partial<FileReport>): FileReport {
  return {
    filePath: '/media/film.mkv',
    skippedByTracking: false,
    audio: [],
    subtitles: [],
    skippedTracks: [],
    failures: [],
    audioSucceeded: true,
    subtitleSucceeded: true,
    ...overrides
  };
}

const REPORTS: FileReport[] = [
  report({
    filePath: '/media/a.mkv',
    audio: [
      { track: audioTrack(0), previousLanguage: 'und', verdict: { code: 'fr', confidence: 0.95, method: 'full-track' } },
      { track: audioTrack(1), previousLanguage: 'und', verdict: { code: 'en', confidence: 0.92, method: 'sampled-segment' } }
    ],
    subtitles: [
      {
        track: subtitleTrack(0),
        previousLanguage: 'und',
        language: { code: 'fr', confidence: 0.97, method: 'text-detector', entryCount: 30 },
        forced: { forced: true, reason: 'Very low subtitle count (30 subtitles)', tier: 3 },
        sdh: false,
        name: 'French [Forced]'
      },
      {
        track: subtitleTrack(1),
        previousLanguage: 'und',
        language: { code: 'en', confidence: 0.9, method: 'text-detector', entryCount: 900 },
        sdh: true,
        name: 'English [SDH]'
      }
    ]
  }),
  report({ filePath: '/media/b.mkv', skippedByTracking: true }),
  report({
    filePath: '/media/c.mkv',
    skippedTracks: [{ track: subtitleTrack(0), reason: 'detected de at 0.40, below 0.85' }],
    failures: [{ trackKind: 'audio', trackIndex: 0, kind: 'timeout', message: 'ffmpeg did not finish' }],
    audioSucceeded: false
  }),
  report({ filePath: '/media/d.mkv', error: 'could not read media info: truncated file' })
];

test('summarizeReports tallies updates, languages and failures', () => {
  const summary = summarizeReports(REPORTS);

  assert.equal(summary.files, 4);
  assert.equal(summary.filesSkipped, 1);
  assert.equal(summary.filesWithErrors, 2);
  assert.equal(summary.audioTracksUpdated, 2);
  assert.equal(summary.subtitleTracksUpdated, 2);
  assert.equal(summary.tracksSkipped, 1);
  assert.equal(summary.forcedTracks, 1);
  assert.equal(summary.sdhTracks, 1);
  assert.deepEqual(summary.languages, { fr: 2, en: 2 });
  assert.deepEqual(summary.failures, [
    { trackKind: 'audio', trackIndex: 0, kind: 'timeout', message: 'ffmpeg did not finish', filePath: '/media/c.mkv' }
  ]);
});

test('formatSummary prints one line per figure', () => {
  const text = formatSummary(summarizeReports(REPORTS), 125_400);

  assert.equal(
    text,
    [
      'Run summary',
      '  files: 4 (1 already processed, 2 with errors)',
      '  audio tracks updated: 2',
      '  subtitle tracks updated: 2 (1 forced, 1 SDH)',
      '  tracks skipped: 1',
      '  languages: en=2, fr=2',
      '  failures:',
      '    /media/d.mkv: could not read media info: truncated file',
      '    /media/c.mkv audio track 0 [timeout]: ffmpeg did not finish',
      '  elapsed: 2m 5s'
    ].join('\n')
  );
});

test('formatSummary leaves out empty sections', () => {
  assert.equal(
    formatSummary(summarizeReports([]), 4_200),
    [
      'Run summary',
      '  files: 0 (0 already processed, 0 with errors)',
      '  audio tracks updated: 0',
      '  subtitle tracks updated: 0 (0 forced, 0 SDH)',
      '  tracks skipped: 0',
      '  elapsed: 4s'
    ].join('\n')
  );
});
