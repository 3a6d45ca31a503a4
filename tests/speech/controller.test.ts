import assert from 'node:assert/strict';
import test from 'node:test';
import { ToolError } from '../../src/services/media/errors';
import { aggregateVerdicts, detectAudioLanguage } from '../../src/services/speech/controller';
import { audioTrack, FakeExtractor, ScriptedRecognizer, speech } from '../helpers/fakes';

const FRENCH = 'Bonjour à tous, nous allons parler du voyage de demain matin.';
const GERMAN = 'Guten Morgen, wie geht es dir heute?';

const SETTINGS = {
  confidenceThreshold: 0.9,
  maxRetries: 3,
  vadFilter: false,
  vadMinSpeechDurationMs: 250,
  vadMaxSpeechDurationS: 30,
  operationTimeoutMs: 1000
};

test('detectAudioLanguage escalates to the full track when samples stay below threshold', async () => {
  const extractor = new FakeExtractor();
  const recognizer = new ScriptedRecognizer([
    speech('french', 0.4, FRENCH),
    speech('french', 0.5, FRENCH),
    speech('french', 0.6, FRENCH),
    speech('french', 0.95, FRENCH)
  ]);

  const outcome = await detectAudioLanguage({ extractor, recognizer }, '/media/film.mkv', audioTrack(0), 7200, SETTINGS);

  assert.deepEqual(outcome, {
    status: 'detected',
    verdict: { code: 'fr', confidence: 0.95, method: 'full-track' }
  });
  assert.equal(recognizer.calls.length, 4);
  assert.deepEqual(
    extractor.audioCalls.map((call) => (call.selection === 'full' ? 'full' : call.selection.startSec)),
    [1080, 576, 864, 'full']
  );
  assert.deepEqual(extractor.audioCalls[3]?.options, { timeoutMs: 1000 });
  assert.equal(extractor.released, 4);
});

test('detectAudioLanguage stops at the first confident sample', async () => {
  const extractor = new FakeExtractor();
  const recognizer = new ScriptedRecognizer([speech('french', 0.92, FRENCH), speech('german', 0.99, GERMAN)]);

  const outcome = await detectAudioLanguage({ extractor, recognizer }, '/media/film.mkv', audioTrack(0), 7200, SETTINGS);

  assert.deepEqual(outcome, {
    status: 'detected',
    verdict: { code: 'fr', confidence: 0.92, method: 'sampled-segment' }
  });
  assert.equal(recognizer.calls.length, 1);
});

test('detectAudioLanguage trusts silence from the full track', async () => {
  const extractor = new FakeExtractor();
  const recognizer = new ScriptedRecognizer([speech('english', 0.3, '')]);

  const outcome = await detectAudioLanguage({ extractor, recognizer }, '/media/film.mkv', audioTrack(0), 7200, SETTINGS);

  assert.deepEqual(outcome, {
    status: 'detected',
    verdict: { code: 'zxx', confidence: 0.3, method: 'full-track' }
  });
});

test('detectAudioLanguage falls back to the most frequent sampled language', async () => {
  const extractor = new FakeExtractor();
  const recognizer = new ScriptedRecognizer([
    speech('french', 0.5, FRENCH),
    speech('german', 0.6, GERMAN),
    speech('french', 0.7, FRENCH),
    speech('german', 0.5, GERMAN)
  ]);

  const outcome = await detectAudioLanguage({ extractor, recognizer }, '/media/film.mkv', audioTrack(0), 7200, SETTINGS);

  assert.deepEqual(outcome, {
    status: 'detected',
    verdict: { code: 'fr', confidence: 0.7, method: 'aggregated-majority' }
  });
});

test('detectAudioLanguage tries the next window when a sample cannot be extracted', async () => {
  const extractor = new FakeExtractor({
    audio: (selection) => (selection !== 'full' && selection.startSec === 1080 ? 'none' : 'sample')
  });
  const recognizer = new ScriptedRecognizer([speech('french', 0.93, FRENCH)]);

  const outcome = await detectAudioLanguage({ extractor, recognizer }, '/media/film.mkv', audioTrack(0), 7200, SETTINGS);

  assert.equal(outcome.status, 'detected');
  assert.deepEqual(
    extractor.audioCalls.map((call) => (call.selection === 'full' ? 'full' : call.selection.startSec)),
    [1080, 1800]
  );
});

test('detectAudioLanguage reports an extraction failure when no audio comes out', async () => {
  const extractor = new FakeExtractor({ audio: () => 'none' });
  const recognizer = new ScriptedRecognizer([speech('french', 0.99, FRENCH)]);

  const outcome = await detectAudioLanguage({ extractor, recognizer }, '/media/film.mkv', audioTrack(0), 7200, SETTINGS);

  assert.deepEqual(outcome, {
    status: 'failed',
    kind: 'extraction',
    message: 'no audio sample could be extracted'
  });
  assert.equal(recognizer.calls.length, 0);
});

test('detectAudioLanguage reports a timeout when the full track times out', async () => {
  const timeout = new ToolError({
    code: 'TOOL_TIMEOUT',
    tool: 'ffmpeg',
    message: 'ffmpeg did not finish within 1000 ms',
    operatorHint: 'test'
  });
  const extractor = new FakeExtractor({ audio: (selection) => (selection === 'full' ? timeout : 'none') });
  const recognizer = new ScriptedRecognizer([speech('french', 0.99, FRENCH)]);

  const outcome = await detectAudioLanguage({ extractor, recognizer }, '/media/film.mkv', audioTrack(0), 7200, SETTINGS);

  assert.equal(outcome.status, 'failed');
  assert.equal(outcome.status === 'failed' ? outcome.kind : undefined, 'timeout');
});

test('detectAudioLanguage reports an inference failure when recognition keeps failing', async () => {
  const extractor = new FakeExtractor();
  const recognizer = new ScriptedRecognizer([new Error('model crashed')]);

  const outcome = await detectAudioLanguage({ extractor, recognizer }, '/media/film.mkv', audioTrack(0), 7200, SETTINGS);

  assert.deepEqual(outcome, {
    status: 'failed',
    kind: 'inference',
    message: 'speech recognition produced no usable result'
  });
  // 3 retries x 5 windows, then the full track.
  assert.equal(recognizer.calls.length, 16);
});

test('aggregateVerdicts breaks ties by first appearance', () => {
  assert.deepEqual(
    aggregateVerdicts([
      { code: 'de', confidence: 0.4, variant: 'filtered' },
      { code: 'fr', confidence: 0.8, variant: 'filtered' },
      { code: 'zxx', confidence: 0.9, variant: 'unfiltered' }
    ]),
    { code: 'de', confidence: 0.4, method: 'aggregated-majority' }
  );
});

test('aggregateVerdicts returns zxx only when every verdict is zxx', () => {
  assert.deepEqual(
    aggregateVerdicts([
      { code: 'zxx', confidence: 0.2, variant: 'filtered' },
      { code: 'zxx', confidence: 0.6, variant: 'unfiltered' }
    ]),
    { code: 'zxx', confidence: 0.6, method: 'aggregated-majority' }
  );
  assert.equal(aggregateVerdicts([]), undefined);
});
