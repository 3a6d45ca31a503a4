import assert from 'node:assert/strict';
import test from 'node:test';
import { countSdhPhrases, detectSdh, hasSoundDescription } from '../../src/services/subtitles/sdh';
import { formatSubtitleTrackName } from '../../src/services/subtitles/track-name';
import type { SubtitleEntry } from '../../src/types/media';

function entries(texts: string[]): SubtitleEntry[] {
  return texts.map((text, index) => ({ index, start: index * 4, end: index * 4 + 2, text }));
}

function dialogue(count: number): string[] {
  return Array.from({ length: count }, (_, index) => `We should leave before noon, line ${index}.`);
}

test('hasSoundDescription finds sound cues in brackets, parentheses and music notes', () => {
  assert.equal(hasSoundDescription('[Door Closes]'), true);
  assert.equal(hasSoundDescription('(laughs) That was close.'), true);
  assert.equal(hasSoundDescription('♪ upbeat music ♪'), true);
  assert.equal(hasSoundDescription('[JOHN] Over here.'), false);
  assert.equal(hasSoundDescription('No cues at all.'), false);
});

test('countSdhPhrases counts distinct phrases', () => {
  assert.equal(countSdhPhrases('The narrator pauses. Muffled voices. She sighs.'), 3);
});

test('detectSdh flags tracks where more than a tenth of entries describe sounds', () => {
  const texts = dialogue(100);
  for (let i = 0; i < 11; i += 1) {
    texts[i * 9] = '[door closes]';
  }
  assert.equal(detectSdh(entries(texts)), true);
});

test('detectSdh needs the ratio to exceed a tenth', () => {
  const texts = dialogue(100);
  for (let i = 0; i < 10; i += 1) {
    texts[i * 9] = '[door closes]';
  }
  assert.equal(detectSdh(entries(texts)), false);
});

test('detectSdh falls back to typical phrases in the whole text', () => {
  const texts = dialogue(100);
  texts[5] = 'The narrator pauses.';
  texts[40] = 'Muffled voices behind the wall.';
  texts[80] = 'She sighs and leaves.';
  assert.equal(detectSdh(entries(texts)), true);
});

test('detectSdh is false for plain dialogue and empty tracks', () => {
  assert.equal(detectSdh(entries(dialogue(50))), false);
  assert.equal(detectSdh([]), false);
});

test('formatSubtitleTrackName appends forced and SDH markers', () => {
  assert.equal(formatSubtitleTrackName('fr', { forced: true, sdh: true }), 'French [Forced] [SDH]');
  assert.equal(formatSubtitleTrackName('de', { forced: false, sdh: false }), 'German');
});
