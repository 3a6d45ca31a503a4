import assert from 'node:assert/strict';
import test from 'node:test';
import { classifyEvidence, hasSpeech, hasSpeechAfterEmptyVad } from '../../src/services/speech/verdict';
import type { TranscriptionEvidence } from '../../src/types/detection';

function evidence(overrides: Partial<TranscriptionEvidence>): TranscriptionEvidence {
  const text = overrides.text ?? 'Bonjour à tous, nous allons parler du voyage de demain matin.';
  return {
    language: 'french',
    confidence: 0.8,
    text,
    textLength: text.length,
    wordCount: text.split(/\s+/).filter(Boolean).length,
    segmentsDetected: 1,
    vadRemovedAll: false,
    variant: 'filtered',
    ...overrides
  };
}

test('classifyEvidence accepts very confident long transcripts without further checks', () => {
  const text = 'okay okay okay okay okay okay okay okay okay okay okay okay';
  const result = classifyEvidence(evidence({ confidence: 0.97, text, textLength: text.length, wordCount: 12 }));
  assert.deepEqual(result, { code: 'fr', confidence: 0.97, variant: 'filtered' });
});

test('classifyEvidence returns zxx for hallucinated text', () => {
  const result = classifyEvidence(evidence({ text: "Okay, let's go!", textLength: 15, wordCount: 3 }));
  assert.equal(result.code, 'zxx');
  assert.equal(result.confidence, 0.8);
});

test('classifyEvidence applies the stricter test after voice filtering removed all audio', () => {
  const base = { variant: 'unfiltered' as const, vadRemovedAll: true };
  assert.equal(classifyEvidence(evidence({ ...base, confidence: 0.65 })).code, 'zxx');
  assert.equal(classifyEvidence(evidence({ ...base, confidence: 0.75 })).code, 'fr');
});

test('classifyEvidence applies the standard speech test otherwise', () => {
  assert.equal(classifyEvidence(evidence({ confidence: 0.1 })).code, 'zxx');
  assert.equal(classifyEvidence(evidence({ confidence: 0.25 })).code, 'fr');
});

test('classifyEvidence maps Dutch through its legacy code', () => {
  assert.equal(classifyEvidence(evidence({ language: 'dutch' })).code, 'nl');
  assert.equal(classifyEvidence(evidence({ language: 'nl' })).code, 'nl');
});

test('hasSpeech thresholds', () => {
  assert.equal(hasSpeech(evidence({ confidence: 0.61, text: 'Oui.', textLength: 4, wordCount: 1 })), true);
  assert.equal(hasSpeech(evidence({ confidence: 0.35, textLength: 16, wordCount: 3 })), true);
  assert.equal(hasSpeech(evidence({ confidence: 0.35, textLength: 15, wordCount: 3 })), false);
  assert.equal(hasSpeech(evidence({ confidence: 0, textLength: 101, wordCount: 16 })), true);
});

test('hasSpeechAfterEmptyVad thresholds', () => {
  assert.equal(hasSpeechAfterEmptyVad(evidence({ confidence: 0.71, textLength: 31, wordCount: 6 })), true);
  assert.equal(hasSpeechAfterEmptyVad(evidence({ confidence: 0.71, textLength: 31, wordCount: 5 })), false);
  assert.equal(hasSpeechAfterEmptyVad(evidence({ confidence: 0.55, textLength: 101, wordCount: 21 })), true);
});
