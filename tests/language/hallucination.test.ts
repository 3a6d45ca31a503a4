import assert from 'node:assert/strict';
import test from 'node:test';
import {
  compressionRatio,
  isLikelyHallucination,
  stripPunctuation
} from '../../src/services/language/hallucination';

const GENUINE = 'Bonjour à tous, nous allons parler du voyage de demain matin.';

test('isLikelyHallucination flags empty and very short text', () => {
  assert.equal(isLikelyHallucination(''), true);
  assert.equal(isLikelyHallucination('  ok  '), true);
});

test('isLikelyHallucination flags low character variety', () => {
  assert.equal(isLikelyHallucination('abababababab'), true);
});

test('isLikelyHallucination flags character runs', () => {
  assert.equal(isLikelyHallucination('Noooooo way'), true);
});

test('isLikelyHallucination flags short blocks repeated four times', () => {
  assert.equal(isLikelyHallucination('Well hahahaha that was funny'), true);
  assert.equal(isLikelyHallucination('Well haha that was funny'), false);
  assert.equal(isLikelyHallucination('la la la la la la la'), true);
});

test('isLikelyHallucination flags two characters spread over lines', () => {
  assert.equal(isLikelyHallucination('ab\nab\nab\nab\nab\nab\nab\nab'), true);
});

test('isLikelyHallucination flags scripts produced on silence', () => {
  assert.equal(isLikelyHallucination('สวัสดีครับ'), true);
});

test('isLikelyHallucination flags text made of one or two words', () => {
  assert.equal(isLikelyHallucination('the the the the the the the the the dog'), true);
});

test('isLikelyHallucination flags text where under a fifth of the words are unique', () => {
  assert.equal(isLikelyHallucination(Array(6).fill('yes no maybe').join(' ')), true);
});

test('isLikelyHallucination flags highly compressible text', () => {
  const sentence =
    'the quick brown fox jumps over lazy dogs while seven wizards quietly judge boxing matches nearby';
  const text = Array(5).fill(sentence).join(' ');
  assert.equal(compressionRatio(text) < 0.3, true);
  assert.equal(isLikelyHallucination(text), true);
  assert.equal(isLikelyHallucination(sentence), false);
});

test('isLikelyHallucination flags generic filler under 50 characters', () => {
  assert.equal(isLikelyHallucination('Alright, we should just go.'), true);
  assert.equal(isLikelyHallucination("I'm gonna get the car keys"), true);
  assert.equal(isLikelyHallucination('Give me a minute, please.'), true);
});

test('isLikelyHallucination leaves generic phrasing alone at 50 characters or more', () => {
  assert.equal(
    isLikelyHallucination("I'm gonna get the car keys from the kitchen before we leave"),
    false
  );
});

test('isLikelyHallucination flags stock phrases regardless of punctuation', () => {
  assert.equal(isLikelyHallucination("Okay, let's go!"), true);
  assert.equal(isLikelyHallucination('Hold on a second.'), true);
});

test('isLikelyHallucination accepts ordinary speech', () => {
  assert.equal(isLikelyHallucination(GENUINE), false);
  assert.equal(isLikelyHallucination(GENUINE), isLikelyHallucination(GENUINE));
});

test('compressionRatio is low for redundant text', () => {
  assert.equal(compressionRatio(''), 1);
  assert.equal(compressionRatio('a'.repeat(1000)) < 0.3, true);
});

test('stripPunctuation keeps letters digits and spaces', () => {
  assert.equal(stripPunctuation("let's go, 2 times!"), 'lets go 2 times');
});
