import { deflateSync } from 'node:zlib';

// Scripts the recognizer over-produces on silent or noise-only input.
const SUSPECT_SCRIPT_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1780, 0x17ff], // Khmer
  [0x0e00, 0x0e7f], // Thai
  [0x1000, 0x109f], // Myanmar
  [0x0980, 0x09ff], // Bengali
  [0x10a0, 0x10ff] // Georgian
];

const STOCK_PHRASES = [
  'okay up here we go',
  "i'm going to go get some water",
  "let's go",
  'here we go',
  "okay let's go",
  "alright let's go",
  "come on let's go",
  'okay here we go',
  'let me get some water',
  "i'm going to get some water",
  'i need to get some water',
  'hold on let me',
  'wait let me',
  'okay wait',
  'hold on',
  'one second',
  'just a second',
  'give me a second',
  'let me just'
];

const GENERIC_SHORT_PATTERNS = [
  /\b(okay|ok|alright|lets|here we go|come on)\b.*\b(go|water|get|just|wait)\b/u,
  /\bim (going to|gonna) (go|get)/u,
  /\b(hold on|wait|give me|let me) (a |just |)?(second|minute|moment)\b/u
];

const REPEATED_CHAR = /(.)\1{4,}/u;
const REPEATED_BLOCK = /(.{1,3})\1{3,}/u;
const PUNCTUATION = /[^\p{L}\p{N}_\s]/gu;

const COMPRESSION_RATIO_FLOOR = 0.3;

function distinctChars(text: string): number {
  return new Set(Array.from(text)).size;
}

function suspectScriptRatio(text: string): number {
  const chars = Array.from(text);
  if (chars.length === 0) {
    return 0;
  }

  let suspect = 0;
  for (const char of chars) {
    const code = char.codePointAt(0) ?? 0;
    if (SUSPECT_SCRIPT_RANGES.some(([low, high]) => code >= low && code <= high)) {
      suspect += 1;
    }
  }
  return suspect / chars.length;
}

export function compressionRatio(text: string): number {
  const bytes = Buffer.from(text, 'utf8');
  if (bytes.length === 0) {
    return 1;
  }
  return deflateSync(bytes).length / bytes.length;
}

export function stripPunctuation(text: string): string {
  return text.replace(PUNCTUATION, '');
}

// Compared against punctuation-stripped text, so stripped the same way.
const STOCK_PHRASE_KEYS = STOCK_PHRASES.map(stripPunctuation);

/**
 * Flags transcript text that looks like recognizer output on silence rather than
 * speech. Deterministic; prefers rejecting a short genuine utterance over
 * accepting an artifact.
 */
export function isLikelyHallucination(input: string): boolean {
  const text = input.trim();
  if (text.length < 3) {
    return true;
  }

  const length = Array.from(text).length;

  if (distinctChars(text.replace(/ /g, '')) <= 3 && length > 10) {
    return true;
  }

  if (distinctChars(text.replace(/[ \n]/g, '')) <= 2 && length > 20) {
    return true;
  }

  if (REPEATED_CHAR.test(text) || REPEATED_BLOCK.test(text)) {
    return true;
  }

  if (suspectScriptRatio(text) > 0.7) {
    return true;
  }

  const words = text.split(/\s+/).filter(Boolean);
  if (words.length > 3 && new Set(words).size / words.length < 0.2) {
    return true;
  }

  if (length > 20 && words.length > 5 && new Set(words).size <= 2) {
    return true;
  }

  if (compressionRatio(text) < COMPRESSION_RATIO_FLOOR) {
    return true;
  }

  const lowered = text.toLowerCase();
  const clean = stripPunctuation(lowered);

  if (STOCK_PHRASE_KEYS.some((phrase) => clean.includes(phrase))) {
    return true;
  }

  if (lowered.length < 50 && GENERIC_SHORT_PATTERNS.some((pattern) => pattern.test(clean))) {
    return true;
  }

  return false;
}
