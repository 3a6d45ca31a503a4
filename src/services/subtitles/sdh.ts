import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { logDetail } from '@/lib/log';
import type { SubtitleEntry } from '@/types/media';

const vocabularySchema = z.object({
  soundKeywords: z.array(z.string().min(1)).min(1),
  phrases: z.array(z.string().min(1)).min(1)
});

function loadVocabulary(): z.infer<typeof vocabularySchema> {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../data/sdh-vocabulary.json', import.meta.url), 'utf8')
  );
  return vocabularySchema.parse(raw);
}

const VOCABULARY = loadVocabulary();

const SOUND_SPAN_PATTERNS = [
  /\[[A-Za-z\s]{3,}\]/gi,
  /\([A-Za-z\s]{3,}\)/gi,
  /♪[^♪]+♪/gu,
  /\*[A-Za-z\s]{3,}\*/gi
];

const PHRASE_PATTERNS = VOCABULARY.phrases.map((phrase) => new RegExp(`\\b${phrase}\\b`));

const ENTRY_RATIO_THRESHOLD = 0.1;
const PHRASE_MATCH_THRESHOLD = 3;

/** Whether the text has a bracketed, parenthesised, starred or sung span naming a sound. */
export function hasSoundDescription(text: string): boolean {
  for (const pattern of SOUND_SPAN_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const content = match[0].replace(/[\[\]()*♪]/gu, '').trim().toLowerCase();
      if (VOCABULARY.soundKeywords.some((keyword) => content.includes(keyword))) {
        return true;
      }
    }
  }
  return false;
}

export function countSdhPhrases(text: string): number {
  const lowered = text.toLowerCase();
  return PHRASE_PATTERNS.filter((pattern) => pattern.test(lowered)).length;
}

/**
 * A track is SDH when more than a tenth of its entries describe sounds, or
 * when the whole text carries several typical SDH phrases.
 */
export function detectSdh(entries: SubtitleEntry[]): boolean {
  if (entries.length === 0) {
    return false;
  }

  const described = entries.filter((entry) => hasSoundDescription(entry.text)).length;
  const ratio = described / entries.length;
  logDetail(
    'sdh',
    `sound descriptions in ${described}/${entries.length} entries (${(ratio * 100).toFixed(1)}%)`
  );
  if (ratio > ENTRY_RATIO_THRESHOLD) {
    return true;
  }

  const phraseCount = countSdhPhrases(entries.map((entry) => entry.text).join(' '));
  if (phraseCount >= PHRASE_MATCH_THRESHOLD) {
    logDetail('sdh', `found ${phraseCount} SDH phrase patterns`);
    return true;
  }
  return false;
}
