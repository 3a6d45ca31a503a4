import { francAll } from 'franc';
import { normalizeLanguageCode, UNDETERMINED } from '@/services/language/codes';
import type { LanguageCandidate, TextLanguageDetector } from '@/types/media';

/** Ranked `[iso639-3, score]` pairs, best first. */
export type TrigramIdentifier = (text: string, only: string[]) => Array<[string, number]>;

export interface FrancDetectorOptions {
  /** Minimum characters per chunk; a shorter tail joins the chunk before it. */
  chunkChars?: number;
  /** Floor for the vote denominator, so a single chunk never reads as certain. */
  minChunks?: number;
  /** ISO 639-3 codes to choose between; empty means every language franc knows. */
  only?: string[];
  identify?: TrigramIdentifier;
}

const DEFAULT_CHUNK_CHARS = 200;
const DEFAULT_MIN_CHUNKS = 3;

const identifyWithFranc: TrigramIdentifier = (text, only) =>
  francAll(text, only.length > 0 ? { only } : {});

export function splitIntoChunks(text: string, chunkChars: number): string[] {
  const chunks: string[] = [];
  let current: string[] = [];
  let length = 0;

  for (const word of text.split(/\s+/)) {
    if (!word) {
      continue;
    }
    current.push(word);
    length += word.length + 1;
    if (length >= chunkChars) {
      chunks.push(current.join(' '));
      current = [];
      length = 0;
    }
  }

  if (current.length > 0) {
    const tail = current.join(' ');
    const last = chunks.pop();
    chunks.push(last === undefined ? tail : `${last} ${tail}`);
  }
  return chunks;
}

/**
 * Trigram detector that votes across chunks of the sample. A language's
 * probability is its share of the chunk votes.
 */
export class FrancTextDetector implements TextLanguageDetector {
  private readonly chunkChars: number;
  private readonly minChunks: number;
  private readonly only: string[];
  private readonly identify: TrigramIdentifier;

  constructor(options: FrancDetectorOptions = {}) {
    this.chunkChars = options.chunkChars ?? DEFAULT_CHUNK_CHARS;
    this.minChunks = options.minChunks ?? DEFAULT_MIN_CHUNKS;
    this.only = options.only ?? [];
    this.identify = options.identify ?? identifyWithFranc;
  }

  async detect(text: string): Promise<LanguageCandidate[]> {
    const votes = new Map<string, number>();
    let counted = 0;

    for (const chunk of splitIntoChunks(text, this.chunkChars)) {
      const [best] = this.identify(chunk, this.only);
      if (!best) {
        continue;
      }
      const code = normalizeLanguageCode(best[0]);
      if (code === UNDETERMINED) {
        continue;
      }
      votes.set(code, (votes.get(code) ?? 0) + 1);
      counted += 1;
    }

    const denominator = Math.max(counted, this.minChunks);
    return [...votes.entries()]
      .map(([language, count]) => ({ language, probability: count / denominator }))
      .sort((a, b) => b.probability - a.probability);
  }
}
