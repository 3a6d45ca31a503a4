import { describeError, logDetail } from '@/lib/log';
import { normalizeLanguageCode, UNDETERMINED } from '@/services/language/codes';
import { detectLanguageByScript } from '@/services/language/script-detector';
import type { SubtitleLanguageMethod, SubtitleLanguageResult } from '@/types/detection';
import type { SubtitleEntry, TextLanguageDetector } from '@/types/media';

const MIN_SAMPLE_CHARS = 50;
const DEFAULT_SAMPLE_CHARS = 5000;
const SAMPLE_RADIUS = 5;

export function stripSubtitleMarkup(text: string): string {
  return text.replace(/<[^>]+>/g, '').replace(/\{[^}]+\}/g, '');
}

/** Text from around the start, middle and end of the track, markup removed. */
export function sampleSubtitleText(entries: SubtitleEntry[], maxChars = DEFAULT_SAMPLE_CHARS): string {
  const anchors: number[] = [];
  if (entries.length > 0) {
    anchors.push(0);
  }
  if (entries.length > 10) {
    anchors.push(Math.floor(entries.length / 2));
  }
  if (entries.length > 20) {
    anchors.push(entries.length - 1);
  }

  const parts: string[] = [];
  let total = 0;

  for (const anchor of anchors) {
    const window = entries.slice(Math.max(0, anchor - SAMPLE_RADIUS), anchor + SAMPLE_RADIUS);
    for (const entry of window) {
      const text = stripSubtitleMarkup(entry.text);
      parts.push(text);
      total += text.length;
      if (total >= maxChars) {
        break;
      }
    }
    if (total >= maxChars) {
      break;
    }
  }

  return parts.join(' ');
}

/**
 * Runs the text detector and falls back to script ratios when it is absent,
 * returns nothing, or throws.
 */
export async function detectTextLanguage(
  text: string,
  entryCount: number,
  detector: TextLanguageDetector | undefined,
  method: SubtitleLanguageMethod = 'text-detector'
): Promise<SubtitleLanguageResult> {
  if (text.trim().length < MIN_SAMPLE_CHARS) {
    logDetail('subtitle-language', 'insufficient subtitle text for language detection');
    return { code: UNDETERMINED, confidence: 0, method, entryCount };
  }

  if (!detector) {
    return detectLanguageByScript(text, entryCount);
  }

  try {
    const candidates = await detector.detect(text);
    const [primary, ...others] = [...candidates].sort((a, b) => b.probability - a.probability);
    if (!primary) {
      logDetail('subtitle-language', 'text detector returned no candidates, using script ratios');
      return detectLanguageByScript(text, entryCount);
    }

    if (others.length > 0) {
      logDetail(
        'subtitle-language',
        `other candidates: ${others
          .slice(0, 2)
          .map((candidate) => `${candidate.language}=${candidate.probability.toFixed(2)}`)
          .join(', ')}`
      );
    }

    return {
      code: normalizeLanguageCode(primary.language),
      confidence: primary.probability,
      method,
      entryCount
    };
  } catch (error) {
    console.warn(
      `[subtitle-language] text detector failed, using script ratios: ${describeError(error)}`
    );
    return detectLanguageByScript(text, entryCount);
  }
}

export async function detectSubtitleLanguage(
  entries: SubtitleEntry[],
  detector: TextLanguageDetector | undefined
): Promise<SubtitleLanguageResult> {
  return detectTextLanguage(sampleSubtitleText(entries), entries.length, detector);
}
