import { normalizeLanguageCode, UNDETERMINED } from '@/services/language/codes';
import type { SubtitleLanguageResult } from '@/types/detection';

interface ScriptCounts {
  latin: number;
  cyrillic: number;
  arabic: number;
  cjk: number;
}

function countScripts(text: string): ScriptCounts {
  const counts: ScriptCounts = { latin: 0, cyrillic: 0, arabic: 0, cjk: 0 };
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0;
    if (code < 0x0250) {
      counts.latin += 1;
    } else if (code >= 0x0400 && code <= 0x04ff) {
      counts.cyrillic += 1;
    } else if (code >= 0x0600 && code <= 0x06ff) {
      counts.arabic += 1;
    } else if (code >= 0x4e00 && code <= 0x9fff) {
      counts.cjk += 1;
    }
  }
  return counts;
}

function result(code: string, confidence: number, entryCount: number): SubtitleLanguageResult {
  return {
    code: normalizeLanguageCode(code),
    confidence,
    method: 'script-heuristic',
    entryCount
  };
}

/**
 * Guesses a language from character-script ratios alone. Latin text is reported
 * as English with capped confidence.
 */
export function detectLanguageByScript(text: string, entryCount: number): SubtitleLanguageResult {
  if (text.trim().length < 10) {
    return result(UNDETERMINED, 0, entryCount);
  }

  const letters = text.replace(/\s/g, '');
  const total = Array.from(letters).length;

  const counts = countScripts(letters);
  const cyrillic = counts.cyrillic / total;
  const arabic = counts.arabic / total;
  const cjk = counts.cjk / total;
  const latin = counts.latin / total;

  if (cyrillic > 0.3) {
    return result('rus', Math.min(0.9, 0.5 + cyrillic * 0.5), entryCount);
  }
  if (arabic > 0.3) {
    return result('ara', Math.min(0.9, 0.5 + arabic * 0.5), entryCount);
  }
  if (cjk > 0.3) {
    return result('chi', Math.min(0.85, 0.45 + cjk * 0.5), entryCount);
  }
  if (latin > 0.7) {
    const ratioBonus = (latin - 0.7) * 0.3;
    const lengthBonus = Math.min(0.2, text.length / 5000);
    return result('eng', Math.min(0.65, 0.3 + ratioBonus + lengthBonus), entryCount);
  }

  return result(UNDETERMINED, 0.1, entryCount);
}
