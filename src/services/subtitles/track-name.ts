import { getLanguageDisplayName } from '@/services/language/codes';

/** Display name such as "French [Forced] [SDH]". */
export function formatSubtitleTrackName(code: string, flags: { forced: boolean; sdh: boolean }): string {
  const parts = [getLanguageDisplayName(code)];
  if (flags.forced) {
    parts.push('[Forced]');
  }
  if (flags.sdh) {
    parts.push('[SDH]');
  }
  return parts.join(' ');
}
