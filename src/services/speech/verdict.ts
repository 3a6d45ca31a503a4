import { languageNameToCode, NO_LINGUISTIC_CONTENT } from '@/services/language/codes';
import { isLikelyHallucination } from '@/services/language/hallucination';
import type { SampleVerdict, TranscriptionEvidence } from '@/types/detection';

export function hasSpeech(evidence: TranscriptionEvidence): boolean {
  const { confidence, textLength, wordCount } = evidence;
  return (
    (confidence > 0.6 && textLength > 0) ||
    (confidence > 0.3 && textLength > 15 && wordCount > 2) ||
    (confidence > 0.2 && textLength > 50 && wordCount > 8) ||
    (textLength > 100 && wordCount > 15)
  );
}

/** Applied to unfiltered text after voice-activity filtering found nothing. */
export function hasSpeechAfterEmptyVad(evidence: TranscriptionEvidence): boolean {
  const { confidence, textLength, wordCount } = evidence;
  return (
    (confidence > 0.7 && textLength > 30 && wordCount > 5) ||
    (confidence > 0.5 && textLength > 100 && wordCount > 20)
  );
}

function silence(evidence: TranscriptionEvidence): SampleVerdict {
  return { code: NO_LINGUISTIC_CONTENT, confidence: evidence.confidence, variant: evidence.variant };
}

/**
 * Turns one transcription into a language code, or `zxx` when the evidence
 * points at no real speech. Very confident, long transcripts skip the
 * hallucination heuristics.
 */
export function classifyEvidence(evidence: TranscriptionEvidence): SampleVerdict {
  const accepted: SampleVerdict = {
    code: languageNameToCode(evidence.language),
    confidence: evidence.confidence,
    variant: evidence.variant
  };

  if (evidence.confidence > 0.95 && evidence.textLength > 50) {
    return accepted;
  }

  if (isLikelyHallucination(evidence.text)) {
    return silence(evidence);
  }

  if (evidence.variant === 'unfiltered' && evidence.vadRemovedAll) {
    return hasSpeechAfterEmptyVad(evidence) ? accepted : silence(evidence);
  }

  return hasSpeech(evidence) ? accepted : silence(evidence);
}
