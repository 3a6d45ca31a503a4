import type { DetectionSettings } from '@/config/detection';
import { describeError, logDetail } from '@/lib/log';
import type { AudioSample, MediaExtractor, SpeechRecognizer, Track } from '@/types/media';

export type SpeechTimingSettings = Pick<
  DetectionSettings,
  'vadMinSpeechDurationMs' | 'vadMaxSpeechDurationS' | 'operationTimeoutMs'
>;

/**
 * Speech segment timings of a whole audio track, from a voice-activity
 * filtered transcription. Undefined when the audio could not be analysed.
 */
export async function detectSpeechTimings(
  deps: { extractor: MediaExtractor; recognizer: SpeechRecognizer },
  filePath: string,
  track: Track,
  settings: SpeechTimingSettings
): Promise<Array<[number, number]> | undefined> {
  let sample: AudioSample | undefined;
  try {
    sample = await deps.extractor.extractAudio(filePath, track, 'full', {
      timeoutMs: settings.operationTimeoutMs
    });
  } catch (error) {
    console.warn(`[forced][audio] full-track extraction failed: ${describeError(error)}`);
    return undefined;
  }
  if (!sample) {
    logDetail('forced', 'no audio available for speech timing analysis');
    return undefined;
  }

  try {
    const result = await deps.recognizer.transcribe(sample.path, {
      vadFilter: true,
      temperature: 0,
      vadMinSpeechDurationMs: settings.vadMinSpeechDurationMs,
      vadMaxSpeechDurationS: settings.vadMaxSpeechDurationS,
      wordTimestamps: true
    });
    return result.segments.map((segment): [number, number] => [segment.start, segment.end]);
  } catch (error) {
    console.warn(`[forced][audio] speech detection failed: ${describeError(error)}`);
    return undefined;
  } finally {
    await sample.release();
  }
}
