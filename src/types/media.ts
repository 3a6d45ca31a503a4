export type TrackKind = 'audio' | 'subtitle';

export interface Track {
  kind: TrackKind;
  /** 0-based position among tracks of the same kind. */
  index: number;
  streamIndex: number;
  codec: string;
  language?: string;
  title?: string;
}

export interface MediaInfo {
  durationSec: number;
  tracks: Track[];
}

export interface TimeWindow {
  startSec: number;
  durationSec: number;
}

export type AudioSelection = TimeWindow | 'full';

export interface AudioSample {
  path: string;
  release(): Promise<void>;
}

export type SubtitlePayload =
  | { format: 'text'; srt: string }
  | { format: 'image' };

export interface SubtitleImages {
  paths: string[];
  release(): Promise<void>;
}

export interface SubtitleEntry {
  index: number;
  start: number;
  end: number;
  text: string;
}

export interface RecognizedSegment {
  start: number;
  end: number;
  text: string;
  avgLogprob?: number;
}

export interface RecognitionOptions {
  vadFilter: boolean;
  temperature: number;
  vadMinSpeechDurationMs?: number;
  vadMaxSpeechDurationS?: number;
  wordTimestamps?: boolean;
}

export interface RecognitionResult {
  language: string;
  languageProbability: number;
  segments: RecognizedSegment[];
}

export interface LanguageCandidate {
  language: string;
  probability: number;
}

export interface MediaProbe {
  probe(filePath: string): Promise<MediaInfo>;
  countSubtitlePackets(filePath: string, track: Track): Promise<number>;
}

export interface ExtractOptions {
  timeoutMs?: number;
}

export interface MediaExtractor {
  extractAudio(
    filePath: string,
    track: Track,
    selection: AudioSelection,
    options?: ExtractOptions
  ): Promise<AudioSample | undefined>;
  extractSubtitle(filePath: string, track: Track): Promise<SubtitlePayload | undefined>;
  extractSubtitleImages(
    filePath: string,
    track: Track,
    maxFrames: number
  ): Promise<SubtitleImages | undefined>;
}

export interface SpeechRecognizer {
  /** Resolved once when the recognizer is created. */
  readonly supportsVad: boolean;
  transcribe(audioPath: string, options: RecognitionOptions): Promise<RecognitionResult>;
}

export interface TextLanguageDetector {
  detect(text: string): Promise<LanguageCandidate[]>;
}

export interface OcrEngine {
  recognize(imagePaths: string[]): Promise<string>;
}

export interface SubtitleMetadataUpdate {
  language: string;
  name: string;
  forced: boolean;
}

export interface MetadataWriter {
  setAudioLanguage(filePath: string, track: Track, language: string): Promise<void>;
  setSubtitleMetadata(
    filePath: string,
    track: Track,
    update: SubtitleMetadataUpdate
  ): Promise<void>;
}
