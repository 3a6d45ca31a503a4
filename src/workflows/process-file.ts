import path from 'node:path';
import type { DetectionSettings, RunOptions } from '@/config/detection';
import { describeError, logDetail } from '@/lib/log';
import { isUndetermined } from '@/services/language/codes';
import { detectSubtitleLanguage, detectTextLanguage } from '@/services/language/subtitle-language';
import { isToolTimeout } from '@/services/media/errors';
import { detectAudioLanguage } from '@/services/speech/controller';
import {
  classifyImageSubtitleForced,
  decideForcedFromStatistics,
  resolveForcedWithSpeech
} from '@/services/subtitles/forced';
import { detectSpeechTimings } from '@/services/subtitles/forced-audio';
import { detectSdh } from '@/services/subtitles/sdh';
import { parseSrt } from '@/services/subtitles/srt';
import { computeSubtitleStatistics } from '@/services/subtitles/statistics';
import { formatSubtitleTrackName } from '@/services/subtitles/track-name';
import type { ProcessingTracker } from '@/services/tracking/tracker';
import type {
  FailureKind,
  ForcedVerdict,
  LanguageVerdict,
  SubtitleLanguageResult,
  TrackFailure
} from '@/types/detection';
import type {
  MediaExtractor,
  MediaInfo,
  MediaProbe,
  MetadataWriter,
  OcrEngine,
  SpeechRecognizer,
  SubtitleEntry,
  TextLanguageDetector,
  Track
} from '@/types/media';

const MAX_OCR_FRAMES = 50;

export interface ProcessingDeps {
  probe: MediaProbe;
  extractor: MediaExtractor;
  recognizer: SpeechRecognizer;
  writer: MetadataWriter;
  tracker?: ProcessingTracker;
  textDetector?: TextLanguageDetector;
  ocr?: OcrEngine;
}

export interface AudioTrackOutcome {
  track: Track;
  previousLanguage: string;
  verdict: LanguageVerdict;
}

export interface SubtitleTrackOutcome {
  track: Track;
  previousLanguage: string;
  language: SubtitleLanguageResult;
  forced?: ForcedVerdict;
  sdh: boolean;
  name: string;
}

export interface SkippedTrack {
  track: Track;
  reason: string;
}

export interface FileReport {
  filePath: string;
  skippedByTracking: boolean;
  error?: string;
  audio: AudioTrackOutcome[];
  subtitles: SubtitleTrackOutcome[];
  skippedTracks: SkippedTrack[];
  failures: TrackFailure[];
  audioSucceeded: boolean;
  subtitleSucceeded: boolean;
}

class TrackFailureSignal extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string) {
    super(message);
    this.name = 'TrackFailureSignal';
    this.kind = kind;
  }
}

function toFailure(track: Track, error: unknown, fallback: FailureKind): TrackFailure {
  let kind = fallback;
  if (error instanceof TrackFailureSignal) {
    kind = error.kind;
  } else if (isToolTimeout(error)) {
    kind = 'timeout';
  }
  return { trackKind: track.kind, trackIndex: track.index, kind, message: describeError(error) };
}

function recordFailure(report: FileReport, failure: TrackFailure): void {
  report.failures.push(failure);
  console.error(
    `[process-file][${failure.trackKind} track ${failure.trackIndex}] ${failure.kind} failure in ` +
      `${path.basename(report.filePath)}: ${failure.message}`
  );
}

function selectTracks(info: MediaInfo, kind: Track['kind'], includeTagged: boolean): Track[] {
  return info.tracks.filter(
    (track) => track.kind === kind && (includeTagged || isUndetermined(track.language))
  );
}

async function processAudioTrack(
  deps: ProcessingDeps,
  filePath: string,
  track: Track,
  info: MediaInfo,
  settings: DetectionSettings,
  report: FileReport
): Promise<void> {
  const outcome = await detectAudioLanguage(deps, filePath, track, info.durationSec, settings);
  if (outcome.status === 'failed') {
    throw new TrackFailureSignal(outcome.kind, outcome.message);
  }

  const { verdict } = outcome;
  if (isUndetermined(verdict.code)) {
    throw new TrackFailureSignal('low-confidence', 'recognizer could not name the spoken language');
  }

  try {
    await deps.writer.setAudioLanguage(filePath, track, verdict.code);
  } catch (error) {
    throw new TrackFailureSignal('write', describeError(error));
  }

  report.audio.push({ track, previousLanguage: track.language ?? 'und', verdict });
  console.info(
    `[process-file][audio track ${track.index}] ${verdict.code} (${verdict.confidence.toFixed(2)}, ${verdict.method})`
  );
}

async function readSubtitleTrack(
  deps: ProcessingDeps,
  filePath: string,
  track: Track
): Promise<{ language: SubtitleLanguageResult; entries?: SubtitleEntry[] }> {
  const payload = await deps.extractor.extractSubtitle(filePath, track);
  if (!payload) {
    throw new TrackFailureSignal('extraction', 'subtitle track could not be extracted');
  }

  if (payload.format === 'text') {
    const { entries, timestampErrors } = parseSrt(payload.srt);
    if (timestampErrors.length > 0) {
      logDetail('process-file', `subtitle track ${track.index}: ${timestampErrors.length} unreadable blocks skipped`);
    }
    return { language: await detectSubtitleLanguage(entries, deps.textDetector), entries };
  }

  if (!deps.ocr) {
    throw new TrackFailureSignal('extraction', 'image subtitles need an OCR engine');
  }

  const images = await deps.extractor.extractSubtitleImages(filePath, track, MAX_OCR_FRAMES);
  if (!images) {
    throw new TrackFailureSignal('extraction', 'no subtitle images could be rendered');
  }

  let text: string;
  try {
    text = await deps.ocr.recognize(images.paths);
  } catch (error) {
    throw new TrackFailureSignal('inference', `OCR failed: ${describeError(error)}`);
  } finally {
    await images.release();
  }

  return { language: await detectTextLanguage(text, images.paths.length, deps.textDetector, 'ocr') };
}

async function classifyForced(
  deps: ProcessingDeps,
  filePath: string,
  track: Track,
  info: MediaInfo,
  entries: SubtitleEntry[] | undefined,
  settings: DetectionSettings
): Promise<ForcedVerdict | undefined> {
  if (!(info.durationSec > 0)) {
    logDetail('forced', `unknown runtime, skipping forced analysis of subtitle track ${track.index}`);
    return undefined;
  }

  if (!entries) {
    try {
      const frames = await deps.probe.countSubtitlePackets(filePath, track);
      return classifyImageSubtitleForced(frames, info.durationSec);
    } catch (error) {
      console.warn(`[forced][image] could not count frames of subtitle track ${track.index}: ${describeError(error)}`);
      return undefined;
    }
  }

  const statistics = computeSubtitleStatistics(entries, info.durationSec);
  logDetail(
    'forced',
    `track ${track.index}: count=${statistics.count} density=${statistics.density.toFixed(1)}/min ` +
      `coverage=${statistics.coveragePercent.toFixed(1)}% gap variance=${statistics.gapVariance.toFixed(1)}`
  );

  const decision = decideForcedFromStatistics(statistics, info.durationSec / 60, settings.forced);
  if (decision.kind === 'decided') {
    return decision.verdict;
  }

  const audioTrack = info.tracks.find((candidate) => candidate.kind === 'audio');
  if (!settings.analyzeForcedAudio || !audioTrack) {
    return decision.fallback;
  }

  const timings = await detectSpeechTimings(deps, filePath, audioTrack, settings);
  return timings ? resolveForcedWithSpeech(statistics, timings, info.durationSec) : decision.fallback;
}

async function processSubtitleTrack(
  deps: ProcessingDeps,
  filePath: string,
  track: Track,
  info: MediaInfo,
  settings: DetectionSettings,
  report: FileReport
): Promise<void> {
  const { language, entries } = await readSubtitleTrack(deps, filePath, track);

  if (isUndetermined(language.code) || language.confidence < settings.subtitleConfidenceThreshold) {
    const reason =
      `detected ${language.code} at ${language.confidence.toFixed(2)}, ` +
      `below ${settings.subtitleConfidenceThreshold}`;
    report.skippedTracks.push({ track, reason });
    console.warn(`[process-file][subtitle track ${track.index}] skipped: ${reason}`);
    return;
  }

  const forced = settings.detectForcedSubtitles
    ? await classifyForced(deps, filePath, track, info, entries, settings)
    : undefined;
  const sdh = settings.detectSdhSubtitles && entries !== undefined && detectSdh(entries);
  const name = formatSubtitleTrackName(language.code, { forced: forced?.forced ?? false, sdh });

  try {
    await deps.writer.setSubtitleMetadata(filePath, track, {
      language: language.code,
      name,
      forced: forced?.forced ?? false
    });
  } catch (error) {
    throw new TrackFailureSignal('write', describeError(error));
  }

  report.subtitles.push({ track, previousLanguage: track.language ?? 'und', language, forced, sdh, name });
  console.info(
    `[process-file][subtitle track ${track.index}] ${language.code} "${name}" (${language.confidence.toFixed(2)}, ${language.method})` +
      (forced ? ` forced=${forced.forced} tier ${forced.tier}: ${forced.reason}` : '')
  );
}

/**
 * Classifies the undetermined tracks of one file (every track of a type when
 * reprocessing it) and writes the results back. Track failures are collected
 * in the report; nothing thrown by a collaborator escapes.
 */
export async function processFile(
  deps: ProcessingDeps,
  filePath: string,
  settings: DetectionSettings,
  options: RunOptions
): Promise<FileReport> {
  const report: FileReport = {
    filePath,
    skippedByTracking: false,
    audio: [],
    subtitles: [],
    skippedTracks: [],
    failures: [],
    audioSucceeded: false,
    subtitleSucceeded: false
  };
  const tracker = options.useTracking ? deps.tracker : undefined;

  let skipAudio = false;
  let skipSubtitles = false;
  if (tracker && !options.forceReprocess) {
    try {
      const entry = await tracker.getValidEntry(filePath);
      skipAudio = (entry?.audioProcessed ?? false) && !options.reprocessAll;
      skipSubtitles = (entry?.subtitleProcessed ?? false) && !options.reprocessAllSubtitles;
    } catch (error) {
      console.warn(`[process-file] tracking lookup failed for ${filePath}: ${describeError(error)}`);
    }

    if (skipAudio && (skipSubtitles || !settings.processSubtitles)) {
      report.skippedByTracking = true;
      console.info(`Skipping ${path.basename(filePath)} (already processed)`);
      return report;
    }
  }

  console.info(`Processing: ${path.basename(filePath)}`);

  let info: MediaInfo;
  try {
    info = await deps.probe.probe(filePath);
  } catch (error) {
    report.error = `could not read media info: ${describeError(error)}`;
    console.error(`[process-file] ${path.basename(filePath)}: ${report.error}`);
    return report;
  }

  if (skipAudio) {
    report.audioSucceeded = true;
  } else {
    for (const track of selectTracks(info, 'audio', options.reprocessAll)) {
      try {
        await processAudioTrack(deps, filePath, track, info, settings, report);
      } catch (error) {
        recordFailure(report, toFailure(track, error, 'inference'));
      }
    }
    report.audioSucceeded = !report.failures.some((failure) => failure.trackKind === 'audio');
  }

  if (skipSubtitles) {
    report.subtitleSucceeded = true;
  } else if (settings.processSubtitles) {
    for (const track of selectTracks(info, 'subtitle', options.reprocessAllSubtitles)) {
      try {
        await processSubtitleTrack(deps, filePath, track, info, settings, report);
      } catch (error) {
        recordFailure(report, toFailure(track, error, 'extraction'));
      }
    }
    report.subtitleSucceeded = !report.failures.some((failure) => failure.trackKind === 'subtitle');
  }

  if (tracker && !options.dryRun) {
    try {
      await tracker.markProcessed(filePath, {
        audio: report.audioSucceeded,
        subtitle: report.subtitleSucceeded
      });
    } catch (error) {
      console.warn(`[process-file] could not record ${filePath} as processed: ${describeError(error)}`);
    }
  }

  return report;
}
