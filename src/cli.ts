import 'dotenv/config';
import os from 'node:os';
import { parseArgs } from 'node:util';
import { loadDetectionSettings, loadRunOptions } from '@/config/detection';
import { env, getRuntimeWarnings } from '@/config/env';
import { describeError, setVerbose } from '@/lib/log';
import { FrancTextDetector } from '@/services/language/text-detector';
import { isToolError } from '@/services/media/errors';
import { FfmpegExtractor } from '@/services/media/ffmpeg';
import { FfprobeMediaProbe } from '@/services/media/ffprobe';
import { HttpSpeechRecognizer } from '@/services/media/http-recognizer';
import { DryRunMetadataWriter, MkvpropeditWriter } from '@/services/media/mkvpropedit';
import { assertToolsAvailable, runTool } from '@/services/media/run-tool';
import { TesseractOcrEngine } from '@/services/media/tesseract';
import { ProcessingTracker } from '@/services/tracking/tracker';
import type { OcrEngine } from '@/types/media';
import { processLibrary } from '@/workflows/process-library';
import { formatSummary, summarizeReports } from '@/workflows/summary';

const USAGE = `Usage: tracklang [options]

  --dir <path>                 media directory (repeatable, defaults to MEDIA_PATHS)
  --dry-run                    report changes without writing them
  --verbose                    print per-attempt details
  --no-vad                     disable voice-activity filtering
  --reprocess-all              reprocess every audio track, tagged or not
  --reprocess-all-subtitles    reprocess every subtitle track, tagged or not
  --force-reprocess            ignore the processed-files table
  --no-tracking                neither read nor update the processed-files table
  --clear-tracking             empty the processed-files table and exit
  --process-subtitles          classify subtitle tracks (default)
  --no-subtitles               leave subtitle tracks alone
  --analyze-forced             use speech timings for ambiguous forced subtitles
  --no-sdh-detection           do not look for SDH subtitles
  --help                       show this help`;

function lowerPriority(): void {
  try {
    os.setPriority(os.constants.priority.PRIORITY_LOW);
  } catch (error) {
    console.warn(`[cli] could not lower process priority: ${describeError(error)}`);
  }
}

async function createOcrEngine(): Promise<OcrEngine | undefined> {
  try {
    await runTool(env.tesseractPath, ['--version'], { timeoutMs: 10_000 });
    return new TesseractOcrEngine(env.tesseractPath, env.tesseractLanguages);
  } catch (error) {
    console.warn(`[cli] tesseract unavailable, image subtitles will fail: ${describeError(error)}`);
    return undefined;
  }
}

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      dir: { type: 'string', multiple: true },
      'dry-run': { type: 'boolean' },
      verbose: { type: 'boolean' },
      'no-vad': { type: 'boolean' },
      'reprocess-all': { type: 'boolean' },
      'reprocess-all-subtitles': { type: 'boolean' },
      'force-reprocess': { type: 'boolean' },
      'no-tracking': { type: 'boolean' },
      'clear-tracking': { type: 'boolean' },
      'process-subtitles': { type: 'boolean' },
      'no-subtitles': { type: 'boolean' },
      'analyze-forced': { type: 'boolean' },
      'no-sdh-detection': { type: 'boolean' },
      help: { type: 'boolean' }
    }
  });

  if (values.help) {
    console.info(USAGE);
    return 0;
  }
  if (values.verbose) {
    setVerbose(true);
  }

  const settings = loadDetectionSettings();
  if (values['no-vad']) {
    settings.vadFilter = false;
  }
  if (values['process-subtitles']) {
    settings.processSubtitles = true;
  }
  if (values['no-subtitles']) {
    settings.processSubtitles = false;
  }
  if (values['analyze-forced']) {
    settings.analyzeForcedAudio = true;
  }
  if (values['no-sdh-detection']) {
    settings.detectSdhSubtitles = false;
  }

  const options = loadRunOptions();
  if (values['dry-run']) {
    options.dryRun = true;
  }
  if (values['no-tracking']) {
    options.useTracking = false;
  }
  if (values['force-reprocess']) {
    options.forceReprocess = true;
  }
  if (values['reprocess-all']) {
    options.reprocessAll = true;
  }
  if (values['reprocess-all-subtitles']) {
    options.reprocessAllSubtitles = true;
  }

  const tracker = new ProcessingTracker(env.trackingDbPath);
  if (values['clear-tracking']) {
    const stats = await tracker.getStats();
    await tracker.clearAll();
    console.info(`Cleared tracking for ${stats.totalTracked} file(s).`);
    return 0;
  }

  for (const warning of getRuntimeWarnings()) {
    console.warn(`[config] ${warning}`);
  }

  const roots = values.dir && values.dir.length > 0 ? values.dir : env.mediaPaths;
  if (roots.length === 0) {
    console.error('No media directory given. Pass --dir or set MEDIA_PATHS.');
    return 1;
  }

  lowerPriority();

  await assertToolsAvailable([
    { command: env.ffmpegPath, versionArgs: ['-version'] },
    { command: env.ffprobePath, versionArgs: ['-version'] },
    ...(options.dryRun ? [] : [{ command: env.mkvpropeditPath, versionArgs: ['--version'] }])
  ]);

  const recognizer = await HttpSpeechRecognizer.connect({
    endpoint: env.asrEndpoint,
    timeoutMs: env.asrTimeoutMs
  });
  if (settings.vadFilter && !recognizer.supportsVad) {
    console.warn('[cli] recognizer lacks voice-activity filtering, transcribing unfiltered');
  }

  const startedAt = Date.now();
  const reports = await processLibrary(
    {
      probe: new FfprobeMediaProbe(env.ffprobePath),
      extractor: new FfmpegExtractor(env.ffmpegPath),
      recognizer,
      writer: options.dryRun ? new DryRunMetadataWriter() : new MkvpropeditWriter(env.mkvpropeditPath),
      tracker,
      textDetector: new FrancTextDetector({ only: env.textDetectorLanguages }),
      ocr: settings.processSubtitles ? await createOcrEngine() : undefined
    },
    roots,
    settings,
    options
  );

  console.info(formatSummary(summarizeReports(reports), Date.now() - startedAt));

  if (options.useTracking) {
    const stats = await tracker.getStats();
    console.info(
      `Tracking: ${stats.totalTracked} file(s) (${stats.both} both, ${stats.audioOnly} audio only, ${stats.subtitleOnly} subtitles only)`
    );
  }
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    if (isToolError(error)) {
      console.error(`[startup] ${error.message}\n  ${error.operatorHint}`);
    } else {
      console.error(`[startup] ${describeError(error)}`);
    }
    process.exitCode = 1;
  }
);
