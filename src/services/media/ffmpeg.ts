import { mkdtemp, readdir, readFile, rm, stat } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describeError, logDetail } from '@/lib/log';
import { runStrategies, type Strategy } from '@/lib/strategies';
import { isToolError } from '@/services/media/errors';
import { runTool, type ToolRunner } from '@/services/media/run-tool';
import { isImageSubtitleCodec } from '@/services/subtitles/forced';
import type {
  AudioSample,
  AudioSelection,
  ExtractOptions,
  MediaExtractor,
  SubtitleImages,
  SubtitlePayload,
  Track
} from '@/types/media';

// Speech band with loudness normalisation, as the recognizer expects 16 kHz mono.
export const SPEECH_FILTER_CHAIN = 'volume=2.0,highpass=f=80,lowpass=f=8000,dynaudnorm=f=200:g=3';
export const MIN_AUDIO_BYTES = 10 * 1024;
export const SILENCE_FLOOR_DB = -60;
const MIN_SRT_BYTES = 100;

export function audioSelectors(track: Track): string[] {
  return [`0:a:${track.index}`, `0:${track.streamIndex}`, `a:${track.index}`];
}

export function subtitleSelectors(track: Track): string[] {
  return [`0:s:${track.index}`, `0:${track.streamIndex}`, `s:${track.index}`];
}

export function buildAudioArgs(
  filePath: string,
  selector: string,
  selection: AudioSelection,
  outputPath: string
): string[] {
  const window =
    selection === 'full'
      ? []
      : ['-ss', selection.startSec.toFixed(3), '-t', String(selection.durationSec)];
  return [
    '-y',
    '-v',
    'error',
    ...window,
    '-i',
    filePath,
    '-map',
    selector,
    '-vn',
    '-af',
    SPEECH_FILTER_CHAIN,
    '-ac',
    '1',
    '-ar',
    '16000',
    '-c:a',
    'pcm_s16le',
    outputPath
  ];
}

/** Mean volume in dB from ffmpeg's volumedetect report, if present. */
export function parseMeanVolume(stderr: string): number | undefined {
  const match = /mean_volume:\s*(-?[\d.]+|-inf)\s*dB/.exec(stderr);
  if (!match?.[1]) {
    return undefined;
  }
  return match[1] === '-inf' ? Number.NEGATIVE_INFINITY : Number.parseFloat(match[1]);
}

async function fileSize(filePath: string): Promise<number> {
  try {
    return (await stat(filePath)).size;
  } catch {
    return 0;
  }
}

function abortsStrategies(error: unknown): boolean {
  return isToolError(error) && (error.code === 'TOOL_TIMEOUT' || error.code === 'TOOL_MISSING');
}

export class FfmpegExtractor implements MediaExtractor {
  private readonly ffmpegPath: string;
  private readonly run: ToolRunner;

  constructor(ffmpegPath: string, run: ToolRunner = runTool) {
    this.ffmpegPath = ffmpegPath;
    this.run = run;
  }

  private async withTempDir<T>(
    task: (dir: string) => Promise<T | undefined>,
    keep: (value: T) => boolean
  ): Promise<T | undefined> {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'tracklang-'));
    let value: T | undefined;
    try {
      value = await task(dir);
      return value;
    } finally {
      if (value === undefined || !keep(value)) {
        await rm(dir, { recursive: true, force: true });
      }
    }
  }

  /** Whether the sample carries audible sound. An unreadable level passes. */
  private async isAudible(samplePath: string): Promise<boolean> {
    try {
      const { stderr } = await this.run(this.ffmpegPath, [
        '-hide_banner',
        '-i',
        samplePath,
        '-af',
        'volumedetect',
        '-f',
        'null',
        '-'
      ]);
      const meanVolume = parseMeanVolume(stderr);
      if (meanVolume === undefined) {
        return true;
      }
      logDetail('ffmpeg', `sample mean volume ${meanVolume.toFixed(1)} dB`);
      return meanVolume > SILENCE_FLOOR_DB;
    } catch (error) {
      logDetail('ffmpeg', `volume check failed, keeping sample: ${describeError(error)}`);
      return true;
    }
  }

  async extractAudio(
    filePath: string,
    track: Track,
    selection: AudioSelection,
    options: ExtractOptions = {}
  ): Promise<AudioSample | undefined> {
    return this.withTempDir<AudioSample>(
      async (dir) => {
        const outputPath = path.join(dir, 'sample.wav');
        const strategies: Strategy<string>[] = audioSelectors(track).map((selector) => ({
          name: selector,
          run: async () => {
            await this.run(this.ffmpegPath, buildAudioArgs(filePath, selector, selection, outputPath), {
              timeoutMs: options.timeoutMs
            });
            return (await fileSize(outputPath)) >= MIN_AUDIO_BYTES ? outputPath : undefined;
          }
        }));

        const outcome = await runStrategies(strategies, {
          onFailure: (name, error) =>
            logDetail(
              'ffmpeg',
              `audio map ${name} failed${error === undefined ? ': output too small' : `: ${describeError(error)}`}`
            ),
          shouldAbort: abortsStrategies
        });
        if (!outcome) {
          return undefined;
        }

        if (!(await this.isAudible(outcome.value))) {
          logDetail('ffmpeg', `audio track ${track.index} sample is silent, skipping`);
          return undefined;
        }

        return {
          path: outcome.value,
          release: () => rm(dir, { recursive: true, force: true })
        };
      },
      () => true
    );
  }

  async extractSubtitle(filePath: string, track: Track): Promise<SubtitlePayload | undefined> {
    if (isImageSubtitleCodec(track.codec)) {
      return { format: 'image' };
    }

    return this.withTempDir<SubtitlePayload>(
      async (dir) => {
        const outputPath = path.join(dir, 'track.srt');
        const outcome = await runStrategies(
          subtitleSelectors(track).map((selector) => ({
            name: selector,
            run: async () => {
              await this.run(this.ffmpegPath, [
                '-y',
                '-v',
                'warning',
                '-i',
                filePath,
                '-map',
                selector,
                '-c:s',
                'srt',
                outputPath
              ]);
              return (await fileSize(outputPath)) > MIN_SRT_BYTES
                ? readFile(outputPath, 'utf8')
                : undefined;
            }
          })),
          {
            onFailure: (name, error) =>
              logDetail('ffmpeg', `subtitle map ${name} failed: ${describeError(error ?? 'empty output')}`),
            shouldAbort: abortsStrategies
          }
        );
        return outcome ? { format: 'text', srt: outcome.value } : undefined;
      },
      () => false
    );
  }

  async extractSubtitleImages(
    filePath: string,
    track: Track,
    maxFrames: number
  ): Promise<SubtitleImages | undefined> {
    return this.withTempDir<SubtitleImages>(
      async (dir) => {
        const pattern = path.join(dir, 'sub_%04d.png');
        const frames = ['-frames:v', String(maxFrames), '-vsync', '0'];

        const collect = async (): Promise<string[] | undefined> => {
          const names = (await readdir(dir)).filter((name) => /^sub_\d+\.png$/.test(name)).sort();
          return names.length > 0 ? names.map((name) => path.join(dir, name)) : undefined;
        };

        const outcome = await runStrategies<string[]>(
          [
            {
              name: 'subtitle-filter',
              run: async () => {
                await this.run(this.ffmpegPath, [
                  '-y', '-v', 'warning', '-i', filePath,
                  '-filter_complex', `[0:s:${track.index}]scale=iw:ih[sub]`,
                  '-map', '[sub]', ...frames, pattern
                ]);
                return collect();
              }
            },
            {
              name: 'stream-copy',
              run: async () => {
                const supPath = path.join(dir, 'track.sup');
                await this.run(this.ffmpegPath, [
                  '-y', '-v', 'warning', '-i', filePath,
                  '-map', `0:s:${track.index}`, '-c', 'copy', supPath
                ]);
                if ((await fileSize(supPath)) === 0) {
                  return undefined;
                }
                await this.run(this.ffmpegPath, ['-y', '-v', 'warning', '-i', supPath, ...frames, pattern]);
                return collect();
              }
            },
            {
              name: 'video-overlay',
              run: async () => {
                await this.run(this.ffmpegPath, [
                  '-y', '-v', 'warning', '-i', filePath,
                  '-filter_complex', `[0:v][0:s:${track.index}]overlay[v]`,
                  '-map', '[v]', ...frames, '-q:v', '2', pattern
                ]);
                return collect();
              }
            }
          ],
          {
            onFailure: (name, error) =>
              logDetail('ffmpeg', `image extraction via ${name} failed: ${describeError(error ?? 'no frames')}`),
            shouldAbort: abortsStrategies
          }
        );

        if (!outcome) {
          return undefined;
        }
        return {
          paths: outcome.value.slice(0, maxFrames),
          release: () => rm(dir, { recursive: true, force: true })
        };
      },
      () => true
    );
  }
}
