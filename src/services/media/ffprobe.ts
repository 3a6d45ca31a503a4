import { z } from 'zod';
import { ToolError } from '@/services/media/errors';
import { runTool, type ToolRunner } from '@/services/media/run-tool';
import type { MediaInfo, MediaProbe, Track } from '@/types/media';

const probeSchema = z.object({
  streams: z
    .array(
      z.object({
        index: z.number().int(),
        codec_type: z.string().optional(),
        codec_name: z.string().optional(),
        tags: z
          .object({
            language: z.string().optional(),
            title: z.string().optional()
          })
          .passthrough()
          .optional()
      })
    )
    .default([]),
  format: z
    .object({
      duration: z.union([z.string(), z.number()]).optional()
    })
    .passthrough()
    .optional()
});

/** Builds the ordered track list from ffprobe's JSON. Unknown stream types are ignored. */
export function parseProbeOutput(stdout: string): MediaInfo {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch (error) {
    throw new ToolError({
      code: 'TOOL_INVALID_OUTPUT',
      tool: 'ffprobe',
      message: 'ffprobe returned output that is not JSON',
      operatorHint: 'Check that FFPROBE_PATH points at ffprobe, not ffmpeg.',
      cause: error
    });
  }

  const parsed = probeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ToolError({
      code: 'TOOL_INVALID_OUTPUT',
      tool: 'ffprobe',
      message: `ffprobe output did not match the expected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      operatorHint: 'Upgrade ffprobe to a release with JSON output support.',
      cause: parsed.error
    });
  }

  const tracks: Track[] = [];
  let audioIndex = 0;
  let subtitleIndex = 0;

  for (const stream of parsed.data.streams) {
    const language = stream.tags?.language?.trim() || undefined;
    const title = stream.tags?.title?.trim() || undefined;
    const codec = stream.codec_name ?? 'unknown';

    if (stream.codec_type === 'audio') {
      tracks.push({ kind: 'audio', index: audioIndex, streamIndex: stream.index, codec, language, title });
      audioIndex += 1;
    } else if (stream.codec_type === 'subtitle') {
      tracks.push({ kind: 'subtitle', index: subtitleIndex, streamIndex: stream.index, codec, language, title });
      subtitleIndex += 1;
    }
  }

  const duration = Number(parsed.data.format?.duration ?? 0);
  return {
    durationSec: Number.isFinite(duration) && duration > 0 ? duration : 0,
    tracks
  };
}

export class FfprobeMediaProbe implements MediaProbe {
  private readonly ffprobePath: string;
  private readonly run: ToolRunner;

  constructor(ffprobePath: string, run: ToolRunner = runTool) {
    this.ffprobePath = ffprobePath;
    this.run = run;
  }

  async probe(filePath: string): Promise<MediaInfo> {
    const { stdout } = await this.run(this.ffprobePath, [
      '-v',
      'error',
      '-print_format',
      'json',
      '-show_format',
      '-show_streams',
      filePath
    ]);
    return parseProbeOutput(stdout);
  }

  async countSubtitlePackets(filePath: string, track: Track): Promise<number> {
    const { stdout } = await this.run(this.ffprobePath, [
      '-v',
      'error',
      '-select_streams',
      `s:${track.index}`,
      '-count_packets',
      '-show_entries',
      'stream=nb_read_packets',
      '-of',
      'csv=p=0',
      filePath
    ]);

    const count = Number.parseInt(stdout.trim(), 10);
    if (!Number.isFinite(count) || count < 0) {
      throw new ToolError({
        code: 'TOOL_INVALID_OUTPUT',
        tool: 'ffprobe',
        message: `could not read a packet count from "${stdout.trim()}"`,
        operatorHint: 'Verify the subtitle stream is readable with ffprobe -count_packets.'
      });
    }
    return count;
  }
}
