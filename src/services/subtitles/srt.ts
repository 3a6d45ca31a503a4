import type { SubtitleEntry } from '@/types/media';

const TIMESTAMP_PATTERN = /^(\d{1,2}):(\d{2}):(\d{2})[,.](\d{1,3})$/;
const INDEX_PATTERN = /^\d+$/;

export function parseSrtTimestamp(value: string): number | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const hours = Number.parseInt(match[1] ?? '0', 10);
  const minutes = Number.parseInt(match[2] ?? '0', 10);
  const seconds = Number.parseInt(match[3] ?? '0', 10);
  const millis = Number.parseInt((match[4] ?? '0').padEnd(3, '0'), 10);
  return hours * 3600 + minutes * 60 + seconds + millis / 1000;
}

export function toSrtTimestamp(totalSeconds: number): string {
  const clamped = Math.max(0, totalSeconds);
  const totalMillis = Math.round(clamped * 1000);
  const hours = Math.floor(totalMillis / 3_600_000)
    .toString()
    .padStart(2, '0');
  const minutes = Math.floor((totalMillis % 3_600_000) / 60_000)
    .toString()
    .padStart(2, '0');
  const seconds = Math.floor((totalMillis % 60_000) / 1000)
    .toString()
    .padStart(2, '0');
  const milliseconds = (totalMillis % 1000).toString().padStart(3, '0');
  return `${hours}:${minutes}:${seconds},${milliseconds}`;
}

/**
 * Parses SRT text into entries. Blocks with an unreadable timing line are
 * skipped and reported by position; a missing numeric counter is tolerated.
 */
export function parseSrt(srt: string): { entries: SubtitleEntry[]; timestampErrors: number[] } {
  const lines = srt.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n').split('\n');
  const entries: SubtitleEntry[] = [];
  const timestampErrors: number[] = [];

  let i = 0;
  let blockIndex = 0;

  while (i < lines.length) {
    const line = (lines[i] ?? '').trim();
    if (!line) {
      i += 1;
      continue;
    }

    if (INDEX_PATTERN.test(line) && (lines[i + 1] ?? '').includes('-->')) {
      i += 1;
    }

    const parts = (lines[i] ?? '').split('-->').map((part) => part.trim());
    const start = parts.length === 2 ? parseSrtTimestamp(parts[0] ?? '') : null;
    // Position settings may follow the end time.
    const end = parts.length === 2 ? parseSrtTimestamp((parts[1] ?? '').split(/\s+/)[0] ?? '') : null;

    i += 1;
    const textLines: string[] = [];
    while (i < lines.length && (lines[i] ?? '').trim() !== '') {
      textLines.push((lines[i] ?? '').trim());
      i += 1;
    }

    if (start === null || end === null) {
      timestampErrors.push(blockIndex);
    } else {
      entries.push({
        index: entries.length,
        start,
        end,
        text: textLines.join('\n')
      });
    }

    blockIndex += 1;
  }

  return { entries, timestampErrors };
}
