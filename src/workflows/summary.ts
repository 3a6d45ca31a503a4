import type { TrackFailure } from '@/types/detection';
import type { FileReport } from '@/workflows/process-file';

export interface RunSummary {
  files: number;
  filesSkipped: number;
  filesWithErrors: number;
  audioTracksUpdated: number;
  subtitleTracksUpdated: number;
  tracksSkipped: number;
  forcedTracks: number;
  sdhTracks: number;
  languages: Record<string, number>;
  failures: Array<TrackFailure & { filePath: string }>;
  fileErrors: Array<{ filePath: string; message: string }>;
}

export function summarizeReports(reports: FileReport[]): RunSummary {
  const summary: RunSummary = {
    files: reports.length,
    filesSkipped: 0,
    filesWithErrors: 0,
    audioTracksUpdated: 0,
    subtitleTracksUpdated: 0,
    tracksSkipped: 0,
    forcedTracks: 0,
    sdhTracks: 0,
    languages: {},
    failures: [],
    fileErrors: []
  };

  const countLanguage = (code: string) => {
    summary.languages[code] = (summary.languages[code] ?? 0) + 1;
  };

  for (const report of reports) {
    if (report.skippedByTracking) {
      summary.filesSkipped += 1;
      continue;
    }
    if (report.error) {
      summary.fileErrors.push({ filePath: report.filePath, message: report.error });
    }
    if (report.error || report.failures.length > 0) {
      summary.filesWithErrors += 1;
    }

    summary.audioTracksUpdated += report.audio.length;
    summary.subtitleTracksUpdated += report.subtitles.length;
    summary.tracksSkipped += report.skippedTracks.length;

    for (const outcome of report.audio) {
      countLanguage(outcome.verdict.code);
    }
    for (const outcome of report.subtitles) {
      countLanguage(outcome.language.code);
      if (outcome.forced?.forced) {
        summary.forcedTracks += 1;
      }
      if (outcome.sdh) {
        summary.sdhTracks += 1;
      }
    }
    for (const failure of report.failures) {
      summary.failures.push({ ...failure, filePath: report.filePath });
    }
  }

  return summary;
}

function formatDuration(elapsedMs: number): string {
  const totalSeconds = Math.round(elapsedMs / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}

export function formatSummary(summary: RunSummary, elapsedMs: number): string {
  const lines = [
    'Run summary',
    `  files: ${summary.files} (${summary.filesSkipped} already processed, ${summary.filesWithErrors} with errors)`,
    `  audio tracks updated: ${summary.audioTracksUpdated}`,
    `  subtitle tracks updated: ${summary.subtitleTracksUpdated} (${summary.forcedTracks} forced, ${summary.sdhTracks} SDH)`,
    `  tracks skipped: ${summary.tracksSkipped}`
  ];

  const languages = Object.entries(summary.languages).sort(
    ([codeA, countA], [codeB, countB]) => countB - countA || codeA.localeCompare(codeB)
  );
  if (languages.length > 0) {
    lines.push(`  languages: ${languages.map(([code, count]) => `${code}=${count}`).join(', ')}`);
  }

  if (summary.fileErrors.length > 0 || summary.failures.length > 0) {
    lines.push('  failures:');
    for (const fileError of summary.fileErrors) {
      lines.push(`    ${fileError.filePath}: ${fileError.message}`);
    }
    for (const failure of summary.failures) {
      lines.push(
        `    ${failure.filePath} ${failure.trackKind} track ${failure.trackIndex} [${failure.kind}]: ${failure.message}`
      );
    }
  }

  lines.push(`  elapsed: ${formatDuration(elapsedMs)}`);
  return lines.join('\n');
}
