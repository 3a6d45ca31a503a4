import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import path from 'node:path';
import type { DetectionSettings, RunOptions } from '@/config/detection';
import { describeError } from '@/lib/log';
import { processFile, type FileReport, type ProcessingDeps } from '@/workflows/process-file';

const MEDIA_EXTENSION = '.mkv';

/** Every .mkv under `root`, depth first and sorted by path. Unreadable directories are skipped. */
export async function findMediaFiles(root: string): Promise<string[]> {
  const found: string[] = [];
  const pending = [path.resolve(root)];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) {
      break;
    }

    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      console.warn(`[library] cannot read ${dir}: ${describeError(error)}`);
      continue;
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        pending.push(fullPath);
      } else if (entry.isFile() && path.extname(entry.name).toLowerCase() === MEDIA_EXTENSION) {
        found.push(fullPath);
      }
    }
  }

  return found.sort();
}

/** Processes the files under each root one at a time. */
export async function processLibrary(
  deps: ProcessingDeps,
  roots: string[],
  settings: DetectionSettings,
  options: RunOptions
): Promise<FileReport[]> {
  const reports: FileReport[] = [];

  for (const root of roots) {
    const files = await findMediaFiles(root);
    console.info(`[library] ${files.length} file(s) under ${root}`);
    for (const filePath of files) {
      reports.push(await processFile(deps, filePath, settings, options));
    }
  }

  return reports;
}
