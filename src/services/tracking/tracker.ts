import { stat } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { readJsonFile, updateJsonFile } from '@/lib/json-store';
import type { TrackingDb, TrackingEntry } from '@/types/detection';

const MTIME_TOLERANCE_MS = 1000;

const trackingDbSchema = z.object({
  entries: z.record(
    z.object({
      size: z.number().nonnegative(),
      mtimeMs: z.number(),
      audioProcessed: z.boolean(),
      subtitleProcessed: z.boolean(),
      processedAt: z.string()
    })
  )
});

function parseTrackingDb(value: unknown): TrackingDb {
  return trackingDbSchema.parse(value);
}

function emptyDb(): TrackingDb {
  return { entries: {} };
}

export interface TrackingStats {
  totalTracked: number;
  audioOnly: number;
  subtitleOnly: number;
  both: number;
}

export interface ProcessedFlags {
  audio: boolean;
  subtitle: boolean;
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

async function readFileSignature(filePath: string): Promise<{ size: number; mtimeMs: number } | undefined> {
  try {
    const info = await stat(filePath);
    return { size: info.size, mtimeMs: info.mtimeMs };
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * On-disk record of files whose tracks were already classified. An entry only
 * counts while the file keeps its recorded size and modification time; a
 * stale entry is removed the moment it is looked at.
 */
export class ProcessingTracker {
  private readonly dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = path.resolve(dbPath);
  }

  private key(filePath: string): string {
    return path.resolve(filePath);
  }

  private async load(): Promise<TrackingDb> {
    return readJsonFile(this.dbPath, emptyDb(), parseTrackingDb);
  }

  async getEntry(filePath: string): Promise<TrackingEntry | undefined> {
    const db = await this.load();
    const key = this.key(filePath);
    return Object.hasOwn(db.entries, key) ? db.entries[key] : undefined;
  }

  async getValidEntry(filePath: string): Promise<TrackingEntry | undefined> {
    const entry = await this.getEntry(filePath);
    if (!entry) {
      return undefined;
    }

    const signature = await readFileSignature(filePath);
    if (
      signature &&
      signature.size === entry.size &&
      Math.abs(signature.mtimeMs - entry.mtimeMs) <= MTIME_TOLERANCE_MS
    ) {
      return entry;
    }

    await this.clearEntry(filePath);
    return undefined;
  }

  async isProcessed(filePath: string): Promise<boolean> {
    return (await this.getValidEntry(filePath)) !== undefined;
  }

  /** Records the file unless neither track type succeeded. Returns whether an entry was written. */
  async markProcessed(filePath: string, flags: ProcessedFlags): Promise<boolean> {
    if (!flags.audio && !flags.subtitle) {
      return false;
    }

    const signature = await readFileSignature(filePath);
    if (!signature) {
      console.warn(`[tracker] cannot record ${filePath}: file no longer exists`);
      return false;
    }

    const key = this.key(filePath);
    await updateJsonFile(
      this.dbPath,
      emptyDb(),
      (current) => ({
        entries: {
          ...current.entries,
          [key]: {
            size: signature.size,
            mtimeMs: signature.mtimeMs,
            audioProcessed: flags.audio,
            subtitleProcessed: flags.subtitle,
            processedAt: new Date().toISOString()
          }
        }
      }),
      parseTrackingDb
    );
    return true;
  }

  async clearEntry(filePath: string): Promise<void> {
    const key = this.key(filePath);
    await updateJsonFile(
      this.dbPath,
      emptyDb(),
      (current) => {
        const { [key]: _removed, ...rest } = current.entries;
        return { entries: rest };
      },
      parseTrackingDb
    );
  }

  async clearAll(): Promise<void> {
    await updateJsonFile(this.dbPath, emptyDb(), () => emptyDb(), parseTrackingDb);
  }

  async getStats(): Promise<TrackingStats> {
    const entries = Object.values((await this.load()).entries);
    return {
      totalTracked: entries.length,
      audioOnly: entries.filter((entry) => entry.audioProcessed && !entry.subtitleProcessed).length,
      subtitleOnly: entries.filter((entry) => !entry.audioProcessed && entry.subtitleProcessed).length,
      both: entries.filter((entry) => entry.audioProcessed && entry.subtitleProcessed).length
    };
  }
}
