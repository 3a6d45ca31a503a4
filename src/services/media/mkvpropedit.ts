import path from 'node:path';
import { logDetail } from '@/lib/log';
import { toLegacyCode } from '@/services/language/codes';
import { runTool, type ToolRunner } from '@/services/media/run-tool';
import type { MetadataWriter, SubtitleMetadataUpdate, Track } from '@/types/media';

export function buildAudioLanguageArgs(filePath: string, track: Track, language: string): string[] {
  return [filePath, '--edit', `track:a${track.index + 1}`, '--set', `language=${toLegacyCode(language)}`];
}

export function buildSubtitleMetadataArgs(
  filePath: string,
  track: Track,
  update: SubtitleMetadataUpdate
): string[] {
  return [
    filePath,
    '--edit',
    `track:s${track.index + 1}`,
    '--set',
    `language=${toLegacyCode(update.language)}`,
    '--set',
    `name=${update.name}`,
    '--set',
    `flag-forced=${update.forced ? 1 : 0}`
  ];
}

/** Edits track headers in place; the container is never remuxed. */
export class MkvpropeditWriter implements MetadataWriter {
  private readonly mkvpropeditPath: string;
  private readonly run: ToolRunner;

  constructor(mkvpropeditPath: string, run: ToolRunner = runTool) {
    this.mkvpropeditPath = mkvpropeditPath;
    this.run = run;
  }

  async setAudioLanguage(filePath: string, track: Track, language: string): Promise<void> {
    await this.run(this.mkvpropeditPath, buildAudioLanguageArgs(filePath, track, language));
    logDetail('mkvpropedit', `audio track ${track.index} of ${path.basename(filePath)} set to ${language}`);
  }

  async setSubtitleMetadata(
    filePath: string,
    track: Track,
    update: SubtitleMetadataUpdate
  ): Promise<void> {
    await this.run(this.mkvpropeditPath, buildSubtitleMetadataArgs(filePath, track, update));
    logDetail(
      'mkvpropedit',
      `subtitle track ${track.index} of ${path.basename(filePath)} set to ${update.language} "${update.name}"`
    );
  }
}

/** Reports the edits a real run would make. */
export class DryRunMetadataWriter implements MetadataWriter {
  async setAudioLanguage(filePath: string, track: Track, language: string): Promise<void> {
    console.info(
      `[dry-run] would set audio track ${track.index} in ${path.basename(filePath)} to language ${language}`
    );
  }

  async setSubtitleMetadata(
    filePath: string,
    track: Track,
    update: SubtitleMetadataUpdate
  ): Promise<void> {
    console.info(
      `[dry-run] would set subtitle track ${track.index} in ${path.basename(filePath)}: ` +
        `language ${update.language}, name "${update.name}"${update.forced ? ', forced' : ''}`
    );
  }
}
