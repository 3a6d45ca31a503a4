import { describeError, logDetail } from '@/lib/log';
import { isToolError } from '@/services/media/errors';
import { runTool, type ToolRunner } from '@/services/media/run-tool';
import type { OcrEngine } from '@/types/media';

const MAX_OCR_IMAGES = 30;
const IMAGE_TIMEOUT_MS = 30_000;

export class TesseractOcrEngine implements OcrEngine {
  private readonly tesseractPath: string;
  private readonly languages: string;
  private readonly run: ToolRunner;

  constructor(tesseractPath: string, languages: string, run: ToolRunner = runTool) {
    this.tesseractPath = tesseractPath;
    this.languages = languages;
    this.run = run;
  }

  /** Joined text of the readable images; unreadable images are skipped. */
  async recognize(imagePaths: string[]): Promise<string> {
    const texts: string[] = [];

    for (const imagePath of imagePaths.slice(0, MAX_OCR_IMAGES)) {
      try {
        const { stdout } = await this.run(
          this.tesseractPath,
          [imagePath, 'stdout', '-l', this.languages, '--psm', '6'],
          { timeoutMs: IMAGE_TIMEOUT_MS }
        );
        const text = stdout.trim();
        if (text.length > 2) {
          texts.push(text);
        }
      } catch (error) {
        if (isToolError(error) && error.code === 'TOOL_MISSING') {
          throw error;
        }
        logDetail('ocr', `could not read ${imagePath}: ${describeError(error)}`);
      }
    }

    logDetail('ocr', `read text from ${texts.length}/${Math.min(imagePaths.length, MAX_OCR_IMAGES)} images`);
    return texts.join('\n');
  }
}
