const recommended = ['ASR_ENDPOINT', 'MEDIA_PATHS'];

function splitList(raw: string | undefined): string[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(',')
    .map((value) => value.trim())
    .filter(Boolean);
}

export const env = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  ffmpegPath: process.env.FFMPEG_PATH ?? 'ffmpeg',
  ffprobePath: process.env.FFPROBE_PATH ?? 'ffprobe',
  mkvpropeditPath: process.env.MKVPROPEDIT_PATH ?? 'mkvpropedit',
  tesseractPath: process.env.TESSERACT_PATH ?? 'tesseract',
  tesseractLanguages: process.env.TESSERACT_LANGUAGES ?? 'eng',
  textDetectorLanguages: splitList(process.env.TEXT_DETECTOR_LANGUAGES),
  asrEndpoint: process.env.ASR_ENDPOINT ?? 'http://localhost:7002',
  asrTimeoutMs: Number(process.env.ASR_TIMEOUT_MS ?? '900000'),
  trackingDbPath: process.env.TRACKING_DB_PATH ?? 'config/processed_files.json',
  mediaPaths: splitList(process.env.MEDIA_PATHS)
};

export function getRuntimeWarnings(): string[] {
  return recommended
    .filter((key) => !process.env[key])
    .map((key) => `${key} is not configured; using defaults.`);
}
