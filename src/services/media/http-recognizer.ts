import { fetch, type Dispatcher } from 'undici';
import { z } from 'zod';
import { describeError } from '@/lib/log';
import { ToolError } from '@/services/media/errors';
import type { RecognitionOptions, RecognitionResult, SpeechRecognizer } from '@/types/media';

const TOOL = 'asr';
const CAPABILITY_TIMEOUT_MS = 10_000;

const capabilitiesSchema = z.object({
  vad: z.boolean().default(false)
});

const transcriptionSchema = z.object({
  language: z.string().default(''),
  languageProbability: z.number().min(0).max(1).default(0),
  segments: z
    .array(
      z.object({
        start: z.number(),
        end: z.number(),
        text: z.string(),
        avgLogprob: z.number().optional()
      })
    )
    .default([])
});

export interface TranscriptionRequest {
  audioPath: string;
  temperature: number;
  vadFilter: boolean;
  vadParameters?: { minSpeechDurationMs?: number; maxSpeechDurationS?: number };
  wordTimestamps: boolean;
  beamSize: number;
}

export interface HttpRecognizerOptions {
  endpoint: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

async function requestJson(
  url: string,
  init: { method: 'GET' | 'POST'; body?: string },
  timeoutMs: number,
  dispatcher: Dispatcher | undefined
): Promise<{ status: number; body: unknown }> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, {
      method: init.method,
      headers: init.body ? { 'Content-Type': 'application/json' } : undefined,
      body: init.body,
      signal: controller.signal,
      dispatcher
    });
    const text = await response.text();
    let body: unknown = undefined;
    if (text.trim()) {
      try {
        body = JSON.parse(text);
      } catch {
        body = text;
      }
    }
    return { status: response.status, body };
  } catch (error) {
    if (controller.signal.aborted) {
      throw new ToolError({
        code: 'TOOL_TIMEOUT',
        tool: TOOL,
        message: `speech recognizer did not answer within ${timeoutMs} ms`,
        operatorHint: 'Raise ASR_TIMEOUT_MS or check the recognizer host load.',
        cause: error
      });
    }
    throw new ToolError({
      code: 'TOOL_MISSING',
      tool: TOOL,
      message: `speech recognizer unreachable at ${url}: ${describeError(error)}`,
      operatorHint: 'Start the recognizer service or correct ASR_ENDPOINT.',
      cause: error
    });
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Client of a speech recognition server that reads audio from a shared path.
 * Voice-activity support is asked for once, when the client connects.
 */
export class HttpSpeechRecognizer implements SpeechRecognizer {
  readonly supportsVad: boolean;
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly dispatcher: Dispatcher | undefined;

  private constructor(options: HttpRecognizerOptions, supportsVad: boolean) {
    this.endpoint = options.endpoint.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.dispatcher = options.dispatcher;
    this.supportsVad = supportsVad;
  }

  static async connect(options: HttpRecognizerOptions): Promise<HttpSpeechRecognizer> {
    const base = options.endpoint.replace(/\/+$/, '');
    const { status, body } = await requestJson(
      `${base}/capabilities`,
      { method: 'GET' },
      Math.min(options.timeoutMs, CAPABILITY_TIMEOUT_MS),
      options.dispatcher
    );

    if (status === 404) {
      console.warn('[asr] recognizer does not report capabilities, voice-activity filtering disabled');
      return new HttpSpeechRecognizer(options, false);
    }
    if (status < 200 || status >= 300) {
      throw new ToolError({
        code: 'TOOL_FAILED',
        tool: TOOL,
        message: `capability check failed with status ${status}`,
        operatorHint: 'Check the recognizer service logs.'
      });
    }

    const parsed = capabilitiesSchema.safeParse(body);
    if (!parsed.success) {
      console.warn('[asr] unreadable capability report, voice-activity filtering disabled');
      return new HttpSpeechRecognizer(options, false);
    }
    return new HttpSpeechRecognizer(options, parsed.data.vad);
  }

  async transcribe(audioPath: string, options: RecognitionOptions): Promise<RecognitionResult> {
    const vadFilter = options.vadFilter && this.supportsVad;
    const payload: TranscriptionRequest = {
      audioPath,
      temperature: options.temperature,
      vadFilter,
      vadParameters: vadFilter
        ? {
            minSpeechDurationMs: options.vadMinSpeechDurationMs,
            maxSpeechDurationS: options.vadMaxSpeechDurationS
          }
        : undefined,
      wordTimestamps: options.wordTimestamps ?? false,
      beamSize: 1
    };

    const { status, body } = await requestJson(
      `${this.endpoint}/transcribe`,
      { method: 'POST', body: JSON.stringify(payload) },
      this.timeoutMs,
      this.dispatcher
    );

    if (status < 200 || status >= 300) {
      throw new ToolError({
        code: 'TOOL_FAILED',
        tool: TOOL,
        message: `transcription failed with status ${status}`,
        operatorHint: 'Check the recognizer service logs for the failing request.'
      });
    }

    const parsed = transcriptionSchema.safeParse(body);
    if (!parsed.success) {
      throw new ToolError({
        code: 'TOOL_INVALID_OUTPUT',
        tool: TOOL,
        message: `unexpected transcription response: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        operatorHint: 'Make sure the recognizer service version matches this client.',
        cause: parsed.error
      });
    }
    return parsed.data;
  }
}
