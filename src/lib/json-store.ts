import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';

let storeLock = Promise.resolve();
const TRANSIENT_PARSE_RETRIES = 3;
const TRANSIENT_PARSE_RETRY_DELAY_MS = 15;

export type JsonParser<T> = (value: unknown) => T;

async function withLock<T>(fn: () => Promise<T>): Promise<T> {
  const run = storeLock.then(fn, fn);
  storeLock = run.then(
    () => undefined,
    () => undefined
  );
  return run;
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Reads and parses a JSON document. A missing file yields `defaultValue`; so does
 * a document that stays unparsable or fails `parse` after the transient retries,
 * in which case the store starts fresh and the next write replaces it.
 */
export async function readJsonFile<T>(
  filePath: string,
  defaultValue: T,
  parse?: JsonParser<T>
): Promise<T> {
  for (let attempt = 0; attempt <= TRANSIENT_PARSE_RETRIES; attempt += 1) {
    let content: string;
    try {
      content = await readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return defaultValue;
      }
      throw error;
    }

    if (content.trim().length === 0 && attempt < TRANSIENT_PARSE_RETRIES) {
      await delay(TRANSIENT_PARSE_RETRY_DELAY_MS);
      continue;
    }

    try {
      const raw: unknown = JSON.parse(content);
      return parse ? parse(raw) : (raw as T);
    } catch (error) {
      if (
        error instanceof SyntaxError &&
        error.message.includes('Unexpected end of JSON input') &&
        attempt < TRANSIENT_PARSE_RETRIES
      ) {
        await delay(TRANSIENT_PARSE_RETRY_DELAY_MS);
        continue;
      }

      console.warn(
        `[json-store] could not load ${filePath}, starting fresh: ${
          error instanceof Error ? error.message : 'unknown error'
        }`
      );
      return defaultValue;
    }
  }

  return defaultValue;
}

export async function writeJsonFile<T>(filePath: string, value: T): Promise<void> {
  const dir = path.dirname(filePath);
  await mkdir(dir, { recursive: true });

  const tmpPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  const content = JSON.stringify(value, null, 2);
  await writeFile(tmpPath, content, 'utf8');
  await rename(tmpPath, filePath);
}

export async function updateJsonFile<T>(
  filePath: string,
  defaultValue: T,
  mutator: (current: T) => T,
  parse?: JsonParser<T>
): Promise<T> {
  return withLock(async () => {
    const current = await readJsonFile(filePath, defaultValue, parse);
    const next = mutator(current);
    await writeJsonFile(filePath, next);
    return next;
  });
}
