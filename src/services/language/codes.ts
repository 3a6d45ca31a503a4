import { readFileSync } from 'node:fs';
import { z } from 'zod';

export const UNDETERMINED = 'und';
export const NO_LINGUISTIC_CONTENT = 'zxx';

const UNDEFINED_SYNONYMS = new Set(['', 'und', 'unknown', 'undefined', 'undetermined']);

const languageTableSchema = z.object({
  names: z.record(z.string()),
  legacyToAlpha2: z.record(z.string().length(2)),
  alternateCodes: z.record(z.string().length(2)),
  displayNames: z.record(z.string())
});

export type LanguageTable = Readonly<z.infer<typeof languageTableSchema>>;

function loadLanguageTable(): LanguageTable {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../data/languages.json', import.meta.url), 'utf8')
  );
  return Object.freeze(languageTableSchema.parse(raw));
}

const TABLE = loadLanguageTable();

const ALPHA2_TO_LEGACY: ReadonlyMap<string, string> = new Map(
  Object.entries(TABLE.legacyToAlpha2).map(([legacy, alpha2]) => [alpha2, legacy])
);

function lookup(record: Record<string, string>, key: string): string | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * Folds a language tag into the 2-letter code space. Undefined synonyms become
 * `und`, known legacy 3-letter codes become their 2-letter form, and anything
 * unrecognized is kept (lower-cased) so operators can still see it.
 */
export function normalizeLanguageCode(raw: string | null | undefined): string {
  const code = (raw ?? '').trim().toLowerCase();

  if (UNDEFINED_SYNONYMS.has(code)) {
    return UNDETERMINED;
  }

  if (code === NO_LINGUISTIC_CONTENT) {
    return NO_LINGUISTIC_CONTENT;
  }

  const alpha2 = lookup(TABLE.legacyToAlpha2, code) ?? lookup(TABLE.alternateCodes, code);
  if (alpha2) {
    return alpha2;
  }

  return code;
}

export function isUndetermined(tag: string | null | undefined): boolean {
  return normalizeLanguageCode(tag) === UNDETERMINED;
}

/**
 * Maps a recognizer language (a name such as "french" or a code such as "fr")
 * to a normalized code.
 */
export function languageNameToCode(name: string): string {
  const key = name.trim().toLowerCase();
  if (key === 'dutch' || key === 'nl') {
    return normalizeLanguageCode('dut');
  }
  return normalizeLanguageCode(lookup(TABLE.names, key) ?? key);
}

export function toLegacyCode(code: string): string {
  const normalized = normalizeLanguageCode(code);
  return ALPHA2_TO_LEGACY.get(normalized) ?? normalized;
}

export function getLanguageDisplayName(code: string): string {
  const normalized = normalizeLanguageCode(code);
  return lookup(TABLE.displayNames, normalized) ?? normalized.toUpperCase();
}
