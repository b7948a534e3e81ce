import { readFileSync } from 'node:fs';

import YAML from 'yaml';

import defaultLexiconData from '../data/lexicon.json' with { type: 'json' };

/**
 * Word lists behind the rule-based heuristics.
 * Matching is case-insensitive substring matching against the response text.
 */
export interface Lexicon {
  readonly encouragementWords: readonly string[];
  readonly guidingWords: readonly string[];
  readonly storyWords: readonly string[];
  readonly gameWords: readonly string[];
  readonly complexWords: readonly string[];
  readonly negativeWords: readonly string[];
  /** Words that mark a refusal when they co-occur with a negative word */
  readonly refusalWords: readonly string[];
  /** Test-case categories that get content filtering */
  readonly safetyCategories: readonly string[];
}

export class LexiconError extends Error {
  readonly source: string;

  constructor(message: string, source: string) {
    super(`${source}: ${message}`);
    this.name = 'LexiconError';
    this.source = source;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readWordList(
  data: Record<string, unknown>,
  field: keyof Lexicon,
  source: string,
): readonly string[] {
  const value = data[field];
  if (!Array.isArray(value)) {
    throw new LexiconError(`"${field}" must be an array of strings`, source);
  }

  const words: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string' || item.length === 0) {
      throw new LexiconError(
        `"${field}" contains a non-string or empty entry`,
        source,
      );
    }
    words.push(item);
  }
  return words;
}

export function parseLexicon(data: unknown, source: string): Lexicon {
  if (!isRecord(data)) {
    throw new LexiconError('lexicon must be an object', source);
  }

  return {
    encouragementWords: readWordList(data, 'encouragementWords', source),
    guidingWords: readWordList(data, 'guidingWords', source),
    storyWords: readWordList(data, 'storyWords', source),
    gameWords: readWordList(data, 'gameWords', source),
    complexWords: readWordList(data, 'complexWords', source),
    negativeWords: readWordList(data, 'negativeWords', source),
    refusalWords: readWordList(data, 'refusalWords', source),
    safetyCategories: readWordList(data, 'safetyCategories', source),
  };
}

/**
 * Reads a lexicon from a YAML or JSON file.
 * @throws LexiconError when a list is missing or malformed
 */
export function loadLexicon(filePath: string): Lexicon {
  const content = readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new LexiconError(`cannot parse lexicon: ${reason}`, filePath);
  }
  return parseLexicon(parsed, filePath);
}

let cachedDefault: Lexicon | undefined;

/** Lexicon shipped with the package */
export function defaultLexicon(): Lexicon {
  cachedDefault ??= parseLexicon(defaultLexiconData, 'lexicon.json');
  return cachedDefault;
}

/** True when any word occurs in the already lower-cased text */
export function containsAny(
  lowerText: string,
  words: readonly string[],
): boolean {
  return words.some((word) => lowerText.includes(word.toLowerCase()));
}
