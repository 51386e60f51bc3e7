import { readFileSync } from 'fs';
import { PigeonError } from '@pigeonpost/utils';

const WORDS_FILE = new URL('../data/adjectives.json', import.meta.url);

let bundled: readonly string[] | undefined;

export function loadAdjectives(): readonly string[] {
  if (!bundled) {
    const parsed: unknown = JSON.parse(readFileSync(WORDS_FILE, 'utf-8'));
    if (!Array.isArray(parsed) || !parsed.every((word): word is string => typeof word === 'string')) {
      throw new Error(`Adjective list at ${WORDS_FILE.pathname} must be an array of strings`);
    }
    bundled = parsed;
  }
  return bundled;
}

export class AdjectivePicker {
  private words: readonly string[];
  private random: () => number;

  constructor(options?: { words?: readonly string[]; random?: () => number }) {
    this.words = options?.words ?? loadAdjectives();
    this.random = options?.random ?? Math.random;
  }

  /**
   * Pick a word not present in `exclude` (compared case-insensitively).
   */
  pick(exclude: Iterable<string> = []): string {
    const taken = new Set(Array.from(exclude, (word) => word.toLowerCase()));
    const candidates = this.words.filter((word) => !taken.has(word.toLowerCase()));

    if (candidates.length === 0) {
      throw new PigeonError('ADJECTIVES_EXHAUSTED', `All ${this.words.length} adjectives already have an image`, {
        total: this.words.length,
      });
    }

    const index = Math.min(Math.floor(this.random() * candidates.length), candidates.length - 1);
    return candidates[index];
  }

  get size(): number {
    return this.words.length;
  }
}
