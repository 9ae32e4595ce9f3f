import { GERMAN_ALPHABET } from './alphabets.js';

/** Maps a last character to the characters that cannot follow it. */
type ExclusionTable = Readonly<Record<string, string>>;

const ALL_BUT_U = [...GERMAN_ALPHABET].filter((char) => char !== 'u').join('');

/**
 * Consonant clusters that do not occur in German street names.
 * `x` ends a prefix, `q` only continues with `u`.
 */
export const GERMAN_EXCLUSIONS: ExclusionTable = {
  b: 'bcdfgjkpqvwxz',
  c: 'bcdfgjpqvwxyz',
  d: 'bcdfgjkpqvwxz',
  f: 'bcdgjkpqvwxz',
  g: 'bcdfjkpqvwxz',
  k: 'bcdfgjkpqvwxz',
  p: 'bcdgjkpqvwxz',
  t: 'bcdfgjkpqvwx',
  x: GERMAN_ALPHABET,
  q: ALL_BUT_U,
};

export class AlphabetPruner {
  private readonly alphabet: readonly string[];
  private readonly successors: ReadonlyMap<string, readonly string[]>;

  constructor(
    alphabet: string = GERMAN_ALPHABET,
    exclusions: ExclusionTable = GERMAN_EXCLUSIONS,
  ) {
    this.alphabet = [...alphabet];

    const successors = new Map<string, readonly string[]>();
    for (const [char, excluded] of Object.entries(exclusions)) {
      const blocked = new Set(excluded);
      successors.set(
        char,
        this.alphabet.filter((symbol) => !blocked.has(symbol)),
      );
    }
    this.successors = successors;
  }

  /** Candidate next characters, in alphabet order, for a prefix. */
  nextSymbols(prefix: string): readonly string[] {
    const lastChar = prefix.slice(-1).toLowerCase();
    if (!lastChar) {
      return this.alphabet;
    }

    return this.successors.get(lastChar) ?? this.alphabet;
  }
}

export type { ExclusionTable };
