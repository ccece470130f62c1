// Character-level typo perturbation. Deterministic for a given seed and makes
// no external call.
import keyboard from "./keyboard.json";
import { countWords } from "~~/services/prompts/builder";
import { Random, createRandom, hashString, pickOne } from "~~/utils/random";

export const TYPO_METHODS = [
  "char_swap",
  "missing_char",
  "extra_char",
  "nearby_char",
  "similar_char",
  "skipped_space",
  "random_space",
  "repeated_char",
  "unichar",
  "casing",
  "punctuation",
] as const;
export type TypoMethod = (typeof TYPO_METHODS)[number];

export type TypoResult = {
  text: string;
  /** Methods that changed the text, in the order they were applied */
  operations: TypoMethod[];
};

export type TypoOptions = {
  /** Defaults to a hash of the input text */
  seed?: number;
};

const NEARBY_KEYS: Record<string, string> = keyboard.nearby;
const SIMILAR_CHARS: Record<string, string> = keyboard.similar;

const SENTENCE_MARKS = "!?.";
const CLAUSE_MARKS = ",;:-";

function isLetter(char: string): boolean {
  return char.toLowerCase() !== char.toUpperCase();
}

function isSpace(char: string): boolean {
  return /\s/.test(char);
}

function matchCase(replacement: string, original: string): string {
  return original === original.toUpperCase() ? replacement.toUpperCase() : replacement;
}

/** Indices in [0, text.length) for which `accept` holds */
function positions(text: string, accept: (index: number) => boolean): number[] {
  const result: number[] = [];
  for (let i = 0; i < text.length; i++) {
    if (accept(i)) result.push(i);
  }
  return result;
}

function replaceAt(text: string, index: number, replacement: string, removeCount: number = 1): string {
  return text.slice(0, index) + replacement + text.slice(index + removeCount);
}

function neighbourOf(char: string, random: Random): string | null {
  const keys = NEARBY_KEYS[char.toLowerCase()];
  if (!keys) return null;
  return matchCase(pickOne([...keys], random), char);
}

type TypoOperation = (text: string, random: Random) => string;

const OPERATIONS: Record<TypoMethod, TypoOperation> = {
  char_swap: (text, random) => {
    const candidates = positions(
      text,
      i => i + 1 < text.length && !isSpace(text[i]) && !isSpace(text[i + 1]) && text[i] !== text[i + 1],
    );
    if (candidates.length === 0) return text;
    const i = pickOne(candidates, random);
    return replaceAt(text, i, text[i + 1] + text[i], 2);
  },

  missing_char: (text, random) => {
    const candidates = positions(text, i => !isSpace(text[i]));
    if (candidates.length === 0) return text;
    return replaceAt(text, pickOne(candidates, random), "");
  },

  extra_char: (text, random) => {
    const candidates = positions(text, i => NEARBY_KEYS[text[i].toLowerCase()] !== undefined);
    if (candidates.length === 0) return text;
    const i = pickOne(candidates, random);
    const extra = neighbourOf(text[i], random);
    return extra === null ? text : replaceAt(text, i + 1, extra, 0);
  },

  nearby_char: (text, random) => {
    const candidates = positions(text, i => NEARBY_KEYS[text[i].toLowerCase()] !== undefined);
    if (candidates.length === 0) return text;
    const i = pickOne(candidates, random);
    const replacement = neighbourOf(text[i], random);
    return replacement === null ? text : replaceAt(text, i, replacement);
  },

  similar_char: (text, random) => {
    const candidates = positions(text, i => SIMILAR_CHARS[text[i].toLowerCase()] !== undefined);
    if (candidates.length === 0) return text;
    const i = pickOne(candidates, random);
    return replaceAt(text, i, pickOne([...SIMILAR_CHARS[text[i].toLowerCase()]], random));
  },

  skipped_space: (text, random) => {
    const candidates = positions(text, i => text[i] === " " && i > 0 && i < text.length - 1);
    if (candidates.length === 0) return text;
    return replaceAt(text, pickOne(candidates, random), "");
  },

  random_space: (text, random) => {
    // Split a word: insert a space between two non-space characters
    const candidates = positions(text, i => i > 0 && !isSpace(text[i - 1]) && !isSpace(text[i]));
    if (candidates.length === 0) return text;
    return replaceAt(text, pickOne(candidates, random), " ", 0);
  },

  repeated_char: (text, random) => {
    const candidates = positions(text, i => isLetter(text[i]));
    if (candidates.length === 0) return text;
    const i = pickOne(candidates, random);
    return replaceAt(text, i, text[i], 0);
  },

  unichar: (text, random) => {
    // Collapse a doubled letter ("coffee" -> "cofee")
    const candidates = positions(text, i => i + 1 < text.length && isLetter(text[i]) && text[i] === text[i + 1]);
    if (candidates.length === 0) return text;
    return replaceAt(text, pickOne(candidates, random), "");
  },

  casing: (text, random) => {
    const candidates = positions(text, i => isLetter(text[i]));
    if (candidates.length === 0) return text;
    const i = pickOne(candidates, random);
    const char = text[i];
    return replaceAt(text, i, char === char.toUpperCase() ? char.toLowerCase() : char.toUpperCase());
  },

  punctuation: (text, random) => {
    const candidates = positions(text, i => (SENTENCE_MARKS + CLAUSE_MARKS).includes(text[i]));
    if (candidates.length === 0) {
      return text + pickOne([...SENTENCE_MARKS], random);
    }
    const i = pickOne(candidates, random);
    const current = text[i];
    const pool = CLAUSE_MARKS.includes(current) ? `${CLAUSE_MARKS} ` : `${SENTENCE_MARKS} `;
    return replaceAt(text, i, pickOne([...pool].filter(mark => mark !== current), random));
  },
};

/**
 * Number of typo operations for a question: one per `intensity` percent of its
 * words, at least one. Intensity 0 means no operation.
 */
export function typoOperationCount(text: string, intensity: number): number {
  if (intensity <= 0) return 0;
  return Math.max(1, Math.floor((countWords(text) * intensity) / 100));
}

/**
 * Corrupt `text` with character-level typos.
 *
 * Methods are drawn from a single seeded sequence and a run stops after the
 * required number of effective operations, so for the same seed a higher
 * intensity always applies a superset of the operations of a lower one.
 * A method that leaves the text unchanged is retired and the draw is repeated.
 */
export function applyTypos(text: string, intensity: number, options: TypoOptions = {}): TypoResult {
  const target = typoOperationCount(text, intensity);
  if (target === 0 || !text.trim()) {
    return { text, operations: [] };
  }

  const random = createRandom(options.seed ?? hashString(text));
  const available: TypoMethod[] = [...TYPO_METHODS];
  const operations: TypoMethod[] = [];
  let current = text;

  while (operations.length < target && available.length > 0) {
    const method = pickOne(available, random);
    const next = OPERATIONS[method](current, random);

    if (next === current) {
      available.splice(available.indexOf(method), 1);
      continue;
    }

    current = next;
    operations.push(method);
  }

  return { text: current, operations };
}
