// Answer post-processing helpers
import { normalizeAnswer } from "./scoring";

const LIST_MARKER = /^\s*(?:[-*•]|\d+[.)])\s*/;

/**
 * Split an enumerated answer ("A, B, C", bullet or numbered lines) into items.
 */
export function splitListItems(text: string): string[] {
  return text
    .split(/[,\n;]/)
    .map(item => item.replace(LIST_MARKER, "").trim())
    .filter(Boolean);
}

/** Item at `index`, else the first item, else the trimmed text */
export function pickListItem(text: string, index: number): string {
  const items = splitListItems(text);
  return items[index] ?? items[0] ?? text.trim();
}

export function truncateWords(text: string, maxWords: number): string {
  const words = text.split(/\s+/).filter(Boolean);
  return words.length <= maxWords ? text.trim() : words.slice(0, maxWords).join(" ");
}

/**
 * Answer shared by a strict majority of samples after normalisation, or null.
 * The first sample with the winning form is returned verbatim.
 */
export function majorityAnswer(samples: string[]): string | null {
  const counts = new Map<string, number>();
  for (const sample of samples) {
    const key = normalizeAnswer(sample);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  for (const sample of samples) {
    const key = normalizeAnswer(sample);
    if (key && (counts.get(key) ?? 0) * 2 > samples.length) {
      return sample;
    }
  }
  return null;
}
