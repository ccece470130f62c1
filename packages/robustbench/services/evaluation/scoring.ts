// Answer scoring - token containment, ROUGE-L and smoothed BLEU against the reference
import removeMarkdown from "remove-markdown";
import { AnswerScores } from "~~/types/benchmark";

export type AnswerScore = AnswerScores & { isCorrect: boolean };

const BLEU_MAX_ORDER = 4;

/**
 * Lowercased word tokens with markdown and punctuation removed.
 */
export function tokenize(text: string): string[] {
  return removeMarkdown(text)
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .split(/\s+/)
    .filter(Boolean);
}

export function normalizeAnswer(text: string): string {
  return tokenize(text).join(" ");
}

function lcsLength(a: string[], b: string[]): number {
  let previous = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      current[j] = a[i - 1] === b[j - 1] ? previous[j - 1] + 1 : Math.max(previous[j], current[j - 1]);
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * ROUGE-L F1 over word tokens.
 */
export function rougeL(hypothesis: string[], reference: string[]): number {
  if (hypothesis.length === 0 || reference.length === 0) return 0;
  const lcs = lcsLength(hypothesis, reference);
  if (lcs === 0) return 0;
  const precision = lcs / hypothesis.length;
  const recall = lcs / reference.length;
  return (2 * precision * recall) / (precision + recall);
}

function ngramCounts(tokens: string[], n: number): Map<string, number> {
  const counts = new Map<string, number>();
  for (let i = 0; i + n <= tokens.length; i++) {
    const gram = tokens.slice(i, i + n).join(" ");
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }
  return counts;
}

/**
 * Sentence BLEU with uniform weights up to 4-grams. Orders above one are
 * smoothed by adding one to the matched and total counts, so short answers
 * without higher-order matches still get a non-zero score.
 */
export function bleu(hypothesis: string[], reference: string[]): number {
  if (hypothesis.length === 0 || reference.length === 0) return 0;

  let logPrecisionSum = 0;
  for (let n = 1; n <= BLEU_MAX_ORDER; n++) {
    const hypothesisGrams = ngramCounts(hypothesis, n);
    const referenceGrams = ngramCounts(reference, n);

    let matched = 0;
    let total = 0;
    for (const [gram, count] of hypothesisGrams) {
      matched += Math.min(count, referenceGrams.get(gram) ?? 0);
      total += count;
    }

    if (n === 1 && matched === 0) return 0;
    const precision = n === 1 ? matched / total : (matched + 1) / (total + 1);
    logPrecisionSum += Math.log(precision) / BLEU_MAX_ORDER;
  }

  const brevityPenalty =
    hypothesis.length > reference.length ? 1 : Math.exp(1 - reference.length / hypothesis.length);
  return brevityPenalty * Math.exp(logPrecisionSum);
}

/**
 * Score a processed answer against the reference. Correct when every
 * reference token occurs in the answer, or ROUGE-L F1 reaches `threshold`.
 * An empty reference never scores correct.
 */
export function scoreAnswer(answer: string, reference: string, threshold: number): AnswerScore {
  const answerTokens = tokenize(answer);
  const referenceTokens = tokenize(reference);

  const answerSet = new Set(answerTokens);
  const contained = referenceTokens.length > 0 && referenceTokens.every(token => answerSet.has(token));
  const rouge = rougeL(answerTokens, referenceTokens);

  return {
    isCorrect: referenceTokens.length > 0 && (contained || rouge >= threshold),
    rougeL: rouge,
    bleu: bleu(answerTokens, referenceTokens),
  };
}
