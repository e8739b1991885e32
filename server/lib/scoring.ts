import type { AlignmentPair, Word } from "./alignment";
import { wordDistance } from "./alignment";
import { editTranscript } from "./editDistance";

export type WordCategory = "GOOD" | "OK" | "BAD";

export const categoryCodes: Record<WordCategory, number> = {
  GOOD: 0,
  OK: 1,
  BAD: 2,
};

export type CategoryThresholds = {
  good: number;
  ok: number;
};

export const DEFAULT_THRESHOLDS: CategoryThresholds = {
  good: 70,
  ok: 60,
};

export type WordScore = {
  text: string;
  accuracy: number;
  category: WordCategory;
  startTime: number | null;
  endTime: number | null;
  matchedText: string | null;
  ipa: string;
  matchedIpa: string | null;
  letterCorrectness: boolean[];
};

export type ScoredAlignment = {
  words: WordScore[];
  accuracy: number;
};

export const categorize = (
  accuracy: number,
  thresholds: CategoryThresholds = DEFAULT_THRESHOLDS
): WordCategory => {
  if (accuracy >= thresholds.good) return "GOOD";
  if (accuracy >= thresholds.ok) return "OK";
  return "BAD";
};

export const wordAccuracy = (reference: Word, recognized: Word): number =>
  Math.max(0, 100 * (1 - wordDistance(reference, recognized)));

/**
 * Marks each character of the reference word's normalized form as said
 * correctly when the character-level transcript keeps it.
 */
export function letterCorrectness(reference: string, recognized: string | null): boolean[] {
  const letters = Array.from(reference);
  if (recognized === null) return letters.map(() => false);
  const correct = letters.map(() => false);
  const { steps } = editTranscript(letters, Array.from(recognized));
  for (const step of steps) {
    if (step.op === "keep" && step.sourceIndex !== null) {
      correct[step.sourceIndex] = true;
    }
  }
  return correct;
}

export const meanAccuracy = (scores: readonly WordScore[]): number =>
  scores.length
    ? scores.reduce((total, score) => total + score.accuracy, 0) / scores.length
    : 0;

/**
 * One WordScore per reference word, in reference order. Insertions are
 * extra speech and never reach the list.
 */
export function scoreAlignment(
  reference: readonly Word[],
  recognized: readonly Word[],
  alignment: readonly AlignmentPair[],
  thresholds: CategoryThresholds = DEFAULT_THRESHOLDS
): ScoredAlignment {
  const words: WordScore[] = [];

  for (const pair of alignment) {
    if (pair.refIndex === null) continue;
    const refWord = reference[pair.refIndex];
    const recWord = pair.recIndex === null ? undefined : recognized[pair.recIndex];

    // A missed word is BAD whatever the thresholds say.
    if (!recWord) {
      words.push({
        text: refWord.text,
        accuracy: 0,
        category: "BAD",
        startTime: null,
        endTime: null,
        matchedText: null,
        ipa: refWord.ipa,
        matchedIpa: null,
        letterCorrectness: letterCorrectness(refWord.normalized, null),
      });
      continue;
    }

    const accuracy = wordAccuracy(refWord, recWord);
    words.push({
      text: refWord.text,
      accuracy,
      category: categorize(accuracy, thresholds),
      startTime: null,
      endTime: null,
      matchedText: recWord.text,
      ipa: refWord.ipa,
      matchedIpa: recWord.ipa,
      letterCorrectness: letterCorrectness(refWord.normalized, recWord.normalized),
    });
  }

  return { words, accuracy: meanAccuracy(words) };
}
