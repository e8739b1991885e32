import { editTranscript, phoneticDistance, type EditOperation } from "./editDistance";

export type Word = {
  text: string;
  normalized: string;
  ipa: string;
  index: number;
};

export type TimedWord = Word & {
  start?: number;
  end?: number;
};

export type AlignmentKind = "match" | "substitution" | "insertion" | "deletion";

export type AlignmentPair = {
  refIndex: number | null;
  recIndex: number | null;
  kind: AlignmentKind;
};

export type AlignmentOptions = {
  /** Cost of an unmatched reference or recognized word. */
  gapCost?: number;
};

export const DEFAULT_GAP_COST = 0.8;

const kindForOperation: Record<EditOperation, AlignmentKind> = {
  keep: "match",
  substitute: "substitution",
  insert: "insertion",
  delete: "deletion",
};

export const wordDistance = (reference: Word, recognized: Word): number =>
  phoneticDistance(reference.ipa, recognized.ipa);

/**
 * Aligns recognized words to reference words. Substitutions cost the
 * normalized phonetic distance (at most 1), so a wrong word in the right
 * place always beats a deletion plus an insertion when `gapCost > 0.5`.
 */
export function alignWords(
  reference: readonly Word[],
  recognized: readonly Word[],
  options: AlignmentOptions = {}
): AlignmentPair[] {
  const gapCost = options.gapCost ?? DEFAULT_GAP_COST;
  const { steps } = editTranscript(reference, recognized, {
    substitution: wordDistance,
    insertionCost: gapCost,
    deletionCost: gapCost,
  });

  return steps.map((step) => ({
    refIndex: step.sourceIndex,
    recIndex: step.targetIndex,
    kind: kindForOperation[step.op],
  }));
}
