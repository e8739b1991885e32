export type EditOperation = "keep" | "substitute" | "insert" | "delete";

export type EditCostModel<T> = {
  substitution?: (source: T, target: T) => number;
  insertionCost?: number;
  deletionCost?: number;
};

export type EditStep = {
  op: EditOperation;
  sourceIndex: number | null;
  targetIndex: number | null;
  cost: number;
};

export type EditTranscript = {
  distance: number;
  steps: EditStep[];
};

type Move = "diagonal" | "delete" | "insert";

const TIE_EPSILON = 1e-9;

const defaultSubstitution = <T>(source: T, target: T) => (source === target ? 0 : 1);

const buildTable = <T>(
  source: readonly T[],
  target: readonly T[],
  costs: EditCostModel<T>
) => {
  const m = source.length;
  const n = target.length;
  const substitution = costs.substitution ?? defaultSubstitution;
  const insertionCost = costs.insertionCost ?? 1;
  const deletionCost = costs.deletionCost ?? 1;

  const dp: number[][] = Array.from({ length: m + 1 }, () =>
    Array.from({ length: n + 1 }, () => 0)
  );
  const back: Move[][] = Array.from({ length: m + 1 }, () =>
    Array.from({ length: n + 1 }, (): Move => "diagonal")
  );
  const diagonalCost: number[][] = Array.from({ length: m + 1 }, () =>
    Array.from({ length: n + 1 }, () => 0)
  );

  for (let i = 1; i <= m; i++) {
    dp[i][0] = dp[i - 1][0] + deletionCost;
    back[i][0] = "delete";
  }
  for (let j = 1; j <= n; j++) {
    dp[0][j] = dp[0][j - 1] + insertionCost;
    back[0][j] = "insert";
  }

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      const subCost = substitution(source[i - 1], target[j - 1]);
      const diagonal = dp[i - 1][j - 1] + subCost;
      const deletion = dp[i - 1][j] + deletionCost;
      const insertion = dp[i][j - 1] + insertionCost;
      const best = Math.min(diagonal, deletion, insertion);

      // Ties: diagonal, then deletion, then insertion.
      let move: Move = "insert";
      if (diagonal - best <= TIE_EPSILON) move = "diagonal";
      else if (deletion - best <= TIE_EPSILON) move = "delete";

      dp[i][j] = best;
      back[i][j] = move;
      diagonalCost[i][j] = subCost;
    }
  }

  return { dp, back, diagonalCost, insertionCost, deletionCost };
};

/**
 * Minimum total cost of turning `source` into `target`.
 */
export function editDistance<T>(
  source: readonly T[],
  target: readonly T[],
  costs: EditCostModel<T> = {}
): number {
  return buildTable(source, target, costs).dp[source.length][target.length];
}

/**
 * Same computation as {@link editDistance}, plus the ordered steps that
 * produce the minimum cost. Steps are monotone in both indices.
 */
export function editTranscript<T>(
  source: readonly T[],
  target: readonly T[],
  costs: EditCostModel<T> = {}
): EditTranscript {
  const { dp, back, diagonalCost, insertionCost, deletionCost } = buildTable(
    source,
    target,
    costs
  );

  const steps: EditStep[] = [];
  let i = source.length;
  let j = target.length;
  while (i > 0 || j > 0) {
    const move = back[i][j];
    if (move === "diagonal") {
      const cost = diagonalCost[i][j];
      steps.push({
        op: cost === 0 ? "keep" : "substitute",
        sourceIndex: i - 1,
        targetIndex: j - 1,
        cost,
      });
      i -= 1;
      j -= 1;
    } else if (move === "delete") {
      steps.push({ op: "delete", sourceIndex: i - 1, targetIndex: null, cost: deletionCost });
      i -= 1;
    } else {
      steps.push({ op: "insert", sourceIndex: null, targetIndex: j - 1, cost: insertionCost });
      j -= 1;
    }
  }
  steps.reverse();

  return { distance: dp[source.length][target.length], steps };
}

const ipaNoise = /[\sˈˌ.‿͡'"ʼ-]/gu;

/**
 * Splits an IPA string into comparable symbols. Stress, syllable and
 * linking marks carry no segment of their own and are dropped.
 */
export function ipaSymbols(ipa: string): string[] {
  return Array.from(ipa.normalize("NFC").replace(ipaNoise, ""));
}

/**
 * Edit distance between two IPA strings normalized by the reference
 * length, clamped to [0, 1].
 */
export function phoneticDistance(referenceIpa: string, recognizedIpa: string): number {
  const reference = ipaSymbols(referenceIpa);
  const recognized = ipaSymbols(recognizedIpa);
  if (reference.length === 0) {
    return recognized.length === 0 ? 0 : 1;
  }
  const distance = editDistance(reference, recognized);
  return Math.min(1, Math.max(0, distance / reference.length));
}
