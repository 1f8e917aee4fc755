/**
 * Shared result shape of every extraction strategy. Strategies never decide the winner; a picker
 * does, so each one can be tested on its own.
 */
export interface Candidate {
  value: string;
  source: string;
  confidence: number;
}

export type CandidatePicker = (candidates: Candidate[]) => Candidate | null;

export const candidate = (value: string, source: string, confidence: number): Candidate => ({
  value,
  source,
  confidence,
});

/** First candidate in strategy order, ties already broken by the strategy itself. */
export const pickFirst: CandidatePicker = (candidates) => candidates[0] ?? null;

/** Longest value wins; on equal length the higher confidence, then the earlier strategy. */
export const pickLongest: CandidatePicker = (candidates) => {
  let best: Candidate | null = null;
  for (const current of candidates) {
    if (
      !best ||
      current.value.length > best.value.length ||
      (current.value.length === best.value.length && current.confidence > best.confidence)
    ) {
      best = current;
    }
  }
  return best;
};

/** Runs strategies in order and collects what each produced; a throwing strategy counts as empty. */
export const collectCandidates = async <Ctx>(
  strategies: ReadonlyArray<{ name: string; run: (ctx: Ctx) => Promise<Candidate[]> }>,
  ctx: Ctx,
  onError?: (name: string, error: unknown) => void,
): Promise<Candidate[]> => {
  const out: Candidate[] = [];
  for (const strategy of strategies) {
    try {
      out.push(...(await strategy.run(ctx)));
    } catch (error) {
      onError?.(strategy.name, error);
    }
  }
  return out;
};

/** Runs strategies in order and stops at the first that produced anything. */
export const firstCandidate = async <Ctx>(
  strategies: ReadonlyArray<{ name: string; run: (ctx: Ctx) => Promise<Candidate[]> }>,
  ctx: Ctx,
  onError?: (name: string, error: unknown) => void,
): Promise<Candidate | null> => {
  for (const strategy of strategies) {
    try {
      const found = await strategy.run(ctx);
      if (found.length) return found[0];
    } catch (error) {
      onError?.(strategy.name, error);
    }
  }
  return null;
};
