import type { Decomposition } from '../domain/Decomposition';
import { describeShape } from '../domain/Decomposition';
import type { Result } from '../domain/errors';
import { fail, succeed } from '../domain/errors';
import type { HandValue } from './payment';
import type { YakuResult } from './yaku/types';

/** One scored reading of the hand. */
export type Candidate = {
  shape: Decomposition;
  yaku: YakuResult;
  /** Yaku plus dora; 13 per multiple for yakuman. */
  han: number;
  fu: number;
  value: HandValue;
  /** Capped base points under the active rule set. */
  base: number;
};

function rank(c: Candidate): number[] {
  const yakuman = c.value.kind === 'yakuman' ? c.value.multiple : 0;
  return [yakuman, c.base, c.han, c.fu];
}

/** Higher first; the shape text breaks exact ties so input order never matters. */
export function compareCandidates(a: Candidate, b: Candidate): number {
  const ra = rank(a);
  const rb = rank(b);
  for (let i = 0; i < ra.length; i++) {
    const d = (rb[i] ?? 0) - (ra[i] ?? 0);
    if (d !== 0) return d;
  }
  const sa = describeShape(a.shape);
  const sb = describeShape(b.shape);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

export function selectBest(candidates: Candidate[]): Result<Candidate> {
  const best = candidates.slice().sort(compareCandidates)[0];
  if (!best) return fail('NoYakuFound', 'No reading of the hand has a yaku');
  return succeed(best);
}
