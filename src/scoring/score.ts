import type { Decomposition, WaitShape } from '../domain/Decomposition';
import { describeShape } from '../domain/Decomposition';
import { Decomposer } from '../domain/Decomposer';
import type { WinContext, WinningHand } from '../domain/Hand';
import type { Result } from '../domain/errors';
import { fail, succeed } from '../domain/errors';
import { checkContext } from '../rules/contextChecks';
import { getRule } from '../rules/RuleRegistry';
import type { RuleStrategy } from '../rules/RuleStrategy';
import { totalDora } from './dora';
import { computeFu } from './fu';
import type { HandValue, LimitName, Payments } from './payment';
import { basePoints, translate } from './payment';
import type { Candidate } from './selector';
import { selectBest } from './selector';
import { evaluate } from './yaku/evaluator';
import type { DoraCount, YakuHit } from './yaku/types';

export type ScoreBreakdown = {
  han: number;
  /** 0 for yakuman. */
  fu: number;
  /** Combined yakuman multiple, 0 for a regular hand. */
  yakuman: number;
  limit: LimitName | null;
  basePoints: number;
  totalPoints: number;
  payments: Payments;
  honbaBonus: number;
  /** Yaku in table order, then dora. */
  yaku: YakuHit[];
  shape: string;
  wait: WaitShape | null;
};

function doraHits(d: DoraCount): YakuHit[] {
  const out: YakuHit[] = [];
  if (d.dora > 0) out.push({ id: 'dora', name: 'Dora', han: d.dora });
  if (d.aka > 0) out.push({ id: 'akaDora', name: 'Aka dora', han: d.aka });
  if (d.ura > 0) out.push({ id: 'uraDora', name: 'Ura dora', han: d.ura });
  return out;
}

function waitOf(shape: Decomposition): WaitShape | null {
  if (shape.shape === 'standard') return shape.wait;
  if (shape.shape === 'sevenPairs') return 'tanki';
  return null;
}

function toCandidate(
  shape: Decomposition,
  hand: WinningHand,
  ctx: WinContext,
  rule: RuleStrategy,
): Candidate | null {
  const yaku = evaluate(shape, hand, ctx, rule);
  // dora alone never make a hand
  if (yaku.yaku.length === 0) return null;

  const fu = computeFu(shape, ctx, yaku);
  const han = yaku.yakuman > 0
    ? 13 * yaku.yakuman
    : yaku.yaku.reduce((a, y) => a + y.han, 0) + totalDora(yaku.dora);
  const value: HandValue = yaku.yakuman > 0
    ? { kind: 'yakuman', multiple: yaku.yakuman }
    : { kind: 'regular', han, fu };

  return { shape, yaku, han, fu, value, base: basePoints(value, rule).base };
}

/**
 * Scores a won hand: context checks, every decomposition, best reading, payments.
 * Never throws on bad input; every failure comes back as a ScoringError.
 */
export function score(
  hand: WinningHand,
  ctx: WinContext,
  rule: RuleStrategy = getRule(null),
): Result<ScoreBreakdown> {
  const check = checkContext(hand, ctx);
  if (!check.ok) return fail('AmbiguousConfiguration', check.reason ?? 'Conflicting context flags');

  const shapes = Decomposer.decompose(hand);
  if (!shapes.ok) return shapes;

  const candidates: Candidate[] = [];
  for (const shape of shapes.value) {
    const c = toCandidate(shape, hand, ctx, rule);
    if (c) candidates.push(c);
  }

  const picked = selectBest(candidates);
  if (!picked.ok) return picked;
  const best = picked.value;

  const payout = translate(best.value, ctx, rule);
  return succeed({
    han: best.han,
    fu: best.fu,
    yakuman: best.yaku.yakuman,
    ...payout,
    yaku: [...best.yaku.yaku, ...doraHits(best.yaku.dora)],
    shape: describeShape(best.shape),
    wait: waitOf(best.shape),
  });
}
