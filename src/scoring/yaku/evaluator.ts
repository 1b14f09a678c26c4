import type { Decomposition } from '../../domain/Decomposition';
import type { WinContext, WinningHand } from '../../domain/Hand';
import type { RuleStrategy } from '../../rules/RuleStrategy';
import { countDora } from '../dora';
import { buildView } from './common';
import { REGULAR_YAKU } from './regular';
import type { YakuHit, YakuResult } from './types';
import { YAKUMAN_RULES } from './yakuman';

/**
 * Yaku of one decomposition.
 *
 * Any yakuman replaces the regular yaku and the dora entirely. When the rule
 * set caps the combined multiple, yakuman past the cap are left off the list.
 * Concealed-only yaku are skipped on an open hand; the rest use their open han.
 */
export function evaluate(
  shape: Decomposition,
  hand: WinningHand,
  ctx: WinContext,
  rule: RuleStrategy,
): YakuResult {
  const v = buildView(shape, hand, ctx, rule);

  const fired = YAKUMAN_RULES
    .filter((r) => r.test(v))
    .map((r) => ({ id: r.id, name: r.name, multiple: rule.doubleYakuman ? r.multiple : 1 }));

  if (fired.length > 0) {
    const total = rule.combineYakuman(fired.map((y) => y.multiple));
    // only list what the rule set lets count, so the han add up to the total
    const yaku: YakuHit[] = [];
    let left = total;
    for (const y of fired) {
      if (y.multiple > left) continue;
      yaku.push({ id: y.id, name: y.name, han: 13 * y.multiple });
      left -= y.multiple;
    }
    return { yaku, yakuman: total, dora: { dora: 0, aka: 0, ura: 0 } };
  }

  const yaku: YakuHit[] = [];
  for (const r of REGULAR_YAKU) {
    const han = v.menzen ? r.han : r.openHan;
    if (han === null || !r.test(v)) continue;
    yaku.push({ id: r.id, name: r.name, han });
  }

  return { yaku, yakuman: 0, dora: countDora(hand, ctx) };
}
