import type { WinContext, WinningHand } from '../domain/Hand';
import { isMenzen } from '../domain/Hand';

/**
 * Consistency checks between the win context and the hand.
 *
 * Rule summary (any failure means the flags contradict each other):
 *
 * 1) Ippatsu needs riichi; riichi needs a closed hand (concealed kans are fine).
 * 2) Haitei and rinshan are self-draws; houtei and chankan are wins off another player.
 *    Haitei/houtei and rinshan/chankan exclude each other; rinshan needs a kan.
 * 3) The dealer is always the east seat.
 * 4) Tenhou: dealer tsumo. Chiihou: non-dealer tsumo. Renhou: non-dealer ron.
 *    All three need an untouched hand (no calls, no riichi) and exclude each other.
 *
 * Notes:
 * - Tile legality and counts are checked by the decomposer, not here.
 */

export type CheckResult = { ok: boolean; reason?: string };

function bad(reason: string): CheckResult {
  return { ok: false, reason };
}

export function checkContext(hand: WinningHand, ctx: WinContext): CheckResult {
  const riichi = ctx.riichi !== 'none';
  const tsumo = ctx.method === 'tsumo';

  if (ctx.ippatsu && !riichi) return bad('Ippatsu requires riichi');
  if (riichi && !isMenzen(hand)) return bad('Riichi cannot be declared with open melds');

  if (ctx.haitei && !tsumo) return bad('Haitei (last draw) must be a tsumo win');
  if (ctx.houtei && tsumo) return bad('Houtei (last discard) must be a ron win');
  if (ctx.haitei && ctx.houtei) return bad('Cannot be both haitei and houtei');
  if (ctx.rinshan && !tsumo) return bad('Rinshan (kan replacement draw) must be a tsumo win');
  if (ctx.chankan && tsumo) return bad('Chankan (robbing a kan) must be a ron win');
  if (ctx.rinshan && ctx.chankan) return bad('Cannot be both rinshan and chankan');
  if (ctx.rinshan && !hand.melds.some((m) => m.type === 'kan')) return bad('Rinshan requires a declared kan');
  if (ctx.rinshan && ctx.haitei) return bad('Cannot be both rinshan and haitei');

  if (ctx.dealer !== (ctx.seatWind === 'east')) return bad('Dealer flag disagrees with seat wind');

  const blessings = [ctx.tenhou, ctx.chiihou, ctx.renhou].filter(Boolean).length;
  if (blessings > 1) return bad('Only one of tenhou, chiihou, renhou can apply');
  if (blessings === 1) {
    if (hand.melds.length > 0) return bad('First-turn wins cannot have any calls');
    if (riichi) return bad('First-turn wins cannot follow riichi');
  }
  if (ctx.tenhou && !(ctx.dealer && tsumo)) return bad('Tenhou must be a dealer tsumo');
  if (ctx.chiihou && !(!ctx.dealer && tsumo)) return bad('Chiihou must be a non-dealer tsumo');
  if (ctx.renhou && !(!ctx.dealer && !tsumo)) return bad('Renhou must be a non-dealer ron');

  if (!Number.isInteger(ctx.honba) || ctx.honba < 0) return bad('Honba must be a non-negative integer');

  return { ok: true };
}
