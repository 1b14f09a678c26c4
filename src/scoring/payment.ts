import type { WinContext } from '../domain/Hand';
import type { RuleStrategy } from '../rules/RuleStrategy';

export type HandValue =
  | { kind: 'yakuman'; multiple: number }
  | { kind: 'regular'; han: number; fu: number };

export type LimitName = 'mangan' | 'haneman' | 'baiman' | 'sanbaiman' | 'kazoe yakuman' | 'yakuman';

export type Payments =
  | { method: 'ron'; discarder: number }
  /** `dealer` is null when the dealer won: everyone pays `nonDealer`. */
  | { method: 'tsumo'; dealer: number | null; nonDealer: number };

export type Payout = {
  limit: LimitName | null;
  basePoints: number;
  totalPoints: number;
  payments: Payments;
  honbaBonus: number;
};

export type BasePoints = { base: number; limit: LimitName | null };

const MANGAN = 2000;
const YAKUMAN = 8000;

export const HONBA_RON = 300;
export const HONBA_TSUMO = 100;

function roundUp100(n: number): number {
  return Math.ceil(n / 100) * 100;
}

export function basePoints(value: HandValue, rule: RuleStrategy): BasePoints {
  if (value.kind === 'yakuman') return { base: YAKUMAN * value.multiple, limit: 'yakuman' };

  const { han, fu } = value;
  if (han >= 13) {
    return rule.kazoeYakuman ? { base: YAKUMAN, limit: 'kazoe yakuman' } : { base: 6000, limit: 'sanbaiman' };
  }
  if (han >= 11) return { base: 6000, limit: 'sanbaiman' };
  if (han >= 8) return { base: 4000, limit: 'baiman' };
  if (han >= 6) return { base: 3000, limit: 'haneman' };
  if (han >= 5) return { base: MANGAN, limit: 'mangan' };

  const base = fu * 2 ** (2 + han);
  if (base >= MANGAN) return { base: MANGAN, limit: 'mangan' };
  if (rule.kiriageMangan && base === 1920) return { base: MANGAN, limit: 'mangan' };
  return { base, limit: null };
}

/**
 * Base points to what each player pays.
 *
 * Ron: the discarder pays base x6 (dealer win) or x4, rounded up to 100.
 * Tsumo: each share is rounded up on its own; the dealer pays double.
 * Honba adds 300 in total, split 100 per payer on tsumo.
 */
export function translate(value: HandValue, ctx: WinContext, rule: RuleStrategy): Payout {
  const { base, limit } = basePoints(value, rule);
  const honbaBonus = HONBA_RON * ctx.honba;

  if (ctx.method === 'ron') {
    const discarder = roundUp100(base * (ctx.dealer ? 6 : 4)) + honbaBonus;
    return { limit, basePoints: base, totalPoints: discarder, payments: { method: 'ron', discarder }, honbaBonus };
  }

  const perHonba = HONBA_TSUMO * ctx.honba;
  if (ctx.dealer) {
    const each = roundUp100(base * 2) + perHonba;
    return {
      limit,
      basePoints: base,
      totalPoints: each * 3,
      payments: { method: 'tsumo', dealer: null, nonDealer: each },
      honbaBonus,
    };
  }

  const dealer = roundUp100(base * 2) + perHonba;
  const nonDealer = roundUp100(base) + perHonba;
  return {
    limit,
    basePoints: base,
    totalPoints: dealer + nonDealer * 2,
    payments: { method: 'tsumo', dealer, nonDealer },
    honbaBonus,
  };
}
