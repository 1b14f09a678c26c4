import { isTerminalOrHonor } from '../domain/Tile';
import type { Decomposition, Group, StandardShape } from '../domain/Decomposition';
import type { WinContext } from '../domain/Hand';
import { isConcealedSet, valueConditions } from './yaku/common';
import type { YakuResult } from './yaku/types';

function groupFu(g: Group, shape: StandardShape, ctx: WinContext): number {
  if (g.kind === 'run') return 0;
  let fu = isTerminalOrHonor(g.tile) ? 4 : 2;
  if (isConcealedSet(g, shape, ctx)) fu *= 2;
  if (g.kind === 'quad') fu *= 4;
  return fu;
}

/**
 * Fu of one reading of the hand, rounded up to the next 10.
 *
 * Seven pairs is a flat 25 and a pinfu tsumo a flat 20. Yakuman hands have no fu.
 */
export function computeFu(shape: Decomposition, ctx: WinContext, yaku: YakuResult): number {
  if (yaku.yakuman > 0) return 0;
  if (shape.shape === 'sevenPairs') return 25;
  if (shape.shape !== 'standard') return 0;

  const tsumo = ctx.method === 'tsumo';
  if (tsumo && yaku.yaku.some((y) => y.id === 'pinfu')) return 20;

  const menzen = shape.groups.every((g) => g.concealed);
  let fu = 20;
  if (menzen && !tsumo) fu += 10;
  if (tsumo) fu += 2;

  for (const g of shape.groups) fu += groupFu(g, shape, ctx);

  if (shape.wait === 'kanchan' || shape.wait === 'penchan' || shape.wait === 'tanki') fu += 2;
  fu += 2 * valueConditions(shape.pair, ctx);

  const rounded = Math.ceil(fu / 10) * 10;
  // open hand with nothing on it
  if (!menzen && rounded === 20) return 30;
  return rounded;
}
