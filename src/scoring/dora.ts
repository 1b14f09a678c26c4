import type { Tile } from '../domain/Tile';
import { baseTile, doraFromIndicator, isRedFive } from '../domain/Tile';
import type { WinContext, WinningHand } from '../domain/Hand';
import { allTiles } from '../domain/Hand';
import type { DoraCount } from './yaku/types';

/**
 * Dora bonus han.
 *
 * - every indicator adds one han per copy of the tile it points at
 *   (the same indicator twice counts twice)
 * - each red five is one aka dora
 * - ura dora indicators only count after riichi
 */
function hitsFor(indicators: Tile[], tiles: Tile[]): number {
  let n = 0;
  for (const ind of indicators) {
    const target = doraFromIndicator(ind);
    n += tiles.filter((t) => t === target).length;
  }
  return n;
}

export function countDora(hand: WinningHand, ctx: WinContext): DoraCount {
  const raw = allTiles(hand);
  const tiles = raw.map(baseTile);
  return {
    dora: hitsFor(ctx.doraIndicators, tiles),
    aka: raw.filter(isRedFive).length,
    ura: ctx.riichi === 'none' ? 0 : hitsFor(ctx.uraDoraIndicators, tiles),
  };
}

export function totalDora(d: DoraCount): number {
  return d.dora + d.aka + d.ura;
}
