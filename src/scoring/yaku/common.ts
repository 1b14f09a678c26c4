import type { Suit, Tile } from '../../domain/Tile';
import {
  DRAGONS, baseTile, isTerminal, isTerminalOrHonor, rankOf, suitOf, tileIndex, windTile,
} from '../../domain/Tile';
import type { Decomposition, Group } from '../../domain/Decomposition';
import { groupTiles, isSetGroup } from '../../domain/Decomposition';
import type { WinContext, WinningHand } from '../../domain/Hand';
import { allTiles, isMenzen } from '../../domain/Hand';
import type { RuleStrategy } from '../../rules/RuleStrategy';
import type { YakuView } from './types';

/**
 * Small predicates shared by the yaku tables and the fu calculator.
 */

/** A triplet completed by another player's discard is scored as open. */
export function isConcealedSet(g: Group, shape: Decomposition, ctx: WinContext): boolean {
  if (!isSetGroup(g) || !g.concealed) return false;
  if (shape.shape !== 'standard') return false;
  return !(ctx.method === 'ron' && g === shape.winningGroup);
}

/** Value-tile conditions the tile meets: dragon, seat wind, round wind. */
export function valueConditions(t: Tile, ctx: WinContext): number {
  let n = 0;
  if (DRAGONS.includes(t)) n += 1;
  if (t === windTile(ctx.seatWind)) n += 1;
  if (t === windTile(ctx.roundWind)) n += 1;
  return n;
}

export function numberSuits(tiles: Tile[]): Set<Suit> {
  const suits = new Set<Suit>();
  for (const t of tiles) {
    const s = suitOf(t);
    if (s !== 'z') suits.add(s);
  }
  return suits;
}

export function hasSetOf(v: YakuView, t: Tile): boolean {
  return v.sets.some((g) => g.tile === t);
}

/** How many pairs of identical runs the shape holds (0, 1 or 2). */
export function identicalRunPairs(runs: Tile[]): number {
  const counts = new Map<Tile, number>();
  for (const r of runs) counts.set(r, (counts.get(r) ?? 0) + 1);
  let pairs = 0;
  for (const c of counts.values()) pairs += Math.floor(c / 2);
  return pairs;
}

export function hasRunIn(runs: Tile[], suit: Suit, rank: number): boolean {
  return runs.some((r) => suitOf(r) === suit && rankOf(r) === rank);
}

/** Every group and the pair touch a terminal (and, when allowed, an honor). */
export function allGroupsOutside(v: YakuView, allowHonors: boolean): boolean {
  if (!v.pair) return false;
  const ok = (t: Tile) => (allowHonors ? isTerminalOrHonor(t) : isTerminal(t));
  return ok(v.pair) && v.groups.every((g) => groupTiles(g).some(ok));
}

export function buildView(shape: Decomposition, hand: WinningHand, ctx: WinContext, rule: RuleStrategy): YakuView {
  const groups = shape.shape === 'standard' ? shape.groups : [];
  const sets = groups.filter(isSetGroup);
  const runs = groups
    .filter((g) => g.kind === 'run')
    .map((g) => g.tile)
    .sort((a, b) => tileIndex(a) - tileIndex(b));

  return {
    shape,
    ctx,
    rule,
    menzen: isMenzen(hand),
    tiles: allTiles(hand).map(baseTile),
    win: baseTile(hand.winningTile),
    groups,
    pair: shape.shape === 'standard' ? shape.pair : null,
    runs,
    sets,
    concealedSets: sets.filter((g) => isConcealedSet(g, shape, ctx)).length,
    quads: groups.filter((g) => g.kind === 'quad').length,
  };
}
