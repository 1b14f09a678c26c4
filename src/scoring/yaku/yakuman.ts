import { isGreen, isHonor, isTerminal, isWindTile, rankOf, DRAGONS } from '../../domain/Tile';
import type { YakumanRule, YakuView } from './types';
import { numberSuits } from './common';

const NINE_GATES = [3, 1, 1, 1, 1, 1, 1, 1, 3];

function kokushi(v: YakuView, thirteen: boolean): boolean {
  return v.shape.shape === 'thirteenOrphans' && v.shape.thirteenWait === thirteen;
}

function suuankou(v: YakuView, tanki: boolean): boolean {
  if (v.shape.shape !== 'standard' || v.concealedSets !== 4) return false;
  return (v.shape.wait === 'tanki') === tanki;
}

function windSets(v: YakuView): number {
  return v.sets.filter((g) => isWindTile(g.tile)).length;
}

/**
 * Nine gates: 1112345678999 in one suit plus any tile of that suit.
 * `pure` asks whether the winning tile was the extra one.
 */
function chuuren(v: YakuView, pure: boolean): boolean {
  if (!v.menzen || v.quads > 0) return false;
  if (v.tiles.some(isHonor) || numberSuits(v.tiles).size !== 1) return false;

  const byRank = new Array<number>(9).fill(0);
  for (const t of v.tiles) {
    const r = rankOf(t) - 1;
    byRank[r] = (byRank[r] ?? 0) + 1;
  }
  let extra = -1;
  for (let r = 0; r < 9; r++) {
    const over = (byRank[r] ?? 0) - (NINE_GATES[r] ?? 0);
    if (over < 0) return false;
    if (over === 1) extra = r;
  }
  if (extra === -1) return false;
  return (rankOf(v.win) - 1 === extra) === pure;
}

export const YAKUMAN_RULES: YakumanRule[] = [
  { id: 'kokushi', name: 'Kokushi musou', multiple: 1, test: (v) => kokushi(v, false) },
  { id: 'kokushi13', name: 'Kokushi musou (13-sided wait)', multiple: 2, test: (v) => kokushi(v, true) },
  { id: 'suuankou', name: 'Suuankou', multiple: 1, test: (v) => suuankou(v, false) },
  { id: 'suuankouTanki', name: 'Suuankou (single wait)', multiple: 2, test: (v) => suuankou(v, true) },
  {
    id: 'daisangen', name: 'Daisangen', multiple: 1,
    test: (v) => v.sets.filter((g) => DRAGONS.includes(g.tile)).length === 3,
  },
  {
    id: 'shousuushii', name: 'Shousuushii', multiple: 1,
    test: (v) => windSets(v) === 3 && v.pair !== null && isWindTile(v.pair),
  },
  { id: 'daisuushii', name: 'Daisuushii', multiple: 1, test: (v) => windSets(v) === 4 },
  { id: 'tsuuiisou', name: 'Tsuuiisou', multiple: 1, test: (v) => v.tiles.every(isHonor) },
  { id: 'chinroutou', name: 'Chinroutou', multiple: 1, test: (v) => v.tiles.every(isTerminal) },
  { id: 'ryuuiisou', name: 'Ryuuiisou', multiple: 1, test: (v) => v.tiles.every(isGreen) },
  { id: 'chuuren', name: 'Chuuren poutou', multiple: 1, test: (v) => chuuren(v, false) },
  { id: 'junseiChuuren', name: 'Junsei chuuren poutou', multiple: 2, test: (v) => chuuren(v, true) },
  { id: 'suukantsu', name: 'Suukantsu', multiple: 1, test: (v) => v.quads === 4 },
  { id: 'tenhou', name: 'Tenhou', multiple: 1, test: (v) => v.ctx.tenhou },
  { id: 'chiihou', name: 'Chiihou', multiple: 1, test: (v) => v.ctx.chiihou },
  { id: 'renhou', name: 'Renhou', multiple: 1, test: (v) => v.ctx.renhou },
];
