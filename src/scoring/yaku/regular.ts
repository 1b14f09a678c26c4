import { DRAGONS, isHonor, isSimple, isTerminalOrHonor, makeTile, windTile } from '../../domain/Tile';
import type { YakuRule, YakuView } from './types';
import {
  allGroupsOutside, hasRunIn, hasSetOf, identicalRunPairs, numberSuits, valueConditions,
} from './common';

/**
 * Regular yaku, evaluated independently against one view.
 *
 * Pairs that can never both apply are written as disjoint predicates:
 * riichi/double riichi, iipeikou/ryanpeikou, chanta/junchan/honroutou,
 * honitsu/chinitsu.
 */

const standard = (v: YakuView) => v.shape.shape === 'standard';
const sevenPairs = (v: YakuView) => v.shape.shape === 'sevenPairs';
const tsumo = (v: YakuView) => v.ctx.method === 'tsumo';

function pinfu(v: YakuView): boolean {
  if (v.shape.shape !== 'standard' || !v.menzen) return false;
  if (v.runs.length !== 4) return false;
  if (v.pair === null || valueConditions(v.pair, v.ctx) > 0) return false;
  return v.shape.wait === 'ryanmen';
}

function sanshoku(v: YakuView): boolean {
  for (let r = 1; r <= 7; r++) {
    if (hasRunIn(v.runs, 'm', r) && hasRunIn(v.runs, 'p', r) && hasRunIn(v.runs, 's', r)) return true;
  }
  return false;
}

function ittsu(v: YakuView): boolean {
  return (['m', 'p', 's'] as const).some(
    (s) => hasRunIn(v.runs, s, 1) && hasRunIn(v.runs, s, 4) && hasRunIn(v.runs, s, 7),
  );
}

function sanshokuDoukou(v: YakuView): boolean {
  for (let r = 1; r <= 9; r++) {
    if ((['m', 'p', 's'] as const).every((s) => hasSetOf(v, makeTile(s, r)))) return true;
  }
  return false;
}

function shousangen(v: YakuView): boolean {
  if (!v.pair || !DRAGONS.includes(v.pair)) return false;
  return v.sets.filter((g) => DRAGONS.includes(g.tile)).length === 2;
}

function honroutou(v: YakuView): boolean {
  // all-terminal and all-honor hands are yakuman
  return v.tiles.every(isTerminalOrHonor) && v.tiles.some(isHonor) && !v.tiles.every(isHonor);
}

function singleSuit(v: YakuView, withHonors: boolean): boolean {
  if (numberSuits(v.tiles).size !== 1) return false;
  return v.tiles.some(isHonor) === withHonors;
}

export const REGULAR_YAKU: YakuRule[] = [
  { id: 'riichi', name: 'Riichi', han: 1, openHan: null, test: (v) => v.ctx.riichi === 'riichi' },
  { id: 'doubleRiichi', name: 'Double riichi', han: 2, openHan: null, test: (v) => v.ctx.riichi === 'double' },
  { id: 'ippatsu', name: 'Ippatsu', han: 1, openHan: null, test: (v) => v.ctx.ippatsu },
  { id: 'menzenTsumo', name: 'Menzen tsumo', han: 1, openHan: null, test: (v) => v.menzen && tsumo(v) },
  { id: 'pinfu', name: 'Pinfu', han: 1, openHan: null, test: pinfu },
  {
    id: 'tanyao', name: 'Tanyao', han: 1, openHan: 1,
    test: (v) => (v.menzen || v.rule.openTanyao) && v.tiles.every(isSimple),
  },
  { id: 'iipeikou', name: 'Iipeikou', han: 1, openHan: null, test: (v) => identicalRunPairs(v.runs) === 1 },
  { id: 'ryanpeikou', name: 'Ryanpeikou', han: 3, openHan: null, test: (v) => identicalRunPairs(v.runs) === 2 },
  { id: 'haitei', name: 'Haitei raoyue', han: 1, openHan: 1, test: (v) => v.ctx.haitei && tsumo(v) },
  { id: 'houtei', name: 'Houtei raoyui', han: 1, openHan: 1, test: (v) => v.ctx.houtei && !tsumo(v) },
  { id: 'rinshan', name: 'Rinshan kaihou', han: 1, openHan: 1, test: (v) => v.ctx.rinshan },
  { id: 'chankan', name: 'Chankan', han: 1, openHan: 1, test: (v) => v.ctx.chankan },
  { id: 'yakuhaiWhite', name: 'Yakuhai (white dragon)', han: 1, openHan: 1, test: (v) => hasSetOf(v, 'z5') },
  { id: 'yakuhaiGreen', name: 'Yakuhai (green dragon)', han: 1, openHan: 1, test: (v) => hasSetOf(v, 'z6') },
  { id: 'yakuhaiRed', name: 'Yakuhai (red dragon)', han: 1, openHan: 1, test: (v) => hasSetOf(v, 'z7') },
  {
    id: 'yakuhaiSeatWind', name: 'Yakuhai (seat wind)', han: 1, openHan: 1,
    test: (v) => hasSetOf(v, windTile(v.ctx.seatWind)),
  },
  {
    id: 'yakuhaiRoundWind', name: 'Yakuhai (round wind)', han: 1, openHan: 1,
    test: (v) => hasSetOf(v, windTile(v.ctx.roundWind)),
  },
  { id: 'sanshoku', name: 'Sanshoku doujun', han: 2, openHan: 1, test: sanshoku },
  { id: 'ittsu', name: 'Ittsu', han: 2, openHan: 1, test: ittsu },
  {
    id: 'chanta', name: 'Chanta', han: 2, openHan: 1,
    test: (v) => v.runs.length > 0 && v.tiles.some(isHonor) && allGroupsOutside(v, true),
  },
  {
    id: 'junchan', name: 'Junchan', han: 3, openHan: 2,
    test: (v) => v.runs.length > 0 && allGroupsOutside(v, false),
  },
  { id: 'toitoi', name: 'Toitoi', han: 2, openHan: 2, test: (v) => standard(v) && v.sets.length === 4 },
  { id: 'sanankou', name: 'Sanankou', han: 2, openHan: 2, test: (v) => v.concealedSets === 3 },
  { id: 'sanshokuDoukou', name: 'Sanshoku doukou', han: 2, openHan: 2, test: sanshokuDoukou },
  { id: 'sankantsu', name: 'Sankantsu', han: 2, openHan: 2, test: (v) => v.quads === 3 },
  { id: 'shousangen', name: 'Shousangen', han: 2, openHan: 2, test: shousangen },
  { id: 'honroutou', name: 'Honroutou', han: 2, openHan: 2, test: honroutou },
  { id: 'honitsu', name: 'Honitsu', han: 3, openHan: 2, test: (v) => singleSuit(v, true) },
  { id: 'chinitsu', name: 'Chinitsu', han: 6, openHan: 5, test: (v) => singleSuit(v, false) },
  { id: 'chiitoitsu', name: 'Chiitoitsu', han: 2, openHan: null, test: sevenPairs },
];
