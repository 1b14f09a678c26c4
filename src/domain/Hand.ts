import type { Tile, Wind } from './Tile';
import { baseTile, rankOf, suitOf } from './Tile';

export type Meld =
  | { type: 'chi'; tiles: [Tile, Tile, Tile] }
  | { type: 'pon'; tiles: [Tile, Tile, Tile] }
  | { type: 'kan'; tiles: [Tile, Tile, Tile, Tile]; concealed: boolean };

/**
 * A won hand.
 *
 * - `concealed` holds every tile not in a declared meld, the winning tile included.
 * - A kan counts as three toward the fourteen tiles, so
 *   `concealed.length + 3 * melds.length === 14`.
 */
export type WinningHand = {
  concealed: Tile[];
  melds: Meld[];
  winningTile: Tile;
};

export type WinMethod = 'ron' | 'tsumo';
export type RiichiKind = 'none' | 'riichi' | 'double';

export type WinContext = {
  seatWind: Wind;
  roundWind: Wind;
  dealer: boolean;
  riichi: RiichiKind;
  ippatsu: boolean;
  method: WinMethod;
  haitei: boolean;
  houtei: boolean;
  rinshan: boolean;
  chankan: boolean;
  tenhou: boolean;
  chiihou: boolean;
  renhou: boolean;
  doraIndicators: Tile[];
  uraDoraIndicators: Tile[];
  honba: number;
};

export const HAND_SIZE = 14;

/** Defaults for every flag; only winds, dealer and method have no sensible default. */
export function makeContext(
  init: Pick<WinContext, 'seatWind' | 'roundWind' | 'method'> & Partial<WinContext>,
): WinContext {
  return {
    dealer: init.seatWind === 'east',
    riichi: 'none',
    ippatsu: false,
    haitei: false,
    houtei: false,
    rinshan: false,
    chankan: false,
    tenhou: false,
    chiihou: false,
    renhou: false,
    doraIndicators: [],
    uraDoraIndicators: [],
    honba: 0,
    ...init,
  };
}

/** No calls other than concealed kans. */
export function isMenzen(hand: WinningHand): boolean {
  return hand.melds.every((m) => m.type === 'kan' && m.concealed);
}

/** Every physical tile, kans counted with four. */
export function allTiles(hand: WinningHand): Tile[] {
  return [...hand.concealed, ...hand.melds.flatMap((m) => m.tiles)];
}

export function isValidMeld(m: Meld): boolean {
  const ts = m.tiles.map(baseTile);
  const first = ts[0];
  if (!first) return false;

  if (m.type === 'pon' || m.type === 'kan') {
    const size = m.type === 'pon' ? 3 : 4;
    return ts.length === size && ts.every((t) => t === first);
  }

  // chi: three consecutive ranks of one number suit, in any order
  if (ts.length !== 3) return false;
  const suit = suitOf(first);
  if (suit === 'z' || ts.some((t) => suitOf(t) !== suit)) return false;
  const ranks = ts.map(rankOf).sort((a, b) => a - b);
  return ranks[1] === (ranks[0] ?? 0) + 1 && ranks[2] === (ranks[0] ?? 0) + 2;
}
