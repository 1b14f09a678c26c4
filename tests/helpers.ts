import type { Tile } from '../src/domain/Tile';
import { parseTiles } from '../src/domain/Tile';
import type { Meld, WinningHand } from '../src/domain/Hand';

export function tiles(text: string): Tile[] {
  const out = parseTiles(text);
  if (!out) throw new Error(`bad tiles: ${text}`);
  return out;
}

export function tile(text: string): Tile {
  const [t, ...rest] = tiles(text);
  if (!t || rest.length > 0) throw new Error(`expected one tile: ${text}`);
  return t;
}

export function chi(text: string): Meld {
  const [a, b, c] = tiles(text);
  if (!a || !b || !c) throw new Error(`bad chi: ${text}`);
  return { type: 'chi', tiles: [a, b, c] };
}

export function pon(text: string): Meld {
  const t = tile(text);
  return { type: 'pon', tiles: [t, t, t] };
}

export function kan(text: string, concealed: boolean): Meld {
  const t = tile(text);
  return { type: 'kan', tiles: [t, t, t, t], concealed };
}

export function hand(concealed: string, winningTile: string, melds: Meld[] = []): WinningHand {
  return { concealed: tiles(concealed), melds, winningTile: tile(winningTile) };
}

/** m234 p567 s345 s789 + p22; winning on 5p completes 67p on both sides. */
export const PINFU = '234m22567p345789s';
