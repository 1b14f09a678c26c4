export type Suit = 'm' | 'p' | 's' | 'z';
export type Tile = `${Suit}${number}`; // m/p/s:1-9 (0 = red five), z:1-7

/** 34 tile kinds: 9 manzu, 9 pinzu, 9 souzu, 7 honors. */
export const KIND_COUNT = 34;

export type Wind = 'east' | 'south' | 'west' | 'north';

export const WINDS: Wind[] = ['east', 'south', 'west', 'north'];

export const DRAGONS: Tile[] = ['z5', 'z6', 'z7']; // white, green, red

export function isTile(t: string): t is Tile {
  return /^(?:[mps][0-9]|z[1-7])$/.test(t);
}

export function suitOf(t: Tile): Suit {
  const s = t[0];
  if (s === 'm' || s === 'p' || s === 's' || s === 'z') return s;
  throw new Error(`bad tile: ${t}`);
}

/** Red fives report rank 5. */
export function rankOf(t: Tile): number {
  const n = Number(t.slice(1));
  return n === 0 ? 5 : n;
}

export function isRedFive(t: Tile): boolean {
  return t.slice(1) === '0';
}

/** Strips the red flag: `m0` → `m5`. */
export function baseTile(t: Tile): Tile {
  return isRedFive(t) ? makeTile(suitOf(t), 5) : t;
}

export function makeTile(suit: Suit, rank: number): Tile {
  return `${suit}${rank}`;
}

export function tileIndex(t: Tile): number {
  const suit = suitOf(t);
  const n = rankOf(t);
  if (suit === 'm') return 0 + (n - 1);
  if (suit === 'p') return 9 + (n - 1);
  if (suit === 's') return 18 + (n - 1);
  return 27 + (n - 1);
}

export function indexToTile(i: number): Tile {
  if (!Number.isInteger(i) || i < 0 || i >= KIND_COUNT) throw new Error('bad index');
  if (i < 9) return `m${i + 1}`;
  if (i < 18) return `p${i - 9 + 1}`;
  if (i < 27) return `s${i - 18 + 1}`;
  return `z${i - 27 + 1}`;
}

export function suitOfIndex(i: number): Suit {
  if (i < 9) return 'm';
  if (i < 18) return 'p';
  if (i < 27) return 's';
  return 'z';
}

export function rankOfIndex(i: number): number {
  if (i < 27) return (i % 9) + 1;
  return i - 27 + 1;
}

export function isHonor(t: Tile): boolean {
  return suitOf(t) === 'z';
}

export function isTerminal(t: Tile): boolean {
  if (isHonor(t)) return false;
  const r = rankOf(t);
  return r === 1 || r === 9;
}

export function isTerminalOrHonor(t: Tile): boolean {
  return isHonor(t) || isTerminal(t);
}

export function isSimple(t: Tile): boolean {
  return !isTerminalOrHonor(t);
}

export function isWindTile(t: Tile): boolean {
  return isHonor(t) && rankOf(t) <= 4;
}

export function windTile(w: Wind): Tile {
  return makeTile('z', WINDS.indexOf(w) + 1);
}

/** 2s 3s 4s 6s 8s and green dragon. */
export function isGreen(t: Tile): boolean {
  if (t === 'z6') return true;
  if (suitOf(t) !== 's') return false;
  const r = rankOf(t);
  return r === 2 || r === 3 || r === 4 || r === 6 || r === 8;
}

/** The 13 terminal and honor kinds, in index order. */
export const ORPHANS: Tile[] = [
  'm1', 'm9', 'p1', 'p9', 's1', 's9',
  'z1', 'z2', 'z3', 'z4', 'z5', 'z6', 'z7',
];

/** Tile a dora indicator points at: 9 wraps to 1, north to east, red to white. */
export function doraFromIndicator(indicator: Tile): Tile {
  const t = baseTile(indicator);
  const suit = suitOf(t);
  const n = rankOf(t);
  if (suit !== 'z') return makeTile(suit, n === 9 ? 1 : n + 1);
  if (n <= 4) return makeTile('z', n === 4 ? 1 : n + 1);
  return makeTile('z', n === 7 ? 5 : n + 1);
}

export function countKinds(tiles: Tile[]): number[] {
  const counts = new Array<number>(KIND_COUNT).fill(0);
  for (const t of tiles) {
    const idx = tileIndex(t);
    counts[idx] = (counts[idx] ?? 0) + 1;
  }
  return counts;
}

export function compareTiles(a: Tile, b: Tile): number {
  return tileIndex(a) - tileIndex(b) || Number(isRedFive(a)) - Number(isRedFive(b));
}

export function sortTiles(tiles: Tile[]): Tile[] {
  return tiles.slice().sort(compareTiles);
}

/**
 * Parses compact notation: ranks followed by their suit letter, either
 * `123m456p` or `m123p456`. Whitespace is ignored.
 * Returns null on any unknown character or out-of-range rank.
 */
export function parseTiles(text: string): Tile[] | null {
  const src = text.replace(/\s+/g, '');
  if (src.length === 0) return [];

  const suitFirst = /^[mpsz]/.test(src);
  const out: Tile[] = [];
  let pending: string[] = [];
  let suit: Suit | null = null;

  for (const ch of src) {
    if (ch === 'm' || ch === 'p' || ch === 's' || ch === 'z') {
      if (suitFirst) {
        suit = ch;
        continue;
      }
      if (pending.length === 0) return null;
      for (const d of pending) out.push(makeTile(ch, Number(d)));
      pending = [];
      continue;
    }
    if (!/[0-9]/.test(ch)) return null;
    if (suitFirst) {
      if (!suit) return null;
      out.push(makeTile(suit, Number(ch)));
    } else {
      pending.push(ch);
    }
  }
  if (pending.length > 0) return null;
  return out.every((t) => isTile(t)) ? out : null;
}
