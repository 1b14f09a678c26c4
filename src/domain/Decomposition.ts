import type { Tile } from './Tile';
import { makeTile, rankOf, suitOf } from './Tile';

export type WaitShape = 'ryanmen' | 'kanchan' | 'penchan' | 'tanki' | 'shanpon';

/**
 * One group of a standard shape.
 * - run: `tile` is the lowest tile of the sequence
 * - `declared` marks groups that came from a called or kan'd meld
 */
export type Group = {
  kind: 'run' | 'triplet' | 'quad';
  tile: Tile;
  concealed: boolean;
  declared: boolean;
};

export type StandardShape = {
  shape: 'standard';
  groups: Group[];
  pair: Tile;
  wait: WaitShape;
  /** Group completed by the winning tile; null when the pair was. */
  winningGroup: Group | null;
};

export type SevenPairsShape = {
  shape: 'sevenPairs';
  pairs: Tile[];
};

export type ThirteenOrphansShape = {
  shape: 'thirteenOrphans';
  duplicate: Tile;
  /** The duplicate was the winning tile, i.e. the hand waited on all thirteen. */
  thirteenWait: boolean;
};

export type Decomposition = StandardShape | SevenPairsShape | ThirteenOrphansShape;

export function groupTiles(g: Group): Tile[] {
  if (g.kind === 'run') {
    const suit = suitOf(g.tile);
    const r = rankOf(g.tile);
    return [g.tile, makeTile(suit, r + 1), makeTile(suit, r + 2)];
  }
  const n = g.kind === 'quad' ? 4 : 3;
  return new Array<Tile>(n).fill(g.tile);
}

export function isSetGroup(g: Group): boolean {
  return g.kind === 'triplet' || g.kind === 'quad';
}

export function describeGroup(g: Group): string {
  const tiles = groupTiles(g).join('');
  return g.concealed ? tiles : `(${tiles})`;
}

export function describeShape(d: Decomposition): string {
  if (d.shape === 'standard') {
    return [...d.groups.map(describeGroup), `${d.pair}${d.pair}`].join(' ');
  }
  if (d.shape === 'sevenPairs') return d.pairs.map((p) => `${p}${p}`).join(' ');
  return `kokushi+${d.duplicate}`;
}
