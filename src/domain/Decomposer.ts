import type { Tile } from './Tile';
import {
  ORPHANS, KIND_COUNT, baseTile, countKinds, indexToTile, rankOf, rankOfIndex, suitOfIndex, tileIndex,
} from './Tile';
import type { Meld, WinningHand } from './Hand';
import { HAND_SIZE, allTiles, isValidMeld } from './Hand';
import type { Decomposition, Group, StandardShape, WaitShape } from './Decomposition';
import { describeGroup } from './Decomposition';
import type { Result } from './errors';
import { fail, succeed } from './errors';

/** Far above what fourteen tiles can need; only malformed input gets near it. */
export const SEARCH_LIMIT = 20_000;

type SearchNode = {
  counts: number[];
  groups: Group[];
  parent: SearchNode | null;
  /** Complete partitions found below this node. */
  leaves: number;
};

type Step = { node: SearchNode; exit: boolean };

type Budget = { steps: number; limit: number };

function keyOf(counts: number[]): string {
  return counts.join('');
}

function meldToGroup(m: Meld): Group {
  const head = baseTile(m.tiles[0]);
  if (m.type === 'chi') {
    const lowest = m.tiles.map(baseTile).reduce((a, b) => (tileIndex(b) < tileIndex(a) ? b : a));
    return { kind: 'run', tile: lowest, concealed: false, declared: true };
  }
  if (m.type === 'pon') return { kind: 'triplet', tile: head, concealed: false, declared: true };
  return { kind: 'quad', tile: head, concealed: m.concealed, declared: true };
}

function runWait(start: Tile, win: Tile): WaitShape {
  const r = rankOf(start);
  const w = rankOf(win);
  if (w === r + 1) return 'kanchan';
  if (w === r) return r === 7 ? 'penchan' : 'ryanmen';
  return r === 1 ? 'penchan' : 'ryanmen';
}

function runContains(g: Group, t: Tile): boolean {
  const i = tileIndex(g.tile);
  const j = tileIndex(t);
  return j >= i && j <= i + 2;
}

/**
 * Enumerates every way a won hand can be read as a winning shape.
 *
 * Declared melds are fixed groups; only the concealed tiles are searched.
 */
export class Decomposer {
  static decompose(hand: WinningHand, limit = SEARCH_LIMIT): Result<Decomposition[]> {
    const problem = this.checkShape(hand);
    if (problem) return fail('InvalidHandShape', problem);

    const counts = countKinds(hand.concealed);
    const win = baseTile(hand.winningTile);

    const standard = this.standardShapes(counts, hand, win, { steps: 0, limit });
    if (!standard.ok) return standard;

    const out: Decomposition[] = [...standard.value];

    const sevenPairs = this.sevenPairs(counts, hand);
    if (sevenPairs) out.push(sevenPairs);

    const orphans = this.thirteenOrphans(counts, hand, win);
    if (orphans) out.push(orphans);

    if (out.length === 0) return fail('InvalidHandShape', 'Tiles do not form a winning shape');
    return succeed(out);
  }

  /** Structural preconditions; returns a message for the first one that fails. */
  static checkShape(hand: WinningHand): string | null {
    if (hand.melds.length > 4) return 'More than four declared melds';
    for (const m of hand.melds) {
      if (!isValidMeld(m)) return `Malformed ${m.type}: ${m.tiles.join(' ')}`;
    }
    const size = hand.concealed.length + 3 * hand.melds.length;
    if (size !== HAND_SIZE) return `Hand has ${size} tiles, expected ${HAND_SIZE}`;

    const win = baseTile(hand.winningTile);
    if (!hand.concealed.some((t) => baseTile(t) === win)) return 'Winning tile is not among the concealed tiles';

    const total = countKinds(allTiles(hand));
    const over = total.findIndex((c) => c > 4);
    if (over !== -1) return `More than four copies of ${indexToTile(over)}`;
    return null;
  }

  private static standardShapes(
    counts: number[],
    hand: WinningHand,
    win: Tile,
    budget: Budget,
  ): Result<StandardShape[]> {
    const fixed = hand.melds.map(meldToGroup);
    const shapes: StandardShape[] = [];
    const seen = new Set<string>();
    // remainders already shown to have no partition; shared across pair choices
    const dead = new Set<string>();

    for (let i = 0; i < KIND_COUNT; i++) {
      if ((counts[i] ?? 0) < 2) continue;
      const rest = counts.slice();
      rest[i] = (rest[i] ?? 0) - 2;
      const pair = indexToTile(i);

      const parts = this.partitions(rest, dead, budget);
      if (!parts) return fail('InvalidHandShape', 'Search limit exceeded');

      for (const part of parts) {
        for (const shape of this.placeWinningTile(fixed, part, pair, win)) {
          const key = this.shapeKey(shape);
          if (seen.has(key)) continue;
          seen.add(key);
          shapes.push(shape);
        }
      }
    }
    return succeed(shapes);
  }

  /**
   * All partitions of `start` into runs and triplets.
   *
   * Depth-first over an explicit stack. Only the lowest remaining tile is
   * branched on, so every remainder strictly shrinks. A node whose subtree
   * produced no partition has its remainder recorded in `dead`.
   * Returns null once the step budget is spent.
   */
  private static partitions(start: number[], dead: Set<string>, budget: Budget): Group[][] | null {
    const found: Group[][] = [];
    const root: SearchNode = { counts: start, groups: [], parent: null, leaves: 0 };
    const stack: Step[] = [{ node: root, exit: false }];

    for (let step = stack.pop(); step; step = stack.pop()) {
      const { node } = step;

      if (step.exit) {
        if (node.leaves === 0) dead.add(keyOf(node.counts));
        if (node.parent) node.parent.leaves += node.leaves;
        continue;
      }

      budget.steps += 1;
      if (budget.steps > budget.limit) return null;
      if (dead.has(keyOf(node.counts))) continue;

      const c = node.counts;
      const i = c.findIndex((v) => v > 0);
      if (i === -1) {
        found.push(node.groups);
        if (node.parent) node.parent.leaves += 1;
        continue;
      }

      stack.push({ node, exit: true });

      // pushed first, explored second
      if (suitOfIndex(i) !== 'z' && rankOfIndex(i) <= 7 && (c[i + 1] ?? 0) > 0 && (c[i + 2] ?? 0) > 0) {
        const next = c.slice();
        next[i] = (next[i] ?? 0) - 1;
        next[i + 1] = (next[i + 1] ?? 0) - 1;
        next[i + 2] = (next[i + 2] ?? 0) - 1;
        const run: Group = { kind: 'run', tile: indexToTile(i), concealed: true, declared: false };
        stack.push({ node: { counts: next, groups: [...node.groups, run], parent: node, leaves: 0 }, exit: false });
      }

      if ((c[i] ?? 0) >= 3) {
        const next = c.slice();
        next[i] = (next[i] ?? 0) - 3;
        const triplet: Group = { kind: 'triplet', tile: indexToTile(i), concealed: true, declared: false };
        stack.push({ node: { counts: next, groups: [...node.groups, triplet], parent: node, leaves: 0 }, exit: false });
      }
    }

    return found;
  }

  /** One shape per distinct spot the winning tile can occupy. */
  private static placeWinningTile(fixed: Group[], part: Group[], pair: Tile, win: Tile): StandardShape[] {
    const out: StandardShape[] = [];

    if (pair === win) {
      out.push({ shape: 'standard', groups: [...fixed, ...part.map((g) => ({ ...g }))], pair, wait: 'tanki', winningGroup: null });
    }

    part.forEach((g, idx) => {
      const hit = g.kind === 'run' ? runContains(g, win) : g.tile === win;
      if (!hit) return;
      const groups = [...fixed, ...part.map((x) => ({ ...x }))];
      const winningGroup = groups[fixed.length + idx] ?? null;
      const wait: WaitShape = g.kind === 'run' ? runWait(g.tile, win) : 'shanpon';
      out.push({ shape: 'standard', groups, pair, wait, winningGroup });
    });

    return out;
  }

  private static shapeKey(s: StandardShape): string {
    const groups = s.groups.map(describeGroup).sort().join(',');
    const winning = s.winningGroup ? describeGroup(s.winningGroup) : 'pair';
    return `${groups}|${s.pair}|${s.wait}|${winning}`;
  }

  private static sevenPairs(counts: number[], hand: WinningHand): Decomposition | null {
    if (hand.melds.length > 0) return null;
    const pairs: Tile[] = [];
    for (let i = 0; i < KIND_COUNT; i++) {
      const c = counts[i] ?? 0;
      if (c === 0) continue;
      // four of a kind is not two pairs
      if (c !== 2) return null;
      pairs.push(indexToTile(i));
    }
    return pairs.length === 7 ? { shape: 'sevenPairs', pairs } : null;
  }

  private static thirteenOrphans(counts: number[], hand: WinningHand, win: Tile): Decomposition | null {
    if (hand.melds.length > 0) return null;
    const orphanIdx = new Set(ORPHANS.map(tileIndex));
    let duplicate: Tile | null = null;

    for (let i = 0; i < KIND_COUNT; i++) {
      const c = counts[i] ?? 0;
      if (!orphanIdx.has(i)) {
        if (c > 0) return null;
        continue;
      }
      if (c === 0 || c > 2) return null;
      if (c === 2) {
        if (duplicate) return null;
        duplicate = indexToTile(i);
      }
    }
    if (!duplicate) return null;
    return { shape: 'thirteenOrphans', duplicate, thirteenWait: duplicate === win };
  }
}
