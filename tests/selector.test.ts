import type { Tile } from '../src/domain/Tile';
import type { HandValue } from '../src/scoring/payment';
import type { Candidate } from '../src/scoring/selector';
import { selectBest } from '../src/scoring/selector';

function candidate(pair: Tile, value: HandValue, base: number): Candidate {
  const han = value.kind === 'yakuman' ? 13 * value.multiple : value.han;
  const fu = value.kind === 'yakuman' ? 0 : value.fu;
  return {
    shape: { shape: 'sevenPairs', pairs: [pair] },
    yaku: { yaku: [], yakuman: value.kind === 'yakuman' ? value.multiple : 0, dora: { dora: 0, aka: 0, ura: 0 } },
    han,
    fu,
    value,
    base,
  };
}

function pick(cs: Candidate[]): Tile | undefined {
  const r = selectBest(cs);
  if (!r.ok) throw new Error(r.error.message);
  return r.value.shape.shape === 'sevenPairs' ? r.value.shape.pairs[0] : undefined;
}

describe('selectBest', () => {
  const low = candidate('m1', { kind: 'regular', han: 2, fu: 30 }, 480);
  const sameBaseMoreHan = candidate('m2', { kind: 'regular', han: 3, fu: 30 }, 960);
  const sameBaseMoreFu = candidate('m3', { kind: 'regular', han: 2, fu: 60 }, 960);
  const kazoe = candidate('m4', { kind: 'regular', han: 14, fu: 40 }, 8000);
  const yakuman = candidate('m5', { kind: 'yakuman', multiple: 1 }, 8000);

  it('prefers the higher base points', () => {
    expect(pick([low, sameBaseMoreFu])).toBe('m3');
  });

  it('breaks equal base points on han before fu', () => {
    expect(pick([sameBaseMoreFu, sameBaseMoreHan])).toBe('m2');
  });

  it('ranks any yakuman above a counted hand', () => {
    expect(pick([kazoe, yakuman])).toBe('m5');
  });

  it('does not depend on candidate order', () => {
    const all = [low, sameBaseMoreHan, sameBaseMoreFu, kazoe, yakuman];
    expect(pick(all)).toBe(pick(all.slice().reverse()));
    const tied = [candidate('p9', low.value, 480), candidate('p1', low.value, 480)];
    expect(pick(tied)).toBe('p1');
    expect(pick(tied.slice().reverse())).toBe('p1');
  });

  it('reports NoYakuFound on no candidates', () => {
    const r = selectBest([]);
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error.kind).toBe('NoYakuFound');
  });
});
