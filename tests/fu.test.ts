import { Decomposer } from '../src/domain/Decomposer';
import type { Decomposition } from '../src/domain/Decomposition';
import type { WinContext, WinningHand } from '../src/domain/Hand';
import { makeContext } from '../src/domain/Hand';
import { computeFu } from '../src/scoring/fu';
import { evaluate } from '../src/scoring/yaku/evaluator';
import { getRule } from '../src/rules/RuleRegistry';
import { PINFU, chi, hand, kan } from './helpers';

const rule = getRule('standard');

function fuOf(h: WinningHand, ctx: WinContext, pick: (d: Decomposition) => boolean = () => true): number {
  const shapes = Decomposer.decompose(h);
  if (!shapes.ok) throw new Error(shapes.error.message);
  const d = shapes.value.find(pick);
  if (!d) throw new Error('no matching decomposition');
  return computeFu(d, ctx, evaluate(d, h, ctx, rule));
}

const ron = makeContext({ seatWind: 'south', roundWind: 'east', method: 'ron' });
const tsumo = makeContext({ seatWind: 'south', roundWind: 'east', method: 'tsumo' });

describe('computeFu', () => {
  it('gives a closed pinfu ron 30', () => {
    expect(fuOf(hand(PINFU, 'p5'), ron)).toBe(30);
  });

  it('gives a pinfu tsumo exactly 20', () => {
    expect(fuOf(hand(PINFU, 'p5'), tsumo)).toBe(20);
  });

  it('gives seven pairs exactly 25', () => {
    expect(fuOf(hand('112233m445566p77s', 's7'), ron, (d) => d.shape === 'sevenPairs')).toBe(25);
  });

  it('raises an open hand with nothing on it to 30', () => {
    expect(fuOf(hand('234p66p345567s', 's3', [chi('m234')]), ron)).toBe(30);
  });

  it('adds 2 per value condition on the pair', () => {
    // 20 + 10 (closed ron) + 4 (double east pair) = 34 -> 40
    const dealerRon = makeContext({ seatWind: 'east', roundWind: 'east', method: 'ron' });
    expect(fuOf(hand('234m567p345678s11z', 'm2'), dealerRon)).toBe(40);
  });

  it('scores quads at four times their triplet value', () => {
    // 20 + 32 (closed white kan) + 8 (open 2m kan) + 2 (tanki) = 62 -> 70
    const h = hand('234p567s99p', 'p9', [kan('z5', true), kan('m2', false)]);
    expect(fuOf(h, ron)).toBe(70);
  });

  it('scores the shanpon triplet open on ron and closed on tsumo', () => {
    const h = hand('111222333m55p789s', 'm3');
    const triplets = (d: Decomposition) => d.shape === 'standard' && d.wait === 'shanpon';
    // 20 + 10 + 8 (m1) + 4 (m2) + 2 (m3 by ron) = 44 -> 50
    expect(fuOf(h, ron, triplets)).toBe(50);
    // 20 + 2 + 8 + 4 + 4 = 38 -> 40
    expect(fuOf(h, tsumo, triplets)).toBe(40);
  });
});
