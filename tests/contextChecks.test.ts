import type { WinContext } from '../src/domain/Hand';
import { makeContext } from '../src/domain/Hand';
import { checkContext } from '../src/rules/contextChecks';
import { PINFU, chi, hand, kan } from './helpers';

const closed = hand(PINFU, 'p5');
const open = hand('22567p345789s', 'p5', [chi('m234')]);

function ctx(init: Partial<WinContext>): WinContext {
  return makeContext({ seatWind: 'south', roundWind: 'east', method: 'ron', ...init });
}

describe('checkContext', () => {
  it('accepts an ordinary win', () => {
    expect(checkContext(closed, ctx({}))).toEqual({ ok: true });
  });

  it.each<[string, Partial<WinContext>, string]>([
    ['ippatsu alone', { ippatsu: true }, 'Ippatsu requires riichi'],
    ['haitei on ron', { haitei: true }, 'Haitei (last draw) must be a tsumo win'],
    ['houtei on tsumo', { houtei: true, method: 'tsumo' }, 'Houtei (last discard) must be a ron win'],
    ['rinshan on ron', { rinshan: true }, 'Rinshan (kan replacement draw) must be a tsumo win'],
    ['chankan on tsumo', { chankan: true, method: 'tsumo' }, 'Chankan (robbing a kan) must be a ron win'],
    ['rinshan without a kan', { rinshan: true, method: 'tsumo' }, 'Rinshan requires a declared kan'],
    ['a dealer in the south seat', { dealer: true }, 'Dealer flag disagrees with seat wind'],
    ['tenhou and chiihou', { tenhou: true, chiihou: true, method: 'tsumo' }, 'Only one of tenhou, chiihou, renhou can apply'],
    ['tenhou for a non-dealer', { tenhou: true, method: 'tsumo' }, 'Tenhou must be a dealer tsumo'],
    ['renhou on tsumo', { renhou: true, method: 'tsumo' }, 'Renhou must be a non-dealer ron'],
    ['chiihou after riichi', { chiihou: true, method: 'tsumo', riichi: 'riichi' }, 'First-turn wins cannot follow riichi'],
    ['negative honba', { honba: -1 }, 'Honba must be a non-negative integer'],
  ])('rejects %s', (_label, init, reason) => {
    expect(checkContext(closed, ctx(init))).toEqual({ ok: false, reason });
  });

  it('rejects riichi on an open hand', () => {
    expect(checkContext(open, ctx({ riichi: 'riichi' }))).toEqual({
      ok: false,
      reason: 'Riichi cannot be declared with open melds',
    });
  });

  it('allows riichi with a concealed kan', () => {
    const withKan = hand('234m22567p345s', 'p5', [kan('s7', true)]);
    expect(checkContext(withKan, ctx({ riichi: 'riichi' }))).toEqual({ ok: true });
  });

  it('rejects first-turn wins after a call', () => {
    expect(checkContext(open, ctx({ renhou: true }))).toEqual({
      ok: false,
      reason: 'First-turn wins cannot have any calls',
    });
  });
});
