import { parseScoreRequest, toPublicResult } from '../src/net/dto';
import { fail } from '../src/domain/errors';

const hand = { concealed: '234m22567p345789s', winningTile: 'p5' };
const context = { seatWind: 'south', roundWind: 'east', method: 'ron' };

function message(body: unknown): string {
  const r = parseScoreRequest(body);
  if (r.ok) throw new Error('expected the request to be rejected');
  return r.message;
}

describe('parseScoreRequest', () => {
  it('accepts compact tile strings and fills context defaults', () => {
    const r = parseScoreRequest({ hand, context });
    expect(r.ok).toBe(true);
    if (!r.ok) return;
    expect(r.request.hand.concealed).toHaveLength(14);
    expect(r.request.hand.melds).toEqual([]);
    expect(r.request.context).toMatchObject({ dealer: false, riichi: 'none', honba: 0, doraIndicators: [] });
    expect(r.request.rule).toBeNull();
  });

  it('accepts tile arrays, melds and optional fields', () => {
    const r = parseScoreRequest({
      hand: {
        concealed: ['p2', 'p2', 'p5', 'p6', 'p7', 's3', 's4', 's5', 's7', 's8', 's9'],
        melds: [{ type: 'chi', tiles: '342m' }],
        winningTile: 'p5',
      },
      context: { ...context, riichi: true, honba: 1, doraIndicators: ['z4'] },
      rule: 'Single-Yakuman',
    });
    if (!r.ok) throw new Error(r.message);
    expect(r.request.hand.melds).toEqual([{ type: 'chi', tiles: ['m3', 'm4', 'm2'] }]);
    expect(r.request.context.riichi).toBe('riichi');
    expect(r.request.context.honba).toBe(1);
    expect(r.request.context.doraIndicators).toEqual(['z4']);
    expect(r.request.rule).toBe('single-yakuman');
  });

  it('reads a kan as open unless marked concealed', () => {
    const body = (concealed?: boolean) => ({
      hand: { concealed: '234m22567p345s', melds: [{ type: 'kan', tiles: '7777s', concealed }], winningTile: 'p5' },
      context,
    });
    const open = parseScoreRequest(body());
    const closed = parseScoreRequest(body(true));
    if (!open.ok || !closed.ok) throw new Error('expected both to parse');
    expect(open.request.hand.melds[0]).toEqual({ type: 'kan', tiles: ['s7', 's7', 's7', 's7'], concealed: false });
    expect(closed.request.hand.melds[0]).toEqual({ type: 'kan', tiles: ['s7', 's7', 's7', 's7'], concealed: true });
  });

  it('names the field that is wrong', () => {
    expect(message(null)).toBe('body: expected a JSON object');
    expect(message({ hand: { ...hand, concealed: ['m1', 'x9'] }, context }))
      .toBe('hand.concealed: unknown tile "x9"');
    expect(message({ hand: { ...hand, winningTile: 'z8' }, context }))
      .toBe('hand.winningTile: unknown tile "z8"');
    expect(message({ hand: { ...hand, melds: [{ type: 'chi', tiles: '124m' }] }, context }))
      .toBe('hand.melds[0]: malformed meld');
    expect(message({ hand: { ...hand, melds: [{ type: 'kan', tiles: '1111m', concealed: 1 }] }, context }))
      .toBe('hand.melds[0].concealed: expected a boolean');
    expect(message({ hand, context: { ...context, seatWind: 'up' } }))
      .toBe('context.seatWind: expected one of east, south, west, north');
    expect(message({ hand, context: { ...context, method: 'draw' } }))
      .toBe('context.method: expected "ron" or "tsumo"');
    expect(message({ hand, context: { ...context, ippatsu: 'yes' } }))
      .toBe('context.ippatsu: expected a boolean');
    expect(message({ hand, context: { ...context, riichi: 'triple' } }))
      .toBe('context.riichi: expected "none", "riichi" or "double"');
    expect(message({ hand, context: { ...context, honba: 1.5 } }))
      .toBe('context.honba: expected a non-negative integer');
    expect(message({ hand, context, rule: 'house' })).toBe('rule: unknown rule set "house"');
  });

  it('rejects a fifth copy of a tile', () => {
    expect(message({ hand: { concealed: '11111m234p234s111z', winningTile: 'm1' }, context }))
      .toBe('hand: more than four copies of m1');
  });

  it('allows one red five per suit and no more', () => {
    const one = parseScoreRequest({ hand: { concealed: '234m22067p345789s', winningTile: 'p0' }, context });
    expect(one.ok).toBe(true);

    expect(message({ hand: { concealed: '234m22007p345789s', winningTile: 'p0' }, context }))
      .toBe('hand: more than one red p5');
    expect(message({
      hand: { concealed: '0m2267p345789s', melds: [{ type: 'chi', tiles: '340m' }], winningTile: 'p7' },
      context,
    })).toBe('hand: more than one red m5');
  });
});

describe('toPublicResult', () => {
  it('passes errors through unchanged', () => {
    expect(toPublicResult(fail('NoYakuFound', 'none'))).toEqual({
      ok: false,
      error: { kind: 'NoYakuFound', message: 'none' },
    });
  });
});
