import {
  baseTile, doraFromIndicator, indexToTile, isGreen, parseTiles, rankOf, sortTiles, tileIndex,
} from '../src/domain/Tile';

describe('tiles', () => {
  it('parses both compact notations', () => {
    expect(parseTiles('123m456p')).toEqual(['m1', 'm2', 'm3', 'p4', 'p5', 'p6']);
    expect(parseTiles('m123p456')).toEqual(['m1', 'm2', 'm3', 'p4', 'p5', 'p6']);
    expect(parseTiles('11z 9s')).toEqual(['z1', 'z1', 's9']);
  });

  it('rejects unknown characters, dangling ranks and missing honors', () => {
    expect(parseTiles('123')).toBeNull();
    expect(parseTiles('8z')).toBeNull();
    expect(parseTiles('12x')).toBeNull();
  });

  it('treats a red five as the plain five', () => {
    expect(parseTiles('0m')).toEqual(['m0']);
    expect(baseTile('m0')).toBe('m5');
    expect(rankOf('p0')).toBe(5);
    expect(tileIndex('s0')).toBe(tileIndex('s5'));
    expect(sortTiles(['m6', 'm0', 'm5', 'm4'])).toEqual(['m4', 'm5', 'm0', 'm6']);
  });

  it('maps indices back to tiles', () => {
    expect(indexToTile(0)).toBe('m1');
    expect(indexToTile(17)).toBe('p9');
    expect(indexToTile(33)).toBe('z7');
    expect(() => indexToTile(34)).toThrow('bad index');
  });

  it('follows dora indicators around each cycle', () => {
    expect(doraFromIndicator('m9')).toBe('m1');
    expect(doraFromIndicator('p0')).toBe('p6');
    expect(doraFromIndicator('z3')).toBe('z4');
    expect(doraFromIndicator('z4')).toBe('z1');
    expect(doraFromIndicator('z5')).toBe('z6');
    expect(doraFromIndicator('z7')).toBe('z5');
  });

  it('knows the all-green tiles', () => {
    expect(isGreen('s6')).toBe(true);
    expect(isGreen('z6')).toBe(true);
    expect(isGreen('s5')).toBe(false);
    expect(isGreen('p2')).toBe(false);
  });
});
