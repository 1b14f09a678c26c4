import type { Tile, Wind } from '../domain/Tile';
import { WINDS, countKinds, indexToTile, isTile, makeTile, parseTiles } from '../domain/Tile';
import type { Meld, RiichiKind, WinContext, WinMethod, WinningHand } from '../domain/Hand';
import { allTiles, isValidMeld, makeContext } from '../domain/Hand';
import type { Result, ScoringError } from '../domain/errors';
import { hasRule } from '../rules/RuleRegistry';
import type { ScoreBreakdown } from '../scoring/score';

export type ScoreRequest = {
  hand: WinningHand;
  context: WinContext;
  /** null: the server's configured rule set. */
  rule: string | null;
};

export type ParseResult = { ok: true; request: ScoreRequest } | { ok: false; message: string };

export type PublicResult =
  | { ok: true; result: ScoreBreakdown }
  | { ok: false; error: ScoringError };

type Parsed<T> = { ok: true; value: T } | { ok: false; message: string };

function bad<T>(message: string): Parsed<T> {
  return { ok: false, message };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Accepts `['m1', 'm2']` or compact `'m12'` / `'12m'`. */
function readTiles(v: unknown, field: string): Parsed<Tile[]> {
  if (typeof v === 'string') {
    const tiles = parseTiles(v);
    return tiles ? { ok: true, value: tiles } : bad(`${field}: cannot parse "${v}"`);
  }
  if (!Array.isArray(v)) return bad(`${field}: expected a tile list`);
  const out: Tile[] = [];
  for (const t of v) {
    if (typeof t !== 'string' || !isTile(t)) return bad(`${field}: unknown tile ${JSON.stringify(t)}`);
    out.push(t);
  }
  return { ok: true, value: out };
}

function readTile(v: unknown, field: string): Parsed<Tile> {
  if (typeof v === 'string' && isTile(v)) return { ok: true, value: v };
  return bad(`${field}: unknown tile ${JSON.stringify(v)}`);
}

function readMeld(v: unknown, field: string): Parsed<Meld> {
  if (!isRecord(v)) return bad(`${field}: expected an object`);
  const tiles = readTiles(v.tiles, `${field}.tiles`);
  if (!tiles.ok) return tiles;

  const [a, b, c, d, ...rest] = tiles.value;
  const { type, concealed } = v;
  let meld: Meld | null = null;
  if (type === 'chi' && a && b && c && !d) {
    meld = { type: 'chi', tiles: [a, b, c] };
  } else if (type === 'pon' && a && b && c && !d) {
    meld = { type: 'pon', tiles: [a, b, c] };
  } else if (type === 'kan' && a && b && c && d && rest.length === 0) {
    if (concealed !== undefined && typeof concealed !== 'boolean') return bad(`${field}.concealed: expected a boolean`);
    meld = { type: 'kan', tiles: [a, b, c, d], concealed: concealed === true };
  }
  if (!meld || !isValidMeld(meld)) return bad(`${field}: malformed meld`);
  return { ok: true, value: meld };
}

function readHand(v: unknown): Parsed<WinningHand> {
  if (!isRecord(v)) return bad('hand: expected an object');

  const concealed = readTiles(v.concealed, 'hand.concealed');
  if (!concealed.ok) return concealed;
  const winningTile = readTile(v.winningTile, 'hand.winningTile');
  if (!winningTile.ok) return winningTile;

  const melds: Meld[] = [];
  const rawMelds = v.melds ?? [];
  if (!Array.isArray(rawMelds)) return bad('hand.melds: expected a list');
  for (let i = 0; i < rawMelds.length; i++) {
    const m = readMeld(rawMelds[i], `hand.melds[${i}]`);
    if (!m.ok) return m;
    melds.push(m.value);
  }

  const hand: WinningHand = { concealed: concealed.value, melds, winningTile: winningTile.value };
  const over = countKinds(allTiles(hand)).findIndex((n) => n > 4);
  if (over !== -1) return bad(`hand: more than four copies of ${indexToTile(over)}`);
  // a set holds one red five per number suit
  for (const suit of ['m', 'p', 's'] as const) {
    const red = makeTile(suit, 0);
    if (allTiles(hand).filter((t) => t === red).length > 1) return bad(`hand: more than one red ${suit}5`);
  }
  return { ok: true, value: hand };
}

function readWind(v: unknown, field: string): Parsed<Wind> {
  const w = WINDS.find((x) => x === v);
  return w ? { ok: true, value: w } : bad(`${field}: expected one of ${WINDS.join(', ')}`);
}

const FLAGS = [
  'dealer', 'ippatsu', 'haitei', 'houtei', 'rinshan', 'chankan', 'tenhou', 'chiihou', 'renhou',
] as const;

function readContext(v: unknown): Parsed<WinContext> {
  if (!isRecord(v)) return bad('context: expected an object');

  const seatWind = readWind(v.seatWind, 'context.seatWind');
  if (!seatWind.ok) return seatWind;
  const roundWind = readWind(v.roundWind, 'context.roundWind');
  if (!roundWind.ok) return roundWind;

  const rawMethod = v.method;
  const method: WinMethod | null = rawMethod === 'ron' || rawMethod === 'tsumo' ? rawMethod : null;
  if (!method) return bad('context.method: expected "ron" or "tsumo"');

  const ctx = makeContext({ seatWind: seatWind.value, roundWind: roundWind.value, method });

  for (const f of FLAGS) {
    const flag = v[f];
    if (flag === undefined) continue;
    if (typeof flag !== 'boolean') return bad(`context.${f}: expected a boolean`);
    ctx[f] = flag;
  }

  const rawRiichi = v.riichi;
  if (rawRiichi !== undefined) {
    const riichi: RiichiKind | null =
      rawRiichi === true ? 'riichi'
        : rawRiichi === false ? 'none'
          : rawRiichi === 'none' || rawRiichi === 'riichi' || rawRiichi === 'double' ? rawRiichi
            : null;
    if (!riichi) return bad('context.riichi: expected "none", "riichi" or "double"');
    ctx.riichi = riichi;
  }

  for (const f of ['doraIndicators', 'uraDoraIndicators'] as const) {
    if (v[f] === undefined) continue;
    const tiles = readTiles(v[f], `context.${f}`);
    if (!tiles.ok) return tiles;
    ctx[f] = tiles.value;
  }

  const honba = v.honba;
  if (honba !== undefined) {
    if (typeof honba !== 'number' || !Number.isInteger(honba) || honba < 0) {
      return bad('context.honba: expected a non-negative integer');
    }
    ctx.honba = honba;
  }

  return { ok: true, value: ctx };
}

/** Validates a `{ hand, context, rule? }` body; nothing malformed reaches the engine. */
export function parseScoreRequest(body: unknown): ParseResult {
  if (!isRecord(body)) return { ok: false, message: 'body: expected a JSON object' };

  const hand = readHand(body.hand);
  if (!hand.ok) return hand;
  const context = readContext(body.context);
  if (!context.ok) return context;

  const rawRule = body.rule;
  let rule: string | null = null;
  if (rawRule !== undefined && rawRule !== null) {
    if (typeof rawRule !== 'string' || !hasRule(rawRule)) {
      return { ok: false, message: `rule: unknown rule set ${JSON.stringify(rawRule)}` };
    }
    rule = rawRule.trim().toLowerCase();
  }

  return { ok: true, request: { hand: hand.value, context: context.value, rule } };
}

export function toPublicResult(result: Result<ScoreBreakdown>): PublicResult {
  return result.ok ? { ok: true, result: result.value } : { ok: false, error: result.error };
}
