import type { Tile } from '../../domain/Tile';
import type { Decomposition, Group } from '../../domain/Decomposition';
import type { WinContext } from '../../domain/Hand';
import type { RuleStrategy } from '../../rules/RuleStrategy';

export type RegularYakuId =
  | 'riichi' | 'doubleRiichi' | 'ippatsu' | 'menzenTsumo' | 'pinfu' | 'tanyao'
  | 'iipeikou' | 'ryanpeikou' | 'haitei' | 'houtei' | 'rinshan' | 'chankan'
  | 'yakuhaiWhite' | 'yakuhaiGreen' | 'yakuhaiRed' | 'yakuhaiSeatWind' | 'yakuhaiRoundWind'
  | 'sanshoku' | 'ittsu' | 'chanta' | 'junchan' | 'toitoi' | 'sanankou'
  | 'sanshokuDoukou' | 'sankantsu' | 'shousangen' | 'honroutou'
  | 'honitsu' | 'chinitsu' | 'chiitoitsu';

export type YakumanId =
  | 'kokushi' | 'kokushi13' | 'suuankou' | 'suuankouTanki' | 'daisangen'
  | 'shousuushii' | 'daisuushii' | 'tsuuiisou' | 'chinroutou' | 'ryuuiisou'
  | 'chuuren' | 'junseiChuuren' | 'suukantsu' | 'tenhou' | 'chiihou' | 'renhou';

export type DoraId = 'dora' | 'akaDora' | 'uraDora';

export type YakuId = RegularYakuId | YakumanId | DoraId;

export type YakuHit = {
  id: YakuId;
  name: string;
  /** Yakuman report 13 per multiple. */
  han: number;
};

export type DoraCount = { dora: number; aka: number; ura: number };

export type YakuResult = {
  /** Yakuman only when `yakuman > 0`; never includes dora. */
  yaku: YakuHit[];
  /** Combined yakuman multiple, 0 when none fired. */
  yakuman: number;
  dora: DoraCount;
};

/**
 * What every yaku predicate reads. Built once per decomposition.
 *
 * For shapes other than standard, `groups` is empty and `pair` is null.
 */
export type YakuView = {
  shape: Decomposition;
  ctx: WinContext;
  rule: RuleStrategy;
  menzen: boolean;
  /** Every tile of the hand with red flags stripped, kans with four. */
  tiles: Tile[];
  win: Tile;
  groups: Group[];
  pair: Tile | null;
  /** Lowest tile of every run. */
  runs: Tile[];
  /** Triplets and quads. */
  sets: Group[];
  /** Triplets/quads still concealed after the win; a triplet completed by ron does not count. */
  concealedSets: number;
  quads: number;
};

export type YakuRule = {
  id: RegularYakuId;
  name: string;
  han: number;
  /** null: concealed hands only. */
  openHan: number | null;
  test: (v: YakuView) => boolean;
};

export type YakumanRule = {
  id: YakumanId;
  name: string;
  /** 2 for the double variants; the rule set may cap it at 1. */
  multiple: 1 | 2;
  test: (v: YakuView) => boolean;
};
