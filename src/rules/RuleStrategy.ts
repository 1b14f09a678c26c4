/**
 * Table-rule strategy interface.
 *
 * Notes:
 * - Every switch here changes scoring only; hand shapes and yaku
 *   definitions are shared by all rule sets.
 * - `combineYakuman` receives one multiple per yakuman that fired under a
 *   single reading of the hand.
 */
export interface RuleStrategy {
  /** Stable id used for config/request selection. */
  readonly id: string;
  /** Display name (for UI / debugging). */
  readonly name: string;

  /** Thirteen-sided kokushi, single-wait suuankou and true nine gates count twice. */
  readonly doubleYakuman: boolean;
  /** 13+ han without a yakuman scores as yakuman; otherwise it stops at sanbaiman. */
  readonly kazoeYakuman: boolean;
  /** 4 han 30 fu and 3 han 60 fu round up to mangan. */
  readonly kiriageMangan: boolean;
  /** Tanyao is allowed with called melds. */
  readonly openTanyao: boolean;

  combineYakuman(multiples: number[]): number;
}
