import type { RuleStrategy } from './RuleStrategy';

/**
 * Conservative club rules: a hand is worth at most one yakuman.
 *
 * - no double yakuman, simultaneous yakuman do not stack
 * - 13+ han stops at sanbaiman
 * - kiriage mangan on
 * - no open tanyao (kuitan nashi)
 */
export class SingleYakumanRule implements RuleStrategy {
  readonly id = 'single-yakuman';
  readonly name = 'Single yakuman (no stacking, kiriage, no open tanyao)';

  readonly doubleYakuman = false;
  readonly kazoeYakuman = false;
  readonly kiriageMangan = true;
  readonly openTanyao = false;

  combineYakuman(multiples: number[]): number {
    return multiples.length > 0 ? Math.min(1, Math.max(...multiples)) : 0;
  }
}
