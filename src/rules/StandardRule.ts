import type { RuleStrategy } from './RuleStrategy';

/**
 * Common modern online rules.
 *
 * - double yakuman on, distinct yakuman add up
 * - kazoe yakuman on
 * - open tanyao on, no kiriage mangan
 */
export class StandardRule implements RuleStrategy {
  readonly id = 'standard';
  readonly name = 'Standard (double yakuman, kazoe)';

  readonly doubleYakuman = true;
  readonly kazoeYakuman = true;
  readonly kiriageMangan = false;
  readonly openTanyao = true;

  combineYakuman(multiples: number[]): number {
    return multiples.reduce((a, m) => a + m, 0);
  }
}
