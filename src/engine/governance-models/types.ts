import type { GovernanceModelName } from '../../shared/types.js';

export interface GovernanceModel {
  readonly name: GovernanceModelName;
  /** Smallest affirmative weight that passes against `supply`. */
  threshold(supply: number): number;
  passes(affirmative: number, supply: number): boolean;
  summarize(affirmative: number, supply: number): string;
}
