import type { GovernanceModel } from './types.js';

export class ConsensusModel implements GovernanceModel {
  readonly name = 'consensus';

  threshold(supply: number): number {
    return supply;
  }

  passes(affirmative: number, supply: number): boolean {
    return affirmative === supply;
  }

  summarize(affirmative: number, supply: number): string {
    return `Consensus: ${affirmative} of ${supply}. ${this.passes(affirmative, supply) ? 'Unanimous' : 'Not unanimous'}`;
  }
}
