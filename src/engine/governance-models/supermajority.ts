import type { GovernanceModel } from './types.js';

/** Two thirds of supply, with the threshold rounded down. */
export class SupermajorityModel implements GovernanceModel {
  readonly name = 'supermajority';

  threshold(supply: number): number {
    return Math.floor((supply * 2) / 3);
  }

  passes(affirmative: number, supply: number): boolean {
    return affirmative >= this.threshold(supply);
  }

  summarize(affirmative: number, supply: number): string {
    const passed = this.passes(affirmative, supply);
    return `Supermajority (2/3): ${affirmative} of ${supply} (needs ${this.threshold(supply)}). ${passed ? 'Passed' : 'Not passed'}`;
  }
}
