import type { GovernanceModel } from './types.js';

export class SimpleMajorityModel implements GovernanceModel {
  readonly name = 'simple_majority';

  threshold(supply: number): number {
    return Math.floor(supply / 2) + 1;
  }

  // Strictly more than half; a tie fails
  passes(affirmative: number, supply: number): boolean {
    return affirmative > Math.floor(supply / 2);
  }

  summarize(affirmative: number, supply: number): string {
    const passed = this.passes(affirmative, supply);
    return `Simple majority: ${affirmative} of ${supply} (needs ${this.threshold(supply)}). ${passed ? 'Passed' : 'Not passed'}`;
  }
}
