import type { GovernanceModelName } from '../../shared/types.js';
import type { GovernanceModel } from './types.js';
import { SimpleMajorityModel } from './simple-majority.js';
import { SupermajorityModel } from './supermajority.js';
import { ConsensusModel } from './consensus.js';

export type { GovernanceModel } from './types.js';

export function createGovernanceModel(name: GovernanceModelName = 'simple_majority'): GovernanceModel {
  switch (name) {
    case 'simple_majority':
      return new SimpleMajorityModel();
    case 'supermajority':
      return new SupermajorityModel();
    case 'consensus':
      return new ConsensusModel();
  }
}

export { SimpleMajorityModel, SupermajorityModel, ConsensusModel };
