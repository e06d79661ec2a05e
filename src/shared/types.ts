// ── Core domain types for sharevote ──

export type ProposalState = 'created' | 'voting_open' | 'closed' | 'finalized';

export type GovernanceModelName = 'simple_majority' | 'supermajority' | 'consensus';

export type VoteWeighting = 'one_per_holder' | 'balance';

/** `true`/`false` on binary proposals, a declared option on multi-option ones. */
export type VoteChoice = boolean | string;

// ── Proposals ──

export interface FrozenTally {
  yes: number;
  no: number;
}

export interface Proposal {
  id: number;
  creator: string;
  description: string;
  options: string[] | null; // null = binary yes/no
  shareClass: string;
  fractionId: number | null;
  weighting: VoteWeighting;
  supplyBaseline: number;
  createdAt: number;
  votingStart: number | null;
  deadline: number;
  finalized: boolean;
  finalizedAt: number | null;
  finalTally: FrozenTally | null;
}

export type ProposalLifecycleUpdate = Partial<
  Pick<Proposal, 'votingStart' | 'finalized' | 'finalizedAt' | 'finalTally'>
>;

export interface OptionCount {
  option: string;
  count: number;
}

export interface ProposalTally {
  proposalId: number;
  yes: number;
  no: number;
  options: OptionCount[];
}

export interface NewProposal {
  description: string;
  options?: string[];
  deadline: number;
  shareClass?: string;
  weighting?: VoteWeighting;
  quorumBase?: number;
}

// ── Votes ──

export interface VoteRecord {
  proposalId: number;
  voter: string;
  choice: VoteChoice;
  weight: number;
  castAt: number;
}

export interface VotingHistory {
  yes: number;
  no: number;
  finalized: boolean;
}

// ── Fractions ──

export interface Fraction {
  id: number;
  assetId: string;
  shareClass: string;
  owner: string;
  amount: number;
  createdAt: number;
}

export interface NewFraction {
  assetId: string;
  shareClass: string;
  owner: string;
}

export interface NewFractionVote {
  description: string;
  deadline: number;
  votingStart?: number;
}

// ── Locks ──

export interface LockRecord {
  holder: string;
  shareClass: string;
  amount: number;
  unlockAt: number;
  lockedAt: number;
}

// ── Decisions ──

export interface Decision {
  proposalId: number;
  model: GovernanceModelName;
  affirmative: number;
  negative: number;
  supplyBaseline: number;
  threshold: number;
  passed: boolean;
  results: OptionCount[];
  winningOption: string | null;
  summary: string;
}

// ── Config ──

export interface ShareClassSeed {
  id: string;
  holders: Record<string, number>;
}

export interface ApiTokenConfig {
  identity: string;
  token: string;
}

export interface GovernanceDefaults {
  share_class: string;
  model: GovernanceModelName;
  weighting: VoteWeighting;
}

export interface GovernanceConfig {
  version: string;
  governance: {
    name: string;
    description: string;
    operators: string[];
    defaults: GovernanceDefaults;
    api_tokens: ApiTokenConfig[];
    ledger: {
      share_classes: ShareClassSeed[];
    };
  };
}
