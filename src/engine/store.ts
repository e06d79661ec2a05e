import type {
  Fraction,
  LockRecord,
  Proposal,
  ProposalLifecycleUpdate,
  ProposalTally,
  VoteChoice,
  VoteRecord,
} from '../shared/types.js';
import type { EventQuery, GovernanceEvent, GovernanceEventKind } from '../shared/events.js';

export const DEFAULT_EVENT_LIMIT = 100;

/**
 * Persistence interface for the governance engine.
 * Implemented in memory (engine/memory-store) and by the database layer.
 *
 * Proposals, votes, fractions and events are append-only; only the
 * lifecycle fields of a proposal, its tally counters and lock records change.
 */
export interface GovernanceStore {
  /** Run `fn` atomically: every write inside it lands, or none does. */
  transaction<T>(fn: () => T): T;

  nextProposalId(): number;
  /** Also creates the proposal's zeroed tally. */
  saveProposal(proposal: Proposal): void;
  updateProposal(id: number, updates: ProposalLifecycleUpdate): void;
  getProposal(id: number): Proposal | null;
  listProposals(): Proposal[];
  countProposals(): number;

  getTally(proposalId: number): ProposalTally | null;
  incrementTally(proposalId: number, choice: VoteChoice, weight: number): void;

  saveVote(vote: VoteRecord): void;
  getVote(proposalId: number, voter: string): VoteRecord | null;
  listVotes(proposalId: number): VoteRecord[];

  nextFractionId(): number;
  saveFraction(fraction: Fraction): void;
  getFraction(id: number): Fraction | null;
  listFractions(): Fraction[];

  getLock(holder: string, shareClass: string): LockRecord | null;
  saveLock(lock: LockRecord): void;
  deleteLock(holder: string, shareClass: string): void;
  listLocks(): LockRecord[];

  appendEvent(event: GovernanceEvent): void;
  lastSequence(kind: GovernanceEventKind): number;
  listEvents(query?: EventQuery): GovernanceEvent[];
}

export function voteKey(proposalId: number, voter: string): string {
  return JSON.stringify([proposalId, voter]);
}

export function lockKey(holder: string, shareClass: string): string {
  return JSON.stringify([holder, shareClass]);
}
