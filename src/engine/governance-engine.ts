import type {
  Decision,
  Fraction,
  GovernanceModelName,
  LockRecord,
  NewFraction,
  NewFractionVote,
  NewProposal,
  OptionCount,
  Proposal,
  ProposalState,
  ProposalTally,
  VoteChoice,
  VoteRecord,
  VoteWeighting,
  VotingHistory,
} from '../shared/types.js';
import type { EventQuery, GovernanceEvent } from '../shared/events.js';
import type { AccessControl } from './access-control.js';
import type { BalanceLedger } from './balance-ledger.js';
import { SystemClock, type Clock } from './clock.js';
import { GovernanceError } from './errors.js';
import { EventLog, commit, type EventHandler } from './event-log.js';
import { createGovernanceModel } from './governance-models/index.js';
import { canPerform, proposalState, withinVotingWindow } from './lifecycle.js';
import { LockManager } from './locks.js';
import type { GovernanceStore } from './store.js';
import { decide, resultsOf } from './tally.js';

export interface EngineDefaults {
  shareClass: string;
  model: GovernanceModelName;
  weighting: VoteWeighting;
}

export interface GovernanceEngineOptions {
  store: GovernanceStore;
  ledger: BalanceLedger;
  access: AccessControl;
  clock?: Clock;
  defaults?: Partial<EngineDefaults>;
}

const FALLBACK_DEFAULTS: EngineDefaults = {
  shareClass: 'GOV',
  model: 'simple_majority',
  weighting: 'one_per_holder',
};

/**
 * Proposal store, vote ledger, tally engine and lifecycle controller behind
 * one facade.
 *
 * Every mutating method is synchronous and commits in a single store
 * transaction, so calls are applied one at a time and a failed call leaves
 * no trace. Validation runs before anything is written.
 */
export class GovernanceEngine {
  private store: GovernanceStore;
  private ledger: BalanceLedger;
  private access: AccessControl;
  private clock: Clock;
  private defaults: EngineDefaults;
  private events: EventLog;
  private locks: LockManager;

  constructor(opts: GovernanceEngineOptions) {
    this.store = opts.store;
    this.ledger = opts.ledger;
    this.access = opts.access;
    this.clock = opts.clock ?? new SystemClock();
    this.defaults = { ...FALLBACK_DEFAULTS, ...opts.defaults };
    this.events = new EventLog(this.store);
    this.locks = new LockManager(this.store, this.ledger, this.clock, this.events);
  }

  onEvent(handler: EventHandler): () => void {
    return this.events.subscribeAll(handler);
  }

  getEventLog(): EventLog {
    return this.events;
  }

  now(): number {
    return this.clock.now();
  }

  // ── Proposal store ──

  createProposal(caller: string, input: NewProposal): Proposal {
    this.authorize(caller, 'create proposals');
    const now = this.clock.now();
    const proposal = this.buildProposal(caller, input, null, now);

    commit(this.store, this.events, () => this.insertProposal(proposal, now));
    console.log(`[ENGINE] Proposal #${proposal.id} created by ${caller}, deadline ${proposal.deadline}`);
    return proposal;
  }

  openVoting(caller: string, id: number, votingStart: number): Proposal {
    this.authorize(caller, 'open voting');
    const proposal = this.requireProposal(id);
    this.assertCanOpen(proposal, votingStart);

    commit(this.store, this.events, () => this.markVotingOpen(proposal, votingStart));
    console.log(`[ENGINE] Voting on proposal #${id} opens at ${votingStart}`);
    return this.requireProposal(id);
  }

  getProposal(id: number): Proposal {
    return this.requireProposal(id);
  }

  listProposals(): Proposal[] {
    return this.store.listProposals();
  }

  getCurrentProposalCount(): number {
    return this.store.countProposals();
  }

  getProposalState(id: number): ProposalState {
    return proposalState(this.requireProposal(id), this.clock.now());
  }

  // ── Vote ledger ──

  castVote(proposalId: number, voter: string, choice: VoteChoice): VoteRecord {
    const proposal = this.requireProposal(proposalId);
    const now = this.clock.now();

    if (proposal.votingStart === null) {
      throw new GovernanceError('VotingNotStarted', `Voting on proposal #${proposalId} has not been opened`);
    }
    if (!withinVotingWindow(proposal, now)) {
      throw new GovernanceError(
        'VotingClosed',
        `Proposal #${proposalId} accepts votes from ${proposal.votingStart} to ${proposal.deadline}, now is ${now}`,
      );
    }
    if (this.store.getVote(proposalId, voter)) {
      throw new GovernanceError('AlreadyVoted', `${voter} has already voted on proposal #${proposalId}`);
    }
    const balance = this.ledger.balanceOf(voter, proposal.shareClass);
    if (balance <= 0) {
      throw new GovernanceError('NoVotingWeight', `${voter} holds no ${proposal.shareClass}`);
    }
    this.assertChoice(proposal, choice);

    const vote: VoteRecord = {
      proposalId,
      voter,
      choice,
      weight: proposal.weighting === 'balance' ? balance : 1,
      castAt: now,
    };

    return commit(this.store, this.events, () => {
      this.store.saveVote(vote);
      this.store.incrementTally(proposalId, choice, vote.weight);
      this.events.record({ kind: 'vote_cast', proposalId, voter, choice, weight: vote.weight }, now);
      return vote;
    });
  }

  getVoteRecord(proposalId: number, voter: string): VoteRecord | null {
    this.requireProposal(proposalId);
    return this.store.getVote(proposalId, voter);
  }

  listVoteRecords(proposalId: number): VoteRecord[] {
    this.requireProposal(proposalId);
    return this.store.listVotes(proposalId);
  }

  // ── Tally engine ──

  computeDecision(id: number, model: GovernanceModelName = this.defaults.model): Decision {
    const proposal = this.requireProposal(id);
    return decide(proposal, this.requireTally(id), createGovernanceModel(model));
  }

  getVotes(id: number, option: VoteChoice): number {
    const proposal = this.requireProposal(id);
    this.assertChoice(proposal, option);
    const tally = this.requireTally(id);
    if (option === true) return tally.yes;
    if (option === false) return tally.no;
    return tally.options.find((o) => o.option === option)?.count ?? 0;
  }

  getResults(id: number): OptionCount[] {
    const proposal = this.requireProposal(id);
    return resultsOf(proposal, this.requireTally(id));
  }

  getVotingHistory(id: number): VotingHistory {
    const proposal = this.requireProposal(id);
    if (proposal.finalTally) {
      return { ...proposal.finalTally, finalized: true };
    }
    const tally = this.requireTally(id);
    return { yes: tally.yes, no: tally.no, finalized: proposal.finalized };
  }

  // ── Lifecycle controller ──

  finalize(caller: string, id: number): Proposal {
    this.authorize(caller, 'finalize proposals');
    const proposal = this.requireProposal(id);
    if (proposal.finalized) {
      throw new GovernanceError('AlreadyFinalized', `Proposal #${id} is already finalized`);
    }
    const now = this.clock.now();
    if (!canPerform('finalize', proposalState(proposal, now))) {
      throw new GovernanceError('TooEarly', `Proposal #${id} can be finalized after ${proposal.deadline}, now is ${now}`);
    }

    const tally = this.requireTally(id);
    const finalTally = { yes: tally.yes, no: tally.no };
    commit(this.store, this.events, () => {
      this.store.updateProposal(id, { finalized: true, finalizedAt: now, finalTally });
      this.events.record({ kind: 'proposal_finalized', proposalId: id, ...finalTally }, now);
    });
    console.log(`[ENGINE] Proposal #${id} finalized (yes ${finalTally.yes}, no ${finalTally.no})`);
    return this.requireProposal(id);
  }

  // ── Fractions ──

  createFraction(caller: string, input: NewFraction): Fraction {
    this.authorize(caller, 'create fractions');
    const amount = this.ledger.totalMinted(input.shareClass);
    if (amount <= 0) {
      throw new GovernanceError('InvalidAmount', `Share class ${input.shareClass} has no minted supply`);
    }
    const now = this.clock.now();
    const fraction: Fraction = {
      id: this.store.nextFractionId(),
      assetId: input.assetId,
      shareClass: input.shareClass,
      owner: input.owner,
      amount,
      createdAt: now,
    };

    commit(this.store, this.events, () => {
      this.store.saveFraction(fraction);
      this.events.record({ kind: 'fraction_created', fractionId: fraction.id, assetId: fraction.assetId, amount }, now);
    });
    console.log(`[ENGINE] Fraction #${fraction.id} of asset ${fraction.assetId}: ${amount} ${fraction.shareClass}`);
    return fraction;
  }

  getFraction(id: number): Fraction {
    const fraction = this.store.getFraction(id);
    if (!fraction) throw new GovernanceError('NotFound', `Fraction not found: ${id}`);
    return fraction;
  }

  listFractions(): Fraction[] {
    return this.store.listFractions();
  }

  /**
   * Start a yes/no vote among a fraction's holders. One vote per holder,
   * measured against the fraction's minted amount.
   */
  openFractionVote(caller: string, fractionId: number, input: NewFractionVote): Proposal {
    this.authorize(caller, 'open fraction votes');
    const fraction = this.getFraction(fractionId);
    const now = this.clock.now();
    const proposal = this.buildProposal(
      caller,
      {
        description: input.description,
        deadline: input.deadline,
        shareClass: fraction.shareClass,
        weighting: 'one_per_holder',
        quorumBase: fraction.amount,
      },
      fraction.id,
      now,
    );
    const votingStart = input.votingStart;
    if (votingStart !== undefined) {
      this.assertCanOpen(proposal, votingStart);
    }

    commit(this.store, this.events, () => {
      this.insertProposal(proposal, now);
      if (votingStart !== undefined) this.markVotingOpen(proposal, votingStart);
    });
    console.log(`[ENGINE] Proposal #${proposal.id} opened for fraction #${fraction.id}`);
    return this.requireProposal(proposal.id);
  }

  // ── Locked balances ──

  lockTokens(holder: string, shareClass: string, amount: number, unlockAt: number): LockRecord {
    return this.locks.lock(holder, shareClass, amount, unlockAt);
  }

  unlockTokens(holder: string, shareClass: string, amount?: number): LockRecord | null {
    return this.locks.unlock(holder, shareClass, amount);
  }

  getLock(holder: string, shareClass: string): LockRecord | null {
    return this.locks.getLock(holder, shareClass);
  }

  /** Re-apply persisted locks as ledger holds after the ledger is reseeded. */
  restoreLocks(): LockRecord[] {
    return this.locks.restoreHolds();
  }

  // ── Events ──

  listEvents(query?: EventQuery): GovernanceEvent[] {
    return this.store.listEvents(query);
  }

  // ── Helpers ──

  private authorize(caller: string, action: string): void {
    if (!this.access.isAuthorized(caller)) {
      throw new GovernanceError('Unauthorized', `${caller} is not allowed to ${action}`);
    }
  }

  private requireProposal(id: number): Proposal {
    const proposal = this.store.getProposal(id);
    if (!proposal) throw new GovernanceError('NotFound', `Proposal not found: ${id}`);
    return proposal;
  }

  private requireTally(id: number): ProposalTally {
    const tally = this.store.getTally(id);
    if (!tally) throw new GovernanceError('NotFound', `Tally not found for proposal: ${id}`);
    return tally;
  }

  private buildProposal(caller: string, input: NewProposal, fractionId: number | null, now: number): Proposal {
    if (!Number.isSafeInteger(input.deadline) || input.deadline <= now) {
      throw new GovernanceError('InvalidDeadline', `Deadline ${input.deadline} is not after ${now}`);
    }
    const options = input.options ? this.normalizeOptions(input.options) : null;
    const shareClass = input.shareClass ?? this.defaults.shareClass;
    const weighting = input.weighting ?? this.defaults.weighting;
    // Baseline is counted in the same unit as vote weight
    const supplyBaseline = input.quorumBase ?? (weighting === 'balance'
      ? this.ledger.totalMinted(shareClass)
      : this.ledger.holderCount(shareClass));
    if (!Number.isSafeInteger(supplyBaseline) || supplyBaseline <= 0) {
      throw new GovernanceError('InvalidAmount', `Supply baseline for ${shareClass} must be positive, got ${supplyBaseline}`);
    }

    return {
      id: this.store.nextProposalId(),
      creator: caller,
      description: input.description,
      options,
      shareClass,
      fractionId,
      weighting,
      supplyBaseline,
      createdAt: now,
      votingStart: null,
      deadline: input.deadline,
      finalized: false,
      finalizedAt: null,
      finalTally: null,
    };
  }

  private normalizeOptions(options: string[]): string[] {
    const trimmed = options.map((o) => o.trim());
    if (trimmed.length < 2) {
      throw new GovernanceError('InvalidOption', 'A multi-option proposal needs at least two options');
    }
    if (trimmed.some((o) => o.length === 0)) {
      throw new GovernanceError('InvalidOption', 'Options must not be blank');
    }
    if (new Set(trimmed).size !== trimmed.length) {
      throw new GovernanceError('InvalidOption', 'Options must be unique');
    }
    return trimmed;
  }

  private insertProposal(proposal: Proposal, now: number): void {
    this.store.saveProposal(proposal);
    this.events.record(
      { kind: 'proposal_created', proposalId: proposal.id, description: proposal.description, deadline: proposal.deadline },
      now,
    );
  }

  private assertCanOpen(proposal: Proposal, votingStart: number): void {
    // Zero marks a proposal that was never opened
    if (!Number.isSafeInteger(votingStart) || votingStart <= 0) {
      throw new GovernanceError('InvalidWindow', `Voting start must be a positive time, got ${votingStart}`);
    }
    if (votingStart >= proposal.deadline) {
      throw new GovernanceError(
        'InvalidWindow',
        `Voting start ${votingStart} must be before the deadline ${proposal.deadline}`,
      );
    }
    const state = proposalState(proposal, this.clock.now());
    if (!canPerform('open_voting', state)) {
      throw new GovernanceError('InvalidWindow', `Cannot open voting on proposal #${proposal.id} in state ${state}`);
    }
  }

  private markVotingOpen(proposal: Proposal, votingStart: number): void {
    this.store.updateProposal(proposal.id, { votingStart });
    this.events.record({ kind: 'voting_started', proposalId: proposal.id, start: votingStart }, this.clock.now());
  }

  private assertChoice(proposal: Proposal, choice: VoteChoice): void {
    if (proposal.options === null) {
      if (typeof choice !== 'boolean') {
        throw new GovernanceError('InvalidOption', `Proposal #${proposal.id} takes a yes/no vote`);
      }
      return;
    }
    if (typeof choice !== 'string' || !proposal.options.includes(choice)) {
      throw new GovernanceError(
        'InvalidOption',
        `"${String(choice)}" is not an option of proposal #${proposal.id} (${proposal.options.join(', ')})`,
      );
    }
  }
}
