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
import { DEFAULT_EVENT_LIMIT, lockKey, voteKey, type GovernanceStore } from './store.js';

type Undo = () => void;

function copyProposal(p: Proposal): Proposal {
  return {
    ...p,
    options: p.options ? [...p.options] : null,
    finalTally: p.finalTally ? { ...p.finalTally } : null,
  };
}

function copyTally(t: ProposalTally): ProposalTally {
  return { ...t, options: t.options.map((o) => ({ ...o })) };
}

/**
 * Map-backed store. Writes made inside `transaction` are journalled and
 * undone in reverse order if the callback throws.
 */
export class MemoryStore implements GovernanceStore {
  private proposals = new Map<number, Proposal>();
  private tallies = new Map<number, ProposalTally>();
  private votes = new Map<string, VoteRecord>();
  private votesByProposal = new Map<number, VoteRecord[]>();
  private fractions = new Map<number, Fraction>();
  private locks = new Map<string, LockRecord>();
  private events: GovernanceEvent[] = [];
  private sequences = new Map<GovernanceEventKind, number>();
  private proposalCounter = 0;
  private fractionCounter = 0;
  private journal: Undo[] | null = null;

  transaction<T>(fn: () => T): T {
    // Nested calls join the outer transaction
    if (this.journal) return fn();

    const journal: Undo[] = [];
    this.journal = journal;
    try {
      return fn();
    } catch (err) {
      for (let i = journal.length - 1; i >= 0; i--) {
        journal[i]();
      }
      throw err;
    } finally {
      this.journal = null;
    }
  }

  private record(undo: Undo): void {
    this.journal?.push(undo);
  }

  // ── Proposals ──

  nextProposalId(): number {
    return this.proposalCounter + 1;
  }

  saveProposal(proposal: Proposal): void {
    const previousCounter = this.proposalCounter;
    this.proposals.set(proposal.id, copyProposal(proposal));
    this.tallies.set(proposal.id, {
      proposalId: proposal.id,
      yes: 0,
      no: 0,
      options: (proposal.options ?? []).map((option) => ({ option, count: 0 })),
    });
    this.proposalCounter = Math.max(this.proposalCounter, proposal.id);
    this.record(() => {
      this.proposals.delete(proposal.id);
      this.tallies.delete(proposal.id);
      this.proposalCounter = previousCounter;
    });
  }

  updateProposal(id: number, updates: ProposalLifecycleUpdate): void {
    const current = this.proposals.get(id);
    if (!current) return;
    this.proposals.set(id, copyProposal({ ...current, ...updates }));
    this.record(() => this.proposals.set(id, current));
  }

  getProposal(id: number): Proposal | null {
    const p = this.proposals.get(id);
    return p ? copyProposal(p) : null;
  }

  listProposals(): Proposal[] {
    return [...this.proposals.values()].sort((a, b) => a.id - b.id).map(copyProposal);
  }

  countProposals(): number {
    return this.proposals.size;
  }

  // ── Tallies ──

  getTally(proposalId: number): ProposalTally | null {
    const t = this.tallies.get(proposalId);
    return t ? copyTally(t) : null;
  }

  incrementTally(proposalId: number, choice: VoteChoice, weight: number): void {
    const current = this.tallies.get(proposalId);
    if (!current) return;
    const next = copyTally(current);
    if (choice === true) {
      next.yes += weight;
    } else if (choice === false) {
      next.no += weight;
    } else {
      const slot = next.options.find((o) => o.option === choice);
      if (!slot) return;
      slot.count += weight;
    }
    this.tallies.set(proposalId, next);
    this.record(() => this.tallies.set(proposalId, current));
  }

  // ── Votes ──

  saveVote(vote: VoteRecord): void {
    const key = voteKey(vote.proposalId, vote.voter);
    if (this.votes.has(key)) {
      throw new Error(`Duplicate vote record for ${vote.voter} on proposal ${vote.proposalId}`);
    }
    this.votes.set(key, { ...vote });
    const list = this.votesByProposal.get(vote.proposalId) ?? [];
    list.push({ ...vote });
    this.votesByProposal.set(vote.proposalId, list);
    this.record(() => {
      this.votes.delete(key);
      list.pop();
    });
  }

  getVote(proposalId: number, voter: string): VoteRecord | null {
    const v = this.votes.get(voteKey(proposalId, voter));
    return v ? { ...v } : null;
  }

  listVotes(proposalId: number): VoteRecord[] {
    return (this.votesByProposal.get(proposalId) ?? []).map((v) => ({ ...v }));
  }

  // ── Fractions ──

  nextFractionId(): number {
    return this.fractionCounter + 1;
  }

  saveFraction(fraction: Fraction): void {
    const previousCounter = this.fractionCounter;
    this.fractions.set(fraction.id, { ...fraction });
    this.fractionCounter = Math.max(this.fractionCounter, fraction.id);
    this.record(() => {
      this.fractions.delete(fraction.id);
      this.fractionCounter = previousCounter;
    });
  }

  getFraction(id: number): Fraction | null {
    const f = this.fractions.get(id);
    return f ? { ...f } : null;
  }

  listFractions(): Fraction[] {
    return [...this.fractions.values()].sort((a, b) => a.id - b.id).map((f) => ({ ...f }));
  }

  // ── Locks ──

  getLock(holder: string, shareClass: string): LockRecord | null {
    const lock = this.locks.get(lockKey(holder, shareClass));
    return lock ? { ...lock } : null;
  }

  saveLock(lock: LockRecord): void {
    const key = lockKey(lock.holder, lock.shareClass);
    const previous = this.locks.get(key);
    this.locks.set(key, { ...lock });
    this.record(() => {
      if (previous) this.locks.set(key, previous);
      else this.locks.delete(key);
    });
  }

  deleteLock(holder: string, shareClass: string): void {
    const key = lockKey(holder, shareClass);
    const previous = this.locks.get(key);
    if (!previous) return;
    this.locks.delete(key);
    this.record(() => this.locks.set(key, previous));
  }

  listLocks(): LockRecord[] {
    return [...this.locks.values()].map((l) => ({ ...l }));
  }

  // ── Events ──

  appendEvent(event: GovernanceEvent): void {
    const previousSeq = this.sequences.get(event.kind);
    this.events.push({ ...event });
    this.sequences.set(event.kind, Math.max(previousSeq ?? 0, event.seq));
    this.record(() => {
      this.events.pop();
      if (previousSeq === undefined) this.sequences.delete(event.kind);
      else this.sequences.set(event.kind, previousSeq);
    });
  }

  lastSequence(kind: GovernanceEventKind): number {
    return this.sequences.get(kind) ?? 0;
  }

  listEvents(query: EventQuery = {}): GovernanceEvent[] {
    const { kind, afterSeq, limit = DEFAULT_EVENT_LIMIT } = query;
    return this.events
      .filter((e) => (kind === undefined || e.kind === kind) && (afterSeq === undefined || e.seq > afterSeq))
      .slice(0, limit)
      .map((e) => ({ ...e }));
  }
}
