import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { GovernanceEngine } from '@/engine/governance-engine.js';
import { MemoryStore } from '@/engine/memory-store.js';
import { InMemoryBalanceLedger } from '@/engine/balance-ledger.js';
import { OperatorAccessControl } from '@/engine/access-control.js';
import { ManualClock } from '@/engine/clock.js';
import { GovernanceError, type GovernanceErrorCode } from '@/engine/errors.js';
import type { GovernanceEvent } from '@/shared/events.js';
import type { ProposalLifecycleUpdate, VoteChoice } from '@/shared/types.js';

const START = 1_000;

/** MemoryStore that can be told to fail a write. */
class FlakyStore extends MemoryStore {
  failing: 'incrementTally' | 'updateProposal' | null = null;

  incrementTally(proposalId: number, choice: VoteChoice, weight: number): void {
    if (this.failing === 'incrementTally') throw new Error('write failed');
    super.incrementTally(proposalId, choice, weight);
  }

  updateProposal(id: number, updates: ProposalLifecycleUpdate): void {
    if (this.failing === 'updateProposal') throw new Error('write failed');
    super.updateProposal(id, updates);
  }
}

function setup(holders: Record<string, number> = { alice: 1, bob: 1, carol: 1 }) {
  const clock = new ManualClock(START);
  const store = new FlakyStore();
  const ledger = InMemoryBalanceLedger.fromSeed([{ id: 'GOV', holders }]);
  const engine = new GovernanceEngine({
    store,
    ledger,
    access: new OperatorAccessControl(['ops']),
    clock,
  });
  return { clock, store, ledger, engine };
}

function expectCode(fn: () => unknown, code: GovernanceErrorCode): void {
  try {
    fn();
  } catch (err) {
    if (!(err instanceof GovernanceError)) throw err;
    expect(err.code).toBe(code);
    return;
  }
  throw new Error(`Expected ${code}, nothing was thrown`);
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ── End to end ──

describe('binary proposal lifecycle', () => {
  it('runs create, open, vote and finalize', () => {
    const { clock, engine } = setup();

    const proposal = engine.createProposal('ops', { description: 'Upgrade Treasury', deadline: START + 1000 });
    expect(proposal.id).toBe(1);
    expect(proposal.supplyBaseline).toBe(3);
    expect(engine.getProposalState(1)).toBe('created');

    engine.openVoting('ops', 1, START + 10);
    clock.set(START + 10);
    engine.castVote(1, 'alice', true);
    engine.castVote(1, 'bob', true);
    engine.castVote(1, 'carol', false);

    expect(engine.getVotingHistory(1)).toEqual({ yes: 2, no: 1, finalized: false });
    expectCode(() => engine.finalize('ops', 1), 'TooEarly');

    clock.set(START + 1001);
    expect(engine.getProposalState(1)).toBe('closed');
    const finalized = engine.finalize('ops', 1);
    expect(finalized.finalized).toBe(true);
    expect(finalized.finalizedAt).toBe(START + 1001);
    expect(finalized.finalTally).toEqual({ yes: 2, no: 1 });
    expect(engine.getVotingHistory(1)).toEqual({ yes: 2, no: 1, finalized: true });
    expect(engine.getProposalState(1)).toBe('finalized');

    const decision = engine.computeDecision(1);
    expect(decision.passed).toBe(true);
    expect(decision.threshold).toBe(2);
  });
});

// ── Proposal store ──

describe('createProposal', () => {
  it('assigns sequential ids', () => {
    const { engine } = setup();
    engine.createProposal('ops', { description: 'A', deadline: START + 10 });
    const second = engine.createProposal('ops', { description: 'B', deadline: START + 10 });
    expect(second.id).toBe(2);
    expect(engine.getCurrentProposalCount()).toBe(2);
    expect(engine.listProposals().map((p) => p.description)).toEqual(['A', 'B']);
  });

  it('rejects callers that are not operators', () => {
    const { engine } = setup();
    expectCode(() => engine.createProposal('alice', { description: 'A', deadline: START + 10 }), 'Unauthorized');
    expect(engine.getCurrentProposalCount()).toBe(0);
  });

  it('rejects a deadline that is not in the future', () => {
    const { engine } = setup();
    expectCode(() => engine.createProposal('ops', { description: 'A', deadline: START }), 'InvalidDeadline');
  });

  it('fixes the supply baseline at creation', () => {
    const { engine, ledger } = setup();
    engine.createProposal('ops', { description: 'A', deadline: START + 10 });
    ledger.mint('dave', 'GOV', 100);
    expect(engine.getProposal(1).supplyBaseline).toBe(3);
    expect(engine.computeDecision(1).supplyBaseline).toBe(3);
  });

  it('counts holders as the baseline when each holder has one vote', () => {
    const { engine } = setup({ alice: 60, bob: 40 });
    const proposal = engine.createProposal('ops', { description: 'A', deadline: START + 100 });
    expect(proposal.weighting).toBe('one_per_holder');
    expect(proposal.supplyBaseline).toBe(2);

    engine.openVoting('ops', 1, START);
    engine.castVote(1, 'alice', true);
    engine.castVote(1, 'bob', true);
    expect(engine.computeDecision(1)).toMatchObject({ affirmative: 2, supplyBaseline: 2, threshold: 2, passed: true });
    expect(engine.computeDecision(1, 'consensus').passed).toBe(true);
  });

  it('uses minted supply as the baseline for balance-weighted proposals', () => {
    const { engine } = setup({ alice: 60, bob: 40 });
    const proposal = engine.createProposal('ops', { description: 'A', deadline: START + 100, weighting: 'balance' });
    expect(proposal.supplyBaseline).toBe(100);
  });

  it('uses an explicit quorum base over minted supply', () => {
    const { engine } = setup();
    const proposal = engine.createProposal('ops', { description: 'A', deadline: START + 10, quorumBase: 50 });
    expect(proposal.supplyBaseline).toBe(50);
  });

  it('rejects a share class with no supply', () => {
    const { engine } = setup();
    expectCode(
      () => engine.createProposal('ops', { description: 'A', deadline: START + 10, shareClass: 'EMPTY' }),
      'InvalidAmount',
    );
  });

  it('trims options and rejects bad option lists', () => {
    const { engine } = setup();
    const proposal = engine.createProposal('ops', { description: 'Colour', deadline: START + 10, options: [' red ', 'blue'] });
    expect(proposal.options).toEqual(['red', 'blue']);

    expectCode(() => engine.createProposal('ops', { description: 'X', deadline: START + 10, options: ['only'] }), 'InvalidOption');
    expectCode(() => engine.createProposal('ops', { description: 'X', deadline: START + 10, options: ['a', 'a'] }), 'InvalidOption');
    expectCode(() => engine.createProposal('ops', { description: 'X', deadline: START + 10, options: ['a', ' '] }), 'InvalidOption');
  });

  it('throws NotFound for unknown ids', () => {
    const { engine } = setup();
    expectCode(() => engine.getProposal(99), 'NotFound');
  });
});

describe('openVoting', () => {
  it('rejects a start at or after the deadline', () => {
    const { engine } = setup();
    engine.createProposal('ops', { description: 'A', deadline: START + 100 });
    expectCode(() => engine.openVoting('ops', 1, START + 100), 'InvalidWindow');
    expect(engine.getProposal(1).votingStart).toBeNull();
  });

  it('rejects a start that is not a positive time', () => {
    const { engine } = setup();
    engine.createProposal('ops', { description: 'A', deadline: START + 100 });
    expectCode(() => engine.openVoting('ops', 1, 0), 'InvalidWindow');
    expectCode(() => engine.openVoting('ops', 1, -5), 'InvalidWindow');
    expect(engine.getProposal(1).votingStart).toBeNull();
    expect(engine.listEvents({ kind: 'voting_started' })).toEqual([]);

    expectCode(() => engine.castVote(1, 'alice', true), 'VotingNotStarted');
    expect(engine.getVotingHistory(1)).toEqual({ yes: 0, no: 0, finalized: false });
  });

  it('can only open once', () => {
    const { engine } = setup();
    engine.createProposal('ops', { description: 'A', deadline: START + 100 });
    engine.openVoting('ops', 1, START + 5);
    expectCode(() => engine.openVoting('ops', 1, START + 6), 'InvalidWindow');
    expect(engine.getProposal(1).votingStart).toBe(START + 5);
  });

  it('requires an operator', () => {
    const { engine } = setup();
    engine.createProposal('ops', { description: 'A', deadline: START + 100 });
    expectCode(() => engine.openVoting('bob', 1, START + 5), 'Unauthorized');
  });
});

// ── Vote ledger ──

describe('castVote', () => {
  function openProposal() {
    const ctx = setup();
    ctx.engine.createProposal('ops', { description: 'A', deadline: START + 100 });
    return ctx;
  }

  it('rejects votes before voting is opened', () => {
    const { engine } = openProposal();
    expectCode(() => engine.castVote(1, 'alice', true), 'VotingNotStarted');
  });

  it('rejects votes before the window starts and after the deadline', () => {
    const { clock, engine } = openProposal();
    engine.openVoting('ops', 1, START + 10);
    expectCode(() => engine.castVote(1, 'alice', true), 'VotingClosed');

    clock.set(START + 100);
    engine.castVote(1, 'alice', true);

    clock.set(START + 101);
    expectCode(() => engine.castVote(1, 'bob', true), 'VotingClosed');
  });

  it('allows one vote per holder', () => {
    const { engine } = openProposal();
    engine.openVoting('ops', 1, START);
    engine.castVote(1, 'alice', true);
    expectCode(() => engine.castVote(1, 'alice', false), 'AlreadyVoted');
    expect(engine.getVotingHistory(1)).toEqual({ yes: 1, no: 0, finalized: false });
  });

  it('rejects voters without a balance', () => {
    const { engine } = openProposal();
    engine.openVoting('ops', 1, START);
    expectCode(() => engine.castVote(1, 'mallory', true), 'NoVotingWeight');
  });

  it('rejects option names on a yes/no proposal', () => {
    const { engine } = openProposal();
    engine.openVoting('ops', 1, START);
    expectCode(() => engine.castVote(1, 'alice', 'maybe'), 'InvalidOption');
    expect(engine.getVoteRecord(1, 'alice')).toBeNull();
  });

  it('records the vote with its weight and time', () => {
    const { engine } = openProposal();
    engine.openVoting('ops', 1, START);
    const vote = engine.castVote(1, 'alice', true);
    expect(vote).toEqual({ proposalId: 1, voter: 'alice', choice: true, weight: 1, castAt: START });
    expect(engine.getVoteRecord(1, 'alice')).toEqual(vote);
    expect(engine.listVoteRecords(1)).toEqual([vote]);
  });

  it('applies concurrent votes one at a time', async () => {
    const { engine } = openProposal();
    engine.openVoting('ops', 1, START);
    const results = await Promise.allSettled(
      [true, false].map(async (choice) => engine.castVote(1, 'alice', choice)),
    );
    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    expect(results.filter((r) => r.status === 'rejected')).toHaveLength(1);
    expect(engine.getVotingHistory(1)).toEqual({ yes: 1, no: 0, finalized: false });
  });

  it('rolls back a vote when a write fails', () => {
    const { engine, store } = openProposal();
    engine.openVoting('ops', 1, START);
    const seen: GovernanceEvent[] = [];
    engine.onEvent((e) => seen.push(e));

    store.failing = 'incrementTally';
    expect(() => engine.castVote(1, 'alice', true)).toThrow('write failed');
    expect(engine.getVoteRecord(1, 'alice')).toBeNull();
    expect(engine.listEvents({ kind: 'vote_cast' })).toEqual([]);
    expect(seen).toEqual([]);

    store.failing = null;
    engine.castVote(1, 'alice', true);
    expect(engine.getVotingHistory(1).yes).toBe(1);
    expect(seen.map((e) => e.kind)).toEqual(['vote_cast']);
  });
});

describe('balance weighting', () => {
  it('weights votes by share balance', () => {
    const { engine } = setup({ alice: 60, bob: 40 });
    engine.createProposal('ops', { description: 'A', deadline: START + 100, weighting: 'balance' });
    engine.openVoting('ops', 1, START);
    expect(engine.castVote(1, 'alice', true).weight).toBe(60);
    engine.castVote(1, 'bob', false);

    const decision = engine.computeDecision(1);
    expect(decision.affirmative).toBe(60);
    expect(decision.negative).toBe(40);
    expect(decision.supplyBaseline).toBe(100);
    expect(decision.passed).toBe(true);
    expect(engine.computeDecision(1, 'supermajority').passed).toBe(false);
  });
});

// ── Multi-option ──

describe('multi-option proposals', () => {
  function optionProposal() {
    const ctx = setup();
    ctx.engine.createProposal('ops', { description: 'Colour', deadline: START + 100, options: ['red', 'blue', 'green'] });
    ctx.engine.openVoting('ops', 1, START);
    return ctx;
  }

  it('counts votes per option', () => {
    const { engine } = optionProposal();
    engine.castVote(1, 'alice', 'red');
    engine.castVote(1, 'bob', 'red');
    engine.castVote(1, 'carol', 'blue');

    expect(engine.getVotes(1, 'red')).toBe(2);
    expect(engine.getVotes(1, 'green')).toBe(0);
    expect(engine.getResults(1)).toEqual([
      { option: 'red', count: 2 },
      { option: 'blue', count: 1 },
      { option: 'green', count: 0 },
    ]);

    const decision = engine.computeDecision(1);
    expect(decision.winningOption).toBe('red');
    expect(decision.passed).toBe(true);
  });

  it('rejects undeclared options and boolean choices', () => {
    const { engine } = optionProposal();
    expectCode(() => engine.castVote(1, 'alice', 'purple'), 'InvalidOption');
    expectCode(() => engine.castVote(1, 'alice', true), 'InvalidOption');
    expectCode(() => engine.getVotes(1, 'purple'), 'InvalidOption');
  });

  it('checks voting weight before the option', () => {
    const { engine } = optionProposal();
    expectCode(() => engine.castVote(1, 'mallory', 'purple'), 'NoVotingWeight');
  });
});

// ── Lifecycle controller ──

describe('finalize', () => {
  function closedProposal() {
    const ctx = setup();
    ctx.engine.createProposal('ops', { description: 'A', deadline: START + 100 });
    ctx.engine.openVoting('ops', 1, START);
    ctx.engine.castVote(1, 'alice', true);
    ctx.clock.set(START + 101);
    return ctx;
  }

  it('requires an operator', () => {
    const { engine } = closedProposal();
    expectCode(() => engine.finalize('alice', 1), 'Unauthorized');
  });

  it('finalizes once', () => {
    const { engine } = closedProposal();
    engine.finalize('ops', 1);
    expectCode(() => engine.finalize('ops', 1), 'AlreadyFinalized');
  });

  it('finalizes a proposal that never opened once its deadline passes', () => {
    const { clock, engine } = setup();
    engine.createProposal('ops', { description: 'A', deadline: START + 100 });
    clock.set(START + 101);
    expect(engine.finalize('ops', 1).finalTally).toEqual({ yes: 0, no: 0 });
  });

  it('records the frozen tally in the event', () => {
    const { engine } = closedProposal();
    engine.finalize('ops', 1);
    const [event] = engine.listEvents({ kind: 'proposal_finalized' });
    expect(event).toEqual({ kind: 'proposal_finalized', proposalId: 1, yes: 1, no: 0, seq: 1, at: START + 101 });
  });
});

// ── Fractions ──

describe('fractions', () => {
  it('creates a fraction sized to the minted supply', () => {
    const { engine } = setup();
    const fraction = engine.createFraction('ops', { assetId: 'building-7', shareClass: 'GOV', owner: 'alice' });
    expect(fraction).toEqual({ id: 1, assetId: 'building-7', shareClass: 'GOV', owner: 'alice', amount: 3, createdAt: START });
    expect(engine.getFraction(1)).toEqual(fraction);
    expect(engine.listFractions()).toEqual([fraction]);
  });

  it('rejects a fraction of an empty share class', () => {
    const { engine } = setup();
    expectCode(() => engine.createFraction('ops', { assetId: 'x', shareClass: 'EMPTY', owner: 'alice' }), 'InvalidAmount');
    expectCode(() => engine.getFraction(1), 'NotFound');
  });

  it('opens a yes/no vote among the fraction holders', () => {
    const { engine } = setup({ alice: 5, bob: 3 });
    engine.createFraction('ops', { assetId: 'building-7', shareClass: 'GOV', owner: 'alice' });
    const proposal = engine.openFractionVote('ops', 1, { description: 'Sell building', deadline: START + 100, votingStart: START });

    expect(proposal.fractionId).toBe(1);
    expect(proposal.options).toBeNull();
    expect(proposal.weighting).toBe('one_per_holder');
    expect(proposal.supplyBaseline).toBe(8);
    expect(proposal.votingStart).toBe(START);
    expect(engine.getProposalState(proposal.id)).toBe('voting_open');

    expect(engine.castVote(proposal.id, 'alice', true).weight).toBe(1);
    expect(engine.listEvents().map((e) => e.kind)).toEqual([
      'fraction_created',
      'proposal_created',
      'voting_started',
      'vote_cast',
    ]);
  });

  it('decides a fraction vote against the fraction amount', () => {
    const { engine } = setup({ h1: 1, h2: 1, h3: 1, h4: 1, h5: 1 });
    engine.createFraction('ops', { assetId: 'building-7', shareClass: 'GOV', owner: 'h1' });
    const sell = engine.openFractionVote('ops', 1, { description: 'Sell', deadline: START + 100, votingStart: START });
    const refinance = engine.openFractionVote('ops', 1, { description: 'Refinance', deadline: START + 100, votingStart: START });

    for (const holder of ['h1', 'h2', 'h3']) engine.castVote(sell.id, holder, true);
    for (const holder of ['h4', 'h5']) engine.castVote(sell.id, holder, false);
    expect(engine.computeDecision(sell.id)).toMatchObject({
      affirmative: 3,
      negative: 2,
      supplyBaseline: 5,
      threshold: 3,
      passed: true,
    });
    expect(engine.computeDecision(sell.id, 'consensus').passed).toBe(false);

    // Holders who stay away count against the fraction amount
    engine.castVote(refinance.id, 'h1', true);
    engine.castVote(refinance.id, 'h2', true);
    engine.castVote(refinance.id, 'h3', false);
    expect(engine.computeDecision(refinance.id)).toMatchObject({
      affirmative: 2,
      negative: 1,
      supplyBaseline: 5,
      passed: false,
    });
  });

  it('rejects a fraction vote that starts at zero', () => {
    const { engine } = setup();
    engine.createFraction('ops', { assetId: 'building-7', shareClass: 'GOV', owner: 'alice' });
    expectCode(
      () => engine.openFractionVote('ops', 1, { description: 'Sell', deadline: START + 100, votingStart: 0 }),
      'InvalidWindow',
    );
    expect(engine.getCurrentProposalCount()).toBe(0);
  });

  it('leaves nothing behind when opening the vote fails', () => {
    const { engine, store } = setup();
    engine.createFraction('ops', { assetId: 'building-7', shareClass: 'GOV', owner: 'alice' });
    const seen: GovernanceEvent[] = [];
    engine.onEvent((e) => seen.push(e));

    store.failing = 'updateProposal';
    expect(() => engine.openFractionVote('ops', 1, { description: 'Sell', deadline: START + 100, votingStart: START }))
      .toThrow('write failed');

    expect(engine.getCurrentProposalCount()).toBe(0);
    expect(engine.listEvents({ kind: 'proposal_created' })).toEqual([]);
    expect(seen).toEqual([]);

    store.failing = null;
    expect(engine.openFractionVote('ops', 1, { description: 'Sell', deadline: START + 100 }).id).toBe(1);
  });
});

// ── Events ──

describe('events', () => {
  it('numbers each kind independently', () => {
    const { engine } = setup();
    engine.createProposal('ops', { description: 'A', deadline: START + 100 });
    engine.createProposal('ops', { description: 'B', deadline: START + 100 });
    engine.openVoting('ops', 2, START);

    expect(engine.listEvents({ kind: 'proposal_created' }).map((e) => e.seq)).toEqual([1, 2]);
    expect(engine.listEvents({ kind: 'voting_started' }).map((e) => e.seq)).toEqual([1]);
    expect(engine.listEvents({ kind: 'proposal_created', afterSeq: 1 })).toHaveLength(1);
    expect(engine.listEvents({ limit: 2 }).map((e) => e.kind)).toEqual(['proposal_created', 'proposal_created']);
  });

  it('keeps going when a subscriber throws', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const { engine } = setup();
    engine.onEvent(() => {
      throw new Error('boom');
    });
    const seen: number[] = [];
    engine.getEventLog().subscribe('proposal_created', (e) => seen.push(e.seq));

    engine.createProposal('ops', { description: 'A', deadline: START + 100 });
    expect(seen).toEqual([1]);
    expect(engine.getCurrentProposalCount()).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith('[EVENTS] Subscriber failed on proposal_created #1: boom');
  });

  it('stops delivering after unsubscribe', () => {
    const { engine } = setup();
    const seen: string[] = [];
    const unsubscribe = engine.onEvent((e) => seen.push(e.kind));
    engine.createProposal('ops', { description: 'A', deadline: START + 100 });
    unsubscribe();
    engine.createProposal('ops', { description: 'B', deadline: START + 100 });
    expect(seen).toEqual(['proposal_created']);
  });
});

// ── Locks ──

describe('locked balances', () => {
  it('holds locked shares without removing their voting weight', () => {
    const { engine, ledger } = setup({ alice: 10, bob: 10 });
    engine.lockTokens('alice', 'GOV', 4, START + 500);
    expect(ledger.spendableOf('alice', 'GOV')).toBe(6);
    expect(ledger.balanceOf('alice', 'GOV')).toBe(10);

    engine.createProposal('ops', { description: 'A', deadline: START + 100, weighting: 'balance' });
    engine.openVoting('ops', 1, START);
    expect(engine.castVote(1, 'alice', true).weight).toBe(10);
  });

  it('extends an existing lock', () => {
    const { engine } = setup({ alice: 10 });
    engine.lockTokens('alice', 'GOV', 4, START + 500);
    const lock = engine.lockTokens('alice', 'GOV', 2, START + 200);
    expect(lock).toEqual({ holder: 'alice', shareClass: 'GOV', amount: 6, unlockAt: START + 500, lockedAt: START });
    expect(engine.getLock('alice', 'GOV')).toEqual(lock);
  });

  it('validates lock requests', () => {
    const { engine } = setup({ alice: 10 });
    expectCode(() => engine.lockTokens('alice', 'GOV', 0, START + 10), 'InvalidAmount');
    expectCode(() => engine.lockTokens('alice', 'GOV', 1, START), 'InvalidDeadline');
    expectCode(() => engine.lockTokens('alice', 'GOV', 11, START + 10), 'InsufficientBalance');
    expect(engine.getLock('alice', 'GOV')).toBeNull();
  });

  it('releases only after the unlock time', () => {
    const { clock, engine, ledger } = setup({ alice: 10 });
    engine.lockTokens('alice', 'GOV', 6, START + 500);
    expectCode(() => engine.unlockTokens('alice', 'GOV'), 'TooEarly');

    clock.set(START + 500);
    expectCode(() => engine.unlockTokens('alice', 'GOV', 7), 'InsufficientLocked');
    expect(engine.unlockTokens('alice', 'GOV', 2)).toMatchObject({ amount: 4 });
    expect(ledger.spendableOf('alice', 'GOV')).toBe(6);
    expect(engine.unlockTokens('alice', 'GOV')).toBeNull();
    expect(ledger.spendableOf('alice', 'GOV')).toBe(10);
    expect(engine.getLock('alice', 'GOV')).toBeNull();
    expectCode(() => engine.unlockTokens('alice', 'GOV'), 'InsufficientLocked');

    expect(engine.listEvents({ kind: 'tokens_unlocked' }).map((e) => e.seq)).toEqual([1, 2]);
  });
});

describe('restoring locks', () => {
  function reopened(store: FlakyStore, clock: ManualClock, holders: Record<string, number>) {
    const ledger = InMemoryBalanceLedger.fromSeed([{ id: 'GOV', holders }]);
    const engine = new GovernanceEngine({ store, ledger, access: new OperatorAccessControl(['ops']), clock });
    return { ledger, engine };
  }

  it('holds persisted locks on a reseeded ledger', () => {
    const { clock, store, engine } = setup({ alice: 10 });
    engine.lockTokens('alice', 'GOV', 4, START + 500);

    const next = reopened(store, clock, { alice: 10 });
    expect(next.engine.restoreLocks()).toEqual([]);
    expect(next.ledger.spendableOf('alice', 'GOV')).toBe(6);
    expect(next.ledger.heldOf('alice', 'GOV')).toBe(4);
    expect(next.engine.listEvents({ kind: 'tokens_unlocked' })).toEqual([]);
  });

  it('cuts a lock the new balance cannot cover, and it still releases', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { clock, store, engine } = setup({ alice: 10 });
    const original = engine.lockTokens('alice', 'GOV', 8, START + 500);

    const next = reopened(store, clock, { alice: 5 });
    expect(next.engine.restoreLocks()).toEqual([original]);
    expect(next.engine.getLock('alice', 'GOV')).toMatchObject({ amount: 5, unlockAt: START + 500 });
    expect(next.ledger.spendableOf('alice', 'GOV')).toBe(0);
    expect(next.ledger.balanceOf('alice', 'GOV')).toBe(5);
    expect(next.engine.listEvents({ kind: 'tokens_unlocked' })).toEqual([
      { kind: 'tokens_unlocked', holder: 'alice', shareClass: 'GOV', amount: 3, seq: 1, at: START },
    ]);
    expect(warnSpy).toHaveBeenCalledWith('[ENGINE] Lock of 8 GOV for alice cut to 5');

    clock.set(START + 500);
    expect(next.engine.unlockTokens('alice', 'GOV')).toBeNull();
    expect(next.ledger.spendableOf('alice', 'GOV')).toBe(5);
  });

  it('clears a lock when nothing is left to hold', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { clock, store, engine } = setup({ alice: 10, bob: 1 });
    engine.lockTokens('alice', 'GOV', 8, START + 500);

    const next = reopened(store, clock, { bob: 1 });
    expect(next.engine.restoreLocks()).toHaveLength(1);
    expect(next.engine.getLock('alice', 'GOV')).toBeNull();
    expect(next.engine.listEvents({ kind: 'tokens_unlocked' })).toMatchObject([{ holder: 'alice', amount: 8 }]);
  });
});

// ── Load ──

describe('decision cost', () => {
  it('decides from counters after tens of thousands of votes', () => {
    const holders: Record<string, number> = {};
    for (let i = 0; i < 20_000; i++) holders[`holder-${i}`] = 1;
    const { engine, store } = setup(holders);

    engine.createProposal('ops', { description: 'Load', deadline: START + 100 });
    engine.openVoting('ops', 1, START);
    for (let i = 0; i < 20_000; i++) {
      engine.castVote(1, `holder-${i}`, i < 12_000);
    }

    const listVotes = vi.spyOn(store, 'listVotes');
    const decision = engine.computeDecision(1);
    expect(listVotes).not.toHaveBeenCalled();
    expect(decision).toMatchObject({ affirmative: 12_000, negative: 8_000, supplyBaseline: 20_000, passed: true });
    expect(engine.listEvents({ kind: 'vote_cast', afterSeq: 19_999 })).toEqual([
      expect.objectContaining({ seq: 20_000, voter: 'holder-19999', choice: false }),
    ]);
  }, 60_000);
});
