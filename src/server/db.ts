import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { sqliteTable, text, integer, primaryKey, uniqueIndex } from 'drizzle-orm/sqlite-core';
import { and, asc, count, eq, gt, max, sql, type SQL } from 'drizzle-orm';
import type {
  Fraction,
  LockRecord,
  Proposal,
  ProposalLifecycleUpdate,
  ProposalTally,
  VoteChoice,
  VoteRecord,
} from '../shared/types.js';
import { GOVERNANCE_EVENT_KINDS, type EventQuery, type GovernanceEvent, type GovernanceEventKind } from '../shared/events.js';
import { GovernanceEventPayloadSchema, StoredVoteChoice } from '../shared/schemas.js';
import { DEFAULT_EVENT_LIMIT, type GovernanceStore } from '../engine/store.js';

// ── Drizzle schema ──

export const proposals = sqliteTable('proposals', {
  id: integer('id').primaryKey(),
  creator: text('creator').notNull(),
  description: text('description').notNull(),
  binary: integer('is_binary', { mode: 'boolean' }).notNull(),
  shareClass: text('share_class').notNull(),
  fractionId: integer('fraction_id'),
  weighting: text('weighting', { enum: ['one_per_holder', 'balance'] }).notNull(),
  supplyBaseline: integer('supply_baseline').notNull(),
  createdAt: integer('created_at').notNull(),
  votingStart: integer('voting_start'),
  deadline: integer('deadline').notNull(),
  finalized: integer('finalized', { mode: 'boolean' }).notNull().default(false),
  finalizedAt: integer('finalized_at'),
  finalYes: integer('final_yes'),
  finalNo: integer('final_no'),
  yesCount: integer('yes_count').notNull().default(0),
  noCount: integer('no_count').notNull().default(0),
});

export const proposalOptions = sqliteTable('proposal_options', {
  proposalId: integer('proposal_id').notNull(),
  position: integer('position').notNull(),
  option: text('option').notNull(),
  count: integer('count').notNull().default(0),
}, (table) => ({
  pk: primaryKey({ columns: [table.proposalId, table.position] }),
}));

export const votes = sqliteTable('votes', {
  proposalId: integer('proposal_id').notNull(),
  voter: text('voter').notNull(),
  choice: text('choice').notNull(), // JSON: boolean or option string
  weight: integer('weight').notNull(),
  castAt: integer('cast_at').notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.proposalId, table.voter] }),
}));

export const fractions = sqliteTable('fractions', {
  id: integer('id').primaryKey(),
  assetId: text('asset_id').notNull(),
  shareClass: text('share_class').notNull(),
  owner: text('owner').notNull(),
  amount: integer('amount').notNull(),
  createdAt: integer('created_at').notNull(),
});

export const locks = sqliteTable('locks', {
  holder: text('holder').notNull(),
  shareClass: text('share_class').notNull(),
  amount: integer('amount').notNull(),
  unlockAt: integer('unlock_at').notNull(),
  lockedAt: integer('locked_at').notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.holder, table.shareClass] }),
}));

export const events = sqliteTable('events', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  kind: text('kind', { enum: GOVERNANCE_EVENT_KINDS }).notNull(),
  seq: integer('seq').notNull(),
  at: integer('at').notNull(),
  payload: text('payload').notNull(), // JSON
}, (table) => ({
  kindSeq: uniqueIndex('idx_events_kind_seq').on(table.kind, table.seq),
}));

// ── Database client ──

export type DbClient = ReturnType<typeof drizzle>;

export function createDb(dbPath: string): { db: DbClient; sqlite: BetterSqlite3.Database } {
  const sqlite = new Database(dbPath);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');

  const db = drizzle(sqlite);

  // Create tables
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS proposals (
      id INTEGER PRIMARY KEY,
      creator TEXT NOT NULL,
      description TEXT NOT NULL,
      is_binary INTEGER NOT NULL,
      share_class TEXT NOT NULL,
      fraction_id INTEGER REFERENCES fractions(id),
      weighting TEXT NOT NULL,
      supply_baseline INTEGER NOT NULL,
      created_at INTEGER NOT NULL,
      voting_start INTEGER,
      deadline INTEGER NOT NULL,
      finalized INTEGER NOT NULL DEFAULT 0,
      finalized_at INTEGER,
      final_yes INTEGER,
      final_no INTEGER,
      yes_count INTEGER NOT NULL DEFAULT 0,
      no_count INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS proposal_options (
      proposal_id INTEGER NOT NULL REFERENCES proposals(id),
      position INTEGER NOT NULL,
      option TEXT NOT NULL,
      count INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (proposal_id, position)
    );

    CREATE TABLE IF NOT EXISTS votes (
      proposal_id INTEGER NOT NULL REFERENCES proposals(id),
      voter TEXT NOT NULL,
      choice TEXT NOT NULL,
      weight INTEGER NOT NULL,
      cast_at INTEGER NOT NULL,
      PRIMARY KEY (proposal_id, voter)
    );

    CREATE TABLE IF NOT EXISTS fractions (
      id INTEGER PRIMARY KEY,
      asset_id TEXT NOT NULL,
      share_class TEXT NOT NULL,
      owner TEXT NOT NULL,
      amount INTEGER NOT NULL,
      created_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS locks (
      holder TEXT NOT NULL,
      share_class TEXT NOT NULL,
      amount INTEGER NOT NULL,
      unlock_at INTEGER NOT NULL,
      locked_at INTEGER NOT NULL,
      PRIMARY KEY (holder, share_class)
    );

    CREATE TABLE IF NOT EXISTS events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      kind TEXT NOT NULL,
      seq INTEGER NOT NULL,
      at INTEGER NOT NULL,
      payload TEXT NOT NULL
    );

    CREATE UNIQUE INDEX IF NOT EXISTS idx_events_kind_seq ON events(kind, seq);
    CREATE INDEX IF NOT EXISTS idx_proposal_options_proposal ON proposal_options(proposal_id);
    CREATE INDEX IF NOT EXISTS idx_votes_proposal ON votes(proposal_id);
  `);

  return { db, sqlite };
}

type ProposalRow = typeof proposals.$inferSelect;

// ── GovernanceStore implementation ──

export class DbStore implements GovernanceStore {
  constructor(private db: DbClient) {}

  transaction<T>(fn: () => T): T {
    return this.db.transaction(() => fn());
  }

  // ── Proposals ──

  nextProposalId(): number {
    const row = this.db.select({ maxId: max(proposals.id) }).from(proposals).get();
    return (row?.maxId ?? 0) + 1;
  }

  saveProposal(proposal: Proposal): void {
    this.db.insert(proposals).values({
      id: proposal.id,
      creator: proposal.creator,
      description: proposal.description,
      binary: proposal.options === null,
      shareClass: proposal.shareClass,
      fractionId: proposal.fractionId,
      weighting: proposal.weighting,
      supplyBaseline: proposal.supplyBaseline,
      createdAt: proposal.createdAt,
      votingStart: proposal.votingStart,
      deadline: proposal.deadline,
      finalized: proposal.finalized,
      finalizedAt: proposal.finalizedAt,
      finalYes: proposal.finalTally?.yes ?? null,
      finalNo: proposal.finalTally?.no ?? null,
    }).run();

    const options = proposal.options ?? [];
    if (options.length > 0) {
      this.db.insert(proposalOptions).values(
        options.map((option, position) => ({ proposalId: proposal.id, position, option })),
      ).run();
    }
  }

  updateProposal(id: number, updates: ProposalLifecycleUpdate): void {
    const setClauses: Partial<typeof proposals.$inferInsert> = {};
    if (updates.votingStart !== undefined) setClauses.votingStart = updates.votingStart;
    if (updates.finalized !== undefined) setClauses.finalized = updates.finalized;
    if (updates.finalizedAt !== undefined) setClauses.finalizedAt = updates.finalizedAt;
    if (updates.finalTally !== undefined) {
      setClauses.finalYes = updates.finalTally?.yes ?? null;
      setClauses.finalNo = updates.finalTally?.no ?? null;
    }
    if (Object.keys(setClauses).length === 0) return;

    this.db.update(proposals).set(setClauses).where(eq(proposals.id, id)).run();
  }

  getProposal(id: number): Proposal | null {
    const row = this.db.select().from(proposals).where(eq(proposals.id, id)).get();
    return row ? this.toProposal(row) : null;
  }

  listProposals(): Proposal[] {
    return this.db.select().from(proposals)
      .orderBy(asc(proposals.id))
      .all()
      .map((row) => this.toProposal(row));
  }

  countProposals(): number {
    const row = this.db.select({ n: count() }).from(proposals).get();
    return row?.n ?? 0;
  }

  private optionRows(proposalId: number) {
    return this.db.select().from(proposalOptions)
      .where(eq(proposalOptions.proposalId, proposalId))
      .orderBy(asc(proposalOptions.position))
      .all();
  }

  private toProposal(row: ProposalRow): Proposal {
    return {
      id: row.id,
      creator: row.creator,
      description: row.description,
      options: row.binary ? null : this.optionRows(row.id).map((o) => o.option),
      shareClass: row.shareClass,
      fractionId: row.fractionId,
      weighting: row.weighting,
      supplyBaseline: row.supplyBaseline,
      createdAt: row.createdAt,
      votingStart: row.votingStart,
      deadline: row.deadline,
      finalized: row.finalized,
      finalizedAt: row.finalizedAt,
      finalTally: row.finalYes !== null && row.finalNo !== null
        ? { yes: row.finalYes, no: row.finalNo }
        : null,
    };
  }

  // ── Tallies ──

  getTally(proposalId: number): ProposalTally | null {
    const row = this.db.select({ yes: proposals.yesCount, no: proposals.noCount })
      .from(proposals)
      .where(eq(proposals.id, proposalId))
      .get();
    if (!row) return null;
    return {
      proposalId,
      yes: row.yes,
      no: row.no,
      options: this.optionRows(proposalId).map((o) => ({ option: o.option, count: o.count })),
    };
  }

  incrementTally(proposalId: number, choice: VoteChoice, weight: number): void {
    if (choice === true) {
      this.db.update(proposals)
        .set({ yesCount: sql`${proposals.yesCount} + ${weight}` })
        .where(eq(proposals.id, proposalId))
        .run();
    } else if (choice === false) {
      this.db.update(proposals)
        .set({ noCount: sql`${proposals.noCount} + ${weight}` })
        .where(eq(proposals.id, proposalId))
        .run();
    } else {
      this.db.update(proposalOptions)
        .set({ count: sql`${proposalOptions.count} + ${weight}` })
        .where(and(eq(proposalOptions.proposalId, proposalId), eq(proposalOptions.option, choice)))
        .run();
    }
  }

  // ── Votes ──

  saveVote(vote: VoteRecord): void {
    this.db.insert(votes).values({
      ...vote,
      choice: JSON.stringify(vote.choice),
    }).run();
  }

  getVote(proposalId: number, voter: string): VoteRecord | null {
    const row = this.db.select().from(votes)
      .where(and(eq(votes.proposalId, proposalId), eq(votes.voter, voter)))
      .get();
    return row ? this.toVote(row) : null;
  }

  listVotes(proposalId: number): VoteRecord[] {
    return this.db.select().from(votes)
      .where(eq(votes.proposalId, proposalId))
      .orderBy(asc(votes.castAt), asc(votes.voter))
      .all()
      .map((row) => this.toVote(row));
  }

  private toVote(row: typeof votes.$inferSelect): VoteRecord {
    return { ...row, choice: StoredVoteChoice.parse(JSON.parse(row.choice)) };
  }

  // ── Fractions ──

  nextFractionId(): number {
    const row = this.db.select({ maxId: max(fractions.id) }).from(fractions).get();
    return (row?.maxId ?? 0) + 1;
  }

  saveFraction(fraction: Fraction): void {
    this.db.insert(fractions).values(fraction).run();
  }

  getFraction(id: number): Fraction | null {
    return this.db.select().from(fractions).where(eq(fractions.id, id)).get() ?? null;
  }

  listFractions(): Fraction[] {
    return this.db.select().from(fractions).orderBy(asc(fractions.id)).all();
  }

  // ── Locks ──

  getLock(holder: string, shareClass: string): LockRecord | null {
    return this.db.select().from(locks)
      .where(and(eq(locks.holder, holder), eq(locks.shareClass, shareClass)))
      .get() ?? null;
  }

  saveLock(lock: LockRecord): void {
    this.db.insert(locks).values(lock).onConflictDoUpdate({
      target: [locks.holder, locks.shareClass],
      set: { amount: lock.amount, unlockAt: lock.unlockAt, lockedAt: lock.lockedAt },
    }).run();
  }

  deleteLock(holder: string, shareClass: string): void {
    this.db.delete(locks)
      .where(and(eq(locks.holder, holder), eq(locks.shareClass, shareClass)))
      .run();
  }

  listLocks(): LockRecord[] {
    return this.db.select().from(locks).orderBy(asc(locks.holder), asc(locks.shareClass)).all();
  }

  // ── Events ──

  appendEvent(event: GovernanceEvent): void {
    const { seq, at, ...payload } = event;
    this.db.insert(events).values({
      kind: event.kind,
      seq,
      at,
      payload: JSON.stringify(payload),
    }).run();
  }

  lastSequence(kind: GovernanceEventKind): number {
    const row = this.db.select({ seq: max(events.seq) }).from(events).where(eq(events.kind, kind)).get();
    return row?.seq ?? 0;
  }

  listEvents(query: EventQuery = {}): GovernanceEvent[] {
    const { kind, afterSeq, limit = DEFAULT_EVENT_LIMIT } = query;
    const conditions: SQL[] = [];
    if (kind !== undefined) conditions.push(eq(events.kind, kind));
    if (afterSeq !== undefined) conditions.push(gt(events.seq, afterSeq));

    return this.db.select().from(events)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(asc(events.id))
      .limit(limit)
      .all()
      .map((row) => ({
        ...GovernanceEventPayloadSchema.parse(JSON.parse(row.payload)),
        seq: row.seq,
        at: row.at,
      }));
  }
}
