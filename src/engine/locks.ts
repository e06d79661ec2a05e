import type { LockRecord } from '../shared/types.js';
import type { BalanceLedger } from './balance-ledger.js';
import type { Clock } from './clock.js';
import { GovernanceError } from './errors.js';
import { commit, type EventLog } from './event-log.js';
import type { GovernanceStore } from './store.js';

/**
 * Escrow of share balances until an unlock time.
 *
 * Locked amounts are held on the balance ledger, so they stop being
 * spendable but still count towards `balanceOf` (and voting weight).
 * A holder has at most one lock per share class; locking again extends it.
 */
export class LockManager {
  constructor(
    private store: GovernanceStore,
    private ledger: BalanceLedger,
    private clock: Clock,
    private events: EventLog,
  ) {}

  lock(holder: string, shareClass: string, amount: number, unlockAt: number): LockRecord {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new GovernanceError('InvalidAmount', `Lock amount must be a positive integer, got ${amount}`);
    }
    const now = this.clock.now();
    if (!Number.isSafeInteger(unlockAt) || unlockAt <= now) {
      throw new GovernanceError('InvalidDeadline', `Unlock time ${unlockAt} is not after ${now}`);
    }
    const spendable = this.ledger.spendableOf(holder, shareClass);
    if (amount > spendable) {
      throw new GovernanceError(
        'InsufficientBalance',
        `${holder} has ${spendable} spendable ${shareClass}, cannot lock ${amount}`,
      );
    }

    return commit(this.store, this.events, () => {
      const existing = this.store.getLock(holder, shareClass);
      const record: LockRecord = {
        holder,
        shareClass,
        amount: (existing?.amount ?? 0) + amount,
        unlockAt: Math.max(existing?.unlockAt ?? 0, unlockAt),
        lockedAt: now,
      };
      this.store.saveLock(record);
      this.events.record({ kind: 'tokens_locked', holder, shareClass, amount, unlockAt: record.unlockAt }, now);
      // Ledger last: it is outside the store transaction
      this.ledger.hold(holder, shareClass, amount);
      return record;
    });
  }

  /**
   * Release `amount` (the whole lock when omitted). Returns what stays locked,
   * or null when the lock is cleared.
   */
  unlock(holder: string, shareClass: string, amount?: number): LockRecord | null {
    const existing = this.store.getLock(holder, shareClass);
    if (!existing) {
      throw new GovernanceError('InsufficientLocked', `${holder} has no locked ${shareClass}`);
    }
    const release = amount ?? existing.amount;
    if (!Number.isSafeInteger(release) || release <= 0) {
      throw new GovernanceError('InvalidAmount', `Unlock amount must be a positive integer, got ${release}`);
    }
    if (release > existing.amount) {
      throw new GovernanceError(
        'InsufficientLocked',
        `${holder} has ${existing.amount} locked ${shareClass}, cannot unlock ${release}`,
      );
    }
    const now = this.clock.now();
    if (now < existing.unlockAt) {
      throw new GovernanceError('TooEarly', `Lock for ${holder}/${shareClass} opens at ${existing.unlockAt}`);
    }

    return commit(this.store, this.events, () => {
      const remaining = existing.amount - release;
      let result: LockRecord | null = null;
      if (remaining === 0) {
        this.store.deleteLock(holder, shareClass);
      } else {
        result = { ...existing, amount: remaining };
        this.store.saveLock(result);
      }
      this.events.record({ kind: 'tokens_unlocked', holder, shareClass, amount: release }, now);
      this.ledger.release(holder, shareClass, release);
      return result;
    });
  }

  /**
   * Put persisted locks back on a freshly seeded ledger. A lock larger than
   * the holder's current balance is cut to that balance, or cleared when
   * nothing is left, and the difference is recorded as `tokens_unlocked`.
   * Returns the locks that were cut.
   */
  restoreHolds(): LockRecord[] {
    const now = this.clock.now();
    const holds: LockRecord[] = [];
    const cut: LockRecord[] = [];

    commit(this.store, this.events, () => {
      for (const lock of this.store.listLocks()) {
        const kept = Math.min(lock.amount, this.ledger.spendableOf(lock.holder, lock.shareClass));
        if (kept < lock.amount) {
          if (kept === 0) {
            this.store.deleteLock(lock.holder, lock.shareClass);
          } else {
            this.store.saveLock({ ...lock, amount: kept });
          }
          this.events.record(
            { kind: 'tokens_unlocked', holder: lock.holder, shareClass: lock.shareClass, amount: lock.amount - kept },
            now,
          );
          console.warn(`[ENGINE] Lock of ${lock.amount} ${lock.shareClass} for ${lock.holder} cut to ${kept}`);
          cut.push(lock);
        }
        if (kept > 0) holds.push({ ...lock, amount: kept });
      }
    });

    // Ledger last: it is outside the store transaction
    for (const hold of holds) {
      this.ledger.hold(hold.holder, hold.shareClass, hold.amount);
    }
    return cut;
  }

  getLock(holder: string, shareClass: string): LockRecord | null {
    return this.store.getLock(holder, shareClass);
  }
}
