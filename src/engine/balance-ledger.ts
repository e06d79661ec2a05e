import { GovernanceError } from './errors.js';
import type { ShareClassSeed } from '../shared/types.js';

/**
 * Multi-asset balance ledger the engine reads voting weight from.
 * The engine never owns balances; it only places and releases holds.
 */
export interface BalanceLedger {
  /** Spendable plus held amount. */
  balanceOf(holder: string, shareClass: string): number;
  spendableOf(holder: string, shareClass: string): number;
  totalMinted(shareClass: string): number;
  /** Holders with a nonzero balance (spendable or held). */
  holderCount(shareClass: string): number;
  hold(holder: string, shareClass: string, amount: number): void;
  release(holder: string, shareClass: string, amount: number): void;
}

interface Account {
  spendable: number;
  held: number;
}

/**
 * In-process ledger used by the dev server and tests.
 */
export class InMemoryBalanceLedger implements BalanceLedger {
  private classes = new Map<string, Map<string, Account>>();
  private minted = new Map<string, number>();

  /** Seed balances from config share classes. */
  static fromSeed(seed: ShareClassSeed[]): InMemoryBalanceLedger {
    const ledger = new InMemoryBalanceLedger();
    for (const shareClass of seed) {
      for (const [holder, amount] of Object.entries(shareClass.holders)) {
        if (amount > 0) ledger.mint(holder, shareClass.id, amount);
      }
    }
    return ledger;
  }

  balanceOf(holder: string, shareClass: string): number {
    const account = this.account(holder, shareClass);
    return account ? account.spendable + account.held : 0;
  }

  spendableOf(holder: string, shareClass: string): number {
    return this.account(holder, shareClass)?.spendable ?? 0;
  }

  heldOf(holder: string, shareClass: string): number {
    return this.account(holder, shareClass)?.held ?? 0;
  }

  totalMinted(shareClass: string): number {
    return this.minted.get(shareClass) ?? 0;
  }

  holderCount(shareClass: string): number {
    return this.holders(shareClass).length;
  }

  holders(shareClass: string): string[] {
    const accounts = this.classes.get(shareClass);
    if (!accounts) return [];
    return [...accounts.entries()]
      .filter(([, a]) => a.spendable + a.held > 0)
      .map(([holder]) => holder);
  }

  mint(holder: string, shareClass: string, amount: number): void {
    assertPositive(amount);
    const account = this.ensureAccount(holder, shareClass);
    account.spendable += amount;
    this.minted.set(shareClass, this.totalMinted(shareClass) + amount);
  }

  burn(holder: string, shareClass: string, amount: number): void {
    assertPositive(amount);
    const account = this.account(holder, shareClass);
    if (!account || account.spendable < amount) {
      throw new GovernanceError('InsufficientBalance', `${holder} cannot burn ${amount} of ${shareClass}`);
    }
    account.spendable -= amount;
    this.minted.set(shareClass, this.totalMinted(shareClass) - amount);
  }

  transfer(from: string, to: string, shareClass: string, amount: number): void {
    assertPositive(amount);
    const source = this.account(from, shareClass);
    if (!source || source.spendable < amount) {
      throw new GovernanceError('InsufficientBalance', `${from} cannot transfer ${amount} of ${shareClass}`);
    }
    source.spendable -= amount;
    this.ensureAccount(to, shareClass).spendable += amount;
  }

  hold(holder: string, shareClass: string, amount: number): void {
    assertPositive(amount);
    const account = this.account(holder, shareClass);
    if (!account || account.spendable < amount) {
      throw new GovernanceError('InsufficientBalance', `${holder} has less than ${amount} spendable ${shareClass}`);
    }
    account.spendable -= amount;
    account.held += amount;
  }

  release(holder: string, shareClass: string, amount: number): void {
    assertPositive(amount);
    const account = this.account(holder, shareClass);
    if (!account || account.held < amount) {
      throw new GovernanceError('InsufficientLocked', `${holder} has less than ${amount} held ${shareClass}`);
    }
    account.held -= amount;
    account.spendable += amount;
  }

  private account(holder: string, shareClass: string): Account | undefined {
    return this.classes.get(shareClass)?.get(holder);
  }

  private ensureAccount(holder: string, shareClass: string): Account {
    let accounts = this.classes.get(shareClass);
    if (!accounts) {
      accounts = new Map();
      this.classes.set(shareClass, accounts);
    }
    let account = accounts.get(holder);
    if (!account) {
      account = { spendable: 0, held: 0 };
      accounts.set(holder, account);
    }
    return account;
  }
}

function assertPositive(amount: number): void {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new GovernanceError('InvalidAmount', `Amount must be a positive integer, got ${amount}`);
  }
}
