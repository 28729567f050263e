import type { Address, Amount, Timestamp } from '../kernel-core/L0/Ontology.js';
import type { Evidence } from '../kernel-core/L5/Audit.js';

/**
 * Ledger Port: Fungible Token
 * The first argument of every mutating call is the account initiating it.
 */
export interface ITokenLedger {
    readonly address: Address;
    balanceOf(account: Address): Amount;
    allowance(owner: Address, spender: Address): Amount;
    approve(owner: Address, spender: Address, amount: Amount): boolean;
    transfer(from: Address, to: Address, amount: Amount): boolean;
    transferFrom(spender: Address, from: Address, to: Address, amount: Amount): boolean;
}

/**
 * Ledger Port: Host
 * Resolves deployed code and runs a unit of work all-or-nothing.
 */
export interface ILedgerHost {
    hasCode(address: Address): boolean;
    tokenAt(address: Address): ITokenLedger | undefined;
    atomically<T>(work: () => T): T;
}

/**
 * Environment Port: System Clock
 * Monotonically non-decreasing, in seconds.
 */
export interface ISystemClock {
    now(): Timestamp;
}

/**
 * Persistence Port: Event Store
 * Append-only log of lifecycle evidence.
 */
export interface IEventStore {
    append(evidence: Evidence): void;
    getHistory(): Evidence[];
    getLatest(): Evidence | null;
}
