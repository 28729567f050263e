import type { Address, Amount } from '../../kernel-core/L0/Ontology.js';
import type { ILedgerHost, ITokenLedger } from '../../Platform/Ports.js';
import { normalizeAddress } from '../../kernel-core/L1/Identity.js';
import { mulDiv } from '../../kernel-core/L0/Primitives.js';

export class LedgerError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'LedgerError';
    }
}

export interface TransferNotice {
    token: Address;
    from: Address;
    to: Address;
    amount: Amount; // credited to `to`, after any fee
}

export type ReceiveHook = (notice: TransferNotice) => void;

export interface TokenOptions {
    feeBps?: number; // withheld from the recipient and burned
}

interface TokenSnapshot {
    balances: Map<Address, Amount>;
    allowances: Map<string, Amount>;
    totalSupply: Amount;
}

const BPS = 10_000n;

/**
 * In-process fungible token. Mutations return true or throw a LedgerError,
 * except while transfers are set to fail, when they return false.
 */
export class InMemoryToken implements ITokenLedger {
    public readonly address: Address;
    private balances: Map<Address, Amount> = new Map();
    private allowances: Map<string, Amount> = new Map();
    private hooks: Map<Address, ReceiveHook[]> = new Map();
    private supply: Amount = 0n;
    private feeBps: bigint;
    private failing = false;

    constructor(address: Address, options: TokenOptions = {}) {
        this.address = normalizeAddress(address);
        this.feeBps = BigInt(options.feeBps ?? 0);
        if (this.feeBps < 0n || this.feeBps > BPS) throw new LedgerError(`Fee out of range: ${this.feeBps} bps`);
    }

    public get totalSupply(): Amount { return this.supply; }

    public balanceOf(account: Address): Amount {
        return this.balances.get(account.toLowerCase()) ?? 0n;
    }

    public allowance(owner: Address, spender: Address): Amount {
        return this.allowances.get(this.allowanceKey(owner, spender)) ?? 0n;
    }

    public mint(to: Address, amount: Amount): void {
        if (amount < 0n) throw new LedgerError('Cannot mint a negative amount');
        const account = normalizeAddress(to);
        this.balances.set(account, this.balanceOf(account) + amount);
        this.supply += amount;
    }

    public approve(owner: Address, spender: Address, amount: Amount): boolean {
        if (amount < 0n) throw new LedgerError('Cannot approve a negative amount');
        this.allowances.set(this.allowanceKey(owner, spender), amount);
        return true;
    }

    public transfer(from: Address, to: Address, amount: Amount): boolean {
        if (this.failing) return false;
        this.move(from, to, amount);
        return true;
    }

    public transferFrom(spender: Address, from: Address, to: Address, amount: Amount): boolean {
        if (this.failing) return false;
        const allowed = this.allowance(from, spender);
        if (allowed < amount) throw new LedgerError(`Allowance ${allowed} is below ${amount}`);
        this.allowances.set(this.allowanceKey(from, spender), allowed - amount);
        this.move(from, to, amount);
        return true;
    }

    public setFee(bps: number): void {
        const fee = BigInt(bps);
        if (fee < 0n || fee > BPS) throw new LedgerError(`Fee out of range: ${bps} bps`);
        this.feeBps = fee;
    }

    public failTransfers(enabled: boolean): void {
        this.failing = enabled;
    }

    /**
     * Registers a callback fired after `account` is credited.
     */
    public onReceive(account: Address, hook: ReceiveHook): void {
        const key = normalizeAddress(account);
        this.hooks.set(key, [...(this.hooks.get(key) ?? []), hook]);
    }

    public snapshot(): TokenSnapshot {
        return { balances: new Map(this.balances), allowances: new Map(this.allowances), totalSupply: this.supply };
    }

    public restore(snapshot: TokenSnapshot): void {
        this.balances = new Map(snapshot.balances);
        this.allowances = new Map(snapshot.allowances);
        this.supply = snapshot.totalSupply;
    }

    private move(from: Address, to: Address, amount: Amount): void {
        if (amount < 0n) throw new LedgerError('Cannot transfer a negative amount');
        const sender = normalizeAddress(from);
        const recipient = normalizeAddress(to);

        const balance = this.balanceOf(sender);
        if (balance < amount) throw new LedgerError(`Balance ${balance} is below ${amount}`);

        const fee = mulDiv(amount, this.feeBps, BPS);
        const credited = amount - fee;
        this.balances.set(sender, balance - amount);
        this.balances.set(recipient, this.balanceOf(recipient) + credited);
        this.supply -= fee;

        for (const hook of this.hooks.get(recipient) ?? []) {
            hook({ token: this.address, from: sender, to: recipient, amount: credited });
        }
    }

    private allowanceKey(owner: Address, spender: Address): string {
        return `${owner.toLowerCase()}:${spender.toLowerCase()}`;
    }
}

/**
 * In-process ledger host: deployed code, tokens, and all-or-nothing execution.
 */
export class InMemoryLedger implements ILedgerHost {
    private tokens: Map<Address, InMemoryToken> = new Map();
    private contracts: Set<Address> = new Set();

    public deployToken(address: Address, options: TokenOptions = {}): InMemoryToken {
        const token = new InMemoryToken(address, options);
        if (this.hasCode(token.address)) throw new LedgerError(`Code already deployed at ${token.address}`);
        this.tokens.set(token.address, token);
        return token;
    }

    /**
     * Deploys code that is not a token.
     */
    public deployContract(address: Address): void {
        const key = normalizeAddress(address);
        if (this.hasCode(key)) throw new LedgerError(`Code already deployed at ${key}`);
        this.contracts.add(key);
    }

    public hasCode(address: Address): boolean {
        const key = address.toLowerCase();
        return this.tokens.has(key) || this.contracts.has(key);
    }

    public tokenAt(address: Address): InMemoryToken | undefined {
        return this.tokens.get(address.toLowerCase());
    }

    public atomically<T>(work: () => T): T {
        const snapshots = [...this.tokens.values()].map(token => ({ token, snapshot: token.snapshot() }));
        try {
            return work();
        } catch (e: unknown) {
            for (const { token, snapshot } of snapshots) token.restore(snapshot);
            throw e;
        }
    }
}
