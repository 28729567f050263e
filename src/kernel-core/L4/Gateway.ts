import type { Address, Amount } from '../L0/Ontology.js';
import type { ITokenLedger } from '../../Platform/Ports.js';
import { ReentrancyLock } from '../L0/ReentrancyLock.js';
import { ErrorCode, LockupError } from '../Errors.js';

export interface PullReceipt {
    before: Amount;
    after: Amount;
}

/**
 * Token Transfer Gateway
 * The kernel's only route to the ledger's transfer primitives. Every call
 * must happen while the kernel holds its reentrancy lock.
 */
export class TokenGateway {
    constructor(
        private readonly ledger: ITokenLedger,
        private readonly self: Address,
        private readonly lock: ReentrancyLock
    ) { }

    public get token(): Address { return this.ledger.address; }

    public custody(): Amount {
        return this.ledger.balanceOf(this.self);
    }

    /**
     * Creation: pulls `amount` from the owner and reports the kernel's balance
     * on either side of the call.
     */
    public pullFromOwner(owner: Address, amount: Amount): PullReceipt {
        this.lock.assertHeld('pullFromOwner');
        const before = this.custody();
        this.invoke('pullFromOwner', () => this.ledger.transferFrom(this.self, owner, this.self, amount));
        return { before, after: this.custody() };
    }

    // Release
    public pushToBeneficiary(beneficiary: Address, amount: Amount): void {
        this.lock.assertHeld('pushToBeneficiary');
        this.invoke('pushToBeneficiary', () => this.ledger.transfer(this.self, beneficiary, amount));
    }

    // Revocation
    public pushToOwner(owner: Address, amount: Amount): void {
        this.lock.assertHeld('pushToOwner');
        this.invoke('pushToOwner', () => this.ledger.transfer(this.self, owner, amount));
    }

    private invoke(site: string, call: () => boolean): void {
        let accepted: boolean;
        try {
            accepted = call();
        } catch (e: unknown) {
            if (e instanceof LockupError) throw e;
            const message = e instanceof Error ? e.message : String(e);
            throw new LockupError(ErrorCode.TRANSFER_FAILED, `${site} reverted: ${message}`, { site, token: this.token });
        }
        if (!accepted) {
            throw new LockupError(ErrorCode.TRANSFER_FAILED, `${site} returned false`, { site, token: this.token });
        }
    }
}
