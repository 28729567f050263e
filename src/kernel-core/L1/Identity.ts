import type { Address } from '../L0/Ontology.js';
import type { Ed25519PublicKey } from '../L0/Crypto.js';
import { ZERO_ADDRESS } from '../L0/Primitives.js';
import { ErrorCode, LockupError } from '../Errors.js';

// --- 1. Addresses ---
const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

export function isAddress(value: unknown): value is Address {
    return typeof value === 'string' && ADDRESS_PATTERN.test(value);
}

export function normalizeAddress(value: Address): Address {
    if (!isAddress(value)) throw new RangeError(`Malformed address: ${value}`);
    return value.toLowerCase();
}

export function isZeroAddress(value: Address): boolean {
    return value.toLowerCase() === ZERO_ADDRESS;
}

export function sameAddress(a: Address, b: Address): boolean {
    return a.toLowerCase() === b.toLowerCase();
}

// --- 2. Single-Owner Access Control ---
export class Ownership {
    private current: Address;

    constructor(initialOwner: Address) {
        if (!isAddress(initialOwner) || isZeroAddress(initialOwner)) {
            throw new LockupError(ErrorCode.INVALID_OWNER, `Invalid initial owner: ${initialOwner}`);
        }
        this.current = initialOwner.toLowerCase();
    }

    public get owner(): Address { return this.current; }

    public isOwner(caller: Address): boolean {
        return sameAddress(caller, this.current);
    }

    public checkpoint(): Address { return this.current; }

    // Undo for an operation that failed after `transfer`
    public restore(checkpoint: Address): void {
        this.current = checkpoint;
    }

    /**
     * Hands the role to `newOwner`. Returns the previous owner.
     */
    public transfer(caller: Address, newOwner: Address): Address {
        if (!this.isOwner(caller)) {
            throw new LockupError(ErrorCode.UNAUTHORIZED, `${caller} is not the owner`);
        }
        if (!isAddress(newOwner) || isZeroAddress(newOwner)) {
            throw new LockupError(ErrorCode.INVALID_OWNER, `Invalid new owner: ${newOwner}`);
        }
        const previous = this.current;
        this.current = newOwner.toLowerCase();
        return previous;
    }
}

// --- 3. Principals (request signers) ---
export interface Principal {
    address: Address;
    publicKey: Ed25519PublicKey;
    registeredAt: string;
}

export class PrincipalRegistry {
    private principals: Map<Address, Principal> = new Map();

    public register(address: Address, publicKey: Ed25519PublicKey): Principal {
        if (!isAddress(address)) throw new Error(`Identity Violation: malformed address ${address}`);
        if (!/^[0-9a-fA-F]{64}$/.test(publicKey)) throw new Error('Identity Violation: public key must be 32 hex bytes');

        const key = address.toLowerCase();
        if (this.principals.has(key)) throw new Error(`Identity Violation: ${key} already registered`);

        const principal: Principal = { address: key, publicKey: publicKey.toLowerCase(), registeredAt: new Date().toISOString() };
        this.principals.set(key, principal);
        return principal;
    }

    public get(address: Address): Principal | undefined {
        return this.principals.get(address.toLowerCase());
    }
}
