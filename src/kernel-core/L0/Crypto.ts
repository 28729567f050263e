// src/kernel-core/L0/Crypto.ts
import { createHash } from 'crypto';
import * as ed from '@noble/ed25519';

// 1.1 Hash Function (SHA-256)
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

export const GENESIS_HASH = '0'.repeat(64);

// 1.2 Canonical form: sorted keys, bigint as decimal string
export function canonicalize(value: unknown): string {
    if (typeof value === 'bigint') return JSON.stringify(value.toString());
    if (value === null || typeof value !== 'object') return JSON.stringify(value) ?? 'null';
    if (Array.isArray(value)) return `[${value.map(canonicalize).join(',')}]`;

    const entries = Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`).join(',')}}`;
}

// 1.3 Digital Signatures (Ed25519, hex encoded)
export type Ed25519PublicKey = string;
export type Ed25519PrivateKey = string;
export type Signature = string;

export interface KeyPair {
    publicKey: Ed25519PublicKey;
    privateKey: Ed25519PrivateKey;
}

const toHex = (bytes: Uint8Array): string => Buffer.from(bytes).toString('hex');

export async function generateKeyPair(): Promise<KeyPair> {
    const privateKey = ed.utils.randomPrivateKey();
    const publicKey = await ed.getPublicKey(privateKey);
    return { publicKey: toHex(publicKey), privateKey: toHex(privateKey) };
}

export async function signData(data: string, privateKey: Ed25519PrivateKey): Promise<Signature> {
    return toHex(await ed.sign(Buffer.from(data), privateKey));
}

export async function verifySignature(data: string, signature: Signature, publicKey: Ed25519PublicKey): Promise<boolean> {
    try {
        return await ed.verify(signature, Buffer.from(data), publicKey);
    } catch {
        // malformed hex or point
        return false;
    }
}
