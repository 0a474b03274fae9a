import nacl from 'tweetnacl';
import fs from 'fs';
import path from 'path';

export interface KeyPair {
    publicKey: Uint8Array;
    secretKey: Uint8Array;
}

export const KEYS_FILE = path.join(__dirname, '.keys.json');

/**
 * Generate a new Ed25519 minter keypair
 */
export function generateKeyPair(): KeyPair {
    return nacl.sign.keyPair();
}

/**
 * Public keys travel as bigints: that is how mint callers are identified
 */
export function publicKeyToBigInt(publicKey: Uint8Array): bigint {
    return BigInt('0x' + Buffer.from(publicKey).toString('hex'));
}

/**
 * Convert a caller key back to bytes for signature checks
 */
export function bigIntToPublicKey(pubKeyBigInt: bigint): Uint8Array {
    const hex = pubKeyBigInt.toString(16).padStart(64, '0');
    return new Uint8Array(Buffer.from(hex, 'hex'));
}

/**
 * Parse a 32-byte hex public key (with or without 0x)
 */
export function parsePublicKeyHex(hex: string): bigint {
    const clean = hex.trim().replace(/^0x/i, '');
    if (!/^[0-9a-fA-F]{64}$/.test(clean)) {
        throw new Error(`Invalid public key: expected 64 hex chars, got "${hex}"`);
    }
    return BigInt('0x' + clean);
}

/**
 * Save keypair to file, readable by the service user only
 */
export function saveKeyPair(keys: KeyPair, filepath: string = KEYS_FILE): void {
    const data = {
        publicKey: Buffer.from(keys.publicKey).toString('hex'),
        secretKey: Buffer.from(keys.secretKey).toString('hex'),
    };
    fs.writeFileSync(filepath, JSON.stringify(data, null, 2), { mode: 0o600 });
    console.log(`Keys saved to ${filepath}`);
}

/**
 * Load keypair from file, or null when there is none
 */
export function loadKeyPair(filepath: string = KEYS_FILE): KeyPair | null {
    if (!fs.existsSync(filepath)) {
        return null;
    }
    const data: unknown = JSON.parse(fs.readFileSync(filepath, 'utf-8'));
    if (
        typeof data !== 'object' || data === null ||
        !('publicKey' in data) || typeof data.publicKey !== 'string' ||
        !('secretKey' in data) || typeof data.secretKey !== 'string'
    ) {
        throw new Error(`Malformed key file: ${filepath}`);
    }
    return {
        publicKey: new Uint8Array(Buffer.from(data.publicKey, 'hex')),
        secretKey: new Uint8Array(Buffer.from(data.secretKey, 'hex')),
    };
}

/**
 * Get or create the service keypair
 */
export function getOrCreateKeyPair(filepath: string = KEYS_FILE): KeyPair {
    let keys = loadKeyPair(filepath);
    if (!keys) {
        console.log('No existing keys found, generating new keypair...');
        keys = generateKeyPair();
        saveKeyPair(keys, filepath);
    }
    return keys;
}

/**
 * Display key info (public half only)
 */
export function displayKeyInfo(keys: KeyPair): void {
    console.log('=== Minter Key Info ===');
    console.log('Public Key (hex):', Buffer.from(keys.publicKey).toString('hex'));
    console.log('Public Key (BigInt):', publicKeyToBigInt(keys.publicKey).toString());
    console.log('=======================');
}
