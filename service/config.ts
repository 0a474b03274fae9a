import path from 'path';
import { Address } from '@ton/core';
import { parsePublicKeyHex } from './keys';
import { DEFAULT_POLL_INTERVAL_MS, DEFAULT_POLL_LIMIT, DEFAULT_WHALE_THRESHOLD } from './watcher';

export type Network = 'mainnet' | 'testnet';
export type MintPolicyKind = 'open' | 'allowlist';

export interface ServiceConfig {
    // Network
    network: Network;
    toncenterApiKey?: string;
    walletMnemonic?: string[];

    // On-chain collection mirrored by the publisher (optional)
    collectionAddress?: Address;

    // Whale watch
    watchAddress?: Address;
    jettonWalletAddress?: Address;
    whaleThreshold: bigint; // in jetton units
    pollLimit: number;
    pollIntervalMs: number;

    // Who may mint
    mintPolicy: MintPolicyKind;
    minterPublicKeys: bigint[];

    // Persistence + server
    registryFile: string;
    port: number;
}

type Env = Record<string, string | undefined>;

export function getEndpoint(network: Network): string {
    return network === 'mainnet'
        ? 'https://toncenter.com/api/v2/jsonRPC'
        : 'https://testnet.toncenter.com/api/v2/jsonRPC';
}

export function parseNetwork(value: string | undefined): Network {
    if (!value) return 'mainnet';
    if (value !== 'mainnet' && value !== 'testnet') {
        throw new Error(`NETWORK must be mainnet or testnet, got "${value}"`);
    }
    return value;
}

function parseOptionalAddress(name: string, value: string | undefined): Address | undefined {
    if (!value) return undefined;
    try {
        return Address.parse(value);
    } catch (e) {
        throw new Error(`${name} is not a valid address: ${value}`);
    }
}

function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
    if (!value) return fallback;
    const num = parseInt(value, 10);
    if (!Number.isInteger(num) || num <= 0) {
        throw new Error(`${name} must be a positive integer, got "${value}"`);
    }
    return num;
}

/**
 * Parse a decimal jetton amount ("1.5") into base units
 */
export function parseJettonAmount(value: string | undefined, fallback: bigint, decimals: number = 6): bigint {
    if (!value) return fallback;
    const match = /^(\d+)(?:\.(\d+))?$/.exec(value.trim());
    if (!match) {
        throw new Error(`Invalid jetton amount: "${value}"`);
    }
    const [, whole, fraction = ''] = match;
    if (fraction.length > decimals) {
        throw new Error(`Jetton amount "${value}" has more than ${decimals} decimals`);
    }
    return BigInt(whole) * 10n ** BigInt(decimals) + BigInt(fraction.padEnd(decimals, '0'));
}

export function parseMintPolicy(value: string | undefined): MintPolicyKind {
    if (!value) return 'allowlist';
    if (value !== 'open' && value !== 'allowlist') {
        throw new Error(`MINT_POLICY must be open or allowlist, got "${value}"`);
    }
    return value;
}

export function loadConfig(env: Env = process.env): ServiceConfig {
    const mnemonic = env.WALLET_MNEMONIC?.trim().split(/\s+/);

    return {
        network: parseNetwork(env.NETWORK),
        toncenterApiKey: env.TONCENTER_API_KEY,
        walletMnemonic: mnemonic && mnemonic.length > 0 && mnemonic[0] !== '' ? mnemonic : undefined,
        collectionAddress: parseOptionalAddress('COLLECTION_ADDRESS', env.COLLECTION_ADDRESS),
        watchAddress: parseOptionalAddress('WATCH_ADDRESS', env.WATCH_ADDRESS),
        jettonWalletAddress: parseOptionalAddress('JETTON_WALLET_ADDRESS', env.JETTON_WALLET_ADDRESS),
        whaleThreshold: parseJettonAmount(env.WHALE_THRESHOLD, DEFAULT_WHALE_THRESHOLD),
        pollLimit: parsePositiveInt('POLL_LIMIT', env.POLL_LIMIT, DEFAULT_POLL_LIMIT),
        pollIntervalMs: parsePositiveInt('POLL_INTERVAL_MS', env.POLL_INTERVAL_MS, DEFAULT_POLL_INTERVAL_MS),
        mintPolicy: parseMintPolicy(env.MINT_POLICY),
        minterPublicKeys: (env.MINTER_PUBLIC_KEYS ?? '')
            .split(',')
            .filter((key) => key.trim() !== '')
            .map(parsePublicKeyHex),
        registryFile: env.REGISTRY_FILE ?? path.join(__dirname, 'registry.json'),
        port: parsePositiveInt('PORT', env.PORT, 3000),
    };
}
