import { Address } from '@ton/core';
import path from 'path';
import dotenv from 'dotenv';
import { getOrCreateKeyPair, displayKeyInfo, publicKeyToBigInt, KEYS_FILE } from './keys';
import { loadConfig, ServiceConfig } from './config';
import { startServer } from './api';
import { signMintRequest } from './signing';
import { MintPolicy, onlyMinters, openMinting } from './registry';
import { RegistryStore } from './store';
import { CollectionPublisher } from './publisher';
import { WhaleMinter } from './minting';
import { TonTransferFeed } from './transfers';
import { WhaleWatcher } from './watcher';
import { createTonClient, isContractDeployed, openServiceWallet, openWhaleCollection } from './contracts';

// Load .env file from service directory
dotenv.config({ path: path.join(__dirname, '.env') });

function buildPolicy(config: ServiceConfig, serviceKey: bigint): MintPolicy {
    if (config.mintPolicy === 'open') {
        console.log('WARNING: MINT_POLICY=open, any caller may mint whales');
        return openMinting;
    }
    return onlyMinters([serviceKey, ...config.minterPublicKeys]);
}

async function serve(config: ServiceConfig): Promise<void> {
    const keys = getOrCreateKeyPair(KEYS_FILE);
    const serviceKey = publicKeyToBigInt(keys.publicKey);

    const store = new RegistryStore(config.registryFile);
    const registry = store.load(buildPolicy(config, serviceKey));
    const client = createTonClient(config.network, config.toncenterApiKey);

    let publisher: CollectionPublisher | undefined;
    if (config.collectionAddress) {
        if (!config.walletMnemonic) {
            throw new Error('WALLET_MNEMONIC must be set to publish to COLLECTION_ADDRESS');
        }
        if (!(await isContractDeployed(client, config.collectionAddress))) {
            throw new Error(`Collection ${config.collectionAddress.toString()} is not deployed`);
        }
        const wallet = await openServiceWallet(client, config.walletMnemonic);
        console.log('Publishing from wallet:', wallet.address.toString());
        publisher = new CollectionPublisher(openWhaleCollection(client, config.collectionAddress), wallet.sender);
        await publisher.resume(registry);
    } else {
        console.log('COLLECTION_ADDRESS not set, whales are kept in the registry only');
    }

    const minter = new WhaleMinter({ registry, publisher, store });

    let watcher: WhaleWatcher | undefined;
    if (config.watchAddress) {
        const feed = new TonTransferFeed(client, {
            watchAddress: config.watchAddress,
            jettonWallet: config.jettonWalletAddress,
        });
        watcher = new WhaleWatcher(feed, minter, {
            watchAddress: config.watchAddress,
            whaleThreshold: config.whaleThreshold,
            pollLimit: config.pollLimit,
            pollIntervalMs: config.pollIntervalMs,
            caller: serviceKey,
        });
    }

    startServer({ keys, config, minter, watcher, usedRequests: new Set() });

    const { failure } = await minter.publish();
    if (failure) {
        console.error(`Whale #${failure.whale.tokenId} is still waiting to be published`);
    }
}

async function main() {
    console.log('=== Whale Minter Service ===\n');

    // Parse CLI arguments
    const args = process.argv.slice(2);
    const command = args[0] || 'serve';
    const config = loadConfig();

    switch (command) {
        case 'keys': {
            displayKeyInfo(getOrCreateKeyPair(KEYS_FILE));
            console.log('\nAdd this public key to MINTER_PUBLIC_KEYS of the service that should accept it.');
            break;
        }

        case 'serve':
            await serve(config);
            break;

        case 'sign': {
            // Produce a signed POST /mint body
            const ownerAddress = args[1];
            const queryId = args[2];

            if (!ownerAddress || !queryId || !/^\d+$/.test(queryId)) {
                console.log('Usage: ts-node index.ts sign <ownerAddress> <queryId>');
                process.exit(1);
            }

            const keys = getOrCreateKeyPair(KEYS_FILE);
            const signed = signMintRequest(keys, Address.parse(ownerAddress), BigInt(queryId));

            console.log('\n=== Mint Request ===');
            console.log(
                JSON.stringify(
                    {
                        ownerAddress: signed.ownerAddress.toString(),
                        queryId: signed.queryId.toString(),
                        publicKey: Buffer.from(keys.publicKey).toString('hex'),
                        signature: signed.signatureHex,
                    },
                    null,
                    2
                )
            );
            break;
        }

        default:
            console.log('Available commands:');
            console.log('  serve  - Start API server (default)');
            console.log('  keys   - Display minter public key');
            console.log('  sign   - Sign a mint request (ts-node index.ts sign <owner> <queryId>)');
            break;
    }
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
