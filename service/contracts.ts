import { Address, OpenedContract, Sender, TonClient, WalletContractV4 } from '@ton/ton';
import { mnemonicToPrivateKey } from '@ton/crypto';
import { WhaleCollection } from '../wrappers/WhaleCollection';
import { getEndpoint, Network } from './config';

/**
 * Create TON client
 */
export function createTonClient(network: Network, apiKey?: string): TonClient {
    return new TonClient({
        endpoint: getEndpoint(network),
        apiKey,
    });
}

/**
 * Open the service wallet that pays for collection mints
 */
export async function openServiceWallet(
    client: TonClient,
    mnemonic: string[]
): Promise<{ address: Address; sender: Sender }> {
    const keyPair = await mnemonicToPrivateKey(mnemonic);
    const wallet = client.open(
        WalletContractV4.create({
            workchain: 0,
            publicKey: keyPair.publicKey,
        })
    );
    return { address: wallet.address, sender: wallet.sender(keyPair.secretKey) };
}

export function openWhaleCollection(client: TonClient, address: Address): OpenedContract<WhaleCollection> {
    return client.open(WhaleCollection.createFromAddress(address));
}

/**
 * Check if contract is deployed
 */
export async function isContractDeployed(client: TonClient, address: Address): Promise<boolean> {
    const state = await client.getContractState(address);
    return state.state === 'active';
}
