import { Address, Sender } from '@ton/core';
import { MintWhaleOptions } from '../wrappers/WhaleCollection';
import { MINT_WHALE_VALUE, NFT_DEPLOY_AMOUNT, whaleContentToCell } from '../wrappers/utils';
import { TokenRegistry } from './registry';
import { TokenId } from './ledger';

/**
 * The parts of an opened `WhaleCollection` the publisher needs.
 */
export interface CollectionHandle {
    sendMintWhale(via: Sender, opts: MintWhaleOptions): Promise<unknown>;
    getNextItemIndex(): Promise<bigint>;
}

export interface PendingWhale {
    tokenId: TokenId;
    owner: Address;
}

export interface FlushResult {
    published: PendingWhale[];
    failure: { whale: PendingWhale; error: Error } | null;
}

export interface PublisherOptions {
    value: bigint;
    amount: bigint;
}

/**
 * Mirrors minted whales onto the on-chain collection, strictly in id order.
 * The collection only deploys `item_index <= next_item_index`, so a failed
 * send blocks everything queued behind it until the next flush.
 */
export class CollectionPublisher {
    private readonly queue: PendingWhale[] = [];
    private running: Promise<FlushResult> | null = null;

    constructor(
        private readonly collection: CollectionHandle,
        private readonly via: Sender,
        private readonly opts: PublisherOptions = { value: MINT_WHALE_VALUE, amount: NFT_DEPLOY_AMOUNT }
    ) {}

    enqueue(tokenId: TokenId, owner: Address): void {
        this.queue.push({ tokenId, owner });
    }

    pending(): PendingWhale[] {
        return [...this.queue];
    }

    /**
     * Queues every registry id the collection has not deployed yet.
     * Returns how many were added.
     */
    async resume(registry: TokenRegistry): Promise<number> {
        if (this.running) {
            throw new Error('Cannot resume while a flush is running');
        }
        const onChain = await this.collection.getNextItemIndex();
        const queued = new Set(this.queue.map((whale) => whale.tokenId));

        let added = 0;
        for (let id = onChain; id < registry.nextTokenId; id++) {
            if (queued.has(id)) continue;
            this.queue.push({ tokenId: id, owner: registry.ownerOf(id) });
            added++;
        }
        this.queue.sort((a, b) => (a.tokenId < b.tokenId ? -1 : a.tokenId > b.tokenId ? 1 : 0));

        console.log(`Collection is at item ${onChain}, ${added} whale(s) queued for publishing`);
        return added;
    }

    flush(): Promise<FlushResult> {
        if (!this.running) {
            this.running = this.drain().finally(() => {
                this.running = null;
            });
        }
        return this.running;
    }

    private async drain(): Promise<FlushResult> {
        const published: PendingWhale[] = [];

        while (this.queue.length > 0) {
            const whale = this.queue[0];
            try {
                await this.collection.sendMintWhale(this.via, {
                    value: this.opts.value,
                    amount: this.opts.amount,
                    queryId: whale.tokenId,
                    itemIndex: whale.tokenId,
                    itemOwner: whale.owner,
                    itemContent: whaleContentToCell(whale.tokenId),
                });
            } catch (e) {
                const error = e instanceof Error ? e : new Error(String(e));
                console.error(`Publishing whale #${whale.tokenId} failed:`, error.message);
                return { published, failure: { whale, error } };
            }

            this.queue.shift();
            published.push(whale);
            console.log(`Whale #${whale.tokenId} sent to collection for ${whale.owner.toString()}`);
        }

        return { published, failure: null };
    }
}
