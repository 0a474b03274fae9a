import { Address } from '@ton/core';
import { TokenRegistry } from './registry';
import { CollectionPublisher, FlushResult } from './publisher';
import { RegistryStore } from './store';
import { TokenId } from './ledger';

export interface WhaleMinterDeps {
    registry: TokenRegistry;
    publisher?: CollectionPublisher;
    store?: RegistryStore;
}

export class WhaleMinter {
    readonly registry: TokenRegistry;
    private readonly publisher?: CollectionPublisher;
    private readonly store?: RegistryStore;

    constructor(deps: WhaleMinterDeps) {
        this.registry = deps.registry;
        this.publisher = deps.publisher;
        this.store = deps.store;
    }

    mint(owner: Address | null, caller?: bigint): TokenId {
        const tokenId = this.registry.mint(owner, caller);
        // mint() only returns for a valid owner
        const recorded = this.registry.ownerOf(tokenId);
        this.publisher?.enqueue(tokenId, recorded);
        this.persist();
        console.log(`Minted whale #${tokenId} to ${recorded.toString()}`);
        return tokenId;
    }

    // The mint has already happened; the next successful save carries it
    private persist(): void {
        const store = this.store;
        if (!store) return;
        try {
            store.save(this.registry);
        } catch (e) {
            console.error(`Saving registry to ${store.filepath} failed:`, e instanceof Error ? e.message : e);
        }
    }

    async publish(): Promise<FlushResult> {
        if (!this.publisher) {
            return { published: [], failure: null };
        }
        return this.publisher.flush();
    }

    hasPublisher(): boolean {
        return this.publisher !== undefined;
    }
}
