import { Address, Transaction } from '@ton/core';

// Jetton wallet -> owner notification (TEP-74)
export const OP_TRANSFER_NOTIFICATION = 0x7362d09c;

export interface JettonTransfer {
    sender: Address;
    amount: bigint;
    queryId: bigint;
    // Jetton wallet that sent the notification
    source: Address;
    lt: bigint;
}

export interface TransferFeed {
    poll(): Promise<JettonTransfer[]>;
}

/**
 * The slice of `TonClient` the feed reads through.
 */
export interface TransactionReader {
    // With `lt` and `hash`, returns the transactions older than that one
    getTransactions(address: Address, opts: { limit: number; lt?: string; hash?: string }): Promise<Transaction[]>;
}

export function decodeTransferNotification(tx: Transaction): JettonTransfer | null {
    const msg = tx.inMessage;
    if (!msg || msg.info.type !== 'internal' || msg.info.bounced) {
        return null;
    }

    const body = msg.body.beginParse();
    if (body.remainingBits < 32 || body.loadUint(32) !== OP_TRANSFER_NOTIFICATION) {
        return null;
    }

    // Anyone can send this op; a body that does not parse is not a transfer
    try {
        const queryId = body.loadUintBig(64);
        const amount = body.loadCoins();
        const sender = body.loadMaybeAddress();
        if (!sender) {
            return null;
        }
        return { sender, amount, queryId, source: msg.info.src, lt: tx.lt };
    } catch (e) {
        return null;
    }
}

export interface TonTransferFeedOptions {
    watchAddress: Address;
    // Only notifications from this jetton wallet count when set
    jettonWallet?: Address;
    limit?: number;
}

export class TonTransferFeed implements TransferFeed {
    private cursor: bigint | null = null;

    constructor(
        private readonly reader: TransactionReader,
        private readonly opts: TonTransferFeedOptions
    ) {}

    async poll(): Promise<JettonTransfer[]> {
        if (this.cursor === null) {
            // Start from the chain's current state, as a fresh watch would
            const txs = await this.reader.getTransactions(this.opts.watchAddress, { limit: 1 });
            this.cursor = txs.length > 0 ? txs[0].lt : 0n;
            return [];
        }

        const since = this.cursor;
        const txs = await this.readSince(since);
        this.cursor = txs.reduce((max, tx) => (tx.lt > max ? tx.lt : max), since);

        const jettonWallet = this.opts.jettonWallet;
        return txs
            .sort((a, b) => (a.lt < b.lt ? -1 : a.lt > b.lt ? 1 : 0))
            .map(decodeTransferNotification)
            .filter((transfer): transfer is JettonTransfer => transfer !== null)
            .filter((transfer) => !jettonWallet || transfer.source.equals(jettonWallet));
    }

    // Pages back from the newest transaction until the cursor is reached
    private async readSince(since: bigint): Promise<Transaction[]> {
        const limit = this.opts.limit ?? 50;
        const collected: Transaction[] = [];
        let from: { lt: string; hash: string } | undefined;

        for (;;) {
            const page = await this.reader.getTransactions(this.opts.watchAddress, { limit, ...from });
            collected.push(...page.filter((tx) => tx.lt > since));

            const oldest = page[page.length - 1];
            if (page.length < limit || !oldest || oldest.lt <= since) {
                return collected;
            }
            from = { lt: oldest.lt.toString(), hash: oldest.hash().toString('base64') };
        }
    }
}
