import { Address, beginCell, Cell, Transaction } from '@ton/core';
import { OP_TRANSFER_NOTIFICATION, TransactionReader } from '../service/transfers';

export function transferNotification(amount: bigint, sender: Address | null, queryId: bigint = 0n): Cell {
    return beginCell()
        .storeUint(OP_TRANSFER_NOTIFICATION, 32)
        .storeUint(queryId, 64)
        .storeCoins(amount)
        .storeAddress(sender)
        .storeBit(false) // forward_payload inline, empty
        .endCell();
}

// Answers like TonClient: the account's transactions, newest first,
// starting below `lt`/`hash` when given
export class SandboxReader implements TransactionReader {
    readonly txs: Transaction[] = [];
    requests = 0;

    async getTransactions(
        address: Address,
        opts: { limit: number; lt?: string; hash?: string }
    ): Promise<Transaction[]> {
        this.requests++;
        const account = BigInt('0x' + address.hash.toString('hex'));
        let txs = this.txs.filter((tx) => tx.address === account).reverse();

        const { lt, hash } = opts;
        if (lt !== undefined && hash !== undefined) {
            const at = txs.findIndex((tx) => tx.lt.toString() === lt && tx.hash().toString('base64') === hash);
            txs = at < 0 ? [] : txs.slice(at + 1);
        }
        return txs.slice(0, opts.limit);
    }
}
