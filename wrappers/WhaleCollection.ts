import { Address, beginCell, Cell, Contract, ContractProvider, Sender, SendMode } from '@ton/core';

// Standard NFT collection (TEP-62) op codes
export const OP_DEPLOY_NFT = 1;

export type MintWhaleOptions = {
    value: bigint;
    queryId?: bigint;
    itemIndex: bigint;
    itemOwner: Address;
    itemContent: Cell;
    // TON forwarded to the freshly deployed item
    amount: bigint;
};

export function mintWhaleBody(opts: MintWhaleOptions): Cell {
    return beginCell()
        .storeUint(OP_DEPLOY_NFT, 32)
        .storeUint(opts.queryId ?? 0n, 64)
        .storeUint(opts.itemIndex, 64)
        .storeCoins(opts.amount)
        .storeRef(
            beginCell()
                .storeAddress(opts.itemOwner)
                .storeRef(opts.itemContent)
                .endCell()
        )
        .endCell();
}

export class WhaleCollection implements Contract {
    constructor(readonly address: Address) {}

    static createFromAddress(address: Address) {
        return new WhaleCollection(address);
    }

    async sendMintWhale(provider: ContractProvider, via: Sender, opts: MintWhaleOptions) {
        await provider.internal(via, {
            value: opts.value,
            sendMode: SendMode.PAY_GAS_SEPARATELY,
            body: mintWhaleBody(opts),
        });
    }

    async getNextItemIndex(provider: ContractProvider): Promise<bigint> {
        const { stack } = await provider.get('get_collection_data', []);
        return stack.readBigNumber();
    }
}
