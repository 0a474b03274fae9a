import { beginCell, Cell, toNano } from '@ton/core';

// Forwarded to each new item, plus what the collection spends to deploy it
export const NFT_DEPLOY_AMOUNT = toNano('0.05');
export const MINT_WHALE_VALUE = toNano('0.1');

/**
 * Individual item content; the collection prefixes its common content URI.
 */
export function whaleContentToCell(tokenId: bigint): Cell {
    return beginCell()
        .storeStringTail(`${tokenId}.json`)
        .endCell();
}
