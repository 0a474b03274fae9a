import nacl from 'tweetnacl';
import { Address, beginCell } from '@ton/core';
import { KeyPair, bigIntToPublicKey } from './keys';

export interface SignedMintRequest {
    ownerAddress: Address;
    queryId: bigint;
    dataHash: Buffer;
    signatureHex: string;
}

/**
 * Hash owner + queryId. The queryId lets one key sign many mints for the
 * same owner while each signature is still usable only once.
 */
export function hashMintRequest(ownerAddress: Address, queryId: bigint): Buffer {
    return beginCell()
        .storeAddress(ownerAddress)
        .storeUint(queryId, 64)
        .endCell()
        .hash();
}

export function signMintRequest(keys: KeyPair, ownerAddress: Address, queryId: bigint): SignedMintRequest {
    const dataHash = hashMintRequest(ownerAddress, queryId);
    const signatureBytes = nacl.sign.detached(dataHash, keys.secretKey);
    return {
        ownerAddress,
        queryId,
        dataHash,
        signatureHex: Buffer.from(signatureBytes).toString('hex'),
    };
}

export function verifyMintRequest(
    ownerAddress: Address,
    queryId: bigint,
    signatureHex: string,
    publicKey: bigint
): boolean {
    if (!/^[0-9a-fA-F]{128}$/.test(signatureHex)) {
        return false;
    }
    const dataHash = hashMintRequest(ownerAddress, queryId);
    const signatureBytes = new Uint8Array(Buffer.from(signatureHex, 'hex'));
    return nacl.sign.detached.verify(dataHash, signatureBytes, bigIntToPublicKey(publicKey));
}
