import { Address } from '@ton/core';
import { IdentifierCollisionError, InvalidRecipientError, NotTokenOwnerError, TokenNotFoundError } from './errors';

export type TokenId = bigint;

/**
 * Identifier -> owner storage behind the registry.
 *
 * Implementations reject `addr_none` (null) and the zero address as owners,
 * and never assign an owner to an id that already has one.
 */
export interface OwnershipLedger {
    recordNewOwnership(id: TokenId, owner: Address | null): void;
    ownerOf(id: TokenId): Address;
    exists(id: TokenId): boolean;
    balanceOf(owner: Address): number;
    tokensOf(owner: Address): TokenId[];
    transfer(id: TokenId, from: Address, to: Address | null): void;
    entries(): Array<[TokenId, Address]>;
    size(): number;
}

export function isZeroAddress(address: Address): boolean {
    return address.hash.every((byte) => byte === 0);
}

export function formatOwner(owner: Address | null): string {
    return owner ? owner.toString() : 'addr_none';
}

function assertValidRecipient(owner: Address | null): asserts owner is Address {
    if (!owner || isZeroAddress(owner)) {
        throw new InvalidRecipientError(formatOwner(owner));
    }
}

export class InMemoryOwnershipLedger implements OwnershipLedger {
    private readonly owners = new Map<TokenId, Address>();

    recordNewOwnership(id: TokenId, owner: Address | null): void {
        assertValidRecipient(owner);
        if (this.owners.has(id)) {
            throw new IdentifierCollisionError(id);
        }
        this.owners.set(id, owner);
    }

    ownerOf(id: TokenId): Address {
        const owner = this.owners.get(id);
        if (!owner) {
            throw new TokenNotFoundError(id);
        }
        return owner;
    }

    exists(id: TokenId): boolean {
        return this.owners.has(id);
    }

    balanceOf(owner: Address): number {
        return this.tokensOf(owner).length;
    }

    tokensOf(owner: Address): TokenId[] {
        return this.entries()
            .filter(([, current]) => current.equals(owner))
            .map(([id]) => id);
    }

    transfer(id: TokenId, from: Address, to: Address | null): void {
        const current = this.ownerOf(id);
        if (!current.equals(from)) {
            throw new NotTokenOwnerError(id, from.toString());
        }
        assertValidRecipient(to);
        this.owners.set(id, to);
    }

    entries(): Array<[TokenId, Address]> {
        return [...this.owners.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    }

    size(): number {
        return this.owners.size;
    }
}
