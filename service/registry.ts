import { Address } from '@ton/core';
import { CorruptSnapshotError, IdentifierCollisionError, RegistryError, UnauthorizedMinterError } from './errors';
import { InMemoryOwnershipLedger, OwnershipLedger, TokenId } from './ledger';

/**
 * Decides whether a caller may mint. Callers are identified by their
 * Ed25519 public key; `undefined` is an anonymous caller.
 */
export type MintPolicy = (caller: bigint | undefined) => boolean;

export const openMinting: MintPolicy = () => true;

export function onlyMinters(publicKeys: bigint[]): MintPolicy {
    const allowed = new Set(publicKeys);
    return (caller) => caller !== undefined && allowed.has(caller);
}

export interface RegistrySnapshot {
    nextTokenId: string;
    owners: Array<[string, string]>;
}

function isStringPair(value: unknown): value is [string, string] {
    return Array.isArray(value) && value.length === 2 && typeof value[0] === 'string' && typeof value[1] === 'string';
}

export function parseSnapshot(value: unknown): RegistrySnapshot {
    if (typeof value !== 'object' || value === null) {
        throw new CorruptSnapshotError('not an object');
    }
    if (!('nextTokenId' in value) || typeof value.nextTokenId !== 'string') {
        throw new CorruptSnapshotError('nextTokenId must be a decimal string');
    }
    if (!('owners' in value) || !Array.isArray(value.owners) || !value.owners.every(isStringPair)) {
        throw new CorruptSnapshotError('owners must be a list of [id, address] pairs');
    }
    return { nextTokenId: value.nextTokenId, owners: value.owners };
}

function parseTokenId(raw: string): TokenId {
    if (!/^\d+$/.test(raw)) {
        throw new CorruptSnapshotError(`invalid token id "${raw}"`);
    }
    return BigInt(raw);
}

function parseOwner(raw: string): Address {
    try {
        return Address.parse(raw);
    } catch (e) {
        throw new CorruptSnapshotError(`invalid owner address "${raw}"`);
    }
}

/**
 * Allocates whale ids and records them in the ownership ledger.
 *
 * A mint that the ledger rejects leaves the counter where it was, so ids
 * handed out are always exactly `0..nextTokenId-1`.
 */
export class TokenRegistry {
    private counter: TokenId = 0n;
    private fault: IdentifierCollisionError | null = null;

    constructor(
        readonly ledger: OwnershipLedger,
        private readonly policy: MintPolicy
    ) {}

    static restore(
        snapshot: RegistrySnapshot,
        policy: MintPolicy,
        ledger: OwnershipLedger = new InMemoryOwnershipLedger()
    ): TokenRegistry {
        const next = parseTokenId(snapshot.nextTokenId);
        for (const [rawId, rawOwner] of snapshot.owners) {
            const id = parseTokenId(rawId);
            if (id >= next) {
                throw new CorruptSnapshotError(`token ${id} is not below nextTokenId ${next}`);
            }
            try {
                ledger.recordNewOwnership(id, parseOwner(rawOwner));
            } catch (e) {
                if (e instanceof RegistryError && e.kind !== 'CorruptSnapshot') {
                    throw new CorruptSnapshotError(e.message);
                }
                throw e;
            }
        }
        // Every id below the counter must have an owner
        if (BigInt(ledger.size()) !== next) {
            throw new CorruptSnapshotError(`${ledger.size()} owner(s) recorded for nextTokenId ${next}`);
        }

        const registry = new TokenRegistry(ledger, policy);
        registry.counter = next;
        return registry;
    }

    get nextTokenId(): TokenId {
        return this.counter;
    }

    mint(targetOwner: Address | null, caller?: bigint): TokenId {
        if (this.fault) {
            throw this.fault;
        }
        if (!this.policy(caller)) {
            throw new UnauthorizedMinterError(caller);
        }

        const id = this.counter;
        try {
            this.ledger.recordNewOwnership(id, targetOwner);
        } catch (e) {
            if (e instanceof IdentifierCollisionError) {
                this.fault = e;
            }
            throw e;
        }
        this.counter = id + 1n;
        return id;
    }

    ownerOf(id: TokenId): Address {
        return this.ledger.ownerOf(id);
    }

    totalMinted(): TokenId {
        return this.counter;
    }

    isHalted(): boolean {
        return this.fault !== null;
    }

    snapshot(): RegistrySnapshot {
        return {
            nextTokenId: this.counter.toString(),
            owners: this.ledger.entries().map(([id, owner]) => [id.toString(), owner.toRawString()]),
        };
    }
}
