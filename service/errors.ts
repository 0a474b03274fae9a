export type RegistryErrorKind =
    | 'InvalidRecipient'
    | 'IdentifierCollision'
    | 'UnauthorizedMinter'
    | 'TokenNotFound'
    | 'NotTokenOwner'
    | 'CorruptSnapshot'
    | 'WatcherError';

export class RegistryError extends Error {
    readonly kind: RegistryErrorKind;
    readonly context: Record<string, string>;

    constructor(kind: RegistryErrorKind, message: string, context: Record<string, string> = {}) {
        super(message);
        this.name = this.constructor.name;
        this.kind = kind;
        this.context = context;
    }

    toJSON(): Record<string, unknown> {
        return { kind: this.kind, message: this.message, context: this.context };
    }
}

export class InvalidRecipientError extends RegistryError {
    constructor(owner: string) {
        super('InvalidRecipient', `Invalid recipient: ${owner}`, { owner });
    }
}

// Unreachable while the registry only proposes fresh ids; treated as fatal
export class IdentifierCollisionError extends RegistryError {
    constructor(tokenId: bigint) {
        super('IdentifierCollision', `Token ${tokenId} already has an owner`, { tokenId: tokenId.toString() });
    }
}

export class UnauthorizedMinterError extends RegistryError {
    constructor(caller: bigint | undefined) {
        super(
            'UnauthorizedMinter',
            caller === undefined ? 'Anonymous caller may not mint' : 'Caller may not mint',
            caller === undefined ? {} : { caller: caller.toString(16) }
        );
    }
}

export class TokenNotFoundError extends RegistryError {
    constructor(tokenId: bigint) {
        super('TokenNotFound', `Token ${tokenId} was never minted`, { tokenId: tokenId.toString() });
    }
}

export class NotTokenOwnerError extends RegistryError {
    constructor(tokenId: bigint, from: string) {
        super('NotTokenOwner', `${from} does not own token ${tokenId}`, { tokenId: tokenId.toString(), from });
    }
}

export class CorruptSnapshotError extends RegistryError {
    constructor(reason: string) {
        super('CorruptSnapshot', `Corrupt registry snapshot: ${reason}`);
    }
}

export class WatcherError extends RegistryError {
    constructor(message: string) {
        super('WatcherError', message);
    }
}
