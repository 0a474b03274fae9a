import fs from 'fs';
import path from 'path';
import { CorruptSnapshotError } from './errors';
import { MintPolicy, TokenRegistry, parseSnapshot } from './registry';
import { InMemoryOwnershipLedger } from './ledger';

/**
 * Persists the registry as a JSON snapshot next to the service.
 */
export class RegistryStore {
    constructor(readonly filepath: string) {}

    load(policy: MintPolicy): TokenRegistry {
        if (!fs.existsSync(this.filepath)) {
            console.log(`No registry found at ${this.filepath}, starting from token 0`);
            return new TokenRegistry(new InMemoryOwnershipLedger(), policy);
        }

        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(this.filepath, 'utf-8'));
        } catch (e) {
            throw new CorruptSnapshotError(`${this.filepath} is not valid JSON`);
        }
        const registry = TokenRegistry.restore(parseSnapshot(raw), policy);
        console.log(`Registry loaded from ${this.filepath}, next token ${registry.nextTokenId}`);
        return registry;
    }

    // Written beside the target, then renamed over it
    save(registry: TokenRegistry): void {
        const tmp = path.join(path.dirname(this.filepath), `.${path.basename(this.filepath)}.tmp`);
        fs.writeFileSync(tmp, JSON.stringify(registry.snapshot(), null, 2));
        fs.renameSync(tmp, this.filepath);
    }
}
