import fs from 'fs';
import os from 'os';
import path from 'path';
import { Address } from '@ton/core';
import { RegistryStore } from '../service/store';
import { openMinting } from '../service/registry';
import { CorruptSnapshotError } from '../service/errors';

const ALICE = new Address(0, Buffer.alloc(32, 0x11));
const BOB = new Address(-1, Buffer.alloc(32, 0x22));

describe('RegistryStore', () => {
    let dir: string;
    let store: RegistryStore;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'whale-registry-'));
        store = new RegistryStore(path.join(dir, 'registry.json'));
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should start a fresh registry when no file exists', () => {
        const registry = store.load(openMinting);

        expect(registry.nextTokenId).toBe(0n);
        expect(fs.existsSync(store.filepath)).toBe(false);
    });

    it('should save and load the same registry', () => {
        const registry = store.load(openMinting);
        registry.mint(ALICE);
        registry.mint(BOB);
        store.save(registry);

        const loaded = store.load(openMinting);

        expect(loaded.nextTokenId).toBe(2n);
        expect(loaded.ownerOf(1n).equals(BOB)).toBe(true);
        expect(loaded.ownerOf(1n).workChain).toBe(-1);
        expect(fs.readdirSync(dir)).toEqual(['registry.json']);
    });

    it('should fail on a file that is not JSON', () => {
        fs.writeFileSync(store.filepath, '{ nope');

        expect(() => store.load(openMinting)).toThrow(CorruptSnapshotError);
    });

    it('should fail on a snapshot that breaks the counter invariant', () => {
        fs.writeFileSync(
            store.filepath,
            JSON.stringify({ nextTokenId: '0', owners: [['0', ALICE.toRawString()]] })
        );

        expect(() => store.load(openMinting)).toThrow('token 0 is not below nextTokenId 0');
    });
});
