import { Blockchain, SandboxContract, TreasuryContract } from '@ton/sandbox';
import { Address, beginCell, Cell, toNano } from '@ton/core';
import { JettonTransfer, TonTransferFeed, TransferFeed } from '../service/transfers';
import { WhaleWatcher, shortAddress } from '../service/watcher';
import { WhaleMinter } from '../service/minting';
import { InMemoryOwnershipLedger } from '../service/ledger';
import { TokenRegistry, onlyMinters } from '../service/registry';
import { WatcherError } from '../service/errors';
import { SandboxReader, transferNotification } from './helpers';

const SERVICE_KEY = 0xabcdefn;
const WATCHED = new Address(0, Buffer.alloc(32, 0x77));
const JETTON_WALLET = new Address(0, Buffer.alloc(32, 0x88));
const ALICE = new Address(0, Buffer.alloc(32, 0x01));
const BOB = new Address(0, Buffer.alloc(32, 0x02));

function transfer(sender: Address, amount: bigint, lt: bigint): JettonTransfer {
    return { sender, amount, queryId: 0n, source: JETTON_WALLET, lt };
}

function expectedLog(sender: Address, amount: bigint): string {
    const from = sender.toString();
    const to = WATCHED.toString();
    return `${from.slice(0, 4)}...${from.slice(-3)} -> ${to.slice(0, 4)}...${to.slice(-3)}, value: ${amount}`;
}

class QueueFeed implements TransferFeed {
    batches: JettonTransfer[][] = [];
    calls = 0;
    error: Error | null = null;
    // Holds poll() open until resolved
    gate: Promise<void> | null = null;

    async poll(): Promise<JettonTransfer[]> {
        this.calls++;
        if (this.gate) await this.gate;
        if (this.error) throw this.error;
        return this.batches.shift() ?? [];
    }
}

describe('TonTransferFeed', () => {
    let blockchain: Blockchain;
    let deposit: SandboxContract<TreasuryContract>;
    let jettonWallet: SandboxContract<TreasuryContract>;
    let reader: SandboxReader;
    let feed: TonTransferFeed;

    async function notify(from: SandboxContract<TreasuryContract>, body: Cell) {
        const result = await from.send({ to: deposit.address, value: toNano('0.05'), body });
        reader.txs.push(...result.transactions);
    }

    beforeEach(async () => {
        blockchain = await Blockchain.create();
        deposit = await blockchain.treasury('deposit');
        jettonWallet = await blockchain.treasury('jetton-wallet');
        reader = new SandboxReader();
        feed = new TonTransferFeed(reader, { watchAddress: deposit.address, jettonWallet: jettonWallet.address });
    });

    it('should skip history on the first poll', async () => {
        await notify(jettonWallet, transferNotification(5_000_000n, ALICE));

        expect(await feed.poll()).toEqual([]);
    });

    it('should return new notifications from the jetton wallet, oldest first', async () => {
        const attacker = await blockchain.treasury('attacker');
        await notify(jettonWallet, transferNotification(9_000_000n, BOB));
        await feed.poll();

        await notify(jettonWallet, transferNotification(2_000_000n, ALICE, 1n));
        await notify(attacker, transferNotification(50_000_000n, ALICE));
        await notify(jettonWallet, beginCell().storeUint(0, 32).storeStringTail('hello').endCell());
        await notify(jettonWallet, transferNotification(3_000_000n, BOB, 2n));

        const transfers = await feed.poll();

        expect(transfers.map((t) => t.amount)).toEqual([2_000_000n, 3_000_000n]);
        expect(transfers.map((t) => t.queryId)).toEqual([1n, 2n]);
        expect(transfers[0].sender.equals(ALICE)).toBe(true);
        expect(transfers[1].sender.equals(BOB)).toBe(true);
        expect(transfers[0].source.equals(jettonWallet.address)).toBe(true);
        expect(transfers[0].lt).toBeLessThan(transfers[1].lt);

        expect(await feed.poll()).toEqual([]);
    });

    it('should page back to the cursor when more transfers arrive than one page holds', async () => {
        const paged = new TonTransferFeed(reader, { watchAddress: deposit.address, limit: 2 });
        await notify(jettonWallet, transferNotification(9_000_000n, BOB));
        await paged.poll();

        for (let i = 1n; i <= 5n; i++) {
            await notify(jettonWallet, transferNotification(i * 1_000_000n, ALICE, i));
        }
        reader.requests = 0;

        const transfers = await paged.poll();

        expect(transfers.map((t) => t.queryId)).toEqual([1n, 2n, 3n, 4n, 5n]);
        expect(reader.requests).toBe(3);
        expect(await paged.poll()).toEqual([]);
    });

    it('should accept any source without a configured jetton wallet', async () => {
        const other = await blockchain.treasury('other-jetton-wallet');
        const openFeed = new TonTransferFeed(reader, { watchAddress: deposit.address });
        await openFeed.poll();

        await notify(other, transferNotification(4_000_000n, ALICE));

        const transfers = await openFeed.poll();
        expect(transfers).toHaveLength(1);
        expect(transfers[0].source.equals(other.address)).toBe(true);
    });
});

describe('WhaleWatcher', () => {
    let feed: QueueFeed;
    let registry: TokenRegistry;
    let watcher: WhaleWatcher;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
        feed = new QueueFeed();
        registry = new TokenRegistry(new InMemoryOwnershipLedger(), onlyMinters([SERVICE_KEY]));
        watcher = new WhaleWatcher(feed, new WhaleMinter({ registry }), {
            watchAddress: WATCHED,
            whaleThreshold: 1_000_000n,
            pollLimit: 3,
            pollIntervalMs: 10_000,
            caller: SERVICE_KEY,
        });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should shorten friendly addresses to 4 + 3 characters', () => {
        const full = ALICE.toString();
        expect(shortAddress(ALICE)).toBe(`${full.slice(0, 4)}...${full.slice(-3)}`);
        expect(shortAddress(ALICE)).toHaveLength(10);
    });

    it('should mint a whale only for transfers above the threshold', async () => {
        feed.batches.push([
            transfer(ALICE, 5_000_000n, 10n),
            transfer(BOB, 1_000_000n, 11n),
            transfer(BOB, 1_000_001n, 12n),
        ]);

        await watcher.poll();

        expect(registry.nextTokenId).toBe(2n);
        expect(registry.ownerOf(0n).equals(ALICE)).toBe(true);
        expect(registry.ownerOf(1n).equals(BOB)).toBe(true);
        expect(watcher.getLogs()).toEqual([expectedLog(ALICE, 5_000_000n), expectedLog(BOB, 1_000_001n)]);
        expect(watcher.getPollCount()).toBe(1);
    });

    it('should keep polling when a mint is refused', async () => {
        const anonymous = new WhaleWatcher(feed, new WhaleMinter({ registry }), {
            watchAddress: WATCHED,
            whaleThreshold: 1_000_000n,
            pollLimit: 3,
            pollIntervalMs: 10_000,
        });
        feed.batches.push([transfer(ALICE, 5_000_000n, 10n)]);

        await anonymous.poll();

        expect(registry.nextTokenId).toBe(0n);
        expect(anonymous.getLogs()).toEqual([expectedLog(ALICE, 5_000_000n)]);
        expect(anonymous.getPollCount()).toBe(1);
    });

    it('should count a failed poll', async () => {
        feed.error = new Error('rpc down');

        await expect(watcher.poll()).rejects.toThrow('rpc down');
        expect(watcher.getPollCount()).toBe(1);
    });

    describe('timers', () => {
        beforeEach(() => {
            jest.useFakeTimers();
        });

        afterEach(() => {
            jest.useRealTimers();
        });

        it('should refuse a second start and a stop while idle', () => {
            expect(watcher.start()).toBe('Watching for logs, polling 3 times.');
            expect(watcher.isPolling()).toBe(true);
            expect(() => watcher.start()).toThrow(WatcherError);
            expect(() => watcher.start()).toThrow('Already watching for logs.');

            expect(watcher.stop()).toBe('Watching for logs stopped.');
            expect(watcher.isPolling()).toBe(false);
            expect(() => watcher.stop()).toThrow('No timer to clear.');
        });

        it('should poll once per interval', async () => {
            watcher.start();

            await jest.advanceTimersByTimeAsync(9_999);
            expect(feed.calls).toBe(0);

            await jest.advanceTimersByTimeAsync(1);
            expect(feed.calls).toBe(1);

            watcher.stop();
        });

        it('should stop by itself after the poll limit', async () => {
            watcher.start();

            await watcher.poll();
            await watcher.poll();
            await watcher.poll();

            expect(watcher.isPolling()).toBe(false);
            expect(watcher.getPollCount()).toBe(3);

            await jest.advanceTimersByTimeAsync(60_000);
            expect(feed.calls).toBe(3);
        });

        it('should reset logs and poll count on start', async () => {
            feed.batches.push([transfer(ALICE, 5_000_000n, 10n)]);
            watcher.start();
            await watcher.poll();
            watcher.stop();
            expect(watcher.getLogs()).toHaveLength(1);

            watcher.start();

            expect(watcher.getLogs()).toEqual([]);
            expect(watcher.getPollCount()).toBe(0);
            watcher.stop();
        });

        it('should leave a restarted run alone when an older poll finishes late', async () => {
            let release: () => void = () => undefined;
            feed.gate = new Promise((resolve) => {
                release = () => resolve();
            });
            feed.batches.push([transfer(ALICE, 5_000_000n, 10n)]);
            const single = new WhaleWatcher(feed, new WhaleMinter({ registry }), {
                watchAddress: WATCHED,
                whaleThreshold: 1_000_000n,
                pollLimit: 1,
                pollIntervalMs: 10_000,
                caller: SERVICE_KEY,
            });

            single.start();
            const late = single.poll();
            single.stop();
            single.start();
            release();
            await late;

            expect(single.isPolling()).toBe(true);
            expect(single.getPollCount()).toBe(0);
            expect(single.getLogs()).toEqual([]);
            expect(registry.nextTokenId).toBe(0n);
            single.stop();
        });

        it('should not poll after stop', async () => {
            watcher.start();
            watcher.stop();

            await jest.advanceTimersByTimeAsync(30_000);
            expect(feed.calls).toBe(0);
        });
    });
});
