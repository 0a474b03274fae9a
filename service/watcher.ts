import { Address } from '@ton/core';
import { WatcherError } from './errors';
import { WhaleMinter } from './minting';
import { TransferFeed } from './transfers';

export const DEFAULT_POLL_LIMIT = 3;
export const DEFAULT_POLL_INTERVAL_MS = 10_000;
// 1 unit of a 6-decimal stablecoin
export const DEFAULT_WHALE_THRESHOLD = 1_000_000n;

export interface WatcherOptions {
    watchAddress: Address;
    whaleThreshold: bigint;
    pollLimit: number;
    pollIntervalMs: number;
    // Key the watcher mints under
    caller?: bigint;
}

export function shortAddress(address: Address): string {
    const str = address.toString();
    return `${str.slice(0, 4)}...${str.slice(-3)}`;
}

/**
 * Polls jetton transfers into the watched address and mints a whale to
 * every sender above the threshold. Stops by itself after `pollLimit` polls.
 */
export class WhaleWatcher {
    private active = false;
    private generation = 0;
    private timer: NodeJS.Timeout | null = null;
    private logs: string[] = [];
    private pollCount = 0;

    constructor(
        private readonly feed: TransferFeed,
        private readonly minter: WhaleMinter,
        private readonly opts: WatcherOptions
    ) {}

    start(): string {
        if (this.active) {
            throw new WatcherError('Already watching for logs.');
        }

        this.logs = [];
        this.pollCount = 0;
        this.active = true;
        this.generation++;
        this.schedule(this.generation);

        console.log(`Watching ${this.opts.watchAddress.toString()} every ${this.opts.pollIntervalMs}ms`);
        return `Watching for logs, polling ${this.opts.pollLimit} times.`;
    }

    stop(): string {
        if (!this.active) {
            throw new WatcherError('No timer to clear.');
        }
        this.halt();
        return 'Watching for logs stopped.';
    }

    isPolling(): boolean {
        return this.active;
    }

    getPollCount(): number {
        return this.pollCount;
    }

    getLogs(): string[] {
        return [...this.logs];
    }

    async poll(): Promise<void> {
        // A stop/start while the feed is read hands the state to a newer run
        const generation = this.generation;
        try {
            const transfers = await this.feed.poll();
            if (generation !== this.generation) return;
            let minted = 0;

            for (const transfer of transfers) {
                if (transfer.amount <= this.opts.whaleThreshold) continue;

                this.logs.push(
                    `${shortAddress(transfer.sender)} -> ${shortAddress(this.opts.watchAddress)}, value: ${transfer.amount}`
                );
                try {
                    this.minter.mint(transfer.sender, this.opts.caller);
                    minted++;
                } catch (e) {
                    console.error(
                        `Minting whale for ${transfer.sender.toString()} failed:`,
                        e instanceof Error ? e.message : e
                    );
                }
            }

            if (minted > 0) {
                await this.minter.publish();
            }
        } finally {
            if (generation === this.generation) this.countPoll();
        }
    }

    private countPoll(): void {
        this.pollCount++;
        if (this.pollCount >= this.opts.pollLimit) {
            this.halt();
        }
    }

    private schedule(generation: number): void {
        this.timer = setTimeout(() => {
            this.timer = null;
            void this.poll()
                .catch((e) => console.error('Whale watch poll failed:', e instanceof Error ? e.message : e))
                .finally(() => {
                    // A stop/start during the poll belongs to a newer run
                    if (this.active && generation === this.generation) this.schedule(generation);
                });
        }, this.opts.pollIntervalMs);
    }

    private halt(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        this.active = false;
    }
}
