/**
 * src/utils/completionChannel.ts
 *
 * Single-consumer mailbox between running job tasks and the scheduler.
 *
 * Tasks post() a message and return immediately. Messages are handed to the
 * consumer one at a time in posting order; a message posted while the
 * consumer is busy waits its turn. idle() resolves once the mailbox is empty
 * and the consumer has returned.
 */

import { log } from 'crawlee';
import { toErrorMessage } from './errors.js';

export type ChannelConsumer<T> = (message: T) => Promise<void> | void;

export class CompletionChannel<T> {
    private readonly queue: T[] = [];
    private draining = false;
    private idleResolvers: Array<() => void> = [];

    constructor(private readonly consumer: ChannelConsumer<T>) {}

    post(message: T): void {
        this.queue.push(message);
        this.pump();
    }

    private pump(): void {
        if (this.draining) return;
        this.draining = true;

        this.drain()
            .catch((err: unknown) => {
                log.error(`[CompletionChannel] Drain failed: ${toErrorMessage(err)}`);
            })
            .finally(() => {
                this.draining = false;
                if (this.queue.length > 0) {
                    this.pump();
                } else {
                    this.resolveIdle();
                }
            });
    }

    private async drain(): Promise<void> {
        for (let message = this.queue.shift(); message !== undefined; message = this.queue.shift()) {
            try {
                await this.consumer(message);
            } catch (err) {
                log.error(`[CompletionChannel] Consumer failed: ${toErrorMessage(err)}`);
            }
        }
    }

    private resolveIdle(): void {
        const waiters = this.idleResolvers;
        this.idleResolvers = [];
        for (const resolve of waiters) resolve();
    }

    async idle(): Promise<void> {
        if (!this.draining && this.queue.length === 0) return;
        await new Promise<void>((resolve) => {
            this.idleResolvers.push(resolve);
        });
    }

    get pending(): number {
        return this.queue.length;
    }

    get busy(): boolean {
        return this.draining;
    }
}
