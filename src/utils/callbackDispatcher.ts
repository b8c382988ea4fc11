/**
 * src/utils/callbackDispatcher.ts
 *
 * Typed fan-out of pipeline events to registered handlers.
 *
 * Handlers for one event kind run in registration order, one at a time.
 * A handler that throws (or rejects) is wrapped in a HandlerError, logged
 * and counted; the remaining handlers still run and dispatch() itself
 * never rejects, so a broken consumer cannot stall the scheduler.
 */

import { log } from 'crawlee';
import type { ChangeReport } from './changeDetector.js';
import type { DiffResult } from './diffEngine.js';
import { HandlerError } from './errors.js';
import { recordHandlerFailure } from './metrics.js';
import type { PriceAlert } from './priceMonitor.js';

// ─── Event Payloads ───────────────────────────────────────────────────────────

export interface JobSucceededEvent {
    jobId: string;
    name: string;
    result: unknown;
    startedAt: Date;
    completedAt: Date;
    durationMs: number;
    nextDue: Date;
}

export interface JobFailedEvent {
    jobId: string;
    name: string;
    error: string;
    errorCode: string | null;
    retryable: boolean;
    /** Consecutive failures including this one. */
    retryCount: number;
    maxRetries: number;
    /** True when the job moved to Failed and will not run again on its own. */
    terminal: boolean;
    nextDue: Date | null;
    completedAt: Date;
}

export interface ChangeDetectedEvent {
    jobId: string | null;
    report: ChangeReport;
}

export interface DiffComputedEvent {
    jobId: string | null;
    diff: DiffResult;
}

export interface EventPayloads {
    JobSucceeded: JobSucceededEvent;
    JobFailed: JobFailedEvent;
    ChangeDetected: ChangeDetectedEvent;
    DiffComputed: DiffComputedEvent;
    PriceAlertFired: PriceAlert;
}

export type EventKind = keyof EventPayloads;

export const EVENT_KINDS: readonly EventKind[] = [
    'JobSucceeded',
    'JobFailed',
    'ChangeDetected',
    'DiffComputed',
    'PriceAlertFired',
];

export type EventHandler<K extends EventKind> = (payload: EventPayloads[K]) => void | Promise<void>;

export interface DispatchReport {
    kind: EventKind;
    delivered: number;
    failed: number;
    errors: HandlerError[];
}

type HandlerTable = { [K in EventKind]: Array<EventHandler<K>> };

// ─── Dispatcher ───────────────────────────────────────────────────────────────

export class CallbackDispatcher {
    private readonly handlers: HandlerTable = {
        JobSucceeded: [],
        JobFailed: [],
        ChangeDetected: [],
        DiffComputed: [],
        PriceAlertFired: [],
    };

    /** Returns a function that unregisters the handler. */
    register<K extends EventKind>(kind: K, handler: EventHandler<K>): () => void {
        const list: Array<EventHandler<K>> = this.handlers[kind];
        list.push(handler);
        return () => {
            const idx = list.indexOf(handler);
            if (idx !== -1) list.splice(idx, 1);
        };
    }

    async dispatch<K extends EventKind>(kind: K, payload: EventPayloads[K]): Promise<DispatchReport> {
        const list: Array<EventHandler<K>> = [...this.handlers[kind]];
        const errors: HandlerError[] = [];
        let delivered = 0;

        for (const [index, handler] of list.entries()) {
            try {
                await handler(payload);
                delivered++;
            } catch (err) {
                const wrapped = new HandlerError(kind, index, err);
                errors.push(wrapped);
                recordHandlerFailure();
                log.error(`[Dispatcher] ${wrapped.message}`);
            }
        }

        return { kind, delivered, failed: errors.length, errors };
    }

    handlerCount(kind: EventKind): number {
        return this.handlers[kind].length;
    }

    clear(): void {
        for (const kind of EVENT_KINDS) {
            this.handlers[kind].length = 0;
        }
    }
}
