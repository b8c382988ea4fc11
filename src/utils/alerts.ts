/**
 * src/utils/alerts.ts
 *
 * Outbound notifications for pipeline events.
 *
 * SUPPORTED CHANNELS
 * ──────────────────
 * 1. Slack:   POST to ALERT_SLACK_WEBHOOK (Incoming Webhooks URL)
 * 2. Webhook: POST JSON payload to ALERT_WEBHOOK_URL (any HTTP endpoint)
 *
 * ALERT STORM PREVENTION
 * ───────────────────────
 * Each (channel, topic) pair sends at most once per ALERT_COOLDOWN_MIN.
 * A topic is one product/source for price alerts, one job for failures and
 * one source key for content changes, so a flapping price cannot flood the
 * channel while other products still get through.
 *
 * attachAlertChannels() wires the notifier to a CallbackDispatcher:
 *   PriceAlertFired              → warning (drop) / info (increase)
 *   JobFailed (terminal only)    → critical
 *   ChangeDetected               → info
 */

import * as http from 'http';
import * as https from 'https';
import { log } from 'crawlee';
import { itemToObject } from '../sources/itemRecord.js';
import type { CallbackDispatcher } from './callbackDispatcher.js';
import { toErrorMessage } from './errors.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export type AlertSeverity = 'info' | 'warning' | 'critical';

export type AlertChannel = 'slack' | 'webhook';

export type DeliveryStatus = 'sent' | 'not-configured' | 'cooldown' | 'failed' | 'disabled';

export interface AlertContext {
    [key: string]: string | number | boolean | undefined;
}

export interface AlertConfig {
    slackWebhook: string;
    webhookUrl: string;
    cooldownMin: number;
    enabled: boolean;
    serviceName?: string;
}

export type HttpPost = (url: string, body: string) => Promise<void>;

export interface AlertNotifierOptions {
    post?: HttpPost;
    now?: () => number;
}

// ─── HTTP POST Helper ─────────────────────────────────────────────────────────

/** Raw HTTPS/HTTP POST of a JSON body; rejects on status ≥ 400 or after 8 s. */
export function httpPost(url: string, body: string): Promise<void> {
    return new Promise((resolve, reject) => {
        const parsed = new URL(url);
        const isHttps = parsed.protocol === 'https:';
        const transport = isHttps ? https : http;

        const req = transport.request({
            hostname: parsed.hostname,
            port: parsed.port || (isHttps ? 443 : 80),
            path: parsed.pathname + parsed.search,
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                'Content-Length': Buffer.byteLength(body),
            },
            timeout: 8000,
        }, (res) => {
            res.resume();
            if (res.statusCode && res.statusCode >= 400) {
                reject(new Error(`HTTP ${res.statusCode}`));
            } else {
                resolve();
            }
        });

        req.on('error', reject);
        req.on('timeout', () => {
            req.destroy();
            reject(new Error('Request timed out'));
        });
        req.write(body);
        req.end();
    });
}

// ─── Formatting ───────────────────────────────────────────────────────────────

const SEVERITY_EMOJI: Record<AlertSeverity, string> = {
    info: 'ℹ️',
    warning: '⚠️',
    critical: '🚨',
};

const SLACK_COLOR: Record<AlertSeverity, string> = {
    info: '#36A64F',
    warning: '#FFA500',
    critical: '#FF0000',
};

function formatContext(ctx: AlertContext, sep: string): string {
    return Object.entries(ctx)
        .filter(([, v]) => v !== undefined)
        .map(([k, v]) => `${k}${sep}${v}`)
        .join(' | ');
}

// ─── Notifier ─────────────────────────────────────────────────────────────────

export class AlertNotifier {
    /** `${channel}:${topic}` → last send, epoch ms */
    private readonly lastSent = new Map<string, number>();
    private readonly post: HttpPost;
    private readonly now: () => number;
    private readonly serviceName: string;

    constructor(private readonly config: AlertConfig, options: AlertNotifierOptions = {}) {
        this.post = options.post ?? httpPost;
        this.now = options.now ?? Date.now;
        this.serviceName = config.serviceName ?? 'pagewatch';
    }

    private isOnCooldown(channel: AlertChannel, topic: string): boolean {
        const last = this.lastSent.get(`${channel}:${topic}`);
        return last !== undefined && this.now() - last < this.config.cooldownMin * 60_000;
    }

    private async deliver(
        channel: AlertChannel,
        url: string,
        topic: string,
        payload: string,
    ): Promise<DeliveryStatus> {
        if (!url) return 'not-configured';
        if (this.isOnCooldown(channel, topic)) {
            log.debug(`[Alerts] ${channel} on cooldown for ${topic}.`);
            return 'cooldown';
        }
        try {
            await this.post(url, payload);
            this.lastSent.set(`${channel}:${topic}`, this.now());
            log.info(`[Alerts] ${channel} alert sent (${topic}).`);
            return 'sent';
        } catch (err) {
            log.warning(`[Alerts] ${channel} send failed: ${toErrorMessage(err)}`);
            return 'failed';
        }
    }

    /**
     * Logs the alert and posts it to every configured channel concurrently.
     * Never rejects: delivery problems come back as statuses.
     */
    async sendAlert(
        severity: AlertSeverity,
        message: string,
        context: AlertContext = {},
        topic: string = severity,
    ): Promise<Record<AlertChannel, DeliveryStatus>> {
        if (!this.config.enabled) {
            log.debug(`[Alerts] Alerts disabled. Would send (${severity}): ${message}`);
            return { slack: 'disabled', webhook: 'disabled' };
        }

        const ctx = formatContext(context, '=');
        const line = `${SEVERITY_EMOJI[severity]} [${severity.toUpperCase()}] ${message}${ctx ? ` (${ctx})` : ''}`;
        if (severity === 'critical') log.error(`[Alerts] ${line}`);
        else if (severity === 'warning') log.warning(`[Alerts] ${line}`);
        else log.info(`[Alerts] ${line}`);

        const timestamp = new Date(this.now());
        const slackPayload = JSON.stringify({
            attachments: [{
                color: SLACK_COLOR[severity],
                title: `${this.serviceName} — ${severity.toUpperCase()}`,
                text: message,
                footer: formatContext(context, ': '),
                ts: Math.floor(timestamp.getTime() / 1000),
            }],
        });
        const webhookPayload = JSON.stringify({
            severity,
            message,
            topic,
            context,
            timestamp: timestamp.toISOString(),
            service: this.serviceName,
        });

        const [slack, webhook] = await Promise.all([
            this.deliver('slack', this.config.slackWebhook, topic, slackPayload),
            this.deliver('webhook', this.config.webhookUrl, topic, webhookPayload),
        ]);
        return { slack, webhook };
    }
}

// ─── Dispatcher Wiring ────────────────────────────────────────────────────────

/** Registers the notifier on the dispatcher; returns a function that detaches it. */
export function attachAlertChannels(dispatcher: CallbackDispatcher, notifier: AlertNotifier): () => void {
    const detach = [
        dispatcher.register('PriceAlertFired', async (alert) => {
            const sign = alert.pctChange > 0 ? '+' : '';
            await notifier.sendAlert(
                alert.direction === 'drop' ? 'warning' : 'info',
                `Price ${alert.direction} for ${alert.productId} at ${alert.sourceId}: ` +
                `${alert.previousPrice.toFixed(2)} → ${alert.newPrice.toFixed(2)} (${sign}${alert.pctChange}%)`,
                { product: alert.productId, source: alert.sourceId, at: alert.timestamp.toISOString() },
                `price:${alert.productId}@${alert.sourceId}`,
            );
        }),
        dispatcher.register('JobFailed', async (event) => {
            if (!event.terminal) return;
            await notifier.sendAlert(
                'critical',
                `Job ${event.name} stopped after ${event.retryCount} failure(s): ${event.error}`,
                { jobId: event.jobId, code: event.errorCode ?? undefined, retryable: event.retryable },
                `job-failed:${event.jobId}`,
            );
        }),
        dispatcher.register('ChangeDetected', async ({ jobId, report }) => {
            const sample = report.added[0];
            await notifier.sendAlert(
                'info',
                `Content changed for ${report.sourceKey}: +${report.added.length} / -${report.removed.length} items`,
                {
                    jobId: jobId ?? undefined,
                    firstAdded: sample ? JSON.stringify(itemToObject(sample)) : undefined,
                },
                `change:${report.sourceKey}`,
            );
        }),
    ];
    return () => {
        for (const off of detach) off();
    };
}
