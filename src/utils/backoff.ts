/**
 * src/utils/backoff.ts
 *
 * Retry delay and interval helpers for the job scheduler.
 */

/**
 * Exponential backoff: base × 2^attempt, capped at maxMs.
 * `attempt` counts earlier consecutive failures, so the first retry waits `baseMs`.
 */
export function computeBackoff(attempt: number, baseMs: number, maxMs: number): number {
    const n = Math.max(0, Math.floor(attempt));
    return Math.min(maxMs, baseMs * 2 ** n);
}

/**
 * Interval in seconds for the simple cron shapes, or null when the
 * expression is not one of them:
 *
 *   "*\/N * * * *"  every N minutes
 *   "0 * * * *"    every hour
 *   "0 0 * * *"    every day at midnight
 *
 * Month and weekday fields are not interpreted.
 */
export function parseCron(expr: string): number | null {
    const parts = expr.trim().split(/\s+/);
    if (parts.length !== 5) return null;

    const [minute, hour, day] = parts;

    if (minute.startsWith('*/') && hour === '*' && day === '*') {
        const step = minute.slice(2);
        if (!/^\d+$/.test(step)) return null;
        const minutes = Number(step);
        return minutes > 0 ? minutes * 60 : null;
    }
    if (minute === '0' && hour === '*' && day === '*') return 3600;
    if (minute === '0' && hour === '0' && day === '*') return 86_400;
    return null;
}
