/**
 * src/config/jobsFile.ts
 *
 * Job definitions on disk: a JSON array of scrape targets with their
 * schedule. Loading validates every entry with zod; saving writes what
 * `JobScheduler.exportJobs()` returns, so a save/load round trip restores
 * the same jobs.
 *
 *   [
 *     {
 *       "name": "widgets",
 *       "url": "https://shop.example/widgets",
 *       "selector": { "container": ".product", "fields": { "name": "h2", "price": ".price" } },
 *       "cron": "*\/15 * * * *",
 *       "price": { "sourceId": "shop" }
 *     }
 *   ]
 */

import * as fs from 'fs/promises';
import { log } from 'crawlee';
import { z } from 'zod';
import type { ScrapeTarget } from '../pipeline.js';
import type { ExportedJob, JobDefinition } from '../scheduler.js';
import { ConfigError, toErrorMessage } from '../utils/errors.js';

// ─── Schema ───────────────────────────────────────────────────────────────────

const selectorSchema = z.object({
    container: z.string().min(1),
    fields: z.record(z.string().min(1)).optional(),
    required: z.boolean().optional(),
});

const priceSchema = z.object({
    sourceId: z.string().min(1).optional(),
    priceField: z.string().min(1).optional(),
    nameField: z.string().min(1).optional(),
});

export const jobEntrySchema = z.object({
    id: z.string().min(1).optional(),
    name: z.string().min(1),
    url: z.string().url(),
    selector: selectorSchema,
    headers: z.record(z.string()).optional(),
    sourceKey: z.string().min(1).optional(),
    price: priceSchema.optional(),
    intervalSeconds: z.number().positive().optional(),
    cron: z.string().nullable().optional(),
    maxRetries: z.number().int().min(0).optional(),
    enabled: z.boolean().optional(),
});

export const jobsFileSchema = z.array(jobEntrySchema);

export type JobEntry = z.infer<typeof jobEntrySchema>;

// ─── Conversion ───────────────────────────────────────────────────────────────

export function toJobDefinition(entry: JobEntry): JobDefinition<ScrapeTarget> {
    return {
        id: entry.id,
        name: entry.name,
        target: {
            name: entry.name,
            url: entry.url,
            selector: entry.selector,
            headers: entry.headers,
            sourceKey: entry.sourceKey,
            price: entry.price,
        },
        intervalSeconds: entry.intervalSeconds,
        cron: entry.cron,
        maxRetries: entry.maxRetries,
        enabled: entry.enabled,
    };
}

export function toJobEntry(job: ExportedJob<ScrapeTarget>): JobEntry {
    const { target } = job;
    return {
        id: job.id,
        name: job.name,
        url: target.url,
        selector: target.selector,
        headers: target.headers,
        sourceKey: target.sourceKey,
        price: target.price,
        intervalSeconds: job.intervalSeconds,
        cron: job.cron,
        maxRetries: job.maxRetries,
        enabled: job.enabled,
    };
}

/** Throws ConfigError naming every invalid entry. */
export function parseJobsFile(text: string, origin = 'jobs file'): JobDefinition<ScrapeTarget>[] {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        throw new ConfigError(`${origin}: invalid JSON (${toErrorMessage(err)})`, { cause: err });
    }

    const parsed = jobsFileSchema.safeParse(raw);
    if (!parsed.success) {
        const lines = parsed.error.issues.map((i) => `- ${i.path.join('.') || '(root)'}: ${i.message}`);
        throw new ConfigError(`${origin}: invalid job definitions:\n${lines.join('\n')}`, { cause: parsed.error });
    }
    return parsed.data.map(toJobDefinition);
}

// ─── File I/O ─────────────────────────────────────────────────────────────────

/** A missing file yields no jobs. */
export async function loadJobsFile(filePath: string): Promise<JobDefinition<ScrapeTarget>[]> {
    let text: string;
    try {
        text = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
            log.warning(`[Config] Jobs file not found: ${filePath}`);
            return [];
        }
        throw new ConfigError(`Could not read ${filePath}: ${toErrorMessage(err)}`, { cause: err });
    }

    const defs = parseJobsFile(text, filePath);
    log.info(`[Config] Loaded ${defs.length} job(s) from ${filePath}`);
    return defs;
}

export async function saveJobsFile(filePath: string, jobs: readonly ExportedJob<ScrapeTarget>[]): Promise<void> {
    const entries = jobs.map(toJobEntry);
    await fs.writeFile(filePath, JSON.stringify(entries, null, 2) + '\n', 'utf-8');
    log.info(`[Config] Saved ${entries.length} job(s) to ${filePath}`);
}
