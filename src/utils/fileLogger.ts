/**
 * src/utils/fileLogger.ts
 *
 * Dual-output logging: every line written to stdout/stderr (crawlee's log
 * included) is also appended to a log file.
 *
 * BEHAVIOUR
 * ─────────
 *  • initFileLogger() truncates the file, so every run starts clean.
 *  • When the file grows past 25 MB it is cut back to its last ~20 MB,
 *    starting at a line boundary.
 *  • closeFileLogger() closes the stream and restores the console writers.
 */

import * as fs from 'fs';
import * as path from 'path';
import { toErrorMessage } from './errors.js';

const MAX_LOG_SIZE = 25 * 1024 * 1024;
const TARGET_SIZE = 20 * 1024 * 1024;
const SIZE_CHECK_EVERY = 1024 * 1024;

let logFile: string | null = null;
let writeStream: fs.WriteStream | null = null;
let bytesSinceLastCheck = 0;
let isTruncating = false;
const restorers: Array<() => void> = [];

function truncateLogFile(): void {
    if (isTruncating || !logFile) return;
    isTruncating = true;

    try {
        const stats = fs.statSync(logFile);
        if (stats.size <= MAX_LOG_SIZE) return;

        writeStream?.end();
        writeStream = null;

        const fd = fs.openSync(logFile, 'r');
        const buffer = Buffer.alloc(TARGET_SIZE);
        const bytesRead = fs.readSync(fd, buffer, 0, TARGET_SIZE, Math.max(0, stats.size - TARGET_SIZE));
        fs.closeSync(fd);

        let content = buffer.toString('utf-8', 0, bytesRead);
        const firstNewLine = content.indexOf('\n');
        if (firstNewLine !== -1 && firstNewLine < content.length - 1) {
            content = content.slice(firstNewLine + 1);
        }

        fs.writeFileSync(logFile, content, 'utf-8');
        writeStream = fs.createWriteStream(logFile, { flags: 'a', encoding: 'utf-8' });
        writeStream.write(
            `\n--- LOG ROTATED AT ${new Date().toISOString()} (size was ${Math.round(stats.size / 1024 / 1024)}MB) ---\n`,
        );
    } catch (err) {
        process.stderr.write(`[FileLogger] Rotation failed: ${toErrorMessage(err)}\n`);
    } finally {
        isTruncating = false;
        bytesSinceLastCheck = 0;
    }
}

function mirror(chunk: unknown): void {
    if (!writeStream || isTruncating) return;

    const text = typeof chunk === 'string'
        ? chunk
        : chunk instanceof Uint8Array ? Buffer.from(chunk).toString('utf-8') : '';
    if (text === '') return;

    writeStream.write(text);
    bytesSinceLastCheck += Buffer.byteLength(text);
    if (bytesSinceLastCheck > SIZE_CHECK_EVERY) {
        bytesSinceLastCheck = 0;
        setImmediate(truncateLogFile);
    }
}

function tee(stream: NodeJS.WriteStream): () => void {
    const original = stream.write;
    const hooked: typeof stream.write = (...args: unknown[]): boolean => {
        mirror(args[0]);
        return Reflect.apply(original, stream, args);
    };
    stream.write = hooked;
    return () => {
        stream.write = original;
    };
}

/**
 * Starts mirroring console output to `filePath` (relative paths resolve
 * against the working directory). Call once, before any log output.
 */
export function initFileLogger(filePath: string): string {
    closeFileLogger();

    logFile = path.resolve(process.cwd(), filePath);
    fs.writeFileSync(logFile, '', 'utf-8');
    writeStream = fs.createWriteStream(logFile, { flags: 'a', encoding: 'utf-8' });

    restorers.push(tee(process.stdout), tee(process.stderr));
    return logFile;
}

export function closeFileLogger(): void {
    while (restorers.length > 0) {
        restorers.pop()?.();
    }
    writeStream?.end();
    writeStream = null;
    logFile = null;
}
