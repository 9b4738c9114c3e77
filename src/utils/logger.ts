import fs from 'fs';
import path from 'path';
import { env } from '../config/env';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let fileStream: fs.WriteStream | null = null;

if (env.LOG_FILE) {
    fs.mkdirSync(path.dirname(env.LOG_FILE), { recursive: true });
    fileStream = fs.createWriteStream(env.LOG_FILE, { flags: 'a' });
}

export interface Logger {
    debug(message: string, ...meta: unknown[]): void;
    info(message: string, ...meta: unknown[]): void;
    warn(message: string, ...meta: unknown[]): void;
    error(message: string, ...meta: unknown[]): void;
}

function formatMeta(meta: unknown[]): string {
    return meta
        .map(m => (m instanceof Error ? m.stack || m.message : typeof m === 'string' ? m : JSON.stringify(m)))
        .join(' ');
}

/**
 * Console logger with a `[Tag]` prefix, gated by LOG_LEVEL and mirrored to LOG_FILE when set.
 */
export function createLogger(tag: string, level: LogLevel = env.LOG_LEVEL): Logger {
    const write = (lvl: LogLevel, message: string, meta: unknown[]) => {
        if (LEVEL_ORDER[lvl] < LEVEL_ORDER[level]) return;

        const line = `[${tag}] ${message}`;
        if (lvl === 'error') console.error(line, ...meta);
        else if (lvl === 'warn') console.warn(line, ...meta);
        else console.log(line, ...meta);

        if (fileStream) {
            const suffix = meta.length > 0 ? ` ${formatMeta(meta)}` : '';
            fileStream.write(`${new Date().toISOString()} ${lvl.toUpperCase()} ${line}${suffix}\n`);
        }
    };

    return {
        debug: (message, ...meta) => write('debug', message, meta),
        info: (message, ...meta) => write('info', message, meta),
        warn: (message, ...meta) => write('warn', message, meta),
        error: (message, ...meta) => write('error', message, meta),
    };
}
