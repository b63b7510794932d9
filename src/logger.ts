/**
 * Structured Logger
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when QUERYSMITH_LOG_JSON=1
 * - Optional file output via QUERYSMITH_LOG_FILE
 * - Module context (component name) on every line
 * - Request correlation bound per logger, so concurrent pipelines never share it
 *
 * Environment:
 *   QUERYSMITH_LOG_LEVEL  = debug|info|warn|error|silent (default: info)
 *   QUERYSMITH_LOG_JSON   = 1 (default: text)
 *   QUERYSMITH_LOG_FILE   = path (optional, appends)
 *   QUERYSMITH_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

function parseLevel(raw: string | undefined): number {
    const v = (raw || 'info').toLowerCase();
    if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error' || v === 'silent') {
        return LEVEL_ORDER[v];
    }
    return LEVEL_ORDER.info;
}

const DEBUG_OVERRIDE = process.env.QUERYSMITH_DEBUG === '1' || process.env.QUERYSMITH_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : parseLevel(process.env.QUERYSMITH_LOG_LEVEL);

const JSON_MODE = process.env.QUERYSMITH_LOG_JSON === '1';
const LOG_FILE = process.env.QUERYSMITH_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Correlation Context                                                        */
/* -------------------------------------------------------------------------- */

export interface LogContext {
    requestId?: string;
    stage?: string;
    node?: string;
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, ctx: LogContext, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (ctx.requestId) entry.request_id = ctx.requestId;
        if (ctx.stage) entry.stage = ctx.stage;
        if (ctx.node) entry.node = ctx.node;
        if (data) entry.data = data;
        writeOutput(level, JSON.stringify(entry));
    } else {
        const scope = ctx.requestId
            ? ` [${ctx.requestId.slice(0, 8)}${ctx.stage ? ':' + ctx.stage : ''}${ctx.node ? '/' + ctx.node : ''}]`
            : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${scope}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(level, line);
    }
}

function writeOutput(level: LogLevel, line: string): void {
    switch (level) {
        case 'error': process.stderr.write(line + '\n'); break;
        case 'warn':  process.stderr.write(line + '\n'); break;
        default:      process.stdout.write(line + '\n'); break;
    }

    if (LOG_FILE) {
        try {
            fs.appendFileSync(LOG_FILE, line + '\n');
        } catch (e) {
            process.stderr.write(`[logger] file append failed: ${e instanceof Error ? e.message : String(e)}\n`);
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
    /** Returns a logger with additional correlation fields merged in. */
    withContext(ctx: LogContext): Logger;
}

export function createLogger(component: string, ctx: LogContext = {}): Logger {
    return {
        debug: (msg, data) => emit('debug', component, ctx, msg, data),
        info:  (msg, data) => emit('info',  component, ctx, msg, data),
        warn:  (msg, data) => emit('warn',  component, ctx, msg, data),
        error: (msg, data) => emit('error', component, ctx, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`, ctx),
        withContext: (more) => createLogger(component, { ...ctx, ...more }),
    };
}
