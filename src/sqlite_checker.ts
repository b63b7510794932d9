// SQLite sandbox checker
// CONTRACT: every check runs against a fresh in-memory database built from the
// mapping model; nothing persists between checks.
// The probe runs in a worker thread: better-sqlite3 is synchronous, and a runaway
// query must not hold the event loop. The worker is terminated on abort or timeout.

import { Worker } from 'worker_threads';
import { TIMEOUTS } from './config';
import { referencedColumns } from './mapping_model';
import { createLogger, Logger } from './logger';
import type { CheckContext, CheckResult, MappingModel, QueryChecker, TableSpec } from './types';

/** Seed rows keyed by table name (`name` or `schema.name`). */
export type SeedData = Record<string, Array<Record<string, unknown>>>;

type SqlValue = number | string | bigint | Buffer | null;

function quoteIdent(name: string): string {
    return `"${name.replace(/"/g, '""')}"`;
}

function toSqlValue(v: unknown): SqlValue {
    if (v === null || v === undefined) return null;
    if (typeof v === 'number' || typeof v === 'string' || typeof v === 'bigint') return v;
    if (typeof v === 'boolean') return v ? 1 : 0;
    if (Buffer.isBuffer(v)) return v;
    return JSON.stringify(v);
}

function isRow(v: unknown): v is Record<string, unknown> {
    return v !== null && typeof v === 'object' && !Array.isArray(v);
}

function splitName(table: TableSpec): { schema: string | null; name: string } {
    if (table.schema) return { schema: table.schema, name: table.name };
    const dot = table.name.lastIndexOf('.');
    if (dot > 0) return { schema: table.name.slice(0, dot), name: table.name.slice(dot + 1) };
    return { schema: null, name: table.name };
}

/** One setup step: `exec` when there are no params, a prepared `run` otherwise. */
export interface SetupStatement {
    sql: string;
    params?: SqlValue[];
}

type WorkerReply =
    | { type: 'result'; rowCount: number | null }
    | { type: 'error'; message: string };

function isWorkerReply(msg: unknown): msg is WorkerReply {
    if (!isRow(msg)) return false;
    if (msg.type === 'result') return msg.rowCount === null || typeof msg.rowCount === 'number';
    return msg.type === 'error' && typeof msg.message === 'string';
}

// Plain JS, evaluated in the worker; the driver path is resolved by the parent.
const WORKER_CODE = `
    const { parentPort, workerData } = require("worker_threads");
    const Database = require(workerData.driver);
    const db = new Database(":memory:");
    const toParam = (v) => ArrayBuffer.isView(v) ? Buffer.from(v.buffer, v.byteOffset, v.byteLength) : v;
    try {
        for (const s of workerData.statements) {
            if (s.params) db.prepare(s.sql).run(...s.params.map(toParam));
            else db.exec(s.sql);
        }
        const row = db.prepare(workerData.probe).get();
        const count = row && typeof row === "object" ? Number(row.row_count) : NaN;
        parentPort.postMessage({ type: "result", rowCount: Number.isFinite(count) ? count : null });
    } catch (err) {
        parentPort.postMessage({ type: "error", message: String(err && err.message ? err.message : err) });
    } finally {
        db.close();
    }
`;

export class SandboxKilledError extends Error {
    constructor(public readonly timeoutMs: number) {
        super(`sandbox worker killed after ${timeoutMs}ms`);
        this.name = 'SandboxKilledError';
    }
}

export class SqliteSandboxChecker implements QueryChecker {
    private readonly log: Logger;
    private readonly driver = require.resolve('better-sqlite3');

    constructor(
        private readonly seed: SeedData = {},
        logger?: Logger,
        private readonly hardTimeoutMs: number = TIMEOUTS.CHECK_WORKER_MS
    ) {
        this.log = logger ?? createLogger('sqlite-checker');
    }

    async check(candidateFragment: string, context: CheckContext, signal?: AbortSignal): Promise<CheckResult> {
        if (signal?.aborted) return { passed: false, failureReason: 'check cancelled' };

        const reply = await this.runInWorker(this.schemaStatements(context.mapping), context.probe, signal);
        if (reply === null) return { passed: false, failureReason: 'check cancelled' };
        if (reply.type === 'error') {
            this.log.debug('Probe rejected', { node: context.node?.id ?? 'query', reason: reply.message, fragment: candidateFragment.slice(0, 200) });
            return { passed: false, failureReason: reply.message };
        }
        return reply.rowCount === null ? { passed: true } : { passed: true, rowEstimate: reply.rowCount };
    }

    /** Resolves null when `signal` aborts; rejects when the worker dies or overruns. */
    private runInWorker(statements: SetupStatement[], probe: string, signal?: AbortSignal): Promise<WorkerReply | null> {
        return new Promise<WorkerReply | null>((resolve, reject) => {
            const worker = new Worker(WORKER_CODE, {
                eval: true,
                workerData: { driver: this.driver, statements, probe },
            });
            let settled = false;

            const finish = (outcome: () => void): void => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                signal?.removeEventListener('abort', onAbort);
                outcome();
            };
            const kill = (): void => {
                worker.terminate().catch((e: unknown) => this.log.warn('Sandbox worker did not terminate cleanly', { error: String(e) }));
            };

            const timer = setTimeout(() => {
                this.log.error(`Sandbox worker timeout after ${this.hardTimeoutMs}ms`);
                finish(() => reject(new SandboxKilledError(this.hardTimeoutMs)));
                kill();
            }, this.hardTimeoutMs);

            const onAbort = (): void => {
                finish(() => resolve(null));
                kill();
            };
            signal?.addEventListener('abort', onAbort, { once: true });

            worker.on('message', (msg: unknown) => {
                finish(() => (isWorkerReply(msg) ? resolve(msg) : reject(new Error('sandbox worker sent an unexpected message'))));
            });
            worker.on('error', (err: Error) => finish(() => reject(err)));
            worker.on('exit', (code: number) => finish(() => reject(new Error(`sandbox worker exited with code ${code}`))));
        });
    }

    /** One untyped table per mapping table, in attached databases per schema, then seed rows. */
    schemaStatements(mapping: MappingModel): SetupStatement[] {
        const statements: SetupStatement[] = [];
        const attached = new Set<string>(['main', 'temp']);

        for (const table of mapping.tables) {
            const { schema, name } = splitName(table);
            if (schema && !attached.has(schema.toLowerCase())) {
                statements.push({ sql: `ATTACH DATABASE ':memory:' AS ${quoteIdent(schema)}` });
                attached.add(schema.toLowerCase());
            }

            const seedRows = this.seedFor(table).filter(isRow);
            const columns = [...referencedColumns(mapping, table)];
            const lower = new Set(columns.map((c) => c.toLowerCase()));
            for (const row of seedRows) {
                for (const key of Object.keys(row)) {
                    if (!lower.has(key.toLowerCase())) {
                        lower.add(key.toLowerCase());
                        columns.push(key);
                    }
                }
            }
            if (columns.length === 0) columns.push('id');

            const qualified = `${schema ? `${quoteIdent(schema)}.` : ''}${quoteIdent(name)}`;
            statements.push({ sql: `CREATE TABLE IF NOT EXISTS ${qualified} (${columns.map(quoteIdent).join(', ')})` });

            for (const row of seedRows) {
                const keys = Object.keys(row);
                if (keys.length === 0) continue;
                statements.push({
                    sql: `INSERT INTO ${qualified} (${keys.map(quoteIdent).join(', ')}) VALUES (${keys.map(() => '?').join(', ')})`,
                    params: keys.map((k) => toSqlValue(row[k])),
                });
            }
        }
        return statements;
    }

    private seedFor(table: TableSpec): unknown[] {
        const keys = [table.name, table.schema ? `${table.schema}.${table.name}` : null, table.alias ?? null]
            .filter((k): k is string => k !== null);
        for (const k of keys) {
            const rows = this.seed[k];
            if (Array.isArray(rows)) return rows;
        }
        return [];
    }
}
