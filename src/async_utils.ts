// Cancellation-aware waiting shared by the gateway, the validator and the pipeline.

import { ErrorFactory, isPipelineError, PipelineError } from './structured_error';

export class CallTimeoutError extends Error {
    constructor(public readonly timeoutMs: number) {
        super(`timeout after ${timeoutMs}ms`);
        this.name = 'CallTimeoutError';
    }
}

/** The pipeline-level error carried by an aborted signal. */
export function abortError(signal: AbortSignal): PipelineError {
    return isPipelineError(signal.reason) ? signal.reason : ErrorFactory.cancelled();
}

export function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) throw abortError(signal);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    return new Promise<void>((resolve, reject) => {
        const onAbort = (): void => {
            clearTimeout(tid);
            if (signal) reject(abortError(signal));
        };
        const tid = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Runs `work` with its own signal that aborts when the parent aborts or when
 * `timeoutMs` elapses. Timeout rejects with CallTimeoutError, parent abort with
 * the parent's pipeline error.
 */
export async function withTimeout<T>(
    work: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    parent?: AbortSignal
): Promise<T> {
    throwIfAborted(parent);

    const ac = new AbortController();
    let tid: NodeJS.Timeout | undefined;
    let onParentAbort: (() => void) | undefined;

    const guard = new Promise<never>((_, reject) => {
        tid = setTimeout(() => {
            const err = new CallTimeoutError(timeoutMs);
            ac.abort(err);
            reject(err);
        }, timeoutMs);
        if (parent) {
            onParentAbort = (): void => {
                const err = abortError(parent);
                ac.abort(err);
                reject(err);
            };
            parent.addEventListener('abort', onParentAbort, { once: true });
        }
    });

    try {
        return await Promise.race([work(ac.signal), guard]);
    } finally {
        clearTimeout(tid);
        if (parent && onParentAbort) parent.removeEventListener('abort', onParentAbort);
    }
}
