export interface GenerateResult {
    text: string;
    tokensUsed: number;
    /** USD; the gateway prices the call from its table when absent. */
    costEstimate?: number;
}

/**
 * The only contract the engine requires from a reasoning backend. New providers
 * are added by implementing this, never by special-casing the pipeline.
 */
export interface ReasoningProvider {
    readonly name: string;
    readonly model: string;
    generate(prompt: string, maxTokens: number, signal?: AbortSignal): Promise<GenerateResult>;
}

export type ProviderFailureKind = 'rate_limited' | 'network' | 'server' | 'client' | 'malformed';

export class ProviderFailure extends Error {
    constructor(
        public readonly kind: ProviderFailureKind,
        message: string,
        public readonly retryAfterMs?: number,
        public readonly httpStatus?: number
    ) {
        super(message);
        this.name = 'ProviderFailure';
    }

    get retryable(): boolean {
        return this.kind !== 'client';
    }
}

/** Parses a Retry-After header (seconds or HTTP date) into milliseconds. */
export function parseRetryAfter(raw: string | null, nowMs: number = Date.now()): number | undefined {
    if (!raw) return undefined;
    const secs = Number(raw);
    if (Number.isFinite(secs) && secs >= 0) return Math.round(secs * 1000);
    const at = Date.parse(raw);
    if (Number.isFinite(at)) return Math.max(0, at - nowMs);
    return undefined;
}
