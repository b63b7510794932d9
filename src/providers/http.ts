import { sanitizeErrorSnippet } from '../config';
import { ProviderFailure, parseRetryAfter } from './provider';

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function asRecord(value: unknown): JsonRecord | null {
    return isRecord(value) ? value : null;
}

export function clampInt(n: unknown): number {
    const x = Number(n);
    if (!Number.isFinite(x)) return 0;
    return Math.max(0, Math.floor(x));
}

/**
 * POSTs a JSON body and returns the parsed JSON response. Non-2xx responses and
 * transport errors are mapped to ProviderFailure.
 */
export async function postJson(
    url: string,
    headers: Record<string, string>,
    body: unknown,
    providerName: string,
    signal?: AbortSignal
): Promise<JsonRecord> {
    let resp: Response;
    try {
        resp = await fetch(url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', ...headers },
            body: JSON.stringify(body),
            signal,
        });
    } catch (e) {
        // Aborts propagate untouched so the caller can tell cancellation from failure.
        if (signal?.aborted) throw e;
        throw new ProviderFailure('network', `${providerName} network_error: ${sanitizeErrorSnippet(e instanceof Error ? e.message : String(e))}`);
    }

    const bodyText = await resp.text();

    if (!resp.ok) {
        const snippet = sanitizeErrorSnippet(bodyText);
        const status = resp.status;
        if (status === 429) {
            throw new ProviderFailure('rate_limited', `${providerName} rate limited: ${snippet}`, parseRetryAfter(resp.headers.get('retry-after')), status);
        }
        const kind = status >= 500 ? 'server' : 'client';
        throw new ProviderFailure(kind, `${providerName} error ${status}: ${snippet}`, undefined, status);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(bodyText);
    } catch {
        throw new ProviderFailure('malformed', `${providerName} response was not JSON: ${sanitizeErrorSnippet(bodyText)}`, undefined, resp.status);
    }
    const record = asRecord(parsed);
    if (!record) {
        throw new ProviderFailure('malformed', `${providerName} response was not a JSON object`, undefined, resp.status);
    }
    return record;
}
