// provider_gateway.ts - uniform access to interchangeable reasoning providers

import crypto from 'crypto';
import { LRUCache } from 'lru-cache';
import { CallTimeoutError, abortError, sleep, throwIfAborted, withTimeout } from './async_utils';
import { BACKOFF, GATEWAY, TIMEOUTS, estimateTokens, getModelPricing, sanitizeErrorSnippet } from './config';
import { createLogger, Logger } from './logger';
import { ProviderFailure, ReasoningProvider } from './providers/provider';
import { ErrorCode, ErrorFactory } from './structured_error';

const defaultLog = createLogger('provider-gateway');

// ============================================================================
// Types
// ============================================================================

export interface ProviderLimits {
    requestsPerMinute: number;
    tokensPerMinute: number;
    requestsPerDay: number | null;
    tokensPerDay: number | null;
}

export interface ProviderPricing {
    /** USD per million prompt tokens. */
    prompt: number;
    /** USD per million completion tokens. */
    completion: number;
}

export interface ProviderEntry {
    provider: ReasoningProvider;
    limits?: Partial<ProviderLimits>;
    pricing?: ProviderPricing;
}

export interface BackoffConfig {
    baseMs: number;
    factor: number;
    capMs: number;
    /** Fractional jitter, 0.5 = ±50%. */
    jitter: number;
}

export interface GatewayClock {
    now(): number;
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
    /** Uniform in [0, 1). */
    random(): number;
}

export interface GatewayOptions {
    maxAttemptsPerProvider?: number;
    failureThreshold?: number;
    cooldownMs?: number;
    backoff?: Partial<BackoffConfig>;
    callTimeoutMs?: number;
    cacheEntries?: number;
    clock?: Partial<GatewayClock>;
    logger?: Logger;
}

export type CallOutcome =
    | { kind: 'completed'; provider: string; text: string; tokensUsed: number; costUsd: number }
    | { kind: 'rate_limited'; provider: string; retryAfterMs?: number; local: boolean }
    | { kind: 'provider_error'; provider: string; code: ErrorCode; message: string; retryable: boolean };

export interface RetryNotice {
    provider: string;
    attempt: number;
    delayMs: number;
    reason: string;
}

export interface CallOptions {
    signal?: AbortSignal;
    logger?: Logger;
}

export interface CompleteOptions extends CallOptions {
    onRetry?: (notice: RetryNotice) => void;
}

export interface Completion {
    provider: string;
    text: string;
    tokensUsed: number;
    costUsd: number;
    /** Provider calls made, across all providers, including the successful one. */
    calls: number;
}

export interface CachedCompletion {
    provider: string;
    text: string;
    tokensUsed: number;
}

export interface AccountSnapshot {
    provider: string;
    requestsLastMinute: number;
    tokensLastMinute: number;
    requestsLastDay: number;
    tokensLastDay: number;
    consecutiveFailures: number;
    cooldownUntil: number | null;
}

// ============================================================================
// Backoff
// ============================================================================

/**
 * Delay before retry number `attempt` (1-based). The result never drops below
 * `previousMs`, so a per-call delay sequence is non-decreasing up to the cap.
 * A larger provider hint wins, up to the cap.
 */
export function backoffDelay(
    attempt: number,
    previousMs: number,
    random: () => number,
    config: BackoffConfig,
    retryAfterMs?: number
): number {
    const raw = Math.min(config.capMs, config.baseMs * Math.pow(config.factor, Math.max(0, attempt - 1)));
    const jittered = raw * (1 + config.jitter * (2 * random() - 1));
    let delay = Math.max(previousMs, Math.min(config.capMs, Math.round(jittered)));
    if (retryAfterMs !== undefined) delay = Math.max(delay, Math.min(config.capMs, retryAfterMs));
    return delay;
}

// ============================================================================
// Mutex (single-slot semaphore)
// ============================================================================

class Mutex {
    private locked = false;
    private queue: Array<() => void> = [];

    private async acquire(): Promise<void> {
        if (!this.locked) {
            this.locked = true;
            return;
        }
        return new Promise<void>((resolve) => {
            this.queue.push(resolve);
        });
    }

    private release(): void {
        const next = this.queue.shift();
        if (next) {
            next();
        } else {
            this.locked = false;
        }
    }

    async runExclusive<T>(fn: () => T): Promise<T> {
        await this.acquire();
        try {
            return fn();
        } finally {
            this.release();
        }
    }
}

// ============================================================================
// Provider account
// ============================================================================

interface WindowEntry {
    id: number;
    ts: number;
    tokens: number;
}

class ProviderAccount {
    private entries: WindowEntry[] = [];
    private nextId = 1;
    consecutiveFailures = 0;
    cooldownUntil = 0;

    constructor(readonly entry: ProviderEntry, readonly limits: ProviderLimits) { }

    get name(): string {
        return this.entry.provider.name;
    }

    prune(now: number): void {
        const cutoff = now - GATEWAY.DAY_WINDOW_MS;
        this.entries = this.entries.filter((e) => e.ts > cutoff);
    }

    usage(now: number, windowMs: number): { requests: number; tokens: number; oldestTs: number | null } {
        const cutoff = now - windowMs;
        let requests = 0;
        let tokens = 0;
        let oldestTs: number | null = null;
        for (const e of this.entries) {
            if (e.ts <= cutoff) continue;
            requests++;
            tokens += e.tokens;
            if (oldestTs === null || e.ts < oldestTs) oldestTs = e.ts;
        }
        return { requests, tokens, oldestTs };
    }

    /**
     * Milliseconds until the projected call fits the windows, or 0 when it fits now.
     */
    saturation(now: number, tokens: number): number {
        const checks: Array<{ windowMs: number; maxRequests: number | null; maxTokens: number | null }> = [
            { windowMs: GATEWAY.MINUTE_WINDOW_MS, maxRequests: this.limits.requestsPerMinute, maxTokens: this.limits.tokensPerMinute },
            { windowMs: GATEWAY.DAY_WINDOW_MS, maxRequests: this.limits.requestsPerDay, maxTokens: this.limits.tokensPerDay },
        ];
        let waitMs = 0;
        for (const c of checks) {
            const u = this.usage(now, c.windowMs);
            const overRequests = c.maxRequests !== null && u.requests + 1 > c.maxRequests;
            const overTokens = c.maxTokens !== null && u.tokens + tokens > c.maxTokens;
            if ((overRequests || overTokens) && u.oldestTs !== null) {
                waitMs = Math.max(waitMs, u.oldestTs + c.windowMs - now);
            } else if (overTokens) {
                // A single call larger than the window allowance never fits.
                waitMs = Math.max(waitMs, c.windowMs);
            }
        }
        return waitMs;
    }

    reserve(now: number, tokens: number): number {
        const id = this.nextId++;
        this.entries.push({ id, ts: now, tokens });
        return id;
    }

    settle(id: number, tokens: number): void {
        const e = this.entries.find((x) => x.id === id);
        if (e) e.tokens = tokens;
    }

    release(id: number): void {
        this.entries = this.entries.filter((x) => x.id !== id);
    }

    inCooldown(now: number): boolean {
        return now < this.cooldownUntil;
    }
}

function sha256Hex(s: string): string {
    return crypto.createHash('sha256').update(s).digest('hex');
}

function failureCode(f: ProviderFailure): ErrorCode {
    switch (f.kind) {
        case 'rate_limited': return 'RATE_LIMITED';
        case 'network': return 'NETWORK_ERROR';
        default: return 'PROVIDER_ERROR';
    }
}

// ============================================================================
// ProviderGateway
// ============================================================================

export class ProviderGateway {
    private readonly accounts: ProviderAccount[];
    private readonly lock = new Mutex();
    private readonly cache: LRUCache<string, CachedCompletion>;
    private readonly clock: GatewayClock;
    private readonly backoff: BackoffConfig;
    private readonly maxAttempts: number;
    private readonly failureThreshold: number;
    private readonly cooldownMs: number;
    private readonly callTimeoutMs: number;
    private readonly log: Logger;

    /** Providers in priority order; the first entry is tried first. */
    constructor(entries: ProviderEntry[], options: GatewayOptions = {}) {
        const names = new Set<string>();
        for (const e of entries) {
            if (names.has(e.provider.name)) {
                throw new Error(`Duplicate provider name: ${e.provider.name}`);
            }
            names.add(e.provider.name);
        }

        this.accounts = entries.map((e) => new ProviderAccount(e, {
            requestsPerMinute: e.limits?.requestsPerMinute ?? GATEWAY.DEFAULT_REQUESTS_PER_MINUTE,
            tokensPerMinute: e.limits?.tokensPerMinute ?? GATEWAY.DEFAULT_TOKENS_PER_MINUTE,
            requestsPerDay: e.limits?.requestsPerDay ?? null,
            tokensPerDay: e.limits?.tokensPerDay ?? null,
        }));
        this.clock = {
            now: options.clock?.now ?? (() => Date.now()),
            sleep: options.clock?.sleep ?? sleep,
            random: options.clock?.random ?? Math.random,
        };
        this.backoff = {
            baseMs: options.backoff?.baseMs ?? BACKOFF.BASE_MS,
            factor: options.backoff?.factor ?? BACKOFF.FACTOR,
            capMs: options.backoff?.capMs ?? BACKOFF.CAP_MS,
            jitter: options.backoff?.jitter ?? BACKOFF.JITTER,
        };
        this.maxAttempts = Math.max(1, options.maxAttemptsPerProvider ?? GATEWAY.MAX_ATTEMPTS_PER_PROVIDER);
        this.failureThreshold = Math.max(1, options.failureThreshold ?? GATEWAY.FAILURE_THRESHOLD);
        this.cooldownMs = options.cooldownMs ?? GATEWAY.COOLDOWN_MS;
        this.callTimeoutMs = options.callTimeoutMs ?? TIMEOUTS.PROVIDER_CALL_MS;
        this.cache = new LRUCache<string, CachedCompletion>({
            max: Math.max(1, options.cacheEntries ?? GATEWAY.RESPONSE_CACHE_ENTRIES),
        });
        this.log = options.logger ?? defaultLog;

        if (this.accounts.length === 0) {
            this.log.warn('No providers configured; every completion will fail with ALL_PROVIDERS_UNAVAILABLE');
        }
    }

    get providerNames(): string[] {
        return this.accounts.map((a) => a.name);
    }

    /** Worst-case USD for a call of this size on the most expensive configured provider. */
    estimateCost(promptTokens: number, completionTokens: number): number {
        let worst = 0;
        for (const a of this.accounts) {
            const p = this.pricingFor(a);
            worst = Math.max(worst, (promptTokens / 1_000_000) * p.prompt + (completionTokens / 1_000_000) * p.completion);
        }
        return worst;
    }

    cached(prompt: string): CachedCompletion | undefined {
        return this.cache.get(sha256Hex(prompt));
    }

    async snapshot(): Promise<AccountSnapshot[]> {
        return this.lock.runExclusive(() => {
            const now = this.clock.now();
            return this.accounts.map((a) => {
                const minute = a.usage(now, GATEWAY.MINUTE_WINDOW_MS);
                const day = a.usage(now, GATEWAY.DAY_WINDOW_MS);
                return {
                    provider: a.name,
                    requestsLastMinute: minute.requests,
                    tokensLastMinute: minute.tokens,
                    requestsLastDay: day.requests,
                    tokensLastDay: day.tokens,
                    consecutiveFailures: a.consecutiveFailures,
                    cooldownUntil: a.inCooldown(now) ? a.cooldownUntil : null,
                };
            });
        });
    }

    /**
     * One call to one provider. Local window saturation returns RateLimited
     * without calling out; the check and the reservation happen under the lock.
     */
    async callProvider(name: string, prompt: string, maxTokens: number, options: CallOptions = {}): Promise<CallOutcome> {
        const account = this.accounts.find((a) => a.name === name);
        if (!account) {
            return { kind: 'provider_error', provider: name, code: 'PROVIDER_ERROR', message: `Unknown provider: ${name}`, retryable: false };
        }
        throwIfAborted(options.signal);

        const log = options.logger ?? this.log;
        const projectedTokens = estimateTokens(prompt) + maxTokens;

        const admission = await this.lock.runExclusive(() => {
            const now = this.clock.now();
            account.prune(now);
            const waitMs = account.saturation(now, projectedTokens);
            if (waitMs > 0) return { reserved: null, waitMs };
            return { reserved: account.reserve(now, projectedTokens), waitMs: 0 };
        });

        if (admission.reserved === null) {
            log.debug('Local rate window saturated', { provider: name, wait_ms: admission.waitMs });
            return { kind: 'rate_limited', provider: name, retryAfterMs: admission.waitMs, local: true };
        }
        const reservation = admission.reserved;

        try {
            const result = await withTimeout(
                (signal) => account.entry.provider.generate(prompt, maxTokens, signal),
                this.callTimeoutMs,
                options.signal
            );
            const tokensUsed = Math.max(0, Math.floor(result.tokensUsed));
            const pricing = this.pricingFor(account);
            const costUsd = result.costEstimate ?? (tokensUsed / 1_000_000) * Math.max(pricing.prompt, pricing.completion);

            await this.lock.runExclusive(() => {
                account.settle(reservation, tokensUsed);
                account.consecutiveFailures = 0;
            });
            this.cache.set(sha256Hex(prompt), { provider: name, text: result.text, tokensUsed });

            log.debug('Provider call completed', { provider: name, tokens: tokensUsed, cost_usd: costUsd });
            return { kind: 'completed', provider: name, text: result.text, tokensUsed, costUsd };
        } catch (e) {
            if (options.signal?.aborted) {
                await this.lock.runExclusive(() => account.release(reservation));
                throw abortError(options.signal);
            }

            const outcome = this.classify(name, e);
            await this.lock.runExclusive(() => {
                // The request reached the provider; it counts, its tokens mostly don't.
                account.settle(reservation, estimateTokens(prompt));
                account.consecutiveFailures++;
                if (account.consecutiveFailures >= this.failureThreshold) {
                    account.cooldownUntil = this.clock.now() + this.cooldownMs;
                    account.consecutiveFailures = 0;
                    log.warn('Provider entering cooldown', { provider: name, cooldown_ms: this.cooldownMs });
                }
            });
            return outcome;
        }
    }

    /**
     * Routes a completion across providers in priority order with backoff,
     * cooldown and failover. Throws ALL_PROVIDERS_UNAVAILABLE when no provider
     * can serve it.
     */
    async complete(prompt: string, maxTokens: number, options: CompleteOptions = {}): Promise<Completion> {
        const log = options.logger ?? this.log;
        const tried: Array<{ provider: string; outcome: string }> = [];
        let calls = 0;

        for (const account of this.accounts) {
            const name = account.name;
            let previousDelay = 0;

            for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
                throwIfAborted(options.signal);

                if (account.inCooldown(this.clock.now())) {
                    tried.push({ provider: name, outcome: 'cooldown' });
                    break;
                }

                const outcome = await this.callProvider(name, prompt, maxTokens, options);
                if (outcome.kind !== 'rate_limited' || !outcome.local) calls++;

                if (outcome.kind === 'completed') {
                    return { provider: name, text: outcome.text, tokensUsed: outcome.tokensUsed, costUsd: outcome.costUsd, calls };
                }

                if (outcome.kind === 'rate_limited' && outcome.local) {
                    tried.push({ provider: name, outcome: 'saturated' });
                    break;
                }
                if (outcome.kind === 'provider_error' && !outcome.retryable) {
                    tried.push({ provider: name, outcome: `error: ${outcome.message}` });
                    break;
                }
                if (attempt === this.maxAttempts || account.inCooldown(this.clock.now())) {
                    tried.push({ provider: name, outcome: outcome.kind === 'rate_limited' ? 'rate_limited' : `error: ${outcome.message}` });
                    break;
                }

                const delayMs = backoffDelay(
                    attempt,
                    previousDelay,
                    this.clock.random,
                    this.backoff,
                    outcome.kind === 'rate_limited' ? outcome.retryAfterMs : undefined
                );
                previousDelay = delayMs;
                const reason = outcome.kind === 'rate_limited' ? 'rate limited' : outcome.message;

                log.info('Retrying provider call', { provider: name, attempt, delay_ms: delayMs, reason });
                options.onRetry?.({ provider: name, attempt, delayMs, reason });
                await this.clock.sleep(delayMs, options.signal);
            }
        }

        log.error('No provider could serve the completion', { tried });
        throw ErrorFactory.allProvidersUnavailable({ tried, calls });
    }

    private pricingFor(account: ProviderAccount): ProviderPricing {
        return account.entry.pricing ?? getModelPricing(account.entry.provider.model);
    }

    private classify(name: string, e: unknown): CallOutcome {
        if (e instanceof ProviderFailure) {
            if (e.kind === 'rate_limited') {
                return { kind: 'rate_limited', provider: name, retryAfterMs: e.retryAfterMs, local: false };
            }
            return { kind: 'provider_error', provider: name, code: failureCode(e), message: sanitizeErrorSnippet(e.message), retryable: e.retryable };
        }
        if (e instanceof CallTimeoutError) {
            return { kind: 'provider_error', provider: name, code: 'NETWORK_ERROR', message: e.message, retryable: true };
        }
        const message = e instanceof Error ? e.message : String(e);
        return { kind: 'provider_error', provider: name, code: 'PROVIDER_ERROR', message: sanitizeErrorSnippet(message), retryable: true };
    }
}
