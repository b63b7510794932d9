// Provider entries configured from QUERYSMITH_* environment variables.

import { DEFAULT_MODELS } from '../config';
import type { ProviderEntry } from '../provider_gateway';
import { AnthropicProvider } from './anthropic';
import { OpenAICompatibleProvider } from './openai_compatible';

export type ProviderKind = 'openai' | 'anthropic' | 'openrouter';

const ALL_KINDS: readonly ProviderKind[] = ['openai', 'anthropic', 'openrouter'];

type Env = Record<string, string | undefined>;

function isKind(v: string): v is ProviderKind {
    return ALL_KINDS.some((k) => k === v);
}

function intOrUndefined(raw: string | undefined): number | undefined {
    if (!raw) return undefined;
    const n = parseInt(raw, 10);
    return Number.isFinite(n) && n > 0 ? n : undefined;
}

/**
 * Priority order: QUERYSMITH_PROVIDERS (comma separated) when set, otherwise
 * openai, anthropic, openrouter. Kinds without an API key are skipped.
 */
export function providerOrder(env: Env): ProviderKind[] {
    const raw = env.QUERYSMITH_PROVIDERS;
    if (!raw) return [...ALL_KINDS];
    const out: ProviderKind[] = [];
    for (const part of raw.split(',')) {
        const k = part.trim().toLowerCase();
        if (isKind(k) && !out.includes(k)) out.push(k);
    }
    return out;
}

export function providersFromEnv(env: Env = process.env): ProviderEntry[] {
    const entries: ProviderEntry[] = [];
    for (const kind of providerOrder(env)) {
        const prefix = `QUERYSMITH_${kind.toUpperCase()}`;
        const apiKey = env[`${prefix}_API_KEY`];
        if (!apiKey) continue;

        const model = env[`${prefix}_MODEL`] || DEFAULT_MODELS[kind];
        const baseUrl = env[`${prefix}_BASE_URL`] || undefined;
        const limits = {
            requestsPerMinute: intOrUndefined(env[`${prefix}_RPM`]),
            tokensPerMinute: intOrUndefined(env[`${prefix}_TPM`]),
        };

        switch (kind) {
            case 'openai':
                entries.push({ provider: new OpenAICompatibleProvider({ name: 'openai', apiKey, model, baseUrl }), limits });
                break;
            case 'anthropic':
                entries.push({ provider: new AnthropicProvider({ apiKey, model, baseUrl }), limits });
                break;
            case 'openrouter':
                entries.push({
                    provider: new OpenAICompatibleProvider({
                        name: 'openrouter',
                        apiKey,
                        model,
                        baseUrl: baseUrl || 'https://openrouter.ai/api/v1',
                        extraHeaders: { 'X-Title': 'querysmith' },
                    }),
                    limits,
                });
                break;
        }
    }
    return entries;
}
