/**
 * Shared Configuration Constants
 *
 * Centralized configuration for the generation engine.
 * Values can be overridden via environment variables.
 */

function envInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const n = parseInt(raw, 10);
    return Number.isFinite(n) ? n : fallback;
}

function envFloat(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const n = parseFloat(raw);
    return Number.isFinite(n) ? n : fallback;
}

// Default model per provider kind
export const DEFAULT_MODELS = {
    openai: process.env.QUERYSMITH_OPENAI_MODEL || 'gpt-4o-mini',
    anthropic: process.env.QUERYSMITH_ANTHROPIC_MODEL || 'claude-3-5-haiku-latest',
    openrouter: process.env.QUERYSMITH_OPENROUTER_MODEL || 'deepseek/deepseek-chat',
};

// Model pricing (USD per million tokens)
export const MODEL_PRICING: Record<string, { prompt: number; completion: number }> = {
    'gpt-4o-mini': { prompt: 0.15, completion: 0.6 },
    'gpt-4o': { prompt: 2.50, completion: 10.00 },
    'claude-3-5-haiku-latest': { prompt: 0.80, completion: 4.00 },
    'claude-3-5-sonnet-latest': { prompt: 3.00, completion: 15.00 },
    'deepseek/deepseek-chat': { prompt: 0.14, completion: 0.28 },
    'openai/gpt-4o-mini': { prompt: 0.15, completion: 0.6 },
    'anthropic/claude-3.5-haiku': { prompt: 0.80, completion: 4.00 },
};

// Fallback pricing when model not in the table
export const FALLBACK_PRICING = {
    prompt: envFloat('QUERYSMITH_COST_PROMPT_PER_M', 3.0),
    completion: envFloat('QUERYSMITH_COST_COMPLETION_PER_M', 15.0),
};

// Provider Gateway: backoff on provider-side rate limits
export const BACKOFF = {
    BASE_MS: envInt('QUERYSMITH_BACKOFF_BASE_MS', 1000),
    FACTOR: 2,
    CAP_MS: envInt('QUERYSMITH_BACKOFF_CAP_MS', 300_000),
    JITTER: 0.5,
};

// Provider Gateway: retry, cooldown and rate windows
export const GATEWAY = {
    MAX_ATTEMPTS_PER_PROVIDER: envInt('QUERYSMITH_MAX_ATTEMPTS', 3),
    FAILURE_THRESHOLD: envInt('QUERYSMITH_FAILURE_THRESHOLD', 3),
    COOLDOWN_MS: envInt('QUERYSMITH_COOLDOWN_MS', 60_000),
    MINUTE_WINDOW_MS: 60_000,
    DAY_WINDOW_MS: 86_400_000,
    DEFAULT_REQUESTS_PER_MINUTE: envInt('QUERYSMITH_RPM', 60),
    DEFAULT_TOKENS_PER_MINUTE: envInt('QUERYSMITH_TPM', 200_000),
    RESPONSE_CACHE_ENTRIES: envInt('QUERYSMITH_CACHE_ENTRIES', 500),
};

// Budget Controller
export const BUDGET = {
    RESERVE_FRACTION: envFloat('QUERYSMITH_BUDGET_RESERVE', 0.10),
    DEFAULT_MAX_COST_USD: envFloat('QUERYSMITH_BUDGET_USD', 1.0),
};

// Max output tokens per call kind
export const MAX_OUTPUT_TOKENS = {
    DISCOVERY: envInt('QUERYSMITH_MAX_TOKENS_DISCOVERY', 2000),
    BUILD_UNIT: envInt('QUERYSMITH_MAX_TOKENS_UNIT', 600),
    REPAIR: envInt('QUERYSMITH_MAX_TOKENS_REPAIR', 1500),
};

// Timeouts (milliseconds)
export const TIMEOUTS = {
    PROVIDER_CALL_MS: envInt('QUERYSMITH_PROVIDER_TIMEOUT_MS', 120_000),
    VALIDATION_CHECK_MS: envInt('QUERYSMITH_CHECK_TIMEOUT_MS', 10_000),
    CHECK_WORKER_MS: envInt('QUERYSMITH_CHECK_WORKER_TIMEOUT_MS', 30_000), // Sandbox worker hard-kill timeout
    REQUEST_MS: envInt('QUERYSMITH_REQUEST_TIMEOUT_MS', 600_000),
};

// Finished request logs kept for late subscribers
export const RETENTION = {
    MAX_FINISHED_REQUESTS: envInt('QUERYSMITH_RETAIN_REQUESTS', 200),
    FINISHED_TTL_MS: envInt('QUERYSMITH_RETAIN_TTL_MS', 3_600_000),
};

// Error snippet sanitization
export const SANITIZE = {
    ERROR_SNIPPET_MAX_CHARS: 500,
    STRIP_PATTERNS: [
        /[a-fA-F0-9]{32,}/g,
        /sk-[A-Za-z0-9_-]{10,}/g,
        /Authorization:\s*Bearer\s+[A-Za-z0-9._-]+/gi,
        /x-api-key:\s*[A-Za-z0-9._-]+/gi,
    ],
};

/**
 * Get pricing for a model, falling back to defaults if not found
 */
export function getModelPricing(modelId: string): { prompt: number; completion: number } {
    return MODEL_PRICING[modelId] || FALLBACK_PRICING;
}

/**
 * Estimate cost for a model call
 */
export function estimateModelCost(
    modelId: string,
    promptTokens: number,
    completionTokens: number
): number {
    const pricing = getModelPricing(modelId);
    return (
        (promptTokens / 1_000_000) * pricing.prompt +
        (completionTokens / 1_000_000) * pricing.completion
    );
}

/** ~3.3 chars per token for SQL/JSON-heavy prompts, with a word-count floor. */
export function estimateTokens(text: string): number {
    const chars = text.length;
    const words = text.split(/\s+/).filter(Boolean).length;
    return Math.max(Math.ceil(chars / 3.3), Math.ceil(words * 1.3));
}

export function sanitizeErrorSnippet(input: string): string {
    let out = input || '';
    for (const re of SANITIZE.STRIP_PATTERNS) {
        out = out.replace(re, '[REDACTED]');
    }
    if (out.length > SANITIZE.ERROR_SNIPPET_MAX_CHARS) {
        out = out.slice(0, SANITIZE.ERROR_SNIPPET_MAX_CHARS);
    }
    return out.replace(/[^\x20-\x7E]+/g, ' ');
}
