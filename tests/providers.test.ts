import test from 'node:test';
import assert from 'node:assert/strict';

import { DEFAULT_MODELS } from '../src/config';
import { AnthropicProvider } from '../src/providers/anthropic';
import { providerOrder, providersFromEnv } from '../src/providers/from_env';
import { OpenAICompatibleProvider } from '../src/providers/openai_compatible';
import { parseRetryAfter, ProviderFailure } from '../src/providers/provider';

interface SeenRequest {
    url: string;
    headers: Headers;
    body: unknown;
}

function fakeFetch(status: number, body: unknown, headers: Record<string, string> = {}) {
    const seen: SeenRequest[] = [];
    const impl = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
        seen.push({ url: String(input), headers: new Headers(init?.headers), body: JSON.parse(String(init?.body)) });
        return new Response(typeof body === 'string' ? body : JSON.stringify(body), { status, headers });
    };
    return { seen, impl };
}

const openai = (): OpenAICompatibleProvider => new OpenAICompatibleProvider({ name: 'openai', apiKey: 'test-secret', model: 'gpt-4o-mini' });

test('openai-compatible provider posts a chat completion and reads usage', async (t) => {
    const { seen, impl } = fakeFetch(200, {
        choices: [{ message: { content: 'SELECT 1' } }],
        usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
    });
    t.mock.method(globalThis, 'fetch', impl);

    const result = await openai().generate('prompt', 20);
    assert.equal(result.text, 'SELECT 1');
    assert.equal(result.tokensUsed, 15);
    assert.equal(seen[0].url, 'https://api.openai.com/v1/chat/completions');
    assert.equal(seen[0].headers.get('authorization'), 'Bearer test-secret');
    assert.deepEqual(seen[0].body, {
        model: 'gpt-4o-mini',
        messages: [{ role: 'user', content: 'prompt' }],
        temperature: 0.1,
        max_tokens: 20,
        stream: false,
    });
});

test('HTTP 429 maps to a rate limit with the Retry-After delay', async (t) => {
    t.mock.method(globalThis, 'fetch', fakeFetch(429, 'slow down', { 'retry-after': '2' }).impl);
    await assert.rejects(openai().generate('prompt', 20), (e: unknown) => {
        assert.ok(e instanceof ProviderFailure);
        assert.equal(e.kind, 'rate_limited');
        assert.equal(e.retryAfterMs, 2000);
        assert.equal(e.message, 'openai rate limited: slow down');
        return true;
    });
});

test('server errors are retryable and client errors are not', async (t) => {
    const server = t.mock.method(globalThis, 'fetch', fakeFetch(503, 'unavailable').impl);
    await assert.rejects(openai().generate('prompt', 20), (e: unknown) => e instanceof ProviderFailure && e.kind === 'server' && e.retryable);
    server.mock.restore();

    t.mock.method(globalThis, 'fetch', fakeFetch(401, 'bad key').impl);
    await assert.rejects(openai().generate('prompt', 20), (e: unknown) =>
        e instanceof ProviderFailure && e.kind === 'client' && !e.retryable && e.message === 'openai error 401: bad key');
});

test('an empty completion is malformed', async (t) => {
    t.mock.method(globalThis, 'fetch', fakeFetch(200, { choices: [] }).impl);
    await assert.rejects(openai().generate('prompt', 20), (e: unknown) =>
        e instanceof ProviderFailure && e.kind === 'malformed' && e.message === 'openai returned an empty completion');
});

test('anthropic provider joins text blocks and sums usage', async (t) => {
    const { seen, impl } = fakeFetch(200, {
        content: [{ type: 'text', text: 'SELECT ' }, { type: 'tool_use' }, { type: 'text', text: '1' }],
        usage: { input_tokens: 7, output_tokens: 3 },
    });
    t.mock.method(globalThis, 'fetch', impl);

    const provider = new AnthropicProvider({ apiKey: 'test-secret', model: 'claude-3-5-haiku-latest', baseUrl: 'http://localhost:9/v1/' });
    const result = await provider.generate('prompt', 50);
    assert.equal(result.text, 'SELECT 1');
    assert.equal(result.tokensUsed, 10);
    assert.equal(seen[0].url, 'http://localhost:9/v1/messages');
    assert.equal(seen[0].headers.get('x-api-key'), 'test-secret');
    assert.equal(seen[0].headers.get('anthropic-version'), '2023-06-01');
});

test('Retry-After accepts seconds and HTTP dates', () => {
    assert.equal(parseRetryAfter('3'), 3000);
    assert.equal(parseRetryAfter('Thu, 01 Jan 2026 00:00:10 GMT', Date.parse('Thu, 01 Jan 2026 00:00:00 GMT')), 10_000);
    assert.equal(parseRetryAfter(null), undefined);
    assert.equal(parseRetryAfter('soon'), undefined);
});

/* -------------------------------------------------------------------------- */
/* Environment configuration                                                  */
/* -------------------------------------------------------------------------- */

test('provider order follows QUERYSMITH_PROVIDERS and skips unknown kinds', () => {
    assert.deepEqual(providerOrder({}), ['openai', 'anthropic', 'openrouter']);
    assert.deepEqual(providerOrder({ QUERYSMITH_PROVIDERS: 'openrouter, OpenAI, bogus, openrouter' }), ['openrouter', 'openai']);
});

test('providers without an API key are skipped', () => {
    const entries = providersFromEnv({
        QUERYSMITH_PROVIDERS: 'anthropic,openrouter,openai',
        QUERYSMITH_OPENROUTER_API_KEY: 'test-secret',
        QUERYSMITH_OPENROUTER_MODEL: 'openai/gpt-4o-mini',
        QUERYSMITH_OPENROUTER_RPM: '30',
        QUERYSMITH_OPENAI_API_KEY: 'test-secret',
        QUERYSMITH_OPENAI_TPM: 'lots',
    });
    assert.deepEqual(entries.map((e) => [e.provider.name, e.provider.model]), [
        ['openrouter', 'openai/gpt-4o-mini'],
        ['openai', DEFAULT_MODELS.openai],
    ]);
    assert.deepEqual(entries[0].limits, { requestsPerMinute: 30, tokensPerMinute: undefined });
    assert.deepEqual(entries[1].limits, { requestsPerMinute: undefined, tokensPerMinute: undefined });
});

test('openrouter uses its own endpoint and title header', async (t) => {
    const { seen, impl } = fakeFetch(200, { choices: [{ message: { content: 'ok' } }] });
    t.mock.method(globalThis, 'fetch', impl);
    const [entry] = providersFromEnv({ QUERYSMITH_PROVIDERS: 'openrouter', QUERYSMITH_OPENROUTER_API_KEY: 'test-secret' });
    await entry.provider.generate('prompt', 5);
    assert.equal(seen[0].url, 'https://openrouter.ai/api/v1/chat/completions');
    assert.equal(seen[0].headers.get('x-title'), 'querysmith');
});
