import test from 'node:test';
import assert from 'node:assert/strict';

import { backoffDelay, GatewayOptions, ProviderGateway, RetryNotice } from '../src/provider_gateway';
import { GenerateResult, ProviderFailure, ReasoningProvider } from '../src/providers/provider';
import { isPipelineError } from '../src/structured_error';
import { FakeProvider } from './helpers';

const BACKOFF = { baseMs: 1000, factor: 2, capMs: 8000, jitter: 0.5 };

function gateway(providers: ReasoningProvider[], options: GatewayOptions = {}): { gw: ProviderGateway; slept: number[] } {
    const slept: number[] = [];
    const gw = new ProviderGateway(providers.map((provider) => ({ provider })), {
        failureThreshold: 3,
        cooldownMs: 60_000,
        backoff: BACKOFF,
        ...options,
        clock: {
            now: () => 0,
            sleep: async (ms: number) => {
                slept.push(ms);
            },
            random: () => 0.5,
            ...options.clock,
        },
    });
    return { gw, slept };
}

/* -------------------------------------------------------------------------- */
/* Backoff                                                                    */
/* -------------------------------------------------------------------------- */

test('backoff doubles from the base and stops at the cap', () => {
    const delays: number[] = [];
    let previous = 0;
    for (let attempt = 1; attempt <= 6; attempt++) {
        previous = backoffDelay(attempt, previous, () => 0.5, BACKOFF);
        delays.push(previous);
    }
    assert.deepEqual(delays, [1000, 2000, 4000, 8000, 8000, 8000]);
});

test('backoff never decreases even when jitter draws low', () => {
    const first = backoffDelay(1, 0, () => 1, BACKOFF);
    const second = backoffDelay(2, first, () => 0, BACKOFF);
    assert.equal(first, 1500);
    assert.equal(second, 1500);
});

test('a provider retry hint longer than the computed delay wins', () => {
    assert.equal(backoffDelay(1, 0, () => 0.5, BACKOFF, 5000), 5000);
    assert.equal(backoffDelay(1, 0, () => 0.5, BACKOFF, 200), 1000);
});

test('a provider retry hint is held to the cap', () => {
    const config = { ...BACKOFF, capMs: 300_000 };
    const first = backoffDelay(1, 0, () => 0.5, config, 3_600_000);
    assert.equal(first, 300_000);
    assert.equal(backoffDelay(2, first, () => 0.5, config, 3_600_000), 300_000);
});

/* -------------------------------------------------------------------------- */
/* Routing                                                                    */
/* -------------------------------------------------------------------------- */

test('duplicate provider names are rejected', () => {
    assert.throws(
        () => new ProviderGateway([{ provider: new FakeProvider('a') }, { provider: new FakeProvider('a') }]),
        /Duplicate provider name: a/
    );
});

test('fails over to the next provider after exhausting retries', async () => {
    const failing = new FakeProvider('a', [], () => new ProviderFailure('server', 'upstream 503'));
    const healthy = new FakeProvider('b', ['SELECT 1']);
    const { gw, slept } = gateway([failing, healthy]);
    const notices: RetryNotice[] = [];

    const out = await gw.complete('prompt', 10, { onRetry: (n) => notices.push(n) });

    assert.deepEqual(out, { provider: 'b', text: 'SELECT 1', tokensUsed: 100, costUsd: 0, calls: 4 });
    assert.equal(failing.calls, 3);
    assert.deepEqual(slept, [1000, 2000]);
    assert.deepEqual(notices.map((n) => [n.provider, n.attempt, n.reason]), [
        ['a', 1, 'upstream 503'],
        ['a', 2, 'upstream 503'],
    ]);
});

test('a provider that reaches the failure threshold cools down and is skipped', async () => {
    const failing = new FakeProvider('a', [], () => new ProviderFailure('network', 'socket hang up'));
    const healthy = new FakeProvider('b', [], () => 'ok');
    const { gw } = gateway([failing, healthy]);

    await gw.complete('first', 10);
    const second = await gw.complete('second', 10);

    assert.equal(second.provider, 'b');
    assert.equal(second.calls, 1);
    assert.equal(failing.calls, 3);
    const [a] = await gw.snapshot();
    assert.equal(a.cooldownUntil, 60_000);
    assert.equal(a.consecutiveFailures, 0);
    assert.equal(a.requestsLastMinute, 3);
});

test('a cooled-down provider is tried again once its window has passed', async () => {
    let now = 0;
    const flaky = new FakeProvider('a', [
        new ProviderFailure('network', 'socket hang up'),
        new ProviderFailure('network', 'socket hang up'),
        new ProviderFailure('network', 'socket hang up'),
    ], () => 'recovered');
    const healthy = new FakeProvider('b', [], () => 'ok');
    const { gw } = gateway([flaky, healthy], { clock: { now: () => now } });

    assert.equal((await gw.complete('first', 10)).provider, 'b');

    now = 59_999;
    assert.equal((await gw.complete('second', 10)).provider, 'b');
    assert.equal(flaky.calls, 3);

    now = 60_000;
    const third = await gw.complete('third', 10);
    assert.deepEqual(third, { provider: 'a', text: 'recovered', tokensUsed: 100, costUsd: 0, calls: 1 });
    assert.equal(flaky.calls, 4);
    const [a] = await gw.snapshot();
    assert.equal(a.cooldownUntil, null);
});

test('a non-retryable client error moves on without retrying', async () => {
    const rejecting = new FakeProvider('a', [new ProviderFailure('client', 'invalid model')]);
    const healthy = new FakeProvider('b', ['ok']);
    const { gw, slept } = gateway([rejecting, healthy]);

    const out = await gw.complete('prompt', 10);
    assert.equal(out.provider, 'b');
    assert.equal(out.calls, 2);
    assert.equal(rejecting.calls, 1);
    assert.deepEqual(slept, []);
});

test('rate limits honour Retry-After and end in ALL_PROVIDERS_UNAVAILABLE', async () => {
    const limited = new FakeProvider('a', [], () => new ProviderFailure('rate_limited', '429', 5000));
    const { gw, slept } = gateway([limited]);

    await assert.rejects(gw.complete('prompt', 10), (e: unknown) => {
        assert.ok(isPipelineError(e));
        assert.equal(e.code, 'ALL_PROVIDERS_UNAVAILABLE');
        assert.deepEqual(e.structured.context, { tried: [{ provider: 'a', outcome: 'rate_limited' }], calls: 3 });
        return true;
    });
    assert.deepEqual(slept, [5000, 5000]);
});

test('local window saturation answers without calling the provider', async () => {
    const provider = new FakeProvider('a', [], () => 'ok');
    const limited = new ProviderGateway([{ provider, limits: { requestsPerMinute: 1 } }], {
        clock: { now: () => 1000, sleep: async () => undefined, random: () => 0.5 },
    });

    await limited.complete('first', 10);
    const outcome = await limited.callProvider('a', 'second', 10);
    assert.deepEqual(outcome, { kind: 'rate_limited', provider: 'a', retryAfterMs: 60_000, local: true });

    await assert.rejects(limited.complete('third', 10), (e: unknown) => {
        assert.ok(isPipelineError(e));
        assert.deepEqual(e.structured.context, { tried: [{ provider: 'a', outcome: 'saturated' }], calls: 0 });
        return true;
    });
    assert.equal(provider.calls, 1);
    assert.deepEqual(limited.providerNames, ['a']);
});

test('concurrent completions share one local admission slot', async () => {
    const provider = new FakeProvider('a', [], () => 'ok');
    const gw = new ProviderGateway([{ provider, limits: { requestsPerMinute: 1 } }], {
        clock: { now: () => 1000, sleep: async () => undefined, random: () => 0.5 },
    });

    const results = await Promise.allSettled([gw.complete('first', 10), gw.complete('second', 10)]);

    assert.equal(provider.calls, 1);
    const fulfilled = results.filter((r) => r.status === 'fulfilled');
    const rejected = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
    assert.equal(fulfilled.length, 1);
    assert.equal(rejected.length, 1);
    const [error] = rejected;
    assert.ok(isPipelineError(error));
    assert.equal(error.code, 'ALL_PROVIDERS_UNAVAILABLE');
    assert.deepEqual(error.structured.context, { tried: [{ provider: 'a', outcome: 'saturated' }], calls: 0 });
});

test('an unknown provider name is a provider error', async () => {
    const { gw } = gateway([new FakeProvider('a')]);
    assert.deepEqual(await gw.callProvider('zzz', 'p', 10), {
        kind: 'provider_error',
        provider: 'zzz',
        code: 'PROVIDER_ERROR',
        message: 'Unknown provider: zzz',
        retryable: false,
    });
});

test('a call that outlives the call timeout counts as a network error', async () => {
    const hanging: ReasoningProvider = {
        name: 'slow',
        model: 'fake-model',
        generate: () => new Promise<GenerateResult>(() => undefined),
    };
    const { gw } = gateway([hanging], { callTimeoutMs: 5 });
    const outcome = await gw.callProvider('slow', 'p', 10);
    assert.equal(outcome.kind, 'provider_error');
    assert.equal(outcome.kind === 'provider_error' ? outcome.code : null, 'NETWORK_ERROR');
});

test('successful completions are cached by prompt', async () => {
    const { gw } = gateway([new FakeProvider('a', ['SELECT 2'])]);
    assert.equal(gw.cached('prompt'), undefined);
    await gw.complete('prompt', 10);
    assert.deepEqual(gw.cached('prompt'), { provider: 'a', text: 'SELECT 2', tokensUsed: 100 });
});

test('an aborted signal stops routing before any call', async () => {
    const provider = new FakeProvider('a', ['ok']);
    const { gw } = gateway([provider]);
    const ac = new AbortController();
    ac.abort();
    await assert.rejects(gw.complete('prompt', 10, { signal: ac.signal }), (e: unknown) => isPipelineError(e) && e.code === 'CANCELLED');
    assert.equal(provider.calls, 0);
});
