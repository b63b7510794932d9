import test from 'node:test';
import assert from 'node:assert/strict';

import { Orchestrator } from '../src/orchestrator';
import { GenerateResult, ProviderFailure, ReasoningProvider } from '../src/providers/provider';
import type { CheckResult, ProgressEvent } from '../src/types';
import {
    FakeProvider,
    instantGateway,
    sampleDiscoveryJson,
    sampleModel,
    sampleRequest,
    ScriptedChecker,
    sqlResponder,
} from './helpers';

const PASS: CheckResult = { passed: true, rowEstimate: 1 };

function passing(): ScriptedChecker {
    return new ScriptedChecker(() => PASS);
}

function sqlProvider(name = 'a'): FakeProvider {
    return new FakeProvider(name, [], sqlResponder(sampleDiscoveryJson()));
}

function tags(events: ProgressEvent[]): string[] {
    return events.map((e) => `${e.phase}(${e.section})`);
}

test('a clean run builds every node and verifies the query', async () => {
    const provider = sqlProvider();
    const checker = passing();
    const orchestrator = new Orchestrator({ gateway: instantGateway([provider]), checker });

    const handle = orchestrator.submit(sampleRequest());
    const outcome = await handle.result;

    assert.ok(outcome.ok);
    assert.equal(outcome.value.status, 'complete');
    assert.equal(outcome.value.verified, true);
    assert.deepEqual(outcome.value.unresolved, []);
    assert.equal(outcome.value.query, [
        '-- Generated for sqlite',
        '-- Status: complete',
        'WITH',
        '  cte_orders AS (',
        '    SELECT id, customer_id, amount, status FROM orders',
        '  ),',
        '  cte_customers AS (',
        '    SELECT id, name FROM customers',
        '  )',
        'SELECT',
        '  c.name AS customer_name,',
        '  SUM(o.amount) AS total_amount',
        'FROM cte_orders AS o',
        'INNER JOIN cte_customers AS c ON o.customer_id = c.id',
        "WHERE o.status = 'shipped'",
        'GROUP BY c.name',
    ].join('\n'));
    assert.deepEqual(outcome.value.units.map((u) => [u.nodeId, u.status, u.attempts]), [
        ['table:orders', 'passed', 1],
        ['table:customers', 'passed', 1],
        ['join:orders-customers', 'passed', 1],
        ['computed:total_amount', 'passed', 1],
        ['filter:1', 'passed', 1],
    ]);
    assert.equal(provider.calls, 6);
    assert.deepEqual(checker.checked.map((c) => c.node), [
        'table:orders',
        'table:customers',
        'join:orders-customers',
        'computed:total_amount',
        'filter:1',
        'query',
    ]);
    assert.deepEqual(handle.stages().map((s) => s.state), ['completed', 'completed', 'completed', 'completed', 'completed']);

    const terminal = handle.events.terminal();
    assert.equal(terminal?.phase, 'complete');
    assert.equal(terminal?.details.status, 'complete');
    assert.equal(handle.events.since(0).filter((e) => e.section === 'pipeline').length, 1);
});

test('a node that fails twice is retried before its dependents are built', async () => {
    const provider = sqlProvider();
    const checker = new ScriptedChecker((_fragment, context, call) =>
        context.node?.id === 'table:orders' && call <= 2 ? { passed: false, failureReason: 'near "FROM": syntax error' } : PASS);
    const orchestrator = new Orchestrator({ gateway: instantGateway([provider]), checker });

    const handle = orchestrator.submit(sampleRequest());
    const outcome = await handle.result;
    assert.ok(outcome.ok);
    assert.equal(outcome.value.status, 'complete');

    const watched = new Set(['table:orders', 'table:customers', 'join:orders-customers', 'pipeline']);
    const events = handle.events.since(0).filter((e) => watched.has(e.section) && (e.phase === 'retry' || e.phase === 'complete'));
    assert.deepEqual(tags(events), [
        'retry(table:orders)',
        'retry(table:orders)',
        'complete(table:orders)',
        'complete(table:customers)',
        'complete(join:orders-customers)',
        'complete(pipeline)',
    ]);
    assert.deepEqual(events[0].details, { attempt: 1, reason: 'near "FROM": syntax error' });
    assert.equal(events[1].details.attempt, 2);
    assert.equal(events[2].details.attempts, 3);

    const nodeOf = (p: string): string => /NODE: (\S+)/.exec(p)?.[1] ?? 'discovery';
    const order = provider.prompts.map(nodeOf);
    assert.ok(order.lastIndexOf('table:orders') < order.indexOf('join:orders-customers'));
    assert.equal(order.filter((n) => n === 'table:orders').length, 3);
});

test('provider retries inside a call surface as progress events', async () => {
    const provider = new FakeProvider('a', [new ProviderFailure('server', 'upstream 502')], sqlResponder(sampleDiscoveryJson()));
    const orchestrator = new Orchestrator({ gateway: instantGateway([provider]), checker: passing() });

    const handle = orchestrator.submit(sampleRequest());
    assert.ok((await handle.result).ok);

    const retry = handle.events.since(0).find((e) => e.section === 'discovery' && e.phase === 'progress');
    assert.equal(retry?.message, 'Provider a retry in 1000ms');
    assert.deepEqual(retry?.details, { provider: 'a', attempt: 1, delay_ms: 1000, reason: 'upstream 502' });
});

test('a missing table becomes a placeholder and its dependents follow', async () => {
    const provider = sqlProvider();
    const checker = new ScriptedChecker((_fragment, context) =>
        context.node?.id === 'table:customers' ? { passed: false, failureReason: 'no such table: customers' } : PASS);
    const orchestrator = new Orchestrator({ gateway: instantGateway([provider]), checker });

    const handle = orchestrator.submit(sampleRequest());
    const outcome = await handle.result;
    assert.ok(outcome.ok);

    const artifact = outcome.value;
    assert.equal(artifact.status, 'degraded');
    assert.deepEqual(artifact.unresolved.map((u) => [u.nodeId, u.reason]), [
        ['table:customers', 'unresolved: no such table: customers'],
        ['join:orders-customers', 'unresolved: depends on unresolved table:customers'],
    ]);
    assert.deepEqual(artifact.units.map((u) => u.status), ['passed', 'skipped-with-comment', 'skipped-with-comment', 'passed', 'passed']);
    assert.equal(provider.calls, 5);

    const lines = artifact.query.split('\n');
    assert.deepEqual(lines.slice(0, 6), [
        '-- Generated for sqlite',
        '-- Status: degraded',
        '-- Unresolved items: 2',
        'WITH',
        '  -- unresolved table customers: no such table: customers',
        '  -- draft: SELECT id, name FROM customers',
    ]);
    assert.ok(lines.includes('-- INNER JOIN cte_customers AS c ON ? -- unresolved: depends on unresolved table:customers'));

    const customers = handle.events.since(0).filter((e) => e.section === 'table:customers');
    assert.deepEqual(customers.map((e) => e.phase), ['start', 'degraded', 'complete']);
    assert.equal(customers[1].details.code, 'STRUCTURAL_GAP');
    assert.equal(customers[2].details.status, 'placeholder');
    assert.equal(handle.stages()[2].state, 'degraded');
});

test('all providers rate limited ends with ALL_PROVIDERS_UNAVAILABLE and no built nodes', async () => {
    const limited = (name: string): FakeProvider => new FakeProvider(name, [], () => new ProviderFailure('rate_limited', '429'));
    const a = limited('a');
    const b = limited('b');
    const orchestrator = new Orchestrator({ gateway: instantGateway([a, b]), checker: passing() });

    const handle = orchestrator.submit(sampleRequest());
    const outcome = await handle.result;

    assert.equal(outcome.ok, false);
    assert.ok(!outcome.ok && outcome.error.code === 'ALL_PROVIDERS_UNAVAILABLE');
    const terminal = handle.events.terminal();
    assert.equal(terminal?.phase, 'error');
    assert.equal(terminal?.details.kind, 'ALL_PROVIDERS_UNAVAILABLE');
    assert.equal(terminal?.details.reason, 'all_providers_unavailable');
    assert.equal(terminal?.details.stage, 'discovery');
    assert.equal(handle.events.since(0).some((e) => e.section.startsWith('table:')), false);
    assert.deepEqual(handle.stages().map((s) => s.state), ['failed', 'pending', 'pending', 'pending', 'pending']);
    assert.ok(a.calls > 0 && b.calls > 0);
});

test('a ceiling below one call degrades discovery without calling a provider', async () => {
    const provider = sqlProvider();
    const orchestrator = new Orchestrator({ gateway: instantGateway([provider]), checker: passing() });

    const handle = orchestrator.submit(sampleRequest({
        budget: { maxTokens: 10 },
        specification: { text: 'Total shipped order amount per customer name.', hints: sampleModel() },
    }));
    const outcome = await handle.result;

    assert.equal(provider.calls, 0);
    const discovery = handle.events.since(0).filter((e) => e.section === 'discovery');
    assert.deepEqual(discovery.map((e) => e.phase), ['start', 'degraded', 'complete']);
    assert.equal(discovery[1].details.code, 'BUDGET_EXHAUSTED');
    assert.equal(discovery[1].details.fallback, 'hints');

    assert.ok(outcome.ok);
    assert.equal(outcome.value.status, 'degraded');
    assert.deepEqual(outcome.value.units.map((u) => u.source), ['template', 'template', 'template', 'template', 'template']);
    assert.equal(handle.stages()[0].state, 'degraded');
});

test('a dependency cycle fails resolution before anything is built', async () => {
    const cyclic = JSON.stringify({
        tables: [{ name: 'orders', columns: ['amount'] }],
        output_columns: [
            { table: 'orders', column: 'amount', alias: 'x', aggregation: 'SUM', depends_on: ['y'] },
            { table: 'orders', column: 'amount', alias: 'y', transformation: 'x * 2', depends_on: ['x'] },
        ],
    });
    const provider = new FakeProvider('a', [], () => cyclic);
    const checker = passing();
    const orchestrator = new Orchestrator({ gateway: instantGateway([provider]), checker });

    const handle = orchestrator.submit(sampleRequest());
    const outcome = await handle.result;

    assert.ok(!outcome.ok);
    assert.equal(outcome.error.code, 'DEPENDENCY_CYCLE');
    assert.equal(outcome.error.message, 'Dependency cycle detected: computed:x -> computed:y -> computed:x');
    assert.equal(handle.events.terminal()?.details.stage, 'dependency-resolution');
    assert.equal(provider.calls, 1);
    assert.equal(checker.checked.length, 0);
});

test('cancelling a running request ends with a cancelled error event', async () => {
    const provider = sqlProvider();
    const orchestrator = new Orchestrator({ gateway: instantGateway([provider]), checker: passing() });

    const handle = orchestrator.submit(sampleRequest());
    handle.cancel('stopped by test');
    const outcome = await handle.result;

    assert.ok(!outcome.ok);
    assert.equal(outcome.error.code, 'CANCELLED');
    const terminal = handle.events.terminal();
    assert.equal(terminal?.phase, 'error');
    assert.equal(terminal?.message, 'stopped by test');
    assert.equal(terminal?.details.reason, 'cancelled');
    assert.equal(provider.calls, 0);
});

test('an already aborted caller signal stops the request before the first stage', async () => {
    const ac = new AbortController();
    ac.abort();
    const orchestrator = new Orchestrator({ gateway: instantGateway([sqlProvider()]), checker: passing() });

    const handle = orchestrator.submit(sampleRequest(), { signal: ac.signal });
    await handle.result;

    const events = handle.events.since(0);
    assert.deepEqual(tags(events), ['error(pipeline)']);
    assert.equal(events[0].details.reason, 'cancelled');
    assert.equal(events[0].details.stage, null);
});

test('the wall-clock limit ends a stuck request with a timeout', async () => {
    const stuck: ReasoningProvider = {
        name: 'stuck',
        model: 'fake-model',
        generate: () => new Promise<GenerateResult>(() => undefined),
    };
    const orchestrator = new Orchestrator({ gateway: instantGateway([stuck]), checker: passing() });

    const handle = orchestrator.submit(sampleRequest({ timeoutMs: 20 }));
    const outcome = await handle.result;

    assert.ok(!outcome.ok);
    assert.equal(outcome.error.code, 'TIMEOUT');
    assert.equal(handle.events.terminal()?.details.reason, 'timeout');
});

test('an invalid request is rejected with a single error event', async () => {
    const orchestrator = new Orchestrator({ gateway: instantGateway([sqlProvider()]), checker: passing() });

    const handle = orchestrator.submit(sampleRequest({ targetEnvironment: '' }), { requestId: 'bad-request' });
    const outcome = await handle.result;

    assert.ok(!outcome.ok);
    assert.equal(outcome.error.code, 'INVALID_REQUEST');
    assert.deepEqual(outcome.error.context.problems, ['.targetEnvironment: Length 0 < minLength 1']);
    assert.deepEqual(tags(handle.events.since(0)), ['error(pipeline)']);
    assert.ok(handle.events.isSealed);
    assert.equal(orchestrator.getHandle('bad-request'), handle);
});

test('concurrent requests keep separate logs and retire when finished', async () => {
    const orchestrator = new Orchestrator({ gateway: instantGateway([sqlProvider()]), checker: passing() });

    const first = orchestrator.submit(sampleRequest(), { requestId: 'r1' });
    const second = orchestrator.submit(sampleRequest({ intelligenceLevel: 'aggressive' }), { requestId: 'r2' });
    assert.equal(orchestrator.activeCount, 2);

    const [a, b] = await Promise.all([first.result, second.result]);
    assert.ok(a.ok && b.ok);
    assert.equal(orchestrator.activeCount, 0);
    assert.equal(first.events.since(0)[0].sequence, 1);
    assert.equal(second.events.since(0)[0].sequence, 1);
    assert.ok(b.ok && b.value.query.startsWith('-- Generated for sqlite\nWITH'));
    assert.equal(orchestrator.getHandle('r2'), second);
});

test('the submitted request is frozen for the pipeline', async () => {
    const request = sampleRequest();
    const orchestrator = new Orchestrator({ gateway: instantGateway([sqlProvider()]), checker: passing() });
    const handle = orchestrator.submit(request);
    request.targetEnvironment = 'changed';
    const outcome = await handle.result;
    assert.ok(outcome.ok);
    assert.ok(outcome.value.query.startsWith('-- Generated for sqlite'));
});

test('a filter on an undeclared table is reported and commented, not lost', async () => {
    const discovery = JSON.stringify({
        ...JSON.parse(sampleDiscoveryJson()),
        filters: [
            { table: 'orders', column: 'status', operator: '=', value: 'shipped' },
            { table: 'shipments', column: 'status', operator: '=', value: 'late' },
        ],
    });
    const provider = new FakeProvider('a', [], sqlResponder(discovery));
    const orchestrator = new Orchestrator({ gateway: instantGateway([provider]), checker: passing() });

    const handle = orchestrator.submit(sampleRequest());
    const outcome = await handle.result;
    assert.ok(outcome.ok);

    assert.equal(outcome.value.status, 'degraded');
    assert.deepEqual(outcome.value.unresolved, [{
        nodeId: 'filter:2',
        reason: 'Filter on shipments.status references unknown table; dropped',
        suggestion: 'Declare table shipments or correct the filter',
    }]);
    assert.deepEqual(outcome.value.query.split('\n').slice(0, 5), [
        '-- Generated for sqlite',
        '-- Status: degraded',
        '-- Unresolved items: 1',
        '-- dropped filter:2: Filter on shipments.status references unknown table; dropped',
        'WITH',
    ]);
    assert.ok(outcome.value.query.includes("WHERE o.status = 'shipped'"));
});
