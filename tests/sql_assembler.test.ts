import test from 'node:test';
import assert from 'node:assert/strict';

import { deriveNodes, resolveGraph } from '../src/dependency_resolver';
import {
    assembleQuery,
    buildProbe,
    buildQueryProbe,
    cleanFragment,
    FragmentView,
    sqlLiteral,
    templateFragment,
} from '../src/sql_assembler';
import { fragmentFor, sampleModel } from './helpers';

const model = sampleModel();
const { graph } = resolveGraph(deriveNodes(model).nodes);

function node(id: string) {
    const n = graph.nodes.get(id);
    assert.ok(n, `missing node ${id}`);
    return n;
}

const built = (id: string): FragmentView => ({ fragment: fragmentFor(`\nNODE: ${id}\n`) });

test('cleanFragment strips fences, semicolons and clause keywords', () => {
    assert.equal(cleanFragment('join', '```sql\nINNER JOIN customers c ON o.customer_id = c.id;\n```'), 'o.customer_id = c.id');
    assert.equal(cleanFragment('computed', 'SELECT SUM(o.amount) AS total_amount'), 'SUM(o.amount)');
    assert.equal(cleanFragment('filter', "WHERE o.status = 'shipped';"), "o.status = 'shipped'");
    assert.equal(cleanFragment('table', '-- orders\nSELECT id FROM orders'), 'SELECT id FROM orders');
});

test('sqlLiteral quotes strings and leaves numbers and NULL bare', () => {
    assert.equal(sqlLiteral('shipped'), "'shipped'");
    assert.equal(sqlLiteral("O'Brien"), "'O''Brien'");
    assert.equal(sqlLiteral('42'), '42');
    assert.equal(sqlLiteral('NULL'), 'NULL');
    assert.equal(sqlLiteral('a, b', 'IN'), "('a', 'b')");
});

test('templates build each fragment from the mapping model', () => {
    assert.equal(templateFragment(node('table:orders'), model), 'SELECT id, customer_id, amount, status FROM orders');
    assert.equal(templateFragment(node('table:customers'), model), 'SELECT id, name FROM customers');
    assert.equal(templateFragment(node('join:orders-customers'), model), 'o.customer_id = c.id');
    assert.equal(templateFragment(node('computed:total_amount'), model), 'SUM(o.amount)');
    assert.equal(templateFragment(node('filter:1'), model), "o.status = 'shipped'");
});

test('assembles CTEs, joins, aggregates and filters into one query', () => {
    const out = assembleQuery(model, graph, built);
    assert.equal(out.sql, [
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
    assert.deepEqual(out.notJoined, []);
    assert.deepEqual(out.omittedColumns, []);
});

test('placeholders become comments and out-of-scope columns are omitted', () => {
    const lookup = (id: string): FragmentView => {
        if (id === 'table:customers') return { fragment: null, note: 'no such table: customers', draft: 'SELECT id, name FROM customer' };
        if (id === 'join:orders-customers') return { fragment: null, note: 'depends on unresolved table:customers' };
        return built(id);
    };
    const out = assembleQuery(model, graph, lookup);
    assert.equal(out.sql, [
        'WITH',
        '  -- unresolved table customers: no such table: customers',
        '  -- draft: SELECT id, name FROM customer',
        '  cte_orders AS (',
        '    SELECT id, customer_id, amount, status FROM orders',
        '  )',
        '-- customer_name: table customers is not in scope',
        'SELECT',
        '  SUM(o.amount) AS total_amount',
        '-- INNER JOIN cte_customers AS c ON ? -- unresolved: depends on unresolved table:customers',
        'FROM cte_orders AS o',
        "WHERE o.status = 'shipped'",
    ].join('\n'));
    assert.deepEqual(out.omittedColumns, ['customer_name']);
});

test('unverified fragments are annotated only when comments are on', () => {
    const lookup = (id: string): FragmentView =>
        id === 'filter:1' ? { ...built(id), unverified: true, note: 'check timed out' } : built(id);
    const withComments = assembleQuery(model, graph, lookup).sql.split('\n');
    assert.ok(withComments.includes('-- filter filter:1 unverified: check timed out'));
    const without = assembleQuery(model, graph, lookup, { comments: false }).sql.split('\n');
    assert.equal(without.some((l) => l.startsWith('--')), false);
});

test('dropped mapping items lead the query as comments', () => {
    const out = assembleQuery(model, graph, built, {
        dropped: [{ nodeId: 'filter:2', reason: 'Filter on shipments.status references unknown table; dropped' }],
    });
    assert.deepEqual(out.sql.split('\n').slice(0, 2), [
        '-- dropped filter:2: Filter on shipments.status references unknown table; dropped',
        'WITH',
    ]);
});

test('a table with no resolved join is reported as not joined', () => {
    const lookup = (id: string): FragmentView | undefined => (id === 'join:orders-customers' ? undefined : built(id));
    const out = assembleQuery(model, graph, lookup);
    assert.deepEqual(out.notJoined, ['customers']);
    assert.ok(out.sql.split('\n').includes('-- cte_customers is not joined: no resolved relationship connects customers'));
});

test('a filter probe wraps the candidate with its table dependency', () => {
    const closure = (id: string): FragmentView | undefined => (id === 'table:orders' ? built(id) : undefined);
    const probe = buildProbe(model, graph, closure, node('filter:1'), "o.status = 'shipped'");
    assert.equal(probe, [
        'WITH',
        '  cte_orders AS (',
        '    SELECT id, customer_id, amount, status FROM orders',
        '  )',
        'SELECT COUNT(*) AS row_count FROM (',
        '  SELECT 1 AS one',
        '  FROM cte_orders AS o',
        "  WHERE o.status = 'shipped'",
        ') AS probe',
    ].join('\n'));
});

test('table and query probes count rows of the candidate', () => {
    assert.equal(
        buildProbe(model, graph, () => undefined, node('table:orders'), 'SELECT id FROM orders'),
        'SELECT COUNT(*) AS row_count FROM (\n  SELECT id FROM orders\n) AS probe'
    );
    assert.equal(buildQueryProbe('SELECT 1\nFROM t'), 'SELECT COUNT(*) AS row_count FROM (\n  SELECT 1\n  FROM t\n) AS probe');
});
