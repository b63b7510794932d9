import test from 'node:test';
import assert from 'node:assert/strict';

import { dependencyClosure, deriveNodes, findCycle, resolveGraph } from '../src/dependency_resolver';
import { isPipelineError } from '../src/structured_error';
import type { GraphNode, MappingModel } from '../src/types';
import { sampleModel } from './helpers';

function tableNode(id: string, index: number, dependsOn: string[] = []): GraphNode {
    return {
        id,
        kind: 'table',
        dependsOn,
        declarationIndex: index,
        description: id,
        table: { name: id, columns: [] },
    };
}

test('derives nodes in declaration order with their dependencies', () => {
    const { nodes, diagnostics } = deriveNodes(sampleModel());

    assert.deepEqual(nodes.map((n) => n.id), [
        'table:orders',
        'table:customers',
        'join:orders-customers',
        'computed:total_amount',
        'filter:1',
    ]);
    assert.deepEqual(nodes[2].dependsOn, ['table:orders', 'table:customers']);
    assert.deepEqual(nodes[3].dependsOn, ['table:orders']);
    assert.equal(diagnostics.length, 0);
});

test('plain output columns do not become nodes', () => {
    const { nodes } = deriveNodes(sampleModel());
    assert.equal(nodes.some((n) => n.id === 'computed:customer_name'), false);
});

test('topological order breaks ties by declaration index', () => {
    const { graph } = resolveGraph(deriveNodes(sampleModel()).nodes);
    assert.deepEqual(graph.order, [
        'table:orders',
        'table:customers',
        'join:orders-customers',
        'computed:total_amount',
        'filter:1',
    ]);
    assert.equal(graph.edges.length, 4);
});

test('a dependency always precedes its dependents', () => {
    const nodes = [
        tableNode('c', 0, ['a', 'b']),
        tableNode('a', 1),
        tableNode('b', 2, ['a']),
    ];
    const { graph } = resolveGraph(nodes);
    assert.deepEqual(graph.order, ['a', 'b', 'c']);
});

test('relationships to unknown tables are dropped with a diagnostic', () => {
    const model: MappingModel = {
        ...sampleModel(),
        relationships: [{ left: 'orders', right: 'invoices', joinType: 'LEFT', condition: 'o.id = i.order_id' }],
    };
    const { nodes, diagnostics } = deriveNodes(model);

    assert.equal(nodes.some((n) => n.kind === 'join'), false);
    assert.equal(diagnostics.length, 1);
    assert.equal(diagnostics[0].code, 'DISCOVERY_PARTIAL');
    assert.equal(diagnostics[0].subject, 'join:orders-invoices');
});

test('dangling dependencies are dropped during resolution', () => {
    const { graph, diagnostics } = resolveGraph([tableNode('a', 0, ['ghost'])]);
    assert.deepEqual(graph.nodes.get('a')?.dependsOn, []);
    assert.equal(diagnostics[0].message, 'a depends on unknown node ghost; dependency dropped');
});

test('a cycle through computed columns is fatal and names its members', () => {
    const model: MappingModel = {
        ...sampleModel(),
        outputColumns: [
            { table: 'orders', column: 'amount', alias: 'x', aggregation: 'SUM', dependsOn: ['y'] },
            { table: 'orders', column: 'amount', alias: 'y', aggregation: 'MAX', dependsOn: ['x'] },
        ],
    };
    const { nodes } = deriveNodes(model);

    assert.deepEqual(findCycle(nodes), ['computed:x', 'computed:y', 'computed:x']);
    assert.throws(() => resolveGraph(nodes), (e: unknown) => {
        assert.ok(isPipelineError(e));
        assert.equal(e.code, 'DEPENDENCY_CYCLE');
        assert.equal(e.message, 'Dependency cycle detected: computed:x -> computed:y -> computed:x');
        assert.deepEqual(e.structured.context.members, ['computed:x', 'computed:y', 'computed:x']);
        return true;
    });
});

test('self-dependency of a computed column is dropped, not a cycle', () => {
    const model: MappingModel = {
        ...sampleModel(),
        outputColumns: [{ table: 'orders', column: 'amount', alias: 'x', aggregation: 'SUM', dependsOn: ['x'] }],
    };
    const { nodes, diagnostics } = deriveNodes(model);
    assert.deepEqual(nodes.find((n) => n.id === 'computed:x')?.dependsOn, ['table:orders']);
    assert.equal(diagnostics.length, 1);
});

test('business rules attach to the computed column they apply to', () => {
    const model: MappingModel = {
        ...sampleModel(),
        businessRules: [
            { rule: 'Exclude refunds', appliesTo: 'total_amount' },
            { rule: 'Unrelated', appliesTo: 'customers' },
        ],
    };
    const node = deriveNodes(model).nodes.find((n) => n.id === 'computed:total_amount');
    assert.ok(node && node.kind === 'computed');
    assert.deepEqual(node.rules.map((r) => r.rule), ['Exclude refunds']);
});

test('dependencyClosure returns transitive dependencies in graph order', () => {
    const { graph } = resolveGraph([
        tableNode('a', 0),
        tableNode('b', 1, ['a']),
        tableNode('c', 2, ['b']),
        tableNode('d', 3),
    ]);
    assert.deepEqual(dependencyClosure(graph, 'c'), ['a', 'b']);
    assert.deepEqual(dependencyClosure(graph, 'd'), []);
});
