/**
 * Dependency Resolver
 *
 * Derives the build graph from a mapping model and orders it.
 *
 * INVARIANTS:
 * - Cycle detection runs before ordering; a cycle is fatal and names its members
 * - Order is topological with ties broken by declaration index
 * - References to unknown nodes are dropped with a diagnostic, never guessed
 */

import { findTable } from './mapping_model';
import { ErrorFactory } from './structured_error';
import type {
    ComputedNode,
    DependencyGraph,
    Diagnostic,
    FilterNode,
    GraphNode,
    JoinNode,
    MappingModel,
    OutputColumnSpec,
    TableNode,
} from './types';

/* -------------------------------------------------------------------------- */
/* Node ids                                                                   */
/* -------------------------------------------------------------------------- */

export function tableNodeId(name: string): string {
    return `table:${name}`;
}

export function joinNodeId(left: string, right: string): string {
    return `join:${left}-${right}`;
}

/** Output alias of a computed column; falls back to `<table>_<column>`. */
export function computedKey(col: OutputColumnSpec): string {
    return col.alias || `${col.table}_${col.column}`;
}

export function computedNodeId(col: OutputColumnSpec): string {
    return `computed:${computedKey(col)}`;
}

export function filterNodeId(index: number): string {
    return `filter:${index + 1}`;
}

export function isComputed(col: OutputColumnSpec): boolean {
    return Boolean(col.aggregation || col.transformation);
}

/* -------------------------------------------------------------------------- */
/* Derivation                                                                 */
/* -------------------------------------------------------------------------- */

export interface DerivedNodes {
    nodes: GraphNode[];
    diagnostics: Diagnostic[];
}

/**
 * Builds graph nodes from the mapping model in declaration order: tables, joins,
 * computed columns, filters. Unknown references are removed from `dependsOn`
 * (or the node dropped when it cannot stand without them).
 */
export function deriveNodes(model: MappingModel): DerivedNodes {
    const nodes: GraphNode[] = [];
    const diagnostics: Diagnostic[] = [];
    const ids = new Set<string>();
    let index = 0;

    const add = (node: GraphNode): void => {
        if (ids.has(node.id)) {
            diagnostics.push({ severity: 'warning', message: `Duplicate node ${node.id} ignored`, subject: node.id });
            return;
        }
        ids.add(node.id);
        nodes.push(node);
    };

    for (const table of model.tables) {
        const node: TableNode = {
            id: tableNodeId(table.name),
            kind: 'table',
            dependsOn: [],
            declarationIndex: index++,
            description: table.description || `Source table ${table.schema ? `${table.schema}.` : ''}${table.name}`,
            table,
        };
        add(node);
    }

    for (const rel of model.relationships) {
        const left = findTable(model, rel.left);
        const right = findTable(model, rel.right);
        const id = joinNodeId(left?.name ?? rel.left, right?.name ?? rel.right);
        if (!left || !right) {
            const missing = [!left ? rel.left : null, !right ? rel.right : null].filter((x): x is string => x !== null);
            diagnostics.push({
                severity: 'warning',
                code: 'DISCOVERY_PARTIAL',
                message: `Relationship ${rel.left} -> ${rel.right} references unknown table ${missing.join(', ')}; dropped`,
                suggestion: `Declare table ${missing.join(', ')} in the mapping document or correct the relationship`,
                subject: id,
            });
            continue;
        }
        const node: JoinNode = {
            id,
            kind: 'join',
            dependsOn: [tableNodeId(left.name), tableNodeId(right.name)],
            declarationIndex: index++,
            description: rel.description || `${rel.joinType} JOIN ${left.name} with ${right.name}`,
            relationship: rel,
        };
        add(node);
    }

    const computedCols = model.outputColumns.filter(isComputed);
    const computedIds = new Set(computedCols.map(computedNodeId));

    for (const col of computedCols) {
        const id = computedNodeId(col);
        const table = findTable(model, col.table);
        if (!table) {
            diagnostics.push({
                severity: 'warning',
                code: 'DISCOVERY_PARTIAL',
                message: `Computed column ${computedKey(col)} references unknown table ${col.table}; dropped`,
                suggestion: `Declare table ${col.table} or correct the output column`,
                subject: id,
            });
            continue;
        }
        const deps = [tableNodeId(table.name)];
        for (const ref of col.dependsOn || []) {
            const depId = `computed:${ref}`;
            if (computedIds.has(depId) && depId !== id) {
                deps.push(depId);
            } else {
                diagnostics.push({
                    severity: 'warning',
                    code: 'DISCOVERY_PARTIAL',
                    message: `Computed column ${computedKey(col)} depends on unknown column ${ref}; reference dropped`,
                    suggestion: `Define ${ref} as an output column or remove the dependency`,
                    subject: id,
                });
            }
        }
        const rules = model.businessRules.filter((r) =>
            r.appliesTo !== undefined && [col.column, col.alias, computedKey(col), `${col.table}.${col.column}`]
                .some((k) => k !== undefined && k.toLowerCase() === r.appliesTo?.toLowerCase()));
        const node: ComputedNode = {
            id,
            kind: 'computed',
            dependsOn: deps,
            declarationIndex: index++,
            description: col.transformation || `${col.aggregation}(${col.table}.${col.column})`,
            column: col,
            rules,
        };
        add(node);
    }

    model.filters.forEach((filter, i) => {
        const id = filterNodeId(i);
        const table = findTable(model, filter.table);
        if (!table) {
            diagnostics.push({
                severity: 'warning',
                code: 'DISCOVERY_PARTIAL',
                message: `Filter on ${filter.table}.${filter.column} references unknown table; dropped`,
                suggestion: `Declare table ${filter.table} or correct the filter`,
                subject: id,
            });
            return;
        }
        const node: FilterNode = {
            id,
            kind: 'filter',
            dependsOn: [tableNodeId(table.name)],
            declarationIndex: index++,
            description: filter.description || `${filter.clause} ${filter.table}.${filter.column} ${filter.operator} ${filter.value}`,
            filter,
        };
        add(node);
    });

    return { nodes, diagnostics };
}

/* -------------------------------------------------------------------------- */
/* Resolution                                                                 */
/* -------------------------------------------------------------------------- */

/**
 * Depth-first search with recursion-stack marking. Returns the first cycle found
 * as a closed path (first member repeated at the end), or null.
 */
export function findCycle(nodes: readonly GraphNode[]): string[] | null {
    const byId = new Map(nodes.map((n) => [n.id, n]));
    const state = new Map<string, 'visiting' | 'done'>();
    const stack: string[] = [];

    const visit = (id: string): string[] | null => {
        state.set(id, 'visiting');
        stack.push(id);
        const node = byId.get(id);
        for (const dep of node?.dependsOn ?? []) {
            if (!byId.has(dep)) continue;
            const s = state.get(dep);
            if (s === 'visiting') {
                return [...stack.slice(stack.indexOf(dep)), dep];
            }
            if (s === undefined) {
                const found = visit(dep);
                if (found) return found;
            }
        }
        stack.pop();
        state.set(id, 'done');
        return null;
    };

    const ordered = [...nodes].sort((a, b) => a.declarationIndex - b.declarationIndex);
    for (const n of ordered) {
        if (state.has(n.id)) continue;
        const cycle = visit(n.id);
        if (cycle) return cycle;
    }
    return null;
}

/**
 * Resolves nodes into a DependencyGraph. Dangling dependencies are dropped with a
 * diagnostic; a cycle throws DEPENDENCY_CYCLE.
 */
export function resolveGraph(input: readonly GraphNode[]): { graph: DependencyGraph; diagnostics: Diagnostic[] } {
    const diagnostics: Diagnostic[] = [];
    const known = new Set(input.map((n) => n.id));

    const nodes: GraphNode[] = input.map((n) => {
        const kept = n.dependsOn.filter((d) => known.has(d));
        for (const d of n.dependsOn) {
            if (!known.has(d)) {
                diagnostics.push({
                    severity: 'warning',
                    code: 'DISCOVERY_PARTIAL',
                    message: `${n.id} depends on unknown node ${d}; dependency dropped`,
                    suggestion: `Declare ${d} in the mapping document or remove the reference`,
                    subject: n.id,
                });
            }
        }
        return { ...n, dependsOn: [...new Set(kept)] };
    });

    const cycle = findCycle(nodes);
    if (cycle) throw ErrorFactory.dependencyCycle(cycle);

    // Kahn's algorithm; the ready set is kept sorted by declaration index.
    const indegree = new Map<string, number>();
    const dependents = new Map<string, string[]>();
    for (const n of nodes) {
        indegree.set(n.id, n.dependsOn.length);
        for (const d of n.dependsOn) {
            const list = dependents.get(d) ?? [];
            list.push(n.id);
            dependents.set(d, list);
        }
    }
    const byId = new Map(nodes.map((n) => [n.id, n]));
    const declIndex = (id: string): number => byId.get(id)?.declarationIndex ?? Number.MAX_SAFE_INTEGER;

    const ready = nodes.filter((n) => n.dependsOn.length === 0).map((n) => n.id);
    const order: string[] = [];
    while (ready.length > 0) {
        ready.sort((a, b) => declIndex(a) - declIndex(b));
        const next = ready.shift();
        if (next === undefined) break;
        order.push(next);
        for (const dep of dependents.get(next) ?? []) {
            const left = (indegree.get(dep) ?? 0) - 1;
            indegree.set(dep, left);
            if (left === 0) ready.push(dep);
        }
    }

    const edges = nodes.flatMap((n) => n.dependsOn.map((d) => ({ from: d, to: n.id })));
    return {
        graph: { nodes: byId, edges, order },
        diagnostics,
    };
}

/** All transitive dependencies of `id`, in graph order. */
export function dependencyClosure(graph: DependencyGraph, id: string): string[] {
    const seen = new Set<string>();
    const walk = (n: string): void => {
        for (const d of graph.nodes.get(n)?.dependsOn ?? []) {
            if (seen.has(d)) continue;
            seen.add(d);
            walk(d);
        }
    };
    walk(id);
    return graph.order.filter((n) => seen.has(n));
}
