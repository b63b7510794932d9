/**
 * Query assembly from build-unit fragments.
 *
 * Fragment shapes per node kind:
 *   table     SELECT body of the table's CTE          SELECT id, name FROM customers
 *   join      ON condition                             c.id = o.customer_id
 *   computed  select expression, no alias              SUM(o.amount)
 *   filter    predicate for WHERE or HAVING            o.status = 'shipped'
 *
 * Each table is wrapped as `cte_<name>` and referenced by its alias (or name), so
 * fragments qualify columns with that reference.
 */

import { computedKey, computedNodeId, isComputed } from './dependency_resolver';
import { findTable, referencedColumns, tableRef } from './mapping_model';
import type { DependencyGraph, GraphNode, JoinType, MappingModel, NodeKind, TableSpec } from './types';

/* -------------------------------------------------------------------------- */
/* Fragment views                                                             */
/* -------------------------------------------------------------------------- */

export interface FragmentView {
    /** Null for a placeholder. */
    fragment: string | null;
    unverified?: boolean;
    /** Reason or suggestion shown beside a placeholder or unverified fragment. */
    note?: string;
    /** Rejected fragment shown commented out beside a placeholder. */
    draft?: string;
}

/** Returns undefined for nodes that are not part of the query being assembled. */
export type FragmentLookup = (nodeId: string) => FragmentView | undefined;

export interface AssembledQuery {
    sql: string;
    /** Tables with a CTE that no join brought into the FROM clause. */
    notJoined: string[];
    /** Output columns left out because their table is not in scope or unresolved. */
    omittedColumns: string[];
}

const AGGREGATE = /\b(SUM|COUNT|AVG|MIN|MAX|GROUP_CONCAT|STRING_AGG|ARRAY_AGG)\s*\(/i;

export function cteName(table: TableSpec): string {
    return `cte_${table.name.replace(/[^A-Za-z0-9_]/g, '_')}`;
}

function comment(text: string): string {
    return `-- ${text.replace(/\s*\n\s*/g, ' ')}`;
}

function indent(text: string, pad: string): string {
    return text.split('\n').map((l) => pad + l).join('\n');
}

function flipJoin(type: JoinType): JoinType {
    if (type === 'LEFT') return 'RIGHT';
    if (type === 'RIGHT') return 'LEFT';
    return type;
}

/* -------------------------------------------------------------------------- */
/* Fragment cleanup and templates                                             */
/* -------------------------------------------------------------------------- */

/**
 * Normalizes a provider completion into the fragment shape for its node kind:
 * strips code fences, trailing semicolons and the clause keyword or alias the
 * assembler adds itself.
 */
export function cleanFragment(kind: NodeKind, text: string): string {
    let out = text.trim();
    const fence = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```\s*$/.exec(out);
    if (fence) out = fence[1].trim();
    out = out.split('\n').filter((l) => !/^\s*--/.test(l)).join('\n');
    out = out.replace(/;+\s*$/, '').trim();

    switch (kind) {
        case 'join':
            out = out.replace(/^[\s\S]*?\bJOIN\b[\s\S]*?\bON\b\s+/i, '').replace(/^ON\s+/i, '');
            break;
        case 'filter':
            out = out.replace(/^(WHERE|HAVING|AND)\s+/i, '');
            break;
        case 'computed':
            out = out.replace(/^SELECT\s+/i, '').replace(/\s+AS\s+"?[A-Za-z_][A-Za-z0-9_]*"?\s*$/i, '');
            break;
        case 'table':
            break;
    }
    return out.trim();
}

/** SQL literal for a filter value: numbers and NULL bare, lists expanded, strings quoted. */
export function sqlLiteral(value: string, operator = '='): string {
    const v = value.trim();
    if (/^(NOT\s+)?IN$/i.test(operator.trim())) {
        const inner = v.replace(/^\(/, '').replace(/\)$/, '');
        const items = inner.split(',').map((s) => s.trim()).filter(Boolean);
        return `(${items.map((i) => sqlLiteral(i)).join(', ')})`;
    }
    if (/^-?\d+(\.\d+)?$/.test(v) || /^NULL$/i.test(v) || /^'.*'$/.test(v)) return v;
    return `'${v.replace(/'/g, "''")}'`;
}

/**
 * Deterministic fragment built from the mapping model alone, used when the
 * budget does not allow a provider call. Null when the model lacks what the
 * fragment needs.
 */
export function templateFragment(node: GraphNode, mapping: MappingModel): string | null {
    switch (node.kind) {
        case 'table': {
            const cols = referencedColumns(mapping, node.table);
            const source = `${node.table.schema ? `${node.table.schema}.` : ''}${node.table.name}`;
            return `SELECT ${cols.length > 0 ? cols.join(', ') : '*'} FROM ${source}`;
        }
        case 'join':
            return node.relationship.condition;
        case 'computed': {
            const table = findTable(mapping, node.column.table);
            const col = `${table ? tableRef(table) : node.column.table}.${node.column.column}`;
            const agg = node.column.aggregation;
            return agg && /^[A-Z_]+$/.test(agg) ? `${agg}(${col})` : col;
        }
        case 'filter': {
            const f = node.filter;
            const table = findTable(mapping, f.table);
            const col = `${table ? tableRef(table) : f.table}.${f.column}`;
            if (/^IS( NOT)?$/i.test(f.operator)) return `${col} ${f.operator} NULL`;
            return `${col} ${f.operator} ${sqlLiteral(f.value, f.operator)}`;
        }
    }
}

/* -------------------------------------------------------------------------- */
/* FROM clause                                                                */
/* -------------------------------------------------------------------------- */

interface FromParts {
    ctes: string[];
    cteComments: string[];
    from: string[];
    fromComments: string[];
    /** Extra predicates from joins between tables already in scope. */
    extraWhere: string[];
    inScope: Set<string>;
    notJoined: string[];
}

function buildFrom(
    mapping: MappingModel,
    graph: DependencyGraph,
    lookup: FragmentLookup,
    comments: boolean
): FromParts {
    const parts: FromParts = { ctes: [], cteComments: [], from: [], fromComments: [], extraWhere: [], inScope: new Set(), notJoined: [] };
    const available = new Map<string, TableSpec>();

    for (const id of graph.order) {
        const node = graph.nodes.get(id);
        if (node?.kind !== 'table') continue;
        const view = lookup(id);
        if (!view) continue;
        if (view.fragment === null) {
            parts.cteComments.push(comment(`unresolved table ${node.table.name}: ${view.note ?? 'no fragment'}`));
            if (view.draft) parts.cteComments.push(comment(`draft: ${view.draft}`));
            continue;
        }
        if (view.unverified && comments) {
            parts.cteComments.push(comment(`${cteName(node.table)} unverified${view.note ? `: ${view.note}` : ''}`));
        }
        parts.ctes.push(`${cteName(node.table)} AS (\n${indent(view.fragment, '    ')}\n  )`);
        available.set(node.table.name, node.table);
    }

    const source = (t: TableSpec): string => `${cteName(t)} AS ${tableRef(t)}`;

    const root = [...available.values()][0];
    if (!root) return parts;
    parts.from.push(`FROM ${source(root)}`);
    parts.inScope.add(root.name);

    type PendingJoin = { left: TableSpec; right: TableSpec; type: JoinType; condition: string; unverified: boolean; note?: string };
    let pending: PendingJoin[] = [];

    for (const id of graph.order) {
        const node = graph.nodes.get(id);
        if (node?.kind !== 'join') continue;
        const view = lookup(id);
        if (!view) continue;
        const left = findTable(mapping, node.relationship.left);
        const right = findTable(mapping, node.relationship.right);
        if (!left || !right) continue;
        if (view.fragment === null) {
            parts.fromComments.push(comment(`${node.relationship.joinType} JOIN ${cteName(right)} AS ${tableRef(right)} ON ? -- unresolved: ${view.note ?? 'no condition'}`));
            if (view.draft) parts.fromComments.push(comment(`draft: ${view.draft}`));
            continue;
        }
        if (!available.has(left.name) || !available.has(right.name)) continue;
        pending.push({ left, right, type: node.relationship.joinType, condition: view.fragment, unverified: Boolean(view.unverified), note: view.note });
    }

    // Joins are placed once one side is in scope; a join between two unplaced
    // tables waits for another join to bring one of them in.
    while (pending.length > 0) {
        const waiting: PendingJoin[] = [];
        let progressed = false;
        for (const j of pending) {
            const hasLeft = parts.inScope.has(j.left.name);
            const hasRight = parts.inScope.has(j.right.name);
            if (hasLeft && hasRight) {
                parts.extraWhere.push(j.condition);
                progressed = true;
            } else if (hasLeft || hasRight) {
                const joined = hasLeft ? j.right : j.left;
                const type = hasLeft ? j.type : flipJoin(j.type);
                if (j.unverified && comments) parts.fromComments.push(comment(`join ${j.left.name} -> ${j.right.name} unverified${j.note ? `: ${j.note}` : ''}`));
                parts.from.push(`${type} JOIN ${source(joined)} ON ${j.condition}`);
                parts.inScope.add(joined.name);
                progressed = true;
            } else {
                waiting.push(j);
            }
        }
        if (!progressed) {
            const j = waiting.shift();
            if (!j) break;
            parts.from.push(`CROSS JOIN ${source(j.left)}`);
            parts.inScope.add(j.left.name);
            waiting.unshift(j);
        }
        pending = waiting;
    }

    for (const t of available.values()) {
        if (!parts.inScope.has(t.name)) {
            parts.notJoined.push(t.name);
            parts.fromComments.push(comment(`${cteName(t)} is not joined: no resolved relationship connects ${t.name}`));
        }
    }
    return parts;
}

function withClause(ctes: string[], cteComments: string[]): string[] {
    if (ctes.length === 0) return cteComments;
    return ['WITH', ...cteComments.map((c) => '  ' + c), ctes.map((c) => '  ' + c).join(',\n')];
}

/* -------------------------------------------------------------------------- */
/* Final query                                                                */
/* -------------------------------------------------------------------------- */

export interface AssembleOptions {
    /** Emit comments for unverified fragments (placeholders are always commented). */
    comments?: boolean;
    /** Mapping items that never became graph nodes; always commented. */
    dropped?: ReadonlyArray<{ nodeId: string; reason: string }>;
}

export function assembleQuery(
    mapping: MappingModel,
    graph: DependencyGraph,
    lookup: FragmentLookup,
    options: AssembleOptions = {}
): AssembledQuery {
    const comments = options.comments ?? true;
    const from = buildFrom(mapping, graph, lookup, comments);

    const select: string[] = [];
    const selectComments: string[] = [];
    const groupBy: string[] = [];
    const omittedColumns: string[] = [];
    let hasAggregate = false;

    for (const col of mapping.outputColumns) {
        const table = findTable(mapping, col.table);
        const label = computedKey(col);
        if (!table || !from.inScope.has(table.name)) {
            omittedColumns.push(label);
            selectComments.push(comment(`${label}: table ${col.table} is not in scope`));
            continue;
        }
        if (isComputed(col)) {
            const view = lookup(computedNodeId(col));
            if (!view) continue;
            if (view.fragment === null) {
                omittedColumns.push(label);
                selectComments.push(comment(`unresolved ${label}: ${view.note ?? 'no expression'}`));
                if (view.draft) selectComments.push(comment(`draft: ${view.draft}`));
                continue;
            }
            if (view.unverified && comments) selectComments.push(comment(`${label} unverified${view.note ? `: ${view.note}` : ''}`));
            select.push(`${view.fragment} AS ${label}`);
            if (AGGREGATE.test(view.fragment) || col.aggregation) {
                hasAggregate = true;
            } else {
                groupBy.push(view.fragment);
            }
        } else {
            const expr = `${tableRef(table)}.${col.column}`;
            select.push(col.alias && col.alias !== col.column ? `${expr} AS ${col.alias}` : expr);
            groupBy.push(expr);
        }
    }

    const where: string[] = [...from.extraWhere];
    const having: string[] = [];
    const filterComments: string[] = [];
    for (const id of graph.order) {
        const node = graph.nodes.get(id);
        if (node?.kind !== 'filter') continue;
        const view = lookup(id);
        if (!view) continue;
        const table = findTable(mapping, node.filter.table);
        if (view.fragment === null) {
            filterComments.push(comment(`unresolved filter ${node.description}: ${view.note ?? 'no predicate'}`));
            continue;
        }
        if (!table || !from.inScope.has(table.name)) {
            filterComments.push(comment(`filter ${view.fragment} skipped: table ${node.filter.table} is not in scope`));
            continue;
        }
        if (view.unverified && comments) filterComments.push(comment(`filter ${id} unverified${view.note ? `: ${view.note}` : ''}`));
        (node.filter.clause === 'HAVING' ? having : where).push(view.fragment);
    }

    const lines: string[] = (options.dropped ?? []).map((d) => comment(`dropped ${d.nodeId}: ${d.reason}`));
    lines.push(...withClause(from.ctes, from.cteComments));
    lines.push(...selectComments);
    lines.push('SELECT');
    lines.push(select.length > 0 ? select.map((s) => '  ' + s).join(',\n') : '  *');
    lines.push(...from.fromComments);
    lines.push(...from.from);
    lines.push(...filterComments);
    if (where.length > 0) lines.push(`WHERE ${where.join('\n  AND ')}`);
    if (hasAggregate && groupBy.length > 0) lines.push(`GROUP BY ${groupBy.join(', ')}`);
    if (having.length > 0) lines.push(`HAVING ${having.join('\n  AND ')}`);

    return { sql: lines.join('\n'), notJoined: from.notJoined, omittedColumns };
}

/* -------------------------------------------------------------------------- */
/* Probes                                                                     */
/* -------------------------------------------------------------------------- */

/**
 * Wraps a candidate fragment with its built dependencies into a row-count query.
 * `lookup` should answer for the dependency closure of `node` only.
 */
export function buildProbe(
    mapping: MappingModel,
    graph: DependencyGraph,
    lookup: FragmentLookup,
    node: GraphNode,
    candidate: string
): string {
    if (node.kind === 'table') {
        return `SELECT COUNT(*) AS row_count FROM (\n${indent(candidate, '  ')}\n) AS probe`;
    }

    const withCandidate: FragmentLookup = (id) => (id === node.id ? { fragment: candidate } : lookup(id));
    const from = buildFrom(mapping, graph, withCandidate, false);

    const inner = node.kind === 'computed' ? `SELECT ${candidate} AS value` : 'SELECT 1 AS one';
    const body = [inner, ...from.from];
    if (node.kind === 'filter') {
        const where = [...from.extraWhere];
        if (node.filter.clause === 'HAVING') {
            if (where.length > 0) body.push(`WHERE ${where.join(' AND ')}`);
            body.push(`HAVING ${candidate}`);
        } else {
            body.push(`WHERE ${[...where, candidate].join(' AND ')}`);
        }
    } else if (from.extraWhere.length > 0) {
        body.push(`WHERE ${from.extraWhere.join(' AND ')}`);
    }

    return [
        ...withClause(from.ctes, []),
        'SELECT COUNT(*) AS row_count FROM (',
        indent(body.join('\n'), '  '),
        ') AS probe',
    ].join('\n');
}

/** Wraps a complete query into a row-count query. */
export function buildQueryProbe(query: string): string {
    return `SELECT COUNT(*) AS row_count FROM (\n${indent(query, '  ')}\n) AS probe`;
}
