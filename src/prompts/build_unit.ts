/**
 * Build Unit Prompt
 * Produces ONE fragment for ONE graph node, scoped to the node and the
 * fragments of its already-built dependencies
 */

import { cteName } from '../sql_assembler';
import { findTable, referencedColumns, tableRef } from '../mapping_model';
import type { GraphNode, MappingModel } from '../types';

export interface BuiltDependency {
    nodeId: string;
    fragment: string;
}

export interface BuildUnitPromptInput {
    node: GraphNode;
    mapping: MappingModel;
    dependencies: BuiltDependency[];
    targetEnvironment: string;
    /** Set on retries: what the previous draft was and why it was rejected. */
    previousFragment?: string;
    previousFailure?: string;
}

function tableLine(mapping: MappingModel, name: string): string {
    const t = findTable(mapping, name);
    if (!t) return `- ${name} (not declared)`;
    return `- ${t.schema ? `${t.schema}.` : ''}${t.name} (available as ${cteName(t)}, referenced as ${tableRef(t)}): columns ${referencedColumns(mapping, t).join(', ') || '(none listed)'}`;
}

function taskFor(node: GraphNode, mapping: MappingModel): string {
    switch (node.kind) {
        case 'table': {
            const t = node.table;
            const source = `${t.schema ? `${t.schema}.` : ''}${t.name}`;
            return `Write the SELECT statement for the CTE of source table ${source}.
It MUST select every one of these columns by their exact names: ${referencedColumns(mapping, t).join(', ') || '*'}.
Read FROM ${source}. Do not join other tables. Do not rename columns.
Output shape: SELECT ... FROM ${source}`;
        }
        case 'join': {
            const r = node.relationship;
            const hint = r.condition ? `\nDocumented condition: ${r.condition}` : '\nThe document gives no explicit condition: derive it from the column names.';
            return `Write the ON condition for: ${r.joinType} JOIN between ${r.left} and ${r.right}.${hint}
Qualify columns with the table references listed below.
Output shape: <left_ref>.<column> = <right_ref>.<column>  (no JOIN or ON keyword)`;
        }
        case 'computed': {
            const c = node.column;
            const rules = node.rules.map((r) => `- ${r.rule}${r.implementation ? ` (${r.implementation})` : ''}`).join('\n');
            return `Write the select expression for output column ${c.alias ?? c.column}.
Source column: ${c.table}.${c.column}
Aggregation: ${c.aggregation ?? 'none'}
Transformation: ${c.transformation ?? 'none'}${rules ? `\nBusiness rules:\n${rules}` : ''}
If it depends on other computed columns, inline their expressions (shown below) instead of referring to their aliases.
Output shape: a single expression, without AS alias`;
        }
        case 'filter': {
            const f = node.filter;
            return `Write the ${f.clause} predicate: ${f.table}.${f.column} ${f.operator} ${f.value}${f.description ? ` (${f.description})` : ''}.
Output shape: a boolean expression without the WHERE/HAVING keyword`;
        }
    }
}

export function getBuildUnitPrompt(input: BuildUnitPromptInput): string {
    const { node, mapping, dependencies } = input;

    const tables = new Set<string>();
    if (node.kind === 'table') tables.add(node.table.name);
    if (node.kind === 'join') {
        tables.add(node.relationship.left);
        tables.add(node.relationship.right);
    }
    if (node.kind === 'computed') tables.add(node.column.table);
    if (node.kind === 'filter') tables.add(node.filter.table);

    const depBlock = dependencies.length > 0
        ? `\nALREADY BUILT (do not repeat, build on them):\n${dependencies.map((d) => `[${d.nodeId}]\n${d.fragment}`).join('\n\n')}\n`
        : '';
    const retryBlock = input.previousFailure
        ? `\nYOUR PREVIOUS ATTEMPT FAILED.\nPrevious fragment:\n${input.previousFragment ?? '(none)'}\nError: ${input.previousFailure}\nFix the cause of this error.\n`
        : '';

    return `You are a SQL expert building one fragment of a larger ${input.targetEnvironment} query, one piece at a time.
You MUST return ONLY the SQL fragment. No explanation, no markdown.

NODE: ${node.id}
PURPOSE: ${node.description}

TABLES:
${[...tables].map((t) => tableLine(mapping, t)).join('\n')}
${depBlock}
TASK:
${taskFor(node, mapping)}
${retryBlock}
Do not include comments.`;
}
