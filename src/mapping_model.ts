/**
 * Mapping model: parsing, normalization, hint merging and gap filling for the
 * discovery artifact.
 *
 * Provider output uses the snake_case wire shape requested by the discovery
 * prompt; everything past `parseMappingResponse` is the camelCase MappingModel.
 * Invalid items are dropped individually with a diagnostic rather than failing
 * the whole response.
 */

import { JsonSchema, SchemaValidator } from './schema_validator';
import type { GapFilling } from './strategy';
import type {
    BusinessRule,
    Diagnostic,
    FilterSpec,
    JoinType,
    MappingMetadata,
    MappingModel,
    OutputColumnSpec,
    RelationshipSpec,
    TableSpec,
} from './types';

/* -------------------------------------------------------------------------- */
/* Wire schemas                                                               */
/* -------------------------------------------------------------------------- */

const OPT_STRING: JsonSchema = { type: ['string', 'null'] };

const SCHEMAS: Record<string, JsonSchema> = {
    'mapping.root': {
        type: 'object',
        properties: {
            tables: { type: 'array' },
            relationships: { type: ['array', 'null'] },
            output_columns: { type: ['array', 'null'] },
            filters: { type: ['array', 'null'] },
            business_logic: { type: ['array', 'null'] },
            metadata: { type: ['object', 'null'] },
        },
        required: ['tables'],
    },
    'mapping.table': {
        type: 'object',
        properties: {
            name: { type: 'string', minLength: 1, pattern: '^[A-Za-z_][A-Za-z0-9_$.]*$' },
            alias: OPT_STRING,
            schema: OPT_STRING,
            columns: { type: ['array', 'null'], items: { type: 'string', minLength: 1 } },
            description: OPT_STRING,
        },
        required: ['name'],
    },
    'mapping.relationship': {
        type: 'object',
        properties: {
            left_table: { type: 'string', minLength: 1 },
            right_table: { type: 'string', minLength: 1 },
            join_type: OPT_STRING,
            join_condition: OPT_STRING,
            description: OPT_STRING,
        },
        required: ['left_table', 'right_table'],
    },
    'mapping.output_column': {
        type: 'object',
        properties: {
            table: { type: 'string', minLength: 1 },
            column: { type: 'string', minLength: 1 },
            alias: OPT_STRING,
            aggregation: OPT_STRING,
            transformation: OPT_STRING,
            depends_on: { type: ['array', 'null'], items: { type: 'string' } },
        },
        required: ['table', 'column'],
    },
    'mapping.filter': {
        type: 'object',
        properties: {
            table: { type: 'string', minLength: 1 },
            column: { type: 'string', minLength: 1 },
            operator: { type: 'string', minLength: 1 },
            value: { type: ['string', 'number', 'boolean', 'null', 'array'] },
            condition: OPT_STRING,
            description: OPT_STRING,
        },
        required: ['table', 'column', 'operator'],
    },
    'mapping.business_rule': {
        type: 'object',
        properties: {
            rule: { type: 'string', minLength: 1 },
            implementation: OPT_STRING,
            applies_to: OPT_STRING,
        },
        required: ['rule'],
    },
};

const validator = new SchemaValidator();
for (const [id, schema] of Object.entries(SCHEMAS)) validator.registerSchema(id, schema);

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

type Json = Record<string, unknown>;

function isJson(v: unknown): v is Json {
    return v !== null && typeof v === 'object' && !Array.isArray(v);
}

function str(v: unknown): string | undefined {
    if (typeof v !== 'string') return undefined;
    const t = v.trim();
    if (!t || t.toLowerCase() === 'null' || t.toLowerCase() === 'none') return undefined;
    return t;
}

function sameName(a: string, b: string): boolean {
    return a.toLowerCase() === b.toLowerCase();
}

export function emptyMappingModel(): MappingModel {
    return { tables: [], relationships: [], outputColumns: [], filters: [], businessRules: [], metadata: {} };
}

/** Removes a surrounding markdown code fence and any prose outside the JSON object. */
export function stripCodeFences(text: string): string {
    let out = text.trim();
    const fence = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```\s*$/.exec(out);
    if (fence) out = fence[1].trim();
    if (!out.startsWith('{')) {
        const start = out.indexOf('{');
        const end = out.lastIndexOf('}');
        if (start >= 0 && end > start) out = out.slice(start, end + 1);
    }
    return out;
}

export function normalizeJoinType(raw: unknown): JoinType | null {
    const v = str(raw);
    if (v === undefined) return 'INNER';
    const t = v.toUpperCase().replace(/\s+OUTER/, '').replace(/\s+JOIN$/, '').trim();
    if (t === 'INNER' || t === 'LEFT' || t === 'RIGHT' || t === 'FULL') return t;
    return null;
}

/** Name used to qualify a table's columns in SQL: its alias, else its name. */
export function tableRef(table: TableSpec): string {
    if (table.alias) return table.alias;
    return table.name.includes('.') ? table.name.slice(table.name.lastIndexOf('.') + 1) : table.name;
}

/** True when `ref` names the table by name, alias or qualifier. */
export function refersTo(table: TableSpec, ref: string): boolean {
    return sameName(table.name, ref) || sameName(tableRef(table), ref) || (table.alias !== undefined && sameName(table.alias, ref));
}

export function findTable(model: MappingModel, name: string): TableSpec | undefined {
    return model.tables.find((t) => refersTo(t, name));
}

/* -------------------------------------------------------------------------- */
/* Parsing                                                                    */
/* -------------------------------------------------------------------------- */

export type MappingParse =
    | { ok: true; model: MappingModel; diagnostics: Diagnostic[] }
    | { ok: false; error: string };

function dropped(kind: string, index: number, errors: Array<{ path: string; message: string }>): Diagnostic {
    const first = errors[0];
    return {
        severity: 'warning',
        code: 'DISCOVERY_PARTIAL',
        message: `Dropped ${kind} #${index + 1}: ${first ? `${first.path || '(root)'} ${first.message}` : 'invalid'}`,
        suggestion: `Clarify the ${kind} in the mapping document`,
        subject: `${kind}[${index}]`,
    };
}

function validItems(raw: unknown, schemaId: string, kind: string, diagnostics: Diagnostic[]): Json[] {
    if (!Array.isArray(raw)) return [];
    const out: Json[] = [];
    raw.forEach((item, i) => {
        const res = validator.validate(item, schemaId);
        if (res.valid && isJson(item)) {
            out.push(item);
        } else {
            diagnostics.push(dropped(kind, i, res.errors));
        }
    });
    return out;
}

/**
 * Parses a discovery completion into a MappingModel. Fails only when the text is
 * not a JSON object of the expected top-level shape.
 */
export function parseMappingResponse(text: string): MappingParse {
    const cleaned = stripCodeFences(text);
    let parsed: unknown;
    try {
        parsed = JSON.parse(cleaned);
    } catch (e) {
        return { ok: false, error: `response is not valid JSON: ${e instanceof Error ? e.message : String(e)}` };
    }

    const root = validator.validate(parsed, 'mapping.root');
    if (!root.valid || !isJson(parsed)) {
        const first = root.errors[0];
        return { ok: false, error: `response has wrong shape: ${first ? `${first.path || '(root)'} ${first.message}` : 'not an object'}` };
    }

    const diagnostics: Diagnostic[] = [];
    const model = emptyMappingModel();

    for (const t of validItems(parsed.tables, 'mapping.table', 'table', diagnostics)) {
        const name = String(t.name).trim();
        const columns = Array.isArray(t.columns) ? t.columns.filter((c): c is string => typeof c === 'string').map((c) => c.trim()) : [];
        const existing = model.tables.find((x) => sameName(x.name, name));
        if (existing) {
            for (const c of columns) if (!existing.columns.includes(c)) existing.columns.push(c);
            continue;
        }
        model.tables.push({ name, alias: str(t.alias), schema: str(t.schema), columns: [...new Set(columns)], description: str(t.description) });
    }

    validItems(parsed.relationships, 'mapping.relationship', 'relationship', diagnostics).forEach((r, i) => {
        const joinType = normalizeJoinType(r.join_type);
        if (joinType === null) {
            diagnostics.push({
                severity: 'warning',
                code: 'DISCOVERY_PARTIAL',
                message: `Dropped relationship #${i + 1}: unknown join type ${String(r.join_type)}`,
                suggestion: 'Use one of INNER, LEFT, RIGHT or FULL',
                subject: `relationship[${i}]`,
            });
            return;
        }
        model.relationships.push({
            left: String(r.left_table).trim(),
            right: String(r.right_table).trim(),
            joinType,
            condition: str(r.join_condition) ?? null,
            description: str(r.description),
        });
    });

    for (const c of validItems(parsed.output_columns, 'mapping.output_column', 'output column', diagnostics)) {
        const dependsOn = Array.isArray(c.depends_on)
            ? c.depends_on.filter((d): d is string => typeof d === 'string' && d.trim() !== '').map((d) => d.trim())
            : undefined;
        model.outputColumns.push({
            table: String(c.table).trim(),
            column: String(c.column).trim(),
            alias: str(c.alias),
            aggregation: str(c.aggregation)?.toUpperCase() ?? null,
            transformation: str(c.transformation) ?? null,
            dependsOn: dependsOn && dependsOn.length > 0 ? dependsOn : undefined,
        });
    }

    for (const f of validItems(parsed.filters, 'mapping.filter', 'filter', diagnostics)) {
        const clause = str(f.condition)?.toUpperCase() === 'HAVING' ? 'HAVING' : 'WHERE';
        const value = Array.isArray(f.value) ? f.value.map(String).join(', ') : f.value === null || f.value === undefined ? 'NULL' : String(f.value);
        model.filters.push({
            table: String(f.table).trim(),
            column: String(f.column).trim(),
            operator: String(f.operator).trim().toUpperCase(),
            value,
            clause,
            description: str(f.description),
        });
    }

    for (const b of validItems(parsed.business_logic, 'mapping.business_rule', 'business rule', diagnostics)) {
        model.businessRules.push({ rule: String(b.rule).trim(), implementation: str(b.implementation), appliesTo: str(b.applies_to) });
    }

    if (isJson(parsed.metadata)) {
        const m = parsed.metadata;
        const complexity = str(m.complexity)?.toUpperCase();
        model.metadata = {
            description: str(m.description),
            complexity: complexity === 'SIMPLE' || complexity === 'MEDIUM' || complexity === 'COMPLEX' ? complexity : undefined,
            businessDomain: str(m.business_domain),
        };
    }

    return { ok: true, model, diagnostics };
}

/* -------------------------------------------------------------------------- */
/* Hint merging                                                               */
/* -------------------------------------------------------------------------- */

function mergeBy<T>(primary: T[], extra: T[] | undefined, same: (a: T, b: T) => boolean): T[] {
    const out = [...primary];
    for (const item of extra || []) {
        if (!out.some((x) => same(x, item))) out.push(item);
    }
    return out;
}

/**
 * Merges ingestion hints into a discovered model. Discovered entries win; hints
 * fill what discovery missed. Table columns are unioned.
 */
export function mergeHints(model: MappingModel, hints: Partial<MappingModel> | undefined): MappingModel {
    if (!hints) return model;

    const tables: TableSpec[] = model.tables.map((t) => ({ ...t, columns: [...t.columns] }));
    for (const h of hints.tables || []) {
        const existing = tables.find((t) => sameName(t.name, h.name));
        if (existing) {
            for (const c of h.columns || []) if (!existing.columns.includes(c)) existing.columns.push(c);
            existing.schema = existing.schema ?? h.schema;
            existing.alias = existing.alias ?? h.alias;
        } else {
            tables.push({ ...h, columns: [...(h.columns || [])] });
        }
    }

    const metadata: MappingMetadata = { ...(hints.metadata || {}), ...stripUndefined(model.metadata) };

    return {
        tables,
        relationships: mergeBy<RelationshipSpec>(model.relationships, hints.relationships, (a, b) =>
            (sameName(a.left, b.left) && sameName(a.right, b.right)) || (sameName(a.left, b.right) && sameName(a.right, b.left))),
        outputColumns: mergeBy<OutputColumnSpec>(model.outputColumns, hints.outputColumns, (a, b) =>
            sameName(a.table, b.table) && sameName(a.column, b.column) && (a.alias ?? '') === (b.alias ?? '')),
        filters: mergeBy<FilterSpec>(model.filters, hints.filters, (a, b) =>
            sameName(a.table, b.table) && sameName(a.column, b.column) && a.operator === b.operator && a.value === b.value),
        businessRules: mergeBy<BusinessRule>(model.businessRules, hints.businessRules, (a, b) => a.rule === b.rule),
        metadata,
    };
}

function stripUndefined(m: MappingMetadata): MappingMetadata {
    const out: MappingMetadata = {};
    if (m.description !== undefined) out.description = m.description;
    if (m.complexity !== undefined) out.complexity = m.complexity;
    if (m.businessDomain !== undefined) out.businessDomain = m.businessDomain;
    return out;
}

/* -------------------------------------------------------------------------- */
/* Gap filling                                                                */
/* -------------------------------------------------------------------------- */

function singular(name: string): string {
    const base = name.includes('.') ? name.slice(name.lastIndexOf('.') + 1) : name;
    if (/ies$/i.test(base)) return base.slice(0, -3) + 'y';
    if (/(ss|us)$/i.test(base)) return base;
    if (/s$/i.test(base)) return base.slice(0, -1);
    return base;
}

const QUALIFIED_COLUMN = /\b([A-Za-z_][A-Za-z0-9_]*)\.([A-Za-z_][A-Za-z0-9_]*)\b/g;

/**
 * Every column the model mentions for a table, in first-mention order: declared,
 * output, filtered, and qualified references in join conditions.
 */
export function referencedColumns(model: MappingModel, table: TableSpec): string[] {
    const out: string[] = [];
    const seen = new Set<string>();
    const add = (c: string): void => {
        const key = c.toLowerCase();
        if (!seen.has(key)) {
            seen.add(key);
            out.push(c);
        }
    };

    table.columns.forEach(add);
    for (const o of model.outputColumns) if (refersTo(table, o.table)) add(o.column);
    for (const f of model.filters) if (refersTo(table, f.table)) add(f.column);
    for (const r of model.relationships) {
        if (!r.condition) continue;
        for (const m of r.condition.matchAll(QUALIFIED_COLUMN)) {
            if (refersTo(table, m[1])) add(m[2]);
        }
    }
    return out;
}

function knownColumns(model: MappingModel, table: TableSpec): Set<string> {
    return new Set(referencedColumns(model, table).map((c) => c.toLowerCase()));
}

function conventionalCondition(parent: TableSpec, child: TableSpec): string {
    return `${tableRef(parent)}.id = ${tableRef(child)}.${singular(parent.name).toLowerCase()}_id`;
}

function evidenceCondition(model: MappingModel, left: TableSpec, right: TableSpec): string | null {
    const lc = knownColumns(model, left);
    const rc = knownColumns(model, right);
    const fk = (t: TableSpec): string[] => [`${singular(t.name).toLowerCase()}_id`, `${t.name.toLowerCase()}_id`];

    for (const col of fk(left)) {
        if (lc.has('id') && rc.has(col)) return `${tableRef(left)}.id = ${tableRef(right)}.${col}`;
    }
    for (const col of fk(right)) {
        if (rc.has('id') && lc.has(col)) return `${tableRef(left)}.${col} = ${tableRef(right)}.id`;
    }
    return null;
}

/**
 * Resolves relationships without a join condition according to the gap-filling
 * mode. Returns a new model; the input is not modified.
 */
export function fillGaps(model: MappingModel, mode: GapFilling): { model: MappingModel; diagnostics: Diagnostic[] } {
    const diagnostics: Diagnostic[] = [];
    const relationships: RelationshipSpec[] = [];

    for (const rel of model.relationships) {
        if (rel.condition) {
            relationships.push(rel);
            continue;
        }
        const subject = `join:${rel.left}-${rel.right}`;
        const suggestion = `Specify the join condition between ${rel.left} and ${rel.right}`;
        const left = findTable(model, rel.left);
        const right = findTable(model, rel.right);

        if (mode === 'strict' || !left || !right) {
            diagnostics.push({
                severity: 'warning',
                code: 'STRUCTURAL_GAP',
                message: `Relationship ${rel.left} -> ${rel.right} has no join condition; dropped`,
                suggestion,
                subject,
            });
            continue;
        }

        const inferred = mode === 'conventional'
            ? evidenceCondition(model, left, right) ?? conventionalCondition(left, right)
            : evidenceCondition(model, left, right);

        if (inferred) {
            relationships.push({ ...rel, condition: inferred, inferred: true });
            diagnostics.push({
                severity: 'info',
                message: `Inferred join condition ${inferred}`,
                suggestion: `Confirm the join condition between ${rel.left} and ${rel.right}`,
                subject,
            });
        } else {
            // Left for the builder to resolve from the document text.
            relationships.push(rel);
            diagnostics.push({
                severity: 'warning',
                code: 'STRUCTURAL_GAP',
                message: `No evidence for a join condition between ${rel.left} and ${rel.right}`,
                suggestion,
                subject,
            });
        }
    }

    return { model: { ...model, relationships }, diagnostics };
}
