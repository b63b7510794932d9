/**
 * GenerationRequest validation and parsing.
 *
 * validateRequest() checks a typed request on submission; parseGenerationRequest()
 * builds one from untyped JSON (CLI spec files). Hints in JSON use the same
 * snake_case shape discovery responses use.
 */

import { TIMEOUTS } from './config';
import { parseMappingResponse } from './mapping_model';
import { JsonSchema, SchemaValidator } from './schema_validator';
import { parseIntelligenceLevel, parseStrategyOverrides } from './strategy';
import type { BudgetCeiling, GenerationRequest, SheetExtract } from './types';

const REQUEST_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['specification', 'targetEnvironment', 'intelligenceLevel', 'budget', 'timeoutMs'],
    properties: {
        specification: {
            type: 'object',
            required: ['text'],
            properties: {
                text: { type: 'string' },
                sheets: {
                    type: 'array',
                    items: { type: 'object', required: ['name', 'text'], properties: { name: { type: 'string' }, text: { type: 'string' } } },
                },
                hints: { type: 'object' },
            },
        },
        targetEnvironment: { type: 'string', minLength: 1 },
        intelligenceLevel: { type: 'string', enum: ['conservative', 'balanced', 'aggressive'] },
        budget: {
            type: 'object',
            properties: {
                maxTokens: { type: 'number', minimum: 1 },
                maxCostUsd: { type: 'number', minimum: 0 },
            },
        },
        timeoutMs: { type: 'number', minimum: 1 },
        strategyOverrides: { type: 'object' },
    },
};

const schemas = new SchemaValidator();
schemas.registerSchema('generation.request', REQUEST_SCHEMA);

/** Problems with a submitted request; empty when it is valid. */
export function validateRequest(request: unknown): string[] {
    const res = schemas.validate(request, 'generation.request');
    const problems = res.errors.map((e) => `${e.path || '(root)'}: ${e.message}`);
    if (!res.valid || !isObject(request)) return problems;

    const spec = request.specification;
    const budget = request.budget;
    if (isObject(spec)) {
        const hints = spec.hints;
        const hasText = typeof spec.text === 'string' && spec.text.trim() !== '';
        const hasTables = isObject(hints) && Array.isArray(hints.tables) && hints.tables.length > 0;
        if (!hasText && !hasTables) problems.push('.specification: text is empty and no table hints were given');
    }
    if (isObject(budget) && budget.maxTokens === undefined && budget.maxCostUsd === undefined) {
        problems.push('.budget: set maxTokens, maxCostUsd or both');
    }
    if (request.strategyOverrides !== undefined) {
        problems.push(...parseStrategyOverrides(request.strategyOverrides).problems.map((p) => `.strategyOverrides: ${p}`));
    }
    return problems;
}

/* -------------------------------------------------------------------------- */
/* Parsing untyped input                                                      */
/* -------------------------------------------------------------------------- */

function isObject(v: unknown): v is Record<string, unknown> {
    return v !== null && typeof v === 'object' && !Array.isArray(v);
}

function positive(v: unknown): number | undefined {
    return typeof v === 'number' && Number.isFinite(v) && v > 0 ? v : undefined;
}

export type RequestParse =
    | { ok: true; request: GenerationRequest; warnings: string[] }
    | { ok: false; problems: string[] };

/**
 * Builds a GenerationRequest from JSON. Accepts both `targetEnvironment` and
 * `target_environment` style keys; missing budget and timeout take the defaults.
 */
export function parseGenerationRequest(raw: unknown, defaults: { maxCostUsd: number }): RequestParse {
    if (!isObject(raw)) return { ok: false, problems: ['request must be a JSON object'] };
    const problems: string[] = [];
    const warnings: string[] = [];

    const specRaw = isObject(raw.specification) ? raw.specification : raw;
    const text = typeof specRaw.text === 'string' ? specRaw.text : '';
    const sheets: SheetExtract[] = Array.isArray(specRaw.sheets)
        ? specRaw.sheets.filter(isObject).map((s) => ({ name: String(s.name ?? ''), text: String(s.text ?? '') }))
        : [];

    let hints: GenerationRequest['specification']['hints'];
    if (specRaw.hints !== undefined) {
        const parsed = parseMappingResponse(JSON.stringify(specRaw.hints));
        if (parsed.ok) {
            hints = parsed.model;
            warnings.push(...parsed.diagnostics.map((d) => d.message));
        } else {
            problems.push(`hints: ${parsed.error}`);
        }
    }

    const target = raw.targetEnvironment ?? raw.target_environment;
    const levelRaw = raw.intelligenceLevel ?? raw.intelligence_level ?? 'balanced';
    const level = parseIntelligenceLevel(levelRaw);
    if (level === null) problems.push(`unknown intelligence level: ${String(levelRaw)}`);

    const budgetRaw = isObject(raw.budget) ? raw.budget : {};
    const budget: BudgetCeiling = {
        maxTokens: positive(budgetRaw.maxTokens ?? budgetRaw.max_tokens),
        maxCostUsd: positive(budgetRaw.maxCostUsd ?? budgetRaw.max_cost_usd),
    };
    if (budget.maxTokens === undefined && budget.maxCostUsd === undefined) budget.maxCostUsd = defaults.maxCostUsd;

    const overridesRaw = raw.strategyOverrides ?? raw.strategy_overrides;
    const overrides = parseStrategyOverrides(overridesRaw);
    problems.push(...overrides.problems);

    if (typeof target !== 'string' || target.trim() === '') problems.push('targetEnvironment is required');
    if (problems.length > 0 || level === null || typeof target !== 'string') return { ok: false, problems };

    return {
        ok: true,
        request: {
            specification: { text, sheets, hints },
            targetEnvironment: target.trim(),
            intelligenceLevel: level,
            budget,
            timeoutMs: positive(raw.timeoutMs ?? raw.timeout_ms) ?? TIMEOUTS.REQUEST_MS,
            strategyOverrides: overridesRaw === undefined ? undefined : overrides.overrides,
        },
        warnings,
    };
}
