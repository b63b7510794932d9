// Stage 1: discovery (required)

import { emptyMappingModel, fillGaps, mergeHints, parseMappingResponse } from '../mapping_model';
import { getDiscoveryPrompt } from '../prompts';
import { ErrorFactory } from '../structured_error';
import type { Diagnostic, GenerationRequest, MappingModel } from '../types';
import { DiscoveryArtifact, DiscoverySource, emit, gatedComplete, Stage, StageContext, StageOutput } from './context';

const SECTION = 'discovery';

function hintsOnly(request: Readonly<GenerationRequest>): MappingModel {
    return mergeHints(emptyMappingModel(), request.specification.hints);
}

export const discoveryStage: Stage<Readonly<GenerationRequest>, DiscoveryArtifact> = {
    name: 'discovery',
    required: true,

    async run(request: Readonly<GenerationRequest>, ctx: StageContext): Promise<StageOutput<DiscoveryArtifact>> {
        const diagnostics: Diagnostic[] = [];
        const spec = request.specification;
        let mapping: MappingModel | null = null;
        let source: DiscoverySource = 'provider';
        let degraded = false;
        let previousError: string | undefined;

        for (let attempt = 1; attempt <= ctx.strategy.discoveryAttempts && mapping === null; attempt++) {
            const prompt = getDiscoveryPrompt(spec.text, spec.sheets, previousError);
            const call = await gatedComplete(ctx, prompt, ctx.strategy.discoveryMaxTokens, {
                section: SECTION,
                label: `discovery#${attempt}`,
                essential: attempt === 1,
            });

            if (call.kind === 'denied') {
                degraded = true;
                const cached = ctx.gateway.cached(prompt);
                const parsed = cached ? parseMappingResponse(cached.text) : null;
                if (parsed?.ok) {
                    mapping = mergeHints(parsed.model, spec.hints);
                    diagnostics.push(...parsed.diagnostics);
                    source = 'cache';
                } else {
                    mapping = hintsOnly(request);
                    source = 'hints';
                }
                diagnostics.push({
                    severity: 'warning',
                    code: 'BUDGET_EXHAUSTED',
                    message: `Discovery call denied by budget: ${call.reason}`,
                    suggestion: 'Raise the budget ceiling to let discovery read the full document',
                });
                emit(ctx, SECTION, 'degraded', `Budget denied discovery; using ${source === 'cache' ? 'cached response' : 'ingestion hints'}`, {
                    code: 'BUDGET_EXHAUSTED',
                    reason: call.reason,
                    fallback: source,
                });
                break;
            }

            const parsed = parseMappingResponse(call.text);
            if (parsed.ok) {
                mapping = mergeHints(parsed.model, spec.hints);
                diagnostics.push(...parsed.diagnostics);
                emit(ctx, SECTION, 'progress', `Discovered ${parsed.model.tables.length} tables, ${parsed.model.relationships.length} relationships`, {
                    provider: call.provider,
                    tokens: call.tokensUsed,
                    dropped: parsed.diagnostics.length,
                });
            } else {
                previousError = parsed.error;
                ctx.log.warn('Discovery response rejected', { attempt, error: parsed.error });
                emit(ctx, SECTION, 'progress', `Discovery response rejected: ${parsed.error}`, { attempt });
            }
        }

        if (mapping === null) {
            degraded = true;
            mapping = hintsOnly(request);
            source = 'hints';
            diagnostics.push({
                severity: 'warning',
                code: 'DISCOVERY_PARTIAL',
                message: `No usable discovery response: ${previousError ?? 'unknown error'}`,
                suggestion: 'Restructure the mapping document into clearly labelled tables, joins and outputs',
            });
            emit(ctx, SECTION, 'degraded', 'Discovery fell back to ingestion hints', { code: 'DISCOVERY_PARTIAL', reason: previousError });
        }

        const gaps = fillGaps(mapping, ctx.strategy.gapFilling);
        mapping = gaps.model;
        diagnostics.push(...gaps.diagnostics);

        if (mapping.tables.length === 0) {
            throw ErrorFactory.requiredStageFailed(
                'discovery',
                'no source tables could be identified',
                'Name at least one source table and its columns in the mapping document'
            );
        }

        const partial = diagnostics.filter((d) => d.severity !== 'info' && d.code !== 'BUDGET_EXHAUSTED');
        if (partial.length > 0) {
            degraded = true;
            emit(ctx, SECTION, 'degraded', `${partial.length} discovery item(s) dropped or unresolved`, {
                code: 'DISCOVERY_PARTIAL',
                items: partial.map((d) => ({ message: d.message, suggestion: d.suggestion })),
            });
        }

        return { artifact: { mapping, source }, degraded, diagnostics };
    },
};
