// Stage 4: validation (optional)
// Fallback: the assembled query, annotated as unverified.

import { MAX_OUTPUT_TOKENS } from '../config';
import { unitView } from '../incremental_builder';
import { getRepairPrompt } from '../prompts';
import { assembleQuery, AssembledQuery, buildQueryProbe } from '../sql_assembler';
import type { CheckContext, Diagnostic, StageResult } from '../types';
import type { Verdict } from '../validator';
import { BuildArtifact, emit, gatedComplete, Stage, StageContext, StageOutput, ValidationArtifact } from './context';

const SECTION = 'validation';

export class QueryRejectedError extends Error {
    constructor(public readonly reason: string) {
        super(`Assembled query failed validation: ${reason}`);
        this.name = 'QueryRejectedError';
    }
}

function assemble(prior: StageResult<BuildArtifact>, ctx: StageContext): AssembledQuery {
    const { mapping, graph, units, dropped } = prior.artifact;
    return assembleQuery(mapping, graph, (id) => unitView(units.get(id)), {
        comments: ctx.strategy.commentDensity !== 'minimal',
        dropped,
    });
}

function stripSql(text: string): string {
    let out = text.trim();
    const fence = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```\s*$/.exec(out);
    if (fence) out = fence[1].trim();
    return out.replace(/;+\s*$/, '').trim();
}

async function checkQuery(query: string, prior: StageResult<BuildArtifact>, ctx: StageContext): Promise<Verdict> {
    const context: CheckContext = {
        requestId: ctx.requestId,
        targetEnvironment: ctx.request.targetEnvironment,
        node: null,
        mapping: prior.artifact.mapping,
        probe: buildQueryProbe(query),
    };
    return ctx.validator.checkFragment(query, context, ctx.signal);
}

export const validationStage: Stage<StageResult<BuildArtifact>, ValidationArtifact> = {
    name: 'validation',
    required: false,

    async run(prior: StageResult<BuildArtifact>, ctx: StageContext): Promise<StageOutput<ValidationArtifact>> {
        const assembled = assemble(prior, ctx);
        const diagnostics: Diagnostic[] = [];

        const first = await checkQuery(assembled.sql, prior, ctx);
        if (first.outcome === 'passed') {
            emit(ctx, SECTION, 'progress', 'Assembled query passed its trial execution', { row_estimate: first.rowEstimate });
            return {
                artifact: { ...prior.artifact, query: assembled.sql, verified: true, repaired: false, notJoined: assembled.notJoined },
                degraded: false,
                diagnostics,
            };
        }

        if (first.outcome === 'inconclusive') {
            throw new QueryRejectedError(first.reason);
        }

        if (!ctx.strategy.repairFinalQuery) {
            throw new QueryRejectedError(first.reason);
        }

        emit(ctx, SECTION, 'retry', 'Repairing assembled query', { attempt: 1, reason: first.reason });
        const call = await gatedComplete(
            ctx,
            getRepairPrompt(assembled.sql, first.reason, ctx.request.targetEnvironment),
            MAX_OUTPUT_TOKENS.REPAIR,
            { section: SECTION, label: 'repair#1', essential: false }
        );
        if (call.kind === 'denied') {
            throw new QueryRejectedError(`${first.reason}; repair denied by budget: ${call.reason}`);
        }

        const repaired = stripSql(call.text);
        const second = repaired ? await checkQuery(repaired, prior, ctx) : null;
        if (second?.outcome !== 'passed') {
            const why = second === null ? 'empty repair response' : second.reason;
            throw new QueryRejectedError(`${first.reason}; repair rejected: ${why}`);
        }

        diagnostics.push({
            severity: 'info',
            code: 'VALIDATION_FAILED',
            message: `Assembled query repaired after: ${first.reason}`,
        });
        emit(ctx, SECTION, 'progress', 'Repaired query passed its trial execution', { row_estimate: second.rowEstimate });
        return {
            artifact: { ...prior.artifact, query: repaired, verified: true, repaired: true, notJoined: assembled.notJoined },
            degraded: false,
            diagnostics,
        };
    },

    fallback(prior: StageResult<BuildArtifact>, ctx: StageContext, reason: string): ValidationArtifact {
        const assembled = assemble(prior, ctx);
        return {
            ...prior.artifact,
            query: assembled.sql,
            verified: false,
            repaired: false,
            notJoined: assembled.notJoined,
            note: reason,
        };
    },
};
