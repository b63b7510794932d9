/**
 * Stage Pipeline
 *
 * discovery → dependency-resolution → incremental-build → validation → finalize
 *
 * Each stage moves pending → running → {completed, degraded, failed}. A failed
 * required stage ends the request with one `error` event on the pipeline
 * section; a failed optional stage runs its fallback and the pipeline carries on
 * degraded. Stage artifacts are the only data passed between stages.
 */

import { abortError, throwIfAborted } from './async_utils';
import { PIPELINE_SECTION } from './event_log';
import { dependencyResolutionStage } from './stages/dependency_resolution';
import { discoveryStage } from './stages/discovery';
import { finalizeStage } from './stages/finalize';
import { incrementalBuildStage } from './stages/incremental_build';
import { validationStage } from './stages/validation';
import { emit, Stage, StageContext } from './stages/context';
import { ErrorFactory, isPipelineError, PipelineError, StructuredError } from './structured_error';
import type { FinalArtifact, StageName, StageResult, StageState, StageStatus } from './types';

export const STAGE_ORDER: readonly StageName[] = [
    'discovery',
    'dependency-resolution',
    'incremental-build',
    'validation',
    'finalize',
];

export interface StageRecord {
    name: StageName;
    state: StageState;
    status?: StageStatus;
    durationMs?: number;
    tokens?: number;
    costUsd?: number;
}

export type PipelineOutcome =
    | { ok: true; value: FinalArtifact; stages: StageRecord[] }
    | { ok: false; error: StructuredError; stages: StageRecord[] };

export class StagePipeline {
    private readonly records = new Map<StageName, StageRecord>();
    private current: StageName | null = null;

    constructor(private readonly ctx: StageContext) {
        for (const name of STAGE_ORDER) this.records.set(name, { name, state: 'pending' });
    }

    stages(): StageRecord[] {
        return STAGE_ORDER.map((name) => ({ ...(this.records.get(name) ?? { name, state: 'pending' }) }));
    }

    async run(): Promise<PipelineOutcome> {
        const { ctx } = this;
        try {
            const discovery = await this.runStage(discoveryStage, ctx.request);
            const resolution = await this.runStage(dependencyResolutionStage, discovery);
            const build = await this.runStage(incrementalBuildStage, resolution);
            const validation = await this.runStage(validationStage, build);
            const final = await this.runStage(finalizeStage, { discovery, resolution, build, validation });

            const artifact = final.artifact;
            ctx.log.info('Pipeline finished', { status: artifact.status, unresolved: artifact.unresolved.length });
            emit(ctx, PIPELINE_SECTION, 'complete', `Generation ${artifact.status}`, { artifact, status: artifact.status });
            return { ok: true, value: artifact, stages: this.stages() };
        } catch (e) {
            const error = this.toPipelineError(e).structured;
            ctx.log.error('Pipeline failed', { code: error.code, message: error.message, stage: this.current });
            emit(ctx, PIPELINE_SECTION, 'error', error.message, {
                kind: error.code,
                message: error.message,
                suggestion: error.suggestion,
                stage: this.current,
                reason: error.code.toLowerCase(),
                context: error.context,
            });
            return { ok: false, error, stages: this.stages() };
        }
    }

    private toPipelineError(e: unknown): PipelineError {
        // Whatever a stage threw while the request was being aborted, the abort wins.
        if (this.ctx.signal.aborted) return abortError(this.ctx.signal);
        if (isPipelineError(e)) return e;
        const reason = e instanceof Error ? e.message : String(e);
        return ErrorFactory.requiredStageFailed(
            this.current ?? 'pipeline',
            reason,
            'Inspect the stage log for the underlying error and resubmit'
        );
    }

    private update(name: StageName, patch: Partial<StageRecord>): void {
        const prev = this.records.get(name) ?? { name, state: 'pending' };
        this.records.set(name, { ...prev, ...patch });
    }

    private async runStage<I, O>(stage: Stage<I, O>, input: I): Promise<StageResult<O>> {
        const { ctx } = this;
        const log = ctx.log.withContext({ requestId: ctx.requestId, stage: stage.name });
        throwIfAborted(ctx.signal);

        this.current = stage.name;
        this.update(stage.name, { state: 'running' });
        emit(ctx, stage.name, 'start', `Stage ${stage.name} started`, { required: stage.required });

        const started = Date.now();
        const before = ctx.budget.snapshot();
        const usage = () => {
            const after = ctx.budget.snapshot();
            return {
                tokens: after.tokensUsed - before.tokensUsed,
                costUsd: after.costUsd - before.costUsd,
                durationMs: Date.now() - started,
            };
        };

        try {
            const out = await stage.run(input, { ...ctx, log });
            const status: StageStatus = out.degraded ? 'degraded' : 'success';
            const spent = usage();
            this.update(stage.name, {
                state: out.degraded ? 'degraded' : 'completed',
                status,
                durationMs: spent.durationMs,
                tokens: spent.tokens,
                costUsd: spent.costUsd,
            });
            log.info('Stage finished', { status, duration_ms: spent.durationMs, tokens: spent.tokens });
            emit(ctx, stage.name, 'complete', `Stage ${stage.name} ${status}`, { status, diagnostics: out.diagnostics.length });
            return { stage: stage.name, status, artifact: out.artifact, diagnostics: out.diagnostics, usage: spent };
        } catch (e) {
            const fallback = stage.fallback;
            if (stage.required || !fallback || isPipelineError(e) || ctx.signal.aborted) {
                this.update(stage.name, { state: 'failed', status: 'failed', ...usage() });
                throw e;
            }

            const reason = e instanceof Error ? e.message : String(e);
            const suggestion = 'Review the unverified query before use';
            log.warn('Optional stage failed; using fallback', { reason });
            const artifact = fallback(input, ctx, reason);
            const spent = usage();
            this.update(stage.name, { state: 'degraded', status: 'degraded', durationMs: spent.durationMs, tokens: spent.tokens, costUsd: spent.costUsd });
            emit(ctx, stage.name, 'degraded', `Stage ${stage.name} failed; fallback used`, {
                code: 'OPTIONAL_STAGE_FAILED',
                reason,
                suggestion,
            });
            emit(ctx, stage.name, 'complete', `Stage ${stage.name} degraded`, { status: 'degraded', diagnostics: 1 });
            return {
                stage: stage.name,
                status: 'degraded',
                artifact,
                diagnostics: [{ severity: 'warning', code: 'OPTIONAL_STAGE_FAILED', message: reason, suggestion }],
                usage: spent,
            };
        }
    }
}
