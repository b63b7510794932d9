/**
 * Shared stage plumbing: the per-request context every stage receives, the
 * stage contract, and budget-gated provider calls.
 */

import { BudgetController } from '../budget_controller';
import { estimateTokens } from '../config';
import { ProgressEventLog } from '../event_log';
import type { Logger } from '../logger';
import { ProviderGateway } from '../provider_gateway';
import type { StrategyProfile } from '../strategy';
import type {
    BuildUnit,
    DependencyGraph,
    Diagnostic,
    EventPhase,
    GenerationRequest,
    MappingModel,
    StageName,
    StageResult,
    UnresolvedItem,
} from '../types';
import { Validator } from '../validator';

/* -------------------------------------------------------------------------- */
/* Context                                                                    */
/* -------------------------------------------------------------------------- */

export interface StageContext {
    requestId: string;
    request: Readonly<GenerationRequest>;
    strategy: StrategyProfile;
    gateway: ProviderGateway;
    budget: BudgetController;
    validator: Validator;
    events: ProgressEventLog;
    signal: AbortSignal;
    log: Logger;
}

export function emit(
    ctx: StageContext,
    section: string,
    phase: EventPhase,
    message: string,
    details: Record<string, unknown> = {}
): void {
    ctx.events.append(section, phase, message, details);
}

/* -------------------------------------------------------------------------- */
/* Stage contract                                                             */
/* -------------------------------------------------------------------------- */

export interface StageOutput<O> {
    artifact: O;
    degraded: boolean;
    diagnostics: Diagnostic[];
}

export interface Stage<I, O> {
    readonly name: StageName;
    readonly required: boolean;
    run(input: I, ctx: StageContext): Promise<StageOutput<O>>;
    /** Optional stages: the artifact to continue with when run() fails. */
    fallback?(input: I, ctx: StageContext, reason: string): O;
}

/* -------------------------------------------------------------------------- */
/* Artifacts                                                                  */
/* -------------------------------------------------------------------------- */

export type DiscoverySource = 'provider' | 'cache' | 'hints';

export interface DiscoveryArtifact {
    mapping: MappingModel;
    source: DiscoverySource;
}

export interface ResolutionArtifact {
    mapping: MappingModel;
    graph: DependencyGraph;
    /** Items dropped by discovery or resolution; they never reach the graph. */
    dropped: UnresolvedItem[];
}

export interface BuildArtifact extends ResolutionArtifact {
    units: ReadonlyMap<string, BuildUnit>;
}

export interface ValidationArtifact extends BuildArtifact {
    query: string;
    verified: boolean;
    repaired: boolean;
    notJoined: string[];
    /** Why the query is not verified. */
    note?: string;
}

export interface PriorResults {
    discovery: StageResult<DiscoveryArtifact>;
    resolution: StageResult<ResolutionArtifact>;
    build: StageResult<BuildArtifact>;
    validation: StageResult<ValidationArtifact>;
}

/* -------------------------------------------------------------------------- */
/* Budget-gated completion                                                    */
/* -------------------------------------------------------------------------- */

export type GatedCompletion =
    | { kind: 'completed'; text: string; tokensUsed: number; costUsd: number; provider: string }
    | { kind: 'denied'; reason: string };

export interface GatedOptions {
    section: string;
    label: string;
    essential: boolean;
}

/**
 * Authorizes, calls and records one completion. Denial is returned, not thrown;
 * fatal gateway errors and cancellation propagate.
 */
export async function gatedComplete(
    ctx: StageContext,
    prompt: string,
    maxTokens: number,
    options: GatedOptions
): Promise<GatedCompletion> {
    const promptTokens = estimateTokens(prompt);
    const estimatedTokens = promptTokens + maxTokens;
    const auth = ctx.budget.authorize(estimatedTokens, {
        estimatedCostUsd: ctx.gateway.estimateCost(promptTokens, maxTokens),
        essential: options.essential,
    });
    if (!auth.allowed) return { kind: 'denied', reason: auth.reason };

    const completion = await ctx.gateway.complete(prompt, maxTokens, {
        signal: ctx.signal,
        logger: ctx.log,
        onRetry: (n) => emit(ctx, options.section, 'progress', `Provider ${n.provider} retry in ${n.delayMs}ms`, {
            provider: n.provider,
            attempt: n.attempt,
            delay_ms: n.delayMs,
            reason: n.reason,
        }),
    });
    ctx.budget.record(completion.tokensUsed, completion.costUsd, options.label, estimatedTokens, completion.calls);

    return {
        kind: 'completed',
        text: completion.text,
        tokensUsed: completion.tokensUsed,
        costUsd: completion.costUsd,
        provider: completion.provider,
    };
}
