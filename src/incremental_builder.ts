/**
 * Incremental Builder
 *
 * Builds graph nodes one at a time in topological order, each through the
 * validate/recover loop.
 *
 * INVARIANTS:
 * - A node is built only when every dependency is passed or skipped-with-comment
 *   (checked before each build call; a violation throws)
 * - Retries are bounded by the strategy; exhaustion yields a placeholder
 * - A node whose dependency is a pure placeholder becomes a placeholder without
 *   a provider call
 */

import {
    decideRecovery,
    isSettled,
    markFailed,
    markPassed,
    newUnit,
    suggestionFor,
    toPlaceholder,
    toUnverified,
    withDraft,
} from './build_unit';
import { dependencyClosure } from './dependency_resolver';
import { getBuildUnitPrompt } from './prompts';
import { buildProbe, cleanFragment, FragmentLookup, FragmentView, templateFragment } from './sql_assembler';
import { emit, gatedComplete, GatedCompletion, StageContext } from './stages/context';
import type { ErrorCode } from './structured_error';
import type { BuildUnit, DependencyGraph, Diagnostic, GraphNode, MappingModel, UnitSource } from './types';
import type { Verdict } from './validator';

export class BuildOrderError extends Error {
    constructor(nodeId: string, dependency: string) {
        super(`Cannot build ${nodeId}: dependency ${dependency} is not settled`);
        this.name = 'BuildOrderError';
    }
}

export interface BuildOutcome {
    units: Map<string, BuildUnit>;
    diagnostics: Diagnostic[];
    degraded: boolean;
}

/** View of a settled unit for assembly and probes. */
export function unitView(unit: BuildUnit | undefined): FragmentView | undefined {
    if (!unit || !isSettled(unit)) return undefined;
    if (unit.lifecycle === 'placeholder' || unit.fragment === null) {
        return { fragment: null, note: unit.failureReason ?? unit.suggestion, draft: unit.draft };
    }
    if (unit.lifecycle === 'unverified') {
        return { fragment: unit.fragment, unverified: true, note: unit.failureReason };
    }
    return { fragment: unit.fragment };
}

type Draft =
    | { kind: 'fragment'; text: string; source: UnitSource }
    | { kind: 'none'; reason: string };

export class IncrementalBuilder {
    private readonly units = new Map<string, BuildUnit>();
    private readonly diagnostics: Diagnostic[] = [];
    private degraded = false;

    constructor(
        private readonly ctx: StageContext,
        private readonly mapping: MappingModel,
        private readonly graph: DependencyGraph
    ) { }

    async buildAll(): Promise<BuildOutcome> {
        for (const id of this.graph.order) {
            const node = this.graph.nodes.get(id);
            if (!node) continue;
            this.units.set(id, await this.buildNode(node));
        }
        return { units: this.units, diagnostics: this.diagnostics, degraded: this.degraded };
    }

    private assertBuildable(node: GraphNode): void {
        for (const dep of node.dependsOn) {
            if (!isSettled(this.units.get(dep))) throw new BuildOrderError(node.id, dep);
        }
    }

    private async buildNode(node: GraphNode): Promise<BuildUnit> {
        const { ctx } = this;
        const log = ctx.log.withContext({ stage: 'incremental-build', node: node.id });
        let unit = newUnit(node);

        emit(ctx, node.id, 'start', `Building ${node.kind} ${node.id}`, { kind: node.kind, depends_on: [...node.dependsOn] });

        const blocked = node.dependsOn.find((d) => this.units.get(d)?.lifecycle === 'placeholder');
        if (blocked) {
            return this.settlePlaceholder(node, unit, 'STRUCTURAL_GAP', `depends on unresolved ${blocked}`);
        }

        let fallbackUsed = false;
        while (true) {
            this.assertBuildable(node);

            const draft = await this.draft(node, unit);
            if (draft.kind === 'none') {
                return this.settlePlaceholder(node, unit, 'BUDGET_EXHAUSTED', draft.reason);
            }
            if (draft.source !== 'provider') fallbackUsed = true;

            unit = withDraft(unit, draft.text, draft.source);
            const verdict: Verdict = draft.text
                ? await ctx.validator.validate(unit, {
                    requestId: ctx.requestId,
                    targetEnvironment: ctx.request.targetEnvironment,
                    node,
                    mapping: this.mapping,
                    probe: buildProbe(this.mapping, this.graph, this.closureLookup(node), node, draft.text),
                }, ctx.signal)
                : { outcome: 'failed', reason: 'provider returned an empty fragment', classification: 'recoverable' };

            const decision = decideRecovery(unit, verdict, ctx.strategy);
            switch (decision.action) {
                case 'accept':
                    unit = markPassed(unit, decision.rowEstimate);
                    log.debug('Unit passed', { attempts: unit.attempts, source: unit.source });
                    emit(ctx, node.id, 'complete', `${node.id} passed`, {
                        status: 'passed',
                        attempts: unit.attempts,
                        source: unit.source,
                        row_estimate: decision.rowEstimate,
                    });
                    return unit;

                case 'accept-unverified':
                    return this.settleUnverified(node, unit, decision.reason);

                case 'placeholder':
                    return this.settlePlaceholder(node, unit, decision.code, decision.reason);

                case 'retry':
                    if (fallbackUsed) {
                        // A fallback fragment failed; no provider call is available to fix it.
                        return this.settlePlaceholder(node, unit, 'BUDGET_EXHAUSTED', decision.reason);
                    }
                    unit = markFailed(unit, decision.reason);
                    log.info('Unit failed validation; retrying', { attempt: decision.attempt, reason: decision.reason });
                    emit(ctx, node.id, 'retry', `Retrying ${node.id} after attempt ${decision.attempt}`, {
                        attempt: decision.attempt,
                        reason: decision.reason,
                    });
                    break;
            }
        }
    }

    /**
     * Produces the next fragment: a provider completion, or on budget denial a
     * cached completion, then a template. Never called again once a fallback
     * fragment has been rejected.
     */
    private async draft(node: GraphNode, unit: BuildUnit): Promise<Draft> {
        const { ctx } = this;
        const prompt = getBuildUnitPrompt({
            node,
            mapping: this.mapping,
            dependencies: dependencyClosure(this.graph, node.id)
                .map((id) => ({ nodeId: id, fragment: this.units.get(id)?.fragment ?? null }))
                .filter((d): d is { nodeId: string; fragment: string } => d.fragment !== null),
            targetEnvironment: ctx.request.targetEnvironment,
            previousFragment: unit.draft,
            previousFailure: unit.failureReason,
        });

        const call = await this.gated(node, prompt, unit.attempts + 1);
        if (call.kind === 'completed') {
            return { kind: 'fragment', text: cleanFragment(node.kind, call.text), source: 'provider' };
        }

        const cached = ctx.gateway.cached(prompt);
        const template = cached ? null : templateFragment(node, this.mapping);
        const fallback = cached ? 'cached response' : template ? 'template fragment' : 'placeholder';
        this.degraded = true;
        this.diagnostics.push({
            severity: 'warning',
            code: 'BUDGET_EXHAUSTED',
            message: `Build of ${node.id} denied by budget: ${call.reason}`,
            suggestion: 'Raise the budget ceiling or lower the intelligence level',
            subject: node.id,
        });
        emit(ctx, node.id, 'degraded', `Budget denied ${node.id}; using ${fallback}`, {
            code: 'BUDGET_EXHAUSTED',
            reason: call.reason,
            fallback,
        });
        if (cached) return { kind: 'fragment', text: cleanFragment(node.kind, cached.text), source: 'cache' };
        if (template) return { kind: 'fragment', text: template, source: 'template' };
        return { kind: 'none', reason: `budget exhausted: ${call.reason}` };
    }

    private gated(node: GraphNode, prompt: string, attempt: number): Promise<GatedCompletion> {
        return gatedComplete(this.ctx, prompt, this.ctx.strategy.unitMaxTokens, {
            section: node.id,
            label: `build:${node.id}#${attempt}`,
            essential: attempt === 1,
        });
    }

    private closureLookup(node: GraphNode): FragmentLookup {
        const closure = new Set(dependencyClosure(this.graph, node.id));
        return (id) => (closure.has(id) ? unitView(this.units.get(id)) : undefined);
    }

    private settlePlaceholder(node: GraphNode, unit: BuildUnit, code: ErrorCode, reason: string): BuildUnit {
        const suggestion = suggestionFor(node, code);
        const placeholder = toPlaceholder(unit, reason, suggestion);
        this.degraded = true;
        this.diagnostics.push({ severity: 'warning', code, message: `${node.id}: ${reason}`, suggestion, subject: node.id });
        this.ctx.log.warn('Unit replaced by placeholder', { node: node.id, code, reason });
        emit(this.ctx, node.id, 'degraded', `${node.id} replaced by placeholder`, {
            code,
            reason,
            suggestion,
            attempts: placeholder.attempts,
        });
        emit(this.ctx, node.id, 'complete', `${node.id} unresolved`, { status: 'placeholder', attempts: placeholder.attempts });
        return placeholder;
    }

    private settleUnverified(node: GraphNode, unit: BuildUnit, reason: string): BuildUnit {
        const suggestion = `Verify ${node.id} against the target environment`;
        const kept = toUnverified(unit, reason, suggestion);
        this.degraded = true;
        this.diagnostics.push({ severity: 'warning', code: 'UNVERIFIED_FRAGMENT', message: `${node.id}: ${reason}`, suggestion, subject: node.id });
        emit(this.ctx, node.id, 'degraded', `${node.id} kept unverified`, { code: 'UNVERIFIED_FRAGMENT', reason, suggestion });
        emit(this.ctx, node.id, 'complete', `${node.id} unverified`, { status: 'unverified', attempts: kept.attempts });
        return kept;
    }
}
