/**
 * Stage 5: finalize (required)
 *
 * Renders the final artifact: header comment, the query with its inline
 * placeholder comments, and the list of unresolved items.
 */

import { tableNodeId } from '../dependency_resolver';
import type { CommentDensity } from '../strategy';
import type { Diagnostic, FinalArtifact, UnresolvedItem } from '../types';
import { emit, PriorResults, Stage, StageContext, StageOutput } from './context';

function collectUnresolved(prior: PriorResults): UnresolvedItem[] {
    const { graph, dropped } = prior.resolution.artifact;
    const { units } = prior.build.artifact;
    const validation = prior.validation.artifact;
    const items: UnresolvedItem[] = [...dropped];

    for (const id of graph.order) {
        const unit = units.get(id);
        if (!unit || (unit.lifecycle !== 'placeholder' && unit.lifecycle !== 'unverified')) continue;
        items.push({
            nodeId: id,
            reason: unit.comment ?? unit.failureReason ?? 'unresolved',
            suggestion: unit.suggestion ?? 'Clarify this item in the mapping document',
        });
    }

    for (const table of validation.notJoined) {
        items.push({
            nodeId: tableNodeId(table),
            reason: `table ${table} is not joined to the rest of the query`,
            suggestion: `Specify how ${table} relates to the other tables`,
        });
    }

    if (!validation.verified) {
        items.push({
            nodeId: 'query',
            reason: `unverified: ${validation.note ?? 'assembled query was not checked'}`,
            suggestion: 'Run the query against a test copy of the target environment before use',
        });
    }
    return items;
}

export function renderHeader(
    density: CommentDensity,
    info: { targetEnvironment: string; status: FinalArtifact['status']; verified: boolean; description?: string; unresolved: UnresolvedItem[] }
): string[] {
    const lines = [`-- Generated for ${info.targetEnvironment}`];
    if (density === 'minimal') return lines;

    if (info.description) lines.push(`-- ${info.description.replace(/\s*\n\s*/g, ' ')}`);
    lines.push(`-- Status: ${info.status}${info.verified ? '' : ' (unverified)'}`);
    if (info.unresolved.length > 0) lines.push(`-- Unresolved items: ${info.unresolved.length}`);
    if (density === 'verbose') {
        for (const item of info.unresolved) {
            lines.push(`--   ${item.nodeId}: ${item.reason}`);
            lines.push(`--     suggestion: ${item.suggestion}`);
        }
    }
    return lines;
}

export const finalizeStage: Stage<PriorResults, FinalArtifact> = {
    name: 'finalize',
    required: true,

    async run(prior: PriorResults, ctx: StageContext): Promise<StageOutput<FinalArtifact>> {
        const validation = prior.validation.artifact;
        const unresolved = collectUnresolved(prior);
        const stageDegraded = [prior.discovery, prior.resolution, prior.build, prior.validation].some((r) => r.status === 'degraded');
        const status: FinalArtifact['status'] = !stageDegraded && validation.verified && unresolved.length === 0 ? 'complete' : 'degraded';

        const header = renderHeader(ctx.strategy.commentDensity, {
            targetEnvironment: ctx.request.targetEnvironment,
            status,
            verified: validation.verified,
            description: validation.mapping.metadata.description,
            unresolved,
        });

        const units: FinalArtifact['units'] = [];
        for (const id of validation.graph.order) {
            const unit = validation.units.get(id);
            if (unit) units.push({ nodeId: unit.nodeId, status: unit.status, attempts: unit.attempts, source: unit.source });
        }

        const artifact: FinalArtifact = {
            query: [...header, validation.query].join('\n'),
            status,
            verified: validation.verified,
            unresolved,
            units,
        };

        emit(ctx, 'finalize', 'progress', `Final artifact ${status}`, { unresolved: unresolved.length, verified: validation.verified });
        return {
            artifact,
            degraded: status === 'degraded',
            diagnostics: unresolved.map((u): Diagnostic => ({ severity: 'warning', message: `${u.nodeId}: ${u.reason}`, suggestion: u.suggestion, subject: u.nodeId })),
        };
    },
};
