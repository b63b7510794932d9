// Stage 2: dependency-resolution (required)

import { deriveNodes, resolveGraph } from '../dependency_resolver';
import type { DependencyGraph, Diagnostic, StageResult, UnresolvedItem } from '../types';
import { DiscoveryArtifact, emit, ResolutionArtifact, Stage, StageContext, StageOutput } from './context';

const SECTION = 'dependency-resolution';

/**
 * Discovery drops that left no graph node, then resolution warnings. A
 * discovery gap whose node exists is left to the builder.
 */
export function droppedItems(discovery: readonly Diagnostic[], resolution: readonly Diagnostic[], graph: DependencyGraph): UnresolvedItem[] {
    const items: UnresolvedItem[] = [];
    const seen = new Set<string>();
    const add = (d: Diagnostic, fallbackId: string): void => {
        const nodeId = d.subject ?? fallbackId;
        const key = `${nodeId}\n${d.message}`;
        if (seen.has(key)) return;
        seen.add(key);
        items.push({ nodeId, reason: d.message, suggestion: d.suggestion ?? 'Clarify this item in the mapping document' });
    };

    for (const d of discovery) {
        if (d.code !== 'DISCOVERY_PARTIAL' && d.code !== 'STRUCTURAL_GAP') continue;
        if (d.subject && graph.nodes.has(d.subject)) continue;
        add(d, 'discovery');
    }
    for (const d of resolution) {
        if (d.severity !== 'info') add(d, SECTION);
    }
    return items;
}

export const dependencyResolutionStage: Stage<StageResult<DiscoveryArtifact>, ResolutionArtifact> = {
    name: 'dependency-resolution',
    required: true,

    async run(prior: StageResult<DiscoveryArtifact>, ctx: StageContext): Promise<StageOutput<ResolutionArtifact>> {
        const { mapping } = prior.artifact;
        const derived = deriveNodes(mapping);
        // A cycle throws DEPENDENCY_CYCLE from here; nothing is built.
        const { graph, diagnostics } = resolveGraph(derived.nodes);
        const all = [...derived.diagnostics, ...diagnostics];

        emit(ctx, SECTION, 'progress', `Resolved ${graph.order.length} nodes`, {
            order: [...graph.order],
            edges: graph.edges.length,
        });

        const degraded = all.some((d) => d.severity !== 'info');
        if (degraded) {
            emit(ctx, SECTION, 'degraded', `${all.length} unresolvable reference(s) dropped`, {
                code: 'DISCOVERY_PARTIAL',
                items: all.map((d) => ({ subject: d.subject, message: d.message, suggestion: d.suggestion })),
            });
        }

        const dropped = droppedItems(prior.diagnostics, all, graph);
        return { artifact: { mapping, graph, dropped }, degraded, diagnostics: all };
    },
};
