// Stage 3: incremental-build (required)

import { IncrementalBuilder } from '../incremental_builder';
import type { StageResult } from '../types';
import { BuildArtifact, emit, ResolutionArtifact, Stage, StageContext, StageOutput } from './context';

export const incrementalBuildStage: Stage<StageResult<ResolutionArtifact>, BuildArtifact> = {
    name: 'incremental-build',
    required: true,

    async run(prior: StageResult<ResolutionArtifact>, ctx: StageContext): Promise<StageOutput<BuildArtifact>> {
        const { mapping, graph, dropped } = prior.artifact;
        const builder = new IncrementalBuilder(ctx, mapping, graph);
        const outcome = await builder.buildAll();

        let passed = 0;
        for (const unit of outcome.units.values()) {
            if (unit.status === 'passed') passed++;
        }
        emit(ctx, 'incremental-build', 'progress', `Built ${passed}/${outcome.units.size} nodes`, {
            passed,
            unresolved: outcome.units.size - passed,
        });

        return {
            artifact: { mapping, graph, dropped, units: outcome.units },
            degraded: outcome.degraded,
            diagnostics: outcome.diagnostics,
        };
    },
};
