/**
 * Prompts for the generation stages
 *
 * One generator per provider call kind; each returns the full user prompt.
 */

export { getDiscoveryPrompt } from './discovery';
export { getBuildUnitPrompt } from './build_unit';
export type { BuildUnitPromptInput, BuiltDependency } from './build_unit';
export { getRepairPrompt } from './repair';
