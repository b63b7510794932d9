import type { ErrorCode } from './structured_error';
import type { StrategyOverrides } from './strategy';

/* -------------------------------------------------------------------------- */
/* Request                                                                    */
/* -------------------------------------------------------------------------- */

export type IntelligenceLevel = 'conservative' | 'balanced' | 'aggressive';

export interface BudgetCeiling {
    maxTokens?: number;
    maxCostUsd?: number;
}

export interface SheetExtract {
    name: string;
    text: string;
}

/** Output of the (external) ingestion step. */
export interface NormalizedSpecification {
    text: string;
    sheets?: SheetExtract[];
    /** Partial structure the ingestion step could already recognize. */
    hints?: Partial<MappingModel>;
}

export interface GenerationRequest {
    specification: NormalizedSpecification;
    targetEnvironment: string;
    intelligenceLevel: IntelligenceLevel;
    budget: BudgetCeiling;
    timeoutMs: number;
    strategyOverrides?: StrategyOverrides;
}

/* -------------------------------------------------------------------------- */
/* Mapping model (discovery artifact)                                         */
/* -------------------------------------------------------------------------- */

export type JoinType = 'INNER' | 'LEFT' | 'RIGHT' | 'FULL';
export type FilterClause = 'WHERE' | 'HAVING';

export interface TableSpec {
    name: string;
    schema?: string;
    alias?: string;
    columns: string[];
    description?: string;
}

export interface RelationshipSpec {
    left: string;
    right: string;
    joinType: JoinType;
    condition: string | null;
    description?: string;
    inferred?: boolean;
}

export interface OutputColumnSpec {
    table: string;
    column: string;
    alias?: string;
    aggregation?: string | null;
    transformation?: string | null;
    /** Aliases of other computed columns this one is derived from. */
    dependsOn?: string[];
}

export interface FilterSpec {
    table: string;
    column: string;
    operator: string;
    value: string;
    clause: FilterClause;
    description?: string;
}

export interface BusinessRule {
    rule: string;
    implementation?: string;
    appliesTo?: string;
}

export interface MappingMetadata {
    description?: string;
    complexity?: 'SIMPLE' | 'MEDIUM' | 'COMPLEX';
    businessDomain?: string;
}

export interface MappingModel {
    tables: TableSpec[];
    relationships: RelationshipSpec[];
    outputColumns: OutputColumnSpec[];
    filters: FilterSpec[];
    businessRules: BusinessRule[];
    metadata: MappingMetadata;
}

/* -------------------------------------------------------------------------- */
/* Dependency graph                                                           */
/* -------------------------------------------------------------------------- */

export type NodeKind = 'table' | 'join' | 'computed' | 'filter';

interface NodeBase {
    id: string;
    dependsOn: string[];
    declarationIndex: number;
    description: string;
}

export interface TableNode extends NodeBase {
    kind: 'table';
    table: TableSpec;
}

export interface JoinNode extends NodeBase {
    kind: 'join';
    relationship: RelationshipSpec;
}

export interface ComputedNode extends NodeBase {
    kind: 'computed';
    column: OutputColumnSpec;
    rules: BusinessRule[];
}

export interface FilterNode extends NodeBase {
    kind: 'filter';
    filter: FilterSpec;
}

export type GraphNode = TableNode | JoinNode | ComputedNode | FilterNode;

export interface DependencyGraph {
    nodes: ReadonlyMap<string, GraphNode>;
    edges: ReadonlyArray<{ from: string; to: string }>;
    /** Topological order, ties broken by declaration order. */
    order: readonly string[];
}

/* -------------------------------------------------------------------------- */
/* Build units                                                                */
/* -------------------------------------------------------------------------- */

export type UnitStatus = 'untested' | 'passed' | 'failed' | 'skipped-with-comment';
export type UnitSource = 'provider' | 'cache' | 'template' | 'placeholder';
export type UnitLifecycle = 'untested' | 'failed' | 'retrying' | 'passed' | 'placeholder' | 'unverified';

export interface UnitTransition {
    from: UnitLifecycle;
    to: UnitLifecycle;
    attempt: number;
    reason?: string;
}

export interface BuildUnit {
    nodeId: string;
    kind: NodeKind;
    /** Null for a pure placeholder. */
    fragment: string | null;
    status: UnitStatus;
    lifecycle: UnitLifecycle;
    attempts: number;
    source: UnitSource;
    comment?: string;
    failureReason?: string;
    suggestion?: string;
    /** Last rejected fragment, kept for the placeholder comment. */
    draft?: string;
    rowEstimate?: number;
    history: UnitTransition[];
}

/* -------------------------------------------------------------------------- */
/* Stages                                                                     */
/* -------------------------------------------------------------------------- */

export type StageName = 'discovery' | 'dependency-resolution' | 'incremental-build' | 'validation' | 'finalize';
export type StageStatus = 'success' | 'degraded' | 'failed';
export type StageState = 'pending' | 'running' | 'completed' | 'degraded' | 'failed';

export interface Diagnostic {
    severity: 'info' | 'warning' | 'error';
    message: string;
    code?: ErrorCode;
    suggestion?: string;
    subject?: string;
}

export interface ResourceUsage {
    tokens: number;
    costUsd: number;
    durationMs: number;
}

export interface StageResult<T> {
    stage: StageName;
    status: StageStatus;
    artifact: T;
    diagnostics: Diagnostic[];
    usage: ResourceUsage;
}

export interface UnresolvedItem {
    nodeId: string;
    reason: string;
    suggestion: string;
}

export interface FinalArtifact {
    query: string;
    status: 'complete' | 'degraded';
    verified: boolean;
    unresolved: UnresolvedItem[];
    units: Array<Pick<BuildUnit, 'nodeId' | 'status' | 'attempts' | 'source'>>;
}

/* -------------------------------------------------------------------------- */
/* Events                                                                     */
/* -------------------------------------------------------------------------- */

export type EventPhase = 'start' | 'progress' | 'retry' | 'degraded' | 'complete' | 'error';

export interface ProgressEvent {
    section: string;
    phase: EventPhase;
    message: string;
    details: Record<string, unknown>;
    sequence: number;
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Validation capability                                                      */
/* -------------------------------------------------------------------------- */

export interface CheckContext {
    requestId: string;
    targetEnvironment: string;
    /** Null when the whole assembled query is checked. */
    node: GraphNode | null;
    mapping: MappingModel;
    /** Partial query embedding the candidate fragment with its built dependencies. */
    probe: string;
}

export interface CheckResult {
    passed: boolean;
    rowEstimate?: number;
    failureReason?: string;
}

export interface QueryChecker {
    check(candidateFragment: string, context: CheckContext, signal?: AbortSignal): Promise<CheckResult>;
}
