/**
 * Main entry point - exports all public APIs
 */

export { Orchestrator } from './orchestrator';
export type { OrchestratorOptions, RequestHandle, SubmitOptions } from './orchestrator';
export { StagePipeline, STAGE_ORDER } from './pipeline';
export type { PipelineOutcome, StageRecord } from './pipeline';
export { ProviderGateway, backoffDelay } from './provider_gateway';
export type {
    ProviderEntry,
    ProviderLimits,
    ProviderPricing,
    GatewayOptions,
    GatewayClock,
    CallOutcome,
    Completion,
} from './provider_gateway';
export { ProviderFailure } from './providers/provider';
export type { ReasoningProvider, GenerateResult, ProviderFailureKind } from './providers/provider';
export { OpenAICompatibleProvider } from './providers/openai_compatible';
export type { OpenAICompatibleConfig } from './providers/openai_compatible';
export { AnthropicProvider } from './providers/anthropic';
export type { AnthropicConfig } from './providers/anthropic';
export { providersFromEnv } from './providers/from_env';
export { BudgetController } from './budget_controller';
export type { Authorization, BudgetSnapshot } from './budget_controller';
export { buildStrategy, parseStrategyOverrides } from './strategy';
export type { StrategyProfile, StrategyOverrides } from './strategy';
export { deriveNodes, resolveGraph, findCycle, dependencyClosure } from './dependency_resolver';
export { IncrementalBuilder, BuildOrderError } from './incremental_builder';
export { Validator, classifyFailure } from './validator';
export type { Verdict } from './validator';
export { decideRecovery } from './build_unit';
export type { RecoveryDecision } from './build_unit';
export { assembleQuery } from './sql_assembler';
export type { AssembledQuery } from './sql_assembler';
export { SqliteSandboxChecker } from './sqlite_checker';
export type { SeedData } from './sqlite_checker';
export { ProgressEventLog, toServerSentEvent, parseLastEventId, PIPELINE_SECTION } from './event_log';
export { parseGenerationRequest, validateRequest } from './request';
export { parseMappingResponse, mergeHints, fillGaps } from './mapping_model';
export { SchemaValidator } from './schema_validator';
export type { ValidationResult, JsonSchema } from './schema_validator';
export { ErrorFactory, PipelineError, isPipelineError } from './structured_error';
export type { ErrorCode, Severity, StructuredError } from './structured_error';
export { createLogger } from './logger';
export type { Logger } from './logger';
export type * from './types';
