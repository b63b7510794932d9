/**
 * Orchestrator
 *
 * Accepts generation requests and runs one independent pipeline per request.
 * Requests share only the provider gateway (accounts and response cache); each
 * gets its own budget, strategy, event log and abort controller.
 *
 * Cancellation (caller signal or handle.cancel()) and the wall-clock timeout
 * abort the request's signal with the matching PipelineError, which every
 * suspension point rethrows; the pipeline then ends with a single `error` event.
 */

import { LRUCache } from 'lru-cache';
import { v4 as uuidv4 } from 'uuid';
import { BudgetController } from './budget_controller';
import { RETENTION, TIMEOUTS } from './config';
import { PIPELINE_SECTION, ProgressEventLog } from './event_log';
import { createLogger, Logger } from './logger';
import { PipelineOutcome, StagePipeline, StageRecord, STAGE_ORDER } from './pipeline';
import { ProviderGateway } from './provider_gateway';
import { validateRequest } from './request';
import type { StageContext } from './stages/context';
import { buildStrategy } from './strategy';
import { ErrorFactory, PipelineError } from './structured_error';
import type { GenerationRequest, QueryChecker } from './types';
import { Validator } from './validator';

export interface OrchestratorOptions {
    gateway: ProviderGateway;
    checker: QueryChecker;
    logger?: Logger;
    checkTimeoutMs?: number;
    retention?: { max?: number; ttlMs?: number };
    /** Event timestamps. */
    now?: () => Date;
}

export interface SubmitOptions {
    signal?: AbortSignal;
    requestId?: string;
}

export interface RequestHandle {
    readonly requestId: string;
    readonly events: ProgressEventLog;
    /** Never rejects; failures resolve to `{ ok: false }`. */
    readonly result: Promise<PipelineOutcome>;
    cancel(reason?: string): void;
    stages(): StageRecord[];
}

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const v of Object.values(value)) deepFreeze(v);
    }
    return value;
}

export class Orchestrator {
    private readonly active = new Map<string, RequestHandle>();
    private readonly finished: LRUCache<string, RequestHandle>;
    private readonly log: Logger;

    constructor(private readonly options: OrchestratorOptions) {
        this.log = options.logger ?? createLogger('orchestrator');
        this.finished = new LRUCache<string, RequestHandle>({
            max: Math.max(1, options.retention?.max ?? RETENTION.MAX_FINISHED_REQUESTS),
            ttl: Math.max(1, options.retention?.ttlMs ?? RETENTION.FINISHED_TTL_MS),
        });
    }

    get activeCount(): number {
        return this.active.size;
    }

    /** Handle of a running or recently finished request. */
    getHandle(requestId: string): RequestHandle | undefined {
        return this.active.get(requestId) ?? this.finished.get(requestId);
    }

    submit(request: GenerationRequest, options: SubmitOptions = {}): RequestHandle {
        const requestId = options.requestId ?? uuidv4();
        const events = new ProgressEventLog(this.options.now);
        const log = this.log.withContext({ requestId });

        const problems = validateRequest(request);
        if (problems.length > 0) {
            return this.rejected(requestId, events, ErrorFactory.invalidRequest(problems), log);
        }

        const frozen = deepFreeze(structuredClone(request));
        const strategy = buildStrategy(frozen.intelligenceLevel, frozen.strategyOverrides);
        const controller = new AbortController();
        const abort = (error: PipelineError): void => {
            if (!controller.signal.aborted) controller.abort(error);
        };

        const timeoutMs = frozen.timeoutMs > 0 ? frozen.timeoutMs : TIMEOUTS.REQUEST_MS;
        const timer = setTimeout(() => abort(ErrorFactory.timeout(timeoutMs)), timeoutMs);
        const onCallerAbort = (): void => abort(ErrorFactory.cancelled('cancelled by caller'));
        if (options.signal?.aborted) onCallerAbort();
        options.signal?.addEventListener('abort', onCallerAbort, { once: true });

        const ctx: StageContext = {
            requestId,
            request: frozen,
            strategy,
            gateway: this.options.gateway,
            budget: new BudgetController(frozen.budget, strategy.reserveFraction, log.child('budget')),
            validator: new Validator(this.options.checker, strategy, this.options.checkTimeoutMs ?? TIMEOUTS.VALIDATION_CHECK_MS),
            events,
            signal: controller.signal,
            log,
        };
        const pipeline = new StagePipeline(ctx);

        log.info('Request accepted', { level: strategy.level, target: frozen.targetEnvironment, timeout_ms: timeoutMs });

        const result = pipeline.run().finally(() => {
            clearTimeout(timer);
            options.signal?.removeEventListener('abort', onCallerAbort);
            this.retire(requestId);
        });

        const handle: RequestHandle = {
            requestId,
            events,
            result,
            cancel: (reason?: string) => abort(ErrorFactory.cancelled(reason ?? 'cancelled by caller')),
            stages: () => pipeline.stages(),
        };
        this.active.set(requestId, handle);
        return handle;
    }

    private retire(requestId: string): void {
        const handle = this.active.get(requestId);
        if (!handle) return;
        this.active.delete(requestId);
        this.finished.set(requestId, handle);
    }

    private rejected(requestId: string, events: ProgressEventLog, error: PipelineError, log: Logger): RequestHandle {
        const structured = error.structured;
        log.warn('Request rejected', { problems: structured.context.problems });
        events.append(PIPELINE_SECTION, 'error', structured.message, {
            kind: structured.code,
            message: structured.message,
            suggestion: structured.suggestion,
            stage: null,
            reason: structured.code.toLowerCase(),
            context: structured.context,
        });
        const stages: StageRecord[] = STAGE_ORDER.map((name) => ({ name, state: 'pending' }));
        const handle: RequestHandle = {
            requestId,
            events,
            result: Promise.resolve({ ok: false, error: structured, stages }),
            cancel: () => undefined,
            stages: () => stages.map((s) => ({ ...s })),
        };
        this.finished.set(requestId, handle);
        return handle;
    }
}
