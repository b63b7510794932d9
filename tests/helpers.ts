// Shared fixtures and in-process fakes for the test suite.

import { BudgetController } from '../src/budget_controller';
import { ProgressEventLog } from '../src/event_log';
import { createLogger } from '../src/logger';
import { ProviderGateway } from '../src/provider_gateway';
import { GenerateResult, ProviderFailure, ReasoningProvider } from '../src/providers/provider';
import type { StageContext } from '../src/stages/context';
import { buildStrategy, StrategyOverrides } from '../src/strategy';
import type { CheckContext, CheckResult, GenerationRequest, MappingModel, QueryChecker } from '../src/types';
import { Validator } from '../src/validator';

export function sampleModel(): MappingModel {
    return {
        tables: [
            { name: 'orders', alias: 'o', columns: ['id', 'customer_id', 'amount', 'status'] },
            { name: 'customers', alias: 'c', columns: ['id', 'name'] },
        ],
        relationships: [{ left: 'orders', right: 'customers', joinType: 'INNER', condition: 'o.customer_id = c.id' }],
        outputColumns: [
            { table: 'customers', column: 'name', alias: 'customer_name' },
            { table: 'orders', column: 'amount', alias: 'total_amount', aggregation: 'SUM' },
        ],
        filters: [{ table: 'orders', column: 'status', operator: '=', value: 'shipped', clause: 'WHERE' }],
        businessRules: [],
        metadata: {},
    };
}

/** Discovery response in the wire shape for sampleModel(). */
export function sampleDiscoveryJson(): string {
    return JSON.stringify({
        tables: [
            { name: 'orders', alias: 'o', columns: ['id', 'customer_id', 'amount', 'status'] },
            { name: 'customers', alias: 'c', columns: ['id', 'name'] },
        ],
        relationships: [{ left_table: 'orders', right_table: 'customers', join_type: 'INNER', join_condition: 'o.customer_id = c.id' }],
        output_columns: [
            { table: 'customers', column: 'name', alias: 'customer_name' },
            { table: 'orders', column: 'amount', alias: 'total_amount', aggregation: 'SUM' },
        ],
        filters: [{ table: 'orders', column: 'status', operator: '=', value: 'shipped' }],
    });
}

export function sampleRequest(overrides: Partial<GenerationRequest> = {}): GenerationRequest {
    return {
        specification: { text: 'Total shipped order amount per customer name.' },
        targetEnvironment: 'sqlite',
        intelligenceLevel: 'balanced',
        budget: { maxTokens: 1_000_000 },
        timeoutMs: 60_000,
        ...overrides,
    };
}

/* -------------------------------------------------------------------------- */
/* Fake provider                                                              */
/* -------------------------------------------------------------------------- */

export type ScriptedReply = string | ProviderFailure | ((prompt: string) => string | ProviderFailure);

/**
 * Replies in order from `script`; once the script is exhausted, `fallback`
 * answers every prompt.
 */
export class FakeProvider implements ReasoningProvider {
    readonly model = 'fake-model';
    readonly prompts: string[] = [];
    private readonly script: ScriptedReply[];

    constructor(
        readonly name: string,
        script: ScriptedReply[] = [],
        private readonly fallback?: (prompt: string) => string | ProviderFailure,
        private readonly tokensPerCall = 100
    ) {
        this.script = [...script];
    }

    get calls(): number {
        return this.prompts.length;
    }

    async generate(prompt: string, _maxTokens: number, signal?: AbortSignal): Promise<GenerateResult> {
        this.prompts.push(prompt);
        if (signal?.aborted) throw new Error('aborted');
        const next = this.script.shift() ?? this.fallback;
        if (next === undefined) throw new ProviderFailure('server', `${this.name}: no scripted reply`);
        const reply = typeof next === 'function' ? next(prompt) : next;
        if (reply instanceof ProviderFailure) throw reply;
        return { text: reply, tokensUsed: this.tokensPerCall, costEstimate: 0 };
    }
}

/** Answers discovery with `discovery` and every build prompt with a template per node kind. */
export function sqlResponder(discovery: string): (prompt: string) => string {
    return (prompt) => {
        if (prompt.includes('\nNODE: ')) return fragmentFor(prompt);
        return discovery;
    };
}

/** Minimal fragment answers keyed on the node id in a build prompt. */
export function fragmentFor(prompt: string): string {
    const node = /NODE: (\S+)/.exec(prompt)?.[1] ?? '';
    switch (node) {
        case 'table:orders': return 'SELECT id, customer_id, amount, status FROM orders';
        case 'table:customers': return 'SELECT id, name FROM customers';
        case 'join:orders-customers': return 'o.customer_id = c.id';
        case 'computed:total_amount': return 'SUM(o.amount)';
        case 'filter:1': return "o.status = 'shipped'";
        default: return 'SELECT 1';
    }
}

/* -------------------------------------------------------------------------- */
/* Fake checker                                                               */
/* -------------------------------------------------------------------------- */

export class ScriptedChecker implements QueryChecker {
    readonly checked: Array<{ node: string; fragment: string }> = [];

    constructor(private readonly decide: (fragment: string, context: CheckContext, call: number) => CheckResult | Promise<CheckResult>) { }

    async check(candidateFragment: string, context: CheckContext): Promise<CheckResult> {
        const node = context.node?.id ?? 'query';
        this.checked.push({ node, fragment: candidateFragment });
        const call = this.checked.filter((c) => c.node === node).length;
        return this.decide(candidateFragment, context, call);
    }
}

export const passAll = new ScriptedChecker(() => ({ passed: true, rowEstimate: 1 }));

/* -------------------------------------------------------------------------- */
/* Stage context                                                              */
/* -------------------------------------------------------------------------- */

export function instantGateway(providers: ReasoningProvider[]): ProviderGateway {
    return new ProviderGateway(
        providers.map((provider) => ({ provider })),
        { clock: { sleep: async () => undefined, random: () => 0.5 }, failureThreshold: 3, cooldownMs: 60_000 }
    );
}

export function stageContext(options: {
    gateway: ProviderGateway;
    checker: QueryChecker;
    request?: GenerationRequest;
    strategy?: StrategyOverrides;
    signal?: AbortSignal;
}): StageContext {
    const request = options.request ?? sampleRequest();
    const strategy = buildStrategy(request.intelligenceLevel, { ...request.strategyOverrides, ...options.strategy });
    return {
        requestId: 'test-request',
        request,
        strategy,
        gateway: options.gateway,
        budget: new BudgetController(request.budget, strategy.reserveFraction),
        validator: new Validator(options.checker, strategy, 1_000),
        events: new ProgressEventLog(),
        signal: options.signal ?? new AbortController().signal,
        log: createLogger('test'),
    };
}
