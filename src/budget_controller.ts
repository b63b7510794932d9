/**
 * BudgetController: per-request spend control for provider calls.
 *
 * INVARIANT: every provider call a stage makes is authorized here first, and its
 * actual usage recorded afterwards. One controller per request; nothing is shared.
 *
 * - Hard ceiling on tokens and/or USD (fail-closed)
 * - Reserve margin that non-essential calls (retries, repairs) may not touch
 * - Spend ledger with estimated vs actual reconciliation
 */

import { BUDGET } from './config';
import { createLogger, Logger } from './logger';
import type { BudgetCeiling } from './types';

export interface SpendRecord {
    label: string;
    tokens: number;
    costUsd: number;
    estimatedTokens?: number;
    /** Provider calls behind this spend, retries and failovers included. */
    providerCalls: number;
    timestamp: string;
}

export interface AuthorizeOptions {
    estimatedCostUsd?: number;
    /** Essential calls may use the reserve; retries and repairs may not. */
    essential: boolean;
}

export type Authorization =
    | { allowed: true }
    | { allowed: false; reason: string };

export interface BudgetSnapshot {
    tokensUsed: number;
    costUsd: number;
    maxTokens: number | null;
    maxCostUsd: number | null;
    reserveFraction: number;
    calls: number;
    denials: number;
}

export class BudgetController {
    private tokensUsed = 0;
    private costUsd = 0;
    private denials = 0;
    private readonly ledger: SpendRecord[] = [];
    private readonly maxTokens: number | null;
    private readonly maxCostUsd: number | null;
    private readonly reserveFraction: number;
    private readonly log: Logger;

    constructor(ceiling: BudgetCeiling, reserveFraction: number = BUDGET.RESERVE_FRACTION, logger?: Logger) {
        this.maxTokens = ceiling.maxTokens ?? null;
        this.maxCostUsd = ceiling.maxCostUsd ?? null;
        this.reserveFraction = Math.min(Math.max(reserveFraction, 0), 0.99);
        this.log = logger ?? createLogger('budget');
    }

    /**
     * Pre-flight check. Never throws; a denial is for the caller to degrade around.
     */
    authorize(estimatedTokens: number, options: AuthorizeOptions): Authorization {
        const usable = options.essential ? 1 : 1 - this.reserveFraction;
        const estCost = options.estimatedCostUsd ?? 0;

        if (this.maxTokens !== null) {
            const limit = this.maxTokens * usable;
            if (this.tokensUsed + estimatedTokens > limit) {
                return this.deny(
                    options.essential
                        ? `token ceiling: ${this.tokensUsed} used + ${estimatedTokens} estimated > ${this.maxTokens}`
                        : `token reserve: ${this.tokensUsed} used + ${estimatedTokens} estimated would leave less than ${Math.round(this.reserveFraction * 100)}% of ${this.maxTokens}`
                );
            }
        }

        if (this.maxCostUsd !== null) {
            const limit = this.maxCostUsd * usable;
            if (this.costUsd + estCost > limit) {
                return this.deny(
                    options.essential
                        ? `cost ceiling: $${this.costUsd.toFixed(4)} spent + $${estCost.toFixed(4)} estimated > $${this.maxCostUsd.toFixed(4)}`
                        : `cost reserve: $${this.costUsd.toFixed(4)} spent + $${estCost.toFixed(4)} estimated would leave less than ${Math.round(this.reserveFraction * 100)}% of $${this.maxCostUsd.toFixed(4)}`
                );
            }
        }

        return { allowed: true };
    }

    /** Record actual usage after a completed call. */
    record(tokens: number, costUsd: number, label: string, estimatedTokens?: number, providerCalls = 1): void {
        this.tokensUsed += tokens;
        this.costUsd += costUsd;
        this.ledger.push({ label, tokens, costUsd, estimatedTokens, providerCalls, timestamp: new Date().toISOString() });

        if (estimatedTokens !== undefined && tokens > estimatedTokens) {
            this.log.debug('Usage above estimate', { label, estimated: estimatedTokens, actual: tokens });
        }
        this.log.debug('Spend recorded', { label, tokens, cost_usd: costUsd, provider_calls: providerCalls, cumulative_tokens: this.tokensUsed, cumulative_usd: this.costUsd });
    }

    /** Remaining fraction of the tightest ceiling, 1 when unbounded. */
    remainingFraction(): number {
        let frac = 1;
        if (this.maxTokens !== null) frac = Math.min(frac, this.maxTokens > 0 ? 1 - this.tokensUsed / this.maxTokens : 0);
        if (this.maxCostUsd !== null) frac = Math.min(frac, this.maxCostUsd > 0 ? 1 - this.costUsd / this.maxCostUsd : 0);
        return Math.max(0, frac);
    }

    getLedger(): SpendRecord[] {
        return this.ledger.map((r) => ({ ...r }));
    }

    snapshot(): BudgetSnapshot {
        return {
            tokensUsed: this.tokensUsed,
            costUsd: this.costUsd,
            maxTokens: this.maxTokens,
            maxCostUsd: this.maxCostUsd,
            reserveFraction: this.reserveFraction,
            calls: this.ledger.reduce((n, r) => n + r.providerCalls, 0),
            denials: this.denials,
        };
    }

    private deny(reason: string): Authorization {
        this.denials++;
        this.log.warn('Budget denied call', { reason });
        return { allowed: false, reason };
    }
}
