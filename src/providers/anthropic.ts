// Anthropic messages API.

import { estimateModelCost } from '../config';
import { asRecord, clampInt, postJson } from './http';
import { GenerateResult, ProviderFailure, ReasoningProvider } from './provider';

const ANTHROPIC_VERSION = '2023-06-01';

export interface AnthropicConfig {
    name?: string;
    apiKey: string;
    model: string;
    baseUrl?: string;
}

export class AnthropicProvider implements ReasoningProvider {
    readonly name: string;
    readonly model: string;
    private readonly endpoint: string;
    private readonly apiKey: string;

    constructor(config: AnthropicConfig) {
        this.name = config.name || 'anthropic';
        this.model = config.model;
        this.apiKey = config.apiKey;
        this.endpoint = `${(config.baseUrl || 'https://api.anthropic.com/v1').replace(/\/+$/, '')}/messages`;
    }

    async generate(prompt: string, maxTokens: number, signal?: AbortSignal): Promise<GenerateResult> {
        const data = await postJson(
            this.endpoint,
            { 'x-api-key': this.apiKey, 'anthropic-version': ANTHROPIC_VERSION },
            {
                model: this.model,
                max_tokens: maxTokens,
                messages: [{ role: 'user', content: prompt }],
            },
            this.name,
            signal
        );

        const blocks = Array.isArray(data.content) ? data.content : [];
        const text = blocks
            .map((b) => asRecord(b))
            .filter((b) => b?.type === 'text' && typeof b.text === 'string')
            .map((b) => String(b?.text))
            .join('');
        if (!text) {
            throw new ProviderFailure('malformed', `${this.name} returned no text content`);
        }

        const usage = asRecord(data.usage) || {};
        const inputTokens = clampInt(usage.input_tokens);
        const outputTokens = clampInt(usage.output_tokens);

        return {
            text,
            tokensUsed: inputTokens + outputTokens,
            costEstimate: estimateModelCost(this.model, inputTokens, outputTokens),
        };
    }
}
