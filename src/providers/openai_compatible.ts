// OpenAI-compatible chat completions (OpenAI, OpenRouter, local gateways).

import { estimateModelCost } from '../config';
import { asRecord, clampInt, postJson } from './http';
import { GenerateResult, ProviderFailure, ReasoningProvider } from './provider';

export interface OpenAICompatibleConfig {
    name: string;
    apiKey: string;
    model: string;
    baseUrl?: string;
    temperature?: number;
    extraHeaders?: Record<string, string>;
}

export class OpenAICompatibleProvider implements ReasoningProvider {
    readonly name: string;
    readonly model: string;
    private readonly endpoint: string;
    private readonly apiKey: string;
    private readonly temperature: number;
    private readonly extraHeaders: Record<string, string>;

    constructor(config: OpenAICompatibleConfig) {
        this.name = config.name;
        this.model = config.model;
        this.apiKey = config.apiKey;
        this.endpoint = `${(config.baseUrl || 'https://api.openai.com/v1').replace(/\/+$/, '')}/chat/completions`;
        this.temperature = config.temperature ?? 0.1;
        this.extraHeaders = config.extraHeaders || {};
    }

    async generate(prompt: string, maxTokens: number, signal?: AbortSignal): Promise<GenerateResult> {
        const data = await postJson(
            this.endpoint,
            { Authorization: `Bearer ${this.apiKey}`, ...this.extraHeaders },
            {
                model: this.model,
                messages: [{ role: 'user', content: prompt }],
                temperature: this.temperature,
                max_tokens: maxTokens,
                stream: false,
            },
            this.name,
            signal
        );

        const choices = Array.isArray(data.choices) ? data.choices : [];
        const message = asRecord(asRecord(choices[0])?.message);
        const text = typeof message?.content === 'string' ? message.content : '';
        if (!text) {
            throw new ProviderFailure('malformed', `${this.name} returned an empty completion`);
        }

        const usage = asRecord(data.usage) || {};
        const promptTokens = clampInt(usage.prompt_tokens);
        const completionTokens = clampInt(usage.completion_tokens);
        const tokensUsed = clampInt(usage.total_tokens) || promptTokens + completionTokens;

        return {
            text,
            tokensUsed,
            costEstimate: estimateModelCost(this.model, promptTokens, completionTokens),
        };
    }
}
