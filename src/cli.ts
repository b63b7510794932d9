/**
 * CLI Entry Point for querysmith
 */

import * as fs from 'fs';
import { BUDGET } from './config';
import { toServerSentEvent } from './event_log';
import { Orchestrator } from './orchestrator';
import { ProviderGateway } from './provider_gateway';
import { providersFromEnv } from './providers/from_env';
import { parseGenerationRequest } from './request';
import { SeedData, SqliteSandboxChecker } from './sqlite_checker';
import { parseIntelligenceLevel, parseStrategyOverrides } from './strategy';
import type { GenerationRequest, ProgressEvent } from './types';

type OutputMode = 'text' | 'json' | 'sse';

function readJson(file: string): unknown {
    return JSON.parse(fs.readFileSync(file, 'utf-8'));
}

function isRecord(v: unknown): v is Record<string, unknown> {
    return v !== null && typeof v === 'object' && !Array.isArray(v);
}

function optionValue(args: string[], flag: string): string | undefined | null {
    const i = args.indexOf(flag);
    if (i === -1) return undefined;
    const v = args[i + 1];
    return v && !v.startsWith('--') ? v : null;
}

export function formatEvent(event: ProgressEvent): string {
    const seq = String(event.sequence).padStart(4, ' ');
    const tag = `${event.section}:${event.phase}`;
    return `${seq} ${tag.padEnd(32)} ${event.message}`;
}

class QuerysmithCLI {
    async run(args: string[]): Promise<void> {
        const command = args[2] || 'help';

        switch (command) {
            case 'generate':
                await this.runGenerate(args.slice(3));
                break;
            case 'providers':
                this.runProviders();
                break;
            default:
                this.showHelp();
        }
    }

    private fail(message: string, ...details: string[]): void {
        console.error(`Error: ${message}`);
        for (const d of details) console.error(`   ${d}`);
        process.exitCode = 1;
    }

    private runProviders(): void {
        const entries = providersFromEnv();
        if (entries.length === 0) {
            console.log('No providers configured. Set QUERYSMITH_OPENAI_API_KEY, QUERYSMITH_ANTHROPIC_API_KEY or QUERYSMITH_OPENROUTER_API_KEY.');
            return;
        }
        entries.forEach((e, i) => console.log(`${i + 1}. ${e.provider.name} (${e.provider.model})`));
    }

    private async runGenerate(args: string[]): Promise<void> {
        const specPath = args[0];
        if (!specPath || specPath.startsWith('--')) {
            this.fail('specification file required', 'Usage: querysmith generate <spec.json> [--level <level>] [--budget <usd>] [--max-tokens <n>] [--timeout <ms>] [--seed <seed.json>] [--strategy <strategy.json>] [--out <file.sql>] [--json | --sse]');
            return;
        }
        if (!fs.existsSync(specPath)) {
            this.fail(`File not found: ${specPath}`);
            return;
        }

        const flags = ['--level', '--budget', '--max-tokens', '--timeout', '--seed', '--strategy', '--out'];
        const values = new Map<string, string>();
        for (const flag of flags) {
            const v = optionValue(args, flag);
            if (v === null) {
                this.fail(`${flag} requires a value`);
                return;
            }
            if (v !== undefined) values.set(flag, v);
        }
        const mode: OutputMode = args.includes('--json') ? 'json' : args.includes('--sse') ? 'sse' : 'text';

        let raw: unknown;
        try {
            raw = readJson(specPath);
        } catch (e) {
            this.fail(`Cannot read ${specPath}: ${e instanceof Error ? e.message : String(e)}`);
            return;
        }
        if (!isRecord(raw)) {
            this.fail('Invalid specification (expected JSON object)');
            return;
        }

        const overrides: Record<string, unknown> = { ...raw };
        const level = values.get('--level');
        if (level !== undefined) {
            if (!parseIntelligenceLevel(level)) {
                this.fail(`Invalid level: ${level}`, 'Valid levels: conservative, balanced, aggressive');
                return;
            }
            overrides.intelligenceLevel = level;
        }
        const budgetUsd = values.get('--budget');
        const maxTokens = values.get('--max-tokens');
        if (budgetUsd !== undefined || maxTokens !== undefined) {
            overrides.budget = {
                maxCostUsd: budgetUsd !== undefined ? parseFloat(budgetUsd) : undefined,
                maxTokens: maxTokens !== undefined ? parseInt(maxTokens, 10) : undefined,
            };
        }
        const timeout = values.get('--timeout');
        if (timeout !== undefined) overrides.timeoutMs = parseInt(timeout, 10);
        const strategyPath = values.get('--strategy');
        if (strategyPath !== undefined) {
            const parsed = parseStrategyOverrides(readJson(strategyPath));
            if (parsed.problems.length > 0) {
                this.fail(`Invalid strategy file ${strategyPath}`, ...parsed.problems);
                return;
            }
            overrides.strategyOverrides = parsed.overrides;
        }

        const parsed = parseGenerationRequest(overrides, { maxCostUsd: BUDGET.DEFAULT_MAX_COST_USD });
        if (!parsed.ok) {
            this.fail('Invalid generation request', ...parsed.problems);
            return;
        }
        for (const w of parsed.warnings) console.error(`Warning: ${w}`);

        const seed = this.loadSeed(values.get('--seed'));
        if (seed === null) return;

        const entries = providersFromEnv();
        if (entries.length === 0) {
            this.fail('No providers configured', 'Set QUERYSMITH_OPENAI_API_KEY, QUERYSMITH_ANTHROPIC_API_KEY or QUERYSMITH_OPENROUTER_API_KEY');
            return;
        }

        await this.generate(parsed.request, new ProviderGateway(entries), seed, mode, values.get('--out'));
    }

    private loadSeed(seedPath: string | undefined): SeedData | null {
        if (seedPath === undefined) return {};
        const raw = readJson(seedPath);
        if (!isRecord(raw)) {
            this.fail(`Invalid seed file ${seedPath} (expected an object of table name to rows)`);
            return null;
        }
        const seed: SeedData = {};
        for (const [table, rows] of Object.entries(raw)) {
            if (Array.isArray(rows)) seed[table] = rows.filter(isRecord);
        }
        return seed;
    }

    private async generate(
        request: GenerationRequest,
        gateway: ProviderGateway,
        seed: SeedData,
        mode: OutputMode,
        outPath: string | undefined
    ): Promise<void> {
        const orchestrator = new Orchestrator({ gateway, checker: new SqliteSandboxChecker(seed) });
        const controller = new AbortController();
        const onSigint = (): void => controller.abort();
        process.once('SIGINT', onSigint);

        const handle = orchestrator.submit(request, { signal: controller.signal });
        for await (const event of handle.events.stream()) {
            if (mode === 'json') process.stdout.write(JSON.stringify(event) + '\n');
            else if (mode === 'sse') process.stdout.write(toServerSentEvent(event));
            else console.error(formatEvent(event));
        }
        process.removeListener('SIGINT', onSigint);

        const outcome = await handle.result;
        if (!outcome.ok) {
            if (mode === 'text') this.fail(`${outcome.error.code}: ${outcome.error.message}`, `Suggestion: ${outcome.error.suggestion}`);
            else process.exitCode = 1;
            return;
        }

        const artifact = outcome.value;
        if (outPath) {
            fs.writeFileSync(outPath, artifact.query + '\n');
            if (mode === 'text') console.error(`Query written to ${outPath}`);
        } else if (mode === 'text') {
            console.log(artifact.query);
        }

        if (mode === 'text') {
            console.error(`\nStatus: ${artifact.status}${artifact.verified ? '' : ' (unverified)'}`);
            for (const item of artifact.unresolved) {
                console.error(`   ${item.nodeId}: ${item.reason}`);
                console.error(`      -> ${item.suggestion}`);
            }
        }
        if (artifact.status === 'degraded') process.exitCode = 2;
    }

    private showHelp(): void {
        console.log(`
querysmith - mapping document to validated SQL

USAGE:
  querysmith <command> [options]

COMMANDS:
  generate <spec.json>   Generate a query from a normalized mapping specification
  providers              List providers configured from the environment
  help                   Show this help

GENERATE OPTIONS:
  --level <level>        conservative | balanced | aggressive (default: balanced)
  --budget <usd>         Cost ceiling in USD (default: ${BUDGET.DEFAULT_MAX_COST_USD})
  --max-tokens <n>       Token ceiling
  --timeout <ms>         Wall-clock limit for the request
  --seed <seed.json>     Seed rows for the SQLite sandbox, keyed by table name
  --strategy <file>      Strategy overrides (JSON)
  --out <file.sql>       Write the query to a file
  --json                 Print events as JSON lines
  --sse                  Print events as Server-Sent Events

EXIT CODES:
  0 complete, 1 failed, 2 degraded

EXAMPLES:
  querysmith generate orders.spec.json --level conservative --budget 0.25
  QUERYSMITH_PROVIDERS=anthropic,openai querysmith generate orders.spec.json --json
`);
    }
}

// Run CLI
if (require.main === module) {
    const cli = new QuerysmithCLI();
    cli.run(process.argv).catch((err: unknown) => {
        console.error('Fatal error:', err);
        process.exit(1);
    });
}

export { QuerysmithCLI };
