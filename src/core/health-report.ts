import type { GatewayConfig } from '../config/config-loader.js';
import type {
    EndpointCheckResult,
    HealthReport,
    HealthReportMode,
    SmokeCheckResult,
} from '../types/health-report.js';

const ENDPOINT_TIMEOUT_MS = 12_000;
const SMOKE_TIMEOUT_MS = 30_000;
const ENDPOINT_SNIPPET_CHARS = 800;
const SMOKE_SNIPPET_CHARS = 1_200;
const SMOKE_MAX_TOKENS = 16;

export interface HealthReportOptions {
    mode?: HealthReportMode;
    now?: () => Date;
    /** Gateway address to probe; defaults to the loopback interface on the configured port. */
    gatewayUrl?: string;
}

interface HttpProbe {
    code: number;
    body: string;
}

/** Accepts `full`, `compact` and the query-style `?compact`. */
export function parseHealthReportMode(raw: string | undefined): HealthReportMode | null {
    if (raw === undefined || raw === 'full') {
        return 'full';
    }
    if (raw === 'compact' || raw === '?compact') {
        return 'compact';
    }
    return null;
}

async function probe(url: string, init: RequestInit, timeoutMs: number): Promise<HttpProbe> {
    try {
        const response = await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
        return { code: response.status, body: await response.text() };
    } catch {
        return { code: 0, body: '' };
    }
}

/**
 * End-to-end readiness report for a deployed gateway: model listings on both
 * backends and the gateway, then one smoke completion per backend routed
 * through the gateway's passthrough surface.
 */
export class HealthReportService {
    readonly #config: Readonly<GatewayConfig>;
    readonly #mode: HealthReportMode;
    readonly #now: () => Date;
    readonly #gatewayUrl: string;

    constructor(config: Readonly<GatewayConfig>, options: HealthReportOptions = {}) {
        this.#config = config;
        this.#mode = options.mode ?? 'full';
        this.#now = options.now ?? (() => new Date());
        this.#gatewayUrl = options.gatewayUrl ?? `http://127.0.0.1:${config.port}`;
    }

    async run(): Promise<HealthReport> {
        const endpointChecks = await Promise.all([
            this.#checkEndpoint('reasoning_models', `${this.#config.reasoning.backendEndpoint}/v1/models`),
            this.#checkEndpoint('multimodal_models', `${this.#config.multimodal.backendEndpoint}/v1/models`),
            this.#checkEndpoint('gateway_models', `${this.#gatewayUrl}/v1/models`),
        ]);
        const smokeChecks = await Promise.all([
            this.#smoke('reasoning_smoke', this.#config.reasoning.canonicalId, 'Reply with READY_REASONING'),
            this.#smoke('multimodal_smoke', this.#config.multimodal.canonicalId, [
                { type: 'text', text: 'Reply with READY_MM' },
            ]),
        ]);

        return {
            timestamp_utc: this.#now().toISOString().replace(/\.\d{3}Z$/, 'Z'),
            mode: this.#mode,
            ok: [...endpointChecks, ...smokeChecks].every((check) => check.ok),
            stack: {
                public_port: this.#config.port,
                reasoning_url: this.#config.reasoning.backendEndpoint,
                multimodal_url: this.#config.multimodal.backendEndpoint,
                reasoning_model: this.#config.reasoning.canonicalId,
                multimodal_model: this.#config.multimodal.canonicalId,
            },
            endpoint_checks: endpointChecks,
            smoke_checks: smokeChecks,
        };
    }

    async #checkEndpoint(name: string, url: string): Promise<EndpointCheckResult> {
        const { code, body } = await probe(url, { method: 'GET' }, ENDPOINT_TIMEOUT_MS);
        return { name, url, code, ok: code === 200, body_snippet: this.#snippet(body, ENDPOINT_SNIPPET_CHARS) };
    }

    async #smoke(name: string, model: string, content: unknown): Promise<SmokeCheckResult> {
        const { code, body } = await probe(
            `${this.#gatewayUrl}/v1/chat/completions`,
            {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({
                    model,
                    messages: [{ role: 'user', content }],
                    max_tokens: SMOKE_MAX_TOKENS,
                }),
            },
            SMOKE_TIMEOUT_MS,
        );
        return {
            name,
            code,
            ok: code === 200 && body.includes('choices'),
            body_snippet: this.#snippet(body, SMOKE_SNIPPET_CHARS),
        };
    }

    #snippet(body: string, limit: number): string {
        return this.#mode === 'full' ? body.slice(0, limit) : '';
    }
}
