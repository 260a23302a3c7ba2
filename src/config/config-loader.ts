import { CONFIG_SCHEMA_MAP, type GatewayConfigKey } from './env-schema.js';
import type { ModelIdentity } from '../types/dispatch.js';

export type EnvSource = Readonly<Record<string, string | undefined>>;

export interface GatewayConfig {
    port: number;
    staticDir: string;
    logDir: string;
    reasoning: ModelIdentity;
    multimodal: ModelIdentity;
}

function stripTrailingSlash(url: string): string {
    return url.replace(/\/+$/, '');
}

/**
 * Resolve a single configuration value: the environment wins when set to a
 * non-blank value, otherwise the schema default applies.
 */
export function getConfigValue(key: GatewayConfigKey, env: EnvSource = process.env): string {
    const raw = env[key];
    if (typeof raw === 'string' && raw.trim() !== '') {
        return raw.trim();
    }
    return CONFIG_SCHEMA_MAP.get(key)?.defaultValue ?? '';
}

/**
 * Build the immutable gateway configuration. Read once at startup; there is
 * no reload path.
 */
export function loadGatewayConfig(env: EnvSource = process.env): Readonly<GatewayConfig> {
    const port = Number.parseInt(getConfigValue('PUBLIC_PORT', env), 10);

    const reasoning: ModelIdentity = Object.freeze({
        role: 'reasoning',
        canonicalId: getConfigValue('MODEL_REASONING_ID', env),
        alias: getConfigValue('MODEL_REASONING_ALIAS', env),
        backendEndpoint: stripTrailingSlash(getConfigValue('REASONING_URL', env)),
    });
    const multimodal: ModelIdentity = Object.freeze({
        role: 'multimodal',
        canonicalId: getConfigValue('MODEL_MULTIMODAL_ID', env),
        alias: getConfigValue('MODEL_MULTIMODAL_ALIAS', env),
        backendEndpoint: stripTrailingSlash(getConfigValue('MULTIMODAL_URL', env)),
    });

    return Object.freeze({
        port: Number.isInteger(port) ? port : 8080,
        staticDir: getConfigValue('GATEWAY_STATIC_DIR', env),
        logDir: getConfigValue('GATEWAY_LOG_DIR', env),
        reasoning,
        multimodal,
    });
}
