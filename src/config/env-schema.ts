/**
 * Centralized registry of all environment keys consumed by the gateway.
 *
 * Each entry declares:
 *   - `key`          The exact env variable name.
 *   - `kind`         How the raw value is interpreted ('port' | 'url' | 'string' | 'path').
 *   - `scope`        Subsystem that owns the key.
 *   - `defaultValue` Value used when the variable is unset or empty.
 *   - `description`  Human-readable purpose.
 *   - `remediation`  Actionable hint when the value is invalid.
 */

export type ConfigKeyKind = 'port' | 'url' | 'string' | 'path';

export type ConfigKeyScope = 'runtime' | 'backend' | 'model';

export type GatewayConfigKey =
  | 'PUBLIC_PORT'
  | 'REASONING_URL'
  | 'MULTIMODAL_URL'
  | 'MODEL_REASONING_ID'
  | 'MODEL_MULTIMODAL_ID'
  | 'MODEL_REASONING_ALIAS'
  | 'MODEL_MULTIMODAL_ALIAS'
  | 'GATEWAY_STATIC_DIR'
  | 'GATEWAY_LOG_DIR';

export interface ConfigKeySpec {
  key: GatewayConfigKey;
  kind: ConfigKeyKind;
  scope: ConfigKeyScope;
  defaultValue: string;
  description: string;
  remediation: string;
}

export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
  // ── Runtime ──────────────────────────────────────────────────────────────────
  {
    key: 'PUBLIC_PORT',
    kind: 'port',
    scope: 'runtime',
    defaultValue: '8080',
    description: 'Listening port for the public gateway HTTP surface (default: 8080).',
    remediation: 'Set PUBLIC_PORT to an integer between 1 and 65535, e.g. PUBLIC_PORT=8080.',
  },
  {
    key: 'GATEWAY_STATIC_DIR',
    kind: 'path',
    scope: 'runtime',
    defaultValue: 'static',
    description: 'Directory served under / and /static/* (default: ./static).',
    remediation: 'Point GATEWAY_STATIC_DIR at a directory containing index.html.',
  },
  {
    key: 'GATEWAY_LOG_DIR',
    kind: 'path',
    scope: 'runtime',
    defaultValue: 'logs',
    description: 'Directory receiving the daily markdown operator log (default: ./logs).',
    remediation: 'Set GATEWAY_LOG_DIR to a writable directory.',
  },

  // ── Backends ─────────────────────────────────────────────────────────────────
  {
    key: 'REASONING_URL',
    kind: 'url',
    scope: 'backend',
    defaultValue: 'http://127.0.0.1:8355',
    description: 'Base URL of the reasoning inference backend.',
    remediation: 'Set REASONING_URL to an absolute http(s) URL, e.g. http://127.0.0.1:8355.',
  },
  {
    key: 'MULTIMODAL_URL',
    kind: 'url',
    scope: 'backend',
    defaultValue: 'http://127.0.0.1:8356',
    description: 'Base URL of the multimodal inference backend.',
    remediation: 'Set MULTIMODAL_URL to an absolute http(s) URL, e.g. http://127.0.0.1:8356.',
  },

  // ── Models ───────────────────────────────────────────────────────────────────
  {
    key: 'MODEL_REASONING_ID',
    kind: 'string',
    scope: 'model',
    defaultValue: 'nvidia/Phi-4-reasoning-plus-FP8',
    description: 'Canonical model id served by the reasoning backend.',
    remediation: 'Set MODEL_REASONING_ID to the id the reasoning backend reports on /v1/models.',
  },
  {
    key: 'MODEL_MULTIMODAL_ID',
    kind: 'string',
    scope: 'model',
    defaultValue: 'nvidia/Phi-4-multimodal-instruct-NVFP4',
    description: 'Canonical model id served by the multimodal backend.',
    remediation: 'Set MODEL_MULTIMODAL_ID to the id the multimodal backend reports on /v1/models.',
  },
  {
    key: 'MODEL_REASONING_ALIAS',
    kind: 'string',
    scope: 'model',
    defaultValue: 'phi-4-reasoning-plus',
    description: 'Short alias accepted in place of the reasoning model id.',
    remediation: 'Set MODEL_REASONING_ALIAS to a non-empty name distinct from the other model names.',
  },
  {
    key: 'MODEL_MULTIMODAL_ALIAS',
    kind: 'string',
    scope: 'model',
    defaultValue: 'phi-4-multimodal-instruct',
    description: 'Short alias accepted in place of the multimodal model id.',
    remediation: 'Set MODEL_MULTIMODAL_ALIAS to a non-empty name distinct from the other model names.',
  },
] as const;

/** Quick lookup map by key name. */
export const CONFIG_SCHEMA_MAP: ReadonlyMap<GatewayConfigKey, ConfigKeySpec> = new Map(
  CONFIG_SCHEMA.map((spec) => [spec.key, spec]),
);
